import { Socket } from 'net'

import { formatAddress } from './address'
import { LINEBREAK } from './constants'
import { ConnectError, ConnectionClosed, FramingError } from './errors'
import { Address, ILineReader, ILogger } from './types'

const CRLF = Buffer.from(LINEBREAK)

interface IPendingRead {
    attempt(): boolean
    reject(err: Error): void
}

let sid = 0

/**
 * One socket to one memcached endpoint. A Connection is either connected or
 * closed for good; after any I/O failure a new one has to be created.
 */
export class Connection implements ILineReader {
    public static connect(address: Address, timeout: number, logger: ILogger | null = null): Promise<Connection> {
        const serverAddress = formatAddress(address)

        return new Promise((resolve, reject) => {
            const socket = new Socket()

            const onError = (err: Error): void => {
                fail(err.message)
            }
            const onTimeout = (): void => {
                fail(`timed out after ${timeout}ms`)
            }
            const onConnect = (): void => {
                socket.removeListener('error', onError)
                socket.removeListener('timeout', onTimeout)
                resolve(new Connection(sid++, serverAddress, socket, logger))
            }
            const fail = (reason: string): void => {
                socket.removeListener('connect', onConnect)
                socket.destroy()
                reject(new ConnectError(serverAddress, reason))
            }

            socket.setTimeout(timeout)
            socket.once('error', onError)
            socket.once('timeout', onTimeout)
            socket.once('connect', onConnect)

            if ('path' in address) {
                socket.connect(address.path)

            } else {
                socket.setNoDelay(true)
                socket.connect(address.port, address.host)
            }
        })
    }

    public readonly streamID: number
    public readonly serverAddress: string

    private socket: Socket | null
    private logger: ILogger | null
    private buffer: Buffer
    private pending: IPendingRead | null
    private writing: ((err: Error) => void) | null
    private closedReason: string

    private constructor(streamID: number, serverAddress: string, socket: Socket, logger: ILogger | null) {
        this.streamID = streamID
        this.serverAddress = serverAddress
        this.socket = socket
        this.logger = logger
        this.buffer = Buffer.alloc(0)
        this.pending = null
        this.writing = null
        this.closedReason = ''

        socket.on('data', (chunk: Buffer) => {
            this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk
            if (this.pending) {
                this.pending.attempt()
            }
        })
        socket.on('timeout', () => {
            // idle sockets may time out freely, only a waiting read or write fails
            if (this.pending || this.writing) {
                this.fail('timed out waiting for the server')
            }
        })
        socket.on('error', (err: Error) => {
            this.fail(err.message)
        })
        socket.on('end', () => {
            this.fail('server closed the connection')
        })
        socket.on('close', () => {
            this.fail('socket closed')
        })
    }

    get connected(): boolean {
        return this.socket !== null
    }

    public sendLine(line: string | Buffer): Promise<void> {
        return this.sendLines([line])
    }

    // Writes every line followed by CRLF in a single write
    public sendLines(lines: Array<string | Buffer>): Promise<void> {
        const socket = this.socket
        if (!socket) {
            return Promise.reject(new ConnectionClosed(this.closedReason))
        }

        if (this.buffer.length) {
            const unread = this.buffer.length
            this.close()
            return Promise.reject(new FramingError(`${unread} unread bytes left over from a previous reply`))
        }

        const chunks: Array<Buffer> = []
        lines.forEach((line) => {
            if (this.logger) {
                this.logger.log(`${this.streamID} << ${typeof line === 'string' ? line : `[${line.length} bytes]`}`)
            }

            chunks.push(typeof line === 'string' ? Buffer.from(line) : line, CRLF)
        })

        return new Promise((resolve, reject) => {
            this.writing = reject
            socket.write(Buffer.concat(chunks), (err?: Error | null) => {
                this.writing = null
                if (err) {
                    this.fail(err.message)
                    reject(new ConnectionClosed(this.closedReason))
                } else {
                    resolve()
                }
            })
        })
    }

    public readLine(): Promise<string> {
        return this.read((): string | undefined => {
            const index = this.buffer.indexOf(CRLF)
            if (index === -1) {
                return undefined
            }

            const line = this.buffer.subarray(0, index).toString('utf8')
            this.buffer = this.buffer.subarray(index + CRLF.length)

            if (this.logger) {
                this.logger.log(`${this.streamID} >> ${line}`)
            }

            return line
        })
    }

    public readExact(length: number): Promise<Buffer> {
        return this.read((): Buffer | undefined => {
            if (this.buffer.length < length) {
                return undefined
            }

            const data = Buffer.from(this.buffer.subarray(0, length))
            this.buffer = this.buffer.subarray(length)

            if (this.logger) {
                this.logger.log(`${this.streamID} >> [${length} bytes]`)
            }

            return data
        })
    }

    public close(): void {
        this.fail('closed by client')
    }

    private read<T>(take: () => T | undefined): Promise<T> {
        if (!this.socket) {
            return Promise.reject(new ConnectionClosed(this.closedReason))
        }

        if (this.pending) {
            return Promise.reject(new Error(`A read is already pending on connection ${this.streamID}`))
        }

        const ready = take()
        if (ready !== undefined) {
            return Promise.resolve(ready)
        }

        return new Promise((resolve, reject) => {
            this.pending = {
                attempt: (): boolean => {
                    const value = take()
                    if (value === undefined) {
                        return false
                    }

                    this.pending = null
                    resolve(value)
                    return true
                },
                reject: (err: Error): void => {
                    this.pending = null
                    reject(err)
                },
            }
        })
    }

    private fail(reason: string): void {
        const socket = this.socket
        if (!socket) {
            return
        }

        this.socket = null
        this.closedReason = reason
        this.buffer = Buffer.alloc(0)
        socket.destroy()

        if (this.logger) {
            this.logger.log(`${this.streamID} -- ${reason}`)
        }

        if (this.pending) {
            this.pending.reject(new ConnectionClosed(reason))
        }

        if (this.writing) {
            const reject = this.writing
            this.writing = null
            reject(new ConnectionClosed(reason))
        }
    }
}
