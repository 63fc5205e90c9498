import { createServer, Server, Socket } from 'net'

import { ConnectionClosed } from '../lib/errors'
import { ILineReader, ILogger } from '../lib/types'

const CRLF = Buffer.from('\r\n')
const STORAGE_VERBS = ['set', 'add', 'replace', 'append', 'prepend', 'cas']

interface IStoredValue {
    value: Buffer
    flags: number
    cas: number
}

// `null` drops the connection instead of answering
export type ScriptedReply =
    string | Buffer | null

/**
 * A scripted, in-process stand-in for a memcached server. It understands the
 * commands the client sends; `nextReply` overrides the answer to the next
 * command received on any connection.
 */
export class FakeMemcached {
    public readonly store: Map<string, IStoredValue> = new Map()
    public readonly received: Array<string> = []
    public connections: number = 0

    private server: Server
    private sockets: Set<Socket> = new Set()
    private replies: Array<ScriptedReply> = []
    private casCounter: number = 0
    private stalled: boolean = false

    constructor() {
        this.server = createServer((socket) => this.accept(socket))
    }

    get address(): string {
        const info = this.server.address()
        if (info === null || typeof info === 'string') {
            throw new Error('The fake server is not listening on a TCP port')
        }

        return `127.0.0.1:${info.port}`
    }

    public start(): Promise<string> {
        return new Promise((resolve) => {
            this.server.listen(0, '127.0.0.1', () => resolve(this.address))
        })
    }

    public stop(): Promise<void> {
        this.sockets.forEach((socket) => socket.destroy())
        return new Promise((resolve) => {
            this.server.close(() => resolve())
        })
    }

    public nextReply(...replies: Array<ScriptedReply>): void {
        this.replies.push(...replies)
    }

    // new connections are accepted but never read from
    public stall(): void {
        this.stalled = true
    }

    public reset(): void {
        this.stalled = false
        this.store.clear()
        this.received.length = 0
        this.replies.length = 0
        this.connections = 0
    }

    private accept(socket: Socket): void {
        let buffer = Buffer.alloc(0)
        this.connections++
        this.sockets.add(socket)

        socket.on('close', () => this.sockets.delete(socket))
        socket.on('error', () => socket.destroy())

        if (this.stalled) {
            socket.pause()
            return
        }

        socket.on('data', (chunk: Buffer) => {
            buffer = Buffer.concat([buffer, chunk])

            for (;;) {
                const index = buffer.indexOf(CRLF)
                if (index === -1 || socket.destroyed) {
                    return
                }

                const line = buffer.subarray(0, index).toString()
                const tokens = line.split(' ')
                let data = Buffer.alloc(0)
                let consumed = index + CRLF.length

                if (STORAGE_VERBS.indexOf(tokens[0]) > -1) {
                    const bytes = +tokens[4]
                    if (buffer.length < consumed + bytes + CRLF.length) {
                        return
                    }

                    data = Buffer.from(buffer.subarray(consumed, consumed + bytes))
                    consumed += bytes + CRLF.length
                }

                buffer = buffer.subarray(consumed)
                this.handle(socket, line, tokens, data)
            }
        })
    }

    private handle(socket: Socket, line: string, tokens: Array<string>, data: Buffer): void {
        this.received.push(line)

        if (this.replies.length) {
            const reply = this.replies.shift()
            if (reply === null || reply === undefined) {
                socket.destroy()
            } else {
                socket.write(reply)
            }

            return
        }

        socket.write(this.respond(tokens, data))
    }

    private respond(tokens: Array<string>, data: Buffer): Buffer | string {
        const [verb, key] = tokens
        const existing = this.store.get(key)

        switch (verb) {
            case 'get':
            case 'gets': {
                const chunks: Array<Buffer> = []
                tokens.slice(1).forEach((name) => {
                    const entry = this.store.get(name)
                    if (entry) {
                        const cas = verb === 'gets' ? ` ${entry.cas}` : ''
                        chunks.push(Buffer.from(`VALUE ${name} ${entry.flags} ${entry.value.length}${cas}\r\n`), entry.value, CRLF)
                    }
                })
                chunks.push(Buffer.from('END\r\n'))
                return Buffer.concat(chunks)
            }

            case 'set':
                return this.put(key, data, +tokens[2])

            case 'add':
                return existing ? 'NOT_STORED\r\n' : this.put(key, data, +tokens[2])

            case 'replace':
                return existing ? this.put(key, data, +tokens[2]) : 'NOT_STORED\r\n'

            case 'append':
            case 'prepend':
                if (!existing) {
                    return 'NOT_STORED\r\n'
                }

                return this.put(key, verb === 'append'
                    ? Buffer.concat([existing.value, data])
                    : Buffer.concat([data, existing.value]), existing.flags)

            case 'cas':
                if (!existing) {
                    return 'NOT_FOUND\r\n'
                }

                return String(existing.cas) === tokens[5] ? this.put(key, data, +tokens[2]) : 'EXISTS\r\n'

            case 'delete':
                return this.store.delete(key) ? 'DELETED\r\n' : 'NOT_FOUND\r\n'

            case 'version':
                return 'VERSION 1.6.21\r\n'

            case 'stats':
                return this.stats(tokens.slice(1))

            default:
                return 'ERROR\r\n'
        }
    }

    private put(key: string, value: Buffer, flags: number): string {
        this.store.set(key, { value, flags, cas: ++this.casCounter })
        return 'STORED\r\n'
    }

    private stats(args: Array<string>): string {
        const lines: Array<string> = []

        switch (args.join(' ')) {
            case '':
                lines.push('STAT pid 4242', 'STAT uptime 3600', `STAT curr_items ${this.store.size}`, 'STAT version 1.6.21')
                break

            case 'settings':
                lines.push('STAT tcpport 11211', 'STAT maxbytes 67108864', 'STAT evictions on')
                break

            case 'items':
                lines.push(
                    'STAT items:1:number 2',
                    'STAT items:1:age 120',
                    'STAT items:1:evicted 0',
                    'STAT items:1:evicted_time 0',
                    'STAT items:1:outofmemory 0',
                    'STAT items:2:number 1',
                    'STAT items:2:age 30',
                    'STAT items:2:evicted 3',
                    'STAT items:2:evicted_time 15',
                    'STAT items:2:outofmemory 1',
                )
                break

            case 'slabs':
                lines.push(
                    'STAT 1:chunk_size 96',
                    'STAT 1:total_pages 1',
                    'STAT 1:free_chunks_end 0',
                    'STAT 2:chunk_size 1184',
                    'STAT 2:total_pages 2',
                    'STAT 2:free_chunks_end 5',
                    'STAT 3:chunk_size 1480',
                    'STAT 3:total_pages 0',
                    'STAT active_slabs 2',
                    'STAT total_malloced 2097152',
                )
                break

            case 'detail on':
            case 'detail off':
                return 'OK\r\n'

            case 'detail dump':
                lines.push('PREFIX mykey get 1 hit 1 set 1 del 0')
                break

            default:
                if (args[0] === 'cachedump') {
                    Array.from(this.store.keys()).slice(0, +args[2]).forEach((name) => {
                        lines.push(`ITEM ${name} [${this.store.get(name)?.value.length} b; 0 s]`)
                    })
                    break
                }

                return 'ERROR\r\n'
        }

        return lines.concat('END').map((line) => `${line}\r\n`).join('')
    }
}

/**
 * Line reader over a fixed buffer, for decoding replies without a socket.
 * Running out of data behaves like the server hanging up.
 */
export class BufferReader implements ILineReader {
    private buffer: Buffer

    constructor(data: string | Buffer) {
        this.buffer = typeof data === 'string' ? Buffer.from(data) : data
    }

    get remaining(): number {
        return this.buffer.length
    }

    public async readLine(): Promise<string> {
        const index = this.buffer.indexOf(CRLF)
        if (index === -1) {
            throw new ConnectionClosed('end of test data')
        }

        const line = this.buffer.subarray(0, index).toString()
        this.buffer = this.buffer.subarray(index + CRLF.length)
        return line
    }

    public async readExact(length: number): Promise<Buffer> {
        if (this.buffer.length < length) {
            throw new ConnectionClosed('end of test data')
        }

        const data = this.buffer.subarray(0, length)
        this.buffer = this.buffer.subarray(length)
        return data
    }
}

export class MemoryLogger implements ILogger {
    public readonly lines: Array<string> = []

    public log(message: string): void {
        this.lines.push(message)
    }
}

/**
 * Generate a random alphabetical string.
 */
export function alphabet(n: number): string {
    let result: string = ''
    for (let i = 0; i < n; i++) {
        result += String.fromCharCode(97 + Math.floor(Math.random() * 26))
    }

    return result
}

export function wait(delay: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(() => { resolve() }, delay)
    })
}

// Returns an address nothing listens on
export async function closedPort(): Promise<string> {
    const server = new FakeMemcached()
    const address = await server.start()
    await server.stop()
    return address
}
