import { Command } from './commands'
import { LINEBREAK, SINGLE_LINE_TOKENS, TERMINATOR } from './constants'
import { ClientError, CommandError, FramingError, ServerError, UnknownReply } from './errors'
import {
    DeleteStatus,
    ILineReader,
    IValueBlock,
    IValueHeader,
    StatusReply,
    StorageStatus,
} from './types'

const DIGITS = /^\d+$/
const MAX_FLAGS = 0xffffffff

// Wire lines for a command, each one is sent followed by CRLF
export function encode(command: Command): Array<string | Buffer> {
    switch (command.type) {
        case 'get':
        case 'gets':
        case 'delete':
            return [`${command.type} ${command.key}`]

        case 'set':
        case 'add':
        case 'replace':
        case 'append':
        case 'prepend':
        case 'cas':
            return [
                `${command.type} ${command.key} ${command.flags} ${command.expire} ${command.value.length}` +
                    (command.cas !== undefined ? ` ${command.cas}` : ''),
                command.value,
            ]

        case 'version':
            return ['version']

        case 'stats':
            return [command.sub ? `stats ${command.sub}` : 'stats']

        case 'cachedump':
            return [`stats cachedump ${command.slabClass} ${command.limit}`]

        case 'raw':
            return [command.line]

        default: {
            const _exhaustiveCheck: never = command
            throw new Error(`Unknown command ${JSON.stringify(_exhaustiveCheck)}`)
        }
    }
}

export function toWire(lines: Array<string | Buffer>): Buffer {
    const chunks: Array<Buffer> = []
    lines.forEach((line) => {
        chunks.push(typeof line === 'string' ? Buffer.from(line) : line, Buffer.from(LINEBREAK))
    })

    return Buffer.concat(chunks)
}

export function decodeStatus(line: string): StatusReply {
    const space = line.indexOf(' ')
    const token = space === -1 ? line : line.slice(0, space)
    const message = space === -1 ? '' : line.slice(space + 1)

    switch (token) {
        case 'CLIENT_ERROR':
        case 'SERVER_ERROR':
            return { kind: token, message }

        case 'ERROR':
            return { kind: token }

        case 'OK':
        case 'STORED':
        case 'NOT_STORED':
        case 'EXISTS':
        case 'DELETED':
        case 'NOT_FOUND':
        case 'TOUCHED':
            if (space === -1) {
                return { kind: token }
            }
            break
    }

    return { kind: 'UNKNOWN', raw: line }
}

// Throws the typed error for error replies, no-op for anything else
export function raiseOnError(line: string): void {
    const reply = decodeStatus(line)

    switch (reply.kind) {
        case 'ERROR':
            throw new CommandError()
        case 'CLIENT_ERROR':
            throw new ClientError(reply.message)
        case 'SERVER_ERROR':
            throw new ServerError(reply.message)
    }
}

export function parseValueHeader(line: string): IValueHeader {
    const tokens = line.split(' ')

    if (tokens[0] !== 'VALUE') {
        raiseOnError(line)
        throw new FramingError(`expected VALUE or ${TERMINATOR}, got "${line}"`)
    }

    if (tokens.length < 4 || tokens.length > 5 || !tokens[1]) {
        throw new FramingError(`malformed VALUE header "${line}"`)
    }

    const [, key, flags, bytes, cas] = tokens
    if (!DIGITS.test(flags) || +flags > MAX_FLAGS) {
        throw new FramingError(`invalid flags in VALUE header "${line}"`)
    }

    if (!DIGITS.test(bytes)) {
        throw new FramingError(`invalid length in VALUE header "${line}"`)
    }

    if (cas !== undefined && !DIGITS.test(cas)) {
        throw new FramingError(`invalid cas in VALUE header "${line}"`)
    }

    const header: IValueHeader = { key, flags: +flags, bytes: +bytes }
    if (cas !== undefined) {
        header.cas = cas
    }

    return header
}

/**
 * Reads the reply to a single key `get`/`gets`. Resolves `undefined` when the
 * server has no value for the key. The declared length has to be consumed
 * exactly and may not exceed `maxBytes`, anything else is a FramingError.
 */
export async function decodeValueBlock(
    reader: ILineReader,
    expectedKey?: string,
    maxBytes: number = Number.POSITIVE_INFINITY,
): Promise<IValueBlock | undefined> {
    const line = await reader.readLine()
    if (line === TERMINATOR) {
        return undefined
    }

    const header = parseValueHeader(line)
    if (expectedKey !== undefined && header.key !== expectedKey) {
        throw new FramingError(`expected a value for key "${expectedKey}", got "${header.key}"`)
    }

    if (header.bytes > maxBytes) {
        throw new FramingError(`value of key "${header.key}" declares ${header.bytes} bytes, more than the maximum of ${maxBytes}`)
    }

    const data = await reader.readExact(header.bytes)
    const tail = await reader.readExact(LINEBREAK.length)
    if (tail.toString('latin1') !== LINEBREAK) {
        throw new FramingError(`value of key "${header.key}" does not end after the declared ${header.bytes} bytes`)
    }

    const end = await reader.readLine()
    if (end !== TERMINATOR) {
        throw new FramingError(`expected ${TERMINATOR} after the value of key "${header.key}", got "${end}"`)
    }

    return { header, data }
}

/**
 * Reads a multi-line reply up to END and returns the lines verbatim, without
 * the terminator. A first line that completes a reply by itself (`OK`,
 * `VERSION 1.6.21`, `STORED`, ...) is returned alone.
 */
export async function decodeBlock(reader: ILineReader): Promise<Array<string>> {
    const lines: Array<string> = []

    for (;;) {
        const line = await reader.readLine()
        if (line === TERMINATOR) {
            return lines
        }

        raiseOnError(line)

        if (!lines.length && SINGLE_LINE_TOKENS.indexOf(line.split(' ')[0]) > -1) {
            return [line]
        }

        lines.push(line)
    }
}

export async function decodeStorage(reader: ILineReader): Promise<StorageStatus> {
    const line = await reader.readLine()
    const reply = decodeStatus(line)

    switch (reply.kind) {
        case 'STORED':
        case 'NOT_STORED':
        case 'EXISTS':
        case 'NOT_FOUND':
            return reply.kind
    }

    raiseOnError(line)
    throw new UnknownReply(line)
}

export async function decodeDelete(reader: ILineReader): Promise<DeleteStatus> {
    const line = await reader.readLine()
    const reply = decodeStatus(line)

    switch (reply.kind) {
        case 'DELETED':
        case 'NOT_FOUND':
            return reply.kind
    }

    raiseOnError(line)
    throw new UnknownReply(line)
}

export async function decodeVersion(reader: ILineReader): Promise<string> {
    const line = await reader.readLine()
    const match = /^VERSION (.+)$/.exec(line)
    if (match) {
        return match[1]
    }

    raiseOnError(line)
    throw new UnknownReply(line)
}
