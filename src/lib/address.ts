import { DEFAULT_HOST, DEFAULT_PORT } from './constants'
import { InvalidAddress } from './errors'
import { Address } from './types'

const HOST_PORT = /^([^:\s\[\]]+):(\d+)$/
const BRACKETED = /^\[([0-9a-fA-F:.]+)\](?::(\d+))?$/
const HOST_ONLY = /^[^:\s\/\[\]]+$/
const IPV6 = /^[0-9a-fA-F:.]*:[0-9a-fA-F:.]*$/

/**
 * Tells whether a command line argument names a server rather than a command,
 * e.g. `localhost:11211`, `[::1]:11211` or `/var/run/memcached.sock`.
 */
export function looksLikeAddress(text: string): boolean {
    return text.startsWith('/') || HOST_PORT.test(text) || BRACKETED.test(text)
}

/**
 * Parses `host:port`, a bare host (port defaults to 11211), `[ipv6]:port` or
 * a unix socket path. An empty address means the local default server.
 */
export function parseAddress(text?: string): Address {
    if (!text) {
        return { host: DEFAULT_HOST, port: DEFAULT_PORT }
    }

    if (text.startsWith('/')) {
        return { path: text }
    }

    let match = HOST_PORT.exec(text)
    if (match) {
        return { host: match[1], port: toPort(text, match[2]) }
    }

    match = BRACKETED.exec(text)
    if (match) {
        return { host: match[1], port: match[2] === undefined ? DEFAULT_PORT : toPort(text, match[2]) }
    }

    if (HOST_ONLY.test(text) || IPV6.test(text)) {
        return { host: text, port: DEFAULT_PORT }
    }

    throw new InvalidAddress(text)
}

export function formatAddress(address: Address): string {
    if ('path' in address) {
        return address.path
    }

    return address.host.includes(':')
        ? `[${address.host}]:${address.port}`
        : `${address.host}:${address.port}`
}

function toPort(text: string, port: string): number {
    const value = +port
    if (value < 1 || value > 65535) {
        throw new InvalidAddress(text)
    }

    return value
}
