export class MemcachedCliError extends Error {
    constructor(message: string) {
        super(message)
        this.name = new.target.name
    }
}

export class ConnectError extends MemcachedCliError {
    public readonly address: string

    constructor(address: string, reason: string) {
        super(`Can't connect to memcached server at ${address}: ${reason}`)
        this.address = address
    }
}

export class ConnectionClosed extends MemcachedCliError {
    public readonly reason: string

    constructor(reason: string) {
        super(`Connection closed: ${reason}`)
        this.reason = reason
    }
}

export class FramingError extends MemcachedCliError {
    constructor(message: string) {
        super(`Framing error: ${message}`)
    }
}

export class InvalidKey extends MemcachedCliError {
    public readonly key: string

    constructor(key: string, message: string) {
        super(message)
        this.key = key
    }
}

export class InvalidValue extends MemcachedCliError {}

export class InvalidAddress extends MemcachedCliError {
    constructor(address: string) {
        super(`Invalid memcached address: ${address}`)
    }
}

export class ClientError extends MemcachedCliError {
    public readonly serverMessage: string

    constructor(serverMessage: string) {
        super(`CLIENT_ERROR ${serverMessage}`)
        this.serverMessage = serverMessage
    }
}

export class ServerError extends MemcachedCliError {
    public readonly serverMessage: string

    constructor(serverMessage: string) {
        super(`SERVER_ERROR ${serverMessage}`)
        this.serverMessage = serverMessage
    }
}

export class CommandError extends MemcachedCliError {
    constructor() {
        super('Received an ERROR response')
    }
}

export class UnknownReply extends MemcachedCliError {
    public readonly raw: string

    constructor(raw: string) {
        super(`Unknown response from the memcached server: ${raw}`)
        this.raw = raw
    }
}

export class DataSourceError extends MemcachedCliError {
    public readonly cause: Error

    constructor(message: string, cause: Error) {
        super(`${message}: ${cause.message}`)
        this.cause = cause
    }
}

export class DataSourceBusy extends MemcachedCliError {
    constructor() {
        super('Another command is still in flight on this connection')
    }
}
