export interface ITcpAddress {
    host: string
    port: number
}

export interface ISocketPathAddress {
    path: string
}

export type Address =
    ITcpAddress | ISocketPathAddress

export interface ILogger {
    log(message: string): void
}

export interface IDataSourceConfig {
    timeout: number         // ms allowed for connect and for each read/write wait
    maxKeySize: number      // max key size allowed by Memcached
    maxValue: number        // max length of value allowed by Memcached
    reconnect: boolean      // reconnect once and retry when the link drops mid-command
    debug: boolean          // output the commands and responses
    logger: ILogger
}

export type DataSourceOptions =
    Partial<IDataSourceConfig>

export type StatusKind =
    'OK' | 'STORED' | 'NOT_STORED' | 'EXISTS' |
    'DELETED' | 'NOT_FOUND' | 'TOUCHED'

export type StatusReply =
    { kind: StatusKind } |
    { kind: 'ERROR' } |
    { kind: 'CLIENT_ERROR', message: string } |
    { kind: 'SERVER_ERROR', message: string } |
    { kind: 'UNKNOWN', raw: string }

export type StorageStatus =
    'STORED' | 'NOT_STORED' | 'EXISTS' | 'NOT_FOUND'

export type DeleteStatus =
    'DELETED' | 'NOT_FOUND'

export interface IValueHeader {
    key: string
    flags: number
    bytes: number
    cas?: string
}

export interface IValueBlock {
    header: IValueHeader
    data: Buffer
}

// What the decoders need from a connection
export interface ILineReader {
    readLine(): Promise<string>
    readExact(length: number): Promise<Buffer>
}

export interface IStoreOptions {
    flags?: number
    expire?: number
}
