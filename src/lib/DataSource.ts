import { EventEmitter } from 'events'

import { parseAddress, formatAddress } from './address'
import * as Codec from './codec'
import {
    Command,
    IStorageCommand,
    isRepeatable,
    RetrievalCommandType,
    StorageCommandType,
    summarize,
} from './commands'
import { Connection } from './Connection'
import { DEFAULT_CONFIG } from './defaults'
import {
    ConnectError,
    ConnectionClosed,
    DataSourceBusy,
    DataSourceError,
    FramingError,
    InvalidValue,
} from './errors'
import { IItemStore, Item } from './Item'
import {
    Address,
    DataSourceOptions,
    DeleteStatus,
    IDataSourceConfig,
    ILineReader,
    IStoreOptions,
    StorageStatus,
} from './types'
import * as Utils from './utils'

type Decoder<T> =
    (reader: ILineReader) => Promise<T>

export type DetailMode =
    'on' | 'off'

/**
 * Session over a single connection to a single memcached server. One command
 * is in flight at a time; the connection is opened on first use.
 *
 * Emits `connect` and `reconnecting` with the server address, and `close`
 * when `end` is called.
 */
export class DataSource extends EventEmitter implements IItemStore {
    public static config: IDataSourceConfig = DEFAULT_CONFIG

    // Connects right away so a bad address fails before the first command
    public static async connect(address?: string | Address, options: DataSourceOptions = {}): Promise<DataSource> {
        const dataSource = new DataSource(address, options)
        await dataSource._connection()
        return dataSource
    }

    public readonly address: Address

    private _config: IDataSourceConfig
    private _connectionInstance: Connection | null
    private _busy: boolean
    private _generation: number     // bumped by end(), commands started before it give up

    constructor(address?: string | Address, options: DataSourceOptions = {}) {
        super()
        this._config = Utils.merge(DataSource.config, options)
        this.address = typeof address === 'object' ? address : parseAddress(address)
        this._connectionInstance = null
        this._busy = false
        this._generation = 0
    }

    get serverAddress(): string {
        return formatAddress(this.address)
    }

    get connected(): boolean {
        return this._connectionInstance !== null && this._connectionInstance.connected
    }

    public end(): void {
        this._generation++

        if (this._connectionInstance) {
            this._connectionInstance.close()
            this._connectionInstance = null
            this.emit('close', this.serverAddress)
        }
    }

    /**
     * Sends a line as typed by the user and returns the reply lines, without
     * the END terminator. Used for the `stats` family.
     */
    public async query(rawCommandText: string): Promise<Array<string>> {
        Utils.validateLine(rawCommandText)
        return this._execute({ type: 'raw', line: rawCommandText }, Codec.decodeBlock)
    }

    public get(key: string): Promise<Item | undefined> {
        return this.retrieve('get', key)
    }

    // like get, the item also carries its cas token
    public gets(key: string): Promise<Item | undefined> {
        return this.retrieve('gets', key)
    }

    public async retrieve(type: RetrievalCommandType, key: string): Promise<Item | undefined> {
        Utils.validateKey(key, this._config)

        const block = await this._execute({ type, key }, (reader) => Codec.decodeValueBlock(reader, key, this._config.maxValue))
        return block && Item.fromGetReply(block.header, block.data)
    }

    public set(key: string, value: string | Buffer, options: IStoreOptions = {}): Promise<StorageStatus> {
        return this.store('set', key, value, options)
    }

    public add(key: string, value: string | Buffer, options: IStoreOptions = {}): Promise<StorageStatus> {
        return this.store('add', key, value, options)
    }

    public replace(key: string, value: string | Buffer, options: IStoreOptions = {}): Promise<StorageStatus> {
        return this.store('replace', key, value, options)
    }

    public append(key: string, value: string | Buffer): Promise<StorageStatus> {
        return this.store('append', key, value)
    }

    public prepend(key: string, value: string | Buffer): Promise<StorageStatus> {
        return this.store('prepend', key, value)
    }

    // check and set
    public cas(key: string, value: string | Buffer, cas: string, options: IStoreOptions = {}): Promise<StorageStatus> {
        return this.store('cas', key, value, { ...options, cas })
    }

    // As all storage commands use the same syntax they are all proxied to this
    // method. Only `cas` takes the extra token.
    public async store(
        type: StorageCommandType,
        key: string,
        value: string | Buffer,
        options: IStoreOptions & { cas?: string } = {},
    ): Promise<StorageStatus> {
        if (type === 'cas' && options.cas === undefined) {
            throw new InvalidValue('A cas command needs the cas token of the item')
        }

        const command: IStorageCommand = {
            type,
            key,
            value: Utils.toBuffer(value),
            flags: options.flags ?? 0,
            expire: options.expire ?? 0,
        }
        if (type === 'cas') {
            command.cas = options.cas
        }

        Utils.validateStorage(command, this._config)
        return this._execute(command, Codec.decodeStorage)
    }

    public async delete(key: string): Promise<DeleteStatus> {
        Utils.validateKey(key, this._config)
        return this._execute({ type: 'delete', key }, Codec.decodeDelete)
    }

    public version(): Promise<string> {
        return this._execute({ type: 'version' }, Codec.decodeVersion)
    }

    // `stats`, or `stats <sub>` such as settings, items or slabs
    public async stats(sub?: string): Promise<Array<string>> {
        if (sub !== undefined) {
            Utils.validateLine(sub)
        }

        return this._execute({ type: 'stats', sub }, Codec.decodeBlock)
    }

    public async cachedump(slabClass: number, limit: number): Promise<Array<string>> {
        if (!Number.isInteger(slabClass) || slabClass < 1 || !Number.isInteger(limit) || limit < 0) {
            throw new InvalidValue(`Invalid cachedump arguments ${slabClass} ${limit}`)
        }

        return this._execute({ type: 'cachedump', slabClass, limit }, Codec.decodeBlock)
    }

    public detailDump(): Promise<Array<string>> {
        return this.stats('detail dump')
    }

    public detail(mode: DetailMode): Promise<Array<string>> {
        return this.stats(`detail ${mode}`)
    }

    private async _execute<T>(command: Command, decode: Decoder<T>): Promise<T> {
        if (this._busy) {
            throw new DataSourceBusy()
        }

        this._busy = true
        try {
            return await this._attempt(command, decode)
        } finally {
            this._busy = false
        }
    }

    private async _attempt<T>(command: Command, decode: Decoder<T>): Promise<T> {
        const lines = Codec.encode(command)
        const generation = this._generation
        const connection = await this._connection(generation)

        try {
            return await this._roundTrip(connection, lines, decode)

        } catch (err) {
            // closed by `end`, not by the link
            if (!(err instanceof ConnectionClosed) || !this._config.reconnect || this._generation !== generation) {
                throw err
            }

            // The server may already have applied a write, so only commands that
            // can safely be sent twice are retried. The next call reconnects.
            if (!isRepeatable(command)) {
                throw new DataSourceError(`"${summarize(command)}" may or may not have been applied`, err)
            }

            this.emit('reconnecting', this.serverAddress)
            this._log(`reconnecting to ${this.serverAddress} after: ${err.message}`)

            try {
                return await this._roundTrip(await this._connection(generation), lines, decode)

            } catch (cause) {
                if (this._generation !== generation) {
                    throw cause
                }

                if (cause instanceof ConnectionClosed || cause instanceof ConnectError) {
                    throw new DataSourceError(`"${summarize(command)}" failed after reconnecting`, cause)
                }

                throw cause
            }
        }
    }

    private async _roundTrip<T>(connection: Connection, lines: Array<string | Buffer>, decode: Decoder<T>): Promise<T> {
        try {
            await connection.sendLines(lines)
            return await decode(connection)

        } catch (err) {
            // never try to resynchronize, the rest of the stream can't be trusted
            if (err instanceof FramingError) {
                connection.close()
            }

            throw err
        }
    }

    private async _connection(generation: number = this._generation): Promise<Connection> {
        if (this._connectionInstance && this._connectionInstance.connected) {
            return this._connectionInstance
        }

        this._connectionInstance = null
        const connection = await Connection.connect(
            this.address,
            this._config.timeout,
            this._config.debug ? this._config.logger : null,
        )

        if (this._generation !== generation) {
            connection.close()
            throw new ConnectionClosed('closed by client')
        }

        this._connectionInstance = connection
        this.emit('connect', this.serverAddress)
        return connection
    }

    private _log(message: string): void {
        if (this._config.debug) {
            this._config.logger.log(message)
        }
    }
}
