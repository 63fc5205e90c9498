import { RetrievalCommandType, StorageCommandType } from './commands'
import { DISPLAY_DATA_LENGTH, NOT_ASCII, TRUNCATION_MARKER } from './constants'
import { FramingError } from './errors'
import { DeleteStatus, IStoreOptions, IValueHeader, StorageStatus } from './types'
import { toBuffer } from './utils'

// The part of a DataSource that items load themselves from and save themselves to
export interface IItemStore {
    retrieve(type: RetrievalCommandType, key: string): Promise<Item | undefined>
    store(type: StorageCommandType, key: string, value: string | Buffer, options?: IStoreOptions & { cas?: string }): Promise<StorageStatus>
    delete(key: string): Promise<DeleteStatus>
}

export interface IItemFields {
    key: string
    value: Buffer
    flags: number
    expire: number
    cas?: string
}

/**
 * A single cache entry. Items are immutable: `with` returns a changed copy.
 */
export class Item {
    public static fromGetReply(header: IValueHeader, data: Buffer): Item {
        if (data.length !== header.bytes) {
            throw new FramingError(`value of key "${header.key}" is ${data.length} bytes, header declared ${header.bytes}`)
        }

        return new Item({
            key: header.key,
            value: data,
            flags: header.flags,
            expire: 0,
            cas: header.cas,
        })
    }

    public static buildForSet(key: string, value: string | Buffer, expire: number = 0, flags: number = 0): Item {
        return new Item({ key, value: toBuffer(value), flags, expire })
    }

    public static find(store: IItemStore, key: string, command: RetrievalCommandType = 'get'): Promise<Item | undefined> {
        return store.retrieve(command, key)
    }

    public readonly key: string
    public readonly value: Buffer
    public readonly flags: number
    public readonly expire: number
    public readonly cas?: string

    constructor(fields: IItemFields) {
        this.key = fields.key
        this.value = fields.value
        this.flags = fields.flags
        this.expire = fields.expire
        if (fields.cas !== undefined) {
            this.cas = fields.cas
        }
    }

    get length(): number {
        return this.value.length
    }

    public with(changes: Partial<Omit<IItemFields, 'value'>> & { value?: string | Buffer }): Item {
        return new Item({
            key: changes.key ?? this.key,
            value: changes.value === undefined ? this.value : toBuffer(changes.value),
            flags: changes.flags ?? this.flags,
            expire: changes.expire ?? this.expire,
            cas: changes.cas ?? this.cas,
        })
    }

    // `cas` sends the token this item was read with
    public save(store: IItemStore, command: StorageCommandType = 'set'): Promise<StorageStatus> {
        return store.store(command, this.key, this.value, {
            flags: this.flags,
            expire: this.expire,
            cas: command === 'cas' ? this.cas : undefined,
        })
    }

    public remove(store: IItemStore): Promise<DeleteStatus> {
        return store.delete(this.key)
    }

    // Leading byte is printable ASCII or whitespace. Empty values count as printable.
    public isBinarySafe(): boolean {
        if (!this.value.length) {
            return true
        }

        const first = this.value[0]
        return (first >= 0x21 && first <= 0x7e) || first === 0x20 || (first >= 0x09 && first <= 0x0d)
    }

    public valueText(): string {
        return this.isBinarySafe() ? this.value.toString('utf8') : NOT_ASCII
    }

    public displayValue(): string {
        if (!this.isBinarySafe()) {
            return NOT_ASCII
        }

        if (this.value.length <= DISPLAY_DATA_LENGTH) {
            return this.value.toString('utf8')
        }

        return this.value.subarray(0, DISPLAY_DATA_LENGTH - 1).toString('utf8') + TRUNCATION_MARKER
    }

    // name/text pairs in the order they are printed
    public toFields(): Array<[string, string]> {
        const fields: Array<[string, string]> = [
            ['key', this.key],
            ['value', this.displayValue()],
            ['flags', String(this.flags)],
            ['length', String(this.length)],
        ]

        if (this.cas !== undefined) {
            fields.push(['cas', this.cas])
        }

        return fields
    }
}
