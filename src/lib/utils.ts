import { IStorageCommand } from './commands'
import { InvalidKey, InvalidValue } from './errors'
import { IDataSourceConfig } from './types'

const MAX_FLAGS = 0xffffffff
const MAX_EXPIRE = 0x7fffffff

export function validateKey(key: string, config: IDataSourceConfig): void {
    if (!key) {
        throw new InvalidKey(key, 'The key should not be empty')

    } else if (Buffer.byteLength(key) > config.maxKeySize) {
        throw new InvalidKey(key, `Key "${key}" is longer than the maximum allowed length of ${config.maxKeySize}`)

    } else if (/[\s\x00-\x1f\x7f]/.test(key)) {
        throw new InvalidKey(key, 'The key should not contain any whitespace, control characters or new lines')
    }
}

export function validateStorage(command: IStorageCommand, config: IDataSourceConfig): void {
    validateKey(command.key, config)

    if (command.value.length > config.maxValue) {
        throw new InvalidValue(`The length of the value is greater than ${config.maxValue}`)

    } else if (!Number.isInteger(command.flags) || command.flags < 0 || command.flags > MAX_FLAGS) {
        throw new InvalidValue(`Flags must be an unsigned 32-bit integer, got ${command.flags}`)

    } else if (!Number.isInteger(command.expire) || command.expire < 0 || command.expire > MAX_EXPIRE) {
        throw new InvalidValue(`Expiration must be a non-negative number of seconds, got ${command.expire}`)

    } else if (command.cas !== undefined && !/^\d+$/.test(command.cas)) {
        throw new InvalidValue(`CAS token must be an unsigned integer, got "${command.cas}"`)
    }
}

export function validateLine(line: string): void {
    if (!line.trim()) {
        throw new InvalidValue('The command should not be empty')

    } else if (/[\r\n]/.test(line)) {
        throw new InvalidValue('The command should be a single line')
    }
}

// copies the defined values of each override onto a copy of the defaults
export function merge<T extends object>(defaults: T, ...overrides: Array<Partial<T>>): T {
    const target: T = { ...defaults }

    for (const override of overrides) {
        for (const [key, value] of Object.entries(override)) {
            if (value !== undefined) {
                Object.assign(target, { [key]: value })
            }
        }
    }

    return target
}

// always a new buffer, callers may reuse theirs
export function toBuffer(value: string | Buffer): Buffer {
    if (typeof value === 'string') {
        return Buffer.from(value)
    }

    return Buffer.from(value)
}
