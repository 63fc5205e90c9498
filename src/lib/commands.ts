export type StorageCommandType =
    'set' | 'add' | 'replace' | 'append' | 'prepend' | 'cas'

export type RetrievalCommandType =
    'get' | 'gets'

export interface IStorageCommand {
    type: StorageCommandType
    key: string
    value: Buffer
    flags: number
    expire: number
    cas?: string
}

export interface IRetrievalCommand {
    type: RetrievalCommandType
    key: string
}

export interface IDeleteCommand {
    type: 'delete'
    key: string
}

export interface IVersionCommand {
    type: 'version'
}

// `stats`, `stats settings`, `stats items`, `stats detail dump`, ...
export interface IStatsCommand {
    type: 'stats'
    sub?: string
}

export interface ICachedumpCommand {
    type: 'cachedump'
    slabClass: number
    limit: number
}

// a caller supplied line, sent as is
export interface IRawCommand {
    type: 'raw'
    line: string
}

export type Command =
    IStorageCommand | IRetrievalCommand | IDeleteCommand | IVersionCommand |
    IStatsCommand | ICachedumpCommand | IRawCommand

export type CommandType =
    Command['type']

const READ_ONLY_VERBS = ['get', 'gets', 'version', 'stats']

/**
 * Whether sending the command a second time cannot change what the server
 * holds. Only these are retried after the link drops mid-command.
 */
export function isRepeatable(command: Command): boolean {
    switch (command.type) {
        case 'get':
        case 'gets':
        case 'version':
        case 'stats':
        case 'cachedump':
            return true

        case 'raw': {
            const tokens = command.line.trim().split(/\s+/)
            // `stats detail on|off` toggles server state but is safe to repeat,
            // `stats reset` is not
            return READ_ONLY_VERBS.indexOf(tokens[0]) > -1 && tokens[1] !== 'reset'
        }

        case 'set':
        case 'add':
        case 'replace':
        case 'append':
        case 'prepend':
        case 'cas':
        case 'delete':
            return false

        default: {
            const _exhaustiveCheck: never = command
            throw new Error(`Unknown command ${JSON.stringify(_exhaustiveCheck)}`)
        }
    }
}

export function summarize(command: Command): string {
    switch (command.type) {
        case 'raw':
            return command.line
        case 'stats':
            return command.sub ? `stats ${command.sub}` : 'stats'
        case 'cachedump':
            return `stats cachedump ${command.slabClass} ${command.limit}`
        case 'version':
            return 'version'
        default:
            return `${command.type} ${command.key}`
    }
}
