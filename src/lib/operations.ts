import { DEFAULT_CACHEDUMP_SIZE } from './constants'
import { DetailMode } from './DataSource'

export type OperationType =
    'help' | 'version' | 'quit' | 'display' | 'stats' | 'settings' |
    'cachedump' | 'detaildump' | 'detail' | 'get' | 'set' | 'delete'

export type Operation =
    { type: 'help', command?: string } |
    { type: 'version' } |
    { type: 'quit' } |
    { type: 'display' } |
    { type: 'stats' } |
    { type: 'settings' } |
    { type: 'cachedump', slabClass: number, limit: number } |
    { type: 'detaildump' } |
    { type: 'detail', mode: DetailMode } |
    { type: 'get', key: string } |
    { type: 'set', key: string, value: string, expire: number, flags: number } |
    { type: 'delete', key: string }

export type ParseResult =
    { ok: true, operation: Operation } |
    { ok: false, message: string }

export interface IOperationInfo {
    type: OperationType
    aliases: Array<string>
    summary: string
    description?: string
}

export const OPERATIONS: Array<IOperationInfo> = [
    { type: 'help', aliases: ['\\h'], summary: 'Show help (this)' },
    { type: 'version', aliases: ['\\v'], summary: 'Show server version' },
    { type: 'quit', aliases: ['\\q', 'exit'], summary: 'Exit' },
    { type: 'display', aliases: ['\\d'], summary: 'Display slabs info' },
    { type: 'stats', aliases: ['\\s'], summary: 'Show stats' },
    { type: 'settings', aliases: ['\\c', 'config'], summary: 'Show settings' },
    {
        type: 'cachedump',
        aliases: ['\\cd', 'dump'],
        summary: 'Show cachedump of specified slab',
        description: [
            'Usage:',
            '    > cachedump <CLASS> <NUMBER>',
            '    > cachedump 1 10',
            `    > cachedump 3     # default <NUMBER> ${DEFAULT_CACHEDUMP_SIZE}`,
        ].join('\n'),
    },
    {
        type: 'detaildump',
        aliases: ['\\dd'],
        summary: 'Show detail dump',
        description: [
            'Description:',
            '    Report statistics about data access using KEY prefix. The default separator',
            '    for prefix is \':\'.',
            '    If you have not enabled reporting at Memcached start-up, run "detail on".',
            '    See man memcached(1) for details.',
        ].join('\n'),
    },
    {
        type: 'detail',
        aliases: [],
        summary: 'Enable/Disable detail dump',
        description: [
            'Usage:',
            '    > detail on',
            '    > detail off',
            '',
            'Description:',
            '    See "\\h detaildump"',
        ].join('\n'),
    },
    { type: 'get', aliases: [], summary: 'Get data of KEY', description: 'Usage:\n    > get <KEY>' },
    {
        type: 'set',
        aliases: [],
        summary: 'Set data with KEY, VALUE',
        description: [
            'Usage:',
            '    > set <KEY> <VALUE> [<EXPIRE> [<FLAGS>]]',
            '    > set mykey1 MyValue1',
            '    > set mykey2 MyValue2 0     # Never expires. Default',
            '    > set mykey3 MyValue3 120 1',
        ].join('\n'),
    },
    { type: 'delete', aliases: [], summary: 'Delete data of KEY', description: 'Usage:\n    > delete <KEY>' },
]

const OPERATION_OF: Map<string, OperationType> = new Map()
OPERATIONS.forEach((info) => {
    OPERATION_OF.set(info.type, info.type)
    info.aliases.forEach((alias) => OPERATION_OF.set(alias, info.type))
})

// Resolves a command name or one of its aliases, e.g. `\cd` and `dump` to `cachedump`
export function resolveOperation(name: string): OperationType | undefined {
    return OPERATION_OF.get(name)
}

export function operationInfo(type: OperationType): IOperationInfo {
    const info = OPERATIONS.find((candidate) => candidate.type === type)
    if (!info) {
        throw new Error(`No help registered for ${type}`)
    }

    return info
}

// first alias, the name itself, then the remaining aliases
export function sortedAliasesOf(type: OperationType): Array<string> {
    const [first, ...rest] = operationInfo(type).aliases
    return first === undefined ? [type] : [first, type, ...rest]
}

const UNSIGNED = /^\d+$/

export function parseOperation(words: Array<string>): ParseResult {
    const [name, ...args] = words
    const type = name === undefined ? undefined : resolveOperation(name)

    if (type === undefined) {
        return { ok: false, message: `Unknown command - ${words.join(' ')}` }
    }

    switch (type) {
        case 'help':
            return { ok: true, operation: { type, command: args[0] } }

        case 'version':
        case 'quit':
        case 'display':
        case 'stats':
        case 'settings':
        case 'detaildump':
            return { ok: true, operation: { type } }

        case 'cachedump': {
            const [slabClass, limit] = args
            if (!slabClass) {
                return { ok: false, message: 'No slab class specified.' }
            }

            if (!UNSIGNED.test(slabClass) || +slabClass < 1 || (limit !== undefined && !UNSIGNED.test(limit))) {
                return { ok: false, message: 'CLASS and NUMBER must be positive numbers.' }
            }

            return {
                ok: true,
                operation: { type, slabClass: +slabClass, limit: limit === undefined ? DEFAULT_CACHEDUMP_SIZE : +limit },
            }
        }

        case 'detail': {
            const mode = args[0]
            if (mode !== 'on' && mode !== 'off') {
                return { ok: false, message: 'Mode must be \'on\' or \'off\'!' }
            }

            return { ok: true, operation: { type, mode } }
        }

        case 'get':
        case 'delete': {
            const key = args[0]
            if (!key) {
                return { ok: false, message: 'No KEY specified.' }
            }

            return { ok: true, operation: { type, key } }
        }

        case 'set': {
            const [key, value, expire = '0', flags = '0'] = args
            if (!key || !value) {
                return { ok: false, message: 'KEY or VALUE not specified.' }
            }

            if (!UNSIGNED.test(expire) || !UNSIGNED.test(flags)) {
                return { ok: false, message: 'EXPIRE and FLAGS must be numbers.' }
            }

            return { ok: true, operation: { type, key, value, expire: +expire, flags: +flags } }
        }

        default: {
            const _exhaustiveCheck: never = type
            throw new Error(`Unknown operation ${_exhaustiveCheck}`)
        }
    }
}
