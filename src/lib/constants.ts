export const LINEBREAK = '\r\n'
export const TERMINATOR = 'END'
export const DEFAULT_HOST = '127.0.0.1'
export const DEFAULT_PORT = 11211

export const DISPLAY_DATA_LENGTH = 320
export const TRUNCATION_MARKER = '...(the rest is skipped)'
export const NOT_ASCII = '(Not ASCII)'

export const DEFAULT_CACHEDUMP_SIZE = 20

// first-line replies that complete a reply on their own, no END follows
export const SINGLE_LINE_TOKENS: Array<string> = [
    'OK', 'RESET', 'VERSION', 'STORED', 'NOT_STORED',
    'EXISTS', 'DELETED', 'NOT_FOUND', 'TOUCHED',
]
