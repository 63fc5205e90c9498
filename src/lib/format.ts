import { Item } from './Item'
import { operationInfo, OPERATIONS, OperationType, resolveOperation, sortedAliasesOf } from './operations'

const SPACE = '    '
const STAT_LINE = /^STAT\s+(\S*)\s+(.*)/
const ITEMS_LINE = /^STAT items:(\d+):(\w+) (\d+)/
const SLABS_LINE = /^STAT (\d+):(\w+) (\d+)/

type SlabStats = Map<string, number>

export function formatItem(item: Item): Array<string> {
    return item.toFields().map(([name, value]) => `${SPACE}${name.padStart(6)}:${SPACE}${value}`)
}

// `STAT <field> <value>` lines as a map, other lines are skipped
export function parseStats(lines: Array<string>): Map<string, string> {
    const stats: Map<string, string> = new Map()

    lines.forEach((line) => {
        const match = STAT_LINE.exec(line)
        if (match) {
            stats.set(match[1], match[2])
        }
    })

    return stats
}

export function formatStats(title: string, serverAddress: string, lines: Array<string>): Array<string> {
    const stats = parseStats(lines)
    const output = [
        `# ${title} - ${serverAddress}`,
        `#${'Field'.padStart(23)}  ${'Value'.padStart(16)}`,
    ]

    Array.from(stats.keys()).sort().forEach((field) => {
        output.push(`${field.padStart(24)}  ${String(stats.get(field)).padStart(16)}`)
    })

    return output
}

/**
 * Merges `stats items` and `stats slabs` into one row per slab class.
 */
export function formatSlabs(itemLines: Array<string>, slabLines: Array<string>): Array<string> {
    const slabs: Map<number, SlabStats> = new Map()
    let max = 1

    const statsOf = (slabClass: number): SlabStats => {
        let stats = slabs.get(slabClass)
        if (!stats) {
            stats = new Map()
            slabs.set(slabClass, stats)
        }

        return stats
    }

    itemLines.forEach((line) => {
        const match = ITEMS_LINE.exec(line)
        if (match) {
            statsOf(+match[1]).set(match[2], +match[3])
        }
    })

    slabLines.forEach((line) => {
        const match = SLABS_LINE.exec(line)
        if (match) {
            statsOf(+match[1]).set(match[2], +match[3])
            max = +match[1]
        }
    })

    const output = ['  #  Item_Size  Max_age   Pages   Count   Full?  Evicted Evict_Time OOM']

    for (let slabClass = 1; slabClass <= max; slabClass++) {
        const slab = slabs.get(slabClass)
        const totalPages = slab && slab.get('total_pages')
        if (!slab || !totalPages) {
            continue
        }

        const stat = (name: string): number => slab.get(name) || 0
        const chunkSize = stat('chunk_size')
        const size = chunkSize < 1024 ? `${chunkSize}B` : `${(chunkSize / 1024).toFixed(1)}K`
        const full = stat('free_chunks_end') === 0 ? 'yes' : 'no'

        output.push([
            String(slabClass).padStart(3),
            size.padStart(8),
            `${String(stat('age')).padStart(9)}s`,
            String(totalPages).padStart(7),
            String(stat('number')).padStart(7),
            full.padStart(7),
            String(stat('evicted')).padStart(8),
            String(stat('evicted_time')).padStart(8),
            String(stat('outofmemory')).padStart(4),
        ].join(' '))
    }

    return output
}

export function formatHelp(command: string = ''): Array<string> {
    const type: OperationType | undefined = command ? resolveOperation(command) : undefined
    const output: Array<string> = []

    if (type) {
        const info = operationInfo(type)
        output.push(
            '',
            `[Command "${command}"]`,
            '',
            'Summary:',
            `${SPACE}${info.summary}`,
            '',
            'Aliases:',
            `${SPACE}${sortedAliasesOf(type).join(', ')}`,
            '',
        )

        if (info.description) {
            output.push(...info.description.split('\n'), '')
        }

        return output
    }

    if (command) {
        output.push(`Unknown command: ${command}`)
    }

    output.push('', '[Available Commands]')
    OPERATIONS.forEach((info) => {
        output.push(`${sortedAliasesOf(info.type).join(', ').padEnd(24)}${SPACE}${info.summary}`)
    })
    output.push('', 'Type \\h <command> for each.', '')

    return output
}
