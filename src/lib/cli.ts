import { createInterface } from 'readline'
import { parseArgs } from 'util'
import { z } from 'zod'

import { looksLikeAddress, parseAddress } from './address'
import { DataSource } from './DataSource'
import { Dispatcher, IDispatchResult } from './Dispatcher'
import { MemcachedCliError } from './errors'
import { parseOperation } from './operations'

export const PROGRAM = 'memcached-cli'

export const CliOptionsSchema = z.object({
    addr: z.string().min(1).refine((addr) => {
        try {
            parseAddress(addr)
            return true
        } catch {
            return false
        }
    }, { message: 'not a valid host:port or socket path' }).optional(),
    timeout: z.coerce.number().int().positive().optional(),
    debug: z.boolean().default(false),
    help: z.boolean().default(false),
})

export type CliOptions =
    z.infer<typeof CliOptionsSchema>

export interface IParsedCommandLine {
    options: CliOptions
    command: Array<string>
}

export interface IOutput {
    write(text: string): unknown
}

const VALUE_OPTIONS = ['-a', '--addr', '-t', '--timeout']

export const USAGE = [
    `Usage: ${PROGRAM} [<ADDR>] [options] [<COMMAND> [<ARGS>...]]`,
    '',
    'Options:',
    '    -a, --addr <ADDR>       Server address, host:port or socket path (default 127.0.0.1:11211)',
    '    -t, --timeout <SEC>     Connect and read timeout in seconds (default 1)',
    '    -d, --debug             Print the lines sent to and received from the server',
    '    -h, --help              Show this message',
    '',
    'Without a COMMAND an interactive prompt is started. Type \\h there for commands.',
].join('\n')

/**
 * Splits argv into options and the batch command. Options and an address are
 * only taken before the command, so `set key -1` keeps its arguments.
 * MEMCACHED_CLI_ADDR and MEMCACHED_CLI_TIMEOUT give defaults.
 */
export function parseCommandLine(argv: Array<string>, env: NodeJS.ProcessEnv = {}): IParsedCommandLine {
    const head: Array<string> = []
    let addr: string | undefined
    let i = 0

    if (argv[0] !== undefined && looksLikeAddress(argv[0])) {
        addr = argv[0]
        i = 1
    }

    for (; i < argv.length && argv[i].startsWith('-'); i++) {
        head.push(argv[i])
        if (VALUE_OPTIONS.indexOf(argv[i]) > -1 && i + 1 < argv.length) {
            head.push(argv[++i])
        }
    }

    const { values } = parseArgs({
        args: head,
        options: {
            addr: { type: 'string', short: 'a' },
            timeout: { type: 'string', short: 't' },
            debug: { type: 'boolean', short: 'd' },
            help: { type: 'boolean', short: 'h' },
        },
        strict: true,
    })

    const options = CliOptionsSchema.parse({
        addr: addr ?? values.addr ?? env.MEMCACHED_CLI_ADDR,
        timeout: values.timeout ?? env.MEMCACHED_CLI_TIMEOUT,
        debug: values.debug ?? false,
        help: values.help ?? false,
    })

    return { options, command: argv.slice(i) }
}

export function createDataSource(options: CliOptions): Promise<DataSource> {
    return DataSource.connect(options.addr, {
        timeout: options.timeout === undefined ? undefined : options.timeout * 1000,
        debug: options.debug,
    })
}

/**
 * Parses and runs one command line. Failures of the core are reported as a
 * short diagnostic, anything else is rethrown.
 */
export async function execute(dispatcher: Dispatcher, words: Array<string>): Promise<IDispatchResult> {
    const parsed = parseOperation(words)
    if (!parsed.ok) {
        return { ok: false, lines: [parsed.message] }
    }

    try {
        return await dispatcher.run(parsed.operation)
    } catch (err) {
        if (err instanceof MemcachedCliError) {
            return { ok: false, lines: [`${err.name}: ${err.message}`] }
        }

        throw err
    }
}

export async function runBatch(dataSource: DataSource, words: Array<string>, output: IOutput): Promise<boolean> {
    const command = words[0]
    if (command === 'quit' || command === 'exit' || command === '\\q') {
        output.write(`Nothing to do with ${command}\n`)
        return false
    }

    const result = await execute(new Dispatcher(dataSource), words)
    writeLines(output, result.lines)

    if (!result.ok) {
        output.write(`Command seems failed. Run \`${PROGRAM} help\` or \`${PROGRAM} help ${command}\` for usage.\n`)
    }

    return result.ok
}

export async function runInteractive(
    dataSource: DataSource,
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream,
): Promise<void> {
    const dispatcher = new Dispatcher(dataSource)
    const rl = createInterface({ input, output, prompt: `memcached@${dataSource.serverAddress}> ` })

    rl.on('SIGINT', () => {
        output.write('Caught INT. Exiting...\n')
        rl.close()
    })

    output.write('Type \'\\h\' or \'help\' to show help.\n\n')
    rl.prompt()

    for await (const line of rl) {
        const words = line.trim().split(/\s+/).filter(Boolean)

        if (words.length) {
            const parsed = parseOperation(words)
            if (parsed.ok && parsed.operation.type === 'quit') {
                break
            }

            const result = await execute(dispatcher, words)
            writeLines(output, result.lines)

            if (!result.ok && parsed.ok) {
                output.write(`Command seems failed. Type \\h ${words[0]} for help.\n\n`)
            }
        }

        rl.prompt()
    }
}

function writeLines(output: IOutput, lines: Array<string>): void {
    lines.forEach((line) => {
        output.write(`${line}\n`)
    })
}
