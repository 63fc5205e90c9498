#!/usr/bin/env node
import { ZodError } from 'zod'

import {
    createDataSource,
    IParsedCommandLine,
    parseCommandLine,
    PROGRAM,
    runBatch,
    runInteractive,
    USAGE,
} from '../lib/cli'
import { DataSource } from '../lib/DataSource'
import { ConnectError } from '../lib/errors'

async function main(): Promise<number> {
    let parsed: IParsedCommandLine
    try {
        parsed = parseCommandLine(process.argv.slice(2), process.env)
    } catch (err) {
        const message = err instanceof ZodError
            ? err.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
            : String(err instanceof Error ? err.message : err)
        process.stderr.write(`${PROGRAM}: ${message}\n${USAGE}\n`)
        return 2
    }

    if (parsed.options.help) {
        process.stdout.write(`${USAGE}\n`)
        return 0
    }

    let dataSource: DataSource
    try {
        dataSource = await createDataSource(parsed.options)
    } catch (err) {
        if (err instanceof ConnectError) {
            process.stderr.write(`Can't connect to Memcached server! Addr=${err.address}\n`)
            return 1
        }

        throw err
    }

    try {
        if (parsed.command.length) {
            return await runBatch(dataSource, parsed.command, process.stdout) ? 0 : 1
        }

        if (!process.stdin.isTTY) {
            process.stderr.write('TTY Not Found! Quit.\n')
            return 1
        }

        await runInteractive(dataSource, process.stdin, process.stdout)
        return 0
    } finally {
        dataSource.end()
    }
}

main().then((code) => {
    process.exitCode = code
}, (err: Error) => {
    process.stderr.write(`${err.stack || err.message}\n`)
    process.exitCode = 1
})
