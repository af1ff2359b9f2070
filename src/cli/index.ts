#!/usr/bin/env node
/**
 * CLI entry point for rotalog.
 *
 * Reads lines from stdin and appends them to a rotating log file.
 *
 * @example
 * ```bash
 * my-server | rotalog /var/log/my-server/out.log --max-size 50mb --max-archives 10
 * my-worker 2>&1 | rotalog worker.log --suffix date_uuid --raw
 * ```
 */
import meow from 'meow'
import { attempt, attemptSync } from '@logosdx/utils'

import { RotatingFileSink } from '../core/sink/sink.js'
import { attachDiagnostics } from '../core/sink/diagnostics.js'
import {
    registerExceptionHandlers,
    registerSignalHandlers,
    registerSuspendHandlers,
    removeAllHandlers,
} from '../core/lifecycle/index.js'
import { icons, theme } from '../core/theme.js'
import { resolveCliPlan, UsageError } from './args.js'
import { pipeLines } from './pipe.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ <command> | rotalog <file> [options]

  Options
    --suffix <policy>         Archive naming: numbering (default) or date_uuid
    --max-size <size>         Rotate past this size, e.g. 512kb, 10mb (default: 10mb)
    --max-archives <n>        Archives to keep, 0-255 (default: 5)
    --permission <octal>      Mode for a newly created file (default: 640)
    --level <level>           Level given to each line (default: info)
    --flush-threshold <n>     Sync after this many lines (default: 200)
    --raw, -r                 Write lines as-is, without timestamp and level
    --verbose, -v             Report opens, rotations and removals on stderr
    --quiet, -q               Report nothing on stderr
    --help, -h                Show this help
    --version                 Show version

  Environment
    ROTALOG_SUFFIX, ROTALOG_MAX_SIZE, ROTALOG_MAX_ARCHIVES,
    ROTALOG_PERMISSION, ROTALOG_FLUSH_THRESHOLD, ROTALOG_LEVEL

  Signals
    SIGINT, SIGTERM, SIGHUP   Sync and close, then exit
    SIGUSR1                   Pause rotation and sync
    SIGUSR2                   Resume rotation

  Examples
    $ my-server | rotalog server.log
    $ my-server | rotalog server.log --max-size 50mb --max-archives 10
    $ my-worker 2>&1 | rotalog worker.log --suffix date_uuid --raw
`


/**
 * Exit codes per shutdown signal.
 */
const SIGNAL_EXIT_CODES = {
    SIGHUP: 129,
    SIGINT: 130,
    SIGTERM: 143,
} as const


/**
 * Print a fatal message to stderr.
 */
function fail(message: string): void {

    process.stderr.write(`${theme.error(icons.error)} ${message}\n`)
}


/**
 * Main entry point.
 *
 * @returns Process exit code
 */
async function main(): Promise<number> {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        flags: {
            suffix: { type: 'string' },
            maxSize: { type: 'string' },
            maxArchives: { type: 'number' },
            permission: { type: 'string' },
            level: { type: 'string' },
            flushThreshold: { type: 'number' },
            raw: { type: 'boolean', shortFlag: 'r', default: false },
            verbose: { type: 'boolean', shortFlag: 'v', default: false },
            quiet: { type: 'boolean', shortFlag: 'q', default: false },
        },
    })

    const [plan, planErr] = attemptSync(() => resolveCliPlan(cli.input, cli.flags))

    if (planErr) {

        fail(planErr.message)

        return planErr instanceof UsageError ? 2 : 1
    }

    const [sink, openErr] = await attempt(() => RotatingFileSink.open(plan.options))

    if (openErr) {

        fail(openErr.message)

        return 1
    }

    const detach = plan.diagnostics === 'quiet'
        ? () => undefined
        : attachDiagnostics({
            stream: process.stderr,
            verbose: plan.diagnostics === 'verbose',
            file: sink.filepath,
        })

    const shutdown = (code: number): void => {

        detach()
        removeAllHandlers()
        process.exit(code)
    }

    registerSignalHandlers([sink], async (signal) => shutdown(SIGNAL_EXIT_CODES[signal]))
    registerSuspendHandlers([sink])
    registerExceptionHandlers([sink], async (error) => {

        fail(error.message)
        shutdown(1)
    })

    const [, pipeErr] = await attempt(() => pipeLines(process.stdin, sink, plan.lineLevel, {
        highWaterMark: plan.options.flushThreshold,
    }))

    await sink.close()

    detach()
    removeAllHandlers()

    if (pipeErr) {

        fail(`Failed to read stdin: ${pipeErr.message}`)

        return 1
    }

    return 0
}


// Run main
main().then((code) => {

    process.exitCode = code
}).catch((error) => {

    console.error('Fatal error:', error)
    process.exit(1)
})
