/**
 * CLI argument resolution.
 *
 * Turns parsed flags and the environment into sink options. Flags win
 * over ROTALOG_* variables, which win over the built-in defaults.
 */
import { LogLevelSchema, SuffixExtensionSchema, getEnvConfig } from '../core/sink/config.js'
import { rawLine, formatLine } from '../core/sink/formatter.js'
import type { LogLevel, RotationConfigInput, SinkOptions } from '../core/sink/types.js'


/**
 * Flags accepted by the CLI.
 */
export interface CliFlags {
    suffix?: string
    maxSize?: string
    maxArchives?: number
    permission?: string
    level?: string
    flushThreshold?: number
    raw: boolean
    verbose: boolean
    quiet: boolean
}


/**
 * Everything the CLI needs to run.
 */
export interface CliPlan {

    /** Options for RotatingFileSink.open() */
    options: SinkOptions

    /** Level given to every piped line */
    lineLevel: LogLevel

    /** Diagnostic verbosity */
    diagnostics: 'quiet' | 'normal' | 'verbose'
}


/**
 * Bad command line input.
 */
export class UsageError extends Error {

    override readonly name = 'UsageError' as const

    constructor(message: string) {

        super(message)
    }
}


/**
 * Build the run plan from positional input, flags and environment.
 *
 * @throws UsageError when the target is missing or a flag is invalid
 * @throws Error when a ROTALOG_* variable is invalid
 *
 * @example
 * ```typescript
 * resolveCliPlan(['app.log'], { maxSize: '1mb', raw: true, verbose: false, quiet: false })
 * // { options: { file: 'app.log', rotation: { maxFileSize: '1mb' }, ... }, lineLevel: 'info', ... }
 * ```
 */
export function resolveCliPlan(
    input: readonly string[],
    flags: CliFlags,
    env: NodeJS.ProcessEnv = process.env,
): CliPlan {

    const file = input[0]

    if (!file) {

        throw new UsageError('Missing target file, e.g. `rotalog app.log`')
    }

    if (input.length > 1) {

        throw new UsageError(`Expected one target file, got ${input.length}`)
    }

    const envConfig = getEnvConfig(env)
    const rotation: RotationConfigInput = { ...envConfig.rotation }

    if (flags.suffix !== undefined) {

        const result = SuffixExtensionSchema.safeParse(flags.suffix)

        if (!result.success) {

            throw new UsageError(
                `Invalid --suffix '${flags.suffix}': must be one of ${SuffixExtensionSchema.options.join(', ')}`,
            )
        }

        rotation.suffixExtension = result.data
    }

    if (flags.maxSize !== undefined) {

        rotation.maxFileSize = flags.maxSize
    }

    if (flags.maxArchives !== undefined) {

        rotation.maxArchivedFilesCount = flags.maxArchives
    }

    let lineLevel: LogLevel = 'info'

    if (flags.level !== undefined) {

        const result = LogLevelSchema.safeParse(flags.level)

        if (!result.success) {

            throw new UsageError(
                `Invalid --level '${flags.level}': must be one of ${LogLevelSchema.options.join(', ')}`,
            )
        }

        lineLevel = result.data
    }

    const options: SinkOptions = {
        file,
        permission: flags.permission ?? envConfig.permission,
        rotation,
        flushThreshold: flags.flushThreshold ?? envConfig.flushThreshold,
        level: envConfig.level,
        format: flags.raw ? rawLine : formatLine,

        // The CLI attaches its own channel so it can honour --verbose
        diagnostics: false,
    }

    const diagnostics = flags.quiet
        ? 'quiet'
        : flags.verbose ? 'verbose' : 'normal'

    return { options, lineLevel, diagnostics }
}
