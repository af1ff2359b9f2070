/**
 * Diagnostic Channel
 *
 * Writes sink problems (and, when verbose, rotation activity) to a side
 * stream such as stderr. Sinks never throw after construction, so this is
 * where their failures become visible.
 */
import type { Writable } from 'node:stream';

import { observer, type RotalogEvents } from '../observer.js';
import { icons, theme } from '../theme.js';


/**
 * Events the diagnostic channel can describe.
 */
export type DiagnosticEvent =
    | 'sink:error'
    | 'sink:degraded'
    | 'sink:recovered'
    | 'sink:opened'
    | 'sink:closed'
    | 'sink:paused'
    | 'sink:resumed'
    | 'sink:rotated'
    | 'sink:archive-removed';

type Severity = 'error' | 'warning' | 'success' | 'info';

/**
 * Message and severity per event.
 */
const TEMPLATES: { [E in DiagnosticEvent]: (d: RotalogEvents[E]) => [Severity, string] } = {

    'sink:error': (d) => ['error', `${d.file}: ${d.step} failed: ${d.error.message}`],
    'sink:degraded': (d) => ['warning', `${d.file}: target could not be reopened, appends will retry: ${d.error.message}`],
    'sink:recovered': (d) => ['success', `${d.file}: target reopened`],

    'sink:opened': (d) => ['info', `${d.file}: ${d.reopened ? 'reopened' : 'opened'} (mode ${d.mode.toString(8)})`],
    'sink:closed': (d) => ['info', `${d.file}: closed after ${d.totalWritten} lines`],
    'sink:paused': (d) => ['info', `${d.file}: rotation paused`],
    'sink:resumed': (d) => ['info', `${d.file}: rotation resumed`],
    'sink:rotated': (d) => [
        'info',
        `${d.file}: rotated ${icons.arrow} ${d.archive}`
        + (d.removed.length > 0 ? `, removed ${d.removed.length} archive(s)` : '')
        + ` (${d.durationMs}ms)`,
    ],
    'sink:archive-removed': (d) => ['info', `${d.file}: removed archive ${d.archive}`],

};

const ICONS: Record<Severity, string> = {
    error: icons.error,
    warning: icons.warning,
    success: icons.success,
    info: icons.info,
};

/**
 * Events written regardless of verbosity.
 */
const PROBLEM_EVENTS = ['sink:error', 'sink:degraded', 'sink:recovered'] as const;

/**
 * Events written only when verbose.
 */
const ACTIVITY_EVENTS = [
    'sink:opened',
    'sink:closed',
    'sink:paused',
    'sink:resumed',
    'sink:rotated',
    'sink:archive-removed',
] as const;


/**
 * Format one diagnostic line.
 *
 * @example
 * ```typescript
 * formatDiagnostic('sink:recovered', { file: '/logs/app.log' }, false)
 * // '[rotalog] ✓ /logs/app.log: target reopened\n'
 * ```
 */
export function formatDiagnostic<E extends DiagnosticEvent>(
    event: E,
    data: RotalogEvents[E],
    color = true,
): string {

    const template: (d: RotalogEvents[E]) => [Severity, string] = TEMPLATES[event];
    const [severity, message] = template(data);
    const icon = ICONS[severity];

    if (!color) {

        return `[rotalog] ${icon} ${message}\n`;

    }

    return `${theme.muted('[rotalog]')} ${theme[severity](icon)} ${message}\n`;

}


/**
 * Options for attachDiagnostics().
 */
export interface DiagnosticOptions {

    /** Where lines go */
    stream: Writable;

    /** Also describe opens, closes, pauses and rotations */
    verbose?: boolean;

    /** Only describe events of this target */
    file?: string;

    /** Colorize output (default: true; ansis still honours NO_COLOR) */
    color?: boolean;
}


/**
 * Subscribe a stream to sink events.
 *
 * @returns Cleanup function that unsubscribes
 *
 * @example
 * ```typescript
 * const detach = attachDiagnostics({ stream: process.stderr, verbose: true })
 * // ... later
 * detach()
 * ```
 */
export function attachDiagnostics(options: DiagnosticOptions): () => void {

    const { stream, file, color = true } = options;

    const write = <E extends DiagnosticEvent>(event: E, data: RotalogEvents[E]): void => {

        if (file !== undefined && data.file !== file) {

            return;

        }

        stream.write(formatDiagnostic(event, data, color));

    };

    const events: DiagnosticEvent[] = options.verbose
        ? [...PROBLEM_EVENTS, ...ACTIVITY_EVENTS]
        : [...PROBLEM_EVENTS];

    const cleanups = events.map((event) => subscribe(event, write));

    return () => {

        for (const cleanup of cleanups) {

            cleanup();

        }

    };

}


/**
 * Subscribe one event to a generic writer.
 */
function subscribe(
    event: DiagnosticEvent,
    write: <E extends DiagnosticEvent>(event: E, data: RotalogEvents[E]) => void,
): () => void {

    switch (event) {

        case 'sink:error': return observer.on('sink:error', (data) => write('sink:error', data));
        case 'sink:degraded': return observer.on('sink:degraded', (data) => write('sink:degraded', data));
        case 'sink:recovered': return observer.on('sink:recovered', (data) => write('sink:recovered', data));
        case 'sink:opened': return observer.on('sink:opened', (data) => write('sink:opened', data));
        case 'sink:closed': return observer.on('sink:closed', (data) => write('sink:closed', data));
        case 'sink:paused': return observer.on('sink:paused', (data) => write('sink:paused', data));
        case 'sink:resumed': return observer.on('sink:resumed', (data) => write('sink:resumed', data));
        case 'sink:rotated': return observer.on('sink:rotated', (data) => write('sink:rotated', data));
        case 'sink:archive-removed': return observer.on('sink:archive-removed', (data) => write('sink:archive-removed', data));

    }

}
