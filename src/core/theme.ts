/**
 * Diagnostic Color Theme
 *
 * Colors and icons for the diagnostic side channel. Uses ansis for
 * truecolor (hex) support; ansis drops the escapes by itself when the
 * output is not a terminal or NO_COLOR is set.
 *
 * @example
 * ```typescript
 * import { theme, icons } from '../core/theme.js'
 *
 * stream.write(`${theme.error(icons.error)} rename failed\n`)
 * ```
 */
import ansis from 'ansis';

// ─────────────────────────────────────────────────────────────
// Color Palette
// ─────────────────────────────────────────────────────────────

/**
 * Hex values used directly with ansis truecolor support.
 */
export const palette = {

    // Status
    success: '#10B981',      // Emerald Green
    warning: '#F59E0B',      // Amber
    error: '#EF4444',        // Red
    info: '#8B5CF6',         // Purple

    // Neutrals
    muted: '#9CA3AF',        // Gray-400

} as const;

// ─────────────────────────────────────────────────────────────
// Color Functions (Truecolor)
// ─────────────────────────────────────────────────────────────

/**
 * Theme color functions for direct use.
 */
export const theme = {

    success: (text: string) => ansis.hex(palette.success)(text),
    warning: (text: string) => ansis.hex(palette.warning)(text),
    error: (text: string) => ansis.hex(palette.error)(text),
    info: (text: string) => ansis.hex(palette.info)(text),
    muted: (text: string) => ansis.hex(palette.muted)(text),

} as const;

/**
 * Icons for diagnostic lines.
 */
export const icons = {
    success: '✓',
    error: '✗',
    warning: '⚠',
    info: '•',
    arrow: '→',
} as const;

/**
 * Remove ANSI escape codes.
 */
export function stripAnsi(text: string): string {

    return ansis.strip(text);

}
