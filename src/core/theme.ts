/**
 * Console Color Theme
 *
 * Level colors for console output. Uses ansis for truecolor (hex)
 * support; ansis falls back to 256 or 16 colors on weaker terminals.
 *
 * @example
 * ```typescript
 * import { logLevelColors } from '../core/theme.js'
 *
 * process.stderr.write(logLevelColors.error('level=ERROR'))
 * ```
 */
import ansis from 'ansis';

import type { LogLevel } from './logger/types.js';

// ─────────────────────────────────────────────────────────────
// Color Palette
// ─────────────────────────────────────────────────────────────

/**
 * Slate palette.
 * Hex values used directly with ansis truecolor support.
 */
export const palette = {

    // Status
    success: '#10B981',      // Emerald Green
    warning: '#F59E0B',      // Amber
    error: '#EF4444',        // Red

    // Neutrals
    muted: '#9CA3AF',        // Gray-400

} as const;

// ─────────────────────────────────────────────────────────────
// Log Level Styles
// ─────────────────────────────────────────────────────────────

/**
 * Color per log level: red errors, amber warnings, green info, gray debug.
 */
export const logLevelColors: Record<LogLevel, (text: string) => string> = {
    error: (text: string) => ansis.hex(palette.error)(text),
    warn: (text: string) => ansis.hex(palette.warning)(text),
    info: (text: string) => ansis.hex(palette.success)(text),
    debug: (text: string) => ansis.hex(palette.muted)(text),
};

/**
 * Remove ANSI escape codes from a string.
 */
export function stripColor(text: string): string {

    return ansis.strip(text);

}
