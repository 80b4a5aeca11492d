/**
 * Environment Detection
 *
 * Decides whether console output should carry ANSI colors.
 */

/**
 * Terminal programs on Windows known to render ANSI escapes.
 */
const WINDOWS_ANSI_ENV_VARS = [
    'WT_SESSION',
    'TERM_PROGRAM',
    'ANSICON',
];

/**
 * Inputs to color detection; each defaults to the running process.
 */
export interface ColorDetectionOptions {

    env?: NodeJS.ProcessEnv;

    stream?: { isTTY?: boolean };

    platform?: NodeJS.Platform;

}

/**
 * Detect whether ANSI colors should be used on a console stream.
 *
 * Checks, in order:
 * - NO_COLOR set to anything non-empty disables color
 * - A stream that is not a TTY disables color
 * - Outside Windows, color is on
 * - On Windows, color is on only under a terminal that advertises ANSI support
 *
 * @example
 * ```typescript
 * if (detectColor({ stream: process.stderr })) {
 *     sink = new ColorSink(sink)
 * }
 * ```
 */
export function detectColor(options: ColorDetectionOptions = {}): boolean {

    const env = options.env ?? process.env;
    const stream = options.stream ?? process.stderr;
    const platform = options.platform ?? process.platform;

    if (env['NO_COLOR']) {

        return false;

    }

    if (!stream.isTTY) {

        return false;

    }

    if (platform !== 'win32') {

        return true;

    }

    return WINDOWS_ANSI_ENV_VARS.some((name) => Boolean(env[name]));

}
