/**
 * Color Sink
 *
 * Colors the `level=XXX` token of text lines before handing them to the
 * wrapped sink. Lines without a level token pass through untouched.
 */
import { logLevelColors } from '../theme.js';
import { byteLength } from './sinks.js';
import type { LogLevel, Sink } from './types.js';

/**
 * Level tokens in the order they are searched.
 */
const LEVEL_TOKENS: ReadonlyArray<[string, LogLevel]> = [
    ['level=ERROR', 'error'],
    ['level=WARN', 'warn'],
    ['level=INFO', 'info'],
    ['level=DEBUG', 'debug'],
];

/**
 * Color the first level token in a line.
 *
 * @example
 * ```typescript
 * colorizeLevel('time=... level=ERROR msg=boom')
 * // 'time=... level=ERROR msg=boom' with the level token in red
 * ```
 */
export function colorizeLevel(line: string): string {

    for (const [token, level] of LEVEL_TOKENS) {

        const index = line.indexOf(token);

        if (index >= 0) {

            return line.slice(0, index) + logLevelColors[level](token) + line.slice(index + token.length);

        }

    }

    return line;

}

/**
 * Sink decorator that colors level tokens.
 *
 * Reports the length of the uncolored chunk, so callers see the same
 * count they asked to write.
 */
export class ColorSink implements Sink {

    constructor(public readonly inner: Sink) {}

    write(chunk: string | Uint8Array): number {

        const text = typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8');

        this.inner.write(colorizeLevel(text));

        return byteLength(chunk);

    }

    close(): void {

        this.inner.close?.();

    }

}
