/**
 * Stack Handler
 *
 * Appends a `stack` attribute to records at or above a threshold level.
 * The stack is captured synchronously inside handle(), so it shows the
 * path from the logging call site down through the chain.
 */
import { withRecordAttrs } from './record.js';
import { LEVEL_PRIORITY } from './types.js';
import type { Attr, Handler, LogLevel, LogRecord, StackLevel } from './types.js';

const DEFAULT_STACK_MAX_BYTES = 64 * 1024;

let defaultStackMaxBytes = DEFAULT_STACK_MAX_BYTES;

/**
 * Change the stack size cap used by handlers built afterwards.
 *
 * Values <= 0 are ignored.
 */
export function setStackMaxBytes(n: number): void {

    if (!Number.isFinite(n) || n <= 0) {

        return;

    }

    defaultStackMaxBytes = Math.floor(n);

}

/**
 * Current default stack size cap.
 */
export function getStackMaxBytes(): number {

    return defaultStackMaxBytes;

}

/**
 * Capture the current call stack as text, without the leading `Error` line.
 */
export function captureStack(): string {

    const limit = Error.stackTraceLimit;

    Error.stackTraceLimit = Infinity;

    try {

        const stack = new Error().stack ?? '';

        return stack.split('\n').slice(1).map((line) => line.trim()).join('\n');

    }
    finally {

        Error.stackTraceLimit = limit;

    }

}

/**
 * Cut a string to at most `maxBytes` UTF-8 bytes.
 *
 * A multi-byte character split at the boundary is dropped.
 */
export function truncateBytes(text: string, maxBytes: number): string {

    const buf = Buffer.from(text, 'utf8');

    if (buf.byteLength <= maxBytes) {

        return text;

    }

    return buf.subarray(0, maxBytes).toString('utf8').replace(/\uFFFD+$/, '');

}

export class StackHandler implements Handler {

    constructor(
        public readonly next: Handler,
        public readonly threshold: LogLevel,
        public readonly maxBytes: number = defaultStackMaxBytes,
    ) {}

    enabled(level: LogLevel): boolean {

        return this.next.enabled(level);

    }

    handle(record: LogRecord): void {

        if (LEVEL_PRIORITY[record.level] < LEVEL_PRIORITY[this.threshold]) {

            this.next.handle(record);

            return;

        }

        const stack = truncateBytes(captureStack(), this.maxBytes);

        this.next.handle(withRecordAttrs(record, [{ key: 'stack', value: stack }]));

    }

    withAttrs(attrs: readonly Attr[]): Handler {

        return newStackHandler(this.next.withAttrs(attrs), this.threshold, this.maxBytes);

    }

    withGroup(name: string): Handler {

        return newStackHandler(this.next.withGroup(name), this.threshold, this.maxBytes);

    }

}

/**
 * Wrap a handler with stack attachment.
 *
 * Returns `next` itself when the threshold is `'off'`.
 *
 * @example
 * ```typescript
 * newStackHandler(handler, 'off') === handler // true
 * newStackHandler(handler, 'error')           // StackHandler
 * ```
 */
export function newStackHandler(
    next: Handler,
    threshold: StackLevel,
    maxBytes: number = defaultStackMaxBytes,
): Handler {

    if (threshold === 'off') {

        return next;

    }

    return new StackHandler(next, threshold, maxBytes > 0 ? maxBytes : defaultStackMaxBytes);

}
