/**
 * Logger
 *
 * Thin façade over a handler chain. Builds records from log calls and
 * hands them to the chain synchronously. Logging never throws: delivery
 * failures are published as `logger:error` events instead.
 *
 * @example
 * ```typescript
 * const logger = new Logger(new TextHandler(new StreamSink()))
 *
 * logger.info('server started', { port: 8080 })
 * // time=2024-01-15T10:30:00.000Z level=INFO msg="server started" port=8080
 *
 * const api = logger.with({ component: 'api' })
 * api.warn('slow request', { path: '/devices', took: duration(1250) })
 * ```
 */
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { attemptSync } from '@logosdx/utils';

import { logEvents } from '../observer.js';
import { createRecord, toAttrs } from './record.js';
import { captureStack } from './stack.js';
import { duration } from './types.js';
import type { Attr, Handler, LogLevel, Loggable, SourceLocation } from './types.js';

/**
 * Directory of the logging core; frames from here are skipped when
 * looking for the caller.
 */
const LOGGER_DIR = dirname(fileURLToPath(import.meta.url));

const FRAME_PATTERN = /^at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Record caller file and line on every record */
    addSource?: boolean;

    /** Called by fatal(); defaults to process.exit */
    exit?: (code: number) => void;

}

/**
 * Find the first stack frame outside the logging core.
 */
export function callerLocation(): SourceLocation | undefined {

    for (const line of captureStack().split('\n')) {

        const match = FRAME_PATTERN.exec(line);

        if (!match || !match[2] || !match[3]) {

            continue;

        }

        const file = match[2].startsWith('file://') ? fileURLToPath(match[2]) : match[2];

        if (file.startsWith(LOGGER_DIR) || file.startsWith('node:')) {

            continue;

        }

        const location: SourceLocation = { file, line: Number(match[3]) };

        return match[1] ? { ...location, function: match[1] } : location;

    }

    return undefined;

}

/**
 * Whether a value carries its own structured log fields.
 */
export function isLoggable(value: unknown): value is Loggable {

    return typeof value === 'object'
        && value !== null
        && 'logAttrs' in value
        && typeof value.logAttrs === 'function';

}

/**
 * Type name reported as `error_type`.
 */
export function errorType(err: unknown): string {

    if (err instanceof Error) {

        return err.constructor.name;

    }

    return err === null ? 'null' : typeof err;

}

export class Logger {

    readonly handler: Handler;

    #addSource: boolean;
    #exit: (code: number) => void;

    constructor(handler: Handler, options: LoggerOptions = {}) {

        this.handler = handler;
        this.#addSource = options.addSource ?? false;
        this.#exit = options.exit ?? ((code) => process.exit(code));

    }

    get addSource(): boolean {

        return this.#addSource;

    }

    enabled(level: LogLevel): boolean {

        return this.handler.enabled(level);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#emit('debug', message, toAttrs(data));

    }

    info(message: string, data?: Record<string, unknown>): void {

        this.#emit('info', message, toAttrs(data));

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#emit('warn', message, toAttrs(data));

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#emit('error', message, toAttrs(data));

    }

    log(level: LogLevel, message: string, data?: Record<string, unknown>): void {

        this.#emit(level, message, toAttrs(data));

    }

    /**
     * Log with prebuilt attributes, e.g. groups from `group()`.
     */
    logAttrs(level: LogLevel, message: string, attrs: readonly Attr[]): void {

        this.#emit(level, message, attrs);

    }

    /**
     * Log an error with normalized `error` and `error_type` fields, plus
     * the error's own fields when it implements Loggable.
     */
    errorErr(message: string, err: unknown, data?: Record<string, unknown>): void {

        if (err === null || err === undefined) {

            this.#emit('error', message, toAttrs(data));

            return;

        }

        const attrs: Attr[] = [
            ...toAttrs(data),
            { key: 'error', value: err },
            { key: 'error_type', value: errorType(err) },
        ];

        if (isLoggable(err)) {

            attrs.push(...err.logAttrs());

        }

        this.#emit('error', message, attrs);

    }

    /**
     * Log at error level, then exit with status 1.
     */
    fatal(message: string, data?: Record<string, unknown>): void {

        this.#emit('error', message, toAttrs(data));
        this.#exit(1);

    }

    /**
     * Log "<message> started" now and return a callback that logs
     * "<message> completed" with the elapsed duration.
     *
     * @example
     * ```typescript
     * const done = logger.timed('sync', { source: 'crm' })
     * await syncContacts()
     * done({ synced: 42 })
     * // msg="sync completed" source=crm synced=42 duration=1.2s
     * ```
     */
    timed(
        message: string,
        data?: Record<string, unknown>,
        level: LogLevel = 'info',
    ): (extra?: Record<string, unknown>) => void {

        const start = performance.now();

        this.#emit(level, `${message} started`, toAttrs(data));

        return (extra) => {

            this.#emit(level, `${message} completed`, [
                ...toAttrs(data),
                ...toAttrs(extra),
                { key: 'duration', value: duration(performance.now() - start) },
            ]);

        };

    }

    /**
     * Child logger with attributes bound to every record.
     */
    with(data: Record<string, unknown>): Logger {

        const attrs = toAttrs(data);

        if (attrs.length === 0) {

            return this;

        }

        return new Logger(this.handler.withAttrs(attrs), this.#options);

    }

    /**
     * Child logger that nests later attributes under `name`.
     */
    withGroup(name: string): Logger {

        if (!name) {

            return this;

        }

        return new Logger(this.handler.withGroup(name), this.#options);

    }

    get #options(): LoggerOptions {

        return { addSource: this.#addSource, exit: this.#exit };

    }

    #emit(level: LogLevel, message: string, attrs: readonly Attr[]): void {

        if (!this.handler.enabled(level)) {

            return;

        }

        const source = this.#addSource ? callerLocation() : undefined;
        const record = createRecord(level, message, attrs, source);

        const [, err] = attemptSync(() => this.handler.handle(record));

        if (err) {

            logEvents.emit('logger:error', { level, message, error: err });

        }

    }

}
