/**
 * Logger Types
 *
 * Type definitions for the logstrand logging pipeline.
 * A log call becomes an immutable LogRecord that flows through a chain
 * of handlers and ends in one or more byte sinks.
 */

/**
 * Record severity, ordered debug < info < warn < error.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Threshold for stack attachment. `'off'` disables the stage entirely.
 */
export type StackLevel = LogLevel | 'off';

/**
 * Numeric priority for log levels.
 * Higher numbers = more severe.
 */
export const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * All levels in ascending order of severity.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[];

/**
 * Whether `level` is at or above `threshold`.
 */
export function isLevelAtLeast(level: LogLevel, threshold: LogLevel): boolean {

    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];

}

/**
 * Mutable minimum-level cell shared by every terminal handler of a chain.
 *
 * Updating it changes filtering without rebuilding the chain.
 */
export class LevelRef {

    #level: LogLevel;

    constructor(level: LogLevel = 'info') {

        this.#level = level;

    }

    get level(): LogLevel {

        return this.#level;

    }

    set(level: LogLevel): void {

        this.#level = level;

    }

    enabled(level: LogLevel): boolean {

        return isLevelAtLeast(level, this.#level);

    }

}

/**
 * Elapsed time attribute value.
 *
 * @example
 * ```typescript
 * logger.info('request done', { took: duration(1500) })
 * // took=1.5s
 * ```
 */
export class Duration {

    constructor(public readonly ms: number) {}

    toString(): string {

        if (Math.abs(this.ms) >= 1000) {

            return `${+(this.ms / 1000).toFixed(3)}s`;

        }

        return `${+this.ms.toFixed(3)}ms`;

    }

    toJSON(): string {

        return this.toString();

    }

}

/**
 * Build a Duration attribute value from milliseconds.
 */
export function duration(ms: number): Duration {

    return new Duration(ms);

}

/**
 * A named set of attributes nested under one key.
 */
export class AttrGroup {

    constructor(public readonly attrs: readonly Attr[]) {}

}

/**
 * Attribute value.
 *
 * Formatters recognize strings, numbers, bigints, booleans, Date,
 * Duration, Error and AttrGroup. Anything else is stringified as-is;
 * values are not validated.
 */
export type AttrValue = unknown;

/**
 * A single key/value attribute.
 */
export interface Attr {

    readonly key: string;

    readonly value: AttrValue;

}

/**
 * Caller location captured when `addSource` is enabled.
 */
export interface SourceLocation {

    file: string;

    line: number;

    function?: string;

}

/**
 * One log call.
 *
 * Records are never mutated; stages that change attributes build a new one.
 */
export interface LogRecord {

    readonly time: Date;

    readonly level: LogLevel;

    readonly message: string;

    readonly attrs: readonly Attr[];

    readonly source?: SourceLocation;

}

/**
 * A stage in the handler chain.
 *
 * `handle` throws when delivery fails. `withAttrs` and `withGroup`
 * return new handlers and leave the receiver untouched.
 */
export interface Handler {

    enabled(level: LogLevel): boolean;

    handle(record: LogRecord): void;

    withAttrs(attrs: readonly Attr[]): Handler;

    withGroup(name: string): Handler;

}

/**
 * Byte destination.
 *
 * `write` returns the number of bytes written and throws on failure.
 */
export interface Sink {

    write(chunk: string | Uint8Array): number;

    close?(): void;

}

/**
 * A sink the controller owns and must close on teardown.
 */
export interface ClosableSink extends Sink {

    close(): void;

}

/**
 * Errors that carry their own structured fields.
 *
 * @example
 * ```typescript
 * class HttpError extends Error implements Loggable {
 *     constructor(readonly status: number) { super(`status ${status}`) }
 *     logAttrs() { return [{ key: 'status', value: this.status }] }
 * }
 * ```
 */
export interface Loggable {

    logAttrs(): readonly Attr[];

}

/**
 * Logger configuration.
 *
 * Validated by LoggerConfigSchema before a chain is built.
 */
export interface LoggerConfig {

    /** Minimum level to emit */
    level: LogLevel;

    /** Log to stderr */
    console: boolean;

    /** Emit JSON lines on the console instead of text */
    consoleJSON: boolean;

    /** Log file path; ignored when fileWriter is set */
    filePath: string;

    /** Emit JSON lines to the file instead of text */
    jsonFile: boolean;

    /** Record caller file and line */
    addSource: boolean;

    /** Attach a stack to records at or above this level */
    stacktraceLevel: StackLevel;

    /** Cap on attached stack size in bytes; unset follows setStackMaxBytes() */
    stackMaxBytes?: number | undefined;

    /** Rotate when the file would exceed this many bytes (0 = never) */
    fileMaxSizeBytes: number;

    /** Rotated files to keep (0 = keep all) */
    fileMaxBackups: number;

    /** Caller-supplied file sink; overrides filePath */
    fileWriter?: Sink | undefined;

}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
    console: false,
    consoleJSON: false,
    filePath: '',
    jsonFile: false,
    addSource: false,
    stacktraceLevel: 'off',
    fileMaxSizeBytes: 0,
    fileMaxBackups: 0,
};

/**
 * Log rotation result.
 */
export interface RotationResult {

    /** Whether rotation occurred */
    rotated: boolean;

    /** Active file path (if rotated) */
    oldFile?: string;

    /** Backup file path (if rotated) */
    newFile?: string;

    /** Backups deleted during cleanup (if maxBackups exceeded) */
    deletedFiles?: string[];

    /** Why rotation failed (if it did) */
    error?: Error;

}

/**
 * Controller lifecycle state.
 */
export type ControllerState = 'unconfigured' | 'configured';
