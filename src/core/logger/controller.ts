/**
 * Logger Controller
 *
 * Owns the active logger and the file sink behind it. configure() builds
 * a complete new chain first, then swaps it in, then closes the sink the
 * previous chain owned. A failed file open still installs a console
 * logger, so a bad reconfiguration never leaves the process without one.
 *
 * @example
 * ```typescript
 * const { error } = configure({
 *     level: 'debug',
 *     console: true,
 *     filePath: 'logs/app.log',
 *     fileMaxSizeBytes: 10 * 1024 * 1024,
 *     fileMaxBackups: 5,
 * })
 *
 * if (error) {
 *     warn('file logging disabled', { error })
 * }
 *
 * info('server started', { port: 8080 })
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { detectColor } from '../environment.js';
import { logEvents } from '../observer.js';
import { ColorSink } from './color.js';
import { validateLoggerConfig, type LoggerConfigInput } from './config.js';
import { combineHandlers } from './fanout.js';
import { JsonHandler, TextHandler, type FormatHandlerOptions } from './formatter.js';
import { Logger } from './logger.js';
import { RedactionHandler, redactedKeys, RedactionKeys } from './redact.js';
import { FileRotator } from './rotation.js';
import { FileSink, StreamSink, type WritableLike } from './sinks.js';
import { getStackMaxBytes, newStackHandler } from './stack.js';
import { LevelRef } from './types.js';
import type {
    ClosableSink,
    ControllerState,
    Handler,
    LogLevel,
    LoggerConfig,
    Sink,
} from './types.js';

/**
 * Config used when the logger is first requested before configure().
 */
const LAZY_DEFAULT_CONFIG: LoggerConfigInput = { level: 'info', console: true };

/**
 * Options for LoggerController construction.
 */
export interface ControllerOptions {

    /** Redaction key set read by the chain (defaults to the process-wide set) */
    keys?: RedactionKeys;

    /** Console stream (defaults to process.stderr) */
    console?: WritableLike & { isTTY?: boolean };

    /** Environment for color detection (defaults to process.env) */
    env?: NodeJS.ProcessEnv;

    /** Platform for color detection (defaults to process.platform) */
    platform?: NodeJS.Platform;

    /** Called by fatal() (defaults to process.exit) */
    exit?: (code: number) => void;

}

/**
 * Outcome of configure().
 *
 * `logger` is always usable; `error` reports a sink that failed to open.
 */
export interface ConfigureResult {

    logger: Logger;

    error: Error | null;

}

/**
 * A chain built but not yet installed.
 */
interface BuiltChain {

    logger: Logger;

    closer: ClosableSink | null;

    error: Error | null;

    color: boolean;

}

function isClosable(sink: Sink): sink is ClosableSink {

    return typeof sink.close === 'function';

}

export class LoggerController {

    readonly keys: RedactionKeys;

    #logger: Logger | null = null;
    #closer: ClosableSink | null = null;
    #level = new LevelRef('info');
    #color = false;

    #console: WritableLike & { isTTY?: boolean };
    #env: NodeJS.ProcessEnv | undefined;
    #platform: NodeJS.Platform | undefined;
    #exit: ((code: number) => void) | undefined;

    constructor(options: ControllerOptions = {}) {

        this.keys = options.keys ?? new RedactionKeys();
        this.#console = options.console ?? process.stderr;
        this.#env = options.env;
        this.#platform = options.platform;
        this.#exit = options.exit;

    }

    get state(): ControllerState {

        return this.#logger ? 'configured' : 'unconfigured';

    }

    get level(): LogLevel {

        return this.#level.level;

    }

    /**
     * Whether the last build colored console output.
     */
    get colorEnabled(): boolean {

        return this.#color;

    }

    /**
     * Build a new chain from config and install it.
     *
     * @throws LoggerConfigError if the config is invalid; nothing changes
     */
    configure(input: LoggerConfigInput = {}): ConfigureResult {

        const config = validateLoggerConfig(input);
        const next = this.#build(config);

        // Commit: plain reference swaps, no I/O
        const previous = this.#closer;

        this.#level.set(config.level);
        this.#logger = next.logger;
        this.#closer = next.closer;
        this.#color = next.color;

        // The old chain is unreachable from here on; release its sink
        if (previous && previous !== next.closer) {

            this.#closeSink(previous);

        }

        logEvents.emit('logger:configured', {
            level: config.level,
            console: config.console,
            file: config.fileWriter ? null : config.filePath || null,
            error: next.error,
        });

        return { logger: next.logger, error: next.error };

    }

    /**
     * Return to unconfigured: close the owned sink, drop the logger,
     * clear redacted keys and restore the info level.
     */
    reset(): void {

        const previous = this.#closer;

        this.#logger = null;
        this.#closer = null;
        this.#color = false;
        this.#level = new LevelRef('info');
        this.keys.clear();

        if (previous) {

            this.#closeSink(previous);

        }

        logEvents.emit('logger:reset', {});

    }

    /**
     * The active logger, configuring a console logger on first use.
     *
     * The check and the configure run in one synchronous turn, so two
     * callers can never both initialize.
     */
    logger(): Logger {

        if (this.#logger) {

            return this.#logger;

        }

        return this.configure(LAZY_DEFAULT_CONFIG).logger;

    }

    /**
     * Change the minimum level of the active chain.
     */
    setLevel(level: LogLevel): void {

        this.#level.set(level);

    }

    /**
     * Install a prebuilt logger. The controller stops owning any sink.
     */
    setLogger(logger: Logger): void {

        const previous = this.#closer;

        this.#logger = logger;
        this.#closer = null;

        if (previous) {

            this.#closeSink(previous);

        }

    }

    #build(config: LoggerConfig): BuiltChain {

        const handlers: Handler[] = [];
        const options: FormatHandlerOptions = { level: this.#level, addSource: config.addSource };

        let color = false;

        if (config.console) {

            const base = new StreamSink(this.#console);

            color = detectColor({ env: this.#env, stream: this.#console, platform: this.#platform });

            handlers.push(
                config.consoleJSON
                    ? new JsonHandler(base, options)
                    : new TextHandler(color ? new ColorSink(base) : base, options),
            );

        }

        const [fileSink, error] = attemptSync(() => openFileSink(config));
        let closer: ClosableSink | null = null;

        if (fileSink) {

            handlers.push(
                config.jsonFile
                    ? new JsonHandler(fileSink, options)
                    : new TextHandler(fileSink, options),
            );

            closer = isClosable(fileSink) ? fileSink : null;

        }

        if (handlers.length === 0) {

            handlers.push(new TextHandler(new StreamSink(this.#console), options));

        }

        let handler = combineHandlers(handlers);

        handler = newStackHandler(
            handler,
            config.stacktraceLevel,
            config.stackMaxBytes ?? getStackMaxBytes(),
        );
        handler = new RedactionHandler(handler, this.keys);

        return {
            logger: new Logger(handler, { addSource: config.addSource, exit: this.#exit }),
            closer,
            error,
            color,
        };

    }

    #closeSink(sink: ClosableSink): void {

        const [, err] = attemptSync(() => sink.close());

        if (err) {

            logEvents.emit('logger:error', {
                level: 'error',
                message: 'failed to close previous log sink',
                error: err,
            });

        }

    }

}

/**
 * Open the file sink a config asks for, if any.
 *
 * @throws SinkOpenError when the file cannot be opened
 */
function openFileSink(config: LoggerConfig): Sink | null {

    if (config.fileWriter) {

        return config.fileWriter;

    }

    if (!config.filePath) {

        return null;

    }

    if (config.fileMaxSizeBytes > 0) {

        return new FileRotator(config.filePath, config.fileMaxSizeBytes, config.fileMaxBackups);

    }

    return new FileSink(config.filePath);

}

// ─────────────────────────────────────────────────────────────
// Singleton / Module API
// ─────────────────────────────────────────────────────────────

/**
 * Process-wide controller behind the module-level functions.
 */
export const defaultController = new LoggerController({ keys: redactedKeys });

/**
 * Configure the process-wide logger.
 */
export function configure(input: LoggerConfigInput = {}): ConfigureResult {

    return defaultController.configure(input);

}

/**
 * Reset the process-wide logger.
 *
 * Useful for testing to ensure clean state between tests.
 */
export function resetLogger(): void {

    defaultController.reset();

}

/**
 * Get the process-wide logger, configuring a console logger on first use.
 */
export function getLogger(): Logger {

    return defaultController.logger();

}

export function setLevel(level: LogLevel): void {

    defaultController.setLevel(level);

}

export function setLogger(logger: Logger): void {

    defaultController.setLogger(logger);

}

export function debug(message: string, data?: Record<string, unknown>): void {

    getLogger().debug(message, data);

}

export function info(message: string, data?: Record<string, unknown>): void {

    getLogger().info(message, data);

}

export function warn(message: string, data?: Record<string, unknown>): void {

    getLogger().warn(message, data);

}

export function error(message: string, data?: Record<string, unknown>): void {

    getLogger().error(message, data);

}

/**
 * Log at error level and exit the process with status 1.
 */
export function fatal(message: string, data?: Record<string, unknown>): void {

    getLogger().fatal(message, data);

}

export function errorErr(message: string, err: unknown, data?: Record<string, unknown>): void {

    getLogger().errorErr(message, err, data);

}

/**
 * Child of the process-wide logger with bound attributes.
 */
export function withAttrs(data: Record<string, unknown>): Logger {

    return getLogger().with(data);

}

export function withGroup(name: string): Logger {

    return getLogger().withGroup(name);

}

export function timed(
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info',
): (extra?: Record<string, unknown>) => void {

    return getLogger().timed(message, data, level);

}
