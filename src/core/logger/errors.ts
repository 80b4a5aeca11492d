/**
 * Logger errors.
 *
 * Distinct error types so callers of configure() can tell a bad config
 * apart from a sink that could not be opened.
 */
import type { z } from 'zod';


/**
 * Error when a file-backed sink cannot be opened.
 *
 * @example
 * ```typescript
 * const { error } = configure({ filePath: '/readonly/app.log' })
 * if (error instanceof SinkOpenError) {
 *     console.error(`Logging to stderr only: ${error.path}`)
 * }
 * ```
 */
export class SinkOpenError extends Error {

    override readonly name = 'SinkOpenError' as const;

    constructor(
        public readonly path: string,
        options?: { cause?: unknown },
    ) {

        const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';

        super(`Failed to open log file '${path}'${reason}`, options);

    }

}


/**
 * Error when writing to a sink that was already closed.
 */
export class SinkClosedError extends Error {

    override readonly name = 'SinkClosedError' as const;

    constructor(public readonly path: string) {

        super(`Log sink '${path}' is closed`);

    }

}


/**
 * Error thrown when logger config validation fails.
 *
 * Includes the specific field that failed and all validation issues.
 */
export class LoggerConfigError extends Error {

    override readonly name = 'LoggerConfigError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}
