/**
 * Logger configuration.
 *
 * Zod schemas for the logger config plus two outside sources for it:
 * LOGSTRAND_* environment variables and a YAML file. Layers are merged
 * in order and validated once at the end.
 *
 * @example
 * ```bash
 * LOGSTRAND_LEVEL=debug
 * LOGSTRAND_FILE=logs/app.log
 * LOGSTRAND_FILE_MAX_SIZE=10mb
 * LOGSTRAND_FILE_MAX_BACKUPS=5
 * ```
 *
 * ```yaml
 * # logstrand.yml
 * logging:
 *   level: info
 *   console: true
 *   filePath: logs/app.log
 *   fileMaxSize: 10mb
 *   fileMaxBackups: 5
 * ```
 */
import { readFileSync } from 'node:fs';
import { attemptSync } from '@logosdx/utils';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { LoggerConfigError } from './errors.js';
import { parseSize } from './rotation.js';
import type { LoggerConfig, Sink } from './types.js';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Stack attachment threshold.
 */
export const StackLevelSchema = z.enum(['off', 'debug', 'info', 'warn', 'error']);

/**
 * Anything with a write() method.
 */
const SinkSchema = z.custom<Sink>(
    (value) => typeof value === 'object'
        && value !== null
        && 'write' in value
        && typeof value.write === 'function',
    { message: 'fileWriter must have a write() method' },
);

/**
 * Byte size as a number or a size string (e.g., '10mb').
 */
const SizeSchema = z.union([
    z.number().int().nonnegative(),
    z.string().transform((value, ctx) => {

        const [bytes, err] = attemptSync(() => parseSize(value));

        if (err) {

            ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });

            return z.NEVER;

        }

        return bytes;

    }),
]);

// ─────────────────────────────────────────────────────────────
// Config Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Full logger config with defaults applied.
 */
export const LoggerConfigSchema = z.object({
    level: LogLevelSchema.default('info'),
    console: z.boolean().default(false),
    consoleJSON: z.boolean().default(false),
    filePath: z.string().default(''),
    jsonFile: z.boolean().default(false),
    addSource: z.boolean().default(false),
    stacktraceLevel: StackLevelSchema.default('off'),
    stackMaxBytes: z.number().int().positive().optional(),
    fileMaxSizeBytes: SizeSchema.default(0),
    fileMaxBackups: z.number().int().nonnegative().default(0),
    fileWriter: SinkSchema.optional(),
});

/**
 * Config as accepted by configure(); every field is optional.
 */
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

/**
 * Config file section. Accepts `fileMaxSize` as a size string.
 */
const FileConfigSchema = LoggerConfigSchema
    .omit({ fileWriter: true })
    .partial()
    .extend({ fileMaxSize: SizeSchema.optional() });

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

function toConfigError(error: z.ZodError, source?: string): LoggerConfigError {

    const firstIssue = error.issues[0];
    const field = firstIssue?.path.join('.') || 'unknown';
    const where = source ? ` (${source})` : '';

    return new LoggerConfigError(
        `Invalid logger config${where}: ${field}: ${firstIssue?.message ?? 'Validation failed'}`,
        field,
        error.issues,
    );

}

/**
 * Validate a config and fill in defaults.
 *
 * @throws LoggerConfigError if validation fails
 *
 * @example
 * ```typescript
 * const [config, err] = attemptSync(() => validateLoggerConfig({ level: 'loud' }))
 * if (err) {
 *     console.error(err.message) // Invalid logger config: level: Invalid enum value...
 * }
 * ```
 */
export function validateLoggerConfig(input: unknown): LoggerConfig {

    const result = LoggerConfigSchema.safeParse(input ?? {});

    if (!result.success) {

        throw toConfigError(result.error);

    }

    return result.data;

}

// ─────────────────────────────────────────────────────────────
// Environment
// ─────────────────────────────────────────────────────────────

const EnvBoolSchema = z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['1', 'true', '0', 'false']))
    .transform((value) => value === '1' || value === 'true');

const EnvIntSchema = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
    LOGSTRAND_LEVEL: z.string().trim().toLowerCase().pipe(LogLevelSchema).optional(),
    LOGSTRAND_CONSOLE: EnvBoolSchema.optional(),
    LOGSTRAND_CONSOLE_JSON: EnvBoolSchema.optional(),
    LOGSTRAND_FILE: z.string().optional(),
    LOGSTRAND_JSON_FILE: EnvBoolSchema.optional(),
    LOGSTRAND_ADD_SOURCE: EnvBoolSchema.optional(),
    LOGSTRAND_STACKTRACE_LEVEL: z.string().trim().toLowerCase().pipe(StackLevelSchema).optional(),
    LOGSTRAND_FILE_MAX_SIZE: SizeSchema.optional(),
    LOGSTRAND_FILE_MAX_BACKUPS: EnvIntSchema.optional(),
});

/**
 * Read config values from LOGSTRAND_* environment variables.
 *
 * Unset variables come back as undefined and do not override other
 * layers in resolveConfig().
 *
 * @throws LoggerConfigError if a variable holds an invalid value
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfigInput {

    const result = EnvSchema.safeParse(env);

    if (!result.success) {

        throw toConfigError(result.error, 'environment');

    }

    const vars = result.data;

    return {
        level: vars.LOGSTRAND_LEVEL,
        console: vars.LOGSTRAND_CONSOLE,
        consoleJSON: vars.LOGSTRAND_CONSOLE_JSON,
        filePath: vars.LOGSTRAND_FILE,
        jsonFile: vars.LOGSTRAND_JSON_FILE,
        addSource: vars.LOGSTRAND_ADD_SOURCE,
        stacktraceLevel: vars.LOGSTRAND_STACKTRACE_LEVEL,
        fileMaxSizeBytes: vars.LOGSTRAND_FILE_MAX_SIZE,
        fileMaxBackups: vars.LOGSTRAND_FILE_MAX_BACKUPS,
    };

}

// ─────────────────────────────────────────────────────────────
// Config File
// ─────────────────────────────────────────────────────────────

/**
 * Load logger config from a YAML file.
 *
 * Reads the `logging` section when present, the document root otherwise.
 *
 * @throws LoggerConfigError if the section is invalid
 */
export function loadConfigFile(filepath: string): LoggerConfigInput {

    const doc: unknown = parseYaml(readFileSync(filepath, 'utf8'));

    const section = typeof doc === 'object' && doc !== null && 'logging' in doc
        ? doc.logging
        : doc;

    const result = FileConfigSchema.safeParse(section ?? {});

    if (!result.success) {

        throw toConfigError(result.error, filepath);

    }

    const { fileMaxSize, ...rest } = result.data;

    return fileMaxSize === undefined ? rest : { ...rest, fileMaxSizeBytes: fileMaxSize };

}

/**
 * Merge config layers left to right and validate the result.
 *
 * Layers are unvalidated (flags, env, file sections); only the merged
 * config is checked. Undefined values never override an earlier layer.
 *
 * @example
 * ```typescript
 * const config = resolveConfig(
 *     { console: true },
 *     loadConfigFile('logstrand.yml'),
 *     getEnvConfig(),
 * )
 * ```
 */
export function resolveConfig(...layers: Array<Record<string, unknown>>): LoggerConfig {

    const merged: Record<string, unknown> = {};

    for (const layer of layers) {

        for (const [key, value] of Object.entries(layer)) {

            if (value !== undefined) {

                merged[key] = value;

            }

        }

    }

    return validateLoggerConfig(merged);

}
