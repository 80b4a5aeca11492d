/**
 * Log Formatter
 *
 * Terminal handlers that turn records into lines and write them to a
 * sink. TextHandler writes `key=value` lines; JsonHandler writes one JSON
 * object per line.
 *
 * @example
 * ```text
 * time=2024-01-15T10:30:00.000Z level=INFO msg="server started" port=8080
 * {"time":"2024-01-15T10:30:00.000Z","level":"INFO","msg":"server started","port":8080}
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { AttrGroup, Duration, LevelRef } from './types.js';
import type { Attr, Handler, LogLevel, LogRecord, Sink, SourceLocation } from './types.js';

/**
 * An attribute together with the groups that were open when it was added.
 */
interface ScopedAttr {

    readonly groups: readonly string[];

    readonly attr: Attr;

}

/**
 * Flattened attribute ready for output.
 */
interface FlatAttr {

    readonly path: readonly string[];

    readonly key: string;

    readonly value: unknown;

}

/**
 * Options shared by the terminal handlers.
 */
export interface FormatHandlerOptions {

    /** Shared minimum level (defaults to a private `info` cell) */
    level?: LevelRef;

    /** Include the caller location when the record carries one */
    addSource?: boolean;

}

/**
 * Uppercase level label used in both output formats.
 */
export function levelLabel(level: LogLevel): string {

    return level.toUpperCase();

}

/**
 * Expand group values into dotted paths.
 */
function flatten(groups: readonly string[], attrs: readonly Attr[], out: FlatAttr[]): void {

    for (const { key, value } of attrs) {

        if (value instanceof AttrGroup) {

            flatten([...groups, key], value.attrs, out);
            continue;

        }

        out.push({ path: groups, key, value });

    }

}

/**
 * Base for handlers that format records into lines.
 *
 * Bound attributes and open groups live on the handler; `withAttrs` and
 * `withGroup` return copies.
 */
export abstract class FormatHandler implements Handler {

    readonly sink: Sink;
    readonly levelRef: LevelRef;
    readonly addSource: boolean;

    protected readonly bound: readonly ScopedAttr[];
    protected readonly groups: readonly string[];

    constructor(
        sink: Sink,
        options: FormatHandlerOptions = {},
        bound: readonly ScopedAttr[] = [],
        groups: readonly string[] = [],
    ) {

        this.sink = sink;
        this.levelRef = options.level ?? new LevelRef();
        this.addSource = options.addSource ?? false;
        this.bound = bound;
        this.groups = groups;

    }

    enabled(level: LogLevel): boolean {

        return this.levelRef.enabled(level);

    }

    handle(record: LogRecord): void {

        this.sink.write(this.format(record) + '\n');

    }

    withAttrs(attrs: readonly Attr[]): Handler {

        if (attrs.length === 0) {

            return this;

        }

        const scoped = attrs.map((attr) => ({ groups: this.groups, attr }));

        return this.copy([...this.bound, ...scoped], this.groups);

    }

    withGroup(name: string): Handler {

        if (!name) {

            return this;

        }

        return this.copy(this.bound, [...this.groups, name]);

    }

    /**
     * Format a record as a single line without the trailing newline.
     */
    abstract format(record: LogRecord): string;

    protected abstract copy(bound: readonly ScopedAttr[], groups: readonly string[]): FormatHandler;

    protected get options(): FormatHandlerOptions {

        return { level: this.levelRef, addSource: this.addSource };

    }

    /**
     * Bound attributes followed by the record's own, flattened.
     */
    protected collect(record: LogRecord): FlatAttr[] {

        const out: FlatAttr[] = [];

        for (const { groups, attr } of this.bound) {

            flatten(groups, [attr], out);

        }

        flatten(this.groups, record.attrs, out);

        return out;

    }

}

// ─────────────────────────────────────────────────────────────
// Text
// ─────────────────────────────────────────────────────────────

const NEEDS_QUOTING = /[\s"=\\\u0000-\u001f\u007f]/;

/**
 * Quote a string when it would not survive as a bare token.
 */
export function quoteIfNeeded(value: string): string {

    if (value === '' || NEEDS_QUOTING.test(value)) {

        return JSON.stringify(value);

    }

    return value;

}

/**
 * Render a value for text output.
 *
 * @example
 * ```typescript
 * textValue('hello world')     // '"hello world"'
 * textValue(new Error('boom')) // 'boom'
 * textValue(duration(1500))    // '1.5s'
 * ```
 */
export function textValue(value: unknown): string {

    if (typeof value === 'string') {

        return quoteIfNeeded(value);

    }

    if (value === null || value === undefined) {

        return String(value);

    }

    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {

        return String(value);

    }

    if (value instanceof Date) {

        return Number.isNaN(value.getTime()) ? 'InvalidDate' : value.toISOString();

    }

    if (value instanceof Duration) {

        return value.toString();

    }

    if (value instanceof Error) {

        return quoteIfNeeded(value.message);

    }

    if (typeof value === 'object') {

        const [str, err] = attemptSync(() => JSON.stringify(value));

        if (err || str === undefined) {

            return quoteIfNeeded(String(value));

        }

        return quoteIfNeeded(str);

    }

    return quoteIfNeeded(String(value));

}

/**
 * Handler writing `key=value` lines.
 */
export class TextHandler extends FormatHandler {

    format(record: LogRecord): string {

        const parts = [
            `time=${record.time.toISOString()}`,
            `level=${levelLabel(record.level)}`,
            `msg=${quoteIfNeeded(record.message)}`,
        ];

        if (this.addSource && record.source) {

            parts.push(`source=${quoteIfNeeded(`${record.source.file}:${record.source.line}`)}`);

        }

        for (const { path, key, value } of this.collect(record)) {

            parts.push(`${quoteIfNeeded([...path, key].join('.'))}=${textValue(value)}`);

        }

        return parts.join(' ');

    }

    protected copy(bound: readonly ScopedAttr[], groups: readonly string[]): FormatHandler {

        return new TextHandler(this.sink, this.options, bound, groups);

    }

}

// ─────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────

/**
 * Convert a value into something JSON.stringify renders faithfully.
 */
export function jsonValue(value: unknown): unknown {

    if (value === undefined) {

        return null;

    }

    if (typeof value === 'bigint') {

        return value.toString();

    }

    if (value instanceof Date) {

        return Number.isNaN(value.getTime()) ? 'InvalidDate' : value.toISOString();

    }

    if (value instanceof Duration) {

        return value.toString();

    }

    if (value instanceof Error) {

        return value.message;

    }

    if (typeof value === 'object' && value !== null) {

        const [, err] = attemptSync(() => JSON.stringify(value));

        return err ? String(value) : value;

    }

    if (typeof value === 'function' || typeof value === 'symbol') {

        return String(value);

    }

    return value;

}

/**
 * Top-level JSON fields owned by the record itself.
 */
const JSON_RECORD_KEYS: ReadonlySet<string> = new Set(['time', 'level', 'msg', 'source']);

/**
 * Move a top-level attribute key out of the way of a record field.
 */
function jsonTopKey(key: string): string {

    return JSON_RECORD_KEYS.has(key) ? `attr.${key}` : key;

}

function sourceObject(source: SourceLocation): Record<string, unknown> {

    const out: Record<string, unknown> = { file: source.file, line: source.line };

    if (source.function) {

        out['function'] = source.function;

    }

    return out;

}

/**
 * Handler writing one JSON object per line.
 *
 * Attributes or groups named `time`, `level`, `msg` or `source` at the
 * top level are written as `attr.<name>` so they never replace the
 * record's own fields.
 */
export class JsonHandler extends FormatHandler {

    format(record: LogRecord): string {

        const entry: Record<string, unknown> = {
            time: record.time.toISOString(),
            level: levelLabel(record.level),
            msg: record.message,
        };

        if (this.addSource && record.source) {

            entry['source'] = sourceObject(record.source);

        }

        // Nested group objects created for this entry, keyed by path
        const nested = new Map<string, Record<string, unknown>>();

        for (const { path: rawPath, key: rawKey, value } of this.collect(record)) {

            const [head, ...tail] = rawPath;
            const path = head === undefined ? [] : [jsonTopKey(head), ...tail];
            const key = head === undefined ? jsonTopKey(rawKey) : rawKey;
            let target = entry;

            path.forEach((segment, i) => {

                const id = path.slice(0, i + 1).join('\u0000');
                let next = nested.get(id);

                if (!next) {

                    next = {};
                    nested.set(id, next);
                    target[segment] = next;

                }

                target = next;

            });

            target[key] = jsonValue(value);

        }

        return JSON.stringify(entry);

    }

    protected copy(bound: readonly ScopedAttr[], groups: readonly string[]): FormatHandler {

        return new JsonHandler(this.sink, this.options, bound, groups);

    }

}
