/**
 * Redaction
 *
 * Replaces the values of sensitive attributes with a fixed placeholder.
 * The block-list is matched case-insensitively and can change at any
 * time; every change publishes a brand-new set, so a record is always
 * redacted against one complete snapshot.
 *
 * @example
 * ```typescript
 * setRedactedKeys('password', 'Authorization')
 *
 * logger.info('login', { user: 'ada', password: 'hunter2' })
 * // ... user=ada password=REDACTED
 * ```
 */
import { attemptSync } from '@logosdx/utils';

import { replaceRecordAttrs } from './record.js';
import { AttrGroup } from './types.js';
import type { Attr, Handler, LogLevel, LogRecord } from './types.js';

/**
 * Placeholder written in place of redacted values.
 */
export const REDACTED = 'REDACTED';

/**
 * Query parameters sanitizeUrl always redacts.
 */
const SENSITIVE_QUERY_PARAMS: ReadonlySet<string> = new Set(['apikey', 'password', 'token', 'key']);

const EMPTY_KEYS: ReadonlySet<string> = new Set();

// ─────────────────────────────────────────────────────────────
// Key Set
// ─────────────────────────────────────────────────────────────

/**
 * Copy-on-write set of lower-cased attribute keys.
 *
 * Writers build a complete new set and swap it in; a published set is
 * never modified afterwards.
 */
export class RedactionKeys {

    #snapshot: ReadonlySet<string> = EMPTY_KEYS;

    /**
     * The currently published set.
     */
    snapshot(): ReadonlySet<string> {

        return this.#snapshot;

    }

    get size(): number {

        return this.#snapshot.size;

    }

    has(key: string): boolean {

        return this.#snapshot.has(key.toLowerCase());

    }

    /**
     * Replace the set with exactly these keys.
     */
    set(...keys: string[]): void {

        this.#snapshot = new Set(keys.map((k) => k.toLowerCase()));

    }

    /**
     * Add keys to the current set.
     */
    add(...keys: string[]): void {

        const next = new Set(this.#snapshot);

        for (const key of keys) {

            next.add(key.toLowerCase());

        }

        this.#snapshot = next;

    }

    clear(): void {

        this.#snapshot = EMPTY_KEYS;

    }

    /**
     * Keys in the current set, sorted.
     */
    list(): string[] {

        return [...this.#snapshot].sort();

    }

}

/**
 * Process-wide key set used by the default controller.
 */
export const redactedKeys = new RedactionKeys();

/**
 * Replace the redacted keys.
 */
export function setRedactedKeys(...keys: string[]): void {

    redactedKeys.set(...keys);

}

/**
 * Add keys to the redaction set.
 */
export function addRedactedKeys(...keys: string[]): void {

    redactedKeys.add(...keys);

}

/**
 * Remove all redacted keys.
 */
export function clearRedactedKeys(): void {

    redactedKeys.clear();

}

/**
 * Snapshot of the redacted keys, sorted.
 */
export function listRedactedKeys(): string[] {

    return redactedKeys.list();

}

// ─────────────────────────────────────────────────────────────
// Attribute Redaction
// ─────────────────────────────────────────────────────────────

/**
 * Redact attributes against a key snapshot, walking into groups.
 *
 * Order is preserved; untouched attributes are passed through as-is.
 */
export function redactAttrs(attrs: readonly Attr[], keys: ReadonlySet<string>): Attr[] {

    return attrs.map((attr) => {

        if (keys.has(attr.key.toLowerCase())) {

            return { key: attr.key, value: REDACTED };

        }

        if (attr.value instanceof AttrGroup) {

            return { key: attr.key, value: new AttrGroup(redactAttrs(attr.value.attrs, keys)) };

        }

        return attr;

    });

}

/**
 * Handler that redacts attributes before passing records on.
 */
export class RedactionHandler implements Handler {

    constructor(
        public readonly next: Handler,
        public readonly keys: RedactionKeys = redactedKeys,
    ) {}

    enabled(level: LogLevel): boolean {

        return this.next.enabled(level);

    }

    handle(record: LogRecord): void {

        const keys = this.keys.snapshot();

        if (keys.size === 0) {

            this.next.handle(record);

            return;

        }

        this.next.handle(replaceRecordAttrs(record, redactAttrs(record.attrs, keys)));

    }

    /**
     * Bound attributes are redacted against the set current at bind time.
     */
    withAttrs(attrs: readonly Attr[]): Handler {

        const keys = this.keys.snapshot();
        const bound = keys.size === 0 ? attrs : redactAttrs(attrs, keys);

        return new RedactionHandler(this.next.withAttrs(bound), this.keys);

    }

    withGroup(name: string): Handler {

        return new RedactionHandler(this.next.withGroup(name), this.keys);

    }

}

// ─────────────────────────────────────────────────────────────
// URLs
// ─────────────────────────────────────────────────────────────

/**
 * Replace sensitive query parameter values in place.
 *
 * @returns whether any parameter was replaced
 */
function redactParams(params: URLSearchParams): boolean {

    const sensitive = [...new Set(params.keys())]
        .filter((name) => SENSITIVE_QUERY_PARAMS.has(name.toLowerCase()));

    for (const name of sensitive) {

        params.set(name, REDACTED);

    }

    return sensitive.length > 0;

}

/**
 * Redact the query of a string that is not an absolute URL.
 *
 * Everything outside the `?...` part is kept as written.
 */
function redactQuery(raw: string): string {

    const queryAt = raw.indexOf('?');
    const hashAt = raw.indexOf('#');

    if (queryAt < 0 || (hashAt >= 0 && hashAt < queryAt)) {

        return raw;

    }

    const end = hashAt < 0 ? raw.length : hashAt;
    const params = new URLSearchParams(raw.slice(queryAt + 1, end));

    if (!redactParams(params)) {

        return raw;

    }

    return raw.slice(0, queryAt + 1) + params.toString() + raw.slice(end);

}

/**
 * Redact well-known credential query parameters in a URL.
 *
 * Matches `apikey`, `password`, `token` and `key` case-insensitively,
 * independent of the redacted key set. Absolute URLs are rebuilt from
 * their parsed form. Request paths such as `/api?token=abc` and any
 * other string keep their text and only have the query rewritten.
 *
 * @example
 * ```typescript
 * sanitizeUrl('https://api.local/v1?apikey=abc123&name=test')
 * // 'https://api.local/v1?apikey=REDACTED&name=test'
 *
 * sanitizeUrl('/v1/devices?token=abc123')
 * // '/v1/devices?token=REDACTED'
 * ```
 */
export function sanitizeUrl(url: string | URL | null | undefined): string {

    if (!url) {

        return '';

    }

    const raw = url.toString();
    const [parsed] = attemptSync(() => new URL(raw));

    if (!parsed) {

        return redactQuery(raw);

    }

    redactParams(parsed.searchParams);

    return parsed.toString();

}
