/**
 * Record helpers.
 *
 * Records are treated as immutable values. Every helper here returns a
 * new record and leaves its input alone, so a stage further down the
 * chain can never change what an earlier stage saw.
 */
import { AttrGroup, type Attr, type LogLevel, type LogRecord, type SourceLocation } from './types.js';


/**
 * Convert a plain data object into ordered attributes.
 *
 * Key order follows the object's own enumeration order.
 *
 * @example
 * ```typescript
 * toAttrs({ port: 8080, host: 'localhost' })
 * // [{ key: 'port', value: 8080 }, { key: 'host', value: 'localhost' }]
 * ```
 */
export function toAttrs(data?: Record<string, unknown>): Attr[] {

    if (!data) {

        return [];

    }

    return Object.entries(data).map(([key, value]) => ({ key, value }));

}

/**
 * Build a group attribute.
 */
export function group(key: string, data: Record<string, unknown>): Attr {

    return { key, value: new AttrGroup(toAttrs(data)) };

}

/**
 * Create a record stamped with the current time.
 */
export function createRecord(
    level: LogLevel,
    message: string,
    attrs: readonly Attr[] = [],
    source?: SourceLocation,
): LogRecord {

    const record: LogRecord = {
        time: new Date(),
        level,
        message,
        attrs: [...attrs],
    };

    return source ? { ...record, source } : record;

}

/**
 * Copy a record with extra attributes appended.
 */
export function withRecordAttrs(record: LogRecord, attrs: readonly Attr[]): LogRecord {

    return { ...record, attrs: [...record.attrs, ...attrs] };

}

/**
 * Copy a record with its attributes replaced.
 */
export function replaceRecordAttrs(record: LogRecord, attrs: readonly Attr[]): LogRecord {

    return { ...record, attrs: [...attrs] };

}
