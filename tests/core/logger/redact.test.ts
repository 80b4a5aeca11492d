import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
    REDACTED,
    RedactionHandler,
    RedactionKeys,
    addRedactedKeys,
    clearRedactedKeys,
    listRedactedKeys,
    redactAttrs,
    sanitizeUrl,
    setRedactedKeys,
} from '../../../src/core/logger/redact.js';
import { TextHandler } from '../../../src/core/logger/formatter.js';
import { Logger } from '../../../src/core/logger/logger.js';
import { createRecord, group } from '../../../src/core/logger/record.js';
import { MemorySink } from '../../../src/core/logger/sinks.js';
import { AttrGroup, LevelRef } from '../../../src/core/logger/types.js';
import { CaptureHandler } from '../../utils/handlers.js';

describe('logger: redact', () => {

    describe('RedactionKeys', () => {

        it('should store keys lower-cased and match case-insensitively', () => {

            const keys = new RedactionKeys();

            keys.set('Password', 'API_KEY');

            expect(keys.has('password')).toBe(true);
            expect(keys.has('PASSWORD')).toBe(true);
            expect(keys.has('api_key')).toBe(true);
            expect(keys.list()).toEqual(['api_key', 'password']);

        });

        it('should replace the set on set() and extend it on add()', () => {

            const keys = new RedactionKeys();

            keys.set('a', 'b');
            keys.set('c');

            expect(keys.list()).toEqual(['c']);

            keys.add('D', 'e');

            expect(keys.list()).toEqual(['c', 'd', 'e']);

        });

        it('should publish a new snapshot on every change', () => {

            const keys = new RedactionKeys();

            keys.set('token');

            const before = keys.snapshot();

            keys.add('secret');

            expect(before.has('secret')).toBe(false);
            expect(keys.snapshot().has('secret')).toBe(true);

        });

        it('should clear all keys', () => {

            const keys = new RedactionKeys();

            keys.set('token');
            keys.clear();

            expect(keys.size).toBe(0);
            expect(keys.list()).toEqual([]);

        });

    });

    describe('module-level key functions', () => {

        afterEach(() => {

            clearRedactedKeys();

        });

        it('should manage the process-wide set', () => {

            setRedactedKeys('Password');
            addRedactedKeys('Token');

            expect(listRedactedKeys()).toEqual(['password', 'token']);

            clearRedactedKeys();

            expect(listRedactedKeys()).toEqual([]);

        });

    });

    describe('redactAttrs', () => {

        it('should replace matching values and keep order', () => {

            const keys = new Set(['password']);

            const result = redactAttrs([
                { key: 'user', value: 'ada' },
                { key: 'PASSWORD', value: 'test-secret' },
                { key: 'count', value: 3 },
            ], keys);

            expect(result).toEqual([
                { key: 'user', value: 'ada' },
                { key: 'PASSWORD', value: REDACTED },
                { key: 'count', value: 3 },
            ]);

        });

        it('should walk into groups', () => {

            const keys = new Set(['token']);

            const [attr] = redactAttrs([group('auth', { user: 'ada', token: 'test-token' })], keys);

            expect(attr?.value).toBeInstanceOf(AttrGroup);
            expect(attr?.value).toEqual(new AttrGroup([
                { key: 'user', value: 'ada' },
                { key: 'token', value: REDACTED },
            ]));

        });

        it('should redact a whole group when its key matches', () => {

            const keys = new Set(['credentials']);

            const result = redactAttrs([group('credentials', { user: 'ada' })], keys);

            expect(result).toEqual([{ key: 'credentials', value: REDACTED }]);

        });

    });

    describe('RedactionHandler', () => {

        let keys: RedactionKeys;
        let capture: CaptureHandler;

        beforeEach(() => {

            keys = new RedactionKeys();
            capture = new CaptureHandler();

        });

        it('should pass the same record through when the set is empty', () => {

            const handler = new RedactionHandler(capture, keys);
            const record = createRecord('info', 'hello', [{ key: 'password', value: 'test-secret' }]);

            handler.handle(record);

            expect(capture.records[0]).toBe(record);

        });

        it('should redact record attributes case-insensitively', () => {

            keys.set('password');

            const handler = new RedactionHandler(capture, keys);

            handler.handle(createRecord('info', 'login', [
                { key: 'User', value: 'ada' },
                { key: 'PassWord', value: 'test-secret' },
            ]));

            expect(capture.records[0]?.attrs).toEqual([
                { key: 'User', value: 'ada' },
                { key: 'PassWord', value: REDACTED },
            ]);

        });

        it('should not modify the original record', () => {

            keys.set('password');

            const handler = new RedactionHandler(capture, keys);
            const record = createRecord('info', 'login', [{ key: 'password', value: 'test-secret' }]);

            handler.handle(record);

            expect(record.attrs).toEqual([{ key: 'password', value: 'test-secret' }]);

        });

        it('should stop redacting after the set is cleared', () => {

            keys.set('password');

            const handler = new RedactionHandler(capture, keys);

            keys.clear();
            handler.handle(createRecord('info', 'login', [{ key: 'password', value: 'test-secret' }]));

            expect(capture.lastAttr('password')).toBe('test-secret');

        });

        it('should redact bound attributes at bind time', () => {

            keys.set('api_key');

            const child = new RedactionHandler(capture, keys).withAttrs([
                { key: 'API_KEY', value: 'test-key' },
                { key: 'service', value: 'billing' },
            ]);

            expect(child).toBeInstanceOf(RedactionHandler);

            child.handle(createRecord('info', 'call'));

            const inner = child instanceof RedactionHandler ? child.next : null;

            expect(inner).toBeInstanceOf(CaptureHandler);
            expect(inner instanceof CaptureHandler ? inner.bound : []).toEqual([
                { key: 'API_KEY', value: REDACTED },
                { key: 'service', value: 'billing' },
            ]);

        });

        it('should delegate enabled() to the next handler', () => {

            const handler = new RedactionHandler(new CaptureHandler([], new LevelRef('warn')), keys);

            expect(handler.enabled('info')).toBe(false);
            expect(handler.enabled('error')).toBe(true);

        });

    });

    describe('text output', () => {

        beforeEach(() => {

            vi.useFakeTimers();
            vi.setSystemTime(new Date('2024-01-15T10:30:00.000Z'));

        });

        afterEach(() => {

            vi.useRealTimers();

        });

        it('should write REDACTED in place of sensitive values', () => {

            const keys = new RedactionKeys();
            const sink = new MemorySink();
            const logger = new Logger(new RedactionHandler(new TextHandler(sink), keys));

            keys.set('password');
            logger.info('login', { user: 'ada', Password: 'test-secret' });

            expect(sink.lines()).toEqual([
                'time=2024-01-15T10:30:00.000Z level=INFO msg=login user=ada Password=REDACTED',
            ]);

        });

    });

    describe('sanitizeUrl', () => {

        it('should redact credential query parameters', () => {

            expect(sanitizeUrl('https://fw.local/api?apikey=abc123&name=test'))
                .toBe('https://fw.local/api?apikey=REDACTED&name=test');

        });

        it('should match parameter names case-insensitively', () => {

            expect(sanitizeUrl('https://fw.local/x?Token=t1&KEY=k1&Password=p1'))
                .toBe('https://fw.local/x?Token=REDACTED&KEY=REDACTED&Password=REDACTED');

        });

        it('should ignore the dynamic key set', () => {

            setRedactedKeys('name');

            expect(sanitizeUrl('https://fw.local/api?name=test')).toBe('https://fw.local/api?name=test');

            clearRedactedKeys();

        });

        it('should accept URL objects', () => {

            expect(sanitizeUrl(new URL('https://fw.local/api?token=abc')))
                .toBe('https://fw.local/api?token=REDACTED');

        });

        it('should return empty string for empty input', () => {

            expect(sanitizeUrl('')).toBe('');
            expect(sanitizeUrl(null)).toBe('');
            expect(sanitizeUrl(undefined)).toBe('');

        });

        it('should redact request paths without a host', () => {

            const sanitized = sanitizeUrl('/api/devices?token=test-secret&limit=10');

            expect(sanitized).toBe('/api/devices?token=REDACTED&limit=10');
            expect(sanitized).not.toContain('test-secret');

        });

        it('should keep the path and fragment of relative URLs as written', () => {

            expect(sanitizeUrl('api/devices?Key=test-secret#top')).toBe('api/devices?Key=REDACTED#top');
            expect(sanitizeUrl('?password=test-secret')).toBe('?password=REDACTED');

        });

        it('should redact the query of unparsable input', () => {

            expect(sanitizeUrl('not a url ?apikey=test-secret')).toBe('not a url ?apikey=REDACTED');

        });

        it('should leave relative URLs without credentials untouched', () => {

            expect(sanitizeUrl('/health')).toBe('/health');
            expect(sanitizeUrl('/search?q=a b')).toBe('/search?q=a b');
            expect(sanitizeUrl('/docs#faq?token=x')).toBe('/docs#faq?token=x');

        });

    });

});
