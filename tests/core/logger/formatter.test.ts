import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
    JsonHandler,
    TextHandler,
    jsonValue,
    quoteIfNeeded,
    textValue,
} from '../../../src/core/logger/formatter.js';
import { createRecord, group, toAttrs } from '../../../src/core/logger/record.js';
import { MemorySink } from '../../../src/core/logger/sinks.js';
import { LevelRef, duration } from '../../../src/core/logger/types.js';

describe('logger: formatter', () => {

    let sink: MemorySink;

    beforeEach(() => {

        // Mock Date for consistent timestamps
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-01-15T10:30:00.000Z'));

        sink = new MemorySink();

    });

    afterEach(() => {

        vi.useRealTimers();

    });

    describe('quoteIfNeeded', () => {

        it('should leave bare tokens alone', () => {

            expect(quoteIfNeeded('GET')).toBe('GET');
            expect(quoteIfNeeded('/health')).toBe('/health');

        });

        it('should quote empty strings and strings with spaces, quotes or equals', () => {

            expect(quoteIfNeeded('')).toBe('""');
            expect(quoteIfNeeded('hello world')).toBe('"hello world"');
            expect(quoteIfNeeded('a=b')).toBe('"a=b"');
            expect(quoteIfNeeded('say "hi"')).toBe('"say \\"hi\\""');
            expect(quoteIfNeeded('line\nbreak')).toBe('"line\\nbreak"');

        });

    });

    describe('textValue', () => {

        it('should render scalars', () => {

            expect(textValue(8080)).toBe('8080');
            expect(textValue(true)).toBe('true');
            expect(textValue(10n)).toBe('10');
            expect(textValue(null)).toBe('null');
            expect(textValue(undefined)).toBe('undefined');

        });

        it('should render dates, durations and errors', () => {

            expect(textValue(new Date('2024-01-01T00:00:00.000Z'))).toBe('2024-01-01T00:00:00.000Z');
            expect(textValue(duration(1500))).toBe('1.5s');
            expect(textValue(duration(250))).toBe('250ms');
            expect(textValue(new Error('boom failed'))).toBe('"boom failed"');

        });

        it('should render objects as JSON', () => {

            expect(textValue([1, 2])).toBe('[1,2]');
            expect(textValue({ a: 1 })).toBe('"{\\"a\\":1}"');

        });

        it('should fall back to String() for values JSON cannot render', () => {

            const circular: Record<string, unknown> = {};
            circular['self'] = circular;

            expect(textValue(circular)).toBe('"[object Object]"');

        });

    });

    describe('TextHandler', () => {

        it('should write one key=value line per record', () => {

            new TextHandler(sink).handle(createRecord('info', 'server started', toAttrs({ port: 8080 })));

            expect(sink.text()).toBe(
                'time=2024-01-15T10:30:00.000Z level=INFO msg="server started" port=8080\n',
            );

        });

        it('should prefix attributes with open groups', () => {

            const handler = new TextHandler(sink)
                .withAttrs(toAttrs({ component: 'api' }))
                .withGroup('req')
                .withAttrs(toAttrs({ method: 'GET' }));

            handler.handle(createRecord('warn', 'slow', [
                ...toAttrs({ status: 200 }),
                group('db', { ms: 5 }),
            ]));

            expect(sink.lines()).toEqual([
                'time=2024-01-15T10:30:00.000Z level=WARN msg=slow component=api req.method=GET req.status=200 req.db.ms=5',
            ]);

        });

        it('should include the source when enabled', () => {

            const handler = new TextHandler(sink, { addSource: true });

            handler.handle(createRecord('error', 'failed', [], { file: '/srv/app.ts', line: 42 }));

            expect(sink.lines()).toEqual([
                'time=2024-01-15T10:30:00.000Z level=ERROR msg=failed source=/srv/app.ts:42',
            ]);

        });

        it('should omit the source when disabled', () => {

            new TextHandler(sink).handle(createRecord('debug', 'x', [], { file: '/srv/app.ts', line: 42 }));

            expect(sink.lines()).toEqual(['time=2024-01-15T10:30:00.000Z level=DEBUG msg=x']);

        });

        it('should follow the shared level', () => {

            const level = new LevelRef('warn');
            const handler = new TextHandler(sink, { level });

            expect(handler.enabled('info')).toBe(false);

            level.set('debug');

            expect(handler.enabled('info')).toBe(true);
            expect(handler.withGroup('g').enabled('debug')).toBe(true);

        });

        it('should return itself for empty attrs or group names', () => {

            const handler = new TextHandler(sink);

            expect(handler.withAttrs([])).toBe(handler);
            expect(handler.withGroup('')).toBe(handler);

        });

    });

    describe('jsonValue', () => {

        it('should convert values JSON cannot carry', () => {

            expect(jsonValue(undefined)).toBeNull();
            expect(jsonValue(10n)).toBe('10');
            expect(jsonValue(new Date('2024-01-01T00:00:00.000Z'))).toBe('2024-01-01T00:00:00.000Z');
            expect(jsonValue(duration(1500))).toBe('1.5s');
            expect(jsonValue(new Error('boom'))).toBe('boom');

        });

        it('should pass plain values through', () => {

            const obj = { a: 1 };

            expect(jsonValue(obj)).toBe(obj);
            expect(jsonValue('text')).toBe('text');
            expect(jsonValue(3)).toBe(3);

        });

    });

    describe('JsonHandler', () => {

        it('should write one JSON object per line', () => {

            new JsonHandler(sink).handle(createRecord('info', 'server started', toAttrs({ port: 8080 })));

            expect(sink.text()).toBe(
                '{"time":"2024-01-15T10:30:00.000Z","level":"INFO","msg":"server started","port":8080}\n',
            );

        });

        it('should nest grouped attributes', () => {

            const handler = new JsonHandler(sink)
                .withAttrs(toAttrs({ component: 'api' }))
                .withGroup('req')
                .withAttrs(toAttrs({ method: 'GET' }));

            handler.handle(createRecord('info', 'done', [
                ...toAttrs({ status: 200 }),
                group('db', { ms: 5 }),
            ]));

            expect(JSON.parse(sink.lines()[0] ?? '')).toEqual({
                time: '2024-01-15T10:30:00.000Z',
                level: 'INFO',
                msg: 'done',
                component: 'api',
                req: { method: 'GET', status: 200, db: { ms: 5 } },
            });

        });

        it('should write the source as an object', () => {

            const handler = new JsonHandler(sink, { addSource: true });

            handler.handle(createRecord('error', 'failed', [], { file: '/srv/app.ts', line: 42, function: 'serve' }));

            expect(sink.lines()).toEqual([
                '{"time":"2024-01-15T10:30:00.000Z","level":"ERROR","msg":"failed","source":{"file":"/srv/app.ts","line":42,"function":"serve"}}',
            ]);

        });

        it('should keep record fields when attributes reuse their names', () => {

            const handler = new JsonHandler(sink, { addSource: true })
                .withAttrs(toAttrs({ msg: 'bound' }));

            handler.handle(createRecord('warn', 'disk low', [
                ...toAttrs({ level: 'custom', source: 'cron' }),
                group('time', { zone: 'utc' }),
            ], { file: '/srv/app.ts', line: 7 }));

            expect(sink.lines()).toEqual([
                '{"time":"2024-01-15T10:30:00.000Z","level":"WARN","msg":"disk low","source":{"file":"/srv/app.ts","line":7},'
                + '"attr.msg":"bound","attr.level":"custom","attr.source":"cron","attr.time":{"zone":"utc"}}',
            ]);

        });

        it('should not rename nested keys that match record fields', () => {

            new JsonHandler(sink).withGroup('req').handle(createRecord('info', 'x', toAttrs({ level: 2 })));

            expect(sink.lines()).toEqual([
                '{"time":"2024-01-15T10:30:00.000Z","level":"INFO","msg":"x","req":{"level":2}}',
            ]);

        });

        it('should render durations, errors and undefined', () => {

            new JsonHandler(sink).handle(createRecord('info', 'x', toAttrs({
                took: duration(250),
                error: new Error('boom'),
                missing: undefined,
            })));

            expect(sink.lines()).toEqual([
                '{"time":"2024-01-15T10:30:00.000Z","level":"INFO","msg":"x","took":"250ms","error":"boom","missing":null}',
            ]);

        });

    });

});
