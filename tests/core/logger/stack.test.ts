import { describe, it, expect, afterEach } from 'vitest';

import {
    StackHandler,
    captureStack,
    getStackMaxBytes,
    newStackHandler,
    setStackMaxBytes,
    truncateBytes,
} from '../../../src/core/logger/stack.js';
import { createRecord } from '../../../src/core/logger/record.js';
import { CaptureHandler } from '../../utils/handlers.js';

describe('logger: stack', () => {

    describe('newStackHandler', () => {

        it('should return the next handler itself when off', () => {

            const next = new CaptureHandler();

            expect(newStackHandler(next, 'off')).toBe(next);

        });

        it('should wrap the next handler otherwise', () => {

            const handler = newStackHandler(new CaptureHandler(), 'error', 1024);

            expect(handler).toBeInstanceOf(StackHandler);
            expect(handler instanceof StackHandler ? handler.maxBytes : 0).toBe(1024);

        });

    });

    describe('StackHandler', () => {

        it('should attach a stack at and above the threshold', () => {

            const capture = new CaptureHandler();
            const handler = new StackHandler(capture, 'warn', 64 * 1024);

            handler.handle(createRecord('warn', 'slow'));
            handler.handle(createRecord('error', 'failed'));

            for (const record of capture.records) {

                const stack = record.attrs.find((attr) => attr.key === 'stack')?.value;

                expect(typeof stack).toBe('string');
                expect(String(stack)).toContain('stack.test.ts');

            }

        });

        it('should leave records below the threshold untouched', () => {

            const capture = new CaptureHandler();
            const handler = new StackHandler(capture, 'error', 64 * 1024);
            const record = createRecord('info', 'ok', [{ key: 'n', value: 1 }]);

            handler.handle(record);

            expect(capture.records[0]).toBe(record);

        });

        it('should append the stack after existing attributes', () => {

            const capture = new CaptureHandler();
            const handler = new StackHandler(capture, 'error', 64 * 1024);

            handler.handle(createRecord('error', 'boom', [{ key: 'n', value: 1 }]));

            expect(capture.records[0]?.attrs.map((attr) => attr.key)).toEqual(['n', 'stack']);

        });

        it('should cap the stack at maxBytes', () => {

            const capture = new CaptureHandler();
            const handler = new StackHandler(capture, 'debug', 40);

            handler.handle(createRecord('debug', 'trace'));

            const stack = String(capture.lastAttr('stack'));

            expect(Buffer.byteLength(stack)).toBeLessThanOrEqual(40);

        });

        it('should keep wrapping children', () => {

            const capture = new CaptureHandler();
            const child = new StackHandler(capture, 'error', 1024).withAttrs([{ key: 'component', value: 'api' }]);

            expect(child).toBeInstanceOf(StackHandler);

            child.handle(createRecord('error', 'boom'));

            expect(capture.lastAttr('stack')).toBeDefined();

        });

    });

    describe('captureStack', () => {

        it('should drop the Error header and keep frames', () => {

            const stack = captureStack();

            expect(stack.startsWith('Error')).toBe(false);
            expect(stack.split('\n')[0]).toMatch(/^at /);

        });

    });

    describe('truncateBytes', () => {

        it('should return short text unchanged', () => {

            expect(truncateBytes('hello', 10)).toBe('hello');

        });

        it('should cut to the byte limit', () => {

            expect(truncateBytes('abcdefgh', 3)).toBe('abc');

        });

        it('should drop a multi-byte character split at the boundary', () => {

            // 'é' is two bytes in UTF-8
            expect(truncateBytes('aé', 2)).toBe('a');

        });

    });

    describe('setStackMaxBytes', () => {

        afterEach(() => {

            setStackMaxBytes(64 * 1024);

        });

        it('should update the default cap', () => {

            setStackMaxBytes(2048);

            expect(getStackMaxBytes()).toBe(2048);
            expect(new StackHandler(new CaptureHandler(), 'error').maxBytes).toBe(2048);

        });

        it('should ignore non-positive values', () => {

            setStackMaxBytes(2048);
            setStackMaxBytes(0);
            setStackMaxBytes(-5);

            expect(getStackMaxBytes()).toBe(2048);

        });

    });

});
