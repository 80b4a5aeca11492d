/**
 * Sinks
 *
 * Byte destinations at the end of a handler chain. Every sink writes
 * synchronously and reports how many bytes it accepted.
 */
import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { attemptSync } from '@logosdx/utils';

import { SinkClosedError, SinkOpenError } from './errors.js';
import type { ClosableSink, Sink } from './types.js';

/**
 * Minimal writable surface, satisfied by process.stderr and any
 * node:stream Writable.
 */
export interface WritableLike {

    write(chunk: string | Uint8Array): unknown;

}

/**
 * Byte length of a chunk.
 */
export function byteLength(chunk: string | Uint8Array): number {

    return typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength;

}

/**
 * Sink over a Node writable stream (stderr by default).
 *
 * The stream stays open; the logger does not own process streams.
 */
export class StreamSink implements Sink {

    constructor(public readonly stream: WritableLike = process.stderr) {}

    write(chunk: string | Uint8Array): number {

        this.stream.write(chunk);

        return byteLength(chunk);

    }

}

/**
 * Plain append-mode file sink without rotation.
 */
export class FileSink implements ClosableSink {

    #fd: number | null;

    /**
     * @throws SinkOpenError when the file cannot be created or opened
     */
    constructor(public readonly path: string) {

        const [fd, err] = attemptSync(() => {

            mkdirSync(dirname(path), { recursive: true });

            return openSync(path, 'a', 0o644);

        });

        if (err) {

            throw new SinkOpenError(path, { cause: err });

        }

        this.#fd = fd;

    }

    get closed(): boolean {

        return this.#fd === null;

    }

    write(chunk: string | Uint8Array): number {

        if (this.#fd === null) {

            throw new SinkClosedError(this.path);

        }

        return writeSync(this.#fd, typeof chunk === 'string' ? Buffer.from(chunk) : chunk);

    }

    /**
     * Close the file. Repeated calls are no-ops.
     */
    close(): void {

        const fd = this.#fd;

        if (fd === null) {

            return;

        }

        this.#fd = null;
        closeSync(fd);

    }

}

/**
 * In-memory sink that keeps every chunk as a string.
 *
 * @example
 * ```typescript
 * const sink = new MemorySink()
 * configure({ fileWriter: sink })
 * info('hello')
 * sink.lines() // ['time=... level=INFO msg=hello']
 * ```
 */
export class MemorySink implements ClosableSink {

    readonly chunks: string[] = [];

    closeCount = 0;

    write(chunk: string | Uint8Array): number {

        this.chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));

        return byteLength(chunk);

    }

    close(): void {

        this.closeCount++;

    }

    /**
     * Everything written so far.
     */
    text(): string {

        return this.chunks.join('');

    }

    /**
     * Written output split into lines, without the trailing empty line.
     */
    lines(): string[] {

        return this.text().split('\n').filter((line) => line.length > 0);

    }

    clear(): void {

        this.chunks.length = 0;

    }

}
