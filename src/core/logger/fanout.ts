/**
 * Fan-out Handler
 *
 * Delivers one record to several handlers. A failing child never keeps
 * the record from the children after it; the first failure is rethrown
 * once every child has been tried.
 */
import { attemptSync } from '@logosdx/utils';

import type { Attr, Handler, LogLevel, LogRecord } from './types.js';

export class FanoutHandler implements Handler {

    readonly handlers: readonly Handler[];

    constructor(handlers: readonly Handler[]) {

        if (handlers.length === 0) {

            throw new Error('FanoutHandler requires at least one handler');

        }

        this.handlers = [...handlers];

    }

    enabled(level: LogLevel): boolean {

        return this.handlers.some((h) => h.enabled(level));

    }

    /**
     * Hand the record to every child in construction order.
     *
     * Level filtering happens before a record reaches the fan-out, so
     * children are not asked again.
     *
     * @throws the first child error, after all children were attempted
     */
    handle(record: LogRecord): void {

        let firstErr: Error | null = null;

        for (const handler of this.handlers) {

            const [, err] = attemptSync(() => handler.handle(record));

            if (err && !firstErr) {

                firstErr = err;

            }

        }

        if (firstErr) {

            throw firstErr;

        }

    }

    withAttrs(attrs: readonly Attr[]): Handler {

        return new FanoutHandler(this.handlers.map((h) => h.withAttrs(attrs)));

    }

    withGroup(name: string): Handler {

        return new FanoutHandler(this.handlers.map((h) => h.withGroup(name)));

    }

}

/**
 * Combine handlers, skipping the fan-out when there is only one.
 */
export function combineHandlers(handlers: readonly Handler[]): Handler {

    const [first, ...rest] = handlers;

    if (first && rest.length === 0) {

        return first;

    }

    return new FanoutHandler(handlers);

}
