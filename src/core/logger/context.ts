/**
 * Request context.
 *
 * Carries a request ID through async work so handlers and callers can
 * tag log lines without threading it through every function.
 *
 * @example
 * ```typescript
 * await withRequestId(newRequestId(), async () => {
 *     getLogger().with({ request_id: getRequestId() }).info('handling request')
 * })
 * ```
 */
import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

const requestIdStore = new AsyncLocalStorage<string>();

/**
 * Fresh random request ID (UUID v4).
 */
export function newRequestId(): string {

    return randomUUID();

}

/**
 * Run `fn` with `id` as the current request ID.
 */
export function withRequestId<T>(id: string, fn: () => T): T {

    return requestIdStore.run(id, fn);

}

/**
 * The current request ID, or an empty string outside withRequestId().
 */
export function getRequestId(): string {

    return requestIdStore.getStore() ?? '';

}
