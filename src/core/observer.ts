/**
 * Logger lifecycle events.
 *
 * The logger cannot log its own failures through itself, so rotation,
 * configuration and delivery problems are published here instead.
 *
 * @example
 * ```typescript
 * const cleanup = logEvents.on('logger:rotation-failed', ({ file, error }) => {
 *     metrics.increment('log_rotation_failures')
 * })
 *
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events,
} from '@logosdx/observer'

import type { LogLevel } from './logger/types.js'


/**
 * All events emitted by the logger core.
 *
 * - `logger:configured` - A new chain was installed
 * - `logger:reset` - The controller returned to unconfigured
 * - `logger:rotated` - A file sink rotated
 * - `logger:rotation-failed` - Rotation failed; writes continue on the current file
 * - `logger:error` - A log call failed to deliver; the caller never sees it
 */
export interface LoggerEvents {

    'logger:configured': { level: LogLevel; console: boolean; file: string | null; error: Error | null }
    'logger:reset': Record<string, never>
    'logger:rotated': { oldFile: string; newFile: string; deletedFiles: string[] }
    'logger:rotation-failed': { file: string; error: Error }
    'logger:error': { level: LogLevel; message: string; error: Error }
}

export type LoggerEventNames = Events<LoggerEvents>;

/**
 * Global observer for logger lifecycle events.
 *
 * Enable debug mode with `LOGSTRAND_DEBUG=1` to see all events as they occur.
 */
export const logEvents = new ObserverEngine<LoggerEvents>({
    name: 'logstrand',
    spy: process.env['LOGSTRAND_DEBUG']
        ? (action) => console.error(`[logstrand:${action.fn}] ${String(action.event)}`)
        : undefined
});
