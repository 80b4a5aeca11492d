/**
 * Demo run.
 *
 * Configures a controller from flags, a YAML file and LOGSTRAND_* env
 * vars, then logs a fixed sequence that shows levels, child loggers,
 * errors, redaction and timing.
 */
import { attemptSync } from '@logosdx/utils'

import { getEnvConfig, loadConfigFile, resolveConfig } from '../core/logger/config.js'
import { defaultController, type LoggerController } from '../core/logger/controller.js'
import type { WritableLike } from '../core/logger/sinks.js'
import { duration } from '../core/logger/types.js'


/**
 * Parsed command line flags.
 */
export interface DemoFlags {
    json: boolean
    addSource: boolean
    file?: string
    level?: string
    maxSize?: string
    maxBackups?: number
    config?: string
}

export interface DemoOptions {
    controller?: LoggerController
    env?: NodeJS.ProcessEnv
    stderr?: WritableLike
}


/**
 * Config layer taken from flags. Unset flags stay undefined.
 */
export function flagLayer(flags: DemoFlags): Record<string, unknown> {

    return {
        level: flags.level,
        consoleJSON: flags.json || undefined,
        filePath: flags.file,
        jsonFile: flags.json || undefined,
        addSource: flags.addSource || undefined,
        fileMaxSizeBytes: flags.maxSize,
        fileMaxBackups: flags.maxBackups,
    }
}

/**
 * Run the demo and return the process exit code.
 */
export function runDemo(flags: DemoFlags, options: DemoOptions = {}): number {

    const controller = options.controller ?? defaultController
    const stderr = options.stderr ?? process.stderr

    const [config, err] = attemptSync(() => resolveConfig(
        { console: true },
        flags.config ? loadConfigFile(flags.config) : {},
        getEnvConfig(options.env),
        flagLayer(flags),
    ))

    if (err) {

        stderr.write(`logstrand-demo: ${err.message}\n`)

        return 1
    }

    const { logger, error } = controller.configure(config)

    if (error) {

        logger.warn('file logging disabled', { error })
    }

    controller.keys.add('password', 'token')

    logger.info('demo started', { min_level: config.level })
    logger.debug('debug detail', { step: 1 })

    const api = logger.with({ component: 'api' })

    api.info('request handled', { method: 'GET', path: '/health', status: 200 })
    api.warn('slow request', { path: '/reports', took: duration(1250) })

    logger.errorErr('request failed', new Error('connection refused'), { attempt: 2 })
    logger.info('user login', { user: 'demo', password: 'example-password' })

    const done = logger.timed('shutdown')

    done({ flushed: true })

    return 0
}
