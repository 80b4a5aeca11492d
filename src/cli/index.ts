#!/usr/bin/env node
/**
 * CLI entry point for logstrand-demo.
 *
 * @example
 * ```bash
 * logstrand-demo                                  # text to stderr
 * logstrand-demo --json --level debug             # JSON, everything
 * logstrand-demo --file logs/demo.log --max-size 1kb --max-backups 3
 * LOGSTRAND_STACKTRACE_LEVEL=error logstrand-demo # stacks on errors
 * ```
 */
import meow from 'meow'

import { runDemo } from './demo.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ logstrand-demo [options]

  Options
    --json              JSON output on console and file
    --file <path>       Also write to a log file
    --level <level>     Minimum level: debug, info, warn, error
    --max-size <size>   Rotate the file past this size (e.g. 10mb)
    --max-backups <n>   Rotated files to keep (0 keeps all)
    --add-source        Record caller file and line
    --config <path>     YAML config file
    --help, -h          Show this help
    --version           Show version

  Environment
    LOGSTRAND_LEVEL, LOGSTRAND_FILE, LOGSTRAND_FILE_MAX_SIZE, ...
    Flags override environment, which overrides the config file.
`


const cli = meow(HELP_TEXT, {
    importMeta: import.meta,
    flags: {
        json: {
            type: 'boolean',
            default: false
        },
        file: {
            type: 'string'
        },
        level: {
            type: 'string'
        },
        maxSize: {
            type: 'string'
        },
        maxBackups: {
            type: 'number'
        },
        addSource: {
            type: 'boolean',
            default: false
        },
        config: {
            type: 'string'
        }
    }
})

process.exitCode = runDemo({
    json: cli.flags.json,
    addSource: cli.flags.addSource,
    file: cli.flags.file,
    level: cli.flags.level,
    maxSize: cli.flags.maxSize,
    maxBackups: cli.flags.maxBackups,
    config: cli.flags.config,
})
