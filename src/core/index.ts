/**
 * Core module exports.
 *
 * Public entry point of the package. Applications import from here.
 */

// Observer
export { logEvents } from './observer.js'
export type { LoggerEvents, LoggerEventNames } from './observer.js'

// Environment
export { detectColor, type ColorDetectionOptions } from './environment.js'

// Theme
export { logLevelColors, palette, stripColor } from './theme.js'

// Logger
export * from './logger/index.js'
