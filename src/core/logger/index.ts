/**
 * Logger Module
 *
 * Structured logging with pluggable handler chains.
 *
 * Features:
 * - Text and JSON record formats
 * - Size-based file rotation with backup retention
 * - Fan-out to several handlers
 * - Stack traces attached above a level
 * - Case-insensitive redaction of sensitive keys
 * - Safe runtime reconfiguration
 */

// Types
export type {
    Attr,
    AttrValue,
    ClosableSink,
    ControllerState,
    Handler,
    Loggable,
    LoggerConfig,
    LogLevel,
    LogRecord,
    RotationResult,
    Sink,
    SourceLocation,
    StackLevel,
} from './types.js';

export {
    AttrGroup,
    DEFAULT_LOGGER_CONFIG,
    Duration,
    duration,
    isLevelAtLeast,
    LEVEL_PRIORITY,
    LevelRef,
    LOG_LEVELS,
} from './types.js';

// Errors
export { LoggerConfigError, SinkClosedError, SinkOpenError } from './errors.js';

// Records
export { createRecord, group, toAttrs } from './record.js';

// Formatting
export {
    FormatHandler,
    JsonHandler,
    TextHandler,
    type FormatHandlerOptions,
} from './formatter.js';

export { ColorSink, colorizeLevel } from './color.js';

// Sinks
export { FileSink, MemorySink, StreamSink, type WritableLike } from './sinks.js';

// Rotation
export {
    cleanupRotatedFiles,
    FileRotator,
    formatRotationTimestamp,
    generateRotatedName,
    listRotatedFiles,
    parseSize,
} from './rotation.js';

// Handlers
export { combineHandlers, FanoutHandler } from './fanout.js';

export {
    captureStack,
    getStackMaxBytes,
    newStackHandler,
    setStackMaxBytes,
    StackHandler,
    truncateBytes,
} from './stack.js';

export {
    addRedactedKeys,
    clearRedactedKeys,
    listRedactedKeys,
    REDACTED,
    redactAttrs,
    RedactionHandler,
    RedactionKeys,
    redactedKeys,
    sanitizeUrl,
    setRedactedKeys,
} from './redact.js';

// Logger
export { callerLocation, Logger, type LoggerOptions } from './logger.js';

// Configuration
export {
    getEnvConfig,
    loadConfigFile,
    LoggerConfigSchema,
    resolveConfig,
    validateLoggerConfig,
    type LoggerConfigInput,
} from './config.js';

// Controller
export {
    configure,
    debug,
    defaultController,
    error,
    errorErr,
    fatal,
    getLogger,
    info,
    LoggerController,
    resetLogger,
    setLevel,
    setLogger,
    timed,
    warn,
    withAttrs,
    withGroup,
    type ConfigureResult,
    type ControllerOptions,
} from './controller.js';

// Request context
export { getRequestId, newRequestId, withRequestId } from './context.js';
