/**
 * Logger Module
 *
 * Leveled, categorized logging with an async writer loop.
 *
 * Features:
 * - Critical categories that bypass the threshold
 * - Redaction of `keyword=value` fragments
 * - Deferred structured messages
 * - Size-based file rotation with zip archives and retention
 * - Emergency channel for failures inside the pipeline
 */

// Types
export type {
    LogLevel,
    MinLevel,
    LogEntry,
    Appender,
    LoggerState,
    QueueState,
    QueueStats,
    RotationResult,
} from './types.js';

export { LOG_LEVEL_PRIORITY, LOG_LEVELS, DEFAULT_CATEGORY } from './types.js';

// Config
export {
    LogConfig,
    LogConfigSchema,
    ConfigValidationError,
    parseConfig,
    createConfig,
    loadConfigFile,
} from './config.js';
export type { LogConfigValues, LogConfigInput, FrozenConfigValues } from './config.js';

// Redaction
export { FILTERED_MASK, compileRedactionPatterns, filterSensitive } from './redact.js';

// Messages
export {
    StructuredMessage,
    MessageBuilder,
    formatMessage,
    interpolate,
    type MessageProducer,
} from './message.js';

// Entries and formatting
export { createEntry, captureStackTrace, type EntryInit } from './entry.js';
export {
    LEVEL_LABELS,
    FILE_LINE_PATTERN,
    formatTime,
    formatFileLine,
    formatConsoleMessage,
} from './formatter.js';

// Queue
export { AsyncLogQueue, BoundedQueue, WakeSignal, type AsyncLogQueueOptions } from './queue.js';

// Appenders
export { FileAppender, type FileAppenderOptions } from './file.js';
export {
    ConsoleAppender,
    createConsoleSink,
    type ConsoleSink,
    type ConsoleSinkOptions,
} from './console.js';
export {
    LOG_EXT,
    ARCHIVE_EXT,
    generateLogFileName,
    isLogFileName,
    listLogFiles,
    pruneLogFiles,
    compressFile,
    type LogFileInfo,
} from './rotation.js';

// Emergency channel
export { EmergencyChannel, EMERGENCY_LOG_FILE } from './emergency.js';

// Performance
export { PerformanceMonitor, formatPerformanceSample, type PerformanceSample } from './performance.js';

// Bridge
export {
    LogRequestBuffer,
    truncateUtf8,
    MAX_MESSAGE_BYTES,
    MAX_CATEGORY_BYTES,
    type LogRequest,
    type LogTarget,
} from './bridge.js';

// Logger
export { Logger, createLogger, CRITICAL_CATEGORY, SYSTEM_CATEGORY, type LoggerOptions } from './logger.js';
