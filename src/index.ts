/**
 * loglane
 *
 * Logging for real-time applications.
 *
 * @example
 * ```typescript
 * import { createLogger, StructuredMessage } from 'loglane'
 *
 * const logger = createLogger({ minLevel: 'info', enableFileOutput: true })
 *
 * logger.info('Server tick rate locked at 60Hz', 'Engine')
 * logger.debugStructured(StructuredMessage.format('Spawned {0} at {1}', 'orc', pos))
 *
 * await logger.shutdown()
 * ```
 */
export * from './core/logger/index.js';

export { createObserver } from './core/observer.js';
export type { LoggerEvents, LoggerEventNames, LoggerObserver } from './core/observer.js';

export { isRelease, isInteractive } from './core/environment.js';
