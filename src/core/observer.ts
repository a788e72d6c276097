/**
 * Logger lifecycle events.
 *
 * Every Logger owns its own observer, so several loggers can live in the
 * same process without sharing listeners.
 *
 * @example
 * ```typescript
 * const logger = new Logger()
 *
 * const cleanup = logger.events.on('logger:rotated', ({ oldFile, newFile }) => {
 *     console.log(`${oldFile} -> ${newFile}`)
 * })
 *
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import type { MinLevel } from './logger/types.js'


/**
 * Events emitted by the logging pipeline.
 */
export interface LoggerEvents {

    'logger:started': { minLevel: MinLevel; async: boolean; appenders: string[] }
    'logger:rotated': { oldFile: string; newFile: string }
    'logger:archived': { source: string; archive: string }
    'logger:pruned': { deleted: string[] }
    'logger:error': { source: string; error: Error }
    'logger:stopped': { entriesWritten: number }
}

export type LoggerEventNames = Events<LoggerEvents>;

export type LoggerObserver = ObserverEngine<LoggerEvents>;

/**
 * Create an observer for one logger instance.
 *
 * Enable debug mode with `LOGLANE_DEBUG=1` to see all events as they occur.
 */
export function createObserver(name = 'loglane'): LoggerObserver {

    return new ObserverEngine<LoggerEvents>({
        name,
        spy: process.env['LOGLANE_DEBUG']
            ? (action) => console.error(`[${name}:${action.fn}] ${String(action.event)}`)
            : undefined
    })
}
