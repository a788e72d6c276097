/**
 * Log Rotation
 *
 * File naming, archival and retention for the file appender.
 *
 * Active files are named by their local creation time:
 *
 * ```
 * <prefix>_yyyyMMdd_HHmmss_fff.log       active / rotated
 * <prefix>_yyyyMMdd_HHmmss_fff.log.zip   archived (zip holding the log)
 * ```
 *
 * Retention counts logs and archives together.
 */
import { existsSync, readdirSync, statSync, unlinkSync } from 'node:fs'
import { readFile, writeFile, unlink } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { attempt, attemptSync } from '@logosdx/utils'
import { zip, type Zippable } from 'fflate'

import { escapeRegex } from './redact.js'


export const LOG_EXT = '.log'
export const ARCHIVE_EXT = '.log.zip'


/**
 * A log or archive found on disk.
 */
export interface LogFileInfo {

    path: string

    name: string

    /** Best available creation time in ms */
    createdAt: number
}


/**
 * Generate a log file name for a creation time.
 *
 * @example
 * ```typescript
 * generateLogFileName('app', new Date(2024, 0, 15, 10, 30, 45, 123))
 * // 'app_20240115_103045_123.log'
 * ```
 */
export function generateLogFileName(prefix: string, now: Date = new Date(), sequence = 0): string {

    const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
        + `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
        + `_${pad(now.getMilliseconds(), 3)}`

    const suffix = sequence > 0 ? `_${sequence}` : ''

    return `${prefix}_${stamp}${suffix}${LOG_EXT}`
}


/**
 * Pick a path for a new log file that does not exist yet.
 *
 * Files created within the same millisecond get `_1`, `_2`, ... suffixes.
 */
export function nextLogFilePath(dir: string, prefix: string, now: Date = new Date()): string {

    let sequence = 0
    let filepath = join(dir, generateLogFileName(prefix, now))

    while (existsSync(filepath) || existsSync(archivePathFor(filepath))) {

        sequence++
        filepath = join(dir, generateLogFileName(prefix, now, sequence))
    }

    return filepath
}


/**
 * Check whether a file name belongs to this prefix's logs or archives.
 */
export function isLogFileName(name: string, prefix: string): boolean {

    return logFilePattern(prefix).test(name)
}


/**
 * Archive path for a log file: `<file>.zip`.
 */
export function archivePathFor(filepath: string): string {

    return filepath + '.zip'
}


/**
 * List logs and archives for a prefix, newest first.
 *
 * Creation time falls back to the modification time where the
 * filesystem reports no birth time. Equal times are ordered by name,
 * which embeds the creation stamp.
 */
export function listLogFiles(dir: string, prefix: string): LogFileInfo[] {

    const [names, err] = attemptSync(() => readdirSync(dir))

    if (err) {

        return []
    }

    const pattern = logFilePattern(prefix)
    const files: LogFileInfo[] = []

    for (const name of names) {

        if (!pattern.test(name)) {

            continue
        }

        const filepath = join(dir, name)
        const [stats, statErr] = attemptSync(() => statSync(filepath))

        if (statErr) {

            continue
        }

        const createdAt = stats.birthtimeMs > 0
            ? Math.min(stats.birthtimeMs, stats.mtimeMs)
            : stats.mtimeMs

        files.push({ path: filepath, name, createdAt })
    }

    return files.sort((a, b) => (b.createdAt - a.createdAt) || b.name.localeCompare(a.name))
}


/**
 * Delete the oldest logs and archives beyond `maxFiles`.
 *
 * Paths in `exclude` (the active file, files being archived) still
 * count toward the limit but are never deleted.
 *
 * @returns Deleted paths
 * @throws The first deletion error, after attempting every deletion
 */
export function pruneLogFiles(
    dir: string,
    prefix: string,
    maxFiles: number,
    exclude: ReadonlySet<string> = new Set(),
): string[] {

    const files = listLogFiles(dir, prefix)
    const deleted: string[] = []
    let firstError: Error | null = null

    for (const file of files.slice(maxFiles)) {

        if (exclude.has(file.path)) {

            continue
        }

        const [, err] = attemptSync(() => unlinkSync(file.path))

        if (err) {

            firstError ??= new Error(`Failed to delete log file ${file.path}: ${err.message}`, { cause: err })
            continue
        }

        deleted.push(file.path)
    }

    if (firstError) {

        throw firstError
    }

    return deleted
}


/**
 * Zip a closed log file into its archive and delete the original.
 *
 * The archive holds a single entry named after the log file. The
 * original is only removed once the archive has been written.
 *
 * @returns Archive path
 */
export async function compressFile(filepath: string): Promise<string> {

    const archive = archivePathFor(filepath)

    const [content, readErr] = await attempt(() => readFile(filepath))

    if (readErr) {

        throw new Error(`Failed to read ${filepath} for archival: ${readErr.message}`, { cause: readErr })
    }

    const [compressed, zipErr] = await attempt(() => zipEntries({ [basename(filepath)]: content }))

    if (zipErr) {

        throw new Error(`Failed to compress ${filepath}: ${zipErr.message}`, { cause: zipErr })
    }

    const [, writeErr] = await attempt(() => writeFile(archive, compressed))

    if (writeErr) {

        throw new Error(`Failed to write archive ${archive}: ${writeErr.message}`, { cause: writeErr })
    }

    const [, unlinkErr] = await attempt(() => unlink(filepath))

    if (unlinkErr) {

        throw new Error(`Archived ${filepath} but could not delete it: ${unlinkErr.message}`, { cause: unlinkErr })
    }

    return archive
}


function logFilePattern(prefix: string): RegExp {

    return new RegExp(`^${escapeRegex(prefix)}_\\d{8}_\\d{6}_\\d{3}(?:_\\d+)?\\.log(?:\\.zip)?$`)
}


function zipEntries(files: Zippable): Promise<Uint8Array> {

    return new Promise((resolve, reject) => {

        zip(files, { level: 6 }, (err, data) => {

            if (err) {

                reject(err)

                return
            }

            resolve(data)
        })
    })
}


function pad(value: number, width = 2): string {

    return String(value).padStart(width, '0')
}
