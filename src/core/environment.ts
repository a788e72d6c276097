/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment.
 * The logger tightens its threshold in release builds.
 */

/**
 * Detect if running as a release (production) build.
 *
 * Checks for:
 * - LOGLANE_RELEASE=true environment variable
 * - NODE_ENV=production
 *
 * @example
 * ```typescript
 * if (isRelease()) {
 *     // use the stricter release threshold
 * }
 * ```
 */
export function isRelease(): boolean {

    const explicit = process.env['LOGLANE_RELEASE'];

    if (explicit === 'true' || explicit === '1') {

        return true;

    }

    if (explicit === 'false' || explicit === '0') {

        return false;

    }

    return process.env['NODE_ENV'] === 'production';

}

/**
 * Detect if stdout is an interactive terminal.
 */
export function isInteractive(): boolean {

    return Boolean(process.stdout.isTTY) && !process.env['NO_COLOR'];

}
