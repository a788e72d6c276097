/**
 * Sensitive Data Redaction
 *
 * Masks `keyword=value` fragments inside log messages.
 * Patterns are compiled once per config and reused for every call.
 *
 * Patterns run in keyword declaration order. When two keywords overlap
 * (`password=token=1`) each pattern is an independent pass over the
 * output of the previous one.
 *
 * @example
 * ```typescript
 * const patterns = compileRedactionPatterns(['password', 'token'])
 *
 * filterSensitive('password=123 token=abc', patterns)
 * // => 'password=***FILTERED*** token=***FILTERED***'
 * ```
 */

/**
 * Replacement value for matched fragments.
 */
export const FILTERED_MASK = '***FILTERED***';

// ─────────────────────────────────────────────────────────────
// Pattern Compilation
// ─────────────────────────────────────────────────────────────

/**
 * Compile `keyword=<non-whitespace run>` patterns, case-insensitive.
 *
 * Empty keywords are skipped and duplicates keep their first position.
 *
 * @param keywords - Sensitive keywords in declaration order
 * @returns Keyword → pattern, iterated in declaration order
 */
export function compileRedactionPatterns(keywords: readonly string[]): ReadonlyMap<string, RegExp> {

    const patterns = new Map<string, RegExp>();

    for (const keyword of keywords) {

        if (!keyword || patterns.has(keyword)) {

            continue;

        }

        patterns.set(keyword, new RegExp(`${escapeRegex(keyword)}=\\S+`, 'gi'));

    }

    return patterns;

}

// ─────────────────────────────────────────────────────────────
// Filtering
// ─────────────────────────────────────────────────────────────

/**
 * Replace every sensitive fragment in a message.
 *
 * Each pattern is probed with `search` first so non-matching
 * patterns skip the replace pass entirely.
 *
 * @param message - Raw message
 * @param patterns - Compiled patterns from the config cache
 * @param enabled - `enableSensitiveFilter` setting
 * @returns The filtered message, or the input when nothing matched
 */
export function filterSensitive(
    message: string,
    patterns: ReadonlyMap<string, RegExp>,
    enabled = true,
): string {

    if (!enabled || !message || patterns.size === 0) {

        return message;

    }

    let filtered = message;

    for (const [keyword, pattern] of patterns) {

        // search() ignores lastIndex, so the shared global regex stays reusable
        if (filtered.search(pattern) < 0) {

            continue;

        }

        const replacement = `${keyword}=${FILTERED_MASK}`;
        filtered = filtered.replace(pattern, () => replacement);

    }

    return filtered;

}

/**
 * Escape special regex characters in a string.
 */
export function escapeRegex(str: string): string {

    return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

}
