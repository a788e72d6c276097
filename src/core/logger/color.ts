/**
 * Console Colors
 *
 * Severity styling for the default console sink. Uses ansis hex()
 * for truecolor output; ansis drops the codes itself when the stream
 * cannot show them.
 */
import ansis from 'ansis';

/**
 * Console severities. Debug shares `info`, fatal shares `error`.
 */
export type ConsoleSeverity = 'info' | 'warn' | 'error';

/**
 * Hex palette per severity.
 */
export const palette = {
    info: '#8B5CF6',      // Purple
    warn: '#F59E0B',      // Amber
    error: '#EF4444',     // Red
    muted: '#9CA3AF',     // Gray-400
} as const;

const SEVERITY_STYLE: Record<ConsoleSeverity, (text: string) => string> = {
    info: (text) => ansis.hex(palette.info)(text),
    warn: (text) => ansis.hex(palette.warn)(text),
    error: (text) => ansis.hex(palette.error)(text),
};

const muted = (text: string): string => ansis.hex(palette.muted)(text);

/**
 * Color a preformatted console message.
 *
 * The first line takes the severity color; stack trace lines that
 * follow are muted.
 *
 * @example
 * ```typescript
 * colorize('warn', '[Physics] Step took 40ms\nat step (world.ts:10:3)')
 * ```
 */
export function colorize(severity: ConsoleSeverity, message: string): string {

    const newline = message.indexOf('\n');
    const style = SEVERITY_STYLE[severity];

    if (newline < 0) {

        return style(message);

    }

    const head = message.slice(0, newline);
    const tail = message.slice(newline + 1);

    return style(head) + '\n' + tail.split('\n').map(muted).join('\n');

}

/**
 * Strip ANSI codes, for width math and tests.
 */
export function stripColor(text: string): string {

    return ansis.strip(text);

}
