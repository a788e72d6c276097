/**
 * Structured Messages
 *
 * Deferred message construction. A StructuredMessage holds a producer
 * and only builds its string when the dispatcher is about to emit it,
 * so filtered-out calls never pay for formatting.
 *
 * @example
 * ```typescript
 * logger.logStructured('debug', StructuredMessage.format('Value: {0}, Count: {1}', 5, 10))
 * // 'Value: 5, Count: 10' (only built if debug passes the filter)
 * ```
 */
import { attemptSync } from '@logosdx/utils';

/**
 * Zero-argument message producer.
 */
export type MessageProducer = () => string;

// ─────────────────────────────────────────────────────────────
// StructuredMessage
// ─────────────────────────────────────────────────────────────

/**
 * A log message whose text is produced on demand.
 */
export class StructuredMessage {

    readonly #producer: MessageProducer;

    constructor(producer: MessageProducer) {

        this.#producer = producer;

    }

    /**
     * Wrap an already-built string.
     */
    static of(message: string): StructuredMessage {

        return new StructuredMessage(() => message);

    }

    /**
     * Deferred template formatting with one to four arguments.
     *
     * One and two arguments splice `{0}` / `{1}` directly; everything
     * else goes through {@link interpolate}.
     */
    static format<T1>(template: string, arg1: T1): StructuredMessage;
    static format<T1, T2>(template: string, arg1: T1, arg2: T2): StructuredMessage;
    static format<T1, T2, T3>(template: string, arg1: T1, arg2: T2, arg3: T3): StructuredMessage;
    static format<T1, T2, T3, T4>(
        template: string,
        arg1: T1,
        arg2: T2,
        arg3: T3,
        arg4: T4,
    ): StructuredMessage;
    static format(template: string, ...args: unknown[]): StructuredMessage {

        return new StructuredMessage(() => formatMessage(template, args));

    }

    toString(): string {

        return this.#producer();

    }

}

// ─────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────

/**
 * Format a template immediately.
 *
 * @example
 * ```typescript
 * formatMessage('{1} before {0}', ['A', 'B']) // 'B before A'
 * ```
 */
export function formatMessage(template: string, args: readonly unknown[]): string {

    if (args.length === 1) {

        return formatOne(template, args[0]) ?? interpolate(template, args);

    }

    if (args.length === 2) {

        return formatTwo(template, args[0], args[1]) ?? interpolate(template, args);

    }

    return interpolate(template, args);

}

/**
 * Splice a single `{0}`. Returns null when the fast path does not apply.
 */
function formatOne(template: string, arg: unknown): string | null {

    const index = findSingle(template, '{0}');

    if (index < 0 || template.includes('{{') || template.includes('}}')) {

        return null;

    }

    return template.slice(0, index) + stringifyArg(arg) + template.slice(index + 3);

}

/**
 * Splice a single `{0}` and a single `{1}` in either order.
 */
function formatTwo(template: string, arg1: unknown, arg2: unknown): string | null {

    const index0 = findSingle(template, '{0}');
    const index1 = findSingle(template, '{1}');

    if (index0 < 0 || index1 < 0 || template.includes('{{') || template.includes('}}')) {

        return null;

    }

    const [first, firstArg, second, secondArg]: [number, unknown, number, unknown] = index0 < index1
        ? [index0, arg1, index1, arg2]
        : [index1, arg2, index0, arg1];

    return template.slice(0, first)
        + stringifyArg(firstArg)
        + template.slice(first + 3, second)
        + stringifyArg(secondArg)
        + template.slice(second + 3);

}

/**
 * Index of a placeholder that occurs exactly once, else -1.
 */
function findSingle(template: string, placeholder: string): number {

    const index = template.indexOf(placeholder);

    if (index < 0 || template.indexOf(placeholder, index + placeholder.length) >= 0) {

        return -1;

    }

    return index;

}

const PLACEHOLDER = /\{\{|\}\}|\{(\d+)(?:,(-?\d+))?\}/g;

/**
 * General-purpose template interpolation.
 *
 * Supports `{n}`, `{n,width}` (negative width pads right) and `{{` / `}}`
 * escapes. Placeholders without a matching argument are left as written.
 */
export function interpolate(template: string, args: readonly unknown[]): string {

    return template.replace(PLACEHOLDER, (match: string, index?: string, width?: string) => {

        if (match === '{{') return '{';
        if (match === '}}') return '}';

        const position = Number(index);

        if (position >= args.length) {

            return match;

        }

        const text = stringifyArg(args[position]);

        if (!width) {

            return text;

        }

        const pad = Number(width);

        return pad < 0 ? text.padEnd(-pad) : text.padStart(pad);

    });

}

/**
 * Convert an argument to its message text.
 */
export function stringifyArg(value: unknown): string {

    if (value === null || value === undefined) {

        return '';

    }

    if (typeof value === 'string') {

        return value;

    }

    if (value instanceof Error) {

        return value.message;

    }

    if (value instanceof Date) {

        return value.toISOString();

    }

    if (typeof value === 'object') {

        const [str, error] = attemptSync(() => JSON.stringify(value));

        return error || str === undefined ? String(value) : str;

    }

    return String(value);

}

// ─────────────────────────────────────────────────────────────
// MessageBuilder
// ─────────────────────────────────────────────────────────────

/**
 * Chained message builder over a single backing buffer.
 *
 * @example
 * ```typescript
 * const text = new MessageBuilder()
 *     .append('hp=')
 *     .append(42)
 *     .append(' alive=')
 *     .append(true)
 *     .toString()
 * // 'hp=42 alive=true'
 * ```
 */
export class MessageBuilder {

    #parts: string[] = [];
    #length = 0;

    append(value: string | number | bigint | boolean): this {

        const text = String(value);

        this.#parts.push(text);
        this.#length += text.length;

        return this;

    }

    /**
     * Append a number with a fixed count of fraction digits.
     */
    appendFixed(value: number, digits: number): this {

        return this.append(value.toFixed(digits));

    }

    appendLine(value = ''): this {

        return this.append(value).append('\n');

    }

    /**
     * Number of UTF-16 code units appended so far.
     */
    get length(): number {

        return this.#length;

    }

    clear(): this {

        this.#parts = [];
        this.#length = 0;

        return this;

    }

    toString(): string {

        // Collapse the buffer so repeated reads don't re-join
        if (this.#parts.length > 1) {

            this.#parts = [this.#parts.join('')];

        }

        return this.#parts[0] ?? '';

    }

    /**
     * Snapshot the current text as a StructuredMessage.
     */
    toMessage(): StructuredMessage {

        return StructuredMessage.of(this.toString());

    }

}
