import { describe, it, expect, vi } from 'vitest';

import {
    formatMessage,
    interpolate,
    MessageBuilder,
    stringifyArg,
    StructuredMessage,
} from '../../../src/core/logger/message.js';

describe('logger: message', () => {

    describe('StructuredMessage', () => {

        it('should format two arguments', () => {

            expect(StructuredMessage.format('Value: {0}, Count: {1}', 5, 10).toString())
                .toBe('Value: 5, Count: 10');

        });

        it('should handle reversed placeholders', () => {

            expect(StructuredMessage.format('{1} before {0}', 'A', 'B').toString())
                .toBe('B before A');

        });

        it('should format one argument', () => {

            expect(StructuredMessage.format('Loaded {0}', 'level-3').toString()).toBe('Loaded level-3');

        });

        it('should format three and four arguments', () => {

            expect(StructuredMessage.format('{0}/{1}/{2}', 'a', 'b', 'c').toString()).toBe('a/b/c');
            expect(StructuredMessage.format('{3}{2}{1}{0}', 1, 2, 3, 4).toString()).toBe('4321');

        });

        it('should defer work until toString', () => {

            const toJSON = vi.fn(() => 'orc');
            const message = StructuredMessage.format('Spawned {0}', { toJSON });

            expect(toJSON).not.toHaveBeenCalled();
            expect(message.toString()).toBe('Spawned "orc"');
            expect(toJSON).toHaveBeenCalledTimes(1);

        });

        it('should wrap plain strings', () => {

            expect(StructuredMessage.of('ready').toString()).toBe('ready');

        });

        it('should run a custom producer on every read', () => {

            const producer = vi.fn(() => 'tick');
            const message = new StructuredMessage(producer);

            expect(producer).not.toHaveBeenCalled();
            expect(message.toString()).toBe('tick');
            expect(`${message}`).toBe('tick');
            expect(producer).toHaveBeenCalledTimes(2);

        });

    });

    describe('formatMessage', () => {

        it('should fall back when a placeholder is missing', () => {

            expect(formatMessage('no placeholders', ['x'])).toBe('no placeholders');
            expect(formatMessage('only {0}', ['a', 'b'])).toBe('only a');

        });

        it('should fall back when a placeholder repeats', () => {

            expect(formatMessage('{0} and {0}', ['x'])).toBe('x and x');

        });

        it('should fall back for escaped braces', () => {

            expect(formatMessage('{{literal}} {0}', ['x'])).toBe('{literal} x');

        });

        it('should keep out-of-range placeholders verbatim', () => {

            expect(formatMessage('{0} {5}', ['a'])).toBe('a {5}');

        });

        it('should stringify null and undefined as empty', () => {

            expect(formatMessage('[{0}]', [null])).toBe('[]');
            expect(formatMessage('[{0}][{1}]', [undefined, 1])).toBe('[][1]');

        });

    });

    describe('interpolate', () => {

        it('should pad to the requested width', () => {

            expect(interpolate('[{0,5}]', ['ab'])).toBe('[   ab]');
            expect(interpolate('[{0,-5}]', ['ab'])).toBe('[ab   ]');

        });

        it('should not throw on malformed templates', () => {

            expect(interpolate('{x} {0', ['a'])).toBe('{x} {0');

        });

    });

    describe('stringifyArg', () => {

        it('should convert common values', () => {

            expect(stringifyArg(3.5)).toBe('3.5');
            expect(stringifyArg(true)).toBe('true');
            expect(stringifyArg(10n)).toBe('10');
            expect(stringifyArg(new Error('boom'))).toBe('boom');
            expect(stringifyArg(new Date(Date.UTC(2024, 0, 15, 10, 30)))).toBe('2024-01-15T10:30:00.000Z');
            expect(stringifyArg({ x: 1, y: 2 })).toBe('{"x":1,"y":2}');
            expect(stringifyArg([1, 2])).toBe('[1,2]');

        });

        it('should fall back to String for values JSON cannot encode', () => {

            const cyclic: { self?: unknown } = {};
            cyclic.self = cyclic;

            expect(stringifyArg(cyclic)).toBe('[object Object]');

        });

    });

    describe('MessageBuilder', () => {

        it('should chain appends of primitives', () => {

            const text = new MessageBuilder()
                .append('hp=')
                .append(42)
                .append(' alive=')
                .append(true)
                .append(' id=')
                .append(7n)
                .toString();

            expect(text).toBe('hp=42 alive=true id=7');

        });

        it('should format fixed-point numbers', () => {

            expect(new MessageBuilder().appendFixed(3.14159, 2).toString()).toBe('3.14');

        });

        it('should append lines', () => {

            expect(new MessageBuilder().appendLine('a').appendLine().append('b').toString()).toBe('a\n\nb');

        });

        it('should track length and clear', () => {

            const builder = new MessageBuilder().append('abc').append(12);

            expect(builder.length).toBe(5);

            builder.clear();

            expect(builder.length).toBe(0);
            expect(builder.toString()).toBe('');

        });

        it('should return the same text on repeated reads', () => {

            const builder = new MessageBuilder().append('a').append('b');

            expect(builder.toString()).toBe('ab');
            expect(builder.append('c').toString()).toBe('abc');

        });

        it('should produce a StructuredMessage snapshot', () => {

            const builder = new MessageBuilder().append('x');
            const message = builder.toMessage();

            builder.append('y');

            expect(message.toString()).toBe('x');

        });

    });

});
