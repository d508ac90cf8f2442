import { afterEach, describe, it, expect, vi } from 'vitest';
import { JsonParseError } from '../src/errors.js';
import { LargeText } from '../src/core/large-text.js';
import { parse } from '../src/core/parser.js';
import type { Value, ValueTable } from '../src/types.js';
import { createRecordingLogger, parseTable } from './helpers.js';

function parseError(source: string | string[], options: { strict?: boolean; lineSeparated?: boolean } = {}): JsonParseError {
    try {
        parseTable(source, options);
    } catch (error) {
        if (error instanceof JsonParseError) return error;
        throw error;
    }
    throw new Error('expected a parse error');
}

describe('parse', () => {
    describe('value table', () => {
        it('flattens objects and arrays into paths', () => {
            const values = parseTable('{"foo":3,"bar":[1,2,3,4]}');

            expect([...values.keys()]).toEqual(['.', 'foo', 'bar', 'bar[1]', 'bar[2]', 'bar[3]', 'bar[4]']);
            expect(values.get('.')).toEqual({ kind: 'object', members: ['foo', 'bar'] });
            expect(values.get('foo')).toEqual({ kind: 'number', number: 3 });
            expect(values.get('bar')).toEqual({ kind: 'array', count: 4 });
            expect(values.get('bar[4]')).toEqual({ kind: 'number', number: 4 });
        });

        it('quotes member names that are not plain identifiers', () => {
            const values = parseTable('{"a":{"b c":[{"d":true}]}}');

            expect([...values.keys()]).toEqual(['.', 'a', 'a."b c"', 'a."b c"[1]', 'a."b c"[1].d']);
            expect(values.get('a."b c"[1].d')).toEqual({ kind: 'true' });
        });

        it('accepts an array root', () => {
            const values = parseTable('[[1],[],"x",null,false]');

            const expected: [string, Value][] = [
                ['.', { kind: 'array', count: 5 }],
                ['[1]', { kind: 'array', count: 1 }],
                ['[1][1]', { kind: 'number', number: 1 }],
                ['[2]', { kind: 'array', count: 0 }],
                ['[3]', { kind: 'string', string: 'x' }],
                ['[4]', { kind: 'null' }],
                ['[5]', { kind: 'false' }],
            ];
            expect([...values.entries()]).toEqual(expected);
        });

        it('stores an empty string as a value', () => {
            expect(parseTable('{"s":""}').get('s')).toEqual({ kind: 'string', string: '' });
        });

        it('produces an empty table for empty input', () => {
            expect(parseTable('').size).toBe(0);
            expect(parseTable('  \n ').size).toBe(0);
        });

        it('keeps the last of repeated member names', () => {
            const values = parseTable('{"a":{"x":1},"a":2}');

            expect(values.get('.')).toEqual({ kind: 'object', members: ['a'] });
            expect(values.get('a')).toEqual({ kind: 'number', number: 2 });
            expect(values.has('a.x')).toBe(false);
        });

        it('parses chunked and large-text sources', () => {
            const chunked = parseTable(['{"ab', 'c":[1,', '2]}']);
            expect(chunked.get('abc')).toEqual({ kind: 'array', count: 2 });

            const paged = parseTable(LargeText.from('{"a":true}'));
            expect(paged.get('a')).toEqual({ kind: 'true' });
        });

        it('stores long strings as large texts', () => {
            const text = 'y'.repeat(50000);
            const value = parseTable(`{"s":"${text}"}`).get('s');

            expect(value?.kind).toBe('large-text');
            if (value?.kind === 'large-text') {
                expect(value.text.length).toBe(50000);
                expect(value.text.toString()).toBe(text);
            }
        });

        it('frees large texts of the previous document', () => {
            const values: ValueTable = new Map();
            parse(values, `["${'z'.repeat(9000)}"]`);
            const previous = values.get('[1]');

            parse(values, '[1]');

            expect(previous?.kind === 'large-text' && previous.text.isFreed).toBe(true);
        });
    });

    describe('strict and lax mode', () => {
        it('rejects a dangling comma in strict mode', () => {
            const error = parseError('{"a": 1,}');
            expect(error.code).toBe('GRAMMAR');
            expect(error.reason).toBe('Strict JSON forbids dangling comma');
        });

        it('rejects unquoted member names in strict mode', () => {
            expect(parseError('{a: 1,}').message).toBe(
                'Error at line 1, col 2: strict mode JSON parser does not allow unquoted literals',
            );
        });

        it('accepts unquoted names and dangling commas in lax mode', () => {
            const values = parseTable('{a: 1,}', { strict: false });
            expect(values.get('a')).toEqual({ kind: 'number', number: 1 });

            const array = parseTable('[x, 2,]', { strict: false });
            expect(array.get('.')).toEqual({ kind: 'array', count: 2 });
            expect(array.get('[1]')).toEqual({ kind: 'string', string: 'x' });
        });
    });

    describe('errors', () => {
        afterEach(() => {
            vi.restoreAllMocks();
        });

        it('requires an object or array root', () => {
            expect(parseError('42').reason).toBe('expected [ or {');
        });

        it('requires a colon after a member name', () => {
            expect(parseError('{"a" 1}').reason).toBe('Expected ":", seeing "<number>"');
        });

        it('requires a separator between members', () => {
            expect(parseError('{"a":1 "b":2}').reason).toBe('Expected "," or "}", seeing "<string>"');
            expect(parseError('[1 2]').reason).toBe('Expected "," or "]", seeing "<number>"');
        });

        it('requires a string member name', () => {
            expect(parseError('{1:2}').reason).toBe('Expected string (object member name)');
        });

        it('requires a value after a colon', () => {
            expect(parseError('{"a":').reason).toBe('Expected value (null, false, true, number, string)');
        });

        it('rejects content after the document', () => {
            expect(parseError('{} {}').reason).toBe('Expected "<eof>", seeing "{"');
        });

        it('reports line and column', () => {
            const error = parseError('{\n"a":@}');
            expect(error.message).toBe('Error at line 2, col 5: Unexpected character "@"');
            expect(error.line).toBe(2);
            expect(error.column).toBe(5);
        });

        it('counts chunks as lines in line-separated mode', () => {
            const error = parseError(['{"a":1,', '"b":@}'], { lineSeparated: true });
            expect(error.line).toBe(2);
            expect(error.column).toBe(5);
        });

        it('leaves the table empty after a failure', () => {
            const values = parseTable('{"x":1}');
            expect(() => parse(values, '{"a":')).toThrow(JsonParseError);
            expect(values.size).toBe(0);
        });

        it('frees a long string that the grammar rejects', () => {
            const long = 'q'.repeat(9000);
            const free = vi.spyOn(LargeText.prototype, 'free');

            expect(parseError(`{"a" "${long}"}`).reason).toBe('Expected ":", seeing "<string>"');
            expect(free).toHaveBeenCalledTimes(1);

            free.mockClear();
            expect(parseError(`"${long}"`).reason).toBe('expected [ or {');
            expect(free).toHaveBeenCalledTimes(1);
        });

        it('logs failures as warnings', () => {
            const logger = createRecordingLogger();
            expect(() => parse(new Map(), '[1 2]', undefined, logger)).toThrow(JsonParseError);
            expect(logger.records).toEqual([
                {
                    level: 'warn',
                    message: 'parse failed',
                    context: { line: 1, column: 4, reason: 'Expected "," or "]", seeing "<number>"' },
                },
            ]);
        });
    });
});
