import { describe, it, expect } from 'vitest';
import { LargeText } from '../src/core/large-text.js';
import { CharReader, pageText, toChunks } from '../src/core/reader.js';

function readAll(reader: CharReader): string {
    let text = '';
    let char = reader.read();
    while (char !== null) {
        text += char;
        char = reader.read();
    }
    return text;
}

describe('CharReader', () => {
    describe('reading', () => {
        it('concatenates chunks without separator', () => {
            expect(readAll(new CharReader(['ab', 'c', '', 'de']))).toBe('abcde');
        });

        it('returns null for an empty source', () => {
            expect(new CharReader([]).read()).toBe(null);
            expect(new CharReader(['']).read()).toBe(null);
        });

        it('skips whitespace with readNonWs', () => {
            const reader = new CharReader([' \t\n', '\r x']);
            expect(reader.readNonWs()).toBe('x');
            expect(reader.readNonWs()).toBe(null);
        });

        it('reads again what was pushed back', () => {
            const reader = new CharReader(['ab']);
            expect(reader.read()).toBe('a');
            reader.unread('a');
            expect(reader.position).toEqual({ line: 1, column: 0, index: 0 });
            expect(reader.read()).toBe('a');
            expect(reader.read()).toBe('b');
        });

        it('ignores a pushed-back null', () => {
            const reader = new CharReader(['a']);
            reader.read();
            reader.read();
            reader.unread(null);
            expect(reader.read()).toBe(null);
        });

        it('collects a run up to the stop character', () => {
            const reader = new CharReader(['abc', '"def']);
            expect(reader.readUntil('"', '\\')).toEqual({ text: 'abc', stop: '"' });
            expect(reader.read()).toBe('d');
        });

        it('stops a run at the escape character', () => {
            const reader = new CharReader(['ab\\n"']);
            expect(reader.readUntil('"', '\\')).toEqual({ text: 'ab', stop: '\\' });
        });

        it('returns null when a run reaches the end', () => {
            expect(new CharReader(['abc']).readUntil('"', null)).toEqual({ text: 'abc', stop: null });
        });

        it('stops a run at the limit', () => {
            const reader = new CharReader(['abcd', 'ef"']);
            expect(reader.readUntil('"', '\\', 3)).toEqual({ text: 'abc', stop: false });
            expect(reader.readUntil('"', '\\', 3)).toEqual({ text: 'def', stop: false });
            expect(reader.readUntil('"', '\\', 3)).toEqual({ text: '', stop: '"' });
        });

        it('includes pushed-back characters in a run', () => {
            const reader = new CharReader(['xab"']);
            reader.unread(reader.read());
            expect(reader.readUntil('"', null)).toEqual({ text: 'xab', stop: '"' });
        });

        it('tracks positions across a run', () => {
            const reader = new CharReader(['a\nbc"d']);
            reader.readUntil('"', null);
            expect(reader.position).toEqual({ line: 2, column: 3, index: 5 });
        });
    });

    describe('positions', () => {
        it('tracks line and column across line feeds', () => {
            const reader = new CharReader(['a\nb']);
            reader.read();
            expect(reader.position).toEqual({ line: 1, column: 1, index: 1 });
            reader.read();
            expect(reader.position).toEqual({ line: 2, column: 0, index: 2 });
            reader.read();
            expect(reader.position).toEqual({ line: 2, column: 1, index: 3 });
        });

        it('counts chunk boundaries as lines in line-separated mode', () => {
            const reader = new CharReader(['ab', 'cd'], { lineSeparated: true });
            reader.read();
            reader.read();
            expect(reader.position).toEqual({ line: 1, column: 2, index: 2 });
            reader.read();
            expect(reader.position).toEqual({ line: 2, column: 1, index: 3 });
        });

        it('keeps one line across chunks otherwise', () => {
            const reader = new CharReader(['ab', 'cd']);
            readAll(reader);
            expect(reader.position).toEqual({ line: 1, column: 4, index: 4 });
        });
    });
});

describe('source helpers', () => {
    it('pages text', () => {
        expect(pageText('abcde', 2)).toEqual(['ab', 'cd', 'e']);
        expect(pageText('', 2)).toEqual([]);
    });

    it('normalizes every source shape to chunks', () => {
        expect(toChunks('abc')).toEqual(['abc']);
        expect(toChunks(['a', 'b'])).toEqual(['a', 'b']);
        expect(toChunks(LargeText.from('abc'))).toEqual(['abc']);
    });
});
