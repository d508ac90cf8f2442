import { SOURCE_PAGE_LENGTH, type JsonSource, type SourcePosition } from '../types.js';
import { LargeText } from './large-text.js';

// ============ Helpers ============

export function isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

export function isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
}

/**
 * Split text into pages of at most `pageSize` characters.
 */
export function pageText(text: string, pageSize: number = SOURCE_PAGE_LENGTH): string[] {
    const pages: string[] = [];
    for (let offset = 0; offset < text.length; offset += pageSize) {
        pages.push(text.slice(offset, offset + pageSize));
    }
    return pages;
}

/**
 * Normalize any accepted source shape to a list of chunks.
 */
export function toChunks(source: JsonSource): readonly string[] {
    if (typeof source === 'string') return [source];
    if (source instanceof LargeText) return [...source.chunks(SOURCE_PAGE_LENGTH)];
    return source;
}

// ============ Char Reader ============

export interface CharRun {
    text: string;
    stop: string | null | false;
}

/**
 * Single-character reader over a sequence of text chunks.
 *
 * Chunks are concatenated without separator. In line-separated mode each
 * chunk boundary counts as a line break for position tracking only.
 */
export class CharReader {
    private readonly chunks: readonly string[];
    private readonly lineSeparated: boolean;
    private chunkIdx = 0;
    private chunkPos = 0;
    private pushback: string[] = [];
    private line = 1;
    private column = 0;
    private index = 0;

    constructor(chunks: readonly string[], options: { lineSeparated?: boolean } = {}) {
        this.chunks = chunks;
        this.lineSeparated = options.lineSeparated ?? false;
    }

    get position(): SourcePosition {
        return { line: this.line, column: this.column, index: this.index };
    }

    /**
     * Next character, or null at the end of the last chunk.
     */
    read(): string | null {
        let char: string;
        const pushed = this.pushback.pop();
        if (pushed !== undefined) {
            char = pushed;
        } else {
            const next = this.nextFromChunks();
            if (next === null) return null;
            char = next;
        }

        if (char === '\n') {
            this.line++;
            this.column = 0;
        } else {
            this.column++;
        }
        this.index++;
        return char;
    }

    /**
     * Next character that is not space, tab, LF or CR.
     */
    readNonWs(): string | null {
        let char = this.read();
        while (char !== null && isWhitespace(char)) {
            char = this.read();
        }
        return char;
    }

    /**
     * Push back the character most recently read. Null is ignored.
     */
    unread(char: string | null): void {
        if (char === null) return;

        if (char === '\n') {
            this.line--;
            this.column = 0;
        } else {
            this.column--;
        }
        this.index--;
        this.pushback.push(char);
    }

    /**
     * Read characters up to (and consuming) the first `stop` or `escape`
     * character, slicing the run out of the current chunk. `stop` in the
     * result is the character that ended the run, null at end of input, or
     * false once `limit` characters were read without meeting either.
     */
    readUntil(stop: string, escape: string | null, limit: number = Infinity): CharRun {
        const parts: string[] = [];
        let length = 0;

        while (length < limit) {
            const chunk = this.chunks[this.chunkIdx];
            if (this.pushback.length > 0 || chunk === undefined || this.chunkPos >= chunk.length) {
                const char = this.read();
                if (char === null || char === stop || char === escape) {
                    return { text: parts.join(''), stop: char };
                }
                parts.push(char);
                length++;
                continue;
            }

            const max = Math.min(chunk.length, this.chunkPos + (limit - length));
            let end = this.chunkPos;
            while (end < max && chunk[end] !== stop && chunk[end] !== escape) {
                end++;
            }
            const slice = chunk.slice(this.chunkPos, end);
            this.chunkPos = end;
            this.advance(slice);
            parts.push(slice);
            length += slice.length;

            if (end < max) {
                return { text: parts.join(''), stop: this.read() };
            }
        }
        return { text: parts.join(''), stop: false };
    }

    // Position bookkeeping for text taken straight from a chunk
    private advance(text: string): void {
        const lastBreak = text.lastIndexOf('\n');
        if (lastBreak >= 0) {
            this.line += text.split('\n').length - 1;
            this.column = text.length - lastBreak - 1;
        } else {
            this.column += text.length;
        }
        this.index += text.length;
    }

    private nextFromChunks(): string | null {
        while (this.chunkIdx < this.chunks.length) {
            const chunk = this.chunks[this.chunkIdx];
            if (this.chunkPos < chunk.length) {
                return chunk[this.chunkPos++];
            }
            if (this.chunkIdx + 1 >= this.chunks.length) {
                return null;
            }
            this.chunkIdx++;
            this.chunkPos = 0;
            if (this.lineSeparated) {
                this.line++;
                this.column = 0;
            }
        }
        return null;
    }
}
