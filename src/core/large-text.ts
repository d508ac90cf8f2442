import { JsonResourceError } from '../errors.js';

/**
 * Owned, growable character store for text that must not be held as one
 * in-memory string while it is being produced: oversized string literals in
 * the lexer and the output of a large-text writer.
 *
 * The owner releases it with `free()`; any use afterwards throws.
 */
export class LargeText {
    private parts: string[] = [];
    private size = 0;
    private freed = false;
    private joined: string | null = null;
    private readonly cache: boolean;

    constructor(options: { cache?: boolean } = {}) {
        this.cache = options.cache ?? true;
    }

    static from(text: string): LargeText {
        const result = new LargeText();
        result.append(text);
        return result;
    }

    get length(): number {
        this.assertLive('length');
        return this.size;
    }

    get isFreed(): boolean {
        return this.freed;
    }

    append(text: string): void {
        this.assertLive('append');
        if (text.length === 0) return;
        this.parts.push(text);
        this.size += text.length;
        this.joined = null;
    }

    /**
     * Yield the content in slices of at most `size` characters.
     * Slices may be shorter at part boundaries.
     */
    *chunks(size: number): Generator<string> {
        this.assertLive('read');
        if (!Number.isInteger(size) || size < 1) {
            throw new JsonResourceError('chunk size must be a positive integer', { offset: 1, amount: size });
        }
        for (const part of this.parts) {
            for (let offset = 0; offset < part.length; offset += size) {
                yield part.slice(offset, offset + size);
            }
        }
    }

    toString(): string {
        this.assertLive('read');
        if (this.joined !== null) return this.joined;
        const text = this.parts.join('');
        if (this.cache) {
            this.parts = text.length > 0 ? [text] : [];
            this.joined = text;
        }
        return text;
    }

    free(): void {
        this.parts = [];
        this.size = 0;
        this.joined = null;
        this.freed = true;
    }

    private assertLive(operation: string): void {
        if (this.freed) {
            throw new JsonResourceError(`cannot ${operation} a large text that has been freed`);
        }
    }
}
