import type { CachePolicy } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { WRITER_BUFFER_LENGTH } from '../types.js';
import { LargeText } from './large-text.js';

// ============ Sink ============

/**
 * Destination of generated text.
 */
export interface Sink {
    write(text: string): void;
    flush(): void;
    dispose(): void;
    /** Destinations that carry protocol headers receive them before any text */
    sendHeaders?(headers: Readonly<Record<string, string>>): void;
}

/**
 * Anything that accepts text chunks, optionally with headers.
 * Node's `ServerResponse` and `process.stdout` both qualify.
 */
export interface OutputTarget {
    write(chunk: string): unknown;
    setHeader?(name: string, value: string): unknown;
}

/**
 * Headers announcing a JSON body with the given cache policy.
 */
export function outputHeaders(cachePolicy: CachePolicy, etag?: string): Record<string, string> {
    const headers: Record<string, string> = {
        'Content-Type': 'application/json; charset=utf-8',
    };
    if (cachePolicy === 'forbid') {
        headers['Cache-Control'] = 'no-store';
    } else if (cachePolicy === 'allow') {
        headers['Cache-Control'] = 'private, must-revalidate';
    }
    if (etag !== undefined) {
        headers['ETag'] = etag;
    }
    return headers;
}

// ============ Buffered Writer ============

/**
 * Accumulates writes and hands them to `emit` as one unit once the next
 * write would grow the buffer past the threshold.
 */
export abstract class BufferedWriter implements Sink {
    private buffer = '';
    protected readonly logger: Logger;
    private readonly threshold: number;

    constructor(logger: Logger = silentLogger, threshold: number = WRITER_BUFFER_LENGTH) {
        this.logger = logger;
        this.threshold = threshold;
    }

    /** Characters waiting to be emitted */
    get pending(): number {
        return this.buffer.length;
    }

    write(text: string): void {
        if (text.length === 0) return;

        if (this.buffer.length === 0) {
            this.buffer = text;
        } else if (this.buffer.length + text.length <= this.threshold) {
            this.buffer += text;
        } else {
            this.flush();
            this.buffer = text;
        }
    }

    /**
     * Write text followed by a line feed.
     */
    writeLine(text: string = ''): void {
        this.write(`${text}\n`);
    }

    flush(): void {
        if (this.buffer.length === 0) return;

        const text = this.buffer;
        this.buffer = '';
        this.emit(text);
        this.logger.debug('sink flush', { length: text.length });
    }

    dispose(): void {
        this.buffer = '';
        this.release();
    }

    protected abstract emit(text: string): void;

    protected release(): void {}
}

// ============ Stream Writer ============

/**
 * Writes to an output stream or HTTP response.
 */
export class StreamWriter extends BufferedWriter {
    private readonly target: OutputTarget;

    constructor(target: OutputTarget, logger?: Logger) {
        super(logger);
        this.target = target;
    }

    sendHeaders(headers: Readonly<Record<string, string>>): void {
        if (!this.target.setHeader) return;
        for (const [name, value] of Object.entries(headers)) {
            this.target.setHeader(name, value);
        }
    }

    protected emit(text: string): void {
        this.target.write(text);
    }
}

// ============ Large Text Writer ============

/**
 * Collects output into a LargeText that is allocated on the first flush
 * and freed on dispose.
 */
export class LargeTextWriter extends BufferedWriter {
    private text: LargeText | null = null;
    private readonly cache: boolean;

    constructor(options: { cache?: boolean } = {}, logger?: Logger) {
        super(logger);
        this.cache = options.cache ?? true;
    }

    /**
     * Flush and return the collected text. The writer keeps ownership.
     */
    getValue(): LargeText {
        this.flush();
        return this.allocate();
    }

    protected emit(text: string): void {
        this.allocate().append(text);
    }

    protected release(): void {
        if (this.text) {
            this.text.free();
            this.text = null;
            this.logger.debug('large text output released');
        }
    }

    private allocate(): LargeText {
        if (!this.text) {
            this.text = new LargeText({ cache: this.cache });
            this.logger.debug('large text output allocated');
        }
        return this.text;
    }
}
