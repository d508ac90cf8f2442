import { parse } from '../src/core/parser.js';
import { StreamWriter, type OutputTarget } from '../src/core/sink.js';
import { JsonWriter, type JsonWriterOptions } from '../src/core/writer.js';
import type { LogContext, Logger } from '../src/logger.js';
import type { JsonSource, ValueTable } from '../src/types.js';

/**
 * Output target that keeps every chunk and header it receives
 */
export class CollectingTarget implements OutputTarget {
    readonly chunks: string[] = [];
    readonly headers: [string, string][] = [];

    write(chunk: string): boolean {
        this.chunks.push(chunk);
        return true;
    }

    setHeader(name: string, value: string): void {
        this.headers.push([name, value]);
    }

    get text(): string {
        return this.chunks.join('');
    }
}

/**
 * Helper to create a writer over a collecting target
 */
export function createWriter(options: JsonWriterOptions = {}): { writer: JsonWriter; target: CollectingTarget } {
    const target = new CollectingTarget();
    const writer = new JsonWriter(new StreamWriter(target), options);
    return { writer, target };
}

/**
 * Helper to parse into a fresh table
 */
export function parseTable(source: JsonSource, options: { strict?: boolean; lineSeparated?: boolean } = {}): ValueTable {
    const values: ValueTable = new Map();
    parse(values, source, options);
    return values;
}

export interface LogRecord {
    level: 'debug' | 'info' | 'warn' | 'error';
    message: string;
    context?: LogContext;
}

/**
 * Logger that records entries instead of printing them
 */
export function createRecordingLogger(): Logger & { records: LogRecord[] } {
    const records: LogRecord[] = [];
    const record = (level: LogRecord['level']) => (message: string, context?: LogContext): void => {
        records.push({ level, message, context });
    };
    return {
        records,
        debug: record('debug'),
        info: record('info'),
        warn: record('warn'),
        error: record('error'),
    };
}
