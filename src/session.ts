import {
    resolveLargeTextOutputOptions,
    resolveOutputOptions,
    resolveSessionOptions,
    type LargeTextOutputOptions,
    type OutputOptions,
    type ParseOptions,
    type SessionOptions,
} from './config.js';
import { JsonWriterError } from './errors.js';
import { createConsoleLogger, type Logger } from './logger.js';
import * as access from './core/accessors.js';
import type { AccessOptions, DefaultedAccessOptions } from './core/accessors.js';
import { findPathsLike } from './core/find.js';
import type { LargeText } from './core/large-text.js';
import { parse } from './core/parser.js';
import { LargeTextWriter, StreamWriter, outputHeaders, type BufferedWriter, type OutputTarget } from './core/sink.js';
import { JsonWriter } from './core/writer.js';
import { toXml, toXmlSql } from './core/xml.js';
import type { JsonSource, Value, ValueTable, ZonedTimestamp } from './types.js';

export interface JsonSessionOptions extends SessionOptions {
    /** Replaces the console logger built from `logLevel` */
    logger?: Logger;
}

/** Accessor options that may read another table than the session's own */
export type TableOptions<O> = O & { values?: ValueTable };

/**
 * Context object owning a default value table, a logger and at most one
 * active output writer.
 *
 * @example
 * ```ts
 * const session = new JsonSession({ logLevel: 'silent' });
 * session.parse('{"foo":3,"bar":[1,2,3,4]}');
 * session.getCount('bar'); // 4
 *
 * session.initializeOutput(response);
 * const writer = session.writer;
 * writer.openObject();
 * writer.writeMember('ok', true);
 * writer.closeAll();
 * session.freeOutput();
 * ```
 */
export class JsonSession {
    /** Table read by accessors unless another one is passed */
    readonly values: ValueTable = new Map();
    readonly logger: Logger;
    private sink: BufferedWriter | null = null;
    private output: LargeTextWriter | null = null;
    private active: JsonWriter | null = null;

    constructor(options: JsonSessionOptions = {}) {
        const { logLevel } = resolveSessionOptions({ logLevel: options.logLevel });
        this.logger = options.logger ?? createConsoleLogger(logLevel);
    }

    // ============ Output ============

    /**
     * Route writer output to a stream or HTTP response. Headers are sent
     * before the first top-level construct when `emitHeader` is set.
     */
    initializeOutput(target: OutputTarget, options?: OutputOptions): JsonWriter {
        const resolved = resolveOutputOptions(options);
        this.freeOutput();

        this.sink = new StreamWriter(target, this.logger);
        this.active = new JsonWriter(this.sink, {
            indent: resolved.indent,
            headers: resolved.emitHeader ? outputHeaders(resolved.cachePolicy, resolved.etag) : undefined,
            logger: this.logger,
        });
        this.logger.info('output initialized', {
            target: 'stream',
            indent: resolved.indent,
            emitHeader: resolved.emitHeader,
        });
        return this.active;
    }

    /**
     * Collect writer output into a LargeText, read back with `getOutput`.
     */
    initializeLargeTextOutput(options?: LargeTextOutputOptions): JsonWriter {
        const resolved = resolveLargeTextOutputOptions(options);
        this.freeOutput();

        this.output = new LargeTextWriter({ cache: resolved.cache }, this.logger);
        this.sink = this.output;
        this.active = new JsonWriter(this.sink, { indent: resolved.indent, logger: this.logger });
        this.logger.info('output initialized', { target: 'large-text', indent: resolved.indent });
        return this.active;
    }

    /**
     * Release the active writer and whatever its sink holds.
     */
    freeOutput(): void {
        if (!this.sink) return;

        this.sink.dispose();
        this.sink = null;
        this.output = null;
        this.active = null;
        this.logger.info('output released');
    }

    /**
     * Collected large-text output. It stays owned by the session until
     * `freeOutput`.
     */
    getOutput(): LargeText {
        if (!this.output) {
            throw new JsonWriterError('WRITER_STATE', 'large text output is not initialized');
        }
        return this.output.getValue();
    }

    flush(): void {
        this.sink?.flush();
    }

    /** The active writer */
    get writer(): JsonWriter {
        if (!this.active) {
            throw new JsonWriterError('WRITER_STATE', 'output is not initialized');
        }
        return this.active;
    }

    get hasOutput(): boolean {
        return this.active !== null;
    }

    // ============ Parsing ============

    /**
     * Parse into the session's table, or into `values` when given.
     */
    parse(source: JsonSource, options?: ParseOptions, values: ValueTable = this.values): ValueTable {
        parse(values, source, options, this.logger);
        return values;
    }

    toXml(source: JsonSource, options?: ParseOptions): string {
        return toXml(source, options, this.logger);
    }

    toXmlSql(source: JsonSource, strict: 'Y' | 'N' = 'Y'): string {
        return toXmlSql(source, strict, this.logger);
    }

    // ============ Accessors ============

    exists(path: string, options: TableOptions<AccessOptions> = {}): boolean {
        return access.exists(options.values ?? this.values, path, options);
    }

    getValue(path: string, options: TableOptions<AccessOptions> = {}): Value | undefined {
        return access.getValue(options.values ?? this.values, path, options);
    }

    getBoolean(path: string, options: TableOptions<DefaultedAccessOptions<boolean>> = {}): boolean | null {
        return access.getBoolean(options.values ?? this.values, path, options);
    }

    getNumber(path: string, options: TableOptions<DefaultedAccessOptions<number>> = {}): number | null {
        return access.getNumber(options.values ?? this.values, path, options);
    }

    getString(path: string, options: TableOptions<DefaultedAccessOptions<string>> = {}): string | null {
        return access.getString(options.values ?? this.values, path, options);
    }

    getLargeText(path: string, options: TableOptions<DefaultedAccessOptions<LargeText>> = {}): LargeText | null {
        return access.getLargeText(options.values ?? this.values, path, options);
    }

    getDate(path: string, options: TableOptions<DefaultedAccessOptions<Date>> = {}): Date | null {
        return access.getDate(options.values ?? this.values, path, options);
    }

    getTimestamp(path: string, options: TableOptions<DefaultedAccessOptions<Date>> = {}): Date | null {
        return access.getTimestamp(options.values ?? this.values, path, options);
    }

    getTimestampTz(
        path: string,
        options: TableOptions<DefaultedAccessOptions<ZonedTimestamp>> = {},
    ): ZonedTimestamp | null {
        return access.getTimestampTz(options.values ?? this.values, path, options);
    }

    getCount(path: string, options: TableOptions<AccessOptions> = {}): number | null {
        return access.getCount(options.values ?? this.values, path, options);
    }

    getMembers(path: string, options: TableOptions<AccessOptions> = {}): string[] | null {
        return access.getMembers(options.values ?? this.values, path, options);
    }

    getArrayOfString(path: string, options: TableOptions<AccessOptions> = {}): (string | null)[] | null {
        return access.getArrayOfString(options.values ?? this.values, path, options);
    }

    getArrayOfNumber(path: string, options: TableOptions<AccessOptions> = {}): (number | null)[] | null {
        return access.getArrayOfNumber(options.values ?? this.values, path, options);
    }

    findPathsLike(
        returnPath: string,
        subpath?: string | null,
        valuePattern?: string | null,
        values: ValueTable = this.values,
    ): string[] {
        return findPathsLike(values, returnPath, subpath, valuePattern);
    }
}
