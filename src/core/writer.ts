/**
 * Streaming JSON Writer
 *
 * ┌──────────────────────────────────────────────────────────────────┐
 * │                      NESTING STATE PER LEVEL                     │
 * └──────────────────────────────────────────────────────────────────┘
 *
 *   openObject                 write / open child
 *  ───────────▶ OPENED_OBJECT ────────────────────▶ IN_OBJECT ─┐
 *                    │                                  ▲      │ write / open child
 *                    │ closeObject                      └──────┘ (leading ",")
 *                    ▼                                     │
 *                  (pop) ◀─────────── closeObject ─────────┘
 *
 *   openArray                  write / open child
 *  ───────────▶ OPENED_ARRAY ─────────────────────▶ IN_ARRAY ──┐
 *                    │                                  ▲      │
 *                    │ closeArray                       └──────┘
 *                    ▼                                     │
 *                  (pop) ◀─────────── closeArray ──────────┘
 *
 *  The comma and indent of a value come from the level it is written at,
 *  before that level is marked IN_*. Returning to level 0 flushes the sink.
 */

import { JsonTypeError, JsonWriterError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import {
    ROOT_PATH,
    STRINGIFY_LENGTH,
    type CellValue,
    type Column,
    type DateFormat,
    type Link,
    type NestingMarker,
    type RowSet,
    type Value,
    type ValueTable,
    type WritableValue,
    type XmlElement,
} from '../types.js';
import { isZonedTimestamp } from './dates.js';
import { escapeJson, stringify, stringifyNumber } from './escape.js';
import { LargeText } from './large-text.js';
import { collectPlaceholders, substitute } from './links.js';
import { elementPath, formatPath, memberPath, type PathArg } from './path.js';
import { captureText, describeCell, isNestedColumn, isXmlElement, rowSetToXml } from './rowset.js';
import type { Sink } from './sink.js';
import { xmlToJson } from './xml-to-json.js';

// ============ Options ============

export interface JsonWriterOptions {
    /** 0 writes compact output, N indents each level by N characters */
    indent?: number;
    /** Sent to the sink before the first top-level construct opens */
    headers?: Readonly<Record<string, string>>;
    logger?: Logger;
}

export interface WriteOptions {
    /** Write `"name":null` instead of skipping null members */
    writeNull?: boolean;
    dateFormat?: DateFormat;
}

export interface WriteParsedOptions {
    args?: readonly PathArg[];
}

type ContainerKind = 'object' | 'array';

const OPENED: Record<ContainerKind, NestingMarker> = { object: 'OPENED_OBJECT', array: 'OPENED_ARRAY' };
const IN_DATA: Record<ContainerKind, NestingMarker> = { object: 'IN_OBJECT', array: 'IN_ARRAY' };
const CLOSING: Record<ContainerKind, string> = { object: '}', array: ']' };

const kindOf = (marker: NestingMarker): ContainerKind =>
    marker === 'OPENED_OBJECT' || marker === 'IN_OBJECT' ? 'object' : 'array';

const PLAIN_NAME = /^[A-Za-z0-9_]+$/;

/**
 * `"name":` prefix of a member. Names that already start with a double
 * quote are taken as quoted.
 */
function memberPrefix(name: string): string {
    if (PLAIN_NAME.test(name)) return `"${name}":`;
    if (name.startsWith('"')) return `${name}:`;
    return `"${escapeJson(name)}":`;
}

// ============ Writer ============

/**
 * Incremental JSON generator over a Sink.
 *
 * @example
 * ```ts
 * const writer = new JsonWriter(sink);
 * writer.openObject();
 * writer.writeMember('id', 42);
 * writer.openArray('tags');
 * writer.write('a');
 * writer.closeAll();
 * ```
 */
export class JsonWriter {
    private readonly sink: Sink;
    private readonly indentWidth: number;
    private readonly logger: Logger;
    private pendingHeaders: Readonly<Record<string, string>> | null;
    private readonly nesting: NestingMarker[] = [];

    constructor(sink: Sink, options: JsonWriterOptions = {}) {
        this.sink = sink;
        this.indentWidth = options.indent ?? 0;
        this.pendingHeaders = options.headers ?? null;
        this.logger = options.logger ?? silentLogger;
    }

    /** Number of open constructs */
    get level(): number {
        return this.nesting.length;
    }

    // ============ Nesting ============

    openObject(name?: string): void {
        this.open('object', name);
    }

    openArray(name?: string): void {
        this.open('array', name);
    }

    closeObject(): void {
        this.close('object');
    }

    closeArray(): void {
        this.close('array');
    }

    /**
     * Close every open construct, innermost first, then flush.
     */
    closeAll(): void {
        while (this.nesting.length > 0) {
            const marker = this.nesting.pop();
            if (marker === undefined) break;
            this.sink.write(`${this.indent(false)}${CLOSING[kindOf(marker)]}\n`);
        }
        this.sink.flush();
    }

    flush(): void {
        this.sink.flush();
    }

    private open(kind: ContainerKind, name: string | undefined): void {
        if (this.nesting.length === 0) this.sendHeaders();

        const prefix = this.indent();
        this.dataWritten();
        this.nesting.push(OPENED[kind]);

        const label = name === undefined ? '' : `${stringify(name)}:`;
        this.sink.write(`${prefix}${label}${kind === 'object' ? '{' : '['}\n`);
    }

    private close(kind: ContainerKind): void {
        const current = this.nesting[this.nesting.length - 1];
        if (current === undefined) {
            throw new JsonWriterError('WRITER_STATE', `cannot close ${kind}: nothing is open`);
        }
        if (kindOf(current) !== kind) {
            throw new JsonWriterError('WRITER_STATE', `cannot close ${kind}: innermost open construct is an ${kindOf(current)}`);
        }

        this.nesting.pop();
        this.sink.write(`${this.indent(false)}${CLOSING[kind]}\n`);
        if (this.nesting.length === 0) {
            this.sink.flush();
        }
    }

    private sendHeaders(): void {
        if (!this.pendingHeaders) return;
        this.sink.sendHeaders?.(this.pendingHeaders);
        this.pendingHeaders = null;
    }

    private indent(comma: boolean = true): string {
        const level = this.nesting.length;
        if (level === 0) return '';

        const needsComma = comma && this.hasData();
        if (this.indentWidth > 0) {
            const width = level * this.indentWidth;
            return needsComma ? ','.padStart(width) : ' '.repeat(width);
        }
        return needsComma ? ',' : '';
    }

    private hasData(): boolean {
        const current = this.nesting[this.nesting.length - 1];
        return current === 'IN_ARRAY' || current === 'IN_OBJECT';
    }

    private dataWritten(): void {
        const last = this.nesting.length - 1;
        if (last < 0) return;
        this.nesting[last] = IN_DATA[kindOf(this.nesting[last])];
    }

    private requireOpen(): void {
        if (this.nesting.length === 0) {
            throw new JsonWriterError('WRITER_STATE', 'no object or array is open');
        }
    }

    // ============ Scalars ============

    /**
     * Write an array element (or any value where no name is needed).
     */
    write(value: WritableValue, options: Pick<WriteOptions, 'dateFormat'> = {}): void {
        this.requireOpen();
        this.emit(this.indent(), value, options.dateFormat);
    }

    /**
     * Write `"name":value`. Null and undefined are skipped unless
     * `writeNull` is set.
     */
    writeMember(name: string, value: WritableValue, options: WriteOptions = {}): void {
        this.requireOpen();
        if ((value === null || value === undefined) && !options.writeNull) return;
        this.emit(this.indent() + memberPrefix(name), value, options.dateFormat);
    }

    /**
     * Write an array of scalars, or nothing for an empty array unless
     * `writeNull` is set. A null name writes an unnamed array.
     */
    writeArray(
        name: string | null,
        values: readonly (string | number | null)[],
        options: Pick<WriteOptions, 'writeNull'> = {},
    ): void {
        if (values.length === 0 && !options.writeNull) return;

        this.openArray(name ?? undefined);
        for (const value of values) {
            this.write(value);
        }
        this.closeArray();
    }

    private emit(prefix: string, value: WritableValue, dateFormat: DateFormat = 'timestamp'): void {
        if (value instanceof LargeText) {
            this.sink.write(`${prefix}"`);
            for (const slice of value.chunks(STRINGIFY_LENGTH)) {
                this.sink.write(escapeJson(slice));
            }
            this.sink.write('"\n');
        } else if (typeof value === 'string' && value.length > STRINGIFY_LENGTH) {
            this.sink.write(`${prefix}"`);
            for (let offset = 0; offset < value.length; offset += STRINGIFY_LENGTH) {
                this.sink.write(escapeJson(value.slice(offset, offset + STRINGIFY_LENGTH)));
            }
            this.sink.write('"\n');
        } else {
            this.sink.write(`${prefix}${stringify(value, dateFormat)}\n`);
        }
        this.dataWritten();
    }

    // ============ Raw and structured ============

    /**
     * Write a pre-formatted JSON fragment without escaping.
     */
    writeRaw(fragment: string): void {
        this.requireOpen();
        this.sink.write(`${this.indent()}${fragment}\n`);
        this.dataWritten();
    }

    writeRawMember(name: string, fragment: string): void {
        this.requireOpen();
        this.sink.write(`${this.indent()}${memberPrefix(name)}${fragment}\n`);
        this.dataWritten();
    }

    /**
     * Write an element tree through the XML-to-JSON transform.
     */
    writeXml(element: XmlElement | null): void {
        if (element === null) {
            this.write(null);
            return;
        }
        this.requireOpen();
        this.sink.write(this.indent());
        this.sink.write(`${xmlToJson(element)}\n`);
        this.dataWritten();
    }

    writeXmlMember(name: string, element: XmlElement | null, options: Pick<WriteOptions, 'writeNull'> = {}): void {
        if (element === null) {
            this.writeMember(name, null, options);
            return;
        }
        this.requireOpen();
        this.sink.write(this.indent() + memberPrefix(name));
        this.sink.write(`${xmlToJson(element)}\n`);
        this.dataWritten();
    }

    // ============ Parsed values ============

    /**
     * Re-emit the subtree of a value table at `path`. A missing path is
     * written as null.
     */
    writeParsed(values: ValueTable, path: string = ROOT_PATH, options: WriteParsedOptions = {}): void {
        const resolved = formatPath(path, options.args);
        this.writeParsedValue(undefined, values, resolved);
    }

    writeParsedMember(
        name: string,
        values: ValueTable,
        path: string = ROOT_PATH,
        options: WriteParsedOptions = {},
    ): void {
        this.requireOpen();
        const resolved = formatPath(path, options.args);
        this.writeParsedValue(name, values, resolved);
    }

    private writeParsedValue(name: string | undefined, values: ValueTable, path: string): void {
        const value: Value = values.get(path) ?? { kind: 'null' };
        const put = (scalar: WritableValue): void => {
            if (name === undefined) {
                this.write(scalar);
            } else {
                this.writeParsedScalarMember(name, scalar);
            }
        };

        switch (value.kind) {
            case 'null':
                return put(null);
            case 'true':
                return put(true);
            case 'false':
                return put(false);
            case 'number':
                return put(value.number);
            case 'string':
                return put(value.string);
            case 'large-text':
                return put(value.text);
            case 'object':
                this.openObject(name);
                for (const member of value.members) {
                    this.writeParsedValue(member, values, memberPath(path, member));
                }
                this.closeObject();
                return;
            case 'array':
                this.openArray(name);
                for (let i = 1; i <= value.count; i++) {
                    this.writeParsedValue(undefined, values, elementPath(path, i));
                }
                this.closeArray();
                return;
        }
    }

    // Table member names are raw text, so they are always quoted here
    private writeParsedScalarMember(name: string, value: WritableValue): void {
        this.requireOpen();
        this.emit(`${this.indent()}${stringify(name)}:`, value);
    }

    // ============ Row sets ============

    /**
     * Write a row set as an array of objects, one member per non-null
     * column. Row sets with nested row-set or object columns are written
     * through their XML isomorphism.
     */
    writeRows(rows: RowSet, name?: string): void {
        this.writeRowSet(rows, name, undefined);
    }

    /**
     * Write a `links` array. With substitutions, `#name#` placeholders in
     * each href are replaced first.
     */
    writeLinks(links: readonly Link[], substitutions?: ReadonlyMap<string, string>): void {
        if (links.length === 0) return;

        this.openArray('links');
        for (const item of links) {
            this.openObject();
            this.writeMember('href', substitutions ? substitute(item.href, substitutions) : item.href);
            this.writeMember('rel', item.rel);
            this.writeMember('templated', item.templated);
            this.writeMember('mediaType', item.mediaType);
            this.writeMember('method', item.method);
            this.writeMember('profile', item.profile);
            this.closeObject();
        }
        this.closeArray();
    }

    /**
     * Write `"items"` from a row set, each row followed by its links, then
     * the collection-level links. At level 0 the output is wrapped in an
     * object.
     */
    writeItems(items: RowSet, itemLinks?: readonly Link[], links?: readonly Link[]): void {
        const enclose = this.nesting.length === 0;
        if (enclose) this.openObject();

        this.writeRowSet(items, 'items', itemLinks);
        this.writeLinks(links ?? []);

        if (enclose) this.closeObject();
    }

    private writeRowSet(rows: RowSet, name: string | undefined, links: readonly Link[] | undefined): void {
        try {
            if (rows.columns.some((column) => isNestedColumn(column.type))) {
                if (links !== undefined) {
                    throw new JsonWriterError(
                        'RESTRICTION',
                        'implementation restriction: nested type and cursor columns not supported',
                    );
                }
                this.writeNestedRowSet(rows, name);
                return;
            }

            const placeholders = links ? collectPlaceholders(links) : [];
            const captured = rows.columns.map((column) => placeholders.includes(column.name));

            this.openArray(name);
            for (const row of rows.rows) {
                const substitutions = new Map(placeholders.map((placeholder): [string, string] => [placeholder, '']));

                this.openObject();
                rows.columns.forEach((column, i) => {
                    const cell = row[i];
                    this.writeCell(column, cell);
                    if (captured[i]) substitutions.set(column.name, captureText(column.type, cell));
                });
                if (links) this.writeLinks(links, substitutions);
                this.closeObject();
            }
            this.closeArray();
        } finally {
            rows.close?.();
        }
    }

    private writeNestedRowSet(rows: RowSet, name: string | undefined): void {
        this.logger.info('row set has nested columns, writing through XML', {
            columns: rows.columns.length,
        });

        const element = rowSetToXml(rows);
        if (!element.children || element.children.length === 0) {
            this.openArray(name);
            this.closeArray();
            return;
        }
        if (this.nesting.length === 0) {
            this.sendHeaders();
            this.sink.write(`${xmlToJson(element)}\n`);
            this.sink.flush();
        } else if (name === undefined) {
            this.writeXml(element);
        } else {
            this.writeXmlMember(name, element);
        }
    }

    private writeCell(column: Column, cell: CellValue): void {
        if (cell === null || cell === undefined) return;
        const mismatch = (): JsonTypeError => new JsonTypeError(column.name, column.type, describeCell(cell));

        switch (column.type) {
            case 'string':
                if (typeof cell !== 'string') throw mismatch();
                if (cell.length === 4 && cell.toUpperCase() === 'TRUE') {
                    this.writeMember(column.name, true);
                } else if (cell.length === 5 && cell.toUpperCase() === 'FALSE') {
                    this.writeMember(column.name, false);
                } else {
                    this.writeMember(column.name, cell);
                }
                return;
            case 'number':
                if (typeof cell !== 'number') throw mismatch();
                this.writeRawMember(column.name, stringifyNumber(cell));
                return;
            case 'date':
            case 'timestamp':
                if (!(cell instanceof Date)) throw mismatch();
                this.writeMember(column.name, cell, { dateFormat: column.type });
                return;
            case 'timestamp-tz':
                if (!isZonedTimestamp(cell)) throw mismatch();
                this.writeMember(column.name, cell);
                return;
            case 'large-text':
                if (!(cell instanceof LargeText) && typeof cell !== 'string') throw mismatch();
                this.writeMember(column.name, cell);
                return;
            case 'xml':
                if (!isXmlElement(cell)) throw mismatch();
                this.writeXmlMember(column.name, cell);
                return;
            case 'rowset':
            case 'object':
                throw mismatch();
        }
    }
}
