import type { LargeText } from './core/large-text.js';

// ============ Limits ============

/** Decoded characters a string literal may hold before it spills into a LargeText. */
export const STRING_SPILL_LENGTH = 8190;

/** Characters the buffered writer accumulates before it flushes. */
export const WRITER_BUFFER_LENGTH = 32767;

/** Slice length used when escaping and streaming long string values. */
export const STRINGIFY_LENGTH = 5460;

/** Page size used to split a LargeText source before parsing. */
export const SOURCE_PAGE_LENGTH = 8191;

/** Path of the document root in a value table. */
export const ROOT_PATH = '.';

// ============ Values ============

/**
 * Kinds of values stored in a value table.
 */
export type ValueKind =
    | 'null'
    | 'true'
    | 'false'
    | 'number'
    | 'string'
    | 'large-text'
    | 'object'
    | 'array';

/**
 * A single entry of a value table.
 *
 * Containers never embed their children: an object lists its member names
 * and an array its element count, and the children live in the same table
 * under paths derived from the container's own path.
 */
export type Value =
    | { kind: 'null' }
    | { kind: 'true' }
    | { kind: 'false' }
    | { kind: 'number'; number: number }
    | { kind: 'string'; string: string }
    | { kind: 'large-text'; text: LargeText }
    | { kind: 'object'; members: string[] }
    | { kind: 'array'; count: number };

/**
 * Flat mapping from path to value; "." is the document root.
 */
export type ValueTable = Map<string, Value>;

/**
 * Source text accepted by the parser: one string, a large text that is
 * paged internally, or a sequence of chunks.
 */
export type JsonSource = string | LargeText | readonly string[];

// ============ Lexer ============

/**
 * Token types produced by the lexer.
 */
export type TokenType =
    | 'EOF'
    | 'BEGIN_ARRAY'     // [
    | 'BEGIN_OBJECT'    // {
    | 'END_ARRAY'       // ]
    | 'END_OBJECT'      // }
    | 'NAME_SEPARATOR'  // :
    | 'VALUE_SEPARATOR' // ,
    | 'FALSE'
    | 'TRUE'
    | 'NULL'
    | 'NUMBER'
    | 'STRING';

/**
 * Position of a character in the source. Lines and columns are 1-based.
 */
export interface SourcePosition {
    line: number;
    column: number;
    index: number;
}

// ============ Dates ============

/**
 * A point in time together with the UTC offset it should be rendered in.
 */
export interface ZonedTimestamp {
    instant: Date;
    /** Minutes east of UTC, e.g. 120 for +02:00 */
    offsetMinutes: number;
}

/**
 * Textual layout used when writing a Date.
 * 'date' omits fractional seconds, 'timestamp' keeps milliseconds.
 */
export type DateFormat = 'date' | 'timestamp';

// ============ Structured markup ============

/**
 * Minimal element tree used for the XML isomorphism of JSON.
 */
export interface XmlElement {
    name: string;
    attributes?: Readonly<Record<string, string>>;
    children?: readonly XmlElement[];
    text?: string;
}

// ============ Row sets ============

/**
 * Declared type of a row-set column.
 */
export type ColumnType =
    | 'string'
    | 'number'
    | 'date'
    | 'timestamp'
    | 'timestamp-tz'
    | 'large-text'
    | 'xml'
    | 'rowset'
    | 'object';

export interface Column {
    name: string;
    type: ColumnType;
}

/**
 * Structured (object-typed) column value: attribute name to value.
 */
export interface StructuredValue {
    readonly kind: 'object';
    readonly attributes: { readonly [attribute: string]: CellValue };
}

export type CellValue =
    | string
    | number
    | Date
    | ZonedTimestamp
    | LargeText
    | XmlElement
    | RowSet
    | StructuredValue
    | null
    | undefined;

/**
 * Tabular result set. Column metadata is read once; rows are consumed in
 * order and `close` is called when the writer is done with them.
 */
export interface RowSet {
    readonly kind: 'rowset';
    readonly columns: readonly Column[];
    readonly rows: Iterable<readonly CellValue[]>;
    close?(): void;
}

// ============ Links ============

/**
 * Hypermedia link template. `href` may contain `#column#` placeholders that
 * are filled from the current row.
 */
export interface Link {
    href: string;
    rel: string;
    templated?: boolean;
    mediaType?: string;
    method?: string;
    profile?: string;
}

// ============ Writer ============

/**
 * Per-level state of the writer's nesting stack.
 */
export type NestingMarker =
    | 'OPENED_ARRAY'    // [ written, no element yet
    | 'OPENED_OBJECT'   // { written, no member yet
    | 'IN_ARRAY'        // at least one element written
    | 'IN_OBJECT';      // at least one member written

/**
 * Values the writer serializes directly.
 */
export type WritableValue =
    | string
    | number
    | boolean
    | null
    | undefined
    | Date
    | ZonedTimestamp
    | LargeText;
