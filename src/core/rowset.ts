import type {
    CellValue,
    Column,
    ColumnType,
    RowSet,
    StructuredValue,
    XmlElement,
    ZonedTimestamp,
} from '../types.js';
import { formatDate, formatZoned, isZonedTimestamp } from './dates.js';
import { stringifyNumber } from './escape.js';
import { LargeText } from './large-text.js';

// ============ Builders ============

/**
 * Row set over in-memory rows.
 *
 * @example
 * ```ts
 * const rows = rowSet(
 *     [{ name: 'ID', type: 'number' }, { name: 'NAME', type: 'string' }],
 *     [[1, 'Ada'], [2, null]],
 * );
 * ```
 */
export function rowSet(
    columns: readonly Column[],
    rows: Iterable<readonly CellValue[]>,
    close?: () => void,
): RowSet {
    return close ? { kind: 'rowset', columns, rows, close } : { kind: 'rowset', columns, rows };
}

/**
 * Object-typed cell value.
 */
export function structured(attributes: { readonly [attribute: string]: CellValue }): StructuredValue {
    return { kind: 'object', attributes };
}

// ============ Guards ============

export function isRowSet(value: unknown): value is RowSet {
    return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'rowset';
}

export function isStructuredValue(value: unknown): value is StructuredValue {
    return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'object';
}

export function isXmlElement(value: unknown): value is XmlElement {
    return (
        typeof value === 'object' &&
        value !== null &&
        !(value instanceof Date) &&
        !(value instanceof LargeText) &&
        !('kind' in value) &&
        'name' in value &&
        typeof value.name === 'string'
    );
}

/**
 * Short description of a cell's runtime type, for error messages.
 */
export function describeCell(cell: CellValue): string {
    if (cell === null || cell === undefined) return 'null';
    if (typeof cell === 'string' || typeof cell === 'number') return typeof cell;
    if (cell instanceof Date) return 'date';
    if (cell instanceof LargeText) return 'large-text';
    if (isRowSet(cell)) return 'rowset';
    if (isStructuredValue(cell)) return 'object';
    if (isZonedTimestamp(cell)) return 'timestamp-tz';
    return 'xml';
}

/**
 * Whether a column type can only be written through the XML isomorphism.
 */
export function isNestedColumn(type: ColumnType): boolean {
    return type === 'rowset' || type === 'object';
}

// ============ Link capture ============

/**
 * Text of a cell as substituted into link templates. Null gives ''.
 */
export function captureText(type: ColumnType, cell: CellValue): string {
    if (cell === null || cell === undefined) return '';
    if (typeof cell === 'string') return cell;
    if (typeof cell === 'number') return stringifyNumber(cell);
    if (cell instanceof Date) return formatDate(cell, type === 'date' ? 'date' : 'timestamp');
    if (isZonedTimestamp(cell)) return formatZoned(cell);
    return '';
}

// ============ XML isomorphism ============

function scalarText(cell: string | number | Date | ZonedTimestamp | LargeText, type: ColumnType | undefined): string {
    if (typeof cell === 'string') return cell;
    if (typeof cell === 'number') return stringifyNumber(cell);
    if (cell instanceof Date) return formatDate(cell, type === 'date' ? 'date' : 'timestamp');
    if (cell instanceof LargeText) return cell.toString();
    return formatZoned(cell);
}

function cellToXml(name: string, cell: CellValue, type?: ColumnType): XmlElement | null {
    if (cell === null || cell === undefined) return null;

    if (isRowSet(cell)) {
        try {
            return { name, children: rowsToXml(cell, `${name}_ROW`) };
        } finally {
            cell.close?.();
        }
    }
    if (isStructuredValue(cell)) {
        const children: XmlElement[] = [];
        for (const [attribute, value] of Object.entries(cell.attributes)) {
            const child = cellToXml(attribute, value);
            if (child) children.push(child);
        }
        return { name, children };
    }
    if (isXmlElement(cell)) {
        return { name, children: [cell] };
    }
    return { name, text: scalarText(cell, type) };
}

function rowsToXml(rows: RowSet, rowName: string): XmlElement[] {
    const result: XmlElement[] = [];
    for (const row of rows.rows) {
        const children: XmlElement[] = [];
        rows.columns.forEach((column, i) => {
            const child = cellToXml(column.name, row[i], column.type);
            if (child) children.push(child);
        });
        result.push({ name: rowName, children });
    }
    return result;
}

/**
 * Element tree of a row set: `ROWSET` holding one `ROW` per row and one
 * element per non-null column. Nested row sets become `<COL><COL_ROW>...`,
 * structured values one child per attribute. Nested row sets are closed
 * once read; closing `rows` is left to the caller.
 */
export function rowSetToXml(rows: RowSet): XmlElement {
    return { name: 'ROWSET', children: rowsToXml(rows, 'ROW') };
}
