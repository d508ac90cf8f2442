import type { FormatOptions } from '../config.js';
import { JsonConfigError, JsonTypeError, JsonValueError } from '../errors.js';
import type { Value, ValueTable, ZonedTimestamp } from '../types.js';
import { parseIsoTimestamp } from './dates.js';
import { stringifyNumber } from './escape.js';
import { LargeText } from './large-text.js';
import { elementPath, formatPath, type PathArg } from './path.js';

// ============ Options ============

export interface AccessOptions {
    /** Values for `%s`, `%d` and `%N` placeholders in the path */
    args?: readonly PathArg[];
    format?: FormatOptions;
}

export interface DefaultedAccessOptions<T> extends AccessOptions {
    /** Returned when nothing exists at the path */
    default?: T;
}

const MAX_ARGS = 5;

function resolvePath(path: string, options: AccessOptions | undefined): string {
    const args = options?.args ?? [];
    if (args.length > MAX_ARGS) {
        throw new JsonConfigError('path arguments', [`at most ${MAX_ARGS} are supported, got ${args.length}`]);
    }
    return formatPath(path, args, options?.format);
}

function lookup(values: ValueTable, path: string, options: AccessOptions | undefined): [string, Value | undefined] {
    const resolved = resolvePath(path, options);
    return [resolved, values.get(resolved)];
}

// ============ Conversions ============

const NUMBER_TEXT = /^\s*-?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

function toBoolean(path: string, value: Value): boolean | null {
    switch (value.kind) {
        case 'null':
            return null;
        case 'true':
            return true;
        case 'false':
            return false;
        default:
            throw new JsonTypeError(path, 'boolean', value.kind);
    }
}

function toNumber(path: string, value: Value): number | null {
    switch (value.kind) {
        case 'null':
            return null;
        case 'number':
            return value.number;
        case 'string':
            if (!NUMBER_TEXT.test(value.string)) {
                throw new JsonValueError(path, `"${value.string}" is not a number`);
            }
            return Number(value.string);
        default:
            throw new JsonTypeError(path, 'number', value.kind);
    }
}

function toText(path: string, value: Value): string | null {
    switch (value.kind) {
        case 'null':
            return null;
        case 'true':
        case 'false':
            return value.kind;
        case 'number':
            return stringifyNumber(value.number);
        case 'string':
            return value.string;
        default:
            throw new JsonTypeError(path, 'string', value.kind);
    }
}

function toTimestamp(path: string, value: Value, expected: string): ZonedTimestamp | null {
    if (value.kind === 'null') return null;
    if (value.kind !== 'string') throw new JsonTypeError(path, expected, value.kind);

    const parsed = parseIsoTimestamp(value.string);
    if (!parsed) {
        throw new JsonValueError(path, `"${value.string}" is not a valid ${expected}`);
    }
    return parsed;
}

// ============ Accessors ============

/**
 * Whether anything, including a JSON null, exists at the path.
 */
export function exists(values: ValueTable, path: string, options?: AccessOptions): boolean {
    return values.has(resolvePath(path, options));
}

/**
 * Raw table entry at the path.
 */
export function getValue(values: ValueTable, path: string, options?: AccessOptions): Value | undefined {
    return lookup(values, path, options)[1];
}

export function getBoolean(
    values: ValueTable,
    path: string,
    options?: DefaultedAccessOptions<boolean>,
): boolean | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;
    return toBoolean(resolved, value);
}

/**
 * Number at the path. Numeric strings are converted; anything else that
 * is not a number or null is an error.
 */
export function getNumber(
    values: ValueTable,
    path: string,
    options?: DefaultedAccessOptions<number>,
): number | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;
    return toNumber(resolved, value);
}

/**
 * Text at the path. Booleans and numbers are returned in their JSON form;
 * large texts must be read with `getLargeText`.
 */
export function getString(
    values: ValueTable,
    path: string,
    options?: DefaultedAccessOptions<string>,
): string | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;
    return toText(resolved, value);
}

/**
 * Text at the path as a LargeText. For large values the table keeps
 * ownership; other values are copied into a new LargeText.
 */
export function getLargeText(
    values: ValueTable,
    path: string,
    options?: DefaultedAccessOptions<LargeText>,
): LargeText | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;
    if (value.kind === 'large-text') return value.text;

    const text = toText(resolved, value);
    return text === null ? null : LargeText.from(text);
}

/**
 * Date at the path, to the second.
 */
export function getDate(values: ValueTable, path: string, options?: DefaultedAccessOptions<Date>): Date | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;

    const parsed = toTimestamp(resolved, value, 'date');
    if (!parsed) return null;
    const millis = parsed.instant.getTime();
    return new Date(millis - (((millis % 1000) + 1000) % 1000));
}

/**
 * Timestamp at the path, to the millisecond.
 */
export function getTimestamp(
    values: ValueTable,
    path: string,
    options?: DefaultedAccessOptions<Date>,
): Date | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;
    return toTimestamp(resolved, value, 'timestamp')?.instant ?? null;
}

/**
 * Timestamp at the path together with the offset it was written in.
 */
export function getTimestampTz(
    values: ValueTable,
    path: string,
    options?: DefaultedAccessOptions<ZonedTimestamp>,
): ZonedTimestamp | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return options?.default ?? null;
    return toTimestamp(resolved, value, 'timestamp with time zone');
}

/**
 * Number of members of an object or elements of an array.
 */
export function getCount(values: ValueTable, path: string, options?: AccessOptions): number | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return null;

    switch (value.kind) {
        case 'object':
            return value.members.length;
        case 'array':
            return value.count;
        default:
            throw new JsonTypeError(resolved, 'array or object', value.kind);
    }
}

/**
 * Member names of the object at the path, in document order.
 */
export function getMembers(values: ValueTable, path: string, options?: AccessOptions): string[] | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return null;
    if (value.kind !== 'object') throw new JsonTypeError(resolved, 'object', value.kind);
    return [...value.members];
}

function collectArray<T>(
    values: ValueTable,
    path: string,
    value: Value,
    convert: (path: string, value: Value) => T | null,
): (T | null)[] {
    if (value.kind !== 'array') return [convert(path, value)];

    const result: (T | null)[] = [];
    for (let i = 1; i <= value.count; i++) {
        const childPath = elementPath(path, i);
        const child = values.get(childPath);
        result.push(child ? convert(childPath, child) : null);
    }
    return result;
}

/**
 * Elements of the array at the path as strings. A scalar gives a
 * one-element array.
 */
export function getArrayOfString(
    values: ValueTable,
    path: string,
    options?: AccessOptions,
): (string | null)[] | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return null;
    return collectArray(values, resolved, value, toText);
}

/**
 * Elements of the array at the path as numbers. A scalar gives a
 * one-element array.
 */
export function getArrayOfNumber(
    values: ValueTable,
    path: string,
    options?: AccessOptions,
): (number | null)[] | null {
    const [resolved, value] = lookup(values, path, options);
    if (!value) return null;
    return collectArray(values, resolved, value, toNumber);
}
