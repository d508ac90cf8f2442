import type { DateFormat, ZonedTimestamp } from '../types.js';
import { formatDate, formatZoned, isZonedTimestamp } from './dates.js';

// ============ Escape Table ============

const hex4 = (code: number): string => `\\u${code.toString(16).toUpperCase().padStart(4, '0')}`;

const SHORT_ESCAPES: Readonly<Record<number, string>> = {
    0x08: '\\b',
    0x09: '\\t',
    0x0a: '\\n',
    0x0d: '\\r',
    0x22: '\\"',
    0x2f: '\\/',
    0x5c: '\\\\',
};

// Printable ASCII that must not appear raw when output lands inside HTML
const UNICODE_ESCAPED = new Set(['&', '<', '>', "'", '`']);

/**
 * Escaped form of each ASCII code point.
 */
export const ESCAPE_TABLE: readonly string[] = Array.from({ length: 128 }, (_, code) => {
    const short = SHORT_ESCAPES[code];
    if (short !== undefined) return short;

    const char = String.fromCharCode(code);
    if (code < 0x20 || code === 0x7f || UNICODE_ESCAPED.has(char)) return hex4(code);
    return char;
});

/**
 * Escape text for use inside a JSON string literal (without the quotes).
 * Every UTF-16 code unit outside ASCII becomes `\uXXXX`.
 */
export function escapeJson(text: string): string {
    let out = '';
    let runStart = 0;

    for (let i = 0; i < text.length; i++) {
        const code = text.charCodeAt(i);
        const escaped = code < 128 ? ESCAPE_TABLE[code] : hex4(code);
        if (escaped.length === 1) continue;

        out += text.slice(runStart, i) + escaped;
        runStart = i + 1;
    }

    return runStart === 0 ? text : out + text.slice(runStart);
}

const HTML_ENTITIES: Readonly<Record<string, string>> = {
    '&': '&amp;',
    '"': '&quot;',
    '<': '&lt;',
    '>': '&gt;',
    "'": '&#x27;',
    '/': '&#x2F;',
};

/**
 * Quick HTML/XML text escape.
 */
export function escapeHtml(text: string): string {
    return text.replace(/[&"<>'/]/g, (char) => HTML_ENTITIES[char] ?? char);
}

// ============ Stringify ============

export type Stringifiable = string | number | boolean | null | undefined | Date | ZonedTimestamp;

/**
 * JSON text of a scalar.
 *
 * Strings are quoted and escaped; non-finite numbers, null and undefined
 * give `null`; dates are written as quoted ISO text.
 *
 * @example
 * ```ts
 * stringify(-0.005);   // '-0.005'
 * stringify('a"b');    // '"a\\"b"'
 * ```
 */
export function stringify(value: Stringifiable, dateFormat: DateFormat = 'timestamp'): string {
    if (value === null || value === undefined) return 'null';

    switch (typeof value) {
        case 'string':
            return `"${escapeJson(value)}"`;
        case 'number':
            return stringifyNumber(value);
        case 'boolean':
            return value ? 'true' : 'false';
    }

    if (value instanceof Date) return `"${formatDate(value, dateFormat)}"`;
    if (isZonedTimestamp(value)) return `"${formatZoned(value)}"`;
    return 'null';
}

/**
 * Number text with a leading zero before the decimal point.
 */
export function stringifyNumber(value: number | null | undefined): string {
    if (value === null || value === undefined || !Number.isFinite(value)) return 'null';
    return String(value);
}
