import type { XmlElement } from '../types.js';
import { escapeJson } from './escape.js';

// XPath number(): optional sign, digits with an optional fraction, padding allowed
const XPATH_NUMBER = /^\s*-?(\d+(\.\d*)?|\.\d+)\s*$/;
const DIGITS = '1234567890';

const enquote = (text: string): string => `"${escapeJson(text)}"`;

const hasText = (text: string | undefined): text is string => text !== undefined && text.trim().length > 0;

/**
 * JSON form of element text: null, a number, a boolean, or a string.
 *
 * Numeric-looking text that would not survive as a JSON number
 * (` 123`, `0123`, `-0123`, `1.2.3`, `123.`) stays a string.
 */
export function xmlTextToJson(text: string): string {
    if (text.length === 0) return 'null';

    if (XPATH_NUMBER.test(text)) {
        if (DIGITS.includes(text)) return text;
        if (
            !'1234567890.-'.includes(text[0]) ||
            (text.startsWith('-0') && !text.startsWith('-0.')) ||
            (text.startsWith('0') && !text.startsWith('0.')) ||
            text.indexOf('.') !== text.lastIndexOf('.') ||
            text.endsWith('.')
        ) {
            return enquote(text);
        }
        if (text.startsWith('.')) return `0${text}`;
        if (text.startsWith('-.')) return `-0.${text.slice(2)}`;
        return text;
    }

    const lower = text.toLowerCase();
    if (text.length === 4 && lower === 'true') return 'true';
    if (text.length === 5 && lower === 'false') return 'false';
    return enquote(text);
}

function isArrayLike(element: XmlElement, children: readonly XmlElement[]): boolean {
    const count = children.length;
    if (count === 0) return false;

    const first = children[0].name;
    if (first !== children[count - 1].name) return false;

    return (
        count > 1 ||
        element.name.toLowerCase() === 'rowset' ||
        first.includes('x0028__x0027') ||
        first.toLowerCase().endsWith('_row')
    );
}

/**
 * Convert an element tree to JSON text.
 *
 * Repeated children (or the rows of a `ROWSET`, or `*_ROW` children) become
 * an array; elements with attributes or children become objects with
 * `@name` members for attributes and `@text` for mixed text; leaf
 * elements become their text value, or null.
 *
 * @example
 * ```ts
 * xmlToJson({ name: 'ROWSET', children: [{ name: 'ROW', children: [{ name: 'ID', text: '1' }] }] });
 * // '[{"ID":1}]'
 * ```
 */
export function xmlToJson(element: XmlElement): string {
    const children = element.children ?? [];
    const attributes = Object.entries(element.attributes ?? {});

    if (isArrayLike(element, children)) {
        const items = [
            ...attributes.map(([name, value]) => `{${enquote(`@${name}`)}:${xmlTextToJson(value)}}`),
            ...children.map((child) => xmlToJson(child)),
        ];
        return `[${items.join(',')}]`;
    }

    if (attributes.length > 0 || children.length > 0) {
        const members = [
            ...attributes.map(([name, value]) => `${enquote(`@${name}`)}:${xmlTextToJson(value)}`),
            ...children.map((child) => `${enquote(child.name)}:${xmlToJson(child)}`),
        ];
        if (hasText(element.text)) {
            members.push(`"@text":${xmlTextToJson(element.text)}`);
        }
        return `{${members.join(',')}}`;
    }

    if (hasText(element.text)) return xmlTextToJson(element.text);
    return 'null';
}
