import { resolveOptions, FormatOptionsSchema, type FormatOptions } from '../config.js';
import { ROOT_PATH } from '../types.js';
import { stringifyNumber } from './escape.js';

/**
 * Positional value substituted into a path pattern.
 */
export type PathArg = string | number | null | undefined;

// ============ Member Names ============

const PLAIN_NAME = /^[A-Za-z0-9_]+$/;

export function isPlainName(name: string): boolean {
    return PLAIN_NAME.test(name);
}

/**
 * Path segment for an object member: the name itself when it is a plain
 * identifier, otherwise double-quoted with inner quotes escaped.
 *
 * @example
 * ```ts
 * toMemberName('price');      // 'price'
 * toMemberName('unit price'); // '"unit price"'
 * ```
 */
export function toMemberName(name: string): string {
    return isPlainName(name) ? name : `"${name.replace(/"/g, '\\"')}"`;
}

/**
 * Path of a member of the object at `parent`.
 */
export function memberPath(parent: string, name: string): string {
    return parent === ROOT_PATH ? toMemberName(name) : `${parent}.${toMemberName(name)}`;
}

/**
 * Path of the 1-based element `index` of the array at `parent`.
 */
export function elementPath(parent: string, index: number): string {
    return `${parent === ROOT_PATH ? '' : parent}[${index}]`;
}

// ============ Formatting ============

/**
 * Substitute positional arguments into a path pattern.
 *
 * `%s` and `%d` take the next argument in order; `%0` to `%19` pick an
 * argument by index, the first occurrence only. Anything else after `%`
 * is kept. With no arguments the pattern is returned as is.
 *
 * @example
 * ```ts
 * formatPath('items[%d].name', [3]);   // 'items[3].name'
 * formatPath('%1.%0', ['b', 'a']);      // 'a.b'
 * ```
 */
export function formatPath(pattern: string, args: readonly PathArg[] = [], options?: FormatOptions): string {
    if (args.length === 0) return pattern;

    const { maxLength } = resolveOptions('format options', FormatOptionsSchema, options);
    const render = (arg: PathArg): string => {
        if (arg === null || arg === undefined) return '';
        const text = typeof arg === 'number' ? stringifyNumber(arg) : arg;
        return text.length > maxLength ? `${text.slice(0, maxLength - 1)}~` : text;
    };

    const usedIndexes = new Set<number>();
    let nextArg = 0;
    let out = '';
    let i = 0;

    while (i < pattern.length) {
        const char = pattern[i];
        const directive = pattern[i + 1];
        if (char !== '%' || directive === undefined) {
            out += char;
            i++;
            continue;
        }

        if (directive === 's' || directive === 'd') {
            if (nextArg < args.length) {
                out += render(args[nextArg++]);
            } else {
                out += char + directive;
            }
            i += 2;
            continue;
        }

        if (directive >= '0' && directive <= '9') {
            const following = pattern[i + 2];
            const twoDigits = directive === '1' && following !== undefined && following >= '0' && following <= '9';
            const index = twoDigits ? Number(directive + following) : Number(directive);
            const width = twoDigits ? 3 : 2;

            if (index < args.length && !usedIndexes.has(index)) {
                usedIndexes.add(index);
                out += render(args[index]);
            } else {
                out += pattern.slice(i, i + width);
            }
            i += width;
            continue;
        }

        out += char;
        i++;
    }

    return out;
}

// ============ LIKE Patterns ============

const likeCache = new Map<string, RegExp>();

/**
 * Compile a LIKE pattern: `%` matches any run of characters, `_` exactly
 * one, everything else itself. The whole text must match.
 */
export function likeToRegExp(pattern: string): RegExp {
    let regexp = likeCache.get(pattern);
    if (!regexp) {
        const source = Array.from(pattern, (char) => {
            if (char === '%') return '[\\s\\S]*';
            if (char === '_') return '[\\s\\S]';
            return char.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
        }).join('');
        regexp = new RegExp(`^${source}$`, 'u');
        likeCache.set(pattern, regexp);
    }
    return regexp;
}

export function matchesLike(text: string, pattern: string): boolean {
    return likeToRegExp(pattern).test(text);
}
