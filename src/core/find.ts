import { ROOT_PATH, type Value, type ValueTable } from '../types.js';
import { stringifyNumber } from './escape.js';
import { elementPath, matchesLike, memberPath } from './path.js';

/**
 * Split a query into parts at `[...]`, `%` and `.` boundaries.
 *
 * @example
 * ```ts
 * splitQuery('items[%].name'); // ['items', '[%]', '.name']
 * ```
 */
export function splitQuery(query: string): string[] {
    return query
        .replace(/(\[[^\]]*|%|\.)/g, '|$1')
        .replace(/\|\|/g, '|')
        .replace(/^\|+|\|+$/g, '')
        .split('|');
}

function valueMatches(value: Value, pattern: string): boolean {
    switch (value.kind) {
        case 'true':
        case 'false':
            return matchesLike(value.kind, pattern);
        case 'number':
            return matchesLike(stringifyNumber(value.number), pattern);
        case 'string':
            return matchesLike(value.string, pattern);
        default:
            return false;
    }
}

/**
 * Paths whose subtree contains a match for `returnPath` followed by
 * `subpath`, optionally with a leaf value matching `valuePattern`.
 *
 * Patterns use LIKE wildcards. The walk starts at the root and, among
 * siblings, only descends into those that match the most query parts.
 *
 * @example
 * ```ts
 * // {"items":[{"name":"A","magical":true},{"name":"B","magical":"rather not"}]}
 * findPathsLike(values, 'items[%]', '.magical', 'true'); // ['items[1]']
 * ```
 */
export function findPathsLike(
    values: ValueTable,
    returnPath: string,
    subpath?: string | null,
    valuePattern?: string | null,
): string[] {
    const parts = splitQuery(returnPath);
    const returnMatchIdx = parts.length;
    if (subpath) {
        parts.push(...splitQuery(subpath));
    }
    for (let i = 1; i < parts.length; i++) {
        parts[i] = parts[i - 1] + parts[i];
    }

    const partCount = parts.length;
    const lastPart = parts[partCount - 1];
    const found: string[] = [];
    let currentReturn: string | null = null;

    // Index of the deepest query part `path` matches, given its parent's
    const computeMatchIdx = (path: string, parentIdx: number): number => {
        const next = parentIdx + 1;
        if (next < partCount && matchesLike(path, parts[next - 1])) {
            return matchesLike(path, lastPart) ? partCount : next;
        }
        if (next === partCount && matchesLike(path, lastPart)) {
            return partCount;
        }
        return parentIdx;
    };

    const walk = (path: string, matchIdx: number): void => {
        let returnMatched = false;
        if (currentReturn === null && matchIdx >= returnMatchIdx) {
            returnMatched = true;
            currentReturn = path;
        }

        const current = values.get(path);
        if (!current) return;

        if (matchIdx === partCount && (!valuePattern || valueMatches(current, valuePattern))) {
            if (currentReturn !== null && !found.includes(currentReturn)) {
                found.push(currentReturn);
            }
            currentReturn = null;
            return;
        }

        const candidates: string[] = [];
        if (current.kind === 'array') {
            for (let i = 1; i <= current.count; i++) {
                candidates.push(elementPath(path, i));
            }
        } else if (current.kind === 'object') {
            for (const member of current.members) {
                candidates.push(memberPath(path, member));
            }
        }

        const matches = candidates.map((candidate) => computeMatchIdx(candidate, matchIdx));
        const best = matches.reduce((max, idx) => Math.max(max, idx), 0);
        candidates.forEach((candidate, i) => {
            if (matches[i] === best) walk(candidate, matches[i]);
        });

        if (returnMatched) {
            currentReturn = null;
        }
    };

    walk(ROOT_PATH, 0);
    return found;
}
