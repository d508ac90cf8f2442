import { resolveParseOptions, type ParseOptions } from '../config.js';
import { JsonParseError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ROOT_PATH, type JsonSource, type TokenType, type Value, type ValueTable } from '../types.js';
import type { LargeText } from './large-text.js';
import { Lexer, symbolName, type Token } from './lexer.js';
import { CharReader, toChunks } from './reader.js';
import { elementPath, memberPath } from './path.js';

// ============ Visitor ============

export type ScalarValue = Extract<Value, { kind: 'null' | 'true' | 'false' | 'number' | 'string' | 'large-text' }>;

/**
 * Where a value sits in the document. `name` is the raw member name, or
 * null for array elements and the root.
 */
export interface Slot {
    path: string;
    name: string | null;
}

/**
 * Receives the grammar walk. Scalar payloads (including large texts) are
 * handed over to the visitor.
 */
export interface ParseVisitor {
    beginObject(slot: Slot): void;
    endObject(slot: Slot, members: string[]): void;
    beginArray(slot: Slot): void;
    endArray(slot: Slot, count: number): void;
    scalar(slot: Slot, value: ScalarValue): void;
}

// ============ Grammar ============

const ROOT_SLOT: Slot = { path: ROOT_PATH, name: null };

/**
 * Recursive-descent walk of one document, reporting to `visitor`.
 * Empty input produces no events.
 */
export function parseDocument(
    reader: CharReader,
    visitor: ParseVisitor,
    options: { strict?: boolean; logger?: Logger } = {},
): void {
    const strict = options.strict ?? true;
    const lexer = new Lexer(reader, { strict, logger: options.logger });

    // A rejected string token still owns its large text
    const fail = (token: Token, reason: string): never => {
        if (token.type === 'STRING' && typeof token.value !== 'string') {
            token.value.free();
        }
        throw new JsonParseError('GRAMMAR', token.position, reason);
    };

    const expect = (token: Token, type: TokenType, alternative?: TokenType): void => {
        if (token.type === type || token.type === alternative) return;
        const wanted = alternative
            ? `"${symbolName(type)}" or "${symbolName(alternative)}"`
            : `"${symbolName(type)}"`;
        fail(token, `Expected ${wanted}, seeing "${symbolName(token.type)}"`);
    };

    const parseValue = (slot: Slot, token: Token): void => {
        switch (token.type) {
            case 'BEGIN_OBJECT':
                return parseObject(slot);
            case 'BEGIN_ARRAY':
                return parseArray(slot);
            case 'STRING':
                return visitor.scalar(
                    slot,
                    typeof token.value === 'string'
                        ? { kind: 'string', string: token.value }
                        : { kind: 'large-text', text: token.value },
                );
            case 'NUMBER':
                return visitor.scalar(slot, { kind: 'number', number: token.value });
            case 'TRUE':
                return visitor.scalar(slot, { kind: 'true' });
            case 'FALSE':
                return visitor.scalar(slot, { kind: 'false' });
            case 'NULL':
                return visitor.scalar(slot, { kind: 'null' });
            default:
                fail(token, 'Expected value (null, false, true, number, string)');
        }
    };

    const parseObject = (slot: Slot): void => {
        visitor.beginObject(slot);
        const members: string[] = [];
        const seen = new Set<string>();

        let token = lexer.next();
        if (token.type !== 'END_OBJECT') {
            for (;;) {
                if (token.type !== 'STRING') {
                    return fail(token, 'Expected string (object member name)');
                }
                const name = memberName(token.value);
                expect(lexer.next(), 'NAME_SEPARATOR');

                if (!seen.has(name)) {
                    seen.add(name);
                    members.push(name);
                }
                parseValue({ path: memberPath(slot.path, name), name }, lexer.next());

                token = lexer.next();
                expect(token, 'VALUE_SEPARATOR', 'END_OBJECT');
                if (token.type === 'END_OBJECT') break;

                token = lexer.next();
                if (token.type === 'END_OBJECT') {
                    if (strict) fail(token, 'Strict JSON forbids dangling comma');
                    break;
                }
            }
        }

        visitor.endObject(slot, members);
    };

    const parseArray = (slot: Slot): void => {
        visitor.beginArray(slot);
        let count = 0;

        let token = lexer.next();
        if (token.type !== 'END_ARRAY') {
            for (;;) {
                count++;
                parseValue({ path: elementPath(slot.path, count), name: null }, token);

                token = lexer.next();
                expect(token, 'VALUE_SEPARATOR', 'END_ARRAY');
                if (token.type === 'END_ARRAY') break;

                token = lexer.next();
                if (token.type === 'END_ARRAY') {
                    if (strict) fail(token, 'Strict JSON forbids dangling comma');
                    break;
                }
            }
        }

        visitor.endArray(slot, count);
    };

    try {
        const first = lexer.next();
        if (first.type === 'EOF') return;

        if (first.type === 'BEGIN_OBJECT') {
            parseObject(ROOT_SLOT);
        } else if (first.type === 'BEGIN_ARRAY') {
            parseArray(ROOT_SLOT);
        } else {
            fail(first, 'expected [ or {');
        }

        expect(lexer.next(), 'EOF');
    } finally {
        lexer.dispose();
    }
}

function memberName(value: string | LargeText): string {
    if (typeof value === 'string') return value;
    const name = value.toString();
    value.free();
    return name;
}

// ============ Value Table ============

/**
 * Release the large texts held by a table and empty it.
 */
export function clearTable(values: ValueTable): void {
    for (const value of values.values()) {
        if (value.kind === 'large-text') value.text.free();
    }
    values.clear();
}

/**
 * Builds a fresh value table. Containers are entered when they open, so
 * the table iterates in document order.
 */
export class TableVisitor implements ParseVisitor {
    readonly table: ValueTable = new Map();

    beginObject(slot: Slot): void {
        this.replace(slot.path, { kind: 'object', members: [] });
    }

    endObject(slot: Slot, members: string[]): void {
        this.table.set(slot.path, { kind: 'object', members });
    }

    beginArray(slot: Slot): void {
        this.replace(slot.path, { kind: 'array', count: 0 });
    }

    endArray(slot: Slot, count: number): void {
        this.table.set(slot.path, { kind: 'array', count });
    }

    scalar(slot: Slot, value: ScalarValue): void {
        this.replace(slot.path, value);
    }

    discard(): void {
        clearTable(this.table);
    }

    // A repeated member name replaces the earlier value and its children
    private replace(path: string, value: Value): void {
        if (this.table.has(path)) {
            const prefixes = [`${path}.`, `${path}[`];
            for (const [key, old] of this.table) {
                if (key === path || prefixes.some((prefix) => key.startsWith(prefix))) {
                    if (old.kind === 'large-text') old.text.free();
                    this.table.delete(key);
                }
            }
        }
        this.table.set(path, value);
    }
}

/**
 * Parse `source` into `values`.
 *
 * The table is emptied first; on success it holds the new document, on
 * failure it stays empty and the error is rethrown.
 *
 * @example
 * ```ts
 * const values: ValueTable = new Map();
 * parse(values, '{"foo":3,"bar":[1,2,3,4]}');
 * getCount(values, 'bar'); // 4
 * ```
 */
export function parse(
    values: ValueTable,
    source: JsonSource,
    options?: ParseOptions,
    logger: Logger = silentLogger,
): void {
    const { strict, lineSeparated } = resolveParseOptions(options);
    const reader = new CharReader(toChunks(source), { lineSeparated });
    const visitor = new TableVisitor();

    try {
        parseDocument(reader, visitor, { strict, logger });
    } catch (error) {
        visitor.discard();
        clearTable(values);
        if (error instanceof JsonParseError) {
            logger.warn('parse failed', { line: error.line, column: error.column, reason: error.reason });
        }
        throw error;
    }

    clearTable(values);
    for (const [path, value] of visitor.table) {
        values.set(path, value);
    }
    logger.debug('parse complete', { entries: values.size, strict });
}
