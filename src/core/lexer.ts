import { JsonParseError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { STRING_SPILL_LENGTH, type SourcePosition, type TokenType } from '../types.js';
import { LargeText } from './large-text.js';
import { isDigit, isWhitespace, type CharReader } from './reader.js';

// ============ Tokens ============

export type Token =
    | { type: 'STRING'; value: string | LargeText; position: SourcePosition }
    | { type: 'NUMBER'; value: number; text: string; position: SourcePosition }
    | { type: Exclude<TokenType, 'STRING' | 'NUMBER'>; position: SourcePosition };

const SYMBOL_NAMES: Record<TokenType, string> = {
    EOF: '<eof>',
    BEGIN_ARRAY: '[',
    BEGIN_OBJECT: '{',
    END_ARRAY: ']',
    END_OBJECT: '}',
    NAME_SEPARATOR: ':',
    VALUE_SEPARATOR: ',',
    FALSE: 'false',
    TRUE: 'true',
    NULL: 'null',
    NUMBER: '<number>',
    STRING: '<string>',
};

/**
 * Display name of a token type, as used in error messages.
 */
export function symbolName(type: TokenType): string {
    return SYMBOL_NAMES[type];
}

type StructuralType = 'BEGIN_ARRAY' | 'BEGIN_OBJECT' | 'END_ARRAY' | 'END_OBJECT' | 'NAME_SEPARATOR' | 'VALUE_SEPARATOR';

const STRUCTURAL: Readonly<Record<string, StructuralType>> = {
    '[': 'BEGIN_ARRAY',
    '{': 'BEGIN_OBJECT',
    ']': 'END_ARRAY',
    '}': 'END_OBJECT',
    ':': 'NAME_SEPARATOR',
    ',': 'VALUE_SEPARATOR',
};

const KEYWORDS = new Map<string, 'TRUE' | 'FALSE' | 'NULL'>([
    ['true', 'TRUE'],
    ['false', 'FALSE'],
    ['null', 'NULL'],
]);

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
    '"': '"',
    '\\': '\\',
    '/': '/',
    b: '\b',
    f: '\f',
    n: '\n',
    r: '\r',
    t: '\t',
};

const HEX4 = /^[0-9A-Fa-f]{4}$/;

const isLiteralStart = (char: string): boolean => /^[A-Za-z_]$/.test(char);
const isLiteralPart = (char: string): boolean => /^[A-Za-z0-9_]$/.test(char);

// Number DFA states
type NumberState =
    | 'INTEGER'         // -?digit+
    | 'FRACTION_START'  // '.' seen, digit required
    | 'FRACTION'        // digits after '.'
    | 'EXPONENT_MARK'   // e/E seen, sign or digit required
    | 'EXPONENT_SIGN'   // +/- seen, digit required
    | 'EXPONENT';       // exponent digits

// ============ String Accumulator ============

/**
 * Collects decoded string content, moving it into a LargeText once it
 * grows past the spill length.
 */
class StringAccumulator {
    private parts: string[] = [];
    private length = 0;
    private large: LargeText | null = null;

    append(text: string): boolean {
        if (text.length === 0) return false;

        if (this.large) {
            this.large.append(text);
            return false;
        }
        if (this.length + text.length <= STRING_SPILL_LENGTH) {
            this.parts.push(text);
            this.length += text.length;
            return false;
        }

        this.large = new LargeText();
        this.large.append(this.parts.join(''));
        this.large.append(text);
        this.parts = [];
        this.length = 0;
        return true;
    }

    take(): string | LargeText {
        const result = this.large ?? this.parts.join('');
        this.large = null;
        this.parts = [];
        this.length = 0;
        return result;
    }

    discard(): void {
        this.large?.free();
        this.large = null;
        this.parts = [];
        this.length = 0;
    }
}

// ============ Lexer ============

/**
 * Tokenizer over a CharReader.
 *
 * A STRING token may carry a LargeText; ownership passes to whoever takes
 * the token.
 */
export class Lexer {
    private readonly reader: CharReader;
    private readonly strict: boolean;
    private readonly logger: Logger;
    private readonly accumulator = new StringAccumulator();

    constructor(reader: CharReader, options: { strict?: boolean; logger?: Logger } = {}) {
        this.reader = reader;
        this.strict = options.strict ?? true;
        this.logger = options.logger ?? silentLogger;
    }

    next(): Token {
        const char = this.reader.readNonWs();
        const position = this.reader.position;
        if (char === null) return { type: 'EOF', position };

        const structural = STRUCTURAL[char];
        if (structural !== undefined) return { type: structural, position };

        if (char === '"') return this.readString(position);
        if (char === '-' || isDigit(char)) return this.readNumber(char, position);
        if (isLiteralStart(char)) return this.readLiteral(char, position);

        throw this.error(`Unexpected character "${char}"`);
    }

    /**
     * Release any partially collected string.
     */
    dispose(): void {
        this.accumulator.discard();
    }

    // ============ Numbers ============

    private readNumber(first: string, position: SourcePosition): Token {
        let text = first;

        if (first === '-') {
            const char = this.reader.read();
            if (char === null || !isDigit(char)) {
                throw this.error(`expected 0-9 after minus sign, not "${char ?? ''}"`);
            }
            text += char;
        }

        let state: NumberState = 'INTEGER';
        for (;;) {
            const char = this.reader.read();

            if (char !== null && isDigit(char)) {
                text += char;
                if (state === 'FRACTION_START') state = 'FRACTION';
                else if (state === 'EXPONENT_MARK' || state === 'EXPONENT_SIGN') state = 'EXPONENT';
                continue;
            }

            if (state === 'FRACTION_START' || state === 'EXPONENT_MARK' || state === 'EXPONENT_SIGN') {
                if (state === 'EXPONENT_MARK' && (char === '+' || char === '-')) {
                    text += char;
                    state = 'EXPONENT_SIGN';
                    continue;
                }
                throw this.error(`Invalid number: ${text}${char ?? ''}`);
            }

            if (char === '.' && state === 'INTEGER') {
                text += char;
                state = 'FRACTION_START';
                continue;
            }
            if ((char === 'e' || char === 'E') && (state === 'INTEGER' || state === 'FRACTION')) {
                text += char;
                state = 'EXPONENT_MARK';
                continue;
            }

            this.reader.unread(char);
            return { type: 'NUMBER', value: Number(text), text, position };
        }
    }

    // ============ Strings ============

    private readString(position: SourcePosition): Token {
        const acc = this.accumulator;
        try {
            for (;;) {
                const run = this.reader.readUntil('"', '\\', STRING_SPILL_LENGTH);
                this.append(run.text);

                if (run.stop === false) continue;
                if (run.stop === null) throw this.error('Unterminated quoted string');
                if (run.stop === '"') break;
                this.append(this.readEscape());
            }
        } catch (error) {
            acc.discard();
            throw error;
        }
        return { type: 'STRING', value: acc.take(), position };
    }

    private append(text: string): void {
        if (this.accumulator.append(text)) {
            this.logger.debug('string literal spilled to large text', { line: this.reader.position.line });
        }
    }

    private readEscape(): string {
        const char = this.reader.read();
        if (char === null) throw this.error('Unterminated quoted string');

        const simple = SIMPLE_ESCAPES[char];
        if (simple !== undefined) return simple;
        if (char !== 'u') throw this.error(`Invalid escape sequence \\${char}`);

        const code = this.readHex4();
        if (code >= 0xdc00 && code <= 0xdfff) {
            throw this.error(`Unpaired surrogate \\u${hexText(code)}`);
        }
        if (code < 0xd800 || code > 0xdbff) {
            return String.fromCharCode(code);
        }

        // High surrogate: the low half must follow immediately
        const backslash = this.reader.read();
        const u = backslash === '\\' ? this.reader.read() : null;
        if (u !== 'u') throw this.error(`Unpaired surrogate \\u${hexText(code)}`);

        const low = this.readHex4();
        if (low < 0xdc00 || low > 0xdfff) {
            throw this.error(`Unpaired surrogate \\u${hexText(code)}`);
        }
        return String.fromCharCode(code, low);
    }

    private readHex4(): number {
        let digits = '';
        for (let i = 0; i < 4; i++) {
            const char = this.reader.read();
            if (char === null) break;
            digits += char;
        }
        if (!HEX4.test(digits)) {
            throw this.error(`"\\u${digits}" is not a valid hex string`);
        }
        return parseInt(digits, 16);
    }

    // ============ Literals ============

    private readLiteral(first: string, position: SourcePosition): Token {
        let text = first;
        let char = this.reader.read();
        while (char !== null && isLiteralPart(char)) {
            text += char;
            char = this.reader.read();
        }
        // One trailing whitespace character belongs to the literal
        if (char === null || !isWhitespace(char)) {
            this.reader.unread(char);
        }

        const keyword = KEYWORDS.get(text);
        if (keyword !== undefined) return { type: keyword, position };

        if (this.strict) {
            throw this.error('strict mode JSON parser does not allow unquoted literals');
        }
        return { type: 'STRING', value: text, position };
    }

    private error(reason: string): JsonParseError {
        return new JsonParseError('LEXICAL', this.reader.position, reason);
    }
}

const hexText = (code: number): string => code.toString(16).toUpperCase().padStart(4, '0');
