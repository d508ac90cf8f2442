import type { SourcePosition } from './types.js';

/**
 * Machine-readable error categories.
 */
export type JsonErrorCode =
    | 'LEXICAL'
    | 'GRAMMAR'
    | 'TYPE'
    | 'CONVERSION'
    | 'WRITER_STATE'
    | 'RESTRICTION'
    | 'RESOURCE'
    | 'CONFIG';

/**
 * Base class for every error raised by the engine.
 */
export class JsonError extends Error {
    readonly code: JsonErrorCode;

    constructor(code: JsonErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'JsonError';
        this.code = code;
    }
}

/**
 * Lexical or grammar violation. Parsing stops at the first one.
 */
export class JsonParseError extends JsonError {
    readonly line: number;
    readonly column: number;
    readonly index: number;
    /** The message without the position prefix */
    readonly reason: string;

    constructor(code: 'LEXICAL' | 'GRAMMAR', position: SourcePosition, reason: string) {
        super(code, `Error at line ${position.line}, col ${position.column}: ${reason}`);
        this.name = 'JsonParseError';
        this.line = position.line;
        this.column = position.column;
        this.index = position.index;
        this.reason = reason;
    }
}

/**
 * A value exists at the path but has a kind the accessor cannot return.
 */
export class JsonTypeError extends JsonError {
    readonly path: string;
    readonly expected: string;
    readonly actual: string;

    constructor(path: string, expected: string, actual: string) {
        super('TYPE', `Value at "${path}" is ${actual}, expected ${expected}`);
        this.name = 'JsonTypeError';
        this.path = path;
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * A string value could not be converted to the requested type.
 */
export class JsonValueError extends JsonError {
    readonly path: string;

    constructor(path: string, message: string) {
        super('CONVERSION', `Value at "${path}": ${message}`);
        this.name = 'JsonValueError';
        this.path = path;
    }
}

/**
 * Writer misuse: mismatched close, write without an open construct, or an
 * unsupported combination of options.
 */
export class JsonWriterError extends JsonError {
    constructor(code: 'WRITER_STATE' | 'RESTRICTION', message: string) {
        super(code, message);
        this.name = 'JsonWriterError';
    }
}

/**
 * Failure reading from or allocating a large-text buffer.
 */
export class JsonResourceError extends JsonError {
    readonly offset: number | undefined;
    readonly amount: number | undefined;

    constructor(message: string, chunk?: { offset: number; amount: number }, cause?: unknown) {
        super(
            'RESOURCE',
            chunk ? `next_chunk(ofs=${chunk.offset},amt=${chunk.amount}): ${message}` : message,
            { cause },
        );
        this.name = 'JsonResourceError';
        this.offset = chunk?.offset;
        this.amount = chunk?.amount;
    }
}

/**
 * Options object failed validation.
 */
export class JsonConfigError extends JsonError {
    readonly issues: string[];

    constructor(what: string, issues: string[]) {
        super('CONFIG', `Invalid ${what}: ${issues.join('; ')}`);
        this.name = 'JsonConfigError';
        this.issues = issues;
    }
}
