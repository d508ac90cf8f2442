export { JsonSession, type JsonSessionOptions, type TableOptions } from './session.js';

export {
    JsonError,
    JsonParseError,
    JsonTypeError,
    JsonValueError,
    JsonWriterError,
    JsonResourceError,
    JsonConfigError,
    type JsonErrorCode,
} from './errors.js';

export { createConsoleLogger, silentLogger, type Logger, type LogLevel, type LogContext } from './logger.js';

export {
    resolveOptions,
    type ParseOptions,
    type OutputOptions,
    type LargeTextOutputOptions,
    type SessionOptions,
    type FormatOptions,
    type CachePolicy,
} from './config.js';

export { LargeText } from './core/large-text.js';
export { CharReader, pageText, toChunks } from './core/reader.js';
export type { CharRun } from './core/reader.js';
export { Lexer, type Token } from './core/lexer.js';
export { parse, parseDocument, clearTable, TableVisitor, type ParseVisitor, type Slot, type ScalarValue } from './core/parser.js';
export { toXml, toXmlSql, fixXmlName, XmlVisitor } from './core/xml.js';
export { formatPath, memberPath, elementPath, matchesLike, type PathArg } from './core/path.js';
export {
    exists,
    getValue,
    getBoolean,
    getNumber,
    getString,
    getLargeText,
    getDate,
    getTimestamp,
    getTimestampTz,
    getCount,
    getMembers,
    getArrayOfString,
    getArrayOfNumber,
    type AccessOptions,
    type DefaultedAccessOptions,
} from './core/accessors.js';
export { findPathsLike, splitQuery } from './core/find.js';
export { escapeJson, escapeHtml, stringify, stringifyNumber } from './core/escape.js';
export { formatDate, formatZoned, parseIsoTimestamp } from './core/dates.js';
export {
    BufferedWriter,
    StreamWriter,
    LargeTextWriter,
    outputHeaders,
    type Sink,
    type OutputTarget,
} from './core/sink.js';
export { JsonWriter, type JsonWriterOptions, type WriteOptions, type WriteParsedOptions } from './core/writer.js';
export { rowSet, structured, rowSetToXml } from './core/rowset.js';
export { link, type LinkOptions } from './core/links.js';
export { xmlToJson, xmlTextToJson } from './core/xml-to-json.js';

export {
    ROOT_PATH,
    type Value,
    type ValueKind,
    type ValueTable,
    type JsonSource,
    type TokenType,
    type SourcePosition,
    type ZonedTimestamp,
    type DateFormat,
    type XmlElement,
    type Column,
    type ColumnType,
    type CellValue,
    type RowSet,
    type StructuredValue,
    type Link,
    type NestingMarker,
    type WritableValue,
} from './types.js';
