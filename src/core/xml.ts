import { resolveParseOptions, type ParseOptions } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { ROOT_PATH, type JsonSource } from '../types.js';
import { escapeHtml, stringifyNumber } from './escape.js';
import { isPlainName } from './path.js';
import { parseDocument, type ParseVisitor, type ScalarValue, type Slot } from './parser.js';
import { CharReader, toChunks } from './reader.js';
import { LargeTextWriter, type BufferedWriter } from './sink.js';

const XML_PROLOG = '<?xml version="1.0" encoding="UTF-8"?>';
const ROOT_TAG = 'json';
const ROW_TAG = 'row';
const LARGE_TEXT_SLICE = 4000;

/**
 * Turn a member name into a usable element name: a leading `-` becomes
 * `_`, then every character outside `[A-Za-z0-9_-]` becomes `_`.
 */
export function fixXmlName(name: string): string {
    if (name.length === 0) return '_';
    return name.replace(/^-/, '_').replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Emits the XML isomorphism of the document: `<json>` for the root, one
 * element per member, `<row>` per array element. Nulls produce nothing.
 */
export class XmlVisitor implements ParseVisitor {
    private readonly out: BufferedWriter;

    constructor(out: BufferedWriter) {
        this.out = out;
    }

    beginObject(slot: Slot): void {
        this.open(slot);
    }

    endObject(slot: Slot): void {
        this.close(slot);
    }

    beginArray(slot: Slot): void {
        this.open(slot);
    }

    endArray(slot: Slot): void {
        this.close(slot);
    }

    scalar(slot: Slot, value: ScalarValue): void {
        const tag = tagOf(slot);
        switch (value.kind) {
            case 'null':
                return;
            case 'true':
            case 'false':
                this.out.write(`<${tag}>${value.kind}`);
                break;
            case 'number':
                this.out.write(`<${tag}>${stringifyNumber(value.number)}`);
                break;
            case 'string':
                this.out.write(`<${tag}>${escapeHtml(value.string)}`);
                break;
            case 'large-text':
                this.out.write(`<${tag}>`);
                for (const slice of value.text.chunks(LARGE_TEXT_SLICE)) {
                    this.out.write(escapeHtml(slice));
                }
                value.text.free();
                break;
        }
        this.out.writeLine(`</${tag}>`);
    }

    private open(slot: Slot): void {
        if (slot.path === ROOT_PATH) {
            this.out.writeLine(XML_PROLOG);
        }
        this.out.write(`<${tagOf(slot)}>`);
    }

    private close(slot: Slot): void {
        this.out.writeLine(`</${tagOf(slot)}>`);
    }
}

function tagOf(slot: Slot): string {
    if (slot.path === ROOT_PATH) return ROOT_TAG;
    if (slot.name === null) return ROW_TAG;
    return isPlainName(slot.name) ? slot.name : fixXmlName(slot.name);
}

/**
 * Convert JSON text to its XML isomorphism. Empty input gives an empty
 * string.
 *
 * @example
 * ```ts
 * toXml('{"a":[1,null]}');
 * // <?xml version="1.0" encoding="UTF-8"?>
 * // <json><a><row>1</row>
 * // </a>
 * // </json>
 * ```
 */
export function toXml(source: JsonSource, options?: ParseOptions, logger: Logger = silentLogger): string {
    const { strict, lineSeparated } = resolveParseOptions(options);
    const writer = new LargeTextWriter({}, logger);
    try {
        parseDocument(new CharReader(toChunks(source), { lineSeparated }), new XmlVisitor(writer), { strict, logger });
        return writer.getValue().toString();
    } finally {
        writer.dispose();
    }
}

/**
 * `toXml` with the strict flag given as 'Y' or 'N'.
 */
export function toXmlSql(source: JsonSource, strict: 'Y' | 'N' = 'Y', logger?: Logger): string {
    return toXml(source, { strict: strict === 'Y' }, logger);
}
