import { describe, it, expect } from 'vitest';
import { JsonTypeError, JsonWriterError } from '../src/errors.js';
import { collectPlaceholders, link, substitute } from '../src/core/links.js';
import { captureText, rowSet, rowSetToXml, structured } from '../src/core/rowset.js';
import { xmlTextToJson, xmlToJson } from '../src/core/xml-to-json.js';
import type { Column } from '../src/types.js';
import { createWriter } from './helpers.js';

const PEOPLE: Column[] = [
    { name: 'ID', type: 'number' },
    { name: 'NAME', type: 'string' },
    { name: 'ACTIVE', type: 'string' },
    { name: 'CREATED', type: 'date' },
];

describe('writeRows', () => {
    it('writes one object per row and skips nulls', () => {
        let closed = 0;
        const rows = rowSet(
            PEOPLE,
            [
                [1, 'Ada', 'TRUE', new Date(Date.UTC(2024, 0, 2, 3, 4, 5))],
                [2, null, 'false', null],
            ],
            () => closed++,
        );
        const { writer, target } = createWriter();
        writer.writeRows(rows);

        expect(target.text).toBe(
            '[\n{\n"ID":1\n,"NAME":"Ada"\n,"ACTIVE":true\n,"CREATED":"2024-01-02T03:04:05Z"\n}\n' +
                ',{\n"ID":2\n,"ACTIVE":false\n}\n]\n',
        );
        expect(closed).toBe(1);
    });

    it('writes zoned timestamps, large text and element columns', () => {
        const rows = rowSet(
            [
                { name: 'AT', type: 'timestamp-tz' },
                { name: 'BODY', type: 'large-text' },
                { name: 'DOC', type: 'xml' },
            ],
            [[{ instant: new Date('2024-03-01T12:30:00.000Z'), offsetMinutes: 60 }, 'long', { name: 'A', text: 'x' }]],
        );
        const { writer, target } = createWriter();
        writer.openObject();
        writer.writeRows(rows, 'data');
        writer.closeObject();

        expect(JSON.parse(target.text)).toEqual({
            data: [{ AT: '2024-03-01T13:30:00.000+01:00', BODY: 'long', DOC: 'x' }],
        });
    });

    it('rejects cells that do not match their column type and still closes', () => {
        let closed = 0;
        const rows = rowSet([{ name: 'N', type: 'number' }], [['x']], () => closed++);
        const { writer } = createWriter();

        expect(() => writer.writeRows(rows)).toThrow(new JsonTypeError('N', 'number', 'string'));
        expect(closed).toBe(1);
    });

    describe('nested columns', () => {
        const nested = (): { rows: ReturnType<typeof rowSet>; closed: string[] } => {
            const closed: string[] = [];
            const kids = rowSet([{ name: 'N', type: 'string' }], [['x'], ['y']], () => closed.push('kids'));
            const rows = rowSet(
                [
                    { name: 'ID', type: 'number' },
                    { name: 'KIDS', type: 'rowset' },
                ],
                [[1, kids]],
                () => closed.push('rows'),
            );
            return { rows, closed };
        };

        it('writes through the element tree', () => {
            const { rows, closed } = nested();
            const { writer, target } = createWriter();
            writer.openObject();
            writer.writeRows(rows, 'data');
            writer.closeObject();

            expect(target.text).toBe('{\n"data":[{"ID":1,"KIDS":[{"N":"x"},{"N":"y"}]}]\n}\n');
            expect(closed).toEqual(['kids', 'rows']);
        });

        it('writes at the top level', () => {
            const { rows } = nested();
            const { writer, target } = createWriter();
            writer.writeRows(rows);

            expect(target.text).toBe('[{"ID":1,"KIDS":[{"N":"x"},{"N":"y"}]}]\n');
        });

        it('writes an empty array for an empty row set', () => {
            const rows = rowSet([{ name: 'KIDS', type: 'rowset' }], []);
            const { writer, target } = createWriter();
            writer.openObject();
            writer.writeRows(rows, 'data');
            writer.closeObject();

            expect(target.text).toBe('{\n"data":[\n]\n}\n');
        });

        it('maps structured values to objects', () => {
            const rows = rowSet([{ name: 'ADDR', type: 'object' }], [[structured({ CITY: 'Oslo', ZIP: 150 })]]);
            const { writer, target } = createWriter();
            writer.openObject();
            writer.writeRows(rows, 'data');
            writer.closeObject();

            expect(JSON.parse(target.text)).toEqual({ data: [{ ADDR: { CITY: 'Oslo', ZIP: 150 } }] });
        });

        it('cannot be combined with links', () => {
            const { rows, closed } = nested();
            const { writer } = createWriter();

            let error: unknown;
            try {
                writer.writeItems(rows, [link('/x/#ID#', 'self')]);
            } catch (caught) {
                error = caught;
            }
            expect(error).toBeInstanceOf(JsonWriterError);
            expect(error instanceof JsonWriterError && error.code).toBe('RESTRICTION');
            expect(closed).toEqual(['rows']);
        });
    });
});

describe('links', () => {
    it('writes items with row links and collection links', () => {
        const rows = rowSet(
            [
                { name: 'ID', type: 'number' },
                { name: 'NAME', type: 'string' },
            ],
            [
                [7, 'a'],
                [8, 'b'],
            ],
        );
        const { writer, target } = createWriter();
        writer.writeItems(rows, [link('/things/#ID#', 'self')], [link('/things', 'collection', { method: 'GET' })]);

        expect(writer.level).toBe(0);
        expect(JSON.parse(target.text)).toEqual({
            items: [
                { ID: 7, NAME: 'a', links: [{ href: '/things/7', rel: 'self' }] },
                { ID: 8, NAME: 'b', links: [{ href: '/things/8', rel: 'self' }] },
            ],
            links: [{ href: '/things', rel: 'collection', method: 'GET' }],
        });
    });

    it('substitutes an empty string for null columns', () => {
        const rows = rowSet([{ name: 'ID', type: 'number' }], [[null]]);
        const { writer, target } = createWriter();
        writer.writeItems(rows, [link('/things/#ID#', 'self', { templated: true })]);

        expect(JSON.parse(target.text)).toEqual({
            items: [{ links: [{ href: '/things/', rel: 'self', templated: true }] }],
        });
    });

    it('collects distinct placeholders in order', () => {
        expect(collectPlaceholders([link('/a/#ID#/#ID#', 'self'), link('/b/#NAME#', 'x')])).toEqual(['ID', 'NAME']);
    });

    it('substitutes every occurrence', () => {
        expect(substitute('/a/#ID#/#ID#', new Map([['ID', '7']]))).toBe('/a/7/7');
    });

    it('captures dates without fractional seconds', () => {
        expect(captureText('date', new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00Z');
        expect(captureText('number', 0.5)).toBe('0.5');
        expect(captureText('string', null)).toBe('');
    });
});

describe('xml to json', () => {
    it('converts leaf text by its look', () => {
        expect(xmlTextToJson('')).toBe('null');
        expect(xmlTextToJson('13')).toBe('13');
        expect(xmlTextToJson('-0.5')).toBe('-0.5');
        expect(xmlTextToJson('.5')).toBe('0.5');
        expect(xmlTextToJson('-.5')).toBe('-0.5');
        expect(xmlTextToJson('0123')).toBe('"0123"');
        expect(xmlTextToJson('12.')).toBe('"12."');
        expect(xmlTextToJson('TRUE')).toBe('true');
        expect(xmlTextToJson('abc')).toBe('"abc"');
    });

    it('writes attributes and mixed text as members', () => {
        expect(xmlToJson({ name: 'A', attributes: { id: '5' }, text: 'hi' })).toBe('{"@id":5,"@text":"hi"}');
    });

    it('writes a single child as an object member', () => {
        expect(xmlToJson({ name: 'A', children: [{ name: 'B', text: 'x' }] })).toBe('{"B":"x"}');
    });

    it('writes repeated children as an array', () => {
        expect(xmlToJson({ name: 'L', children: [{ name: 'I', text: '1' }, { name: 'I' }] })).toBe('[1,null]');
    });

    it('builds the element tree of a row set', () => {
        const rows = rowSet([{ name: 'ID', type: 'number' }, { name: 'OPT', type: 'string' }], [[1, null]]);
        expect(rowSetToXml(rows)).toEqual({
            name: 'ROWSET',
            children: [{ name: 'ROW', children: [{ name: 'ID', text: '1' }] }],
        });
    });
});
