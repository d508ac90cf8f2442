import { describe, it, expect } from 'vitest';
import { JsonParseError } from '../src/errors.js';
import { fixXmlName, toXml, toXmlSql } from '../src/core/xml.js';

const PROLOG = '<?xml version="1.0" encoding="UTF-8"?>\n';

describe('toXml', () => {
    it('maps members to elements and array elements to rows', () => {
        expect(toXml('{"a":[1,null]}')).toBe(`${PROLOG}<json><a><row>1</row>\n</a>\n</json>\n`);
    });

    it('escapes text and fixes element names', () => {
        expect(toXml('{"my key":"a<b","-x":true}')).toBe(
            `${PROLOG}<json><my_key>a&lt;b</my_key>\n<_x>true</_x>\n</json>\n`,
        );
    });

    it('names an array root json', () => {
        expect(toXml('[{"n":2.5}]')).toBe(`${PROLOG}<json><row><n>2.5</n>\n</row>\n</json>\n`);
    });

    it('writes long strings in full', () => {
        const text = 'q'.repeat(9000);
        expect(toXml(`{"s":"${text}"}`)).toBe(`${PROLOG}<json><s>${text}</s>\n</json>\n`);
    });

    it('returns an empty string for empty input', () => {
        expect(toXml('')).toBe('');
    });

    it('takes the strict flag as Y or N', () => {
        expect(toXmlSql('{a:1}', 'N')).toBe(`${PROLOG}<json><a>1</a>\n</json>\n`);
        expect(() => toXmlSql('{a:1}', 'Y')).toThrow(JsonParseError);
    });
});

describe('fixXmlName', () => {
    it('replaces characters outside the element name set', () => {
        expect(fixXmlName('-a.b c')).toBe('_a_b_c');
        expect(fixXmlName('ok-name_1')).toBe('ok-name_1');
    });

    it('gives an underscore for an empty name', () => {
        expect(fixXmlName('')).toBe('_');
    });
});
