import { afterEach, describe, it, expect, vi } from 'vitest';
import {
    resolveLargeTextOutputOptions,
    resolveOutputOptions,
    resolveParseOptions,
    resolveSessionOptions,
} from '../src/config.js';
import { JsonConfigError } from '../src/errors.js';
import { createConsoleLogger } from '../src/logger.js';

describe('option resolution', () => {
    it('fills in defaults', () => {
        expect(resolveParseOptions()).toEqual({ strict: true, lineSeparated: false });
        expect(resolveOutputOptions({})).toEqual({ emitHeader: true, cachePolicy: 'forbid', indent: 0 });
        expect(resolveLargeTextOutputOptions()).toEqual({ indent: 0, cache: true });
        expect(resolveSessionOptions()).toEqual({ logLevel: 'warn' });
    });

    it('keeps given values', () => {
        expect(resolveOutputOptions({ cachePolicy: 'allow', etag: 'abc', indent: 3 })).toEqual({
            emitHeader: true,
            cachePolicy: 'allow',
            etag: 'abc',
            indent: 3,
        });
    });

    it('lists every invalid field', () => {
        let error: unknown;
        try {
            resolveOutputOptions({ etag: '', indent: 1.5 });
        } catch (caught) {
            error = caught;
        }

        expect(error).toBeInstanceOf(JsonConfigError);
        if (error instanceof JsonConfigError) {
            expect(error.code).toBe('CONFIG');
            expect(error.issues).toHaveLength(2);
            expect(error.issues[0]).toMatch(/^etag: /);
            expect(error.issues[1]).toMatch(/^indent: /);
            expect(error.message).toMatch(/^Invalid output options: etag: /);
        }
    });
});

describe('createConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes labelled JSON entries at or above its level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const logger = createConsoleLogger('info', 'test');

        logger.debug('hidden');
        logger.info('hello', { n: 1 });

        expect(log).toHaveBeenCalledTimes(1);
        const line = String(log.mock.calls[0][0]);
        expect(line.startsWith('test: ')).toBe(true);
        expect(JSON.parse(line.slice('test: '.length))).toMatchObject({
            level: 'info',
            message: 'hello',
            context: { n: 1 },
        });
    });

    it('routes warnings and errors to their console methods', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const logger = createConsoleLogger('warn');

        logger.warn('careful');
        logger.error('broken');

        expect(warn).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledTimes(1);
        expect(String(warn.mock.calls[0][0]).startsWith('pathjson: ')).toBe(true);
    });

    it('drops everything when silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        createConsoleLogger('silent').error('nothing');
        expect(error).not.toHaveBeenCalled();
    });
});
