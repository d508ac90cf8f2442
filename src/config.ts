import { z } from 'zod';
import { JsonConfigError } from './errors.js';

// ============ Schemas ============

export const ParseOptionsSchema = z.object({
    /** Enforce RFC 8259; lax mode accepts unquoted literals and dangling commas */
    strict: z.boolean().default(true),
    /** Treat each chunk of a chunked source as one line when reporting positions */
    lineSeparated: z.boolean().default(false),
});

export const CachePolicySchema = z.enum(['allow', 'forbid', 'omit']);

export const OutputOptionsSchema = z.object({
    /** Send content-type and cache headers before the first top-level open */
    emitHeader: z.boolean().default(true),
    cachePolicy: CachePolicySchema.default('forbid'),
    etag: z.string().min(1).optional(),
    /** 0 writes compact output, N indents each level by N characters */
    indent: z.number().int().min(0).default(0),
});

export const LargeTextOutputOptionsSchema = z.object({
    indent: z.number().int().min(0).default(0),
    /** Memoise the joined text of the output buffer */
    cache: z.boolean().default(true),
});

export const SessionOptionsSchema = z.object({
    logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('warn'),
});

export const FormatOptionsSchema = z.object({
    /** Arguments longer than this are truncated and marked with "~" */
    maxLength: z.number().int().min(1).default(1000),
});

// ============ Types ============

export type ParseOptions = z.input<typeof ParseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof ParseOptionsSchema>;

export type CachePolicy = z.output<typeof CachePolicySchema>;

export type OutputOptions = z.input<typeof OutputOptionsSchema>;
export type ResolvedOutputOptions = z.output<typeof OutputOptionsSchema>;

export type LargeTextOutputOptions = z.input<typeof LargeTextOutputOptionsSchema>;
export type ResolvedLargeTextOutputOptions = z.output<typeof LargeTextOutputOptionsSchema>;

export type SessionOptions = z.input<typeof SessionOptionsSchema>;
export type ResolvedSessionOptions = z.output<typeof SessionOptionsSchema>;

export type FormatOptions = z.input<typeof FormatOptionsSchema>;

// ============ Resolution ============

/**
 * Validate an options bag and fill in defaults.
 * Throws JsonConfigError listing every invalid field.
 */
export function resolveOptions<S extends z.ZodTypeAny>(
    what: string,
    schema: S,
    input: z.input<S> | undefined,
): z.output<S> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${field}: ${issue.message}`;
        });
        throw new JsonConfigError(what, issues);
    }
    return result.data;
}

export const resolveParseOptions = (input?: ParseOptions): ResolvedParseOptions =>
    resolveOptions('parse options', ParseOptionsSchema, input);

export const resolveOutputOptions = (input?: OutputOptions): ResolvedOutputOptions =>
    resolveOptions('output options', OutputOptionsSchema, input);

export const resolveLargeTextOutputOptions = (input?: LargeTextOutputOptions): ResolvedLargeTextOutputOptions =>
    resolveOptions('large text output options', LargeTextOutputOptionsSchema, input);

export const resolveSessionOptions = (input?: SessionOptions): ResolvedSessionOptions =>
    resolveOptions('session options', SessionOptionsSchema, input);
