import type { Link } from '../types.js';

export interface LinkOptions {
    templated?: boolean;
    mediaType?: string;
    method?: string;
    profile?: string;
}

/**
 * Build a link descriptor. `href` may reference row columns as `#NAME#`.
 *
 * @example
 * ```ts
 * link('/orders/#ID#', 'self');
 * link('/orders{?page}', 'search', { templated: true });
 * ```
 */
export function link(href: string, rel: string, options: LinkOptions = {}): Link {
    return { href, rel, ...options };
}

const PLACEHOLDER = /#([^#]+)#/g;

/**
 * Distinct placeholder names referenced by the hrefs, in order of first use.
 */
export function collectPlaceholders(links: readonly Link[]): string[] {
    const names: string[] = [];
    for (const { href } of links) {
        for (const match of href.matchAll(PLACEHOLDER)) {
            if (!names.includes(match[1])) names.push(match[1]);
        }
    }
    return names;
}

/**
 * Replace every `#name#` in `href` with its substitution.
 */
export function substitute(href: string, substitutions: ReadonlyMap<string, string>): string {
    let result = href;
    for (const [name, value] of substitutions) {
        result = result.split(`#${name}#`).join(value);
    }
    return result;
}
