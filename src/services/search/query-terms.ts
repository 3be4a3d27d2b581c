/**
 * Query normalization and term handling for lexical search.
 */

export const STOP_WORDS: ReadonlySet<string> = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'with', 'by'
]);

// ASCII punctuation: !"#$%&'()*+,-./:;<=>?@[\]^_`{|}~
const PUNCTUATION = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Lowercases, strips ASCII punctuation and collapses whitespace. Idempotent.
 */
export function normalizeQuery(query: string): string {
    return query
        .toLowerCase()
        .replace(PUNCTUATION, '')
        .split(/\s+/)
        .filter((part) => part.length > 0)
        .join(' ');
}

export function extractTerms(normalized: string): Set<string> {
    const terms = new Set<string>();
    for (const token of normalized.split(/\s+/)) {
        if (token.length > 1 && !STOP_WORDS.has(token)) terms.add(token);
    }
    return terms;
}

/**
 * Adds one naive-stemmed variant per term ("-ing", plural "-s", "-ed").
 * Never removes a term.
 */
export function expandTerms(terms: ReadonlySet<string>): Set<string> {
    const expanded = new Set(terms);
    for (const term of terms) {
        let stem: string | null = null;
        if (term.endsWith('ing')) stem = term.slice(0, -3);
        else if (term.endsWith('s') && !term.endsWith('ss')) stem = term.slice(0, -1);
        else if (term.endsWith('ed')) stem = term.slice(0, -2);
        if (stem) expanded.add(stem);
    }
    return expanded;
}
