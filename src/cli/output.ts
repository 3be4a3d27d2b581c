import type { ScoredDocument } from '../types/index.js';

/**
 * CLI output. Results go to stdout as JSON; diagnostics go to stderr, so
 * `kbase search ... | jq` sees only data.
 */

export interface ResultRow {
    key: string;
    title: string;
    score: number;
}

export function toResultRows(results: ScoredDocument[]): ResultRow[] {
    return results.map(({ document, score }) => ({ key: document.key, title: document.title, score }));
}

export function writeJson(data: unknown): void {
    process.stdout.write(`${JSON.stringify(data, null, 2)}\n`);
}

export function writeError(message: string): void {
    process.stderr.write(`Error: ${message}\n`);
}
