import { l2Normalize } from './vector-math.js';

/**
 * Deterministic character-hash vector used when no embedding model is
 * available. Position i contributes 1/(i+1) to slot `codePoint mod dimension`;
 * the sum is L2-normalized. Empty text maps to the zero vector.
 *
 * Not semantic: it only lets identical or near-identical texts find each other.
 */
export function fallbackEmbedding(text: string, dimension: number): number[] {
    const vector = new Array<number>(dimension).fill(0);
    if (!text) return vector;

    let position = 0;
    for (const ch of text) {
        const code = ch.codePointAt(0) ?? 0;
        const slot = code % dimension;
        vector[slot] = (vector[slot] ?? 0) + 1 / (position + 1);
        position++;
    }
    return l2Normalize(vector);
}
