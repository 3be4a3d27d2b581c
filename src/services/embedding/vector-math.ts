import { KnowledgeBaseError } from '../../types/index.js';

function assertSameLength(a: number[], b: number[]): void {
    if (a.length !== b.length) {
        throw new KnowledgeBaseError(
            `Embeddings must have the same dimensions (got ${a.length} and ${b.length})`,
            'INVALID_EMBEDDING_DIMENSION',
            400
        );
    }
}

export function l2Norm(vector: number[]): number {
    let sum = 0;
    for (const v of vector) sum += v * v;
    return Math.sqrt(sum);
}

/**
 * Scales a vector to unit length. The zero vector is returned unchanged.
 */
export function l2Normalize(vector: number[]): number[] {
    const norm = l2Norm(vector);
    if (norm === 0) return vector.slice();
    return vector.map((v) => v / norm);
}

/**
 * Cosine similarity; 0 when either vector has zero norm.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
    assertSameLength(a, b);
    let dot = 0, n1 = 0, n2 = 0;
    a.forEach((x, i) => {
        const y = b[i] ?? 0;
        dot += x * y; n1 += x * x; n2 += y * y;
    });
    const mag = Math.sqrt(n1) * Math.sqrt(n2);
    return mag === 0 ? 0 : dot / mag;
}

export function euclideanDistance(a: number[], b: number[]): number {
    assertSameLength(a, b);
    let sum = 0;
    a.forEach((x, i) => {
        const d = x - (b[i] ?? 0);
        sum += d * d;
    });
    return Math.sqrt(sum);
}

/**
 * Short printable form of a vector for logs, e.g. `[0.1, 0.2, ... ] (length: 384)`.
 */
export function truncateForDisplay(vector: number[], maxElements = 20): string {
    if (vector.length === 0) return '[]';
    if (vector.length <= maxElements) return `[${vector.map(String).join(', ')}]`;
    const head = vector.slice(0, maxElements).map(String).join(', ');
    return `[${head}, ... ] (length: ${vector.length})`;
}
