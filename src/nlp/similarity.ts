import type { EmbeddingVector } from '../types/index.js';

/**
 * Cosine similarity between two dense vectors of equal length.
 * Returns 0 when either vector has zero norm.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
        throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dotProduct += x * y;
        normA += x * x;
        normB += y * y;
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    if (denominator === 0) return 0;

    return dotProduct / denominator;
}

/**
 * Cosine distance, `1 - cosineSimilarity`, in [0, 2].
 */
export function cosineDistance(a: EmbeddingVector, b: EmbeddingVector): number {
    return 1 - cosineSimilarity(a, b);
}

/**
 * Whether two group names describe the same theme: they share at least 40% of
 * the words of the shorter name, or one name contains the other.
 */
export function namesAreSimilar(nameA: string, nameB: string): boolean {
    const a = nameA.trim().toLowerCase();
    const b = nameB.trim().toLowerCase();
    if (!a || !b) return false;

    const wordsA = new Set(a.split(/\s+/));
    const wordsB = new Set(b.split(/\s+/));
    const common = [...wordsA].filter((word) => wordsB.has(word)).length;

    if (common > 0) {
        return common / Math.min(wordsA.size, wordsB.size) >= 0.4;
    }
    return a.includes(b) || b.includes(a);
}
