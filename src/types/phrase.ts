/**
 * A fixed-dimension embedding of one phrase. Produced once per phrase and never mutated.
 */
export type EmbeddingVector = readonly number[];

/**
 * Phrase: one keyword/query taking part in a clustering session.
 * Identity is the normalized `key`, so the same query collected from two sources
 * appears once.
 */
export interface Phrase {
    /** Raw text as first seen (trimmed, inner whitespace collapsed) */
    text: string;

    /** Normalized identity: lower-cased, trimmed, whitespace collapsed */
    key: string;

    /** Collection the phrase came from (e.g. 'keyword_relations', 'autocomplete') */
    source: string | null;

    /** Precomputed embedding, when the caller already has one */
    embedding?: EmbeddingVector;
}

/**
 * Phrase as accepted from callers before normalization.
 */
export interface PhraseInput {
    text: string;
    source?: string | null;
    embedding?: EmbeddingVector;
}
