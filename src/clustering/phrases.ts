import type { Phrase, PhraseInput } from '../types/index.js';
import { ClusteringInputError } from './errors.js';

/**
 * Trim and collapse inner whitespace.
 */
export function cleanText(text: string): string {
    return text.trim().replace(/\s+/g, ' ');
}

/**
 * Identity of a phrase: cleaned and lower-cased.
 */
export function normalizeKey(text: string): string {
    return cleanText(text).toLowerCase();
}

/**
 * Build the immutable phrase set of a session.
 * Blank entries are dropped; duplicates (by key) keep the first spelling and source.
 * @throws ClusteringInputError when nothing usable is left
 */
export function normalizePhrases(inputs: ReadonlyArray<string | PhraseInput>): Phrase[] {
    if (inputs.length === 0) {
        throw new ClusteringInputError('No phrases to cluster');
    }

    const seen = new Set<string>();
    const phrases: Phrase[] = [];

    for (const input of inputs) {
        const raw = typeof input === 'string' ? input : input.text;
        const text = cleanText(raw);
        if (!text) continue;

        const key = text.toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);

        const phrase: Phrase = {
            text,
            key,
            source: typeof input === 'string' ? null : input.source ?? null,
        };
        if (typeof input !== 'string' && input.embedding) {
            phrase.embedding = input.embedding;
        }
        phrases.push(phrase);
    }

    if (phrases.length === 0) {
        throw new ClusteringInputError('All phrases are blank');
    }

    return phrases;
}
