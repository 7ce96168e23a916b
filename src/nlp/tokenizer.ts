import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into an array of lowercase tokens.
 * - Lowercase
 * - Split on whitespace and punctuation (letters of any script are kept)
 * - Remove stopwords
 * - Remove single-character tokens
 * - No stemming (deterministic)
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s-]/gu, ' ')  // Remove punctuation except hyphens
        .split(/\s+/)
        .map((token) => token.replace(/^-+|-+$/g, ''))  // Trim hyphens at edges
        .filter((token) =>
            token.length > 1 &&
            !STOPWORDS.has(token) &&
            !/^\d+$/.test(token)  // Remove pure numbers
        );
}

/**
 * Distinct tokens of a text, in first-seen order.
 */
export function uniqueTokens(text: string): string[] {
    return Array.from(new Set(tokenize(text)));
}
