import { readFileSync } from 'node:fs';

/**
 * Stopword lists per language, loaded once from data/stopwords.json.
 * No stemming, so tokenization stays deterministic.
 */
const STOPWORDS_PATH = new URL('../../data/stopwords.json', import.meta.url);

function loadStopwords(): ReadonlySet<string> {
    const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_PATH, 'utf-8'));
    const words = new Set<string>();
    if (typeof parsed !== 'object' || parsed === null) return words;

    for (const list of Object.values(parsed)) {
        if (!Array.isArray(list)) continue;
        for (const word of list) {
            if (typeof word === 'string') words.add(word.toLowerCase());
        }
    }
    return words;
}

export const STOPWORDS: ReadonlySet<string> = loadStopwords();
