import { tokenize } from './tokenizer.js';

/**
 * TF-IDF corpus built from short texts (phrases).
 * Fully deterministic: identical input produces identical output.
 */
export interface TfIdfCorpus {
    /** Document ID → TF-IDF vector (term → weight) */
    documents: Map<string, Map<string, number>>;
    /** Term → document frequency (how many documents contain this term) */
    df: Map<string, number>;
    /** Total number of documents */
    size: number;
}

export interface CorpusDocument {
    id: string;
    text: string;
}

/**
 * Build a TF-IDF corpus. Documents without any token are left out.
 */
export function buildCorpus(docs: CorpusDocument[]): TfIdfCorpus {
    const df = new Map<string, number>();
    const documents = new Map<string, Map<string, number>>();

    for (const doc of docs) {
        const tokens = tokenize(doc.text);
        if (tokens.length === 0) continue;

        // Compute term frequency (TF)
        const tf = new Map<string, number>();
        for (const token of tokens) {
            tf.set(token, (tf.get(token) ?? 0) + 1);
        }

        // Normalize TF by the most frequent term
        const maxTf = Math.max(...tf.values());
        const normalizedTf = new Map<string, number>();
        for (const [term, count] of tf) {
            normalizedTf.set(term, count / maxTf);
        }

        documents.set(doc.id, normalizedTf);

        for (const term of new Set(tokens)) {
            df.set(term, (df.get(term) ?? 0) + 1);
        }
    }

    // Compute TF-IDF weights; +1 keeps terms shared by every document above zero
    const N = documents.size;
    for (const [, docTf] of documents) {
        for (const [term, tf] of docTf) {
            const termDf = df.get(term) ?? 1;
            docTf.set(term, tf * (Math.log(N / termDf) + 1));
        }
    }

    return { documents, df, size: N };
}

/**
 * Get the top-N TF-IDF terms from a set of document IDs.
 * Ties are broken alphabetically. Used for group naming.
 */
export function getTopTerms(corpus: TfIdfCorpus, docIds: string[], topN = 3): string[] {
    const termScores = new Map<string, number>();

    for (const docId of docIds) {
        const vector = corpus.documents.get(docId);
        if (!vector) continue;

        for (const [term, weight] of vector) {
            termScores.set(term, (termScores.get(term) ?? 0) + weight);
        }
    }

    return Array.from(termScores.entries())
        .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
        .slice(0, topN)
        .map(([term]) => term);
}
