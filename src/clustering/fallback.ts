import type {
    ClusteringOptions,
    EmbeddingLookup,
    EmbeddingProvider,
    EmbeddingVector,
    Phrase,
} from '../types/index.js';
import { UNCLUSTERED_INDEX } from '../types/index.js';
import { buildCorpus, getTopTerms } from '../nlp/tfidf.js';
import { getLogger } from '../utils/logger.js';
import { RetryExhaustedError, describeError, withRetry } from '../utils/retry.js';
import { dbscan } from './dbscan.js';
import { EmbeddingUnavailableError } from './errors.js';
import { GroupRegistry } from './group-registry.js';

export interface EmbeddingSource {
    provider: EmbeddingProvider | null;
    cache?: EmbeddingLookup;
    /** Texts per provider request */
    chunkSize?: number;
}

/**
 * One vector per phrase, in phrase order.
 *
 * Precomputed vectors are used as given, then the cache, then the provider in
 * chunks with retry.
 * @throws EmbeddingUnavailableError when vectors cannot be obtained or are unusable
 */
export async function embedPhrases(
    phrases: readonly Phrase[],
    source: EmbeddingSource,
    retry: Pick<ClusteringOptions, 'maxAttempts' | 'retryBaseDelayMs'>
): Promise<EmbeddingVector[]> {
    const vectors: Array<EmbeddingVector | undefined> = phrases.map((phrase) => phrase.embedding);
    const { provider, cache } = source;

    if (provider && cache) {
        phrases.forEach((phrase, i) => {
            if (vectors[i] === undefined) {
                vectors[i] = cache.get(provider.model, phrase.key) ?? undefined;
            }
        });
    }

    const missing = phrases.flatMap((phrase, i) => (vectors[i] === undefined ? [i] : []));
    if (missing.length > 0) {
        if (!provider) {
            throw new EmbeddingUnavailableError(
                `No embedding provider configured and ${missing.length} phrase(s) have no vector`
            );
        }

        const chunkSize = source.chunkSize ?? 100;
        getLogger().debug({ missing: missing.length, chunkSize, model: provider.model }, 'Fetching embeddings');

        for (let start = 0; start < missing.length; start += chunkSize) {
            const indices = missing.slice(start, start + chunkSize);
            const texts = indices.map((i) => phrases[i]?.text ?? '');

            let fetched: EmbeddingVector[];
            try {
                fetched = await withRetry(() => provider.embed(texts), {
                    attempts: retry.maxAttempts,
                    baseDelayMs: retry.retryBaseDelayMs,
                    label: 'embeddings',
                });
            } catch (error) {
                const cause = error instanceof RetryExhaustedError ? error.lastError : error;
                throw new EmbeddingUnavailableError(`Embedding provider failed: ${describeError(cause)}`, cause);
            }

            if (fetched.length !== indices.length) {
                throw new EmbeddingUnavailableError(
                    `Embedding provider returned ${fetched.length} vector(s) for ${indices.length} phrase(s)`
                );
            }

            indices.forEach((phraseIndex, j) => {
                const vector = fetched[j];
                const phrase = phrases[phraseIndex];
                vectors[phraseIndex] = vector;
                if (vector && phrase) cache?.set(provider.model, phrase.key, vector);
            });
        }
    }

    return checkVectors(vectors);
}

function checkVectors(vectors: ReadonlyArray<EmbeddingVector | undefined>): EmbeddingVector[] {
    const checked: EmbeddingVector[] = [];
    let dimension: number | null = null;

    for (const vector of vectors) {
        if (!vector || vector.length === 0) {
            throw new EmbeddingUnavailableError('Missing embedding vector');
        }
        if (dimension === null) dimension = vector.length;
        if (vector.length !== dimension) {
            throw new EmbeddingUnavailableError(`Inconsistent embedding dimensions: ${dimension} vs ${vector.length}`);
        }
        if (!vector.every(Number.isFinite)) {
            throw new EmbeddingUnavailableError('Embedding contains non-finite values');
        }
        checked.push(vector);
    }
    return checked;
}

/**
 * Cluster the whole phrase set with DBSCAN and name each group after its top terms.
 * @throws EmbeddingUnavailableError
 */
export async function clusterByDensity(
    phrases: readonly Phrase[],
    options: Pick<ClusteringOptions, 'fallback' | 'maxAttempts' | 'retryBaseDelayMs'>,
    source: EmbeddingSource
): Promise<GroupRegistry> {
    const vectors = await embedPhrases(phrases, source, options);
    const labels = dbscan(vectors, options.fallback);

    const membersByLabel = new Map<number, string[]>();
    phrases.forEach((phrase, i) => {
        const label = labels[i] ?? UNCLUSTERED_INDEX;
        const members = membersByLabel.get(label) ?? [];
        members.push(phrase.key);
        membersByLabel.set(label, members);
    });

    const corpus = buildCorpus(phrases.map((phrase) => ({ id: phrase.key, text: phrase.text })));
    const registry = new GroupRegistry([...phrases]);

    const clusterLabels = [...membersByLabel.keys()].filter((label) => label !== UNCLUSTERED_INDEX).sort((a, b) => a - b);
    for (const label of clusterLabels) {
        const members = membersByLabel.get(label) ?? [];
        const terms = getTopTerms(corpus, members, 3);
        const name = terms.length > 0 ? terms.join(' ') : `Group ${label + 1}`;
        const group = registry.createGroup(name, `Density cluster of ${members.length} similar phrases`);
        for (const key of members) registry.assign(key, group.index);
    }
    for (const key of membersByLabel.get(UNCLUSTERED_INDEX) ?? []) {
        registry.assign(key, UNCLUSTERED_INDEX);
    }

    getLogger().info(
        {
            phrases: phrases.length,
            groups: clusterLabels.length,
            noise: membersByLabel.get(UNCLUSTERED_INDEX)?.length ?? 0,
            epsilon: options.fallback.epsilon,
            minSamples: options.fallback.minSamples,
        },
        'Density clustering finished'
    );

    return registry;
}
