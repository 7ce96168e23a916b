import { EmbeddingCache } from '../cache/embedding-cache.js';
import { resolveEmbeddingProvider, resolveLlmProvider } from '../providers/index.js';
import type { ClusteringResult, KwClusterConfig, PhraseInput } from '../types/index.js';
import { mergeConfig } from '../utils/config.js';
import { ClusteringOrchestrator, type ClusterContext } from './orchestrator.js';
import type { ClusteringOverrides } from './options.js';

/**
 * Orchestrator wired to the providers and embedding cache named by `config`.
 */
export function createOrchestrator(config: KwClusterConfig): ClusteringOrchestrator {
    return new ClusteringOrchestrator({
        llm: (aiProvider) => resolveLlmProvider({ ...config, clustering: { ...config.clustering, aiProvider } }),
        embeddings: {
            provider: resolveEmbeddingProvider(config),
            cache: config.noCache ? undefined : new EmbeddingCache({ cacheDir: config.cacheDir }),
            chunkSize: config.embedding.chunkSize,
        },
        llmSettings: { temperature: config.llm.temperature, maxTokens: config.llm.maxTokens },
    });
}

/**
 * Cluster phrases with providers taken from the environment and default settings.
 */
export async function cluster(
    phrases: ReadonlyArray<string | PhraseInput>,
    options: ClusteringOverrides = {},
    context: ClusterContext = {}
): Promise<ClusteringResult> {
    const config = mergeConfig({ clustering: options });
    return createOrchestrator(config).cluster(phrases, options, context);
}
