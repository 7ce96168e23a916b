import type { EmbeddingVector } from './phrase.js';

/**
 * Interface for embedding providers (OpenAI, Ollama, etc.).
 */
export interface EmbeddingProvider {
    /** Provider name */
    readonly name: string;

    /** Model identifier, part of the cache key */
    readonly model: string;

    /**
     * Embed several texts in one request.
     * Returns one vector per input, in input order.
     */
    embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]>;
}

/**
 * Embedding provider initialization options.
 */
export interface EmbeddingProviderOptions {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    /** Requested output dimensions, where the provider supports it */
    dimensions?: number;
}

/**
 * Persistent vector store consulted before calling an embedding provider.
 */
export interface EmbeddingLookup {
    get(model: string, text: string): EmbeddingVector | null;
    set(model: string, text: string, vector: EmbeddingVector): void;
}
