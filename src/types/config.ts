import type { GroupCountRange } from './group.js';
import type { AiProviderName } from './llm-provider.js';

/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Density clustering parameters for the fallback path.
 */
export interface FallbackOptions {
    /** DBSCAN radius, as cosine distance (1 - cosine similarity) */
    epsilon: number;
    /** Neighbours (the point itself included) needed for a core point */
    minSamples: number;
}

/**
 * Options recognised by `cluster()`.
 */
export interface ClusteringOptions {
    useAiClustering: boolean;
    aiProvider: AiProviderName;
    targetGroupRange: GroupCountRange;
    batchSize: number;
    minGroupSize: number;
    outlierRatioCeiling: number;
    sampleSize: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    sessionTimeoutMs: number;
    memoryExamples: number;
    redistributionThreshold: number;
    mergeThreshold: number;
    mergeSimilarNames: boolean;
    fallback: FallbackOptions;
}

/**
 * Per-backend model and endpoint settings.
 */
export interface LlmConfig {
    openaiModel: string;
    anthropicModel: string;
    ollamaModel: string;
    ollamaBaseUrl: string;
    temperature: number;
    maxTokens: number;
}

/**
 * Embedding provider settings.
 */
export interface EmbeddingConfig {
    provider: 'openai' | 'ollama';
    model: string;
    dimensions?: number;
    /** Texts per embedding request */
    chunkSize: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface KwClusterConfig {
    /** SQLite database path */
    out: string;

    /** Research task the phrases belong to (e.g. seed keyword) */
    seed?: string;

    // Cache
    cacheDir: string;
    noCache: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    clustering: ClusteringOptions;
    llm: LlmConfig;
    embedding: EmbeddingConfig;
}

/**
 * Default clustering options.
 */
export const DEFAULT_CLUSTERING_OPTIONS: ClusteringOptions = {
    useAiClustering: true,
    aiProvider: 'openai',
    targetGroupRange: { min: 8, max: 12 },
    batchSize: 25,
    minGroupSize: 3,
    outlierRatioCeiling: 0.35,
    sampleSize: 30,
    maxAttempts: 3,
    retryBaseDelayMs: 1000,
    sessionTimeoutMs: 300_000,
    memoryExamples: 3,
    redistributionThreshold: 0.5,
    mergeThreshold: 0.25,
    mergeSimilarNames: false,
    fallback: {
        epsilon: 0.3,
        minSamples: 2,
    },
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: KwClusterConfig = {
    out: './kwcluster.db',
    cacheDir: '.kwcluster-cache',
    noCache: false,
    logLevel: 'info',
    jsonLogs: false,
    clustering: DEFAULT_CLUSTERING_OPTIONS,
    llm: {
        openaiModel: 'gpt-4o',
        anthropicModel: 'claude-sonnet-4-20250514',
        ollamaModel: 'llama3.1',
        ollamaBaseUrl: 'http://localhost:11434',
        temperature: 0.2,
        maxTokens: 4096,
    },
    embedding: {
        provider: 'openai',
        model: 'text-embedding-3-small',
        dimensions: 512,
        chunkSize: 100,
    },
};
