/**
 * Barrel export for all shared types.
 */
export type { Phrase, PhraseInput, EmbeddingVector } from './phrase.js';
export { UNCLUSTERED_INDEX, UNCLUSTERED_NAME } from './group.js';
export type {
    Group,
    GroupCountRange,
    ClusteringStrategy,
    MemoryGroup,
    SessionMemory,
    QualityMetrics,
} from './group.js';
export type {
    ClusteringSession,
    SessionStatus,
    Provenance,
    FallbackReason,
    LegacyGroup,
    LegacyClusterOutput,
    ClusteringResult,
} from './session.js';
export { DEFAULT_CONFIG, DEFAULT_CLUSTERING_OPTIONS } from './config.js';
export type {
    KwClusterConfig,
    ClusteringOptions,
    FallbackOptions,
    LlmConfig,
    EmbeddingConfig,
    LogLevel,
} from './config.js';
export type { EmbeddingProvider, EmbeddingProviderOptions, EmbeddingLookup } from './embedding-provider.js';
export type {
    AiProviderName,
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
export type { SessionRecord, GroupRecord, GroupMemberRecord } from './storage.js';
