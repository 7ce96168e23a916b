/**
 * Public API of kwcluster.
 */
export { cluster, createOrchestrator } from './clustering/index.js';
export { ClusteringOrchestrator } from './clustering/orchestrator.js';
export type { OrchestratorDeps, ClusterContext } from './clustering/orchestrator.js';
export type { ClusteringOverrides } from './clustering/options.js';
export { resolveClusteringOptions } from './clustering/options.js';
export {
    ClusteringInputError,
    EmbeddingUnavailableError,
    ResponseValidationError,
    SessionTimeoutError,
    StageFailedError,
} from './clustering/errors.js';
export { toLegacyFormat } from './clustering/legacy-format.js';
export { dbscan } from './clustering/dbscan.js';
export { EmbeddingCache } from './cache/embedding-cache.js';
export { ClusterDatabase } from './storage/database.js';
export { exportSession, renderExport, type ExportFormat } from './exporters/export.js';
export {
    AnthropicProvider,
    OllamaEmbeddingProvider,
    OllamaProvider,
    OpenAiEmbeddingProvider,
    OpenAiProvider,
    ProviderChain,
    resolveEmbeddingProvider,
    resolveLlmProvider,
} from './providers/index.js';
export { initLogger } from './utils/logger.js';
export * from './types/index.js';
