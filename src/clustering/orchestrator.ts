import { randomUUID } from 'node:crypto';
import type {
    AiProviderName,
    ClusteringOptions,
    ClusteringResult,
    ClusteringSession,
    ClusteringStrategy,
    FallbackReason,
    Group,
    LlmProvider,
    Phrase,
    PhraseInput,
    QualityMetrics,
    SessionMemory,
    SessionStatus,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/retry.js';
import { BatchEngine } from './batch-engine.js';
import { SessionTimeoutError, StageFailedError } from './errors.js';
import { clusterByDensity, type EmbeddingSource } from './fallback.js';
import { finalizeGroups } from './finalizer.js';
import { GroupRegistry } from './group-registry.js';
import { toLegacyFormat } from './legacy-format.js';
import type { AiCallSettings } from './llm-response.js';
import { buildMemory } from './memory.js';
import { computeQualityMetrics } from './metrics.js';
import { resolveClusteringOptions, type ClusteringOverrides } from './options.js';
import { normalizePhrases } from './phrases.js';
import type { PhraseScorer } from './relatedness.js';
import { planStrategy } from './strategy-planner.js';

export interface OrchestratorDeps {
    /**
     * Model for the planner and batch engine, looked up per call from `aiProvider`.
     * Null routes straight to the fallback.
     */
    llm: (provider: AiProviderName) => LlmProvider | null;
    embeddings: EmbeddingSource;
    llmSettings?: AiCallSettings;
    /** Replaces the finalizer's lexical scorer */
    scorer?: PhraseScorer;
}

export interface ClusterContext {
    /** Parent research task, e.g. the seed keyword */
    taskId?: string | null;
}

/** Groups and metrics produced by either path. */
interface PipelineOutcome {
    /** Null on the fallback path */
    strategy: ClusteringStrategy | null;
    groups: Group[];
    memory: SessionMemory;
    metrics: QualityMetrics;
}

/**
 * Entry point of the clustering pipeline.
 *
 * Runs planner → batches → finalizer under one deadline and answers any
 * unrecoverable AI failure with density clustering over the whole phrase set.
 * Holds no per-session state, so one instance can serve concurrent sessions.
 */
export class ClusteringOrchestrator {
    constructor(private readonly deps: OrchestratorDeps) {}

    /**
     * Cluster phrases into semantic groups.
     * @throws ClusteringInputError for empty input or invalid options
     * @throws EmbeddingUnavailableError when the fallback has no usable vectors
     */
    async cluster(
        inputs: ReadonlyArray<string | PhraseInput>,
        overrides: ClusteringOverrides = {},
        context: ClusterContext = {}
    ): Promise<ClusteringResult> {
        const options = resolveClusteringOptions(overrides);
        const phrases = normalizePhrases(inputs);

        const session: ClusteringSession = {
            id: randomUUID(),
            taskId: context.taskId ?? null,
            phrases,
            strategy: null,
            groups: [],
            memory: { groups: [] },
            status: 'pending',
            provenance: null,
            metrics: null,
            startedAt: new Date().toISOString(),
            finishedAt: null,
            error: null,
        };
        const startTime = Date.now();

        getLogger().info(
            { sessionId: session.id, taskId: session.taskId, phrases: phrases.length, useAi: options.useAiClustering },
            'Clustering started'
        );

        let fallbackReason: FallbackReason | null = null;
        let outcome: PipelineOutcome | null = null;
        const llm = options.useAiClustering ? this.deps.llm(options.aiProvider) : null;

        if (!options.useAiClustering) {
            fallbackReason = 'ai_disabled';
        } else if (!llm || !(await providerAvailable(llm))) {
            fallbackReason = 'provider_unavailable';
        } else {
            try {
                outcome = await this.runWithDeadline(llm, session, phrases, options);
            } catch (error) {
                fallbackReason = classifyFailure(error);
                session.error = describeError(error);
            }
        }

        let result: ClusteringResult;
        if (outcome) {
            result = this.complete(session, phrases, outcome, 'ai_with_memory', null);
        } else {
            getLogger().warn(
                { sessionId: session.id, reason: fallbackReason, error: session.error },
                'Fallback triggered'
            );
            try {
                outcome = await this.runFallback(phrases, options);
            } catch (error) {
                session.status = 'failed';
                session.finishedAt = new Date().toISOString();
                session.error = describeError(error);
                throw error;
            }
            result = this.complete(session, phrases, outcome, 'fallback_density_clustering', fallbackReason);
        }

        getLogger().info(
            {
                sessionId: session.id,
                provenance: result.provenance,
                fallbackReason: result.fallbackReason,
                groups: result.metrics.groupCount,
                outlierRatio: Number(result.metrics.outlierRatio.toFixed(4)),
                qualityGoalAchieved: result.metrics.qualityGoalAchieved,
                durationMs: Date.now() - startTime,
            },
            'Clustering complete'
        );

        return result;
    }

    /**
     * Race the AI path against the session deadline. On expiry the in-flight
     * call is aborted and whatever the AI path still produces is discarded.
     */
    private async runWithDeadline(
        llm: LlmProvider,
        session: ClusteringSession,
        phrases: Phrase[],
        options: ClusteringOptions
    ): Promise<PipelineOutcome> {
        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new SessionTimeoutError(options.sessionTimeoutMs);
                controller.abort(error);
                reject(error);
            }, options.sessionTimeoutMs);
        });

        const setStatus = (status: SessionStatus) => {
            if (!controller.signal.aborted) session.status = status;
        };

        try {
            return await Promise.race([
                this.runAiPath(llm, phrases, options, session.taskId, controller.signal, setStatus),
                deadline,
            ]);
        } finally {
            clearTimeout(timer);
        }
    }

    private async runAiPath(
        llm: LlmProvider,
        phrases: Phrase[],
        options: ClusteringOptions,
        taskId: string | null,
        signal: AbortSignal,
        setStatus: (status: SessionStatus) => void
    ): Promise<PipelineOutcome> {
        const { llmSettings, scorer } = this.deps;

        setStatus('planning');
        const strategy = await planStrategy(phrases, { provider: llm, options, taskId, settings: llmSettings, signal });
        signal.throwIfAborted();

        setStatus('batching');
        const registry = new GroupRegistry(phrases);
        const engine = new BatchEngine({ provider: llm, registry, strategy, options, taskId, settings: llmSettings, signal });
        await engine.run(phrases);
        signal.throwIfAborted();

        setStatus('finalizing');
        const { metrics } = finalizeGroups({
            registry,
            totalPhrases: phrases.length,
            targetRange: strategy.targetGroupRange,
            options,
            scorer,
        });

        return {
            strategy,
            groups: registry.snapshot(),
            memory: buildMemory(registry, options.memoryExamples),
            metrics,
        };
    }

    private async runFallback(phrases: Phrase[], options: ClusteringOptions): Promise<PipelineOutcome> {
        const registry = await clusterByDensity(phrases, options, this.deps.embeddings);
        const metrics = computeQualityMetrics(
            registry.snapshot(),
            phrases.length,
            options.targetGroupRange,
            options.outlierRatioCeiling
        );
        return {
            strategy: null,
            groups: registry.snapshot(),
            memory: buildMemory(registry, options.memoryExamples),
            metrics,
        };
    }

    private complete(
        session: ClusteringSession,
        phrases: Phrase[],
        outcome: PipelineOutcome,
        provenance: ClusteringResult['provenance'],
        fallbackReason: FallbackReason | null
    ): ClusteringResult {
        session.strategy = outcome.strategy;
        session.groups = outcome.groups;
        session.memory = outcome.memory;
        session.metrics = outcome.metrics;
        session.provenance = provenance;
        session.status = 'completed';
        session.finishedAt = new Date().toISOString();

        return {
            ...toLegacyFormat(phrases, outcome.groups, outcome.metrics),
            sessionId: session.id,
            provenance,
            strategy: outcome.strategy,
            fallbackReason,
            session,
        };
    }
}

async function providerAvailable(llm: LlmProvider): Promise<boolean> {
    try {
        return await llm.isAvailable();
    } catch (error) {
        getLogger().warn({ provider: llm.name, error: describeError(error) }, 'Provider availability check failed');
        return false;
    }
}

/**
 * Map an AI path failure to a fallback reason. Anything else is a bug and is rethrown.
 */
function classifyFailure(error: unknown): FallbackReason {
    if (error instanceof SessionTimeoutError) return 'session_timeout';
    if (error instanceof StageFailedError) {
        return error.stage === 'strategy' ? 'strategy_failed' : 'batch_failed';
    }
    throw error;
}
