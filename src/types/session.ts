import type { Phrase } from './phrase.js';
import type { ClusteringStrategy, Group, QualityMetrics, SessionMemory } from './group.js';

export type SessionStatus = 'pending' | 'planning' | 'batching' | 'finalizing' | 'completed' | 'failed';

/** Which pipeline path produced a result. */
export type Provenance = 'ai_with_memory' | 'fallback_density_clustering';

/** Why a session was routed to the fallback clusterer. */
export type FallbackReason =
    | 'ai_disabled'
    | 'provider_unavailable'
    | 'strategy_failed'
    | 'batch_failed'
    | 'session_timeout';

/**
 * ClusteringSession: one run over one phrase set.
 */
export interface ClusteringSession {
    id: string;
    /** Parent research task (e.g. the seed keyword) */
    taskId: string | null;
    phrases: Phrase[];
    strategy: ClusteringStrategy | null;
    /** Groups ordered by index, unclustered bucket first */
    groups: Group[];
    memory: SessionMemory;
    status: SessionStatus;
    provenance: Provenance | null;
    metrics: QualityMetrics | null;
    startedAt: string;
    finishedAt: string | null;
    error: string | null;
}

/**
 * One group in the flat format consumed by storage and reporting.
 */
export interface LegacyGroup {
    label: number;
    name: string;
    description: string;
    phrases: string[];
    size: number;
}

/**
 * Flat label format: phrase → label plus group metadata.
 */
export interface LegacyClusterOutput {
    /** Labels aligned with the session's phrase order */
    labels: number[];
    /** Phrase text → label */
    phraseLabels: Record<string, number>;
    /** Label → group name (unclustered bucket excluded) */
    clusterNames: Record<number, string>;
    /** Groups by ascending label, unclustered bucket last */
    groups: LegacyGroup[];
    metrics: QualityMetrics;
}

/**
 * What `cluster()` returns to callers.
 */
export interface ClusteringResult extends LegacyClusterOutput {
    sessionId: string;
    provenance: Provenance;
    strategy: ClusteringStrategy | null;
    fallbackReason: FallbackReason | null;
    session: ClusteringSession;
}
