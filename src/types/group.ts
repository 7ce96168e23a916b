/** Index reserved for the unclustered / noise bucket. */
export const UNCLUSTERED_INDEX = -1;

/** Display name of the unclustered bucket. */
export const UNCLUSTERED_NAME = 'Unclustered';

/**
 * Group: a named set of phrases sharing one semantic theme.
 */
export interface Group {
    /** Stable within a session; -1 only for the unclustered bucket */
    index: number;

    /** Human-readable name, assigned once the content is known */
    name: string;

    /** How the group relates to the strategy's partition axes */
    description: string;

    /** Member phrase keys, in assignment order */
    members: string[];
}

/**
 * Target range for the number of groups (inclusive on both ends).
 */
export interface GroupCountRange {
    min: number;
    max: number;
}

/**
 * Strategy proposed by the planner before any assignment happens.
 */
export interface ClusteringStrategy {
    targetGroupRange: GroupCountRange;

    /** What distinguishes one group from another (e.g. "brand", "user intent") */
    partitionAxes: string[];

    rationale: string;
}

/**
 * One entry of the cross-batch memory.
 */
export interface MemoryGroup {
    index: number;
    name: string;
    description: string;
    examples: string[];
    size: number;
}

/**
 * Bounded summary of the groups created so far, regenerated before every batch.
 */
export interface SessionMemory {
    groups: MemoryGroup[];
}

/**
 * Quality metrics, always derived from current membership.
 */
export interface QualityMetrics {
    totalPhrases: number;
    groupCount: number;
    averageGroupSize: number;
    /** Group size → number of groups of that size (unclustered bucket excluded) */
    sizeHistogram: Record<number, number>;
    outlierCount: number;
    outlierRatio: number;
    targetGroupCountAchieved: boolean;
    qualityGoalAchieved: boolean;
}
