import type { ClusteringOptions, GroupCountRange, QualityMetrics } from '../types/index.js';
import { namesAreSimilar } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/retry.js';
import type { GroupRegistry } from './group-registry.js';
import { computeQualityMetrics } from './metrics.js';
import { buildProfile, lexicalScore, type GroupProfile, type PhraseScorer } from './relatedness.js';

export type FinalizerOptions = Pick<
    ClusteringOptions,
    'minGroupSize' | 'outlierRatioCeiling' | 'redistributionThreshold' | 'mergeThreshold' | 'mergeSimilarNames'
>;

export interface FinalizeInput {
    registry: GroupRegistry;
    totalPhrases: number;
    targetRange: GroupCountRange;
    options: FinalizerOptions;
    /** Defaults to `lexicalScore` */
    scorer?: PhraseScorer;
}

export interface FinalizeReport {
    metrics: QualityMetrics;
    redistributed: number;
    mergedByName: number;
    mergedSmall: number;
    dissolved: number;
}

/**
 * Deterministic clean-up after batching: redistribution, optional name merge,
 * consolidation of undersized groups, then the quality check. Never throws.
 */
export function finalizeGroups(input: FinalizeInput): FinalizeReport {
    const { registry, options } = input;
    const scorer = input.scorer ?? lexicalScore;

    const redistributed = redistribute(registry, scorer, options.redistributionThreshold);
    const mergedByName = options.mergeSimilarNames ? mergeSimilarNames(registry) : 0;
    const { merged: mergedSmall, dissolved } = consolidate(registry, scorer, options);
    registry.removeEmptyGroups();

    const metrics = computeQualityMetrics(
        registry.snapshot(),
        input.totalPhrases,
        input.targetRange,
        options.outlierRatioCeiling
    );

    getLogger().info(
        {
            redistributed,
            mergedByName,
            mergedSmall,
            dissolved,
            groupCount: metrics.groupCount,
            outlierRatio: Number(metrics.outlierRatio.toFixed(4)),
            qualityGoalAchieved: metrics.qualityGoalAchieved,
            targetGroupCountAchieved: metrics.targetGroupCountAchieved,
        },
        'Finalization metrics'
    );

    return { metrics, redistributed, mergedByName, mergedSmall, dissolved };
}

// ─── Redistribution ──────────────────────────────────────────

function redistribute(registry: GroupRegistry, scorer: PhraseScorer, threshold: number): number {
    const profiles = registry.clusteredGroups().map((group) => buildProfile(group, registry));
    if (profiles.length === 0) return 0;

    let moved = 0;
    for (const key of [...registry.unclustered.members]) {
        const text = registry.phrase(key)?.text ?? key;
        try {
            const best = bestMatch(profiles, (profile) => scorer(text, profile));
            if (best && best.score >= threshold) {
                registry.assign(key, best.index);
                moved++;
            }
        } catch (error) {
            getLogger().warn({ phrase: text, error: describeError(error) }, 'Could not score phrase, leaving it unclustered');
        }
    }
    return moved;
}

/**
 * Highest-scoring profile; ties go to the lowest index.
 */
function bestMatch(
    profiles: readonly GroupProfile[],
    score: (profile: GroupProfile) => number
): { index: number; score: number } | null {
    let best: { index: number; score: number } | null = null;
    for (const profile of profiles) {
        const value = score(profile);
        if (!best || value > best.score || (value === best.score && profile.index < best.index)) {
            best = { index: profile.index, score: value };
        }
    }
    return best;
}

// ─── Name merge ──────────────────────────────────────────────

function mergeSimilarNames(registry: GroupRegistry): number {
    let merged = 0;
    let changed = true;
    while (changed) {
        changed = false;
        const groups = registry.clusteredGroups();
        outer: for (let i = 0; i < groups.length; i++) {
            for (let j = i + 1; j < groups.length; j++) {
                const keep = groups[i];
                const drop = groups[j];
                if (keep && drop && namesAreSimilar(keep.name, drop.name)) {
                    registry.mergeInto(drop.index, keep.index);
                    merged++;
                    changed = true;
                    break outer;
                }
            }
        }
    }
    return merged;
}

// ─── Consolidation ───────────────────────────────────────────

function consolidate(
    registry: GroupRegistry,
    scorer: PhraseScorer,
    options: FinalizerOptions
): { merged: number; dissolved: number } {
    let merged = 0;
    let dissolved = 0;

    for (;;) {
        const groups = registry.clusteredGroups();
        const smallest = groups
            .filter((group) => group.members.length < options.minGroupSize)
            .sort((a, b) => a.members.length - b.members.length || a.index - b.index)[0];
        if (!smallest) break;

        const texts = smallest.members.map((key) => registry.phrase(key)?.text ?? key);
        const candidates = groups
            .filter((group) => group.index !== smallest.index && group.members.length >= options.minGroupSize)
            .map((group) => buildProfile(group, registry));

        const best = texts.length > 0
            ? bestMatch(candidates, (profile) => meanScore(texts, profile, scorer))
            : null;

        if (best && best.score >= options.mergeThreshold) {
            registry.mergeInto(smallest.index, best.index);
            merged++;
        } else {
            registry.dissolve(smallest.index);
            dissolved++;
        }
    }

    return { merged, dissolved };
}

function meanScore(texts: readonly string[], profile: GroupProfile, scorer: PhraseScorer): number {
    let total = 0;
    let scored = 0;
    for (const text of texts) {
        try {
            total += scorer(text, profile);
            scored++;
        } catch (error) {
            getLogger().warn({ phrase: text, error: describeError(error) }, 'Could not score phrase, leaving it out of the mean');
        }
    }
    return scored > 0 ? total / scored : 0;
}
