import type { Group, GroupCountRange, QualityMetrics } from '../types/index.js';
import { UNCLUSTERED_INDEX } from '../types/index.js';

/**
 * Derive quality metrics from membership. Empty groups are not counted.
 */
export function computeQualityMetrics(
    groups: readonly Group[],
    totalPhrases: number,
    targetRange: GroupCountRange,
    outlierRatioCeiling: number
): QualityMetrics {
    const clustered = groups.filter((group) => group.index !== UNCLUSTERED_INDEX && group.members.length > 0);
    const outlierCount = groups
        .filter((group) => group.index === UNCLUSTERED_INDEX)
        .reduce((sum, group) => sum + group.members.length, 0);

    const sizeHistogram: Record<number, number> = {};
    let clusteredPhrases = 0;
    for (const group of clustered) {
        const size = group.members.length;
        sizeHistogram[size] = (sizeHistogram[size] ?? 0) + 1;
        clusteredPhrases += size;
    }

    const groupCount = clustered.length;
    const outlierRatio = totalPhrases > 0 ? outlierCount / totalPhrases : 0;

    return {
        totalPhrases,
        groupCount,
        averageGroupSize: groupCount > 0 ? clusteredPhrases / groupCount : 0,
        sizeHistogram,
        outlierCount,
        outlierRatio,
        targetGroupCountAchieved: groupCount >= targetRange.min && groupCount <= targetRange.max,
        qualityGoalAchieved: outlierRatio <= outlierRatioCeiling,
    };
}
