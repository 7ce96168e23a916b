import type { Group, LegacyClusterOutput, LegacyGroup, Phrase, QualityMetrics } from '../types/index.js';
import { UNCLUSTERED_INDEX, UNCLUSTERED_NAME } from '../types/index.js';

/**
 * Flatten finalized groups into label form.
 *
 * Non-empty groups get contiguous labels 0..k-1 in ascending session index;
 * the unclustered bucket keeps -1 and is listed last. Pure.
 */
export function toLegacyFormat(
    phrases: readonly Phrase[],
    groups: readonly Group[],
    metrics: QualityMetrics
): LegacyClusterOutput {
    const textByKey = new Map(phrases.map((phrase) => [phrase.key, phrase.text]));
    const textOf = (key: string) => textByKey.get(key) ?? key;

    const clustered = groups
        .filter((group) => group.index !== UNCLUSTERED_INDEX && group.members.length > 0)
        .sort((a, b) => a.index - b.index);

    const labelByKey = new Map<string, number>();
    const clusterNames: Record<number, string> = {};
    const legacyGroups: LegacyGroup[] = clustered.map((group, label) => {
        for (const key of group.members) labelByKey.set(key, label);
        clusterNames[label] = group.name;
        return {
            label,
            name: group.name,
            description: group.description,
            phrases: group.members.map(textOf),
            size: group.members.length,
        };
    });

    const unclustered = groups.find((group) => group.index === UNCLUSTERED_INDEX);
    const unclusteredKeys = phrases
        .map((phrase) => phrase.key)
        .filter((key) => !labelByKey.has(key));
    legacyGroups.push({
        label: UNCLUSTERED_INDEX,
        name: unclustered?.name ?? UNCLUSTERED_NAME,
        description: unclustered?.description ?? '',
        phrases: unclusteredKeys.map(textOf),
        size: unclusteredKeys.length,
    });

    const labels = phrases.map((phrase) => labelByKey.get(phrase.key) ?? UNCLUSTERED_INDEX);
    // fromEntries defines own properties, so a phrase such as "__proto__" stays a key
    const phraseLabels: Record<string, number> = Object.fromEntries(
        phrases.map((phrase, i) => [phrase.text, labels[i] ?? UNCLUSTERED_INDEX])
    );

    return { labels, phraseLabels, clusterNames, groups: legacyGroups, metrics };
}
