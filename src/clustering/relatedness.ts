import type { Group } from '../types/index.js';
import { tokenize, uniqueTokens } from '../nlp/tokenizer.js';
import type { GroupRegistry } from './group-registry.js';

/**
 * What characterises a group, for lexical scoring.
 */
export interface GroupProfile {
    index: number;
    /** Tokens of the group name and description */
    labelTokens: ReadonlySet<string>;
    /** Token → share of members containing it */
    memberFrequency: ReadonlyMap<string, number>;
}

/**
 * Score in [0, 1] of how well a phrase fits a group.
 */
export type PhraseScorer = (text: string, profile: GroupProfile) => number;

export function buildProfile(group: Group, registry: GroupRegistry): GroupProfile {
    const counts = new Map<string, number>();
    for (const key of group.members) {
        for (const token of uniqueTokens(registry.phrase(key)?.text ?? key)) {
            counts.set(token, (counts.get(token) ?? 0) + 1);
        }
    }

    const size = group.members.length;
    const memberFrequency = new Map<string, number>();
    for (const [token, count] of counts) {
        memberFrequency.set(token, count / size);
    }

    return {
        index: group.index,
        labelTokens: new Set(tokenize(`${group.name} ${group.description}`)),
        memberFrequency,
    };
}

/**
 * Mean over the phrase's distinct tokens: 1 for a token in the group label,
 * otherwise the share of members that contain it.
 */
export const lexicalScore: PhraseScorer = (text, profile) => {
    const tokens = uniqueTokens(text);
    if (tokens.length === 0) return 0;

    let total = 0;
    for (const token of tokens) {
        total += profile.labelTokens.has(token) ? 1 : profile.memberFrequency.get(token) ?? 0;
    }
    return total / tokens.length;
};
