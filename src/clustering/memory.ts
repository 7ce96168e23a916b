import type { SessionMemory } from '../types/index.js';
import type { GroupRegistry } from './group-registry.js';

/** Descriptions longer than this are cut in the memory sent to the model. */
export const MEMORY_DESCRIPTION_LIMIT = 160;

/**
 * Summarise the registry for the next batch request.
 *
 * Size depends on the number of groups and `examples`, never on how many phrases
 * have been processed.
 */
export function buildMemory(registry: GroupRegistry, examples: number): SessionMemory {
    return {
        groups: registry.clusteredGroups().map((group) => ({
            index: group.index,
            name: group.name,
            description: truncate(group.description, MEMORY_DESCRIPTION_LIMIT),
            examples: group.members
                .slice(0, examples)
                .map((key) => registry.phrase(key)?.text ?? key),
            size: group.members.length,
        })),
    };
}

function truncate(text: string, limit: number): string {
    if (text.length <= limit) return text;
    return `${text.slice(0, limit - 1).trimEnd()}…`;
}
