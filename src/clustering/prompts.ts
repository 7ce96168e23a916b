import type { ClusteringStrategy, GroupCountRange, Phrase, SessionMemory } from '../types/index.js';

/**
 * A prompt split into the system instruction and the user message.
 * The user message always ends with the request payload as a fenced JSON block.
 */
export interface Prompt {
    system: string;
    user: string;
}

const SYSTEM_PROMPT =
    'You are an SEO keyword research assistant who organises search phrases into semantic groups. ' +
    'Answer with a single JSON object and nothing else.';

function payloadBlock(payload: object): string {
    return '```json\n' + JSON.stringify(payload, null, 2) + '\n```';
}

function topicLine(taskId: string | null): string {
    return taskId ? `The phrases were collected for the seed keyword "${taskId}".\n` : '';
}

export interface StrategyPromptInput {
    sample: Phrase[];
    totalPhrases: number;
    defaultRange: GroupCountRange;
    taskId: string | null;
}

export function buildStrategyPrompt(input: StrategyPromptInput): Prompt {
    const user = [
        `Plan how to split ${input.totalPhrases} keyword phrases into semantic groups.`,
        topicLine(input.taskId),
        'Below is a representative sample. Propose how many groups the full set should have',
        `(the usual range is ${input.defaultRange.min}-${input.defaultRange.max}) and the axes that separate`,
        'one group from another, such as product type, brand or user intent.',
        '',
        'Reply with:',
        '{"target_min": <int>, "target_max": <int>, "partition_axes": [<string>, ...], "rationale": <string>}',
        '',
        payloadBlock({
            total_phrases: input.totalPhrases,
            default_group_range: input.defaultRange,
            sample_phrases: input.sample.map((phrase) => phrase.text),
        }),
    ].join('\n');

    return { system: SYSTEM_PROMPT, user };
}

export interface BatchPromptInput {
    batch: Phrase[];
    batchNumber: number;
    totalBatches: number;
    strategy: ClusteringStrategy;
    memory: SessionMemory;
    taskId: string | null;
}

export function buildBatchPrompt(input: BatchPromptInput): Prompt {
    const { strategy } = input;
    const user = [
        `Assign the phrases of batch ${input.batchNumber} of ${input.totalBatches} to groups.`,
        topicLine(input.taskId),
        `Aim for ${strategy.targetGroupRange.min}-${strategy.targetGroupRange.max} groups in total,`,
        `split along: ${strategy.partitionAxes.join(', ')}.`,
        '',
        'Reuse an existing group by its index whenever a phrase fits it. Declare a new group in',
        '"new_groups" only when no existing group fits, and refer to it by its exact name.',
        'Use -1 for phrases that fit no group.',
        '',
        'Reply with:',
        '{"new_groups": [{"name": <string>, "description": <string>}],',
        ' "assignments": [{"phrase": <string>, "group": <existing index | -1 | new group name>}]}',
        '',
        payloadBlock({
            existing_groups: input.memory.groups,
            phrases: input.batch.map((phrase) => phrase.text),
        }),
    ].join('\n');

    return { system: SYSTEM_PROMPT, user };
}
