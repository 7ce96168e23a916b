import { z } from 'zod';
import type {
    ClusteringOptions,
    ClusteringStrategy,
    GroupCountRange,
    LlmProvider,
    Phrase,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { RetryExhaustedError, withRetry } from '../utils/retry.js';
import { StageFailedError } from './errors.js';
import { requestJson, type AiCallSettings } from './llm-response.js';
import { buildStrategyPrompt } from './prompts.js';

/**
 * Shape of the planner reply. `target_max` may not exceed the phrase count.
 */
export function strategyResponseSchema(totalPhrases: number) {
    return z
        .object({
            target_min: z.number().int().positive(),
            target_max: z.number().int().positive(),
            partition_axes: z.array(z.string().trim().min(1)).min(1),
            rationale: z.string().default(''),
        })
        .refine((reply) => reply.target_min <= reply.target_max, {
            message: 'target_min must not exceed target_max',
        })
        .refine((reply) => reply.target_max <= totalPhrases, {
            message: `target_max must not exceed the ${totalPhrases} phrases`,
        });
}

/**
 * Evenly spaced sample over the input order; the whole list when it is small enough.
 */
export function sampleStratified<T>(items: readonly T[], size: number): T[] {
    if (items.length <= size) return [...items];

    const sample: T[] = [];
    for (let i = 0; i < size; i++) {
        const item = items[Math.floor((i * items.length) / size)];
        if (item !== undefined) sample.push(item);
    }
    return sample;
}

/**
 * Clamp a proposed range to what the phrase count can support:
 * at least 1 group, at most one group per `minGroupSize` phrases.
 */
export function clampRange(range: GroupCountRange, totalPhrases: number, minGroupSize: number): GroupCountRange {
    const ceiling = Math.max(1, Math.floor(totalPhrases / minGroupSize));
    const max = Math.min(Math.max(range.max, 1), ceiling);
    const min = Math.min(Math.max(range.min, 1), max);
    return { min, max };
}

export interface PlannerContext {
    provider: LlmProvider;
    options: ClusteringOptions;
    taskId: string | null;
    settings?: AiCallSettings;
    signal?: AbortSignal;
}

/**
 * Ask the model for a strategy based on a sample of the phrases.
 * @throws StageFailedError when every attempt failed or returned an invalid reply
 */
export async function planStrategy(phrases: Phrase[], ctx: PlannerContext): Promise<ClusteringStrategy> {
    const { options, signal } = ctx;
    const sample = sampleStratified(phrases, options.sampleSize);
    const prompt = buildStrategyPrompt({
        sample,
        totalPhrases: phrases.length,
        defaultRange: options.targetGroupRange,
        taskId: ctx.taskId,
    });
    const schema = strategyResponseSchema(phrases.length);

    let reply: z.output<typeof schema>;
    try {
        reply = await withRetry(
            () => requestJson(ctx.provider, prompt, schema, { ...ctx.settings, signal }),
            { attempts: options.maxAttempts, baseDelayMs: options.retryBaseDelayMs, label: 'strategy', signal }
        );
    } catch (error) {
        if (error instanceof RetryExhaustedError) {
            throw new StageFailedError('strategy', error.attempts, error.lastError);
        }
        throw error;
    }

    const strategy: ClusteringStrategy = {
        targetGroupRange: clampRange(
            { min: reply.target_min, max: reply.target_max },
            phrases.length,
            options.minGroupSize
        ),
        partitionAxes: reply.partition_axes,
        rationale: reply.rationale,
    };

    getLogger().info(
        {
            sampleSize: sample.length,
            proposed: { min: reply.target_min, max: reply.target_max },
            targetGroupRange: strategy.targetGroupRange,
            partitionAxes: strategy.partitionAxes,
        },
        'Strategy chosen'
    );

    return strategy;
}
