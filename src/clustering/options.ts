import { z } from 'zod';
import { DEFAULT_CLUSTERING_OPTIONS, type ClusteringOptions, type FallbackOptions } from '../types/index.js';
import { ClusteringInputError } from './errors.js';

const rangeSchema = z
    .object({
        min: z.number().int().positive(),
        max: z.number().int().positive(),
    })
    .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export const clusteringOptionsSchema = z.object({
    useAiClustering: z.boolean(),
    aiProvider: z.enum(['openai', 'anthropic', 'ollama']),
    targetGroupRange: rangeSchema,
    batchSize: z.number().int().positive(),
    minGroupSize: z.number().int().positive(),
    outlierRatioCeiling: z.number().min(0).max(1),
    sampleSize: z.number().int().positive(),
    maxAttempts: z.number().int().positive(),
    retryBaseDelayMs: z.number().min(0),
    sessionTimeoutMs: z.number().positive(),
    memoryExamples: z.number().int().min(0),
    redistributionThreshold: z.number().min(0).max(1),
    mergeThreshold: z.number().min(0).max(1),
    mergeSimilarNames: z.boolean(),
    fallback: z.object({
        epsilon: z.number().positive().max(2),
        minSamples: z.number().int().positive(),
    }),
}) satisfies z.ZodType<ClusteringOptions>;

/**
 * Schema for partial options, as found in config files.
 */
export const clusteringOverridesSchema = clusteringOptionsSchema
    .extend({ fallback: clusteringOptionsSchema.shape.fallback.partial() })
    .partial();

/**
 * Partial options as accepted from callers, config files and CLI flags.
 */
export type ClusteringOverrides = Partial<Omit<ClusteringOptions, 'fallback'>> & {
    fallback?: Partial<FallbackOptions>;
};

/**
 * Drop keys whose value is `undefined`, so they do not shadow defaults when spread.
 */
export function definedOnly<T extends object>(value: T): Partial<T> {
    return Object.fromEntries(
        Object.entries(value).filter(([, entry]) => entry !== undefined)
    );
}

/**
 * Merge overrides onto a base and validate the result.
 * @throws ClusteringInputError when a value is out of range
 */
export function resolveClusteringOptions(
    overrides: ClusteringOverrides = {},
    base: ClusteringOptions = DEFAULT_CLUSTERING_OPTIONS
): ClusteringOptions {
    const merged = {
        ...base,
        ...definedOnly(overrides),
        fallback: {
            ...base.fallback,
            ...definedOnly(overrides.fallback ?? {}),
        },
    };

    const parsed = clusteringOptionsSchema.safeParse(merged);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ClusteringInputError(`Invalid clustering options (${issues.join('; ')})`);
    }
    return parsed.data;
}
