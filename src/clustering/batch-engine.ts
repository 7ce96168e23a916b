import { z } from 'zod';
import {
    UNCLUSTERED_INDEX,
    type ClusteringOptions,
    type ClusteringStrategy,
    type LlmProvider,
    type Phrase,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { RetryExhaustedError, withRetry } from '../utils/retry.js';
import { ResponseValidationError, StageFailedError } from './errors.js';
import type { GroupRegistry } from './group-registry.js';
import { requestJson, type AiCallSettings } from './llm-response.js';
import { buildMemory } from './memory.js';
import { normalizeKey } from './phrases.js';
import { buildBatchPrompt } from './prompts.js';

export const batchResponseSchema = z.object({
    new_groups: z
        .array(
            z.object({
                name: z.string().trim().min(1),
                description: z.string().trim().default(''),
            })
        )
        .default([]),
    assignments: z.array(
        z.object({
            phrase: z.string(),
            group: z.union([z.number().int(), z.string().trim().min(1)]),
        })
    ),
});

export type BatchResponse = z.output<typeof batchResponseSchema>;

export type BatchEngineState =
    | { kind: 'idle' }
    | { kind: 'awaiting'; batch: number }
    | { kind: 'assigned'; batch: number }
    | { kind: 'all-processed' }
    | { kind: 'failed'; batch: number };

/** Where a validated assignment points. */
type AssignmentTarget = { kind: 'existing'; index: number } | { kind: 'new'; name: string };

/**
 * A validated batch reply, ready to be applied to the registry.
 */
export interface BatchPlan {
    /** New groups that received at least one phrase, in declaration order */
    newGroups: Array<{ name: string; description: string }>;
    assignments: Array<{ key: string; target: AssignmentTarget }>;
    /** Phrases in the reply that are not part of the batch */
    ignored: string[];
}

interface DeclaredGroup {
    name: string;
    description: string;
    /** Set when the declaration matches a group the registry already has */
    existingIndex?: number;
}

function sameText(a: string, b: string): boolean {
    return normalizeKey(a) === normalizeKey(b);
}

/**
 * Check a reply against the batch and the registry without mutating anything.
 * @throws ResponseValidationError on unknown indices, undeclared names or conflicting groups
 */
export function planBatch(reply: BatchResponse, batch: readonly Phrase[], registry: GroupRegistry): BatchPlan {
    const issues: string[] = [];

    // ─── New group declarations ──────────────────────────────
    const declared = new Map<string, DeclaredGroup>();
    for (const group of reply.new_groups) {
        const nameKey = normalizeKey(group.name);
        const earlier = declared.get(nameKey);
        if (earlier) {
            if (group.description && earlier.description && !sameText(group.description, earlier.description)) {
                issues.push(`new group "${group.name}" is declared twice with different descriptions`);
            }
            continue;
        }

        const existing = registry.findByName(group.name);
        if (existing) {
            if (group.description && !sameText(group.description, existing.description)) {
                issues.push(`new group "${group.name}" conflicts with existing group ${existing.index}`);
                continue;
            }
            declared.set(nameKey, { ...group, existingIndex: existing.index });
            continue;
        }
        declared.set(nameKey, { ...group });
    }

    // ─── Assignments ─────────────────────────────────────────
    const batchKeys = new Set(batch.map((phrase) => phrase.key));
    const decided = new Map<string, AssignmentTarget>();
    const ignored: string[] = [];

    for (const assignment of reply.assignments) {
        const key = normalizeKey(assignment.phrase);
        if (!batchKeys.has(key)) {
            ignored.push(assignment.phrase);
            continue;
        }
        if (decided.has(key)) continue;

        const target = resolveTarget(assignment.group, declared, registry);
        if (typeof target === 'string') {
            issues.push(`"${assignment.phrase}": ${target}`);
            continue;
        }
        decided.set(key, target);
    }

    if (issues.length > 0) {
        throw new ResponseValidationError('Invalid batch assignment', issues);
    }

    const assignments = batch.map((phrase) => ({
        key: phrase.key,
        target: decided.get(phrase.key) ?? { kind: 'existing' as const, index: UNCLUSTERED_INDEX },
    }));

    const usedNames = new Set(
        assignments.flatMap(({ target }) => (target.kind === 'new' ? [normalizeKey(target.name)] : []))
    );
    const newGroups = [...declared.entries()]
        .filter(([nameKey, group]) => group.existingIndex === undefined && usedNames.has(nameKey))
        .map(([, group]) => ({ name: group.name, description: group.description }));

    return { newGroups, assignments, ignored };
}

/**
 * Resolve a group reference; returns a reason string when it is invalid.
 */
function resolveTarget(
    ref: number | string,
    declared: ReadonlyMap<string, DeclaredGroup>,
    registry: GroupRegistry
): AssignmentTarget | string {
    if (typeof ref === 'string') {
        const group = declared.get(normalizeKey(ref));
        if (group) {
            return group.existingIndex === undefined
                ? { kind: 'new', name: group.name }
                : { kind: 'existing', index: group.existingIndex };
        }
        // Models sometimes quote indices
        if (/^-?\d+$/.test(ref)) return resolveTarget(Number(ref), declared, registry);
        return `group "${ref}" is not declared in new_groups`;
    }

    if (ref === UNCLUSTERED_INDEX || (ref >= 0 && registry.has(ref))) {
        return { kind: 'existing', index: ref };
    }
    return `group index ${ref} does not exist`;
}

/**
 * Apply a validated plan. Returns the indices of the groups it created.
 */
export function applyBatchPlan(plan: BatchPlan, registry: GroupRegistry): number[] {
    const created = new Map<string, number>();
    for (const group of plan.newGroups) {
        created.set(normalizeKey(group.name), registry.createGroup(group.name, group.description).index);
    }

    for (const { key, target } of plan.assignments) {
        const index = target.kind === 'existing' ? target.index : created.get(normalizeKey(target.name));
        registry.assign(key, index ?? UNCLUSTERED_INDEX);
    }

    return [...created.values()];
}

export interface BatchEngineContext {
    provider: LlmProvider;
    registry: GroupRegistry;
    strategy: ClusteringStrategy;
    options: ClusteringOptions;
    taskId: string | null;
    settings?: AiCallSettings;
    signal?: AbortSignal;
}

/**
 * Assigns phrases batch by batch, carrying a memory of the groups created so far.
 *
 * Batches run strictly in order; the registry is only touched once a reply has
 * passed validation, so a failed batch leaves it as the previous batch left it.
 */
export class BatchEngine {
    private current: BatchEngineState = { kind: 'idle' };
    private readonly transitions: BatchEngineState[] = [{ kind: 'idle' }];

    constructor(private readonly ctx: BatchEngineContext) {}

    get state(): BatchEngineState {
        return this.current;
    }

    /** Every state the engine has been in, in order. */
    get history(): readonly BatchEngineState[] {
        return this.transitions;
    }

    /**
     * Process every phrase.
     * @throws StageFailedError when a batch spends its retry budget
     */
    async run(phrases: readonly Phrase[]): Promise<void> {
        const { batchSize } = this.ctx.options;
        const totalBatches = Math.ceil(phrases.length / batchSize);

        for (let n = 1; n <= totalBatches; n++) {
            const batch = phrases.slice((n - 1) * batchSize, n * batchSize);
            await this.processBatch(batch, n, totalBatches);
        }

        this.transition({ kind: 'all-processed' });
    }

    private async processBatch(batch: Phrase[], batchNumber: number, totalBatches: number): Promise<void> {
        const { provider, registry, strategy, options, taskId, settings, signal } = this.ctx;
        this.transition({ kind: 'awaiting', batch: batchNumber });

        let plan: BatchPlan;
        let attemptsUsed = 0;
        try {
            plan = await withRetry(
                async (attempt) => {
                    attemptsUsed = attempt + 1;
                    // Regenerated per attempt so the request reflects the registry as it is now
                    const memory = buildMemory(registry, options.memoryExamples);
                    const prompt = buildBatchPrompt({ batch, batchNumber, totalBatches, strategy, memory, taskId });
                    const reply = await requestJson(provider, prompt, batchResponseSchema, { ...settings, signal });
                    return planBatch(reply, batch, registry);
                },
                {
                    attempts: options.maxAttempts,
                    baseDelayMs: options.retryBaseDelayMs,
                    label: `batch ${batchNumber}`,
                    signal,
                }
            );
        } catch (error) {
            this.transition({ kind: 'failed', batch: batchNumber });
            if (error instanceof RetryExhaustedError) {
                throw new StageFailedError('batch', error.attempts, error.lastError, batchNumber);
            }
            throw error;
        }

        if (plan.ignored.length > 0) {
            getLogger().warn({ batch: batchNumber, phrases: plan.ignored }, 'Ignoring assignments for phrases outside the batch');
        }

        const created = applyBatchPlan(plan, registry);
        this.transition({ kind: 'assigned', batch: batchNumber });

        getLogger().info(
            {
                batch: batchNumber,
                totalBatches,
                attempts: attemptsUsed,
                phrases: batch.length,
                unclustered: plan.assignments.filter(({ target }) =>
                    target.kind === 'existing' && target.index === UNCLUSTERED_INDEX
                ).length,
                newGroups: created.length,
                groupCount: registry.clusteredGroups().length,
            },
            'Batch processed'
        );
    }

    private transition(next: BatchEngineState): void {
        this.current = next;
        this.transitions.push(next);
    }
}
