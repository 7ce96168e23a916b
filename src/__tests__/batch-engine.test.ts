import { describe, it, expect } from 'vitest';
import { BatchEngine, applyBatchPlan, batchResponseSchema, planBatch } from '../clustering/batch-engine.js';
import { ResponseValidationError, StageFailedError } from '../clustering/errors.js';
import { GroupRegistry } from '../clustering/group-registry.js';
import { normalizePhrases } from '../clustering/phrases.js';
import { DEFAULT_CLUSTERING_OPTIONS, type ClusteringStrategy } from '../types/index.js';
import { StubLlm, readPayload, scriptedHandler } from './helpers.js';

const phrases = normalizePhrases(['running shoes', 'trail shoes', 'yoga mat', 'yoga block', 'gift card']);

const strategy: ClusteringStrategy = {
    targetGroupRange: { min: 2, max: 4 },
    partitionAxes: ['product'],
    rationale: '',
};

function registryWithShoes(): GroupRegistry {
    const registry = new GroupRegistry(phrases);
    registry.createGroup('Shoes', 'Footwear');
    return registry;
}

describe('planBatch', () => {
    it('should resolve existing indices, new names and omitted phrases', () => {
        const registry = registryWithShoes();
        const reply = batchResponseSchema.parse({
            new_groups: [{ name: 'Yoga', description: 'Yoga gear' }],
            assignments: [
                { phrase: 'running shoes', group: 0 },
                { phrase: 'Running Shoes', group: -1 },
                { phrase: 'yoga mat', group: 'Yoga' },
                { phrase: 'yoga block', group: 'yoga' },
                { phrase: 'tennis ball', group: 0 },
            ],
        });

        const plan = planBatch(reply, phrases, registry);

        expect(plan).toEqual({
            newGroups: [{ name: 'Yoga', description: 'Yoga gear' }],
            assignments: [
                { key: 'running shoes', target: { kind: 'existing', index: 0 } },
                { key: 'trail shoes', target: { kind: 'existing', index: -1 } },
                { key: 'yoga mat', target: { kind: 'new', name: 'Yoga' } },
                { key: 'yoga block', target: { kind: 'new', name: 'Yoga' } },
                { key: 'gift card', target: { kind: 'existing', index: -1 } },
            ],
            ignored: ['tennis ball'],
        });
    });

    it('should reject an index that does not exist without touching the registry', () => {
        const registry = registryWithShoes();
        const reply = batchResponseSchema.parse({ assignments: [{ phrase: 'yoga mat', group: 5 }] });

        expect(() => planBatch(reply, phrases, registry)).toThrow('"yoga mat": group index 5 does not exist');
        expect(registry.assignedCount).toBe(0);
        expect(registry.clusteredGroups()).toHaveLength(1);
    });

    it('should reject a name that was not declared', () => {
        const reply = batchResponseSchema.parse({ assignments: [{ phrase: 'yoga mat', group: 'Hiking' }] });

        expect(() => planBatch(reply, phrases, registryWithShoes())).toThrow(ResponseValidationError);
        expect(() => planBatch(reply, phrases, registryWithShoes())).toThrow(
            '"yoga mat": group "Hiking" is not declared in new_groups'
        );
    });

    it('should reject a new group that conflicts with an existing one', () => {
        const reply = batchResponseSchema.parse({
            new_groups: [{ name: 'shoes', description: 'Anything worn on the feet or hands' }],
            assignments: [{ phrase: 'trail shoes', group: 'shoes' }],
        });

        expect(() => planBatch(reply, phrases, registryWithShoes())).toThrow(
            'new group "shoes" conflicts with existing group 0'
        );
    });

    it('should map a redeclared existing group onto its index', () => {
        const reply = batchResponseSchema.parse({
            new_groups: [{ name: 'Shoes', description: 'footwear' }],
            assignments: [{ phrase: 'trail shoes', group: 'Shoes' }],
        });

        const plan = planBatch(reply, phrases, registryWithShoes());

        expect(plan.newGroups).toEqual([]);
        expect(plan.assignments[1]).toEqual({ key: 'trail shoes', target: { kind: 'existing', index: 0 } });
    });

    it('should reject a group declared twice with different descriptions', () => {
        const reply = batchResponseSchema.parse({
            new_groups: [
                { name: 'Yoga', description: 'Yoga gear' },
                { name: 'Yoga', description: 'Meditation apps' },
            ],
            assignments: [{ phrase: 'yoga mat', group: 'Yoga' }],
        });

        expect(() => planBatch(reply, phrases, registryWithShoes())).toThrow('declared twice');
    });

    it('should not create declared groups that receive no phrase', () => {
        const reply = batchResponseSchema.parse({
            new_groups: [{ name: 'Yoga' }, { name: 'Gifts' }],
            assignments: [{ phrase: 'yoga mat', group: 'Yoga' }],
        });

        const plan = planBatch(reply, phrases, registryWithShoes());
        expect(plan.newGroups).toEqual([{ name: 'Yoga', description: '' }]);
    });

    it('should accept quoted indices', () => {
        const reply = batchResponseSchema.parse({ assignments: [{ phrase: 'running shoes', group: '0' }] });

        const plan = planBatch(reply, phrases, registryWithShoes());
        expect(plan.assignments[0]).toEqual({ key: 'running shoes', target: { kind: 'existing', index: 0 } });
    });
});

describe('applyBatchPlan', () => {
    it('should create new groups and assign every phrase of the batch', () => {
        const registry = registryWithShoes();
        const reply = batchResponseSchema.parse({
            new_groups: [{ name: 'Yoga', description: 'Yoga gear' }],
            assignments: [
                { phrase: 'running shoes', group: 0 },
                { phrase: 'yoga mat', group: 'Yoga' },
            ],
        });

        const created = applyBatchPlan(planBatch(reply, phrases, registry), registry);

        expect(created).toEqual([1]);
        expect(registry.get(0)?.members).toEqual(['running shoes']);
        expect(registry.get(1)?.members).toEqual(['yoga mat']);
        expect(registry.unclustered.members).toEqual(['trail shoes', 'yoga block', 'gift card']);
        expect(registry.assignedCount).toBe(5);
    });
});

describe('BatchEngine', () => {
    const shopping = normalizePhrases(['running shoes', 'trail shoes', 'yoga mat', 'yoga block']);
    const groupOf = new Map([
        ['running shoes', 'Shoes'],
        ['trail shoes', 'Shoes'],
        ['yoga mat', 'Yoga'],
        ['yoga block', 'Yoga'],
    ]);
    const options = { ...DEFAULT_CLUSTERING_OPTIONS, batchSize: 2, retryBaseDelayMs: 0 };

    it('should process batches in order and carry groups forward', async () => {
        const llm = new StubLlm(scriptedHandler(groupOf));
        const registry = new GroupRegistry(shopping);
        const engine = new BatchEngine({ provider: llm, registry, strategy, options, taskId: null });

        await engine.run(shopping);

        expect(engine.history).toEqual([
            { kind: 'idle' },
            { kind: 'awaiting', batch: 1 },
            { kind: 'assigned', batch: 1 },
            { kind: 'awaiting', batch: 2 },
            { kind: 'assigned', batch: 2 },
            { kind: 'all-processed' },
        ]);
        expect(registry.clusteredGroups().map((g) => [g.index, g.name, g.members])).toEqual([
            [0, 'Shoes', ['running shoes', 'trail shoes']],
            [1, 'Yoga', ['yoga mat', 'yoga block']],
        ]);

        const second = readPayload(llm.calls[1]?.prompt ?? '');
        expect(second.kind).toBe('batch');
        if (second.kind === 'batch') {
            expect(second.payload.phrases).toEqual(['yoga mat', 'yoga block']);
            expect(second.payload.existing_groups).toEqual([
                {
                    index: 0,
                    name: 'Shoes',
                    description: 'All about shoes',
                    examples: ['running shoes', 'trail shoes'],
                    size: 2,
                },
            ]);
        }
    });

    it('should limit memory examples per group', async () => {
        const llm = new StubLlm(scriptedHandler(groupOf));
        const registry = new GroupRegistry(shopping);
        const engine = new BatchEngine({
            provider: llm,
            registry,
            strategy,
            options: { ...options, memoryExamples: 1 },
            taskId: null,
        });

        await engine.run(shopping);

        const second = readPayload(llm.calls[1]?.prompt ?? '');
        if (second.kind !== 'batch') throw new Error('expected a batch prompt');
        expect(second.payload.existing_groups[0]?.examples).toEqual(['running shoes']);
        expect(second.payload.existing_groups[0]?.size).toBe(2);
    });

    it('should retry a batch whose reply fails validation', async () => {
        const scripted = scriptedHandler(groupOf);
        const llm = new StubLlm((prompt, call, params) =>
            call === 2 ? '{"assignments": [{"phrase": "yoga mat", "group": 9}]}' : scripted(prompt, call, params)
        );
        const registry = new GroupRegistry(shopping);
        const engine = new BatchEngine({ provider: llm, registry, strategy, options, taskId: null });

        await engine.run(shopping);

        expect(llm.calls).toHaveLength(3);
        expect(llm.calls[2]?.prompt).toBe(llm.calls[1]?.prompt);
        expect(engine.state).toEqual({ kind: 'all-processed' });
        expect(registry.get(1)?.members).toEqual(['yoga mat', 'yoga block']);
    });

    it('should fail after maxAttempts and leave the registry untouched', async () => {
        const llm = new StubLlm(() => '{"assignments": [{"phrase": "running shoes", "group": 9}]}');
        const registry = new GroupRegistry(shopping);
        const engine = new BatchEngine({ provider: llm, registry, strategy, options, taskId: null });

        const error = await engine.run(shopping).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StageFailedError);
        expect(error).toMatchObject({ stage: 'batch', batchNumber: 1, attempts: 3 });
        expect(llm.calls).toHaveLength(3);
        expect(engine.state).toEqual({ kind: 'failed', batch: 1 });
        expect(registry.clusteredGroups()).toEqual([]);
        expect(registry.assignedCount).toBe(0);
    });
});
