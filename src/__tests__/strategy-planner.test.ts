import { describe, it, expect, vi, afterEach } from 'vitest';
import { decodeResponse, parseJsonFromText } from '../clustering/llm-response.js';
import { clampRange, planStrategy, sampleStratified, strategyResponseSchema } from '../clustering/strategy-planner.js';
import { ResponseValidationError, StageFailedError } from '../clustering/errors.js';
import { normalizePhrases } from '../clustering/phrases.js';
import { OpenAiProvider } from '../providers/openai.js';
import { DEFAULT_CLUSTERING_OPTIONS } from '../types/index.js';
import { StubLlm, jsonResponse, readPayload, strategyReply } from './helpers.js';

const options = { ...DEFAULT_CLUSTERING_OPTIONS, retryBaseDelayMs: 0 };

function numbered(count: number): string[] {
    return Array.from({ length: count }, (_, i) => `phrase ${i}`);
}

describe('parseJsonFromText', () => {
    it('should parse a bare object', () => {
        expect(parseJsonFromText('{"a": 1}')).toEqual({ a: 1 });
    });

    it('should strip code fences and surrounding prose', () => {
        const text = 'Here you go:\n```json\n{"a": [1, 2]}\n```\nHope this helps.';
        expect(parseJsonFromText(text)).toEqual({ a: [1, 2] });
    });

    it('should reject replies without an object', () => {
        expect(() => parseJsonFromText('no json here')).toThrow('No JSON object found in response');
    });

    it('should reject malformed JSON', () => {
        expect(() => parseJsonFromText('{"a": }')).toThrow(ResponseValidationError);
        expect(() => parseJsonFromText('{"a": }')).toThrow('Response is not valid JSON');
    });
});

describe('strategyResponseSchema', () => {
    it('should accept a valid reply and default the rationale', () => {
        const reply = decodeResponse(
            '{"target_min": 3, "target_max": 5, "partition_axes": ["brand"]}',
            strategyResponseSchema(20)
        );
        expect(reply).toEqual({ target_min: 3, target_max: 5, partition_axes: ['brand'], rationale: '' });
    });

    it('should reject an inverted range', () => {
        expect(() =>
            decodeResponse('{"target_min": 6, "target_max": 5, "partition_axes": ["brand"]}', strategyResponseSchema(20))
        ).toThrow('target_min must not exceed target_max');
    });

    it('should reject more groups than phrases', () => {
        expect(() =>
            decodeResponse('{"target_min": 2, "target_max": 30, "partition_axes": ["brand"]}', strategyResponseSchema(20))
        ).toThrow('target_max must not exceed the 20 phrases');
    });

    it('should require at least one partition axis', () => {
        expect(() =>
            decodeResponse('{"target_min": 2, "target_max": 3, "partition_axes": []}', strategyResponseSchema(20))
        ).toThrow(ResponseValidationError);
    });
});

describe('sampleStratified', () => {
    it('should return the whole list when it is small', () => {
        expect(sampleStratified([1, 2, 3], 5)).toEqual([1, 2, 3]);
    });

    it('should spread the sample evenly over the input', () => {
        const items = Array.from({ length: 100 }, (_, i) => i);
        expect(sampleStratified(items, 4)).toEqual([0, 25, 50, 75]);
        expect(new Set(sampleStratified(items, 30)).size).toBe(30);
    });
});

describe('clampRange', () => {
    it('should keep a range the phrase count supports', () => {
        expect(clampRange({ min: 8, max: 12 }, 100, 3)).toEqual({ min: 8, max: 12 });
    });

    it('should cap the range at one group per minGroupSize phrases', () => {
        expect(clampRange({ min: 8, max: 12 }, 20, 3)).toEqual({ min: 6, max: 6 });
    });

    it('should allow at least one group', () => {
        expect(clampRange({ min: 4, max: 9 }, 2, 3)).toEqual({ min: 1, max: 1 });
    });
});

describe('planStrategy', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should send a stratified sample and return the clamped strategy', async () => {
        const llm = new StubLlm(() => strategyReply(8, 12));
        const phrases = normalizePhrases(numbered(20));

        const strategy = await planStrategy(phrases, { provider: llm, options: { ...options, sampleSize: 5 }, taskId: 'shoes' });

        expect(strategy).toEqual({
            targetGroupRange: { min: 6, max: 6 },
            partitionAxes: ['product type'],
            rationale: 'Split by product',
        });
        expect(llm.calls).toHaveLength(1);
        expect(llm.calls[0]?.params.jsonMode).toBe(true);
        expect(llm.calls[0]?.prompt).toContain('seed keyword "shoes"');

        const request = readPayload(llm.calls[0]?.prompt ?? '');
        expect(request.kind).toBe('strategy');
        if (request.kind === 'strategy') {
            expect(request.payload.total_phrases).toBe(20);
            expect(request.payload.sample_phrases).toEqual(['phrase 0', 'phrase 4', 'phrase 8', 'phrase 12', 'phrase 16']);
        }
    });

    it('should retry an invalid reply', async () => {
        const llm = new StubLlm((_, call) => (call === 1 ? 'I think eight groups' : strategyReply(2, 4)));

        const strategy = await planStrategy(normalizePhrases(numbered(30)), { provider: llm, options, taskId: null });

        expect(llm.calls).toHaveLength(2);
        expect(strategy.targetGroupRange).toEqual({ min: 2, max: 4 });
    });

    it('should fail the stage after maxAttempts invalid replies', async () => {
        const llm = new StubLlm(() => strategyReply(2, 50));

        const error = await planStrategy(normalizePhrases(numbered(30)), { provider: llm, options, taskId: null }).catch(
            (e: unknown) => e
        );

        expect(error).toBeInstanceOf(StageFailedError);
        expect(error).toMatchObject({ stage: 'strategy', attempts: 3 });
        expect(llm.calls).toHaveLength(3);
    });

    it('should send one request per attempt through a real provider', async () => {
        const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ error: 'overloaded' }, 503));
        vi.stubGlobal('fetch', fetchMock);
        const provider = new OpenAiProvider({ apiKey: 'test-secret', model: 'gpt-test' });

        const error = await planStrategy(normalizePhrases(numbered(30)), { provider, options, taskId: null }).catch(
            (e: unknown) => e
        );

        expect(error).toBeInstanceOf(StageFailedError);
        expect(error).toMatchObject({ stage: 'strategy', attempts: 3 });
        expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should forward model settings', async () => {
        const llm = new StubLlm(() => strategyReply(1, 2));

        await planStrategy(normalizePhrases(numbered(10)), {
            provider: llm,
            options,
            taskId: null,
            settings: { temperature: 0.1, maxTokens: 500 },
        });

        expect(llm.calls[0]?.params).toMatchObject({ temperature: 0.1, maxTokens: 500, jsonMode: true });
    });
});
