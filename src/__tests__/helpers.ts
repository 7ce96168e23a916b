import type { Mock } from 'vitest';
import { z } from 'zod';
import { ClusteringOrchestrator } from '../clustering/orchestrator.js';
import type {
    ClusteringResult,
    EmbeddingProvider,
    EmbeddingVector,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProvider,
    PhraseInput,
} from '../types/index.js';

// ─── Prompt payloads ─────────────────────────────────────

const strategyPayloadSchema = z.object({
    total_phrases: z.number(),
    sample_phrases: z.array(z.string()),
});

const batchPayloadSchema = z.object({
    existing_groups: z.array(
        z.object({
            index: z.number(),
            name: z.string(),
            description: z.string(),
            examples: z.array(z.string()),
            size: z.number(),
        })
    ),
    phrases: z.array(z.string()),
});

export type StrategyPayload = z.infer<typeof strategyPayloadSchema>;
export type BatchPayload = z.infer<typeof batchPayloadSchema>;

/**
 * The fenced JSON block that ends every prompt.
 */
export function extractPayload(prompt: string): unknown {
    const start = prompt.lastIndexOf('```json\n');
    const end = prompt.lastIndexOf('\n```');
    if (start === -1 || end <= start) throw new Error('Prompt has no payload block');
    return JSON.parse(prompt.slice(start + '```json\n'.length, end));
}

export function readPayload(
    prompt: string
): { kind: 'strategy'; payload: StrategyPayload } | { kind: 'batch'; payload: BatchPayload } {
    const raw = extractPayload(prompt);
    const batch = batchPayloadSchema.safeParse(raw);
    if (batch.success) return { kind: 'batch', payload: batch.data };
    return { kind: 'strategy', payload: strategyPayloadSchema.parse(raw) };
}

// ─── LLM stub ────────────────────────────────────────────

export interface RecordedCall {
    prompt: string;
    params: LlmCompletionParams;
}

export type StubHandler = (prompt: string, call: number, params: LlmCompletionParams) => string | Promise<string>;

/**
 * In-process LLM whose replies come from a handler.
 */
export class StubLlm implements LlmProvider {
    readonly name = 'stub';
    readonly supportsStructuredOutput = true;
    readonly calls: RecordedCall[] = [];

    constructor(
        private readonly handler: StubHandler,
        private readonly available = true
    ) {}

    async isAvailable(): Promise<boolean> {
        return this.available;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        this.calls.push({ prompt, params });
        const text = await this.handler(prompt, this.calls.length, params);
        return {
            text,
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            model: 'stub-model',
            provider: this.name,
        };
    }
}

export function strategyReply(min = 8, max = 12): string {
    return JSON.stringify({
        target_min: min,
        target_max: max,
        partition_axes: ['product type'],
        rationale: 'Split by product',
    });
}

/**
 * Handler that plans 8-12 groups and assigns every phrase to the group named in
 * `groupOf`, creating groups on first use. Phrases missing from `groupOf` go to -1.
 */
export function scriptedHandler(groupOf: ReadonlyMap<string, string>): StubHandler {
    return (prompt) => {
        const request = readPayload(prompt);
        if (request.kind === 'strategy') return strategyReply();

        const { existing_groups: existing, phrases } = request.payload;
        const newGroups = new Map<string, { name: string; description: string }>();
        const assignments = phrases.map((phrase) => {
            const name = groupOf.get(phrase);
            if (!name) return { phrase, group: -1 };
            const known = existing.find((group) => group.name === name);
            if (known) return { phrase, group: known.index };
            newGroups.set(name, { name, description: `All about ${name.toLowerCase()}` });
            return { phrase, group: name };
        });

        return '```json\n' + JSON.stringify({ new_groups: [...newGroups.values()], assignments }) + '\n```';
    };
}

// ─── Embedding stub ──────────────────────────────────────

/**
 * Bag-of-words embedding: every distinct word gets its own dimension, so the
 * cosine similarity of two phrases is their word overlap.
 */
export class StubEmbeddings implements EmbeddingProvider {
    readonly name = 'stub';
    readonly model = 'stub-embedding';
    calls = 0;
    private readonly vocabulary = new Map<string, number>();

    constructor(
        private readonly dimensions = 64,
        private readonly fail = false
    ) {}

    async embed(texts: string[]): Promise<EmbeddingVector[]> {
        this.calls++;
        if (this.fail) throw new Error('embedding service down');
        return texts.map((text) => this.vectorFor(text));
    }

    vectorFor(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);
        for (const word of text.toLowerCase().split(/\s+/)) {
            if (!word) continue;
            let slot = this.vocabulary.get(word);
            if (slot === undefined) {
                slot = this.vocabulary.size;
                this.vocabulary.set(word, slot);
            }
            vector[slot % this.dimensions] = 1;
        }
        return vector;
    }
}

/**
 * Reply that never arrives; rejects with the abort reason once `signal` fires.
 */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<string> {
    return new Promise((_, reject) => {
        signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

// ─── fetch stubs ─────────────────────────────────────────

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

/**
 * URL, parsed JSON body and headers of the n-th call to a stubbed fetch.
 */
export function recordedRequest(
    fetchMock: Mock<typeof fetch>,
    n = 0
): { url: string; method: string | undefined; body: unknown; headers: Headers } {
    const call = fetchMock.mock.calls[n];
    if (!call) throw new Error(`fetch was not called ${n + 1} time(s)`);
    const [input, init] = call;
    return {
        url: String(input),
        method: init?.method,
        body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
        headers: new Headers(init?.headers),
    };
}

// ─── Fixtures ────────────────────────────────────────────

export const SAMPLE_PHRASES: PhraseInput[] = [
    { text: 'running shoes for men', source: 'autocomplete' },
    { text: 'running shoes for women', source: 'keyword_relations' },
    { text: 'running shoes for kids' },
    { text: 'yoga mat for beginners', source: 'autocomplete' },
    { text: 'yoga mat for travel' },
    { text: 'zebra' },
];

/**
 * Density-clustered result for SAMPLE_PHRASES: two groups and one unclustered phrase.
 */
export async function sampleResult(taskId = 'sport shop'): Promise<ClusteringResult> {
    const orchestrator = new ClusteringOrchestrator({ llm: () => null, embeddings: { provider: new StubEmbeddings() } });
    return orchestrator.cluster(SAMPLE_PHRASES, { useAiClustering: false }, { taskId });
}
