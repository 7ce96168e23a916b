import { z } from 'zod';
import type { EmbeddingProvider, EmbeddingProviderOptions, EmbeddingVector } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { OLLAMA_BASE } from './ollama.js';
import { ProviderResponseError, readBody } from './response.js';

const OPENAI_BASE = 'https://api.openai.com/v1';

const openAiEmbeddingSchema = z.object({
    data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int() })),
});

const ollamaEmbeddingSchema = z.object({
    embeddings: z.array(z.array(z.number())),
});

/**
 * OpenAI embeddings endpoint; one request per chunk of texts.
 */
export class OpenAiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'openai';
    readonly model: string;
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly dimensions?: number;

    constructor(options: EmbeddingProviderOptions) {
        this.apiKey = options.apiKey ?? process.env['OPENAI_API_KEY'];
        this.baseUrl = (options.baseUrl ?? OPENAI_BASE).replace(/\/+$/, '');
        this.model = options.model;
        this.dimensions = options.dimensions;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
        if (texts.length === 0) return [];
        if (!this.apiKey) {
            throw new ProviderResponseError(this.name, 'OPENAI_API_KEY is not set');
        }

        const response = await this.httpClient.post(
            `${this.baseUrl}/embeddings`,
            {
                model: this.model,
                input: texts,
                ...(this.dimensions ? { dimensions: this.dimensions } : {}),
            },
            {
                source: 'embeddings',
                headers: { Authorization: `Bearer ${this.apiKey}` },
                signal,
            }
        );

        const body = readBody(this.name, openAiEmbeddingSchema, response.data);
        return [...body.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    }
}

/**
 * Ollama `/api/embed`, which takes a batch of inputs.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'ollama';
    readonly model: string;
    private httpClient: HttpClient;
    private readonly baseUrl: string;

    constructor(options: EmbeddingProviderOptions) {
        this.baseUrl = (options.baseUrl ?? OLLAMA_BASE).replace(/\/+$/, '');
        this.model = options.model;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
        if (texts.length === 0) return [];

        const response = await this.httpClient.post(
            `${this.baseUrl}/api/embed`,
            { model: this.model, input: texts },
            { source: 'ollama', signal }
        );

        return readBody(this.name, ollamaEmbeddingSchema, response.data).embeddings;
    }
}
