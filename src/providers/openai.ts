import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { readBody } from './response.js';

const OPENAI_BASE = 'https://api.openai.com/v1';

const chatCompletionSchema = z.object({
    model: z.string(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

/**
 * OpenAI chat completions adapter.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai';
    readonly supportsStructuredOutput = true;
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(options: LlmProviderOptions) {
        this.apiKey = options.apiKey ?? process.env['OPENAI_API_KEY'];
        this.baseUrl = (options.baseUrl ?? OPENAI_BASE).replace(/\/+$/, '');
        this.model = options.model;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.apiKey);
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages = [
            ...(params.systemPrompt ? [{ role: 'system', content: params.systemPrompt }] : []),
            { role: 'user', content: prompt },
        ];

        const response = await this.httpClient.post(
            `${this.baseUrl}/chat/completions`,
            {
                model: params.model ?? this.model,
                messages,
                temperature: params.temperature,
                max_tokens: params.maxTokens,
                ...(params.jsonMode ? { response_format: { type: 'json_object' } } : {}),
            },
            {
                source: 'openai',
                headers: { Authorization: `Bearer ${this.apiKey ?? ''}` },
                signal: params.signal,
            }
        );

        const body = readBody(this.name, chatCompletionSchema, response.data);
        const usage = body.usage;
        return {
            text: body.choices[0]?.message.content ?? '',
            usage: {
                promptTokens: usage?.prompt_tokens ?? 0,
                completionTokens: usage?.completion_tokens ?? 0,
                totalTokens: usage?.total_tokens ?? 0,
            },
            model: body.model,
            provider: this.name,
        };
    }
}
