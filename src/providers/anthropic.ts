import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { readBody } from './response.js';

const ANTHROPIC_BASE = 'https://api.anthropic.com/v1';
const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 4096;

const messagesSchema = z.object({
    model: z.string(),
    content: z.array(
        z.object({
            type: z.string(),
            text: z.string().optional(),
        })
    ),
    usage: z
        .object({
            input_tokens: z.number(),
            output_tokens: z.number(),
        })
        .optional(),
});

/**
 * Anthropic messages adapter. There is no JSON mode, so `jsonMode` only adds
 * an instruction to the system prompt.
 *
 * @see https://docs.anthropic.com/en/api/messages
 */
export class AnthropicProvider implements LlmProvider {
    readonly name = 'anthropic';
    readonly supportsStructuredOutput = false;
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(options: LlmProviderOptions) {
        this.apiKey = options.apiKey ?? process.env['ANTHROPIC_API_KEY'];
        this.baseUrl = (options.baseUrl ?? ANTHROPIC_BASE).replace(/\/+$/, '');
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
        const system = [
            params.systemPrompt,
            params.jsonMode ? 'Respond with valid JSON only, without code fences.' : undefined,
        ]
            .filter(Boolean)
            .join('\n\n');

        const response = await this.httpClient.post(
            `${this.baseUrl}/messages`,
            {
                model: params.model ?? this.model,
                max_tokens: params.maxTokens ?? DEFAULT_MAX_TOKENS,
                temperature: params.temperature,
                ...(system ? { system } : {}),
                messages: [{ role: 'user', content: prompt }],
            },
            {
                source: 'anthropic',
                headers: {
                    'x-api-key': this.apiKey ?? '',
                    'anthropic-version': ANTHROPIC_VERSION,
                },
                signal: params.signal,
            }
        );

        const body = readBody(this.name, messagesSchema, response.data);
        const text = body.content
            .filter((block) => block.type === 'text')
            .map((block) => block.text ?? '')
            .join('');
        const input = body.usage?.input_tokens ?? 0;
        const output = body.usage?.output_tokens ?? 0;

        return {
            text,
            usage: { promptTokens: input, completionTokens: output, totalTokens: input + output },
            model: body.model,
            provider: this.name,
        };
    }
}
