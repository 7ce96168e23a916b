import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import { createHttpClient, getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/retry.js';
import { readBody } from './response.js';

export const OLLAMA_BASE = 'http://localhost:11434';

const chatSchema = z.object({
    model: z.string(),
    message: z.object({ content: z.string() }),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Local Ollama chat adapter.
 *
 * @see https://github.com/ollama/ollama/blob/main/docs/api.md
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly supportsStructuredOutput = true;
    private httpClient: HttpClient;
    /** No retries, so a missing server is detected quickly */
    private probeClient: HttpClient;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(options: LlmProviderOptions) {
        this.baseUrl = (options.baseUrl ?? OLLAMA_BASE).replace(/\/+$/, '');
        this.model = options.model;
        this.httpClient = getHttpClient();
        this.probeClient = createHttpClient({ maxRetries: 0, timeout: 2000 });
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
        this.probeClient = client;
    }

    /**
     * Whether the local server answers.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.probeClient.get(`${this.baseUrl}/api/tags`, { source: 'ollama' });
            return response.ok;
        } catch (error) {
            getLogger().debug({ baseUrl: this.baseUrl, error: describeError(error) }, 'Ollama not reachable');
            return false;
        }
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const messages = [
            ...(params.systemPrompt ? [{ role: 'system', content: params.systemPrompt }] : []),
            { role: 'user', content: prompt },
        ];

        const response = await this.httpClient.post(
            `${this.baseUrl}/api/chat`,
            {
                model: params.model ?? this.model,
                messages,
                stream: false,
                ...(params.jsonMode ? { format: 'json' } : {}),
                options: {
                    temperature: params.temperature,
                    num_predict: params.maxTokens,
                },
            },
            { source: 'ollama', signal: params.signal }
        );

        const body = readBody(this.name, chatSchema, response.data);
        const promptTokens = body.prompt_eval_count ?? 0;
        const completionTokens = body.eval_count ?? 0;
        return {
            text: body.message.content,
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: body.model,
            provider: this.name,
        };
    }
}
