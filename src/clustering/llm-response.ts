import { z } from 'zod';
import type { LlmCompletionParams, LlmProvider } from '../types/index.js';
import { ResponseValidationError } from './errors.js';
import type { Prompt } from './prompts.js';

/**
 * Model settings forwarded on every AI call of a session.
 */
export type AiCallSettings = Pick<LlmCompletionParams, 'model' | 'temperature' | 'maxTokens'>;

/**
 * Pull the JSON object out of a model reply.
 * Handles code fences and prose around the object.
 */
export function parseJsonFromText(text: string): unknown {
    const unfenced = text.replace(/```(?:json)?/gi, '');
    const firstBrace = unfenced.indexOf('{');
    const lastBrace = unfenced.lastIndexOf('}');
    if (firstBrace === -1 || lastBrace <= firstBrace) {
        throw new ResponseValidationError('No JSON object found in response', [], text);
    }

    try {
        return JSON.parse(unfenced.slice(firstBrace, lastBrace + 1));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ResponseValidationError('Response is not valid JSON', [reason], text);
    }
}

/**
 * Parse a model reply and check it against `schema`.
 * @throws ResponseValidationError listing every schema issue
 */
export function decodeResponse<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
    const parsed = schema.safeParse(parseJsonFromText(text));
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        throw new ResponseValidationError('Response does not match the expected shape', issues, text);
    }
    return parsed.data;
}

/**
 * Send a prompt in JSON mode and decode the reply.
 */
export async function requestJson<S extends z.ZodTypeAny>(
    provider: LlmProvider,
    prompt: Prompt,
    schema: S,
    settings: AiCallSettings & { signal?: AbortSignal }
): Promise<z.output<S>> {
    const result = await provider.complete(prompt.user, {
        ...settings,
        systemPrompt: prompt.system,
        jsonMode: true,
    });
    return decodeResponse(result.text, schema);
}
