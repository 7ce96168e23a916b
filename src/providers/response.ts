import { z } from 'zod';

/**
 * A provider answered with a body we cannot read.
 */
export class ProviderResponseError extends Error {
    constructor(
        public readonly provider: string,
        message: string
    ) {
        super(`${provider}: ${message}`);
        this.name = 'ProviderResponseError';
    }
}

/**
 * Check a provider's JSON body against the fields we use.
 */
export function readBody<S extends z.ZodTypeAny>(provider: string, schema: S, data: unknown): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ProviderResponseError(provider, `unexpected response (${issues.join('; ')})`);
    }
    return parsed.data;
}
