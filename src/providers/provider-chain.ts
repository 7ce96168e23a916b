import type { LlmCompletionParams, LlmCompletionResult, LlmProvider } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/retry.js';

/**
 * Tries each provider in order until one answers.
 * Providers that report themselves unavailable are skipped for the rest of the run.
 */
export class ProviderChain implements LlmProvider {
    readonly name: string;
    readonly supportsStructuredOutput: boolean;
    private readonly availability = new Map<LlmProvider, boolean>();

    constructor(private readonly providers: readonly LlmProvider[]) {
        if (providers.length === 0) {
            throw new Error('ProviderChain needs at least one provider');
        }
        this.name = providers.map((provider) => provider.name).join('>');
        this.supportsStructuredOutput = providers.every((provider) => provider.supportsStructuredOutput);
    }

    async isAvailable(): Promise<boolean> {
        for (const provider of this.providers) {
            if (await this.check(provider)) return true;
        }
        return false;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        let lastError: unknown = new Error('No provider in the chain is available');

        for (const provider of this.providers) {
            if (!(await this.check(provider))) continue;
            try {
                return await provider.complete(prompt, params);
            } catch (error) {
                if (params.signal?.aborted) throw error;
                lastError = error;
                getLogger().warn({ provider: provider.name, error: describeError(error) }, 'Provider failed, trying next');
            }
        }

        throw lastError;
    }

    private async check(provider: LlmProvider): Promise<boolean> {
        const known = this.availability.get(provider);
        if (known !== undefined) return known;

        let available: boolean;
        try {
            available = await provider.isAvailable();
        } catch (error) {
            getLogger().debug({ provider: provider.name, error: describeError(error) }, 'Availability check failed');
            available = false;
        }
        this.availability.set(provider, available);
        return available;
    }
}
