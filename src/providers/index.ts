import type { AiProviderName, EmbeddingProvider, KwClusterConfig, LlmProvider } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { AnthropicProvider } from './anthropic.js';
import { OllamaEmbeddingProvider, OpenAiEmbeddingProvider } from './embeddings.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiProvider } from './openai.js';
import { ProviderChain } from './provider-chain.js';

const CHAIN_ORDER: readonly AiProviderName[] = ['openai', 'anthropic', 'ollama'];

function createLlmProvider(name: AiProviderName, config: KwClusterConfig): LlmProvider | null {
    switch (name) {
        case 'openai': {
            const apiKey = getApiKey('OPENAI_API_KEY');
            return apiKey ? new OpenAiProvider({ apiKey, model: config.llm.openaiModel }) : null;
        }
        case 'anthropic': {
            const apiKey = getApiKey('ANTHROPIC_API_KEY');
            return apiKey ? new AnthropicProvider({ apiKey, model: config.llm.anthropicModel }) : null;
        }
        case 'ollama':
            return new OllamaProvider({ baseUrl: config.llm.ollamaBaseUrl, model: config.llm.ollamaModel });
    }
}

/**
 * Provider chain for the AI path: the configured backend first, then the other
 * cloud backends that have credentials. Ollama joins only when it is the
 * configured backend. Returns null when nothing is usable.
 */
export function resolveLlmProvider(config: KwClusterConfig): LlmProvider | null {
    const primary = config.clustering.aiProvider;
    const order = [primary, ...CHAIN_ORDER.filter((name) => name !== primary && name !== 'ollama')];

    const providers = order.flatMap((name) => {
        const provider = createLlmProvider(name, config);
        return provider ? [provider] : [];
    });

    if (providers.length === 0) return null;
    return providers.length === 1 ? providers[0] ?? null : new ProviderChain(providers);
}

/**
 * Embedding provider for the fallback path, or null without credentials.
 */
export function resolveEmbeddingProvider(config: KwClusterConfig): EmbeddingProvider | null {
    const { embedding } = config;
    if (embedding.provider === 'ollama') {
        return new OllamaEmbeddingProvider({ baseUrl: config.llm.ollamaBaseUrl, model: embedding.model });
    }

    const apiKey = getApiKey('OPENAI_API_KEY');
    return apiKey
        ? new OpenAiEmbeddingProvider({ apiKey, model: embedding.model, dimensions: embedding.dimensions })
        : null;
}

export { AnthropicProvider, OllamaProvider, OpenAiProvider, ProviderChain, OllamaEmbeddingProvider, OpenAiEmbeddingProvider };
