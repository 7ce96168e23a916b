import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type AiProviderName,
    type EmbeddingConfig,
    type KwClusterConfig,
    type LlmConfig,
    type LogLevel,
} from '../types/index.js';
import {
    clusteringOverridesSchema,
    definedOnly,
    resolveClusteringOptions,
    type ClusteringOverrides,
} from '../clustering/options.js';
import { getLogger } from './logger.js';

/**
 * Config values as given by CLI flags, env vars or the config file: every field optional.
 */
export type ConfigOverrides = Partial<Omit<KwClusterConfig, 'clustering' | 'llm' | 'embedding'>> & {
    clustering?: ClusteringOverrides;
    llm?: Partial<LlmConfig>;
    embedding?: Partial<EmbeddingConfig>;
};

const configFileSchema = z
    .object({
        out: z.string(),
        seed: z.string(),
        cacheDir: z.string(),
        noCache: z.boolean(),
        logLevel: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
        clustering: clusteringOverridesSchema,
        llm: z
            .object({
                openaiModel: z.string(),
                anthropicModel: z.string(),
                ollamaModel: z.string(),
                ollamaBaseUrl: z.string(),
                temperature: z.number(),
                maxTokens: z.number().int().positive(),
            })
            .partial(),
        embedding: z
            .object({
                provider: z.enum(['openai', 'ollama']),
                model: z.string(),
                dimensions: z.number().int().positive(),
                chunkSize: z.number().int().positive(),
            })
            .partial(),
    })
    .partial();

/**
 * Load configuration from kwcluster.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('kwcluster', {
        searchPlaces: ['kwcluster.config.json', 'package.json'],
    });

    try {
        const result = await explorer.search();
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Ignoring invalid config file');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

function parseBoolean(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseProvider(value: string | undefined): AiProviderName | undefined {
    const normalized = value?.trim().toLowerCase();
    if (normalized === 'claude') return 'anthropic';
    if (normalized === 'openai' || normalized === 'anthropic' || normalized === 'ollama') return normalized;
    return undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
    const levels: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];
    return levels.find((level) => level === value);
}

/**
 * Read relevant environment variables.
 * API keys are read where they are used, never stored in config.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    return {
        logLevel: parseLogLevel(env['LOG_LEVEL']),
        clustering: definedOnly({
            useAiClustering: parseBoolean(env['USE_AI_CLUSTERING']),
            aiProvider: parseProvider(env['AI_PROVIDER']),
        }),
        llm: definedOnly({
            openaiModel: env['AI_MODEL_OPENAI'],
            anthropicModel: env['AI_MODEL_CLAUDE'],
            ollamaModel: env['AI_MODEL_OLLAMA'],
            ollamaBaseUrl: env['OLLAMA_BASE_URL'],
        }),
        embedding: definedOnly({
            model: env['EMBEDDING_MODEL'],
        }),
    };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(cliFlags: ConfigOverrides): Promise<KwClusterConfig> {
    const fileConfig = await loadConfigFile();
    const envConfig = loadEnvVars();
    return mergeConfig(fileConfig, envConfig, cliFlags);
}

/**
 * Layer config sources over the defaults, later sources winning.
 * @throws ClusteringInputError when the merged clustering options are invalid
 */
export function mergeConfig(...sources: Array<ConfigOverrides | null>): KwClusterConfig {
    let merged: KwClusterConfig = DEFAULT_CONFIG;

    for (const source of sources) {
        if (!source) continue;
        const { clustering, llm, embedding, ...rest } = source;

        merged = {
            ...merged,
            ...definedOnly(rest),
            // Deep merge nested objects
            clustering: resolveClusteringOptions(clustering, merged.clustering),
            llm: { ...merged.llm, ...definedOnly(llm ?? {}) },
            embedding: { ...merged.embedding, ...definedOnly(embedding ?? {}) },
        };
    }

    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    const value = process.env[name];
    return value && value.trim() !== '' ? value : undefined;
}
