import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_CONFIG } from '../types/index.js';
import { getApiKey, loadEnvVars, mergeConfig } from '../utils/config.js';
import { firstCsvField, parsePhrases } from '../utils/phrase-file.js';
import { RetryExhaustedError, backoffDelay, withRetry } from '../utils/retry.js';
import { ClusteringInputError } from '../clustering/errors.js';

describe('Config', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should aim for 8-12 groups with at most 35% unclustered', () => {
            expect(DEFAULT_CONFIG.clustering.targetGroupRange).toEqual({ min: 8, max: 12 });
            expect(DEFAULT_CONFIG.clustering.outlierRatioCeiling).toBe(0.35);
        });

        it('should retry each AI stage three times', () => {
            expect(DEFAULT_CONFIG.clustering.maxAttempts).toBe(3);
        });

        it('should have AI clustering enabled by default', () => {
            expect(DEFAULT_CONFIG.clustering.useAiClustering).toBe(true);
            expect(DEFAULT_CONFIG.clustering.aiProvider).toBe('openai');
        });
    });

    describe('loadEnvVars', () => {
        it('should map environment variables onto config fields', () => {
            expect(
                loadEnvVars({
                    AI_PROVIDER: 'Claude',
                    USE_AI_CLUSTERING: 'false',
                    LOG_LEVEL: 'debug',
                    AI_MODEL_OLLAMA: 'qwen-test',
                    EMBEDDING_MODEL: 'embed-test',
                })
            ).toEqual({
                logLevel: 'debug',
                clustering: { useAiClustering: false, aiProvider: 'anthropic' },
                llm: { ollamaModel: 'qwen-test' },
                embedding: { model: 'embed-test' },
            });
        });

        it('should ignore unknown values', () => {
            const env = loadEnvVars({ AI_PROVIDER: 'gemini', LOG_LEVEL: 'loud' });
            expect(env.logLevel).toBeUndefined();
            expect(env.clustering).toEqual({});
        });

        it('should accept the usual spellings of true', () => {
            expect(loadEnvVars({ USE_AI_CLUSTERING: 'YES' }).clustering).toEqual({ useAiClustering: true });
            expect(loadEnvVars({ USE_AI_CLUSTERING: '1' }).clustering).toEqual({ useAiClustering: true });
        });
    });

    describe('mergeConfig', () => {
        it('should return defaults without sources', () => {
            expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
        });

        it('should let later sources win and merge nested objects', () => {
            const config = mergeConfig(
                { clustering: { batchSize: 10, fallback: { epsilon: 0.2 } }, llm: { ollamaModel: 'file-model' } },
                { clustering: { batchSize: 20 } },
                { out: 'cli.db', llm: { temperature: 0 } }
            );

            expect(config.out).toBe('cli.db');
            expect(config.clustering.batchSize).toBe(20);
            expect(config.clustering.fallback).toEqual({ epsilon: 0.2, minSamples: 2 });
            expect(config.llm).toEqual({ ...DEFAULT_CONFIG.llm, ollamaModel: 'file-model', temperature: 0 });
        });

        it('should not let undefined values shadow earlier ones', () => {
            const config = mergeConfig({ out: 'file.db' }, { out: undefined, clustering: { batchSize: undefined } });
            expect(config.out).toBe('file.db');
            expect(config.clustering.batchSize).toBe(25);
        });

        it('should reject invalid clustering options', () => {
            expect(() => mergeConfig({ clustering: { outlierRatioCeiling: 1.5 } })).toThrow(ClusteringInputError);
        });
    });

    describe('getApiKey', () => {
        afterEach(() => {
            vi.unstubAllEnvs();
        });

        it('should treat blank keys as missing', () => {
            vi.stubEnv('OPENAI_API_KEY', '   ');
            expect(getApiKey('OPENAI_API_KEY')).toBeUndefined();

            vi.stubEnv('OPENAI_API_KEY', 'test-secret');
            expect(getApiKey('OPENAI_API_KEY')).toBe('test-secret');
        });
    });
});

describe('Phrase files', () => {
    it('should read one phrase per line from text files', () => {
        expect(parsePhrases('running shoes\n\n  \nyoga mat\r\n', '.txt')).toEqual(['running shoes', 'yoga mat']);
    });

    it('should read the first CSV column and skip a header', () => {
        const csv = 'keyword,volume\nrunning shoes,1200\n"shoes, ""cheap""",300\n';
        expect(parsePhrases(csv, '.CSV')).toEqual(['running shoes', 'shoes, "cheap"']);
    });

    it('should keep the first row when it is not a header', () => {
        expect(parsePhrases('yoga mat,10\nski jacket,20', '.csv')).toEqual(['yoga mat', 'ski jacket']);
    });

    it('should read JSON strings and objects', () => {
        const json = JSON.stringify(['yoga mat', { text: 'ski jacket', source: 'autocomplete' }]);
        expect(parsePhrases(json, '.json')).toEqual(['yoga mat', { text: 'ski jacket', source: 'autocomplete' }]);
    });

    it('should reject JSON that is not a phrase list', () => {
        expect(() => parsePhrases('{"phrases": []}', '.json')).toThrow('JSON phrase file must be an array');
    });

    it('should parse quoted CSV fields', () => {
        expect(firstCsvField('"a ""b"" c",d')).toBe('a "b" c');
        expect(firstCsvField('plain,rest')).toBe('plain');
    });
});

describe('withRetry', () => {
    it('should compute exponential backoff', () => {
        expect([0, 1, 2].map((attempt) => backoffDelay(100, attempt))).toEqual([100, 200, 400]);
    });

    it('should return the first successful attempt', async () => {
        const fn = vi.fn<(attempt: number) => Promise<string>>()
            .mockRejectedValueOnce(new Error('flaky'))
            .mockResolvedValueOnce('done');
        const onRetry = vi.fn();

        const result = await withRetry(fn, { attempts: 3, baseDelayMs: 0, label: 'test', onRetry });

        expect(result).toBe('done');
        expect(fn).toHaveBeenCalledTimes(2);
        expect(onRetry).toHaveBeenCalledWith({ attempt: 0, delayMs: 0, error: new Error('flaky') });
    });

    it('should throw RetryExhaustedError with the last error', async () => {
        let calls = 0;
        const error = await withRetry(
            async () => {
                calls++;
                throw new Error(`failure ${calls}`);
            },
            { attempts: 3, baseDelayMs: 0, label: 'test' }
        ).catch((e: unknown) => e);

        expect(calls).toBe(3);
        expect(error).toBeInstanceOf(RetryExhaustedError);
        expect(error).toMatchObject({ label: 'test', attempts: 3, message: 'test failed after 3 attempt(s): failure 3' });
    });

    it('should stop at once when the signal is aborted', async () => {
        const controller = new AbortController();
        let calls = 0;

        const error = await withRetry(
            async () => {
                calls++;
                controller.abort(new Error('deadline'));
                throw new Error('aborted');
            },
            { attempts: 3, baseDelayMs: 0, label: 'test', signal: controller.signal }
        ).catch((e: unknown) => e);

        expect(calls).toBe(1);
        expect(error).toEqual(new Error('aborted'));
    });
});
