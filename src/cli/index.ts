#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { EmbeddingCache } from '../cache/embedding-cache.js';
import { createOrchestrator } from '../clustering/index.js';
import type { ClusteringOverrides } from '../clustering/options.js';
import { EXPORT_EXTENSIONS, EXPORT_FORMATS, exportSession, isExportFormat } from '../exporters/export.js';
import { ClusterDatabase } from '../storage/database.js';
import type { AiProviderName, ClusteringResult, KwClusterConfig, LogLevel } from '../types/index.js';
import { resolveConfig } from '../utils/config.js';
import { getHttpClient } from '../utils/http-client.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { readPhraseFile } from '../utils/phrase-file.js';

const VERSION = '1.0.0';

const PROVIDERS: readonly AiProviderName[] = ['openai', 'anthropic', 'ollama'];
const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

// ─── Option parsers ───────────────────────────────────────

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseRatio(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
        throw new InvalidArgumentError('Expected a number between 0 and 1.');
    }
    return parsed;
}

function parseProvider(value: string): AiProviderName {
    const name = value.toLowerCase() === 'claude' ? 'anthropic' : value.toLowerCase();
    const provider = PROVIDERS.find((candidate) => candidate === name);
    if (!provider) throw new InvalidArgumentError(`Expected one of: ${PROVIDERS.join(', ')}.`);
    return provider;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
    return level;
}

interface ClusterCommandOptions {
    input: string;
    out?: string;
    seed?: string;
    ai: boolean;
    provider?: AiProviderName;
    batchSize?: number;
    minGroupSize?: number;
    outlierCeiling?: number;
    targetMin?: number;
    targetMax?: number;
    timeout?: number;
    mergeSimilarNames?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    cache: boolean;
}

function clusteringFlags(opts: ClusterCommandOptions): ClusteringOverrides {
    if ((opts.targetMin === undefined) !== (opts.targetMax === undefined)) {
        throw new InvalidArgumentError('--target-min and --target-max must be given together.');
    }

    return {
        useAiClustering: opts.ai ? undefined : false,
        aiProvider: opts.provider,
        batchSize: opts.batchSize,
        minGroupSize: opts.minGroupSize,
        outlierRatioCeiling: opts.outlierCeiling,
        targetGroupRange:
            opts.targetMin !== undefined && opts.targetMax !== undefined
                ? { min: opts.targetMin, max: opts.targetMax }
                : undefined,
        sessionTimeoutMs: opts.timeout,
        mergeSimilarNames: opts.mergeSimilarNames,
    };
}

function printSummary(result: ClusteringResult, dbPath: string): void {
    const { metrics } = result;
    console.log('\n📊 Clustering summary\n');
    console.log(`  Session:     ${result.sessionId}`);
    console.log(`  Provenance:  ${result.provenance}${result.fallbackReason ? ` (${result.fallbackReason})` : ''}`);
    console.log(`  Phrases:     ${metrics.totalPhrases}`);
    console.log(`  Groups:      ${metrics.groupCount}`);
    console.log(`  Unclustered: ${metrics.outlierCount} (${(metrics.outlierRatio * 100).toFixed(1)}%)`);
    console.log(`  Quality goal ${metrics.qualityGoalAchieved ? 'met' : 'missed'}`);
    console.log('');
    for (const group of result.groups) {
        console.log(`  [${group.label}] ${group.name} (${group.size})`);
    }
    console.log(`\n  Saved to ${dbPath}\n`);
}

const program = new Command();

program
    .name('kwcluster')
    .description('Cluster SEO keyword phrases into semantic groups with an LLM, falling back to density clustering.')
    .version(VERSION);

// ─── CLUSTER command ──────────────────────────────────────

program
    .command('cluster')
    .description('Cluster the phrases of a file and store the session')
    .requiredOption('-i, --input <file>', 'Phrase file: .txt (one per line), .json or .csv')
    .option('-o, --out <path>', 'Output database path')
    .option('--seed <keyword>', 'Seed keyword the phrases were collected for')
    .option('--no-ai', 'Skip the AI pipeline and use density clustering')
    .option('--provider <name>', 'AI provider: openai | anthropic | ollama', parseProvider)
    .option('--batch-size <n>', 'Phrases per AI batch', parseInteger)
    .option('--min-group-size <n>', 'Smallest group kept by the finalizer', parseInteger)
    .option('--outlier-ceiling <ratio>', 'Highest acceptable unclustered share', parseRatio)
    .option('--target-min <n>', 'Default lower bound for the group count', parseInteger)
    .option('--target-max <n>', 'Default upper bound for the group count', parseInteger)
    .option('--timeout <ms>', 'Deadline for the AI pipeline', parseInteger)
    .option('--merge-similar-names', 'Merge groups with near-identical names')
    .option('--log-level <level>', 'Log level: silent | error | warn | info | debug', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .option('--no-cache', 'Disable the embedding cache')
    .action(async (opts: ClusterCommandOptions) => {
        let config: KwClusterConfig;
        try {
            config = await resolveConfig({
                out: opts.out,
                seed: opts.seed,
                logLevel: opts.logLevel,
                jsonLogs: opts.jsonLogs,
                noCache: opts.cache ? undefined : true,
                clustering: clusteringFlags(opts),
            });
        } catch (error) {
            console.error(`Invalid configuration: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        }
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        getHttpClient({ version: VERSION });

        const logger = getLogger();

        try {
            const phrases = readPhraseFile(opts.input);
            logger.info({ input: opts.input, phrases: phrases.length }, 'Phrases loaded');

            const result = await createOrchestrator(config).cluster(phrases, config.clustering, {
                taskId: config.seed ?? null,
            });

            const db = new ClusterDatabase(config.out);
            try {
                db.saveResult(result);
            } finally {
                db.close();
            }

            printSummary(result, config.out);
        } catch (error) {
            logger.error({ error }, 'Clustering failed');
            process.exit(1);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export a stored session to JSON, CSV, or Markdown')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .requiredOption('-f, --format <format>', 'Export format: json | csv | markdown')
    .option('-s, --session <id>', 'Session id (default: latest)')
    .option('-o, --out <path>', 'Output file path')
    .action((opts: { input: string; format: string; session?: string; out?: string }) => {
        const format = opts.format.toLowerCase();

        if (!isExportFormat(format)) {
            console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exit(1);
        }

        const outputPath = opts.out ?? opts.input.replace(/\.db$/, '') + EXPORT_EXTENSIONS[format];

        try {
            const sessionId = exportSession(opts.input, outputPath, format, opts.session);
            console.log(`Exported session ${sessionId} to ${outputPath}`);
        } catch (error) {
            console.error('Export failed:', error);
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: { input: string }) => {
        try {
            const db = new ClusterDatabase(opts.input);
            const stats = db.getStats();
            const recent = db.listSessions(5);
            db.close();

            console.log('\n📊 kwcluster Database Statistics\n');
            console.log(`  Sessions: ${stats.sessions}`);
            console.log(`  Groups:   ${stats.groups}`);
            console.log(`  Members:  ${stats.members}`);

            if (Object.keys(stats.sessionsByProvenance).length > 0) {
                console.log('\n  Provenance:');
                for (const [provenance, count] of Object.entries(stats.sessionsByProvenance)) {
                    console.log(`    ${provenance}: ${count}`);
                }
            }

            if (recent.length > 0) {
                console.log('\n  Recent sessions:');
                for (const session of recent) {
                    const goal = session.quality_goal_achieved ? 'goal met' : 'goal missed';
                    console.log(
                        `    ${session.session_id}  ${session.task_id ?? '-'}  ${session.group_count} groups  ${goal}`
                    );
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the embedding cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        const config = await resolveConfig({});
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const cache = new EmbeddingCache({ cacheDir: config.cacheDir });

        switch (action) {
            case 'clear': {
                const removed = cache.clear();
                console.log(removed > 0 ? `Cache cleared (${removed} entries).` : 'No cache to clear.');
                break;
            }
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB in ${stats.directory}`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

await program.parseAsync();
