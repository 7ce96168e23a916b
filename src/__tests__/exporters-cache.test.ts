import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { exportSession, isExportFormat, renderExport, type ExportData } from '../exporters/export.js';
import { EmbeddingCache } from '../cache/embedding-cache.js';
import { ClusterDatabase } from '../storage/database.js';
import { sampleResult } from './helpers.js';

const DATA: ExportData = {
    session: {
        session_id: 's-1',
        task_id: 'shoes',
        status: 'completed',
        provenance: 'ai_with_memory',
        fallback_reason: null,
        total_phrases: 5,
        group_count: 1,
        outlier_ratio: 0.4,
        quality_goal_achieved: 0,
        strategy_json: '{"targetGroupRange":{"min":1,"max":2},"partitionAxes":["brand"],"rationale":""}',
        metrics_json: '{"groupCount":1}',
        error_message: null,
        started_at: '2026-01-01T00:00:00.000Z',
        finished_at: '2026-01-01T00:00:01.000Z',
    },
    groups: [
        {
            group_id: 1,
            session_id: 's-1',
            group_number: 0,
            group_label: 'Shoes, "best"',
            description: 'Footwear',
            phrases_count: 3,
            representative_phrase: 'nike air',
            phrases: ['nike air', 'shoes, cheap', 'say "hi"'],
        },
        {
            group_id: 2,
            session_id: 's-1',
            group_number: -1,
            group_label: 'Unclustered',
            description: null,
            phrases_count: 2,
            representative_phrase: null,
            phrases: ['zebra', 'xylophone'],
        },
    ],
};

describe('Exporters', () => {
    it('should recognise export formats', () => {
        expect(isExportFormat('csv')).toBe(true);
        expect(isExportFormat('graphml')).toBe(false);
    });

    it('should export to JSON', () => {
        const parsed: unknown = JSON.parse(renderExport(DATA, 'json'));

        expect(parsed).toMatchObject({
            kwcluster: { version: '1.0.0' },
            session: {
                id: 's-1',
                task_id: 'shoes',
                provenance: 'ai_with_memory',
                strategy: { targetGroupRange: { min: 1, max: 2 }, partitionAxes: ['brand'], rationale: '' },
                metrics: { groupCount: 1 },
            },
            groups: [
                { number: 0, label: 'Shoes, "best"', size: 3, representative: 'nike air' },
                { number: -1, label: 'Unclustered', size: 2, representative: null, phrases: ['zebra', 'xylophone'] },
            ],
        });
    });

    it('should export to CSV with quoted fields where needed', () => {
        expect(renderExport(DATA, 'csv')).toBe(
            'group_number,group_label,phrase,is_representative\n' +
            '0,"Shoes, ""best""",nike air,1\n' +
            '0,"Shoes, ""best""","shoes, cheap",0\n' +
            '0,"Shoes, ""best""","say ""hi""",0\n' +
            '-1,Unclustered,zebra,0\n' +
            '-1,Unclustered,xylophone,0\n'
        );
    });

    it('should export to Markdown', () => {
        expect(renderExport(DATA, 'markdown')).toBe(
            [
                '# Keyword groups: shoes',
                '',
                '- Session: `s-1`',
                '- Provenance: ai_with_memory',
                '- Phrases: 5, groups: 1, unclustered: 40.0%',
                '',
                '## Shoes, "best" (3)',
                '',
                'Footwear',
                '',
                '- nike air',
                '- shoes, cheap',
                '- say "hi"',
                '',
                '## Unclustered (2)',
                '',
                '- zebra',
                '- xylophone',
            ].join('\n') + '\n'
        );
    });

    describe('exportSession', () => {
        let tmpDir: string;
        let dbPath: string;

        beforeEach(() => {
            tmpDir = mkdtempSync(join(tmpdir(), 'kwcluster-export-'));
            dbPath = join(tmpDir, 'test.db');
        });

        afterEach(() => {
            rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should write the latest session when no id is given', async () => {
            const result = await sampleResult();
            const db = new ClusterDatabase(dbPath);
            db.saveResult(result);
            db.close();

            const outPath = join(tmpDir, 'groups.csv');
            expect(exportSession(dbPath, outPath, 'csv')).toBe(result.sessionId);

            const lines = readFileSync(outPath, 'utf-8').trimEnd().split('\n');
            expect(lines[0]).toBe('group_number,group_label,phrase,is_representative');
            expect(lines[1]).toBe('0,running shoes kids,running shoes for men,1');
            expect(lines.at(-1)).toBe('-1,Unclustered,zebra,0');
        });

        it('should fail on an empty database', () => {
            expect(() => exportSession(dbPath, join(tmpDir, 'out.json'), 'json')).toThrow('Database contains no sessions');
        });

        it('should fail on an unknown session id', () => {
            expect(() => exportSession(dbPath, join(tmpDir, 'out.json'), 'json', 'nope')).toThrow('Session not found: nope');
        });
    });
});

describe('Embedding Cache', () => {
    let cacheDir: string;
    let cache: EmbeddingCache;

    beforeEach(() => {
        cacheDir = mkdtempSync(join(tmpdir(), 'kwcluster-cache-'));
        cache = new EmbeddingCache({ cacheDir });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(cacheDir, { recursive: true, force: true });
    });

    it('should store and retrieve vectors by model and normalized phrase', () => {
        cache.set('model-a', 'Running Shoes', [0.5, 0.25]);

        expect(cache.get('model-a', '  running shoes ')).toEqual([0.5, 0.25]);
        expect(cache.get('model-b', 'running shoes')).toBeNull();
    });

    it('should return null for cache miss', () => {
        expect(cache.get('model-a', 'missing')).toBeNull();
    });

    it('should expire old entries', () => {
        cache.set('model-a', 'yoga mat', [1]);
        const later = Date.now() + 31 * 24 * 60 * 60 * 1000;
        vi.spyOn(Date, 'now').mockReturnValue(later);

        expect(cache.get('model-a', 'yoga mat')).toBeNull();
    });

    it('should report stats and clear entries', () => {
        cache.set('model-a', 'one', [1]);
        cache.set('model-a', 'two', [2]);

        const stats = cache.getStats();
        expect(stats).toMatchObject({ enabled: true, directory: join(cacheDir, 'embeddings'), entries: 2 });
        expect(stats.bytes).toBeGreaterThan(0);

        expect(cache.clear()).toBe(2);
        expect(cache.getStats().entries).toBe(0);
    });

    it('should return null when disabled', () => {
        const disabled = new EmbeddingCache({ cacheDir, enabled: false });
        disabled.set('model-a', 'one', [1]);
        expect(disabled.get('model-a', 'one')).toBeNull();
    });
});
