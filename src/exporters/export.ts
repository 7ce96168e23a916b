import { writeFileSync } from 'node:fs';
import { ClusterDatabase, type GroupWithPhrases } from '../storage/database.js';
import type { SessionRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv' | 'markdown';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'markdown'];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
    json: '.json',
    csv: '.csv',
    markdown: '.md',
};

export interface ExportData {
    session: SessionRecord;
    groups: GroupWithPhrases[];
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Export one stored session (the latest when `sessionId` is omitted) to a file.
 * @returns the exported session id
 */
export function exportSession(
    dbPath: string,
    outputPath: string,
    format: ExportFormat,
    sessionId?: string
): string {
    const db = new ClusterDatabase(dbPath);

    try {
        const session = sessionId ? db.getSession(sessionId) : db.getLatestSession();
        if (!session) {
            throw new Error(sessionId ? `Session not found: ${sessionId}` : 'Database contains no sessions');
        }

        const data: ExportData = { session, groups: db.getGroupsWithPhrases(session.session_id) };
        writeFileSync(outputPath, renderExport(data, format), 'utf-8');
        getLogger().info(
            { format, outputPath, sessionId: session.session_id, groups: data.groups.length },
            'Session exported'
        );
        return session.session_id;
    } finally {
        db.close();
    }
}

export function renderExport(data: ExportData, format: ExportFormat): string {
    switch (format) {
        case 'json':
            return exportJson(data);
        case 'csv':
            return exportCSV(data);
        case 'markdown':
            return exportMarkdown(data);
    }
}

// ─── Format Implementations ─────────────────────────────

function parseJson(text: string | null): unknown {
    return text ? JSON.parse(text) : null;
}

function exportJson(data: ExportData): string {
    const { session } = data;
    return JSON.stringify({
        kwcluster: {
            version: '1.0.0',
            exported_at: new Date().toISOString(),
        },
        session: {
            id: session.session_id,
            task_id: session.task_id,
            status: session.status,
            provenance: session.provenance,
            fallback_reason: session.fallback_reason,
            started_at: session.started_at,
            finished_at: session.finished_at,
            strategy: parseJson(session.strategy_json),
            metrics: parseJson(session.metrics_json),
        },
        groups: data.groups.map((g) => ({
            number: g.group_number,
            label: g.group_label,
            description: g.description,
            size: g.phrases_count,
            representative: g.representative_phrase,
            phrases: g.phrases,
        })),
    }, null, 2);
}

function csvField(value: string): string {
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function exportCSV(data: ExportData): string {
    let csv = 'group_number,group_label,phrase,is_representative\n';
    for (const group of data.groups) {
        for (const phrase of group.phrases) {
            csv += [
                group.group_number,
                csvField(group.group_label),
                csvField(phrase),
                phrase === group.representative_phrase ? 1 : 0,
            ].join(',') + '\n';
        }
    }
    return csv;
}

function exportMarkdown(data: ExportData): string {
    const { session, groups } = data;
    const outliers = groups.find((g) => g.group_number === -1)?.phrases_count ?? 0;
    const ratio = session.total_phrases > 0 ? (outliers / session.total_phrases) * 100 : 0;

    const lines = [
        `# Keyword groups: ${session.task_id ?? session.session_id}`,
        '',
        `- Session: \`${session.session_id}\``,
        `- Provenance: ${session.provenance ?? 'unknown'}${session.fallback_reason ? ` (${session.fallback_reason})` : ''}`,
        `- Phrases: ${session.total_phrases}, groups: ${session.group_count}, unclustered: ${ratio.toFixed(1)}%`,
    ];

    for (const group of groups) {
        lines.push('', `## ${group.group_label} (${group.phrases_count})`);
        if (group.description) lines.push('', group.description);
        lines.push('');
        for (const phrase of group.phrases) {
            lines.push(`- ${phrase}`);
        }
    }

    return lines.join('\n') + '\n';
}
