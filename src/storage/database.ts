import Database from 'better-sqlite3';
import type { ClusteringResult, GroupMemberRecord, GroupRecord, SessionRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Sessions, their groups (group_number -1 is the unclustered bucket) and group members.
 */
const MIGRATION_V1 = `
-- Sessions: one clustering run over one phrase set
CREATE TABLE IF NOT EXISTS clustering_sessions (
  session_id TEXT PRIMARY KEY,
  task_id TEXT,
  status TEXT NOT NULL,
  provenance TEXT,
  fallback_reason TEXT,
  total_phrases INTEGER NOT NULL DEFAULT 0,
  group_count INTEGER NOT NULL DEFAULT 0,
  outlier_ratio REAL NOT NULL DEFAULT 0,
  quality_goal_achieved INTEGER NOT NULL DEFAULT 0,
  strategy_json TEXT,
  metrics_json TEXT NOT NULL DEFAULT '{}',
  error_message TEXT,
  started_at TEXT NOT NULL,
  finished_at TEXT
);

-- Groups of a session
CREATE TABLE IF NOT EXISTS semantic_groups (
  group_id INTEGER PRIMARY KEY,
  session_id TEXT NOT NULL REFERENCES clustering_sessions(session_id) ON DELETE CASCADE,
  group_number INTEGER NOT NULL,
  group_label TEXT NOT NULL,
  description TEXT,
  phrases_count INTEGER NOT NULL DEFAULT 0,
  representative_phrase TEXT
);

-- Phrases of a group
CREATE TABLE IF NOT EXISTS semantic_group_members (
  member_id INTEGER PRIMARY KEY,
  group_id INTEGER NOT NULL REFERENCES semantic_groups(group_id) ON DELETE CASCADE,
  phrase TEXT NOT NULL,
  source_tag TEXT,
  is_representative INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_sessions_task ON clustering_sessions(task_id);
CREATE INDEX IF NOT EXISTS idx_groups_session ON semantic_groups(session_id);
CREATE INDEX IF NOT EXISTS idx_members_group ON semantic_group_members(group_id);
CREATE UNIQUE INDEX IF NOT EXISTS idx_groups_session_number ON semantic_groups(session_id, group_number);
`;

/**
 * A stored group together with its member phrases.
 */
export interface GroupWithPhrases extends GroupRecord {
    group_id: number;
    phrases: string[];
}

export interface DatabaseStats {
    sessions: number;
    groups: number;
    members: number;
    sessionsByProvenance: Record<string, number>;
}

/**
 * Clustering result store on better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and CRUD operations.
 */
export class ClusterDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Sessions ─────────────────────────────────────────────

    /**
     * Persist a finished session, its groups and members in one transaction.
     * Saving the same session again replaces it.
     */
    saveResult(result: ClusteringResult): void {
        const { session, metrics } = result;
        const sourceByText = new Map(session.phrases.map((phrase) => [phrase.text, phrase.source]));

        const sessionStmt = this.db.prepare(`
      INSERT INTO clustering_sessions (session_id, task_id, status, provenance, fallback_reason, total_phrases, group_count, outlier_ratio, quality_goal_achieved, strategy_json, metrics_json, error_message, started_at, finished_at)
      VALUES (@session_id, @task_id, @status, @provenance, @fallback_reason, @total_phrases, @group_count, @outlier_ratio, @quality_goal_achieved, @strategy_json, @metrics_json, @error_message, @started_at, @finished_at)
    `);

        const groupStmt = this.db.prepare(`
      INSERT INTO semantic_groups (session_id, group_number, group_label, description, phrases_count, representative_phrase)
      VALUES (@session_id, @group_number, @group_label, @description, @phrases_count, @representative_phrase)
    `);

        const memberStmt = this.db.prepare(`
      INSERT INTO semantic_group_members (group_id, phrase, source_tag, is_representative)
      VALUES (@group_id, @phrase, @source_tag, @is_representative)
    `);

        const record: SessionRecord = {
            session_id: result.sessionId,
            task_id: session.taskId,
            status: session.status,
            provenance: result.provenance,
            fallback_reason: result.fallbackReason,
            total_phrases: metrics.totalPhrases,
            group_count: metrics.groupCount,
            outlier_ratio: metrics.outlierRatio,
            quality_goal_achieved: metrics.qualityGoalAchieved ? 1 : 0,
            strategy_json: result.strategy ? JSON.stringify(result.strategy) : null,
            metrics_json: JSON.stringify(metrics),
            error_message: session.error,
            started_at: session.startedAt,
            finished_at: session.finishedAt,
        };

        const insertAll = this.db.transaction(() => {
            // Cascades to groups and members
            this.db.prepare('DELETE FROM clustering_sessions WHERE session_id = ?').run(result.sessionId);
            sessionStmt.run(record);

            for (const group of result.groups) {
                if (group.label !== -1 && group.size === 0) continue;
                const representative = group.label === -1 ? null : group.phrases[0] ?? null;
                const groupRecord: GroupRecord = {
                    session_id: result.sessionId,
                    group_number: group.label,
                    group_label: group.name,
                    description: group.description || null,
                    phrases_count: group.size,
                    representative_phrase: representative,
                };
                const groupId = Number(groupStmt.run(groupRecord).lastInsertRowid);

                for (const phrase of group.phrases) {
                    const member: GroupMemberRecord = {
                        group_id: groupId,
                        phrase,
                        source_tag: sourceByText.get(phrase) ?? null,
                        is_representative: phrase === representative ? 1 : 0,
                    };
                    memberStmt.run(member);
                }
            }
        });

        insertAll();
        getLogger().debug({ sessionId: result.sessionId, groups: result.groups.length }, 'Session saved');
    }

    getSession(sessionId: string): SessionRecord | undefined {
        return this.db.prepare('SELECT * FROM clustering_sessions WHERE session_id = ?').get(sessionId) as SessionRecord | undefined;
    }

    /**
     * Sessions, newest first.
     */
    listSessions(limit = 20): SessionRecord[] {
        return this.db.prepare('SELECT * FROM clustering_sessions ORDER BY started_at DESC, rowid DESC LIMIT ?').all(limit) as SessionRecord[];
    }

    getLatestSession(): SessionRecord | undefined {
        return this.listSessions(1)[0];
    }

    // ─── Groups ───────────────────────────────────────────────

    /**
     * Groups of a session with their phrases: groups by ascending number,
     * the unclustered bucket last, phrases in insertion order.
     */
    getGroupsWithPhrases(sessionId: string): GroupWithPhrases[] {
        const groups = this.db.prepare(`
      SELECT * FROM semantic_groups
      WHERE session_id = ?
      ORDER BY CASE WHEN group_number = -1 THEN 1 ELSE 0 END, group_number
    `).all(sessionId) as Array<GroupRecord & { group_id: number }>;

        const memberStmt = this.db.prepare('SELECT phrase FROM semantic_group_members WHERE group_id = ? ORDER BY member_id');

        return groups.map((group) => {
            const rows = memberStmt.all(group.group_id) as Array<{ phrase: string }>;
            return { ...group, phrases: rows.map((row) => row.phrase) };
        });
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): DatabaseStats {
        const count = (table: string) =>
            (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

        const provenanceRows = this.db.prepare(`
      SELECT COALESCE(provenance, 'unknown') as provenance, COUNT(*) as count
      FROM clustering_sessions GROUP BY provenance
    `).all() as Array<{ provenance: string; count: number }>;
        const sessionsByProvenance: Record<string, number> = {};
        for (const row of provenanceRows) {
            sessionsByProvenance[row.provenance] = row.count;
        }

        return {
            sessions: count('clustering_sessions'),
            groups: count('semantic_groups'),
            members: count('semantic_group_members'),
            sessionsByProvenance,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
