/**
 * Row of the `clustering_sessions` table.
 */
export interface SessionRecord {
    session_id: string;
    task_id: string | null;
    status: string;
    provenance: string | null;
    fallback_reason: string | null;
    total_phrases: number;
    group_count: number;
    outlier_ratio: number;
    quality_goal_achieved: number;
    strategy_json: string | null;
    metrics_json: string;
    error_message: string | null;
    started_at: string;
    finished_at: string | null;
}

/**
 * Row of the `semantic_groups` table.
 */
export interface GroupRecord {
    group_id?: number;
    session_id: string;
    /** -1 for the unclustered bucket, 0+ for groups */
    group_number: number;
    group_label: string;
    description: string | null;
    phrases_count: number;
    representative_phrase: string | null;
}

/**
 * Row of the `semantic_group_members` table.
 */
export interface GroupMemberRecord {
    member_id?: number;
    group_id: number;
    phrase: string;
    source_tag: string | null;
    is_representative: number;
}
