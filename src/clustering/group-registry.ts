import { UNCLUSTERED_INDEX, UNCLUSTERED_NAME, type Group, type Phrase } from '../types/index.js';
import { normalizeKey } from './phrases.js';

/**
 * Authoritative group list of one session.
 *
 * Keeps the membership invariants: a phrase belongs to at most one group, the
 * unclustered bucket always exists at index -1, and indices are never reused or
 * renumbered once handed out.
 */
export class GroupRegistry {
    private readonly groupsByIndex = new Map<number, Group>();
    private readonly assignments = new Map<string, number>();
    private readonly phrasesByKey: ReadonlyMap<string, Phrase>;
    private nextIndex = 0;

    constructor(phrases: readonly Phrase[]) {
        this.phrasesByKey = new Map(phrases.map((phrase) => [phrase.key, phrase]));
        this.groupsByIndex.set(UNCLUSTERED_INDEX, {
            index: UNCLUSTERED_INDEX,
            name: UNCLUSTERED_NAME,
            description: 'Phrases without a confident group',
            members: [],
        });
    }

    // ─── Reads ───────────────────────────────────────────────

    has(index: number): boolean {
        return this.groupsByIndex.has(index);
    }

    get(index: number): Group | undefined {
        return this.groupsByIndex.get(index);
    }

    phrase(key: string): Phrase | undefined {
        return this.phrasesByKey.get(key);
    }

    /** Group index a phrase is assigned to, if any. */
    groupOf(key: string): number | undefined {
        return this.assignments.get(key);
    }

    get assignedCount(): number {
        return this.assignments.size;
    }

    get unclustered(): Group {
        return this.getOrThrow(UNCLUSTERED_INDEX);
    }

    /** Real groups (unclustered bucket excluded), ascending index. */
    clusteredGroups(): Group[] {
        return [...this.groupsByIndex.values()]
            .filter((group) => group.index !== UNCLUSTERED_INDEX)
            .sort((a, b) => a.index - b.index);
    }

    /** Group whose name matches, ignoring case and whitespace. */
    findByName(name: string): Group | undefined {
        const wanted = normalizeKey(name);
        return this.clusteredGroups().find((group) => normalizeKey(group.name) === wanted);
    }

    /** Deep copy of every group, unclustered bucket first. */
    snapshot(): Group[] {
        return [this.unclustered, ...this.clusteredGroups()].map((group) => ({
            ...group,
            members: [...group.members],
        }));
    }

    // ─── Mutations ───────────────────────────────────────────

    createGroup(name: string, description: string): Group {
        const group: Group = { index: this.nextIndex++, name, description, members: [] };
        this.groupsByIndex.set(group.index, group);
        return group;
    }

    /**
     * Move a phrase into a group, out of wherever it was.
     */
    assign(key: string, index: number): void {
        if (!this.phrasesByKey.has(key)) {
            throw new Error(`Unknown phrase: ${key}`);
        }
        const target = this.getOrThrow(index);

        const current = this.assignments.get(key);
        if (current === index) return;
        if (current !== undefined) {
            const source = this.getOrThrow(current);
            source.members = source.members.filter((member) => member !== key);
        }

        target.members.push(key);
        this.assignments.set(key, index);
    }

    /**
     * Move every member of `sourceIndex` into `targetIndex` and drop the source group.
     */
    mergeInto(sourceIndex: number, targetIndex: number): void {
        if (sourceIndex === UNCLUSTERED_INDEX) {
            throw new Error('The unclustered bucket cannot be merged away');
        }
        if (sourceIndex === targetIndex) return;

        const source = this.getOrThrow(sourceIndex);
        this.getOrThrow(targetIndex);
        for (const key of [...source.members]) {
            this.assign(key, targetIndex);
        }
        this.groupsByIndex.delete(sourceIndex);
    }

    /**
     * Send every member of a group to the unclustered bucket and drop the group.
     */
    dissolve(index: number): void {
        this.mergeInto(index, UNCLUSTERED_INDEX);
    }

    /** Drop groups that ended up without members. */
    removeEmptyGroups(): number[] {
        const removed: number[] = [];
        for (const group of this.clusteredGroups()) {
            if (group.members.length === 0) {
                this.groupsByIndex.delete(group.index);
                removed.push(group.index);
            }
        }
        return removed;
    }

    private getOrThrow(index: number): Group {
        const group = this.groupsByIndex.get(index);
        if (!group) throw new Error(`Unknown group index: ${index}`);
        return group;
    }
}
