import type { EmbeddingVector, FallbackOptions } from '../types/index.js';
import { UNCLUSTERED_INDEX } from '../types/index.js';
import { cosineDistance } from '../nlp/similarity.js';

/**
 * DBSCAN over cosine distance.
 *
 * A point is a core point when at least `minSamples` points (itself included) lie
 * within `epsilon`. Returns one label per vector: cluster ids from 0 in discovery
 * order, -1 for noise. Deterministic for a given input order.
 */
export function dbscan(vectors: readonly EmbeddingVector[], options: FallbackOptions): number[] {
    const { epsilon, minSamples } = options;
    const n = vectors.length;
    const labels = new Array<number>(n).fill(UNCLUSTERED_INDEX);
    const visited = new Array<boolean>(n).fill(false);

    const regionQuery = (i: number): number[] => {
        const point = vectors[i];
        if (!point) return [];
        const neighbors: number[] = [];
        for (let j = 0; j < n; j++) {
            const other = vectors[j];
            if (other && cosineDistance(point, other) <= epsilon) neighbors.push(j);
        }
        return neighbors;
    };

    let clusterId = 0;
    for (let i = 0; i < n; i++) {
        if (visited[i]) continue;
        visited[i] = true;

        const neighbors = regionQuery(i);
        if (neighbors.length < minSamples) continue;  // noise for now; may become a border point

        const current = clusterId++;
        labels[i] = current;

        const queue = [...neighbors];
        const queued = new Set(queue);
        for (let q = 0; q < queue.length; q++) {
            const j = queue[q];
            if (j === undefined) continue;

            if (!visited[j]) {
                visited[j] = true;
                const expansion = regionQuery(j);
                if (expansion.length >= minSamples) {
                    for (const k of expansion) {
                        if (!queued.has(k)) {
                            queued.add(k);
                            queue.push(k);
                        }
                    }
                }
            }

            if (labels[j] === UNCLUSTERED_INDEX) labels[j] = current;
        }
    }

    return labels;
}
