// src/L1/DependencyGraph.ts
import type { UnitID } from '../L0/Ontology.js';

export type Adjacency = ReadonlyMap<UnitID, readonly UnitID[]>;

/**
 * Depth-first search over the whole graph.
 * Returns the first cycle found as an ordered path with the entry node repeated
 * at the end (e.g. ['a', 'b', 'a']), or null when the graph is acyclic.
 * Edges to ids that have no entry of their own are leaves.
 */
export function findCycle(graph: Adjacency): UnitID[] | null {
    const visited = new Set<UnitID>();
    const onStack = new Set<UnitID>();
    const path: UnitID[] = [];

    const visit = (node: UnitID): UnitID[] | null => {
        visited.add(node);
        onStack.add(node);
        path.push(node);

        for (const next of graph.get(node) ?? []) {
            if (onStack.has(next)) {
                return [...path.slice(path.indexOf(next)), next];
            }
            if (!visited.has(next)) {
                const cycle = visit(next);
                if (cycle) return cycle;
            }
        }

        onStack.delete(node);
        path.pop();
        return null;
    };

    for (const node of graph.keys()) {
        if (!visited.has(node)) {
            const cycle = visit(node);
            if (cycle) return cycle;
        }
    }
    return null;
}
