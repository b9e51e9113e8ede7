/**
 * Path finding over a DirectedGraph.
 */

import type { DirectedGraph } from './directed-graph.ts';

/**
 * Finds a path from `from` to `to`, both ends included.
 * Returns an empty array when `to` cannot be reached and `[from]` when the
 * two are the same vertex. Which of several equally short paths comes back is
 * up to the implementation.
 */
export type PathFinder = (
  graph: DirectedGraph,
  from: string,
  to: string
) => readonly string[];

export const breadthFirstPath: PathFinder = (graph, from, to) => {
  if (!graph.hasVertex(from) || !graph.hasVertex(to)) return [];
  if (from === to) return [from];

  const parents = new Map<string, string>();
  const seen = new Set<string>([from]);
  const queue: string[] = [from];

  while (queue.length > 0) {
    const vertex = queue.shift();
    if (vertex === undefined) break;

    for (const next of graph.successors(vertex)) {
      if (seen.has(next)) continue;
      seen.add(next);
      parents.set(next, vertex);

      if (next === to) {
        const path = [to];
        let step = vertex;
        while (step !== from) {
          path.unshift(step);
          const parent = parents.get(step);
          if (parent === undefined) return [];
          step = parent;
        }
        path.unshift(from);
        return path;
      }

      queue.push(next);
    }
  }

  return [];
};
