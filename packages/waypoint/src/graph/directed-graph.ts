/**
 * Mutable directed graph keyed by scene name.
 *
 * Arcs are added at compile time and grafted or pruned while a navigator
 * moves, so the adjacency is plain sets rather than a frozen structure.
 * Not safe to mutate from concurrently running tests.
 */

export interface DirectedGraph {
  addVertex(name: string): void;
  hasVertex(name: string): boolean;
  addArc(from: string, to: string): void;
  removeArc(from: string, to: string): void;
  hasArc(from: string, to: string): boolean;
  successors(name: string): readonly string[];
  vertices(): readonly string[];
}

export const createDirectedGraph = (): DirectedGraph => {
  const adjacency = new Map<string, Set<string>>();

  const arcsFrom = (name: string): Set<string> => {
    const arcs = adjacency.get(name);
    if (!arcs) {
      throw new Error(`Vertex "${name}" is not part of the graph`);
    }
    return arcs;
  };

  return {
    addVertex(name) {
      if (!adjacency.has(name)) {
        adjacency.set(name, new Set());
      }
    },

    hasVertex(name) {
      return adjacency.has(name);
    },

    addArc(from, to) {
      arcsFrom(to);
      arcsFrom(from).add(to);
    },

    removeArc(from, to) {
      adjacency.get(from)?.delete(to);
    },

    hasArc(from, to) {
      return adjacency.get(from)?.has(to) ?? false;
    },

    successors(name) {
      return [...(adjacency.get(name) ?? [])];
    },

    vertices() {
      return [...adjacency.keys()];
    },
  };
};
