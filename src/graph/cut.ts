import type { CsrGraph } from "./csr.js";

/**
 * Counts the undirected edges whose endpoints sit in different subsets. Each
 * edge is visited once through its `u < v` adjacency entry. Neither argument is
 * mutated.
 */
export function countCutEdges(graph: CsrGraph, assignment: ArrayLike<number>): number {
  let cuts = 0;
  for (let vertex = 0; vertex < graph.vertexCount; vertex += 1) {
    const part = assignment[vertex];
    for (const neighbour of graph.neighbours(vertex)) {
      if (vertex < neighbour && part !== assignment[neighbour]) {
        cuts += 1;
      }
    }
  }
  return cuts;
}
