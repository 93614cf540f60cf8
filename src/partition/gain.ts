import type { CsrGraph } from "../graph/csr.js";

/**
 * Kernighan–Lin D-value of {@link vertex} with respect to the subsets `first`
 * and `second`: neighbours in the opposite designated subset minus neighbours
 * in the vertex's own subset. Neighbours in any third subset do not count.
 *
 * The caller guarantees the vertex currently belongs to `first` or `second`.
 */
export function computeGain(
  graph: CsrGraph,
  assignment: ArrayLike<number>,
  vertex: number,
  first: number,
  second: number,
): number {
  const own = assignment[vertex];
  const other = own === first ? second : first;
  let external = 0;
  let internal = 0;
  for (const neighbour of graph.neighbours(vertex)) {
    const part = assignment[neighbour];
    if (part === other) {
      external += 1;
    } else if (part === own) {
      internal += 1;
    }
  }
  return external - internal;
}

/**
 * Refreshes {@link gains} for every unlocked candidate still sitting in one of
 * the two designated subsets. Locked vertices and foreign subsets keep whatever
 * value they had; callers must not read them.
 */
export function refreshGains(
  graph: CsrGraph,
  assignment: ArrayLike<number>,
  candidates: ArrayLike<number>,
  locked: Uint8Array,
  first: number,
  second: number,
  gains: Int32Array,
): void {
  for (let index = 0; index < candidates.length; index += 1) {
    const vertex = candidates[index];
    if (locked[vertex] === 1) {
      continue;
    }
    const part = assignment[vertex];
    if (part !== first && part !== second) {
      continue;
    }
    gains[vertex] = computeGain(graph, assignment, vertex, first, second);
  }
}
