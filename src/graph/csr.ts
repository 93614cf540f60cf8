import { StructuralError } from "../partition/errors.js";

/** Undirected edge expressed as a pair of vertex ids. */
export type EdgePair = readonly [number, number];

/**
 * Read-only undirected graph stored in compressed sparse row form: a flat list
 * of neighbour ids plus, for every vertex, the offset of its slice in that list.
 *
 * Instances never change after construction. Symmetry of the adjacency relation
 * is assumed, not verified; readers that accept untrusted input should run
 * {@link findAsymmetricEdges} before handing the graph to the engine.
 */
export class CsrGraph {
  readonly vertexCount: number;
  /** Number of undirected edges, i.e. adjacency entries `(u, v)` with `u < v`. */
  readonly edgeCount: number;
  private readonly adjacency: Int32Array;
  private readonly rowOffsets: Int32Array;

  constructor(vertexCount: number, neighbours: ArrayLike<number>, offsets: ArrayLike<number>) {
    if (!Number.isInteger(vertexCount) || vertexCount < 1) {
      throw new StructuralError(`vertex count must be a positive integer, got ${vertexCount}`, {
        vertexCount,
      });
    }
    if (offsets.length !== vertexCount + 1) {
      throw new StructuralError(
        `expected ${vertexCount + 1} offsets for ${vertexCount} vertices, got ${offsets.length}`,
        { vertexCount, offsets: offsets.length },
      );
    }
    if (offsets[0] !== 0) {
      throw new StructuralError(`first offset must be 0, got ${offsets[0]}`, { index: 0 });
    }
    for (let index = 1; index < offsets.length; index += 1) {
      const value = offsets[index];
      if (!Number.isInteger(value) || value < offsets[index - 1]) {
        throw new StructuralError(`offsets must be non-decreasing integers (index ${index})`, {
          index,
          value,
        });
      }
    }
    if (offsets[vertexCount] !== neighbours.length) {
      throw new StructuralError(
        `last offset ${offsets[vertexCount]} does not match ${neighbours.length} neighbour entries`,
        { lastOffset: offsets[vertexCount], neighbours: neighbours.length },
      );
    }
    for (let index = 0; index < neighbours.length; index += 1) {
      const value = neighbours[index];
      if (!Number.isInteger(value) || value < 0 || value >= vertexCount) {
        throw new StructuralError(`neighbour entry ${index} references unknown vertex ${value}`, {
          index,
          value,
        });
      }
    }

    this.vertexCount = vertexCount;
    this.adjacency = Int32Array.from(neighbours);
    this.rowOffsets = Int32Array.from(offsets);

    let edges = 0;
    for (let vertex = 0; vertex < vertexCount; vertex += 1) {
      for (let cursor = this.rowOffsets[vertex]; cursor < this.rowOffsets[vertex + 1]; cursor += 1) {
        if (vertex < this.adjacency[cursor]) {
          edges += 1;
        }
      }
    }
    this.edgeCount = edges;
  }

  /** Neighbours of {@link vertex} as a view over the shared adjacency buffer. */
  neighbours(vertex: number): Int32Array {
    return this.adjacency.subarray(this.rowOffsets[vertex], this.rowOffsets[vertex + 1]);
  }

  degree(vertex: number): number {
    return this.rowOffsets[vertex + 1] - this.rowOffsets[vertex];
  }

  /** Linear scan of the shorter adjacency slice. */
  hasEdge(from: number, to: number): boolean {
    const shorter = this.degree(from) <= this.degree(to);
    const source = shorter ? from : to;
    const target = shorter ? to : from;
    const end = this.rowOffsets[source + 1];
    for (let cursor = this.rowOffsets[source]; cursor < end; cursor += 1) {
      if (this.adjacency[cursor] === target) {
        return true;
      }
    }
    return false;
  }

  /** Yields every undirected edge once, as `[u, v]` with `u < v`. */
  *edges(): IterableIterator<EdgePair> {
    for (let vertex = 0; vertex < this.vertexCount; vertex += 1) {
      const end = this.rowOffsets[vertex + 1];
      for (let cursor = this.rowOffsets[vertex]; cursor < end; cursor += 1) {
        const neighbour = this.adjacency[cursor];
        if (vertex < neighbour) {
          yield [vertex, neighbour];
        }
      }
    }
  }

  /** Plain-array copy of the CSR buffers, used by writers. */
  toArrays(): { neighbours: number[]; offsets: number[] } {
    return { neighbours: Array.from(this.adjacency), offsets: Array.from(this.rowOffsets) };
  }
}

/**
 * Validates the CSR buffers and builds a {@link CsrGraph}. Only the structure is
 * checked (offset count, monotonicity, ids in range); symmetry is not.
 */
export function loadGraph(
  vertexCount: number,
  neighbours: ArrayLike<number>,
  offsets: ArrayLike<number>,
): CsrGraph {
  return new CsrGraph(vertexCount, neighbours, offsets);
}

/**
 * Builds a symmetric CSR graph from an undirected edge list. Duplicate edges
 * collapse into one; adjacency slices are sorted by neighbour id.
 */
export function fromEdgeList(vertexCount: number, edges: Iterable<EdgePair>): CsrGraph {
  if (!Number.isInteger(vertexCount) || vertexCount < 1) {
    throw new StructuralError(`vertex count must be a positive integer, got ${vertexCount}`, {
      vertexCount,
    });
  }
  const buckets: Array<Set<number>> = Array.from({ length: vertexCount }, () => new Set<number>());
  for (const [from, to] of edges) {
    for (const endpoint of [from, to]) {
      if (!Number.isInteger(endpoint) || endpoint < 0 || endpoint >= vertexCount) {
        throw new StructuralError(`edge ${from}-${to} references unknown vertex ${endpoint}`, {
          from,
          to,
        });
      }
    }
    if (from === to) {
      throw new StructuralError(`self-loop on vertex ${from} is not supported`, { vertex: from });
    }
    buckets[from].add(to);
    buckets[to].add(from);
  }

  const neighbours: number[] = [];
  const offsets: number[] = [0];
  for (const bucket of buckets) {
    neighbours.push(...Array.from(bucket).sort((a, b) => a - b));
    offsets.push(neighbours.length);
  }
  return new CsrGraph(vertexCount, neighbours, offsets);
}

/**
 * Lists the directed adjacency entries `(u, v)` for which `v` does not list
 * `u` back. An empty result means the adjacency relation is symmetric.
 */
export function findAsymmetricEdges(graph: CsrGraph): EdgePair[] {
  const missing: EdgePair[] = [];
  for (let vertex = 0; vertex < graph.vertexCount; vertex += 1) {
    for (const neighbour of graph.neighbours(vertex)) {
      if (!graph.neighbours(neighbour).includes(vertex)) {
        missing.push([vertex, neighbour]);
      }
    }
  }
  return missing;
}
