import { ParameterError } from "../partition/errors.js";
import { createRandomSource, nextInt, type RandomSource } from "../utils/random.js";
import { fromEdgeList, type CsrGraph, type EdgePair } from "./csr.js";

export interface RandomGraphOptions {
  vertexCount: number;
  /** Probability that any given vertex pair is joined, in `[0, 1]`. */
  edgeProbability: number;
  seed?: string | number;
  /** Takes precedence over {@link seed}. */
  random?: RandomSource;
  /** Chain disconnected components together. Defaults to `true`. */
  ensureConnected?: boolean;
}

/**
 * Connected components, each listed in ascending vertex order, ordered by
 * their smallest vertex. Traversal uses an explicit stack so deep graphs do
 * not exhaust the call stack.
 */
export function findComponents(graph: CsrGraph): number[][] {
  const visited = new Uint8Array(graph.vertexCount);
  const components: number[][] = [];
  const stack: number[] = [];

  for (let root = 0; root < graph.vertexCount; root += 1) {
    if (visited[root] === 1) {
      continue;
    }
    const component: number[] = [];
    visited[root] = 1;
    stack.push(root);
    while (stack.length > 0) {
      const vertex = stack.pop();
      if (vertex === undefined) {
        break;
      }
      component.push(vertex);
      for (const neighbour of graph.neighbours(vertex)) {
        if (visited[neighbour] === 0) {
          visited[neighbour] = 1;
          stack.push(neighbour);
        }
      }
    }
    components.push(component.sort((a, b) => a - b));
  }

  return components;
}

export function isConnected(graph: CsrGraph): boolean {
  return findComponents(graph).length === 1;
}

/**
 * Samples every pair `u < v` independently with {@link RandomGraphOptions.edgeProbability}.
 * When connectivity is requested, each component after the first is linked to
 * its predecessor through one edge between randomly chosen members.
 */
export function generateRandomGraph(options: RandomGraphOptions): CsrGraph {
  const { vertexCount, edgeProbability } = options;
  if (!Number.isInteger(vertexCount) || vertexCount < 1) {
    throw new ParameterError(`vertexCount must be a positive integer, got ${vertexCount}`, {
      vertexCount,
    });
  }
  if (!Number.isFinite(edgeProbability) || edgeProbability < 0 || edgeProbability > 1) {
    throw new ParameterError(`edgeProbability must lie in [0, 1], got ${edgeProbability}`, {
      edgeProbability,
    });
  }

  const random = options.random ?? createRandomSource(options.seed);
  const edges: EdgePair[] = [];
  for (let from = 0; from < vertexCount; from += 1) {
    for (let to = from + 1; to < vertexCount; to += 1) {
      if (random.next() < edgeProbability) {
        edges.push([from, to]);
      }
    }
  }

  const sampled = fromEdgeList(vertexCount, edges);
  if (options.ensureConnected === false) {
    return sampled;
  }

  const components = findComponents(sampled);
  if (components.length === 1) {
    return sampled;
  }
  for (let index = 1; index < components.length; index += 1) {
    const previous = components[index - 1];
    const current = components[index];
    edges.push([previous[nextInt(random, previous.length)], current[nextInt(random, current.length)]]);
  }
  return fromEdgeList(vertexCount, edges);
}
