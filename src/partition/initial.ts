import { ParameterError } from "./errors.js";
import { shuffleInPlace, type RandomSource } from "../utils/random.js";

/** Vertex id → subset index, one entry per vertex. */
export type Assignment = Int32Array;

/**
 * Random near-even starting assignment: vertex ids are shuffled and the
 * shuffled positions dealt round-robin, so every subset receives either
 * `⌈n/k⌉` or `⌊n/k⌋` vertices.
 */
export function buildInitialAssignment(
  vertexCount: number,
  numParts: number,
  random: RandomSource,
): Assignment {
  if (!Number.isInteger(numParts) || numParts < 2 || numParts > vertexCount) {
    throw new ParameterError(`numParts must be an integer in [2, ${vertexCount}], got ${numParts}`, {
      numParts,
      vertexCount,
    });
  }

  const order = new Int32Array(vertexCount);
  for (let vertex = 0; vertex < vertexCount; vertex += 1) {
    order[vertex] = vertex;
  }
  shuffleInPlace(order, random);

  const assignment = new Int32Array(vertexCount);
  for (let position = 0; position < vertexCount; position += 1) {
    assignment[order[position]] = position % numParts;
  }
  return assignment;
}
