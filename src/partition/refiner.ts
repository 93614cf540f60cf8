import type { CsrGraph } from "../graph/csr.js";
import { countCutEdges } from "../graph/cut.js";
import { ParameterError } from "./errors.js";
import { refreshGains } from "./gain.js";
import type { Assignment } from "./initial.js";

/** One tentative swap generated during a pairwise refinement call. */
export interface SwapRecord {
  /** Vertex moved from the first subset to the second. */
  readonly first: number;
  /** Vertex moved from the second subset to the first. */
  readonly second: number;
  /** Combined gain of the pair, edge correction included. */
  readonly gain: number;
  /** Global cut-edge count once this swap and every earlier one are applied. */
  readonly cutEdges: number;
}

export interface PairRefinementOptions {
  /** Materialise the tentative swap sequence in {@link PairRefinementResult.swaps}. */
  recordSwaps?: boolean;
  /**
   * Number of subsets in the assignment. Defaults to one more than the
   * highest subset index present.
   */
  numParts?: number;
}

export interface PairRefinementResult {
  /** Whether at least one swap was written back to the assignment. */
  committed: boolean;
  /** Length of the committed best prefix. */
  committedSwaps: number;
  /** Number of tentative swaps generated before the best-prefix selection. */
  candidateSwaps: number;
  cutBefore: number;
  cutAfter: number;
  /** Tentative swap sequence; empty unless `recordSwaps` was requested. */
  swaps: readonly SwapRecord[];
}

function collectMembers(assignment: Assignment, part: number): Int32Array {
  let size = 0;
  for (let vertex = 0; vertex < assignment.length; vertex += 1) {
    if (assignment[vertex] === part) {
      size += 1;
    }
  }
  const members = new Int32Array(size);
  let cursor = 0;
  for (let vertex = 0; vertex < assignment.length; vertex += 1) {
    if (assignment[vertex] === part) {
      members[cursor] = vertex;
      cursor += 1;
    }
  }
  return members;
}

function highestPart(assignment: Assignment): number {
  let highest = -1;
  for (const part of assignment) {
    if (part > highest) {
      highest = part;
    }
  }
  return highest;
}

/**
 * Runs one Kernighan–Lin pass between the subsets `first` and `second`.
 *
 * Each round recomputes gains against the working copy, picks the unlocked
 * pair with the highest combined gain (`2` is subtracted when the two vertices
 * are adjacent), applies it tentatively and locks both vertices. Once no pair
 * is left, the shortest prefix of the swap sequence reaching the lowest cut
 * count is written back to {@link assignment}, provided that count is strictly
 * below the starting one. Otherwise the assignment is left untouched.
 *
 * Ties in the pair search keep the earliest pair, scanning `first` members
 * in ascending id order and, for each, `second` members in ascending order.
 */
export function refinePair(
  graph: CsrGraph,
  assignment: Assignment,
  first: number,
  second: number,
  options: PairRefinementOptions = {},
): PairRefinementResult {
  if (first === second) {
    throw new ParameterError(`cannot refine subset ${first} against itself`, { first, second });
  }
  if (assignment.length !== graph.vertexCount) {
    throw new ParameterError(
      `assignment covers ${assignment.length} vertices but the graph has ${graph.vertexCount}`,
      { assignment: assignment.length, vertexCount: graph.vertexCount },
    );
  }
  const numParts = options.numParts ?? highestPart(assignment) + 1;
  for (const part of [first, second]) {
    if (!Number.isInteger(part) || part < 0 || part >= numParts) {
      throw new ParameterError(`subset ${part} is outside [0, ${numParts})`, { part, numParts });
    }
  }

  const membersFirst = collectMembers(assignment, first);
  const membersSecond = collectMembers(assignment, second);
  const rounds = Math.min(membersFirst.length, membersSecond.length);
  const cutBefore = countCutEdges(graph, assignment);

  const working = assignment.slice();
  const locked = new Uint8Array(graph.vertexCount);
  const gains = new Int32Array(graph.vertexCount);
  const swapFirst = new Int32Array(rounds);
  const swapSecond = new Int32Array(rounds);
  const swapGain = new Int32Array(rounds);
  const swapCut = new Int32Array(rounds);
  let generated = 0;

  for (let round = 0; round < rounds; round += 1) {
    refreshGains(graph, working, membersFirst, locked, first, second, gains);
    refreshGains(graph, working, membersSecond, locked, first, second, gains);

    let bestGain = Number.NEGATIVE_INFINITY;
    let bestFirst = -1;
    let bestSecond = -1;
    for (const candidateFirst of membersFirst) {
      if (locked[candidateFirst] === 1) {
        continue;
      }
      for (const candidateSecond of membersSecond) {
        if (locked[candidateSecond] === 1) {
          continue;
        }
        let combined = gains[candidateFirst] + gains[candidateSecond];
        if (graph.hasEdge(candidateFirst, candidateSecond)) {
          combined -= 2;
        }
        if (combined > bestGain) {
          bestGain = combined;
          bestFirst = candidateFirst;
          bestSecond = candidateSecond;
        }
      }
    }

    if (bestFirst === -1) {
      break;
    }

    working[bestFirst] = second;
    working[bestSecond] = first;
    locked[bestFirst] = 1;
    locked[bestSecond] = 1;
    swapFirst[generated] = bestFirst;
    swapSecond[generated] = bestSecond;
    swapGain[generated] = bestGain;
    swapCut[generated] = countCutEdges(graph, working);
    generated += 1;
  }

  let bestPrefix = 0;
  let bestCut = cutBefore;
  for (let index = 0; index < generated; index += 1) {
    if (swapCut[index] < bestCut) {
      bestCut = swapCut[index];
      bestPrefix = index + 1;
    }
  }

  for (let index = 0; index < bestPrefix; index += 1) {
    assignment[swapFirst[index]] = second;
    assignment[swapSecond[index]] = first;
  }

  const swaps: SwapRecord[] = [];
  if (options.recordSwaps === true) {
    for (let index = 0; index < generated; index += 1) {
      swaps.push({
        first: swapFirst[index],
        second: swapSecond[index],
        gain: swapGain[index],
        cutEdges: swapCut[index],
      });
    }
  }

  return {
    committed: bestPrefix > 0,
    committedSwaps: bestPrefix,
    candidateSwaps: generated,
    cutBefore,
    cutAfter: bestCut,
    swaps,
  };
}
