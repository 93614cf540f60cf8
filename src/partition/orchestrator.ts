import { DEFAULT_MAX_PASSES, parsePartitionSettings, type PartitionSettings } from "../config/partition.js";
import type { CsrGraph } from "../graph/csr.js";
import { countCutEdges } from "../graph/cut.js";
import type { EngineLogger } from "../logger.js";
import { createRandomSource, type RandomSource } from "../utils/random.js";
import {
  assertBalanced,
  computeBalanceBounds,
  measurePartSizes,
  type BalanceBounds,
} from "./balance.js";
import { ParameterError } from "./errors.js";
import { buildInitialAssignment, type Assignment } from "./initial.js";
import { refinePair, type SwapRecord } from "./refiner.js";

export type PartitionState =
  | "uninitialized"
  | "initializing"
  | "refining"
  | "validating"
  | "done"
  | "failed";

export interface PartitionOptions {
  /** Upper bound on refinement passes. Defaults to {@link DEFAULT_MAX_PASSES}. */
  maxPasses?: number;
  /** Seed for the initial assignment; ignored when {@link random} is given. */
  seed?: string | number;
  random?: RandomSource;
  /** Also reject subsets smaller than `floor(n / k)`. */
  enforceMinimum?: boolean;
  /** Collect every pairwise call and its tentative swaps in `trace`. */
  recordSwaps?: boolean;
  logger?: EngineLogger;
  onStateChange?: (state: PartitionState) => void;
}

/** Trace entry for one pairwise refinement call. */
export interface RefinementStep {
  pass: number;
  pair: readonly [number, number];
  cutBefore: number;
  cutAfter: number;
  committedSwaps: number;
  swaps: readonly SwapRecord[];
}

export interface PartitionResult {
  assignment: Assignment;
  /** Vertex ids of each subset, ascending. */
  parts: number[][];
  sizes: number[];
  cutEdges: number;
  /** Passes actually executed. */
  passes: number;
  /** False when the pass limit stopped refinement while passes still improved. */
  converged: boolean;
  bounds: BalanceBounds;
  trace?: RefinementStep[];
}

function groupParts(assignment: Assignment, numParts: number): number[][] {
  const parts: number[][] = Array.from({ length: numParts }, () => []);
  assignment.forEach((part, vertex) => {
    parts[part].push(vertex);
  });
  return parts;
}

/**
 * Single partition run driven through its states. A run is single use: call
 * {@link run} once and read {@link state} for diagnostics.
 */
export class PartitionRun {
  private current: PartitionState = "uninitialized";
  private readonly settings: PartitionSettings;

  constructor(
    private readonly graph: CsrGraph,
    numParts: number,
    marginPercent: number,
    private readonly options: PartitionOptions = {},
  ) {
    this.settings = parsePartitionSettings({
      numParts,
      marginPercent,
      maxPasses: options.maxPasses ?? DEFAULT_MAX_PASSES,
      enforceMinimum: options.enforceMinimum ?? false,
      seed: options.seed,
    });
    if (this.settings.numParts > graph.vertexCount) {
      throw new ParameterError(
        `numParts (${this.settings.numParts}) exceeds the vertex count (${graph.vertexCount})`,
        { numParts: this.settings.numParts, vertexCount: graph.vertexCount },
      );
    }
  }

  get state(): PartitionState {
    return this.current;
  }

  run(): PartitionResult {
    if (this.current !== "uninitialized") {
      throw new ParameterError(`partition run already ${this.current}`, { state: this.current });
    }
    const { graph, settings, options } = this;
    const logger = options.logger;
    try {
      this.transition("initializing");
      logger?.info("partition_started", {
        vertices: graph.vertexCount,
        edges: graph.edgeCount,
        num_parts: settings.numParts,
        margin_percent: settings.marginPercent,
        max_passes: settings.maxPasses,
      });
      const random = options.random ?? createRandomSource(settings.seed);
      const assignment = buildInitialAssignment(graph.vertexCount, settings.numParts, random);

      this.transition("refining");
      const trace: RefinementStep[] | undefined = options.recordSwaps === true ? [] : undefined;
      let passes = 0;
      let improved = true;
      while (improved && passes < settings.maxPasses) {
        passes += 1;
        improved = false;
        let committedCalls = 0;
        // Every call recounts the global cut, so the last one is current.
        let passCut = 0;
        for (let first = 0; first < settings.numParts; first += 1) {
          for (let second = first + 1; second < settings.numParts; second += 1) {
            const outcome = refinePair(graph, assignment, first, second, {
              recordSwaps: trace !== undefined,
              numParts: settings.numParts,
            });
            passCut = outcome.cutAfter;
            if (outcome.committed) {
              improved = true;
              committedCalls += 1;
            }
            trace?.push({
              pass: passes,
              pair: [first, second],
              cutBefore: outcome.cutBefore,
              cutAfter: outcome.cutAfter,
              committedSwaps: outcome.committedSwaps,
              swaps: outcome.swaps,
            });
          }
        }
        logger?.debug("partition_pass_completed", {
          pass: passes,
          improving_calls: committedCalls,
          cut_edges: passCut,
        });
      }

      this.transition("validating");
      const sizes = measurePartSizes(assignment, settings.numParts);
      const bounds = computeBalanceBounds(graph.vertexCount, settings.numParts, {
        marginPercent: settings.marginPercent,
        enforceMinimum: settings.enforceMinimum,
      });
      assertBalanced(sizes, bounds);

      const cutEdges = countCutEdges(graph, assignment);
      this.transition("done");
      logger?.info("partition_completed", { cut_edges: cutEdges, passes, sizes });
      return {
        assignment,
        parts: groupParts(assignment, settings.numParts),
        sizes,
        cutEdges,
        passes,
        converged: !improved,
        bounds,
        ...(trace !== undefined ? { trace } : {}),
      };
    } catch (error) {
      try {
        this.transition("failed");
      } catch (listenerError) {
        logger?.warn("state_listener_failed", {
          state: "failed",
          message: listenerError instanceof Error ? listenerError.message : String(listenerError),
        });
      }
      logger?.error("partition_failed", {
        state: "failed",
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private transition(next: PartitionState): void {
    this.current = next;
    this.options.onStateChange?.(next);
  }
}

/**
 * Partitions {@link graph} into `numParts` balanced subsets with
 * Kernighan–Lin refinement. Invalid parameters raise {@link ParameterError}
 * before any work starts; an unbalanced outcome raises
 * `BalanceViolationError`.
 */
export function partition(
  graph: CsrGraph,
  numParts: number,
  marginPercent: number,
  options: PartitionOptions = {},
): PartitionResult {
  return new PartitionRun(graph, numParts, marginPercent, options).run();
}
