import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { countCutEdges } from "../src/graph/cut.js";
import { generateRandomGraph } from "../src/graph/generate.js";
import { StructuredLogger, type LogEntry } from "../src/logger.js";
import { ParameterError } from "../src/partition/errors.js";
import { PartitionRun, partition } from "../src/partition/orchestrator.js";
import { ERROR_CODES } from "../src/types.js";
import { constantRandom, triangle, twoTriangles } from "./helpers/graphs.js";

function sortedParts(parts: number[][]): number[][] {
  return [...parts].sort((left, right) => left[0] - right[0]);
}

describe("partition orchestrator", () => {
  it("splits a triangle into subsets of two and one vertex", () => {
    const result = partition(triangle(), 2, 10, { seed: "triangle" });

    // Any 2/1 split of a triangle cuts both edges touching the lone vertex.
    expect(result.cutEdges).to.equal(2);
    expect([...result.sizes].sort()).to.deep.equal([1, 2]);
    expect(result.bounds.maxAllowed).to.equal(2);
    expect(result.converged).to.equal(true);
  });

  it("separates two triangles along their bridge for every seed", () => {
    const graph = twoTriangles();
    for (let seed = 0; seed < 20; seed += 1) {
      const result = partition(graph, 2, 0, { seed });

      expect(result.cutEdges, `seed ${seed}`).to.equal(1);
      expect(sortedParts(result.parts), `seed ${seed}`).to.deep.equal([
        [0, 1, 2],
        [3, 4, 5],
      ]);
      expect(result.sizes).to.deep.equal([3, 3]);
    }
  });

  it("places every vertex alone when the subset count equals the vertex count", () => {
    const graph = twoTriangles();

    const result = partition(graph, 6, 0, { seed: 7 });

    expect(result.cutEdges).to.equal(graph.edgeCount);
    expect(result.sizes).to.deep.equal([1, 1, 1, 1, 1, 1]);
    expect(result.passes).to.equal(1);
    expect(result.converged).to.equal(true);
  });

  it("rejects fewer than two subsets", () => {
    expect(() => partition(twoTriangles(), 1, 10)).to.throw(ParameterError, "numParts must be at least 2");
  });

  it("rejects more subsets than vertices", () => {
    expect(() => partition(triangle(), 4, 10)).to.throw(
      ParameterError,
      "numParts (4) exceeds the vertex count (3)",
    );
  });

  it("rejects negative margins and empty pass limits", () => {
    expect(() => partition(triangle(), 2, -5)).to.throw(ParameterError, "margin must not be negative");
    expect(() => partition(triangle(), 2, 10, { maxPasses: 0 })).to.throw(
      ParameterError,
      "maxPasses must be at least 1",
    );
  });

  it("reports parameter errors with their catalogue code", () => {
    try {
      partition(triangle(), 2, Number.NaN);
      expect.fail("partition should have thrown");
    } catch (error) {
      if (!(error instanceof ParameterError)) {
        throw error;
      }
      expect(error.code).to.equal(ERROR_CODES.KL_PARAMETER);
    }
  });

  it("replays identical results for identical seeds", () => {
    const graph = generateRandomGraph({ vertexCount: 40, edgeProbability: 0.15, seed: "replay" });

    const first = partition(graph, 4, 10, { seed: "run" });
    const second = partition(graph, 4, 10, { seed: "run" });

    expect(Array.from(first.assignment)).to.deep.equal(Array.from(second.assignment));
    expect(first.cutEdges).to.equal(second.cutEdges);
    expect(first.cutEdges).to.equal(countCutEdges(graph, first.assignment));
  });

  it("walks through its states in order", () => {
    const onStateChange = sinon.spy();
    const run = new PartitionRun(twoTriangles(), 2, 10, { seed: 3, onStateChange });

    expect(run.state).to.equal("uninitialized");
    run.run();

    expect(onStateChange.args.map(([state]) => state)).to.deep.equal([
      "initializing",
      "refining",
      "validating",
      "done",
    ]);
    expect(run.state).to.equal("done");
    expect(() => run.run()).to.throw(ParameterError, "partition run already done");
  });

  it("ends in the failed state when a step throws", () => {
    const failure = new Error("generator exhausted");
    const random = { next: sinon.stub().throws(failure) };
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ sink: null, onEntry: (entry) => entries.push(entry) });
    const run = new PartitionRun(twoTriangles(), 2, 10, { random, logger });

    expect(() => run.run()).to.throw(failure);
    expect(run.state).to.equal("failed");
    expect(entries.map((entry) => entry.message)).to.deep.equal(["partition_started", "partition_failed"]);
    expect(entries[1].payload).to.deep.equal({ state: "failed", message: "generator exhausted" });
  });

  it("records every pairwise call when tracing is enabled", () => {
    // constantRandom(0) deals [1, 0, 1, 0, 1, 0]; swapping 1 and 4 fixes it.
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      sink: null,
      level: "debug",
      onEntry: (entry) => entries.push(entry),
    });

    const result = partition(twoTriangles(), 2, 0, {
      random: constantRandom(0),
      recordSwaps: true,
      logger,
    });

    expect(result.passes).to.equal(2);
    expect(result.converged).to.equal(true);
    expect(result.cutEdges).to.equal(1);
    expect(result.parts).to.deep.equal([
      [3, 4, 5],
      [0, 1, 2],
    ]);
    const trace = result.trace ?? [];
    expect(trace.map(({ pass, pair, cutBefore, cutAfter, committedSwaps }) => ({
      pass,
      pair,
      cutBefore,
      cutAfter,
      committedSwaps,
    }))).to.deep.equal([
      { pass: 1, pair: [0, 1], cutBefore: 5, cutAfter: 1, committedSwaps: 1 },
      { pass: 2, pair: [0, 1], cutBefore: 1, cutAfter: 1, committedSwaps: 0 },
    ]);
    expect(trace[0].swaps[0]).to.deep.equal({ first: 1, second: 4, gain: 4, cutEdges: 1 });
    expect(trace[0].swaps).to.have.length(3);
    expect(entries.map((entry) => entry.message)).to.deep.equal([
      "partition_started",
      "partition_pass_completed",
      "partition_pass_completed",
      "partition_completed",
    ]);
    expect(entries.slice(1, 3).map((entry) => entry.payload)).to.deep.equal([
      { pass: 1, improving_calls: 1, cut_edges: 1 },
      { pass: 2, improving_calls: 0, cut_edges: 1 },
    ]);
  });

  it("rethrows the original failure when the state listener throws on failure", () => {
    const failure = new Error("generator exhausted");
    const random = { next: sinon.stub().throws(failure) };
    const onStateChange = sinon.spy((state: string) => {
      if (state === "failed") {
        throw new Error("listener broke");
      }
    });
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ sink: null, onEntry: (entry) => entries.push(entry) });
    const run = new PartitionRun(twoTriangles(), 2, 10, { random, onStateChange, logger });

    expect(() => run.run()).to.throw(failure);
    expect(run.state).to.equal("failed");
    expect(onStateChange.args.map(([state]) => state)).to.deep.equal(["initializing", "failed"]);
    expect(entries.map((entry) => [entry.message, entry.payload])).to.deep.equal([
      ["partition_started", { vertices: 6, edges: 7, num_parts: 2, margin_percent: 10, max_passes: 10 }],
      ["state_listener_failed", { state: "failed", message: "listener broke" }],
      ["partition_failed", { state: "failed", message: "generator exhausted" }],
    ]);
  });

  it("stops at the pass limit and reports that refinement had not settled", () => {
    const result = partition(twoTriangles(), 2, 0, { random: constantRandom(0), maxPasses: 1 });

    expect(result.passes).to.equal(1);
    expect(result.converged).to.equal(false);
    expect(result.cutEdges).to.equal(1);
    expect(result.trace).to.equal(undefined);
  });
});
