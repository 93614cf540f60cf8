import { describe, it } from "mocha";
import { expect } from "chai";

import { measurePartSizes } from "../src/partition/balance.js";
import { ParameterError } from "../src/partition/errors.js";
import { buildInitialAssignment } from "../src/partition/initial.js";
import { createRandomSource } from "../src/utils/random.js";
import { constantRandom } from "./helpers/graphs.js";

describe("partition initial assignment", () => {
  it("deals shuffled positions round-robin", () => {
    // With a generator stuck at 0 every shuffle step swaps with index 0,
    // turning [0, 1, 2, 3] into [1, 2, 3, 0].
    const assignment = buildInitialAssignment(4, 2, constantRandom(0));

    expect(Array.from(assignment)).to.deep.equal([1, 0, 1, 0]);
  });

  it("keeps subset sizes within one of each other", () => {
    const assignment = buildInitialAssignment(10, 3, createRandomSource("sizes"));
    const sizes = measurePartSizes(assignment, 3);

    expect([...sizes].sort((a, b) => a - b)).to.deep.equal([3, 3, 4]);
  });

  it("replays the same assignment for the same seed", () => {
    const first = buildInitialAssignment(50, 4, createRandomSource("replay"));
    const second = buildInitialAssignment(50, 4, createRandomSource("replay"));

    expect(Array.from(first)).to.deep.equal(Array.from(second));
  });

  it("rejects subset counts outside [2, n]", () => {
    expect(() => buildInitialAssignment(5, 1, createRandomSource(1))).to.throw(ParameterError);
    expect(() => buildInitialAssignment(5, 6, createRandomSource(1))).to.throw(ParameterError);
  });
});
