import { describe, it } from "mocha";
import { expect } from "chai";

import {
  assertBalanced,
  checkBalance,
  computeBalanceBounds,
  measurePartSizes,
} from "../src/partition/balance.js";
import { BalanceViolationError, ParameterError } from "../src/partition/errors.js";
import { ERROR_CODES } from "../src/types.js";

describe("partition balance policy", () => {
  it("derives the upper bound from the ideal size and the margin", () => {
    const bounds = computeBalanceBounds(10, 3, { marginPercent: 10, enforceMinimum: false });

    expect(bounds.ideal).to.be.closeTo(10 / 3, 1e-12);
    expect(bounds.maxAllowed).to.equal(4);
    expect(bounds.minAllowed).to.equal(null);
  });

  it("adds the floor of the ideal size as lower bound when the policy asks for it", () => {
    const bounds = computeBalanceBounds(10, 3, { marginPercent: 10, enforceMinimum: true });

    expect(bounds.minAllowed).to.equal(3);
  });

  it("uses the exact ideal size with a zero margin", () => {
    expect(computeBalanceBounds(6, 2, { marginPercent: 0, enforceMinimum: false }).maxAllowed).to.equal(3);
  });

  it("keeps a whole-number upper bound exact when the margin is applied", () => {
    // 20 / 3 * 1.05 is 7 exactly, but evaluating it in that order gives 7.000000000000001.
    const bounds = computeBalanceBounds(20, 3, { marginPercent: 5, enforceMinimum: false });

    expect(bounds.maxAllowed).to.equal(7);
    expect(checkBalance([8, 6, 6], bounds)).to.deep.equal({
      ok: false,
      violations: [{ part: 0, size: 8, bound: "max", limit: 7 }],
    });
  });

  it("rejects negative margins", () => {
    expect(() => computeBalanceBounds(6, 2, { marginPercent: -1, enforceMinimum: false })).to.throw(
      ParameterError,
    );
  });

  it("counts subset sizes and refuses unknown subset indices", () => {
    expect(measurePartSizes([0, 1, 1, 2], 3)).to.deep.equal([1, 2, 1]);
    expect(() => measurePartSizes([0, 3], 3)).to.throw(ParameterError, "unknown subset 3");
  });

  it("reports every subset outside the bounds", () => {
    const bounds = computeBalanceBounds(6, 2, { marginPercent: 0, enforceMinimum: true });

    expect(checkBalance([3, 3], bounds)).to.deep.equal({ ok: true });
    expect(checkBalance([5, 1], bounds)).to.deep.equal({
      ok: false,
      violations: [
        { part: 0, size: 5, bound: "max", limit: 3 },
        { part: 1, size: 1, bound: "min", limit: 3 },
      ],
    });
  });

  it("ignores undersized subsets unless the lower bound is enforced", () => {
    const bounds = computeBalanceBounds(6, 2, { marginPercent: 50, enforceMinimum: false });

    expect(checkBalance([4, 2], bounds)).to.deep.equal({ ok: true });
  });

  it("raises a balance violation carrying the offending subsets", () => {
    const bounds = computeBalanceBounds(6, 2, { marginPercent: 0, enforceMinimum: true });

    try {
      assertBalanced([5, 1], bounds);
      expect.fail("assertBalanced should have thrown");
    } catch (error) {
      if (!(error instanceof BalanceViolationError)) {
        throw error;
      }
      const violation = error;
      expect(violation.code).to.equal(ERROR_CODES.KL_BALANCE);
      expect(violation.message).to.equal("part 0 has 5 vertices (max 3); part 1 has 1 vertices (min 3)");
      expect(violation.violations).to.have.length(2);
    }
  });
});
