import { BalanceViolationError, ParameterError, type BalanceViolation } from "./errors.js";

/** Policy applied once refinement has stopped. */
export interface BalancePolicy {
  /** Tolerated overshoot above the ideal subset size, in percent. */
  marginPercent: number;
  /** Also require every subset to hold at least `floor(ideal)` vertices. */
  enforceMinimum: boolean;
}

export interface BalanceBounds {
  /** `vertexCount / numParts`, not rounded. */
  ideal: number;
  maxAllowed: number;
  /** `null` when the policy does not enforce a lower bound. */
  minAllowed: number | null;
}

export type BalanceReport = { ok: true } | { ok: false; violations: BalanceViolation[] };

export function computeBalanceBounds(
  vertexCount: number,
  numParts: number,
  policy: BalancePolicy,
): BalanceBounds {
  if (!Number.isFinite(policy.marginPercent) || policy.marginPercent < 0) {
    throw new ParameterError(`margin must be a non-negative number, got ${policy.marginPercent}`, {
      marginPercent: policy.marginPercent,
    });
  }
  const ideal = vertexCount / numParts;
  // Divide last: `ideal * 1.05` can land just above a whole number and round up.
  return {
    ideal,
    maxAllowed: Math.ceil((vertexCount * (100 + policy.marginPercent)) / (numParts * 100)),
    minAllowed: policy.enforceMinimum ? Math.floor(ideal) : null,
  };
}

/** Number of vertices assigned to each subset. */
export function measurePartSizes(assignment: ArrayLike<number>, numParts: number): number[] {
  const sizes = new Array<number>(numParts).fill(0);
  for (let vertex = 0; vertex < assignment.length; vertex += 1) {
    const part = assignment[vertex];
    if (!Number.isInteger(part) || part < 0 || part >= numParts) {
      throw new ParameterError(`vertex ${vertex} is assigned to unknown subset ${part}`, {
        vertex,
        part,
        numParts,
      });
    }
    sizes[part] += 1;
  }
  return sizes;
}

/** Lists every subset whose size escapes {@link bounds}. */
export function checkBalance(sizes: readonly number[], bounds: BalanceBounds): BalanceReport {
  const violations: BalanceViolation[] = [];
  sizes.forEach((size, part) => {
    if (size > bounds.maxAllowed) {
      violations.push({ part, size, bound: "max", limit: bounds.maxAllowed });
    }
    if (bounds.minAllowed !== null && size < bounds.minAllowed) {
      violations.push({ part, size, bound: "min", limit: bounds.minAllowed });
    }
  });
  return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

/** Throwing variant of {@link checkBalance}. */
export function assertBalanced(sizes: readonly number[], bounds: BalanceBounds): void {
  const report = checkBalance(sizes, bounds);
  if (!report.ok) {
    throw new BalanceViolationError(report.violations);
  }
}
