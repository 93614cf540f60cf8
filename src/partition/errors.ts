import { ERROR_CODES, type ErrorCode } from "../types.js";

/** Base class for every failure raised by the partitioning engine. */
export class PartitionEngineError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "PartitionEngineError";
    this.code = code;
    this.details = details;
  }
}

/** Malformed graph or result inputs (offset mismatches, ids out of range, ...). */
export class StructuralError extends PartitionEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ERROR_CODES.KL_STRUCTURE, message, details);
    this.name = "StructuralError";
  }
}

/** Invalid partition parameters such as `numParts < 2` or a negative margin. */
export class ParameterError extends PartitionEngineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ERROR_CODES.KL_PARAMETER, message, details);
    this.name = "ParameterError";
  }
}

/** Subset whose size escapes the bounds derived from the balance policy. */
export interface BalanceViolation {
  part: number;
  size: number;
  /** Which bound the subset broke. */
  bound: "max" | "min";
  limit: number;
}

/** Raised after refinement when at least one subset breaks the balance policy. */
export class BalanceViolationError extends PartitionEngineError {
  public readonly violations: BalanceViolation[];

  constructor(violations: BalanceViolation[]) {
    super(
      ERROR_CODES.KL_BALANCE,
      violations
        .map((violation) =>
          violation.bound === "max"
            ? `part ${violation.part} has ${violation.size} vertices (max ${violation.limit})`
            : `part ${violation.part} has ${violation.size} vertices (min ${violation.limit})`,
        )
        .join("; "),
      { violations },
    );
    this.name = "BalanceViolationError";
    this.violations = violations;
  }
}
