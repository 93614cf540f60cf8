/**
 * Environment readers behind the `KL_*` defaults. Blank values count as unset,
 * and a value that cannot be interpreted falls back to the caller's default
 * instead of failing the run.
 */
import process from "node:process";

/** Inclusive bounds applied to numeric variables. */
export interface NumericBounds {
  readonly min?: number;
  readonly max?: number;
}

const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ["1", true],
  ["true", true],
  ["yes", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["no", false],
  ["off", false],
]);

const INTEGER_LITERAL = /^[-+]?\d+$/;

/** Trimmed value of {@link name}, or `undefined` when unset or blank. */
export function readOptionalString(name: string): string | undefined {
  const trimmed = process.env[name]?.trim();
  return trimmed ? trimmed : undefined;
}

function inBounds(value: number, bounds: NumericBounds = {}): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  return (bounds.min === undefined || value >= bounds.min) && (bounds.max === undefined || value <= bounds.max);
}

/** Accepts `1/0`, `true/false`, `yes/no` and `on/off`, in any case. */
export function readBool(name: string, fallback: boolean): boolean {
  const raw = readOptionalString(name);
  return (raw === undefined ? undefined : BOOLEAN_LITERALS.get(raw.toLowerCase())) ?? fallback;
}

/** Base-10 safe integer within {@link bounds}. */
export function readInt(name: string, fallback: number, bounds?: NumericBounds): number {
  const raw = readOptionalString(name);
  if (raw === undefined || !INTEGER_LITERAL.test(raw)) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && inBounds(value, bounds) ? value : fallback;
}

/** Finite decimal number within {@link bounds}; `Infinity` is rejected. */
export function readNumber(name: string, fallback: number, bounds?: NumericBounds): number {
  const raw = readOptionalString(name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  return inBounds(value, bounds) ? value : fallback;
}

/** One of {@link allowed}, matched case-insensitively. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = readOptionalString(name)?.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === raw) ?? fallback;
}
