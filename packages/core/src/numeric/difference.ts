import { Duration } from "./duration.js";
import type { ToleranceMode } from "./tolerance.js";

export type DifferenceResult =
  | { kind: "difference"; value: number | bigint | Duration }
  | { kind: "not-a-number" };

export const NOT_A_NUMBER: DifferenceResult = { kind: "not-a-number" };

type Numeric = number | bigint;

function isNumeric(value: unknown): value is Numeric {
  return typeof value === "number" || typeof value === "bigint";
}

function absBig(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Both operands as bigints when that loses nothing: two bigints, or a bigint
 * paired with an integral number.
 */
function exactIntegers(expected: Numeric, actual: Numeric): [bigint, bigint] | undefined {
  if (typeof expected === "number" && typeof actual === "number") return undefined;
  const e = typeof expected === "bigint" ? expected : Number.isInteger(expected) ? BigInt(expected) : undefined;
  const a = typeof actual === "bigint" ? actual : Number.isInteger(actual) ? BigInt(actual) : undefined;
  return e !== undefined && a !== undefined ? [e, a] : undefined;
}

function numericDifference(expected: Numeric, actual: Numeric, mode: "Linear" | "Percent"): DifferenceResult {
  const exact = exactIntegers(expected, actual);

  if (mode === "Linear") {
    if (exact) return { kind: "difference", value: absBig(exact[1] - exact[0]) };
    return { kind: "difference", value: Math.abs(Number(actual) - Number(expected)) };
  }

  const e = Number(expected);
  const delta = exact ? Number(absBig(exact[1] - exact[0])) : Math.abs(Number(actual) - e);
  return { kind: "difference", value: (delta * 100) / Math.abs(e) };
}

function toDuration(value: unknown): Duration | undefined {
  return value instanceof Duration ? value : undefined;
}

/** Absolute time between two dates or two durations. */
export function durationDifference(expected: unknown, actual: unknown): DifferenceResult {
  if (expected instanceof Date && actual instanceof Date) {
    if (Number.isNaN(expected.getTime()) || Number.isNaN(actual.getTime())) return NOT_A_NUMBER;
    return { kind: "difference", value: Duration.between(expected, actual).abs() };
  }

  const e = toDuration(expected);
  const a = toDuration(actual);
  if (e && a) return { kind: "difference", value: a.minus(e).abs() };

  return NOT_A_NUMBER;
}

/**
 * How far `actual` is from `expected` under the given tolerance mode. Values
 * that cannot be compared numerically yield the not-a-number sentinel.
 */
export function difference(expected: unknown, actual: unknown, mode: ToleranceMode): DifferenceResult {
  if (mode !== "Linear" && mode !== "Percent") return NOT_A_NUMBER;

  if (isNumeric(expected) && isNumeric(actual)) {
    return numericDifference(expected, actual, mode);
  }

  // Durations only have a linear distance.
  return mode === "Linear" ? durationDifference(expected, actual) : NOT_A_NUMBER;
}
