import { ConfigurationError } from "../utils/errors.js";
import type { RangeSpec } from "../types/plan.js";

/** Upper bound on points per sweep axis. */
export const MAX_RANGE_POINTS = 10_000;

// Absorbs float error so that e.g. 0..10 step 2.5 still lands on 10.
const EPSILON = 1e-9;

function round(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

/** Problems with a range, empty when it expands to a finite, non-empty sequence. */
export function rangeProblems(range: RangeSpec, label: string): string[] {
  const { start, stop, step } = range;
  if (![start, stop, step].every(Number.isFinite)) {
    return [`${label}: start, stop and step must be finite numbers`];
  }
  if (step === 0) {
    return [`${label}: step must be non-zero`];
  }
  const span = stop - start;
  if (span !== 0 && Math.sign(span) !== Math.sign(step)) {
    const direction = span > 0 ? "ascending" : "descending";
    return [`${label}: step ${step} ${range.unit} does not move from ${start} toward ${stop} (${direction} range)`];
  }
  const count = Math.floor(span / step + EPSILON) + 1;
  if (count > MAX_RANGE_POINTS) {
    return [`${label}: ${count} points exceeds the limit of ${MAX_RANGE_POINTS}`];
  }
  return [];
}

/**
 * Expand an inclusive range into the values it visits, in visiting order.
 * Descending ranges take a negative step.
 */
export function expandRange(range: RangeSpec, label = "range"): number[] {
  const problems = rangeProblems(range, label);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid ${label}`, problems);
  }
  const count = Math.floor((range.stop - range.start) / range.step + EPSILON) + 1;
  return Array.from({ length: count }, (_, k) => round(range.start + k * range.step));
}
