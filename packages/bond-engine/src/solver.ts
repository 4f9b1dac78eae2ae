// Bisection root-finder for the price/yield relationship
// Bracket [0, 1] annual; relies on PV falling as the rate rises

import { RootFindingNonConvergentError } from './errors.js';
import type { YieldSolution } from './types.js';

export const YIELD_FLOOR = 0;
export const YIELD_CAP = 1;

export interface BisectionStep {
  readonly iteration: number;
  readonly mid: number;
  readonly presentValue: number;
  readonly target: number;
  /** Bracket after this step's update */
  readonly low: number;
  readonly high: number;
}

/** Decides, after each bracket update, whether `mid` is good enough. */
export type StoppingRule = (step: BisectionStep) => boolean;

/** Stop once the priced midpoint is within `tolerance` price units of the target. */
export function priceTolerance(tolerance: number): StoppingRule {
  if (!(tolerance > 0) || !Number.isFinite(tolerance)) {
    throw new RangeError(`tolerance must be a positive finite number, got ${tolerance}`);
  }
  return (step) => Math.abs(step.target - step.presentValue) < tolerance;
}

/** Stop once the bracket is no wider than `epsilon`, whatever the price gap. */
export function intervalWidth(epsilon: number): StoppingRule {
  if (!(epsilon > 0) || !Number.isFinite(epsilon)) {
    throw new RangeError(`epsilon must be a positive finite number, got ${epsilon}`);
  }
  return (step) => step.high - step.low <= epsilon;
}

export interface BisectionOptions {
  stop: StoppingRule;
  /** Defaults to no cap: the loop ends only when `stop` fires */
  maxIterations?: number;
}

/**
 * Find r in [0, 1] with pricer(r) close to `target`. When the iteration budget
 * runs out the last midpoint comes back with `converged: false`; targets whose
 * yield lies outside the bracket end up next to a boundary.
 */
export function bisectYield(
  pricer: (rate: number) => number,
  target: number,
  options: BisectionOptions,
): YieldSolution {
  const maxIterations = options.maxIterations ?? Number.POSITIVE_INFINITY;
  if (!(maxIterations >= 1) || (Number.isFinite(maxIterations) && !Number.isInteger(maxIterations))) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }

  let low = YIELD_FLOOR;
  let high = YIELD_CAP;
  let mid = (low + high) / 2;
  let pv = Number.NaN;
  let iteration = 0;

  while (iteration < maxIterations) {
    iteration++;
    mid = (low + high) / 2;
    pv = pricer(mid);

    // Price too low means the rate is too high: search the lower half
    if (pv < target) high = mid;
    else low = mid;

    if (options.stop({ iteration, mid, presentValue: pv, target, low, high })) {
      return { rate: mid, converged: true, iterations: iteration, low, high, presentValue: pv };
    }
  }

  return { rate: mid, converged: false, iterations: iteration, low, high, presentValue: pv };
}

export function requireConverged(solution: YieldSolution): YieldSolution {
  if (!solution.converged) throw new RootFindingNonConvergentError(solution);
  return solution;
}
