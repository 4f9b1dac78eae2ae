// Bond valuation engine: immutable terms plus an explicit valuation state
// Yield-dependent analytics read the state; supplying or deriving a yield returns a new engine

import { InvalidTermsError, YieldUnsetError } from './errors.js';
import { bisectYield, intervalWidth, priceTolerance } from './solver.js';
import { createBondTerms } from './terms.js';
import * as valuation from './valuation.js';
import type { BondTerms, BondTermsInput, ValuationState, YieldSolution, YieldSource } from './types.js';

export const DEFAULT_YTM_TOLERANCE = 1e-6;
export const DEFAULT_YTM_MAX_ITERATIONS = 1000;
export const BREAK_EVEN_WIDTH = 1e-6;

/** Yield value meaning "derive it from the market price" on the console and tool surfaces */
export const UNSET_YIELD_SENTINEL = -1;

export interface YtmOptions {
  tolerance?: number;
  maxIterations?: number;
}

export interface BondInput extends BondTermsInput {
  /** Annual nominal yield; -1, null or absent leaves the state unset */
  requiredYield?: number | null;
}

const UNSET: ValuationState = Object.freeze<ValuationState>({ status: 'unset' });

function checkYield(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new InvalidTermsError([{ field, reason: 'must be a finite number' }]);
  }
  return value;
}

export class BondValuationEngine {
  readonly terms: BondTerms;
  readonly state: ValuationState;

  constructor(terms: BondTerms, state: ValuationState = UNSET) {
    this.terms = terms;
    this.state = state;
  }

  static create(input: BondInput): BondValuationEngine {
    const terms = createBondTerms(input);
    const engine = new BondValuationEngine(terms);
    const y = input.requiredYield;
    if (y === undefined || y === null || y === UNSET_YIELD_SENTINEL) return engine;
    return engine.supplyYield(y);
  }

  get hasYield(): boolean {
    return this.state.status !== 'unset';
  }

  get yieldSource(): YieldSource | undefined {
    return this.state.status === 'unset' ? undefined : this.state.status;
  }

  /** Throws YieldUnsetError until a yield has been supplied or derived */
  get requiredYield(): number {
    return this.yieldFor('requiredYield');
  }

  // ── Valuation state transitions ───────────────────────────────────

  supplyYield(requiredYield: number): BondValuationEngine {
    checkYield(requiredYield, 'requiredYield');
    const state: ValuationState = { status: 'supplied', requiredYield };
    return new BondValuationEngine(this.terms, Object.freeze(state));
  }

  deriveYield(options: YtmOptions = {}): BondValuationEngine {
    const solution = this.solveYtm(options);
    const state: ValuationState = { status: 'derived', requiredYield: solution.rate, solution };
    return new BondValuationEngine(this.terms, Object.freeze(state));
  }

  /** Derive the yield from the market price only when none is set */
  ensureYield(options: YtmOptions = {}): BondValuationEngine {
    return this.hasYield ? this : this.deriveYield(options);
  }

  // ── Pricing ──────────────────────────────────────────────────────

  presentValue(rate: number): number {
    return valuation.presentValue(this.terms, rate);
  }

  solveYtm(options: YtmOptions = {}): YieldSolution {
    return bisectYield(rate => this.presentValue(rate), this.terms.marketPrice, {
      stop: priceTolerance(options.tolerance ?? DEFAULT_YTM_TOLERANCE),
      maxIterations: options.maxIterations ?? DEFAULT_YTM_MAX_ITERATIONS,
    });
  }

  ytm(tolerance = DEFAULT_YTM_TOLERANCE, maxIterations = DEFAULT_YTM_MAX_ITERATIONS): number {
    return this.solveYtm({ tolerance, maxIterations }).rate;
  }

  /** Interval-width bisection only: no price check, no iteration cap */
  solveBreakEvenYield(referencePrice: number): YieldSolution {
    if (!Number.isFinite(referencePrice) || referencePrice <= 0) {
      throw new InvalidTermsError([{ field: 'referencePrice', reason: 'must be > 0' }]);
    }
    return bisectYield(rate => this.presentValue(rate), referencePrice, {
      stop: intervalWidth(BREAK_EVEN_WIDTH),
    });
  }

  breakEvenYield(referencePrice: number): number {
    return this.solveBreakEvenYield(referencePrice).rate;
  }

  currentYield(): number {
    return valuation.currentYield(this.terms);
  }

  // ── Yield sensitivity ────────────────────────────────────────────

  macaulayDuration(): number {
    return valuation.macaulayDuration(this.terms, this.yieldFor('macaulayDuration'));
  }

  modifiedDuration(): number {
    return valuation.modifiedDuration(this.terms, this.yieldFor('modifiedDuration'));
  }

  convexity(): number {
    return valuation.convexity(this.terms, this.yieldFor('convexity'));
  }

  private yieldFor(operation: string): number {
    if (this.state.status === 'unset') throw new YieldUnsetError(operation);
    return this.state.requiredYield;
  }
}
