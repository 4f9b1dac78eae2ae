// Bond terms, valuation state and solver result shapes
// Shared by the engine, the report builders and the tool server

export interface BondTermsInput {
  faceValue: number;
  couponRate: number;
  marketPrice: number;
  remainingYears: number;
  paymentFrequency: number;
}

/** Contractual terms of a plain fixed-coupon bond. Frozen once built. */
export interface BondTerms {
  readonly faceValue: number;
  readonly couponRate: number;      // annual nominal, fraction of face
  readonly marketPrice: number;     // observed price, YTM target
  readonly remainingYears: number;  // whole years
  readonly paymentFrequency: number; // coupons per year
}

export interface YieldSolution {
  /** Last midpoint evaluated: the yield estimate */
  readonly rate: number;
  readonly converged: boolean;
  readonly iterations: number;
  /** Final bracket after the last update */
  readonly low: number;
  readonly high: number;
  /** Present value at `rate` */
  readonly presentValue: number;
}

export type YieldSource = 'supplied' | 'derived';

export type ValuationState =
  | { readonly status: 'unset' }
  | { readonly status: 'supplied'; readonly requiredYield: number }
  | { readonly status: 'derived'; readonly requiredYield: number; readonly solution: YieldSolution };

export interface CashFlow {
  readonly period: number;
  /** Years from now: period / frequency */
  readonly time: number;
  readonly amount: number;
}
