// Error taxonomy for the valuation engine
// Every engine failure is a BondEngineError with a stable code

import type { YieldSolution } from './types.js';

export type BondEngineErrorCode =
  | 'INVALID_TERMS'
  | 'INVALID_RATE'
  | 'YIELD_UNSET'
  | 'ROOT_FINDING_NON_CONVERGENT';

export abstract class BondEngineError extends Error {
  abstract readonly code: BondEngineErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface TermIssue {
  readonly field: string;
  readonly reason: string;
}

export class InvalidTermsError extends BondEngineError {
  readonly code = 'INVALID_TERMS';
  readonly issues: readonly TermIssue[];

  constructor(issues: readonly TermIssue[]) {
    super(`Invalid bond terms: ${issues.map(i => `${i.field} ${i.reason}`).join('; ')}`);
    this.issues = issues;
  }
}

export class InvalidRateError extends BondEngineError {
  readonly code = 'INVALID_RATE';
  readonly rate: number;

  constructor(rate: number, paymentFrequency: number) {
    super(`Discount rate ${rate} is outside the compounding domain (must be finite and > -${paymentFrequency})`);
    this.rate = rate;
  }
}

export class YieldUnsetError extends BondEngineError {
  readonly code = 'YIELD_UNSET';

  constructor(operation: string) {
    super(`${operation} requires a required yield: supply one or derive it from the market price first`);
  }
}

export class RootFindingNonConvergentError extends BondEngineError {
  readonly code = 'ROOT_FINDING_NON_CONVERGENT';
  readonly solution: YieldSolution;

  constructor(solution: YieldSolution) {
    super(
      `Yield search did not converge after ${solution.iterations} iterations ` +
      `(best estimate ${solution.rate}, bracket [${solution.low}, ${solution.high}])`,
    );
    this.solution = solution;
  }
}

export function isBondEngineError(err: unknown): err is BondEngineError {
  return err instanceof BondEngineError;
}
