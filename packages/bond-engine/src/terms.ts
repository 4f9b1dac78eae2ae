import { InvalidTermsError, type TermIssue } from './errors.js';
import type { BondTerms, BondTermsInput } from './types.js';

function checkPositive(issues: TermIssue[], field: string, value: number): void {
  if (!Number.isFinite(value)) issues.push({ field, reason: 'must be a finite number' });
  else if (value <= 0) issues.push({ field, reason: 'must be > 0' });
}

function checkPositiveInteger(issues: TermIssue[], field: string, value: number): void {
  if (!Number.isFinite(value)) issues.push({ field, reason: 'must be a finite number' });
  else if (!Number.isInteger(value)) issues.push({ field, reason: 'must be an integer' });
  else if (value <= 0) issues.push({ field, reason: 'must be > 0' });
}

/**
 * Validate and freeze bond terms. Collects every problem before throwing so the
 * caller sees all bad fields at once.
 */
export function createBondTerms(input: BondTermsInput): BondTerms {
  const issues: TermIssue[] = [];
  checkPositive(issues, 'faceValue', input.faceValue);
  if (!Number.isFinite(input.couponRate)) issues.push({ field: 'couponRate', reason: 'must be a finite number' });
  else if (input.couponRate < 0) issues.push({ field: 'couponRate', reason: 'must be >= 0' });
  checkPositive(issues, 'marketPrice', input.marketPrice);
  checkPositiveInteger(issues, 'remainingYears', input.remainingYears);
  checkPositiveInteger(issues, 'paymentFrequency', input.paymentFrequency);

  if (issues.length > 0) throw new InvalidTermsError(issues);

  return Object.freeze({
    faceValue: input.faceValue,
    couponRate: input.couponRate,
    marketPrice: input.marketPrice,
    remainingYears: input.remainingYears,
    paymentFrequency: input.paymentFrequency,
  });
}

export function couponPerPeriod(terms: BondTerms): number {
  return terms.faceValue * terms.couponRate / terms.paymentFrequency;
}

export function periodCount(terms: BondTerms): number {
  return terms.remainingYears * terms.paymentFrequency;
}

/** Same bond paying coupons `frequency` times a year */
export function withFrequency(terms: BondTerms, frequency: number): BondTerms {
  return createBondTerms({ ...terms, paymentFrequency: frequency });
}
