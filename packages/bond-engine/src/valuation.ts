// Cash-flow valuation: present value, duration, convexity, current yield
// Flat annual nominal rate compounded `paymentFrequency` times a year

import { InvalidRateError } from './errors.js';
import { couponPerPeriod, periodCount } from './terms.js';
import type { BondTerms, CashFlow } from './types.js';

function discountBase(terms: BondTerms, rate: number): number {
  const base = 1 + rate / terms.paymentFrequency;
  if (!Number.isFinite(rate) || !(base > 0)) {
    throw new InvalidRateError(rate, terms.paymentFrequency);
  }
  return base;
}

/**
 * PV(r) = sum_{t=1..n} C / (1 + r/f)^t + F / (1 + r/f)^n
 */
export function presentValue(terms: BondTerms, rate: number): number {
  const base = discountBase(terms, rate);
  const coupon = couponPerPeriod(terms);
  const periods = periodCount(terms);

  let pv = 0;
  for (let t = 1; t <= periods; t++) {
    pv += coupon / Math.pow(base, t);
  }
  pv += terms.faceValue / Math.pow(base, periods);
  return pv;
}

/**
 * Time-weighted PV of the cash flows over the observed market price.
 * Measured in coupon periods; the denominator is the market price, not PV(y).
 */
export function macaulayDuration(terms: BondTerms, requiredYield: number): number {
  const base = discountBase(terms, requiredYield);
  const coupon = couponPerPeriod(terms);
  const periods = periodCount(terms);

  let duration = 0;
  for (let t = 1; t <= periods; t++) {
    duration += t * coupon / Math.pow(base, t);
  }
  duration += periods * terms.faceValue / Math.pow(base, periods);
  return duration / terms.marketPrice;
}

export function modifiedDuration(terms: BondTerms, requiredYield: number): number {
  return macaulayDuration(terms, requiredYield) / discountBase(terms, requiredYield);
}

export function convexity(terms: BondTerms, requiredYield: number): number {
  const base = discountBase(terms, requiredYield);
  const coupon = couponPerPeriod(terms);
  const periods = periodCount(terms);

  let sum = 0;
  for (let t = 1; t <= periods; t++) {
    sum += t * (t + 1) * coupon / Math.pow(base, t + 2);
  }
  sum += periods * (periods + 1) * terms.faceValue / Math.pow(base, periods + 2);
  return sum / terms.marketPrice;
}

// NOTE: divides the per-period coupon, not the annual coupon, by the price.
export function currentYield(terms: BondTerms): number {
  return couponPerPeriod(terms) / terms.marketPrice;
}

export function cashFlowSchedule(terms: BondTerms): CashFlow[] {
  const coupon = couponPerPeriod(terms);
  const periods = periodCount(terms);
  const flows: CashFlow[] = [];
  for (let t = 1; t <= periods; t++) {
    flows.push({
      period: t,
      time: t / terms.paymentFrequency,
      amount: t === periods ? coupon + terms.faceValue : coupon,
    });
  }
  return flows;
}
