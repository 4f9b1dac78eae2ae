import { describe, it, expect } from 'vitest';
import {
  cashFlowSchedule,
  convexity,
  couponPerPeriod,
  createBondTerms,
  currentYield,
  InvalidRateError,
  InvalidTermsError,
  macaulayDuration,
  modifiedDuration,
  periodCount,
  presentValue,
  withFrequency,
} from '../src/index.js';

const discountBond = createBondTerms({
  faceValue: 1000,
  couponRate: 0.05,
  marketPrice: 950,
  remainingYears: 8,
  paymentFrequency: 2,
});

describe('createBondTerms', () => {
  it('freezes valid terms', () => {
    expect(Object.isFrozen(discountBond)).toBe(true);
    expect(couponPerPeriod(discountBond)).toBe(25);
    expect(periodCount(discountBond)).toBe(16);
  });

  it('accepts a zero coupon rate', () => {
    const zero = createBondTerms({ faceValue: 100, couponRate: 0, marketPrice: 80, remainingYears: 3, paymentFrequency: 1 });
    expect(couponPerPeriod(zero)).toBe(0);
  });

  it('reports every invalid field at once', () => {
    try {
      createBondTerms({ faceValue: 0, couponRate: -0.01, marketPrice: -5, remainingYears: 2.5, paymentFrequency: 0 });
      expect.unreachable('createBondTerms should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTermsError);
      if (!(err instanceof InvalidTermsError)) return;
      expect(err.code).toBe('INVALID_TERMS');
      expect(err.issues.map(i => i.field)).toEqual([
        'faceValue', 'couponRate', 'marketPrice', 'remainingYears', 'paymentFrequency',
      ]);
      expect(err.issues[3]).toEqual({ field: 'remainingYears', reason: 'must be an integer' });
    }
  });

  it('rejects non-finite values', () => {
    expect(() => createBondTerms({ faceValue: Number.NaN, couponRate: 0.05, marketPrice: 950, remainingYears: 8, paymentFrequency: 2 }))
      .toThrow('faceValue must be a finite number');
    expect(() => createBondTerms({ faceValue: 1000, couponRate: 0.05, marketPrice: Infinity, remainingYears: 8, paymentFrequency: 2 }))
      .toThrow(InvalidTermsError);
  });

  it('withFrequency re-cuts the coupon schedule', () => {
    const quarterly = withFrequency(discountBond, 4);
    expect(quarterly.paymentFrequency).toBe(4);
    expect(couponPerPeriod(quarterly)).toBe(12.5);
    expect(discountBond.paymentFrequency).toBe(2);
  });
});

describe('presentValue', () => {
  it('prices the 8y 5% semi-annual bond at a 6% yield', () => {
    expect(presentValue(discountBond, 0.06)).toBeCloseTo(937.19449, 4);
  });

  it('sums undiscounted cash flows at a zero rate', () => {
    expect(presentValue(discountBond, 0)).toBe(1400);
  });

  it('prices a par bond at face value', () => {
    const par = createBondTerms({ faceValue: 1000, couponRate: 0.05, marketPrice: 1000, remainingYears: 8, paymentFrequency: 2 });
    expect(presentValue(par, 0.05)).toBeCloseTo(1000, 9);
  });

  it('is strictly decreasing in the rate over (-f, inf)', () => {
    const rates = [-1.9, -1, -0.5, -0.1, 0, 0.01, 0.05, 0.1, 0.5, 1, 3];
    const prices = rates.map(r => presentValue(discountBond, r));
    for (let i = 1; i < prices.length; i++) {
      expect(prices[i]).toBeLessThan(prices[i - 1]);
    }
  });

  it('returns bit-identical results for repeated calls', () => {
    const first = presentValue(discountBond, 0.0637);
    for (let i = 0; i < 5; i++) {
      expect(Object.is(presentValue(discountBond, 0.0637), first)).toBe(true);
    }
  });

  it('rejects rates at or below the compounding singularity', () => {
    expect(() => presentValue(discountBond, -2)).toThrow(InvalidRateError);
    expect(() => presentValue(discountBond, -3)).toThrow(InvalidRateError);
    expect(() => presentValue(discountBond, Number.NaN)).toThrow(InvalidRateError);
  });
});

describe('duration and convexity', () => {
  it('matches the closed sums for the 8y 5% bond at 6%', () => {
    expect(macaulayDuration(discountBond, 0.06)).toBeCloseTo(13.0983064, 6);
    expect(modifiedDuration(discountBond, 0.06)).toBeCloseTo(12.7168023, 6);
    expect(convexity(discountBond, 0.06)).toBeCloseTo(196.5001691, 6);
  });

  it('divides by the market price rather than the model price', () => {
    const dearer = createBondTerms({ ...discountBond, marketPrice: 1900 });
    expect(macaulayDuration(dearer, 0.06)).toBeCloseTo(macaulayDuration(discountBond, 0.06) / 2, 12);
  });

  it('gives the maturity as Macaulay duration for a zero-coupon bond priced at its yield', () => {
    const price = 1000 / Math.pow(1.05, 5);
    const zero = createBondTerms({ faceValue: 1000, couponRate: 0, marketPrice: price, remainingYears: 5, paymentFrequency: 1 });
    expect(macaulayDuration(zero, 0.05)).toBeCloseTo(5, 12);
    expect(modifiedDuration(zero, 0.05)).toBeCloseTo(5 / 1.05, 12);
    expect(convexity(zero, 0.05)).toBeCloseTo(27.2108844, 6);
  });

  it('keeps Macaulay duration positive and within maturity for an annual coupon bond', () => {
    const base = createBondTerms({ faceValue: 1000, couponRate: 0.04, marketPrice: 1, remainingYears: 3, paymentFrequency: 1 });
    const bond = createBondTerms({ ...base, marketPrice: presentValue(base, 0.05) });
    const duration = macaulayDuration(bond, 0.05);
    expect(duration).toBeGreaterThan(0);
    expect(duration).toBeLessThanOrEqual(3);
    expect(duration).toBeCloseTo(2.8843797, 6);
    expect(convexity(bond, 0.05)).toBeGreaterThan(0);
  });
});

describe('currentYield', () => {
  it('divides the per-period coupon by the market price', () => {
    expect(currentYield(discountBond)).toBe(25 / 950);
    expect(currentYield(discountBond)).toBeCloseTo(0.02632, 5);
  });
});

describe('cashFlowSchedule', () => {
  it('lists coupons and repays face with the last one', () => {
    const twoYear = createBondTerms({ faceValue: 1000, couponRate: 0.05, marketPrice: 990, remainingYears: 2, paymentFrequency: 2 });
    expect(cashFlowSchedule(twoYear)).toEqual([
      { period: 1, time: 0.5, amount: 25 },
      { period: 2, time: 1, amount: 25 },
      { period: 3, time: 1.5, amount: 25 },
      { period: 4, time: 2, amount: 1025 },
    ]);
  });
});
