import { describe, it, expect } from 'vitest';
import {
  BondValuationEngine,
  InvalidTermsError,
  UNSET_YIELD_SENTINEL,
  YieldUnsetError,
  type BondInput,
} from '../src/index.js';

const input: BondInput = {
  faceValue: 1000,
  couponRate: 0.05,
  marketPrice: 950,
  remainingYears: 8,
  paymentFrequency: 2,
};

describe('BondValuationEngine', () => {
  describe('valuation state', () => {
    it('treats the -1 sentinel, null and absence as unset', () => {
      for (const requiredYield of [UNSET_YIELD_SENTINEL, null, undefined]) {
        const engine = BondValuationEngine.create({ ...input, requiredYield });
        expect(engine.hasYield).toBe(false);
        expect(engine.state).toEqual({ status: 'unset' });
        expect(engine.yieldSource).toBeUndefined();
      }
    });

    it('refuses yield-dependent analytics while unset', () => {
      const engine = BondValuationEngine.create(input);
      expect(() => engine.macaulayDuration()).toThrow(YieldUnsetError);
      expect(() => engine.modifiedDuration()).toThrow(YieldUnsetError);
      expect(() => engine.convexity()).toThrow(YieldUnsetError);
      expect(() => engine.requiredYield).toThrow('requiredYield requires a required yield');
    });

    it('still answers yield-free questions while unset', () => {
      const engine = BondValuationEngine.create(input);
      expect(engine.currentYield()).toBe(25 / 950);
      expect(engine.presentValue(0)).toBe(1400);
    });

    it('supplyYield returns a new engine and leaves the original unset', () => {
      const unset = BondValuationEngine.create(input);
      const supplied = unset.supplyYield(0.06);
      expect(supplied).not.toBe(unset);
      expect(unset.hasYield).toBe(false);
      expect(supplied.state).toEqual({ status: 'supplied', requiredYield: 0.06 });
      expect(supplied.yieldSource).toBe('supplied');
      expect(Object.isFrozen(supplied.state)).toBe(true);
    });

    it('create() supplies a given yield', () => {
      const engine = BondValuationEngine.create({ ...input, requiredYield: 0.06 });
      expect(engine.requiredYield).toBe(0.06);
      expect(engine.macaulayDuration()).toBeCloseTo(13.0983064, 6);
    });

    it('deriveYield solves for the yield that reproduces the market price', () => {
      const derived = BondValuationEngine.create(input).deriveYield();
      expect(derived.state.status).toBe('derived');
      if (derived.state.status !== 'derived') return;
      expect(derived.state.solution.converged).toBe(true);
      expect(derived.requiredYield).toBe(derived.state.solution.rate);
      expect(Math.abs(derived.presentValue(derived.requiredYield) - 950)).toBeLessThan(1e-6);
    });

    it('ensureYield keeps a supplied yield and derives a missing one', () => {
      const supplied = BondValuationEngine.create({ ...input, requiredYield: 0.06 });
      expect(supplied.ensureYield()).toBe(supplied);

      const derived = BondValuationEngine.create(input).ensureYield();
      expect(derived.yieldSource).toBe('derived');
      expect(derived.requiredYield).toBeCloseTo(0.0578972, 6);
    });

    it('rejects a non-finite supplied yield', () => {
      const engine = BondValuationEngine.create(input);
      expect(() => engine.supplyYield(Number.NaN)).toThrow(InvalidTermsError);
    });

    it('fails fast on invalid terms', () => {
      expect(() => BondValuationEngine.create({ ...input, marketPrice: 0 })).toThrow('marketPrice must be > 0');
      expect(() => BondValuationEngine.create({ ...input, paymentFrequency: 0 })).toThrow(InvalidTermsError);
    });
  });

  describe('ytm', () => {
    it('meets the price tolerance within the iteration cap', () => {
      const engine = BondValuationEngine.create(input);
      const solution = engine.solveYtm();
      expect(solution.converged).toBe(true);
      expect(solution.iterations).toBeLessThanOrEqual(1000);
      expect(Math.abs(engine.presentValue(solution.rate) - 950)).toBeLessThan(1e-6);
      expect(engine.ytm()).toBe(solution.rate);
      expect(solution.rate).toBeCloseTo(0.0578972, 6);
    });

    it('honours a custom tolerance and iteration cap', () => {
      const engine = BondValuationEngine.create(input);
      const coarse = engine.solveYtm({ tolerance: 1, maxIterations: 1000 });
      expect(coarse.converged).toBe(true);
      expect(Math.abs(coarse.presentValue - 950)).toBeLessThan(1);

      const capped = engine.solveYtm({ maxIterations: 5 });
      expect(capped.converged).toBe(false);
      expect(capped.iterations).toBe(5);
      expect(capped.rate).toBe(0.03125);
      expect(engine.ytm(1e-6, 5)).toBe(0.03125);
    });

    it('recovers the coupon rate for a bond trading at par', () => {
      const par = BondValuationEngine.create({ ...input, marketPrice: 1000 });
      expect(par.ytm()).toBeCloseTo(0.05, 6);
    });

    it('cannot solve below zero: a bond above its undiscounted value stays next to 0%', () => {
      const rich = BondValuationEngine.create({ ...input, marketPrice: 1500 });
      const solution = rich.solveYtm();
      expect(solution.converged).toBe(false);
      expect(solution.low).toBe(0);
      expect(solution.rate).toBeLessThan(1e-12);
    });
  });

  describe('breakEvenYield', () => {
    it('narrows the bracket to 1e-6 around the yield of the reference price', () => {
      const engine = BondValuationEngine.create(input);
      const solution = engine.solveBreakEvenYield(950);
      expect(solution.converged).toBe(true);
      expect(solution.iterations).toBe(20);
      expect(solution.high - solution.low).toBeLessThanOrEqual(1e-6);
      expect(Math.abs(solution.rate - engine.ytm())).toBeLessThanOrEqual(1e-6);
      expect(engine.breakEvenYield(950)).toBe(solution.rate);
    });

    it('does not need a required yield', () => {
      const engine = BondValuationEngine.create(input);
      expect(engine.breakEvenYield(1000)).toBeCloseTo(0.05, 5);
    });

    it('rejects a non-positive reference price', () => {
      const engine = BondValuationEngine.create(input);
      expect(() => engine.breakEvenYield(0)).toThrow('referencePrice must be > 0');
    });
  });

  describe('errors', () => {
    it('carry stable codes and class names', () => {
      const err = new YieldUnsetError('convexity');
      expect(err.code).toBe('YIELD_UNSET');
      expect(err.name).toBe('YieldUnsetError');
      expect(err.message).toBe('convexity requires a required yield: supply one or derive it from the market price first');
    });
  });
});
