// Report builders: thin sweeps over the engine's pricing and sensitivity operations
// Each returns plain rows; formatting belongs to the caller

import { BondValuationEngine, type YtmOptions } from './engine.js';
import { withFrequency } from './terms.js';
import { cashFlowSchedule } from './valuation.js';
import type { BondTerms, CashFlow, YieldSolution, YieldSource } from './types.js';

export const DEFAULT_SENSITIVITY_STEP = 0.005;
export const DEFAULT_SENSITIVITY_STEPS = 2;
export const DEFAULT_SCENARIO_SHIFTS: readonly number[] = [-0.02, -0.01, 0, 0.01, 0.02];
export const DEFAULT_FREQUENCIES: readonly number[] = [1, 2, 4];

export interface PricePoint {
  readonly yield: number;
  readonly price: number;
}

export interface RiskMeasures {
  readonly price: number;
  readonly macaulayDuration: number;
  readonly modifiedDuration: number;
  readonly convexity: number;
}

export interface ScenarioRow extends RiskMeasures {
  readonly shift: number;
  readonly yield: number;
}

export interface FrequencyRow extends RiskMeasures {
  readonly frequency: number;
  readonly label: string;
}

export interface SensitivityOptions {
  step?: number;
  steps?: number;
}

function riskAt(engine: BondValuationEngine): RiskMeasures {
  return {
    price: engine.presentValue(engine.requiredYield),
    macaulayDuration: engine.macaulayDuration(),
    modifiedDuration: engine.modifiedDuration(),
    convexity: engine.convexity(),
  };
}

/** Prices at y + k*step for k = -steps..steps around the required yield */
export function priceSensitivity(engine: BondValuationEngine, options: SensitivityOptions = {}): PricePoint[] {
  const step = options.step ?? DEFAULT_SENSITIVITY_STEP;
  const steps = options.steps ?? DEFAULT_SENSITIVITY_STEPS;
  if (!Number.isFinite(step) || step <= 0) throw new RangeError(`step must be > 0, got ${step}`);
  if (!Number.isInteger(steps) || steps < 0) throw new RangeError(`steps must be a non-negative integer, got ${steps}`);

  const base = engine.requiredYield;
  const rows: PricePoint[] = [];
  for (let k = -steps; k <= steps; k++) {
    const y = base + k * step;
    rows.push({ yield: y, price: engine.presentValue(y) });
  }
  return rows;
}

export function scenarioAnalysis(
  engine: BondValuationEngine,
  shifts: readonly number[] = DEFAULT_SCENARIO_SHIFTS,
): ScenarioRow[] {
  const base = engine.requiredYield;
  return shifts.map(shift => {
    const y = base + shift;
    return { shift, yield: y, ...riskAt(engine.supplyYield(y)) };
  });
}

export function frequencyLabel(frequency: number): string {
  switch (frequency) {
    case 1: return 'Annual';
    case 2: return 'Semi-Annual';
    case 4: return 'Quarterly';
    case 12: return 'Monthly';
    default: return `${frequency} per year`;
  }
}

/** Same bond and required yield, re-cut to each coupon frequency */
export function frequencyAnalysis(
  engine: BondValuationEngine,
  frequencies: readonly number[] = DEFAULT_FREQUENCIES,
): FrequencyRow[] {
  const y = engine.requiredYield;
  return frequencies.map(frequency => {
    const variant = new BondValuationEngine(withFrequency(engine.terms, frequency)).supplyYield(y);
    return { frequency, label: frequencyLabel(frequency), ...riskAt(variant) };
  });
}

export interface BondReport {
  readonly terms: BondTerms;
  readonly requiredYield: number;
  readonly yieldSource: YieldSource;
  /** Solver outcome when the required yield was derived from the market price */
  readonly yieldSolution?: YieldSolution;
  readonly price: number;
  readonly ytm: YieldSolution;
  readonly macaulayDuration: number;
  readonly modifiedDuration: number;
  readonly convexity: number;
  readonly currentYield: number;
  readonly priceSensitivity: PricePoint[];
  readonly breakEvenYield: YieldSolution;
  readonly scenarios: ScenarioRow[];
  readonly frequencies: FrequencyRow[];
  readonly cashFlows: CashFlow[];
}

export interface AnalyzeOptions {
  ytm?: YtmOptions;
  sensitivity?: SensitivityOptions;
  scenarioShifts?: readonly number[];
  frequencies?: readonly number[];
}

/**
 * Full single-bond analysis. Derives the required yield from the market price
 * when the engine has none, then runs every report against it.
 */
export function analyzeBond(input: BondValuationEngine, options: AnalyzeOptions = {}): BondReport {
  const engine = input.ensureYield(options.ytm);
  const state = engine.state;

  return {
    terms: engine.terms,
    requiredYield: engine.requiredYield,
    yieldSource: state.status === 'derived' ? 'derived' : 'supplied',
    yieldSolution: state.status === 'derived' ? state.solution : undefined,
    ...riskAt(engine),
    ytm: engine.solveYtm(options.ytm),
    currentYield: engine.currentYield(),
    priceSensitivity: priceSensitivity(engine, options.sensitivity),
    breakEvenYield: engine.solveBreakEvenYield(engine.terms.marketPrice),
    scenarios: scenarioAnalysis(engine, options.scenarioShifts),
    frequencies: frequencyAnalysis(engine, options.frequencies),
    cashFlows: cashFlowSchedule(engine.terms),
  };
}
