export {
  BondValuationEngine,
  BREAK_EVEN_WIDTH,
  DEFAULT_YTM_MAX_ITERATIONS,
  DEFAULT_YTM_TOLERANCE,
  UNSET_YIELD_SENTINEL,
} from './engine.js';
export type { BondInput, YtmOptions } from './engine.js';

export {
  BondEngineError,
  InvalidRateError,
  InvalidTermsError,
  RootFindingNonConvergentError,
  YieldUnsetError,
  isBondEngineError,
} from './errors.js';
export type { BondEngineErrorCode, TermIssue } from './errors.js';

export { bisectYield, intervalWidth, priceTolerance, requireConverged, YIELD_CAP, YIELD_FLOOR } from './solver.js';
export type { BisectionOptions, BisectionStep, StoppingRule } from './solver.js';

export { couponPerPeriod, createBondTerms, periodCount, withFrequency } from './terms.js';
export {
  cashFlowSchedule,
  convexity,
  currentYield,
  macaulayDuration,
  modifiedDuration,
  presentValue,
} from './valuation.js';

export {
  analyzeBond,
  DEFAULT_FREQUENCIES,
  DEFAULT_SCENARIO_SHIFTS,
  DEFAULT_SENSITIVITY_STEP,
  DEFAULT_SENSITIVITY_STEPS,
  frequencyAnalysis,
  frequencyLabel,
  priceSensitivity,
  scenarioAnalysis,
} from './reports.js';
export type {
  AnalyzeOptions,
  BondReport,
  FrequencyRow,
  PricePoint,
  RiskMeasures,
  ScenarioRow,
  SensitivityOptions,
} from './reports.js';

export type {
  BondTerms,
  BondTermsInput,
  CashFlow,
  ValuationState,
  YieldSolution,
  YieldSource,
} from './types.js';
