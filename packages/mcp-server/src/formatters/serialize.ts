// Engine results to the snake_case JSON shapes returned by the tools

import type { BondReport, BondTerms, CashFlow, FrequencyRow, ScenarioRow, YieldSolution } from "bond-engine";

export function solutionJson(solution: YieldSolution) {
  return {
    rate: solution.rate,
    converged: solution.converged,
    iterations: solution.iterations,
    bracket_low: solution.low,
    bracket_high: solution.high,
    present_value: solution.presentValue,
  };
}

export function termsJson(terms: BondTerms) {
  return {
    face_value: terms.faceValue,
    coupon_rate: terms.couponRate,
    market_price: terms.marketPrice,
    remaining_years: terms.remainingYears,
    payment_frequency: terms.paymentFrequency,
  };
}

export function cashFlowJson(flow: CashFlow) {
  return { period: flow.period, payment_time: flow.time, payment: flow.amount };
}

export function scenarioJson(row: ScenarioRow) {
  return {
    shift: row.shift,
    yield: row.yield,
    price: row.price,
    macaulay_duration: row.macaulayDuration,
    modified_duration: row.modifiedDuration,
    convexity: row.convexity,
  };
}

export function frequencyJson(row: FrequencyRow) {
  return {
    payment_frequency: row.frequency,
    label: row.label,
    price: row.price,
    macaulay_duration: row.macaulayDuration,
    modified_duration: row.modifiedDuration,
    convexity: row.convexity,
  };
}

export function reportJson(report: BondReport) {
  return {
    terms: termsJson(report.terms),
    required_yield: report.requiredYield,
    yield_source: report.yieldSource,
    yield_solution: report.yieldSolution ? solutionJson(report.yieldSolution) : undefined,
    price: report.price,
    ytm: solutionJson(report.ytm),
    macaulay_duration: report.macaulayDuration,
    modified_duration: report.modifiedDuration,
    convexity: report.convexity,
    current_yield: report.currentYield,
    price_sensitivity: report.priceSensitivity.map((p) => ({ yield: p.yield, price: p.price })),
    break_even_yield: solutionJson(report.breakEvenYield),
    scenarios: report.scenarios.map(scenarioJson),
    frequencies: report.frequencies.map(frequencyJson),
    cash_flows: report.cashFlows.map(cashFlowJson),
  };
}
