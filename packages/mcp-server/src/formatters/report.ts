// Plain-text rendering of a bond report for the console
// Yields at 4 decimals; prices, durations and payments at 6 significant digits

import type { BondReport, YieldSolution } from "bond-engine";

export function formatYield(n: number): string {
  return n.toFixed(4);
}

export function formatNumber(n: number): string {
  if (!Number.isFinite(n)) return String(n);
  return String(Number(n.toPrecision(6)));
}

function solverNote(solution: YieldSolution): string {
  return solution.converged ? "" : ` (not converged after ${solution.iterations} iterations)`;
}

export function renderReport(report: BondReport): string[] {
  const lines: string[] = [];

  if (report.yieldSource === "derived") {
    const note = report.yieldSolution ? solverNote(report.yieldSolution) : "";
    lines.push(`Required yield derived from the market price: ${formatYield(report.requiredYield)}${note}`);
  }

  lines.push("", "Bond Analysis:");
  lines.push(`Present Value (Price): ${formatNumber(report.price)}`);
  lines.push(`Yield to Maturity (YTM): ${formatYield(report.ytm.rate)}${solverNote(report.ytm)}`);
  lines.push(`Macaulay Duration: ${formatNumber(report.macaulayDuration)}`);
  lines.push(`Modified Duration: ${formatNumber(report.modifiedDuration)}`);
  lines.push(`Convexity: ${formatNumber(report.convexity)}`);
  lines.push(`Current Yield: ${formatYield(report.currentYield)}`);

  lines.push("", "Price Sensitivity Analysis:");
  for (const point of report.priceSensitivity) {
    lines.push(`Yield: ${formatYield(point.yield)} | Price: ${formatNumber(point.price)}`);
  }
  lines.push(`Break-Even Yield: ${formatYield(report.breakEvenYield.rate)}`);

  lines.push("", "Scenario Analysis:");
  for (const row of report.scenarios) {
    lines.push(
      `Yield: ${formatYield(row.yield)}`,
      `Price: ${formatNumber(row.price)}`,
      `Macaulay Duration: ${formatNumber(row.macaulayDuration)}`,
      `Modified Duration: ${formatNumber(row.modifiedDuration)}`,
      `Convexity: ${formatNumber(row.convexity)}`,
      "",
    );
  }

  lines.push("Frequency Analysis:");
  for (const row of report.frequencies) {
    lines.push(
      `Payment Frequency: ${row.label}`,
      `Price: ${formatNumber(row.price)}`,
      `Macaulay Duration: ${formatNumber(row.macaulayDuration)}`,
      `Modified Duration: ${formatNumber(row.modifiedDuration)}`,
      `Convexity: ${formatNumber(row.convexity)}`,
      "",
    );
  }

  lines.push("Cash Flow Schedule:");
  for (const flow of report.cashFlows) {
    lines.push(`Period: ${flow.period} | Payment Time: ${formatNumber(flow.time)} | Payment: ${formatNumber(flow.amount)}`);
  }

  return lines;
}
