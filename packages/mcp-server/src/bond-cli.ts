#!/usr/bin/env -S node --import tsx
// Bond analytics console
//
// Usage:
//   bond-cli --face 1000 --coupon 0.05 --price 950 --years 8 --frequency 2 --yield 0.06
//   bond-cli --face 1000 --coupon 0.05 --price 950 --years 8 --frequency 2 --yield -1 --json
//   bond-cli                      # prompts for every input on stdin

import "dotenv/config";
import { createInterface } from "node:readline";
import { analyzeBond, BondValuationEngine } from "bond-engine";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { collectInput, parseCliArgs, type Ask } from "./cli-input.js";
import { renderReport } from "./formatters/report.js";
import { reportJson } from "./formatters/serialize.js";

// ── ANSI helpers (no chalk dependency) ──────────────────────────────
const isTTY = process.stdout.isTTY ?? false;
const ansi = {
  reset: isTTY ? "\x1b[0m" : "", bold: isTTY ? "\x1b[1m" : "", red: isTTY ? "\x1b[31m" : "",
};
function c(color: keyof typeof ansi, text: string): string { return `${ansi[color]}${text}${ansi.reset}`; }

function printHelp(): void {
  console.log(`
  ${c("bold", "bond-cli")} - fixed-income analytics for a single bond

  ${c("bold", "Usage:")}
    bond-cli [options]

  ${c("bold", "Options:")}
    --face <n>          Face value (e.g. 1000)
    --coupon <n>        Annual coupon rate as decimal (e.g. 0.05)
    --price <n>         Market price (e.g. 950)
    --years <n>         Whole years to maturity (e.g. 8)
    --frequency <n>     Coupons per year (1 annual, 2 semi-annual, 4 quarterly)
    --yield <n>         Required yield as decimal, or -1 to derive it from the price
    --json              Print the report as JSON
    -h, --help          Show this help

  Missing inputs are read from stdin in the order above.

  ${c("bold", "Environment:")}
    BOND_YTM_TOLERANCE        YTM price tolerance (default 1e-6)
    BOND_YTM_MAX_ITERATIONS   YTM iteration cap (default 1000)
    BOND_SENSITIVITY_STEP     Price sensitivity step (default 0.005)
    BOND_LOG_LEVEL            debug | info | warn | error | silent (default info)
`);
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) { printHelp(); return; }
  if (args.unknown.length > 0) throw new Error(`Unknown or incomplete arguments: ${args.unknown.join(" ")}`);

  const config = loadConfig();
  const logger = createLogger("BondCli", config.logLevel);

  const rl = createInterface({ input: process.stdin });
  const lines = rl[Symbol.asyncIterator]();
  const ask: Ask = async (prompt) => {
    process.stdout.write(prompt);
    const next = await lines.next();
    return next.done ? undefined : next.value;
  };

  const input = await collectInput(args.values, ask).finally(() => rl.close());

  const engine = BondValuationEngine.create(input);
  if (!engine.hasYield) logger.info("Calculating required yield (YTM) based on the market price...");

  const report = analyzeBond(engine, {
    ytm: { tolerance: config.ytmTolerance, maxIterations: config.ytmMaxIterations },
    sensitivity: { step: config.sensitivityStep },
  });
  if (!report.ytm.converged) {
    logger.warn("YTM search did not converge; showing the best estimate", { iterations: report.ytm.iterations });
  }

  if (args.json) {
    console.log(JSON.stringify(reportJson(report), null, 2));
    return;
  }
  for (const line of renderReport(report)) console.log(line);
}

main().catch((err) => {
  console.error(`${c("red", "Error:")} ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
