// Runtime configuration from environment variables (dotenv-loaded by the entry points)

import { z } from "zod";
import { DEFAULT_SENSITIVITY_STEP, DEFAULT_YTM_MAX_ITERATIONS, DEFAULT_YTM_TOLERANCE } from "bond-engine";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevelSetting = (typeof LOG_LEVELS)[number];

export const EnvSchema = z.object({
  BOND_YTM_TOLERANCE: z.coerce
    .number()
    .positive()
    .default(DEFAULT_YTM_TOLERANCE)
    .describe("Absolute price tolerance for the YTM solver"),
  BOND_YTM_MAX_ITERATIONS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_YTM_MAX_ITERATIONS)
    .describe("Iteration cap for the YTM solver"),
  BOND_SENSITIVITY_STEP: z.coerce
    .number()
    .positive()
    .default(DEFAULT_SENSITIVITY_STEP)
    .describe("Yield step of the price sensitivity sweep"),
  BOND_LOG_LEVEL: z.enum(LOG_LEVELS).default("info").describe("Minimum level written to stderr"),
});

export interface AppConfig {
  ytmTolerance: number;
  ytmMaxIterations: number;
  sensitivityStep: number;
  logLevel: LogLevelSetting;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Blank variables fall back to their defaults
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }

  return {
    ytmTolerance: parsed.data.BOND_YTM_TOLERANCE,
    ytmMaxIterations: parsed.data.BOND_YTM_MAX_ITERATIONS,
    sensitivityStep: parsed.data.BOND_SENSITIVITY_STEP,
    logLevel: parsed.data.BOND_LOG_LEVEL,
  };
}
