// Argument parsing and input collection for bond-cli
// Inputs are read in a fixed order; missing ones are prompted for

import { z } from "zod";
import { UNSET_YIELD_SENTINEL, type BondInput } from "bond-engine";
import { BondTermsSchema } from "./schemas/common.js";
import { coerceNumbers } from "./formatters/response.js";

export interface InputField {
  key: "face_value" | "coupon_rate" | "market_price" | "remaining_years" | "payment_frequency" | "required_yield";
  flag: string;
  prompt: string;
}

export const INPUT_FIELDS: readonly InputField[] = [
  { key: "face_value", flag: "--face", prompt: "Enter Face Value (e.g. 1000): " },
  { key: "coupon_rate", flag: "--coupon", prompt: "Enter Coupon Rate (e.g. 0.05 for 5%): " },
  { key: "market_price", flag: "--price", prompt: "Enter Market Price (e.g. 950): " },
  { key: "remaining_years", flag: "--years", prompt: "Enter Remaining Maturity in Years (e.g. 8): " },
  { key: "payment_frequency", flag: "--frequency", prompt: "Enter Payment Frequency (1 for annual, 2 for semi-annual): " },
  {
    key: "required_yield",
    flag: "--yield",
    prompt: "Enter Required Yield (e.g. 0.06 for 6%, or -1 if you want it to be calculated based on price): ",
  },
];

export interface CliArgs {
  help: boolean;
  json: boolean;
  values: Partial<Record<InputField["key"], string>>;
  unknown: string[];
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false, json: false, values: {}, unknown: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") { args.help = true; continue; }
    if (arg === "--json") { args.json = true; continue; }

    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const field = INPUT_FIELDS.find((f) => f.flag === flag);
    if (!field) { args.unknown.push(arg); continue; }

    if (eq !== -1) { args.values[field.key] = arg.slice(eq + 1); continue; }
    if (i + 1 >= argv.length) { args.unknown.push(arg); continue; }
    args.values[field.key] = argv[++i];
  }

  return args;
}

export const CliInputSchema = BondTermsSchema.extend({
  required_yield: z.number().describe("Required yield as decimal, or -1 to derive it"),
});

export type Ask = (prompt: string) => Promise<string | undefined>;

/** Fill missing values by prompting in field order, then validate */
export async function collectInput(values: CliArgs["values"], ask: Ask): Promise<BondInput> {
  const raw: Record<string, string> = {};
  for (const field of INPUT_FIELDS) {
    const given = values[field.key] ?? (await ask(field.prompt));
    if (given === undefined) throw new Error(`Missing input for ${field.key} (${field.flag})`);
    raw[field.key] = given.trim();
  }

  const parsed = CliInputSchema.safeParse(coerceNumbers(raw));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid input: ${detail}`);
  }

  const input = parsed.data;
  return {
    faceValue: input.face_value,
    couponRate: input.coupon_rate,
    marketPrice: input.market_price,
    remainingYears: input.remaining_years,
    paymentFrequency: input.payment_frequency,
    requiredYield: input.required_yield === UNSET_YIELD_SENTINEL ? null : input.required_yield,
  };
}
