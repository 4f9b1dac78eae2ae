import { ZodError } from "zod";
import { isBondEngineError } from "bond-engine";

/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * The MCP SDK sometimes passes numeric arguments as strings.
 */
export function coerceNumbers(obj: unknown): unknown {
  if (typeof obj === "string") {
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(coerceNumbers);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v);
    }
    return result;
  }
  return obj;
}

export function errorCode(err: Error): string {
  if (isBondEngineError(err)) return err.code;
  if (err instanceof ZodError) return "INVALID_INPUT";
  return "INTERNAL";
}

export function wrapResponse(result: unknown) {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify({ error: result.message, code: errorCode(result) }) }],
      isError: true,
    };
  }
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
}
