import type { Response } from "express";
import { httpStatusForError, PoolError } from "../lib/errors.js";
import { captureError } from "../lib/sentry.js";
import { sanitizeForLog } from "../lib/utils/sanitize.js";
import type { PoolConfig } from "../types/pool.types.js";
import { formatUFix64 } from "../utils/ufix64.js";

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

/**
 * Convert a domain value for res.json: UFix64 amounts become decimal
 * strings, maps become objects
 */
export function toJson(value: unknown): Json {
  if (typeof value === "bigint") return formatUFix64(value);
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Map) {
    return Object.fromEntries([...value].map(([key, entry]) => [String(key), toJson(entry)]));
  }
  if (value instanceof Set || Array.isArray(value)) {
    return [...value].map(toJson);
  }
  if (typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJson(entry)]));
  }
  return null;
}

/**
 * Pool config with the accumulator precision as a plain integer string
 */
export function presentConfig(config: PoolConfig): Json {
  return toJson({ ...config, accumulatorPrecision: config.accumulatorPrecision.toString() });
}

/**
 * Reply to a failed request. Pool errors map to their 4xx status; anything
 * else is a 500 reported to Sentry.
 */
export function sendError(res: Response, error: unknown, operation: string): void {
  if (error instanceof PoolError) {
    res.status(httpStatusForError(error)).json({
      success: false,
      error: error.kind,
      message: error.message,
    });
    return;
  }

  console.error(`❌ ${operation} error:`, sanitizeForLog(error instanceof Error ? error.message : error));
  captureError(error, { tags: { operation } });
  res.status(500).json({
    success: false,
    error: "Internal server error",
  });
}
