/**
 * UFix64 fixed-point arithmetic
 * Unsigned values with 8 decimal places stored as raw bigint units.
 * The raw value must fit in 64 bits, so the largest value is 184467440737.09551615.
 * Every operation truncates toward zero.
 */

import { NumericSafetyError, PreconditionError } from "../lib/errors.js";

/** Raw UFix64 units: 1.0 === 100_000_000n */
export type UFix64 = bigint;

export const UFIX64_DECIMALS = 8;
export const UFIX64_SCALE = 100_000_000n;
export const UFIX64_MAX: UFix64 = 2n ** 64n - 1n;
export const ZERO: UFix64 = 0n;
export const ONE: UFix64 = UFIX64_SCALE;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,8}))?$/;

function checked(raw: bigint, operation: string): UFix64 {
  if (raw < 0n) {
    throw new NumericSafetyError("underflow", `UFix64 underflow in ${operation}`);
  }
  if (raw > UFIX64_MAX) {
    throw new NumericSafetyError("overflow", `UFix64 overflow in ${operation}`);
  }
  return raw;
}

/**
 * Parse a decimal string such as "100.0" or "0.00000001"
 */
export function parseUFix64(input: string): UFix64 {
  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) {
    throw new PreconditionError(`Invalid UFix64 amount: "${input}"`);
  }
  const whole = BigInt(match[1]);
  const fraction = BigInt((match[2] ?? "").padEnd(UFIX64_DECIMALS, "0"));
  return checked(whole * UFIX64_SCALE + fraction, "parse");
}

/**
 * Whole units to UFix64, e.g. units(5) === parseUFix64("5.0")
 */
export function units(whole: number | bigint): UFix64 {
  if (typeof whole === "number" && !Number.isSafeInteger(whole)) {
    throw new PreconditionError(`Expected a whole number of units, got ${whole}`);
  }
  return checked(BigInt(whole) * UFIX64_SCALE, "units");
}

/**
 * Format as a decimal string with at least one fractional digit ("1.5", "100.0")
 */
export function formatUFix64(raw: UFix64): string {
  const whole = raw / UFIX64_SCALE;
  const fraction = (raw % UFIX64_SCALE)
    .toString()
    .padStart(UFIX64_DECIMALS, "0")
    .replace(/0+$/, "");
  return `${whole}.${fraction || "0"}`;
}

export function isValidUFix64String(input: string): boolean {
  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) return false;
  const raw =
    BigInt(match[1]) * UFIX64_SCALE +
    BigInt((match[2] ?? "").padEnd(UFIX64_DECIMALS, "0"));
  return raw <= UFIX64_MAX;
}

export function add(a: UFix64, b: UFix64): UFix64 {
  return checked(a + b, "add");
}

export function sub(a: UFix64, b: UFix64): UFix64 {
  return checked(a - b, "sub");
}

export function saturatingSub(a: UFix64, b: UFix64): UFix64 {
  return a > b ? a - b : ZERO;
}

/** a × b */
export function mul(a: UFix64, b: UFix64): UFix64 {
  return checked((a * b) / UFIX64_SCALE, "mul");
}

/** a ÷ b */
export function div(a: UFix64, b: UFix64): UFix64 {
  if (b === ZERO) {
    throw new NumericSafetyError("division_by_zero", "UFix64 division by zero");
  }
  return checked((a * UFIX64_SCALE) / b, "div");
}

/**
 * (a × b) ÷ divisor on raw units, computed at full width.
 * Only the result has to fit in 64 bits.
 */
export function mulDivRaw(a: bigint, b: bigint, divisor: bigint): UFix64 {
  if (divisor === 0n) {
    throw new NumericSafetyError("division_by_zero", "UFix64 division by zero");
  }
  return checked((a * b) / divisor, "mulDiv");
}

export function min(a: UFix64, b: UFix64): UFix64 {
  return a < b ? a : b;
}

export function max(a: UFix64, b: UFix64): UFix64 {
  return a > b ? a : b;
}

export function sum(values: Iterable<UFix64>): UFix64 {
  let total = ZERO;
  for (const value of values) {
    total = add(total, value);
  }
  return total;
}

/**
 * Lossy conversion for metrics and ratios; never feed the result back into accounting
 */
export function toNumber(raw: UFix64): number {
  return Number(raw) / Number(UFIX64_SCALE);
}
