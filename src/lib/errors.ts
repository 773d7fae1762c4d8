/**
 * Pool error taxonomy
 * Every failure aborts the whole operation; the kind decides how callers react
 */

export type PoolErrorKind =
  | "precondition"
  | "state"
  | "policy"
  | "numeric"
  | "randomness_pending"
  | "permission";

export class PoolError extends Error {
  readonly kind: PoolErrorKind;

  constructor(kind: PoolErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Asset mismatch, below-minimum deposit, insufficient balance, unknown account */
export class PreconditionError extends PoolError {
  constructor(message: string) {
    super("precondition", message);
  }
}

/** Draw already pending, no draw pending, interval not elapsed, pool paused */
export class StateViolationError extends PoolError {
  constructor(message: string) {
    super("state", message);
  }
}

/** Funding cap exceeded, split deviation, partial-mode deposit cap */
export class PolicyViolationError extends PoolError {
  constructor(message: string) {
    super("policy", message);
  }
}

export type NumericFault = "overflow" | "underflow" | "division_by_zero";

export class NumericSafetyError extends PoolError {
  readonly fault: NumericFault;

  constructor(fault: NumericFault, message: string) {
    super("numeric", message);
    this.fault = fault;
  }
}

export class RandomnessPendingError extends PoolError {
  constructor(message = "Randomness request has not reached finality") {
    super("randomness_pending", message);
  }
}

export class PermissionError extends PoolError {
  constructor(message: string) {
    super("permission", message);
  }
}

/**
 * HTTP status for a pool error kind
 */
export function httpStatusForError(error: PoolError): number {
  switch (error.kind) {
    case "precondition":
      return 400;
    case "permission":
      return 403;
    case "state":
    case "randomness_pending":
      return 409;
    case "policy":
    case "numeric":
      return 422;
  }
}
