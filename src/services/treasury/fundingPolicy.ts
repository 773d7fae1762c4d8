/**
 * Funding Policy
 * Caps on direct (non-yield) funding per destination
 */

import { PolicyViolationError, PreconditionError } from "../../lib/errors.js";
import type {
  FundingDestination,
  FundingPolicyState,
} from "../../types/pool.types.js";
import { add, formatUFix64, ZERO, type UFix64 } from "../../utils/ufix64.js";

export function createFundingPolicyState(
  caps: Partial<Record<FundingDestination, UFix64 | null>> = {},
): FundingPolicyState {
  return {
    caps: {
      savings: caps.savings ?? null,
      lottery: caps.lottery ?? null,
      treasury: caps.treasury ?? null,
    },
    totals: { savings: ZERO, lottery: ZERO, treasury: ZERO },
  };
}

export class FundingPolicy {
  constructor(private readonly state: FundingPolicyState) {}

  /**
   * Throws when funding `amount` into `destination` would pass its cap
   */
  assertWithinCap(destination: FundingDestination, amount: UFix64): void {
    if (amount === ZERO) {
      throw new PreconditionError("Funding amount must be positive");
    }
    const cap = this.state.caps[destination];
    const projected = add(this.state.totals[destination], amount);
    if (cap !== null && projected > cap) {
      throw new PolicyViolationError(
        `Direct funding to ${destination} would reach ${formatUFix64(projected)}, above its cap of ${formatUFix64(cap)}`,
      );
    }
  }

  recordDirectFunding(destination: FundingDestination, amount: UFix64): UFix64 {
    this.assertWithinCap(destination, amount);
    this.state.totals[destination] = add(this.state.totals[destination], amount);
    return this.state.totals[destination];
  }

  /**
   * Caps may be lowered below the running total; that only blocks further funding
   */
  setCap(destination: FundingDestination, cap: UFix64 | null): void {
    this.state.caps[destination] = cap;
  }

  getTotals(): Record<FundingDestination, UFix64> {
    return { ...this.state.totals };
  }

  getCaps(): Record<FundingDestination, UFix64 | null> {
    return { ...this.state.caps };
  }
}
