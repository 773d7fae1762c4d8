/**
 * Savings Accumulator
 * Proportional interest through a single interest-per-share ratio.
 *
 * Every account stores the accumulator-scaled value it has already been
 * credited with (its baseline). Pending interest is always
 * `deposit × accumulated / PRECISION − baseline`, so distributing yield is
 * O(1) no matter how many accounts the pool holds.
 */

import { NumericSafetyError, PreconditionError } from "../../lib/errors.js";
import type {
  AccountRecord,
  AccumulatorState,
  ReceiverId,
} from "../../types/pool.types.js";
import {
  add,
  mulDivRaw,
  sub,
  UFIX64_MAX,
  UFIX64_SCALE,
  ZERO,
  type UFix64,
} from "../../utils/ufix64.js";

export const DEFAULT_ACCUMULATOR_PRECISION = 100n;

/**
 * Largest amount a single distribution may carry at the given precision
 */
export function maxDistributable(precision: bigint): UFix64 {
  return UFIX64_MAX / precision;
}

export function createAccumulatorState(
  precision: bigint = DEFAULT_ACCUMULATOR_PRECISION,
): AccumulatorState {
  if (precision < 1n) {
    throw new PreconditionError("Accumulator precision must be at least 1");
  }
  return {
    accumulatedInterestPerShare: ZERO,
    totalDistributed: ZERO,
    precision,
  };
}

export class SavingsAccumulator {
  constructor(
    private readonly state: AccumulatorState,
    private readonly accounts: Map<ReceiverId, AccountRecord>,
  ) {}

  get precision(): bigint {
    return this.state.precision;
  }

  get accumulatedInterestPerShare(): UFix64 {
    return this.state.accumulatedInterestPerShare;
  }

  get totalDistributed(): UFix64 {
    return this.state.totalDistributed;
  }

  maxDistributable(): UFix64 {
    return maxDistributable(this.state.precision);
  }

  /**
   * Whether `amount` can be spread over `totalDeposited` without the
   * interest-per-share ratio or the distributed total leaving the UFix64 range.
   * Without `totalDeposited` only the per-distribution ceiling is checked.
   */
  canDistribute(amount: UFix64, totalDeposited: UFix64 = ZERO): boolean {
    if (amount > this.maxDistributable()) {
      return false;
    }
    if (totalDeposited === ZERO || amount === ZERO) {
      return true;
    }
    const increment = (amount * this.state.precision * UFIX64_SCALE) / totalDeposited;
    return (
      this.state.accumulatedInterestPerShare + increment <= UFIX64_MAX &&
      this.state.totalDistributed + amount <= UFIX64_MAX
    );
  }

  /**
   * Add `amount` of interest spread over `totalDeposited`.
   * Returns the interest-per-share increment; zero when nobody holds a deposit,
   * in which case the caller keeps the amount.
   */
  distribute(amount: UFix64, totalDeposited: UFix64): UFix64 {
    if (amount > this.maxDistributable()) {
      throw new NumericSafetyError(
        "overflow",
        `Distribution of ${amount} raw units exceeds the accumulator ceiling of ${this.maxDistributable()}`,
      );
    }
    if (!this.canDistribute(amount, totalDeposited)) {
      throw new NumericSafetyError(
        "overflow",
        `Distribution of ${amount} raw units over ${totalDeposited} would overflow the interest-per-share ratio`,
      );
    }
    if (totalDeposited === ZERO || amount === ZERO) {
      return ZERO;
    }

    const interestPerShare = mulDivRaw(
      amount * this.state.precision,
      UFIX64_SCALE,
      totalDeposited,
    );
    this.state.accumulatedInterestPerShare = add(
      this.state.accumulatedInterestPerShare,
      interestPerShare,
    );
    this.state.totalDistributed = add(this.state.totalDistributed, amount);
    return interestPerShare;
  }

  /**
   * Start a fresh account (or one whose deposit returned to zero) at the
   * current ratio so it cannot claim interest distributed before it joined
   */
  initializeAccount(receiver: ReceiverId, deposit: UFix64): void {
    this.requireAccount(receiver).claimedBaseline = this.scaled(deposit);
  }

  pendingInterest(receiver: ReceiverId, deposit?: UFix64): UFix64 {
    const account = this.accounts.get(receiver);
    if (!account) {
      return ZERO;
    }
    return this.pendingFrom(this.scaled(deposit ?? account.deposit), account.claimedBaseline);
  }

  /**
   * Pending interest as it stood when the accumulator was at `interestPerShare`.
   * Only meaningful for accounts untouched since then.
   */
  pendingInterestAt(receiver: ReceiverId, interestPerShare: UFix64): UFix64 {
    const account = this.accounts.get(receiver);
    if (!account) {
      return ZERO;
    }
    return this.pendingFrom(
      this.scaled(account.deposit, interestPerShare),
      account.claimedBaseline,
    );
  }

  /**
   * Return the pending interest and move the baseline past it
   */
  claim(receiver: ReceiverId, deposit?: UFix64): UFix64 {
    const account = this.requireAccount(receiver);
    const earned = this.scaled(deposit ?? account.deposit);
    const pending = this.pendingFrom(earned, account.claimedBaseline);
    account.claimedBaseline = earned;
    return pending;
  }

  updateBaseline(receiver: ReceiverId, newDeposit: UFix64): void {
    this.requireAccount(receiver).claimedBaseline = this.scaled(newDeposit);
  }

  removeAccount(receiver: ReceiverId): void {
    const account = this.accounts.get(receiver);
    if (account) {
      account.claimedBaseline = ZERO;
    }
  }

  snapshot(): AccumulatorState {
    return { ...this.state };
  }

  /**
   * Accumulator-scaled value of a deposit. Baselines are plain integers and
   * may exceed the UFix64 range; only their differences are amounts.
   */
  private scaled(
    deposit: UFix64,
    interestPerShare: UFix64 = this.state.accumulatedInterestPerShare,
  ): bigint {
    return (deposit * interestPerShare) / (UFIX64_SCALE * this.state.precision);
  }

  private pendingFrom(earned: bigint, baseline: bigint): UFix64 {
    return earned > baseline ? sub(earned, baseline) : ZERO;
  }

  private requireAccount(receiver: ReceiverId): AccountRecord {
    const account = this.accounts.get(receiver);
    if (!account) {
      throw new PreconditionError(`Unknown account: ${receiver}`);
    }
    return account;
  }
}
