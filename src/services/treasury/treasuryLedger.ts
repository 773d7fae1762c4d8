/**
 * Treasury Ledger
 * Protocol fees and rounding dust, with an append-only withdrawal history
 */

import { PreconditionError } from "../../lib/errors.js";
import type {
  TreasuryState,
  TreasuryWithdrawal,
} from "../../types/pool.types.js";
import { add, formatUFix64, sub, ZERO, type UFix64 } from "../../utils/ufix64.js";

export type TreasuryCreditKind = "fee" | "dust" | "direct";

export function createTreasuryState(): TreasuryState {
  return {
    balance: ZERO,
    totalCollected: ZERO,
    totalDust: ZERO,
    totalWithdrawn: ZERO,
    history: [],
  };
}

export class TreasuryLedger {
  constructor(private readonly state: TreasuryState) {}

  get balance(): UFix64 {
    return this.state.balance;
  }

  credit(amount: UFix64, kind: TreasuryCreditKind): void {
    if (amount === ZERO) return;

    this.state.balance = add(this.state.balance, amount);
    this.state.totalCollected = add(this.state.totalCollected, amount);
    if (kind === "dust") {
      this.state.totalDust = add(this.state.totalDust, amount);
    }
  }

  withdraw(
    amount: UFix64,
    purpose: string,
    actor: string,
    timestamp: number,
  ): TreasuryWithdrawal {
    if (purpose.trim().length === 0) {
      throw new PreconditionError("Treasury withdrawal requires a purpose");
    }
    if (amount === ZERO) {
      throw new PreconditionError("Treasury withdrawal amount must be positive");
    }
    if (amount > this.state.balance) {
      throw new PreconditionError(
        `Treasury balance ${formatUFix64(this.state.balance)} cannot cover ${formatUFix64(amount)}`,
      );
    }

    this.state.balance = sub(this.state.balance, amount);
    this.state.totalWithdrawn = add(this.state.totalWithdrawn, amount);

    const entry: TreasuryWithdrawal = Object.freeze({
      amount,
      purpose: purpose.trim(),
      actor,
      timestamp,
    });
    this.state.history.push(entry);
    return entry;
  }

  getHistory(): readonly TreasuryWithdrawal[] {
    return Object.freeze([...this.state.history]);
  }

  getStats(): Omit<TreasuryState, "history"> & { withdrawalCount: number } {
    return {
      balance: this.state.balance,
      totalCollected: this.state.totalCollected,
      totalDust: this.state.totalDust,
      totalWithdrawn: this.state.totalWithdrawn,
      withdrawalCount: this.state.history.length,
    };
  }
}
