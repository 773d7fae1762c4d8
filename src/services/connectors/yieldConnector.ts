/**
 * Yield Connector
 * The pool stakes depositor funds through a connector and harvests whatever
 * the connector holds beyond the staked principal
 */

import { add, min, sub, ZERO, type UFix64 } from "../../utils/ufix64.js";

export interface YieldConnector {
  /** Asset the connector reports its balance in */
  readonly assetId: string;
  /** Stake up to `amount`; returns what the connector accepted */
  depositCapacity(amount: UFix64): UFix64;
  /** Withdraw up to `maxAmount`; returns what was actually released */
  withdrawAvailable(maxAmount: UFix64): UFix64;
  /** Balance that can be withdrawn right now */
  minimumAvailable(): UFix64;
}

export interface InMemoryYieldConnectorOptions {
  assetId: string;
  /** Maximum total balance the connector will hold; null for unlimited */
  capacity?: UFix64 | null;
  /** Maximum amount withdrawable at once; null for unlimited */
  liquidityLimit?: UFix64 | null;
  /** Balance already held, when a connector is rebuilt for a persisted pool */
  initialBalance?: UFix64;
}

/**
 * In-process connector for tests and local runs. `accrueYield` simulates
 * the protocol paying out; `setLiquidityLimit` simulates a withdrawal freeze.
 */
export class InMemoryYieldConnector implements YieldConnector {
  readonly assetId: string;
  private balance: UFix64;
  private capacity: UFix64 | null;
  private liquidityLimit: UFix64 | null;

  constructor(options: InMemoryYieldConnectorOptions) {
    this.assetId = options.assetId;
    this.balance = options.initialBalance ?? ZERO;
    this.capacity = options.capacity ?? null;
    this.liquidityLimit = options.liquidityLimit ?? null;
  }

  depositCapacity(amount: UFix64): UFix64 {
    const room =
      this.capacity === null
        ? amount
        : this.capacity > this.balance
          ? sub(this.capacity, this.balance)
          : ZERO;
    const accepted = min(amount, room);
    this.balance = add(this.balance, accepted);
    return accepted;
  }

  withdrawAvailable(maxAmount: UFix64): UFix64 {
    const released = min(maxAmount, this.minimumAvailable());
    this.balance = sub(this.balance, released);
    return released;
  }

  minimumAvailable(): UFix64 {
    return this.liquidityLimit === null
      ? this.balance
      : min(this.balance, this.liquidityLimit);
  }

  accrueYield(amount: UFix64): void {
    this.balance = add(this.balance, amount);
  }

  /** Lose funds, as a failing protocol would */
  slash(amount: UFix64): void {
    this.balance = sub(this.balance, min(amount, this.balance));
  }

  setCapacity(capacity: UFix64 | null): void {
    this.capacity = capacity;
  }

  setLiquidityLimit(limit: UFix64 | null): void {
    this.liquidityLimit = limit;
  }

  getBalance(): UFix64 {
    return this.balance;
  }
}
