/**
 * Winner Tracker
 * Optional sink that keeps a history of draw winners across pools
 */

import type { ReceiverId } from "../types/pool.types.js";
import type { UFix64 } from "../utils/ufix64.js";

export interface WinnerRecord {
  poolId: string;
  round: number;
  receiver: ReceiverId;
  amount: UFix64;
  auxiliaryIds: string[];
  recordedAt: string;
}

export interface WinnerTracker {
  recordWinner(
    poolId: string,
    round: number,
    receiver: ReceiverId,
    amount: UFix64,
    auxiliaryIds: string[],
  ): void;
}

export class InMemoryWinnerTracker implements WinnerTracker {
  private records: WinnerRecord[] = [];
  private maxRecords: number;

  constructor(maxRecords = 10_000) {
    this.maxRecords = maxRecords;
  }

  recordWinner(
    poolId: string,
    round: number,
    receiver: ReceiverId,
    amount: UFix64,
    auxiliaryIds: string[],
  ): void {
    this.records.push({
      poolId,
      round,
      receiver,
      amount,
      auxiliaryIds: [...auxiliaryIds],
      recordedAt: new Date().toISOString(),
    });

    if (this.records.length > this.maxRecords) {
      this.records.shift();
    }
  }

  /**
   * Most recent winners first
   */
  getWinners(filter?: {
    poolId?: string;
    receiver?: ReceiverId;
    limit?: number;
  }): WinnerRecord[] {
    let history = [...this.records];

    if (filter?.poolId) {
      history = history.filter((r) => r.poolId === filter.poolId);
    }
    if (filter?.receiver) {
      history = history.filter((r) => r.receiver === filter.receiver);
    }
    history.reverse();
    if (filter?.limit) {
      history = history.slice(0, filter.limit);
    }

    return history;
  }
}
