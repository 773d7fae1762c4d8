/**
 * Draw Engine
 * Three-phase draw that lives entirely in the persisted DrawReceipt:
 *
 *   startDraw        snapshot stakes, harvest rewards, request randomness
 *   processDrawBatch capture the rest of a large population (optional)
 *   completeDraw     reveal, select winners, compound prizes into deposits
 *
 * Stakes are frozen at startDraw. Accounts not yet captured are captured
 * right before anything mutates them, priced at the accumulator value the
 * draw started with, so batching never changes the odds.
 */

import { StateViolationError, RandomnessPendingError } from "../../lib/errors.js";
import { sanitizeId } from "../../lib/utils/sanitize.js";
import type {
  DrawPhase,
  DrawReceipt,
  DrawSettlement,
  PoolState,
  ReceiverId,
  RewardProcessingResult,
  SelectionResult,
} from "../../types/pool.types.js";
import { add, formatUFix64, sub, ZERO, type UFix64 } from "../../utils/ufix64.js";
import type { RandomnessProvider } from "../connectors/randomnessProvider.js";
import { WinnerSelector } from "./winnerSelector.js";

/**
 * What the engine needs from the pool that owns it
 */
export interface DrawHost {
  readonly state: PoolState;
  readonly randomness: RandomnessProvider;
  assertCanStartDraw(): void;
  assertNotPaused(operation: string): void;
  /** deposit + pending interest + bonus, priced at `interestPerShare` */
  stakeAt(receiver: ReceiverId, interestPerShare: UFix64): UFix64;
  /** Prize pool after harvesting whatever yield is waiting, without side effects */
  projectedPrizePool(): UFix64;
  processRewards(now: number, compound?: boolean): RewardProcessingResult;
  awardPrize(receiver: ReceiverId, amount: UFix64, auxiliaryIds: string[], now: number): void;
  afterPrizesAwarded(): void;
  recordWinner(round: number, receiver: ReceiverId, amount: UFix64, auxiliaryIds: string[]): void;
}

export interface DrawStatus {
  phase: DrawPhase;
  round: number;
  canDrawNow: boolean;
  nextDrawAt: number;
  isReadyToComplete: boolean;
  prizeAmount: UFix64 | null;
  capturedReceivers: number;
  pendingReceivers: number;
  readyAtRound: number | null;
}

export class DrawEngine {
  constructor(private readonly host: DrawHost) {}

  private get state(): PoolState {
    return this.host.state;
  }

  get receipt(): DrawReceipt | null {
    return this.state.drawReceipt;
  }

  isCapturing(): boolean {
    return (this.state.drawReceipt?.pendingReceivers.length ?? 0) > 0;
  }

  startDraw(now: number): DrawReceipt {
    this.host.assertCanStartDraw();
    if (this.state.drawReceipt) {
      throw new StateViolationError(
        `Draw for round ${this.state.drawReceipt.round} is already pending`,
      );
    }
    const nextDrawAt = this.nextDrawAt();
    if (now < nextDrawAt) {
      throw new StateViolationError(
        `Draw interval has not elapsed; next draw at ${nextDrawAt}`,
      );
    }
    if (this.host.projectedPrizePool() === ZERO) {
      throw new StateViolationError("Prize pool is empty");
    }

    // Freeze stakes before this round's rewards are distributed
    const interestPerShare = this.state.accumulator.accumulatedInterestPerShare;
    const receivers = [...this.state.accounts.entries()]
      .filter(([, account]) => account.deposit > ZERO)
      .map(([receiver]) => receiver)
      .sort();

    const receipt: DrawReceipt = {
      round: this.state.currentRound,
      prizeAmount: ZERO,
      timeWeightedStakes: new Map(),
      pendingReceivers: receivers,
      snapshotInterestPerShare: interestPerShare,
      randomnessRequest: this.host.randomness.requestRandomness(),
      startedAt: now,
    };
    this.state.drawReceipt = receipt;
    if (receivers.length <= this.state.config.snapshotBatchSize) {
      this.captureBatch(receivers.length);
    }

    // Split without compounding; uncaptured receivers are priced at the snapshot
    try {
      this.host.processRewards(now, false);
    } catch (error) {
      this.state.drawReceipt = null;
      throw error;
    }

    receipt.prizeAmount = this.state.prizePool;
    if (receipt.prizeAmount === ZERO) {
      this.state.drawReceipt = null;
      throw new StateViolationError("Prize pool is empty");
    }
    this.state.lastDrawTimestamp = now;

    console.log("🎲 Draw started", {
      poolId: sanitizeId(this.state.poolId),
      round: receipt.round,
      prizeAmount: formatUFix64(receipt.prizeAmount),
      receivers: receivers.length,
      commitRound: receipt.randomnessRequest.commitRound,
    });

    return receipt;
  }

  /**
   * Capture up to `limit` pending receivers. Returns how many remain.
   */
  processDrawBatch(limit: number): number {
    this.host.assertNotPaused("processDrawBatch");
    if (!this.state.drawReceipt) {
      throw new StateViolationError("No draw is pending");
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new StateViolationError("Batch limit must be a positive integer");
    }
    return this.captureBatch(limit);
  }

  /**
   * Copy-on-write: capture a receiver's stake before its account changes
   */
  captureBeforeMutation(receiver: ReceiverId): void {
    const receipt = this.state.drawReceipt;
    if (!receipt || receipt.pendingReceivers.length === 0) return;

    const index = receipt.pendingReceivers.indexOf(receiver);
    if (index === -1) return;

    receipt.pendingReceivers.splice(index, 1);
    this.capture(receipt, receiver);
  }

  completeDraw(now: number): DrawSettlement {
    this.host.assertNotPaused("completeDraw");
    const receipt = this.state.drawReceipt;
    if (!receipt) {
      throw new StateViolationError("No draw is pending");
    }
    if (receipt.pendingReceivers.length > 0) {
      throw new StateViolationError(
        `Snapshot capture incomplete: ${receipt.pendingReceivers.length} receivers pending`,
      );
    }

    const fulfillment = this.host.randomness.tryFulfill(receipt.randomnessRequest);
    if (fulfillment.status === "pending") {
      throw new RandomnessPendingError(
        `Randomness for round ${receipt.round} resolves at round ${fulfillment.readyAtRound}`,
      );
    }

    const selector = new WinnerSelector(this.state.config.winnerSelectionStrategy);
    const selection = selector.selectWinners(
      fulfillment.value,
      receipt.timeWeightedStakes,
      receipt.prizeAmount,
    );
    this.applySelection(receipt.round, selection, now);

    const settlement: DrawSettlement = {
      round: receipt.round,
      randomValue: fulfillment.value,
      prizeAmount: receipt.prizeAmount,
      winners: selection.winners,
      amounts: selection.amounts,
      auxiliaryAssignments: selection.auxiliaryAssignments,
      rolledOver: sub(receipt.prizeAmount, selection.totalAwarded),
    };

    this.state.drawReceipt = null;
    this.state.currentRound += 1;

    console.log("🏆 Draw completed", {
      poolId: sanitizeId(this.state.poolId),
      round: settlement.round,
      winners: settlement.winners.length,
      awarded: formatUFix64(selection.totalAwarded),
      rolledOver: formatUFix64(settlement.rolledOver),
      durationSeconds: now - receipt.startedAt,
    });

    return settlement;
  }

  nextDrawAt(): number {
    return this.state.lastDrawTimestamp + this.state.config.drawIntervalSeconds;
  }

  getDrawStatus(now: number): DrawStatus {
    const receipt = this.state.drawReceipt;
    let phase: DrawPhase = "Idle";
    let readyAtRound: number | null = null;

    if (receipt) {
      readyAtRound = receipt.randomnessRequest.commitRound + 1;
      if (receipt.pendingReceivers.length > 0) {
        phase = "CapturingSnapshot";
      } else if (
        this.host.randomness.tryFulfill(receipt.randomnessRequest).status === "pending"
      ) {
        phase = "PendingRandomness";
      } else {
        phase = "ReadyToComplete";
      }
    }

    const blocked =
      this.state.emergency.state === "Paused" ||
      this.state.emergency.state === "EmergencyMode";

    return {
      phase,
      round: this.state.currentRound,
      canDrawNow: !receipt && !blocked && now >= this.nextDrawAt(),
      nextDrawAt: this.nextDrawAt(),
      isReadyToComplete: phase === "ReadyToComplete",
      prizeAmount: receipt ? receipt.prizeAmount : null,
      capturedReceivers: receipt ? receipt.timeWeightedStakes.size : 0,
      pendingReceivers: receipt ? receipt.pendingReceivers.length : 0,
      readyAtRound,
    };
  }

  private captureBatch(limit: number): number {
    const receipt = this.state.drawReceipt;
    if (!receipt) return 0;

    const batch = receipt.pendingReceivers.splice(0, limit);
    for (const receiver of batch) {
      this.capture(receipt, receiver);
    }
    return receipt.pendingReceivers.length;
  }

  private capture(receipt: DrawReceipt, receiver: ReceiverId): void {
    const stake = this.host.stakeAt(receiver, receipt.snapshotInterestPerShare);
    if (stake > ZERO) {
      receipt.timeWeightedStakes.set(receiver, stake);
    }
  }

  private applySelection(round: number, selection: SelectionResult, now: number): void {
    let awarded = ZERO;
    selection.winners.forEach((receiver, i) => {
      const amount = selection.amounts[i];
      const auxiliaryIds = selection.auxiliaryAssignments[i] ?? [];
      this.host.awardPrize(receiver, amount, auxiliaryIds, now);
      this.host.recordWinner(round, receiver, amount, auxiliaryIds);
      awarded = add(awarded, amount);
    });
    if (awarded > ZERO) {
      this.host.afterPrizesAwarded();
    }
  }
}
