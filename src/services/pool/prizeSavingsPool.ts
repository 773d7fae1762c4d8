/**
 * Prize Savings Pool
 * Aggregate root tying accounts, the savings accumulator, the draw engine,
 * the emergency controller, funding policy and treasury together.
 *
 * A pool instance wraps one loaded PoolState for the duration of a single
 * operation. Every operation validates first and only then touches the
 * yield connector, so a thrown error never leaves funds half-moved.
 *
 * Bookkeeping identities:
 *   totalDeposited == totalStaked + liquidBuffer
 *   totalDeposited == Σ account.deposit
 */

import { requirePermission } from "../../lib/auth/permissions.js";
import {
  NumericSafetyError,
  PreconditionError,
  StateViolationError,
} from "../../lib/errors.js";
import { sanitizeId } from "../../lib/utils/sanitize.js";
import {
  AdminPermission,
  type AccountRecord,
  type AdminActor,
  type DistributionStrategy,
  type DrawReceipt,
  type DrawSettlement,
  type EmergencyConfig,
  type FundingDestination,
  type PoolConfig,
  type PoolState,
  type ReceiverId,
  type RewardProcessingResult,
  type TreasuryWithdrawal,
  type WinnerSelectionStrategy,
  type WithdrawalResult,
  type YieldDistribution,
} from "../../types/pool.types.js";
import {
  calculateYieldDistribution,
  validateDistributionStrategy,
  validateSelectionStrategy,
} from "../../utils/distributionCalculations.js";
import {
  add,
  div,
  formatUFix64,
  min,
  mulDivRaw,
  ONE,
  saturatingSub,
  sub,
  sum,
  ZERO,
  type UFix64,
} from "../../utils/ufix64.js";
import {
  conversionRate,
  nativeUnitsFor,
  valueInPoolAsset,
  type PriceOracle,
} from "../connectors/priceOracle.js";
import type { RandomnessProvider } from "../connectors/randomnessProvider.js";
import type { YieldConnector } from "../connectors/yieldConnector.js";
import { DrawEngine, type DrawHost, type DrawStatus } from "../draw/drawEngine.js";
import {
  EmergencyController,
  isBalanceHealthy,
  type EmergencyTransition,
} from "../emergency/emergencyController.js";
import { EventTypes, type PoolEventType } from "../eventBus.js";
import { SavingsAccumulator } from "../savings/savingsAccumulator.js";
import { FundingPolicy } from "../treasury/fundingPolicy.js";
import { TreasuryLedger } from "../treasury/treasuryLedger.js";
import type { WinnerTracker } from "../winnerTracker.js";

export interface PoolCollaborators {
  connector: YieldConnector;
  randomness: RandomnessProvider;
  oracle?: PriceOracle | null;
  tracker?: WinnerTracker | null;
}

export interface PoolEvent {
  type: PoolEventType;
  data: Record<string, unknown>;
}

export interface DepositResult {
  receiver: ReceiverId;
  amount: UFix64;
  interestCompounded: UFix64;
  newDeposit: UFix64;
  sharesMinted: UFix64;
}

export interface DepositPreview {
  allowed: boolean;
  reason: string | null;
  amount: UFix64;
  resultingDeposit: UFix64;
  sharesMinted: UFix64;
  sharePrice: UFix64;
}

export interface AccountView {
  receiver: ReceiverId;
  deposit: UFix64;
  pendingInterest: UFix64;
  totalBalance: UFix64;
  bonusWeight: UFix64;
  totalEarnedSavings: UFix64;
  totalEarnedPrizes: UFix64;
  pendingAuxiliaryPrizes: string[];
  createdAt: number;
  lastActivityAt: number;
}

export interface PoolStats {
  poolId: string;
  assetId: string;
  totalDeposited: UFix64;
  totalStaked: UFix64;
  liquidBuffer: UFix64;
  pendingSavings: UFix64;
  prizePool: UFix64;
  treasuryBalance: UFix64;
  activeAccounts: number;
  currentRound: number;
  lastDrawTimestamp: number;
  emergencyState: PoolState["emergency"]["state"];
  accumulatedInterestPerShare: UFix64;
  totalDistributed: UFix64;
  sharePrice: UFix64;
}

export interface SharePrice {
  effectiveAssets: UFix64;
  effectiveShares: UFix64;
  sharePrice: UFix64;
}

export interface EmergencyInfo {
  state: PoolState["emergency"]["state"];
  reason: string | null;
  activatedAt: number | null;
  triggeredBy: "auto" | "manual" | null;
  health: number;
  balanceHealthy: boolean;
  consecutiveWithdrawFailures: number;
  config: EmergencyConfig;
}

export interface ConservationReport {
  totalDeposited: UFix64;
  sumOfDeposits: UFix64;
  totalStaked: UFix64;
  liquidBuffer: UFix64;
  pendingSavings: UFix64;
  prizePool: UFix64;
  treasuryBalance: UFix64;
  connectorValue: UFix64;
  depositsBalanced: boolean;
  custodyBalanced: boolean;
}

/** Funds taken out of the connector, in its native units and in pool-asset value */
interface ReleasedFunds {
  native: UFix64;
  value: UFix64;
}

export type PoolConfigPatch = Partial<
  Pick<PoolConfig, "minimumDeposit" | "drawIntervalSeconds" | "snapshotBatchSize">
>;

export class PrizeSavingsPool implements DrawHost {
  readonly randomness: RandomnessProvider;
  private readonly connector: YieldConnector;
  private readonly oracle: PriceOracle | null;
  private readonly tracker: WinnerTracker | null;
  private readonly accumulator: SavingsAccumulator;
  private readonly emergency: EmergencyController;
  private readonly funding: FundingPolicy;
  private readonly treasury: TreasuryLedger;
  private readonly draws: DrawEngine;
  private events: PoolEvent[] = [];

  constructor(
    readonly state: PoolState,
    collaborators: PoolCollaborators,
  ) {
    this.connector = collaborators.connector;
    this.randomness = collaborators.randomness;
    this.oracle = collaborators.oracle ?? null;
    this.tracker = collaborators.tracker ?? null;
    this.accumulator = new SavingsAccumulator(state.accumulator, state.accounts);
    this.emergency = new EmergencyController(state.emergency, state.emergencyConfig);
    this.funding = new FundingPolicy(state.fundingPolicy);
    this.treasury = new TreasuryLedger(state.treasury);
    this.draws = new DrawEngine(this);
  }

  get poolId(): string {
    return this.state.poolId;
  }

  /**
   * Events raised since the last drain, for publishing once the operation commits
   */
  drainEvents(): PoolEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  // ==================== Deposits & withdrawals ====================

  deposit(
    receiver: ReceiverId,
    amount: UFix64,
    assetId: string,
    now: number,
  ): DepositResult {
    this.emergency.assertCanDeposit(amount);
    if (assetId !== this.state.config.assetId) {
      throw new PreconditionError(
        `Asset mismatch: pool accepts ${this.state.config.assetId}, got ${assetId}`,
      );
    }
    if (amount === ZERO || amount < this.state.config.minimumDeposit) {
      throw new PreconditionError(
        `Deposit of ${formatUFix64(amount)} is below the minimum of ${formatUFix64(this.state.config.minimumDeposit)}`,
      );
    }

    this.processRewards(now);
    this.draws.captureBeforeMutation(receiver);

    let account = this.state.accounts.get(receiver);
    let interestCompounded = ZERO;
    if (account && account.deposit > ZERO) {
      interestCompounded = this.compoundAccount(receiver, account);
      account.deposit = add(account.deposit, amount);
      this.accumulator.updateBaseline(receiver, account.deposit);
    } else {
      account ??= this.createAccount(receiver, now);
      account.deposit = amount;
      this.accumulator.initializeAccount(receiver, amount);
    }
    account.lastActivityAt = now;

    const sharesMinted = this.sharesFor(amount);
    this.state.totalShares = add(this.state.totalShares, sharesMinted);
    this.state.totalDeposited = add(this.state.totalDeposited, amount);
    this.state.liquidBuffer = add(this.state.liquidBuffer, amount);
    this.restake();

    this.raise(EventTypes.DEPOSIT_COMPLETED, {
      receiver,
      amount: formatUFix64(amount),
      newDeposit: formatUFix64(account.deposit),
    });
    console.log("💰 Deposit completed", {
      poolId: sanitizeId(this.poolId),
      receiver: sanitizeId(receiver),
      amount: formatUFix64(amount),
    });

    return {
      receiver,
      amount,
      interestCompounded,
      newDeposit: account.deposit,
      sharesMinted,
    };
  }

  withdraw(receiver: ReceiverId, amount: UFix64, now: number): WithdrawalResult {
    this.emergency.assertNotPaused("withdraw");
    if (amount === ZERO) {
      throw new PreconditionError("Withdrawal amount must be positive");
    }
    const account = this.requireAccount(receiver);
    const claimable = min(
      this.accumulator.pendingInterest(receiver),
      this.state.pendingSavings,
    );
    if (amount > add(account.deposit, claimable)) {
      throw new PreconditionError(
        `Insufficient balance: ${formatUFix64(add(account.deposit, claimable))} available`,
      );
    }

    this.evaluateEmergency(now);

    // Nothing has moved yet, so a withdrawal that cannot be covered only
    // records the failure
    const available = add(
      min(this.connectorValue(), this.state.totalStaked),
      add(this.state.liquidBuffer, claimable),
    );
    if (amount > available) {
      return this.failWithdrawal(receiver, amount, available, now);
    }

    if (this.emergency.shouldHarvest()) {
      this.processRewards(now);
    }
    this.draws.captureBeforeMutation(receiver);
    this.compoundAccount(receiver, account);
    if (amount > account.deposit) {
      throw new PreconditionError("Insufficient balance after compounding");
    }

    const released = this.releaseValue(min(amount, this.state.totalStaked), true);
    const fromConnector = released.value;
    const shortfall = sub(amount, fromConnector);
    if (shortfall > this.state.liquidBuffer) {
      this.returnToConnector(released);
      return this.failWithdrawal(
        receiver,
        amount,
        add(fromConnector, this.state.liquidBuffer),
        now,
      );
    }

    const sharesBurned =
      amount === this.state.totalDeposited
        ? this.state.totalShares
        : min(
            mulDivRaw(amount, this.state.totalShares, this.state.totalDeposited),
            this.state.totalShares,
          );
    this.state.totalShares = sub(this.state.totalShares, sharesBurned);

    account.deposit = sub(account.deposit, amount);
    account.lastActivityAt = now;
    if (account.deposit === ZERO) {
      this.accumulator.removeAccount(receiver);
    } else {
      this.accumulator.updateBaseline(receiver, account.deposit);
    }
    this.state.totalDeposited = sub(this.state.totalDeposited, amount);
    this.state.totalStaked = sub(this.state.totalStaked, fromConnector);
    this.state.liquidBuffer = sub(this.state.liquidBuffer, shortfall);
    this.emergency.recordWithdrawSuccess();

    this.raise(EventTypes.WITHDRAWAL_COMPLETED, {
      receiver,
      amount: formatUFix64(amount),
      fromConnector: formatUFix64(fromConnector),
      fromBuffer: formatUFix64(shortfall),
    });
    console.log("🏧 Withdrawal completed", {
      poolId: sanitizeId(this.poolId),
      receiver: sanitizeId(receiver),
      amount: formatUFix64(amount),
    });

    this.evaluateEmergency(now);
    return { status: "completed", amount, fromConnector, fromBuffer: shortfall };
  }

  // ==================== Rewards ====================

  /**
   * Harvest yield above the staked principal and split it between savings,
   * the prize pool and the treasury. With `compound` off the savings stay
   * pending in the accumulator until each account is next touched.
   */
  processRewards(now: number, compound = true): RewardProcessingResult {
    this.emergency.assertNotPaused("processRewards");

    const projected = this.projectedRewards();
    this.assertDistributable(projected.distribution.savings);

    const harvested =
      projected.surplus > ZERO ? this.releaseValue(projected.surplus, false).value : ZERO;
    const distribution = calculateYieldDistribution(
      harvested,
      this.state.config.distributionStrategy,
    );

    let dust = this.distributeSavings(distribution.savings);
    this.state.prizePool = add(this.state.prizePool, distribution.lottery);
    this.treasury.credit(distribution.treasury, "fee");

    let compounded = ZERO;
    const compoundingSkipped = !compound || !this.emergency.shouldCompound();
    if (!compoundingSkipped) {
      const swept = this.compoundAll();
      compounded = swept.compounded;
      dust = add(dust, swept.dust);
    }
    this.restake();

    if (harvested > ZERO) {
      this.raise(EventTypes.REWARDS_PROCESSED, {
        harvested: formatUFix64(harvested),
        savings: formatUFix64(distribution.savings),
        lottery: formatUFix64(distribution.lottery),
        treasury: formatUFix64(distribution.treasury),
        dust: formatUFix64(dust),
        compoundingSkipped,
        processedAt: now,
      });
      console.log("🌱 Rewards processed", {
        poolId: sanitizeId(this.poolId),
        harvested: formatUFix64(harvested),
        compoundingSkipped,
      });
    }

    return { harvested, distribution, compounded, dust, compoundingSkipped };
  }

  // ==================== Draws ====================

  startDraw(now: number): DrawReceipt {
    this.evaluateEmergency(now);
    const receipt = this.draws.startDraw(now);
    this.raise(EventTypes.DRAW_STARTED, {
      round: receipt.round,
      prizeAmount: formatUFix64(receipt.prizeAmount),
      capturedReceivers: receipt.timeWeightedStakes.size,
      pendingReceivers: receipt.pendingReceivers.length,
      commitRound: receipt.randomnessRequest.commitRound,
    });
    this.evaluateEmergency(now);
    return receipt;
  }

  processDrawBatch(limit: number): number {
    const remaining = this.draws.processDrawBatch(limit);
    this.raise(EventTypes.DRAW_BATCH_CAPTURED, { remaining });
    return remaining;
  }

  completeDraw(now: number): DrawSettlement {
    this.evaluateEmergency(now);
    const settlement = this.draws.completeDraw(now);
    this.raise(EventTypes.DRAW_COMPLETED, {
      round: settlement.round,
      prizeAmount: formatUFix64(settlement.prizeAmount),
      winners: settlement.winners,
      amounts: settlement.amounts.map(formatUFix64),
      auxiliaryAssignments: settlement.auxiliaryAssignments,
      rolledOver: formatUFix64(settlement.rolledOver),
    });
    this.evaluateEmergency(now);
    return settlement;
  }

  getDrawStatus(now: number): DrawStatus {
    return this.draws.getDrawStatus(now);
  }

  // ==================== Emergency ====================

  health(): number {
    return this.emergency.health(this.connectorValue(), this.state.totalStaked);
  }

  /**
   * Apply automatic emergency trigger or recovery
   */
  evaluateEmergency(now: number): EmergencyTransition | null {
    const transition = this.emergency.assess(
      this.connectorValue(),
      this.state.totalStaked,
      now,
    );
    if (transition) {
      this.onEmergencyTransition(transition);
    }
    return transition;
  }

  enableEmergencyMode(actor: AdminActor, reason: string, now: number): EmergencyTransition {
    requirePermission(actor, AdminPermission.EmergencyOperator);
    return this.onEmergencyTransition(
      this.emergency.enableEmergencyMode(this.requireReason(reason), now),
      actor,
    );
  }

  disableEmergencyMode(actor: AdminActor, now: number): EmergencyTransition {
    requirePermission(actor, AdminPermission.EmergencyOperator);
    return this.onEmergencyTransition(this.emergency.disableEmergencyMode(now), actor);
  }

  pause(actor: AdminActor, reason: string, now: number): EmergencyTransition {
    requirePermission(actor, AdminPermission.EmergencyOperator);
    return this.onEmergencyTransition(
      this.emergency.pause(this.requireReason(reason), now),
      actor,
    );
  }

  enablePartialMode(actor: AdminActor, reason: string, now: number): EmergencyTransition {
    requirePermission(actor, AdminPermission.EmergencyOperator);
    return this.onEmergencyTransition(
      this.emergency.enablePartialMode(this.requireReason(reason), now),
      actor,
    );
  }

  updateEmergencyConfig(actor: AdminActor, patch: Partial<EmergencyConfig>): EmergencyConfig {
    requirePermission(actor, AdminPermission.EmergencyOperator);
    const next: EmergencyConfig = { ...this.state.emergencyConfig, ...patch };
    validateEmergencyConfig(next);
    this.state.emergencyConfig = next;
    this.emergency.setConfig(next);
    this.raise(EventTypes.POOL_CONFIG_UPDATED, { section: "emergency", actor: actor.id });
    return { ...next };
  }

  getEmergencyInfo(): EmergencyInfo {
    const status = this.emergency.getStatus();
    const config = this.emergency.getConfig();
    return {
      state: status.state,
      reason: status.reason,
      activatedAt: status.activatedAt,
      triggeredBy: status.triggeredBy,
      health: this.health(),
      balanceHealthy: isBalanceHealthy(
        this.connectorValue(),
        this.state.totalStaked,
        config.minBalanceThreshold,
      ),
      consecutiveWithdrawFailures: status.consecutiveWithdrawFailures,
      config,
    };
  }

  // ==================== Funding & treasury ====================

  fundDirect(
    actor: AdminActor,
    destination: FundingDestination,
    amount: UFix64,
    assetId: string,
    now: number,
  ): UFix64 {
    requirePermission(actor, AdminPermission.FundingManager);
    this.emergency.assertNotPaused("fundDirect");
    if (assetId !== this.state.config.assetId) {
      throw new PreconditionError(
        `Asset mismatch: pool accepts ${this.state.config.assetId}, got ${assetId}`,
      );
    }
    this.funding.assertWithinCap(destination, amount);
    if (destination === "savings") {
      if (this.state.totalDeposited === ZERO) {
        throw new PreconditionError("Savings funding needs at least one depositor");
      }
      this.assertDistributable(amount);
    }

    const total = this.funding.recordDirectFunding(destination, amount);
    switch (destination) {
      case "savings": {
        this.distributeSavings(amount);
        if (this.emergency.shouldCompound()) {
          this.compoundAll();
        }
        this.restake();
        break;
      }
      case "lottery":
        this.state.prizePool = add(this.state.prizePool, amount);
        break;
      case "treasury":
        this.treasury.credit(amount, "direct");
        break;
    }

    this.raise(EventTypes.FUNDING_RECEIVED, {
      destination,
      amount: formatUFix64(amount),
      runningTotal: formatUFix64(total),
      actor: actor.id,
      fundedAt: now,
    });
    return total;
  }

  setFundingCap(
    actor: AdminActor,
    destination: FundingDestination,
    cap: UFix64 | null,
  ): void {
    requirePermission(actor, AdminPermission.FundingManager);
    this.funding.setCap(destination, cap);
    this.raise(EventTypes.POOL_CONFIG_UPDATED, {
      section: "funding",
      destination,
      cap: cap === null ? null : formatUFix64(cap),
      actor: actor.id,
    });
  }

  withdrawTreasury(
    actor: AdminActor,
    amount: UFix64,
    purpose: string,
    now: number,
  ): TreasuryWithdrawal {
    requirePermission(actor, AdminPermission.TreasuryManager);
    this.emergency.assertNotPaused("withdrawTreasury");
    const entry = this.treasury.withdraw(amount, purpose, actor.id, now);
    this.raise(EventTypes.TREASURY_WITHDRAWN, {
      amount: formatUFix64(entry.amount),
      purpose: entry.purpose,
      actor: entry.actor,
    });
    return entry;
  }

  getTreasuryStats(): ReturnType<TreasuryLedger["getStats"]> & {
    history: readonly TreasuryWithdrawal[];
    fundingTotals: Record<FundingDestination, UFix64>;
    fundingCaps: Record<FundingDestination, UFix64 | null>;
  } {
    return {
      ...this.treasury.getStats(),
      history: this.treasury.getHistory(),
      fundingTotals: this.funding.getTotals(),
      fundingCaps: this.funding.getCaps(),
    };
  }

  // ==================== Configuration ====================

  updateDistributionStrategy(actor: AdminActor, strategy: DistributionStrategy): void {
    requirePermission(actor, AdminPermission.ConfigManager);
    validateDistributionStrategy(strategy);
    this.state.config.distributionStrategy = strategy;
    this.raise(EventTypes.POOL_CONFIG_UPDATED, { section: "distribution", actor: actor.id });
  }

  updateWinnerSelectionStrategy(
    actor: AdminActor,
    strategy: WinnerSelectionStrategy,
  ): void {
    requirePermission(actor, AdminPermission.ConfigManager);
    if (this.state.drawReceipt) {
      throw new StateViolationError(
        "Winner selection cannot change while a draw is pending",
      );
    }
    validateSelectionStrategy(strategy);
    this.state.config.winnerSelectionStrategy = strategy;
    this.raise(EventTypes.POOL_CONFIG_UPDATED, { section: "selection", actor: actor.id });
  }

  updatePoolConfig(actor: AdminActor, patch: PoolConfigPatch): PoolConfig {
    requirePermission(actor, AdminPermission.ConfigManager);
    const next: PoolConfig = { ...this.state.config, ...patch };
    validatePoolConfig(next);
    this.state.config = next;
    this.raise(EventTypes.POOL_CONFIG_UPDATED, { section: "pool", actor: actor.id });
    return { ...next };
  }

  setBonusWeight(
    actor: AdminActor,
    receiver: ReceiverId,
    weight: UFix64,
    reason: string,
    now: number,
  ): void {
    requirePermission(actor, AdminPermission.BonusManager);
    this.emergency.assertNotPaused("setBonusWeight");
    this.draws.captureBeforeMutation(receiver);
    if (weight === ZERO) {
      this.state.bonusWeights.delete(receiver);
    } else {
      this.state.bonusWeights.set(receiver, {
        weight,
        reason: this.requireReason(reason),
        updatedAt: now,
      });
    }
    this.raise(EventTypes.BONUS_UPDATED, {
      receiver,
      weight: formatUFix64(weight),
      actor: actor.id,
    });
  }

  // ==================== Queries ====================

  getAccount(receiver: ReceiverId): AccountView {
    const account = this.requireAccount(receiver);
    const pendingInterest = this.accumulator.pendingInterest(receiver);
    return {
      receiver,
      deposit: account.deposit,
      pendingInterest,
      totalBalance: add(account.deposit, pendingInterest),
      bonusWeight: this.state.bonusWeights.get(receiver)?.weight ?? ZERO,
      totalEarnedSavings: account.totalEarnedSavings,
      totalEarnedPrizes: account.totalEarnedPrizes,
      pendingAuxiliaryPrizes: [...(this.state.pendingAuxiliaryPrizes.get(receiver) ?? [])],
      createdAt: account.createdAt,
      lastActivityAt: account.lastActivityAt,
    };
  }

  getPendingAuxiliaryPrizes(receiver: ReceiverId): string[] {
    return [...(this.state.pendingAuxiliaryPrizes.get(receiver) ?? [])];
  }

  previewDeposit(receiver: ReceiverId, amount: UFix64, assetId: string): DepositPreview {
    const { sharePrice } = this.getSharePrice();
    const account = this.state.accounts.get(receiver);
    const current = account
      ? add(account.deposit, this.accumulator.pendingInterest(receiver))
      : ZERO;
    const preview: DepositPreview = {
      allowed: true,
      reason: null,
      amount,
      resultingDeposit: add(current, amount),
      sharesMinted: this.sharesFor(amount),
      sharePrice,
    };

    try {
      this.emergency.assertCanDeposit(amount);
      if (assetId !== this.state.config.assetId) {
        throw new PreconditionError(`Asset mismatch: pool accepts ${this.state.config.assetId}`);
      }
      if (amount === ZERO || amount < this.state.config.minimumDeposit) {
        throw new PreconditionError(
          `Minimum deposit is ${formatUFix64(this.state.config.minimumDeposit)}`,
        );
      }
    } catch (error) {
      if (!(error instanceof Error)) throw error;
      return { ...preview, allowed: false, reason: error.message };
    }
    return preview;
  }

  getSharePrice(): SharePrice {
    const effectiveAssets = add(this.state.totalDeposited, this.state.pendingSavings);
    const effectiveShares = this.state.totalShares;
    return {
      effectiveAssets,
      effectiveShares,
      sharePrice: effectiveShares === ZERO ? ONE : div(effectiveAssets, effectiveShares),
    };
  }

  getPoolStats(): PoolStats {
    let activeAccounts = 0;
    for (const account of this.state.accounts.values()) {
      if (account.deposit > ZERO) activeAccounts++;
    }
    return {
      poolId: this.poolId,
      assetId: this.state.config.assetId,
      totalDeposited: this.state.totalDeposited,
      totalStaked: this.state.totalStaked,
      liquidBuffer: this.state.liquidBuffer,
      pendingSavings: this.state.pendingSavings,
      prizePool: this.state.prizePool,
      treasuryBalance: this.treasury.balance,
      activeAccounts,
      currentRound: this.state.currentRound,
      lastDrawTimestamp: this.state.lastDrawTimestamp,
      emergencyState: this.emergency.state,
      accumulatedInterestPerShare: this.accumulator.accumulatedInterestPerShare,
      totalDistributed: this.accumulator.totalDistributed,
      sharePrice: this.getSharePrice().sharePrice,
    };
  }

  getConservationReport(): ConservationReport {
    const sumOfDeposits = sum(
      [...this.state.accounts.values()].map((account) => account.deposit),
    );
    return {
      totalDeposited: this.state.totalDeposited,
      sumOfDeposits,
      totalStaked: this.state.totalStaked,
      liquidBuffer: this.state.liquidBuffer,
      pendingSavings: this.state.pendingSavings,
      prizePool: this.state.prizePool,
      treasuryBalance: this.treasury.balance,
      connectorValue: this.connectorValue(),
      depositsBalanced: sumOfDeposits === this.state.totalDeposited,
      custodyBalanced:
        add(this.state.totalStaked, this.state.liquidBuffer) === this.state.totalDeposited,
    };
  }

  // ==================== DrawHost ====================

  assertCanStartDraw(): void {
    this.emergency.assertCanStartDraw();
  }

  assertNotPaused(operation: string): void {
    this.emergency.assertNotPaused(operation);
  }

  stakeAt(receiver: ReceiverId, interestPerShare: UFix64): UFix64 {
    const account = this.state.accounts.get(receiver);
    if (!account) return ZERO;
    return add(
      add(account.deposit, this.accumulator.pendingInterestAt(receiver, interestPerShare)),
      this.state.bonusWeights.get(receiver)?.weight ?? ZERO,
    );
  }

  projectedPrizePool(): UFix64 {
    return add(this.state.prizePool, this.projectedRewards().distribution.lottery);
  }

  awardPrize(
    receiver: ReceiverId,
    amount: UFix64,
    auxiliaryIds: string[],
    now: number,
  ): void {
    const account = this.requireAccount(receiver);
    if (account.deposit > ZERO) {
      this.compoundAccount(receiver, account);
      account.deposit = add(account.deposit, amount);
      this.accumulator.updateBaseline(receiver, account.deposit);
    } else {
      account.deposit = amount;
      this.accumulator.initializeAccount(receiver, amount);
    }
    account.totalEarnedPrizes = add(account.totalEarnedPrizes, amount);
    account.lastActivityAt = now;

    this.state.prizePool = sub(this.state.prizePool, amount);
    this.state.totalDeposited = add(this.state.totalDeposited, amount);
    this.state.liquidBuffer = add(this.state.liquidBuffer, amount);

    if (auxiliaryIds.length > 0) {
      const pending = this.state.pendingAuxiliaryPrizes.get(receiver) ?? [];
      this.state.pendingAuxiliaryPrizes.set(receiver, [...pending, ...auxiliaryIds]);
    }
  }

  afterPrizesAwarded(): void {
    this.restake();
  }

  recordWinner(
    round: number,
    receiver: ReceiverId,
    amount: UFix64,
    auxiliaryIds: string[],
  ): void {
    this.tracker?.recordWinner(this.poolId, round, receiver, amount, auxiliaryIds);
  }

  // ==================== Internals ====================

  private connectorValue(): UFix64 {
    return this.valueOfNative(this.connector.minimumAvailable());
  }

  private valueOfNative(native: UFix64): UFix64 {
    return valueInPoolAsset(
      native,
      this.connector.assetId,
      this.state.config.assetId,
      this.oracle,
    );
  }

  private connectorRate(): UFix64 | null {
    return conversionRate(this.connector.assetId, this.state.config.assetId, this.oracle);
  }

  /**
   * Stake up to `value` of the pool asset; returns the value the connector
   * took. Nothing is staked into an asset that has no quote.
   */
  private stakeValue(value: UFix64): UFix64 {
    const rate = this.connectorRate();
    if (rate === null) return ZERO;
    return this.valueOfNative(this.connector.depositCapacity(nativeUnitsFor(value, rate)));
  }

  /**
   * Release up to `value` of the pool asset. Withdrawals round the native
   * amount up so the payout is covered; harvests round down so principal stays.
   */
  private releaseValue(value: UFix64, roundUp: boolean): ReleasedFunds {
    const rate = this.connectorRate();
    if (rate === null) return { native: ZERO, value: ZERO };
    const native = this.connector.withdrawAvailable(nativeUnitsFor(value, rate, roundUp));
    return { native, value: min(this.valueOfNative(native), value) };
  }

  private projectedRewards(): { surplus: UFix64; distribution: YieldDistribution } {
    const surplus = saturatingSub(this.connectorValue(), this.state.totalStaked);
    return {
      surplus,
      distribution: calculateYieldDistribution(
        surplus,
        this.state.config.distributionStrategy,
      ),
    };
  }

  /**
   * Checked before any connector call, so a distribution that would overflow
   * the accumulator never harvests funds it cannot book
   */
  private assertDistributable(savings: UFix64): void {
    const totalDeposited = this.state.totalDeposited;
    if (totalDeposited === ZERO) return;
    if (!this.accumulator.canDistribute(savings)) {
      throw new NumericSafetyError(
        "overflow",
        `Savings of ${formatUFix64(savings)} exceed the distributable ceiling of ${formatUFix64(this.accumulator.maxDistributable())}`,
      );
    }
    if (!this.accumulator.canDistribute(savings, totalDeposited)) {
      throw new NumericSafetyError(
        "overflow",
        `Savings of ${formatUFix64(savings)} would overflow the accumulator over ${formatUFix64(totalDeposited)} deposited`,
      );
    }
  }

  /**
   * Feed savings into the accumulator. With no depositors the amount has no
   * owner and becomes treasury dust; returns that dust.
   */
  private distributeSavings(amount: UFix64): UFix64 {
    if (amount === ZERO) return ZERO;
    if (this.state.totalDeposited === ZERO) {
      this.treasury.credit(amount, "dust");
      return amount;
    }
    this.accumulator.distribute(amount, this.state.totalDeposited);
    this.state.pendingSavings = add(this.state.pendingSavings, amount);
    return ZERO;
  }

  private compoundAccount(receiver: ReceiverId, account: AccountRecord): UFix64 {
    this.draws.captureBeforeMutation(receiver);
    const pending = this.accumulator.claim(receiver);
    const claimed = min(pending, this.state.pendingSavings);
    if (claimed > ZERO) {
      account.deposit = add(account.deposit, claimed);
      account.totalEarnedSavings = add(account.totalEarnedSavings, claimed);
      this.state.pendingSavings = sub(this.state.pendingSavings, claimed);
      this.state.totalDeposited = add(this.state.totalDeposited, claimed);
      this.state.liquidBuffer = add(this.state.liquidBuffer, claimed);
    }
    this.accumulator.updateBaseline(receiver, account.deposit);
    return claimed;
  }

  /**
   * Compound every account, then sweep what truncation left behind to the treasury
   */
  private compoundAll(): { compounded: UFix64; dust: UFix64 } {
    let compounded = ZERO;
    for (const [receiver, account] of this.state.accounts) {
      if (account.deposit > ZERO) {
        compounded = add(compounded, this.compoundAccount(receiver, account));
      }
    }
    const dust = this.state.pendingSavings;
    this.treasury.credit(dust, "dust");
    this.state.pendingSavings = ZERO;
    return { compounded, dust };
  }

  private restake(): void {
    if (this.state.liquidBuffer === ZERO || !this.emergency.shouldCompound()) return;
    const staked = this.stakeValue(this.state.liquidBuffer);
    this.state.totalStaked = add(this.state.totalStaked, staked);
    this.state.liquidBuffer = sub(this.state.liquidBuffer, staked);
  }

  private returnToConnector(released: ReleasedFunds): void {
    if (released.native === ZERO) return;
    const accepted = this.connector.depositCapacity(released.native);
    if (accepted === released.native) return;
    const kept = saturatingSub(released.value, this.valueOfNative(accepted));
    this.state.totalStaked = sub(this.state.totalStaked, kept);
    this.state.liquidBuffer = add(this.state.liquidBuffer, kept);
  }

  private failWithdrawal(
    receiver: ReceiverId,
    requested: UFix64,
    available: UFix64,
    now: number,
  ): WithdrawalResult {
    const consecutiveFailures = this.emergency.recordWithdrawFailure();
    this.raise(EventTypes.WITHDRAWAL_FAILED, {
      receiver,
      requested: formatUFix64(requested),
      available: formatUFix64(available),
      consecutiveFailures,
    });
    console.warn("⚠️ Withdrawal could not be covered", {
      poolId: sanitizeId(this.poolId),
      receiver: sanitizeId(receiver),
      requested: formatUFix64(requested),
      consecutiveFailures,
    });
    this.evaluateEmergency(now);
    return { status: "failed", requested, available, consecutiveFailures };
  }

  private sharesFor(amount: UFix64): UFix64 {
    if (this.state.totalShares === ZERO || this.state.totalDeposited === ZERO) {
      return amount;
    }
    return mulDivRaw(amount, this.state.totalShares, this.state.totalDeposited);
  }

  private createAccount(receiver: ReceiverId, now: number): AccountRecord {
    const account: AccountRecord = {
      deposit: ZERO,
      claimedBaseline: ZERO,
      totalEarnedSavings: ZERO,
      totalEarnedPrizes: ZERO,
      createdAt: now,
      lastActivityAt: now,
    };
    this.state.accounts.set(receiver, account);
    return account;
  }

  private requireAccount(receiver: ReceiverId): AccountRecord {
    const account = this.state.accounts.get(receiver);
    if (!account) {
      throw new PreconditionError(`Unknown account: ${receiver}`);
    }
    return account;
  }

  private requireReason(reason: string): string {
    const trimmed = reason.trim();
    if (trimmed.length === 0) {
      throw new PreconditionError("A reason is required");
    }
    return trimmed;
  }

  private onEmergencyTransition(
    transition: EmergencyTransition,
    actor?: AdminActor,
  ): EmergencyTransition {
    this.raise(EventTypes.EMERGENCY_CHANGED, {
      from: transition.from,
      to: transition.to,
      reason: transition.reason,
      automatic: transition.automatic,
      actor: actor?.id ?? null,
    });
    console.warn("🚨 Emergency state changed", {
      poolId: sanitizeId(this.poolId),
      from: transition.from,
      to: transition.to,
      automatic: transition.automatic,
    });
    return transition;
  }

  private raise(type: PoolEventType, data: Record<string, unknown>): void {
    this.events.push({ type, data });
  }
}

export function validatePoolConfig(config: PoolConfig): void {
  if (config.assetId.trim().length === 0) {
    throw new PreconditionError("Pool asset is required");
  }
  if (!Number.isInteger(config.drawIntervalSeconds) || config.drawIntervalSeconds < 0) {
    throw new PreconditionError("Draw interval must be a non-negative whole number of seconds");
  }
  if (!Number.isInteger(config.snapshotBatchSize) || config.snapshotBatchSize < 1) {
    throw new PreconditionError("Snapshot batch size must be a positive integer");
  }
  if (config.accumulatorPrecision < 1n) {
    throw new PreconditionError("Accumulator precision must be at least 1");
  }
  validateDistributionStrategy(config.distributionStrategy);
  validateSelectionStrategy(config.winnerSelectionStrategy);
}

export function validateEmergencyConfig(config: EmergencyConfig): void {
  const fractions: Array<[string, number]> = [
    ["minYieldSourceHealth", config.minYieldSourceHealth],
    ["minBalanceThreshold", config.minBalanceThreshold],
    ["recoveryHealthThreshold", config.recoveryHealthThreshold],
  ];
  for (const [name, value] of fractions) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new PreconditionError(`${name} must be between 0 and 1`);
    }
  }
  if (!Number.isInteger(config.maxWithdrawFailures) || config.maxWithdrawFailures < 1) {
    throw new PreconditionError("maxWithdrawFailures must be a positive integer");
  }
  if (
    config.maxEmergencyDurationSeconds !== null &&
    (!Number.isInteger(config.maxEmergencyDurationSeconds) ||
      config.maxEmergencyDurationSeconds < 0)
  ) {
    throw new PreconditionError("maxEmergencyDurationSeconds must be a whole number of seconds");
  }
}
