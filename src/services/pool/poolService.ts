/**
 * Pool Service
 * Runs every pool operation as a transaction against the pool store:
 * load the snapshot, apply the operation on a fresh aggregate, save only on
 * success, then publish the events it raised. Operations on one pool are
 * serialized through a per-pool promise chain.
 */

import { config } from "../../config/index.js";
import { requirePermission } from "../../lib/auth/permissions.js";
import { PoolError, PreconditionError } from "../../lib/errors.js";
import { metrics, trackPoolBalances } from "../../lib/monitoring/metrics.js";
import { captureError, captureMessage } from "../../lib/sentry.js";
import { createPoolStore, type PoolStore } from "../../lib/store/poolStore.js";
import { isValidIdentifier, sanitizeId } from "../../lib/utils/sanitize.js";
import {
  AdminPermission,
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
} from "../../types/pool.types.js";
import type { UFix64 } from "../../utils/ufix64.js";
import {
  CommitRevealRandomnessProvider,
  WallClockRoundClock,
} from "../connectors/randomnessProvider.js";
import { InMemoryYieldConnector } from "../connectors/yieldConnector.js";
import type { DrawStatus } from "../draw/drawEngine.js";
import type { EmergencyTransition } from "../emergency/emergencyController.js";
import { eventBus, EventTypes, type EventBus } from "../eventBus.js";
import {
  InMemoryWinnerTracker,
  type WinnerRecord,
} from "../winnerTracker.js";
import { createPoolState, type CreatePoolInput } from "./poolState.js";
import {
  PrizeSavingsPool,
  type AccountView,
  type ConservationReport,
  type DepositPreview,
  type DepositResult,
  type EmergencyInfo,
  type PoolCollaborators,
  type PoolConfigPatch,
  type PoolStats,
  type SharePrice,
} from "./prizeSavingsPool.js";

/**
 * Builds the runtime collaborators of a pool the first time it is touched
 */
export type CollaboratorFactory = (state: PoolState) => PoolCollaborators;

export interface PoolServiceOptions {
  store: PoolStore;
  collaborators: CollaboratorFactory;
  tracker?: InMemoryWinnerTracker;
  bus?: EventBus;
  /** Current time in unix seconds */
  clock?: () => number;
}

export const nowSeconds = (): number => Math.floor(Date.now() / 1000);

export class PoolService {
  readonly store: PoolStore;
  readonly tracker: InMemoryWinnerTracker;
  private readonly factory: CollaboratorFactory;
  private readonly bus: EventBus;
  private readonly clock: () => number;
  private readonly runtime = new Map<string, PoolCollaborators>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(options: PoolServiceOptions) {
    this.store = options.store;
    this.factory = options.collaborators;
    this.tracker = options.tracker ?? new InMemoryWinnerTracker();
    this.bus = options.bus ?? eventBus;
    this.clock = options.clock ?? nowSeconds;
  }

  now(): number {
    return this.clock();
  }

  /**
   * Attach collaborators to a pool explicitly (a real connector, a test double)
   */
  attach(poolId: string, collaborators: PoolCollaborators): void {
    this.runtime.set(poolId, { tracker: this.tracker, ...collaborators });
  }

  // ==================== Pool lifecycle ====================

  async createPool(
    actor: AdminActor,
    input: CreatePoolInput,
    collaborators?: PoolCollaborators,
  ): Promise<PoolStats> {
    requirePermission(actor, AdminPermission.ConfigManager);
    if (!isValidIdentifier(input.poolId)) {
      throw new PreconditionError(`Invalid pool id: ${sanitizeId(input.poolId)}`);
    }

    return this.enqueue(input.poolId, async () => {
      if (await this.store.load(input.poolId)) {
        throw new PreconditionError(`Pool ${input.poolId} already exists`);
      }
      const state = createPoolState(input, this.now());
      if (collaborators) {
        this.attach(state.poolId, collaborators);
      }
      const pool = new PrizeSavingsPool(state, this.collaboratorsFor(state));
      await this.store.save(state);

      this.bus.publish(EventTypes.POOL_CREATED, state.poolId, {
        assetId: state.config.assetId,
        actor: actor.id,
      });
      console.log("🆕 Pool created", {
        poolId: sanitizeId(state.poolId),
        assetId: state.config.assetId,
      });
      return pool.getPoolStats();
    });
  }

  async listPools(): Promise<string[]> {
    return this.store.list();
  }

  // ==================== Transactions ====================

  /**
   * Run `operation` against a freshly loaded pool and commit it.
   * A thrown error leaves the stored snapshot untouched.
   */
  async execute<T>(
    poolId: string,
    operation: string,
    fn: (pool: PrizeSavingsPool, now: number) => T,
  ): Promise<T> {
    return this.enqueue(poolId, async () => {
      const pool = await this.loadPool(poolId);
      let result: T;
      try {
        result = fn(pool, this.now());
      } catch (error) {
        this.recordFailure(poolId, operation, error);
        throw error;
      }

      await this.store.save(pool.state);
      for (const event of pool.drainEvents()) {
        this.bus.publish(event.type, poolId, event.data);
        if (event.type === EventTypes.EMERGENCY_CHANGED && event.data.to === "EmergencyMode") {
          captureMessage("Pool entered emergency mode", "warning", { poolId, ...event.data });
        }
      }
      this.trackBalances(pool);
      return result;
    });
  }

  /**
   * Read-only access; nothing is saved
   */
  async read<T>(poolId: string, fn: (pool: PrizeSavingsPool, now: number) => T): Promise<T> {
    const pool = await this.loadPool(poolId);
    return fn(pool, this.now());
  }

  // ==================== Depositor operations ====================

  deposit(
    poolId: string,
    receiver: ReceiverId,
    amount: UFix64,
    assetId: string,
  ): Promise<DepositResult> {
    return this.execute(poolId, "deposit", (pool, now) =>
      pool.deposit(receiver, amount, assetId, now),
    );
  }

  withdraw(poolId: string, receiver: ReceiverId, amount: UFix64): Promise<WithdrawalResult> {
    return this.execute(poolId, "withdraw", (pool, now) => pool.withdraw(receiver, amount, now));
  }

  processRewards(poolId: string): Promise<RewardProcessingResult> {
    return this.execute(poolId, "processRewards", (pool, now) => pool.processRewards(now));
  }

  evaluateEmergency(poolId: string): Promise<EmergencyTransition | null> {
    return this.execute(poolId, "evaluateEmergency", (pool, now) =>
      pool.evaluateEmergency(now),
    );
  }

  // ==================== Draws ====================

  /**
   * The emergency check runs in its own transaction first, so an automatic
   * trigger is kept even when the draw step is then rejected
   */
  async startDraw(poolId: string, actor: AdminActor): Promise<DrawReceipt> {
    requirePermission(actor, AdminPermission.DrawOperator);
    await this.evaluateEmergency(poolId);
    return this.execute(poolId, "startDraw", (pool, now) => pool.startDraw(now));
  }

  async processDrawBatch(poolId: string, actor: AdminActor, limit: number): Promise<number> {
    requirePermission(actor, AdminPermission.DrawOperator);
    return this.execute(poolId, "processDrawBatch", (pool) => pool.processDrawBatch(limit));
  }

  async completeDraw(poolId: string, actor: AdminActor): Promise<DrawSettlement> {
    requirePermission(actor, AdminPermission.DrawOperator);
    await this.evaluateEmergency(poolId);
    const end = metrics.drawDuration.startTimer({ pool_id: poolId });
    try {
      return await this.execute(poolId, "completeDraw", (pool, now) => pool.completeDraw(now));
    } finally {
      end();
    }
  }

  // ==================== Admin operations ====================

  enableEmergencyMode(poolId: string, actor: AdminActor, reason: string): Promise<EmergencyTransition> {
    return this.execute(poolId, "enableEmergencyMode", (pool, now) =>
      pool.enableEmergencyMode(actor, reason, now),
    );
  }

  disableEmergencyMode(poolId: string, actor: AdminActor): Promise<EmergencyTransition> {
    return this.execute(poolId, "disableEmergencyMode", (pool, now) =>
      pool.disableEmergencyMode(actor, now),
    );
  }

  pause(poolId: string, actor: AdminActor, reason: string): Promise<EmergencyTransition> {
    return this.execute(poolId, "pause", (pool, now) => pool.pause(actor, reason, now));
  }

  enablePartialMode(poolId: string, actor: AdminActor, reason: string): Promise<EmergencyTransition> {
    return this.execute(poolId, "enablePartialMode", (pool, now) =>
      pool.enablePartialMode(actor, reason, now),
    );
  }

  updateEmergencyConfig(
    poolId: string,
    actor: AdminActor,
    patch: Partial<EmergencyConfig>,
  ): Promise<EmergencyConfig> {
    return this.execute(poolId, "updateEmergencyConfig", (pool) =>
      pool.updateEmergencyConfig(actor, patch),
    );
  }

  fundDirect(
    poolId: string,
    actor: AdminActor,
    destination: FundingDestination,
    amount: UFix64,
    assetId: string,
  ): Promise<UFix64> {
    return this.execute(poolId, "fundDirect", (pool, now) =>
      pool.fundDirect(actor, destination, amount, assetId, now),
    );
  }

  setFundingCap(
    poolId: string,
    actor: AdminActor,
    destination: FundingDestination,
    cap: UFix64 | null,
  ): Promise<void> {
    return this.execute(poolId, "setFundingCap", (pool) =>
      pool.setFundingCap(actor, destination, cap),
    );
  }

  withdrawTreasury(
    poolId: string,
    actor: AdminActor,
    amount: UFix64,
    purpose: string,
  ): Promise<TreasuryWithdrawal> {
    return this.execute(poolId, "withdrawTreasury", (pool, now) =>
      pool.withdrawTreasury(actor, amount, purpose, now),
    );
  }

  updateDistributionStrategy(
    poolId: string,
    actor: AdminActor,
    strategy: DistributionStrategy,
  ): Promise<void> {
    return this.execute(poolId, "updateDistributionStrategy", (pool) =>
      pool.updateDistributionStrategy(actor, strategy),
    );
  }

  updateWinnerSelectionStrategy(
    poolId: string,
    actor: AdminActor,
    strategy: WinnerSelectionStrategy,
  ): Promise<void> {
    return this.execute(poolId, "updateWinnerSelectionStrategy", (pool) =>
      pool.updateWinnerSelectionStrategy(actor, strategy),
    );
  }

  updatePoolConfig(poolId: string, actor: AdminActor, patch: PoolConfigPatch): Promise<PoolConfig> {
    return this.execute(poolId, "updatePoolConfig", (pool) => pool.updatePoolConfig(actor, patch));
  }

  setBonusWeight(
    poolId: string,
    actor: AdminActor,
    receiver: ReceiverId,
    weight: UFix64,
    reason: string,
  ): Promise<void> {
    return this.execute(poolId, "setBonusWeight", (pool, now) =>
      pool.setBonusWeight(actor, receiver, weight, reason, now),
    );
  }

  // ==================== Queries ====================

  getPoolStats(poolId: string): Promise<PoolStats> {
    return this.read(poolId, (pool) => pool.getPoolStats());
  }

  getAccount(poolId: string, receiver: ReceiverId): Promise<AccountView> {
    return this.read(poolId, (pool) => pool.getAccount(receiver));
  }

  previewDeposit(
    poolId: string,
    receiver: ReceiverId,
    amount: UFix64,
    assetId: string,
  ): Promise<DepositPreview> {
    return this.read(poolId, (pool) => pool.previewDeposit(receiver, amount, assetId));
  }

  getSharePrice(poolId: string): Promise<SharePrice> {
    return this.read(poolId, (pool) => pool.getSharePrice());
  }

  getDrawStatus(poolId: string): Promise<DrawStatus> {
    return this.read(poolId, (pool, now) => pool.getDrawStatus(now));
  }

  getEmergencyInfo(poolId: string): Promise<EmergencyInfo> {
    return this.read(poolId, (pool) => pool.getEmergencyInfo());
  }

  getTreasuryStats(poolId: string): Promise<ReturnType<PrizeSavingsPool["getTreasuryStats"]>> {
    return this.read(poolId, (pool) => pool.getTreasuryStats());
  }

  getConservationReport(poolId: string): Promise<ConservationReport> {
    return this.read(poolId, (pool) => pool.getConservationReport());
  }

  async getWinners(
    poolId: string,
    filter?: { receiver?: ReceiverId; limit?: number },
  ): Promise<WinnerRecord[]> {
    await this.loadPool(poolId);
    return this.tracker.getWinners({ poolId, ...filter });
  }

  // ==================== Internals ====================

  private async loadPool(poolId: string): Promise<PrizeSavingsPool> {
    const state = await this.store.load(poolId);
    if (!state) {
      throw new PreconditionError(`Unknown pool: ${poolId}`);
    }
    return new PrizeSavingsPool(state, this.collaboratorsFor(state));
  }

  private collaboratorsFor(state: PoolState): PoolCollaborators {
    let collaborators = this.runtime.get(state.poolId);
    if (!collaborators) {
      collaborators = { tracker: this.tracker, ...this.factory(state) };
      this.runtime.set(state.poolId, collaborators);
    }
    return collaborators;
  }

  private enqueue<T>(poolId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(poolId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(poolId, settled);
    return run.finally(() => {
      if (this.queues.get(poolId) === settled) {
        this.queues.delete(poolId);
      }
    });
  }

  private recordFailure(poolId: string, operation: string, error: unknown): void {
    const kind = error instanceof PoolError ? error.kind : "internal";
    metrics.operationErrors.labels(operation, kind).inc();
    if (error instanceof PoolError) {
      console.warn("⛔ Pool operation rejected", {
        poolId: sanitizeId(poolId),
        operation,
        kind,
        message: error.message,
      });
      return;
    }
    console.error("❌ Pool operation failed", {
      poolId: sanitizeId(poolId),
      operation,
      error: error instanceof Error ? error.message : String(error),
    });
    captureError(error, { tags: { poolId, operation } });
  }

  private trackBalances(pool: PrizeSavingsPool): void {
    const stats = pool.getPoolStats();
    trackPoolBalances(pool.poolId, {
      totalDeposited: stats.totalDeposited,
      prizePool: stats.prizePool,
      treasury: stats.treasuryBalance,
      emergencyState: stats.emergencyState,
      consecutiveFailures: pool.state.emergency.consecutiveWithdrawFailures,
    });
  }
}

/**
 * Reference collaborators: an in-memory connector seeded with the staked
 * principal, and commit-reveal randomness on wall-clock rounds
 */
export function defaultCollaborators(state: PoolState): PoolCollaborators {
  const clock = new WallClockRoundClock(
    config.randomness.roundDurationMs,
    config.randomness.salt,
  );
  return {
    connector: new InMemoryYieldConnector({
      assetId: state.config.assetId,
      initialBalance: state.totalStaked,
    }),
    randomness: new CommitRevealRandomnessProvider(clock, config.randomness.secret),
  };
}

export const poolService = new PoolService({
  store: createPoolStore(config.store.driver, config.store.sqlitePath),
  collaborators: defaultCollaborators,
});
