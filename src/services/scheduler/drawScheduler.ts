import cron from "node-cron";
import { systemActor } from "../../lib/auth/permissions.js";
import { PoolError } from "../../lib/errors.js";
import { captureError } from "../../lib/sentry.js";
import { sanitizeId } from "../../lib/utils/sanitize.js";
import type { AdminActor } from "../../types/pool.types.js";
import { formatUFix64 } from "../../utils/ufix64.js";
import type { PoolService } from "../pool/poolService.js";

export type DrawAction = "started" | "batch" | "completed" | "waiting" | "idle" | "failed";

export interface DrawTickResult {
  poolId: string;
  action: DrawAction;
}

export interface DrawSchedulerOptions {
  rewardsCron: string;
  healthCron: string;
  drawCron: string;
  batchSize: number;
  actor?: AdminActor;
}

function logTickError(task: string, poolId: string, error: unknown): void {
  if (error instanceof PoolError) {
    console.warn(`⏭️ ${task} skipped`, {
      poolId: sanitizeId(poolId),
      kind: error.kind,
      message: error.message,
    });
    return;
  }
  console.error(`❌ ${task} failed`, {
    poolId: sanitizeId(poolId),
    error: error instanceof Error ? error.message : String(error),
  });
  captureError(error, { tags: { task, poolId } });
}

/**
 * Harvest every pool; returns how many pools harvested anything
 */
export async function processRewardsTick(service: PoolService): Promise<number> {
  let harvestedPools = 0;
  for (const poolId of await service.listPools()) {
    try {
      const result = await service.processRewards(poolId);
      if (result.harvested > 0n) {
        harvestedPools++;
        console.log("🌾 Rewards harvested", {
          poolId: sanitizeId(poolId),
          harvested: formatUFix64(result.harvested),
        });
      }
    } catch (error) {
      logTickError("Reward processing", poolId, error);
    }
  }
  return harvestedPools;
}

/**
 * Apply automatic emergency trigger and recovery on every pool
 */
export async function healthTick(service: PoolService): Promise<number> {
  let transitions = 0;
  for (const poolId of await service.listPools()) {
    try {
      if (await service.evaluateEmergency(poolId)) {
        transitions++;
      }
    } catch (error) {
      logTickError("Health evaluation", poolId, error);
    }
  }
  return transitions;
}

/**
 * Move every pool's draw one phase forward when it can
 */
export async function drawTick(
  service: PoolService,
  actor: AdminActor,
  batchSize: number,
): Promise<DrawTickResult[]> {
  const results: DrawTickResult[] = [];
  for (const poolId of await service.listPools()) {
    let action: DrawAction = "idle";
    try {
      const status = await service.getDrawStatus(poolId);
      switch (status.phase) {
        case "Idle":
          if (status.canDrawNow) {
            await service.startDraw(poolId, actor);
            action = "started";
          }
          break;
        case "CapturingSnapshot":
          await service.processDrawBatch(poolId, actor, batchSize);
          action = "batch";
          break;
        case "PendingRandomness":
          action = "waiting";
          break;
        case "ReadyToComplete": {
          const settlement = await service.completeDraw(poolId, actor);
          console.log("🏁 Scheduled draw completed", {
            poolId: sanitizeId(poolId),
            round: settlement.round,
            winners: settlement.winners.length,
          });
          action = "completed";
          break;
        }
      }
    } catch (error) {
      logTickError("Draw", poolId, error);
      action = "failed";
    }
    results.push({ poolId, action });
  }
  return results;
}

/**
 * Run `task` unless its previous run is still going
 */
function guarded(name: string, task: () => Promise<unknown>): () => Promise<void> {
  let isExecuting = false;
  return async () => {
    if (isExecuting) {
      console.log(`⏳ ${name} still running, skipping tick`);
      return;
    }
    isExecuting = true;
    try {
      await task();
    } catch (error) {
      console.error(`❌ ${name} tick failed:`, error);
      captureError(error, { tags: { task: name } });
    } finally {
      isExecuting = false;
    }
  };
}

export function startDrawScheduler(
  service: PoolService,
  options: DrawSchedulerOptions,
): () => void {
  const actor = options.actor ?? systemActor("scheduler");
  const tasks = [
    cron.schedule(
      options.rewardsCron,
      guarded("Rewards", () => processRewardsTick(service)),
    ),
    cron.schedule(
      options.healthCron,
      guarded("Health", () => healthTick(service)),
    ),
    cron.schedule(
      options.drawCron,
      guarded("Draw", () => drawTick(service, actor, options.batchSize)),
    ),
  ];

  console.log("🕐 Draw Scheduler started", {
    rewards: options.rewardsCron,
    health: options.healthCron,
    draws: options.drawCron,
  });

  return () => {
    for (const task of tasks) {
      task.stop();
    }
    console.log("🛑 Draw Scheduler stopped");
  };
}
