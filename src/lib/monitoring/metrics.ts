import {
  collectDefaultMetrics,
  register,
  Gauge,
  Counter,
  Histogram,
} from "prom-client";
import { toNumber, type UFix64 } from "../../utils/ufix64.js";
import type { EmergencyState } from "../../types/pool.types.js";

export const METRIC_PREFIX = "prize_savings_";

let defaultMetricsStarted = false;

/**
 * Enable default process metrics (CPU, memory, event loop). Called once at
 * server startup rather than on import so tests do not start collectors.
 */
export function startDefaultMetrics(): void {
  if (defaultMetricsStarted) return;
  collectDefaultMetrics({ prefix: METRIC_PREFIX });
  defaultMetricsStarted = true;
}

export const metrics = {
  // HTTP Request metrics
  httpRequestsTotal: new Counter({
    name: "prize_savings_http_requests_total",
    help: "Total number of HTTP requests",
    labelNames: ["method", "route", "status_code"],
  }),

  httpRequestDuration: new Histogram({
    name: "prize_savings_http_request_duration_seconds",
    help: "Duration of HTTP requests in seconds",
    labelNames: ["method", "route"],
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2.5],
  }),

  // Deposits and withdrawals
  deposits: new Counter({
    name: "prize_savings_deposits_total",
    help: "Total number of deposits",
    labelNames: ["pool_id"],
  }),

  depositAmount: new Counter({
    name: "prize_savings_deposit_amount_total",
    help: "Total amount deposited",
    labelNames: ["pool_id"],
  }),

  withdrawals: new Counter({
    name: "prize_savings_withdrawals_total",
    help: "Total number of withdrawals",
    labelNames: ["pool_id", "status"],
  }),

  withdrawalAmount: new Counter({
    name: "prize_savings_withdrawal_amount_total",
    help: "Total amount withdrawn",
    labelNames: ["pool_id"],
  }),

  // Rewards
  rewardsHarvested: new Counter({
    name: "prize_savings_rewards_harvested_total",
    help: "Total yield harvested from the yield connector",
    labelNames: ["pool_id", "destination"],
  }),

  dustSwept: new Counter({
    name: "prize_savings_dust_swept_total",
    help: "Rounding dust routed to the treasury",
    labelNames: ["pool_id"],
  }),

  // Draws
  drawsExecuted: new Counter({
    name: "prize_savings_draws_total",
    help: "Total number of draw phases executed",
    labelNames: ["pool_id", "phase"],
  }),

  drawDuration: new Histogram({
    name: "prize_savings_draw_completion_seconds",
    help: "Duration of draw completion in seconds",
    labelNames: ["pool_id"],
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
  }),

  prizesAwarded: new Counter({
    name: "prize_savings_prizes_awarded_total",
    help: "Total prize amount awarded to winners",
    labelNames: ["pool_id"],
  }),

  // Pool balances
  totalDeposited: new Gauge({
    name: "prize_savings_total_deposited",
    help: "Sum of all account deposits",
    labelNames: ["pool_id"],
  }),

  prizePool: new Gauge({
    name: "prize_savings_prize_pool",
    help: "Current prize pool balance",
    labelNames: ["pool_id"],
  }),

  treasuryBalance: new Gauge({
    name: "prize_savings_treasury_balance",
    help: "Current treasury balance",
    labelNames: ["pool_id"],
  }),

  // Emergency
  emergencyState: new Gauge({
    name: "prize_savings_emergency_state",
    help: "Emergency state (0 normal, 1 partial, 2 emergency, 3 paused)",
    labelNames: ["pool_id"],
  }),

  withdrawFailures: new Gauge({
    name: "prize_savings_consecutive_withdraw_failures",
    help: "Consecutive failed withdrawals",
    labelNames: ["pool_id"],
  }),

  // Persistence
  storeOperationDuration: new Histogram({
    name: "prize_savings_store_operation_duration_seconds",
    help: "Duration of pool store operations in seconds",
    labelNames: ["operation", "driver"],
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
  }),

  operationErrors: new Counter({
    name: "prize_savings_operation_errors_total",
    help: "Pool operations that failed",
    labelNames: ["operation", "kind"],
  }),
};

export { register };

const EMERGENCY_STATE_VALUES: Record<EmergencyState, number> = {
  Normal: 0,
  PartialMode: 1,
  EmergencyMode: 2,
  Paused: 3,
};

export function trackPoolBalances(
  poolId: string,
  balances: {
    totalDeposited: UFix64;
    prizePool: UFix64;
    treasury: UFix64;
    emergencyState: EmergencyState;
    consecutiveFailures: number;
  },
): void {
  metrics.totalDeposited.labels(poolId).set(toNumber(balances.totalDeposited));
  metrics.prizePool.labels(poolId).set(toNumber(balances.prizePool));
  metrics.treasuryBalance.labels(poolId).set(toNumber(balances.treasury));
  metrics.emergencyState
    .labels(poolId)
    .set(EMERGENCY_STATE_VALUES[balances.emergencyState]);
  metrics.withdrawFailures.labels(poolId).set(balances.consecutiveFailures);
}

export function trackRequestDuration(
  method: string,
  route: string,
  durationMs: number,
): void {
  metrics.httpRequestDuration.labels(method, route).observe(durationMs / 1000);
}

export function trackRequestCount(
  method: string,
  route: string,
  statusCode: number,
): void {
  metrics.httpRequestsTotal.labels(method, route, statusCode.toString()).inc();
}
