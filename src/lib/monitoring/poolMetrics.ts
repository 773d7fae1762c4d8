/**
 * Feeds pool events into the Prometheus counters
 */

import { eventBus, EventTypes, type EventBus, type EventPayload } from "../../services/eventBus.js";
import { isValidUFix64String, parseUFix64, toNumber } from "../../utils/ufix64.js";
import { metrics } from "./metrics.js";

function amountField(data: unknown, field: string): number {
  if (typeof data !== "object" || data === null || !(field in data)) return 0;
  const value: unknown = Reflect.get(data, field);
  return typeof value === "string" && isValidUFix64String(value)
    ? toNumber(parseUFix64(value))
    : 0;
}

function recordEvent(event: EventPayload): void {
  const poolId = event.poolId;
  switch (event.type) {
    case EventTypes.DEPOSIT_COMPLETED:
      metrics.deposits.labels(poolId).inc();
      metrics.depositAmount.labels(poolId).inc(amountField(event.data, "amount"));
      break;
    case EventTypes.WITHDRAWAL_COMPLETED:
      metrics.withdrawals.labels(poolId, "completed").inc();
      metrics.withdrawalAmount.labels(poolId).inc(amountField(event.data, "amount"));
      break;
    case EventTypes.WITHDRAWAL_FAILED:
      metrics.withdrawals.labels(poolId, "failed").inc();
      break;
    case EventTypes.REWARDS_PROCESSED:
      for (const destination of ["savings", "lottery", "treasury"]) {
        metrics.rewardsHarvested
          .labels(poolId, destination)
          .inc(amountField(event.data, destination));
      }
      metrics.dustSwept.labels(poolId).inc(amountField(event.data, "dust"));
      break;
    case EventTypes.DRAW_STARTED:
      metrics.drawsExecuted.labels(poolId, "start").inc();
      break;
    case EventTypes.DRAW_BATCH_CAPTURED:
      metrics.drawsExecuted.labels(poolId, "batch").inc();
      break;
    case EventTypes.DRAW_COMPLETED:
      metrics.drawsExecuted.labels(poolId, "complete").inc();
      metrics.prizesAwarded
        .labels(poolId)
        .inc(
          amountField(event.data, "prizeAmount") - amountField(event.data, "rolledOver"),
        );
      break;
    default:
      break;
  }
}

const subscribedBuses = new WeakSet<EventBus>();

export function startPoolMetrics(bus: EventBus = eventBus): void {
  if (subscribedBuses.has(bus)) return;
  bus.subscribeAll(recordEvent);
  subscribedBuses.add(bus);
}
