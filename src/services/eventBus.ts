import { EventEmitter } from "events";

export interface EventPayload<T = unknown> {
  type: PoolEventType;
  poolId: string;
  data: T;
  timestamp: string;
}

export const EventTypes = {
  POOL_CREATED: "pool.created",
  POOL_CONFIG_UPDATED: "pool.config_updated",

  DEPOSIT_COMPLETED: "deposit.completed",
  WITHDRAWAL_COMPLETED: "withdrawal.completed",
  WITHDRAWAL_FAILED: "withdrawal.failed",

  REWARDS_PROCESSED: "rewards.processed",
  FUNDING_RECEIVED: "funding.received",
  TREASURY_WITHDRAWN: "treasury.withdrawn",
  BONUS_UPDATED: "bonus.updated",

  DRAW_STARTED: "draw.started",
  DRAW_BATCH_CAPTURED: "draw.batch_captured",
  DRAW_COMPLETED: "draw.completed",

  EMERGENCY_CHANGED: "emergency.changed",
} as const;

export type PoolEventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Event bus for pool notifications
 * Keeps a bounded in-memory history for the admin API
 */
export class EventBus extends EventEmitter {
  private eventHistory: EventPayload[] = [];
  private maxHistorySize = 1000;

  publish<T>(type: PoolEventType, poolId: string, data: T): void {
    const payload: EventPayload<T> = {
      type,
      poolId,
      data,
      timestamp: new Date().toISOString(),
    };

    this.eventHistory.push(payload);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }

    this.emit(type, payload);
    // Generic channel for listeners that want everything
    this.emit("event", payload);
  }

  subscribe(type: PoolEventType, handler: (payload: EventPayload) => void): void {
    this.on(type, handler);
  }

  unsubscribe(type: PoolEventType, handler: (payload: EventPayload) => void): void {
    this.off(type, handler);
  }

  subscribeAll(handler: (payload: EventPayload) => void): void {
    this.on("event", handler);
  }

  getHistory(filter?: {
    type?: PoolEventType;
    poolId?: string;
    limit?: number;
  }): EventPayload[] {
    let history = [...this.eventHistory];

    if (filter?.type) {
      history = history.filter((e) => e.type === filter.type);
    }
    if (filter?.poolId) {
      history = history.filter((e) => e.poolId === filter.poolId);
    }
    if (filter?.limit) {
      history = history.slice(-filter.limit);
    }

    return history;
  }

  clearHistory(): void {
    this.eventHistory = [];
  }

  getStats(): { totalEvents: number; eventTypes: Record<string, number> } {
    const eventTypes: Record<string, number> = {};
    for (const event of this.eventHistory) {
      eventTypes[event.type] = (eventTypes[event.type] || 0) + 1;
    }
    return { totalEvents: this.eventHistory.length, eventTypes };
  }
}

export const eventBus = new EventBus();
