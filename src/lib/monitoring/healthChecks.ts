import type { PoolStore } from "../store/poolStore.js";

export interface HealthCheckResult {
  status: "ok" | "error";
  timestamp: string;
  checks?: Array<{
    name: string;
    status: "ok" | "error";
    error?: string;
    duration?: number;
  }>;
}

export function createHealthChecks(store: PoolStore) {
  return {
    /**
     * Liveness check - returns ok if the process is serving requests
     */
    async liveness(): Promise<HealthCheckResult> {
      return {
        status: "ok",
        timestamp: new Date().toISOString(),
      };
    },

    /**
     * Readiness check - the pool store must answer
     */
    async readiness(): Promise<HealthCheckResult> {
      const start = Date.now();
      try {
        await store.ping();
        return {
          status: "ok",
          timestamp: new Date().toISOString(),
          checks: [{ name: `store:${store.driver}`, status: "ok", duration: Date.now() - start }],
        };
      } catch (error) {
        return {
          status: "error",
          timestamp: new Date().toISOString(),
          checks: [
            {
              name: `store:${store.driver}`,
              status: "error",
              error: error instanceof Error ? error.message : "Unknown error",
            },
          ],
        };
      }
    },
  };
}

export type HealthChecks = ReturnType<typeof createHealthChecks>;
