// At the very top of the file, before other imports
import { config } from "./config/index.js";
import { initSentry } from "./lib/sentry.js";

initSentry(config.sentryDsn, config.nodeEnv);

import { createApp } from "./app.js";
import { startDefaultMetrics } from "./lib/monitoring/metrics.js";
import { startPoolMetrics } from "./lib/monitoring/poolMetrics.js";
import { systemActor } from "./lib/auth/permissions.js";
import { poolService } from "./services/pool/poolService.js";
import { startDrawScheduler } from "./services/scheduler/drawScheduler.js";
import { parseUFix64 } from "./utils/ufix64.js";

console.log("🚀 Starting Prize Savings Backend...");
console.log("📍 PORT:", config.port);
console.log("📍 NODE_ENV:", config.nodeEnv);
console.log("📍 STORE_DRIVER:", config.store.driver);

startDefaultMetrics();
startPoolMetrics();

const app = createApp({
  service: poolService,
  corsOrigins: config.corsOrigins,
  compression: config.enableCompression,
});

/**
 * Create the configured default pool on first start
 */
async function ensureDefaultPool(): Promise<void> {
  const poolId = config.defaultPool.poolId;
  if (!poolId) return;
  if ((await poolService.listPools()).includes(poolId)) return;

  await poolService.createPool(systemActor("bootstrap"), {
    poolId,
    assetId: config.defaultPool.assetId,
    minimumDeposit: parseUFix64(config.defaultPool.minimumDeposit),
    drawIntervalSeconds: config.defaultPool.drawIntervalSeconds,
    distributionStrategy: {
      type: "fixedPercentage",
      savings: parseUFix64("0.7"),
      lottery: parseUFix64("0.2"),
      treasury: parseUFix64("0.1"),
    },
    winnerSelectionStrategy: { type: "single" },
  });
  console.log("✅ Default pool created", { poolId });
}

let stopScheduler: (() => void) | null = null;

const server = app.listen(config.port, "0.0.0.0", () => {
  console.log(`✅ Server running on http://0.0.0.0:${config.port}`);
  console.log(`📍 Health: http://0.0.0.0:${config.port}/api/health`);

  ensureDefaultPool()
    .then(() => {
      if (config.scheduler.enabled) {
        stopScheduler = startDrawScheduler(poolService, config.scheduler);
        console.log("✅ Draw scheduler enabled");
      } else {
        console.log(
          "⏸️  Draw scheduler disabled (set ENABLE_DRAW_SCHEDULER=true to enable)",
        );
      }
    })
    .catch((err) => {
      console.error("❌ Startup failed:", err);
      process.exit(1);
    });
});

function shutdown(signal: string): void {
  console.log(`👋 ${signal} received`);
  stopScheduler?.();
  server.close(() => {
    poolService.store
      .close()
      .then(() => {
        console.log("💤 Server closed");
        process.exit(0);
      })
      .catch((err) => {
        console.error("❌ Store close failed:", err);
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// Error handling
process.on("uncaughtException", (error) => {
  console.error("❌ Uncaught Exception:", error);
  process.exit(1);
});

process.on("unhandledRejection", (reason, promise) => {
  console.error("❌ Unhandled Rejection at:", promise, "reason:", reason);
  process.exit(1);
});

export default app;
