import { Router } from "express";
import type { HealthChecks } from "../lib/monitoring/healthChecks.js";
import { register } from "../lib/monitoring/metrics.js";

export function createHealthRouter(healthChecks: HealthChecks): Router {
  const router = Router();

  // Liveness probe - basic health check
  router.get("/", async (_req, res) => {
    const result = await healthChecks.liveness();
    res.json({
      success: true,
      message: "API is healthy",
      ...result,
    });
  });

  // Readiness probe - store connectivity
  router.get("/ready", async (_req, res) => {
    const result = await healthChecks.readiness();
    if (result.status === "error") {
      res.status(503).json({
        success: false,
        message: "Service not ready",
        ...result,
      });
      return;
    }
    res.json({
      success: true,
      message: "Service is ready",
      ...result,
    });
  });

  return router;
}

/**
 * Prometheus scrape endpoint
 */
export function createMetricsRouter(): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      res.set("Content-Type", register.contentType);
      res.send(await register.metrics());
    } catch (error) {
      res.status(500).json({
        success: false,
        message: "Failed to collect metrics",
        error: error instanceof Error ? error.message : "Unknown error",
      });
    }
  });

  return router;
}
