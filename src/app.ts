import * as Sentry from "@sentry/node";
import express from "express";
import cors from "cors";
import helmet from "helmet";
import compression from "compression";
import { createAdminDrawsRouter } from "./api/admin/draws.js";
import { createAdminEmergencyRouter } from "./api/admin/emergency.js";
import { createAdminPoolsRouter } from "./api/admin/pools.js";
import { createHealthRouter, createMetricsRouter } from "./api/health.js";
import { createPoolsRouter } from "./api/pools/index.js";
import { createHealthChecks } from "./lib/monitoring/healthChecks.js";
import { adminLimiter, generalApiLimiter } from "./lib/middleware/rateLimiter.js";
import { isSentryEnabled } from "./lib/sentry.js";
import { requestMetrics } from "./middleware/requestMetrics.js";
import type { PoolService } from "./services/pool/poolService.js";

export interface AppOptions {
  service: PoolService;
  corsOrigins?: string[];
  compression?: boolean;
  rateLimit?: boolean;
}

export function createApp(options: AppOptions): express.Express {
  const { service } = options;
  const rateLimitEnabled = options.rateLimit ?? true;
  const allowedOrigins = options.corsOrigins ?? [];

  const app = express();
  app.set("trust proxy", 1);

  app.use(
    cors({
      origin(origin, callback) {
        // Allow requests with no origin (curl, server-to-server)
        if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        console.log("CORS blocked origin:", origin);
        callback(new Error("Not allowed by CORS"));
      },
      methods: ["GET", "POST", "PUT", "PATCH", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "Accept", "Origin"],
    }),
  );

  if (options.compression ?? true) {
    app.use(compression({ level: 6, threshold: 1024 }));
  }

  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: "cross-origin" },
    }),
  );

  // Request body size limits
  app.use(express.json({ limit: "10kb" }));

  app.use(requestMetrics);

  if (rateLimitEnabled) {
    app.use("/api", generalApiLimiter);
  }

  app.get("/", (_req, res) => {
    res.json({
      success: true,
      message: "Prize Savings API v1.0",
      timestamp: new Date().toISOString(),
    });
  });

  const healthRoute = createHealthRouter(createHealthChecks(service.store));
  app.use("/health", healthRoute);
  app.use("/api/health", healthRoute);
  app.use("/metrics", createMetricsRouter());

  app.use("/api/pools", createPoolsRouter(service, { rateLimit: rateLimitEnabled }));

  if (rateLimitEnabled) {
    app.use("/api/admin", adminLimiter);
  }
  app.use("/api/admin/pools", createAdminPoolsRouter(service));
  app.use("/api/admin/pools", createAdminEmergencyRouter(service));
  app.use("/api/admin/pools", createAdminDrawsRouter(service));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: "Route not found",
      path: req.path,
    });
  });

  if (isSentryEnabled()) {
    Sentry.setupExpressErrorHandler(app);
  }

  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      // body-parser rejections carry their own 4xx status
      const status =
        typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
          ? err.status
          : 500;
      if (status >= 500) {
        console.error("❌ Error:", err);
      }
      res.status(status).json({
        success: false,
        error: status >= 500 ? "Internal server error" : err instanceof Error ? err.message : "Bad request",
      });
    },
  );

  return app;
}
