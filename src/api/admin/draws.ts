import { Router, Request, Response } from "express";
import {
  adminMiddleware,
  requireAdminPermission,
} from "../../lib/auth/adminMiddleware.js";
import {
  drawBatchSchema,
  validateRequest,
  type DrawBatchBody,
} from "../../lib/middleware/validation.js";
import { sanitizeId } from "../../lib/utils/sanitize.js";
import { eventBus, type EventBus, type PoolEventType, EventTypes } from "../../services/eventBus.js";
import type { PoolService } from "../../services/pool/poolService.js";
import { AdminPermission } from "../../types/pool.types.js";
import { sendError, toJson } from "../respond.js";
import { adminActor } from "./pools.js";

const EVENT_TYPES: readonly string[] = Object.values(EventTypes);

function isPoolEventType(value: string): value is PoolEventType {
  return EVENT_TYPES.includes(value);
}

/**
 * Manual draw control and the event log
 */
export function createAdminDrawsRouter(service: PoolService, bus: EventBus = eventBus): Router {
  const router = Router();
  router.use(adminMiddleware);

  /**
   * POST /api/admin/pools/:poolId/draw/start
   * Snapshot stakes, harvest and request randomness
   */
  router.post(
    "/:poolId/draw/start",
    requireAdminPermission(AdminPermission.DrawOperator),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      try {
        const receipt = await service.startDraw(req.params.poolId, actor);
        console.log("🎲 Draw started by admin", {
          poolId: sanitizeId(req.params.poolId),
          adminId: sanitizeId(actor.id),
          round: receipt.round,
        });
        res.json({
          success: true,
          draw: toJson({
            round: receipt.round,
            prizeAmount: receipt.prizeAmount,
            capturedReceivers: receipt.timeWeightedStakes.size,
            pendingReceivers: receipt.pendingReceivers.length,
            randomnessRequest: receipt.randomnessRequest,
            startedAt: receipt.startedAt,
          }),
        });
      } catch (error) {
        sendError(res, error, "Start draw");
      }
    },
  );

  router.post(
    "/:poolId/draw/batch",
    requireAdminPermission(AdminPermission.DrawOperator),
    validateRequest(drawBatchSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const { limit }: DrawBatchBody = req.body;
      try {
        const remaining = await service.processDrawBatch(req.params.poolId, actor, limit);
        res.json({ success: true, remaining });
      } catch (error) {
        sendError(res, error, "Draw batch");
      }
    },
  );

  /**
   * POST /api/admin/pools/:poolId/draw/complete
   * 409 while randomness is still pending
   */
  router.post(
    "/:poolId/draw/complete",
    requireAdminPermission(AdminPermission.DrawOperator),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      try {
        const settlement = await service.completeDraw(req.params.poolId, actor);
        res.json({
          success: true,
          settlement: toJson({
            ...settlement,
            randomValue: settlement.randomValue.toString(16).padStart(16, "0"),
          }),
        });
      } catch (error) {
        sendError(res, error, "Complete draw");
      }
    },
  );

  /**
   * GET /api/admin/pools/:poolId/events?type=&limit=
   */
  router.get("/:poolId/events", (req: Request, res: Response) => {
    const type = typeof req.query.type === "string" ? req.query.type : undefined;
    if (type !== undefined && !isPoolEventType(type)) {
      res.status(400).json({ success: false, error: `Unknown event type: ${sanitizeId(type)}` });
      return;
    }
    const limitParam = typeof req.query.limit === "string" ? parseInt(req.query.limit, 10) : 100;
    res.json({
      success: true,
      events: bus.getHistory({
        poolId: req.params.poolId,
        type,
        limit: Number.isNaN(limitParam) ? 100 : Math.min(Math.max(limitParam, 1), 1000),
      }),
    });
  });

  return router;
}
