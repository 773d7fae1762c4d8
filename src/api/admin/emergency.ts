import { Router, Request, Response } from "express";
import {
  adminMiddleware,
  requireAdminPermission,
} from "../../lib/auth/adminMiddleware.js";
import {
  emergencyConfigSchema,
  reasonSchema,
  toEmergencyConfigPatch,
  validateRequest,
  type EmergencyConfigBody,
  type ReasonBody,
} from "../../lib/middleware/validation.js";
import type { PoolService } from "../../services/pool/poolService.js";
import { AdminPermission, type AdminActor } from "../../types/pool.types.js";
import type { EmergencyTransition } from "../../services/emergency/emergencyController.js";
import { sendError, toJson } from "../respond.js";
import { adminActor } from "./pools.js";

type ReasonedTransition = (
  poolId: string,
  actor: AdminActor,
  reason: string,
) => Promise<EmergencyTransition>;

/**
 * Manual emergency controls
 */
export function createAdminEmergencyRouter(service: PoolService): Router {
  const router = Router();
  router.use(adminMiddleware);
  const emergencyOperator = requireAdminPermission(AdminPermission.EmergencyOperator);

  const transitionRoute =
    (label: string, transition: ReasonedTransition) =>
    async (req: Request, res: Response): Promise<void> => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const { reason }: ReasonBody = req.body;
      try {
        const result = await transition(req.params.poolId, actor, reason);
        res.json({ success: true, transition: toJson(result) });
      } catch (error) {
        sendError(res, error, label);
      }
    };

  /**
   * POST /api/admin/pools/:poolId/emergency/enable
   */
  router.post(
    "/:poolId/emergency/enable",
    emergencyOperator,
    validateRequest(reasonSchema),
    transitionRoute("Enable emergency mode", (poolId, actor, reason) =>
      service.enableEmergencyMode(poolId, actor, reason),
    ),
  );

  router.post(
    "/:poolId/emergency/pause",
    emergencyOperator,
    validateRequest(reasonSchema),
    transitionRoute("Pause pool", (poolId, actor, reason) =>
      service.pause(poolId, actor, reason),
    ),
  );

  router.post(
    "/:poolId/emergency/partial",
    emergencyOperator,
    validateRequest(reasonSchema),
    transitionRoute("Enable partial mode", (poolId, actor, reason) =>
      service.enablePartialMode(poolId, actor, reason),
    ),
  );

  /**
   * POST /api/admin/pools/:poolId/emergency/disable
   * Back to normal operation; clears the failure counter
   */
  router.post("/:poolId/emergency/disable", emergencyOperator, async (req: Request, res: Response) => {
    const actor = adminActor(req, res);
    if (!actor) return;
    try {
      const result = await service.disableEmergencyMode(req.params.poolId, actor);
      res.json({ success: true, transition: toJson(result) });
    } catch (error) {
      sendError(res, error, "Disable emergency mode");
    }
  });

  router.patch(
    "/:poolId/emergency/config",
    emergencyOperator,
    validateRequest(emergencyConfigSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const body: EmergencyConfigBody = req.body;
      try {
        const config = await service.updateEmergencyConfig(
          req.params.poolId,
          actor,
          toEmergencyConfigPatch(body),
        );
        res.json({ success: true, config: toJson(config) });
      } catch (error) {
        sendError(res, error, "Update emergency config");
      }
    },
  );

  return router;
}
