import { Router, Request, Response } from "express";
import {
  adminMiddleware,
  requireAdminPermission,
} from "../../lib/auth/adminMiddleware.js";
import {
  bonusSchema,
  createPoolSchema,
  distributionStrategySchema,
  fundingCapSchema,
  fundingSchema,
  poolConfigSchema,
  selectionStrategySchema,
  toDistributionStrategy,
  toEmergencyConfigPatch,
  toSelectionStrategy,
  treasuryWithdrawSchema,
  validateRequest,
  type BonusBody,
  type CreatePoolBody,
  type DistributionStrategyBody,
  type FundingBody,
  type FundingCapBody,
  type PoolConfigBody,
  type SelectionStrategyBody,
  type TreasuryWithdrawBody,
} from "../../lib/middleware/validation.js";
import type { PoolService } from "../../services/pool/poolService.js";
import type { PoolConfigPatch } from "../../services/pool/prizeSavingsPool.js";
import { AdminPermission, type AdminActor } from "../../types/pool.types.js";
import { parseUFix64 } from "../../utils/ufix64.js";
import { presentConfig, sendError, toJson } from "../respond.js";

/**
 * The actor adminMiddleware attached; answers 401 when it is missing
 */
export function adminActor(req: Request, res: Response): AdminActor | null {
  if (!req.admin) {
    res.status(401).json({ success: false, error: "Unauthorized" });
    return null;
  }
  return req.admin;
}

/**
 * Pool administration: creation, configuration, funding, treasury, bonuses
 */
export function createAdminPoolsRouter(service: PoolService): Router {
  const router = Router();
  router.use(adminMiddleware);

  /**
   * POST /api/admin/pools
   */
  router.post(
    "/",
    requireAdminPermission(AdminPermission.ConfigManager),
    validateRequest(createPoolSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const body: CreatePoolBody = req.body;
      try {
        const stats = await service.createPool(actor, {
          poolId: body.poolId,
          assetId: body.assetId,
          minimumDeposit: parseUFix64(body.minimumDeposit),
          drawIntervalSeconds: body.drawIntervalSeconds,
          distributionStrategy: toDistributionStrategy(body.distributionStrategy),
          winnerSelectionStrategy: toSelectionStrategy(body.winnerSelectionStrategy),
          accumulatorPrecision:
            body.accumulatorPrecision === undefined ? undefined : BigInt(body.accumulatorPrecision),
          snapshotBatchSize: body.snapshotBatchSize,
          emergencyConfig: body.emergencyConfig
            ? toEmergencyConfigPatch(body.emergencyConfig)
            : undefined,
        });
        res.status(201).json({ success: true, pool: toJson(stats) });
      } catch (error) {
        sendError(res, error, "Create pool");
      }
    },
  );

  /**
   * PATCH /api/admin/pools/:poolId/config
   */
  router.patch(
    "/:poolId/config",
    requireAdminPermission(AdminPermission.ConfigManager),
    validateRequest(poolConfigSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const body: PoolConfigBody = req.body;
      const patch: PoolConfigPatch = {};
      if (body.minimumDeposit !== undefined) patch.minimumDeposit = parseUFix64(body.minimumDeposit);
      if (body.drawIntervalSeconds !== undefined) patch.drawIntervalSeconds = body.drawIntervalSeconds;
      if (body.snapshotBatchSize !== undefined) patch.snapshotBatchSize = body.snapshotBatchSize;
      try {
        const config = await service.updatePoolConfig(req.params.poolId, actor, patch);
        res.json({ success: true, config: presentConfig(config) });
      } catch (error) {
        sendError(res, error, "Update pool config");
      }
    },
  );

  router.put(
    "/:poolId/distribution-strategy",
    requireAdminPermission(AdminPermission.ConfigManager),
    validateRequest(distributionStrategySchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const body: DistributionStrategyBody = req.body;
      try {
        await service.updateDistributionStrategy(
          req.params.poolId,
          actor,
          toDistributionStrategy(body),
        );
        res.json({ success: true, message: "Distribution strategy updated" });
      } catch (error) {
        sendError(res, error, "Update distribution strategy");
      }
    },
  );

  router.put(
    "/:poolId/selection-strategy",
    requireAdminPermission(AdminPermission.ConfigManager),
    validateRequest(selectionStrategySchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const body: SelectionStrategyBody = req.body;
      try {
        await service.updateWinnerSelectionStrategy(
          req.params.poolId,
          actor,
          toSelectionStrategy(body),
        );
        res.json({ success: true, message: "Winner selection strategy updated" });
      } catch (error) {
        sendError(res, error, "Update selection strategy");
      }
    },
  );

  /**
   * POST /api/admin/pools/:poolId/funding
   * Direct funding into savings, the prize pool or the treasury
   */
  router.post(
    "/:poolId/funding",
    requireAdminPermission(AdminPermission.FundingManager),
    validateRequest(fundingSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const { destination, amount, assetId }: FundingBody = req.body;
      try {
        const total = await service.fundDirect(
          req.params.poolId,
          actor,
          destination,
          parseUFix64(amount),
          assetId,
        );
        res.json({ success: true, destination, runningTotal: toJson(total) });
      } catch (error) {
        sendError(res, error, "Direct funding");
      }
    },
  );

  router.put(
    "/:poolId/funding/caps",
    requireAdminPermission(AdminPermission.FundingManager),
    validateRequest(fundingCapSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const { destination, cap }: FundingCapBody = req.body;
      try {
        await service.setFundingCap(
          req.params.poolId,
          actor,
          destination,
          cap === null ? null : parseUFix64(cap),
        );
        res.json({ success: true, destination, cap });
      } catch (error) {
        sendError(res, error, "Set funding cap");
      }
    },
  );

  /**
   * POST /api/admin/pools/:poolId/treasury/withdraw
   */
  router.post(
    "/:poolId/treasury/withdraw",
    requireAdminPermission(AdminPermission.TreasuryManager),
    validateRequest(treasuryWithdrawSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const { amount, purpose }: TreasuryWithdrawBody = req.body;
      try {
        const entry = await service.withdrawTreasury(
          req.params.poolId,
          actor,
          parseUFix64(amount),
          purpose,
        );
        res.json({ success: true, withdrawal: toJson(entry) });
      } catch (error) {
        sendError(res, error, "Treasury withdrawal");
      }
    },
  );

  /**
   * PUT /api/admin/pools/:poolId/bonus
   * A weight of 0 removes the bonus
   */
  router.put(
    "/:poolId/bonus",
    requireAdminPermission(AdminPermission.BonusManager),
    validateRequest(bonusSchema),
    async (req: Request, res: Response) => {
      const actor = adminActor(req, res);
      if (!actor) return;
      const { receiver, weight, reason }: BonusBody = req.body;
      try {
        await service.setBonusWeight(
          req.params.poolId,
          actor,
          receiver,
          parseUFix64(weight),
          reason ?? "",
        );
        res.json({ success: true, receiver, weight });
      } catch (error) {
        sendError(res, error, "Set bonus weight");
      }
    },
  );

  return router;
}
