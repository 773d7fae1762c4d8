import { Router, Request, Response, RequestHandler } from "express";
import { transactionLimiter } from "../../lib/middleware/rateLimiter.js";
import {
  validateDeposit,
  validateWithdraw,
  type DepositBody,
  type WithdrawBody,
} from "../../lib/middleware/validation.js";
import { isValidIdentifier } from "../../lib/utils/sanitize.js";
import type { PoolService } from "../../services/pool/poolService.js";
import { isValidUFix64String, parseUFix64 } from "../../utils/ufix64.js";
import { sendError, toJson } from "../respond.js";

export interface PoolRouterOptions {
  rateLimit: boolean;
}

/**
 * Depositor-facing pool routes
 */
export function createPoolsRouter(
  service: PoolService,
  options: PoolRouterOptions = { rateLimit: true },
): Router {
  const router = Router();
  const limitTransactions: RequestHandler = options.rateLimit
    ? transactionLimiter
    : (_req, _res, next) => next();

  router.param("poolId", (req, res, next, poolId: string) => {
    if (!isValidIdentifier(poolId)) {
      res.status(400).json({ success: false, error: "Invalid pool id" });
      return;
    }
    next();
  });

  /**
   * GET /api/pools
   */
  router.get("/", async (_req: Request, res: Response) => {
    try {
      res.json({ success: true, pools: await service.listPools() });
    } catch (error) {
      sendError(res, error, "List pools");
    }
  });

  /**
   * GET /api/pools/:poolId
   * Pool balances, current round and emergency state
   */
  router.get("/:poolId", async (req: Request, res: Response) => {
    try {
      const stats = await service.getPoolStats(req.params.poolId);
      res.json({ success: true, pool: toJson(stats) });
    } catch (error) {
      sendError(res, error, "Pool stats");
    }
  });

  router.get("/:poolId/share-price", async (req: Request, res: Response) => {
    try {
      const price = await service.getSharePrice(req.params.poolId);
      res.json({ success: true, sharePrice: toJson(price) });
    } catch (error) {
      sendError(res, error, "Share price");
    }
  });

  router.get("/:poolId/accounts/:receiver", async (req: Request, res: Response) => {
    try {
      const account = await service.getAccount(req.params.poolId, req.params.receiver);
      res.json({ success: true, account: toJson(account) });
    } catch (error) {
      sendError(res, error, "Account");
    }
  });

  /**
   * GET /api/pools/:poolId/preview-deposit?receiver=&amount=&assetId=
   */
  router.get("/:poolId/preview-deposit", async (req: Request, res: Response) => {
    const { receiver, amount, assetId } = req.query;
    if (
      typeof receiver !== "string" ||
      typeof amount !== "string" ||
      typeof assetId !== "string" ||
      !isValidIdentifier(receiver) ||
      !isValidUFix64String(amount)
    ) {
      res.status(400).json({
        success: false,
        error: "Validation Error",
        message: "receiver, amount and assetId query parameters are required",
      });
      return;
    }
    try {
      const preview = await service.previewDeposit(
        req.params.poolId,
        receiver,
        parseUFix64(amount),
        assetId,
      );
      res.json({ success: true, preview: toJson(preview) });
    } catch (error) {
      sendError(res, error, "Preview deposit");
    }
  });

  /**
   * POST /api/pools/:poolId/deposit
   */
  router.post(
    "/:poolId/deposit",
    limitTransactions,
    validateDeposit,
    async (req: Request, res: Response) => {
      const { receiver, amount, assetId }: DepositBody = req.body;
      try {
        const result = await service.deposit(
          req.params.poolId,
          receiver,
          parseUFix64(amount),
          assetId,
        );
        res.json({ success: true, deposit: toJson(result) });
      } catch (error) {
        sendError(res, error, "Deposit");
      }
    },
  );

  /**
   * POST /api/pools/:poolId/withdraw
   * A withdrawal the pool cannot cover answers 503 with the failure details
   */
  router.post(
    "/:poolId/withdraw",
    limitTransactions,
    validateWithdraw,
    async (req: Request, res: Response) => {
      const { receiver, amount }: WithdrawBody = req.body;
      try {
        const result = await service.withdraw(req.params.poolId, receiver, parseUFix64(amount));
        if (result.status === "failed") {
          res.status(503).json({
            success: false,
            error: "Insufficient liquidity",
            withdrawal: toJson(result),
          });
          return;
        }
        res.json({ success: true, withdrawal: toJson(result) });
      } catch (error) {
        sendError(res, error, "Withdraw");
      }
    },
  );

  /**
   * POST /api/pools/:poolId/process-rewards
   * Anyone may trigger a harvest
   */
  router.post("/:poolId/process-rewards", limitTransactions, async (req: Request, res: Response) => {
    try {
      const result = await service.processRewards(req.params.poolId);
      res.json({ success: true, rewards: toJson(result) });
    } catch (error) {
      sendError(res, error, "Process rewards");
    }
  });

  router.get("/:poolId/draw", async (req: Request, res: Response) => {
    try {
      const status = await service.getDrawStatus(req.params.poolId);
      res.json({ success: true, draw: toJson(status) });
    } catch (error) {
      sendError(res, error, "Draw status");
    }
  });

  /**
   * GET /api/pools/:poolId/winners?receiver=&limit=
   */
  router.get("/:poolId/winners", async (req: Request, res: Response) => {
    const receiver = typeof req.query.receiver === "string" ? req.query.receiver : undefined;
    const limitParam = typeof req.query.limit === "string" ? parseInt(req.query.limit, 10) : 50;
    const maxResults = Number.isNaN(limitParam) ? 50 : Math.min(Math.max(limitParam, 1), 500);
    try {
      const winners = await service.getWinners(req.params.poolId, { receiver, limit: maxResults });
      res.json({ success: true, winners: toJson(winners) });
    } catch (error) {
      sendError(res, error, "Winners");
    }
  });

  router.get("/:poolId/emergency", async (req: Request, res: Response) => {
    try {
      const info = await service.getEmergencyInfo(req.params.poolId);
      res.json({ success: true, emergency: toJson(info) });
    } catch (error) {
      sendError(res, error, "Emergency info");
    }
  });

  router.get("/:poolId/treasury", async (req: Request, res: Response) => {
    try {
      const stats = await service.getTreasuryStats(req.params.poolId);
      res.json({ success: true, treasury: toJson(stats) });
    } catch (error) {
      sendError(res, error, "Treasury stats");
    }
  });

  router.get("/:poolId/conservation", async (req: Request, res: Response) => {
    try {
      const report = await service.getConservationReport(req.params.poolId);
      res.json({ success: true, conservation: toJson(report) });
    } catch (error) {
      sendError(res, error, "Conservation report");
    }
  });

  return router;
}
