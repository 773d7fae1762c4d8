import Joi from "joi";
import { Request, Response, NextFunction } from "express";
import type {
  DistributionStrategy,
  EmergencyConfig,
  FundingDestination,
  WinnerSelectionStrategy,
} from "../../types/pool.types.js";
import { isValidUFix64String, parseUFix64 } from "../../utils/ufix64.js";
import { IDENTIFIER_PATTERN } from "../utils/sanitize.js";

/**
 * Validation schemas for pool requests
 * Amounts travel as decimal strings ("10.5") and are parsed after validation
 */

const amountSchema = Joi.string()
  .custom((value: string, helpers) =>
    isValidUFix64String(value) ? value.trim() : helpers.error("amount.invalid"),
  )
  .messages({
    "amount.invalid": "{{#label}} must be a decimal amount with up to 8 fractional digits",
    "string.base": "{{#label}} must be a decimal string",
  });

const identifierSchema = Joi.string().pattern(IDENTIFIER_PATTERN).messages({
  "string.pattern.base": "{{#label}} may only contain letters, digits, dashes and underscores",
});

const reasonField = Joi.string().trim().min(1).max(500).required().messages({
  "any.required": "Reason is required",
  "string.empty": "Reason is required",
});

const destinationSchema = Joi.string().valid("savings", "lottery", "treasury").required().messages({
  "any.only": "Destination must be savings, lottery or treasury",
});

// --- Request bodies ---

export interface DepositBody {
  receiver: string;
  amount: string;
  assetId: string;
}

export interface WithdrawBody {
  receiver: string;
  amount: string;
}

export interface DistributionStrategyBody {
  savings: string;
  lottery: string;
  treasury: string;
}

export type SelectionStrategyBody =
  | { type: "single"; nftIds?: string[] }
  | { type: "split"; splits: string[]; nftIds?: string[][] }
  | {
      type: "fixedTiers";
      tiers: Array<{ name: string; amount: string; count: number; nftIds?: string[] }>;
    };

export interface EmergencyConfigBody {
  maxEmergencyDurationSeconds?: number | null;
  autoRecoveryEnabled?: boolean;
  minYieldSourceHealth?: number;
  maxWithdrawFailures?: number;
  partialModeDepositLimit?: string | null;
  minBalanceThreshold?: number;
  recoveryHealthThreshold?: number;
}

export interface CreatePoolBody {
  poolId: string;
  assetId: string;
  minimumDeposit: string;
  drawIntervalSeconds: number;
  distributionStrategy: DistributionStrategyBody;
  winnerSelectionStrategy: SelectionStrategyBody;
  accumulatorPrecision?: string;
  snapshotBatchSize?: number;
  emergencyConfig?: EmergencyConfigBody;
}

export interface PoolConfigBody {
  minimumDeposit?: string;
  drawIntervalSeconds?: number;
  snapshotBatchSize?: number;
}

export interface FundingBody {
  destination: FundingDestination;
  amount: string;
  assetId: string;
}

export interface FundingCapBody {
  destination: FundingDestination;
  cap: string | null;
}

export interface TreasuryWithdrawBody {
  amount: string;
  purpose: string;
}

export interface BonusBody {
  receiver: string;
  weight: string;
  reason?: string;
}

export interface ReasonBody {
  reason: string;
}

export interface DrawBatchBody {
  limit: number;
}

// --- Schemas ---

export const depositSchema = Joi.object<DepositBody>({
  receiver: identifierSchema.required().messages({ "any.required": "Receiver is required" }),
  amount: amountSchema.required().messages({ "any.required": "Amount is required" }),
  assetId: Joi.string().required().messages({ "any.required": "Asset is required" }),
});

export const withdrawSchema = Joi.object<WithdrawBody>({
  receiver: identifierSchema.required().messages({ "any.required": "Receiver is required" }),
  amount: amountSchema.required().messages({ "any.required": "Amount is required" }),
});

export const distributionStrategySchema = Joi.object<DistributionStrategyBody>({
  savings: amountSchema.required(),
  lottery: amountSchema.required(),
  treasury: amountSchema.required(),
});

export const selectionStrategySchema = Joi.object({
  type: Joi.string().valid("single", "split", "fixedTiers").required().messages({
    "any.only": "Strategy type must be single, split or fixedTiers",
  }),
  nftIds: Joi.when("type", {
    switch: [
      { is: "single", then: Joi.array().items(Joi.string()) },
      { is: "split", then: Joi.array().items(Joi.array().items(Joi.string())) },
    ],
    otherwise: Joi.forbidden(),
  }),
  splits: Joi.when("type", {
    is: "split",
    then: Joi.array().items(amountSchema).min(1).required(),
    otherwise: Joi.forbidden(),
  }),
  tiers: Joi.when("type", {
    is: "fixedTiers",
    then: Joi.array()
      .items(
        Joi.object({
          name: Joi.string().trim().min(1).required(),
          amount: amountSchema.required(),
          count: Joi.number().integer().min(1).required(),
          nftIds: Joi.array().items(Joi.string()),
        }),
      )
      .min(1)
      .required(),
    otherwise: Joi.forbidden(),
  }),
});

export const emergencyConfigSchema = Joi.object<EmergencyConfigBody>({
  maxEmergencyDurationSeconds: Joi.number().integer().min(0).allow(null),
  autoRecoveryEnabled: Joi.boolean(),
  minYieldSourceHealth: Joi.number().min(0).max(1),
  maxWithdrawFailures: Joi.number().integer().min(1),
  partialModeDepositLimit: amountSchema.allow(null),
  minBalanceThreshold: Joi.number().min(0).max(1),
  recoveryHealthThreshold: Joi.number().min(0).max(1),
});

export const createPoolSchema = Joi.object<CreatePoolBody>({
  poolId: identifierSchema.required().messages({ "any.required": "Pool id is required" }),
  assetId: Joi.string().trim().min(1).required(),
  minimumDeposit: amountSchema.required(),
  drawIntervalSeconds: Joi.number().integer().min(0).required(),
  distributionStrategy: distributionStrategySchema.required(),
  winnerSelectionStrategy: selectionStrategySchema.required(),
  accumulatorPrecision: Joi.string().pattern(/^[1-9]\d{0,18}$/).messages({
    "string.pattern.base": "Accumulator precision must be a positive integer",
  }),
  snapshotBatchSize: Joi.number().integer().min(1),
  emergencyConfig: emergencyConfigSchema,
});

export const poolConfigSchema = Joi.object<PoolConfigBody>({
  minimumDeposit: amountSchema,
  drawIntervalSeconds: Joi.number().integer().min(0),
  snapshotBatchSize: Joi.number().integer().min(1),
})
  .min(1)
  .messages({ "object.min": "At least one setting is required" });

export const fundingSchema = Joi.object<FundingBody>({
  destination: destinationSchema,
  amount: amountSchema.required(),
  assetId: Joi.string().required(),
});

export const fundingCapSchema = Joi.object<FundingCapBody>({
  destination: destinationSchema,
  cap: amountSchema.allow(null).required(),
});

export const treasuryWithdrawSchema = Joi.object<TreasuryWithdrawBody>({
  amount: amountSchema.required(),
  purpose: Joi.string().trim().min(1).max(500).required().messages({
    "any.required": "Purpose is required",
    "string.empty": "Purpose is required",
  }),
});

export const bonusSchema = Joi.object<BonusBody>({
  receiver: identifierSchema.required(),
  weight: amountSchema.required(),
  reason: Joi.string().trim().max(500).allow("").default(""),
});

export const reasonSchema = Joi.object<ReasonBody>({ reason: reasonField });

export const drawBatchSchema = Joi.object<DrawBatchBody>({
  limit: Joi.number().integer().min(1).max(100_000).default(500),
});

/**
 * Middleware factory for validating request body against a Joi schema
 */
export const validateRequest = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body ?? {}, {
      abortEarly: false, // Return all errors, not just the first one
      stripUnknown: true, // Remove unknown fields
    });

    if (error) {
      const errors = error.details.map((detail) => ({
        field: detail.path.join("."),
        message: detail.message,
      }));

      res.status(400).json({
        success: false,
        error: "Validation Error",
        message: "Invalid request data",
        errors,
      });
      return;
    }

    // Replace request body with validated and sanitized value
    req.body = value;
    next();
  };
};

// --- Body to domain ---

export function toDistributionStrategy(body: DistributionStrategyBody): DistributionStrategy {
  return {
    type: "fixedPercentage",
    savings: parseUFix64(body.savings),
    lottery: parseUFix64(body.lottery),
    treasury: parseUFix64(body.treasury),
  };
}

export function toSelectionStrategy(body: SelectionStrategyBody): WinnerSelectionStrategy {
  switch (body.type) {
    case "single":
      return { type: "single", nftIds: body.nftIds };
    case "split":
      return { type: "split", splits: body.splits.map(parseUFix64), nftIds: body.nftIds };
    case "fixedTiers":
      return {
        type: "fixedTiers",
        tiers: body.tiers.map((tier) => ({
          name: tier.name,
          amount: parseUFix64(tier.amount),
          count: tier.count,
          nftIds: tier.nftIds,
        })),
      };
  }
}

export function toEmergencyConfigPatch(body: EmergencyConfigBody): Partial<EmergencyConfig> {
  const { partialModeDepositLimit, ...rest } = body;
  const patch: Partial<EmergencyConfig> = { ...rest };
  if (partialModeDepositLimit !== undefined) {
    patch.partialModeDepositLimit =
      partialModeDepositLimit === null ? null : parseUFix64(partialModeDepositLimit);
  }
  return patch;
}

/**
 * Middleware for validating deposit requests
 */
export const validateDeposit = validateRequest(depositSchema);

/**
 * Middleware for validating withdrawal requests
 */
export const validateWithdraw = validateRequest(withdrawSchema);
