/**
 * Pool snapshot serialization
 * The persisted document is plain JSON: UFix64 values as decimal strings,
 * maps as entry arrays. Documents are validated with joi on the way back in.
 */

import Joi from "joi";
import type {
  AccountRecord,
  BonusWeight,
  DistributionStrategy,
  DrawReceipt,
  EmergencyConfig,
  EmergencyStatus,
  FundingDestination,
  PoolState,
  TreasuryWithdrawal,
  WinnerSelectionStrategy,
} from "../../types/pool.types.js";
import { formatUFix64, parseUFix64, type UFix64 } from "../../utils/ufix64.js";

export const POOL_DOCUMENT_VERSION = 1;

type Amount = string;

interface AccountDocument {
  deposit: Amount;
  /** Raw accumulator-scaled integer; it can exceed the UFix64 range */
  claimedBaseline: string;
  totalEarnedSavings: Amount;
  totalEarnedPrizes: Amount;
  createdAt: number;
  lastActivityAt: number;
}

type SelectionDocument =
  | { type: "single"; nftIds?: string[] }
  | { type: "split"; splits: Amount[]; nftIds?: string[][] }
  | {
      type: "fixedTiers";
      tiers: Array<{ name: string; amount: Amount; count: number; nftIds?: string[] }>;
    };

export interface PoolDocument {
  version: number;
  poolId: string;
  config: {
    assetId: string;
    minimumDeposit: Amount;
    drawIntervalSeconds: number;
    distributionStrategy: {
      type: "fixedPercentage";
      savings: Amount;
      lottery: Amount;
      treasury: Amount;
    };
    winnerSelectionStrategy: SelectionDocument;
    accumulatorPrecision: string;
    snapshotBatchSize: number;
  };
  emergencyConfig: Omit<EmergencyConfig, "partialModeDepositLimit"> & {
    partialModeDepositLimit: Amount | null;
  };
  emergency: EmergencyStatus;
  totalDeposited: Amount;
  totalStaked: Amount;
  liquidBuffer: Amount;
  pendingSavings: Amount;
  prizePool: Amount;
  totalShares: Amount;
  lastDrawTimestamp: number;
  currentRound: number;
  accounts: Array<[string, AccountDocument]>;
  bonusWeights: Array<[string, { weight: Amount; reason: string; updatedAt: number }]>;
  pendingAuxiliaryPrizes: Array<[string, string[]]>;
  accumulator: {
    accumulatedInterestPerShare: Amount;
    totalDistributed: Amount;
    precision: string;
  };
  treasury: {
    balance: Amount;
    totalCollected: Amount;
    totalDust: Amount;
    totalWithdrawn: Amount;
    history: Array<{ amount: Amount; purpose: string; actor: string; timestamp: number }>;
  };
  fundingPolicy: {
    caps: Record<FundingDestination, Amount | null>;
    totals: Record<FundingDestination, Amount>;
  };
  drawReceipt: {
    round: number;
    prizeAmount: Amount;
    timeWeightedStakes: Array<[string, Amount]>;
    pendingReceivers: string[];
    snapshotInterestPerShare: Amount;
    randomnessRequest: { requestId: string; commitRound: number; commitment: string };
    startedAt: number;
  } | null;
  createdAt: number;
}

// --- Schema ---

const amount = Joi.string().pattern(/^\d+\.\d{1,8}$/).required();
const integerString = Joi.string().pattern(/^[1-9]\d*$/).required();
const rawInteger = Joi.string().pattern(/^\d+$/).required();
const timestamp = Joi.number().integer().min(0).required();
const nullableAmount = Joi.string().pattern(/^\d+\.\d{1,8}$/).allow(null).required();

const entry = (value: Joi.Schema) =>
  Joi.array().ordered(Joi.string().required(), value.required()).length(2);

const selectionSchema = Joi.alternatives().try(
  Joi.object({
    type: Joi.string().valid("single").required(),
    nftIds: Joi.array().items(Joi.string()),
  }),
  Joi.object({
    type: Joi.string().valid("split").required(),
    splits: Joi.array().items(amount).min(1).required(),
    nftIds: Joi.array().items(Joi.array().items(Joi.string())),
  }),
  Joi.object({
    type: Joi.string().valid("fixedTiers").required(),
    tiers: Joi.array()
      .items(
        Joi.object({
          name: Joi.string().required(),
          amount,
          count: Joi.number().integer().min(1).required(),
          nftIds: Joi.array().items(Joi.string()),
        }),
      )
      .min(1)
      .required(),
  }),
);

const destinations = (value: Joi.Schema) =>
  Joi.object({ savings: value, lottery: value, treasury: value }).required();

export const poolDocumentSchema = Joi.object<PoolDocument>({
  version: Joi.number().valid(POOL_DOCUMENT_VERSION).required(),
  poolId: Joi.string().required(),
  config: Joi.object({
    assetId: Joi.string().required(),
    minimumDeposit: amount,
    drawIntervalSeconds: timestamp,
    distributionStrategy: Joi.object({
      type: Joi.string().valid("fixedPercentage").required(),
      savings: amount,
      lottery: amount,
      treasury: amount,
    }).required(),
    winnerSelectionStrategy: selectionSchema.required(),
    accumulatorPrecision: integerString,
    snapshotBatchSize: Joi.number().integer().min(1).required(),
  }).required(),
  emergencyConfig: Joi.object({
    maxEmergencyDurationSeconds: Joi.number().integer().min(0).allow(null).required(),
    autoRecoveryEnabled: Joi.boolean().required(),
    minYieldSourceHealth: Joi.number().min(0).max(1).required(),
    maxWithdrawFailures: Joi.number().integer().min(1).required(),
    partialModeDepositLimit: nullableAmount,
    minBalanceThreshold: Joi.number().min(0).max(1).required(),
    recoveryHealthThreshold: Joi.number().min(0).max(1).required(),
  }).required(),
  emergency: Joi.object({
    state: Joi.string().valid("Normal", "Paused", "EmergencyMode", "PartialMode").required(),
    reason: Joi.string().allow(null).required(),
    activatedAt: Joi.number().integer().allow(null).required(),
    triggeredBy: Joi.string().valid("auto", "manual").allow(null).required(),
    consecutiveWithdrawFailures: Joi.number().integer().min(0).required(),
  }).required(),
  totalDeposited: amount,
  totalStaked: amount,
  liquidBuffer: amount,
  pendingSavings: amount,
  prizePool: amount,
  totalShares: amount,
  lastDrawTimestamp: timestamp,
  currentRound: Joi.number().integer().min(1).required(),
  accounts: Joi.array()
    .items(
      entry(
        Joi.object({
          deposit: amount,
          claimedBaseline: rawInteger,
          totalEarnedSavings: amount,
          totalEarnedPrizes: amount,
          createdAt: timestamp,
          lastActivityAt: timestamp,
        }),
      ),
    )
    .required(),
  bonusWeights: Joi.array()
    .items(entry(Joi.object({ weight: amount, reason: Joi.string().required(), updatedAt: timestamp })))
    .required(),
  pendingAuxiliaryPrizes: Joi.array().items(entry(Joi.array().items(Joi.string()))).required(),
  accumulator: Joi.object({
    accumulatedInterestPerShare: amount,
    totalDistributed: amount,
    precision: integerString,
  }).required(),
  treasury: Joi.object({
    balance: amount,
    totalCollected: amount,
    totalDust: amount,
    totalWithdrawn: amount,
    history: Joi.array()
      .items(
        Joi.object({
          amount,
          purpose: Joi.string().required(),
          actor: Joi.string().required(),
          timestamp,
        }),
      )
      .required(),
  }).required(),
  fundingPolicy: Joi.object({
    caps: destinations(nullableAmount),
    totals: destinations(amount),
  }).required(),
  drawReceipt: Joi.object({
    round: Joi.number().integer().min(1).required(),
    prizeAmount: amount,
    timeWeightedStakes: Joi.array().items(entry(amount)).required(),
    pendingReceivers: Joi.array().items(Joi.string()).required(),
    snapshotInterestPerShare: amount,
    randomnessRequest: Joi.object({
      requestId: Joi.string().required(),
      commitRound: Joi.number().integer().min(0).required(),
      commitment: Joi.string().required(),
    }).required(),
    startedAt: timestamp,
  })
    .allow(null)
    .required(),
  createdAt: timestamp,
});

// --- Conversions ---

const nullableFormat = (value: UFix64 | null): Amount | null =>
  value === null ? null : formatUFix64(value);
const nullableParse = (value: Amount | null): UFix64 | null =>
  value === null ? null : parseUFix64(value);

function selectionToDocument(strategy: WinnerSelectionStrategy): SelectionDocument {
  switch (strategy.type) {
    case "single":
      return { ...strategy };
    case "split":
      return { ...strategy, splits: strategy.splits.map(formatUFix64) };
    case "fixedTiers":
      return {
        type: "fixedTiers",
        tiers: strategy.tiers.map((tier) => ({ ...tier, amount: formatUFix64(tier.amount) })),
      };
  }
}

function selectionFromDocument(document: SelectionDocument): WinnerSelectionStrategy {
  switch (document.type) {
    case "single":
      return { ...document };
    case "split":
      return { ...document, splits: document.splits.map(parseUFix64) };
    case "fixedTiers":
      return {
        type: "fixedTiers",
        tiers: document.tiers.map((tier) => ({ ...tier, amount: parseUFix64(tier.amount) })),
      };
  }
}

function distributionFromDocument(
  document: PoolDocument["config"]["distributionStrategy"],
): DistributionStrategy {
  return {
    type: document.type,
    savings: parseUFix64(document.savings),
    lottery: parseUFix64(document.lottery),
    treasury: parseUFix64(document.treasury),
  };
}

export function toDocument(state: PoolState): PoolDocument {
  const { config, emergencyConfig, treasury, fundingPolicy, drawReceipt } = state;
  return {
    version: POOL_DOCUMENT_VERSION,
    poolId: state.poolId,
    config: {
      assetId: config.assetId,
      minimumDeposit: formatUFix64(config.minimumDeposit),
      drawIntervalSeconds: config.drawIntervalSeconds,
      distributionStrategy: {
        type: config.distributionStrategy.type,
        savings: formatUFix64(config.distributionStrategy.savings),
        lottery: formatUFix64(config.distributionStrategy.lottery),
        treasury: formatUFix64(config.distributionStrategy.treasury),
      },
      winnerSelectionStrategy: selectionToDocument(config.winnerSelectionStrategy),
      accumulatorPrecision: config.accumulatorPrecision.toString(),
      snapshotBatchSize: config.snapshotBatchSize,
    },
    emergencyConfig: {
      ...emergencyConfig,
      partialModeDepositLimit: nullableFormat(emergencyConfig.partialModeDepositLimit),
    },
    emergency: { ...state.emergency },
    totalDeposited: formatUFix64(state.totalDeposited),
    totalStaked: formatUFix64(state.totalStaked),
    liquidBuffer: formatUFix64(state.liquidBuffer),
    pendingSavings: formatUFix64(state.pendingSavings),
    prizePool: formatUFix64(state.prizePool),
    totalShares: formatUFix64(state.totalShares),
    lastDrawTimestamp: state.lastDrawTimestamp,
    currentRound: state.currentRound,
    accounts: [...state.accounts.entries()].map(([receiver, account]) => [
      receiver,
      {
        deposit: formatUFix64(account.deposit),
        claimedBaseline: account.claimedBaseline.toString(),
        totalEarnedSavings: formatUFix64(account.totalEarnedSavings),
        totalEarnedPrizes: formatUFix64(account.totalEarnedPrizes),
        createdAt: account.createdAt,
        lastActivityAt: account.lastActivityAt,
      },
    ]),
    bonusWeights: [...state.bonusWeights.entries()].map(([receiver, bonus]) => [
      receiver,
      { weight: formatUFix64(bonus.weight), reason: bonus.reason, updatedAt: bonus.updatedAt },
    ]),
    pendingAuxiliaryPrizes: [...state.pendingAuxiliaryPrizes.entries()].map(
      ([receiver, ids]) => [receiver, [...ids]],
    ),
    accumulator: {
      accumulatedInterestPerShare: formatUFix64(state.accumulator.accumulatedInterestPerShare),
      totalDistributed: formatUFix64(state.accumulator.totalDistributed),
      precision: state.accumulator.precision.toString(),
    },
    treasury: {
      balance: formatUFix64(treasury.balance),
      totalCollected: formatUFix64(treasury.totalCollected),
      totalDust: formatUFix64(treasury.totalDust),
      totalWithdrawn: formatUFix64(treasury.totalWithdrawn),
      history: treasury.history.map((withdrawal) => ({
        ...withdrawal,
        amount: formatUFix64(withdrawal.amount),
      })),
    },
    fundingPolicy: {
      caps: {
        savings: nullableFormat(fundingPolicy.caps.savings),
        lottery: nullableFormat(fundingPolicy.caps.lottery),
        treasury: nullableFormat(fundingPolicy.caps.treasury),
      },
      totals: {
        savings: formatUFix64(fundingPolicy.totals.savings),
        lottery: formatUFix64(fundingPolicy.totals.lottery),
        treasury: formatUFix64(fundingPolicy.totals.treasury),
      },
    },
    drawReceipt: drawReceipt
      ? {
          round: drawReceipt.round,
          prizeAmount: formatUFix64(drawReceipt.prizeAmount),
          timeWeightedStakes: [...drawReceipt.timeWeightedStakes.entries()].map(
            ([receiver, stake]) => [receiver, formatUFix64(stake)],
          ),
          pendingReceivers: [...drawReceipt.pendingReceivers],
          snapshotInterestPerShare: formatUFix64(drawReceipt.snapshotInterestPerShare),
          randomnessRequest: { ...drawReceipt.randomnessRequest },
          startedAt: drawReceipt.startedAt,
        }
      : null,
    createdAt: state.createdAt,
  };
}

export function fromDocument(document: PoolDocument): PoolState {
  const { config, emergencyConfig, treasury, fundingPolicy, drawReceipt } = document;

  const accounts = new Map<string, AccountRecord>(
    document.accounts.map(([receiver, account]) => [
      receiver,
      {
        deposit: parseUFix64(account.deposit),
        claimedBaseline: BigInt(account.claimedBaseline),
        totalEarnedSavings: parseUFix64(account.totalEarnedSavings),
        totalEarnedPrizes: parseUFix64(account.totalEarnedPrizes),
        createdAt: account.createdAt,
        lastActivityAt: account.lastActivityAt,
      },
    ]),
  );
  const bonusWeights = new Map<string, BonusWeight>(
    document.bonusWeights.map(([receiver, bonus]) => [
      receiver,
      { weight: parseUFix64(bonus.weight), reason: bonus.reason, updatedAt: bonus.updatedAt },
    ]),
  );
  const history: TreasuryWithdrawal[] = treasury.history.map((withdrawal) =>
    Object.freeze({ ...withdrawal, amount: parseUFix64(withdrawal.amount) }),
  );
  const receipt: DrawReceipt | null = drawReceipt
    ? {
        round: drawReceipt.round,
        prizeAmount: parseUFix64(drawReceipt.prizeAmount),
        timeWeightedStakes: new Map(
          drawReceipt.timeWeightedStakes.map(([receiver, stake]) => [
            receiver,
            parseUFix64(stake),
          ]),
        ),
        pendingReceivers: [...drawReceipt.pendingReceivers],
        snapshotInterestPerShare: parseUFix64(drawReceipt.snapshotInterestPerShare),
        randomnessRequest: { ...drawReceipt.randomnessRequest },
        startedAt: drawReceipt.startedAt,
      }
    : null;

  return {
    poolId: document.poolId,
    config: {
      assetId: config.assetId,
      minimumDeposit: parseUFix64(config.minimumDeposit),
      drawIntervalSeconds: config.drawIntervalSeconds,
      distributionStrategy: distributionFromDocument(config.distributionStrategy),
      winnerSelectionStrategy: selectionFromDocument(config.winnerSelectionStrategy),
      accumulatorPrecision: BigInt(config.accumulatorPrecision),
      snapshotBatchSize: config.snapshotBatchSize,
    },
    emergencyConfig: {
      ...emergencyConfig,
      partialModeDepositLimit: nullableParse(emergencyConfig.partialModeDepositLimit),
    },
    emergency: { ...document.emergency },
    totalDeposited: parseUFix64(document.totalDeposited),
    totalStaked: parseUFix64(document.totalStaked),
    liquidBuffer: parseUFix64(document.liquidBuffer),
    pendingSavings: parseUFix64(document.pendingSavings),
    prizePool: parseUFix64(document.prizePool),
    totalShares: parseUFix64(document.totalShares),
    lastDrawTimestamp: document.lastDrawTimestamp,
    currentRound: document.currentRound,
    accounts,
    bonusWeights,
    pendingAuxiliaryPrizes: new Map(
      document.pendingAuxiliaryPrizes.map(([receiver, ids]) => [receiver, [...ids]]),
    ),
    accumulator: {
      accumulatedInterestPerShare: parseUFix64(document.accumulator.accumulatedInterestPerShare),
      totalDistributed: parseUFix64(document.accumulator.totalDistributed),
      precision: BigInt(document.accumulator.precision),
    },
    treasury: {
      balance: parseUFix64(treasury.balance),
      totalCollected: parseUFix64(treasury.totalCollected),
      totalDust: parseUFix64(treasury.totalDust),
      totalWithdrawn: parseUFix64(treasury.totalWithdrawn),
      history,
    },
    fundingPolicy: {
      caps: {
        savings: nullableParse(fundingPolicy.caps.savings),
        lottery: nullableParse(fundingPolicy.caps.lottery),
        treasury: nullableParse(fundingPolicy.caps.treasury),
      },
      totals: {
        savings: parseUFix64(fundingPolicy.totals.savings),
        lottery: parseUFix64(fundingPolicy.totals.lottery),
        treasury: parseUFix64(fundingPolicy.totals.treasury),
      },
    },
    drawReceipt: receipt,
    createdAt: document.createdAt,
  };
}

export function serializePoolState(state: PoolState): string {
  return JSON.stringify(toDocument(state));
}

/**
 * Parse and validate a stored document. Throws when the document is malformed.
 */
export function deserializePoolState(json: string): PoolState {
  const parsed: unknown = JSON.parse(json);
  const { error, value } = poolDocumentSchema.validate(parsed, { abortEarly: true });
  if (error) {
    throw new Error(`Stored pool document is invalid: ${error.message}`);
  }
  return fromDocument(value);
}
