/**
 * Pool state factory
 */

import type {
  DistributionStrategy,
  EmergencyConfig,
  FundingDestination,
  PoolState,
  WinnerSelectionStrategy,
} from "../../types/pool.types.js";
import { ZERO, type UFix64 } from "../../utils/ufix64.js";
import {
  createEmergencyStatus,
  DEFAULT_EMERGENCY_CONFIG,
} from "../emergency/emergencyController.js";
import {
  createAccumulatorState,
  DEFAULT_ACCUMULATOR_PRECISION,
} from "../savings/savingsAccumulator.js";
import { createFundingPolicyState } from "../treasury/fundingPolicy.js";
import { createTreasuryState } from "../treasury/treasuryLedger.js";
import { validateEmergencyConfig, validatePoolConfig } from "./prizeSavingsPool.js";

export const DEFAULT_SNAPSHOT_BATCH_SIZE = 1000;

export interface CreatePoolInput {
  poolId: string;
  assetId: string;
  minimumDeposit: UFix64;
  drawIntervalSeconds: number;
  distributionStrategy: DistributionStrategy;
  winnerSelectionStrategy: WinnerSelectionStrategy;
  accumulatorPrecision?: bigint;
  snapshotBatchSize?: number;
  emergencyConfig?: Partial<EmergencyConfig>;
  fundingCaps?: Partial<Record<FundingDestination, UFix64 | null>>;
}

export function createPoolState(input: CreatePoolInput, now: number): PoolState {
  const precision = input.accumulatorPrecision ?? DEFAULT_ACCUMULATOR_PRECISION;
  const config = {
    assetId: input.assetId,
    minimumDeposit: input.minimumDeposit,
    drawIntervalSeconds: input.drawIntervalSeconds,
    distributionStrategy: input.distributionStrategy,
    winnerSelectionStrategy: input.winnerSelectionStrategy,
    accumulatorPrecision: precision,
    snapshotBatchSize: input.snapshotBatchSize ?? DEFAULT_SNAPSHOT_BATCH_SIZE,
  };
  validatePoolConfig(config);

  const emergencyConfig: EmergencyConfig = {
    ...DEFAULT_EMERGENCY_CONFIG,
    ...input.emergencyConfig,
  };
  validateEmergencyConfig(emergencyConfig);

  return {
    poolId: input.poolId,
    config,
    emergencyConfig,
    emergency: createEmergencyStatus(),
    totalDeposited: ZERO,
    totalStaked: ZERO,
    liquidBuffer: ZERO,
    pendingSavings: ZERO,
    prizePool: ZERO,
    totalShares: ZERO,
    lastDrawTimestamp: now,
    currentRound: 1,
    accounts: new Map(),
    bonusWeights: new Map(),
    pendingAuxiliaryPrizes: new Map(),
    accumulator: createAccumulatorState(precision),
    treasury: createTreasuryState(),
    fundingPolicy: createFundingPolicyState(input.fundingCaps),
    drawReceipt: null,
    createdAt: now,
  };
}
