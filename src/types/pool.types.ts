/**
 * Prize Savings Pool Types
 * Domain types shared by the accounting, draw and emergency services
 */

import type { UFix64 } from "../utils/ufix64.js";

export type ReceiverId = string;

// --- Strategies ---

/**
 * How harvested yield is split. Shares are UFix64 fractions summing to exactly 1.0
 */
export type DistributionStrategy = {
  type: "fixedPercentage";
  savings: UFix64;
  lottery: UFix64;
  treasury: UFix64;
};

export interface PrizeTier {
  name: string;
  amount: UFix64;
  count: number;
  nftIds?: string[];
}

export type WinnerSelectionStrategy =
  | { type: "single"; nftIds?: string[] }
  | { type: "split"; splits: UFix64[]; nftIds?: string[][] }
  | { type: "fixedTiers"; tiers: PrizeTier[] };

export interface YieldDistribution {
  savings: UFix64;
  lottery: UFix64;
  treasury: UFix64;
}

// --- Configuration ---

export interface PoolConfig {
  assetId: string;
  minimumDeposit: UFix64;
  drawIntervalSeconds: number;
  distributionStrategy: DistributionStrategy;
  winnerSelectionStrategy: WinnerSelectionStrategy;
  /** Fixed-point multiplier applied to interest-per-share */
  accumulatorPrecision: bigint;
  /** Populations above this size are captured through processDrawBatch */
  snapshotBatchSize: number;
}

export type EmergencyState =
  | "Normal"
  | "Paused"
  | "EmergencyMode"
  | "PartialMode";

export interface EmergencyConfig {
  maxEmergencyDurationSeconds: number | null;
  autoRecoveryEnabled: boolean;
  /** Health score in [0, 1] below which Normal auto-triggers EmergencyMode */
  minYieldSourceHealth: number;
  maxWithdrawFailures: number;
  partialModeDepositLimit: UFix64 | null;
  /** Fraction of totalStaked the connector must report as available */
  minBalanceThreshold: number;
  recoveryHealthThreshold: number;
}

// --- Accounts ---

export interface AccountRecord {
  deposit: UFix64;
  /** Accumulator-scaled integer, not an amount; may exceed the UFix64 range */
  claimedBaseline: bigint;
  totalEarnedSavings: UFix64;
  totalEarnedPrizes: UFix64;
  createdAt: number;
  lastActivityAt: number;
}

export interface BonusWeight {
  weight: UFix64;
  reason: string;
  updatedAt: number;
}

export interface AccumulatorState {
  accumulatedInterestPerShare: UFix64;
  totalDistributed: UFix64;
  precision: bigint;
}

// --- Draws ---

export interface RandomnessRequest {
  requestId: string;
  commitRound: number;
  commitment: string;
}

export interface DrawReceipt {
  round: number;
  prizeAmount: UFix64;
  timeWeightedStakes: Map<ReceiverId, UFix64>;
  pendingReceivers: ReceiverId[];
  /** Accumulator value at startDraw; stakes captured later are priced at it */
  snapshotInterestPerShare: UFix64;
  randomnessRequest: RandomnessRequest;
  startedAt: number;
}

export type DrawPhase =
  | "Idle"
  | "CapturingSnapshot"
  | "PendingRandomness"
  | "ReadyToComplete";

export interface SelectionResult {
  winners: ReceiverId[];
  amounts: UFix64[];
  auxiliaryAssignments: string[][];
  totalAwarded: UFix64;
}

export interface DrawSettlement {
  round: number;
  randomValue: bigint;
  prizeAmount: UFix64;
  winners: ReceiverId[];
  amounts: UFix64[];
  auxiliaryAssignments: string[][];
  rolledOver: UFix64;
}

// --- Treasury & funding ---

export type FundingDestination = "savings" | "lottery" | "treasury";

export interface FundingPolicyState {
  caps: Record<FundingDestination, UFix64 | null>;
  totals: Record<FundingDestination, UFix64>;
}

export interface TreasuryWithdrawal {
  amount: UFix64;
  purpose: string;
  actor: string;
  timestamp: number;
}

export interface TreasuryState {
  balance: UFix64;
  totalCollected: UFix64;
  totalDust: UFix64;
  totalWithdrawn: UFix64;
  history: TreasuryWithdrawal[];
}

// --- Emergency bookkeeping ---

export interface EmergencyStatus {
  state: EmergencyState;
  reason: string | null;
  activatedAt: number | null;
  /** Health-based recovery only undoes automatic triggers */
  triggeredBy: "auto" | "manual" | null;
  consecutiveWithdrawFailures: number;
}

// --- Aggregate ---

export interface PoolState {
  poolId: string;
  config: PoolConfig;
  emergencyConfig: EmergencyConfig;
  emergency: EmergencyStatus;
  totalDeposited: UFix64;
  totalStaked: UFix64;
  liquidBuffer: UFix64;
  pendingSavings: UFix64;
  prizePool: UFix64;
  /** Pool-level shares, for reporting the effective share price */
  totalShares: UFix64;
  lastDrawTimestamp: number;
  currentRound: number;
  accounts: Map<ReceiverId, AccountRecord>;
  bonusWeights: Map<ReceiverId, BonusWeight>;
  pendingAuxiliaryPrizes: Map<ReceiverId, string[]>;
  accumulator: AccumulatorState;
  treasury: TreasuryState;
  fundingPolicy: FundingPolicyState;
  drawReceipt: DrawReceipt | null;
  createdAt: number;
}

// --- Operation results ---

export type WithdrawalResult =
  | {
      status: "completed";
      amount: UFix64;
      fromConnector: UFix64;
      fromBuffer: UFix64;
    }
  | {
      status: "failed";
      requested: UFix64;
      available: UFix64;
      consecutiveFailures: number;
    };

export interface RewardProcessingResult {
  harvested: UFix64;
  distribution: YieldDistribution;
  compounded: UFix64;
  dust: UFix64;
  compoundingSkipped: boolean;
}

// --- Admin ---

export enum AdminPermission {
  ConfigManager = "config_manager",
  EmergencyOperator = "emergency_operator",
  FundingManager = "funding_manager",
  TreasuryManager = "treasury_manager",
  DrawOperator = "draw_operator",
  BonusManager = "bonus_manager",
}

export interface AdminActor {
  id: string;
  permissions: ReadonlySet<AdminPermission>;
}
