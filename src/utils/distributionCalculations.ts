/**
 * Distribution Calculations
 * Implements the exact financial model for splitting yield and prizes
 */

import { PolicyViolationError, PreconditionError } from "../lib/errors.js";
import type {
  DistributionStrategy,
  PrizeTier,
  WinnerSelectionStrategy,
  YieldDistribution,
} from "../types/pool.types.js";
import {
  add,
  mul,
  ONE,
  sub,
  sum,
  UFIX64_SCALE,
  ZERO,
  type UFix64,
} from "./ufix64.js";

/**
 * Largest tolerated drift between the last split winner's remainder and
 * its nominal share, as a fraction of the nominal share (1%)
 */
export const SPLIT_DEVIATION_TOLERANCE: UFix64 = UFIX64_SCALE / 100n;

/**
 * Split harvested yield according to the distribution strategy.
 * Savings and lottery are truncated; the treasury takes the remainder so
 * the three parts always add up to the input exactly.
 */
export function calculateYieldDistribution(
  amount: UFix64,
  strategy: DistributionStrategy,
): YieldDistribution {
  switch (strategy.type) {
    case "fixedPercentage": {
      const savings = mul(amount, strategy.savings);
      const lottery = mul(amount, strategy.lottery);
      const treasury = sub(sub(amount, savings), lottery);
      return { savings, lottery, treasury };
    }
  }
}

export function validateDistributionStrategy(
  strategy: DistributionStrategy,
): void {
  const total = add(add(strategy.savings, strategy.lottery), strategy.treasury);
  if (total !== ONE) {
    throw new PreconditionError(
      "Distribution shares must sum to exactly 1.0",
    );
  }
}

/**
 * Total cost of awarding every tier in full
 */
export function calculateTierCost(tiers: PrizeTier[]): UFix64 {
  return sum(
    tiers.flatMap((tier) => Array.from({ length: tier.count }, () => tier.amount)),
  );
}

export function calculateTierWinnerCount(tiers: PrizeTier[]): number {
  return tiers.reduce((total, tier) => total + tier.count, 0);
}

/**
 * Prize amounts for a split draw with `winnerCount` filled positions.
 * Positions before the last receive totalPrize × split; the last winner
 * receives whatever remains so the amounts sum to totalPrize exactly.
 */
export function calculateSplitAmounts(
  totalPrize: UFix64,
  splits: UFix64[],
  winnerCount: number,
): UFix64[] {
  if (winnerCount === 0) {
    return [];
  }

  const amounts: UFix64[] = [];
  let allocated = ZERO;
  for (let i = 0; i < winnerCount - 1; i++) {
    const amount = mul(totalPrize, splits[i]);
    amounts.push(amount);
    allocated = add(allocated, amount);
  }
  const remainder = sub(totalPrize, allocated);
  amounts.push(remainder);

  // Deviation is only meaningful when every slot is filled
  if (winnerCount === splits.length) {
    const nominal = mul(totalPrize, splits[winnerCount - 1]);
    const deviation =
      remainder > nominal ? remainder - nominal : nominal - remainder;
    // Truncating each earlier position can leave at most one raw unit behind
    const truncation = BigInt(winnerCount);
    const tolerance = mul(nominal, SPLIT_DEVIATION_TOLERANCE);
    if (deviation > (tolerance > truncation ? tolerance : truncation)) {
      throw new PolicyViolationError(
        `Split remainder deviates from its nominal share by more than 1%`,
      );
    }
  }

  return amounts;
}

export function validateSelectionStrategy(
  strategy: WinnerSelectionStrategy,
): void {
  switch (strategy.type) {
    case "single":
      return;
    case "split": {
      if (strategy.splits.length === 0) {
        throw new PreconditionError("Split strategy needs at least one split");
      }
      if (strategy.splits.some((split) => split === ZERO)) {
        throw new PreconditionError("Split shares must be positive");
      }
      if (sum(strategy.splits) !== ONE) {
        throw new PreconditionError("Split shares must sum to exactly 1.0");
      }
      if (
        strategy.nftIds !== undefined &&
        strategy.nftIds.length > strategy.splits.length
      ) {
        throw new PreconditionError(
          "Split strategy has more prize ID groups than positions",
        );
      }
      return;
    }
    case "fixedTiers": {
      if (strategy.tiers.length === 0) {
        throw new PreconditionError("Tier strategy needs at least one tier");
      }
      for (const tier of strategy.tiers) {
        if (!Number.isInteger(tier.count) || tier.count < 1) {
          throw new PreconditionError(
            `Tier "${tier.name}" must award at least one winner`,
          );
        }
        if (tier.amount === ZERO) {
          throw new PreconditionError(
            `Tier "${tier.name}" must have a positive amount`,
          );
        }
      }
      return;
    }
  }
}
