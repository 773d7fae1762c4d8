/**
 * Winner Selector
 * Weighted sampling without replacement over the draw snapshot.
 * Receivers are ordered by ID, so the same random value and snapshot always
 * select the same winners.
 */

import type {
  ReceiverId,
  SelectionResult,
  WinnerSelectionStrategy,
} from "../../types/pool.types.js";
import {
  calculateSplitAmounts,
  calculateTierCost,
  calculateTierWinnerCount,
} from "../../utils/distributionCalculations.js";
import { sum, ZERO, type UFix64 } from "../../utils/ufix64.js";
import { Xorshift128Plus } from "./randomGenerator.js";

interface Candidate {
  receiver: ReceiverId;
  weight: UFix64;
}

function emptyResult(): SelectionResult {
  return { winners: [], amounts: [], auxiliaryAssignments: [], totalAwarded: ZERO };
}

export function orderedCandidates(weights: Map<ReceiverId, UFix64>): Candidate[] {
  return [...weights.entries()]
    .map(([receiver, weight]) => ({ receiver, weight }))
    .sort((a, b) => (a.receiver < b.receiver ? -1 : a.receiver > b.receiver ? 1 : 0));
}

/**
 * Index of the first cumulative weight strictly greater than `target`
 */
export function findCumulativeIndex(cumulative: bigint[], target: bigint): number {
  let low = 0;
  let high = cumulative.length - 1;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (cumulative[mid] > target) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return low;
}

/**
 * Pick `count` distinct receivers, each with probability proportional to its
 * weight among those not yet picked. The generator is created only when a
 * pick actually needs randomness.
 */
export function sampleWithoutReplacement(
  randomValue: bigint,
  candidates: Candidate[],
  count: number,
): ReceiverId[] {
  const remaining = [...candidates];
  const picked: ReceiverId[] = [];
  let rng: Xorshift128Plus | null = null;

  while (picked.length < count && remaining.length > 0) {
    const cumulative: bigint[] = [];
    let running = 0n;
    for (const candidate of remaining) {
      running += candidate.weight;
      cumulative.push(running);
    }

    let index = 0;
    if (remaining.length > 1 && running > 0n) {
      rng ??= Xorshift128Plus.fromValue(randomValue);
      index = findCumulativeIndex(cumulative, rng.nextBelow(running));
    }

    picked.push(remaining[index].receiver);
    remaining.splice(index, 1);
  }

  return picked;
}

export class WinnerSelector {
  constructor(private readonly strategy: WinnerSelectionStrategy) {}

  selectWinners(
    randomValue: bigint,
    weights: Map<ReceiverId, UFix64>,
    totalPrize: UFix64,
  ): SelectionResult {
    const candidates = orderedCandidates(weights);
    if (candidates.length === 0) {
      return emptyResult();
    }

    switch (this.strategy.type) {
      case "single": {
        const [winner] = sampleWithoutReplacement(randomValue, candidates, 1);
        return {
          winners: [winner],
          amounts: [totalPrize],
          auxiliaryAssignments: [[...(this.strategy.nftIds ?? [])]],
          totalAwarded: totalPrize,
        };
      }

      case "split": {
        const { splits, nftIds } = this.strategy;
        const winners = sampleWithoutReplacement(
          randomValue,
          candidates,
          Math.min(splits.length, candidates.length),
        );
        const amounts = calculateSplitAmounts(totalPrize, splits, winners.length);
        return {
          winners,
          amounts,
          auxiliaryAssignments: winners.map((_, i) => [...(nftIds?.[i] ?? [])]),
          totalAwarded: sum(amounts),
        };
      }

      case "fixedTiers": {
        const { tiers } = this.strategy;
        const cost = calculateTierCost(tiers);
        const winnerCount = calculateTierWinnerCount(tiers);
        // Not enough prize or receivers: everything rolls over
        if (totalPrize < cost || candidates.length < winnerCount) {
          return emptyResult();
        }

        const winners = sampleWithoutReplacement(randomValue, candidates, winnerCount);
        const amounts: UFix64[] = [];
        const auxiliaryAssignments: string[][] = [];
        for (const tier of tiers) {
          for (let j = 0; j < tier.count; j++) {
            amounts.push(tier.amount);
            const nftId = tier.nftIds?.[j];
            auxiliaryAssignments.push(nftId === undefined ? [] : [nftId]);
          }
        }
        return { winners, amounts, auxiliaryAssignments, totalAwarded: cost };
      }
    }
  }
}
