/**
 * Randomness Provider
 * Commit-reveal randomness bound to a future round. A request commits to a
 * secret in round N; its value exists only once round N + 1 has been reached,
 * so whoever commits cannot know the outcome in advance.
 */

import crypto from "crypto";
import { RandomnessPendingError } from "../../lib/errors.js";
import type { RandomnessRequest } from "../../types/pool.types.js";
import {
  deriveRequestSecret,
  revealValue,
  sha256Hex,
  verifyCommitment,
} from "../draw/randomGenerator.js";

export type FulfillmentResult =
  | { status: "pending"; readyAtRound: number }
  | { status: "ready"; value: bigint };

export interface RandomnessProvider {
  requestRandomness(): RandomnessRequest;
  /** Throws RandomnessPendingError until the request's round is final */
  fulfill(request: RandomnessRequest): bigint;
  tryFulfill(request: RandomnessRequest): FulfillmentResult;
}

export interface RoundClock {
  currentRound(): number;
  /** Unpredictable data published once `round` is reached */
  roundEntropy(round: number): string;
}

/**
 * Round clock advanced by hand
 */
export class ManualRoundClock implements RoundClock {
  constructor(
    private round: number = 0,
    private readonly salt: string = "round",
  ) {}

  currentRound(): number {
    return this.round;
  }

  advance(rounds: number = 1): number {
    this.round += rounds;
    return this.round;
  }

  roundEntropy(round: number): string {
    return sha256Hex(`${this.salt}:${round}`);
  }
}

/**
 * Round clock derived from wall-clock time, so restarts never rewind it
 */
export class WallClockRoundClock implements RoundClock {
  constructor(
    private readonly roundDurationMs: number,
    private readonly salt: string,
    private readonly now: () => number = Date.now,
  ) {}

  currentRound(): number {
    return Math.floor(this.now() / this.roundDurationMs);
  }

  roundEntropy(round: number): string {
    return sha256Hex(`${this.salt}:${round}`);
  }
}

export class CommitRevealRandomnessProvider implements RandomnessProvider {
  constructor(
    private readonly clock: RoundClock,
    private readonly providerKey: string,
  ) {}

  requestRandomness(): RandomnessRequest {
    const requestId = crypto.randomUUID();
    const secret = deriveRequestSecret(this.providerKey, requestId);
    return {
      requestId,
      commitRound: this.clock.currentRound(),
      commitment: sha256Hex(secret),
    };
  }

  tryFulfill(request: RandomnessRequest): FulfillmentResult {
    const readyAtRound = request.commitRound + 1;
    if (this.clock.currentRound() < readyAtRound) {
      return { status: "pending", readyAtRound };
    }

    const secret = deriveRequestSecret(this.providerKey, request.requestId);
    if (!verifyCommitment(secret, request.commitment)) {
      throw new Error(
        `Commitment mismatch for randomness request ${request.requestId}`,
      );
    }
    return {
      status: "ready",
      value: revealValue(secret, this.clock.roundEntropy(readyAtRound)),
    };
  }

  fulfill(request: RandomnessRequest): bigint {
    const result = this.tryFulfill(request);
    if (result.status === "pending") {
      throw new RandomnessPendingError(
        `Randomness request ${request.requestId} resolves at round ${result.readyAtRound}`,
      );
    }
    return result.value;
  }
}
