/**
 * Deterministic random generation for draws
 * A Xorshift128+ stream seeded from the revealed 64-bit randomness, plus the
 * hashing helpers the commit-reveal provider builds on
 */

import crypto from "crypto";

const MASK_64 = (1n << 64n) - 1n;
const RANGE_64 = 1n << 64n;

/** Replaces an all-zero state, which Xorshift would never leave */
const ZERO_STATE_REPLACEMENT = 0x9e3779b97f4a7c15n;

/**
 * Expand a 64-bit value into the 16-byte Xorshift128+ seed by repeating its
 * big-endian bytes
 */
export function seedBytesFromValue(value: bigint): Buffer {
  const bytes = Buffer.alloc(8);
  bytes.writeBigUInt64BE(value & MASK_64);
  return Buffer.concat([bytes, bytes]);
}

export class Xorshift128Plus {
  private state0: bigint;
  private state1: bigint;

  constructor(seed: Buffer) {
    if (seed.length < 16) {
      throw new Error("Xorshift128+ needs a seed of at least 16 bytes");
    }
    this.state0 = seed.readBigUInt64BE(0);
    this.state1 = seed.readBigUInt64BE(8);
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state0 = ZERO_STATE_REPLACEMENT;
      this.state1 = ZERO_STATE_REPLACEMENT;
    }
  }

  static fromValue(value: bigint): Xorshift128Plus {
    return new Xorshift128Plus(seedBytesFromValue(value));
  }

  nextUInt64(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    this.state0 = s0;
    s1 = (s1 ^ (s1 << 23n)) & MASK_64;
    this.state1 = s1 ^ s0 ^ (s1 >> 17n) ^ (s0 >> 26n);
    return (this.state1 + s0) & MASK_64;
  }

  /**
   * Uniform value in [0, bound) by rejection sampling: outputs from the
   * incomplete final block of 2^64 are discarded so no residue is favoured
   */
  nextBelow(bound: bigint): bigint {
    if (bound <= 0n) {
      throw new Error("Bound must be positive");
    }
    const limit = RANGE_64 - (RANGE_64 % bound);
    for (;;) {
      const candidate = this.nextUInt64();
      if (candidate < limit) {
        return candidate % bound;
      }
    }
  }
}

/**
 * SHA-256 hex digest of a string
 */
export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/**
 * Per-request secret derived from the provider key, so nothing has to be
 * held in memory between the commit and the reveal
 */
export function deriveRequestSecret(providerKey: string, requestId: string): string {
  return crypto.createHmac("sha256", providerKey).update(requestId).digest("hex");
}

/**
 * Combine a committed secret with the entropy of the round it is bound to
 */
export function revealValue(secret: string, roundEntropy: string): bigint {
  const digest = crypto
    .createHash("sha256")
    .update(`${secret}:${roundEntropy}`)
    .digest();
  return digest.readBigUInt64BE(0);
}

/**
 * Check that a revealed secret matches its commitment
 */
export function verifyCommitment(secret: string, commitment: string): boolean {
  return sha256Hex(secret) === commitment;
}
