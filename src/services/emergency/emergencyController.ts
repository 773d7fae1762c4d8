/**
 * Emergency Controller
 * Circuit breaker around deposits, withdrawals and draws.
 *
 * Health is a score in [0, 1]: half comes from the yield source still holding
 * enough of the staked principal, half decays with consecutive withdrawal
 * failures. A healthy Normal pool that degrades is moved to EmergencyMode
 * automatically; an automatic emergency lifts itself once health recovers
 * or the configured maximum duration has passed.
 */

import { PolicyViolationError, StateViolationError } from "../../lib/errors.js";
import type {
  EmergencyConfig,
  EmergencyState,
  EmergencyStatus,
} from "../../types/pool.types.js";
import { formatUFix64, mulDivRaw, UFIX64_SCALE, type UFix64 } from "../../utils/ufix64.js";

export const DEFAULT_EMERGENCY_CONFIG: EmergencyConfig = {
  maxEmergencyDurationSeconds: null,
  autoRecoveryEnabled: true,
  minYieldSourceHealth: 0.5,
  maxWithdrawFailures: 3,
  partialModeDepositLimit: null,
  minBalanceThreshold: 0.95,
  recoveryHealthThreshold: 0.9,
};

export interface EmergencyTransition {
  from: EmergencyState;
  to: EmergencyState;
  reason: string;
  automatic: boolean;
}

export function createEmergencyStatus(): EmergencyStatus {
  return {
    state: "Normal",
    reason: null,
    activatedAt: null,
    triggeredBy: null,
    consecutiveWithdrawFailures: 0,
  };
}

/**
 * Fraction in [0, 1] to raw UFix64 units
 */
function fractionToRaw(fraction: number): bigint {
  return BigInt(Math.round(fraction * Number(UFIX64_SCALE)));
}

export function isBalanceHealthy(
  availableValue: UFix64,
  totalStaked: UFix64,
  minBalanceThreshold: number,
): boolean {
  const required = mulDivRaw(
    totalStaked,
    fractionToRaw(minBalanceThreshold),
    UFIX64_SCALE,
  );
  return availableValue >= required;
}

export function calculateHealth(
  balanceOk: boolean,
  consecutiveFailures: number,
): number {
  return (balanceOk ? 0.5 : 0) + 0.5 / (1 + consecutiveFailures);
}

export class EmergencyController {
  constructor(
    private readonly status: EmergencyStatus,
    private config: EmergencyConfig,
  ) {}

  get state(): EmergencyState {
    return this.status.state;
  }

  get consecutiveFailures(): number {
    return this.status.consecutiveWithdrawFailures;
  }

  getConfig(): EmergencyConfig {
    return { ...this.config };
  }

  setConfig(config: EmergencyConfig): void {
    this.config = config;
  }

  health(availableValue: UFix64, totalStaked: UFix64): number {
    return calculateHealth(
      isBalanceHealthy(availableValue, totalStaked, this.config.minBalanceThreshold),
      this.status.consecutiveWithdrawFailures,
    );
  }

  assertNotPaused(operation: string): void {
    if (this.status.state === "Paused") {
      throw new StateViolationError(`Pool is paused: ${operation} is blocked`);
    }
  }

  assertCanDeposit(amount: UFix64): void {
    this.assertNotPaused("deposit");
    if (this.status.state === "EmergencyMode") {
      throw new StateViolationError("Deposits are blocked in emergency mode");
    }
    const limit = this.config.partialModeDepositLimit;
    if (this.status.state === "PartialMode" && limit !== null && amount > limit) {
      throw new PolicyViolationError(
        `Deposits are capped at ${formatUFix64(limit)} in partial mode`,
      );
    }
  }

  assertCanStartDraw(): void {
    this.assertNotPaused("startDraw");
    if (this.status.state === "EmergencyMode") {
      throw new StateViolationError("Draws cannot start in emergency mode");
    }
  }

  /** Global compounding is skipped while in emergency mode */
  shouldCompound(): boolean {
    return this.status.state !== "EmergencyMode";
  }

  /** Withdrawals in emergency mode do not touch the yield source for rewards */
  shouldHarvest(): boolean {
    return this.status.state !== "EmergencyMode";
  }

  recordWithdrawFailure(): number {
    this.status.consecutiveWithdrawFailures += 1;
    return this.status.consecutiveWithdrawFailures;
  }

  recordWithdrawSuccess(): void {
    this.status.consecutiveWithdrawFailures = 0;
  }

  /**
   * Score the yield source and apply any automatic transition. During an
   * automatic emergency a balance that passes the threshold again clears the
   * recorded withdrawal failures, since those describe the outage being
   * recovered from.
   */
  assess(
    availableValue: UFix64,
    totalStaked: UFix64,
    now: number,
  ): EmergencyTransition | null {
    const balanceOk = isBalanceHealthy(
      availableValue,
      totalStaked,
      this.config.minBalanceThreshold,
    );
    if (balanceOk && this.canAutoRecover() && this.status.triggeredBy === "auto") {
      this.status.consecutiveWithdrawFailures = 0;
    }
    return this.evaluate(
      calculateHealth(balanceOk, this.status.consecutiveWithdrawFailures),
      now,
    );
  }

  /**
   * Apply automatic trigger or recovery for the current health.
   * Returns the transition taken, if any.
   */
  evaluate(health: number, now: number): EmergencyTransition | null {
    const failures = this.status.consecutiveWithdrawFailures;

    if (this.status.state === "Normal") {
      if (failures >= this.config.maxWithdrawFailures) {
        return this.transition(
          "EmergencyMode",
          `${failures} consecutive withdrawal failures`,
          now,
          true,
        );
      }
      if (health < this.config.minYieldSourceHealth) {
        return this.transition(
          "EmergencyMode",
          `yield source health ${health.toFixed(3)} below ${this.config.minYieldSourceHealth}`,
          now,
          true,
        );
      }
      return null;
    }

    if (this.canAutoRecover()) {
      const maxDuration = this.config.maxEmergencyDurationSeconds;
      const activatedAt = this.status.activatedAt ?? now;
      if (maxDuration !== null && now - activatedAt >= maxDuration) {
        return this.recover("maximum emergency duration elapsed", now);
      }
      if (
        this.status.triggeredBy === "auto" &&
        health >= this.config.recoveryHealthThreshold
      ) {
        return this.recover(`yield source health recovered to ${health.toFixed(3)}`, now);
      }
    }

    return null;
  }

  enableEmergencyMode(reason: string, now: number): EmergencyTransition {
    return this.transition("EmergencyMode", reason, now, false);
  }

  disableEmergencyMode(now: number): EmergencyTransition {
    const transition = this.transition("Normal", "manually restored", now, false);
    this.status.consecutiveWithdrawFailures = 0;
    return transition;
  }

  pause(reason: string, now: number): EmergencyTransition {
    return this.transition("Paused", reason, now, false);
  }

  enablePartialMode(reason: string, now: number): EmergencyTransition {
    return this.transition("PartialMode", reason, now, false);
  }

  getStatus(): EmergencyStatus {
    return { ...this.status };
  }

  private canAutoRecover(): boolean {
    return this.status.state === "EmergencyMode" && this.config.autoRecoveryEnabled;
  }

  private recover(reason: string, now: number): EmergencyTransition {
    const transition = this.transition("Normal", reason, now, true);
    this.status.consecutiveWithdrawFailures = 0;
    return transition;
  }

  private transition(
    to: EmergencyState,
    reason: string,
    now: number,
    automatic: boolean,
  ): EmergencyTransition {
    const from = this.status.state;
    this.status.state = to;
    if (to === "Normal") {
      this.status.reason = null;
      this.status.activatedAt = null;
      this.status.triggeredBy = null;
    } else {
      this.status.reason = reason;
      this.status.activatedAt = now;
      this.status.triggeredBy = automatic ? "auto" : "manual";
    }
    return { from, to, reason, automatic };
  }
}
