import {
  calculateHealth,
  createEmergencyStatus,
  DEFAULT_EMERGENCY_CONFIG,
  EmergencyController,
  isBalanceHealthy,
} from '../../src/services/emergency/emergencyController';
import type { EmergencyConfig } from '../../src/types/pool.types';
import { parseUFix64 } from '../../src/utils/ufix64';

function controller(overrides: Partial<EmergencyConfig> = {}) {
  const status = createEmergencyStatus();
  return {
    status,
    controller: new EmergencyController(status, { ...DEFAULT_EMERGENCY_CONFIG, ...overrides }),
  };
}

describe('Emergency Controller', () => {
  describe('Health', () => {
    it('should combine balance health and withdrawal failures', () => {
      expect(calculateHealth(true, 0)).toBe(1);
      expect(calculateHealth(false, 0)).toBe(0.5);
      expect(calculateHealth(true, 1)).toBe(0.75);
      expect(calculateHealth(false, 3)).toBe(0.125);
    });

    it('should compare the available balance against the threshold', () => {
      const staked = parseUFix64('10.0');

      expect(isBalanceHealthy(parseUFix64('9.5'), staked, 0.95)).toBe(true);
      expect(isBalanceHealthy(949_999_999n, staked, 0.95)).toBe(false);
      expect(isBalanceHealthy(0n, 0n, 0.95)).toBe(true);
    });
  });

  describe('Automatic transitions', () => {
    it('should trigger on consecutive withdrawal failures', () => {
      const { controller: emergency, status } = controller({ maxWithdrawFailures: 2 });
      emergency.recordWithdrawFailure();
      emergency.recordWithdrawFailure();

      expect(emergency.evaluate(1, 10)).toEqual({
        from: 'Normal',
        to: 'EmergencyMode',
        reason: '2 consecutive withdrawal failures',
        automatic: true,
      });
      expect(status.activatedAt).toBe(10);
      expect(status.triggeredBy).toBe('auto');
    });

    it('should recover once health passes the recovery threshold', () => {
      const { controller: emergency } = controller();
      emergency.evaluate(0.4, 10);

      expect(emergency.evaluate(0.85, 20)).toBeNull();
      expect(emergency.evaluate(0.9, 30)).toMatchObject({ to: 'Normal', automatic: true });
      expect(emergency.state).toBe('Normal');
    });

    it('should clear stale withdrawal failures once the balance is healthy again', () => {
      const { controller: emergency, status } = controller({ maxWithdrawFailures: 1 });
      const staked = parseUFix64('10.0');
      emergency.recordWithdrawFailure();

      expect(emergency.assess(parseUFix64('1.0'), staked, 10)).toMatchObject({
        to: 'EmergencyMode',
        reason: '1 consecutive withdrawal failures',
      });
      expect(emergency.assess(parseUFix64('9.0'), staked, 20)).toBeNull();
      expect(status.consecutiveWithdrawFailures).toBe(1);

      expect(emergency.assess(staked, staked, 30)).toMatchObject({
        to: 'Normal',
        automatic: true,
      });
      expect(status.consecutiveWithdrawFailures).toBe(0);
    });

    it('should keep failures recorded under a manual emergency', () => {
      const { controller: emergency, status } = controller();
      emergency.recordWithdrawFailure();
      emergency.enableEmergencyMode('incident', 10);

      expect(emergency.assess(parseUFix64('10.0'), parseUFix64('10.0'), 20)).toBeNull();
      expect(status.consecutiveWithdrawFailures).toBe(1);
    });

    it('should stay in emergency when auto recovery is disabled', () => {
      const { controller: emergency } = controller({
        autoRecoveryEnabled: false,
        maxEmergencyDurationSeconds: 5,
      });
      emergency.evaluate(0.1, 10);

      expect(emergency.evaluate(1, 100)).toBeNull();
      expect(emergency.state).toBe('EmergencyMode');
    });

    it('should never auto trigger out of paused or partial mode', () => {
      const { controller: emergency } = controller();
      emergency.pause('maintenance', 10);

      expect(emergency.evaluate(0, 20)).toBeNull();
      expect(emergency.state).toBe('Paused');
    });
  });

  describe('Manual transitions', () => {
    it('should clear failures when manually restored', () => {
      const { controller: emergency, status } = controller();
      emergency.recordWithdrawFailure();
      emergency.enableEmergencyMode('incident', 10);

      expect(emergency.disableEmergencyMode(20)).toEqual({
        from: 'EmergencyMode',
        to: 'Normal',
        reason: 'manually restored',
        automatic: false,
      });
      expect(status.consecutiveWithdrawFailures).toBe(0);
      expect(status.reason).toBeNull();
    });

    it('should gate compounding and harvesting on emergency mode', () => {
      const { controller: emergency } = controller();
      emergency.enablePartialMode('review', 10);
      expect(emergency.shouldCompound()).toBe(true);

      emergency.enableEmergencyMode('incident', 20);
      expect(emergency.shouldCompound()).toBe(false);
      expect(emergency.shouldHarvest()).toBe(false);
      expect(() => emergency.assertCanStartDraw()).toThrow('Draws cannot start in emergency mode');
    });
  });
});
