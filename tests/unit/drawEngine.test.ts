import { RandomnessPendingError, StateViolationError } from '../../src/lib/errors';
import { parseUFix64 } from '../../src/utils/ufix64';
import { admin, createTestPool, T0 } from '../helpers/poolFixtures';

function fundedPool(snapshotBatchSize?: number) {
  const fixture = createTestPool(snapshotBatchSize === undefined ? {} : { snapshotBatchSize });
  fixture.pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
  fixture.pool.deposit('bob', parseUFix64('30.0'), 'USDC', T0);
  return fixture;
}

describe('Draw Engine', () => {
  describe('startDraw', () => {
    it('should wait for the draw interval', () => {
      const { pool, connector } = fundedPool();
      connector.accrueYield(parseUFix64('1.0'));

      expect(() => pool.startDraw(T0 + 50)).toThrow(
        'Draw interval has not elapsed; next draw at 1100',
      );
    });

    it('should refuse to start with an empty prize pool', () => {
      const { pool, state } = fundedPool();

      expect(() => pool.startDraw(T0 + 100)).toThrow('Prize pool is empty');
      expect(state.drawReceipt).toBeNull();
    });

    it('should not start in emergency mode', () => {
      const { pool, connector } = fundedPool();
      connector.accrueYield(parseUFix64('1.0'));
      pool.enableEmergencyMode(admin, 'incident', T0);

      expect(() => pool.startDraw(T0 + 100)).toThrow('Draws cannot start in emergency mode');
    });

    it('should freeze stakes before the round rewards are distributed', () => {
      const { pool, connector, state } = fundedPool();
      connector.accrueYield(parseUFix64('1.0'));

      const receipt = pool.startDraw(T0 + 100);

      expect(receipt.round).toBe(1);
      expect(receipt.prizeAmount).toBe(20_000_000n);
      expect(receipt.timeWeightedStakes).toEqual(
        new Map([
          ['alice', 1_000_000_000n],
          ['bob', 3_000_000_000n],
        ]),
      );
      expect(receipt.pendingReceivers).toEqual([]);
      expect(receipt.randomnessRequest.commitRound).toBe(0);
      expect(state.pendingSavings).toBe(70_000_000n);
      expect(pool.getAccount('alice').pendingInterest).toBe(17_500_000n);
      expect(state.lastDrawTimestamp).toBe(T0 + 100);
    });

    it('should count bonus weight in the stake', () => {
      const { pool, connector } = fundedPool();
      pool.setBonusWeight(admin, 'alice', parseUFix64('5.0'), 'early supporter', T0);
      connector.accrueYield(parseUFix64('1.0'));

      const receipt = pool.startDraw(T0 + 100);

      expect(receipt.timeWeightedStakes.get('alice')).toBe(1_500_000_000n);
    });

    it('should reject a second draw while one is pending', () => {
      const { pool, connector } = fundedPool();
      connector.accrueYield(parseUFix64('1.0'));
      pool.startDraw(T0 + 100);

      expect(() => pool.startDraw(T0 + 200)).toThrow('Draw for round 1 is already pending');
    });
  });

  describe('completeDraw', () => {
    it('should wait for randomness to reach finality', () => {
      const { pool, connector } = fundedPool();
      connector.accrueYield(parseUFix64('1.0'));
      pool.startDraw(T0 + 100);

      const status = pool.getDrawStatus(T0 + 100);
      expect(status.phase).toBe('PendingRandomness');
      expect(status.readyAtRound).toBe(1);
      expect(status.canDrawNow).toBe(false);
      expect(() => pool.completeDraw(T0 + 100)).toThrow(RandomnessPendingError);
      expect(() => pool.completeDraw(T0 + 100)).toThrow(
        'Randomness for round 1 resolves at round 1',
      );
    });

    it('should award the prize into the winner deposit', () => {
      const { pool, connector, clock, state, tracker } = fundedPool();
      connector.accrueYield(parseUFix64('1.0'));
      pool.startDraw(T0 + 100);
      clock.advance();
      expect(pool.getDrawStatus(T0 + 150).phase).toBe('ReadyToComplete');
      pool.drainEvents();

      const settlement = pool.completeDraw(T0 + 200);

      expect(settlement.round).toBe(1);
      expect(settlement.prizeAmount).toBe(20_000_000n);
      expect(settlement.winners).toHaveLength(1);
      expect(settlement.amounts).toEqual([20_000_000n]);
      expect(settlement.rolledOver).toBe(0n);

      const [winner] = settlement.winners;
      expect(['alice', 'bob']).toContain(winner);
      expect(pool.getAccount(winner).totalEarnedPrizes).toBe(20_000_000n);
      expect(state.prizePool).toBe(0n);
      expect(state.currentRound).toBe(2);
      expect(state.drawReceipt).toBeNull();
      expect(state.totalDeposited + state.pendingSavings).toBe(4_090_000_000n);

      const report = pool.getConservationReport();
      expect(report.depositsBalanced).toBe(true);
      expect(report.custodyBalanced).toBe(true);

      expect(tracker.getWinners({ poolId: 'test-pool' })).toMatchObject([
        { round: 1, receiver: winner, amount: 20_000_000n },
      ]);
      expect(pool.drainEvents().map((event) => event.type)).toEqual(['draw.completed']);
      expect(pool.getDrawStatus(T0 + 200)).toMatchObject({ phase: 'Idle', canDrawNow: true });
    });

    it('should select the same winner for the same randomness', () => {
      const first = fundedPool();
      const second = fundedPool();
      for (const fixture of [first, second]) {
        fixture.connector.accrueYield(parseUFix64('1.0'));
      }
      const receipt = first.pool.startDraw(T0 + 100);
      second.pool.startDraw(T0 + 100);
      // Replay the first request on the second pool
      if (second.state.drawReceipt) {
        second.state.drawReceipt.randomnessRequest = receipt.randomnessRequest;
      }
      first.clock.advance();
      second.clock.advance();

      expect(second.pool.completeDraw(T0 + 200).winners).toEqual(
        first.pool.completeDraw(T0 + 200).winners,
      );
    });
  });

  describe('Batched capture', () => {
    function batchedDraw() {
      const fixture = fundedPool(1);
      fixture.pool.deposit('carol', parseUFix64('20.0'), 'USDC', T0);
      fixture.connector.accrueYield(parseUFix64('1.0'));
      fixture.pool.startDraw(T0 + 100);
      return fixture;
    }

    it('should leave large populations pending after startDraw', () => {
      const { pool } = batchedDraw();

      expect(pool.getDrawStatus(T0 + 100)).toMatchObject({
        phase: 'CapturingSnapshot',
        capturedReceivers: 0,
        pendingReceivers: 3,
      });
      expect(() => pool.completeDraw(T0 + 100)).toThrow(
        'Snapshot capture incomplete: 3 receivers pending',
      );
    });

    it('should capture pending receivers in batches at the snapshot price', () => {
      const { pool, state } = batchedDraw();

      expect(pool.processDrawBatch(1)).toBe(2);
      expect(pool.processDrawBatch(5)).toBe(0);
      expect(state.drawReceipt?.timeWeightedStakes).toEqual(
        new Map([
          ['alice', 1_000_000_000n],
          ['bob', 3_000_000_000n],
          ['carol', 2_000_000_000n],
        ]),
      );
      expect(() => pool.processDrawBatch(0)).toThrow(StateViolationError);
    });

    it('should capture a stake before the account changes', () => {
      const { pool, state } = batchedDraw();

      pool.setBonusWeight(admin, 'carol', parseUFix64('5.0'), 'promo', T0 + 101);
      expect(state.drawReceipt?.timeWeightedStakes.get('carol')).toBe(2_000_000_000n);

      const result = pool.withdraw('bob', parseUFix64('5.0'), T0 + 102);
      expect(result.status).toBe('completed');
      expect(state.drawReceipt?.timeWeightedStakes.get('bob')).toBe(3_000_000_000n);

      pool.deposit('dave', parseUFix64('50.0'), 'USDC', T0 + 103);
      expect(state.drawReceipt?.timeWeightedStakes.has('dave')).toBe(false);
      expect(state.drawReceipt?.pendingReceivers).toEqual([]);
    });
  });
});
