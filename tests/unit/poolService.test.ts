import { PermissionError, PreconditionError, StateViolationError } from '../../src/lib/errors';
import { InMemoryPoolStore } from '../../src/lib/store/poolStore';
import {
  CommitRevealRandomnessProvider,
  ManualRoundClock,
} from '../../src/services/connectors/randomnessProvider';
import { InMemoryYieldConnector } from '../../src/services/connectors/yieldConnector';
import { EventBus } from '../../src/services/eventBus';
import { PoolService } from '../../src/services/pool/poolService';
import { parseUFix64 } from '../../src/utils/ufix64';
import { admin, poolInput, PROVIDER_KEY, T0, viewer } from '../helpers/poolFixtures';

describe('Pool Service', () => {
  let now: number;
  let store: InMemoryPoolStore;
  let bus: EventBus;
  let connector: InMemoryYieldConnector;
  let rounds: ManualRoundClock;
  let service: PoolService;

  beforeEach(async () => {
    now = T0;
    store = new InMemoryPoolStore();
    bus = new EventBus();
    connector = new InMemoryYieldConnector({ assetId: 'USDC' });
    rounds = new ManualRoundClock(0);
    service = new PoolService({
      store,
      bus,
      clock: () => now,
      collaborators: () => ({
        connector,
        randomness: new CommitRevealRandomnessProvider(rounds, PROVIDER_KEY),
      }),
    });
    await service.createPool(admin, poolInput());
  });

  describe('createPool', () => {
    it('should store the new pool and announce it', async () => {
      await expect(service.listPools()).resolves.toEqual(['test-pool']);
      await expect(service.getPoolStats('test-pool')).resolves.toMatchObject({
        poolId: 'test-pool',
        assetId: 'USDC',
        totalDeposited: 0n,
        lastDrawTimestamp: T0,
      });
      expect(bus.getHistory().map((event) => event.type)).toEqual(['pool.created']);
    });

    it('should reject a duplicate pool id', async () => {
      await expect(service.createPool(admin, poolInput())).rejects.toThrow(
        'Pool test-pool already exists',
      );
    });

    it('should reject an invalid pool id', async () => {
      await expect(
        service.createPool(admin, poolInput({ poolId: 'not a pool' })),
      ).rejects.toThrow(PreconditionError);
    });

    it('should require the config manager permission', async () => {
      await expect(
        service.createPool(viewer, poolInput({ poolId: 'other-pool' })),
      ).rejects.toThrow('Actor viewer lacks the config_manager permission');
    });
  });

  describe('Transactions', () => {
    it('should persist a committed operation', async () => {
      await service.deposit('test-pool', 'alice', parseUFix64('10.0'), 'USDC');

      const stored = await store.load('test-pool');
      expect(stored?.accounts.get('alice')?.deposit).toBe(1_000_000_000n);
      expect(bus.getHistory({ poolId: 'test-pool' }).map((event) => event.type)).toEqual([
        'pool.created',
        'deposit.completed',
      ]);
    });

    it('should leave the stored pool untouched when an operation throws', async () => {
      await service.deposit('test-pool', 'alice', parseUFix64('10.0'), 'USDC');

      await expect(
        service.execute('test-pool', 'tamper', (pool) => {
          pool.state.prizePool = parseUFix64('5.0');
          throw new StateViolationError('rejected after mutation');
        }),
      ).rejects.toThrow('rejected after mutation');

      const stats = await service.getPoolStats('test-pool');
      expect(stats.prizePool).toBe(0n);
      expect(stats.totalDeposited).toBe(1_000_000_000n);
    });

    it('should not publish events of a rejected operation', async () => {
      await expect(
        service.withdraw('test-pool', 'nobody', parseUFix64('1.0')),
      ).rejects.toThrow(PreconditionError);

      expect(bus.getHistory().map((event) => event.type)).toEqual(['pool.created']);
    });

    it('should serialize concurrent operations on one pool', async () => {
      await Promise.all([
        service.deposit('test-pool', 'alice', parseUFix64('1.0'), 'USDC'),
        service.deposit('test-pool', 'bob', parseUFix64('2.0'), 'USDC'),
        service.deposit('test-pool', 'carol', parseUFix64('3.0'), 'USDC'),
      ]);

      const stats = await service.getPoolStats('test-pool');
      expect(stats.totalDeposited).toBe(600_000_000n);
      expect(stats.activeAccounts).toBe(3);
    });

    it('should keep the queue running after a failure', async () => {
      const results = await Promise.allSettled([
        service.deposit('test-pool', 'alice', parseUFix64('0.5'), 'USDC'),
        service.deposit('test-pool', 'bob', parseUFix64('2.0'), 'USDC'),
      ]);

      expect(results.map((result) => result.status)).toEqual(['rejected', 'fulfilled']);
      await expect(service.getAccount('test-pool', 'bob')).resolves.toMatchObject({
        deposit: 200_000_000n,
      });
    });

    it('should report unknown pools', async () => {
      await expect(service.getPoolStats('missing')).rejects.toThrow('Unknown pool: missing');
      await expect(
        service.deposit('missing', 'alice', parseUFix64('1.0'), 'USDC'),
      ).rejects.toThrow('Unknown pool: missing');
    });
  });

  describe('Draws', () => {
    it('should run a draw across separate transactions', async () => {
      await service.deposit('test-pool', 'alice', parseUFix64('10.0'), 'USDC');
      await service.deposit('test-pool', 'bob', parseUFix64('30.0'), 'USDC');
      connector.accrueYield(parseUFix64('1.0'));
      now = T0 + 100;

      const receipt = await service.startDraw('test-pool', admin);
      expect(receipt.prizeAmount).toBe(20_000_000n);
      await expect(service.getDrawStatus('test-pool')).resolves.toMatchObject({
        phase: 'PendingRandomness',
      });

      rounds.advance();
      const settlement = await service.completeDraw('test-pool', admin);

      const winners = await service.getWinners('test-pool');
      expect(winners).toHaveLength(1);
      expect(winners[0]).toMatchObject({
        poolId: 'test-pool',
        round: 1,
        receiver: settlement.winners[0],
        amount: 20_000_000n,
      });
      expect(bus.getHistory({ type: 'draw.completed' })).toHaveLength(1);
    });

    it('should keep an emergency triggered by a rejected draw', async () => {
      await service.updateEmergencyConfig('test-pool', admin, { minYieldSourceHealth: 0.6 });
      await service.deposit('test-pool', 'alice', parseUFix64('10.0'), 'USDC');
      connector.slash(parseUFix64('5.0'));
      now = T0 + 100;

      await expect(service.startDraw('test-pool', admin)).rejects.toThrow(
        new StateViolationError('Draws cannot start in emergency mode'),
      );

      await expect(service.getEmergencyInfo('test-pool')).resolves.toMatchObject({
        state: 'EmergencyMode',
        triggeredBy: 'auto',
      });
      expect(bus.getHistory({ type: 'emergency.changed' })).toHaveLength(1);
    });

    it('should require the draw operator permission', async () => {
      await expect(service.startDraw('test-pool', viewer)).rejects.toThrow(PermissionError);
    });
  });
});
