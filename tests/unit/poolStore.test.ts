import { deserializePoolState, serializePoolState } from '../../src/lib/store/poolSerializer';
import { InMemoryPoolStore, SqlitePoolStore, type PoolStore } from '../../src/lib/store/poolStore';
import { parseUFix64 } from '../../src/utils/ufix64';
import { admin, createTestPool, T0 } from '../helpers/poolFixtures';

function busyPool(poolId = 'test-pool') {
  const fixture = createTestPool({
    poolId,
    winnerSelectionStrategy: {
      type: 'fixedTiers',
      tiers: [{ name: 'gold', amount: parseUFix64('0.1'), count: 1, nftIds: ['trophy'] }],
    },
  });
  const { pool, connector } = fixture;
  pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
  pool.deposit('bob', parseUFix64('2.5'), 'USDC', T0);
  pool.setBonusWeight(admin, 'bob', parseUFix64('1.0'), 'referral', T0);
  pool.setFundingCap(admin, 'lottery', parseUFix64('100.0'));
  pool.fundDirect(admin, 'treasury', parseUFix64('1.0'), 'USDC', T0);
  pool.withdrawTreasury(admin, parseUFix64('0.25'), 'hosting', T0 + 1);
  connector.accrueYield(parseUFix64('1.0'));
  pool.startDraw(T0 + 100);
  return fixture;
}

describe('Pool persistence', () => {
  describe('Serializer', () => {
    it('should restore a pool with a pending draw exactly', () => {
      const { state } = busyPool();

      const restored = deserializePoolState(serializePoolState(state));

      expect(restored).toEqual(state);
      expect(restored.drawReceipt?.timeWeightedStakes.get('bob')).toBe(350_000_000n);
      expect(Object.isFrozen(restored.treasury.history[0])).toBe(true);
    });

    it('should keep baselines beyond the UFix64 range', () => {
      const { pool, connector, state } = createTestPool();
      pool.deposit('alice', parseUFix64('1.0'), 'USDC', T0);
      connector.accrueYield(10_000_000_000_000_000n);
      pool.processRewards(T0 + 1);

      const restored = deserializePoolState(serializePoolState(state));

      expect(restored.accounts.get('alice')).toEqual(state.accounts.get('alice'));
    });

    it('should store amounts as decimal strings', () => {
      const { state } = busyPool();

      const document = JSON.parse(serializePoolState(state));

      expect(document.version).toBe(1);
      expect(document.totalDeposited).toBe('12.5');
      expect(document.config.accumulatorPrecision).toBe('100');
    });

    it('should reject malformed documents', () => {
      expect(() => deserializePoolState('{"version":2}')).toThrow(
        /^Stored pool document is invalid: /,
      );
    });
  });

  const stores: Array<[string, () => PoolStore]> = [
    ['InMemoryPoolStore', () => new InMemoryPoolStore()],
    ['SqlitePoolStore', () => new SqlitePoolStore(':memory:')],
  ];

  describe.each(stores)('%s', (_name, createStore) => {
    let store: PoolStore;

    beforeEach(() => {
      store = createStore();
    });

    afterEach(async () => {
      await store.close();
    });

    it('should return null for an unknown pool', async () => {
      await expect(store.load('missing')).resolves.toBeNull();
    });

    it('should save and load a snapshot', async () => {
      const { state } = busyPool();

      await store.save(state);

      await expect(store.load('test-pool')).resolves.toEqual(state);
    });

    it('should hand out copies rather than the stored snapshot', async () => {
      const { state } = busyPool();
      await store.save(state);

      const loaded = await store.load('test-pool');
      if (!loaded) throw new Error('pool not stored');
      loaded.prizePool = 0n;

      const reloaded = await store.load('test-pool');
      expect(reloaded?.prizePool).toBe(state.prizePool);
    });

    it('should overwrite on save and list pools in order', async () => {
      const first = busyPool('pool-b').state;
      await store.save(first);
      await store.save(busyPool('pool-a').state);
      first.currentRound = 7;
      await store.save(first);

      await expect(store.list()).resolves.toEqual(['pool-a', 'pool-b']);
      expect((await store.load('pool-b'))?.currentRound).toBe(7);
      await expect(store.ping()).resolves.toBeUndefined();
    });
  });
});
