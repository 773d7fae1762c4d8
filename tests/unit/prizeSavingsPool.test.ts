import {
  NumericSafetyError,
  PermissionError,
  PolicyViolationError,
  PreconditionError,
  StateViolationError,
} from '../../src/lib/errors';
import { StaticPriceOracle } from '../../src/services/connectors/priceOracle';
import {
  CommitRevealRandomnessProvider,
  ManualRoundClock,
} from '../../src/services/connectors/randomnessProvider';
import { InMemoryYieldConnector } from '../../src/services/connectors/yieldConnector';
import { createPoolState } from '../../src/services/pool/poolState';
import { PrizeSavingsPool } from '../../src/services/pool/prizeSavingsPool';
import { parseUFix64 } from '../../src/utils/ufix64';
import {
  admin,
  createTestPool,
  poolInput,
  PROVIDER_KEY,
  T0,
  viewer,
} from '../helpers/poolFixtures';

describe('Prize Savings Pool', () => {
  describe('Deposits and rewards', () => {
    it('should stake a first deposit and mint shares one to one', () => {
      const { pool, state } = createTestPool();

      const result = pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);

      expect(result.newDeposit).toBe(1_000_000_000n);
      expect(result.sharesMinted).toBe(1_000_000_000n);
      expect(result.interestCompounded).toBe(0n);
      expect(state.totalStaked).toBe(1_000_000_000n);
      expect(state.liquidBuffer).toBe(0n);
      expect(pool.drainEvents().map((event) => event.type)).toEqual(['deposit.completed']);
    });

    it('should split harvested yield and compound savings', () => {
      const { pool, connector } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      connector.accrueYield(parseUFix64('1.0'));

      const result = pool.processRewards(T0 + 1);

      expect(result).toEqual({
        harvested: 100_000_000n,
        distribution: { savings: 70_000_000n, lottery: 20_000_000n, treasury: 10_000_000n },
        compounded: 70_000_000n,
        dust: 0n,
        compoundingSkipped: false,
      });
      const account = pool.getAccount('alice');
      expect(account.deposit).toBe(1_070_000_000n);
      expect(account.pendingInterest).toBe(0n);
      expect(account.totalEarnedSavings).toBe(70_000_000n);

      const stats = pool.getPoolStats();
      expect(stats.totalDeposited).toBe(1_070_000_000n);
      expect(stats.totalStaked).toBe(1_070_000_000n);
      expect(stats.prizePool).toBe(20_000_000n);
      expect(stats.treasuryBalance).toBe(10_000_000n);
      expect(stats.sharePrice).toBe(107_000_000n);

      const report = pool.getConservationReport();
      expect(report.depositsBalanced).toBe(true);
      expect(report.custodyBalanced).toBe(true);
      expect(report.connectorValue).toBe(1_070_000_000n);
    });

    it('should mint fewer shares once the share price has grown', () => {
      const { pool, connector } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      connector.accrueYield(parseUFix64('1.0'));

      const result = pool.deposit('alice', parseUFix64('5.0'), 'USDC', T0 + 1);

      expect(result.newDeposit).toBe(1_570_000_000n);
      expect(result.sharesMinted).toBe(467_289_719n);
    });

    it('should price many small deposits the same as one large deposit', () => {
      const small = createTestPool({ poolId: 'pool-a', minimumDeposit: parseUFix64('0.001') });
      const large = createTestPool({ poolId: 'pool-b', minimumDeposit: parseUFix64('0.001') });

      for (let i = 0; i < 1000; i++) {
        small.pool.deposit('alice', parseUFix64('0.001'), 'USDC', T0);
      }
      large.pool.deposit('alice', parseUFix64('1.0'), 'USDC', T0);
      small.connector.accrueYield(12_345_678n);
      large.connector.accrueYield(12_345_678n);
      small.pool.processRewards(T0 + 1);
      large.pool.processRewards(T0 + 1);

      expect(small.pool.getSharePrice()).toEqual(large.pool.getSharePrice());
      expect(small.pool.getSharePrice()).toEqual({
        effectiveAssets: 108_641_974n,
        effectiveShares: 100_000_000n,
        sharePrice: 108_641_974n,
      });
    });

    it('should sweep per-account truncation across many depositors to the treasury', () => {
      const { pool, state, connector } = createTestPool({ minimumDeposit: parseUFix64('0.001') });
      for (let i = 0; i < 1000; i++) {
        pool.deposit(`user-${i}`, parseUFix64('0.001'), 'USDC', T0);
      }
      connector.accrueYield(12_345_678n);

      const result = pool.processRewards(T0 + 1);

      expect(result.distribution.savings).toBe(8_641_974n);
      expect(result.compounded).toBe(8_641_000n);
      expect(result.dust).toBe(974n);
      expect([...state.accounts.values()].every((account) => account.deposit === 108_641n)).toBe(
        true,
      );
      expect(pool.getSharePrice()).toEqual({
        effectiveAssets: 108_641_000n,
        effectiveShares: 100_000_000n,
        sharePrice: 108_641_000n,
      });
      const report = pool.getConservationReport();
      expect(report.depositsBalanced).toBe(true);
      expect(report.sumOfDeposits + pool.getTreasuryStats().totalDust).toBe(
        100_000_000n + result.distribution.savings,
      );
    });

    it('should send the rounding remainder of uneven accounts to the treasury', () => {
      const { pool, connector } = createTestPool({ minimumDeposit: parseUFix64('0.1') });
      for (const receiver of ['alice', 'bob', 'carol']) {
        pool.deposit(receiver, parseUFix64('0.33333333'), 'USDC', T0);
      }
      connector.accrueYield(7n);

      const result = pool.processRewards(T0 + 1);

      expect(result).toEqual({
        harvested: 7n,
        distribution: { savings: 4n, lottery: 1n, treasury: 2n },
        compounded: 3n,
        dust: 1n,
        compoundingSkipped: false,
      });
      expect(pool.getAccount('alice').deposit).toBe(33_333_334n);
      expect(pool.getTreasuryStats()).toMatchObject({ balance: 3n, totalDust: 1n });
      const report = pool.getConservationReport();
      expect(report.depositsBalanced).toBe(true);
      expect(report.custodyBalanced).toBe(true);
      expect(report.sumOfDeposits + pool.getTreasuryStats().totalDust).toBe(
        99_999_999n + result.distribution.savings,
      );
    });

    it('should not pay interest earned while an account was empty', () => {
      const { pool, connector } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      pool.deposit('bob', parseUFix64('10.0'), 'USDC', T0);
      connector.accrueYield(parseUFix64('1.0'));
      pool.processRewards(T0 + 1);
      expect(pool.getAccount('alice').totalEarnedSavings).toBe(35_000_000n);

      pool.withdraw('alice', parseUFix64('10.35'), T0 + 2);
      connector.accrueYield(parseUFix64('1.0'));
      pool.processRewards(T0 + 3);
      pool.deposit('alice', parseUFix64('5.0'), 'USDC', T0 + 4);

      expect(pool.getPoolStats().accumulatedInterestPerShare > 350_000_000n).toBe(true);
      expect(pool.getAccount('alice')).toMatchObject({
        deposit: 500_000_000n,
        pendingInterest: 0n,
        totalEarnedSavings: 35_000_000n,
      });
    });

    it('should keep precision through an extreme yield', () => {
      const { pool, connector } = createTestPool();
      pool.deposit('alice', parseUFix64('1.0'), 'USDC', T0);
      connector.accrueYield(10_000_000_000_000_000n);

      pool.processRewards(T0 + 1);

      const account = pool.getAccount('alice');
      expect(account.deposit).toBe(7_000_000_100_000_000n);
      expect(account.deposit > parseUFix64('50000000.0')).toBe(true);
      expect(pool.getSharePrice()).toEqual({
        effectiveAssets: 7_000_000_100_000_000n,
        effectiveShares: 100_000_000n,
        sharePrice: 7_000_000_100_000_000n,
      });
      expect(pool.getPoolStats().prizePool).toBe(2_000_000_000_000_000n);
    });

    it('should refuse a harvest above the accumulator ceiling before touching the connector', () => {
      const { pool, connector, state } = createTestPool({ accumulatorPrecision: 10_000_000_000n });
      pool.deposit('alice', parseUFix64('1.0'), 'USDC', T0);
      connector.accrueYield(parseUFix64('30.0'));

      expect(() => pool.processRewards(T0 + 1)).toThrow(NumericSafetyError);
      expect(connector.getBalance()).toBe(3_100_000_000n);
      expect(state.prizePool).toBe(0n);
    });

    it('should refuse a harvest that would overflow the interest ratio before touching the connector', () => {
      const { pool, connector, state } = createTestPool({
        accumulatorPrecision: 10_000_000_000n,
        minimumDeposit: parseUFix64('0.1'),
      });
      pool.deposit('alice', parseUFix64('0.1'), 'USDC', T0);
      connector.accrueYield(parseUFix64('10.0'));

      expect(() => pool.processRewards(T0 + 1)).toThrow(
        new NumericSafetyError(
          'overflow',
          'Savings of 7.0 would overflow the accumulator over 0.1 deposited',
        ),
      );
      expect(connector.getBalance()).toBe(1_010_000_000n);
      expect(state.totalStaked).toBe(10_000_000n);
      expect(state.prizePool).toBe(0n);
      expect(state.accumulator.accumulatedInterestPerShare).toBe(0n);
    });

    it('should reject deposits in the wrong asset or below the minimum', () => {
      const { pool } = createTestPool();

      expect(() => pool.deposit('alice', parseUFix64('10.0'), 'DAI', T0)).toThrow(
        'Asset mismatch: pool accepts USDC, got DAI',
      );
      expect(() => pool.deposit('alice', parseUFix64('0.5'), 'USDC', T0)).toThrow(
        'Deposit of 0.5 is below the minimum of 1.0',
      );
    });

    it('should preview a deposit without changing state', () => {
      const { pool, state } = createTestPool();

      expect(pool.previewDeposit('alice', parseUFix64('0.5'), 'USDC')).toMatchObject({
        allowed: false,
        reason: 'Minimum deposit is 1.0',
      });
      expect(pool.previewDeposit('alice', parseUFix64('2.0'), 'USDC')).toEqual({
        allowed: true,
        reason: null,
        amount: 200_000_000n,
        resultingDeposit: 200_000_000n,
        sharesMinted: 200_000_000n,
        sharePrice: 100_000_000n,
      });
      expect(state.accounts.size).toBe(0);
    });
  });

  describe('Withdrawals', () => {
    it('should withdraw from the connector and burn shares', () => {
      const { pool, state } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);

      const result = pool.withdraw('alice', parseUFix64('4.0'), T0 + 1);

      expect(result).toEqual({
        status: 'completed',
        amount: 400_000_000n,
        fromConnector: 400_000_000n,
        fromBuffer: 0n,
      });
      expect(state.totalShares).toBe(600_000_000n);
      expect(pool.getAccount('alice').deposit).toBe(600_000_000n);
    });

    it('should fall back to the liquid buffer when the connector is short', () => {
      const { pool, state } = createTestPool({}, { capacity: parseUFix64('6.0') });
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      expect(state.liquidBuffer).toBe(400_000_000n);

      const result = pool.withdraw('alice', parseUFix64('8.0'), T0 + 1);

      expect(result).toEqual({
        status: 'completed',
        amount: 800_000_000n,
        fromConnector: 600_000_000n,
        fromBuffer: 200_000_000n,
      });
      expect(state.totalStaked).toBe(0n);
      expect(state.liquidBuffer).toBe(200_000_000n);
      expect(pool.getConservationReport().custodyBalanced).toBe(true);
    });

    it('should reject unknown accounts and overdrafts', () => {
      const { pool } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);

      expect(() => pool.withdraw('bob', parseUFix64('1.0'), T0)).toThrow('Unknown account: bob');
      expect(() => pool.withdraw('alice', parseUFix64('11.0'), T0)).toThrow(
        'Insufficient balance: 10.0 available',
      );
      expect(() => pool.withdraw('alice', 0n, T0)).toThrow(PreconditionError);
    });

    it('should record a failed withdrawal and trip emergency mode', () => {
      const { pool, connector, state } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      connector.setLiquidityLimit(parseUFix64('1.0'));

      const result = pool.withdraw('alice', parseUFix64('5.0'), T0 + 1);

      expect(result).toEqual({
        status: 'failed',
        requested: 500_000_000n,
        available: 100_000_000n,
        consecutiveFailures: 1,
      });
      expect(state.emergency.state).toBe('EmergencyMode');
      expect(state.emergency.triggeredBy).toBe('auto');
      expect(state.emergency.reason).toBe('yield source health 0.250 below 0.5');
      expect(pool.getAccount('alice').deposit).toBe(1_000_000_000n);
      expect(() => pool.deposit('bob', parseUFix64('1.0'), 'USDC', T0 + 2)).toThrow(
        'Deposits are blocked in emergency mode',
      );
    });

    it('should recover automatically once the yield source can pay out again', () => {
      const { pool, connector, state } = createTestPool({
        emergencyConfig: { maxWithdrawFailures: 1, minYieldSourceHealth: 0.1 },
      });
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      connector.setLiquidityLimit(parseUFix64('1.0'));
      pool.withdraw('alice', parseUFix64('5.0'), T0 + 1);
      expect(state.emergency.reason).toBe('1 consecutive withdrawal failures');

      connector.setLiquidityLimit(null);

      expect(pool.evaluateEmergency(T0 + 2)).toEqual({
        from: 'EmergencyMode',
        to: 'Normal',
        reason: 'yield source health recovered to 1.000',
        automatic: true,
      });
      expect(pool.getEmergencyInfo()).toMatchObject({
        state: 'Normal',
        health: 1,
        consecutiveWithdrawFailures: 0,
      });
      expect(pool.withdraw('alice', parseUFix64('5.0'), T0 + 3).status).toBe('completed');
    });

    it('should stay in emergency while the yield source is still short', () => {
      const { pool, connector, state } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      connector.setLiquidityLimit(parseUFix64('1.0'));
      pool.withdraw('alice', parseUFix64('5.0'), T0 + 1);

      expect(pool.evaluateEmergency(T0 + 2)).toBeNull();
      expect(state.emergency.state).toBe('EmergencyMode');
      expect(state.emergency.consecutiveWithdrawFailures).toBe(1);
    });
  });

  describe('Emergency controls', () => {
    it('should block operations while paused', () => {
      const { pool } = createTestPool();

      expect(pool.pause(admin, 'maintenance', T0)).toEqual({
        from: 'Normal',
        to: 'Paused',
        reason: 'maintenance',
        automatic: false,
      });
      expect(() => pool.deposit('alice', parseUFix64('1.0'), 'USDC', T0)).toThrow(
        'Pool is paused: deposit is blocked',
      );
      expect(() => pool.processRewards(T0)).toThrow('Pool is paused: processRewards is blocked');
    });

    it('should require a reason and the emergency permission', () => {
      const { pool } = createTestPool();

      expect(() => pool.pause(admin, '   ', T0)).toThrow('A reason is required');
      expect(() => pool.pause(viewer, 'maintenance', T0)).toThrow(PermissionError);
      expect(() => pool.pause(viewer, 'maintenance', T0)).toThrow(
        'Actor viewer lacks the emergency_operator permission',
      );
    });

    it('should cap deposits in partial mode', () => {
      const { pool } = createTestPool();
      pool.updateEmergencyConfig(admin, { partialModeDepositLimit: parseUFix64('5.0') });
      pool.enablePartialMode(admin, 'liquidity review', T0);

      expect(() => pool.deposit('alice', parseUFix64('6.0'), 'USDC', T0)).toThrow(
        PolicyViolationError,
      );
      expect(() => pool.deposit('alice', parseUFix64('6.0'), 'USDC', T0)).toThrow(
        'Deposits are capped at 5.0 in partial mode',
      );
      expect(pool.deposit('alice', parseUFix64('5.0'), 'USDC', T0).newDeposit).toBe(
        500_000_000n,
      );
    });

    it('should lift a manual emergency only after the maximum duration', () => {
      const { pool } = createTestPool();
      pool.enableEmergencyMode(admin, 'incident', T0);

      expect(pool.evaluateEmergency(T0 + 30)).toBeNull();

      pool.updateEmergencyConfig(admin, { maxEmergencyDurationSeconds: 60 });
      expect(pool.evaluateEmergency(T0 + 59)).toBeNull();
      expect(pool.evaluateEmergency(T0 + 60)).toEqual({
        from: 'EmergencyMode',
        to: 'Normal',
        reason: 'maximum emergency duration elapsed',
        automatic: true,
      });
    });

    it('should validate emergency settings', () => {
      const { pool } = createTestPool();

      expect(() => pool.updateEmergencyConfig(admin, { minYieldSourceHealth: 2 })).toThrow(
        'minYieldSourceHealth must be between 0 and 1',
      );
      expect(() => pool.updateEmergencyConfig(admin, { maxWithdrawFailures: 0 })).toThrow(
        'maxWithdrawFailures must be a positive integer',
      );
    });
  });

  describe('Funding and treasury', () => {
    it('should fund the prize pool within its cap', () => {
      const { pool } = createTestPool();
      pool.setFundingCap(admin, 'lottery', parseUFix64('5.0'));

      expect(pool.fundDirect(admin, 'lottery', parseUFix64('3.0'), 'USDC', T0)).toBe(300_000_000n);
      expect(pool.getPoolStats().prizePool).toBe(300_000_000n);
      expect(() => pool.fundDirect(admin, 'lottery', parseUFix64('3.0'), 'USDC', T0)).toThrow(
        'Direct funding to lottery would reach 6.0, above its cap of 5.0',
      );
    });

    it('should compound direct savings funding into deposits', () => {
      const { pool, connector } = createTestPool();

      expect(() => pool.fundDirect(admin, 'savings', parseUFix64('1.0'), 'USDC', T0)).toThrow(
        'Savings funding needs at least one depositor',
      );

      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      pool.fundDirect(admin, 'savings', parseUFix64('1.0'), 'USDC', T0 + 1);

      expect(pool.getAccount('alice').deposit).toBe(1_100_000_000n);
      expect(connector.getBalance()).toBe(1_100_000_000n);
      expect(pool.getConservationReport().custodyBalanced).toBe(true);
    });

    it('should keep an append-only treasury history', () => {
      const { pool } = createTestPool();
      pool.fundDirect(admin, 'treasury', parseUFix64('2.0'), 'USDC', T0);

      const entry = pool.withdrawTreasury(admin, parseUFix64('0.5'), 'audit fees', T0 + 5);

      expect(entry).toEqual({
        amount: 50_000_000n,
        purpose: 'audit fees',
        actor: 'test-admin',
        timestamp: T0 + 5,
      });
      expect(Object.isFrozen(entry)).toBe(true);
      const stats = pool.getTreasuryStats();
      expect(stats.balance).toBe(150_000_000n);
      expect(stats.totalWithdrawn).toBe(50_000_000n);
      expect(stats.withdrawalCount).toBe(1);
      expect(Object.isFrozen(stats.history)).toBe(true);
    });

    it('should refuse invalid treasury withdrawals', () => {
      const { pool } = createTestPool();
      pool.fundDirect(admin, 'treasury', parseUFix64('1.5'), 'USDC', T0);

      expect(() => pool.withdrawTreasury(admin, parseUFix64('2.0'), 'ops', T0)).toThrow(
        'Treasury balance 1.5 cannot cover 2.0',
      );
      expect(() => pool.withdrawTreasury(admin, parseUFix64('1.0'), ' ', T0)).toThrow(
        'Treasury withdrawal requires a purpose',
      );
      expect(() => pool.withdrawTreasury(viewer, parseUFix64('1.0'), 'ops', T0)).toThrow(
        'Actor viewer lacks the treasury_manager permission',
      );
    });
  });

  describe('Configuration', () => {
    it('should reject a distribution that does not sum to one', () => {
      const { pool } = createTestPool();

      expect(() =>
        pool.updateDistributionStrategy(admin, {
          type: 'fixedPercentage',
          savings: parseUFix64('0.5'),
          lottery: parseUFix64('0.3'),
          treasury: parseUFix64('0.1'),
        }),
      ).toThrow('Distribution shares must sum to exactly 1.0');
    });

    it('should apply a new minimum deposit', () => {
      const { pool } = createTestPool();

      const config = pool.updatePoolConfig(admin, { minimumDeposit: parseUFix64('2.0') });

      expect(config.minimumDeposit).toBe(200_000_000n);
      expect(() => pool.deposit('alice', parseUFix64('1.0'), 'USDC', T0)).toThrow(
        'Deposit of 1.0 is below the minimum of 2.0',
      );
      expect(() => pool.updatePoolConfig(admin, { snapshotBatchSize: 0 })).toThrow(
        'Snapshot batch size must be a positive integer',
      );
    });

    it('should not change winner selection during a draw', () => {
      const { pool, connector } = createTestPool();
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      connector.accrueYield(parseUFix64('1.0'));
      pool.startDraw(T0 + 100);

      expect(() =>
        pool.updateWinnerSelectionStrategy(admin, {
          type: 'split',
          splits: [parseUFix64('0.5'), parseUFix64('0.5')],
        }),
      ).toThrow(StateViolationError);
    });
  });

  describe('Price oracle', () => {
    function foreignAssetPool(oracle: StaticPriceOracle) {
      const connector = new InMemoryYieldConnector({ assetId: 'sUSDC' });
      const state = createPoolState(poolInput(), T0);
      const pool = new PrizeSavingsPool(state, {
        connector,
        randomness: new CommitRevealRandomnessProvider(new ManualRoundClock(0), PROVIDER_KEY),
        oracle,
      });
      pool.deposit('alice', parseUFix64('10.0'), 'USDC', T0);
      return { pool, connector, state };
    }

    it('should value a foreign connector balance through the oracle', () => {
      const oracle = new StaticPriceOracle({ sUSDC: parseUFix64('1.0') });
      const { pool } = foreignAssetPool(oracle);
      expect(pool.health()).toBe(1);

      oracle.setPrice('sUSDC', parseUFix64('0.5'));

      expect(pool.health()).toBe(0.5);
    });

    it('should stake and harvest in the connector asset units', () => {
      const { pool, connector, state } = foreignAssetPool(
        new StaticPriceOracle({ sUSDC: parseUFix64('2.0') }),
      );
      expect(connector.getBalance()).toBe(500_000_000n);
      expect(state.totalStaked).toBe(1_000_000_000n);

      connector.accrueYield(parseUFix64('0.5'));
      const result = pool.processRewards(T0 + 1);

      expect(result.harvested).toBe(100_000_000n);
      expect(connector.getBalance()).toBe(535_000_000n);
      expect(pool.getAccount('alice').deposit).toBe(1_070_000_000n);
      expect(pool.getConservationReport()).toMatchObject({
        totalStaked: 1_070_000_000n,
        connectorValue: 1_070_000_000n,
        custodyBalanced: true,
      });

      expect(pool.withdraw('alice', parseUFix64('10.7'), T0 + 2)).toEqual({
        status: 'completed',
        amount: 1_070_000_000n,
        fromConnector: 1_070_000_000n,
        fromBuffer: 0n,
      });
      expect(connector.getBalance()).toBe(0n);
    });

    it('should keep an unconvertible remainder in the liquid buffer', () => {
      const { pool, connector, state } = foreignAssetPool(
        new StaticPriceOracle({ sUSDC: parseUFix64('3.0') }),
      );
      expect(state.totalStaked).toBe(999_999_999n);
      expect(state.liquidBuffer).toBe(1n);

      expect(pool.withdraw('alice', parseUFix64('10.0'), T0 + 1)).toEqual({
        status: 'completed',
        amount: 1_000_000_000n,
        fromConnector: 999_999_999n,
        fromBuffer: 1n,
      });
      expect(connector.getBalance()).toBe(0n);
    });

    it('should keep deposits liquid while the connector asset has no quote', () => {
      const { pool, connector, state } = foreignAssetPool(new StaticPriceOracle());

      expect(connector.getBalance()).toBe(0n);
      expect(state.totalStaked).toBe(0n);
      expect(state.liquidBuffer).toBe(1_000_000_000n);
      expect(pool.withdraw('alice', parseUFix64('10.0'), T0 + 1)).toMatchObject({
        status: 'completed',
        fromConnector: 0n,
        fromBuffer: 1_000_000_000n,
      });
    });
  });
});
