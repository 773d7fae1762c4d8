import { createActor, systemActor } from '../../src/lib/auth/permissions';
import {
  CommitRevealRandomnessProvider,
  ManualRoundClock,
} from '../../src/services/connectors/randomnessProvider';
import {
  InMemoryYieldConnector,
  type InMemoryYieldConnectorOptions,
} from '../../src/services/connectors/yieldConnector';
import { createPoolState, type CreatePoolInput } from '../../src/services/pool/poolState';
import { PrizeSavingsPool } from '../../src/services/pool/prizeSavingsPool';
import { InMemoryWinnerTracker } from '../../src/services/winnerTracker';
import { parseUFix64 } from '../../src/utils/ufix64';

export const T0 = 1_000;
export const PROVIDER_KEY = 'test-randomness-secret';

export const admin = systemActor('test-admin');
export const viewer = createActor('viewer', []);

export function poolInput(overrides: Partial<CreatePoolInput> = {}): CreatePoolInput {
  return {
    poolId: 'test-pool',
    assetId: 'USDC',
    minimumDeposit: parseUFix64('1.0'),
    drawIntervalSeconds: 100,
    distributionStrategy: {
      type: 'fixedPercentage',
      savings: parseUFix64('0.7'),
      lottery: parseUFix64('0.2'),
      treasury: parseUFix64('0.1'),
    },
    winnerSelectionStrategy: { type: 'single' },
    ...overrides,
  };
}

export function createTestPool(
  overrides: Partial<CreatePoolInput> = {},
  connectorOptions: Partial<InMemoryYieldConnectorOptions> = {},
) {
  const clock = new ManualRoundClock(0);
  const connector = new InMemoryYieldConnector({ assetId: 'USDC', ...connectorOptions });
  const randomness = new CommitRevealRandomnessProvider(clock, PROVIDER_KEY);
  const tracker = new InMemoryWinnerTracker();
  const state = createPoolState(poolInput(overrides), T0);
  const pool = new PrizeSavingsPool(state, { connector, randomness, tracker });
  return { pool, state, connector, clock, randomness, tracker };
}
