import { generateAccount } from '../src/accounts';
import { InMemoryCollection, InMemoryToken } from '../src/ledger/memory';
import type { TokenContract } from '../src/ledger/types';
import { StakingEngine } from '../src/staking/engine';
import { isStakingError } from '../src/staking/errors';

export const ONE = 10n ** 18n;
export const START = 1_700_000_000;

export class FakeClock {
  constructor(public seconds: number = START) {}

  now = (): number => this.seconds;

  advance(seconds: number): void {
    this.seconds += seconds;
  }
}

export interface SetupOptions {
  stakeActive?: boolean;
  rewardPool?: bigint;
  rewardToken?: (base: TokenContract) => TokenContract;
}

/**
 * Engine wired to in-memory ledgers. Alice and Bob each hold 1000 HYDRO,
 * an approval for all of it and one gating NFT.
 */
export function setup(options: SetupOptions = {}) {
  const clock = new FakeClock();
  const engineAccount = generateAccount();
  const owner = generateAccount();
  const alice = generateAccount();
  const bob = generateAccount();

  const hydro = new InMemoryToken('Hydro', 'HYDRO');
  const kvs = new InMemoryToken('KVS', 'KVS');
  const apes = new InMemoryCollection('Apes');

  kvs.mint(engineAccount, options.rewardPool ?? 2000n * ONE);
  for (const holder of [alice, bob]) {
    hydro.mint(holder, 1000n * ONE);
    hydro.approve(holder, engineAccount, 1000n * ONE);
    apes.mint(holder);
  }

  const stakeToken = hydro.connect(engineAccount);
  const baseReward = kvs.connect(engineAccount);
  const rewardToken = options.rewardToken ? options.rewardToken(baseReward) : baseReward;

  const engine = new StakingEngine({
    account: engineAccount,
    owner,
    stakeToken,
    rewardToken,
    gatingNft: apes,
    clock: clock.now,
    stakeActive: options.stakeActive,
  });

  return {
    engine,
    clock,
    hydro,
    kvs,
    apes,
    engineAccount,
    owner,
    alice,
    bob,
    tokens: { stake: stakeToken, reward: rewardToken },
  };
}

export function sumOfStakes(engine: StakingEngine): bigint {
  return engine.accounts().reduce((sum, account) => sum + engine.getUser(account).amount, 0n);
}

/**
 * Error code thrown by a synchronous call, if any
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isStakingError(error) ? error.code : `unexpected: ${String(error)}`;
  }
  return undefined;
}
