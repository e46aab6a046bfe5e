/**
 * Hydro Staking Server
 *
 * Boots the staking engine against in-memory ledgers:
 *   - deploys Hydro (stake) and KVS (reward) tokens and the gating collection
 *   - funds the engine with REWARD_POOL KVS
 *   - optionally seeds SEED_STAKER with Hydro, one NFT and an approval
 *
 * Usage:
 *   npm start
 *
 * Environment variables (see .env.example):
 *   PORT, LOG_LEVEL, ENGINE_ACCOUNT, OWNER_ACCOUNT, STAKE_ACTIVE,
 *   REWARD_POOL, WITHDRAWAL_DELAY_SECONDS, SEED_STAKER
 */

import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { InMemoryCollection, InMemoryToken } from './ledger/memory';
import { logger, setLogLevel } from './logger';
import { StakingEngine } from './staking';
import type { StakingEvent } from './staking';

const ONE_TOKEN = 10n ** 18n;

function describeEvent(event: StakingEvent): string {
  switch (event.type) {
    case 'Staked':
      return `Staked ${event.amount} by ${event.account}`;
    case 'RewardPaid':
      return `RewardPaid ${event.amount} to ${event.account}`;
    case 'WithdrawalRequested':
      return `WithdrawalRequested ${event.amount} by ${event.account}, releases at ${event.releaseAt}`;
    case 'WithdrawalClaimed':
      return `WithdrawalClaimed ${event.amount} by ${event.account}`;
    case 'RateChanged':
      return `RateChanged ${event.previous} → ${event.current}`;
    case 'StakingToggled':
      return `StakingToggled active=${event.active}`;
    case 'TokensSwept':
      return `TokensSwept ${event.amount} ${event.token}`;
    case 'OwnershipTransferred':
      return `OwnershipTransferred ${event.previous} → ${event.next}`;
  }
}

function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const hydro = new InMemoryToken('Hydro', 'HYDRO');
  const kvs = new InMemoryToken('KVS', 'KVS');
  const collection = new InMemoryCollection('Gating Collection');

  const tokens = {
    stake: hydro.connect(config.engineAccount),
    reward: kvs.connect(config.engineAccount),
  };

  const engine = new StakingEngine({
    account: config.engineAccount,
    owner: config.ownerAccount,
    stakeToken: tokens.stake,
    rewardToken: tokens.reward,
    gatingNft: collection,
    stakeActive: config.stakeActive,
    params: { withdrawalDelay: config.withdrawalDelay },
  });
  engine.subscribe((event) => logger.debug(describeEvent(event)));

  kvs.mint(config.engineAccount, config.rewardPool);
  logger.info(`Engine ${config.engineAccount} funded with ${config.rewardPool} KVS`);
  logger.info(`Owner: ${config.ownerAccount}`);

  if (config.seedStaker) {
    const allowance = 2000n * ONE_TOKEN;
    hydro.mint(config.seedStaker, allowance);
    hydro.approve(config.seedStaker, config.engineAccount, allowance);
    const tokenId = collection.mint(config.seedStaker);
    logger.info(`Seeded ${config.seedStaker} with ${allowance} HYDRO and NFT #${tokenId}`);
  }

  const app = createApp(engine, tokens);
  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`Hydro staking listening on :${info.port}`);
  });
}

try {
  main();
} catch (err) {
  logger.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
