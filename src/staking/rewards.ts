/**
 * Reward Rate Model
 *
 * Rewards accrue per staked unit per whole minute at a rate scaled by 1e18.
 * Each account keeps the rate that was current when it started staking;
 * the global rate only decides what new stakers get.
 *
 * Rate moves by a fixed step:
 * - staker enters → rate goes down (floor 0)
 * - staker leaves → rate goes up (ceiling maxRate)
 */

import { invariant } from './errors';
import type { UserRecord } from './records';

// ============ Configuration ============

export const SCALE = 10n ** 18n;
export const SECONDS_PER_MINUTE = 60n;
export const MINUTES_PER_YEAR = 525_600n;

export const MAX_RATE = 1_902_587_519_025n;  // ~100% APY
export const RATE_STEP = 19_025_875_190n;    // ~1% APY

// apy() = currentRate * APY_SCALE / REWARD_DIVISOR, in basis points
export const APY_SCALE = MINUTES_PER_YEAR * 10_000n;
export const REWARD_DIVISOR = SCALE;

export interface RateParams {
  maxRate: bigint;
  rateStep: bigint;
}

export type RateDirection = 'enter' | 'exit';

// ============ Rewards ============

/**
 * Unrealized reward of a staker at `now`. Whole minutes only.
 */
export function accruedReward(user: UserRecord, now: bigint): bigint {
  invariant(user.amount > 0n, 'reward read on an empty stake');
  invariant(now >= user.checkpoint, 'clock is behind the checkpoint');

  const elapsedMinutes = (now - user.checkpoint) / SECONDS_PER_MINUTE;
  const rewardPerUnit = user.ratePerMinute * elapsedMinutes;
  return (rewardPerUnit * user.amount) / SCALE;
}

/**
 * Next global rate after a staker enters or leaves
 */
export function syncRate(rate: bigint, direction: RateDirection, params: RateParams): bigint {
  if (direction === 'enter') {
    return rate > params.rateStep ? rate - params.rateStep : 0n;
  }
  const raised = rate + params.rateStep;
  return raised > params.maxRate ? params.maxRate : raised;
}

/**
 * Annualized yield of a per-minute rate, in basis points
 */
export function estimateApy(rate: bigint): bigint {
  return (rate * APY_SCALE) / REWARD_DIVISOR;
}
