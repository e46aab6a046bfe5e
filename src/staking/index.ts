/**
 * Staking Module
 *
 * NFT-gated staking with a decaying reward rate and delayed withdrawals.
 */

export * from './engine';
export * from './errors';
export * from './guards';
export * from './records';
export * from './rewards';
export * from './withdrawals';
