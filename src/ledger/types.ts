/**
 * Ledger Collaborators
 *
 * What the staking engine needs from the outside world. Token handles are
 * bound to the engine's own account: `transfer` moves the engine's tokens,
 * `transferFrom` spends an allowance granted to the engine.
 */

export interface TokenContract {
  readonly symbol: string;
  balanceOf(account: string): Promise<bigint>;
  transfer(to: string, amount: bigint): Promise<boolean>;
  transferFrom(from: string, to: string, amount: bigint): Promise<boolean>;
}

export interface OwnershipOracle {
  balanceOf(account: string): Promise<bigint>;
}
