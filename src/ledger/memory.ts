/**
 * In-Memory Ledgers
 *
 * Minimal fungible token and NFT collection kept in process memory.
 * Used by the local server and by tests in place of on-chain contracts.
 */

import type { OwnershipOracle, TokenContract } from './types';

// ============ Fungible Token ============

export class InMemoryToken {
  private balances: Map<string, bigint> = new Map();
  private allowances: Map<string, bigint> = new Map();

  constructor(
    readonly name: string,
    readonly symbol: string
  ) {}

  async balanceOf(account: string): Promise<bigint> {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  mint(to: string, amount: bigint): void {
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
  }

  approve(owner: string, spender: string, amount: bigint): void {
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  /**
   * Move tokens out of `from`. Returns false instead of throwing when the
   * balance is short, like an ERC20 that reports failure.
   */
  move(from: string, to: string, amount: bigint): boolean {
    const balance = this.balances.get(from) ?? 0n;
    if (amount < 0n || balance < amount) {
      return false;
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
    return true;
  }

  spend(spender: string, from: string, to: string, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      return false;
    }
    if (!this.move(from, to, amount)) {
      return false;
    }
    this.allowances.set(allowanceKey(from, spender), allowed - amount);
    return true;
  }

  /**
   * Handle that acts as `account`, the shape the staking engine consumes
   */
  connect(account: string): TokenContract {
    return {
      symbol: this.symbol,
      balanceOf: async (holder) => this.balanceOf(holder),
      transfer: async (to, amount) => this.move(account, to, amount),
      transferFrom: async (from, to, amount) => this.spend(account, from, to, amount),
    };
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}:${spender}`;
}

// ============ NFT Collection ============

export class InMemoryCollection implements OwnershipOracle {
  private owners: Map<number, string> = new Map();
  private nextId = 1;

  constructor(readonly name: string) {}

  mint(to: string): number {
    const tokenId = this.nextId++;
    this.owners.set(tokenId, to);
    return tokenId;
  }

  burn(tokenId: number): void {
    if (!this.owners.delete(tokenId)) {
      throw new Error(`Token ${tokenId} does not exist`);
    }
  }

  ownerOf(tokenId: number): string | undefined {
    return this.owners.get(tokenId);
  }

  async balanceOf(account: string): Promise<bigint> {
    let count = 0n;
    for (const owner of this.owners.values()) {
      if (owner === account) count++;
    }
    return count;
  }
}
