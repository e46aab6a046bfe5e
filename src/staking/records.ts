/**
 * Stake Records
 *
 * Global engine state and the per-account user book. Records are created
 * lazily on first write and never removed, only zeroed.
 */

import { StakingError } from './errors';

// ============ Bounds ============

export const MAX_UINT64 = (1n << 64n) - 1n;   // timestamps
export const MAX_UINT128 = (1n << 128n) - 1n; // amounts, rates
export const MAX_UINT256 = (1n << 256n) - 1n; // totals

export function checkedAdd(a: bigint, b: bigint, max: bigint, field: string): bigint {
  const sum = a + b;
  if (sum > max) {
    throw new StakingError('Overflow', `${field} would exceed ${max}`);
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint, field: string): bigint {
  if (b > a) {
    throw new StakingError('Overflow', `${field} would drop below zero`);
  }
  return a - b;
}

// ============ Types ============

export interface WithdrawalRequest {
  amount: bigint;
  pending: boolean;
  releaseAt: bigint;   // unix seconds
}

export interface UserRecord {
  amount: bigint;
  checkpoint: bigint;     // unix seconds of the last reward reset
  ratePerMinute: bigint;  // frozen when the stake went from zero to nonzero
  withdrawal: WithdrawalRequest;
}

export interface GlobalState {
  currentRate: bigint;
  totalStaked: bigint;
  stakeActive: boolean;
  owner: string;
}

export function emptyWithdrawal(): WithdrawalRequest {
  return { amount: 0n, pending: false, releaseAt: 0n };
}

export function emptyUser(): UserRecord {
  return {
    amount: 0n,
    checkpoint: 0n,
    ratePerMinute: 0n,
    withdrawal: emptyWithdrawal(),
  };
}

export function cloneUser(user: UserRecord): UserRecord {
  return { ...user, withdrawal: { ...user.withdrawal } };
}

// ============ User Book ============

export class UserBook {
  private users: Map<string, UserRecord> = new Map();
  // One map per open operation: account -> record before its first write
  private touched: Map<string, UserRecord | undefined>[] = [];

  /**
   * Read without creating a record. Not for writes: use ensure().
   */
  peek(account: string): UserRecord | undefined {
    return this.users.get(account);
  }

  /**
   * Get the record for an account for writing, creating a zeroed one if
   * needed. Inside an open operation the prior record is kept for rollback.
   */
  ensure(account: string): UserRecord {
    let user = this.users.get(account);
    for (const log of this.touched) {
      if (!log.has(account)) {
        log.set(account, user ? cloneUser(user) : undefined);
      }
    }
    if (!user) {
      user = emptyUser();
      this.users.set(account, user);
    }
    return user;
  }

  begin(): void {
    this.touched.push(new Map());
  }

  /**
   * Close the innermost operation. Enclosing operations already hold their
   * own snapshots of everything it touched.
   */
  commit(): void {
    this.touched.pop();
  }

  /**
   * Close the innermost operation and put back every record it touched
   */
  rollback(): void {
    const log = this.touched.pop();
    if (!log) return;
    for (const [account, snapshot] of log) {
      const current = this.users.get(account);
      if (!snapshot) {
        this.users.delete(account);
      } else if (current) {
        // In place: an enclosing operation may hold this record
        Object.assign(current, snapshot);
      } else {
        this.users.set(account, snapshot);
      }
    }
  }

  accounts(): string[] {
    return Array.from(this.users.keys());
  }
}
