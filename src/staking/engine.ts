/**
 * Staking Engine
 *
 * Hydro in, KVS out. Holders of the gating collection lock the stake token
 * and earn the reward token per minute at the rate that was current when
 * they joined. Unstaked principal waits in a delayed withdrawal request.
 *
 * Each state-changing call:
 * 1. waits its turn on the serial executor
 * 2. takes the re-entrancy latch if it moves value out
 * 3. runs against a snapshot that is restored if anything throws; stake
 *    tokens already pulled in by the failed call are sent back
 */

import { isAccount, NULL_ACCOUNT } from '../accounts';
import type { OwnershipOracle, TokenContract } from '../ledger/types';
import { StakingError } from './errors';
import { assertOwner, ReentrancyLatch, SerialExecutor } from './guards';
import {
  checkedAdd,
  checkedSub,
  cloneUser,
  emptyUser,
  MAX_UINT128,
  MAX_UINT256,
  UserBook,
} from './records';
import type { GlobalState, UserRecord, WithdrawalRequest } from './records';
import { accruedReward, estimateApy, MAX_RATE, RATE_STEP, syncRate } from './rewards';
import type { RateDirection } from './rewards';
import { placeWithdrawalRequest, releaseWithdrawal, WITHDRAWAL_DELAY } from './withdrawals';

// ============ Types ============

/** Unix time in seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface StakingParams {
  maxRate: bigint;
  rateStep: bigint;
  withdrawalDelay: bigint;  // seconds
}

export const DEFAULT_PARAMS: StakingParams = {
  maxRate: MAX_RATE,
  rateStep: RATE_STEP,
  withdrawalDelay: WITHDRAWAL_DELAY,
};

export type StakingEvent =
  | { type: 'Staked'; account: string; amount: bigint; timestamp: bigint }
  | { type: 'RewardPaid'; account: string; amount: bigint }
  | { type: 'WithdrawalRequested'; account: string; amount: bigint; releaseAt: bigint }
  | { type: 'WithdrawalClaimed'; account: string; amount: bigint }
  | { type: 'RateChanged'; previous: bigint; current: bigint }
  | { type: 'StakingToggled'; active: boolean }
  | { type: 'TokensSwept'; token: string; amount: bigint }
  | { type: 'OwnershipTransferred'; previous: string; next: string };

export type StakingListener = (event: StakingEvent) => void;

export interface StakingEngineOptions {
  account: string;            // the engine's own address on the ledgers
  owner: string;
  stakeToken: TokenContract;
  rewardToken: TokenContract;
  gatingNft: OwnershipOracle;
  clock?: Clock;
  params?: Partial<StakingParams>;
  stakeActive?: boolean;
}

export interface StakeReceipt {
  staked: bigint;
  rewardPaid: bigint;
}

export interface UnstakeReceipt {
  rewardPaid: bigint;
  withdrawal: WithdrawalRequest;
}

// ============ Engine ============

export class StakingEngine {
  readonly account: string;
  readonly params: StakingParams;

  private stakeToken: TokenContract;
  private rewardToken: TokenContract;
  private gatingNft: OwnershipOracle;
  private clock: Clock;

  private state: GlobalState;
  private users = new UserBook();
  private executor = new SerialExecutor();
  private latch = new ReentrancyLatch();

  private journal: StakingEvent[] = [];
  private log: StakingEvent[] = [];
  private listeners: Set<StakingListener> = new Set();
  private depth = 0;
  // Per open operation: transfers that undo pulls it already made
  private refunds: Array<Array<() => Promise<void>>> = [];

  constructor(options: StakingEngineOptions) {
    this.account = options.account;
    this.params = { ...DEFAULT_PARAMS, ...options.params };
    this.stakeToken = options.stakeToken;
    this.rewardToken = options.rewardToken;
    this.gatingNft = options.gatingNft;
    this.clock = options.clock ?? systemClock;
    this.state = {
      currentRate: this.params.maxRate,
      totalStaked: 0n,
      stakeActive: options.stakeActive ?? true,
      owner: options.owner,
    };
  }

  // ============ Staking ============

  /**
   * Lock `amount` stake tokens. The caller must have approved the engine
   * and hold at least one gating NFT.
   */
  async stake(caller: string, amount: bigint): Promise<StakeReceipt> {
    return this.executor.run(() =>
      this.atomically(async (now) => {
        if (amount <= 0n) {
          throw new StakingError('InvalidAmount', 'Stake amount must be positive');
        }
        if ((await this.gatingNft.balanceOf(caller)) === 0n) {
          throw new StakingError('NoGatingNft', 'Caller holds no gating NFT');
        }
        if (!this.state.stakeActive) {
          throw new StakingError('StakingInactive', 'Staking is paused');
        }

        const user = this.users.ensure(caller);
        const nextAmount = checkedAdd(user.amount, amount, MAX_UINT128, 'amount');
        const nextTotal = checkedAdd(this.state.totalStaked, amount, MAX_UINT256, 'totalStaked');
        const firstStake = user.amount === 0n;
        const reward = firstStake ? 0n : accruedReward(user, now);

        await this.collect(caller, amount);

        if (firstStake) {
          user.ratePerMinute = this.state.currentRate;
          this.adjustRate('enter');
        }
        user.amount = nextAmount;
        user.checkpoint = now;
        this.state.totalStaked = nextTotal;
        this.record({ type: 'Staked', account: caller, amount, timestamp: now });

        await this.payReward(caller, reward);
        return { staked: amount, rewardPaid: reward };
      })
    );
  }

  /**
   * Claim everything accrued so far. `minimum` is a floor, not a slice:
   * the whole reward is paid once it clears it.
   */
  async withdrawProfit(caller: string, minimum: bigint): Promise<bigint> {
    return this.executor.run(() =>
      this.latch.guard(() =>
        this.atomically(async (now) => {
          const user = this.requireStaker(caller);
          const reward = accruedReward(user, now);
          if (reward < minimum) {
            throw new StakingError(
              'InsufficientAmount',
              `Accrued reward ${reward} is below the requested ${minimum}`
            );
          }

          user.checkpoint = now;
          await this.payReward(caller, reward);
          return reward;
        })
      )
    );
  }

  /**
   * Full unstake: pays rewards and queues the whole principal for withdrawal
   */
  async exit(caller: string): Promise<UnstakeReceipt> {
    return this.executor.run(() =>
      this.latch.guard(() =>
        this.atomically(async (now) => {
          const user = this.requireStaker(caller);
          const reward = accruedReward(user, now);
          const principal = user.amount;

          const withdrawal = this.requestWithdrawal(caller, user, principal, now);
          user.checkpoint = now;
          user.amount = 0n;
          this.adjustRate('exit');
          this.state.totalStaked = checkedSub(this.state.totalStaked, principal, 'totalStaked');

          await this.payReward(caller, reward);
          return { rewardPaid: reward, withdrawal };
        })
      )
    );
  }

  /**
   * Partial unstake. Dropping to exactly zero counts as leaving.
   */
  async withdrawFunds(caller: string, amount: bigint): Promise<UnstakeReceipt> {
    return this.executor.run(() =>
      this.latch.guard(() =>
        this.atomically(async (now) => {
          const user = this.requireStaker(caller);
          if (amount <= 0n) {
            throw new StakingError('InvalidAmount', 'Withdrawal amount must be positive');
          }
          if (amount > user.amount) {
            throw new StakingError(
              'InsufficientAmount',
              `Requested ${amount} exceeds staked ${user.amount}`
            );
          }

          const reward = accruedReward(user, now);
          const withdrawal = this.requestWithdrawal(caller, user, amount, now);

          user.amount -= amount;
          this.state.totalStaked = checkedSub(this.state.totalStaked, amount, 'totalStaked');
          if (user.amount === 0n) {
            this.adjustRate('exit');
          }
          user.checkpoint = now;

          await this.payReward(caller, reward);
          return { rewardPaid: reward, withdrawal };
        })
      )
    );
  }

  /**
   * Release a matured withdrawal request in stake tokens
   */
  async claimHydro(caller: string): Promise<bigint> {
    return this.executor.run(() =>
      this.latch.guard(() =>
        this.atomically(async (now) => {
          const user = this.users.ensure(caller);
          const amount = releaseWithdrawal(user, now);

          await this.send(this.stakeToken, caller, amount);
          this.record({ type: 'WithdrawalClaimed', account: caller, amount });
          return amount;
        })
      )
    );
  }

  // ============ Administration ============

  async toggleStaking(caller: string): Promise<boolean> {
    return this.executor.run(() =>
      this.atomically(async () => {
        assertOwner(this.state, caller);
        this.state.stakeActive = !this.state.stakeActive;
        this.record({ type: 'StakingToggled', active: this.state.stakeActive });
        return this.state.stakeActive;
      })
    );
  }

  async setRate(caller: string, rate: bigint): Promise<void> {
    return this.executor.run(() =>
      this.atomically(async () => {
        assertOwner(this.state, caller);
        if (rate < 0n || rate > this.params.maxRate) {
          throw new StakingError('InvalidRate', `Rate must be within 0..${this.params.maxRate}`);
        }
        this.changeRate(rate);
      })
    );
  }

  /**
   * Send the engine's entire balance of `token` to the owner
   */
  async sweep(caller: string, token: TokenContract): Promise<bigint> {
    return this.executor.run(() =>
      this.atomically(async () => {
        assertOwner(this.state, caller);
        const amount = await token.balanceOf(this.account);
        if (amount > 0n) {
          await this.send(token, this.state.owner, amount);
        }
        this.record({ type: 'TokensSwept', token: token.symbol, amount });
        return amount;
      })
    );
  }

  async transferOwnership(caller: string, next: string): Promise<void> {
    return this.executor.run(() =>
      this.atomically(async () => {
        assertOwner(this.state, caller);
        if (!isAccount(next) || next === NULL_ACCOUNT) {
          throw new StakingError('InvalidOwner', `Cannot hand ownership to ${next}`);
        }
        this.setOwner(next);
      })
    );
  }

  async renounceOwnership(caller: string): Promise<void> {
    return this.executor.run(() =>
      this.atomically(async () => {
        assertOwner(this.state, caller);
        this.setOwner(NULL_ACCOUNT);
      })
    );
  }

  // ============ Views ============

  currentRate(): bigint {
    return this.state.currentRate;
  }

  totalStaked(): bigint {
    return this.state.totalStaked;
  }

  stakeActive(): boolean {
    return this.state.stakeActive;
  }

  owner(): string {
    return this.state.owner;
  }

  /**
   * APY of the rate a new staker would get, in basis points
   */
  apy(): bigint {
    return estimateApy(this.state.currentRate);
  }

  getUser(account: string): UserRecord {
    const user = this.users.peek(account);
    return user ? cloneUser(user) : emptyUser();
  }

  /**
   * Unrealized reward right now. Throws for accounts with nothing staked.
   */
  checkCurrentRewards(account: string): bigint {
    return accruedReward(this.users.peek(account) ?? emptyUser(), this.now());
  }

  accounts(): string[] {
    return this.users.accounts();
  }

  events(): StakingEvent[] {
    return [...this.log];
  }

  subscribe(listener: StakingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============ Internals ============

  private now(): bigint {
    return BigInt(Math.floor(this.clock()));
  }

  /**
   * Run `fn` against the current state. If it throws, roll back the
   * globals, every user record touched (nested calls included) and the
   * buffered events, then return pulled stake tokens to their senders.
   */
  private async atomically<T>(fn: (now: bigint) => Promise<T>): Promise<T> {
    const now = this.now();
    const state = { ...this.state };
    const mark = this.journal.length;

    this.depth++;
    this.users.begin();
    this.refunds.push([]);
    try {
      const result = await fn(now);
      this.users.commit();
      const done = this.refunds.pop() ?? [];
      // An enclosing operation that fails later must undo these too
      this.refunds.at(-1)?.push(...done);
      return result;
    } catch (error) {
      this.state = state;
      this.users.rollback();
      this.journal.length = mark;
      const pending = this.refunds.pop() ?? [];
      for (const refund of pending.reverse()) {
        await refund();
      }
      throw error;
    } finally {
      this.depth--;
      if (this.depth === 0) {
        this.flush();
      }
    }
  }

  private requireStaker(caller: string): UserRecord {
    const user = this.users.peek(caller);
    if (!user || user.amount === 0n) {
      throw new StakingError('NotStaker', 'Caller has nothing staked');
    }
    return this.users.ensure(caller);
  }

  private requestWithdrawal(
    caller: string,
    user: UserRecord,
    amount: bigint,
    now: bigint
  ): WithdrawalRequest {
    const request = placeWithdrawalRequest(user, amount, now, this.params.withdrawalDelay);
    this.record({
      type: 'WithdrawalRequested',
      account: caller,
      amount,
      releaseAt: request.releaseAt,
    });
    return request;
  }

  private adjustRate(direction: RateDirection): void {
    this.changeRate(syncRate(this.state.currentRate, direction, this.params));
  }

  private changeRate(rate: bigint): void {
    const previous = this.state.currentRate;
    this.state.currentRate = rate;
    if (previous !== rate) {
      this.record({ type: 'RateChanged', previous, current: rate });
    }
  }

  private setOwner(next: string): void {
    const previous = this.state.owner;
    this.state.owner = next;
    this.record({ type: 'OwnershipTransferred', previous, next });
  }

  private async collect(from: string, amount: bigint): Promise<void> {
    let ok: boolean;
    try {
      ok = await this.stakeToken.transferFrom(from, this.account, amount);
    } catch (error) {
      throw new StakingError('TransferFailed', `${this.stakeToken.symbol} pull from ${from} failed`, {
        cause: error,
      });
    }
    if (!ok) {
      throw new StakingError('TransferFailed', `${this.stakeToken.symbol} pull from ${from} was refused`);
    }
    this.refunds.at(-1)?.push(() => this.send(this.stakeToken, from, amount));
  }

  private async send(token: TokenContract, to: string, amount: bigint): Promise<void> {
    let ok: boolean;
    try {
      ok = await token.transfer(to, amount);
    } catch (error) {
      throw new StakingError('TransferFailed', `${token.symbol} transfer to ${to} failed`, {
        cause: error,
      });
    }
    if (!ok) {
      throw new StakingError('TransferFailed', `${token.symbol} transfer to ${to} was refused`);
    }
  }

  private async payReward(to: string, reward: bigint): Promise<void> {
    if (reward === 0n) return;
    await this.send(this.rewardToken, to, reward);
    this.record({ type: 'RewardPaid', account: to, amount: reward });
  }

  private record(event: StakingEvent): void {
    this.journal.push(event);
  }

  private flush(): void {
    const events = this.journal;
    this.journal = [];
    for (const event of events) {
      this.log.push(event);
      for (const listener of this.listeners) {
        listener(event);
      }
    }
  }
}
