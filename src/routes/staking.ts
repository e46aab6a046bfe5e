/**
 * Staking API Routes
 *
 * Endpoints for staking, rewards, withdrawals and administration.
 * The acting account comes from the `x-account` header. Token amounts
 * travel as decimal strings.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { isAccount } from '../accounts';
import type { TokenContract } from '../ledger/types';
import { account, uint } from '../schemas';
import { isStakingError } from '../staking/errors';
import type { StakingErrorCode } from '../staking/errors';
import type { StakingEngine } from '../staking/engine';
import type { UserRecord, WithdrawalRequest } from '../staking/records';

// ============ Types ============

export interface StakingTokens {
  stake: TokenContract;
  reward: TokenContract;
}

type ErrorStatus = 400 | 401 | 403 | 409 | 423 | 500 | 502;

const ERROR_STATUS: Record<StakingErrorCode, ErrorStatus> = {
  InvalidAmount: 400,
  InsufficientAmount: 400,
  NotStaker: 400,
  NoPendingRequest: 400,
  InvalidRate: 400,
  InvalidOwner: 400,
  Overflow: 400,
  NotOwner: 403,
  NoGatingNft: 403,
  PendingRequest: 409,
  ReentrantCall: 409,
  WithdrawalLocked: 423,
  StakingInactive: 423,
  TransferFailed: 502,
  InvariantViolation: 500,
};

// ============ Helpers ============

function fail(c: Context, error: unknown) {
  if (isStakingError(error)) {
    return c.json(
      { success: false, error: error.message, code: error.code },
      ERROR_STATUS[error.code]
    );
  }
  throw error;
}

function invalid(c: Context, details: unknown) {
  return c.json({ success: false, error: 'Invalid request', details }, 400);
}

type BodyResult<T> = { success: true; data: T } | { success: false; details: unknown };

/**
 * Parse the JSON body against `schema`. An empty body reads as `{}` so
 * that calls whose fields all have defaults need no body.
 */
async function readBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<BodyResult<z.output<T>>> {
  let body: unknown = {};
  const text = await c.req.text();
  if (text.trim() !== '') {
    try {
      body = JSON.parse(text);
    } catch {
      return { success: false, details: 'Malformed JSON body' };
    }
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { success: false, details: parsed.error.flatten() };
  }
  return { success: true, data: parsed.data };
}

function serializeWithdrawal(request: WithdrawalRequest) {
  return {
    amount: request.amount.toString(),
    pending: request.pending,
    releaseAt: Number(request.releaseAt),
  };
}

function serializeUser(user: UserRecord) {
  return {
    amount: user.amount.toString(),
    checkpoint: Number(user.checkpoint),
    ratePerMinute: user.ratePerMinute.toString(),
    withdrawal: serializeWithdrawal(user.withdrawal),
  };
}

// ============ Routes ============

export function createStakingRoutes(engine: StakingEngine, tokens: StakingTokens): Hono {
  const staking = new Hono();

  // Every mutating call needs a caller
  staking.use('*', async (c, next) => {
    if (c.req.method === 'GET') {
      return next();
    }
    const caller = c.req.header('x-account');
    if (!caller) {
      return c.json({ success: false, error: 'Missing x-account header' }, 401);
    }
    if (!isAccount(caller)) {
      return c.json({ success: false, error: 'Invalid x-account header' }, 400);
    }
    return next();
  });

  const callerOf = (c: Context): string => c.req.header('x-account') ?? '';

  // ============ Views ============

  staking.get('/state', (c) => {
    return c.json({
      success: true,
      state: {
        currentRate: engine.currentRate().toString(),
        apyBps: engine.apy().toString(),
        totalStaked: engine.totalStaked().toString(),
        stakeActive: engine.stakeActive(),
        owner: engine.owner(),
        withdrawalDelay: Number(engine.params.withdrawalDelay),
      },
    });
  });

  staking.get('/users/:account', (c) => {
    const parsed = account.safeParse(c.req.param('account'));
    if (!parsed.success) {
      return invalid(c, parsed.error.flatten());
    }

    const user = engine.getUser(parsed.data);
    const rewards = user.amount > 0n ? engine.checkCurrentRewards(parsed.data) : 0n;

    return c.json({
      success: true,
      account: parsed.data,
      user: serializeUser(user),
      currentRewards: rewards.toString(),
    });
  });

  // ============ Staking Operations ============

  staking.post('/stake', async (c) => {
    const parsed = await readBody(c, z.object({ amount: uint }));
    if (!parsed.success) {
      return invalid(c, parsed.details);
    }

    try {
      const receipt = await engine.stake(callerOf(c), parsed.data.amount);
      return c.json({
        success: true,
        message: `Staked ${receipt.staked} ${tokens.stake.symbol}`,
        staked: receipt.staked.toString(),
        rewardPaid: receipt.rewardPaid.toString(),
        user: serializeUser(engine.getUser(callerOf(c))),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/withdraw-profit', async (c) => {
    const parsed = await readBody(c, z.object({ minimum: uint.default('0') }));
    if (!parsed.success) {
      return invalid(c, parsed.details);
    }

    try {
      const reward = await engine.withdrawProfit(callerOf(c), parsed.data.minimum);
      return c.json({
        success: true,
        message: `Paid ${reward} ${tokens.reward.symbol}`,
        rewardPaid: reward.toString(),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/withdraw-funds', async (c) => {
    const parsed = await readBody(c, z.object({ amount: uint }));
    if (!parsed.success) {
      return invalid(c, parsed.details);
    }

    try {
      const receipt = await engine.withdrawFunds(callerOf(c), parsed.data.amount);
      return c.json({
        success: true,
        message: 'Withdrawal requested',
        rewardPaid: receipt.rewardPaid.toString(),
        withdrawal: serializeWithdrawal(receipt.withdrawal),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/exit', async (c) => {
    try {
      const receipt = await engine.exit(callerOf(c));
      return c.json({
        success: true,
        message: 'Unstaked; principal queued for withdrawal',
        rewardPaid: receipt.rewardPaid.toString(),
        withdrawal: serializeWithdrawal(receipt.withdrawal),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/claim', async (c) => {
    try {
      const amount = await engine.claimHydro(callerOf(c));
      return c.json({
        success: true,
        message: `Released ${amount} ${tokens.stake.symbol}`,
        amount: amount.toString(),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  // ============ Administration ============

  staking.post('/admin/toggle', async (c) => {
    try {
      const active = await engine.toggleStaking(callerOf(c));
      return c.json({ success: true, stakeActive: active });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/admin/rate', async (c) => {
    const parsed = await readBody(c, z.object({ rate: uint }));
    if (!parsed.success) {
      return invalid(c, parsed.details);
    }

    try {
      await engine.setRate(callerOf(c), parsed.data.rate);
      return c.json({
        success: true,
        currentRate: engine.currentRate().toString(),
        apyBps: engine.apy().toString(),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/admin/sweep', async (c) => {
    const parsed = await readBody(c, z.object({ token: z.enum(['stake', 'reward']) }));
    if (!parsed.success) {
      return invalid(c, parsed.details);
    }

    try {
      const token = tokens[parsed.data.token];
      const amount = await engine.sweep(callerOf(c), token);
      return c.json({
        success: true,
        message: `Swept ${amount} ${token.symbol} to the owner`,
        amount: amount.toString(),
      });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/admin/transfer-ownership', async (c) => {
    const parsed = await readBody(c, z.object({ owner: z.string() }));
    if (!parsed.success) {
      return invalid(c, parsed.details);
    }

    try {
      await engine.transferOwnership(callerOf(c), parsed.data.owner);
      return c.json({ success: true, owner: engine.owner() });
    } catch (error) {
      return fail(c, error);
    }
  });

  staking.post('/admin/renounce', async (c) => {
    try {
      await engine.renounceOwnership(callerOf(c));
      return c.json({ success: true, owner: engine.owner() });
    } catch (error) {
      return fail(c, error);
    }
  });

  return staking;
}
