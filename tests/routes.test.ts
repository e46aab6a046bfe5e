import { describe, it, expect, beforeAll } from 'vitest';
import { generateAccount } from '../src/accounts';
import { createApp } from '../src/app';
import { setLogLevel } from '../src/logger';
import { ONE, setup } from './helpers';

const HUNDRED = (100n * ONE).toString();

function post(account: string | undefined, body?: unknown): RequestInit {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (account) headers['x-account'] = account;
  return {
    method: 'POST',
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}

function fixture() {
  const ctx = setup();
  return { ...ctx, app: createApp(ctx.engine, ctx.tokens) };
}

describe('Staking API', () => {
  beforeAll(() => {
    setLogLevel('error');
  });

  it('should answer health checks', async () => {
    const { app } = fixture();
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, status: 'ok' });
  });

  it('should report engine state', async () => {
    const { app, owner } = fixture();
    const res = await app.request('/staking/state');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      state: {
        currentRate: '1902587519025',
        apyBps: '9999',
        totalStaked: '0',
        stakeActive: true,
        owner,
        withdrawalDelay: 604800,
      },
    });
  });

  it('should require a caller for mutating calls', async () => {
    const { app } = fixture();

    const missing = await app.request('/staking/stake', post(undefined, { amount: HUNDRED }));
    expect(missing.status).toBe(401);

    const malformed = await app.request('/staking/stake', post('0xabc', { amount: HUNDRED }));
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ success: false, error: 'Invalid x-account header' });
  });

  it('should validate request bodies', async () => {
    const { app, alice } = fixture();

    const negative = await app.request('/staking/stake', post(alice, { amount: '-5' }));
    expect(negative.status).toBe(400);
    expect(await negative.json()).toMatchObject({ success: false, error: 'Invalid request' });

    const numeric = await app.request('/staking/stake', post(alice, { amount: 100 }));
    expect(numeric.status).toBe(400);

    const broken = await app.request('/staking/stake', {
      method: 'POST',
      headers: { 'x-account': alice, 'content-type': 'application/json' },
      body: '{"amount":',
    });
    expect(broken.status).toBe(400);
    expect(await broken.json()).toEqual({
      success: false,
      error: 'Invalid request',
      details: 'Malformed JSON body',
    });
  });

  it('should reject a bare JSON string body without reaching the engine', async () => {
    const { app, engine, alice } = fixture();

    const res = await app.request('/staking/withdraw-profit', {
      method: 'POST',
      headers: { 'x-account': alice, 'content-type': 'application/json' },
      body: 'minimum',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Invalid request',
      details: 'Malformed JSON body',
    });
    expect(engine.events()).toEqual([]);
  });

  it('should default an empty body', async () => {
    const { app, alice } = fixture();

    const res = await app.request('/staking/withdraw-profit', post(alice));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, code: 'NotStaker' });
  });

  it('should stake and show the position', async () => {
    const { app, clock, alice } = fixture();

    const res = await app.request('/staking/stake', post(alice, { amount: HUNDRED }));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      message: `Staked ${HUNDRED} HYDRO`,
      staked: HUNDRED,
      rewardPaid: '0',
      user: { amount: HUNDRED, ratePerMinute: '1902587519025' },
    });

    clock.advance(60);
    const position = await app.request(`/staking/users/${alice}`);
    expect(await position.json()).toMatchObject({
      success: true,
      account: alice,
      user: { amount: HUNDRED, withdrawal: { amount: '0', pending: false, releaseAt: 0 } },
      currentRewards: '190258751902500',
    });
  });

  it('should show zero rewards for unknown accounts and reject bad ones', async () => {
    const { app } = fixture();
    const stranger = generateAccount();

    const known = await app.request(`/staking/users/${stranger}`);
    expect(await known.json()).toMatchObject({ currentRewards: '0', user: { amount: '0' } });

    const bad = await app.request('/staking/users/not-a-key');
    expect(bad.status).toBe(400);
  });

  it('should map engine errors to statuses', async () => {
    const { app, alice } = fixture();
    const carol = generateAccount();

    const gated = await app.request('/staking/stake', post(carol, { amount: HUNDRED }));
    expect(gated.status).toBe(403);
    expect(await gated.json()).toMatchObject({ success: false, code: 'NoGatingNft' });

    const notStaker = await app.request('/staking/exit', post(alice));
    expect(notStaker.status).toBe(400);
    expect(await notStaker.json()).toMatchObject({ code: 'NotStaker' });
  });

  it('should run the exit and claim flow', async () => {
    const { app, clock, alice, hydro } = fixture();
    await app.request('/staking/stake', post(alice, { amount: HUNDRED }));
    clock.advance(60);

    const exit = await app.request('/staking/exit', post(alice));
    expect(exit.status).toBe(200);
    expect(await exit.json()).toMatchObject({
      rewardPaid: '190258751902500',
      withdrawal: { amount: HUNDRED, pending: true, releaseAt: 1_700_000_060 + 604_800 },
    });

    const early = await app.request('/staking/claim', post(alice));
    expect(early.status).toBe(423);
    expect(await early.json()).toMatchObject({ code: 'WithdrawalLocked' });

    clock.advance(604_800);
    const claim = await app.request('/staking/claim', post(alice));
    expect(claim.status).toBe(200);
    expect(await claim.json()).toMatchObject({ amount: HUNDRED, message: `Released ${HUNDRED} HYDRO` });
    expect(await hydro.balanceOf(alice)).toBe(1000n * ONE);
  });

  it('should pay profit and partial withdrawals', async () => {
    const { app, clock, alice } = fixture();
    await app.request('/staking/stake', post(alice, { amount: HUNDRED }));
    clock.advance(60);

    const profit = await app.request('/staking/withdraw-profit', post(alice));
    expect(await profit.json()).toMatchObject({ success: true, rewardPaid: '190258751902500' });

    const partial = await app.request('/staking/withdraw-funds', post(alice, { amount: ONE.toString() }));
    expect(await partial.json()).toMatchObject({
      success: true,
      rewardPaid: '0',
      withdrawal: { amount: ONE.toString(), pending: true },
    });

    const second = await app.request('/staking/withdraw-funds', post(alice, { amount: '1' }));
    expect(second.status).toBe(409);
    expect(await second.json()).toMatchObject({ code: 'PendingRequest' });
  });

  it('should gate administration on the owner', async () => {
    const { app, owner, alice } = fixture();

    const denied = await app.request('/staking/admin/toggle', post(alice));
    expect(denied.status).toBe(403);

    const toggled = await app.request('/staking/admin/toggle', post(owner));
    expect(await toggled.json()).toEqual({ success: true, stakeActive: false });

    const paused = await app.request('/staking/stake', post(alice, { amount: HUNDRED }));
    expect(paused.status).toBe(423);

    const rate = await app.request('/staking/admin/rate', post(owner, { rate: '1000' }));
    expect(await rate.json()).toEqual({ success: true, currentRate: '1000', apyBps: '0' });

    const sweep = await app.request('/staking/admin/sweep', post(owner, { token: 'reward' }));
    expect(await sweep.json()).toMatchObject({ success: true, amount: (2000n * ONE).toString() });
  });

  it('should transfer and renounce ownership', async () => {
    const { app, owner, bob } = fixture();

    const invalid = await app.request('/staking/admin/transfer-ownership', post(owner, { owner: 'nobody' }));
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ code: 'InvalidOwner' });

    const moved = await app.request('/staking/admin/transfer-ownership', post(owner, { owner: bob }));
    expect(await moved.json()).toEqual({ success: true, owner: bob });

    const renounced = await app.request('/staking/admin/renounce', post(bob));
    expect(await renounced.json()).toEqual({ success: true, owner: '11111111111111111111111111111111' });
  });

  it('should answer unknown paths with 404', async () => {
    const { app } = fixture();
    const res = await app.request('/nowhere');
    expect(res.status).toBe(404);
  });
});
