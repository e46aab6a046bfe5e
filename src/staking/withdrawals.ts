/**
 * Withdrawal Requests
 *
 * Unstaked principal is not paid out directly. It is parked in a single
 * request per account that matures after a fixed delay.
 */

import { StakingError } from './errors';
import { checkedAdd, emptyWithdrawal, MAX_UINT64 } from './records';
import type { UserRecord, WithdrawalRequest } from './records';

export const WITHDRAWAL_DELAY = 7n * 24n * 60n * 60n; // 7 days in seconds

export function placeWithdrawalRequest(
  user: UserRecord,
  amount: bigint,
  now: bigint,
  delay: bigint
): WithdrawalRequest {
  if (user.withdrawal.pending) {
    throw new StakingError('PendingRequest', 'A withdrawal request is already pending');
  }

  user.withdrawal = {
    amount,
    pending: true,
    releaseAt: checkedAdd(now, delay, MAX_UINT64, 'releaseAt'),
  };
  return { ...user.withdrawal };
}

/**
 * Zero a matured request and hand back what it held.
 * The record is cleared before the caller moves any tokens.
 */
export function releaseWithdrawal(user: UserRecord, now: bigint): bigint {
  const request = user.withdrawal;

  if (!request.pending) {
    throw new StakingError('NoPendingRequest', 'No withdrawal request to claim');
  }
  if (now < request.releaseAt) {
    throw new StakingError(
      'WithdrawalLocked',
      `Withdrawal unlocks in ${request.releaseAt - now}s`
    );
  }

  const amount = request.amount;
  user.withdrawal = emptyWithdrawal();
  return amount;
}
