/**
 * Staking Errors
 *
 * Every failure aborts the whole operation. The code tells callers
 * (and the HTTP layer) which rule was broken.
 */

export type StakingErrorCode =
  | 'TransferFailed'
  | 'NotStaker'
  | 'InsufficientAmount'
  | 'PendingRequest'
  | 'NoGatingNft'
  | 'StakingInactive'
  | 'NotOwner'
  | 'ReentrantCall'
  | 'WithdrawalLocked'
  | 'NoPendingRequest'
  | 'InvalidAmount'
  | 'InvalidRate'
  | 'InvalidOwner'
  | 'Overflow'
  | 'InvariantViolation';

export class StakingError extends Error {
  readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StakingError';
    this.code = code;
  }
}

export function isStakingError(error: unknown): error is StakingError {
  return error instanceof StakingError;
}

/**
 * Internal consistency check. A failure here means the engine's own
 * bookkeeping is broken, not that the caller did something wrong.
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new StakingError('InvariantViolation', message);
  }
}
