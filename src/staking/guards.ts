/**
 * Execution Guards
 *
 * - SerialExecutor: one state-changing operation at a time
 * - ReentrancyLatch: rejects nested entry into value-moving operations
 * - assertOwner: administrator gate
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { StakingError } from './errors';
import type { GlobalState } from './records';

export function assertOwner(state: GlobalState, caller: string): void {
  if (caller !== state.owner) {
    throw new StakingError('NotOwner', 'Caller is not the owner');
  }
}

export class ReentrancyLatch {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  async guard<T>(fn: () => Promise<T>): Promise<T> {
    if (this.entered) {
      throw new StakingError('ReentrantCall', 'Re-entrant call rejected');
    }
    this.entered = true;
    try {
      return await fn();
    } finally {
      this.entered = false;
    }
  }
}

/**
 * Queues operations so each one completes before the next begins.
 *
 * A call issued from inside a running operation (a ledger calling back
 * into the engine) is not queued: it would wait on itself forever. It runs
 * in place, which is what lets the latch see it.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();
  private scope = new AsyncLocalStorage<boolean>();

  get inOperation(): boolean {
    return this.scope.getStore() === true;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.inOperation) {
      return fn();
    }

    const result = this.tail.then(() => this.scope.run(true, fn));
    // The queue only needs ordering; the failure itself reaches the caller through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
