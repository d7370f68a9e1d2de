/**
 * Per-operation deadline derived from the configured timeout and an optional
 * caller signal. Whichever fires first aborts the deadline.
 */

import { type MongoDBError, OperationAbortedError, TimeoutError } from '../errors/index.js';

export class Deadline {
  readonly timeoutMs: number;
  private readonly controller = new AbortController();
  private readonly startedAt = Date.now();
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly parent?: AbortSignal;

  private readonly onParentAbort = (): void => {
    this.controller.abort(new OperationAbortedError(this.parent?.reason));
  };

  /**
   * @param timeoutMs - Time budget for the operation
   * @param parent - Caller signal; aborting it aborts the deadline
   * @param onExpire - Builds the abort reason when the budget runs out
   */
  constructor(
    timeoutMs: number,
    parent?: AbortSignal,
    onExpire: () => MongoDBError = () => new TimeoutError(timeoutMs)
  ) {
    this.timeoutMs = timeoutMs;
    this.parent = parent;
    this.timer = setTimeout(() => this.controller.abort(onExpire()), timeoutMs);

    if (parent?.aborted) {
      this.onParentAbort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Milliseconds left before the deadline, never negative.
   */
  remainingMs(): number {
    return Math.max(0, this.timeoutMs - (Date.now() - this.startedAt));
  }

  /**
   * Settles with `operation`, or rejects with the abort reason if the
   * deadline fires first. Rejects immediately when already aborted.
   */
  async race<T>(operation: Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    let detach = (): void => undefined;

    const aborted = new Promise<never>((_, reject) => {
      const onAbort = (): void => reject(signal.reason);
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      detach = () => signal.removeEventListener('abort', onAbort);
    });

    try {
      return await Promise.race([operation, aborted]);
    } finally {
      detach();
    }
  }

  /**
   * Clears the timer and the listener on the caller's signal.
   */
  release(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}

/**
 * Runs `task` under a fresh deadline and releases it on every exit path.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  signal: AbortSignal | undefined,
  task: (deadline: Deadline) => Promise<T>,
  onExpire?: () => MongoDBError
): Promise<T> {
  const deadline = new Deadline(timeoutMs, signal, onExpire);
  try {
    return await task(deadline);
  } finally {
    deadline.release();
  }
}
