export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    timeout.unref?.();

    const onAbort = () => {
      clearTimeout(timeout);
      reject(new DOMException('Sleep aborted', 'AbortError'));
    };

    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export type SignalWaitFailure = 'timeout' | 'aborted';

export class SignalWaitError extends Error {
  constructor(public readonly reason: SignalWaitFailure, timeoutMs: number) {
    super(reason === 'timeout' ? `Signal was not raised within ${timeoutMs}ms` : 'Signal wait aborted');
    this.name = 'SignalWaitError';
  }
}

export interface SignalWaitOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * One-shot notification that can be re-armed.
 *
 * `raise()` releases every pending and future waiter until `reset()` is called. Resetting a raised signal arms a
 * fresh generation; resetting one that was never raised keeps the current waiters parked on it, so a waiter is
 * never released by a stale raise nor stranded by a reset.
 */
export class ResettableSignal {
  private raised = false;
  private generation = 1;
  private readonly waiters = new Set<() => void>();

  get isRaised(): boolean {
    return this.raised;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /** Number of waiters currently parked on the signal. */
  get waiting(): number {
    return this.waiters.size;
  }

  raise(): void {
    if (this.raised) {
      return;
    }
    this.raised = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    waiters.forEach((release) => release());
  }

  reset(): void {
    if (!this.raised) {
      return;
    }
    this.raised = false;
    this.generation += 1;
  }

  async wait({ timeoutMs, signal }: SignalWaitOptions): Promise<void> {
    if (this.raised) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const finish = (error?: SignalWaitError) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
        this.waiters.delete(onRaise);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onRaise = () => finish();
      const onAbort = () => finish(new SignalWaitError('aborted', timeoutMs));
      const timeout = setTimeout(() => finish(new SignalWaitError('timeout', timeoutMs)), Math.max(0, timeoutMs));

      if (signal) {
        if (signal.aborted) {
          onAbort();
          return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
      }

      this.waiters.add(onRaise);
    });
  }
}
