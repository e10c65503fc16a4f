export type Clock = () => number;

/** Largest request budget accepted from config, the CLI and the HTTP API. */
export const MAX_DEADLINE_MS = 60_000;

// setTimeout fires after 1ms for delays above this
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class DeadlineAbortError extends Error {
  constructor(budgetMs: number) {
    super(`Request deadline of ${budgetMs}ms exceeded`);
    this.name = 'DeadlineAbortError';
  }
}

/**
 * One per request, created at ingress. Exposes an AbortSignal that fires
 * when the budget runs out so in-flight searches can be abandoned.
 */
export class Deadline {
  readonly budgetMs: number;
  readonly expiresAt: number;
  private readonly clock: Clock;
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(budgetMs: number, clock: Clock = Date.now) {
    this.budgetMs = budgetMs;
    this.clock = clock;
    this.expiresAt = clock() + budgetMs;

    if (budgetMs <= 0) {
      this.controller.abort(new DeadlineAbortError(budgetMs));
    } else {
      this.timer = setTimeout(() => {
        this.timer = undefined;
        this.controller.abort(new DeadlineAbortError(budgetMs));
      }, Math.min(budgetMs, MAX_TIMER_DELAY_MS));
      this.timer.unref?.();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  expired(): boolean {
    return this.controller.signal.aborted || this.clock() >= this.expiresAt;
  }

  remainingMs(): number {
    if (this.controller.signal.aborted) return 0;
    return Math.max(0, this.expiresAt - this.clock());
  }

  /** Stop the timer once the request is finished. */
  dispose(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

export type RaceOutcome<T> = { settled: true; value: T } | { settled: false };

/**
 * Resolve with the promise's value, or with `{ settled: false }` as soon
 * as the signal aborts. Rejections of the promise propagate.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<RaceOutcome<T>> {
  // An abandoned promise may still reject later; nobody is listening by then.
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.resolve({ settled: false });
  }

  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    const onAbort = (): void => {
      promise.catch(() => undefined);
      resolve({ settled: false });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ settled: true, value });
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
