import { clearTimeout, setTimeout } from 'timers';

import { DriverInvalidArgumentError, DriverRuntimeError } from './error';
import { noop } from './utils';

/** @internal */
export class TimeoutError extends Error {
  duration: number;
  override get name(): 'TimeoutError' {
    return 'TimeoutError';
  }

  constructor(message: string, options: { cause?: Error; duration: number }) {
    super(message, options);
    this.duration = options.duration;
  }

  static is(error: unknown): error is TimeoutError {
    return (
      error != null && typeof error === 'object' && 'name' in error && error.name === 'TimeoutError'
    );
  }
}

type Executor = ConstructorParameters<typeof Promise<never>>[0];
type Reject = Parameters<ConstructorParameters<typeof Promise<never>>[0]>[1];

/**
 * @internal
 * A promise that rejects with a `TimeoutError` once its duration elapses. A duration of 0 never
 * expires. It is never resolved, so it is meant to be raced against the awaited work and cleared
 * afterwards.
 */
export class Timeout extends Promise<never> {
  private id?: NodeJS.Timeout;

  public readonly start: number;
  public ended: number | null = null;
  public duration: number;
  private timedOut = false;
  public cleared = false;

  get remainingTime(): number {
    if (this.timedOut) return 0;
    if (this.duration === 0) return Infinity;
    return Math.max(0, this.start + this.duration - Math.trunc(performance.now()));
  }

  get timeElapsed(): number {
    return Math.trunc(performance.now()) - this.start;
  }

  /**
   * The executor parameter exists for promise subclassing: `then` and `catch` construct derived
   * promises through this constructor.
   */
  private constructor(
    executor: Executor = noop,
    options?: { duration: number; rejection?: Error }
  ) {
    const duration = options?.duration ?? 0;
    const rejection = options?.rejection;

    if (duration < 0) {
      throw new DriverInvalidArgumentError('Cannot create a Timeout with a negative duration');
    }

    let reject: Reject | undefined;
    super((resolve, promiseReject) => {
      reject = promiseReject;
      executor(resolve, promiseReject);
    });

    if (reject == null) {
      throw new DriverRuntimeError('Promise executor did not run synchronously');
    }
    const rejectTimeout = reject;

    this.duration = duration;
    this.start = Math.trunc(performance.now());

    if (rejection == null && this.duration > 0) {
      this.id = setTimeout(() => {
        this.ended = Math.trunc(performance.now());
        this.timedOut = true;
        this.id = undefined;
        rejectTimeout(new TimeoutError(`Expired after ${duration}ms`, { duration }));
      }, this.duration);
    } else if (rejection != null) {
      this.ended = Math.trunc(performance.now());
      this.timedOut = true;
      rejectTimeout(rejection);
    }
  }

  /**
   * Clears the underlying timeout. This method is idempotent
   */
  clear(): void {
    if (this.id != null) clearTimeout(this.id);
    this.id = undefined;
    this.timedOut = false;
    this.cleared = true;
  }

  throwIfExpired(): void {
    if (this.timedOut) throw new TimeoutError('Timed out', { duration: this.duration });
  }

  get expired(): boolean {
    return this.timedOut;
  }

  public static expires(duration: number): Timeout {
    return new Timeout(undefined, { duration });
  }

  static override reject(rejection?: Error): Timeout {
    return new Timeout(undefined, {
      duration: 0,
      rejection: rejection ?? new TimeoutError('Timed out', { duration: 0 })
    });
  }

  static is(timeout: unknown): timeout is Timeout {
    return timeout instanceof Timeout;
  }
}

/**
 * Races `promise` against a timeout of `timeoutMS` (0 waits forever). The timer is always cleared,
 * and a rejected timeout never goes unhandled.
 * @internal
 */
export async function raceWithTimeout<T>(
  promise: Promise<T>,
  timeoutMS: number,
  onTimeout: (error: TimeoutError) => Error
): Promise<T> {
  if (timeoutMS <= 0) return await promise;

  const timeout = Timeout.expires(timeoutMS);
  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    if (TimeoutError.is(error) && timeout.expired) {
      throw onTimeout(error);
    }
    throw error;
  } finally {
    timeout.clear();
  }
}
