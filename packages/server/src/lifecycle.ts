/**
 * Provider lifetime primitives: a one-time async initializer for the bridge
 * handle and linked cancellation scopes for ceremonies.
 */

import { PasskeyError } from './errors.js';

/**
 * Runs an async initializer at most once per success.
 *
 * Concurrent callers share the same in-flight promise, so racing first uses
 * still trigger a single initialization. A rejected attempt is forgotten and
 * the next caller starts a fresh one.
 */
export class InitOnce<T> {
  private readonly init: () => Promise<T>;
  private pending: Promise<T> | null = null;
  private loaded: { value: T } | null = null;

  constructor(init: () => Promise<T>) {
    this.init = init;
  }

  get(): Promise<T> {
    if (this.pending) return this.pending;

    const attempt = new Promise<T>((resolve) => resolve(this.init())).then(
      (value) => {
        this.loaded = { value };
        return value;
      },
      (err: unknown) => {
        if (this.pending === attempt) this.pending = null;
        throw err;
      },
    );
    this.pending = attempt;
    return attempt;
  }

  get isInitialized(): boolean {
    return this.loaded !== null;
  }

  /**
   * The attempt in flight or the one that succeeded, without starting one.
   * Null before the first call and after a failure.
   */
  current(): Promise<T> | null {
    return this.pending;
  }
}

/**
 * A cancellation scope linked to any number of parent signals.
 *
 * The provider owns a root scope; each ceremony takes a child linked to the
 * root and to the caller's own signal. Cancelling the root cancels every
 * child that is still listening.
 */
export class CancellationScope {
  private readonly controller = new AbortController();
  private readonly detachers: Array<() => void> = [];

  constructor(parents: ReadonlyArray<AbortSignal | undefined> = []) {
    for (const parent of parents) {
      if (!parent) continue;
      if (parent.aborted) {
        this.controller.abort(parent.reason);
        break;
      }
      const onAbort = () => this.controller.abort(parent.reason);
      parent.addEventListener('abort', onAbort, { once: true });
      this.detachers.push(() => parent.removeEventListener('abort', onAbort));
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  child(signal?: AbortSignal): CancellationScope {
    return new CancellationScope([this.signal, signal]);
  }

  cancel(reason?: unknown): void {
    this.controller.abort(reason);
  }

  /** Stop listening to the parents. Call once the work this scope guards is over. */
  close(): void {
    for (const detach of this.detachers.splice(0)) detach();
  }
}

/** The error an aborted scope reports: its reason when that is a PasskeyError, CANCELLED otherwise */
export function cancellationError(signal: AbortSignal): PasskeyError {
  if (signal.reason instanceof PasskeyError) return signal.reason;
  return new PasskeyError('CANCELLED', 'Ceremony was cancelled', { cause: signal.reason });
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts, whichever comes
 * first. `work` keeps running after an abort; its outcome is then ignored.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancellationError(signal));
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
