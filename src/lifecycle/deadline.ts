/*
 * MIT License
 * Copyright (c) 2024
 */

import { DeadlineExceededError, toError } from './errors';

export interface Deadline {
  readonly phase: string;
  readonly timeoutMs: number;
  /** Aborts with a DeadlineExceededError once the budget is spent. */
  readonly signal: AbortSignal;
  dispose(): void;
}

/**
 * Allocates a fresh budget for one shutdown phase. The timer starts now, so
 * each phase must create its own deadline when it begins.
 */
export const createDeadline = (phase: string, timeoutMs: number): Deadline => {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(phase, timeoutMs));
  }, timeoutMs);
  timer.unref();

  return {
    phase,
    timeoutMs,
    signal: controller.signal,
    dispose: () => clearTimeout(timer),
  };
};

const abortReason = (signal: AbortSignal): Error => toError(signal.reason);

/**
 * Settles with `work` or rejects with the abort reason, whichever comes first.
 * `work` itself is left running; its late rejection is handed to `onLateFailure`.
 */
export const raceDeadline = <T>(
  work: Promise<T>,
  signal: AbortSignal,
  onLateFailure?: (error: Error) => void,
): Promise<T> => {
  let aborted = false;

  const guarded = work.catch((error: unknown) => {
    if (aborted) {
      onLateFailure?.(toError(error));
      return new Promise<T>(() => undefined);
    }
    throw error;
  });

  if (signal.aborted) {
    return Promise.race([
      guarded,
      Promise.resolve().then(() => {
        aborted = true;
        throw abortReason(signal);
      }),
    ]);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      aborted = true;
      reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    guarded.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
};
