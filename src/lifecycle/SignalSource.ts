/*
 * MIT License
 * Copyright (c) 2024
 */

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

/**
 * One-shot source of termination signals.
 * The first signal is latched from the moment the source exists, so a signal
 * that arrives before anyone calls `wait()` is not lost.
 */
export interface SignalSource {
  wait(): Promise<ShutdownSignal>;
  /** Signals received after the first one. */
  onRepeat(listener: (signal: ShutdownSignal) => void): void;
  dispose(): void;
}

abstract class LatchedSignalSource implements SignalSource {
  private latched?: ShutdownSignal;
  private readonly waiters: Array<(signal: ShutdownSignal) => void> = [];
  private readonly repeatListeners: Array<(signal: ShutdownSignal) => void> = [];

  wait(): Promise<ShutdownSignal> {
    if (this.latched !== undefined) {
      return Promise.resolve(this.latched);
    }

    return new Promise<ShutdownSignal>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  onRepeat(listener: (signal: ShutdownSignal) => void): void {
    this.repeatListeners.push(listener);
  }

  abstract dispose(): void;

  protected deliver(signal: ShutdownSignal): void {
    if (this.latched === undefined) {
      this.latched = signal;
      this.waiters.splice(0).forEach((resolve) => resolve(signal));
      return;
    }

    this.repeatListeners.forEach((listener) => listener(signal));
  }
}

/** Watches SIGINT, SIGTERM and SIGHUP on the current process. */
export class ProcessSignalSource extends LatchedSignalSource {
  private readonly handlers = new Map<ShutdownSignal, () => void>();

  constructor(private readonly target: NodeJS.Process = process) {
    super();

    for (const signal of SHUTDOWN_SIGNALS) {
      const handler = () => this.deliver(signal);
      this.handlers.set(signal, handler);
      this.target.on(signal, handler);
    }
  }

  dispose(): void {
    this.handlers.forEach((handler, signal) => {
      this.target.off(signal, handler);
    });
    this.handlers.clear();
  }
}

/** Synthetic source for driving shutdown without real OS signals. */
export class ManualSignalSource extends LatchedSignalSource {
  private disposed = false;

  trigger(signal: ShutdownSignal = 'SIGTERM'): void {
    if (this.disposed) {
      return;
    }
    this.deliver(signal);
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    this.disposed = true;
  }
}
