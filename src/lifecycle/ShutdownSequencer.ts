/*
 * MIT License
 * Copyright (c) 2024
 */

import { Logger } from '../logging/logger';
import { createDeadline } from './deadline';
import { BindError, toError } from './errors';
import { CleanupFailure, ResourceCleaner } from './ResourceCleaner';
import { ShutdownSignal, SignalSource } from './SignalSource';

export type ShutdownState = 'running' | 'shutting-down' | 'cleaning-up' | 'done' | 'failed';

export interface DrainableServer {
  shutdown(signal: AbortSignal): Promise<void>;
  forceClose(): void;
}

export type ShutdownOutcome =
  | {
      status: 'done';
      signal: ShutdownSignal;
      cleanupFailures: CleanupFailure[];
      exitCode: 0;
    }
  | {
      status: 'failed';
      signal: ShutdownSignal;
      error: Error;
      /** Empty unless cleanup ran after the failed drain. */
      cleanupFailures: CleanupFailure[];
      cleanupRan: boolean;
      exitCode: 1;
    };

export interface ShutdownSequencerOptions {
  shutdownTimeoutMs: number;
  cleanupTimeoutMs: number;
  /** Still run cleanup when the drain misses its deadline. Off by default. */
  cleanupOnDrainTimeout?: boolean;
  onStateChange?: (state: ShutdownState, previous: ShutdownState) => void;
}

const TRANSITIONS: Record<ShutdownState, ShutdownState[]> = {
  running: ['shutting-down'],
  'shutting-down': ['cleaning-up', 'failed'],
  'cleaning-up': ['done', 'failed'],
  done: [],
  failed: [],
};

/**
 * Drives the process from the first termination signal to exit:
 * drain the server, then run the cleanup registry, each phase under its
 * own deadline. Single-shot; there is no way back to `running`.
 */
export class ShutdownSequencer {
  private state: ShutdownState = 'running';
  private armed = false;
  private readonly completion: Promise<ShutdownOutcome>;
  private complete?: (outcome: ShutdownOutcome) => void;

  constructor(
    private readonly signals: SignalSource,
    private readonly server: DrainableServer,
    private readonly cleaner: ResourceCleaner,
    private readonly logger: Logger,
    private readonly options: ShutdownSequencerOptions,
  ) {
    this.completion = new Promise<ShutdownOutcome>((resolve) => {
      this.complete = resolve;
    });
  }

  /**
   * Starts watching for the first signal. Call before the server starts; the
   * signal source latches anything delivered earlier.
   */
  arm(): void {
    if (this.armed) {
      return;
    }
    this.armed = true;

    this.signals.onRepeat((signal) => {
      this.logger.warn('Shutdown already in progress; ignoring signal', { signal, state: this.state });
    });

    void this.signals
      .wait()
      .then((signal) => this.run(signal).catch((error: unknown) => this.crashed(signal, toError(error))))
      .then((outcome) => this.finish(outcome));
  }

  /** Resolves once, when the sequence reaches `done` or `failed`. */
  wait(): Promise<ShutdownOutcome> {
    return this.completion;
  }

  getState(): ShutdownState {
    return this.state;
  }

  /** Releases the signal source without shutting down, e.g. after a failed start. */
  dispose(): void {
    this.signals.dispose();
  }

  private async run(signal: ShutdownSignal): Promise<ShutdownOutcome> {
    this.logger.info('Received signal, starting server shutdown', { signal });
    this.transition('shutting-down');

    const drainDeadline = createDeadline('server drain', this.options.shutdownTimeoutMs);
    let drainError: Error | undefined;
    try {
      await this.server.shutdown(drainDeadline.signal);
    } catch (error) {
      drainError = toError(error);
    } finally {
      drainDeadline.dispose();
    }

    if (drainError instanceof BindError) {
      this.logger.error('Server failed to start; skipping resource cleanup', {
        phase: 'server drain',
        error: drainError.message,
      });
      this.transition('failed');
      return { status: 'failed', signal, error: drainError, cleanupFailures: [], cleanupRan: false, exitCode: 1 };
    }

    if (drainError) {
      this.logger.error('Server forced to shutdown', {
        phase: 'server drain',
        timeoutMs: this.options.shutdownTimeoutMs,
        error: drainError.message,
      });
      this.server.forceClose();

      if (!this.options.cleanupOnDrainTimeout) {
        this.logger.warn('Skipping resource cleanup after failed drain');
        this.transition('failed');
        return { status: 'failed', signal, error: drainError, cleanupFailures: [], cleanupRan: false, exitCode: 1 };
      }

      this.logger.warn('Running resource cleanup best-effort after failed drain');
      const cleanupFailures = await this.runCleanup();
      this.transition('failed');
      return { status: 'failed', signal, error: drainError, cleanupFailures, cleanupRan: true, exitCode: 1 };
    }

    const cleanupFailures = await this.runCleanup();
    this.transition('done');
    this.logger.info('Server has exited');
    return { status: 'done', signal, cleanupFailures, exitCode: 0 };
  }

  private async runCleanup(): Promise<CleanupFailure[]> {
    if (this.state === 'shutting-down') {
      this.transition('cleaning-up');
    }
    this.logger.info('Cleaning up resources...', { actions: this.cleaner.size });

    // Allocated only now so a slow drain cannot eat into the cleanup budget.
    const cleanupDeadline = createDeadline('resource cleanup', this.options.cleanupTimeoutMs);
    try {
      const failures = await this.cleaner.cleanup(cleanupDeadline.signal);
      if (failures.length > 0) {
        this.logger.warn('Errors occurred during resource cleanup', {
          failures: failures.map(({ name, error }) => ({ name, error: error.message })),
        });
      }
      return failures;
    } finally {
      cleanupDeadline.dispose();
    }
  }

  private crashed(signal: ShutdownSignal, error: Error): ShutdownOutcome {
    this.logger.error('Shutdown sequence crashed', { state: this.state, error: error.message });
    if (this.state !== 'done' && this.state !== 'failed') {
      const previous = this.state;
      this.state = 'failed';
      this.options.onStateChange?.('failed', previous);
    }
    return { status: 'failed', signal, error, cleanupFailures: [], cleanupRan: false, exitCode: 1 };
  }

  private transition(next: ShutdownState): void {
    const previous = this.state;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Illegal shutdown transition ${previous} -> ${next}`);
    }

    this.state = next;
    this.logger.debug('Shutdown state changed', { from: previous, to: next });
    this.options.onStateChange?.(next, previous);
  }

  private finish(outcome: ShutdownOutcome): void {
    this.signals.dispose();
    const complete = this.complete;
    this.complete = undefined;
    complete?.(outcome);
  }
}
