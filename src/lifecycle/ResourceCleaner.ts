/*
 * MIT License
 * Copyright (c) 2024
 */

import { Logger } from '../logging/logger';
import { raceDeadline } from './deadline';
import { RegistryConsumedError, toError } from './errors';

/**
 * Teardown for one resource. The signal aborts when the cleanup budget is
 * spent; actions that cannot cooperate may ignore it.
 */
export type CleanupFn = (signal: AbortSignal) => void | Promise<void>;

interface CleanupAction {
  readonly name: string;
  readonly action: CleanupFn;
}

export interface CleanupFailure {
  readonly name: string;
  readonly error: Error;
}

export interface ResourceCleaner {
  registerWithName(name: string, action: CleanupFn): void;
  cleanup(signal: AbortSignal): Promise<CleanupFailure[]>;
  readonly size: number;
}

/**
 * Ordered registry of named teardown actions, consumed once at shutdown.
 *
 * Actions run one at a time in registration order. Each wait is bounded by
 * the signal handed to `cleanup`: an action still pending when it aborts is
 * recorded as failed and left behind, and the next action is started.
 */
export class DefaultResourceCleaner implements ResourceCleaner {
  private readonly actions: CleanupAction[] = [];
  private consumed = false;

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.actions.length;
  }

  registerWithName(name: string, action: CleanupFn): void {
    if (this.consumed) {
      throw new RegistryConsumedError(name);
    }

    if (this.actions.some((existing) => existing.name === name)) {
      this.logger.warn('Cleanup action name registered more than once', { name });
    }

    this.actions.push(Object.freeze({ name, action }));
    this.logger.debug('Cleanup action registered', { name, total: this.actions.length });
  }

  async cleanup(signal: AbortSignal): Promise<CleanupFailure[]> {
    if (this.consumed) {
      this.logger.warn('Cleanup already ran; registry is single-use');
      return [];
    }
    this.consumed = true;

    const duplicates = this.duplicateNames();
    const failures: CleanupFailure[] = [];

    for (const { name, action } of this.actions) {
      const startedAt = Date.now();
      const label = duplicates.has(name) ? `${name} (ambiguous name)` : name;

      try {
        await raceDeadline(this.invoke(action, signal), signal, (error) => {
          this.logger.warn('Cleanup action failed after its deadline', { name: label, error: error.message });
        });
        this.logger.debug('Cleanup action completed', { name: label, durationMs: Date.now() - startedAt });
      } catch (error) {
        const failure = { name, error: toError(error) };
        failures.push(failure);
        this.logger.error('Cleanup action failed', {
          name: label,
          error: failure.error.message,
          durationMs: Date.now() - startedAt,
        });
      }
    }

    return failures;
  }

  private invoke(action: CleanupFn, signal: AbortSignal): Promise<void> {
    try {
      return Promise.resolve(action(signal));
    } catch (error) {
      return Promise.reject(toError(error));
    }
  }

  private duplicateNames(): Set<string> {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const { name } of this.actions) {
      if (seen.has(name)) {
        duplicates.add(name);
      }
      seen.add(name);
    }
    return duplicates;
  }
}
