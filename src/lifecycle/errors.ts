/*
 * MIT License
 * Copyright (c) 2024
 */

export interface ListenAddress {
  host: string;
  port: number;
}

export const formatAddress = (address: ListenAddress): string =>
  address.host.includes(':') ? `[${address.host}]:${address.port}` : `${address.host}:${address.port}`;

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

/** The listener could not be bound. Fatal at startup, never retried. */
export class BindError extends Error {
  readonly code: string | undefined;

  constructor(
    readonly address: ListenAddress,
    cause: Error,
  ) {
    super(`Failed to bind ${formatAddress(address)}: ${cause.message}`, { cause });
    this.name = 'BindError';
    this.code = 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
  }
}

/** A shutdown phase ran past its budget. */
export class DeadlineExceededError extends Error {
  constructor(
    readonly phase: string,
    readonly timeoutMs: number,
  ) {
    super(`${phase} deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

/** The cleanup registry has already been consumed. */
export class RegistryConsumedError extends Error {
  constructor(readonly actionName: string) {
    super(`Cannot register cleanup action "${actionName}": cleanup has already started`);
    this.name = 'RegistryConsumedError';
  }
}
