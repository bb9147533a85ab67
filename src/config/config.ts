/*
 * MIT License
 * Copyright (c) 2024
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';

// .env is only read outside production; production relies on the real environment.
if (process.env.NODE_ENV !== 'production') {
  const envPath = resolve(process.cwd(), '.env');
  if (existsSync(envPath)) {
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      console.error('Failed to load .env file:', result.error.message);
    }
  }
}

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface LifecycleOptions {
  /** Budget for draining in-flight requests. */
  shutdownTimeoutMs: number;
  /** Budget for running registered cleanup actions. */
  cleanupTimeoutMs: number;
  /** Run cleanup best-effort even when the drain timed out. */
  cleanupOnDrainTimeout: boolean;
}

export interface LoggingOptions {
  level: string;
}

export interface TracingOptions {
  enabled: boolean;
}

export interface TestDataOptions {
  enabled: boolean;
  file: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: string;
  lifecycle: LifecycleOptions;
  logging: LoggingOptions;
  tracing: TracingOptions;
  testData: TestDataOptions;
}

export type ServerConfigOverrides = Partial<
  Omit<ServerConfig, 'lifecycle' | 'logging' | 'tracing' | 'testData'>
> & {
  lifecycle?: Partial<LifecycleOptions>;
  logging?: Partial<LoggingOptions>;
  tracing?: Partial<TracingOptions>;
  testData?: Partial<TestDataOptions>;
};

const defaultConfig: ServerConfig = {
  port: 8080,
  host: '0.0.0.0',
  nodeEnv: 'development',
  lifecycle: {
    shutdownTimeoutMs: DEFAULT_TIMEOUT_MS,
    cleanupTimeoutMs: DEFAULT_TIMEOUT_MS,
    cleanupOnDrainTimeout: false,
  },
  logging: {
    level: 'info',
  },
  tracing: {
    enabled: true,
  },
  testData: {
    enabled: false,
    file: 'data/test-data.json',
  },
};

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parses `500ms`, `30s`, `1.5m`, `1h` or bare milliseconds.
 * Returns undefined for anything unparseable.
 */
export const parseDuration = (value: string | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const match = /^\s*(\d+(?:\.\d+)?)\s*(ms|s|m|h)?\s*$/i.exec(value);
  if (!match) {
    return undefined;
  }

  const unit = (match[2] ?? 'ms').toLowerCase();
  return Math.round(Number.parseFloat(match[1]) * DURATION_UNITS[unit]);
};

/** Unset, zero and invalid budgets fall back to the 30 second default. */
export const resolveTimeout = (value: number | undefined): number =>
  value !== undefined && Number.isFinite(value) && value > 0 ? value : DEFAULT_TIMEOUT_MS;

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const parsePort = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const port = Number.parseInt(value, 10);
  return Number.isInteger(port) && port >= 0 && port <= 65_535 ? port : fallback;
};

export const createServerConfig = (overrides: ServerConfigOverrides = {}): ServerConfig => {
  const envConfig: ServerConfig = {
    port: parsePort(process.env.PORT, defaultConfig.port),
    host: process.env.HOST ?? defaultConfig.host,
    nodeEnv: process.env.NODE_ENV ?? defaultConfig.nodeEnv,
    lifecycle: {
      shutdownTimeoutMs: parseDuration(process.env.SHUTDOWN_TIMEOUT) ?? defaultConfig.lifecycle.shutdownTimeoutMs,
      cleanupTimeoutMs: parseDuration(process.env.CLEANUP_TIMEOUT) ?? defaultConfig.lifecycle.cleanupTimeoutMs,
      cleanupOnDrainTimeout: parseBoolean(
        process.env.CLEANUP_ON_DRAIN_TIMEOUT,
        defaultConfig.lifecycle.cleanupOnDrainTimeout,
      ),
    },
    logging: {
      level: process.env.LOG_LEVEL ?? defaultConfig.logging.level,
    },
    tracing: {
      enabled: parseBoolean(process.env.TRACING_ENABLED, defaultConfig.tracing.enabled),
    },
    testData: {
      enabled: parseBoolean(process.env.INIT_TEST_DATA, defaultConfig.testData.enabled),
      file: process.env.TEST_DATA_FILE ?? defaultConfig.testData.file,
    },
  };

  const lifecycle = { ...envConfig.lifecycle, ...overrides.lifecycle };

  return {
    ...envConfig,
    ...overrides,
    lifecycle: {
      ...lifecycle,
      shutdownTimeoutMs: resolveTimeout(lifecycle.shutdownTimeoutMs),
      cleanupTimeoutMs: resolveTimeout(lifecycle.cleanupTimeoutMs),
    },
    logging: {
      ...envConfig.logging,
      ...overrides.logging,
    },
    tracing: {
      ...envConfig.tracing,
      ...overrides.tracing,
    },
    testData: {
      ...envConfig.testData,
      ...overrides.testData,
    },
  };
};

export class ConfigService {
  private readonly config: ServerConfig;

  constructor(overrides?: ServerConfigOverrides) {
    this.config = createServerConfig(overrides);
  }

  getConfig(): ServerConfig {
    return this.config;
  }
}
