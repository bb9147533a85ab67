/*
 * MIT License
 * Copyright (c) 2024
 */

import { ConsoleSpanExporter, SpanExporter } from '@opentelemetry/sdk-trace-base';
import { ConfigService, ServerConfig, ServerConfigOverrides } from './config/config';
import { ConsoleLogger, Logger } from './logging/logger';
import { InMemoryTenantRepository, TenantRepository } from './domain/tenants/TenantRepository';
import { TestDataService } from './domain/testdata/TestDataService';
import { DefaultResourceCleaner, ResourceCleaner } from './lifecycle/ResourceCleaner';
import { ShutdownOutcome, ShutdownSequencer, ShutdownState } from './lifecycle/ShutdownSequencer';
import { ProcessSignalSource, SignalSource } from './lifecycle/SignalSource';
import { HttpServer } from './network/HttpServer';
import { NetworkServer } from './network/NetworkServer';
import { Tracer } from './tracing/Tracer';

export interface Application {
  readonly config: ServerConfig;
  readonly logger: Logger;
  readonly cleaner: ResourceCleaner;
  readonly tenants: TenantRepository;
  readonly tracer?: Tracer;
  /** Seeds, arms the shutdown watcher and binds the listener. */
  start(): Promise<void>;
  /** Resolves when the shutdown sequence has finished. */
  wait(): Promise<ShutdownOutcome>;
  /** start() followed by wait(). */
  run(): Promise<ShutdownOutcome>;
  getServer(): NetworkServer;
  getShutdownState(): ShutdownState;
}

export interface ApplicationDependencies {
  /** Defaults to the real process signals. */
  signals?: SignalSource;
  spanExporter?: SpanExporter;
  onShutdownStateChange?: (state: ShutdownState, previous: ShutdownState) => void;
}

export const createApplication = (
  overrides?: ServerConfigOverrides,
  dependencies: ApplicationDependencies = {},
): Application => {
  const configService = new ConfigService(overrides);
  const config = configService.getConfig();
  const logLevel = config.logging.level;

  const logger = new ConsoleLogger('application', logLevel);
  const lifecycleLogger = logger.child('lifecycle');
  const httpLogger = logger.child('http');

  const cleaner = new DefaultResourceCleaner(lifecycleLogger);
  const tenants = new InMemoryTenantRepository();
  const testData = new TestDataService(tenants, logger.child('testdata'), config.testData.file);

  let tracer: Tracer | undefined;
  if (config.tracing.enabled) {
    const activeTracer = new Tracer(dependencies.spanExporter ?? new ConsoleSpanExporter(), logger.child('tracing'));
    cleaner.registerWithName('Tracer', (signal) => activeTracer.cleanup(signal));
    tracer = activeTracer;
  }

  const networkServer = new NetworkServer(lifecycleLogger);
  const httpServer = new HttpServer(config, httpLogger, tenants, {
    tracer,
    isShuttingDown: () => networkServer.isDraining(),
  });

  // The process source starts latching signals as soon as it is constructed.
  const sequencer = new ShutdownSequencer(
    dependencies.signals ?? new ProcessSignalSource(),
    networkServer,
    cleaner,
    lifecycleLogger,
    {
      shutdownTimeoutMs: config.lifecycle.shutdownTimeoutMs,
      cleanupTimeoutMs: config.lifecycle.cleanupTimeoutMs,
      cleanupOnDrainTimeout: config.lifecycle.cleanupOnDrainTimeout,
      onStateChange: dependencies.onShutdownStateChange,
    },
  );

  const seedTestData = async (): Promise<void> => {
    if (!config.testData.enabled) {
      return;
    }

    const result = await testData.initializeTestData();
    if (!result.ok) {
      logger.warn('Failed to initialize test data', { file: config.testData.file, error: result.error.message });
    }
  };

  const start = async (): Promise<void> => {
    sequencer.arm();
    await seedTestData();

    if (sequencer.getState() !== 'running') {
      logger.warn('Shutdown requested during startup; not starting server', { state: sequencer.getState() });
      return;
    }

    try {
      await networkServer.start({ host: config.host, port: config.port }, httpServer.getApp());
    } catch (error) {
      // A sequence already under way sees the same bind failure through its drain and ends failed.
      sequencer.dispose();
      throw error;
    }

    if (sequencer.getState() !== 'running') {
      logger.warn('Shutdown requested while binding; server is draining', { state: sequencer.getState() });
      return;
    }

    logger.info('Server is running', {
      address: networkServer.getAddress(),
      shutdownTimeoutMs: config.lifecycle.shutdownTimeoutMs,
      cleanupTimeoutMs: config.lifecycle.cleanupTimeoutMs,
    });
  };

  const wait = (): Promise<ShutdownOutcome> => sequencer.wait();

  return {
    config,
    logger,
    cleaner,
    tenants,
    tracer,
    start,
    wait,
    run: async () => {
      await start();
      return wait();
    },
    getServer: () => networkServer,
    getShutdownState: () => sequencer.getState(),
  };
};
