import { createServerConfig, DEFAULT_TIMEOUT_MS, parseDuration, resolveTimeout } from '../src/config/config';

describe('Config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.PORT;
    delete process.env.HOST;
    delete process.env.SHUTDOWN_TIMEOUT;
    delete process.env.CLEANUP_TIMEOUT;
    delete process.env.CLEANUP_ON_DRAIN_TIMEOUT;
    delete process.env.TRACING_ENABLED;
    delete process.env.INIT_TEST_DATA;
    delete process.env.TEST_DATA_FILE;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  test('loads defaults', () => {
    const config = createServerConfig();

    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.lifecycle).toEqual({
      shutdownTimeoutMs: 30_000,
      cleanupTimeoutMs: 30_000,
      cleanupOnDrainTimeout: false,
    });
    expect(config.tracing.enabled).toBe(true);
    expect(config.testData).toEqual({ enabled: false, file: 'data/test-data.json' });
  });

  test('reads overrides from the environment', () => {
    process.env.PORT = '9999';
    process.env.HOST = '127.0.0.1';
    process.env.SHUTDOWN_TIMEOUT = '5s';
    process.env.CLEANUP_TIMEOUT = '1500ms';
    process.env.CLEANUP_ON_DRAIN_TIMEOUT = 'yes';
    process.env.TRACING_ENABLED = 'false';
    process.env.INIT_TEST_DATA = '1';

    const config = createServerConfig();

    expect(config.port).toBe(9999);
    expect(config.host).toBe('127.0.0.1');
    expect(config.lifecycle).toEqual({
      shutdownTimeoutMs: 5_000,
      cleanupTimeoutMs: 1_500,
      cleanupOnDrainTimeout: true,
    });
    expect(config.tracing.enabled).toBe(false);
    expect(config.testData.enabled).toBe(true);
  });

  test('falls back to 30 seconds for zero or invalid timeouts', () => {
    process.env.SHUTDOWN_TIMEOUT = '0';
    process.env.CLEANUP_TIMEOUT = 'soon';

    const config = createServerConfig();

    expect(config.lifecycle.shutdownTimeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.lifecycle.cleanupTimeoutMs).toBe(DEFAULT_TIMEOUT_MS);
  });

  test('merges partial overrides over environment values', () => {
    process.env.SHUTDOWN_TIMEOUT = '10s';

    const config = createServerConfig({ port: 0, lifecycle: { cleanupTimeoutMs: 250 } });

    expect(config.port).toBe(0);
    expect(config.lifecycle.shutdownTimeoutMs).toBe(10_000);
    expect(config.lifecycle.cleanupTimeoutMs).toBe(250);
    expect(config.lifecycle.cleanupOnDrainTimeout).toBe(false);
  });

  test('ignores an unusable PORT', () => {
    process.env.PORT = 'http';

    expect(createServerConfig().port).toBe(8080);
  });

  test.each([
    ['250', 250],
    ['250ms', 250],
    ['30s', 30_000],
    ['1.5m', 90_000],
    ['1h', 3_600_000],
    [' 2S ', 2_000],
  ])('parseDuration(%p) is %p', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  test.each(['', 'fast', '-5s', '10d'])('parseDuration(%p) is undefined', (input) => {
    expect(parseDuration(input)).toBeUndefined();
  });

  test('resolveTimeout keeps positive budgets only', () => {
    expect(resolveTimeout(undefined)).toBe(DEFAULT_TIMEOUT_MS);
    expect(resolveTimeout(0)).toBe(DEFAULT_TIMEOUT_MS);
    expect(resolveTimeout(-1)).toBe(DEFAULT_TIMEOUT_MS);
    expect(resolveTimeout(Number.NaN)).toBe(DEFAULT_TIMEOUT_MS);
    expect(resolveTimeout(500)).toBe(500);
  });
});
