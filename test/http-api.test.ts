import request from 'supertest';
import { HttpServer } from '../src/network/HttpServer';
import { createServerConfig } from '../src/config/config';
import { InMemoryTenantRepository } from '../src/domain/tenants/TenantRepository';
import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { Tracer } from '../src/tracing/Tracer';
import { createMockLogger } from './helpers/mockLogger';

describe('HTTP API (HttpServer)', () => {
  const config = createServerConfig({ nodeEnv: 'test' });
  let tenants: InMemoryTenantRepository;
  let shuttingDown: boolean;

  beforeEach(() => {
    tenants = new InMemoryTenantRepository();
    shuttingDown = false;
  });

  const build = (tracer?: Tracer) =>
    new HttpServer(config, createMockLogger(), tenants, {
      tracer,
      isShuttingDown: () => shuttingDown,
    }).getApp();

  test('GET /health reports ok while serving', async () => {
    const response = await request(build()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.env).toBe('test');
    expect(response.headers['x-powered-by']).toBeUndefined();
  });

  test('asks clients to close their connection once shutdown has begun', async () => {
    shuttingDown = true;

    const response = await request(build()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('shutting-down');
    expect(response.headers.connection).toBe('close');
  });

  test('GET /api/tenants lists the repository contents', async () => {
    tenants.create({ name: 'default', description: 'first' });

    const response = await request(build()).get('/api/tenants');

    expect(response.status).toBe(200);
    expect(response.body.tenants).toHaveLength(1);
    expect(response.body.tenants[0]).toMatchObject({ id: 1, name: 'default', description: 'first' });
  });

  test('unknown routes answer 404 as JSON', async () => {
    const response = await request(build()).get('/missing');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Not Found', path: '/missing' });
  });

  test('records a span per request and exposes its trace id', async () => {
    const exporter = new InMemorySpanExporter();
    const tracer = new Tracer(exporter, createMockLogger());

    const response = await request(build(tracer)).get('/api/tenants');
    await new Promise<void>((resolve) => setImmediate(resolve));
    await tracer.flush();

    const spans = exporter.getFinishedSpans();
    expect(response.headers['x-trace-id']).toMatch(/^[0-9a-f]{32}$/);
    expect(spans).toHaveLength(1);
    expect(spans[0].spanContext().traceId).toBe(response.headers['x-trace-id']);
    expect(spans[0].name).toBe('GET /api/tenants');
    expect(spans[0].kind).toBe(SpanKind.SERVER);
    expect(spans[0].status.code).toBe(SpanStatusCode.UNSET);
    expect(spans[0].attributes).toEqual({
      'http.request.method': 'GET',
      'url.path': '/api/tenants',
      'http.response.status_code': 200,
    });
  });

  test('marks a span as failed when the handler errors', async () => {
    const exporter = new InMemorySpanExporter();
    const tracer = new Tracer(exporter, createMockLogger());
    tenants.list = () => {
      throw new Error('repository offline');
    };

    const response = await request(build(tracer)).get('/api/tenants');
    await new Promise<void>((resolve) => setImmediate(resolve));
    await tracer.flush();

    expect(response.status).toBe(500);
    expect(exporter.getFinishedSpans().map((span) => span.status.code)).toEqual([SpanStatusCode.ERROR]);
  });

  test('stops tracing requests once the tracer has been cleaned up', async () => {
    const exporter = new InMemorySpanExporter();
    const exportSpy = jest.spyOn(exporter, 'export');
    const tracer = new Tracer(exporter, createMockLogger());
    await tracer.cleanup(new AbortController().signal);

    const response = await request(build(tracer)).get('/health');

    expect(response.status).toBe(200);
    expect(response.headers['x-trace-id']).toBeUndefined();
    expect(exportSpy).not.toHaveBeenCalled();
  });
});
