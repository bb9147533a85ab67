/*
 * MIT License
 * Copyright (c) 2024
 */

import { Attributes, Span, SpanKind, SpanStatusCode, Tracer as OtelTracer } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import { BasicTracerProvider, BatchSpanProcessor, SpanExporter } from '@opentelemetry/sdk-trace-base';
import {
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_SERVICE_NAME,
  ATTR_URL_PATH,
} from '@opentelemetry/semantic-conventions';
import { NextFunction, Request, RequestHandler, Response } from 'express';
import { Logger } from '../logging/logger';
import { raceDeadline } from '../lifecycle/deadline';
import { toError } from '../lifecycle/errors';

const TRACER_NAME = 'graceful-http-server';

export interface TracerOptions {
  serviceName?: string;
  /** Ended spans handed to the exporter per batch. */
  maxExportBatchSize?: number;
  /** Upper bound for a single export call inside the span processor. */
  exportTimeoutMillis?: number;
}

/**
 * Request tracing on a private OpenTelemetry provider. Spans are batched by a
 * BatchSpanProcessor and handed to the exporter; `cleanup` shuts the provider
 * down, which exports whatever is still queued.
 */
export class Tracer {
  private readonly provider: BasicTracerProvider;
  private readonly processor: BatchSpanProcessor;
  private readonly tracer: OtelTracer;
  private closed = false;

  constructor(
    exporter: SpanExporter,
    private readonly logger: Logger,
    options: TracerOptions = {},
  ) {
    this.provider = new BasicTracerProvider({
      resource: new Resource({
        [ATTR_SERVICE_NAME]: options.serviceName ?? TRACER_NAME,
        'deployment.environment.name': process.env.NODE_ENV || 'development',
      }),
    });
    this.processor = new BatchSpanProcessor(exporter, {
      maxExportBatchSize: options.maxExportBatchSize ?? 64,
      exportTimeoutMillis: options.exportTimeoutMillis ?? 30_000,
    });
    this.provider.addSpanProcessor(this.processor);
    this.tracer = this.provider.getTracer(TRACER_NAME);
  }

  startSpan(name: string, attributes: Attributes = {}): Span {
    return this.tracer.startSpan(name, { kind: SpanKind.INTERNAL, attributes });
  }

  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      if (this.closed) {
        next();
        return;
      }

      const span = this.tracer.startSpan(`${req.method} ${req.path}`, {
        kind: SpanKind.SERVER,
        attributes: {
          [ATTR_HTTP_REQUEST_METHOD]: req.method,
          [ATTR_URL_PATH]: req.path,
        },
      });
      res.setHeader('X-Trace-Id', span.spanContext().traceId);

      res.once('close', () => {
        span.setAttribute(ATTR_HTTP_RESPONSE_STATUS_CODE, res.statusCode);
        if (res.statusCode >= 500 || !res.writableFinished) {
          span.setStatus({ code: SpanStatusCode.ERROR });
        }
        span.end();
      });

      next();
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Exports every ended span. Export failures are logged, not thrown. */
  async flush(): Promise<void> {
    try {
      await this.processor.forceFlush();
    } catch (error) {
      this.logger.error('Span export failed', { error: toError(error).message });
    }
  }

  /**
   * Stops tracing requests and shuts the provider down within the given budget.
   * Rejects when the final export fails or the signal aborts first.
   */
  async cleanup(signal: AbortSignal): Promise<void> {
    this.closed = true;

    await raceDeadline(this.provider.shutdown(), signal, (error) => {
      this.logger.warn('Tracer shutdown failed after cleanup deadline', { error: error.message });
    });
    this.logger.info('Tracer shut down');
  }
}
