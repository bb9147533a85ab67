/*
 * MIT License
 * Copyright (c) 2024
 */

import express, { Application, NextFunction, Request, Response } from 'express';
import { ServerConfig } from '../config/config';
import { Logger } from '../logging/logger';
import { TenantRepository } from '../domain/tenants/TenantRepository';
import { Tracer } from '../tracing/Tracer';

export interface HttpServerOptions {
  tracer?: Tracer;
  /** Reports whether the process has begun shutting down. */
  isShuttingDown?: () => boolean;
}

export class HttpServer {
  private readonly app: Application;

  constructor(
    private readonly config: ServerConfig,
    private readonly logger: Logger,
    private readonly tenants: TenantRepository,
    private readonly options: HttpServerOptions = {},
  ) {
    this.app = express();
    this.app.set('env', config.nodeEnv);
    this.app.disable('x-powered-by');
    this.registerMiddleware();
    this.registerRoutes();
  }

  getApp(): Application {
    return this.app;
  }

  private registerMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      this.logger.debug('Incoming HTTP request', {
        method: req.method,
        path: req.path,
        ip: req.ip,
      });

      if (this.options.isShuttingDown?.()) {
        res.setHeader('Connection', 'close');
      }

      next();
    });

    if (this.options.tracer) {
      this.app.use(this.options.tracer.middleware());
    }
  }

  private registerRoutes(): void {
    this.app.get('/health', (req: Request, res: Response) => {
      this.logger.debug('Health check requested', { ip: req.ip });

      res.json({
        status: this.options.isShuttingDown?.() ? 'shutting-down' : 'ok',
        env: this.config.nodeEnv,
        time: new Date().toISOString(),
      });
    });

    this.app.get('/api/tenants', (req: Request, res: Response) => {
      const tenants = this.tenants.list();
      this.logger.debug('Tenants requested', {
        totalTenants: tenants.length,
        ip: req.ip,
      });

      res.json({ tenants });
    });

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Not Found', path: req.path });
    });

    this.app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
      void next;
      this.logger.error('Unhandled request error', { path: req.path, error: error.message });
      res.status(500).json({ error: 'Internal Server Error' });
    });
  }
}
