/*
 * MIT License
 * Copyright (c) 2024
 */

import { createServer, IncomingMessage, RequestListener, Server as HttpServerType, ServerResponse } from 'http';
import { Socket } from 'net';
import { Logger } from '../logging/logger';
import { raceDeadline } from '../lifecycle/deadline';
import { BindError, ListenAddress, formatAddress, toError } from '../lifecycle/errors';

/** The listening half of the process: bind, serve, drain. */
export class NetworkServer {
  private httpServer?: HttpServerType;
  private starting?: Promise<void>;
  private closing?: Promise<void>;
  private runtimeAddress?: ListenAddress;
  private readonly sockets = new Set<Socket>();
  private inFlight = 0;
  private draining = false;

  constructor(private readonly logger: Logger) {}

  async start(address: ListenAddress, handler: RequestListener): Promise<void> {
    if (this.httpServer || this.starting) {
      throw new Error(`Server already listening on ${formatAddress(this.getAddress() ?? address)}`);
    }

    const server = createServer();
    server.on('request', (req: IncomingMessage, res: ServerResponse) => this.trackRequest(req, res));
    server.on('request', handler);
    server.on('connection', (socket: Socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
    });

    this.starting = this.listen(server, address);
    try {
      await this.starting;
    } finally {
      this.starting = undefined;
    }
  }

  /**
   * Stops accepting connections and waits for in-flight requests to finish.
   * Rejects with the signal's reason if the drain outlives it; connections
   * are left open in that case, see forceClose().
   */
  async shutdown(signal: AbortSignal): Promise<void> {
    if (this.starting) {
      // Rejects with the BindError when the pending bind fails.
      await raceDeadline(this.starting, signal);
    }

    const server = this.httpServer;
    if (!server) {
      this.logger.info('Server is not running; nothing to drain');
      return;
    }

    if (!this.closing) {
      this.draining = true;
      this.logger.info('Draining server', { inFlight: this.inFlight, connections: this.sockets.size });

      this.closing = new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      server.closeIdleConnections();
    }

    await raceDeadline(this.closing, signal, (error) => {
      this.logger.warn('Server close failed after drain deadline', { error: error.message });
    });

    this.httpServer = undefined;
    this.closing = undefined;
    this.runtimeAddress = undefined;
    this.logger.info('Server stopped successfully');
  }

  forceClose(): void {
    if (this.sockets.size === 0) {
      return;
    }

    this.logger.warn('Destroying remaining connections', { connections: this.sockets.size, inFlight: this.inFlight });
    this.httpServer?.closeAllConnections();
    this.sockets.forEach((socket) => socket.destroy());
    this.sockets.clear();
  }

  isDraining(): boolean {
    return this.draining;
  }

  getAddress(): ListenAddress | undefined {
    return this.runtimeAddress;
  }

  getInFlightCount(): number {
    return this.inFlight;
  }

  private async listen(server: HttpServerType, address: ListenAddress): Promise<void> {
    try {
      await new Promise<void>((resolve, reject) => {
        const onListenError = (error: Error) => {
          reject(new BindError(address, error));
        };

        server.once('error', onListenError);
        server.listen(address.port, address.host, () => {
          server.off('error', onListenError);
          resolve();
        });
      });
    } catch (error) {
      const bindError = toError(error);
      this.logger.error('Failed to start server', {
        address: formatAddress(address),
        error: bindError.message,
      });
      throw bindError;
    }

    server.on('error', (error) => {
      this.logger.error('Server error occurred', { error: error.message });
    });

    const bound = server.address();
    this.runtimeAddress =
      typeof bound === 'object' && bound ? { host: bound.address, port: bound.port } : address;
    this.httpServer = server;
    this.draining = false;

    this.logger.info('Server started successfully', { address: formatAddress(this.runtimeAddress) });
  }

  private trackRequest(req: IncomingMessage, res: ServerResponse): void {
    this.inFlight += 1;

    res.once('close', () => {
      this.inFlight -= 1;

      // Keep-alive sockets would otherwise hold server.close() open after the drain.
      if (this.draining && !req.socket.destroyed) {
        req.socket.end();
      }
    });
  }
}
