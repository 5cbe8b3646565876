/**
 * GatewayServer -- the host application's HTTP health surface.
 *
 * Uses the Node.js built-in `http` module. The worker route asks the
 * supervisor for one live probe; nothing is cached.
 *
 * Routes:
 *   GET /health         - liveness of the host process
 *   GET /health/worker  - health of the supervised analysis worker
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { toError, type IObserver, type IWorkerSupervisor } from '@pulse/core';

export interface GatewayServerOptions {
  port: number;
  host?: string;
  supervisor: Pick<IWorkerSupervisor, 'isHealthy'>;
  observer?: IObserver;
}

export interface GatewayAddress {
  host: string;
  port: number;
}

export class GatewayServer {
  private server: Server | null = null;
  private readonly port: number;
  private readonly host: string;
  private readonly supervisor: Pick<IWorkerSupervisor, 'isHealthy'>;
  private readonly observer?: IObserver;

  constructor(options: GatewayServerOptions) {
    this.port = options.port;
    this.host = options.host ?? '127.0.0.1';
    this.supervisor = options.supervisor;
    this.observer = options.observer;
  }

  /** Start listening on the configured host and port. */
  async start(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          const error = toError(err);
          this.observer?.onError(error, { component: 'gateway', url: req.url });
          this.sendJson(res, 500, { error: error.message });
        });
      });

      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        this.server = server;
        resolve();
      });
    });
  }

  /** Stop accepting connections and wait for open ones to finish. */
  async stop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        this.server = null;
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Bound address, or null when not listening. Useful with port 0. */
  getAddress(): GatewayAddress | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  // ---------------------------------------------------------------------------
  // Request handling
  // ---------------------------------------------------------------------------

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const path = (req.url ?? '/').split('?')[0];

    if (method === 'GET' && path === '/health') {
      this.sendJson(res, 200, { status: 'ok', timestamp: new Date().toISOString() });
      return;
    }

    if (method === 'GET' && path === '/health/worker') {
      const healthy = await this.supervisor.isHealthy();
      this.sendJson(res, healthy ? 200 : 503, { worker: healthy ? 'healthy' : 'unhealthy' });
      return;
    }

    this.sendJson(res, 404, { error: 'Not found' });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    const body = JSON.stringify(data);
    res.writeHead(status, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }
}
