/**
 * modelgate Server
 *
 * OpenAI-compatible front door for local inference backends.
 *
 * Features:
 * - `/v1/chat/completions`, buffered or streamed as SSE
 * - `/v1/models` listing the configured model names
 * - `/health` with rolling request stats
 * - Bearer API key auth, CORS, `X-Request-ID` on every response
 *
 * @packageDocumentation
 */

import * as http from 'node:http';
import { nanoid } from 'nanoid';
import { AuthGuard, type KeyEntry } from './auth.js';
import { Dispatcher } from './dispatcher.js';
import { GatewayError } from './errors.js';
import { RequestHandler } from './handler.js';
import { handleHealthRequest } from './health.js';
import { sendError, sendJson } from './http.js';
import { defaultLogger, type Logger } from './logger.js';
import type { ModelList } from './protocol/openai.js';
import type { ModelRegistry } from './registry.js';
import { StreamRelay } from './relay.js';
import { StatsCollector } from './stats.js';
import type { UsageRecord, UsageSink } from './types.js';
import { UpstreamClient } from './upstream.js';
import { LoggingUsageSink, fanOut } from './usage.js';
import { VERSION } from './version.js';

/**
 * Gateway server configuration
 */
export interface GatewayServerConfig {
  registry: ModelRegistry;
  keys: Iterable<KeyEntry>;
  port?: number;
  host?: string;
  /** Allowed CORS origins; `*` allows any. */
  corsOrigins?: readonly string[];
  /** Extra usage sinks (e.g. the SQLite ledger). Logging and stats are always on. */
  usageSinks?: UsageSink[];
  logger?: Logger;
  maxBodySize?: number;
  now?: () => number;
}

function notFoundBody(pathname: string): { error: { message: string; type: string; code: string } } {
  return {
    error: { message: `Unknown endpoint: ${pathname}`, type: 'not_found', code: 'not_found' },
  };
}

export class GatewayServer {
  private server: http.Server | null = null;
  private readonly registry: ModelRegistry;
  private readonly auth: AuthGuard;
  private readonly handler: RequestHandler;
  private readonly stats: StatsCollector;
  private readonly logger: Logger;
  private readonly corsOrigins: readonly string[];
  private readonly inFlight = new Set<Promise<UsageRecord>>();
  private readonly startedAt: number;
  private readonly config: Required<Pick<GatewayServerConfig, 'port' | 'host'>> & GatewayServerConfig;

  constructor(config: GatewayServerConfig) {
    this.config = {
      ...config,
      port: config.port ?? 8000,
      host: config.host ?? '127.0.0.1',
    };
    this.logger = config.logger ?? defaultLogger;
    this.registry = config.registry;
    this.corsOrigins = config.corsOrigins ?? ['*'];
    this.startedAt = Date.now();

    this.auth = new AuthGuard(config.keys, this.logger.child('auth'));
    this.stats = new StatsCollector(config.now);

    const usage = fanOut(
      [new LoggingUsageSink(this.logger.child('requests')), this.stats, ...(config.usageSinks ?? [])],
      this.logger,
    );

    this.handler = new RequestHandler({
      auth: this.auth,
      dispatcher: new Dispatcher(this.registry),
      upstream: new UpstreamClient(this.logger.child('upstream')),
      relay: new StreamRelay(this.logger.child('relay')),
      usage,
      logger: this.logger,
      ...(config.now ? { now: config.now } : {}),
      ...(config.maxBodySize !== undefined ? { maxBodySize: config.maxBodySize } : {}),
    });
  }

  /**
   * Start the gateway
   */
  async start(): Promise<void> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error('Unhandled error', { cause: err instanceof Error ? err.message : String(err) });
        if (!res.headersSent) {
          sendJson(res, 500, { error: { message: 'Internal server error', type: 'internal_error', code: 'server_error' } });
        } else if (!res.writableEnded) {
          res.end();
        }
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        this.logger.info('modelgate listening', {
          url: `http://${this.config.host}:${this.port}`,
          models: this.registry.size,
        });
        resolve();
      });
    });
  }

  /**
   * Stop the gateway. Resolves once every connection is closed and in-flight
   * requests have recorded their usage.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    await Promise.allSettled([...this.inFlight]);
    this.logger.info('Gateway stopped');
  }

  /** Bound port (useful when listening on port 0). */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  get url(): string {
    const host = this.config.host === '0.0.0.0' ? '127.0.0.1' : this.config.host;
    return `http://${host}:${this.port}`;
  }

  getStats(): StatsCollector {
    return this.stats;
  }

  /**
   * Handle incoming request
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const requestId = nanoid();

    res.setHeader('X-Request-ID', requestId);
    this.applyCors(req, res);

    // Handle preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if ((url.pathname === '/health' || url.pathname === '/healthz') && req.method === 'GET') {
      handleHealthRequest(res, {
        status: 'healthy',
        version: VERSION,
        models: this.registry.names(),
        uptime: Math.floor((Date.now() - this.startedAt) / 1000),
        stats: this.stats.getStats(),
      });
      return;
    }

    if (url.pathname === '/v1/models' && req.method === 'GET') {
      this.handleListModels(req, res);
      return;
    }

    if (url.pathname === '/v1/chat/completions' && req.method === 'POST') {
      const pending = this.handler.handle(req, res, requestId);
      this.inFlight.add(pending);
      try {
        await pending;
      } finally {
        this.inFlight.delete(pending);
      }
      return;
    }

    sendJson(res, 404, notFoundBody(url.pathname));
  }

  private handleListModels(req: http.IncomingMessage, res: http.ServerResponse): void {
    try {
      this.auth.authenticate(req.headers.authorization);
    } catch (err) {
      if (err instanceof GatewayError) {
        sendError(res, err);
        return;
      }
      throw err;
    }

    const created = Math.floor(this.startedAt / 1000);
    const body: ModelList = {
      object: 'list',
      data: this.registry.names().map((id) => ({ id, object: 'model', created, owned_by: 'modelgate' })),
    };
    sendJson(res, 200, body);
  }

  private applyCors(req: http.IncomingMessage, res: http.ServerResponse): void {
    const origin = req.headers.origin;
    if (this.corsOrigins.includes('*')) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else if (origin && this.corsOrigins.includes(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Vary', 'Origin');
    } else {
      return;
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-ID');
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID');
  }
}
