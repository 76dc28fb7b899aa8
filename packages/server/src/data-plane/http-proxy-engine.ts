/**
 * HTTP Proxy Engine
 *
 * Plain-HTTP interception engine built on http-proxy. Each incoming request
 * is buffered, handed to the exchange hooks, and then either answered with
 * the synthesized response, killed, or forwarded upstream.
 *
 * Two routing modes:
 * - forward proxy: absolute-URI requests (`GET http://host/path`) go to that host
 * - reverse proxy: origin-form requests go to the configured target server
 *
 * TLS interception is not handled here.
 *
 * @module @fault-proxy/server/data-plane/http-proxy-engine
 */

import http from 'http';
import { Readable } from 'stream';
import httpProxy from 'http-proxy';
import { createServiceLogger, wrapError } from '@fault-proxy/shared';
import type {
  ExchangeFlow,
  ExchangeHooks,
  InterceptedRequest,
  InterceptedResponse,
  InterceptionEngine,
  SyntheticResponse,
} from '../faults/ports.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'data-plane' },
);

/** Upstream response bodies above this size are not handed to the response hook */
export const MAX_CAPTURED_RESPONSE_BYTES = 4 * 1024 * 1024;

export interface HttpProxyEngineOptions {
  port: number;
  host: string;
  /** Upstream for origin-form requests */
  targetServer?: string;
}

/**
 * Exchange state shared between the hooks and the engine
 */
export class ProxiedExchange implements ExchangeFlow {
  response: InterceptedResponse | null = null;
  synthetic: SyntheticResponse | null = null;
  killed = false;

  constructor(readonly request: InterceptedRequest) {}

  respond(response: SyntheticResponse): void {
    this.synthetic = response;
  }

  kill(): void {
    this.killed = true;
  }

  revert(): void {
    this.synthetic = null;
    this.killed = false;
  }
}

/**
 * Where a request goes upstream. `target` is null when there is no upstream.
 */
export interface UpstreamRoute {
  target: string | null;
  host: string;
  path: string;
  url: string;
}

/**
 * Resolve the upstream of a request from its request-target and Host header
 */
export function resolveUpstream(
  rawUrl: string,
  hostHeader: string,
  targetServer: string | undefined,
): UpstreamRoute {
  if (/^https?:\/\//i.test(rawUrl)) {
    const url = new URL(rawUrl);
    return {
      target: url.origin,
      host: url.host,
      path: `${url.pathname}${url.search}`,
      url: url.toString(),
    };
  }

  const path = rawUrl || '/';
  const scheme = targetServer && new URL(targetServer).protocol === 'https:' ? 'https' : 'http';
  return {
    target: targetServer ?? null,
    host: hostHeader,
    path,
    url: `${scheme}://${hostHeader}${path}`,
  };
}

function readBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

export class HttpProxyEngine implements InterceptionEngine {
  private server: http.Server | null = null;
  private readonly proxy: httpProxy;
  private readonly exchanges = new WeakMap<http.IncomingMessage, ProxiedExchange>();
  private hooks: ExchangeHooks | null = null;

  constructor(private readonly options: HttpProxyEngineOptions) {
    this.proxy = httpProxy.createProxyServer({ xfwd: true });

    this.proxy.on('error', (err, _req, res) => {
      logger.error('Upstream error', err);
      if (res instanceof http.ServerResponse) {
        if (!res.headersSent) {
          res.writeHead(502, { 'Content-Type': 'text/plain' });
        }
        res.end('Bad Gateway');
      } else {
        res.destroy();
      }
    });

    this.proxy.on('proxyRes', (proxyRes, req) => {
      const exchange = this.exchanges.get(req);
      if (exchange) {
        this.captureResponse(exchange, proxyRes);
      }
    });
  }

  async start(hooks: ExchangeHooks): Promise<void> {
    this.hooks = hooks;
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        logger.error('Exchange failed', wrapError(error), { url: req.url });
        if (!res.headersSent) {
          res.writeHead(502, { 'Content-Type': 'text/plain' });
        }
        res.end('Bad Gateway');
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        logger.info('Data plane listening', {
          host: this.options.host,
          port: this.port(),
          targetServer: this.options.targetServer,
        });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.proxy.close();
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    logger.info('Data plane stopped');
  }

  /**
   * Bound port, once started
   */
  port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const route = resolveUpstream(req.url ?? '/', req.headers.host ?? '', this.options.targetServer);
    const body = await readBody(req);

    const exchange = new ProxiedExchange({
      method: req.method ?? 'GET',
      host: route.host,
      path: route.path,
      url: route.url,
      body,
    });

    if (this.hooks) {
      await this.hooks.request(exchange);
    }

    if (exchange.killed) {
      logger.info('Killing connection', { url: exchange.request.url });
      req.socket.destroy();
      return;
    }

    if (exchange.synthetic) {
      const synthetic = exchange.synthetic;
      res.writeHead(synthetic.statusCode, synthetic.headers);
      res.end(synthetic.body);
      return;
    }

    if (!route.target) {
      res.writeHead(502, { 'Content-Type': 'text/plain' });
      res.end('No upstream target configured');
      return;
    }

    req.url = route.path;
    this.exchanges.set(req, exchange);
    this.proxy.web(req, res, { target: route.target, buffer: Readable.from([body]) });
  }

  private captureResponse(exchange: ProxiedExchange, proxyRes: http.IncomingMessage): void {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflow = false;

    proxyRes.on('data', (chunk: Buffer) => {
      if (overflow) return;
      size += chunk.length;
      if (size > MAX_CAPTURED_RESPONSE_BYTES) {
        overflow = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });

    proxyRes.on('end', () => {
      if (overflow || !this.hooks) return;
      exchange.response = {
        statusCode: proxyRes.statusCode ?? 0,
        body: Buffer.concat(chunks),
      };
      this.hooks.response(exchange);
    });
  }
}
