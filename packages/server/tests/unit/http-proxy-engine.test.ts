/**
 * Tests for the http-proxy data plane
 * @module @fault-proxy/server/tests/unit/http-proxy-engine
 *
 * Runs the engine between a loopback client and a loopback upstream.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import http from 'http';
import type { AddressInfo } from 'net';
import { HttpProxyEngine, ProxiedExchange, resolveUpstream } from '../../src/data-plane/http-proxy-engine.js';
import { createFaultInjectionState, type FaultInjectionState } from '../../src/faults/state.js';
import { TextThriftDecoder } from '../helpers/fakes.js';

interface ClientResponse {
  status: number;
  contentType: string | undefined;
  body: string;
}

interface ClientRequest {
  port: number;
  method: string;
  host: string;
  path: string;
  body?: string;
}

function send(request: ClientRequest): Promise<ClientResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port: request.port,
        method: request.method,
        path: request.path,
        headers: { Host: request.host },
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () =>
          resolve({
            status: res.statusCode ?? 0,
            contentType: res.headers['content-type'],
            body: Buffer.concat(chunks).toString('utf8'),
          }),
        );
        res.on('error', reject);
      },
    );
    req.on('error', reject);
    req.end(request.body);
  });
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(address && typeof address === 'object' ? address.port : 0);
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

const CLOUD_HOST = 'testaccount.blob.core.windows.net';
const WORKSPACE_HOST = 'workspace.example.com';

describe('HttpProxyEngine', () => {
  let upstream: http.Server;
  let upstreamPort: number;
  let engine: HttpProxyEngine;
  let proxyPort: number;
  let state: FaultInjectionState;

  beforeAll(async () => {
    // Echoes method, path and body so tests can see what was forwarded
    upstream = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        res.writeHead(200, { 'Content-Type': 'text/plain' });
        res.end(`${req.method}|${req.url}|${Buffer.concat(chunks).toString('utf8')}`);
      });
    });
    upstreamPort = await listen(upstream);

    state = createFaultInjectionState({ decoder: new TextThriftDecoder() });
    engine = new HttpProxyEngine({
      port: 0,
      host: '127.0.0.1',
      targetServer: `http://127.0.0.1:${upstreamPort}`,
    });
    await engine.start(state.addon);
    proxyPort = engine.port() ?? 0;
  });

  afterAll(async () => {
    await engine.stop();
    await close(upstream);
  });

  beforeEach(() => {
    state.registry.disableAll();
    state.history.clear();
  });

  it('forwards CloudFetch downloads and records them', async () => {
    const response = await send({ port: proxyPort, method: 'GET', host: CLOUD_HOST, path: '/chunk-0?sig=abc' });

    expect(response.status).toBe(200);
    expect(response.body).toBe('GET|/chunk-0?sig=abc|');
    expect(state.history.snapshot()).toMatchObject([
      { kind: 'cloud_download', url: `http://${CLOUD_HOST}/chunk-0?sig=abc` },
    ]);
  });

  it('answers an enabled error scenario once, then forwards again', async () => {
    state.registry.enable('cloudfetch_403');

    const injected = await send({ port: proxyPort, method: 'GET', host: CLOUD_HOST, path: '/chunk-1' });
    expect(injected.status).toBe(403);
    expect(injected.contentType).toBe('text/plain');
    expect(injected.body).toBe('Forbidden');

    const forwarded = await send({ port: proxyPort, method: 'GET', host: CLOUD_HOST, path: '/chunk-1' });
    expect(forwarded.status).toBe(200);
    expect(forwarded.body).toBe('GET|/chunk-1|');

    expect(state.history.size()).toBe(2);
  });

  it('closes the client connection for a connection reset', async () => {
    state.registry.enable('cloudfetch_connection_reset');

    await expect(
      send({ port: proxyPort, method: 'GET', host: CLOUD_HOST, path: '/chunk-2' }),
    ).rejects.toMatchObject({ code: 'ECONNRESET' });
    expect(state.registry.status('cloudfetch_connection_reset').enabled).toBe(false);
  });

  it('forwards and records Thrift calls with their body', async () => {
    const response = await send({
      port: proxyPort,
      method: 'POST',
      host: WORKSPACE_HOST,
      path: '/sql/1.0/warehouses/test-warehouse',
      body: 'ExecuteStatement:4',
    });

    expect(response.status).toBe(200);
    expect(response.body).toBe('POST|/sql/1.0/warehouses/test-warehouse|ExecuteStatement:4');
    expect(state.history.snapshot()).toMatchObject([
      { kind: 'thrift', method: 'ExecuteStatement', sequenceId: 4 },
    ]);
  });

  it('forwards other traffic without recording it', async () => {
    const response = await send({ port: proxyPort, method: 'GET', host: WORKSPACE_HOST, path: '/api/2.0/clusters/list' });

    expect(response.status).toBe(200);
    expect(response.body).toBe('GET|/api/2.0/clusters/list|');
    expect(state.history.size()).toBe(0);
  });
});

describe('HttpProxyEngine without a target server', () => {
  it('answers origin-form requests with 502', async () => {
    const state = createFaultInjectionState();
    const engine = new HttpProxyEngine({ port: 0, host: '127.0.0.1' });
    await engine.start(state.addon);
    try {
      const response = await send({
        port: engine.port() ?? 0,
        method: 'GET',
        host: WORKSPACE_HOST,
        path: '/anything',
      });
      expect(response.status).toBe(502);
      expect(response.body).toBe('No upstream target configured');
    } finally {
      await engine.stop();
    }
  });
});

describe('resolveUpstream', () => {
  it('routes absolute-URI requests to their own origin', () => {
    expect(resolveUpstream(`http://${CLOUD_HOST}/chunk-0?sig=abc`, 'ignored', 'http://127.0.0.1:1')).toEqual({
      target: `http://${CLOUD_HOST}`,
      host: CLOUD_HOST,
      path: '/chunk-0?sig=abc',
      url: `http://${CLOUD_HOST}/chunk-0?sig=abc`,
    });
  });

  it('routes origin-form requests to the target server', () => {
    expect(resolveUpstream('/sql/1.0/warehouses/w', WORKSPACE_HOST, 'https://upstream.example.com')).toEqual({
      target: 'https://upstream.example.com',
      host: WORKSPACE_HOST,
      path: '/sql/1.0/warehouses/w',
      url: `https://${WORKSPACE_HOST}/sql/1.0/warehouses/w`,
    });
  });

  it('has no target for origin-form requests without a target server', () => {
    expect(resolveUpstream('/x', WORKSPACE_HOST, undefined).target).toBeNull();
  });
});

describe('ProxiedExchange', () => {
  it('reverts a synthesized response and a kill', () => {
    const exchange = new ProxiedExchange({
      method: 'GET',
      host: CLOUD_HOST,
      path: '/',
      url: `http://${CLOUD_HOST}/`,
      body: new Uint8Array(0),
    });
    exchange.respond({ statusCode: 500, body: 'x', headers: {} });
    exchange.kill();

    exchange.revert();

    expect(exchange.synthetic).toBeNull();
    expect(exchange.killed).toBe(false);
  });
});
