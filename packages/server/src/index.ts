/**
 * Fault Proxy Server
 *
 * Entry point: the control API plus the data plane driving the fault
 * injection hooks.
 * @module @fault-proxy/server
 */

import http from 'http';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import express, { type Express } from 'express';
import cors, { type CorsOptions } from 'cors';
import { createServiceLogger } from '@fault-proxy/shared';
import { createControlRouter } from './api/router.js';
import { loadProxyConfig, type ProxyConfig } from './config.js';
import { createFaultInjectionState, type FaultInjectionState } from './faults/state.js';
import type { InterceptionEngine, ThriftDecoder } from './faults/ports.js';
import type { InjectionEvent } from './faults/injector.js';
import { HttpProxyEngine } from './data-plane/http-proxy-engine.js';

const logger = createServiceLogger({ service: 'fault-proxy' }, { component: 'server' });

// ============================================================================
// CORS Configuration
// ============================================================================

/**
 * Whether `origin` matches one of the allowed patterns (`*` is a wildcard)
 */
export function matchesOrigin(origin: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    if (pattern.includes('*')) {
      const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
      return new RegExp(`^${escaped}$`).test(origin);
    }
    return pattern === origin;
  });
}

/**
 * CORS configuration for browser-based harnesses
 */
export function createCorsConfig(origins: readonly string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Requests without an origin (curl, test clients) are always allowed
      callback(null, !origin || matchesOrigin(origin, origins));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Correlation-ID'],
    exposedHeaders: ['X-Correlation-ID'],
  };
}

/**
 * Collaborators supplied by the embedding process
 */
export interface ServerCollaborators {
  /** Data plane; without one only the control API runs */
  engine?: InterceptionEngine;
  /** Thrift decoder; without one Thrift calls are not recorded */
  decoder?: ThriftDecoder;
}

export interface ServerInstance {
  app: Express;
  controlServer: http.Server;
  state: FaultInjectionState;
  config: ProxyConfig;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

/**
 * Create and configure the server
 */
export function createServer(
  config: Partial<ProxyConfig> = {},
  collaborators: ServerCollaborators = {},
): ServerInstance {
  const finalConfig: ProxyConfig = { ...loadProxyConfig(), ...config };
  const state = createFaultInjectionState({
    maxHistory: finalConfig.maxCallHistory,
    decoder: collaborators.decoder ?? null,
  });

  state.injector.on('injection', (event: InjectionEvent) => {
    logger.info('Injected fault', { ...event, timestamp: event.timestamp.toISOString() });
  });

  const app = express();

  if (finalConfig.enableCors) {
    app.use(cors(createCorsConfig(finalConfig.corsOrigins)));
    logger.debug('CORS enabled', { origins: finalConfig.corsOrigins });
  }

  app.use(createControlRouter(state));
  const controlServer = http.createServer(app);

  logger.info('Creating server', {
    controlPort: finalConfig.controlPort,
    proxyPort: finalConfig.proxyPort,
    host: finalConfig.host,
    maxCallHistory: finalConfig.maxCallHistory,
    dataPlane: collaborators.engine ? 'attached' : 'none',
  });

  return {
    app,
    controlServer,
    state,
    config: finalConfig,

    start: async () => {
      await new Promise<void>((resolveListen, reject) => {
        controlServer.once('error', reject);
        controlServer.listen(finalConfig.controlPort, finalConfig.host, () => {
          controlServer.off('error', reject);
          logger.info('Control API started', {
            url: `http://${finalConfig.host}:${finalConfig.controlPort}`,
          });
          resolveListen();
        });
      });

      if (collaborators.engine) {
        await collaborators.engine.start(state.addon);
      }
    },

    stop: async () => {
      logger.info('Stopping server...');
      if (collaborators.engine) {
        await collaborators.engine.stop();
      }
      await new Promise<void>((resolveClose, reject) => {
        controlServer.close((error) => (error ? reject(error) : resolveClose()));
        controlServer.closeAllConnections();
      });
      logger.info('Server stopped');
    },
  };
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const config = loadProxyConfig();
  const engine = new HttpProxyEngine({
    port: config.proxyPort,
    host: config.host,
    targetServer: config.targetServer,
  });
  const server = createServer(config, { engine });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason instanceof Error ? reason : new Error(String(reason)));
  });

  await server.start();
}

const currentFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (currentFile === entryFile) {
  main().catch((error: unknown) => {
    logger.fatal('Failed to start server', error instanceof Error ? error : undefined);
    process.exit(1);
  });
}

// ============================================================================
// Exports
// ============================================================================

export * from './api/index.js';
export * from './faults/index.js';
export * from './config.js';
export { HttpProxyEngine, ProxiedExchange, resolveUpstream } from './data-plane/http-proxy-engine.js';
