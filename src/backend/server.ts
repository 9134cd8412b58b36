/**
 * Backend Server Module
 *
 * Exports server creation and lifecycle functions for use by:
 * - CLI/standalone mode (index.ts)
 * - Tests that need a real HTTP and WebSocket listener
 *
 * Configuration is read through the config service, so environment variables
 * must be set BEFORE importing this module:
 * - DATABASE_PATH: SQLite database file path
 * - BACKEND_PORT: Server port (default: 3001)
 * - NODE_ENV: Environment (development/production/test)
 */

import type { Server as HttpServer } from 'node:http';
import { createServer as createHttpServer } from 'node:http';
import { createExpressMiddleware } from '@trpc/server/adapters/express';
import express from 'express';
import { type WebSocket, WebSocketServer } from 'ws';
import { type AppContext, createAppContext } from './app-context';
import { WS_MAX_PAYLOAD_BYTES } from './constants';
import { closeDatabase } from './db';
import {
  createCorsMiddleware,
  createErrorHandlerMiddleware,
  createRequestLoggerMiddleware,
  securityMiddleware,
} from './middleware';
import { configureDomainBridges } from './orchestration/domain-bridges.orchestrator';
import { createHealthRouter } from './routers/api/health.router';
import { createThreadUpgradeHandler, isThreadSocketPath } from './routers/websocket';
import { sendBadRequest } from './routers/websocket/upgrade-utils';
import { getLogFilePath } from './services/logger.service';
import { appRouter, createContextFactory } from './trpc/index';

/**
 * Server instance returned by createServer()
 */
export interface ServerInstance {
  /** Start the server and return the URL */
  start(): Promise<string>;
  /** Stop the server gracefully */
  stop(): Promise<void>;
  /** Get the actual port the server is listening on */
  getPort(): number;
  getHttpServer(): HttpServer;
}

export interface ServerOptions {
  /** Close the process-wide database on stop. Off when the context brings its own database. */
  closeDatabaseOnStop?: boolean;
}

/**
 * Create and configure the backend server.
 *
 * @param requestedPort - Port to listen on (default: BACKEND_PORT from config)
 * @returns ServerInstance with start/stop methods
 */
export function createServer(
  requestedPort?: number,
  appContext: AppContext = createAppContext(),
  options: ServerOptions = {}
): ServerInstance {
  const { configService, connectionRegistry, createLogger, findAvailablePort } =
    appContext.services;
  const logger = createLogger('server');
  const closeDatabaseOnStop = options.closeDatabaseOnStop ?? true;

  const REQUESTED_PORT = requestedPort ?? configService.getBackendPort();
  let actualPort: number = REQUESTED_PORT;
  let disposeBridges: (() => void) | null = null;

  const app = express();

  // Create HTTP server and WebSocket server
  const server = createHttpServer(app);
  const wss = new WebSocketServer({ noServer: true, maxPayload: WS_MAX_PAYLOAD_BYTES });

  // ============================================================================
  // WebSocket Heartbeat - Detect zombie connections
  // ============================================================================
  const wsAliveMap = new WeakMap<WebSocket, boolean>();
  let heartbeatInterval: NodeJS.Timeout | null = null;

  const startHeartbeat = () => {
    heartbeatInterval = setInterval(() => {
      wss.clients.forEach((ws) => {
        if (wsAliveMap.get(ws) === false) {
          logger.info('Terminating unresponsive WebSocket connection');
          ws.terminate();
          return;
        }
        wsAliveMap.set(ws, false);
        ws.ping();
      });
    }, configService.getRealtimeConfig().heartbeatIntervalMs);
  };

  // ============================================================================
  // HTTP Pipeline
  // ============================================================================
  app.use(securityMiddleware);
  app.use(createCorsMiddleware(appContext));
  app.use(express.json({ limit: '1mb' }));
  app.use(createRequestLoggerMiddleware(appContext));

  app.use('/health', createHealthRouter(appContext));

  app.use(
    '/api/trpc',
    createExpressMiddleware({
      router: appRouter,
      createContext: createContextFactory(appContext),
    })
  );

  app.use(createErrorHandlerMiddleware(appContext));

  // ============================================================================
  // WebSocket Upgrade Handler
  // ============================================================================
  const handleThreadUpgrade = createThreadUpgradeHandler(appContext);

  server.on('upgrade', (request, socket, head) => {
    let url: URL;
    try {
      url = new URL(request.url || '', `http://${request.headers.host || 'localhost'}`);
    } catch {
      sendBadRequest(socket, 'Malformed upgrade URL');
      return;
    }

    if (isThreadSocketPath(url.pathname)) {
      handleThreadUpgrade(request, socket, head, url, wss, wsAliveMap);
      return;
    }

    socket.destroy();
  });

  // ============================================================================
  // Cleanup Logic
  // ============================================================================
  const closeHttpServer = () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });

  const performCleanup = async () => {
    logger.info('Starting graceful cleanup');

    if (heartbeatInterval) {
      clearInterval(heartbeatInterval);
      heartbeatInterval = null;
    }
    disposeBridges?.();
    disposeBridges = null;

    connectionRegistry.closeAll();
    wss.close();
    server.closeIdleConnections();
    await closeHttpServer();

    if (closeDatabaseOnStop) {
      closeDatabase();
    }

    logger.info('Graceful cleanup completed');
  };

  // ============================================================================
  // Return Server Instance
  // ============================================================================
  return {
    async start(): Promise<string> {
      actualPort = await findAvailablePort(REQUESTED_PORT);
      if (actualPort !== REQUESTED_PORT) {
        logger.warn('Requested port in use, using alternative', {
          requestedPort: REQUESTED_PORT,
          actualPort,
        });
      }

      disposeBridges = configureDomainBridges(appContext.services);

      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(actualPort, () => {
          server.off('error', reject);
          resolve();
        });
      });

      const address = server.address();
      if (address && typeof address !== 'string') {
        actualPort = address.port;
      }

      startHeartbeat();

      logger.info('Backend server started', {
        port: actualPort,
        environment: configService.getEnvironment(),
        logFile: getLogFilePath(),
      });
      logger.info('Server endpoints available', {
        server: `http://localhost:${actualPort}`,
        health: `http://localhost:${actualPort}/health`,
        trpc: `http://localhost:${actualPort}/api/trpc`,
        wsThreads: `ws://localhost:${actualPort}/ws/threads/:threadId`,
      });

      return `http://localhost:${actualPort}`;
    },

    async stop(): Promise<void> {
      await performCleanup();
    },

    getPort(): number {
      return actualPort;
    },

    getHttpServer(): HttpServer {
      return server;
    },
  };
}
