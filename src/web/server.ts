/**
 * Web Server for DDR Timer Sync.
 * Provides the JSON API and a WebSocket feed of sync activity.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server } from 'node:http';
import type { Logger } from 'pino';
import type { AppContext } from '../context.js';
import { createApiRouter } from './api/routes.js';
import { WebSocketHandler } from './ws/handler.js';
import type { WebConfig } from '../core/config/schema.js';
import { httpStatusOf, toErrorBody } from '../core/errors.js';
import { basicAuth } from '../adapters/http.js';

// ============================================================================
// Types
// ============================================================================

export interface WebServerOptions {
  config: WebConfig;
  context: AppContext;
  logger: Logger;
}

export interface WebServer {
  app: Express;
  server: Server;
  wsHandler: WebSocketHandler;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

// ============================================================================
// App Factory
// ============================================================================

/**
 * Build the Express app: body parsing, request logging, optional basic
 * auth and the API router.
 */
export function createHttpApp(config: WebConfig, context: AppContext, logger: Logger): Express {
  const app = express();

  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug({ method: req.method, path: req.path }, 'HTTP request');
    next();
  });

  const guard = authGuard(config);
  if (guard) {
    app.use(guard);
  }

  app.use('/api', createApiRouter(context));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies and anything a route did not render itself
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : httpStatusOf(err);
    if (status >= 500) {
      logger.error({ error: err.message, stack: err.stack }, 'HTTP error');
    }
    res.status(status).json(toErrorBody(err));
  });

  return app;
}

/**
 * Basic auth middleware, or null when auth is off or incomplete.
 */
function authGuard(config: WebConfig): express.RequestHandler | null {
  const auth = config.auth;
  if (!auth?.enabled || !auth.username || !auth.password) {
    return null;
  }
  const expected = basicAuth(auth.username, auth.password);

  return (req, res, next) => {
    if (req.headers.authorization === expected) {
      next();
      return;
    }
    res.setHeader('WWW-Authenticate', 'Basic realm="DDR Timer Sync"');
    res.status(401).json({ error: 'Authentication required' });
  };
}

// ============================================================================
// Server Factory
// ============================================================================

/**
 * Create and configure the web server.
 * Sets up Express app, HTTP server, and WebSocket handler.
 */
export function createWebServer(options: WebServerOptions): WebServer {
  const { config, context, logger } = options;
  const webLogger = logger.child({ module: 'web' });

  const app = createHttpApp(config, context, webLogger);
  const server = createServer(app);
  const wsHandler = new WebSocketHandler(server, context, webLogger);

  wireEventBroadcasting(context, wsHandler, webLogger);

  return {
    app,
    server,
    wsHandler,
    start: async () => {
      return new Promise((resolve, reject) => {
        server.listen(config.port, config.host, () => {
          webLogger.info(
            { host: config.host, port: config.port },
            'Web server listening'
          );
          resolve();
        });
        server.on('error', reject);
      });
    },
    stop: async () => {
      wsHandler.shutdown();
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            webLogger.info('Web server stopped');
            resolve();
          }
        });
      });
    },
  };
}

// ============================================================================
// Event Broadcasting
// ============================================================================

/**
 * Forward sync, registry and auto-sync events to WebSocket clients.
 */
function wireEventBroadcasting(
  context: AppContext,
  wsHandler: WebSocketHandler,
  logger: Logger
): void {
  const { orchestrator, registry, autoSync, commandLog } = context;

  orchestrator.on('synced', ({ result, source }) => {
    wsHandler.broadcastSyncApplied(result, source);
  });

  registry.on('rebuilt', (summary) => {
    wsHandler.broadcastRegistryRebuilt(summary);
  });

  autoSync.on('status', (status) => {
    wsHandler.broadcastAutoSyncStatus(status);
  });

  commandLog.on('entry', (line) => {
    wsHandler.broadcastCommand(line);
  });

  logger.info('Event broadcasting wired to WebSocket handler');
}
