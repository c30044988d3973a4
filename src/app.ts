/**
 * DDR Timer Sync application.
 *
 * Loads configuration, starts the services and the HTTP API, and returns a
 * shutdown function. Used by the CLI and programmatic interfaces.
 *
 * @module ddr-timer-sync/app
 */

import { pino, type Logger } from 'pino';
import type { Config } from './core/config/schema.js';
import { ConfigStore } from './core/config/store.js';
import {
  createAppContext,
  rebuildRegistry,
  watchConfig,
  type AppContext,
} from './context.js';
import { createWebServer, type WebServer } from './web/server.js';

// ============================================================================
// Logger Setup
// ============================================================================

/**
 * Create application logger with sensible defaults.
 */
export function createLogger(level?: string, prettyPrint = true): Logger {
  if (prettyPrint) {
    return pino({
      level: level ?? process.env['LOG_LEVEL'] ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

// ============================================================================
// Application Lifecycle
// ============================================================================

export interface StartOptions {
  configPath?: string;
  /** Disable web server (useful for testing) */
  disableWeb?: boolean;
}

function describe(config: Config): Record<string, unknown> {
  return {
    apps: Object.keys(config.singular.apps),
    tricaster: config.tricaster.enabled ? config.tricaster.host ?? '(no host)' : 'disabled',
    timerSlots: Object.keys(config.timerSync.fields).length,
    autoSync: config.timerSync.autoSync.enabled,
  };
}

/**
 * Start the service.
 * Returns a shutdown function for graceful termination.
 */
export async function startApp(options: StartOptions = {}): Promise<{
  context: AppContext;
  webServer: WebServer | null;
  shutdown: () => Promise<void>;
}> {
  const configPath = options.configPath ?? process.env['CONFIG_PATH'] ?? './config/config.yaml';
  const store = await ConfigStore.load(configPath);
  const config = store.get();
  const logger = createLogger(config.logging.level, config.logging.prettyPrint);

  logger.info('DDR Timer Sync starting...');
  logger.info({ path: store.path, ...describe(config) }, 'Configuration loaded');

  const context = createAppContext(store, logger);
  watchConfig(context);

  await rebuildRegistry(context);

  if (config.timerSync.autoSync.enabled) {
    context.autoSync.start();
  }

  let webServer: WebServer | null = null;
  if (config.web.enabled && !options.disableWeb) {
    webServer = createWebServer({ config: config.web, context, logger });
    await webServer.start();
    logger.info({ host: config.web.host, port: config.web.port }, 'HTTP API available');
  }

  logger.info('DDR Timer Sync running. Press Ctrl+C to stop.');

  const shutdown = async () => {
    logger.info('Shutdown initiated');

    await context.autoSync.stop();

    if (webServer) {
      await webServer.stop();
    }

    logger.info('Shutdown complete');
  };

  return { context, webServer, shutdown };
}
