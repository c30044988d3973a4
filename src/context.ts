/**
 * Service wiring.
 *
 * Builds every service around one configuration store and keeps them in
 * step with saved configuration.
 */

import type { Logger } from 'pino';
import type { ConfigStore, ConfigChangeEvent } from './core/config/store.js';
import { CommandLog } from './core/events/command-log.js';
import { Registry } from './core/registry/registry.js';
import { FieldResolutionCache } from './core/sync/field-cache.js';
import { SyncOrchestrator } from './core/sync/orchestrator.js';
import { AutoSyncLoop } from './core/sync/auto-sync.js';
import { ControlService } from './core/control/control.js';
import { SingularClient } from './adapters/singular/client.js';
import { TriCasterClient } from './adapters/tricaster/client.js';
import type { FetchLike } from './adapters/http.js';

// ============================================================================
// Application Context
// ============================================================================

export interface AppContext {
  store: ConfigStore;
  logger: Logger;
  commandLog: CommandLog;
  singular: SingularClient;
  tricaster: TriCasterClient;
  registry: Registry;
  fieldCache: FieldResolutionCache;
  orchestrator: SyncOrchestrator;
  autoSync: AutoSyncLoop;
  control: ControlService;
  startTime: Date;
}

export interface ContextOptions {
  /** Outbound HTTP; replaced by an in-process stand-in in tests */
  fetchImpl?: FetchLike;
  /** Delay used between restart commands */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build every service around one configuration store.
 * Each service is a fresh instance; nothing is shared between contexts.
 */
export function createAppContext(
  store: ConfigStore,
  logger: Logger,
  options: ContextOptions = {}
): AppContext {
  const commandLog = new CommandLog(store.get().logging.commandLogSize);
  const singular = new SingularClient(() => store.get().singular, options.fetchImpl);
  const tricaster = new TriCasterClient(options.fetchImpl);
  const registry = new Registry(singular, logger);
  const fieldCache = new FieldResolutionCache(singular, logger);

  const orchestrator = new SyncOrchestrator({
    config: store,
    controlApp: singular,
    playback: tricaster,
    fieldCache,
    logger,
    commandLog,
    ...(options.sleep && { sleep: options.sleep }),
  });

  const autoSync = new AutoSyncLoop({ config: store, orchestrator, logger });
  const control = new ControlService({ registry, config: store, controlApp: singular, commandLog, logger });

  return {
    store,
    logger,
    commandLog,
    singular,
    tricaster,
    registry,
    fieldCache,
    orchestrator,
    autoSync,
    control,
    startTime: new Date(),
  };
}

// ============================================================================
// Configuration Changes
// ============================================================================

/**
 * Rebuild the registry after the app list changes.
 */
export async function rebuildRegistry(context: AppContext): Promise<void> {
  const { registry, store, commandLog } = context;
  const summary = await registry.rebuildAll(store.get().singular.apps);

  for (const app of summary.apps) {
    commandLog.record(
      'Registry',
      app.ok ? `App '${app.app}': ${app.count} subcompositions` : `App '${app.app}': ${app.error ?? 'failed'}`
    );
  }
  commandLog.record('Registry', `Total: ${summary.total} subcompositions from ${summary.apps.length} app(s)`);
}

/**
 * React to saved configuration:
 * - timer sync edits invalidate field resolutions and start/stop auto-sync
 * - control app edits invalidate field resolutions and rebuild the registry
 */
export function handleConfigChange(context: AppContext, event: ConfigChangeEvent): Promise<void> {
  const { logger, fieldCache, autoSync } = context;
  const tasks: Promise<void>[] = [];

  if (event.changed.includes('timerSync') || event.changed.includes('singular')) {
    fieldCache.invalidate();
  }

  if (event.changed.includes('singular')) {
    tasks.push(rebuildRegistry(context));
  }

  if (event.changed.includes('timerSync')) {
    if (event.config.timerSync.autoSync.enabled) {
      autoSync.start();
    } else {
      tasks.push(autoSync.stop());
    }
  }

  logger.debug({ changed: event.changed }, 'Configuration changed');
  return Promise.all(tasks).then(() => undefined);
}

export function watchConfig(context: AppContext): void {
  const { store, logger } = context;
  store.on('change', (event) => {
    handleConfigChange(context, event).catch((error: unknown) => {
      logger.error({ error }, 'Failed to apply configuration change');
    });
  });
}
