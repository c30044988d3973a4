/**
 * DDR Timer Sync
 *
 * Mirrors TriCaster DDR clip durations onto Singular control-app timer
 * fields, with a control passthrough and registry of subcompositions.
 *
 * @module ddr-timer-sync
 */

export { startApp, createLogger, type StartOptions } from './app.js';
export {
  createAppContext,
  rebuildRegistry,
  handleConfigChange,
  watchConfig,
  type AppContext,
  type ContextOptions,
} from './context.js';

// Configuration
export {
  ConfigSchema,
  parseConfig,
  safeParseConfig,
  clampInterval,
  validateTimerSync,
  type Config,
  type RoundMode,
  type TimerFieldSet,
  type TriCasterConfig,
  type WebConfig,
} from './core/config/schema.js';
export { ConfigStore, applyEnvironment, type ConfigChangeEvent, type ConfigSource } from './core/config/store.js';

// Errors
export {
  SyncError,
  NotConfiguredError,
  RemoteUnavailableError,
  ParseFailureError,
  FieldNotResolvedError,
  NotFoundError,
  InvalidArgumentError,
  isSyncError,
  errorMessage,
  toErrorBody,
  httpStatusOf,
  type SyncErrorKind,
  type ErrorBody,
} from './core/errors.js';

// Durations
export {
  parseSeconds,
  parseTimecode,
  roundHundredths,
  splitDuration,
  sameDuration,
  formatMinutesSeconds,
  type MinutesSeconds,
} from './core/duration/duration.js';

// Sync engine
export { Registry, slugify, buildTable, type RegistryEntry, type RebuildSummary } from './core/registry/registry.js';
export { FieldResolutionCache } from './core/sync/field-cache.js';
export {
  SyncOrchestrator,
  configuredSlots,
  durationSlots,
  type SlotSyncResult,
  type SyncAllResult,
  type SyncSource,
} from './core/sync/orchestrator.js';
export { AutoSyncLoop, type AutoSyncStatus, type PollResult } from './core/sync/auto-sync.js';
export { ControlService, buildTimeControlPayload, type CommandCatalogueEntry } from './core/control/control.js';
export { coerceValue, parseFlag } from './core/control/coerce.js';
export { CommandLog, type CommandKind } from './core/events/command-log.js';

// Remotes
export * from './adapters/singular/index.js';
export * from './adapters/tricaster/index.js';
export { httpRequest, basicAuth, type FetchLike } from './adapters/http.js';

// Web
export { createWebServer, createHttpApp, type WebServer } from './web/server.js';
