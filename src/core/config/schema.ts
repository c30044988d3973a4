/**
 * Configuration schema for DDR timer sync.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';

// ============================================================================
// Constants
// ============================================================================

export const MIN_AUTO_SYNC_INTERVAL_SECONDS = 2;
export const MAX_AUTO_SYNC_INTERVAL_SECONDS = 10;

// ============================================================================
// Sub-schemas
// ============================================================================

const SingularConfigSchema = z.object({
  /** Control app name → control app token */
  apps: z.record(z.string().min(1), z.string().min(1)).default({}),
  apiBase: z.string().url().default('https://app.singular.live/apiv2'),
  requestTimeoutMs: z.number().int().positive().default(10000),
});

const TriCasterConfigSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().min(1).optional(),
  user: z.string().default('admin'),
  password: z.string().optional(),
  requestTimeoutMs: z.number().int().positive().default(6000),
});

/**
 * Field ids driving one DDR's on-air timer.
 * Partial mappings are accepted here and reported when syncing.
 */
const TimerFieldSetSchema = z.object({
  min: z.string().min(1).optional(),
  sec: z.string().min(1).optional(),
  timer: z.string().min(1).optional(),
});

const AutoSyncConfigSchema = z.object({
  enabled: z.boolean().default(false),
  intervalSeconds: z
    .number()
    .int()
    .min(MIN_AUTO_SYNC_INTERVAL_SECONDS)
    .max(MAX_AUTO_SYNC_INTERVAL_SECONDS)
    .default(3),
});

const TimerSyncConfigSchema = z.object({
  /** Control app token the timer fields live in */
  token: z.string().min(1).optional(),
  roundMode: z.enum(['frames', 'none']).default('frames'),
  fields: z.record(z.coerce.number().int().positive(), TimerFieldSetSchema).default({}),
  /** Delay between the pause and reset commands of a restart */
  restartDelayMs: z.number().int().min(0).max(1000).default(50),
  autoSync: AutoSyncConfigSchema.default({}),
});

const WebAuthConfigSchema = z.object({
  enabled: z.boolean().default(false),
  username: z.string().optional(),
  password: z.string().optional(),
});

const WebConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(3113),
  host: z.string().default('0.0.0.0'),
  auth: WebAuthConfigSchema.optional(),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  prettyPrint: z.boolean().default(true),
  commandLogSize: z.number().int().positive().default(200),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  singular: SingularConfigSchema.default({}),
  tricaster: TriCasterConfigSchema.default({}),
  timerSync: TimerSyncConfigSchema.default({}),
  web: WebConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type SingularConfig = z.infer<typeof SingularConfigSchema>;
export type TriCasterConfig = z.infer<typeof TriCasterConfigSchema>;
export type TimerFieldSet = z.infer<typeof TimerFieldSetSchema>;
export type TimerSyncConfig = z.infer<typeof TimerSyncConfigSchema>;
export type AutoSyncConfig = z.infer<typeof AutoSyncConfigSchema>;
export type WebConfig = z.infer<typeof WebConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type RoundMode = TimerSyncConfig['roundMode'];

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Returns parsed config or throws ZodError.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}

/**
 * Validate configuration without throwing.
 * Returns result object with success flag.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(raw);
}

/**
 * Clamp an auto-sync interval into the supported range.
 */
export function clampInterval(seconds: number): number {
  return Math.max(
    MIN_AUTO_SYNC_INTERVAL_SECONDS,
    Math.min(MAX_AUTO_SYNC_INTERVAL_SECONDS, Math.round(seconds))
  );
}

/**
 * Semantic checks on timer sync settings.
 * These are warnings at save time; the same problems fail the sync itself.
 */
export function validateTimerSync(config: Config): string[] {
  const warnings: string[] = [];
  const { timerSync, tricaster } = config;

  for (const [slot, fields] of Object.entries(timerSync.fields)) {
    if (Boolean(fields.min) !== Boolean(fields.sec)) {
      warnings.push(`DDR ${slot} maps only one of 'min' and 'sec'; duration sync will fail for it.`);
    }
  }

  if (timerSync.autoSync.enabled && !timerSync.token) {
    warnings.push('Auto-sync is enabled but no control app token is set for timer sync.');
  }

  if (timerSync.autoSync.enabled && (!tricaster.enabled || !tricaster.host)) {
    warnings.push('Auto-sync is enabled but the TriCaster module is disabled or has no host.');
  }

  return warnings;
}
