/**
 * Sync orchestrator.
 *
 * Mirrors DDR clip durations onto control app timer fields and drives the
 * timer widgets. Every operation re-reads configuration, so saved changes
 * apply on the next call. Manual syncs and the background loop share one
 * attempt path and one last-applied table (SyncState).
 *
 * Per attempt: idle → fetching-duration → resolving-fields → patching →
 * applied | failed. SyncState only changes on `applied`.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { Config, RoundMode, TimerFieldSet } from '../config/schema.js';
import type { ConfigSource } from '../config/store.js';
import {
  FieldNotResolvedError,
  NotConfiguredError,
  errorMessage,
  isSyncError,
  type SyncErrorKind,
} from '../errors.js';
import {
  formatMinutesSeconds,
  sameDuration,
  splitDuration,
  type MinutesSeconds,
} from '../duration/duration.js';
import type { CommandLog } from '../events/command-log.js';
import { connectionFromConfig } from '../../adapters/tricaster/client.js';
import type { PlaybackDeviceTransport } from '../../adapters/tricaster/types.js';
import type {
  ControlAppTransport,
  ControlItem,
  ControlPatchResponse,
  JsonValue,
  TimerCommand,
} from '../../adapters/singular/types.js';
import type { FieldResolutionCache } from './field-cache.js';

// ============================================================================
// Types
// ============================================================================

export type SyncPhase =
  | 'idle'
  | 'fetching-duration'
  | 'resolving-fields'
  | 'patching'
  | 'applied'
  | 'failed';

export type SyncSource = 'manual' | 'auto';

export interface SlotSyncResult {
  ok: true;
  slot: number;
  durationSeconds: number;
  minutes: number;
  seconds: number;
  framerate: number | null;
  roundMode: RoundMode;
}

export interface SlotError {
  slot: number;
  kind: SyncErrorKind | 'internal';
  message: string;
}

export interface SyncAllResult {
  ok: boolean;
  results: Record<string, SlotSyncResult>;
  errors: SlotError[];
}

export interface TimerCommandResult {
  ok: true;
  slot: number;
  command: TimerCommand;
}

export interface RestartResult {
  ok: true;
  slot: number;
  action: 'restart';
}

export interface RestartAllResult {
  ok: boolean;
  results: RestartResult[];
  errors: SlotError[];
}

export interface SyncAttemptEvent {
  slot: number;
  phase: SyncPhase;
  source: SyncSource;
  error?: string;
}

export interface SyncAppliedEvent {
  result: SlotSyncResult;
  source: SyncSource;
}

export interface SyncOrchestratorEvents {
  attempt: (event: SyncAttemptEvent) => void;
  synced: (event: SyncAppliedEvent) => void;
}

export interface SyncOrchestratorOptions {
  config: ConfigSource;
  controlApp: ControlAppTransport;
  playback: PlaybackDeviceTransport;
  fieldCache: FieldResolutionCache;
  logger?: Logger;
  commandLog?: CommandLog;
  /** Waits between the pause and reset of a restart */
  sleep?: (ms: number) => Promise<void>;
}

interface DurationFields {
  min: string;
  sec: string;
}

// ============================================================================
// Slot Helpers
// ============================================================================

/**
 * Every slot with a field mapping, ascending.
 */
export function configuredSlots(config: Config): number[] {
  return Object.keys(config.timerSync.fields)
    .map((key) => Number(key))
    .filter((slot) => Number.isInteger(slot) && slot > 0)
    .sort((a, b) => a - b);
}

function slotFields(config: Config, slot: number): TimerFieldSet | undefined {
  return config.timerSync.fields[slot];
}

/**
 * Slots whose mapping has both a minutes and a seconds field.
 */
export function durationSlots(config: Config): number[] {
  return configuredSlots(config).filter((slot) => {
    const fields = slotFields(config, slot);
    return Boolean(fields?.min && fields.sec);
  });
}

function requireToken(config: Config): string {
  const token = config.timerSync.token;
  if (!token) {
    throw new NotConfiguredError('No control app token configured for timer sync', 'singular');
  }
  return token;
}

function requireSlotFields(config: Config, slot: number): TimerFieldSet {
  const fields = slotFields(config, slot);
  if (!fields) {
    throw new NotConfiguredError(`No timer fields configured for DDR ${slot}`);
  }
  return fields;
}

function requireDurationFields(config: Config, slot: number): DurationFields {
  const { min, sec } = requireSlotFields(config, slot);
  if (!min || !sec) {
    throw new NotConfiguredError(`DDR ${slot} missing 'min' or 'sec' field configuration`);
  }
  return { min, sec };
}

function toSlotError(slot: number, error: unknown): SlotError {
  return {
    slot,
    kind: isSyncError(error) ? error.kind : 'internal',
    message: errorMessage(error),
  };
}

// ============================================================================
// Orchestrator
// ============================================================================

export class SyncOrchestrator extends EventEmitter {
  private readonly config: ConfigSource;
  private readonly controlApp: ControlAppTransport;
  private readonly playback: PlaybackDeviceTransport;
  private readonly fieldCache: FieldResolutionCache;
  private readonly logger: Logger | null;
  private readonly commandLog: CommandLog | null;
  private readonly sleep: (ms: number) => Promise<void>;

  /** Last successfully applied value per slot */
  private readonly syncState = new Map<number, MinutesSeconds>();

  constructor(options: SyncOrchestratorOptions) {
    super();
    this.config = options.config;
    this.controlApp = options.controlApp;
    this.playback = options.playback;
    this.fieldCache = options.fieldCache;
    this.logger = options.logger?.child({ module: 'sync' }) ?? null;
    this.commandLog = options.commandLog ?? null;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  override on<K extends keyof SyncOrchestratorEvents>(
    event: K,
    listener: SyncOrchestratorEvents[K]
  ): this {
    return super.on(event, listener);
  }

  override off<K extends keyof SyncOrchestratorEvents>(
    event: K,
    listener: SyncOrchestratorEvents[K]
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof SyncOrchestratorEvents>(
    event: K,
    ...args: Parameters<SyncOrchestratorEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  // ---------------------------------------------------------------------------
  // Duration Sync
  // ---------------------------------------------------------------------------

  /**
   * Fetch one DDR's duration and write it to its minutes/seconds fields.
   */
  async syncOne(slot: number): Promise<SlotSyncResult> {
    return this.attempt(slot, 'manual', false);
  }

  /**
   * Sync one slot only if its value differs from the last applied one.
   *
   * @returns The applied result, or null when unchanged
   */
  async syncIfChanged(slot: number, source: SyncSource = 'auto'): Promise<SlotSyncResult | null> {
    return this.attempt(slot, source, true);
  }

  /**
   * Sync every configured slot independently.
   */
  async syncAll(): Promise<SyncAllResult> {
    const config = this.config.get();
    const results: Record<string, SlotSyncResult> = {};
    const errors: SlotError[] = [];

    for (const slot of configuredSlots(config)) {
      try {
        results[`ddr${slot}`] = await this.syncOne(slot);
      } catch (error) {
        errors.push(toSlotError(slot, error));
      }
    }

    return { ok: errors.length === 0, results, errors };
  }

  // ---------------------------------------------------------------------------
  // Timer Commands
  // ---------------------------------------------------------------------------

  async sendTimerCommand(slot: number, command: TimerCommand): Promise<TimerCommandResult> {
    const config = this.config.get();
    const token = requireToken(config);
    const { timer } = requireSlotFields(config, slot);
    if (!timer) {
      throw new NotConfiguredError(`DDR ${slot} missing 'timer' field configuration`);
    }

    await this.patchFields(token, { [timer]: { command } });
    this.commandLog?.record('Timer', `DDR ${slot} ${command}`);
    this.logger?.info({ slot, command }, 'Timer command sent');

    return { ok: true, slot, command };
  }

  /**
   * Pause, wait briefly, then reset. Leaves the timer stopped.
   * Not atomic: a failed reset leaves the timer paused.
   */
  async restart(slot: number): Promise<RestartResult> {
    await this.sendTimerCommand(slot, 'pause');
    await this.sleep(this.config.get().timerSync.restartDelayMs);
    await this.sendTimerCommand(slot, 'reset');
    return { ok: true, slot, action: 'restart' };
  }

  async restartAll(): Promise<RestartAllResult> {
    const results: RestartResult[] = [];
    const errors: SlotError[] = [];

    for (const slot of configuredSlots(this.config.get())) {
      try {
        results.push(await this.restart(slot));
      } catch (error) {
        errors.push(toSlotError(slot, error));
      }
    }

    return { ok: errors.length === 0, results, errors };
  }

  // ---------------------------------------------------------------------------
  // Control Patch
  // ---------------------------------------------------------------------------

  /**
   * Write field values, grouped by owning composition, in one request.
   *
   * @throws FieldNotResolvedError before anything is sent if any field
   *   has no owner in the control app model
   */
  async patchFields(
    token: string,
    values: Readonly<Record<string, JsonValue>>,
    onPhase?: (phase: 'resolving-fields' | 'patching') => void
  ): Promise<ControlPatchResponse> {
    const fieldIds = Object.keys(values);

    onPhase?.('resolving-fields');
    const owners = await this.fieldCache.resolveFields(token, fieldIds);
    const missing = fieldIds.filter((id) => !owners.has(id));
    if (missing.length > 0) {
      throw new FieldNotResolvedError(missing);
    }

    const grouped = new Map<string, Record<string, JsonValue>>();
    for (const [fieldId, value] of Object.entries(values)) {
      const owner = owners.get(fieldId);
      if (owner === undefined) {
        continue;
      }
      const payload = grouped.get(owner) ?? {};
      payload[fieldId] = value;
      grouped.set(owner, payload);
    }

    const items: ControlItem[] = [...grouped].map(([subCompositionId, payload]) => ({
      subCompositionId,
      payload,
    }));

    onPhase?.('patching');
    const response = await this.controlApp.patchControl(token, items);
    this.commandLog?.record('Control PATCH', `items=${items.length} -> ${response.status}`);
    return response;
  }

  // ---------------------------------------------------------------------------
  // SyncState
  // ---------------------------------------------------------------------------

  lastApplied(slot: number): MinutesSeconds | undefined {
    return this.syncState.get(slot);
  }

  /**
   * Snapshot of SyncState keyed by slot number.
   */
  cachedValues(): Record<string, MinutesSeconds> {
    const values: Record<string, MinutesSeconds> = {};
    for (const [slot, value] of this.syncState) {
      values[String(slot)] = { ...value };
    }
    return values;
  }

  clearState(): void {
    this.syncState.clear();
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private attempt(slot: number, source: SyncSource, onlyIfChanged: false): Promise<SlotSyncResult>;
  private attempt(
    slot: number,
    source: SyncSource,
    onlyIfChanged: boolean
  ): Promise<SlotSyncResult | null>;
  private async attempt(
    slot: number,
    source: SyncSource,
    onlyIfChanged: boolean
  ): Promise<SlotSyncResult | null> {
    const phase = (next: SyncPhase, error?: string): void => {
      this.emit('attempt', { slot, phase: next, source, ...(error !== undefined && { error }) });
    };

    phase('idle');
    try {
      const config = this.config.get();
      const token = requireToken(config);
      const fields = requireDurationFields(config, slot);
      const connection = connectionFromConfig(config.tricaster);
      const roundMode = config.timerSync.roundMode;

      phase('fetching-duration');
      const duration = await this.playback.readSlotDuration(connection, slot);
      const split = splitDuration(duration.seconds, duration.framerate, roundMode === 'frames');

      const previous = this.syncState.get(slot);
      if (onlyIfChanged && previous && sameDuration(previous, split)) {
        phase('idle');
        return null;
      }

      await this.patchFields(
        token,
        { [fields.min]: split.minutes, [fields.sec]: split.seconds },
        phase
      );

      this.syncState.set(slot, split);

      const result: SlotSyncResult = {
        ok: true,
        slot,
        durationSeconds: duration.seconds,
        minutes: split.minutes,
        seconds: split.seconds,
        framerate: duration.framerate,
        roundMode,
      };

      phase('applied');
      this.commandLog?.record('Sync', `DDR ${slot} => ${formatMinutesSeconds(split)}`);
      this.logger?.info(
        { slot, source, minutes: split.minutes, seconds: split.seconds, framerate: duration.framerate },
        'DDR duration synced'
      );
      this.emit('synced', { result, source });

      return result;
    } catch (error) {
      phase('failed', errorMessage(error));
      throw error;
    }
  }
}
