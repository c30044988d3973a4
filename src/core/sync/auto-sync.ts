/**
 * Background auto-sync loop.
 *
 * Polls every mapped DDR at a fixed interval and pushes a duration only when
 * it differs from the last applied value. Failures are recorded, never
 * thrown. Starting is idempotent; a start issued while a previous loop is
 * still stopping waits for that loop to finish, so two loops never run at
 * the same time.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { clampInterval } from '../config/schema.js';
import type { ConfigSource } from '../config/store.js';
import { errorMessage } from '../errors.js';
import type { MinutesSeconds } from '../duration/duration.js';
import { durationSlots, type SyncOrchestrator } from './orchestrator.js';

// ============================================================================
// Types
// ============================================================================

export interface AutoSyncStatus {
  enabled: boolean;
  running: boolean;
  intervalSeconds: number;
  lastSync: string | null;
  lastError: string | null;
  cachedValues: Record<string, MinutesSeconds>;
}

export interface PollResult {
  skipped: boolean;
  applied: number[];
  errors: string[];
}

export interface AutoSyncEvents {
  status: (status: AutoSyncStatus) => void;
}

export interface AutoSyncLoopOptions {
  config: ConfigSource;
  orchestrator: SyncOrchestrator;
  logger?: Logger;
  now?: () => Date;
}

interface LoopRun {
  stopped: boolean;
  wake: (() => void) | null;
  done: Promise<void>;
}

// ============================================================================
// Auto-Sync Loop
// ============================================================================

export class AutoSyncLoop extends EventEmitter {
  private readonly config: ConfigSource;
  private readonly orchestrator: SyncOrchestrator;
  private readonly logger: Logger | null;
  private readonly now: () => Date;

  private run: LoopRun | null = null;
  private active = false;
  private lastSync: string | null = null;
  private lastError: string | null = null;

  constructor(options: AutoSyncLoopOptions) {
    super();
    this.config = options.config;
    this.orchestrator = options.orchestrator;
    this.logger = options.logger?.child({ module: 'auto-sync' }) ?? null;
    this.now = options.now ?? (() => new Date());
  }

  override on<K extends keyof AutoSyncEvents>(event: K, listener: AutoSyncEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof AutoSyncEvents>(
    event: K,
    ...args: Parameters<AutoSyncEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Start polling.
   *
   * @returns false if a loop is already running
   */
  start(): boolean {
    if (this.run && !this.run.stopped) {
      return false;
    }

    const previous = this.run;
    const run: LoopRun = { stopped: false, wake: null, done: Promise.resolve() };
    this.run = run;
    run.done = (async () => {
      if (previous) {
        await previous.done;
      }
      await this.loop(run);
    })();

    return true;
  }

  /**
   * Stop polling. Resolves once the current iteration has finished.
   */
  async stop(): Promise<void> {
    const run = this.run;
    if (!run) {
      return;
    }
    run.stopped = true;
    run.wake?.();
    await run.done;
  }

  get running(): boolean {
    return this.active;
  }

  status(): AutoSyncStatus {
    const { autoSync } = this.config.get().timerSync;
    return {
      enabled: autoSync.enabled,
      running: this.active,
      intervalSeconds: clampInterval(autoSync.intervalSeconds),
      lastSync: this.lastSync,
      lastError: this.lastError,
      cachedValues: this.orchestrator.cachedValues(),
    };
  }

  // ---------------------------------------------------------------------------
  // Polling
  // ---------------------------------------------------------------------------

  /**
   * One pass over every mapped DDR. Never throws.
   * Skipped entirely while the device host or control app token is missing.
   */
  async pollOnce(): Promise<PollResult> {
    const config = this.config.get();
    if (!config.tricaster.enabled || !config.tricaster.host || !config.timerSync.token) {
      return { skipped: true, applied: [], errors: [] };
    }

    const applied: number[] = [];
    const errors: string[] = [];

    for (const slot of durationSlots(config)) {
      try {
        const result = await this.orchestrator.syncIfChanged(slot, 'auto');
        if (result) {
          applied.push(slot);
          this.lastSync = this.now().toISOString();
        }
      } catch (error) {
        const message = `DDR ${slot}: ${errorMessage(error)}`;
        errors.push(message);
        this.logger?.debug({ slot, error: errorMessage(error) }, 'Auto-sync slot failed');
      }
    }

    this.lastError = errors.length > 0 ? errors.join('; ') : null;
    if (applied.length > 0 || errors.length > 0) {
      this.emit('status', this.status());
    }

    return { skipped: false, applied, errors };
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async loop(run: LoopRun): Promise<void> {
    this.active = true;
    this.lastError = null;
    this.logger?.info(
      { intervalSeconds: clampInterval(this.config.get().timerSync.autoSync.intervalSeconds) },
      'Auto-sync started'
    );
    this.emit('status', this.status());

    try {
      while (!run.stopped) {
        const { autoSync } = this.config.get().timerSync;
        if (!autoSync.enabled) {
          break;
        }

        await this.pollOnce();

        if (run.stopped) {
          break;
        }
        await this.wait(run, clampInterval(this.config.get().timerSync.autoSync.intervalSeconds) * 1000);
      }
    } catch (error) {
      this.lastError = errorMessage(error);
      this.logger?.warn({ error: this.lastError }, 'Auto-sync loop failed');
    } finally {
      run.stopped = true;
      this.active = false;
      this.logger?.info('Auto-sync stopped');
      this.emit('status', this.status());
    }
  }

  private wait(run: LoopRun, ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        run.wake = null;
        resolve();
      }, ms);
      run.wake = () => {
        clearTimeout(timer);
        run.wake = null;
        resolve();
      };
    });
  }
}
