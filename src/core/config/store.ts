/**
 * Configuration store.
 *
 * Holds the current validated configuration, applies edits made through the
 * API and persists them back to the YAML file. Consumers call `get()` on every
 * operation instead of keeping their own copy.
 */

import { EventEmitter } from 'node:events';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { parseConfig, type Config } from './schema.js';

// ============================================================================
// Types
// ============================================================================

export type ConfigSection = keyof Config;

const SECTIONS: readonly ConfigSection[] = ['singular', 'tricaster', 'timerSync', 'web', 'logging'];

export interface ConfigChangeEvent {
  config: Config;
  changed: ConfigSection[];
}

export interface ConfigStoreEvents {
  change: (event: ConfigChangeEvent) => void;
}

/**
 * Anything that can hand out the current configuration.
 */
export interface ConfigSource {
  get(): Config;
}

// ============================================================================
// Environment Overrides
// ============================================================================

/**
 * Apply secrets and hosts from the environment on top of raw file content.
 */
export function applyEnvironment(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  const base: Record<string, unknown> =
    typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? { ...raw } : {};

  const section = (key: string): Record<string, unknown> => {
    const value = base[key];
    const copy: Record<string, unknown> =
      typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
    base[key] = copy;
    return copy;
  };

  if (env['SINGULAR_TOKEN']) {
    const singular = section('singular');
    const apps = singular['apps'];
    const hasApps = typeof apps === 'object' && apps !== null && Object.keys(apps).length > 0;
    if (!hasApps) {
      singular['apps'] = { Default: env['SINGULAR_TOKEN'] };
    }
  }

  if (env['TRICASTER_HOST']) {
    section('tricaster')['host'] = env['TRICASTER_HOST'];
  }
  if (env['TRICASTER_USER']) {
    section('tricaster')['user'] = env['TRICASTER_USER'];
  }
  if (env['TRICASTER_PASS']) {
    section('tricaster')['password'] = env['TRICASTER_PASS'];
  }
  if (env['TRICASTER_SINGULAR_TOKEN']) {
    section('timerSync')['token'] = env['TRICASTER_SINGULAR_TOKEN'];
  }

  return base;
}

// ============================================================================
// Config Store
// ============================================================================

export class ConfigStore extends EventEmitter implements ConfigSource {
  private current: Config;
  private readonly filePath: string | null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(initial: Config, filePath: string | null = null) {
    super();
    this.current = initial;
    this.filePath = filePath === null ? null : resolve(filePath);
  }

  /**
   * Load configuration from a YAML file.
   * A missing file yields defaults; it is created on the first save.
   */
  static async load(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<ConfigStore> {
    const absolutePath = resolve(filePath);
    let raw: unknown = {};

    if (existsSync(absolutePath)) {
      const content = await readFile(absolutePath, 'utf-8');
      raw = parseYaml(content) ?? {};
    }

    return new ConfigStore(parseConfig(applyEnvironment(raw, env)), absolutePath);
  }

  override on<K extends keyof ConfigStoreEvents>(event: K, listener: ConfigStoreEvents[K]): this {
    return super.on(event, listener);
  }

  override off<K extends keyof ConfigStoreEvents>(event: K, listener: ConfigStoreEvents[K]): this {
    return super.off(event, listener);
  }

  override emit<K extends keyof ConfigStoreEvents>(
    event: K,
    ...args: Parameters<ConfigStoreEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  get path(): string | null {
    return this.filePath;
  }

  get(): Config {
    return this.current;
  }

  /**
   * Apply an edit, validate the result and persist it.
   * The previous configuration stays in place if validation or the write fails.
   */
  async update(mutate: (draft: Config) => void): Promise<Config> {
    const draft = structuredClone(this.current);
    mutate(draft);
    const next = parseConfig(draft);

    const changed = SECTIONS.filter(
      (section) => JSON.stringify(next[section]) !== JSON.stringify(this.current[section])
    );

    if (changed.length > 0) {
      await this.save(next);
      this.current = next;
      this.emit('change', { config: next, changed } satisfies ConfigChangeEvent);
    }

    return next;
  }

  /**
   * Write the current configuration to disk (temp file, then rename).
   */
  async save(config: Config = this.current): Promise<void> {
    const filePath = this.filePath;
    if (filePath === null) {
      return;
    }

    const snapshot = stringifyYaml(config);

    // Chain writes so concurrent saves land in order. A failed write was
    // already reported to its own caller and must not block later ones.
    this.writeQueue = this.writeQueue.catch(() => undefined).then(async () => {
      await mkdir(dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.tmp`;
      await writeFile(tempPath, snapshot, 'utf-8');
      await rename(tempPath, filePath);
    });

    return this.writeQueue;
  }
}
