/**
 * Subcomposition control.
 *
 * Animate in/out, field writes and time controls against registry entries,
 * plus raw control passthrough and the command catalogue served to
 * operators setting up button panels.
 */

import type { Logger } from 'pino';
import type { ConfigSource } from '../config/store.js';
import { InvalidArgumentError, NotConfiguredError, NotFoundError } from '../errors.js';
import type { CommandLog } from '../events/command-log.js';
import type { Registry, RegistryEntry } from '../registry/registry.js';
import type {
  AnimationState,
  ControlAppTransport,
  ControlItem,
  ControlPatchResponse,
  FieldMeta,
  JsonValue,
  TimeControlValue,
} from '../../adapters/singular/types.js';
import { coerceValue } from './coerce.js';

// ============================================================================
// Types
// ============================================================================

export interface ControlResult {
  status: number;
  id: string;
  app: string;
  slug: string;
  response: string;
}

export interface SetFieldOptions {
  app?: string;
  asString?: boolean;
}

export interface SetFieldResult extends ControlResult {
  sent: ControlItem[];
}

export interface TimeControlOptions {
  field: string;
  app?: string;
  /** true starts the clock, false stops it */
  run?: boolean;
  value?: number;
  /** Epoch milliseconds; defaults to now */
  utc?: number;
  /** Countdown length, written to the "Countdown Seconds" field */
  seconds?: number;
}

export interface TimeControlResult extends ControlResult {
  sent: Record<string, JsonValue>;
}

export interface RawControlResult {
  status: number;
  response: string;
}

export interface FieldCommands {
  setUrl: string;
  timecontrolStartUrl?: string;
  timecontrolStopUrl?: string;
  startWithCountdownUrl?: string;
}

export interface CommandCatalogueEntry {
  id: string;
  name: string;
  app: string;
  inUrl: string;
  outUrl: string;
  fields: Record<string, FieldCommands>;
}

export interface ControlServiceOptions {
  registry: Registry;
  config: ConfigSource;
  controlApp: ControlAppTransport;
  commandLog?: CommandLog;
  logger?: Logger;
  now?: () => number;
}

export const COUNTDOWN_SECONDS_FIELD = 'Countdown Seconds';

// ============================================================================
// Payload Builders
// ============================================================================

/**
 * Payload for a time control write, including the optional countdown length.
 */
export function buildTimeControlPayload(
  field: string,
  run: boolean,
  value: number,
  utc: number,
  seconds?: number
): Record<string, JsonValue> {
  const payload: Record<string, JsonValue> = {};
  if (seconds !== undefined) {
    payload[COUNTDOWN_SECONDS_FIELD] = String(seconds);
  }
  const clock: TimeControlValue = { UTC: utc, isRunning: run, value: Math.trunc(value) };
  payload[field] = clock;
  return payload;
}

/**
 * Example URLs for driving one field.
 */
export function fieldCommands(base: string, path: string, field: FieldMeta): FieldCommands {
  const id = encodeURIComponent(field.id);
  const commands: FieldCommands = { setUrl: `${base}/${path}/set?field=${id}&value=VALUE` };

  if (field.type.toLowerCase() === 'timecontrol') {
    commands.timecontrolStartUrl = `${base}/${path}/timecontrol?field=${id}&run=true&value=0`;
    commands.timecontrolStopUrl = `${base}/${path}/timecontrol?field=${id}&run=false&value=0`;
    commands.startWithCountdownUrl = `${base}/${path}/timecontrol?field=${id}&run=true&value=0&seconds=10`;
  }

  return commands;
}

// ============================================================================
// Control Service
// ============================================================================

export class ControlService {
  private readonly registry: Registry;
  private readonly config: ConfigSource;
  private readonly controlApp: ControlAppTransport;
  private readonly commandLog: CommandLog | null;
  private readonly logger: Logger | null;
  private readonly now: () => number;

  constructor(options: ControlServiceOptions) {
    this.registry = options.registry;
    this.config = options.config;
    this.controlApp = options.controlApp;
    this.commandLog = options.commandLog ?? null;
    this.logger = options.logger?.child({ module: 'control' }) ?? null;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Animate a subcomposition in or out.
   */
  async animate(nameOrId: string, state: AnimationState, app?: string): Promise<ControlResult> {
    const entry = this.registry.lookup(nameOrId, app);
    const response = await this.send(entry.token, [{ subCompositionId: entry.id, state }]);

    this.commandLog?.record(state === 'In' ? 'IN' : 'OUT', `${entry.app}/${entry.slug} (${entry.id})`);
    this.logger?.info({ app: entry.app, slug: entry.slug, state }, 'Animation triggered');

    return this.result(entry, response);
  }

  /**
   * Write one field, coercing the value to the field's type.
   */
  async setField(
    nameOrId: string,
    field: string,
    value: string,
    options: SetFieldOptions = {}
  ): Promise<SetFieldResult> {
    const entry = this.registry.lookup(nameOrId, options.app);
    const meta = requireField(entry, field);

    const sent: ControlItem[] = [
      { subCompositionId: entry.id, payload: { [field]: coerceValue(meta, value, options.asString) } },
    ];
    const response = await this.send(entry.token, sent);

    this.commandLog?.record('SET', `${entry.app}/${entry.slug} (${entry.id}) field=${field} value=${value}`);
    this.logger?.debug({ app: entry.app, slug: entry.slug, field }, 'Field set');

    return { ...this.result(entry, response), sent };
  }

  /**
   * Start or stop a "timecontrol" field.
   */
  async timeControl(nameOrId: string, options: TimeControlOptions): Promise<TimeControlResult> {
    const entry = this.registry.lookup(nameOrId, options.app);
    const meta = requireField(entry, options.field);
    if (meta.type.toLowerCase() !== 'timecontrol') {
      throw new InvalidArgumentError(`Field '${options.field}' is not a timecontrol`);
    }

    const run = options.run ?? true;
    const sent = buildTimeControlPayload(
      options.field,
      run,
      options.value ?? 0,
      options.utc ?? this.now(),
      options.seconds
    );
    const response = await this.send(entry.token, [{ subCompositionId: entry.id, payload: sent }]);

    this.commandLog?.record(
      'TIMECONTROL',
      `${entry.app}/${entry.slug} (${entry.id}) field=${options.field} run=${run} seconds=${options.seconds ?? 'none'}`
    );

    return { ...this.result(entry, response), sent };
  }

  /**
   * Send control items as given, to the named app or else the first configured one.
   */
  async sendRaw(items: ControlItem[], appName?: string): Promise<RawControlResult> {
    const apps = this.config.get().singular.apps;
    const token =
      (appName !== undefined ? apps[appName] : undefined) ?? Object.values(apps)[0];
    if (!token) {
      throw new NotConfiguredError('No control app tokens configured', 'singular');
    }

    const response = await this.send(token, items);
    return { status: response.status, response: response.body };
  }

  // ---------------------------------------------------------------------------
  // Catalogue
  // ---------------------------------------------------------------------------

  /**
   * Every registry entry with example command URLs, keyed "app/slug".
   */
  catalogue(base: string): Record<string, CommandCatalogueEntry> {
    const catalogue: Record<string, CommandCatalogueEntry> = {};
    for (const entry of this.registry.list()) {
      catalogue[`${entry.app}/${entry.slug}`] = describeEntry(base, entry);
    }
    return catalogue;
  }

  commandsFor(base: string, app: string, nameOrId: string): CommandCatalogueEntry {
    return describeEntry(base, this.registry.lookup(nameOrId, app));
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async send(token: string, items: ControlItem[]): Promise<ControlPatchResponse> {
    const response = await this.controlApp.patchControl(token, items);
    this.commandLog?.record('Control PATCH', `items=${items.length} -> ${response.status}`);
    return response;
  }

  private result(entry: RegistryEntry, response: ControlPatchResponse): ControlResult {
    return { status: response.status, id: entry.id, app: entry.app, slug: entry.slug, response: response.body };
  }
}

function requireField(entry: RegistryEntry, field: string): FieldMeta {
  const meta = entry.fields.get(field);
  if (!meta) {
    throw new NotFoundError(`Field not found on ${entry.app}/${entry.slug}: ${field}`);
  }
  return meta;
}

function describeEntry(base: string, entry: RegistryEntry): CommandCatalogueEntry {
  const path = `${entry.app}/${entry.slug}`;
  const fields: Record<string, FieldCommands> = {};
  for (const field of entry.fields.values()) {
    fields[field.id] = fieldCommands(base, path, field);
  }
  return {
    id: entry.id,
    name: entry.name,
    app: entry.app,
    inUrl: `${base}/${path}/in`,
    outUrl: `${base}/${path}/out`,
    fields,
  };
}
