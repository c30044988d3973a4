/**
 * API Route Handlers for DDR Timer Sync.
 * Registry, control, timer sync, auto-sync, TriCaster and health endpoints.
 * Failures are rendered with the error taxonomy's status and body.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { rebuildRegistry, type AppContext } from '../../context.js';
import { clampInterval, validateTimerSync } from '../../core/config/schema.js';
import {
  InvalidArgumentError,
  errorMessage,
  httpStatusOf,
  toErrorBody,
} from '../../core/errors.js';
import { parseFlag } from '../../core/control/coerce.js';
import { connectionFromConfig } from '../../adapters/tricaster/client.js';
import type { JsonValue, TimerCommand } from '../../adapters/singular/types.js';

// ============================================================================
// Request Schemas
// ============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

const ControlItemSchema = z.object({
  subCompositionId: z.string().min(1),
  state: z.enum(['In', 'Out']).optional(),
  payload: z.record(z.string(), JsonValueSchema).optional(),
});

const ControlItemsSchema = z.array(ControlItemSchema);

const TimerFieldSetInput = z.object({
  min: z.string().optional(),
  sec: z.string().optional(),
  timer: z.string().optional(),
});

const TimerSyncInput = z.object({
  token: z.string().optional(),
  roundMode: z.enum(['frames', 'none']).default('frames'),
  fields: z.record(z.string(), TimerFieldSetInput).default({}),
});

const AutoSyncInput = z.object({
  enabled: z.boolean(),
  interval: z.number().optional(),
});

const AddAppInput = z.object({
  name: z.string().min(1),
  token: z.string().min(1),
});

const TriCasterInput = z.object({
  host: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
});

const ModuleToggleInput = z.object({
  enabled: z.boolean(),
});

const TIMER_COMMANDS: readonly TimerCommand[] = ['start', 'pause', 'reset'];

const SHORTCUT_ALIASES: Readonly<Record<string, string>> = {
  'record/start': 'record_start',
  'record/stop': 'record_stop',
  'record/toggle': 'record_toggle',
  'streaming/start': 'streaming_start',
  'streaming/stop': 'streaming_stop',
  'streaming/toggle': 'streaming_toggle',
  'main/auto': 'main_auto',
  'main/take': 'main_take',
};

// ============================================================================
// Helpers
// ============================================================================

type Handler = (req: Request, res: Response) => unknown;

/**
 * Run a handler and send its result as JSON; failures go through the
 * error taxonomy.
 */
function route(handler: Handler) {
  return (req: Request, res: Response): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .then((body) => {
        if (!res.headersSent) {
          res.json(body);
        }
      })
      .catch((error: unknown) => {
        res.status(httpStatusOf(error)).json(toErrorBody(error));
      });
  };
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

function queryNumber(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Query parameter '${name}' must be a number`);
  }
  return parsed;
}

function requireQuery(req: Request, name: string): string {
  const value = queryString(req, name);
  if (value === undefined) {
    throw new InvalidArgumentError(`Missing query parameter '${name}'`);
  }
  return value;
}

function parseSlot(text: string | undefined): number {
  const slot = Number(text);
  if (!Number.isInteger(slot) || slot < 1) {
    throw new InvalidArgumentError(`Invalid DDR number: ${text ?? ''}`);
  }
  return slot;
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid request body: ${detail}`);
  }
  return result.data;
}

function baseUrl(req: Request): string {
  const forwardedHost = req.headers['x-forwarded-host'];
  const forwardedProto = req.headers['x-forwarded-proto'];
  const host = (typeof forwardedHost === 'string' && forwardedHost) || req.get('host') || 'localhost';
  const proto = (typeof forwardedProto === 'string' && forwardedProto) || req.protocol;
  return `${proto}://${host}/api/control`;
}

/**
 * Register a handler for both GET and POST, so operators can trigger
 * actions from a browser or a button panel.
 */
function action(router: Router, path: string, handler: Handler): void {
  router.get(path, route(handler));
  router.post(path, route(handler));
}

// ============================================================================
// Router Factory
// ============================================================================

/**
 * Create API router with all endpoints.
 */
export function createApiRouter(context: AppContext): Router {
  const router = Router();
  const { store, registry, control, orchestrator, autoSync, tricaster, commandLog, singular } = context;

  // --------------------------------------------------------------------------
  // Health & Events
  // --------------------------------------------------------------------------

  router.get('/health', route(() => ({
    status: 'ok',
    uptime: Math.floor((Date.now() - context.startTime.getTime()) / 1000),
    registry: registry.size,
    autoSync: autoSync.running,
  })));

  router.get('/events', route(() => ({ events: commandLog.recent(100) })));

  // --------------------------------------------------------------------------
  // Registry
  // --------------------------------------------------------------------------

  router.get('/singular/apps', route(() => ({ apps: Object.keys(store.get().singular.apps) })));

  router.get('/singular/list', route(() => {
    const result: Record<string, { id: string; name: string; app: string; fields: string[] }> = {};
    for (const entry of registry.list()) {
      result[`${entry.app}/${entry.slug}`] = {
        id: entry.id,
        name: entry.name,
        app: entry.app,
        fields: [...entry.fields.keys()],
      };
    }
    return result;
  }));

  router.post('/singular/refresh', route(async () => {
    await rebuildRegistry(context);
    return { ok: true, count: registry.size, apps: registry.appNames().length };
  }));

  router.get('/singular/fields/:app', route(async (req) => {
    const app = req.params['app'] ?? '';
    const token = store.get().singular.apps[app];
    if (!registry.hasApp(app) && token !== undefined) {
      await registry.rebuildApp(app, token);
    }
    const fields = registry.fields(app);
    return { fields, count: fields.length };
  }));

  router.get('/singular/ping', route(async (req) => {
    const apps = store.get().singular.apps;
    const only = queryString(req, 'app');
    const names = only !== undefined && only in apps ? [only] : Object.keys(apps);
    if (names.length === 0) {
      throw new InvalidArgumentError('No control app tokens configured');
    }

    const results: Record<string, { ok: boolean; subs?: number; error?: string }> = {};
    for (const name of names) {
      try {
        await singular.fetchControlModel(apps[name] ?? '');
        results[name] = { ok: true, subs: registry.list().filter((e) => e.app === name).length };
      } catch (error) {
        results[name] = { ok: false, error: errorMessage(error) };
      }
    }

    const ok = Object.values(results).every((r) => r.ok);
    return { ok, message: ok ? 'Connected to Singular' : 'Some connections failed', apps: results };
  }));

  router.get('/singular/commands', route((req) => ({
    note: 'Control endpoints accept GET for testing; POST is recommended in automation.',
    catalogue: control.catalogue(baseUrl(req)),
  })));

  router.post('/singular/control', route(async (req) => {
    const items = parseBody(ControlItemsSchema, req.body);
    return control.sendRaw(items, queryString(req, 'app'));
  }));

  // --------------------------------------------------------------------------
  // Subcomposition Control
  // --------------------------------------------------------------------------

  router.get('/control/:app/:key/help', route((req) => ({
    commands: control.commandsFor(baseUrl(req), req.params['app'] ?? '', req.params['key'] ?? ''),
  })));

  action(router, '/control/:app/:key/in', (req) =>
    control.animate(req.params['key'] ?? '', 'In', req.params['app'])
  );

  action(router, '/control/:app/:key/out', (req) =>
    control.animate(req.params['key'] ?? '', 'Out', req.params['app'])
  );

  action(router, '/control/:app/:key/set', (req) =>
    control.setField(req.params['key'] ?? '', requireQuery(req, 'field'), requireQuery(req, 'value'), {
      ...(req.params['app'] !== undefined && { app: req.params['app'] }),
      asString: parseFlag(queryString(req, 'asString'), false),
    })
  );

  action(router, '/control/:app/:key/timecontrol', (req) => {
    const value = queryNumber(req, 'value');
    const utc = queryNumber(req, 'utc');
    const seconds = queryNumber(req, 'seconds');
    return control.timeControl(req.params['key'] ?? '', {
      field: requireQuery(req, 'field'),
      run: parseFlag(queryString(req, 'run'), true),
      ...(req.params['app'] !== undefined && { app: req.params['app'] }),
      ...(value !== undefined && { value }),
      ...(utc !== undefined && { utc }),
      ...(seconds !== undefined && { seconds: Math.trunc(seconds) }),
    });
  });

  // --------------------------------------------------------------------------
  // Timer Sync Configuration
  // --------------------------------------------------------------------------

  router.get('/timer-sync/config', route(() => {
    const { token, roundMode, fields } = store.get().timerSync;
    return { token: token ?? null, roundMode, fields };
  }));

  router.post('/timer-sync/config', route(async (req) => {
    const input = parseBody(TimerSyncInput, req.body);
    const next = await store.update((draft) => {
      draft.timerSync.token = input.token || undefined;
      draft.timerSync.roundMode = input.roundMode;
      draft.timerSync.fields = {};
      for (const [slot, fields] of Object.entries(input.fields)) {
        draft.timerSync.fields[parseSlot(slot)] = {
          ...(fields.min ? { min: fields.min } : {}),
          ...(fields.sec ? { sec: fields.sec } : {}),
          ...(fields.timer ? { timer: fields.timer } : {}),
        };
      }
    });
    return { ok: true, message: 'Timer sync configuration saved', warnings: validateTimerSync(next) };
  }));

  // --------------------------------------------------------------------------
  // Sync & Timer Commands
  // --------------------------------------------------------------------------

  action(router, '/sync/all', () => orchestrator.syncAll());

  action(router, '/sync/:slot', (req) => orchestrator.syncOne(parseSlot(req.params['slot'])));

  action(router, '/timer/all/restart', () => orchestrator.restartAll());

  action(router, '/timer/:slot/:command', (req) => {
    const slot = parseSlot(req.params['slot']);
    const command = req.params['command'] ?? '';
    if (command === 'restart') {
      return orchestrator.restart(slot);
    }
    const timerCommand = TIMER_COMMANDS.find((candidate) => candidate === command);
    if (!timerCommand) {
      throw new InvalidArgumentError(`Unknown timer command: ${command}`);
    }
    return orchestrator.sendTimerCommand(slot, timerCommand);
  });

  // --------------------------------------------------------------------------
  // Auto-Sync
  // --------------------------------------------------------------------------

  router.get('/auto-sync/status', route(() => autoSync.status()));

  router.post('/auto-sync', route(async (req) => {
    const input = parseBody(AutoSyncInput, req.body);
    const wasRunning = autoSync.running;

    // The store's change event starts or stops the loop.
    await store.update((draft) => {
      draft.timerSync.autoSync.enabled = input.enabled;
      if (input.interval !== undefined) {
        draft.timerSync.autoSync.intervalSeconds = clampInterval(input.interval);
      }
    });

    const interval = store.get().timerSync.autoSync.intervalSeconds;
    if (input.enabled && !wasRunning) {
      return { ok: true, message: 'Auto-sync started', interval };
    }
    if (!input.enabled && wasRunning) {
      return { ok: true, message: 'Auto-sync stopped' };
    }
    return { ok: true, message: `Auto-sync ${input.enabled ? 'enabled' : 'disabled'}`, interval };
  }));

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  router.post('/config/singular/apps', route(async (req) => {
    const input = parseBody(AddAppInput, req.body);
    await store.update((draft) => {
      draft.singular.apps[input.name] = input.token;
    });
    return { ok: true, apps: Object.keys(store.get().singular.apps) };
  }));

  router.delete('/config/singular/apps/:name', route(async (req) => {
    const name = req.params['name'] ?? '';
    await store.update((draft) => {
      delete draft.singular.apps[name];
    });
    return { ok: true, apps: Object.keys(store.get().singular.apps) };
  }));

  router.post('/config/tricaster', route(async (req) => {
    const input = parseBody(TriCasterInput, req.body);
    await store.update((draft) => {
      if (input.host !== undefined) {
        draft.tricaster.host = input.host || undefined;
      }
      if (input.user !== undefined) {
        draft.tricaster.user = input.user || 'admin';
      }
      if (input.password !== undefined) {
        draft.tricaster.password = input.password || undefined;
      }
    });
    return { ok: true, host: store.get().tricaster.host ?? null };
  }));

  router.post('/config/tricaster/module', route(async (req) => {
    const input = parseBody(ModuleToggleInput, req.body);
    await store.update((draft) => {
      draft.tricaster.enabled = input.enabled;
    });
    return { ok: true, enabled: input.enabled };
  }));

  // --------------------------------------------------------------------------
  // TriCaster
  // --------------------------------------------------------------------------

  const connection = () => connectionFromConfig(store.get().tricaster);

  router.get('/tricaster/test', route(() => {
    const { tricaster: settings } = store.get();
    if (!settings.host) {
      return { ok: false, error: 'No TriCaster host configured' };
    }
    return tricaster.testConnection(connection());
  }));

  router.get('/tricaster/ddr', route(async () => ({
    ok: true,
    ddrs: await tricaster.readSlotStatuses(connection()),
  })));

  router.get('/tricaster/tally', route(async () => ({
    ok: true,
    tally: await tricaster.readTally(connection()),
  })));

  router.get('/tricaster/dictionary/:key', route(async (req) => ({
    rawXml: await tricaster.readDictionaryText(connection(), req.params['key'] ?? ''),
  })));

  const runShortcut = async (name: string, params: Record<string, string> = {}) => {
    await tricaster.shortcut(connection(), name, params);
    commandLog.record('TriCaster', `shortcut ${name}`);
    return { ok: true, command: name, params };
  };

  action(router, '/tricaster/shortcut/:name', (req) => {
    const params: Record<string, string> = {};
    const value = queryString(req, 'value');
    const index = queryNumber(req, 'index');
    if (value !== undefined) {
      params['value'] = value;
    }
    if (index !== undefined) {
      params['index'] = String(Math.trunc(index));
    }
    return runShortcut(req.params['name'] ?? '', params);
  });

  for (const [path, name] of Object.entries(SHORTCUT_ALIASES)) {
    router.get(`/tricaster/${path}`, route(() => runShortcut(name)));
  }

  router.get('/tricaster/ddr/:slot/:action(play|stop)', route((req) =>
    runShortcut(`ddr${parseSlot(req.params['slot'])}_${req.params['action'] ?? 'play'}`)
  ));

  router.get('/tricaster/macro/:name', route((req) =>
    runShortcut('play_macro_byname', { value: req.params['name'] ?? '' })
  ));

  return router;
}
