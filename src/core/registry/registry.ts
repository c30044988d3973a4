/**
 * Subcomposition registry.
 *
 * Maps human-readable slugs to control app subcompositions, per control app,
 * with a reverse index from subcomposition id back to slug. Each control app
 * has one immutable table holding both directions; a rebuild builds a new
 * table and swaps it in with a single assignment, so a lookup sees either the
 * old or the new table and never a mix.
 */

import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { NotFoundError, errorMessage } from '../errors.js';
import { flatten } from '../../adapters/singular/model.js';
import type { ControlAppTransport, FieldMeta, RemoteNode } from '../../adapters/singular/types.js';

// ============================================================================
// Types
// ============================================================================

export interface RegistryEntry {
  id: string;
  name: string;
  slug: string;
  app: string;
  token: string;
  fields: ReadonlyMap<string, FieldMeta>;
}

interface AppTable {
  readonly token: string;
  readonly bySlug: ReadonlyMap<string, RegistryEntry>;
  readonly byId: ReadonlyMap<string, string>;
  readonly builtAt: string;
  readonly error: string | null;
}

export interface ResolvedKey {
  app: string;
  slug: string;
}

export interface AppRebuildSummary {
  app: string;
  count: number;
  ok: boolean;
  error?: string;
}

export interface RebuildSummary {
  total: number;
  apps: AppRebuildSummary[];
}

export interface FieldCatalogueEntry {
  id: string;
  name: string;
  subcomposition: string;
  type: string;
}

export interface RegistryEvents {
  rebuilt: (summary: RebuildSummary) => void;
}

// ============================================================================
// Slugs
// ============================================================================

/**
 * Lowercase, collapse non-alphanumeric runs to "-", trim dashes.
 */
export function slugify(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'item';
}

/**
 * Build one application's table from flattened nodes.
 * A new node whose slug is already taken by another id gets -2, -3, ...
 */
export function buildTable(
  app: string,
  token: string,
  nodes: readonly RemoteNode[],
  error: string | null = null
): AppTable {
  const bySlug = new Map<string, RegistryEntry>();
  const byId = new Map<string, string>();

  for (const node of nodes) {
    const base = slugify(node.name);
    let slug = base;
    for (let suffix = 2; bySlug.has(slug) && bySlug.get(slug)?.id !== node.id; suffix++) {
      slug = `${base}-${suffix}`;
    }

    bySlug.set(slug, {
      id: node.id,
      name: node.name,
      slug,
      app,
      token,
      fields: node.fields,
    });
    byId.set(node.id, slug);
  }

  return { token, bySlug, byId, builtAt: new Date().toISOString(), error };
}

// ============================================================================
// Registry
// ============================================================================

export class Registry extends EventEmitter {
  private readonly transport: ControlAppTransport;
  private readonly logger: Logger | null;
  private tables = new Map<string, AppTable>();

  constructor(transport: ControlAppTransport, logger?: Logger) {
    super();
    this.transport = transport;
    this.logger = logger?.child({ module: 'registry' }) ?? null;
  }

  override on<K extends keyof RegistryEvents>(event: K, listener: RegistryEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof RegistryEvents>(
    event: K,
    ...args: Parameters<RegistryEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  // ---------------------------------------------------------------------------
  // Rebuild
  // ---------------------------------------------------------------------------

  /**
   * Rebuild every application's table. Applications no longer listed are
   * dropped; a failure for one application does not stop the others.
   */
  async rebuildAll(applications: Readonly<Record<string, string>>): Promise<RebuildSummary> {
    const names = Object.keys(applications);

    for (const existing of [...this.tables.keys()]) {
      if (!(existing in applications)) {
        this.tables.delete(existing);
      }
    }

    const apps = await Promise.all(
      names.map((name) => this.rebuildApp(name, applications[name] ?? ''))
    );

    const summary: RebuildSummary = {
      total: apps.reduce((sum, app) => sum + app.count, 0),
      apps,
    };

    this.logger?.info(
      { apps: apps.length, total: summary.total, failed: apps.filter((a) => !a.ok).length },
      'Registry rebuilt'
    );
    this.emit('rebuilt', summary);

    return summary;
  }

  /**
   * Rebuild one application's table.
   * On fetch failure the application's previous entries are cleared and the
   * failure is recorded.
   */
  async rebuildApp(app: string, token: string): Promise<AppRebuildSummary> {
    try {
      const trees = await this.transport.fetchControlModel(token);
      const table = buildTable(app, token, flatten(trees));
      this.tables.set(app, table);
      this.logger?.debug({ app, count: table.bySlug.size }, 'Control app indexed');
      return { app, count: table.bySlug.size, ok: true };
    } catch (error) {
      const message = errorMessage(error);
      this.tables.set(app, buildTable(app, token, [], message));
      this.logger?.warn({ app, error: message }, 'Failed to fetch control app model');
      return { app, count: 0, ok: false, error: message };
    }
  }

  /**
   * Drop every table.
   */
  clear(): void {
    this.tables = new Map();
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  /**
   * Find a subcomposition by slug or id.
   *
   * With an application hint only that application is searched, by slug and
   * then by id. Without one, every application's slugs are searched before
   * any id.
   *
   * @throws NotFoundError
   */
  resolve(nameOrId: string, appHint?: string): ResolvedKey {
    if (appHint !== undefined) {
      const table = this.tables.get(appHint);
      if (table?.bySlug.has(nameOrId)) {
        return { app: appHint, slug: nameOrId };
      }
      const slug = table?.byId.get(nameOrId);
      if (slug !== undefined) {
        return { app: appHint, slug };
      }
      throw new NotFoundError(`Subcomposition not found: ${nameOrId} in app ${appHint}`);
    }

    for (const [app, table] of this.tables) {
      if (table.bySlug.has(nameOrId)) {
        return { app, slug: nameOrId };
      }
    }
    for (const [app, table] of this.tables) {
      const slug = table.byId.get(nameOrId);
      if (slug !== undefined) {
        return { app, slug };
      }
    }
    throw new NotFoundError(`Subcomposition not found: ${nameOrId}`);
  }

  /**
   * Resolve and return the entry.
   *
   * @throws NotFoundError
   */
  lookup(nameOrId: string, appHint?: string): RegistryEntry {
    const { app, slug } = this.resolve(nameOrId, appHint);
    const entry = this.get(app, slug);
    if (!entry) {
      throw new NotFoundError(`Subcomposition not found: ${nameOrId}`);
    }
    return entry;
  }

  get(app: string, slug: string): RegistryEntry | undefined {
    return this.tables.get(app)?.bySlug.get(slug);
  }

  hasApp(app: string): boolean {
    return this.tables.has(app);
  }

  appNames(): string[] {
    return [...this.tables.keys()];
  }

  /**
   * Every entry, grouped by application in insertion order.
   */
  list(): RegistryEntry[] {
    const entries: RegistryEntry[] = [];
    for (const table of this.tables.values()) {
      entries.push(...table.bySlug.values());
    }
    return entries;
  }

  get size(): number {
    let total = 0;
    for (const table of this.tables.values()) {
      total += table.bySlug.size;
    }
    return total;
  }

  /**
   * Last rebuild error for an application, if any.
   */
  lastError(app: string): string | null {
    return this.tables.get(app)?.error ?? null;
  }

  /**
   * Every field of an application, sorted by subcomposition then field name.
   *
   * @throws NotFoundError if the application has no table
   */
  fields(app: string): FieldCatalogueEntry[] {
    const table = this.tables.get(app);
    if (!table) {
      throw new NotFoundError(`App '${app}' not found`);
    }

    const fields: FieldCatalogueEntry[] = [];
    for (const entry of table.bySlug.values()) {
      for (const field of entry.fields.values()) {
        fields.push({ id: field.id, name: field.title, subcomposition: entry.name, type: field.type || 'unknown' });
      }
    }

    return fields.sort(
      (a, b) => compareText(a.subcomposition, b.subcomposition) || compareText(a.name, b.name)
    );
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
