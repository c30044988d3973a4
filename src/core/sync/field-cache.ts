/**
 * Field resolution cache.
 *
 * The control endpoint groups values by owning composition, so every field
 * id has to be mapped to the composition that declares it. Mappings are
 * memoized per (token, field id set); the set is sorted so request order
 * does not matter.
 */

import type { Logger } from 'pino';
import { walkCompositions } from '../../adapters/singular/model.js';
import type { ControlAppTransport } from '../../adapters/singular/types.js';

export type FieldOwners = ReadonlyMap<string, string>;

export class FieldResolutionCache {
  private readonly transport: ControlAppTransport;
  private readonly logger: Logger | null;
  private entries = new Map<string, Map<string, Promise<FieldOwners>>>();
  private fetchCount = 0;

  constructor(transport: ControlAppTransport, logger?: Logger) {
    this.transport = transport;
    this.logger = logger?.child({ module: 'field-cache' }) ?? null;
  }

  /**
   * Owning composition id of each requested field.
   * Ids absent from the model are absent from the result.
   */
  async resolveFields(token: string, fieldIds: Iterable<string>): Promise<FieldOwners> {
    const ids = [...new Set(fieldIds)].sort();
    const key = JSON.stringify(ids);
    const cached = this.entries.get(token)?.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.lookup(token, ids);
    this.store(token, key, pending);

    try {
      return await pending;
    } catch (error) {
      // Only drop the entry if it has not been replaced in the meantime.
      if (this.entries.get(token)?.get(key) === pending) {
        this.remove(token, key);
      }
      throw error;
    }
  }

  /**
   * Drop every entry, or only those of one token.
   */
  invalidate(token?: string): void {
    if (token === undefined) {
      this.entries = new Map();
    } else {
      this.entries.delete(token);
    }
    this.logger?.debug({ token: token ?? 'all' }, 'Field resolution cache invalidated');
  }

  /** Number of model fetches performed so far. */
  get fetches(): number {
    return this.fetchCount;
  }

  get size(): number {
    let total = 0;
    for (const byKey of this.entries.values()) {
      total += byKey.size;
    }
    return total;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async lookup(token: string, fieldIds: readonly string[]): Promise<FieldOwners> {
    this.fetchCount++;
    const trees = await this.transport.fetchControlModel(token);
    const wanted = new Set(fieldIds);
    const owners = new Map<string, string>();

    walkCompositions(trees, (node) => {
      if (node.id === null || node.model === null) {
        return;
      }
      for (const field of node.model) {
        if (wanted.has(field.id)) {
          owners.set(field.id, node.id);
        }
      }
    });

    this.logger?.debug({ requested: fieldIds.length, resolved: owners.size }, 'Resolved field owners');
    return owners;
  }

  private store(token: string, key: string, value: Promise<FieldOwners>): void {
    const byKey = new Map(this.entries.get(token));
    byKey.set(key, value);
    this.entries.set(token, byKey);
  }

  private remove(token: string, key: string): void {
    const byKey = new Map(this.entries.get(token));
    byKey.delete(key);
    if (byKey.size === 0) {
      this.entries.delete(token);
    } else {
      this.entries.set(token, byKey);
    }
  }
}
