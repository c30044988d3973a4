/**
 * Singular control app client.
 *
 * Two calls: fetch the document model of a control app, and PATCH control
 * items to it. Neither retries; retry policy belongs to the caller.
 */

import { ParseFailureError } from '../../core/errors.js';
import { httpRequest, type FetchLike } from '../http.js';
import { toCompositionTrees } from './model.js';
import type {
  CompositionTree,
  ControlAppTransport,
  ControlItem,
  ControlPatchResponse,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface SingularClientSettings {
  apiBase: string;
  requestTimeoutMs: number;
}

// ============================================================================
// Client
// ============================================================================

export class SingularClient implements ControlAppTransport {
  private readonly settings: () => SingularClientSettings;
  private readonly fetchImpl: FetchLike;

  /**
   * @param settings - Read on every request so edited settings apply immediately
   * @param fetchImpl - Replaced by an in-process stand-in in tests
   */
  constructor(settings: () => SingularClientSettings, fetchImpl: FetchLike = fetch) {
    this.settings = settings;
    this.fetchImpl = fetchImpl;
  }

  async fetchControlModel(token: string): Promise<CompositionTree[]> {
    const { apiBase, requestTimeoutMs } = this.settings();
    const response = await httpRequest('singular', this.fetchImpl, {
      url: `${trimSlash(apiBase)}/controlapps/${encodeURIComponent(token)}/model`,
      headers: { Accept: 'application/json' },
      timeoutMs: requestTimeoutMs,
      target: 'control app model',
    });

    let document: unknown;
    try {
      document = JSON.parse(response.text);
    } catch (error) {
      throw new ParseFailureError('singular', error instanceof Error ? error.message : 'invalid JSON');
    }

    return toCompositionTrees(document);
  }

  async patchControl(token: string, items: ControlItem[]): Promise<ControlPatchResponse> {
    const { apiBase, requestTimeoutMs } = this.settings();
    const response = await httpRequest('singular', this.fetchImpl, {
      url: `${trimSlash(apiBase)}/controlapps/${encodeURIComponent(token)}/control`,
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(items),
      timeoutMs: requestTimeoutMs,
      target: 'control app control endpoint',
    });

    return { status: response.status, body: response.text };
  }
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
