/**
 * TriCaster HTTP client.
 *
 * Dictionary queries (XML) and shortcut commands against the device's
 * /v1 API. Connection details are passed per call so that edited settings
 * take effect on the next request.
 */

import {
  NotConfiguredError,
  NotFoundError,
  ParseFailureError,
  RemoteUnavailableError,
  errorMessage,
} from '../../core/errors.js';
import type { TriCasterConfig } from '../../core/config/schema.js';
import { basicAuth, httpRequest, type FetchLike, type HttpResponse } from '../http.js';
import {
  extractSlotDuration,
  extractSlotStatuses,
  extractTally,
  formatShortcut,
  parseXmlDocument,
} from './protocol.js';
import {
  DURATION_DICTIONARY_KEYS,
  type ConnectionTestResult,
  type DeviceConnection,
  type DurationDictionaryKey,
  type PlaybackDeviceTransport,
  type SlotDuration,
  type SlotStatus,
  type TallyState,
  type XmlDocument,
} from './types.js';

// ============================================================================
// Connection Settings
// ============================================================================

/**
 * Build connection details from configuration.
 *
 * @throws NotConfiguredError if the module is disabled or has no host
 */
export function connectionFromConfig(config: TriCasterConfig): DeviceConnection {
  if (!config.enabled) {
    throw new NotConfiguredError('TriCaster module is disabled', 'tricaster');
  }
  if (!config.host) {
    throw new NotConfiguredError('TriCaster host not configured', 'tricaster');
  }
  return {
    host: config.host,
    user: config.user,
    password: config.password,
    timeoutMs: config.requestTimeoutMs,
  };
}

// ============================================================================
// Client
// ============================================================================

export class TriCasterClient implements PlaybackDeviceTransport {
  private readonly fetchImpl: FetchLike;

  constructor(fetchImpl: FetchLike = fetch) {
    this.fetchImpl = fetchImpl;
  }

  /**
   * Query a dictionary key and parse the XML response.
   */
  async fetchDictionary(connection: DeviceConnection, key: string): Promise<XmlDocument> {
    const response = await this.request(connection, `/v1/dictionary?key=${encodeURIComponent(key)}`);
    return parseXmlDocument(response.text);
  }

  async fetchPlaybackStatus(
    connection: DeviceConnection,
    key: DurationDictionaryKey
  ): Promise<XmlDocument> {
    return this.fetchDictionary(connection, key);
  }

  /**
   * Duration and framerate of a DDR's clip, trying each timing dictionary.
   *
   * A key that answers with an error status or malformed XML falls through to
   * the next one; a connection failure is raised at once.
   */
  async readSlotDuration(connection: DeviceConnection, slot: number): Promise<SlotDuration> {
    let lastFailure: RemoteUnavailableError | ParseFailureError | null = null;

    for (const key of DURATION_DICTIONARY_KEYS) {
      let doc: XmlDocument;
      try {
        doc = await this.fetchPlaybackStatus(connection, key);
      } catch (error) {
        if (error instanceof ParseFailureError) {
          lastFailure = error;
          continue;
        }
        if (error instanceof RemoteUnavailableError && error.status !== undefined) {
          lastFailure = error;
          continue;
        }
        throw error;
      }

      const duration = extractSlotDuration(doc, slot);
      if (duration) {
        return duration;
      }
    }

    if (lastFailure) {
      throw lastFailure;
    }
    throw new NotFoundError(`DDR${slot} duration not found in TriCaster data`, 'tricaster');
  }

  async readSlotStatuses(connection: DeviceConnection): Promise<Record<string, SlotStatus>> {
    const doc = await this.fetchDictionary(connection, 'ddr_timecode');
    return extractSlotStatuses(doc);
  }

  async readTally(connection: DeviceConnection): Promise<TallyState> {
    const doc = await this.fetchDictionary(connection, 'tally');
    return extractTally(doc);
  }

  /**
   * Raw XML of a dictionary key, for diagnostics.
   */
  async readDictionaryText(connection: DeviceConnection, key: string): Promise<string> {
    const response = await this.request(connection, `/v1/dictionary?key=${encodeURIComponent(key)}`);
    return response.text;
  }

  /**
   * Execute a shortcut command, e.g. `ddr1_play` or `record_start`.
   */
  async shortcut(
    connection: DeviceConnection,
    name: string,
    params: Readonly<Record<string, string>> = {}
  ): Promise<void> {
    await this.request(connection, '/v1/shortcut', formatShortcut(name, params));
  }

  /**
   * Probe the version endpoint. Reports failures instead of throwing.
   */
  async testConnection(connection: DeviceConnection): Promise<ConnectionTestResult> {
    try {
      const response = await this.request(connection, '/v1/version');
      return { ok: true, host: connection.host, response: response.text.slice(0, 200) };
    } catch (error) {
      return { ok: false, host: connection.host, error: errorMessage(error) };
    }
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async request(
    connection: DeviceConnection,
    path: string,
    xmlBody?: string
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = { Accept: 'application/xml' };
    if (connection.user && connection.password) {
      headers['Authorization'] = basicAuth(connection.user, connection.password);
    }
    if (xmlBody !== undefined) {
      headers['Content-Type'] = 'text/xml';
    }

    return httpRequest('tricaster', this.fetchImpl, {
      url: `http://${connection.host}${path}`,
      method: xmlBody === undefined ? 'GET' : 'POST',
      headers,
      ...(xmlBody !== undefined && { body: xmlBody }),
      timeoutMs: connection.timeoutMs,
    });
  }
}
