/**
 * WebSocket Handler for DDR Timer Sync.
 * Broadcasts sync activity to connected clients.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Server } from 'node:http';
import type { Logger } from 'pino';
import type { AppContext } from '../../context.js';
import type { SlotSyncResult, SyncSource } from '../../core/sync/orchestrator.js';
import type { AutoSyncStatus } from '../../core/sync/auto-sync.js';
import type { RebuildSummary } from '../../core/registry/registry.js';

// ============================================================================
// Types
// ============================================================================

export type BroadcastType = 'sync_applied' | 'registry_rebuilt' | 'auto_sync_status' | 'command';

/**
 * Message types sent from server to clients.
 */
export interface ServerMessage {
  type: BroadcastType | 'initial_state' | 'error';
  payload: unknown;
  timestamp: string;
}

/**
 * Message types received from clients.
 */
export interface ClientMessage {
  type: 'subscribe' | 'unsubscribe' | 'pong' | 'get_state';
  events?: string[];
}

interface ClientState {
  isAlive: boolean;
  subscribedEvents: Set<string>;
}

// ============================================================================
// Message Parsing
// ============================================================================

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf-8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  return Buffer.from(data).toString('utf-8');
}

/**
 * Parse a client message, or null when it is not one.
 */
export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
    return null;
  }

  const type = parsed.type;
  if (type !== 'subscribe' && type !== 'unsubscribe' && type !== 'pong' && type !== 'get_state') {
    return null;
  }

  const events =
    'events' in parsed && Array.isArray(parsed.events)
      ? parsed.events.filter((event): event is string => typeof event === 'string')
      : undefined;

  return events ? { type, events } : { type };
}

// ============================================================================
// WebSocket Handler
// ============================================================================

export class WebSocketHandler {
  private readonly wss: WebSocketServer;
  private readonly context: AppContext;
  private readonly logger: Logger;
  private readonly clients: Map<WebSocket, ClientState>;
  private heartbeatInterval: NodeJS.Timeout | null = null;

  constructor(server: Server, context: AppContext, logger: Logger) {
    this.context = context;
    this.logger = logger.child({ module: 'websocket' });
    this.clients = new Map();

    this.wss = new WebSocketServer({
      server,
      path: '/ws',
    });

    this.setupEventHandlers();
    this.startHeartbeat();
  }

  // --------------------------------------------------------------------------
  // Public API
  // --------------------------------------------------------------------------

  broadcastSyncApplied(result: SlotSyncResult, source: SyncSource): void {
    this.broadcast('sync_applied', { ...result, source });
  }

  broadcastRegistryRebuilt(summary: RebuildSummary): void {
    this.broadcast('registry_rebuilt', summary);
  }

  broadcastAutoSyncStatus(status: AutoSyncStatus): void {
    this.broadcast('auto_sync_status', status);
  }

  broadcastCommand(line: string): void {
    this.broadcast('command', { line });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  shutdown(): void {
    this.logger.info('Shutting down WebSocket server');

    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    for (const client of this.clients.keys()) {
      client.close(1001, 'Server shutting down');
    }

    this.clients.clear();
    this.wss.close();
  }

  // --------------------------------------------------------------------------
  // Private Methods
  // --------------------------------------------------------------------------

  private setupEventHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      this.handleConnection(ws);
    });

    this.wss.on('error', (error) => {
      this.logger.error({ error: error.message }, 'WebSocket server error');
    });
  }

  private handleConnection(ws: WebSocket): void {
    const client: ClientState = { isAlive: true, subscribedEvents: new Set(['all']) };
    this.clients.set(ws, client);
    this.logger.info({ clients: this.clients.size }, 'Client connected');

    this.sendInitialState(ws);

    ws.on('message', (data: RawData) => {
      this.handleMessage(ws, client, data);
    });

    ws.on('pong', () => {
      client.isAlive = true;
    });

    ws.on('close', (code, reason) => {
      this.clients.delete(ws);
      this.logger.info(
        { code, reason: reason.toString(), clients: this.clients.size },
        'Client disconnected'
      );
    });

    ws.on('error', (error) => {
      this.logger.error({ error: error.message }, 'Client error');
      this.clients.delete(ws);
    });
  }

  private sendInitialState(ws: WebSocket): void {
    const { autoSync, registry, commandLog } = this.context;

    this.send(ws, {
      type: 'initial_state',
      payload: {
        autoSync: autoSync.status(),
        registry: { apps: registry.appNames(), count: registry.size },
        recentCommands: commandLog.recent(50),
      },
      timestamp: new Date().toISOString(),
    });
  }

  private handleMessage(ws: WebSocket, client: ClientState, data: RawData): void {
    const message = parseClientMessage(rawToString(data));

    if (!message) {
      this.logger.warn('Failed to parse client message');
      this.send(ws, {
        type: 'error',
        payload: { message: 'Invalid message format' },
        timestamp: new Date().toISOString(),
      });
      return;
    }

    switch (message.type) {
      case 'pong':
        client.isAlive = true;
        break;

      case 'get_state':
        this.sendInitialState(ws);
        break;

      case 'subscribe':
        if (message.events) {
          client.subscribedEvents = new Set(message.events);
          this.logger.debug({ events: [...client.subscribedEvents] }, 'Client subscribed to events');
        }
        break;

      case 'unsubscribe':
        for (const event of message.events ?? []) {
          client.subscribedEvents.delete(event);
        }
        break;
    }
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  /**
   * Send to every client subscribed to the type (or to "all").
   */
  private broadcast(type: BroadcastType, payload: unknown): void {
    const messageStr = JSON.stringify({ type, payload, timestamp: new Date().toISOString() });

    for (const [ws, client] of this.clients) {
      const subscribed = client.subscribedEvents.has('all') || client.subscribedEvents.has(type);
      if (subscribed && ws.readyState === WebSocket.OPEN) {
        ws.send(messageStr);
      }
    }
  }

  /**
   * Terminate clients that missed a heartbeat.
   */
  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      for (const [ws, client] of this.clients) {
        if (!client.isAlive) {
          this.logger.info('Terminating inactive client');
          ws.terminate();
          this.clients.delete(ws);
          continue;
        }

        client.isAlive = false;
        ws.ping();
      }
    }, 30000);
  }
}
