/**
 * WebSocket client message parsing tests.
 */

import { describe, it, expect } from 'vitest';
import { parseClientMessage } from '../src/web/ws/handler.js';

describe('parseClientMessage', () => {
  it('accepts known message types', () => {
    expect(parseClientMessage('{"type":"pong"}')).toEqual({ type: 'pong' });
    expect(parseClientMessage('{"type":"get_state"}')).toEqual({ type: 'get_state' });
  });

  it('keeps only string event names', () => {
    expect(parseClientMessage('{"type":"subscribe","events":["sync_applied",3,"command"]}')).toEqual({
      type: 'subscribe',
      events: ['sync_applied', 'command'],
    });
  });

  it('rejects malformed or unknown messages', () => {
    expect(parseClientMessage('not json')).toBeNull();
    expect(parseClientMessage('[]')).toBeNull();
    expect(parseClientMessage('{"type":"shutdown"}')).toBeNull();
    expect(parseClientMessage('null')).toBeNull();
  });
});
