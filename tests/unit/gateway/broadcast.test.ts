/**
 * Broadcast Gateway Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { createBroadcastGateway } from '@/gateway/broadcast.js';
import type { BroadcastGateway } from '@/gateway/broadcast.js';
import { createConnectionRegistry } from '@/gateway/registry.js';
import type { ConnectionRegistry } from '@/gateway/registry.js';
import { createNoopLogger } from '@/lib/logger.js';

import { createRecordingTransport } from '../../mocks/index.js';
import type { RecordingTransport } from '../../mocks/index.js';

describe('Broadcast Gateway', () => {
  let registry: ConnectionRegistry;
  let transport: RecordingTransport;
  let broadcast: BroadcastGateway;

  beforeEach(() => {
    registry = createConnectionRegistry();
    transport = createRecordingTransport();
    broadcast = createBroadcastGateway({
      registry,
      transport,
      logger: createNoopLogger(),
    });
    registry.joinChat('conn-a', 'chat-1');
    registry.joinChat('conn-b', 'chat-1');
    registry.joinChat('conn-c', 'chat-2');
  });

  it('should emit to every member of the chat only', () => {
    broadcast.emitToChat('chat-1', 'message', {
      chat_id: 'chat-1',
      content: 'Hello',
    });

    expect(transport.sent.map((frame) => frame.connectionId).sort()).toEqual([
      'conn-a',
      'conn-b',
    ]);
    expect(transport.framesFor('conn-a')[0]).toEqual({
      connectionId: 'conn-a',
      event: 'message',
      payload: { chat_id: 'chat-1', content: 'Hello' },
    });
  });

  it('should do nothing for a chat without members', () => {
    broadcast.emitToChat('chat-empty', 'message', {
      chat_id: 'chat-empty',
      content: 'Hello',
    });

    expect(transport.sent).toHaveLength(0);
  });

  it('should continue the fan-out when one send fails', () => {
    transport.broken.add('conn-a');

    broadcast.emitToChat('chat-1', 'message', {
      chat_id: 'chat-1',
      content: 'Hello',
    });

    expect(transport.framesFor('conn-b')).toHaveLength(1);
    expect(transport.framesFor('conn-a')).toHaveLength(0);
  });

  it('should emit tool labels instead of tool names', () => {
    broadcast.emitToolCall('chat-2', 'search_google_maps');
    broadcast.emitToolCall('chat-2', 'mystery_tool');

    expect(transport.framesFor('conn-c').map((frame) => frame.payload)).toEqual([
      { chat_id: 'chat-2', tool_data: 'Searching Google Maps' },
      { chat_id: 'chat-2', tool_data: 'Working on your request' },
    ]);
  });

  it('should tag errors with the connection current chat', () => {
    registry.register('conn-lonely');

    broadcast.emitError('conn-a', 'Chat not found: nope');
    broadcast.emitError('conn-lonely', 'Message content is required');

    expect(transport.sent).toEqual([
      {
        connectionId: 'conn-a',
        event: 'error',
        payload: { chat_id: 'chat-1', error: 'Chat not found: nope' },
      },
      {
        connectionId: 'conn-lonely',
        event: 'error',
        payload: { chat_id: null, error: 'Message content is required' },
      },
    ]);
  });
});
