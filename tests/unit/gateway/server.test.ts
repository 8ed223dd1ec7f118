/**
 * Socket Server Unit Tests
 *
 * A real ws server on an ephemeral local port, wired to the registry,
 * broadcast gateway and event handlers. The orchestrator is stubbed.
 */

import { createServer } from 'http';
import type { Server } from 'http';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocket } from 'ws';

import { createBroadcastGateway } from '@/gateway/broadcast.js';
import { createEventHandlers } from '@/gateway/handlers.js';
import { createConnectionRegistry } from '@/gateway/registry.js';
import type { ConnectionRegistry } from '@/gateway/registry.js';
import { attachSocketServer, createSocketTransport } from '@/gateway/server.js';
import type { SocketServer, SocketTransport } from '@/gateway/server.js';
import { createNoopLogger } from '@/lib/logger.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import { createChatService } from '@/services/chat.service.js';

import { createInMemoryChatDb, makeChat } from '../../mocks/index.js';

const TOKEN = 'test-secret';

function connect(url: string): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const client = new WebSocket(url);
    client.once('open', () => resolve(client));
    client.on('error', reject);
  });
}

function connectionError(url: string): Promise<string> {
  return new Promise((resolve) => {
    const client = new WebSocket(url);
    client.on('error', (error: Error) => resolve(error.message));
  });
}

function nextFrame(client: WebSocket): Promise<unknown> {
  return new Promise((resolve) => {
    client.once('message', (data) => resolve(JSON.parse(String(data))));
  });
}

describe('Socket Server', () => {
  let httpServer: Server;
  let sockets: SocketServer;
  let registry: ConnectionRegistry;
  let transport: SocketTransport;
  let baseUrl: string;
  const clients: WebSocket[] = [];

  async function open(query = `?token=${TOKEN}`): Promise<WebSocket> {
    const client = await connect(`${baseUrl}/ws${query}`);
    clients.push(client);
    return client;
  }

  beforeEach(async () => {
    const logger = createNoopLogger();
    registry = createConnectionRegistry();
    transport = createSocketTransport();
    const orchestrator: Orchestrator = {
      runTurn: vi.fn<Orchestrator['runTurn']>().mockResolvedValue('Try the corner bistro.'),
    };

    httpServer = createServer();
    sockets = attachSocketServer({
      server: httpServer,
      token: TOKEN,
      registry,
      transport,
      logger,
      handlers: createEventHandlers({
        registry,
        broadcast: createBroadcastGateway({ registry, transport, logger }),
        chats: createChatService({
          db: createInMemoryChatDb([makeChat({ chatId: 'chat-1' })]),
          logger,
        }),
        orchestrator,
        logger,
      }),
    });

    await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
    const address = httpServer.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    baseUrl = `ws://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.terminate();
    }
    await sockets.close();
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  });

  describe('upgrade', () => {
    it('should reject a wrong token with 401 and register nothing', async () => {
      const message = await connectionError(`${baseUrl}/ws?token=xyz`);

      expect(message).toBe('Unexpected server response: 401');
      expect(registry.size()).toBe(0);
      expect(transport.size()).toBe(0);
    });

    it('should reject a missing token', async () => {
      await expect(connectionError(`${baseUrl}/ws`)).resolves.toBe(
        'Unexpected server response: 401'
      );
      expect(registry.size()).toBe(0);
    });

    it('should answer 404 on other paths', async () => {
      await expect(connectionError(`${baseUrl}/other?token=${TOKEN}`)).resolves.toBe(
        'Unexpected server response: 404'
      );
    });
  });

  describe('connection lifecycle', () => {
    it('should register on connect and forget the connection on close', async () => {
      const client = await open();

      await vi.waitFor(() => {
        expect(registry.size()).toBe(1);
        expect(transport.size()).toBe(1);
      });

      client.close();

      await vi.waitFor(() => {
        expect(registry.size()).toBe(0);
        expect(transport.size()).toBe(0);
      });
    });

    it('should drop a closed connection from its chat', async () => {
      const client = await open();
      const reply = nextFrame(client);
      client.send(
        JSON.stringify({ event: 'send_message', data: { chat_id: 'chat-1', content: 'hi' } })
      );
      await reply;

      expect(registry.membersOf('chat-1').size).toBe(1);

      client.close();

      await vi.waitFor(() => {
        expect(registry.membersOf('chat-1').size).toBe(0);
      });
    });
  });

  describe('frames', () => {
    it('should answer a send_message frame with the reply envelope', async () => {
      const client = await open();
      const reply = nextFrame(client);

      client.send(
        JSON.stringify({ event: 'send_message', data: { chat_id: 'chat-1', content: 'pizza?' } })
      );

      await expect(reply).resolves.toEqual({
        event: 'message',
        data: { chat_id: 'chat-1', content: 'Try the corner bistro.' },
      });
    });

    it('should answer a malformed frame with an error event', async () => {
      const client = await open();
      const reply = nextFrame(client);

      client.send('not json');

      await expect(reply).resolves.toEqual({
        event: 'error',
        data: { chat_id: null, error: 'Malformed frame: invalid JSON' },
      });
    });
  });
});
