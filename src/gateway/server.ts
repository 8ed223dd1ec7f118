/**
 * WebSocket server
 *
 * Attached to the HTTP server's `upgrade` event. The shared secret is
 * checked before the upgrade completes; rejected requests get a plain
 * HTTP status and never reach the registry.
 */

import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';

import { nanoid } from 'nanoid';
import { WebSocket, WebSocketServer } from 'ws';
import type { RawData } from 'ws';

import type { Logger } from '@/lib/logger.js';
import type {
  ConnectionTransport,
  EventEnvelope,
  ServerEventMap,
  ServerEventName,
} from '@/types/index.js';

import { authorizeUpgrade } from './auth.js';
import type { EventHandlers } from './handlers.js';
import type { ConnectionRegistry } from './registry.js';

export const SOCKET_PATH = '/ws';

/**
 * Transport over live sockets, keyed by connection id
 */
export interface SocketTransport extends ConnectionTransport {
  add(connectionId: string, socket: WebSocket): void;
  remove(connectionId: string): void;
  size(): number;
}

export function createSocketTransport(): SocketTransport {
  const sockets = new Map<string, WebSocket>();

  return {
    add(connectionId, socket) {
      sockets.set(connectionId, socket);
    },

    remove(connectionId) {
      sockets.delete(connectionId);
    },

    size() {
      return sockets.size;
    },

    send<E extends ServerEventName>(
      connectionId: string,
      event: E,
      payload: ServerEventMap[E]
    ): void {
      const socket = sockets.get(connectionId);
      if (!socket || socket.readyState !== WebSocket.OPEN) {
        throw new Error(`Connection ${connectionId} is not open`);
      }
      const envelope: EventEnvelope<E, ServerEventMap[E]> = {
        event,
        data: payload,
      };
      socket.send(JSON.stringify(envelope));
    },
  };
}

export interface SocketServerDeps {
  server: Server;
  token: string;
  registry: ConnectionRegistry;
  handlers: EventHandlers;
  transport: SocketTransport;
  logger: Logger;
  path?: string;
}

export interface SocketServer {
  close(): Promise<void>;
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.once('finish', () => socket.destroy());
  socket.end(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\n\r\n`);
}

function frameText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

export function attachSocketServer(deps: SocketServerDeps): SocketServer {
  const { server, registry, handlers, transport, logger } = deps;
  const path = deps.path ?? SOCKET_PATH;
  const wss = new WebSocketServer({ noServer: true });

  function onUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const decision = authorizeUpgrade(request.url, { path, token: deps.token });
    if (!decision.accept) {
      logger.warn(
        { status: decision.status, remote: request.socket.remoteAddress },
        'Socket upgrade rejected'
      );
      rejectUpgrade(socket, decision.status, decision.reason);
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  }

  wss.on('connection', (ws: WebSocket) => {
    const connectionId = nanoid();
    const connectionLogger = logger.child({ connectionId });

    transport.add(connectionId, ws);
    registry.register(connectionId);
    connectionLogger.info('Client connected');

    ws.on('message', (data: RawData) => {
      handlers.handleFrame(connectionId, frameText(data)).catch((error: unknown) => {
        connectionLogger.error({ err: error }, 'Frame handling failed');
      });
    });

    ws.on('close', () => {
      registry.unregister(connectionId);
      transport.remove(connectionId);
      connectionLogger.info('Client disconnected');
    });

    ws.on('error', (error: Error) => {
      connectionLogger.warn({ err: error }, 'Socket error');
    });
  });

  server.on('upgrade', onUpgrade);

  return {
    close(): Promise<void> {
      server.off('upgrade', onUpgrade);
      for (const client of wss.clients) {
        client.close(1001, 'Server shutting down');
      }
      return new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
