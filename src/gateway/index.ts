/**
 * Real-time gateway exports
 */

export { createConnectionRegistry } from './registry.js';
export type { ConnectionRegistry } from './registry.js';
export { createBroadcastGateway } from './broadcast.js';
export type { BroadcastGateway, BroadcastGatewayDeps } from './broadcast.js';
export { isValidToken, authorizeUpgrade } from './auth.js';
export type { UpgradeDecision } from './auth.js';
export {
  createEventHandlers,
  sendMessageSchema,
  chatLookupSchema,
} from './handlers.js';
export type { EventHandlers, EventHandlerDeps } from './handlers.js';
export {
  attachSocketServer,
  createSocketTransport,
  SOCKET_PATH,
} from './server.js';
export type { SocketServer, SocketServerDeps, SocketTransport } from './server.js';
