/**
 * Application Entry Point
 *
 * Composition root: builds every component once, wires them through their
 * factory dependencies, then starts the HTTP server with the socket gateway
 * attached.
 */

import 'dotenv/config';
import { Server } from 'http';

import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import {
  attachSocketServer,
  createBroadcastGateway,
  createConnectionRegistry,
  createEventHandlers,
  createSocketTransport,
} from './gateway/index.js';
import { ConfigValidationError, loadConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import {
  createAssistantClient,
  createOpenAI,
  createOrchestrator,
  resolveAssistantId,
} from './orchestrator/index.js';
import {
  createChatService,
  createChatServiceDb,
  createPlaceService,
  createPlaceServiceDb,
} from './services/index.js';
import {
  createToolExecutor,
  createToolHandlers,
  createToolRegistry,
  getPlaceFieldConfig,
  getToolDefinitions,
} from './tools/index.js';
import {
  createExaClient,
  createImageSource,
  createPlacesClient,
  createVisionClient,
  createYelpClient,
} from './tools/providers/index.js';
import { createImageBatchAnalyzer } from './workers/index.js';

const logger = createLogger({ component: 'server' });

async function main(): Promise<void> {
  const config = loadConfig();

  // Document store
  const supabase = createSupabaseAdmin(config.supabase);
  const chats = createChatService({
    db: createChatServiceDb(supabase),
    logger: logger.child({ component: 'chats' }),
  });
  const places = createPlaceService({
    db: createPlaceServiceDb(supabase),
    logger: logger.child({ component: 'places' }),
  });

  // Assistant service and vision
  const openai = createOpenAI({ apiKey: config.openai.apiKey });
  const assistant = createAssistantClient(openai);
  const images = createImageBatchAnalyzer({
    images: createImageSource(),
    vision: createVisionClient(openai),
    model: config.openai.visionModel,
    defaultTimeoutMs: config.imageBatchTimeoutMs,
    logger: logger.child({ component: 'images' }),
  });

  // Tools
  const registry = createToolRegistry(
    createToolHandlers({
      chats,
      places,
      placesClient: createPlacesClient({
        apiKey: config.providers.googleMapsApiKey,
      }),
      yelp: createYelpClient({ apiKey: config.providers.yelpApiKey }),
      contentSearch: createExaClient({ apiKey: config.providers.exaApiKey }),
      images,
      placeFields: getPlaceFieldConfig(),
      imageBatchTimeoutMs: config.imageBatchTimeoutMs,
      visionDetailModel: config.openai.visionDetailModel,
    })
  );
  const executor = createToolExecutor({
    registry,
    logger: logger.child({ component: 'tools' }),
  });

  const assistantId = await resolveAssistantId({
    client: assistant,
    configuredId: config.openai.assistantId,
    cacheFile: config.openai.assistantCacheFile,
    model: config.openai.model,
    tools: getToolDefinitions(),
    logger: logger.child({ component: 'assistant' }),
  });

  // Gateway
  const connections = createConnectionRegistry();
  const transport = createSocketTransport();
  const broadcast = createBroadcastGateway({
    registry: connections,
    transport,
    logger: logger.child({ component: 'broadcast' }),
  });

  const orchestrator = createOrchestrator({
    assistant,
    assistantId,
    chats,
    executor,
    policy: config.polling,
    logger: logger.child({ component: 'orchestrator' }),
    notifyToolCall: (chatId, toolName) => broadcast.emitToolCall(chatId, toolName),
  });

  const handlers = createEventHandlers({
    registry: connections,
    broadcast,
    chats,
    orchestrator,
    logger: logger.child({ component: 'events' }),
  });

  const app = createApp({
    stats: { connections: () => connections.size() },
    logger: logger.child({ component: 'http' }),
    allowedOrigins: config.allowedOrigins,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, 'Server listening');
  });
  if (!(server instanceof Server)) {
    throw new Error('Expected an HTTP/1.1 server');
  }

  const sockets = attachSocketServer({
    server,
    token: config.apiToken,
    registry: connections,
    handlers,
    transport,
    logger: logger.child({ component: 'sockets' }),
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    sockets
      .close()
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Socket server close failed');
      })
      .finally(() => {
        server.close(() => process.exit(0));
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    logger.fatal(
      { missing: error.missing, invalid: error.invalid },
      'Invalid environment'
    );
  } else {
    logger.fatal({ err: error }, `Startup failed: ${errorMessage(error)}`);
  }
  process.exit(1);
});
