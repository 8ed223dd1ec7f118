/**
 * Conversation Orchestrator exports
 *
 * ASSISTANT SERVICE: OpenAI Assistants API (threads + runs)
 * - Required env: OPENAI_API_KEY
 * - Assistant resolved from ASSISTANT_ID, the cache file, or created
 */

export { createOpenAI, createAssistantClient } from './assistant-client.js';
export type { AssistantClientConfig } from './assistant-client.js';
export {
  resolveAssistantId,
  ASSISTANT_INSTRUCTIONS,
  ASSISTANT_NAME,
} from './assistant.js';
export type { ResolveAssistantParams } from './assistant.js';
export { createRunPoller, defaultSleep } from './run-poller.js';
export type { RunPoller, RunPollerDeps, DriveRunParams, Sleep } from './run-poller.js';
export { createOrchestrator, outcomeReply, NO_REPLY_TEXT } from './orchestrator.js';
export type { Orchestrator, OrchestratorDeps, TurnOptions } from './orchestrator.js';
