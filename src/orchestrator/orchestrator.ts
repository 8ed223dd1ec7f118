/**
 * Conversation Orchestrator
 *
 * Runs one conversational turn per user message: log the message, make
 * sure the chat has a thread, drive a run to an end state, log the reply.
 * Turns of the same chat are serialized; different chats run concurrently.
 *
 * runTurn never rejects. Every failure is turned into reply text and
 * stored in the chat log like any other reply.
 */

import { errorMessage } from '@/lib/errors.js';
import { createKeyedMutex } from '@/lib/keyed-mutex.js';
import type { KeyedMutex } from '@/lib/keyed-mutex.js';
import type { Logger } from '@/lib/logger.js';
import type { ChatService } from '@/services/index.js';
import type { ToolExecutor } from '@/tools/types.js';
import type {
  AssistantClient,
  PollingPolicy,
  RunOutcome,
  ToolCallNotifier,
} from '@/types/index.js';

import { createRunPoller } from './run-poller.js';
import type { Sleep } from './run-poller.js';

export const NO_REPLY_TEXT = 'Error: The assistant returned no reply, start a new chat';

/**
 * Reply text for a run that ended without completing
 */
export function outcomeReply(outcome: RunOutcome): string {
  switch (outcome.type) {
    case 'completed':
      return outcome.reply ?? NO_REPLY_TEXT;
    case 'terminal':
      return `Error: The assistant entered a failed state (state ${outcome.status}), start a new chat`;
    case 'timeout':
      return `Error: The assistant did not finish in time (state ${outcome.status}), start a new chat`;
  }
}

export interface TurnOptions {
  signal?: AbortSignal;
}

/**
 * Orchestrator interface
 */
export interface Orchestrator {
  runTurn(chatId: string, userText: string, options?: TurnOptions): Promise<string>;
}

/**
 * Dependencies for orchestrator
 */
export interface OrchestratorDeps {
  assistant: AssistantClient;
  assistantId: string;
  chats: ChatService;
  executor: ToolExecutor;
  policy: PollingPolicy;
  logger: Logger;
  notifyToolCall?: ToolCallNotifier;
  mutex?: KeyedMutex;
  sleep?: Sleep;
}

/**
 * Create an orchestrator instance
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { assistant, chats, logger } = deps;
  const mutex = deps.mutex ?? createKeyedMutex();

  const poller = createRunPoller({
    client: assistant,
    executor: deps.executor,
    policy: deps.policy,
    logger,
    ...(deps.notifyToolCall && { notifyToolCall: deps.notifyToolCall }),
    ...(deps.sleep && { sleep: deps.sleep }),
  });

  async function ensureThread(chatId: string): Promise<string> {
    const existing = await chats.getField(chatId, 'thread');
    if (existing) {
      return existing;
    }

    const threadId = await assistant.createThread();
    await chats.setField(chatId, 'thread', threadId);
    logger.info({ chatId, threadId }, 'Created thread');
    return threadId;
  }

  async function converse(
    chatId: string,
    userText: string,
    options: TurnOptions
  ): Promise<string> {
    await chats.appendMessage(chatId, { role: 'user', content: userText });

    const threadId = await ensureThread(chatId);
    await assistant.addUserMessage(threadId, userText);

    const outcome = await poller.drive({
      threadId,
      assistantId: deps.assistantId,
      chatId,
      ...(options.signal && { signal: options.signal }),
    });

    logger.info(
      {
        chatId,
        outcome: outcome.type,
        tools: outcome.toolCalls.map((call) => ({
          name: call.name,
          status: call.status,
          durationMs: call.durationMs,
        })),
      },
      'Turn finished'
    );
    return outcomeReply(outcome);
  }

  return {
    async runTurn(
      chatId: string,
      userText: string,
      options: TurnOptions = {}
    ): Promise<string> {
      return mutex.runExclusive(chatId, async () => {
        let reply: string;
        try {
          reply = await converse(chatId, userText, options);
        } catch (error) {
          logger.error({ err: error, chatId }, 'Turn failed');
          reply = `Error: ${errorMessage(error)}`;
        }

        try {
          await chats.appendMessage(chatId, { role: 'assistant', content: reply });
        } catch (error) {
          logger.error({ err: error, chatId }, 'Failed to store reply');
        }
        return reply;
      });
    },
  };
}
