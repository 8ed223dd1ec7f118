/**
 * Run Poller
 *
 * Drives one assistant run to an end state: polls its status at a fixed
 * interval, dispatches tool calls when the run requires action and submits
 * their outputs in one batch. Gives up after `maxAttempts` polls or tool
 * rounds, whichever adds up first.
 */

import { setTimeout as delay } from 'timers/promises';

import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import { errorMessage } from '@/lib/errors.js';
import { toToolPayload } from '@/tools/executor.js';
import type { ToolExecutor } from '@/tools/types.js';
import type {
  AssistantClient,
  AssistantRun,
  PollingPolicy,
  RunOutcome,
  RunToolCall,
  ToolCallNotifier,
  ToolInvocation,
  ToolOutput,
} from '@/types/index.js';
import { TERMINAL_RUN_STATUSES } from '@/types/index.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

export interface DriveRunParams {
  threadId: string;
  assistantId: string;
  chatId: string;
  signal?: AbortSignal;
}

export interface RunPoller {
  drive(params: DriveRunParams): Promise<RunOutcome>;
}

export interface RunPollerDeps {
  client: AssistantClient;
  executor: ToolExecutor;
  policy: PollingPolicy;
  logger: Logger;
  notifyToolCall?: ToolCallNotifier;
  sleep?: Sleep;
}

const argumentsSchema = z.record(z.unknown());

function parseArguments(raw: string): Record<string, unknown> | null {
  try {
    const parsed = argumentsSchema.safeParse(JSON.parse(raw === '' ? '{}' : raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function createRunPoller(deps: RunPollerDeps): RunPoller {
  const { client, executor, policy, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;

  async function dispatch(
    calls: RunToolCall[],
    chatId: string,
    invocations: ToolInvocation[]
  ): Promise<ToolOutput[]> {
    return Promise.all(
      calls.map(async (call): Promise<ToolOutput> => {
        const args = parseArguments(call.arguments);
        if (args === null) {
          logger.warn({ tool: call.name, chatId }, 'Unparseable tool arguments');
          return {
            toolCallId: call.id,
            output: JSON.stringify({
              error: `Invalid JSON arguments for ${call.name}`,
            }),
          };
        }

        deps.notifyToolCall?.(chatId, call.name);
        const invocation = await executor.invoke(call.name, args, chatId);
        invocations.push(invocation);

        return {
          toolCallId: call.id,
          output: JSON.stringify(toToolPayload(invocation)),
        };
      })
    );
  }

  async function cancelQuietly(threadId: string, runId: string): Promise<void> {
    try {
      await client.cancelRun(threadId, runId);
    } catch (error) {
      logger.warn({ runId, error: errorMessage(error) }, 'Run cancel failed');
    }
  }

  async function giveUp(
    threadId: string,
    run: AssistantRun,
    invocations: ToolInvocation[]
  ): Promise<RunOutcome> {
    logger.warn({ runId: run.id, status: run.status }, 'Run timed out');
    await cancelQuietly(threadId, run.id);
    return { type: 'timeout', status: run.status, toolCalls: invocations };
  }

  return {
    async drive(params: DriveRunParams): Promise<RunOutcome> {
      const { threadId, chatId, signal } = params;
      const invocations: ToolInvocation[] = [];

      let run: AssistantRun = await client.createRun(threadId, params.assistantId);
      let attempts = 0;

      for (;;) {
        switch (run.status) {
          case 'completed': {
            const reply = await client.latestAssistantMessage(threadId);
            return { type: 'completed', reply, toolCalls: invocations };
          }

          case 'requires_action': {
            if (attempts >= policy.maxAttempts) {
              return giveUp(threadId, run, invocations);
            }
            logger.debug(
              { runId: run.id, calls: run.toolCalls.length },
              'Run requires action'
            );
            const outputs = await dispatch(run.toolCalls, chatId, invocations);
            attempts += 1;
            run = await client.submitToolOutputs(threadId, run.id, outputs);
            break;
          }

          case 'queued':
          case 'in_progress':
          case 'cancelling': {
            if (attempts >= policy.maxAttempts) {
              return giveUp(threadId, run, invocations);
            }
            try {
              await sleep(policy.intervalMs, signal);
            } catch (error) {
              await cancelQuietly(threadId, run.id);
              throw error;
            }
            attempts += 1;
            run = await client.retrieveRun(threadId, run.id);
            break;
          }

          default: {
            if (TERMINAL_RUN_STATUSES.includes(run.status)) {
              logger.error(
                { runId: run.id, status: run.status, lastError: run.lastError },
                'Run ended in a terminal state'
              );
            }
            return { type: 'terminal', status: run.status, toolCalls: invocations };
          }
        }
      }
    },
  };
}
