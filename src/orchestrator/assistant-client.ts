/**
 * Assistant Client Implementation
 *
 * Wraps the OpenAI SDK's Assistants API (threads, messages, runs) behind
 * the AssistantClient contract so the orchestrator never sees SDK types.
 */

import OpenAI from 'openai';

import type {
  AssistantClient,
  AssistantRun,
  AssistantSpec,
  ToolOutput,
} from '@/types/index.js';

type SdkRun = OpenAI.Beta.Threads.Run;

/**
 * Assistant client configuration options
 */
export interface AssistantClientConfig {
  /** OpenAI API key (required) */
  apiKey: string;

  /** Base URL override */
  baseURL?: string;

  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Shared SDK instance, also used for vision requests
 */
export function createOpenAI(config: AssistantClientConfig): OpenAI {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  return new OpenAI({
    apiKey: config.apiKey,
    ...(config.baseURL && { baseURL: config.baseURL }),
    timeout: config.timeout ?? 120000,
  });
}

function toRun(run: SdkRun): AssistantRun {
  const pending = run.required_action?.submit_tool_outputs.tool_calls ?? [];

  return {
    id: run.id,
    status: run.status,
    toolCalls: pending.map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    })),
    lastError: run.last_error?.message ?? null,
  };
}

/**
 * Create an assistant client over an OpenAI SDK instance
 */
export function createAssistantClient(openai: OpenAI): AssistantClient {
  const threads = openai.beta.threads;

  return {
    async createThread(): Promise<string> {
      const thread = await threads.create();
      return thread.id;
    },

    async addUserMessage(threadId: string, content: string): Promise<void> {
      await threads.messages.create(threadId, { role: 'user', content });
    },

    async createRun(threadId: string, assistantId: string): Promise<AssistantRun> {
      const run = await threads.runs.create(threadId, {
        assistant_id: assistantId,
      });
      return toRun(run);
    },

    async retrieveRun(threadId: string, runId: string): Promise<AssistantRun> {
      return toRun(await threads.runs.retrieve(threadId, runId));
    },

    async submitToolOutputs(
      threadId: string,
      runId: string,
      outputs: ToolOutput[]
    ): Promise<AssistantRun> {
      const run = await threads.runs.submitToolOutputs(threadId, runId, {
        tool_outputs: outputs.map((item) => ({
          tool_call_id: item.toolCallId,
          output: item.output,
        })),
      });
      return toRun(run);
    },

    async cancelRun(threadId: string, runId: string): Promise<void> {
      await threads.runs.cancel(threadId, runId);
    },

    async latestAssistantMessage(threadId: string): Promise<string | null> {
      const page = await threads.messages.list(threadId, { order: 'desc' });

      const message = page.data.find((item) => item.role === 'assistant');
      if (!message) {
        return null;
      }

      for (const block of message.content) {
        if (block.type === 'text') {
          return block.text.value;
        }
      }
      return null;
    },

    async findAssistant(assistantId: string): Promise<string | null> {
      try {
        const assistant = await openai.beta.assistants.retrieve(assistantId);
        return assistant.id;
      } catch (error) {
        if (error instanceof OpenAI.NotFoundError) {
          return null;
        }
        throw error;
      }
    },

    async createAssistant(spec: AssistantSpec): Promise<string> {
      const assistant = await openai.beta.assistants.create({
        name: spec.name,
        instructions: spec.instructions,
        model: spec.model,
        tools: spec.tools,
      });
      return assistant.id;
    },
  };
}
