/**
 * Tool Executor
 *
 * Routes tool calls to registered handlers. Every outcome is returned as a
 * ToolInvocation: validation failures, unknown names and collaborator
 * exceptions become `failure` invocations, never thrown errors, so a failing
 * tool cannot abort the run.
 */

import { nanoid } from 'nanoid';
import type { z } from 'zod';

import { ValidationError, errorMessage } from '@/lib/errors.js';
import type { Logger } from '@/lib/logger.js';
import type { ToolErrorPayload, ToolInvocation } from '@/types/index.js';

import type {
  RegisteredTool,
  ToolExecutor,
  ToolRegistry,
  ToolSpec,
} from './types.js';

/**
 * Format zod issues as `path: message` pairs
 */
function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}

/**
 * Wrap a tool spec so its arguments are validated before the handler runs
 */
export function defineTool<TSchema extends z.ZodTypeAny>(
  spec: ToolSpec<TSchema>
): RegisteredTool {
  return {
    name: spec.name,
    async run(args, context) {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        throw new ValidationError(
          `Invalid arguments for ${spec.name}: ${formatIssues(parsed.error)}`
        );
      }
      return spec.handler(parsed.data, context);
    },
  };
}

/**
 * Build a registration table from tools
 */
export function createToolRegistry(tools: RegisteredTool[]): ToolRegistry {
  const registry: ToolRegistry = new Map();
  for (const tool of tools) {
    if (registry.has(tool.name)) {
      throw new Error(`Tool registered twice: ${tool.name}`);
    }
    registry.set(tool.name, tool);
  }
  return registry;
}

/**
 * Payload fed back to the assistant for an invocation
 */
export function toToolPayload(invocation: ToolInvocation): unknown {
  if (invocation.status === 'failure') {
    const payload: ToolErrorPayload = {
      error: invocation.errorMessage ?? 'Tool execution failed',
    };
    return payload;
  }
  return invocation.output ?? null;
}

export interface CreateToolExecutorDeps {
  registry: ToolRegistry;
  logger: Logger;
}

/**
 * Create a tool executor instance
 */
export function createToolExecutor(deps: CreateToolExecutorDeps): ToolExecutor {
  const { registry, logger } = deps;

  return {
    async invoke(
      toolName: string,
      args: Record<string, unknown>,
      chatId: string
    ): Promise<ToolInvocation> {
      const startTime = Date.now();
      const requestId = nanoid();
      const toolLogger = logger.child({ tool: toolName, chatId, requestId });

      const tool = registry.get(toolName);
      if (!tool) {
        toolLogger.error('Unknown tool');
        return {
          name: toolName,
          arguments: args,
          status: 'failure',
          errorMessage: `Function '${toolName}' not recognized.`,
          durationMs: Date.now() - startTime,
        };
      }

      toolLogger.info({ args }, 'Executing tool');

      try {
        const output = await tool.run(args, {
          chatId,
          requestId,
          logger: toolLogger,
        });
        const durationMs = Date.now() - startTime;
        toolLogger.debug({ durationMs }, 'Tool completed');

        return {
          name: toolName,
          arguments: args,
          status: 'success',
          output,
          durationMs,
        };
      } catch (error) {
        const message = errorMessage(error);
        if (error instanceof ValidationError) {
          toolLogger.warn({ error: message }, 'Tool arguments rejected');
        } else {
          toolLogger.error({ err: error }, 'Tool failed');
        }

        return {
          name: toolName,
          arguments: args,
          status: 'failure',
          errorMessage: message,
          durationMs: Date.now() - startTime,
        };
      }
    },

    names(): string[] {
      return [...registry.keys()];
    },
  };
}
