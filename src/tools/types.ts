/**
 * Tool Dispatch Types
 *
 * SCOPE: Internal types for the tool registration table
 */

import type { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import type { ToolInvocation } from '@/types/index.js';

/**
 * Context passed to tool handlers during execution
 */
export interface ToolExecutionContext {
  chatId: string;
  requestId: string;
  logger: Logger;
}

/**
 * Tool handler: receives arguments already validated by the tool's schema
 */
export type ToolHandler<TArgs> = (
  args: TArgs,
  context: ToolExecutionContext
) => Promise<unknown>;

/**
 * Entry of the registration table. `run` validates then dispatches.
 */
export interface RegisteredTool {
  name: string;
  run(
    args: Record<string, unknown>,
    context: ToolExecutionContext
  ): Promise<unknown>;
}

/**
 * Registration table mapping tool names to handlers
 */
export type ToolRegistry = Map<string, RegisteredTool>;

/**
 * Tool dispatcher used by the orchestrator
 */
export interface ToolExecutor {
  invoke(
    toolName: string,
    args: Record<string, unknown>,
    chatId: string
  ): Promise<ToolInvocation>;

  /** Registered tool names */
  names(): string[];
}

/**
 * Shape of a tool before registration
 */
export interface ToolSpec<TSchema extends z.ZodTypeAny> {
  name: string;
  schema: TSchema;
  handler: ToolHandler<z.output<TSchema>>;
}
