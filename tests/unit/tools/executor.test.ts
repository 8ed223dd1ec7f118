/**
 * Tool Executor Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';

import { UpstreamError } from '@/lib/errors.js';
import { createNoopLogger } from '@/lib/logger.js';
import {
  createToolExecutor,
  createToolRegistry,
  defineTool,
  toToolPayload,
} from '@/tools/executor.js';
import type { ToolExecutionContext, ToolExecutor } from '@/tools/types.js';

describe('Tool Executor', () => {
  const echoHandler = vi.fn(
    async (args: { query: string }, _context: ToolExecutionContext) => ({
      echoed: args.query,
    })
  );
  let executor: ToolExecutor;

  beforeEach(() => {
    echoHandler.mockClear();
    const registry = createToolRegistry([
      defineTool({
        name: 'echo',
        schema: z.object({ query: z.string() }),
        handler: echoHandler,
      }),
      defineTool({
        name: 'flaky',
        schema: z.object({}),
        handler: async () => {
          throw new UpstreamError('Place search request failed with status 503', 503);
        },
      }),
    ]);
    executor = createToolExecutor({ registry, logger: createNoopLogger() });
  });

  it('should dispatch validated arguments to the handler', async () => {
    const invocation = await executor.invoke('echo', { query: 'ramen' }, 'chat-1');

    expect(invocation.status).toBe('success');
    expect(invocation.output).toEqual({ echoed: 'ramen' });
    expect(echoHandler).toHaveBeenCalledTimes(1);
    expect(echoHandler.mock.calls[0]?.[1].chatId).toBe('chat-1');
  });

  it('should reject invalid arguments without calling the handler', async () => {
    const invocation = await executor.invoke('echo', {}, 'chat-1');

    expect(toToolPayload(invocation)).toEqual({
      error: 'Invalid arguments for echo: query: Required',
    });
    expect(echoHandler).not.toHaveBeenCalled();
  });

  it('should report unknown tools', async () => {
    const invocation = await executor.invoke('teleport', {}, 'chat-1');

    expect(invocation.status).toBe('failure');
    expect(toToolPayload(invocation)).toEqual({
      error: "Function 'teleport' not recognized.",
    });
  });

  it('should turn handler exceptions into error payloads', async () => {
    const invocation = await executor.invoke('flaky', {}, 'chat-1');

    expect(toToolPayload(invocation)).toEqual({
      error: 'Place search request failed with status 503',
    });
  });

  it('should list registered names', () => {
    expect(executor.names()).toEqual(['echo', 'flaky']);
  });

  it('should refuse duplicate registrations', () => {
    const tool = defineTool({
      name: 'echo',
      schema: z.object({}),
      handler: async () => null,
    });

    expect(() => createToolRegistry([tool, tool])).toThrow(
      'Tool registered twice: echo'
    );
  });

  it('should send null for a successful tool without output', () => {
    expect(
      toToolPayload({
        name: 'noop',
        arguments: {},
        status: 'success',
        durationMs: 1,
      })
    ).toBeNull();
  });
});
