/**
 * Tool Dispatch exports
 *
 * Tools run on behalf of the assistant. Their results, including errors,
 * are fed back to the run as JSON payloads.
 */

export type {
  ToolExecutionContext,
  ToolHandler,
  RegisteredTool,
  ToolRegistry,
  ToolExecutor,
  ToolSpec,
} from './types.js';

export {
  defineTool,
  createToolRegistry,
  createToolExecutor,
  toToolPayload,
} from './executor.js';
export type { CreateToolExecutorDeps } from './executor.js';

export { getToolDefinitions, getPlaceFieldConfig } from './definitions.js';
export type { PlaceFieldConfig } from './definitions.js';

export { TOOL_LABELS, FALLBACK_TOOL_LABEL, toolLabel } from './labels.js';

export { createToolHandlers, formatFieldList } from './handlers/index.js';
export type { ToolHandlerDeps, ReviewSummary } from './handlers/index.js';
