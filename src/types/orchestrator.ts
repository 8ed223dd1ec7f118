/**
 * Orchestrator Domain Types
 *
 * SCOPE: Assistant threads and runs, polling policy, turn outcome
 */

import type { ToolFunctionDefinition, ToolInvocation } from './tool.js';

// ─────────────────────────────────────────────────────────────
// ASSISTANT SERVICE TYPES
// ─────────────────────────────────────────────────────────────

/**
 * Run lifecycle as reported by the assistant service
 */
export type RunStatus =
  | 'queued'
  | 'in_progress'
  | 'requires_action'
  | 'cancelling'
  | 'cancelled'
  | 'failed'
  | 'completed'
  | 'incomplete'
  | 'expired';

/**
 * States after which a run never progresses again without a reply
 */
export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = [
  'failed',
  'expired',
  'cancelled',
  'incomplete',
];

/**
 * Pending tool call on a run in `requires_action`
 */
export interface RunToolCall {
  id: string;
  name: string;
  /** JSON string as produced by the model */
  arguments: string;
}

/**
 * Snapshot of a run
 */
export interface AssistantRun {
  id: string;
  status: RunStatus;
  /** Present only when status is requires_action */
  toolCalls: RunToolCall[];
  lastError: string | null;
}

/**
 * Output for one tool call, submitted back to the run
 */
export interface ToolOutput {
  toolCallId: string;
  /** JSON string */
  output: string;
}

/**
 * Parameters for creating or reusing the assistant
 */
export interface AssistantSpec {
  name: string;
  instructions: string;
  model: string;
  tools: ToolFunctionDefinition[];
}

/**
 * Assistant service contract (threads, messages, runs)
 */
export interface AssistantClient {
  createThread(): Promise<string>;

  addUserMessage(threadId: string, content: string): Promise<void>;

  createRun(threadId: string, assistantId: string): Promise<AssistantRun>;

  retrieveRun(threadId: string, runId: string): Promise<AssistantRun>;

  submitToolOutputs(
    threadId: string,
    runId: string,
    outputs: ToolOutput[]
  ): Promise<AssistantRun>;

  cancelRun(threadId: string, runId: string): Promise<void>;

  /**
   * Text of the newest assistant-role message on the thread, or null
   */
  latestAssistantMessage(threadId: string): Promise<string | null>;

  /**
   * Returns the id if the assistant exists, null otherwise
   */
  findAssistant(assistantId: string): Promise<string | null>;

  createAssistant(spec: AssistantSpec): Promise<string>;
}

// ─────────────────────────────────────────────────────────────
// POLLING
// ─────────────────────────────────────────────────────────────

/**
 * Polling policy for run status
 */
export interface PollingPolicy {
  /** Delay between two status polls (ms) */
  intervalMs: number;

  /** Polls allowed before the run is abandoned */
  maxAttempts: number;
}

/**
 * How a driven run ended
 */
export type RunOutcome =
  | { type: 'completed'; reply: string | null; toolCalls: ToolInvocation[] }
  | { type: 'terminal'; status: RunStatus; toolCalls: ToolInvocation[] }
  | { type: 'timeout'; status: RunStatus; toolCalls: ToolInvocation[] };

/**
 * Called once per tool call before the tool runs
 */
export type ToolCallNotifier = (chatId: string, toolName: string) => void;
