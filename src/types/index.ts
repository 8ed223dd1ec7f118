/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure } from './result.js';
export type {
  GeoLocation,
  MessageRole,
  ChatMessage,
  ChatRecord,
  ChatField,
} from './chat.js';
export type {
  PlacePhoto,
  LocalizedText,
  Place,
  PlaceSummary,
  ImageDescriptor,
  ImageOutcome,
  DescribedPhoto,
} from './place.js';
export type {
  ToolName,
  ToolErrorPayload,
  ToolInvocation,
  ToolFunctionDefinition,
} from './tool.js';
export { TOOL_NAMES } from './tool.js';
export type {
  RunStatus,
  RunToolCall,
  AssistantRun,
  ToolOutput,
  AssistantSpec,
  AssistantClient,
  PollingPolicy,
  RunOutcome,
  ToolCallNotifier,
} from './orchestrator.js';
export { TERMINAL_RUN_STATUSES } from './orchestrator.js';
export type {
  ClientEventName,
  ServerEventMap,
  ServerEventName,
  EventEnvelope,
  ConnectionTransport,
} from './events.js';
