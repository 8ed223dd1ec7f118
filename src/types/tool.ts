/**
 * Tool Domain Types
 *
 * SCOPE: Tools the assistant may call and the shape of one invocation.
 * The function-calling schema itself is configuration
 * (src/tools/data/tool-definitions.json).
 */

/**
 * Names registered with the assistant
 */
export const TOOL_NAMES = [
  'search_google_maps',
  'describe_place',
  'describe_images',
  'extract_image_info',
  'fetch_chat_data',
  'get_stored_places_for_chat',
  'get_yelp_reviews',
  'get_user_location',
  'search_website',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Structured error returned to the assistant in place of a tool result
 */
export interface ToolErrorPayload {
  error: string;
}

/**
 * One tool invocation within a turn. Never persisted, only logged.
 */
export interface ToolInvocation {
  name: string;
  arguments: Record<string, unknown>;
  status: 'success' | 'failure';
  /** Handler output when status is success */
  output?: unknown;
  /** Error text when status is failure */
  errorMessage?: string;
  durationMs: number;
}

/**
 * Function definition in the assistant's function-calling format
 */
export interface ToolFunctionDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}
