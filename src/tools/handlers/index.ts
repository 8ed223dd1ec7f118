/**
 * Tool handler set registered with the executor
 */

import type { RegisteredTool } from '../types.js';

import { createChatTools } from './chat.js';
import type { ToolHandlerDeps } from './deps.js';
import { createImageTools } from './images.js';
import { createPlaceTools } from './places.js';
import { createReviewTools } from './reviews.js';
import { createWebsiteTools } from './website.js';

export type { ToolHandlerDeps } from './deps.js';
export { formatFieldList } from './places.js';
export type { ReviewSummary } from './reviews.js';

export function createToolHandlers(deps: ToolHandlerDeps): RegisteredTool[] {
  return [
    ...createPlaceTools(deps),
    ...createImageTools(deps),
    ...createChatTools(deps),
    ...createReviewTools(deps),
    ...createWebsiteTools(deps),
  ];
}
