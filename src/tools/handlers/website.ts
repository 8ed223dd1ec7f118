/**
 * Domain-scoped content search
 */

import { z } from 'zod';

import { defineTool } from '../executor.js';
import type { RegisteredTool } from '../types.js';

import type { ToolHandlerDeps } from './deps.js';

export function createWebsiteTools(deps: ToolHandlerDeps): RegisteredTool[] {
  const searchWebsite = defineTool({
    name: 'search_website',
    schema: z.object({
      domain: z.string().min(1),
      query: z.string().min(1),
    }),
    async handler(args) {
      const results = await deps.contentSearch.searchDomain(
        args.domain,
        args.query
      );
      return { results, count: results.length };
    },
  });

  return [searchWebsite];
}
