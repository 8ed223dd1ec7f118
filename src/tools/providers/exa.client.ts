/**
 * Domain-scoped content search client (Exa)
 */

import { z } from 'zod';

import { requestJson } from './http.js';

const EXA_BASE_URL = 'https://api.exa.ai';

export interface ExaClientConfig {
  apiKey: string;
  baseUrl?: string;
}

const searchResponseSchema = z.object({
  results: z
    .array(
      z
        .object({
          url: z.string().optional(),
          text: z.string().nullable().optional(),
        })
        .passthrough()
    )
    .optional(),
});

export interface ContentSearchClient {
  /** Text content of the pages in `domain` matching `query` */
  searchDomain(domain: string, query: string): Promise<string[]>;
}

export function createExaClient(config: ExaClientConfig): ContentSearchClient {
  const baseUrl = config.baseUrl ?? EXA_BASE_URL;

  return {
    async searchDomain(domain: string, query: string): Promise<string[]> {
      const raw = await requestJson('Content search', `${baseUrl}/search`, {
        method: 'POST',
        headers: { 'x-api-key': config.apiKey },
        body: {
          query,
          type: 'auto',
          includeDomains: [domain],
          contents: { text: true },
        },
      });
      const parsed = searchResponseSchema.parse(raw);

      const texts: string[] = [];
      for (const item of parsed.results ?? []) {
        if (item.text) {
          texts.push(item.text);
        }
      }
      return texts;
    },
  };
}
