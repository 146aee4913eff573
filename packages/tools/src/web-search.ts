import type { Secrets, WebSearchConfig } from '@parley/core';
import { z } from 'zod';
import type { LocalTool } from './types.js';

export const WEB_SEARCH_TOOL_NAME = 'web_search';

const TavilyResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      content: z.string().default(''),
    }),
  ),
});

export type WebSearchResult = z.infer<typeof TavilyResponseSchema>['results'][number];

export interface WebSearchToolOptions {
  endpoint: string;
  apiKey: string;
  maxResults: number;
}

/** Web search backed by the Tavily search API. */
export function createWebSearchTool(options: WebSearchToolOptions): LocalTool {
  return {
    definition: {
      name: WEB_SEARCH_TOOL_NAME,
      description: 'Search the web for current events and recent facts. Returns titles, URLs and snippets.',
      inputSchema: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'What to search for' },
        },
        required: ['query'],
      },
    },
    handler: async (args, ctx): Promise<WebSearchResult[]> => {
      const query = args['query'];
      if (typeof query !== 'string' || query.trim() === '') {
        throw new Error('query must be a non-empty string');
      }

      const res = await fetch(options.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ api_key: options.apiKey, query, max_results: options.maxResults }),
        signal: ctx.signal,
      });
      if (!res.ok) {
        throw new Error(`search request failed with HTTP ${res.status}`);
      }

      const parsed = TavilyResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error('search response was malformed');
      }
      return parsed.data.results;
    },
  };
}

/** Local tools enabled by configuration. web_search is left out when its key is unset. */
export function createLocalTools(config: WebSearchConfig, secrets: Pick<Secrets, 'webSearchApiKey'>): LocalTool[] {
  const tools: LocalTool[] = [];
  if (secrets.webSearchApiKey) {
    tools.push(
      createWebSearchTool({
        endpoint: config.endpoint,
        apiKey: secrets.webSearchApiKey,
        maxResults: config.maxResults,
      }),
    );
  }
  return tools;
}
