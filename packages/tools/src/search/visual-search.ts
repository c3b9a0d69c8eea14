import { z } from 'zod';
import { errorMessage, silentLogger, type Logger } from '@cartpilot/logging';
import type { ToolDefinition } from '../types.js';
import { CARD_LIMIT, renderProductCards } from './render.js';
import type { ShoppingResult, ShoppingSearchClient } from './serpapi.js';

export const VISUAL_SEARCH_TOOL_NAME = 'search_products_visual';
export const MISSING_KEY_MESSAGE = '<div>Error: SERPAPI_KEY missing.</div>';
export const NO_PRODUCTS_MESSAGE = 'No products found.';

const inputSchema = z.object({
  query: z.string().min(1, 'query is required').describe('Product search query'),
});

type VisualSearchInput = z.infer<typeof inputSchema>;

export interface VisualSearchToolOptions {
  /** null when no search credential is configured */
  client: ShoppingSearchClient | null;
  limit?: number;
  logger?: Logger;
}

/**
 * search_products_visual: Google Shopping search rendered as HTML product cards.
 */
export function createVisualSearchTool(options: VisualSearchToolOptions): ToolDefinition<VisualSearchInput, string> {
  const logger = options.logger ?? silentLogger;

  return {
    name: VISUAL_SEARCH_TOOL_NAME,
    description: 'Searches Google Shopping and returns HTML product cards.',
    inputSchema,
    timeoutMs: 35_000,
    execute: async ({ query }, signal) => {
      if (!options.client) return MISSING_KEY_MESSAGE;

      logger.info(`searching for: ${query}`);
      let results: ShoppingResult[];
      try {
        results = await options.client.search(query, signal);
      } catch (err) {
        logger.warn(`search failed: ${errorMessage(err)}`);
        return `Search Error: ${errorMessage(err)}`;
      }

      if (results.length === 0) return NO_PRODUCTS_MESSAGE;
      return renderProductCards(results, { limit: options.limit ?? CARD_LIMIT });
    },
  };
}
