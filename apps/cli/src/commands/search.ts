import { Command } from 'commander';
import type { Logger } from '@cartpilot/logging';
import { createVisualSearchTool, SerpApiShoppingClient, type ShoppingSearchClient } from '@cartpilot/tools';
import { cliLogger } from '../logger.js';
import { parseNonNegativeInt } from '../options.js';

export interface SearchOptions {
  client: ShoppingSearchClient | null;
  limit?: number;
  logger?: Logger;
}

/** Product cards for a query, exactly as the searcher agent would receive them. */
export async function runSearch(query: string, options: SearchOptions): Promise<string> {
  const tool = createVisualSearchTool(options);
  return tool.execute({ query }, new AbortController().signal);
}

export const searchCommand = new Command('search')
  .argument('<query...>', 'What to shop for')
  .option('--limit <n>', 'Maximum number of cards', parseNonNegativeInt)
  .description('Search Google Shopping and print the product card HTML')
  .action(async (words: string[], opts: { limit?: number }) => {
    const key = process.env.SERPAPI_KEY;
    const html = await runSearch(words.join(' '), {
      client: key ? new SerpApiShoppingClient(key) : null,
      limit: opts.limit,
      logger: cliLogger().child('search'),
    });
    console.log(html);
  });
