import type { ToolLogSink, Logger } from '@cartpilot/logging';
import { createVisualSearchTool, ToolRegistry, type ShoppingSearchClient } from '@cartpilot/tools';
import { ToolCallAgent, type CompletionRouter } from './tool-call-agent.js';

export const SEARCHER_PROMPT = [
  'You are a Visual Shopping Assistant.',
  "If the user asks to find products, call 'search_products_visual'.",
  'Output the HTML EXACTLY as returned by the tool. Do not wrap it in markdown.',
].join('\n');

export interface SearchAgentOptions {
  router: CompletionRouter;
  toolLog: ToolLogSink;
  client: ShoppingSearchClient | null;
  logger?: Logger;
}

/** Turns a shopping request into product-card HTML. */
export function createSearchAgent(options: SearchAgentOptions): ToolCallAgent {
  const logger = options.logger?.child('searcher');
  return new ToolCallAgent({
    name: 'searcher',
    systemPrompt: SEARCHER_PROMPT,
    role: 'searcher',
    registry: new ToolRegistry([createVisualSearchTool({ client: options.client, logger: logger?.child('search') })]),
    router: options.router,
    toolLog: options.toolLog,
    logger,
  });
}
