import type { ToolLogSink, Logger } from '@cartpilot/logging';
import { createShoppingTools, ToolRegistry, type ShoppingToolsOptions } from '@cartpilot/tools';
import { ToolCallAgent, type CompletionRouter } from './tool-call-agent.js';

export const EXECUTOR_PROMPT = [
  'You are an Automation Engineer.',
  "1. Call 'open_browser_to_url' with the provided URL.",
  "2. Call 'click_add_to_cart'.",
  'Report success only after the click is done.',
].join('\n');

export interface ExecutorAgentOptions extends Omit<ShoppingToolsOptions, 'logger'> {
  router: CompletionRouter;
  toolLog: ToolLogSink;
  logger?: Logger;
}

/** Drives the shopper's browser to a product and adds it to the cart. */
export function createExecutorAgent(options: ExecutorAgentOptions): ToolCallAgent {
  const { router, toolLog, logger: parent, ...toolOptions } = options;
  const logger = parent?.child('executor');
  return new ToolCallAgent({
    name: 'executor',
    systemPrompt: EXECUTOR_PROMPT,
    role: 'executor',
    registry: new ToolRegistry(createShoppingTools({ ...toolOptions, logger })),
    router,
    toolLog,
    logger,
  });
}
