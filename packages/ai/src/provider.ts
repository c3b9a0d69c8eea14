import type {
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';

/**
 * Generic AI provider interface.
 * Adding a new provider means implementing AiProvider; the router does not change.
 */

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  /** Cost in USD when the provider reports one (OpenRouter's usage.cost), else 0 */
  costUsd: number;
}

/**
 * Request for a tool-calling completion.
 * Uses the OpenAI message param types, which carry tool_call and tool messages.
 */
export interface ToolCompletionRequest {
  messages: ChatCompletionMessageParam[];
  /** Exact OpenRouter model ID (e.g. 'google/gemini-2.0-flash-001') */
  model: string;
  tools: ChatCompletionTool[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * Response from a tool-calling completion.
 * Returns the full ChatCompletionMessage so callers can inspect tool_calls.
 */
export interface ToolCompletionResponse {
  /** Full message object including content and/or tool_calls */
  message: ChatCompletionMessage;
  /** Why the model stopped generating ('tool_calls', 'stop', 'length', ...) */
  finishReason: string;
  /** Actual model used */
  model: string;
  usage: CompletionUsage;
}

export interface AiProvider {
  completeWithTools(req: ToolCompletionRequest): Promise<ToolCompletionResponse>;
}
