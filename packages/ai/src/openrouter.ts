import OpenAI from 'openai';
import type { CompletionUsage as OpenAiUsage } from 'openai/resources/completions';
import type { AiProvider, CompletionUsage, ToolCompletionRequest, ToolCompletionResponse } from './provider.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface OpenRouterOptions {
  baseURL?: string;
  /** Sent as X-Title so requests are attributed on the OpenRouter dashboard */
  appTitle?: string;
}

/**
 * OpenRouter provider implementation.
 * Uses the openai SDK pointed at https://openrouter.ai/api/v1.
 * OpenRouter handles provider-level failover internally for each model ID.
 */
export class OpenRouterProvider implements AiProvider {
  private readonly client: OpenAI;

  constructor(apiKey: string, options: OpenRouterOptions = {}) {
    this.client = new OpenAI({
      baseURL: options.baseURL ?? OPENROUTER_BASE_URL,
      apiKey,
      defaultHeaders: {
        'X-Title': options.appTitle ?? 'CartPilot',
      },
    });
  }

  /**
   * Tool-calling completion.
   * content=null is valid for tool_calls responses; do NOT throw on null content.
   */
  async completeWithTools(req: ToolCompletionRequest): Promise<ToolCompletionResponse> {
    const response = await this.client.chat.completions.create({
      model: req.model,
      messages: req.messages,
      tools: req.tools,
      tool_choice: 'auto',
      stream: false,
      temperature: req.temperature,
      max_tokens: req.maxTokens,
    });

    const choice = response.choices[0];
    if (!choice) {
      throw new Error('OpenRouter returned empty response for tool-calling request');
    }

    return {
      message: choice.message,
      finishReason: choice.finish_reason ?? 'stop',
      model: response.model,
      usage: toUsage(response.usage),
    };
  }
}

export function toUsage(usage: OpenAiUsage | undefined): CompletionUsage {
  if (!usage) {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0, costUsd: 0 };
  }
  // OpenRouter adds a `cost` field not in the OpenAI SDK types
  const costUsd = 'cost' in usage && typeof usage.cost === 'number' ? usage.cost : 0;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
    costUsd,
  };
}
