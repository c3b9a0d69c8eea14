import type { ChatCompletionMessageParam, ChatCompletionTool } from 'openai/resources/chat/completions';
import { silentLogger, type Logger } from '@cartpilot/logging';
import type { AgentRole, ModelConfig } from './config.js';
import type { AiProvider, ToolCompletionResponse } from './provider.js';

/**
 * Model router.
 * Resolves agent roles to concrete model IDs and logs usage of every completion.
 */
export class ModelRouter {
  constructor(
    private readonly provider: AiProvider,
    private readonly config: ModelConfig,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * Route a tool-calling completion request to the role's model.
   *
   * Steps:
   * 1. Resolve role to concrete model ID
   * 2. Dispatch to provider.completeWithTools
   * 3. Log model and usage
   * 4. Return full ToolCompletionResponse (including tool_calls if present)
   */
  async completeWithTools(
    messages: ChatCompletionMessageParam[],
    role: AgentRole,
    tools: ChatCompletionTool[],
  ): Promise<ToolCompletionResponse> {
    const modelId = this.config[role];

    const response = await this.provider.completeWithTools({
      messages,
      model: modelId,
      tools,
    });

    const { promptTokens, completionTokens, costUsd } = response.usage;
    this.logger.debug(
      `${role} -> ${response.model}: ${promptTokens}+${completionTokens} tokens, $${costUsd.toFixed(6)}, finish=${response.finishReason}`,
    );

    return response;
  }
}
