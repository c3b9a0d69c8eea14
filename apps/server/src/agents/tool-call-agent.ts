import type {
  ChatCompletionAssistantMessageParam,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { toolDefinitionsToOpenAI, type AgentRole, type ModelRouter } from '@cartpilot/ai';
import { errorMessage, silentLogger, type Logger, type ToolLogSink } from '@cartpilot/logging';
import {
  invokeWithLogging,
  type ToolExecutionContext,
  type ToolRegistry,
  type ToolResult,
} from '@cartpilot/tools';

export const DEFAULT_MAX_TURNS = 10;

export class AgentTurnLimitError extends Error {
  constructor(
    readonly agentName: string,
    readonly maxTurns: number,
  ) {
    super(`Agent "${agentName}" did not finish within ${maxTurns} turns.`);
    this.name = 'AgentTurnLimitError';
  }
}

/** What the HTTP layer needs from an agent. */
export interface Agent {
  readonly name: string;
  run(prompt: string, context: ToolExecutionContext): Promise<string>;
}

export type CompletionRouter = Pick<ModelRouter, 'completeWithTools'>;

export interface ToolCallAgentOptions {
  name: string;
  systemPrompt: string;
  role: AgentRole;
  registry: ToolRegistry;
  router: CompletionRouter;
  toolLog: ToolLogSink;
  maxTurns?: number;
  logger?: Logger;
}

/**
 * Minimal tool-calling loop: ask the model, run the tools it calls, feed the results
 * back, repeat until it answers without tool calls.
 *
 * Message flow per turn:
 *   1. router.completeWithTools with the run's messages
 *   2. push the assistant message (before any tool result, or the provider rejects them)
 *   3. for each tool call: invokeWithLogging with the caller's context, push a tool message
 *   4. no tool calls: return the content
 *
 * The caller's ToolExecutionContext reaches every tool but is never shown to the model.
 */
export class ToolCallAgent implements Agent {
  readonly name: string;
  private readonly tools: ChatCompletionTool[];
  private readonly maxTurns: number;
  private readonly logger: Logger;

  constructor(private readonly options: ToolCallAgentOptions) {
    this.name = options.name;
    this.tools = toolDefinitionsToOpenAI(options.registry);
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws {AgentTurnLimitError} when every turn ended in tool calls
   */
  async run(prompt: string, context: ToolExecutionContext): Promise<string> {
    // Fresh messages per run; nothing carries over between requests
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: this.options.systemPrompt },
      { role: 'user', content: prompt },
    ];

    for (let turn = 1; turn <= this.maxTurns; turn++) {
      const { message, finishReason } = await this.options.router.completeWithTools(
        messages,
        this.options.role,
        this.tools,
      );

      messages.push(toAssistantParam(message));

      const toolCalls = message.tool_calls ?? [];
      if (toolCalls.length > 0) {
        this.logger.info(`turn ${turn}: ${toolCalls.map((call) => call.function.name).join(', ')}`);
        for (const call of toolCalls) {
          const result = await this.invoke(call, context);
          messages.push({ role: 'tool', tool_call_id: call.id, content: toolMessageContent(result) });
        }
        continue;
      }

      switch (finishReason) {
        case 'length':
          this.logger.warn(`turn ${turn}: output length limit reached`);
          return `Stopped after ${turn} turns: the model ran out of output tokens.`;
        case 'content_filter':
          this.logger.warn(`turn ${turn}: response blocked by content filter`);
          return `Stopped after ${turn} turns: the response was blocked by the content filter.`;
        default:
          return message.content ?? '';
      }
    }

    this.logger.warn(`gave up after ${this.maxTurns} turns`);
    throw new AgentTurnLimitError(this.name, this.maxTurns);
  }

  private async invoke(call: ChatCompletionMessageToolCall, context: ToolExecutionContext): Promise<ToolResult> {
    let args: unknown;
    try {
      args = call.function.arguments.trim() === '' ? {} : JSON.parse(call.function.arguments);
    } catch (err) {
      return {
        success: false,
        error: `Invalid JSON arguments for tool "${call.function.name}": ${errorMessage(err)}`,
        durationMs: 0,
      };
    }
    return invokeWithLogging(this.options.registry, this.options.toolLog, call.function.name, args, context);
  }
}

function toAssistantParam(message: ChatCompletionMessage): ChatCompletionAssistantMessageParam {
  const param: ChatCompletionAssistantMessageParam = { role: 'assistant', content: message.content };
  if (message.tool_calls && message.tool_calls.length > 0) {
    param.tool_calls = message.tool_calls;
  }
  return param;
}

/** String outputs go back verbatim (the searcher relays card HTML); anything else as JSON. */
export function toolMessageContent(result: ToolResult): string {
  if (!result.success) {
    return JSON.stringify({ success: false, error: result.error });
  }
  return typeof result.output === 'string' ? result.output : JSON.stringify(result.output ?? null);
}
