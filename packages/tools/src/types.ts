import { z } from 'zod';

/**
 * Per-call metadata supplied by the caller (HTTP route, CLI), never by the LLM.
 * Not part of any tool's input schema.
 */
export interface ToolExecutionContext {
  /** Shopper identity; selects the browser session the tool acts on */
  sessionId: string;
}

/** Session used when a caller does not identify itself (single-user demo) */
export const DEFAULT_SESSION_ID = 'default';

/**
 * ToolDefinition<TInput, TOutput>: the contract every tool must implement.
 *
 * @template TInput  - The validated input type (inferred from inputSchema)
 * @template TOutput - The raw output type returned by execute()
 *
 * execute() receives an AbortSignal so long-running work can stop early when the
 * invocation times out.
 */
export interface ToolDefinition<TInput = unknown, TOutput = unknown> {
  name: string;
  description: string;
  // The third param (schema input) is unknown because raw, unvalidated input is what
  // gets parsed. This lets ZodDefault fields (input T | undefined) fit.
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  /** Milliseconds before the invocation is abandoned and its signal aborted */
  timeoutMs: number;
  execute(input: TInput, signal: AbortSignal, context?: ToolExecutionContext): Promise<TOutput>;
}

/**
 * ToolResult<T>: the structured result returned to the caller after invocation.
 */
export interface ToolResult<T = unknown> {
  success: boolean;
  output?: T;
  error?: string;
  durationMs: number;
}
