import {
  errorMessage,
  logToolComplete,
  logToolFailure,
  logToolStart,
  type ToolLogSink,
} from '@cartpilot/logging';
import type { ToolRegistry } from './registry.js';
import type { ToolExecutionContext, ToolResult } from './types.js';
import { withTimeout, ToolTimeoutError } from './timeout.js';

/**
 * invokeWithLogging: the single entry point for all tool execution.
 *
 * Guarantees:
 * - the started entry is logged BEFORE execute()
 * - the output is logged and returned in full
 * - the caller receives a ToolResult and this function never throws
 *
 * @param registry          - ToolRegistry to look up the tool
 * @param log               - Sink receiving the append-only tool log
 * @param toolName          - Name of the tool to invoke
 * @param rawInput - Unvalidated input (validated via tool.inputSchema)
 * @param context  - Caller metadata (session id), hidden from the LLM
 */
export async function invokeWithLogging(
  registry: ToolRegistry,
  log: ToolLogSink,
  toolName: string,
  rawInput: unknown,
  context?: ToolExecutionContext,
): Promise<ToolResult<unknown>> {
  const startTime = Date.now();

  const tool = registry.get(toolName);
  if (!tool) {
    return {
      success: false,
      error: `Tool "${toolName}" is not registered. Available tools: ${registry.list().map((t) => t.name).join(', ')}`,
      durationMs: Date.now() - startTime,
    };
  }

  const parsed = tool.inputSchema.safeParse(rawInput);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return {
      success: false,
      error: `Input validation failed for tool "${toolName}": ${issues}`,
      durationMs: Date.now() - startTime,
    };
  }
  const input = parsed.data;
  const sessionId = context?.sessionId;

  // A broken log sink must not stop the tool; -1 marks "no started entry".
  let parentId: number;
  try {
    parentId = logToolStart(log, { toolName, input, sessionId });
  } catch (err) {
    process.stderr.write(`[invokeWithLogging] logToolStart failed: ${errorMessage(err)}\n`);
    parentId = -1;
  }

  const execStart = Date.now();

  let rawOutput: unknown;
  try {
    rawOutput = await withTimeout(
      tool.name,
      (signal) => tool.execute(input, signal, context),
      tool.timeoutMs,
    );
  } catch (err) {
    const durationMs = Date.now() - execStart;
    const message =
      err instanceof ToolTimeoutError
        ? `Tool "${toolName}" timed out after ${err.timeoutMs}ms`
        : errorMessage(err);

    if (parentId !== -1) {
      try {
        logToolFailure(log, { parentId, toolName, error: message, durationMs, sessionId });
      } catch (logErr) {
        process.stderr.write(`[invokeWithLogging] logToolFailure failed: ${errorMessage(logErr)}\n`);
      }
    }

    return { success: false, error: message, durationMs: Date.now() - startTime };
  }

  const durationMs = Date.now() - execStart;
  if (parentId !== -1) {
    try {
      logToolComplete(log, { parentId, toolName, output: rawOutput, durationMs, sessionId });
    } catch (logErr) {
      process.stderr.write(`[invokeWithLogging] logToolComplete failed: ${errorMessage(logErr)}\n`);
    }
  }

  return { success: true, output: rawOutput, durationMs: Date.now() - startTime };
}
