export class ToolTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms.`);
    this.name = 'ToolTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race fn(signal) against a timer. When the timer wins the signal is aborted, so the
 * shopping tools stop before their next browser step, and the caller gets a
 * ToolTimeoutError.
 */
export async function withTimeout<T>(
  toolName: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ToolTimeoutError(toolName, timeoutMs));
      }, timeoutMs);
    });

    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
