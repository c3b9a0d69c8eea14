import type { Logger } from './logger.js';

/**
 * Tool call logging with a strict append-only pattern.
 *
 * - Caller MUST call logToolStart BEFORE executing the tool to obtain the parentId.
 * - Caller MUST pass that parentId to logToolComplete or logToolFailure afterwards.
 * - The started entry is NEVER modified; completions are new entries.
 */

export type ToolLogStatus = 'started' | 'success' | 'failure';

export interface ToolLogEntry {
  id: number;
  /** Set on completion entries: the id of the matching 'started' entry */
  parentId: number | null;
  toolName: string;
  status: ToolLogStatus;
  input?: unknown;
  output?: unknown;
  error?: string;
  durationMs?: number;
  /** Session the call ran under, when the caller supplied one */
  sessionId?: string;
  at: Date;
}

export type NewToolLogEntry = Omit<ToolLogEntry, 'id' | 'at'>;

export interface ToolLogSink {
  /** Append an entry and return its id. */
  append(entry: NewToolLogEntry): number;
}

/**
 * In-memory sink. Keeps the most recent `capacity` entries; ids keep increasing
 * even after older entries are evicted.
 */
export class MemoryToolLog implements ToolLogSink {
  private readonly entries: ToolLogEntry[] = [];
  private nextId = 1;

  constructor(private readonly capacity = 500) {}

  append(entry: NewToolLogEntry): number {
    const id = this.nextId++;
    this.entries.push({ ...entry, id, at: new Date() });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    return id;
  }

  list(): readonly ToolLogEntry[] {
    return this.entries;
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/** Sink that renders each entry as a single logger line. */
export class LoggerToolLog implements ToolLogSink {
  private nextId = 1;

  constructor(private readonly logger: Logger) {}

  append(entry: NewToolLogEntry): number {
    const id = this.nextId++;
    const session = entry.sessionId ? ` session=${entry.sessionId}` : '';
    switch (entry.status) {
      case 'started':
        this.logger.info(`#${id} ${entry.toolName} started${session} input=${safeJson(entry.input)}`);
        break;
      case 'success':
        this.logger.info(
          `#${entry.parentId ?? '?'} ${entry.toolName} ok in ${entry.durationMs ?? 0}ms${session}`,
        );
        this.logger.debug(`#${entry.parentId ?? '?'} output=${safeJson(entry.output)}`);
        break;
      case 'failure':
        this.logger.warn(
          `#${entry.parentId ?? '?'} ${entry.toolName} failed in ${entry.durationMs ?? 0}ms${session}: ${entry.error ?? 'unknown error'}`,
        );
        break;
    }
    return id;
  }
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? 'undefined';
  } catch {
    return '[unserializable]';
  }
}

/** Record a "started" entry BEFORE the tool executes. Returns the entry id. */
export function logToolStart(
  sink: ToolLogSink,
  params: { toolName: string; input: unknown; sessionId?: string },
): number {
  return sink.append({
    parentId: null,
    toolName: params.toolName,
    status: 'started',
    input: params.input,
    sessionId: params.sessionId,
  });
}

/** Record a "success" completion entry referencing the started entry. */
export function logToolComplete(
  sink: ToolLogSink,
  params: { parentId: number; toolName: string; output: unknown; durationMs: number; sessionId?: string },
): number {
  return sink.append({
    parentId: params.parentId,
    toolName: params.toolName,
    status: 'success',
    output: params.output,
    durationMs: params.durationMs,
    sessionId: params.sessionId,
  });
}

/** Record a "failure" completion entry referencing the started entry. */
export function logToolFailure(
  sink: ToolLogSink,
  params: { parentId: number; toolName: string; error: string; durationMs: number; sessionId?: string },
): number {
  return sink.append({
    parentId: params.parentId,
    toolName: params.toolName,
    status: 'failure',
    error: params.error,
    durationMs: params.durationMs,
    sessionId: params.sessionId,
  });
}
