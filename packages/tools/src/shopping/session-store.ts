import {
  AUTOMATION_CONTROLLED_FLAG,
  BrowserManager,
  BrowserSession,
  stealthLauncher,
  type BrowserLauncher,
  type Viewport,
} from '@cartpilot/browser';
import { errorMessage, silentLogger, type Logger } from '@cartpilot/logging';

export interface VisibleBrowserOptions {
  launcher?: BrowserLauncher;
  /** Run the shopping browser without a window (CI); defaults to false */
  headless?: boolean;
  /** Per-operation pacing so a watcher can follow along; defaults to 1000ms */
  slowMo?: number;
}

/**
 * BrowserManager for the browser the shopper watches: visible, slowed down, and
 * launched with automation detection disabled.
 */
export function createVisibleBrowserManager(options: VisibleBrowserOptions = {}): BrowserManager {
  return new BrowserManager(options.launcher ?? stealthLauncher, {
    headless: options.headless ?? false,
    slowMo: options.slowMo ?? 1000,
    args: [AUTOMATION_CONTROLLED_FLAG],
  });
}

export const DEFAULT_MAX_SESSIONS = 8;
export const DEFAULT_IDLE_TIMEOUT_MS = 15 * 60_000;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface ShoppingSessionStoreOptions {
  manager: BrowserManager;
  viewport?: Viewport;
  /** Opening a session beyond this closes the least recently used idle one */
  maxSessions?: number;
  /** closeIdle() closes sessions left untouched for this long */
  idleTimeoutMs?: number;
  /** Clock, in epoch milliseconds */
  now?: () => number;
  logger?: Logger;
}

export class SessionTaskCancelledError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session '${sessionId}' task was cancelled before it started`);
    this.name = 'SessionTaskCancelledError';
  }
}

/**
 * Shopping sessions keyed by shopper identity.
 *
 * Every session is one browsing context and one page on the shared visible browser,
 * created on first navigation and reused until it is closed, evicted for being idle,
 * or pushed out by the session limit. A whole buy (navigate, then click) for one
 * shopper runs inside one runExclusive() call, so two buys on the same session never
 * interleave on its page; different shoppers proceed independently.
 */
export class ShoppingSessionStore {
  private readonly sessions = new Map<string, BrowserSession>();
  private readonly opening = new Map<string, Promise<BrowserSession>>();
  /** Tail of each session's queue; always settles, never rejects */
  private readonly gates = new Map<string, Promise<void>>();
  private readonly lastUsed = new Map<string, number>();
  private readonly maxSessions: number;
  private readonly idleTimeoutMs: number;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private readonly logger: Logger;

  constructor(private readonly options: ShoppingSessionStoreOptions) {
    this.logger = options.logger ?? silentLogger;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /** The open session for this id, if any. Never creates one. */
  get(sessionId: string): BrowserSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * The session for this id, creating its context and page on first use.
   * Concurrent first calls share one creation.
   */
  async open(sessionId: string): Promise<BrowserSession> {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.touch(sessionId);
      return existing;
    }

    let pending = this.opening.get(sessionId);
    if (!pending) {
      pending = this.makeRoom()
        .then(() =>
          new BrowserSession({
            manager: this.options.manager,
            sessionId,
            viewport: this.options.viewport,
          }).open(),
        )
        .then((session) => {
          this.sessions.set(sessionId, session);
          this.touch(sessionId);
          this.logger.info(`session '${sessionId}' opened`);
          return session;
        })
        .finally(() => this.opening.delete(sessionId));
      this.opening.set(sessionId, pending);
    }
    return pending;
  }

  /**
   * Run task after every earlier task for the same session has settled.
   *
   * @throws {SessionTaskCancelledError} if signal is aborted by the time the task's turn comes
   */
  async runExclusive<T>(sessionId: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.gates.get(sessionId) ?? Promise.resolve();
    const run = previous.then(() => {
      if (signal?.aborted) throw new SessionTaskCancelledError(sessionId);
      return task();
    });
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.gates.set(sessionId, tail);
    try {
      return await run;
    } finally {
      this.touch(sessionId);
      if (this.gates.get(sessionId) === tail) {
        this.gates.delete(sessionId);
      }
    }
  }

  /**
   * Close one session once its in-flight work is done.
   * @returns false if there was no such session
   */
  async close(sessionId: string): Promise<boolean> {
    return this.closeWhen(sessionId, () => true);
  }

  /** Close every session. Individual close failures are logged, not thrown. */
  async closeAll(): Promise<void> {
    this.stopIdleSweep();
    await this.closeMany(this.ids(), () => true);
  }

  /**
   * Close the sessions that have had no work for idleTimeoutMs.
   * @returns the ids that were closed
   */
  async closeIdle(): Promise<string[]> {
    const isIdle = (id: string): boolean => this.now() - (this.lastUsed.get(id) ?? 0) >= this.idleTimeoutMs;
    const candidates = this.ids().filter((id) => !this.gates.has(id) && isIdle(id));
    const closed = await this.closeMany(candidates, isIdle);
    if (closed.length > 0) {
      this.logger.info(`closed ${closed.length} idle session(s): ${closed.join(', ')}`);
    }
    return closed;
  }

  /** Run closeIdle() every intervalMs until closeAll() or stopIdleSweep(). */
  startIdleSweep(intervalMs = DEFAULT_SWEEP_INTERVAL_MS): void {
    this.stopIdleSweep();
    this.sweepTimer = setInterval(() => void this.closeIdle(), intervalMs);
    this.sweepTimer.unref();
  }

  stopIdleSweep(): void {
    if (this.sweepTimer !== undefined) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  ids(): string[] {
    return Array.from(this.sessions.keys());
  }

  size(): number {
    return this.sessions.size;
  }

  private touch(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.lastUsed.set(sessionId, this.now());
    }
  }

  /** The condition is checked again once the session's queue reaches the close. */
  private async closeWhen(sessionId: string, condition: (id: string) => boolean): Promise<boolean> {
    return this.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !condition(sessionId)) return false;
      this.sessions.delete(sessionId);
      this.lastUsed.delete(sessionId);
      await session.close();
      this.logger.info(`session '${sessionId}' closed`);
      return true;
    });
  }

  private async closeMany(ids: string[], condition: (id: string) => boolean): Promise<string[]> {
    const results = await Promise.allSettled(ids.map((id) => this.closeWhen(id, condition)));
    const closed: string[] = [];
    results.forEach((result, i) => {
      const id = ids[i];
      if (id === undefined) return;
      if (result.status === 'rejected') {
        this.logger.warn(`closing session '${id}' failed: ${errorMessage(result.reason)}`);
      } else if (result.value) {
        closed.push(id);
      }
    });
    return closed;
  }

  /** At the session limit, close the least recently used session that has no work queued. */
  private async makeRoom(): Promise<void> {
    if (this.sessions.size + this.opening.size < this.maxSessions) return;

    let victim: string | undefined;
    let oldest = Infinity;
    for (const id of this.sessions.keys()) {
      const used = this.lastUsed.get(id) ?? 0;
      if (!this.gates.has(id) && used < oldest) {
        victim = id;
        oldest = used;
      }
    }
    if (victim === undefined) {
      this.logger.warn(`session limit of ${this.maxSessions} reached and every session is busy`);
      return;
    }

    this.logger.info(`session limit of ${this.maxSessions} reached, closing '${victim}'`);
    const closed = await this.closeMany([victim], () => true);
    if (closed.length === 0) {
      this.logger.warn(`could not free a slot by closing '${victim}'`);
    }
  }
}
