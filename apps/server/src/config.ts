import { z } from 'zod';
import { loadModelConfig, type ModelConfig } from '@cartpilot/ai';
import { isLogLevel, type LogLevel } from '@cartpilot/logging';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'must be true or false' }) })
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string({ required_error: 'is required' }),
  SERPAPI_KEY: z.string().optional(),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  BROWSER_HEADLESS: booleanFlag.default('false'),
  BROWSER_SLOW_MO_MS: z.coerce.number().int().min(0).default(1000),
  CART_SETTLE_MS: z.coerce.number().int().min(0).default(5000),
  MAX_SESSIONS: z.coerce.number().int().min(1).default(8),
  SESSION_IDLE_MINUTES: z.coerce.number().min(0).default(15),
  FRONTEND_DIR: z.string().default('frontend'),
  LOG_LEVEL: z.string().default('info').refine(isLogLevel, 'must be one of debug, info, warn, error'),
});

export interface ServerConfig {
  openRouterApiKey: string;
  /** Unset means product search answers with a missing-key notice */
  serpApiKey?: string;
  host: string;
  port: number;
  browser: {
    headless: boolean;
    slowMoMs: number;
  };
  cartSettleMs: number;
  sessions: {
    maxSessions: number;
    /** 0 keeps sessions until /end_session or shutdown */
    idleTimeoutMs: number;
  };
  /** Directory holding index.html; relative paths resolve against the server package */
  frontendDir: string;
  logLevel: LogLevel;
  models: ModelConfig;
}

/**
 * Parse the environment into a ServerConfig. Empty variables count as unset.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    openRouterApiKey: vars.OPENROUTER_API_KEY,
    serpApiKey: vars.SERPAPI_KEY,
    host: vars.HOST,
    port: vars.PORT,
    browser: {
      headless: vars.BROWSER_HEADLESS,
      slowMoMs: vars.BROWSER_SLOW_MO_MS,
    },
    cartSettleMs: vars.CART_SETTLE_MS,
    sessions: {
      maxSessions: vars.MAX_SESSIONS,
      idleTimeoutMs: vars.SESSION_IDLE_MINUTES * 60_000,
    },
    frontendDir: vars.FRONTEND_DIR,
    logLevel: vars.LOG_LEVEL,
    models: loadModelConfig(present),
  };
}
