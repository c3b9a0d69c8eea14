import { createLogger, isLogLevel, type Logger } from '@cartpilot/logging';

export function cliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const level = env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';
  return createLogger('cli', { level });
}
