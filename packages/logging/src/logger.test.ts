import { describe, it, expect } from 'vitest';
import { createLogger, errorMessage, isLogLevel } from './logger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => void lines.push(line) };
}

describe('createLogger', () => {
  it('writes scoped lines at info and above by default', () => {
    const out = capture();
    const logger = createLogger('navigator', { write: out.write });

    logger.debug('hidden');
    logger.info('loading page');
    logger.warn('slow response');
    logger.error('gave up');

    expect(out.lines).toEqual([
      '[navigator] loading page\n',
      '[navigator] warn: slow response\n',
      '[navigator] error: gave up\n',
    ]);
  });

  it('honors the debug level', () => {
    const out = capture();
    createLogger('resolver', { level: 'debug', write: out.write }).debug('fast path miss');
    expect(out.lines).toEqual(['[resolver] fast path miss\n']);
  });

  it('child loggers extend the scope and keep the level', () => {
    const out = capture();
    const child = createLogger('server', { level: 'warn', write: out.write }).child('chat');

    child.info('dropped');
    child.warn('kept');

    expect(child.scope).toBe('server:chat');
    expect(out.lines).toEqual(['[server:chat] warn: kept\n']);
  });
});

describe('helpers', () => {
  it('isLogLevel accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('errorMessage unwraps Error instances and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
