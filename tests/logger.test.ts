import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel } from '../src/utils/logger.js';
import { stripAnsi } from './helpers.js';

function capture() {
  const lines: string[] = [];
  return { lines, stream: { write: (chunk: string) => lines.push(stripAnsi(chunk)) } };
}

describe('createLogger', () => {
  it('drops records below the threshold', () => {
    const { lines, stream } = capture();
    const logger = createLogger({ level: 'warn', stream });
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown');
    expect(lines).toEqual(['warn  shown\n', 'error also shown\n']);
  });

  it('appends context as key=value pairs', () => {
    const { lines, stream } = capture();
    const logger = createLogger({ level: 'debug', stream });
    logger.info('Shortened term name', { from: 'long-name', to: 'ln', skipped: undefined, limit: 2 });
    expect(lines).toEqual(['info  Shortened term name from=long-name to=ln limit=2\n']);
  });

  it('writes nothing when silent', () => {
    const { lines, stream } = capture();
    createLogger({ level: 'silent', stream }).error('nope');
    expect(lines).toEqual([]);
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
