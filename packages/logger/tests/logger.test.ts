import { describe, expect, it } from 'vitest';
import { createLogger, resolveLogLevel } from '../src/index.js';

describe('resolveLogLevel', () => {
  it('accepts known levels regardless of case', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
  });

  it('falls back when the level is unknown or missing', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel(undefined, 'warn')).toBe('warn');
  });
});

describe('createLogger', () => {
  it('lets callers override the level', () => {
    const logger = createLogger({ name: 'test', level: 'error' });
    expect(logger.level).toBe('error');
    expect(logger.child({ scope: 'child' }).level).toBe('error');
  });
});
