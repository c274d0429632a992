import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('accepts the levels the config accepts', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to info for a missing or unknown level', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
    expect(resolveLogLevel('loud')).toBe('info');
  });
});
