import { describe, it, expect } from 'vitest';
import { createPoolLogger } from '../lib/logger.js';

describe('createPoolLogger', () => {
  it('defaults to the info level', () => {
    expect(createPoolLogger().level).toBe(3);
  });

  it('maps level names to consola levels', () => {
    expect(createPoolLogger({ level: 'debug' }).level).toBe(4);
    expect(createPoolLogger({ level: 'error' }).level).toBe(1);
  });

  it('tags output with pool', () => {
    expect(createPoolLogger().options.defaults.tag).toBe('pool');
  });
});
