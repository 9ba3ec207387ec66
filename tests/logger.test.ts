import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  it('should use the configured level', () => {
    expect(createLogger({ level: 'debug', format: 'json' }).level).toBe('debug');
    expect(createLogger({ level: 'error', format: 'json' }).level).toBe('error');
  });
});
