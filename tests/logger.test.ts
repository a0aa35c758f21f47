import { describe, it, expect } from 'vitest';
import { scrubSensitive } from '../server/logger';

describe('scrubSensitive', () => {
  it('should redact sensitive keys at any depth', () => {
    expect(scrubSensitive({
      apiKey: 'test-secret',
      model: 'model-a',
      nested: { authToken: 'test-token', count: 2 },
      list: [{ password: 'test-password' }],
    })).toEqual({
      apiKey: '[REDACTED]',
      model: 'model-a',
      nested: { authToken: '[REDACTED]', count: 2 },
      list: [{ password: '[REDACTED]' }],
    });
  });

  it('should reduce errors to name and message', () => {
    expect(scrubSensitive({ error: new TypeError('bad input') })).toEqual({
      error: { name: 'TypeError', message: 'bad input' },
    });
  });

  it('should break reference cycles', () => {
    const node: Record<string, unknown> = { name: 'root' };
    node.self = node;

    expect(scrubSensitive(node)).toEqual({ name: 'root', self: '[Circular]' });
  });

  it('should pass primitives through', () => {
    expect(scrubSensitive('text')).toBe('text');
    expect(scrubSensitive(42)).toBe(42);
    expect(scrubSensitive(null)).toBeNull();
  });
});
