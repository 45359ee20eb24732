import { describe, it, expect } from 'vitest';
import { logger, createRequestLogger, truncateSnippet } from '../../src/infrastructure/logger.js';

describe('logger', () => {
  it('has service name configured', () => {
    expect(logger.bindings().name).toBe('grocery-extraction');
  });
});

describe('createRequestLogger', () => {
  it('creates child logger with requestId', () => {
    const child = createRequestLogger('req-123');
    expect(child.bindings().requestId).toBe('req-123');
  });

  it('includes orderId and correlationId when provided', () => {
    const bindings = createRequestLogger('req-123', 'order-9', 'corr-7').bindings();
    expect(bindings.requestId).toBe('req-123');
    expect(bindings.orderId).toBe('order-9');
    expect(bindings.correlationId).toBe('corr-7');
  });

  it('omits orderId and correlationId when not provided', () => {
    const bindings = createRequestLogger('req-123').bindings();
    expect(bindings.orderId).toBeUndefined();
    expect(bindings.correlationId).toBeUndefined();
  });
});

describe('truncateSnippet', () => {
  it('keeps short values intact', () => {
    expect(truncateSnippet('jailbreak')).toBe('jailbreak');
  });

  it('cuts values to 50 characters by default', () => {
    expect(truncateSnippet('a'.repeat(80))).toBe('a'.repeat(50));
  });
});
