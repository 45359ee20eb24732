import { describe, it, expect } from 'vitest';
import { OutputGuardrails } from '../../src/services/guardrails/index.js';

describe('OutputGuardrails', () => {
  const guardrails = new OutputGuardrails();

  it('blocks an empty response', () => {
    const result = guardrails.evaluate('  ');
    expect(result.isAllowed).toBe(false);
    expect(result.violations[0]?.message).toBe('Empty response from model');
  });

  it('blocks a response without JSON', () => {
    const result = guardrails.evaluate('I could not find any groceries.');
    expect(result.isAllowed).toBe(false);
    expect(result.violations).toEqual([
      { type: 'malformed_input', severity: 'HIGH', message: 'No valid JSON found in response', action: 'BLOCK' },
    ]);
  });

  it('skips JSON validation for text responses', () => {
    expect(guardrails.evaluate('OK', 'text')).toEqual({
      isAllowed: true,
      violations: [],
      originalInput: 'OK',
      sanitizedInput: 'OK',
    });
  });

  it('skips JSON validation when disabled', () => {
    const lenient = new OutputGuardrails({ validateJson: false });
    expect(lenient.evaluate('plain prose').isAllowed).toBe(true);
  });

  it('logs low-confidence and malformed items without blocking', () => {
    const response = JSON.stringify({
      items: [{ name: 'milk', confidence: 0.9 }, { name: 'eggs', confidence: 0.3 }, 5, { name: 'bread' }],
    });
    const result = guardrails.evaluate(response);

    expect(result.isAllowed).toBe(true);
    expect(result.violations.map((v) => [v.message, v.action])).toEqual([
      ['Low confidence item: eggs (0.3)', 'LOG'],
      ['Item 2 is not a valid object', 'LOG'],
      ['Low confidence item: bread (0)', 'LOG'],
    ]);
  });

  it('flags responses with too many items', () => {
    const strict = new OutputGuardrails({ maxItems: 1 });
    const response = '```json\n{"items": [{"name": "milk", "confidence": 0.9}, {"name": "eggs", "confidence": 0.8}]}\n```';

    expect(strict.evaluate(response).violations).toEqual([
      { type: 'malformed_input', severity: 'MEDIUM', message: 'Response contains too many items: 2', action: 'LOG' },
    ]);
  });

  it('uses the configured confidence threshold', () => {
    const strict = new OutputGuardrails({ confidenceThreshold: 0.95 });
    const result = strict.evaluate('{"items": [{"name": "milk", "confidence": 0.9}]}');
    expect(result.violations[0]?.message).toBe('Low confidence item: milk (0.9)');
  });
});
