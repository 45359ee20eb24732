import { describe, it, expect } from 'vitest';
import { locateJson } from '../../src/services/extraction/json-locator.js';

describe('locateJson', () => {
  it('prefers a ```json fence', () => {
    const text = 'Sure!\n```json\n{"items": []}\n```\nLet me know.';
    expect(locateJson(text)).toEqual({ value: { items: [] }, strategy: 'fenced_json' });
  });

  it('falls back to any fenced block', () => {
    expect(locateJson('```\n{"items": []}\n```')).toEqual({ value: { items: [] }, strategy: 'fenced_block' });
  });

  it('parses bare JSON, including top-level arrays', () => {
    expect(locateJson('  [{"name": "milk"}]  ')).toEqual({ value: [{ name: 'milk' }], strategy: 'whole_text' });
  });

  it('reads a bare object through the balanced scan', () => {
    expect(locateJson('{"items": []}')).toEqual({ value: { items: [] }, strategy: 'balanced_object' });
  });

  it('falls through to the balanced scan when a leading bracket is not an array', () => {
    expect(locateJson('[note] {"items": []}')).toEqual({ value: { items: [] }, strategy: 'balanced_object' });
  });

  it('finds a balanced object inside prose, ignoring braces in strings', () => {
    const text = 'Here you go: {"items": [{"name": "a}b"}]} hope that helps';
    expect(locateJson(text)).toEqual({ value: { items: [{ name: 'a}b' }] }, strategy: 'balanced_object' });
  });

  it('skips balanced spans that are not JSON', () => {
    const text = 'Use {curly} braces, then {"items": []}';
    expect(locateJson(text)).toEqual({ value: { items: [] }, strategy: 'balanced_object' });
  });

  it('returns null when nothing parses to an object or array', () => {
    expect(locateJson('no json here')).toBeNull();
    expect(locateJson('42')).toBeNull();
    expect(locateJson('{"items": [')).toBeNull();
  });
});
