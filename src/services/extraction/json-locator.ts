import { isRecord } from '../../domain/types.js';

export type JsonLocatorStrategy = 'fenced_json' | 'fenced_block' | 'balanced_object' | 'whole_text';

export interface LocatedJson {
  value: Record<string, unknown> | unknown[];
  strategy: JsonLocatorStrategy;
}

const FENCED_JSON = /```json\s*([\s\S]*?)```/i;
const FENCED_BLOCK = /```[\w-]*\s*([\s\S]*?)```/;

function parseStructured(candidate: string): Record<string, unknown> | unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    if (Array.isArray(parsed)) return parsed;
    if (isRecord(parsed)) return parsed;
    return null;
  } catch {
    return null;
  }
}

/** Index of the brace closing the object opened at `start`, skipping braces inside strings. */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function firstBalancedObject(text: string): Record<string, unknown> | unknown[] | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = findClosingBrace(text, start);
    if (end === -1) return null;
    const parsed = parseStructured(text.slice(start, end + 1));
    if (parsed) return parsed;
  }
  return null;
}

/**
 * Finds the JSON payload in free-form model output. Tries a ```json fence,
 * any fence, a bare top-level array, the first balanced `{...}` span that
 * parses, then the whole trimmed text. Only objects and arrays count as a
 * payload.
 */
export function locateJson(text: string): LocatedJson | null {
  const fencedJson = FENCED_JSON.exec(text);
  if (fencedJson) {
    const value = parseStructured(fencedJson[1].trim());
    if (value) return { value, strategy: 'fenced_json' };
  }

  const fenced = FENCED_BLOCK.exec(text);
  if (fenced) {
    const value = parseStructured(fenced[1].trim());
    if (value) return { value, strategy: 'fenced_block' };
  }

  const trimmed = text.trim();
  // A balanced scan would pick the first object out of a bare array.
  if (trimmed.startsWith('[')) {
    const array = parseStructured(trimmed);
    if (array) return { value: array, strategy: 'whole_text' };
  }

  const balanced = firstBalancedObject(text);
  if (balanced) return { value: balanced, strategy: 'balanced_object' };

  const whole = parseStructured(trimmed);
  if (whole) return { value: whole, strategy: 'whole_text' };

  return null;
}
