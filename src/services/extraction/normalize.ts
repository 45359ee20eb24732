import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ConfidenceLevel } from '../../domain/types.js';

export const DEFAULT_QUANTITY = 1.0;
export const DEFAULT_UNIT = 'piece';
export const DEFAULT_CONFIDENCE = 0.75;

const unitSynonymsSchema = z.record(z.string(), z.string());

export const UNIT_SYNONYMS: Readonly<Record<string, string>> = Object.freeze(
  unitSynonymsSchema.parse(
    JSON.parse(readFileSync(new URL('./data/unit-synonyms.json', import.meta.url), 'utf-8')),
  ),
);

const MIXED_NUMBER = /^(\d+)\s+(\d+)\/(\d+)$/;
const FRACTION = /^(\d+(?:\.\d+)?)\/(\d+(?:\.\d+)?)$/;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function positiveOrDefault(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : DEFAULT_QUANTITY;
}

/** Accepts numbers, decimal strings, `a/b` and `a b/c`; anything else (or a non-positive result) yields 1. */
export function parseQuantity(value: unknown): number {
  if (typeof value === 'number') return positiveOrDefault(value);
  if (typeof value !== 'string') return DEFAULT_QUANTITY;

  const text = value.trim();

  const mixed = MIXED_NUMBER.exec(text);
  if (mixed) {
    return positiveOrDefault(Number(mixed[1]) + Number(mixed[2]) / Number(mixed[3]));
  }

  const fraction = FRACTION.exec(text);
  if (fraction) {
    return positiveOrDefault(Number(fraction[1]) / Number(fraction[2]));
  }

  if (DECIMAL.test(text)) return positiveOrDefault(Number(text));
  return DEFAULT_QUANTITY;
}

export function normalizeUnit(value: unknown): string {
  if (typeof value !== 'string' && typeof value !== 'number') return DEFAULT_UNIT;
  const unit = String(value).trim().toLowerCase();
  if (unit === '') return DEFAULT_UNIT;
  return UNIT_SYNONYMS[unit] ?? unit;
}

export function parseSpecifications(value: unknown): string[] {
  const raw: unknown[] = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
  const specs = raw
    .filter((entry): entry is string | number => typeof entry === 'string' || typeof entry === 'number')
    .map((entry) => String(entry).trim())
    .filter((entry) => entry.length > 0);
  return [...new Set(specs)];
}

export function parseConfidence(value: unknown): number {
  let confidence = DEFAULT_CONFIDENCE;
  if (typeof value === 'number' && Number.isFinite(value)) {
    confidence = value;
  } else if (typeof value === 'string' && DECIMAL.test(value.trim())) {
    confidence = Number(value.trim());
  }
  return Math.max(0, Math.min(1, confidence));
}

export function confidenceLevelFor(confidence: number): ConfidenceLevel {
  if (confidence >= 0.85) return 'high';
  if (confidence >= 0.7) return 'medium';
  if (confidence >= 0.5) return 'low';
  return 'very_low';
}

export function roundTo(value: number, places = 3): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
