import {
  isRecord,
  type ExtractedItem,
  type ExtractionResult,
  type ExtractionStatistics,
  type UncertaintyReason,
} from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { locateJson } from './json-locator.js';
import {
  confidenceLevelFor,
  DEFAULT_QUANTITY,
  normalizeUnit,
  parseConfidence,
  parseQuantity,
  parseSpecifications,
  roundTo,
} from './normalize.js';
import type { ExtractorOptions } from './types.js';

const log = logger.child({ module: 'extractor' });

export const PARSE_FAILURE_NOTE = 'Failed to parse response as JSON';

// Substring matches, so plurals and compounds ("things", "brown rice") count too.
const BULK_KEYWORDS: readonly string[] = ['rice', 'flour', 'sugar', 'salt', 'beans', 'pasta'];
const GENERIC_KEYWORDS: readonly string[] = ['thing', 'stuff', 'item', 'food', 'something'];
const GENERIC_UNITS: ReadonlySet<string> = new Set(['piece', 'unit']);
const UNCERTAIN_BELOW = 0.7;

/**
 * Turns raw model output into grocery line items. Never throws: output that
 * holds no recognizable JSON becomes an empty result with a parsing note.
 */
export class Extractor {
  private readonly uncertaintyThreshold: number;
  private readonly logUncertainItems: boolean;

  constructor(options: ExtractorOptions = {}) {
    this.uncertaintyThreshold = options.uncertaintyThreshold ?? UNCERTAIN_BELOW;
    this.logUncertainItems = options.logUncertainItems ?? true;
  }

  extract(rawText: string, requestId?: string): ExtractionResult {
    const located = locateJson(rawText);

    if (!located) {
      log.error({ requestId, responseLength: rawText.length }, 'Failed to extract JSON from model response');
      return { items: [], unrecognizedText: [rawText], parsingNotes: PARSE_FAILURE_NOTE, rawResponse: rawText };
    }

    const payload = located.value;
    const rawItems: unknown = Array.isArray(payload) ? payload : payload.items;
    const items = (Array.isArray(rawItems) ? rawItems : []).flatMap((raw: unknown, index: number) => {
      const item = parseItem(raw);
      if (!item) {
        log.warn({ requestId, index }, 'Dropping unparseable item');
        return [];
      }
      return [applyUncertaintyHeuristics(item)];
    });

    if (this.logUncertainItems) {
      this.logUncertain(items, requestId);
    }

    log.debug({ requestId, strategy: located.strategy, itemCount: items.length }, 'Extracted items from model response');

    return {
      items,
      unrecognizedText: Array.isArray(payload) ? [] : stringList(payload.unrecognized_text),
      parsingNotes: !Array.isArray(payload) && typeof payload.parsing_notes === 'string' ? payload.parsing_notes : '',
      rawResponse: rawText,
    };
  }

  private logUncertain(items: ExtractedItem[], requestId?: string): void {
    const uncertain = items.filter((item) => item.confidence < this.uncertaintyThreshold);
    if (uncertain.length === 0) return;

    log.warn(
      {
        requestId,
        threshold: this.uncertaintyThreshold,
        uncertainItems: uncertain.map((item) => ({
          name: item.name,
          confidence: item.confidence,
          reasons: item.uncertaintyReasons,
          originalText: item.originalText.slice(0, 100),
        })),
      },
      `Found ${uncertain.length} items with low confidence`,
    );
  }
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function parseItem(raw: unknown): ExtractedItem | null {
  if (!isRecord(raw)) return null;

  const name = typeof raw.name === 'string' || typeof raw.name === 'number' ? String(raw.name).trim() : '';
  if (name === '') return null;

  const confidence = parseConfidence(raw.confidence);
  const source = raw.original_text ?? raw.raw_text_segment;

  return {
    name,
    quantity: parseQuantity(raw.quantity),
    unit: normalizeUnit(raw.unit),
    specifications: parseSpecifications(raw.specifications),
    confidence,
    confidenceLevel: confidenceLevelFor(confidence),
    originalText: typeof source === 'string' ? source : '',
    uncertaintyReasons: [],
  };
}

export function uncertaintyReasonsFor(item: Pick<ExtractedItem, 'name' | 'quantity' | 'unit' | 'originalText'>): UncertaintyReason[] {
  const reasons: UncertaintyReason[] = [];
  const name = item.name.toLowerCase();

  if (item.quantity === DEFAULT_QUANTITY && item.originalText === '') reasons.push('ambiguous_quantity');
  if (GENERIC_UNITS.has(item.unit) && BULK_KEYWORDS.some((kw) => name.includes(kw))) reasons.push('unclear_unit');
  if (GENERIC_KEYWORDS.some((kw) => name.includes(kw))) reasons.push('ambiguous_item');
  if (item.name.length < 3) reasons.push('incomplete_information');

  return reasons;
}

/** Flags uncertainty and, for items the model was confident about, lowers confidence by 0.1 per reason (floor 0.5). */
function applyUncertaintyHeuristics(item: ExtractedItem): ExtractedItem {
  const reasons = uncertaintyReasonsFor(item);
  if (reasons.length === 0 || item.confidence < UNCERTAIN_BELOW) {
    return { ...item, uncertaintyReasons: reasons };
  }

  const confidence = roundTo(Math.max(0.5, item.confidence - 0.1 * reasons.length), 6);
  return { ...item, confidence, confidenceLevel: confidenceLevelFor(confidence), uncertaintyReasons: reasons };
}

export function isUncertain(item: Pick<ExtractedItem, 'confidence' | 'uncertaintyReasons'>): boolean {
  return item.confidence < UNCERTAIN_BELOW || item.uncertaintyReasons.length > 0;
}

/** Derived on demand from the item list; never cached on the result. */
export function computeStatistics(result: Pick<ExtractionResult, 'items'>): ExtractionStatistics {
  const { items } = result;
  if (items.length === 0) {
    return { totalItems: 0, highConfidenceCount: 0, lowConfidenceCount: 0, averageConfidence: 0, uncertainItemsCount: 0 };
  }

  const total = items.reduce((sum, item) => sum + item.confidence, 0);
  return {
    totalItems: items.length,
    highConfidenceCount: items.filter((i) => i.confidenceLevel === 'high' || i.confidenceLevel === 'medium').length,
    lowConfidenceCount: items.filter((i) => i.confidenceLevel === 'low' || i.confidenceLevel === 'very_low').length,
    averageConfidence: roundTo(total / items.length),
    uncertainItemsCount: items.filter(isUncertain).length,
  };
}
