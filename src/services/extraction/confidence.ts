import type { ConfidenceLevel, ExtractedItem } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { confidenceLevelFor, DEFAULT_QUANTITY, DEFAULT_UNIT, roundTo } from './normalize.js';
import type { BatchConfidence, ConfidenceBreakdown } from './types.js';

const log = logger.child({ module: 'confidence' });

const WEIGHTS = {
  MODEL: 0.5,
  COMPLETENESS: 0.2,
  SPECIFICITY: 0.15,
  CONSISTENCY: 0.15,
} as const;

const WEIGHT_UNITS: ReadonlySet<string> = new Set(['kg', 'lb']);

function clamp(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function completeness(item: ExtractedItem): number {
  let score = 0;
  if (item.name.length >= 2) score += 0.4;
  if (item.quantity !== DEFAULT_QUANTITY) score += 0.2;
  if (item.unit !== '' && item.unit !== DEFAULT_UNIT) score += 0.2;
  if (item.specifications.length > 0) score += 0.1;
  if (item.originalText !== '') score += 0.1;
  return Math.min(1, score);
}

function specificity(item: ExtractedItem): number {
  const words = item.name.split(/\s+/).filter((word) => word.length > 0);
  let score = 0.5;
  if (words.length > 1) score += 0.1;
  if (words.length > 2) score += 0.1;
  score += 0.1 * Math.min(item.specifications.length, 3);
  return Math.min(1, score);
}

function consistency(item: ExtractedItem): number {
  const unit = item.unit.toLowerCase();
  let score = 0.7;
  if (item.quantity > 100 && unit === DEFAULT_UNIT) score -= 0.2;
  if (item.quantity < 0.01 && WEIGHT_UNITS.has(unit)) score -= 0.2;
  return clamp(score);
}

/** Recomputes item confidence from the model's score plus completeness, specificity and consistency signals. */
export class ConfidenceScorer {
  readonly baseThreshold: number;
  private readonly logScores: boolean;

  constructor(baseThreshold = 0.7, options: { logScores?: boolean } = {}) {
    this.baseThreshold = baseThreshold;
    this.logScores = options.logScores ?? true;
  }

  breakdown(item: ExtractedItem): ConfidenceBreakdown {
    return {
      modelConfidence: item.confidence,
      completeness: completeness(item),
      specificity: specificity(item),
      consistency: consistency(item),
    };
  }

  calculateItemConfidence(item: ExtractedItem): number {
    const parts = this.breakdown(item);
    return roundTo(
      WEIGHTS.MODEL * parts.modelConfidence +
        WEIGHTS.COMPLETENESS * parts.completeness +
        WEIGHTS.SPECIFICITY * parts.specificity +
        WEIGHTS.CONSISTENCY * parts.consistency,
    );
  }

  /** Returns new items carrying the recomputed confidence; the inputs are left untouched. */
  calibrate(items: readonly ExtractedItem[], requestId?: string): ExtractedItem[] {
    const calibrated = items.map((item) => {
      const confidence = this.calculateItemConfidence(item);
      return { ...item, confidence, confidenceLevel: confidenceLevelFor(confidence) };
    });

    if (this.logScores && calibrated.length > 0) {
      log.debug(
        {
          requestId,
          scores: calibrated.map((item, i) => ({ name: item.name, model: items[i].confidence, calibrated: item.confidence })),
        },
        'Calibrated item confidence',
      );
    }
    return calibrated;
  }

  calculateBatchConfidence(items: readonly ExtractedItem[], threshold = this.baseThreshold): BatchConfidence {
    const distribution: Record<ConfidenceLevel, number> = { high: 0, medium: 0, low: 0, very_low: 0 };

    if (items.length === 0) {
      return {
        averageConfidence: 0,
        minConfidence: 0,
        maxConfidence: 0,
        distribution,
        lowConfidenceItems: [],
        totalItems: 0,
        itemsBelowThreshold: 0,
      };
    }

    const confidences = items.map((item) => item.confidence);
    for (const item of items) {
      distribution[item.confidenceLevel] += 1;
    }

    const lowConfidenceItems = items
      .filter((item) => item.confidence < threshold)
      .map((item) => ({ name: item.name, confidence: item.confidence, reasons: [...item.uncertaintyReasons] }));

    return {
      averageConfidence: roundTo(confidences.reduce((sum, c) => sum + c, 0) / confidences.length),
      minConfidence: roundTo(Math.min(...confidences)),
      maxConfidence: roundTo(Math.max(...confidences)),
      distribution,
      lowConfidenceItems,
      totalItems: items.length,
      itemsBelowThreshold: lowConfidenceItems.length,
    };
  }
}
