import type { ConfidenceLevel, UncertaintyReason } from '../../domain/types.js';

export interface ExtractorOptions {
  /** Items below this confidence are logged as uncertain. */
  uncertaintyThreshold?: number;
  logUncertainItems?: boolean;
}

export interface LowConfidenceItem {
  name: string;
  confidence: number;
  reasons: UncertaintyReason[];
}

export interface BatchConfidence {
  averageConfidence: number;
  minConfidence: number;
  maxConfidence: number;
  distribution: Record<ConfidenceLevel, number>;
  lowConfidenceItems: LowConfidenceItem[];
  totalItems: number;
  itemsBelowThreshold: number;
}

export interface ConfidenceBreakdown {
  modelConfidence: number;
  completeness: number;
  specificity: number;
  consistency: number;
}
