export const GuardrailAction = {
  ALLOW: 'ALLOW',
  BLOCK: 'BLOCK',
  ANONYMIZE: 'ANONYMIZE',
  LOG: 'LOG',
} as const;

export type GuardrailAction = (typeof GuardrailAction)[keyof typeof GuardrailAction];

export const VIOLATION_TYPES = [
  'content_filter',
  'topic_policy',
  'word_policy',
  'pii_detected',
  'malformed_input',
  'injection_attempt',
] as const;

export type ViolationType = (typeof VIOLATION_TYPES)[number];

export const SEVERITIES = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface GuardrailViolation {
  type: ViolationType;
  severity: Severity;
  message: string;
  matchedContent?: string;
  action: GuardrailAction;
  ruleId?: string;
}

export interface GuardrailPolicyStamp {
  guardrailId: string;
  version: string;
}

export interface GuardrailResult {
  isAllowed: boolean;
  violations: GuardrailViolation[];
  originalInput: string;
  sanitizedInput: string;
  policy?: GuardrailPolicyStamp;
}

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low', 'very_low'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export const UNCERTAINTY_REASONS = [
  'ambiguous_quantity',
  'ambiguous_item',
  'unclear_unit',
  'multiple_interpretations',
  'incomplete_information',
  'non_standard_format',
  'possible_misspelling',
  'context_missing',
] as const;

export type UncertaintyReason = (typeof UNCERTAINTY_REASONS)[number];

export interface ExtractedItem {
  name: string;
  quantity: number;
  unit: string;
  specifications: string[];
  confidence: number;
  confidenceLevel: ConfidenceLevel;
  originalText: string;
  uncertaintyReasons: UncertaintyReason[];
}

export interface ExtractionResult {
  items: ExtractedItem[];
  unrecognizedText: string[];
  parsingNotes: string;
  rawResponse: string;
}

export interface ExtractionStatistics {
  totalItems: number;
  highConfidenceCount: number;
  lowConfidenceCount: number;
  averageConfidence: number;
  uncertainItemsCount: number;
}

export interface RetrievedDocument {
  content: string;
  metadata: Record<string, unknown>;
}

export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
