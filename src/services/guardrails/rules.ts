import { GuardrailAction, type Severity, type ViolationType } from '../../domain/types.js';

export type RuleCategory = 'injection' | 'off_topic' | 'pii';

export interface GuardrailRule {
  readonly id: string;
  readonly category: RuleCategory;
  /** Global patterns, used only through `String#match` and `String#replace`. */
  readonly pattern: RegExp;
  readonly violationType: ViolationType;
  readonly severity: Severity;
  readonly message: string;
  readonly defaultAction: GuardrailAction;
  /** Text substituted for each match when the category is anonymized. */
  readonly placeholder: string;
}

export type GuardrailPolicy = Readonly<Record<RuleCategory, GuardrailAction>>;

export const DEFAULT_POLICY: GuardrailPolicy = Object.freeze({
  injection: GuardrailAction.BLOCK,
  off_topic: GuardrailAction.LOG,
  pii: GuardrailAction.ANONYMIZE,
});

type RuleSpec = Pick<GuardrailRule, 'id' | 'pattern'> & Partial<Pick<GuardrailRule, 'message' | 'placeholder'>>;

function defineRules(
  category: RuleCategory,
  shared: Pick<GuardrailRule, 'violationType' | 'severity' | 'message'>,
  specs: RuleSpec[],
): readonly GuardrailRule[] {
  return Object.freeze(
    specs.map((spec) =>
      Object.freeze({
        id: `${category}.${spec.id}`,
        category,
        pattern: spec.pattern,
        violationType: shared.violationType,
        severity: shared.severity,
        message: spec.message ?? shared.message,
        defaultAction: DEFAULT_POLICY[category],
        placeholder: spec.placeholder ?? '[REDACTED]',
      }),
    ),
  );
}

export const INJECTION_RULES = defineRules(
  'injection',
  { violationType: 'injection_attempt', severity: 'CRITICAL', message: 'Potential prompt injection detected' },
  [
    { id: 'ignore-instructions', pattern: /ignore\s+(all\s+)?(previous|prior|above)\s+(instructions?|prompts?|commands?)/gi },
    { id: 'role-system', pattern: /system\s*:\s*/gi },
    { id: 'role-assistant', pattern: /assistant\s*:\s*/gi },
    { id: 'role-human', pattern: /human\s*:\s*/gi },
    { id: 'pretend', pattern: /pretend\s+(you\s+are|to\s+be)/gi },
    { id: 'act-as', pattern: /act\s+as\s+(if\s+)?you/gi },
    { id: 'disregard-rules', pattern: /disregard\s+(all\s+)?(safety|guidelines|rules)/gi },
    { id: 'new-instruction', pattern: /new\s+instruction/gi },
    { id: 'jailbreak', pattern: /jailbreak/gi },
    { id: 'bypass', pattern: /bypass\s+(filter|guardrail|safety)/gi },
  ],
);

export const OFF_TOPIC_RULES = defineRules(
  'off_topic',
  { violationType: 'topic_policy', severity: 'LOW', message: 'Non-grocery content detected' },
  [
    { id: 'finance', pattern: /\b(bitcoin|crypto|cryptocurrency|forex|stock\s+market)\b/gi },
    { id: 'credentials', pattern: /\b(password|login|credential|api\s+key|secret\s+key)\b/gi },
    { id: 'exploits', pattern: /\b(hack|exploit|malware|virus|phishing)\b/gi },
    { id: 'weapons', pattern: /\b(weapon|ammunition|explosive|bomb)\b/gi },
    { id: 'pharmacy', pattern: /\b(prescription|medication|pharmacy)\b(?!.*grocery)/gi },
  ],
);

export const PII_RULES = defineRules(
  'pii',
  { violationType: 'pii_detected', severity: 'MEDIUM', message: 'PII detected' },
  [
    {
      id: 'credit_card',
      pattern: /\b(?:\d{4}[- ]?){3}\d{4}\b/g,
      message: 'PII detected: credit_card',
      placeholder: '[CREDIT_CARD]',
    },
    { id: 'ssn', pattern: /\b\d{3}[- ]?\d{2}[- ]?\d{4}\b/g, message: 'PII detected: ssn', placeholder: '[SSN]' },
    {
      id: 'phone',
      pattern: /\b(?:\+?1[- ]?)?\(?\d{3}\)?[- ]?\d{3}[- ]?\d{4}\b/g,
      message: 'PII detected: phone',
      placeholder: '[PHONE]',
    },
    {
      id: 'email',
      pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g,
      message: 'PII detected: email',
      placeholder: '[EMAIL]',
    },
  ],
);

export const RULES_BY_CATEGORY: Readonly<Record<RuleCategory, readonly GuardrailRule[]>> = Object.freeze({
  injection: INJECTION_RULES,
  off_topic: OFF_TOPIC_RULES,
  pii: PII_RULES,
});

/** Evaluation order of the pattern categories. */
export const CATEGORY_ORDER: readonly RuleCategory[] = Object.freeze(['injection', 'off_topic', 'pii']);

/** Keeps the last four characters so a logged snippet can be correlated without exposing it. */
export function maskSnippet(value: string): string {
  if (value.length <= 4) return '*'.repeat(value.length);
  return '*'.repeat(value.length - 4) + value.slice(-4);
}
