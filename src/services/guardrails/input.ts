import { GuardrailAction, type GuardrailResult, type GuardrailViolation } from '../../domain/types.js';
import { logger, truncateSnippet } from '../../infrastructure/logger.js';
import {
  CATEGORY_ORDER,
  DEFAULT_POLICY,
  maskSnippet,
  RULES_BY_CATEGORY,
  type GuardrailPolicy,
  type GuardrailRule,
  type RuleCategory,
} from './rules.js';

const log = logger.child({ module: 'input-guardrails' });

export const MIN_INPUT_LENGTH = 3;
export const MAX_INPUT_LENGTH = 10_000;

export interface InputGuardrailOptions {
  minLength?: number;
  maxLength?: number;
  policy?: Partial<GuardrailPolicy>;
}

function blockedResult(text: string, violation: GuardrailViolation): GuardrailResult {
  return { isAllowed: false, violations: [violation], originalInput: text, sanitizedInput: text };
}

function isBlocking(violation: GuardrailViolation): boolean {
  return violation.action === GuardrailAction.BLOCK;
}

/**
 * Client-side checks run before any model call. Length checks and blocking
 * categories short-circuit; later categories only run when nothing blocked.
 */
export class InputGuardrails {
  readonly policy: GuardrailPolicy;
  private readonly minLength: number;
  private readonly maxLength: number;

  constructor(options: InputGuardrailOptions = {}) {
    this.minLength = options.minLength ?? MIN_INPUT_LENGTH;
    this.maxLength = options.maxLength ?? MAX_INPUT_LENGTH;
    this.policy = Object.freeze({ ...DEFAULT_POLICY, ...options.policy });
  }

  evaluate(text: string): GuardrailResult {
    if (text.trim() === '') {
      return blockedResult(text, {
        type: 'malformed_input',
        severity: 'HIGH',
        message: 'Empty or null input provided',
        action: GuardrailAction.BLOCK,
      });
    }

    if (text.trim().length < this.minLength) {
      return blockedResult(text, {
        type: 'malformed_input',
        severity: 'MEDIUM',
        message: `Input below minimum length of ${this.minLength}`,
        action: GuardrailAction.BLOCK,
      });
    }

    if (text.length > this.maxLength) {
      return blockedResult(text, {
        type: 'malformed_input',
        severity: 'MEDIUM',
        message: `Input exceeds maximum length of ${this.maxLength}`,
        action: GuardrailAction.BLOCK,
      });
    }

    const violations: GuardrailViolation[] = [];
    let sanitized = text;

    for (const category of CATEGORY_ORDER) {
      const action = this.policy[category];
      if (action === GuardrailAction.ALLOW) continue;

      const outcome = this.applyCategory(category, action, sanitized);
      violations.push(...outcome.violations);
      sanitized = outcome.text;

      if (outcome.violations.some(isBlocking)) {
        log.error(
          { category, ruleIds: outcome.violations.map((v) => v.ruleId), violationCount: violations.length },
          'Input blocked by guardrails',
        );
        return { isAllowed: false, violations, originalInput: text, sanitizedInput: text };
      }
    }

    if (violations.length > 0) {
      log.warn(
        {
          violationCount: violations.length,
          violations: violations.map((v) => ({ type: v.type, ruleId: v.ruleId, action: v.action, matched: v.matchedContent })),
          inputModified: sanitized !== text,
        },
        'Guardrail violations detected',
      );
    }

    return {
      isAllowed: !violations.some(isBlocking),
      violations,
      originalInput: text,
      sanitizedInput: sanitized,
    };
  }

  private applyCategory(
    category: RuleCategory,
    action: GuardrailAction,
    text: string,
  ): { violations: GuardrailViolation[]; text: string } {
    const violations: GuardrailViolation[] = [];
    let current = text;

    for (const rule of RULES_BY_CATEGORY[category]) {
      const matches = current.match(rule.pattern);
      if (!matches) continue;

      // Patterns in non-PII categories report only their first hit.
      const reported = category === 'pii' ? matches : matches.slice(0, 1);
      for (const match of reported) {
        violations.push(toViolation(rule, action, match));
      }

      if (action === GuardrailAction.ANONYMIZE) {
        current = current.replace(rule.pattern, rule.placeholder);
      }
    }

    return { violations, text: current };
  }
}

function toViolation(rule: GuardrailRule, action: GuardrailAction, match: string): GuardrailViolation {
  const snippet = rule.category === 'pii' ? maskSnippet(match) : match;
  return {
    type: rule.violationType,
    severity: rule.severity,
    message: rule.message,
    matchedContent: truncateSnippet(snippet),
    action,
    ruleId: rule.id,
  };
}
