import { GuardrailAction, isRecord, type GuardrailResult, type GuardrailViolation } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { locateJson } from '../extraction/json-locator.js';

const log = logger.child({ module: 'output-guardrails' });

export type ExpectedFormat = 'json' | 'text';

export interface OutputGuardrailOptions {
  validateJson?: boolean;
  confidenceThreshold?: number;
  maxItems?: number;
}

export class OutputGuardrails {
  private readonly validateJson: boolean;
  private readonly confidenceThreshold: number;
  private readonly maxItems: number;

  constructor(options: OutputGuardrailOptions = {}) {
    this.validateJson = options.validateJson ?? true;
    this.confidenceThreshold = options.confidenceThreshold ?? 0.5;
    this.maxItems = options.maxItems ?? 100;
  }

  evaluate(response: string, expectedFormat: ExpectedFormat = 'json'): GuardrailResult {
    if (response.trim() === '') {
      return {
        isAllowed: false,
        violations: [
          { type: 'malformed_input', severity: 'HIGH', message: 'Empty response from model', action: GuardrailAction.BLOCK },
        ],
        originalInput: response,
        sanitizedInput: response,
      };
    }

    const violations = expectedFormat === 'json' && this.validateJson ? this.checkJson(response) : [];

    if (violations.length > 0) {
      log.debug({ violationCount: violations.length, expectedFormat }, 'Output guardrail findings');
    }

    return {
      isAllowed: !violations.some((v) => v.action === GuardrailAction.BLOCK),
      violations,
      originalInput: response,
      sanitizedInput: response,
    };
  }

  private checkJson(response: string): GuardrailViolation[] {
    const located = locateJson(response);
    if (!located) {
      return [
        {
          type: 'malformed_input',
          severity: 'HIGH',
          message: 'No valid JSON found in response',
          action: GuardrailAction.BLOCK,
        },
      ];
    }

    const parsed = located.value;
    if (!isRecord(parsed)) return [];
    const items: unknown = parsed.items;
    if (!Array.isArray(items)) return [];

    const violations: GuardrailViolation[] = [];

    if (items.length > this.maxItems) {
      violations.push({
        type: 'malformed_input',
        severity: 'MEDIUM',
        message: `Response contains too many items: ${items.length}`,
        action: GuardrailAction.LOG,
      });
    }

    items.forEach((item: unknown, index) => {
      if (!isRecord(item)) {
        violations.push({
          type: 'malformed_input',
          severity: 'MEDIUM',
          message: `Item ${index} is not a valid object`,
          action: GuardrailAction.LOG,
        });
        return;
      }

      const confidence = typeof item.confidence === 'number' ? item.confidence : 0;
      if (confidence < this.confidenceThreshold) {
        const name = typeof item.name === 'string' ? item.name : 'unknown';
        violations.push({
          type: 'malformed_input',
          severity: 'LOW',
          message: `Low confidence item: ${name} (${confidence})`,
          action: GuardrailAction.LOG,
        });
      }
    });

    return violations;
  }
}
