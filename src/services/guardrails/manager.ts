import {
  GuardrailAction,
  type GuardrailPolicyStamp,
  type GuardrailResult,
  type GuardrailViolation,
} from '../../domain/types.js';
import { providerVerdictSchema, type ProviderAssessment } from '../../domain/schemas.js';
import { logger, truncateSnippet } from '../../infrastructure/logger.js';
import { InputGuardrails } from './input.js';
import { OutputGuardrails, type ExpectedFormat } from './output.js';

const log = logger.child({ module: 'guardrails' });

const BLOCKED = 'BLOCKED';

export interface ProviderVerdictOutcome {
  isBlocked: boolean;
  violations: GuardrailViolation[];
}

export interface GuardrailsManagerOptions {
  input?: InputGuardrails;
  output?: OutputGuardrails;
  /** Identifier and version of the provider-side guardrail, stamped on every result. */
  guardrailId?: string;
  guardrailVersion?: string;
}

/** Single entry point for local guardrails and provider-native safety verdicts. */
export class GuardrailsManager {
  readonly input: InputGuardrails;
  readonly output: OutputGuardrails;
  private readonly policy?: GuardrailPolicyStamp;

  constructor(options: GuardrailsManagerOptions = {}) {
    this.input = options.input ?? new InputGuardrails();
    this.output = options.output ?? new OutputGuardrails();
    if (options.guardrailId) {
      this.policy = Object.freeze({ guardrailId: options.guardrailId, version: options.guardrailVersion ?? 'DRAFT' });
    }
  }

  evaluateInput(text: string): GuardrailResult {
    return this.stamp(this.input.evaluate(text));
  }

  evaluateOutput(response: string, expectedFormat: ExpectedFormat = 'json'): GuardrailResult {
    return this.stamp(this.output.evaluate(response, expectedFormat));
  }

  /** Translates a provider's own safety verdict into local violations. Unrecognized shapes yield none. */
  interpretProviderVerdict(verdict: unknown): ProviderVerdictOutcome {
    if (verdict === undefined || verdict === null) return { isBlocked: false, violations: [] };

    const parsed = providerVerdictSchema.safeParse(verdict);
    if (!parsed.success) {
      log.debug({ issues: parsed.error.issues.length }, 'Ignoring malformed provider safety verdict');
      return { isBlocked: false, violations: [] };
    }

    if (parsed.data.action === BLOCKED) {
      return {
        isBlocked: true,
        violations: [
          {
            type: 'content_filter',
            severity: 'HIGH',
            message: 'Request blocked by provider guardrails',
            action: GuardrailAction.BLOCK,
          },
        ],
      };
    }

    const assessments = [
      ...(parsed.data.trace?.inputAssessment ? [parsed.data.trace.inputAssessment] : []),
      ...(parsed.data.trace?.outputAssessments ?? []),
    ];
    const violations = assessments.flatMap(assessmentViolations);
    const isBlocked = violations.some((v) => v.action === GuardrailAction.BLOCK);

    if (isBlocked) {
      log.warn({ violationCount: violations.length, guardrailId: this.policy?.guardrailId }, 'Provider guardrails blocked content');
    }
    return { isBlocked, violations };
  }

  private stamp(result: GuardrailResult): GuardrailResult {
    return this.policy ? { ...result, policy: this.policy } : result;
  }
}

function assessmentViolations(assessment: ProviderAssessment): GuardrailViolation[] {
  const violations: GuardrailViolation[] = [];

  for (const filter of assessment.contentPolicy?.filters ?? []) {
    if (filter.action !== BLOCKED) continue;
    violations.push({
      type: 'content_filter',
      severity: 'HIGH',
      message: `Content blocked: ${filter.type ?? 'unknown'}`,
      action: GuardrailAction.BLOCK,
    });
  }

  for (const topic of assessment.topicPolicy?.topics ?? []) {
    if (topic.action !== BLOCKED) continue;
    violations.push({
      type: 'topic_policy',
      severity: 'MEDIUM',
      message: `Topic blocked: ${topic.name ?? 'unknown'}`,
      action: GuardrailAction.BLOCK,
    });
  }

  const words = [...(assessment.wordPolicy?.customWords ?? []), ...(assessment.wordPolicy?.managedWordLists ?? [])];
  for (const word of words) {
    if (word.action !== BLOCKED) continue;
    violations.push({
      type: 'word_policy',
      severity: 'MEDIUM',
      message: 'Word policy blocked content',
      ...(word.match !== undefined && { matchedContent: truncateSnippet(word.match) }),
      action: GuardrailAction.BLOCK,
    });
  }

  return violations;
}
