import { describe, it, expect } from 'vitest';
import { GuardrailsManager, InputGuardrails } from '../../src/services/guardrails/index.js';
import { GuardrailAction } from '../../src/domain/types.js';

describe('GuardrailsManager', () => {
  describe('policy stamp', () => {
    it('stamps results with the configured guardrail id and default version', () => {
      const manager = new GuardrailsManager({ guardrailId: 'gr-test' });

      expect(manager.evaluateInput('milk and eggs').policy).toEqual({ guardrailId: 'gr-test', version: 'DRAFT' });
      expect(manager.evaluateOutput('{"items": []}').policy).toEqual({ guardrailId: 'gr-test', version: 'DRAFT' });
    });

    it('leaves results unstamped without a guardrail id', () => {
      const manager = new GuardrailsManager();
      expect(manager.evaluateInput('milk and eggs').policy).toBeUndefined();
    });
  });

  it('delegates to the injected input guardrails', () => {
    const manager = new GuardrailsManager({
      input: new InputGuardrails({ policy: { pii: GuardrailAction.BLOCK } }),
    });

    expect(manager.evaluateInput('receipt to jane@example.com').isAllowed).toBe(false);
  });

  describe('interpretProviderVerdict', () => {
    const manager = new GuardrailsManager({ guardrailId: 'gr-test', guardrailVersion: '2' });

    it('returns no violations for absent or unrecognized verdicts', () => {
      for (const verdict of [undefined, null, 'blocked', { trace: 'nope' }]) {
        expect(manager.interpretProviderVerdict(verdict)).toEqual({ isBlocked: false, violations: [] });
      }
    });

    it('treats a top-level BLOCKED action as a content filter block', () => {
      expect(manager.interpretProviderVerdict({ action: 'BLOCKED' })).toEqual({
        isBlocked: true,
        violations: [
          {
            type: 'content_filter',
            severity: 'HIGH',
            message: 'Request blocked by provider guardrails',
            action: 'BLOCK',
          },
        ],
      });
    });

    it('collects blocked entries from every assessment', () => {
      const outcome = manager.interpretProviderVerdict({
        action: 'NONE',
        trace: {
          inputAssessment: {
            contentPolicy: {
              filters: [
                { type: 'HATE', action: 'BLOCKED' },
                { type: 'VIOLENCE', action: 'NONE' },
              ],
            },
          },
          outputAssessments: [
            {
              topicPolicy: { topics: [{ name: 'Investing', action: 'BLOCKED' }] },
              wordPolicy: { customWords: [{ match: 'forbidden', action: 'BLOCKED' }] },
            },
          ],
        },
      });

      expect(outcome.isBlocked).toBe(true);
      expect(outcome.violations).toEqual([
        { type: 'content_filter', severity: 'HIGH', message: 'Content blocked: HATE', action: 'BLOCK' },
        { type: 'topic_policy', severity: 'MEDIUM', message: 'Topic blocked: Investing', action: 'BLOCK' },
        {
          type: 'word_policy',
          severity: 'MEDIUM',
          message: 'Word policy blocked content',
          matchedContent: 'forbidden',
          action: 'BLOCK',
        },
      ]);
    });

    it('is not blocked when no entry was blocked', () => {
      const outcome = manager.interpretProviderVerdict({
        trace: { outputAssessments: [{ contentPolicy: { filters: [{ type: 'INSULTS', action: 'NONE' }] } }] },
      });
      expect(outcome).toEqual({ isBlocked: false, violations: [] });
    });
  });
});
