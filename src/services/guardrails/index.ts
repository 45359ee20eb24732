export { InputGuardrails, MIN_INPUT_LENGTH, MAX_INPUT_LENGTH } from './input.js';
export type { InputGuardrailOptions } from './input.js';
export { OutputGuardrails } from './output.js';
export type { OutputGuardrailOptions, ExpectedFormat } from './output.js';
export { GuardrailsManager } from './manager.js';
export type { GuardrailsManagerOptions, ProviderVerdictOutcome } from './manager.js';
export {
  DEFAULT_POLICY,
  INJECTION_RULES,
  OFF_TOPIC_RULES,
  PII_RULES,
  RULES_BY_CATEGORY,
  CATEGORY_ORDER,
  maskSnippet,
} from './rules.js';
export type { GuardrailRule, GuardrailPolicy, RuleCategory } from './rules.js';
