export { PromptBuilder, renderContextBlock, CONTEXT_HEADER, MAX_CONTEXT_DOCUMENTS, MAX_DOCUMENT_CHARS } from './builder.js';
export type { BuiltPrompt } from './builder.js';
export {
  PROMPT_TYPES,
  SYSTEM_PROMPTS,
  EXTRACTION_SYSTEM_PROMPT,
  EXTRACTION_USER_TEMPLATE,
  EXTRACTION_EXAMPLES,
  MATCHING_SYSTEM_PROMPT,
  CLARIFICATION_SYSTEM_PROMPT,
  extractionPrompt,
  matchingPrompt,
  clarificationPrompt,
  withExamples,
} from './templates.js';
export type { PromptType, PromptPair, FewShotExample } from './templates.js';
