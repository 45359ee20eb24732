import type { ConversationMessage, RetrievedDocument } from '../../domain/types.js';
import { SYSTEM_PROMPTS, type PromptType } from './templates.js';

export const MAX_CONTEXT_DOCUMENTS = 5;
export const MAX_DOCUMENT_CHARS = 500;
export const CONTEXT_HEADER = 'Relevant Context from Product Catalog:';

export interface BuiltPrompt {
  system: string;
  messages: ConversationMessage[];
  contextDocumentsCount: number;
  hasConversationHistory: boolean;
}

function sourceOf(metadata: Record<string, unknown>): string {
  const source = metadata.source;
  return typeof source === 'string' && source !== '' ? source : 'unknown';
}

/** Renders up to five documents, each cut to 500 characters, as a labeled context block. */
export function renderContextBlock(documents: readonly RetrievedDocument[]): string {
  if (documents.length === 0) return '';

  const sections = documents.slice(0, MAX_CONTEXT_DOCUMENTS).map((doc, i) => {
    const source = Object.keys(doc.metadata).length > 0 ? `Source: ${sourceOf(doc.metadata)}\n` : '';
    return `\n--- Document ${i + 1} ---\n${source}${doc.content.slice(0, MAX_DOCUMENT_CHARS)}\n`;
  });
  return `\n\n${CONTEXT_HEADER}\n${sections.join('')}`;
}

export class PromptBuilder {
  private readonly type: PromptType;
  private systemMessage?: string;
  private userMessage?: string;
  private readonly documents: RetrievedDocument[] = [];
  private readonly history: ConversationMessage[] = [];
  private readonly instructions: string[] = [];

  constructor(type: PromptType = 'extraction') {
    this.type = type;
  }

  withSystemMessage(message: string): this {
    this.systemMessage = message;
    return this;
  }

  withUserMessage(message: string): this {
    this.userMessage = message;
    return this;
  }

  withContextDocuments(documents: readonly RetrievedDocument[]): this {
    this.documents.push(...documents);
    return this;
  }

  withConversationHistory(history: readonly ConversationMessage[]): this {
    this.history.push(...history);
    return this;
  }

  withAdditionalInstructions(instructions: readonly string[]): this {
    this.instructions.push(...instructions);
    return this;
  }

  build(): BuiltPrompt {
    let system = this.systemMessage || SYSTEM_PROMPTS[this.type];
    if (this.instructions.length > 0) {
      system += `\n\nAdditional Instructions:\n${this.instructions.map((line) => `- ${line}`).join('\n')}`;
    }

    const messages: ConversationMessage[] = [...this.history];
    if (this.userMessage) {
      const context = renderContextBlock(this.documents);
      messages.push({ role: 'user', content: context ? `${context}\n\n${this.userMessage}` : this.userMessage });
    }

    return {
      system,
      messages,
      contextDocumentsCount: this.documents.length,
      hasConversationHistory: this.history.length > 0,
    };
  }
}
