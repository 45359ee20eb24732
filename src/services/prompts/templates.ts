import { compilePrompt } from '../../infrastructure/langfuse.js';

export const PROMPT_TYPES = ['extraction', 'matching', 'clarification'] as const;
export type PromptType = (typeof PROMPT_TYPES)[number];

export const EXTRACTION_SYSTEM_PROMPT = `You are a specialized grocery list processing assistant. Your task is to accurately extract and structure grocery items from natural language text.

Your capabilities:
- Parse grocery lists in various formats (bullet points, numbered lists, free text, voice transcriptions)
- Recognize common grocery items, produce, meat, dairy, pantry items, and household products
- Infer quantities and units from context when not explicitly stated
- Identify item specifications (brand preferences, sizes, organic/non-organic)
- Provide confidence scores for each extraction based on clarity of the input

Constraints:
- Only extract actual grocery/shopping items - ignore non-shopping content
- Do not make up items not mentioned in the text
- Do not provide medical, financial, or legal advice
- Do not process requests unrelated to grocery shopping
- Always provide valid JSON output

Output Format:
You must return a valid JSON object with the following structure:
{
  "items": [
    {
      "name": "item name (normalized to standard product name)",
      "quantity": numeric value (default to 1 if not specified),
      "unit": "unit of measurement (pieces, kg, lb, oz, liters, etc.)",
      "specifications": ["list", "of", "specifications"],
      "confidence": 0.0-1.0 (how confident you are in this extraction),
      "original_text": "the exact text segment this was extracted from"
    }
  ],
  "unrecognized_text": ["any text segments that couldn't be identified as grocery items"],
  "parsing_notes": "any relevant notes about the extraction process"
}`;

export const EXTRACTION_USER_TEMPLATE = `Please extract grocery items from the following text and return structured JSON.

Input text:
{{grocery_text}}

Remember to:
1. Normalize item names to standard product names
2. Include confidence scores for each item
3. Handle quantities and units appropriately
4. Note any ambiguous items or specifications
5. Return ONLY valid JSON, no additional text`;

export const MATCHING_SYSTEM_PROMPT = `You are a product matching assistant that maps extracted grocery items to specific products in a catalog.

Your task:
- Match extracted items to the most appropriate product from the catalog
- Consider synonyms, brand variations, and common misspellings
- Provide match confidence based on how well the item matches the product
- Suggest alternatives when exact matches aren't available

Constraints:
- Only match to products in the provided catalog
- Prefer exact matches over fuzzy matches
- Consider quantity and unit compatibility

Output Format:
{
  "matches": [
    {
      "extracted_item": "original item name",
      "matched_product_id": "catalog product ID or null if no match",
      "matched_product_name": "matched product name",
      "match_type": "exact|fuzzy|category|none",
      "match_confidence": 0.0-1.0,
      "alternatives": ["list", "of", "alternative", "product_ids"]
    }
  ]
}`;

export const MATCHING_USER_TEMPLATE = `Match the following extracted items to products in the catalog.

Extracted Items:
{{items_json}}

Product Catalog:
{{catalog_json}}

Return JSON with matches for each extracted item.`;

export const CLARIFICATION_SYSTEM_PROMPT = `You are a helpful assistant that identifies ambiguous grocery items and generates clarification questions.

Your task:
- Identify items that could have multiple interpretations
- Generate clear, specific questions to resolve ambiguity
- Prioritize questions that would most impact the order

Output Format:
{
  "ambiguous_items": [
    {
      "item_name": "the ambiguous item",
      "ambiguity_type": "quantity|brand|variety|size",
      "question": "question to ask the user",
      "options": ["possible", "options", "if applicable"]
    }
  ]
}`;

export const CLARIFICATION_USER_TEMPLATE = `Review these extracted items and identify any that need clarification:

Items:
{{items_json}}

Identify ambiguous items and generate clarification questions.`;

export interface FewShotExample {
  input: string;
  output: string;
}

export const EXTRACTION_EXAMPLES: readonly FewShotExample[] = [
  {
    input: 'I need milk, 2 dozen eggs, and some bread',
    output: `{
  "items": [
    {"name": "milk", "quantity": 1, "unit": "gallon", "specifications": [], "confidence": 0.85, "original_text": "milk"},
    {"name": "eggs", "quantity": 24, "unit": "pieces", "specifications": ["large"], "confidence": 0.95, "original_text": "2 dozen eggs"},
    {"name": "bread", "quantity": 1, "unit": "loaf", "specifications": [], "confidence": 0.9, "original_text": "some bread"}
  ],
  "unrecognized_text": [],
  "parsing_notes": "Quantity for milk defaulted to 1 gallon. 'Some bread' interpreted as 1 loaf."
}`,
  },
  {
    input: 'Get me 500g of chicken breast, organic if possible, also 1kg rice and tomatoes',
    output: `{
  "items": [
    {"name": "chicken breast", "quantity": 500, "unit": "g", "specifications": ["organic preferred"], "confidence": 0.95, "original_text": "500g of chicken breast, organic if possible"},
    {"name": "rice", "quantity": 1, "unit": "kg", "specifications": [], "confidence": 0.98, "original_text": "1kg rice"},
    {"name": "tomatoes", "quantity": 1, "unit": "kg", "specifications": [], "confidence": 0.8, "original_text": "tomatoes"}
  ],
  "unrecognized_text": [],
  "parsing_notes": "Tomatoes quantity not specified, defaulted to 1kg."
}`,
  },
  {
    input: "Apples (red ones please) x5, butter 250g, and don't forget the coffee beans",
    output: `{
  "items": [
    {"name": "apples", "quantity": 5, "unit": "pieces", "specifications": ["red variety"], "confidence": 0.95, "original_text": "Apples (red ones please) x5"},
    {"name": "butter", "quantity": 250, "unit": "g", "specifications": [], "confidence": 0.98, "original_text": "butter 250g"},
    {"name": "coffee beans", "quantity": 1, "unit": "bag", "specifications": [], "confidence": 0.85, "original_text": "coffee beans"}
  ],
  "unrecognized_text": ["don't forget the"],
  "parsing_notes": "Coffee beans quantity defaulted to 1 bag."
}`,
  },
];

export const SYSTEM_PROMPTS: Readonly<Record<PromptType, string>> = {
  extraction: EXTRACTION_SYSTEM_PROMPT,
  matching: MATCHING_SYSTEM_PROMPT,
  clarification: CLARIFICATION_SYSTEM_PROMPT,
};

export interface PromptPair {
  system: string;
  user: string;
}

export function withExamples(systemPrompt: string, examples: readonly FewShotExample[] = EXTRACTION_EXAMPLES): string {
  if (examples.length === 0) return systemPrompt;
  const rendered = examples
    .map((example, i) => `\nExample ${i + 1}:\nInput: ${example.input}\nOutput: ${example.output}\n`)
    .join('');
  return `${systemPrompt}\n\nExamples:\n${rendered}`;
}

export function extractionPrompt(groceryText: string, includeExamples = true): PromptPair {
  return {
    system: includeExamples ? withExamples(EXTRACTION_SYSTEM_PROMPT) : EXTRACTION_SYSTEM_PROMPT,
    user: compilePrompt(EXTRACTION_USER_TEMPLATE, { grocery_text: groceryText }),
  };
}

export function matchingPrompt(itemsJson: string, catalogJson: string): PromptPair {
  return {
    system: MATCHING_SYSTEM_PROMPT,
    user: compilePrompt(MATCHING_USER_TEMPLATE, { items_json: itemsJson, catalog_json: catalogJson }),
  };
}

export function clarificationPrompt(itemsJson: string): PromptPair {
  return {
    system: CLARIFICATION_SYSTEM_PROMPT,
    user: compilePrompt(CLARIFICATION_USER_TEMPLATE, { items_json: itemsJson }),
  };
}
