import { z } from 'zod';

export const modelConfigSchema = z.object({
  modelId: z.string().min(1, 'Model id is required'),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(1),
  topP: z.number().min(0).max(1),
  topK: z.number().int().nonnegative().optional(),
  stopSequences: z.array(z.string()).default([]),
});

export const processListInput = z.object({
  text: z.string().min(1, 'Grocery list text is required'),
  orderId: z.string().min(1).optional(),
  correlationId: z.string().min(1).optional(),
  useRetrieval: z.boolean().default(false),
  calibrate: z.boolean().default(false),
});

const policyEntry = z.object({ action: z.string().optional() }).passthrough();

const assessmentSchema = z
  .object({
    contentPolicy: z
      .object({ filters: z.array(policyEntry.extend({ type: z.string().optional() })).default([]) })
      .optional(),
    topicPolicy: z
      .object({ topics: z.array(policyEntry.extend({ name: z.string().optional() })).default([]) })
      .optional(),
    wordPolicy: z
      .object({
        customWords: z.array(policyEntry.extend({ match: z.string().optional() })).default([]),
        managedWordLists: z
          .array(policyEntry.extend({ match: z.string().optional(), type: z.string().optional() }))
          .default([]),
      })
      .optional(),
  })
  .passthrough();

/** Native safety verdict some providers attach to a response. */
export const providerVerdictSchema = z
  .object({
    action: z.string().optional(),
    trace: z
      .object({
        inputAssessment: assessmentSchema.optional(),
        outputAssessments: z.array(assessmentSchema).default([]),
      })
      .optional(),
  })
  .passthrough();

/** A retrieval hit. Missing or null metadata becomes an empty object. */
export const retrievedDocumentSchema = z.object({
  content: z.string(),
  metadata: z
    .record(z.string(), z.unknown())
    .nullish()
    .transform((metadata) => metadata ?? {}),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type ModelConfigInput = z.input<typeof modelConfigSchema>;
export type ProcessListInput = z.infer<typeof processListInput>;
export type ProviderVerdict = z.infer<typeof providerVerdictSchema>;
export type ProviderAssessment = z.infer<typeof assessmentSchema>;
