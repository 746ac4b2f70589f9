import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { BIAS_LEVELS } from '@cognisync/shared/src/types/knowledge.types.js';

const BiasLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(BIAS_LEVELS),
);

/** Shape the model is instructed to answer with. */
export const ModelKnowledgeOutputSchema = z.object({
  summary: z.string().trim().min(1),
  key_claims: z.array(z.string()),
  reliability_score: z.number().int().min(0).max(100),
  bias_level: BiasLevelSchema,
  bias_explanation: z.string(),
});

export type ModelKnowledgeOutput = z.infer<typeof ModelKnowledgeOutputSchema>;

// Built from a plain enum so the prompt shows the allowed values, not the preprocess wrapper.
const PromptSchema = ModelKnowledgeOutputSchema.extend({
  bias_level: z.enum(BIAS_LEVELS),
});

export const ModelKnowledgeOutputJsonSchema = zodToJsonSchema(PromptSchema, {
  name: 'KnowledgeOutput',
  $refStrategy: 'none',
});
