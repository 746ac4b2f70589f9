import { z } from '@hono/zod-openapi';
import { BIAS_LEVELS } from '@cognisync/shared/src/types/knowledge.types.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// MIP-003
export const AvailabilityResponseSchema = z
  .object({
    status: z.literal('available'),
    type: z.literal('masumi-agent'),
    agentIdentifier: z.string(),
    message: z.string(),
  })
  .openapi('AvailabilityResponse');

export const InputFieldSchema = z
  .object({
    id: z.string(),
    type: z.enum(['string', 'number', 'boolean', 'option']),
    name: z.string(),
    data: z.object({
      description: z.string(),
      placeholder: z.string().optional(),
    }),
    validations: z
      .array(z.object({ validation: z.string(), value: z.string() }))
      .optional(),
  })
  .openapi('InputField');

export const InputSchemaResponseSchema = z
  .object({
    input_data: z.array(InputFieldSchema),
  })
  .openapi('InputSchemaResponse');

export const AmountSchema = z
  .object({
    amount: z.string(),
    unit: z.string(),
  })
  .openapi('Amount');

export const StartJobResponseSchema = z
  .object({
    status: z.literal('success'),
    job_id: z.string(),
    blockchainIdentifier: z.string(),
    agentIdentifier: z.string(),
    amounts: z.array(AmountSchema),
    input_hash: z.string(),
    payByTime: z.string(),
    submitResultTime: z.string(),
    message: z.string(),
  })
  .openapi('StartJobResponse');

export const KnowledgeObjectSchema = z
  .object({
    source_text_ref: z.string(),
    summary: z.string(),
    key_claims: z.array(z.string()),
    reliability_score: z.number().int().min(0).max(100),
    bias_level: z.enum(BIAS_LEVELS),
    bias_explanation: z.string(),
    verification_status: z.enum(['verified', 'needs_review']),
    provenance: z.object({
      model: z.string(),
      prompt_version: z.string(),
      content_hash: z.string(),
      bias_markers: z.array(z.string()),
      generated_at: z.string(),
      token_usage: z.object({ input: z.number(), output: z.number() }).optional(),
    }),
  })
  .openapi('KnowledgeObject');

export const JobStatusResponseSchema = z
  .object({
    job_id: z.string(),
    status: z.enum(['pending', 'running', 'completed', 'failed']),
    blockchain_identifier: z.string(),
    input_hash: z.string(),
    payment_status: z.enum(['pending', 'completed']),
    created_at: z.string(),
    updated_at: z.string(),
    result: KnowledgeObjectSchema.optional(),
    error: z.string().optional(),
  })
  .openapi('JobStatusResponse');

export type KnowledgeObjectResponse = z.infer<typeof KnowledgeObjectSchema>;
export type JobStatusResponse = z.infer<typeof JobStatusResponseSchema>;
