import { z } from '@hono/zod-openapi';
import { StartJobSchema } from '@cognisync/schemas/src/job-input.schema.js';

export const StartJobRequestSchema = StartJobSchema.openapi('StartJobRequest');

export const JobStatusQuerySchema = z.object({
  job_id: z
    .string()
    .min(1)
    .openapi({ param: { name: 'job_id', in: 'query' }, example: '3b1f0c9e-7a52-4a8e-9d0b-5c2f1e6a4d77' }),
});
