import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { JobService } from '@cognisync/core/src/services/jobs/types.js';
import type { PaymentStatus } from '@cognisync/core/src/services/payment/types.js';
import type { Job } from '@cognisync/shared/src/types/job.types.js';
import type { KnowledgeObject } from '@cognisync/shared/src/types/knowledge.types.js';
import { createRouter, type AppEnv } from '../types.js';
import { JobStatusQuerySchema, StartJobRequestSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  JobStatusResponseSchema,
  StartJobResponseSchema,
  type JobStatusResponse,
  type KnowledgeObjectResponse,
} from '../schemas/responses.js';

const startJobRoute = createRoute({
  method: 'post',
  path: '/start_job',
  tags: ['MIP-003'],
  summary: 'Start a verification job',
  request: {
    body: {
      required: true,
      content: {
        'application/json': {
          schema: StartJobRequestSchema,
        },
      },
    },
  },
  responses: {
    201: {
      description: 'Job accepted',
      content: {
        'application/json': {
          schema: StartJobResponseSchema,
        },
      },
    },
    400: {
      description: 'Malformed job input',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const statusRoute = createRoute({
  method: 'get',
  path: '/status',
  tags: ['MIP-003'],
  summary: 'Get job status and result',
  request: {
    query: JobStatusQuerySchema,
  },
  responses: {
    200: {
      description: 'Current job state',
      content: {
        'application/json': {
          schema: JobStatusResponseSchema,
        },
      },
    },
    404: {
      description: 'Job not found',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

function toKnowledgeResponse(knowledge: KnowledgeObject): KnowledgeObjectResponse {
  const { provenance } = knowledge;
  return {
    source_text_ref: knowledge.sourceTextRef,
    summary: knowledge.summary,
    key_claims: [...knowledge.keyClaims],
    reliability_score: knowledge.reliabilityScore,
    bias_level: knowledge.biasLevel,
    bias_explanation: knowledge.biasExplanation,
    verification_status: knowledge.verificationStatus,
    provenance: {
      model: provenance.model,
      prompt_version: provenance.promptVersion,
      content_hash: provenance.contentHash,
      bias_markers: [...provenance.biasMarkers],
      generated_at: provenance.generatedAt.toISOString(),
      ...(provenance.tokenUsage ? { token_usage: { ...provenance.tokenUsage } } : {}),
    },
  };
}

export function toJobStatusResponse(job: Job, paymentStatus: PaymentStatus): JobStatusResponse {
  const base = {
    job_id: job.id,
    status: job.status,
    blockchain_identifier: job.blockchainIdentifier,
    input_hash: job.inputHash,
    payment_status: paymentStatus,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };

  switch (job.status) {
    case 'completed':
      return { ...base, result: toKnowledgeResponse(job.result) };
    case 'failed':
      return { ...base, error: job.error };
    default:
      return base;
  }
}

export function createJobRoutes(deps: {
  readonly jobService: JobService;
  readonly agentIdentifier: string;
}): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(startJobRoute, async (c) => {
    const body = c.req.valid('json');
    const { job, payment } = await deps.jobService.startJob(body);

    return c.json(
      {
        status: 'success' as const,
        job_id: job.id,
        blockchainIdentifier: payment.blockchainIdentifier,
        agentIdentifier: deps.agentIdentifier,
        amounts: payment.amounts.map((a) => ({ amount: a.amount, unit: a.unit })),
        input_hash: job.inputHash,
        payByTime: payment.payByTime.toISOString(),
        submitResultTime: payment.submitResultTime.toISOString(),
        message: 'Job initiated. Check the status endpoint for completion.',
      },
      201,
    );
  });

  routes.openapi(statusRoute, async (c) => {
    const { job_id: jobId } = c.req.valid('query');
    const job = await deps.jobService.getStatus(jobId);
    const paymentStatus = await deps.jobService.getPaymentStatus(job);

    return c.json(toJobStatusResponse(job, paymentStatus), 200);
  });

  return routes;
}
