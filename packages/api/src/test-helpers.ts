import type { OpenAPIHono } from '@hono/zod-openapi';
import { createVerificationAgent } from '@cognisync/core/src/agents/verification-agent.js';
import type { LlmClient } from '@cognisync/core/src/llm/llm-client.js';
import { createInMemoryJobRepository } from '@cognisync/core/src/repositories/in-memory-job.repository.js';
import type { JobRepository } from '@cognisync/core/src/repositories/job.repository.js';
import { createJobService } from '@cognisync/core/src/services/jobs/job-service.js';
import type { JobService } from '@cognisync/core/src/services/jobs/types.js';
import { createLocalPaymentGateway } from '@cognisync/core/src/services/payment/local-payment-gateway.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export const TEST_AGENT_IDENTIFIER = 'test-agent';

export interface TestApp {
  readonly app: OpenAPIHono<AppEnv>;
  readonly jobService: JobService;
  readonly jobRepository: JobRepository;
}

/**
 * Builds the full app over an in-memory job store and the given LLM client.
 * For use in unit tests only.
 */
export function createTestApp(llmClient: LlmClient): TestApp {
  const jobRepository = createInMemoryJobRepository();
  const jobService = createJobService({
    jobRepository,
    verificationAgent: createVerificationAgent({ llmClient }),
    paymentGateway: createLocalPaymentGateway({
      agentIdentifier: TEST_AGENT_IDENTIFIER,
      network: 'Preprod',
      amounts: [{ amount: '10000000', unit: 'lovelace' }],
    }),
  });

  const app = createApp({ jobService, agentIdentifier: TEST_AGENT_IDENTIFIER, version: '0.1.0' });

  return { app, jobService, jobRepository };
}
