import { Firestore } from '@google-cloud/firestore';
import type { AppConfig } from '@cognisync/schemas/src/config.schema.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import { createVerificationAgent } from '../agents/verification-agent.js';
import { createLlmClient } from '../llm/llm-client.js';
import { createInMemoryJobRepository } from '../repositories/in-memory-job.repository.js';
import type { JobRepository } from '../repositories/job.repository.js';
import { createJobService } from '../services/jobs/job-service.js';
import type { JobService } from '../services/jobs/types.js';
import { createLocalPaymentGateway } from '../services/payment/local-payment-gateway.js';
import type { PaymentGateway } from '../services/payment/types.js';
import { createFirestoreJobRepository } from './firestore-job.repository.js';

const log = createChildLogger('infrastructure:services');

export interface Services {
  readonly jobRepository: JobRepository;
  readonly paymentGateway: PaymentGateway;
  readonly jobService: JobService;
}

function createJobRepository(config: AppConfig['jobStore']): JobRepository {
  if (config.kind === 'firestore') {
    const db = new Firestore({
      projectId: config.firestoreProjectId,
      ignoreUndefinedProperties: true,
    });
    return createFirestoreJobRepository(db);
  }
  return createInMemoryJobRepository();
}

export async function createServices(config: AppConfig): Promise<Services> {
  const llmClient = await createLlmClient(config.llm);
  const jobRepository = createJobRepository(config.jobStore);
  const paymentGateway = createLocalPaymentGateway(config.payment);

  const jobService = createJobService({
    jobRepository,
    verificationAgent: createVerificationAgent({ llmClient }),
    paymentGateway,
  });

  log.info(
    { jobStore: config.jobStore.kind, mockLlm: config.llm.mock, model: config.llm.model },
    'Services initialized',
  );

  return { jobRepository, paymentGateway, jobService };
}
