import { randomUUID } from 'node:crypto';
import { DEFAULT_MAX_CLAIMS } from '@cognisync/schemas/src/job-input.schema.js';
import { validateStartJobInput } from '@cognisync/schemas/src/validators.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import type { Job, JobInput } from '@cognisync/shared/src/types/job.types.js';
import { JobConflictError, JobNotFoundError, toError } from '@cognisync/shared/src/utils/errors.js';
import { sha256Hex } from '../../analysis/content-hash.js';
import type { NormalizationResult } from '../../normalization/result-normalizer.js';
import type { PaymentStatus } from '../payment/types.js';
import type { JobService, JobServiceDeps, StartedJob } from './types.js';

const log = createChildLogger('service:jobs');

export function computeInputHash(input: JobInput): string {
  return sha256Hex(JSON.stringify({ text: input.text, maxClaims: input.maxClaims }));
}

export function createJobService(deps: JobServiceDeps): JobService {
  const { jobRepository, verificationAgent, paymentGateway } = deps;
  const inFlight = new Set<Promise<Job>>();
  const active = new Set<string>();

  async function failJob(id: string, message: string): Promise<Job> {
    const failed = await jobRepository.markFailed(id, message);
    log.warn({ jobId: id, error: message }, 'Job failed');
    return failed;
  }

  async function execute(id: string): Promise<Job> {
    const job = await jobRepository.getById(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    if (job.status !== 'pending') {
      throw new JobConflictError(id, job.status);
    }

    const running = await jobRepository.markRunning(id);
    log.info({ jobId: id }, 'Job running');

    try {
      let outcome: NormalizationResult;
      try {
        outcome = await verificationAgent.verify(running.input);
      } catch (error) {
        return await failJob(id, toError(error).message);
      }

      if (outcome.kind === 'parse_failure') {
        return await failJob(id, `Model output could not be parsed: ${outcome.reason}`);
      }

      const completed = await jobRepository.markCompleted(id, outcome.knowledge);
      log.info(
        {
          jobId: id,
          reliabilityScore: outcome.knowledge.reliabilityScore,
          biasLevel: outcome.knowledge.biasLevel,
        },
        'Job completed',
      );
      return completed;
    } catch (error) {
      // Store-level failure after the job started: record it if the store still accepts writes.
      const message = toError(error).message;
      log.error({ jobId: id, error: message }, 'Job run aborted');
      try {
        return await failJob(id, message);
      } catch (markError) {
        log.error({ jobId: id, error: toError(markError).message }, 'Could not record job failure');
        throw toError(markError);
      }
    }
  }

  async function runJob(id: string): Promise<Job> {
    if (active.has(id)) {
      throw new JobConflictError(id, 'running');
    }
    active.add(id);
    try {
      return await execute(id);
    } finally {
      active.delete(id);
    }
  }

  function schedule(id: string): void {
    const run = runJob(id);
    inFlight.add(run);
    void run
      .catch((error: unknown) => {
        log.error({ jobId: id, error: toError(error).message }, 'Background job run rejected');
      })
      .finally(() => {
        inFlight.delete(run);
      });
  }

  return {
    async startJob(raw: unknown): Promise<StartedJob> {
      const request = validateStartJobInput(raw);
      const input: JobInput = {
        text: request.input_data.text,
        maxClaims: request.input_data.max_claims ?? DEFAULT_MAX_CLAIMS,
      };
      const id = randomUUID();
      const inputHash = computeInputHash(input);

      const payment = await paymentGateway.createPaymentRequest({
        jobId: id,
        identifierFromPurchaser: request.identifier_from_purchaser,
        inputHash,
      });

      const job = await jobRepository.create({
        id,
        input,
        identifierFromPurchaser: request.identifier_from_purchaser,
        blockchainIdentifier: payment.blockchainIdentifier,
        inputHash,
      });
      log.info({ jobId: id, textLength: input.text.length, maxClaims: input.maxClaims }, 'Job created');

      schedule(id);

      return { job, payment };
    },

    runJob,

    async getStatus(id: string): Promise<Job> {
      const job = await jobRepository.getById(id);
      if (!job) {
        throw new JobNotFoundError(id);
      }
      return job;
    },

    getPaymentStatus(job: Job): Promise<PaymentStatus> {
      return paymentGateway.getPaymentStatus(job.blockchainIdentifier);
    },

    async whenIdle(): Promise<void> {
      await Promise.allSettled([...inFlight]);
    },
  };
}
