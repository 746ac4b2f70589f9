import type { Job, PendingJob } from '@cognisync/shared/src/types/job.types.js';
import type { JobRepository } from '../../repositories/job.repository.js';
import type { VerificationAgent } from '../../agents/verification-agent.js';
import type { PaymentGateway, PaymentRequest, PaymentStatus } from '../payment/types.js';

export interface JobServiceDeps {
  readonly jobRepository: JobRepository;
  readonly verificationAgent: VerificationAgent;
  readonly paymentGateway: PaymentGateway;
}

export interface StartedJob {
  readonly job: PendingJob;
  readonly payment: PaymentRequest;
}

export interface JobService {
  /**
   * Validates a MIP-003 start request, registers a pending job and schedules
   * the verification run. Throws SchemaValidationError without creating a
   * job when the body is malformed.
   */
  startJob(raw: unknown): Promise<StartedJob>;
  /**
   * Runs the agent for a pending job and records the outcome on it. Throws
   * JobConflictError if the job is already running or finished. Otherwise it
   * rejects only when the outcome cannot be stored.
   */
  runJob(id: string): Promise<Job>;
  getStatus(id: string): Promise<Job>;
  getPaymentStatus(job: Job): Promise<PaymentStatus>;
  /** Resolves once every scheduled run has settled. */
  whenIdle(): Promise<void>;
}
