import type {
  CompletedJob,
  FailedJob,
  Job,
  JobInput,
  PendingJob,
  RunningJob,
} from '@cognisync/shared/src/types/job.types.js';
import type { KnowledgeObject } from '@cognisync/shared/src/types/knowledge.types.js';

export interface CreateJobInput {
  readonly id: string;
  readonly input: JobInput;
  readonly identifierFromPurchaser: string;
  readonly blockchainIdentifier: string;
  readonly inputHash: string;
}

/**
 * Job status table. Transition methods reject with a PersistenceError when
 * the job is missing or the move is not allowed from its current status.
 */
export interface JobRepository {
  create(input: CreateJobInput): Promise<PendingJob>;
  getById(id: string): Promise<Job | null>;
  markRunning(id: string): Promise<RunningJob>;
  markCompleted(id: string, result: KnowledgeObject): Promise<CompletedJob>;
  markFailed(id: string, error: string): Promise<FailedJob>;
}
