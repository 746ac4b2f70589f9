import type {
  CompletedJob,
  FailedJob,
  Job,
  JobBase,
  JobStatus,
  RunningJob,
} from '@cognisync/shared/src/types/job.types.js';
import type { KnowledgeObject } from '@cognisync/shared/src/types/knowledge.types.js';
import { PersistenceError } from '@cognisync/shared/src/utils/errors.js';

const ALLOWED_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

function assertTransition(job: Job, to: JobStatus): void {
  if (!ALLOWED_TRANSITIONS[job.status].includes(to)) {
    throw new PersistenceError(`Invalid job transition for ${job.id}: ${job.status} -> ${to}`);
  }
}

function baseOf(job: Job, updatedAt: Date): JobBase {
  return {
    id: job.id,
    input: job.input,
    identifierFromPurchaser: job.identifierFromPurchaser,
    blockchainIdentifier: job.blockchainIdentifier,
    inputHash: job.inputHash,
    createdAt: job.createdAt,
    updatedAt,
  };
}

export function toRunning(job: Job, now: Date): RunningJob {
  assertTransition(job, 'running');
  return { ...baseOf(job, now), status: 'running' };
}

export function toCompleted(job: Job, result: KnowledgeObject, now: Date): CompletedJob {
  assertTransition(job, 'completed');
  return { ...baseOf(job, now), status: 'completed', result };
}

export function toFailed(job: Job, error: string, now: Date): FailedJob {
  assertTransition(job, 'failed');
  return { ...baseOf(job, now), status: 'failed', error };
}
