import type {
  CompletedJob,
  FailedJob,
  Job,
  PendingJob,
  RunningJob,
} from '@cognisync/shared/src/types/job.types.js';
import type { KnowledgeObject } from '@cognisync/shared/src/types/knowledge.types.js';
import { PersistenceError } from '@cognisync/shared/src/utils/errors.js';
import type { CreateJobInput, JobRepository } from './job.repository.js';
import { toCompleted, toFailed, toRunning } from './job-transitions.js';

export function createInMemoryJobRepository(): JobRepository {
  const jobs = new Map<string, Job>();

  function transition<T extends Job>(id: string, apply: (current: Job) => T): Promise<T> {
    const current = jobs.get(id);
    if (!current) {
      return Promise.reject(new PersistenceError(`Job not found: ${id}`));
    }
    try {
      const next = apply(current);
      jobs.set(id, next);
      return Promise.resolve(next);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  return {
    create(input: CreateJobInput): Promise<PendingJob> {
      if (jobs.has(input.id)) {
        return Promise.reject(new PersistenceError(`Job already exists: ${input.id}`));
      }
      const now = new Date();
      const job: PendingJob = {
        ...input,
        status: 'pending',
        createdAt: now,
        updatedAt: now,
      };
      jobs.set(job.id, job);
      return Promise.resolve(job);
    },

    getById(id: string): Promise<Job | null> {
      return Promise.resolve(jobs.get(id) ?? null);
    },

    markRunning(id: string): Promise<RunningJob> {
      return transition(id, (current) => toRunning(current, new Date()));
    },

    markCompleted(id: string, result: KnowledgeObject): Promise<CompletedJob> {
      return transition(id, (current) => toCompleted(current, result, new Date()));
    },

    markFailed(id: string, error: string): Promise<FailedJob> {
      return transition(id, (current) => toFailed(current, error, new Date()));
    },
  };
}
