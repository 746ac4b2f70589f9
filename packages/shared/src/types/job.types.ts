import type { KnowledgeObject } from './knowledge.types.js';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface JobInput {
  readonly text: string;
  readonly maxClaims: number;
}

export interface JobBase {
  readonly id: string;
  readonly input: JobInput;
  readonly identifierFromPurchaser: string;
  readonly blockchainIdentifier: string;
  readonly inputHash: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface PendingJob extends JobBase {
  readonly status: 'pending';
}

export interface RunningJob extends JobBase {
  readonly status: 'running';
}

export interface CompletedJob extends JobBase {
  readonly status: 'completed';
  readonly result: KnowledgeObject;
}

export interface FailedJob extends JobBase {
  readonly status: 'failed';
  readonly error: string;
}

export type Job = PendingJob | RunningJob | CompletedJob | FailedJob;
