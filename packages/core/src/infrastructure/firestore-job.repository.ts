import type { DocumentData, Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import { z } from 'zod';
import type {
  CompletedJob,
  FailedJob,
  Job,
  PendingJob,
  RunningJob,
} from '@cognisync/shared/src/types/job.types.js';
import { BIAS_LEVELS, type KnowledgeObject } from '@cognisync/shared/src/types/knowledge.types.js';
import { PersistenceError, toError } from '@cognisync/shared/src/utils/errors.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import type { CreateJobInput, JobRepository } from '../repositories/job.repository.js';
import { toCompleted, toFailed, toRunning } from '../repositories/job-transitions.js';

const log = createChildLogger('firestore:jobs');

const COLLECTION = 'jobs';

const TimestampSchema = z.instanceof(Timestamp);

const KnowledgeDocumentSchema = z.object({
  sourceTextRef: z.string(),
  summary: z.string(),
  keyClaims: z.array(z.string()),
  reliabilityScore: z.number().int().min(0).max(100),
  biasLevel: z.enum(BIAS_LEVELS),
  biasExplanation: z.string(),
  verificationStatus: z.enum(['verified', 'needs_review']),
  provenance: z.object({
    model: z.string(),
    promptVersion: z.string(),
    contentHash: z.string(),
    biasMarkers: z.array(z.string()),
    generatedAt: TimestampSchema,
    tokenUsage: z.object({ input: z.number(), output: z.number() }).optional(),
  }),
});

const JobDocumentSchema = z.object({
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  input: z.object({ text: z.string(), maxClaims: z.number().int() }),
  identifierFromPurchaser: z.string(),
  blockchainIdentifier: z.string(),
  inputHash: z.string(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
  result: KnowledgeDocumentSchema.optional(),
  error: z.string().optional(),
});

type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;

function knowledgeToDocument(knowledge: KnowledgeObject): KnowledgeDocument {
  return {
    ...knowledge,
    keyClaims: [...knowledge.keyClaims],
    provenance: {
      ...knowledge.provenance,
      biasMarkers: [...knowledge.provenance.biasMarkers],
      generatedAt: Timestamp.fromDate(knowledge.provenance.generatedAt),
    },
  };
}

function knowledgeFromDocument(data: KnowledgeDocument): KnowledgeObject {
  return {
    ...data,
    provenance: {
      ...data.provenance,
      generatedAt: data.provenance.generatedAt.toDate(),
    },
  };
}

export function jobToDocument(job: Job): DocumentData {
  return {
    status: job.status,
    input: { text: job.input.text, maxClaims: job.input.maxClaims },
    identifierFromPurchaser: job.identifierFromPurchaser,
    blockchainIdentifier: job.blockchainIdentifier,
    inputHash: job.inputHash,
    createdAt: Timestamp.fromDate(job.createdAt),
    updatedAt: Timestamp.fromDate(job.updatedAt),
    ...(job.status === 'completed' && { result: knowledgeToDocument(job.result) }),
    ...(job.status === 'failed' && { error: job.error }),
  };
}

export function jobFromDocument(id: string, raw: unknown): Job {
  const parsed = JobDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(`Malformed job document ${id}: ${parsed.error.message}`);
  }

  const data = parsed.data;
  const base = {
    id,
    input: data.input,
    identifierFromPurchaser: data.identifierFromPurchaser,
    blockchainIdentifier: data.blockchainIdentifier,
    inputHash: data.inputHash,
    createdAt: data.createdAt.toDate(),
    updatedAt: data.updatedAt.toDate(),
  };

  switch (data.status) {
    case 'pending':
    case 'running':
      return { ...base, status: data.status };
    case 'completed':
      if (!data.result) {
        throw new PersistenceError(`Completed job ${id} has no result`);
      }
      return { ...base, status: 'completed', result: knowledgeFromDocument(data.result) };
    case 'failed':
      if (data.error === undefined) {
        throw new PersistenceError(`Failed job ${id} has no error`);
      }
      return { ...base, status: 'failed', error: data.error };
  }
}

export function createFirestoreJobRepository(db: Firestore): JobRepository {
  const jobsRef = db.collection(COLLECTION);

  async function transition<T extends Job>(id: string, apply: (current: Job) => T): Promise<T> {
    const docRef = jobsRef.doc(id);

    try {
      return await db.runTransaction(async (tx) => {
        const snapshot = await tx.get(docRef);
        if (!snapshot.exists) {
          throw new PersistenceError(`Job not found: ${id}`);
        }
        const next = apply(jobFromDocument(id, snapshot.data()));
        tx.set(docRef, jobToDocument(next));
        return next;
      });
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      const cause = toError(error);
      log.error({ jobId: id, error: cause.message }, 'Job transition failed');
      throw new PersistenceError(`Failed to update job ${id}: ${cause.message}`, cause);
    }
  }

  return {
    async create(input: CreateJobInput): Promise<PendingJob> {
      const now = new Date();
      const job: PendingJob = { ...input, status: 'pending', createdAt: now, updatedAt: now };

      try {
        await jobsRef.doc(job.id).create(jobToDocument(job));
      } catch (error) {
        throw new PersistenceError(`Failed to create job ${job.id}`, toError(error));
      }

      return job;
    },

    async getById(id: string): Promise<Job | null> {
      const doc = await jobsRef.doc(id).get();
      if (!doc.exists) {
        return null;
      }
      return jobFromDocument(id, doc.data());
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
