import { describe, it, expect } from 'vitest';
import { Timestamp } from '@google-cloud/firestore';
import type { CompletedJob, FailedJob, PendingJob } from '@cognisync/shared/src/types/job.types.js';
import { PersistenceError } from '@cognisync/shared/src/utils/errors.js';
import { jobFromDocument, jobToDocument } from './firestore-job.repository.js';

const createdAt = new Date('2026-02-01T10:00:00.000Z');
const updatedAt = new Date('2026-02-01T10:00:05.000Z');

const pendingJob: PendingJob = {
  id: 'job-1',
  status: 'pending',
  input: { text: 'The sky is green.', maxClaims: 3 },
  identifierFromPurchaser: 'purchaser-1',
  blockchainIdentifier: 'local_abc',
  inputHash: 'hash-1',
  createdAt,
  updatedAt: createdAt,
};

const completedJob: CompletedJob = {
  ...pendingJob,
  status: 'completed',
  updatedAt,
  result: {
    sourceTextRef: 'sha256:abc',
    summary: 'Claims the sky is green.',
    keyClaims: ['The sky is green.'],
    reliabilityScore: 2,
    biasLevel: 'low',
    biasExplanation: 'Neutral wording.',
    verificationStatus: 'needs_review',
    provenance: {
      model: 'gemini-test',
      promptVersion: 'verification-v1',
      contentHash: 'abc',
      biasMarkers: [],
      generatedAt: updatedAt,
      tokenUsage: { input: 10, output: 20 },
    },
  },
};

describe('firestore job documents', () => {
  it('should store dates as timestamps', () => {
    const doc = jobToDocument(completedJob);

    expect(doc['createdAt']).toEqual(Timestamp.fromDate(createdAt));
    expect(doc['result']).toMatchObject({
      provenance: { generatedAt: Timestamp.fromDate(updatedAt) },
    });
  });

  it('should omit result and error on a pending job', () => {
    const doc = jobToDocument(pendingJob);

    expect(doc).not.toHaveProperty('result');
    expect(doc).not.toHaveProperty('error');
    expect(doc['status']).toBe('pending');
  });

  it('should read back a completed job', () => {
    expect(jobFromDocument('job-1', jobToDocument(completedJob))).toEqual(completedJob);
  });

  it('should read back a failed job', () => {
    const failedJob: FailedJob = {
      ...pendingJob,
      status: 'failed',
      updatedAt,
      error: 'quota exceeded',
    };
    expect(jobFromDocument('job-1', jobToDocument(failedJob))).toEqual(failedJob);
  });

  it('should reject a completed document without a result', () => {
    const doc = { ...jobToDocument(pendingJob), status: 'completed' };
    expect(() => jobFromDocument('job-1', doc)).toThrow('Completed job job-1 has no result');
  });

  it('should reject a failed document without an error', () => {
    const doc = { ...jobToDocument(pendingJob), status: 'failed' };
    expect(() => jobFromDocument('job-1', doc)).toThrow('Failed job job-1 has no error');
  });

  it('should reject malformed documents', () => {
    expect(() => jobFromDocument('job-1', { status: 'pending' })).toThrow(PersistenceError);
    expect(() => jobFromDocument('job-1', undefined)).toThrow(PersistenceError);
  });
});
