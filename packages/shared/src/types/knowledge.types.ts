export const BIAS_LEVELS = ['low', 'medium', 'high'] as const;

export type BiasLevel = (typeof BIAS_LEVELS)[number];

export type VerificationStatus = 'verified' | 'needs_review';

export interface TokenUsage {
  readonly input: number;
  readonly output: number;
}

export interface KnowledgeProvenance {
  readonly model: string;
  readonly promptVersion: string;
  readonly contentHash: string;
  readonly biasMarkers: readonly string[];
  readonly generatedAt: Date;
  readonly tokenUsage?: TokenUsage;
}

/**
 * Structured verification record produced for one job.
 * Never mutated after the normalizer hands it back.
 */
export interface KnowledgeObject {
  readonly sourceTextRef: string;
  readonly summary: string;
  readonly keyClaims: readonly string[];
  /** Integer in [0, 100]. */
  readonly reliabilityScore: number;
  readonly biasLevel: BiasLevel;
  readonly biasExplanation: string;
  readonly verificationStatus: VerificationStatus;
  readonly provenance: KnowledgeProvenance;
}
