import { ModelKnowledgeOutputSchema } from '@cognisync/schemas/src/knowledge-output.schema.js';
import { formatZodErrors } from '@cognisync/schemas/src/validators.js';
import type {
  BiasLevel,
  KnowledgeObject,
  TokenUsage,
  VerificationStatus,
} from '@cognisync/shared/src/types/knowledge.types.js';
import { findBiasMarkers } from '../analysis/bias-markers.js';
import { sha256Hex } from '../analysis/content-hash.js';
import { extractJsonObject } from '../llm/json-extraction.js';

export const VERIFIED_SCORE_THRESHOLD = 75;

export type NormalizationResult =
  | { readonly kind: 'parsed'; readonly knowledge: KnowledgeObject }
  | { readonly kind: 'parse_failure'; readonly reason: string };

export interface NormalizationContext {
  readonly sourceText: string;
  readonly maxClaims: number;
  readonly model: string;
  readonly promptVersion: string;
  readonly tokenUsage?: TokenUsage;
  readonly generatedAt: Date;
}

export function deriveVerificationStatus(
  reliabilityScore: number,
  biasLevel: BiasLevel,
): VerificationStatus {
  return reliabilityScore >= VERIFIED_SCORE_THRESHOLD && biasLevel === 'low'
    ? 'verified'
    : 'needs_review';
}

/**
 * Turns raw model text into a {@link KnowledgeObject}. Out-of-range or missing
 * fields produce a `parse_failure`; values are never clamped or invented.
 */
export function normalizeModelOutput(
  content: string,
  context: NormalizationContext,
): NormalizationResult {
  const extracted = extractJsonObject(content);
  if (!extracted.ok) {
    return { kind: 'parse_failure', reason: extracted.reason };
  }

  const result = ModelKnowledgeOutputSchema.safeParse(extracted.value);
  if (!result.success) {
    return { kind: 'parse_failure', reason: formatZodErrors(result.error).join('; ') };
  }

  const output = result.data;
  const keyClaims = output.key_claims
    .map((claim) => claim.trim())
    .filter((claim) => claim.length > 0)
    .slice(0, context.maxClaims);
  const contentHash = sha256Hex(context.sourceText);

  return {
    kind: 'parsed',
    knowledge: {
      sourceTextRef: `sha256:${contentHash}`,
      summary: output.summary,
      keyClaims,
      reliabilityScore: output.reliability_score,
      biasLevel: output.bias_level,
      biasExplanation: output.bias_explanation.trim(),
      verificationStatus: deriveVerificationStatus(output.reliability_score, output.bias_level),
      provenance: {
        model: context.model,
        promptVersion: context.promptVersion,
        contentHash,
        biasMarkers: findBiasMarkers(context.sourceText),
        generatedAt: context.generatedAt,
        tokenUsage: context.tokenUsage,
      },
    },
  };
}
