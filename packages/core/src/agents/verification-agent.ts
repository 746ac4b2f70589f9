import type { JobInput } from '@cognisync/shared/src/types/job.types.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { normalizeModelOutput, type NormalizationResult } from '../normalization/result-normalizer.js';
import { buildVerificationPrompt, PROMPT_VERSION } from './verification-prompt.js';

const log = createChildLogger('agent:verification');

export interface VerificationAgentDeps {
  readonly llmClient: LlmClient;
  readonly now?: () => Date;
}

export interface VerificationAgent {
  /**
   * Calls the model once. Provider failures reject with the client's error;
   * unusable output resolves to a `parse_failure`.
   */
  verify(input: JobInput): Promise<NormalizationResult>;
}

export function createVerificationAgent(deps: VerificationAgentDeps): VerificationAgent {
  const now = deps.now ?? ((): Date => new Date());

  return {
    async verify(input: JobInput): Promise<NormalizationResult> {
      log.info({ textLength: input.text.length, maxClaims: input.maxClaims }, 'Invoking model');

      const response = await deps.llmClient.invoke(buildVerificationPrompt(input));

      const result = normalizeModelOutput(response.content, {
        sourceText: input.text,
        maxClaims: input.maxClaims,
        model: response.model,
        promptVersion: PROMPT_VERSION,
        tokenUsage: response.tokenUsage,
        generatedAt: now(),
      });

      if (result.kind === 'parse_failure') {
        log.warn({ reason: result.reason }, 'Model output could not be normalized');
      } else {
        log.info(
          {
            reliabilityScore: result.knowledge.reliabilityScore,
            biasLevel: result.knowledge.biasLevel,
            claims: result.knowledge.keyClaims.length,
          },
          'Model output normalized',
        );
      }

      return result;
    },
  };
}
