import { describe, it, expect, vi } from 'vitest';
import { LlmError } from '@cognisync/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import { createVerificationAgent } from './verification-agent.js';

const fixedNow = new Date('2026-03-01T12:00:00.000Z');

function createMockLlm(content: string): LlmClient {
  return {
    invoke: vi.fn().mockResolvedValue({ content, model: 'gemini-test' }),
  };
}

describe('createVerificationAgent', () => {
  it('should send the built prompt once and normalize the answer', async () => {
    const llmClient = createMockLlm(
      JSON.stringify({
        summary: 'Claims about the sky and boiling water.',
        key_claims: ['The sky is green', 'Water boils at 50°C'],
        reliability_score: 3,
        bias_level: 'Low',
        bias_explanation: 'Plain wording.',
      }),
    );
    const agent = createVerificationAgent({ llmClient, now: () => fixedNow });

    const result = await agent.verify({
      text: 'The sky is green and water boils at 50°C',
      maxClaims: 5,
    });

    expect(llmClient.invoke).toHaveBeenCalledTimes(1);
    const request = vi.mocked(llmClient.invoke).mock.calls[0][0];
    expect(request.userMessage).toBe(
      '<source_text>\nThe sky is green and water boils at 50°C\n</source_text>',
    );

    expect(result.kind).toBe('parsed');
    if (result.kind === 'parsed') {
      expect(result.knowledge.reliabilityScore).toBe(3);
      expect(result.knowledge.biasLevel).toBe('low');
      expect(result.knowledge.keyClaims).toEqual(['The sky is green', 'Water boils at 50°C']);
      expect(result.knowledge.provenance.model).toBe('gemini-test');
      expect(result.knowledge.provenance.promptVersion).toBe('verification-v1');
      expect(result.knowledge.provenance.generatedAt).toEqual(fixedNow);
    }
  });

  it('should resolve to a parse failure for unusable output', async () => {
    const agent = createVerificationAgent({ llmClient: createMockLlm('no json at all') });

    const result = await agent.verify({ text: 'Some text', maxClaims: 5 });

    expect(result).toEqual({
      kind: 'parse_failure',
      reason: 'No JSON object found in model response: no json at all',
    });
  });

  it('should propagate provider errors', async () => {
    const llmClient: LlmClient = {
      invoke: vi.fn().mockRejectedValue(new LlmError('API key not valid', false)),
    };
    const agent = createVerificationAgent({ llmClient });

    await expect(agent.verify({ text: 'Some text', maxClaims: 5 })).rejects.toThrow(
      'API key not valid',
    );
  });
});
