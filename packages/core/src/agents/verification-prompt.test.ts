import { describe, it, expect } from 'vitest';
import { buildVerificationPrompt, PROMPT_VERSION } from './verification-prompt.js';

describe('buildVerificationPrompt', () => {
  const input = { text: 'Water boils at 50°C.', maxClaims: 3 };

  it('should wrap the source text in delimiters', () => {
    const request = buildVerificationPrompt(input);
    expect(request.userMessage).toBe('<source_text>\nWater boils at 50°C.\n</source_text>');
  });

  it('should state the claim limit and every output field', () => {
    const { systemPrompt } = buildVerificationPrompt(input);
    expect(systemPrompt).toContain('key_claims: at most 3 key factual claims');
    for (const field of ['summary', 'key_claims', 'reliability_score', 'bias_level', 'bias_explanation']) {
      expect(systemPrompt).toContain(`"${field}"`);
    }
  });

  it('should be deterministic for the same input', () => {
    expect(buildVerificationPrompt(input)).toEqual(buildVerificationPrompt({ ...input }));
  });

  it('should carry a prompt version', () => {
    expect(PROMPT_VERSION).toBe('verification-v1');
  });
});
