import { describe, it, expect } from 'vitest';
import { ModelKnowledgeOutputJsonSchema, ModelKnowledgeOutputSchema } from './knowledge-output.schema.js';

const validOutput = {
  summary: 'A short summary.',
  key_claims: ['Claim one'],
  reliability_score: 40,
  bias_level: 'medium',
  bias_explanation: 'Some loaded wording.',
};

describe('ModelKnowledgeOutputSchema', () => {
  it('should accept a well-formed model answer', () => {
    const result = ModelKnowledgeOutputSchema.safeParse(validOutput);
    expect(result.success).toBe(true);
  });

  it('should normalize bias level casing and whitespace', () => {
    const result = ModelKnowledgeOutputSchema.parse({ ...validOutput, bias_level: ' HIGH ' });
    expect(result.bias_level).toBe('high');
  });

  it('should reject an unknown bias level', () => {
    const result = ModelKnowledgeOutputSchema.safeParse({ ...validOutput, bias_level: 'extreme' });
    expect(result.success).toBe(false);
  });

  it('should reject scores outside [0, 100]', () => {
    expect(ModelKnowledgeOutputSchema.safeParse({ ...validOutput, reliability_score: 101 }).success).toBe(false);
    expect(ModelKnowledgeOutputSchema.safeParse({ ...validOutput, reliability_score: -1 }).success).toBe(false);
  });

  it('should reject fractional scores', () => {
    const result = ModelKnowledgeOutputSchema.safeParse({ ...validOutput, reliability_score: 72.5 });
    expect(result.success).toBe(false);
  });

  it('should reject an empty summary', () => {
    const result = ModelKnowledgeOutputSchema.safeParse({ ...validOutput, summary: '  ' });
    expect(result.success).toBe(false);
  });
});

describe('ModelKnowledgeOutputJsonSchema', () => {
  it('should list the allowed bias levels', () => {
    const serialized = JSON.stringify(ModelKnowledgeOutputJsonSchema);
    expect(serialized).toContain('"enum":["low","medium","high"]');
  });
});
