import { describe, it, expect } from 'vitest';
import { loadConfig } from '@cognisync/schemas/src/config-loader.js';
import { createServices } from './services.js';

describe('createServices', () => {
  it('should wire an in-memory job service in mock mode', async () => {
    const { jobService } = await createServices(loadConfig({ COGNISYNC_MOCK_LLM: 'true' }));

    const { job } = await jobService.startJob({
      identifier_from_purchaser: 'buyer-1',
      input_data: { text: 'Water is wet. Obviously ice is cold.' },
    });
    await jobService.whenIdle();

    const done = await jobService.getStatus(job.id);
    expect(done.status).toBe('completed');
    if (done.status === 'completed') {
      expect(done.result.keyClaims).toEqual(['Water is wet.', 'Obviously ice is cold.']);
      expect(done.result.biasLevel).toBe('medium');
      expect(done.result.provenance.model).toBe('mock-gemini');
      expect(done.result.provenance.biasMarkers).toEqual(['obviously']);
    }
  });
});
