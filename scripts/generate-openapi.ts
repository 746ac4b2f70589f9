import { createApp } from '../packages/api/src/app.js';
import { createServices } from '../packages/core/src/infrastructure/services.js';
import { loadConfig } from '../packages/schemas/src/config-loader.js';

const config = loadConfig({ COGNISYNC_MOCK_LLM: 'true' });
const { jobService } = await createServices(config);

const app = createApp({
  jobService,
  agentIdentifier: config.payment.agentIdentifier,
  version: '0.1.0',
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'CogniSync Agent API',
    version: '0.1.0',
    description: 'Knowledge verification agent speaking the MIP-003 job protocol',
  },
  servers: [
    { url: 'http://localhost:3000', description: 'Local development' },
  ],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
