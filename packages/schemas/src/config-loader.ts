import { ConfigurationError } from '@cognisync/shared/src/utils/errors.js';
import { EnvSchema } from './config.schema.js';
import type { AppConfig } from './config.schema.js';
import { formatZodErrors } from './validators.js';

/**
 * Builds the typed application config from environment variables.
 * Callers load `.env` (dotenv) before invoking this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid environment configuration: ${formatZodErrors(result.error).join(', ')}`,
    );
  }

  const vars = result.data;

  if (!vars.COGNISYNC_MOCK_LLM && !vars.GEMINI_API_KEY) {
    throw new ConfigurationError(
      'GEMINI_API_KEY environment variable is required unless COGNISYNC_MOCK_LLM is enabled',
    );
  }

  if (vars.JOB_STORE === 'firestore' && !vars.FIRESTORE_PROJECT_ID) {
    throw new ConfigurationError(
      'FIRESTORE_PROJECT_ID environment variable is required when JOB_STORE=firestore',
    );
  }

  return {
    port: vars.PORT,
    llm: {
      mock: vars.COGNISYNC_MOCK_LLM,
      apiKey: vars.GEMINI_API_KEY,
      model: vars.GEMINI_MODEL,
      timeoutMs: vars.LLM_TIMEOUT_MS,
      maxRetries: vars.LLM_MAX_RETRIES,
    },
    payment: {
      agentIdentifier: vars.AGENT_IDENTIFIER,
      network: vars.NETWORK,
      amounts: [{ amount: vars.PAYMENT_AMOUNT, unit: vars.PAYMENT_UNIT }],
      serviceUrl: vars.PAYMENT_SERVICE_URL,
      apiKey: vars.PAYMENT_API_KEY,
      sellerVkey: vars.SELLER_VKEY,
    },
    jobStore: {
      kind: vars.JOB_STORE,
      firestoreProjectId: vars.FIRESTORE_PROJECT_ID,
    },
  };
}
