import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
  COGNISYNC_MOCK_LLM: booleanFlag,
  JOB_STORE: z.enum(['memory', 'firestore']).default('memory'),
  FIRESTORE_PROJECT_ID: optionalString,
  AGENT_IDENTIFIER: z.string().min(1).default('cognisync-agent'),
  NETWORK: z.enum(['Preprod', 'Mainnet']).default('Preprod'),
  PAYMENT_AMOUNT: z.string().regex(/^\d+$/, 'must be a whole number').default('10000000'),
  PAYMENT_UNIT: z.string().min(1).default('lovelace'),
  PAYMENT_SERVICE_URL: optionalString.pipe(z.string().url().optional()),
  PAYMENT_API_KEY: optionalString,
  SELLER_VKEY: optionalString,
});

export interface LlmConfig {
  readonly mock: boolean;
  readonly apiKey?: string;
  readonly model: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface PaymentConfig {
  readonly agentIdentifier: string;
  readonly network: 'Preprod' | 'Mainnet';
  readonly amounts: readonly { readonly amount: string; readonly unit: string }[];
  readonly serviceUrl?: string;
  readonly apiKey?: string;
  readonly sellerVkey?: string;
}

export interface JobStoreConfig {
  readonly kind: 'memory' | 'firestore';
  readonly firestoreProjectId?: string;
}

export interface AppConfig {
  readonly port: number;
  readonly llm: LlmConfig;
  readonly payment: PaymentConfig;
  readonly jobStore: JobStoreConfig;
}
