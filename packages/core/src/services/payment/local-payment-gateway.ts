import { createChildLogger } from '@cognisync/shared/src/logger.js';
import { sha256Hex } from '../../analysis/content-hash.js';
import type {
  CreatePaymentRequestParams,
  PaymentAmount,
  PaymentGateway,
  PaymentRequest,
  PaymentStatus,
} from './types.js';

type GatewayLogger = Pick<ReturnType<typeof createChildLogger>, 'info' | 'debug'>;

const PAY_BY_WINDOW_MS = 60 * 60 * 1000;
const SUBMIT_RESULT_WINDOW_MS = 12 * 60 * 60 * 1000;

export interface LocalPaymentGatewayConfig {
  readonly agentIdentifier: string;
  readonly network: string;
  readonly amounts: readonly PaymentAmount[];
  readonly serviceUrl?: string;
  readonly apiKey?: string;
  readonly sellerVkey?: string;
  readonly now?: () => Date;
  readonly logger?: GatewayLogger;
}

/**
 * Issues payment requests without contacting a payment service. Jobs start
 * immediately; nothing waits for on-chain confirmation, so every payment
 * stays `pending`. Payment-service settings are accepted and logged only.
 */
export function createLocalPaymentGateway(config: LocalPaymentGatewayConfig): PaymentGateway {
  const now = config.now ?? ((): Date => new Date());
  const log = config.logger ?? createChildLogger('payment:local');

  log.info(
    {
      agentIdentifier: config.agentIdentifier,
      network: config.network,
      serviceUrl: config.serviceUrl ?? null,
      apiKeyConfigured: config.apiKey !== undefined,
      sellerVkeyConfigured: config.sellerVkey !== undefined,
    },
    'Local payment gateway ready',
  );

  return {
    createPaymentRequest(params: CreatePaymentRequestParams): Promise<PaymentRequest> {
      const digest = sha256Hex(
        `${params.jobId}:${params.identifierFromPurchaser}:${params.inputHash}`,
      );
      const issuedAt = now().getTime();

      const request: PaymentRequest = {
        blockchainIdentifier: `local_${digest.slice(0, 32)}`,
        amounts: config.amounts,
        payByTime: new Date(issuedAt + PAY_BY_WINDOW_MS),
        submitResultTime: new Date(issuedAt + SUBMIT_RESULT_WINDOW_MS),
      };

      log.debug(
        {
          jobId: params.jobId,
          agentIdentifier: config.agentIdentifier,
          network: config.network,
          blockchainIdentifier: request.blockchainIdentifier,
        },
        'Local payment request issued',
      );

      return Promise.resolve(request);
    },

    getPaymentStatus(): Promise<PaymentStatus> {
      return Promise.resolve('pending');
    },
  };
}
