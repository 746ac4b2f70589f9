export interface PaymentAmount {
  readonly amount: string;
  readonly unit: string;
}

export interface CreatePaymentRequestParams {
  readonly jobId: string;
  readonly identifierFromPurchaser: string;
  readonly inputHash: string;
}

export interface PaymentRequest {
  readonly blockchainIdentifier: string;
  readonly amounts: readonly PaymentAmount[];
  readonly payByTime: Date;
  readonly submitResultTime: Date;
}

export type PaymentStatus = 'pending' | 'completed';

export interface PaymentGateway {
  createPaymentRequest(params: CreatePaymentRequestParams): Promise<PaymentRequest>;
  getPaymentStatus(blockchainIdentifier: string): Promise<PaymentStatus>;
}
