import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Config } from '../config';
import { logger } from '../logger';
import type { TransactionFeed } from '../types';
import { GoCardlessAuth, createHttpClient } from './gcAuth';
import {
  type CreateRequisitionOptions,
  type Institution,
  type Requisition,
  RequisitionManager,
} from './requisition';

const accountDetailsSchema = z.object({
  account: z
    .object({
      resourceId: z.string().optional(),
      details: z.string().optional(),
      name: z.string().optional(),
      iban: z.string().optional(),
      currency: z.string().optional(),
    })
    .passthrough(),
});

const transactionsSchema = z.object({
  transactions: z.object({
    booked: z.array(z.record(z.unknown())).default([]),
    pending: z.array(z.record(z.unknown())).default([]),
  }),
});

export type AccountDetails = z.infer<typeof accountDetailsSchema>['account'];

/**
 * The provider operations the archive relies on.
 */
export interface OpenBankingApi {
  refreshToken(): Promise<void>;
  listInstitutions(countryCode?: string): Promise<Institution[]>;
  getRequisition(requisitionId: string): Promise<Requisition | null>;
  listRequisitions(): Promise<Requisition[]>;
  deleteRequisition(requisitionId: string): Promise<void>;
  createRequisition(options: CreateRequisitionOptions): Promise<Requisition>;
  getAccountDetails(accountId: string): Promise<AccountDetails>;
  getTransactions(accountId: string): Promise<TransactionFeed>;
}

/**
 * Attach bearer auth and request/error logging to an axios instance
 */
export function withAuth(client: AxiosInstance, auth: GoCardlessAuth): AxiosInstance {
  client.interceptors.request.use(
    async (req) => {
      const token = await auth.getAccessToken();
      req.headers.Authorization = `Bearer ${token}`;

      logger.debug(
        { method: req.method, url: req.url, params: req.params },
        'GoCardless API request'
      );
      return req;
    },
    (error) => {
      logger.error({ err: error }, 'GoCardless request error');
      return Promise.reject(error);
    }
  );

  client.interceptors.response.use(
    (response) => response,
    (error) => {
      logger.debug(
        { status: error?.response?.status, data: error?.response?.data },
        'GoCardless API error'
      );
      return Promise.reject(error);
    }
  );

  return client;
}

export class GoCardlessClient implements OpenBankingApi {
  readonly requisitions: RequisitionManager;

  constructor(
    private readonly auth: GoCardlessAuth,
    private readonly client: AxiosInstance
  ) {
    this.requisitions = new RequisitionManager(client);
  }

  static fromConfig(gocardless: Config['gocardless']): GoCardlessClient {
    const auth = new GoCardlessAuth(createHttpClient(gocardless.baseUrl), {
      secretId: gocardless.secretId,
      secretKey: gocardless.secretKey,
    });
    return new GoCardlessClient(auth, withAuth(createHttpClient(gocardless.baseUrl), auth));
  }

  refreshToken(): Promise<void> {
    return this.auth.refreshToken();
  }

  listInstitutions(countryCode?: string): Promise<Institution[]> {
    return this.requisitions.listInstitutions(countryCode);
  }

  getRequisition(requisitionId: string): Promise<Requisition | null> {
    return this.requisitions.getRequisition(requisitionId);
  }

  listRequisitions(): Promise<Requisition[]> {
    return this.requisitions.listRequisitions();
  }

  deleteRequisition(requisitionId: string): Promise<void> {
    return this.requisitions.deleteRequisition(requisitionId);
  }

  createRequisition(options: CreateRequisitionOptions): Promise<Requisition> {
    return this.requisitions.createRequisition(options);
  }

  async getAccountDetails(accountId: string): Promise<AccountDetails> {
    try {
      const response = await this.client.get(`/api/v2/accounts/${accountId}/details/`);
      return accountDetailsSchema.parse(response.data).account;
    } catch (err) {
      logger.error({ err, accountId }, 'Failed to get account details');
      throw err;
    }
  }

  /**
   * Fetch the booked and pending feed for an account, newest first
   */
  async getTransactions(accountId: string): Promise<TransactionFeed> {
    try {
      const response = await this.client.get(`/api/v2/accounts/${accountId}/transactions/`);
      const { transactions } = transactionsSchema.parse(response.data);

      logger.debug(
        { accountId, booked: transactions.booked.length, pending: transactions.pending.length },
        'Fetched transactions'
      );
      return transactions;
    } catch (err) {
      logger.error({ err, accountId }, 'Failed to list transactions');
      throw err;
    }
  }
}
