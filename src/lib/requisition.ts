import axios, { type AxiosInstance } from 'axios';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { logger } from '../logger';

export const LINKED_STATUS = 'LN';

const institutionSchema = z.object({
  id: z.string(),
  name: z.string(),
  bic: z.string().optional(),
  transaction_total_days: z.string().optional(),
  countries: z.array(z.string()).default([]),
  logo: z.string().optional(),
});

const agreementSchema = z.object({
  id: z.string(),
  created: z.string().optional(),
  max_historical_days: z.number(),
  access_valid_for_days: z.number(),
  access_scope: z.array(z.string()).default([]),
  accepted: z.string().nullable().optional(),
  institution_id: z.string(),
});

const requisitionSchema = z.object({
  id: z.string(),
  created: z.string().optional(),
  redirect: z.string().optional(),
  status: z.string(),
  institution_id: z.string(),
  agreement: z.string().optional(),
  reference: z.string().optional(),
  accounts: z.array(z.string()).default([]),
  user_language: z.string().optional(),
  link: z.string(),
});

const requisitionPageSchema = z.object({
  count: z.number(),
  next: z.string().nullable(),
  previous: z.string().nullable(),
  results: z.array(requisitionSchema),
});

export type Institution = z.infer<typeof institutionSchema>;
export type Agreement = z.infer<typeof agreementSchema>;
export type Requisition = z.infer<typeof requisitionSchema>;

const requisitionStatuses: Record<string, string> = {
  CR: 'CREATED',
  GC: 'GIVING_CONSENT',
  UA: 'UNDERGOING_AUTHENTICATION',
  RJ: 'REJECTED',
  SA: 'SELECTING_ACCOUNTS',
  GA: 'GRANTING_ACCESS',
  LN: 'LINKED',
  SU: 'SUSPENDED',
  EX: 'EXPIRED',
};

export function describeStatus(status: string): string {
  return requisitionStatuses[status] ?? 'UNKNOWN';
}

export interface CreateRequisitionOptions {
  institutionId: string;
  redirectUrl: string;
  maxHistoricalDays: number;
  accessValidForDays: number;
  reference?: string;
  userLanguage?: string;
}

export function isNotFound(err: unknown): boolean {
  return axios.isAxiosError(err) && err.response?.status === 404;
}

export class RequisitionManager {
  constructor(private readonly client: AxiosInstance) {}

  /**
   * List available institutions, optionally for one country
   */
  async listInstitutions(countryCode?: string): Promise<Institution[]> {
    try {
      const response = await this.client.get('/api/v2/institutions/', {
        params: countryCode ? { country: countryCode } : {},
      });
      const institutions = z.array(institutionSchema).parse(response.data);

      logger.debug({ countryCode, count: institutions.length }, 'Fetched institutions');
      return institutions;
    } catch (err) {
      logger.error({ err, countryCode }, 'Failed to list institutions');
      throw err;
    }
  }

  /**
   * Create an end-user agreement
   */
  async createAgreement(
    institutionId: string,
    maxHistoricalDays: number,
    accessValidForDays: number,
    accessScope: string[] = ['balances', 'details', 'transactions']
  ): Promise<Agreement> {
    try {
      const response = await this.client.post('/api/v2/agreements/enduser/', {
        institution_id: institutionId,
        max_historical_days: maxHistoricalDays,
        access_valid_for_days: accessValidForDays,
        access_scope: accessScope,
      });
      const agreement = agreementSchema.parse(response.data);

      logger.info({ agreementId: agreement.id, institutionId }, 'Created agreement');
      return agreement;
    } catch (err) {
      logger.error({ err, institutionId }, 'Failed to create agreement');
      throw err;
    }
  }

  /**
   * Create an agreement and a requisition for linking a bank
   */
  async createRequisition(options: CreateRequisitionOptions): Promise<Requisition> {
    const agreement = await this.createAgreement(
      options.institutionId,
      options.maxHistoricalDays,
      options.accessValidForDays
    );

    try {
      const response = await this.client.post('/api/v2/requisitions/', {
        redirect: options.redirectUrl,
        institution_id: options.institutionId,
        reference: options.reference ?? uuid(),
        agreement: agreement.id,
        user_language: options.userLanguage ?? 'EN',
      });
      const requisition = requisitionSchema.parse(response.data);

      logger.info(
        {
          requisitionId: requisition.id,
          institutionId: options.institutionId,
          status: requisition.status,
        },
        'Created requisition'
      );
      return requisition;
    } catch (err) {
      logger.error({ err, institutionId: options.institutionId }, 'Failed to create requisition');
      throw err;
    }
  }

  /**
   * Get requisition by id, or null once the provider no longer knows it
   */
  async getRequisition(requisitionId: string): Promise<Requisition | null> {
    try {
      const response = await this.client.get(`/api/v2/requisitions/${requisitionId}/`);
      return requisitionSchema.parse(response.data);
    } catch (err) {
      if (isNotFound(err)) {
        logger.debug({ requisitionId }, 'Requisition not found');
        return null;
      }
      logger.error({ err, requisitionId }, 'Failed to get requisition');
      throw err;
    }
  }

  async deleteRequisition(requisitionId: string): Promise<void> {
    try {
      await this.client.delete(`/api/v2/requisitions/${requisitionId}/`);
      logger.info({ requisitionId }, 'Deleted requisition');
    } catch (err) {
      logger.error({ err, requisitionId }, 'Failed to delete requisition');
      throw err;
    }
  }

  /**
   * List every requisition, following the provider's pagination
   */
  async listRequisitions(pageSize: number = 100): Promise<Requisition[]> {
    const requisitions: Requisition[] = [];
    let offset = 0;

    try {
      for (;;) {
        const response = await this.client.get('/api/v2/requisitions/', {
          params: { limit: pageSize, offset },
        });
        const page = requisitionPageSchema.parse(response.data);
        requisitions.push(...page.results);

        if (!page.next || page.results.length === 0) {
          return requisitions;
        }
        offset += page.results.length;
      }
    } catch (err) {
      logger.error({ err }, 'Failed to list requisitions');
      throw err;
    }
  }
}
