import type { AccountDetails, OpenBankingApi } from '../lib/gcClient';
import type { CreateRequisitionOptions, Institution, Requisition } from '../lib/requisition';
import type { Bank, TransactionFeed } from '../types';

/**
 * In-process provider. Requisitions, details and feeds are plain maps the
 * test fills in; missing entries behave like the provider's 404.
 */
export class FakeOpenBankingApi implements OpenBankingApi {
  institutions: Institution[] = [];
  requisitions = new Map<string, Requisition>();
  details = new Map<string, AccountDetails>();
  feeds = new Map<string, TransactionFeed>();
  failingAccounts = new Set<string>();
  deleted: string[] = [];
  created: CreateRequisitionOptions[] = [];
  tokenRefreshes = 0;

  async refreshToken(): Promise<void> {
    this.tokenRefreshes++;
  }

  async listInstitutions(): Promise<Institution[]> {
    return this.institutions;
  }

  async getRequisition(requisitionId: string): Promise<Requisition | null> {
    return this.requisitions.get(requisitionId) ?? null;
  }

  async listRequisitions(): Promise<Requisition[]> {
    return [...this.requisitions.values()];
  }

  async deleteRequisition(requisitionId: string): Promise<void> {
    this.requisitions.delete(requisitionId);
    this.deleted.push(requisitionId);
  }

  async createRequisition(options: CreateRequisitionOptions): Promise<Requisition> {
    this.created.push(options);
    const id = `req-new-${this.created.length}`;
    return this.addRequisition(id, 'CR', []);
  }

  async getAccountDetails(accountId: string): Promise<AccountDetails> {
    if (this.failingAccounts.has(accountId)) {
      throw new Error(`details unavailable for ${accountId}`);
    }
    return this.details.get(accountId) ?? { resourceId: accountId };
  }

  async getTransactions(accountId: string): Promise<TransactionFeed> {
    return this.feeds.get(accountId) ?? { booked: [], pending: [] };
  }

  addRequisition(id: string, status: string, accounts: string[]): Requisition {
    const requisition: Requisition = {
      id,
      status,
      institution_id: 'INST_1',
      accounts,
      link: `https://provider.test/link/${id}`,
    };
    this.requisitions.set(id, requisition);
    return requisition;
  }
}

export class FakeNotifier {
  readonly sent: Array<{ to: string; bank: string; link: string }> = [];
  succeed = true;

  async sendLink(toEmail: string, bank: Bank, link: string): Promise<boolean> {
    if (!this.succeed) {
      return false;
    }
    this.sent.push({ to: toEmail, bank: bank.name, link });
    return true;
  }
}
