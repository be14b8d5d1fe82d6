import type { Account, Bank, Transaction } from '../types';
import type { ArchiveStore, NewAccount, NewBank } from './store';

/**
 * In-process archive with the same upsert semantics as the PostgreSQL store.
 * Batches are applied to a copy and swapped in only when every item succeeds.
 */
export class InMemoryStore implements ArchiveStore {
  private banks = new Map<number, Bank>();
  private accounts = new Map<number, Account>();
  private transactions = new Map<string, Transaction>();
  private nextBankId = 1;
  private nextAccountId = 1;

  async getBanks(): Promise<Bank[]> {
    return [...this.banks.values()].map((bank) => ({ ...bank }));
  }

  async getBankByName(name: string): Promise<Bank | null> {
    const bank = [...this.banks.values()].find((b) => b.name === name);
    return bank ? { ...bank } : null;
  }

  async getBanksByIds(ids: Iterable<number>): Promise<Map<number, Bank>> {
    const result = new Map<number, Bank>();
    for (const id of ids) {
      const bank = this.banks.get(id);
      if (bank) {
        result.set(id, { ...bank });
      }
    }
    return result;
  }

  async getAccounts(): Promise<Account[]> {
    return [...this.accounts.values()].map((account) => ({ ...account }));
  }

  async getTransactions(accountId: number): Promise<Transaction[]> {
    return [...this.transactions.values()]
      .filter((t) => t.accountId === accountId)
      .sort((a, b) => a.bookingTime.compare(b.bookingTime) || a.sequenceNumber - b.sequenceNumber)
      .map((t) => ({ ...t }));
  }

  async upsertBanks(banks: NewBank[]): Promise<void> {
    for (const bank of banks) {
      const existing = [...this.banks.values()].find((b) => b.externalId === bank.externalId);
      if (existing) {
        this.banks.set(existing.id, {
          ...existing,
          name: bank.name,
          providerType: bank.providerType,
        });
      } else {
        const id = this.nextBankId++;
        this.banks.set(id, {
          ...bank,
          id,
          activeRequisitionId: '',
          activationEmailSent: false,
        });
      }
    }
  }

  async updateBank(bank: Bank): Promise<void> {
    if (this.banks.has(bank.id)) {
      this.banks.set(bank.id, { ...bank });
    }
  }

  async setActivationEmailSent(bankId: number, sent: boolean): Promise<void> {
    const bank = this.banks.get(bankId);
    if (bank) {
      this.banks.set(bankId, { ...bank, activationEmailSent: sent });
    }
  }

  async clearRequisitionId(requisitionId: string): Promise<void> {
    for (const bank of this.banks.values()) {
      if (bank.activeRequisitionId === requisitionId) {
        this.banks.set(bank.id, { ...bank, activeRequisitionId: '' });
      }
    }
  }

  async upsertAccount(account: NewAccount): Promise<Account> {
    const existing = [...this.accounts.values()].find(
      (a) => a.bankId === account.bankId && a.externalId === account.externalId
    );
    const stored: Account = existing
      ? { ...existing, name: account.name }
      : { ...account, id: this.nextAccountId++ };
    this.accounts.set(stored.id, stored);
    return { ...stored };
  }

  async upsertTransactions(transactions: Transaction[]): Promise<void> {
    const next = new Map(this.transactions);
    for (const transaction of transactions) {
      this.stageTransaction(next, transaction);
    }
    this.transactions = next;
  }

  /** Adds one transaction to a pending batch; throwing aborts the batch. */
  protected stageTransaction(batch: Map<string, Transaction>, transaction: Transaction): void {
    batch.set(transaction.id, { ...transaction });
  }

  async close(): Promise<void> {
    this.transactions.clear();
  }
}
