import type { Account, Bank, ProviderType, Transaction, TransactionState } from '../types';

export type NewBank = Pick<Bank, 'name' | 'externalId' | 'providerType'>;
export type NewAccount = Pick<Account, 'bankId' | 'name' | 'externalId'>;

/**
 * Persistence for banks, accounts and archived transactions. Every write is
 * one all-or-nothing unit: on failure nothing from the call is kept and the
 * error is rethrown.
 */
export interface ArchiveStore {
  getBanks(): Promise<Bank[]>;
  getBankByName(name: string): Promise<Bank | null>;
  getBanksByIds(ids: Iterable<number>): Promise<Map<number, Bank>>;
  getAccounts(): Promise<Account[]>;
  getTransactions(accountId: number): Promise<Transaction[]>;

  /** Inserts or renames banks, keyed by provider institution id. */
  upsertBanks(banks: NewBank[]): Promise<void>;
  updateBank(bank: Bank): Promise<void>;
  setActivationEmailSent(bankId: number, sent: boolean): Promise<void>;
  clearRequisitionId(requisitionId: string): Promise<void>;

  /** Keyed by `(bankId, externalId)`; resolves to the stored row. */
  upsertAccount(account: NewAccount): Promise<Account>;

  /** Keyed by transaction id; later values overwrite every mutable field. */
  upsertTransactions(transactions: Transaction[]): Promise<void>;

  close(): Promise<void>;
}

const providerTypes: readonly ProviderType[] = ['open_banking', 'monzo'];

export function serializeProviderType(type: ProviderType): string {
  return type;
}

export function deserializeProviderType(value: string): ProviderType {
  const match = providerTypes.find((type) => type === value);
  if (!match) {
    throw new Error(`Unknown provider type '${value}'`);
  }
  return match;
}

const transactionStates: readonly TransactionState[] = ['pending', 'booked'];

export function serializeTransactionState(state: TransactionState): string {
  return state;
}

export function deserializeTransactionState(value: string): TransactionState {
  const match = transactionStates.find((state) => state === value);
  if (!match) {
    throw new Error(`Unknown transaction state '${value}'`);
  }
  return match;
}
