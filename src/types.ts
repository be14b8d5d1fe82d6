import type Decimal from 'decimal.js';
import type { BookingTime } from './lib/bookingTime';

export type ProviderType = 'open_banking' | 'monzo';

export type TransactionState = 'pending' | 'booked';

export interface Bank {
  id: number;
  name: string;
  externalId: string;
  providerType: ProviderType;
  /** Empty when no link is tracked for this bank. */
  activeRequisitionId: string;
  activationEmailSent: boolean;
}

export interface Account {
  id: number;
  bankId: number;
  name: string;
  externalId: string;
}

export interface Transaction {
  id: string;
  accountId: number;
  bookingTime: BookingTime;
  sequenceNumber: number;
  remittanceInfo: string;
  transactionCode: string | null;
  amount: Decimal;
  currency: string;
  sourceAmount: Decimal | null;
  sourceCurrency: string | null;
  exchangeRate: number | null;
  state: TransactionState;
  sourceData: RawTransaction;
}

/**
 * One record of the provider's transaction feed, exactly as received. The
 * fields the archive reads are `transactionId`, `bookingDateTime`,
 * `transactionAmount`, `currencyExchange`, `remittanceInformationUnstructured`
 * and `proprietaryBankTransactionCode`; every other key passes through
 * untouched.
 */
export type RawTransaction = Record<string, unknown>;

export interface TransactionFeed {
  booked: RawTransaction[];
  pending: RawTransaction[];
}

export type SyncSummary = {
  banks: number;
  accounts: number;
  transactions: number;
  failures: number;
};
