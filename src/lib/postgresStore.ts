import Decimal from 'decimal.js';
import { Pool } from 'pg';
import { z } from 'zod';
import type { Config } from '../config';
import { logger } from '../logger';
import type { Account, Bank, Transaction } from '../types';
import { BookingTime } from './bookingTime';
import {
  type ArchiveStore,
  type NewAccount,
  type NewBank,
  deserializeProviderType,
  deserializeTransactionState,
  serializeProviderType,
  serializeTransactionState,
} from './store';

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(err?: Error | boolean): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

const BANK_COLUMNS =
  'id, name, external_id, provider_type, active_requisition_id, activation_email_sent';
const ACCOUNT_COLUMNS = 'id, bank_id, name, external_id';
const TRANSACTION_COLUMNS =
  'id, account_id, booking_time, sequence_number, remittance_info, transaction_code, ' +
  'currency, source_currency, source_amount, amount, exchange_rate, source_data, state';
// pg parses timestamptz into a Date, which stops at milliseconds.
const TRANSACTION_SELECT = TRANSACTION_COLUMNS.replace(
  'booking_time',
  'round(extract(epoch FROM booking_time) * 1000000)::bigint AS booking_micros'
);

const bankRow = z.object({
  id: z.number(),
  name: z.string(),
  external_id: z.string(),
  provider_type: z.string(),
  active_requisition_id: z.string().nullable(),
  activation_email_sent: z.boolean(),
});

const accountRow = z.object({
  id: z.number(),
  bank_id: z.number(),
  name: z.string(),
  external_id: z.string(),
});

const transactionRow = z.object({
  id: z.string(),
  account_id: z.number(),
  booking_micros: z.coerce.number().int(),
  sequence_number: z.number(),
  remittance_info: z.string(),
  transaction_code: z.string().nullable(),
  currency: z.string(),
  source_currency: z.string().nullable(),
  source_amount: z.string().nullable(),
  amount: z.string(),
  exchange_rate: z.number().nullable(),
  source_data: z.record(z.unknown()),
  state: z.string(),
});

function toBank(row: unknown): Bank {
  const r = bankRow.parse(row);
  return {
    id: r.id,
    name: r.name,
    externalId: r.external_id,
    providerType: deserializeProviderType(r.provider_type),
    activeRequisitionId: r.active_requisition_id ?? '',
    activationEmailSent: r.activation_email_sent,
  };
}

function toAccount(row: unknown): Account {
  const r = accountRow.parse(row);
  return {
    id: r.id,
    bankId: r.bank_id,
    name: r.name,
    externalId: r.external_id,
  };
}

function toTransaction(row: unknown): Transaction {
  const r = transactionRow.parse(row);
  return {
    id: r.id,
    accountId: r.account_id,
    bookingTime: new BookingTime(r.booking_micros),
    sequenceNumber: r.sequence_number,
    remittanceInfo: r.remittance_info,
    transactionCode: r.transaction_code,
    amount: new Decimal(r.amount),
    currency: r.currency,
    sourceAmount: r.source_amount === null ? null : new Decimal(r.source_amount),
    sourceCurrency: r.source_currency,
    exchangeRate: r.exchange_rate,
    state: deserializeTransactionState(r.state),
    sourceData: r.source_data,
  };
}

export function transactionParams(transaction: Transaction): unknown[] {
  return [
    transaction.id,
    transaction.accountId,
    transaction.bookingTime.toISOString(),
    transaction.sequenceNumber,
    transaction.remittanceInfo,
    transaction.transactionCode,
    transaction.currency,
    transaction.sourceCurrency,
    transaction.sourceAmount === null ? null : transaction.sourceAmount.toFixed(),
    transaction.amount.toFixed(),
    transaction.exchangeRate,
    JSON.stringify(transaction.sourceData),
    serializeTransactionState(transaction.state),
  ];
}

/**
 * PostgreSQL-backed archive. Each write borrows one pooled connection and
 * runs inside its own transaction.
 */
export class PostgresStore implements ArchiveStore {
  constructor(private readonly pool: SqlPool) {}

  static fromConfig(database: Config['database']): PostgresStore {
    const pool = new Pool({
      host: database.host,
      port: database.port,
      user: database.user,
      password: database.password,
      database: database.name,
    });

    pool.on('error', (err) => {
      logger.error({ err }, 'Idle PostgreSQL client error');
    });

    return new PostgresStore(pool);
  }

  async getBanks(): Promise<Bank[]> {
    logger.debug('Retrieving all banks');
    const result = await this.pool.query(`SELECT ${BANK_COLUMNS} FROM banks ORDER BY id`);
    return result.rows.map(toBank);
  }

  async getBankByName(name: string): Promise<Bank | null> {
    logger.debug({ name }, 'Retrieving bank by name');
    const result = await this.pool.query(
      `SELECT ${BANK_COLUMNS} FROM banks WHERE name = $1 ORDER BY id LIMIT 1`,
      [name]
    );
    return result.rows.length > 0 ? toBank(result.rows[0]) : null;
  }

  async getBanksByIds(ids: Iterable<number>): Promise<Map<number, Bank>> {
    const unique = [...new Set(ids)];
    logger.debug({ ids: unique }, 'Retrieving banks by id');
    if (unique.length === 0) {
      return new Map();
    }

    const result = await this.pool.query(
      `SELECT ${BANK_COLUMNS} FROM banks WHERE id = ANY($1::int[])`,
      [unique]
    );
    return new Map(result.rows.map(toBank).map((bank) => [bank.id, bank]));
  }

  async getAccounts(): Promise<Account[]> {
    logger.debug('Retrieving all accounts');
    const result = await this.pool.query(`SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY id`);
    return result.rows.map(toAccount);
  }

  async getTransactions(accountId: number): Promise<Transaction[]> {
    const result = await this.pool.query(
      `SELECT ${TRANSACTION_SELECT} FROM transactions
        WHERE account_id = $1
        ORDER BY booking_time, sequence_number`,
      [accountId]
    );
    return result.rows.map(toTransaction);
  }

  async upsertBanks(banks: NewBank[]): Promise<void> {
    logger.debug({ count: banks.length }, 'Upserting banks');
    await this.withTransaction('upsert banks', { count: banks.length }, async (client) => {
      for (const bank of banks) {
        await client.query(
          `INSERT INTO banks (name, external_id, provider_type)
            VALUES ($1, $2, $3)
            ON CONFLICT (external_id) DO UPDATE
            SET name = EXCLUDED.name, provider_type = EXCLUDED.provider_type`,
          [bank.name, bank.externalId, serializeProviderType(bank.providerType)]
        );
      }
    });
  }

  async updateBank(bank: Bank): Promise<void> {
    logger.debug({ bankId: bank.id, name: bank.name }, 'Updating bank');
    await this.withTransaction('update bank', { bankId: bank.id }, async (client) => {
      await client.query(
        `UPDATE banks
          SET name = $1, external_id = $2, provider_type = $3,
              active_requisition_id = $4, activation_email_sent = $5
          WHERE id = $6`,
        [
          bank.name,
          bank.externalId,
          serializeProviderType(bank.providerType),
          bank.activeRequisitionId || null,
          bank.activationEmailSent,
          bank.id,
        ]
      );
    });
  }

  async setActivationEmailSent(bankId: number, sent: boolean): Promise<void> {
    logger.debug({ bankId, sent }, 'Updating activation email flag');
    await this.withTransaction('update activation email flag', { bankId }, async (client) => {
      await client.query('UPDATE banks SET activation_email_sent = $1 WHERE id = $2', [
        sent,
        bankId,
      ]);
    });
  }

  async clearRequisitionId(requisitionId: string): Promise<void> {
    logger.debug({ requisitionId }, 'Clearing requisition id');
    await this.withTransaction('clear requisition id', { requisitionId }, async (client) => {
      await client.query(
        'UPDATE banks SET active_requisition_id = NULL WHERE active_requisition_id = $1',
        [requisitionId]
      );
    });
  }

  async upsertAccount(account: NewAccount): Promise<Account> {
    logger.debug({ externalId: account.externalId }, 'Upserting account');
    return this.withTransaction(
      'upsert account',
      { bankId: account.bankId, externalId: account.externalId },
      async (client) => {
        const result = await client.query(
          `INSERT INTO accounts (bank_id, external_id, name)
            VALUES ($1, $2, $3)
            ON CONFLICT (bank_id, external_id) DO UPDATE SET name = EXCLUDED.name
            RETURNING ${ACCOUNT_COLUMNS}`,
          [account.bankId, account.externalId, account.name]
        );
        return toAccount(result.rows[0]);
      }
    );
  }

  async upsertTransactions(transactions: Transaction[]): Promise<void> {
    logger.debug({ count: transactions.length }, 'Upserting transactions');
    await this.withTransaction(
      'upsert transactions',
      { count: transactions.length, transactionIds: transactions.map((t) => t.id) },
      async (client) => {
        for (const transaction of transactions) {
          await client.query(
            `INSERT INTO transactions (${TRANSACTION_COLUMNS})
              VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::json, $13)
              ON CONFLICT (id) DO UPDATE SET
                account_id = EXCLUDED.account_id,
                booking_time = EXCLUDED.booking_time,
                sequence_number = EXCLUDED.sequence_number,
                remittance_info = EXCLUDED.remittance_info,
                transaction_code = EXCLUDED.transaction_code,
                currency = EXCLUDED.currency,
                source_currency = EXCLUDED.source_currency,
                source_amount = EXCLUDED.source_amount,
                amount = EXCLUDED.amount,
                exchange_rate = EXCLUDED.exchange_rate,
                source_data = EXCLUDED.source_data,
                state = EXCLUDED.state`,
            transactionParams(transaction)
          );
        }
      }
    );
  }

  async close(): Promise<void> {
    logger.info('Closing database connection');
    await this.pool.end();
  }

  private async withTransaction<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: (client: SqlClient) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      logger.error({ err, ...context }, `Failed to ${operation}, rolling back`);
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        logger.error({ err: rollbackErr, ...context }, 'Rollback failed');
      }
      throw err;
    } finally {
      client.release();
    }
  }
}
