import Decimal from 'decimal.js';
import { z } from 'zod';
import { BookingTime } from './bookingTime';
import type {
  Account,
  RawTransaction,
  Transaction,
  TransactionFeed,
  TransactionState,
} from '../types';

export class FeedParseError extends Error {
  constructor(message: string, readonly transactionId?: string) {
    super(message);
    this.name = 'FeedParseError';
  }
}

// Older than anything a provider reports, so the first record always resets
// the sequence.
export const BOOKING_TIME_SENTINEL = BookingTime.fromDate(new Date(Date.UTC(1900, 0, 1)));

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|([+-])(\d{2})(?::?(\d{2}))?)?$/i;

const recordSchema = z.object({
  bookingDateTime: z.string().optional(),
  bookingDate: z.string().optional(),
  remittanceInformationUnstructured: z.string().optional(),
  remittanceInformationUnstructuredArray: z.array(z.string()).optional(),
  transactionAmount: z.object({
    amount: z.string(),
    currency: z.string(),
  }),
  currencyExchange: z
    .object({
      sourceCurrency: z.string().optional(),
      instructedAmount: z.object({ amount: z.string().optional() }).optional(),
      exchangeRate: z.string().optional(),
    })
    .optional(),
  proprietaryBankTransactionCode: z.string().optional(),
});

type ParsedRecord = z.infer<typeof recordSchema>;

/**
 * Parses an ISO-8601 timestamp. Timestamps without an offset are read as UTC
 * and bare dates as midnight UTC. Fractional seconds are kept to the
 * microsecond; further digits are truncated.
 */
export function parseBookingTime(value: string): BookingTime {
  const invalid = () => new FeedParseError(`Invalid booking timestamp '${value}'`);

  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    throw invalid();
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = ''] = match;
  const [sign, offsetHours = '0', offsetMinutes = '0'] = match.slice(9);
  const fields = [year, month, day, hour, minute, second].map(Number);

  // Date.UTC rolls impossible fields over (Feb 30 becomes Mar 1), so the
  // result must read back as the same fields.
  const wall = new Date(
    Date.UTC(fields[0], fields[1] - 1, fields[2], fields[3], fields[4], fields[5])
  );
  const readBack = [
    wall.getUTCFullYear(),
    wall.getUTCMonth() + 1,
    wall.getUTCDate(),
    wall.getUTCHours(),
    wall.getUTCMinutes(),
    wall.getUTCSeconds(),
  ];
  if (readBack.some((field, index) => field !== fields[index])) {
    throw invalid();
  }

  const offset = Number(offsetHours) * 60 + Number(offsetMinutes);
  if (Number(offsetHours) > 23 || Number(offsetMinutes) > 59) {
    throw invalid();
  }
  const offsetMillis = (sign === '-' ? -offset : offset) * 60_000;
  const micros = Number(fraction.slice(0, 6).padEnd(6, '0'));

  return new BookingTime((wall.getTime() - offsetMillis) * 1000 + micros);
}

export function parseAmount(value: string, field: string): Decimal {
  let amount: Decimal;
  try {
    amount = new Decimal(value.trim());
  } catch {
    throw new FeedParseError(`Invalid ${field} '${value}'`);
  }
  if (!amount.isFinite()) {
    throw new FeedParseError(`Invalid ${field} '${value}'`);
  }
  return amount;
}

export function parseExchangeRate(value: string): number {
  const rate = Number(value);
  if (value.trim() === '' || !Number.isFinite(rate)) {
    throw new FeedParseError(`Invalid exchange rate '${value}'`);
  }
  return rate;
}

function readTransactionId(raw: RawTransaction): string | null {
  const id = raw.transactionId;
  if (id === undefined || id === null || id === '') {
    return null;
  }
  if (typeof id !== 'string') {
    throw new FeedParseError(`Invalid transaction id '${String(id)}'`);
  }
  return id;
}

function readRecord(raw: RawTransaction, transactionId: string): ParsedRecord {
  const result = recordSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new FeedParseError(
      `Malformed transaction ${transactionId}: ${issue.path.join('.')} ${issue.message}`,
      transactionId
    );
  }
  return result.data;
}

function bookingTimeOf(record: ParsedRecord, transactionId: string): BookingTime {
  const value = record.bookingDateTime ?? record.bookingDate;
  if (!value) {
    throw new FeedParseError(`Transaction ${transactionId} has no booking time`, transactionId);
  }
  return parseBookingTime(value);
}

function remittanceOf(record: ParsedRecord): string {
  return (
    record.remittanceInformationUnstructured ??
    record.remittanceInformationUnstructuredArray?.join(' ') ??
    ''
  );
}

function toTransaction(
  account: Account,
  raw: RawTransaction,
  transactionId: string,
  record: ParsedRecord,
  bookingTime: BookingTime,
  sequenceNumber: number,
  state: TransactionState
): Transaction {
  const exchange = record.currencyExchange;
  const sourceAmount = exchange?.instructedAmount?.amount;
  const rate = exchange?.exchangeRate;

  return {
    id: transactionId,
    accountId: account.id,
    bookingTime,
    sequenceNumber,
    remittanceInfo: remittanceOf(record),
    transactionCode: record.proprietaryBankTransactionCode ?? null,
    amount: parseAmount(record.transactionAmount.amount, 'amount'),
    currency: record.transactionAmount.currency,
    sourceAmount: sourceAmount ? parseAmount(sourceAmount, 'instructed amount') : null,
    sourceCurrency: exchange?.sourceCurrency ?? null,
    exchangeRate: rate ? parseExchangeRate(rate) : null,
    state,
    sourceData: raw,
  };
}

/**
 * Turns one account's raw feed into archive records.
 *
 * Pending records are processed before booked ones, and each list is walked
 * oldest-first (the provider returns newest-first). Records sharing a booking
 * time within a pass get consecutive sequence numbers starting at 1; the
 * counter restarts with every pass. Records without a transaction id are
 * dropped and leave the counter alone.
 */
export function parseTransactionFeed(account: Account, feed: TransactionFeed): Transaction[] {
  const results: Transaction[] = [];

  const passes: Array<[RawTransaction[], TransactionState]> = [
    [feed.pending, 'pending'],
    [feed.booked, 'booked'],
  ];

  for (const [records, state] of passes) {
    let currentBookingTime = BOOKING_TIME_SENTINEL;
    let sequenceNumber = 1;

    for (const raw of [...records].reverse()) {
      const transactionId = readTransactionId(raw);
      if (transactionId === null) {
        continue;
      }

      const record = readRecord(raw, transactionId);
      const bookingTime = bookingTimeOf(record, transactionId);

      if (bookingTime.equals(currentBookingTime)) {
        sequenceNumber += 1;
      } else {
        sequenceNumber = 1;
        currentBookingTime = bookingTime;
      }

      results.push(
        toTransaction(account, raw, transactionId, record, bookingTime, sequenceNumber, state)
      );
    }
  }

  return results;
}
