import { describe, expect, it } from 'vitest';
import type { Account, RawTransaction } from '../types';
import { FeedParseError, parseBookingTime, parseTransactionFeed } from './normalizer';

const account: Account = { id: 7, bankId: 1, name: 'Everyday', externalId: 'acc-1' };

function record(transactionId: string | undefined, time: string, amount = '1.00'): RawTransaction {
  return {
    ...(transactionId === undefined ? {} : { transactionId }),
    bookingDateTime: time,
    transactionAmount: { amount, currency: 'GBP' },
    remittanceInformationUnstructured: `payment ${transactionId ?? 'unknown'}`,
  };
}

describe('parseTransactionFeed', () => {
  it('numbers records sharing a timestamp in oldest-first order', () => {
    const result = parseTransactionFeed(account, {
      booked: [
        record('b2', '2024-01-01T10:00:00Z', '5.00'),
        record('b1', '2024-01-01T10:00:00Z', '3.00'),
      ],
      pending: [],
    });

    expect(result.map((t) => [t.id, t.sequenceNumber, t.state])).toEqual([
      ['b1', 1, 'booked'],
      ['b2', 2, 'booked'],
    ]);
    expect(result[0].amount.toFixed(2)).toBe('3.00');
    expect(result[1].amount.toFixed(2)).toBe('5.00');
    expect(result[0].accountId).toBe(7);
  });

  it('resets the sequence when the timestamp changes', () => {
    const result = parseTransactionFeed(account, {
      booked: [
        record('c', '2024-01-02T09:00:00Z'),
        record('b', '2024-01-01T10:00:00Z'),
        record('a', '2024-01-01T10:00:00Z'),
      ],
      pending: [],
    });

    expect(result.map((t) => [t.id, t.sequenceNumber])).toEqual([
      ['a', 1],
      ['b', 2],
      ['c', 1],
    ]);
  });

  it('compares timestamps as instants across offsets', () => {
    const result = parseTransactionFeed(account, {
      booked: [
        record('later', '2024-01-01T11:00:00+01:00'),
        record('first', '2024-01-01T10:00:00Z'),
      ],
      pending: [],
    });

    expect(result.map((t) => t.sequenceNumber)).toEqual([1, 2]);
  });

  it('emits the pending pass before the booked pass and restarts numbering', () => {
    const result = parseTransactionFeed(account, {
      booked: [record('b1', '2024-03-01T08:00:00Z')],
      pending: [
        record('p2', '2024-03-01T08:00:00Z'),
        record('p1', '2024-03-01T08:00:00Z'),
      ],
    });

    expect(result.map((t) => [t.id, t.sequenceNumber, t.state])).toEqual([
      ['p1', 1, 'pending'],
      ['p2', 2, 'pending'],
      ['b1', 1, 'booked'],
    ]);
  });

  it('drops records without a transaction id without touching the counter', () => {
    const result = parseTransactionFeed(account, {
      booked: [
        record('second', '2024-01-01T10:00:00Z'),
        record(undefined, '2024-01-01T10:00:00Z'),
        record('first', '2024-01-01T10:00:00Z'),
      ],
      pending: [],
    });

    expect(result.map((t) => [t.id, t.sequenceNumber])).toEqual([
      ['first', 1],
      ['second', 2],
    ]);
  });

  it('treats an empty transaction id as missing', () => {
    const result = parseTransactionFeed(account, {
      booked: [record('', '2024-01-01T10:00:00Z')],
      pending: [],
    });

    expect(result).toEqual([]);
  });

  it('reads the currency exchange block', () => {
    const raw: RawTransaction = {
      transactionId: 'fx-1',
      bookingDateTime: '2024-05-05T12:00:00Z',
      transactionAmount: { amount: '-11.22', currency: 'GBP' },
      currencyExchange: {
        sourceCurrency: 'USD',
        instructedAmount: { amount: '12.34', currency: 'USD' },
        exchangeRate: '1.1',
      },
      remittanceInformationUnstructured: 'Book shop',
      proprietaryBankTransactionCode: 'CARD',
    };

    const [transaction] = parseTransactionFeed(account, { booked: [raw], pending: [] });

    expect(transaction.sourceCurrency).toBe('USD');
    expect(transaction.sourceAmount?.toFixed()).toBe('12.34');
    expect(transaction.exchangeRate).toBeCloseTo(1.1);
    expect(transaction.amount.toFixed()).toBe('-11.22');
    expect(transaction.transactionCode).toBe('CARD');
    expect(transaction.remittanceInfo).toBe('Book shop');
  });

  it('leaves exchange fields empty without a currency exchange block', () => {
    const [transaction] = parseTransactionFeed(account, {
      booked: [record('plain', '2024-05-05T12:00:00Z')],
      pending: [],
    });

    expect(transaction.sourceAmount).toBeNull();
    expect(transaction.sourceCurrency).toBeNull();
    expect(transaction.exchangeRate).toBeNull();
    expect(transaction.transactionCode).toBeNull();
  });

  it('keeps the raw record as source data', () => {
    const raw: RawTransaction = {
      transactionId: 'raw-1',
      bookingDateTime: '2024-05-05T12:00:00Z',
      transactionAmount: { amount: '10.10', currency: 'EUR' },
      remittanceInformationUnstructured: 'Rent',
      internalTransactionId: 'abc123',
    };

    const [transaction] = parseTransactionFeed(account, { booked: [raw], pending: [] });

    expect(transaction.sourceData).toBe(raw);
    expect(Object.keys(transaction.sourceData)).toEqual([
      'transactionId',
      'bookingDateTime',
      'transactionAmount',
      'remittanceInformationUnstructured',
      'internalTransactionId',
    ]);
    expect(transaction.amount.toFixed(2)).toBe('10.10');
  });

  it('falls back to the booking date and remittance array', () => {
    const [transaction] = parseTransactionFeed(account, {
      booked: [
        {
          transactionId: 'dated',
          bookingDate: '2024-02-29',
          transactionAmount: { amount: '4.50', currency: 'EUR' },
          remittanceInformationUnstructuredArray: ['Coffee', 'Shop'],
        },
      ],
      pending: [],
    });

    expect(transaction.bookingTime.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(transaction.remittanceInfo).toBe('Coffee Shop');
  });

  it('uses an empty remittance when the feed has none', () => {
    const [transaction] = parseTransactionFeed(account, {
      booked: [
        {
          transactionId: 'bare',
          bookingDateTime: '2024-02-29T10:00:00Z',
          transactionAmount: { amount: '1', currency: 'EUR' },
        },
      ],
      pending: [],
    });

    expect(transaction.remittanceInfo).toBe('');
  });

  it('rejects malformed amounts', () => {
    expect(() =>
      parseTransactionFeed(account, {
        booked: [record('bad', '2024-01-01T10:00:00Z', 'ten')],
        pending: [],
      })
    ).toThrow(FeedParseError);
  });

  it('numbers records apart when they differ below the millisecond', () => {
    const result = parseTransactionFeed(account, {
      booked: [
        record('b', '2024-01-01T10:00:00.123900Z'),
        record('a', '2024-01-01T10:00:00.123400Z'),
      ],
      pending: [],
    });

    expect(result.map((t) => [t.id, t.sequenceNumber, t.bookingTime.toISOString()])).toEqual([
      ['a', 1, '2024-01-01T10:00:00.123400Z'],
      ['b', 1, '2024-01-01T10:00:00.123900Z'],
    ]);
  });

  it('fails the feed on an impossible booking date', () => {
    expect(() =>
      parseTransactionFeed(account, {
        booked: [record('leap', '2024-02-30T10:00:00Z')],
        pending: [],
      })
    ).toThrow(FeedParseError);
  });

  it('rejects a transaction id that is not text', () => {
    expect(() =>
      parseTransactionFeed(account, {
        booked: [{ ...record('x', '2024-01-01T10:00:00Z'), transactionId: 42 }],
        pending: [],
      })
    ).toThrow("Invalid transaction id '42'");
  });

  it('rejects records without a booking time', () => {
    expect(() =>
      parseTransactionFeed(account, {
        booked: [{ transactionId: 'x', transactionAmount: { amount: '1', currency: 'EUR' } }],
        pending: [],
      })
    ).toThrow('Transaction x has no booking time');
  });
});

describe('parseBookingTime', () => {
  it('reads timestamps without an offset as UTC', () => {
    expect(parseBookingTime('2024-01-01T10:00:00').toISOString()).toBe(
      '2024-01-01T10:00:00.000Z'
    );
  });

  it('applies short and compact offsets', () => {
    expect(parseBookingTime('2024-01-01T10:00:00+01').toISOString()).toBe(
      '2024-01-01T09:00:00.000Z'
    );
    expect(parseBookingTime('2024-01-01T10:00:00-0230').toISOString()).toBe(
      '2024-01-01T12:30:00.000Z'
    );
  });

  it('keeps fractional seconds', () => {
    expect(parseBookingTime('2024-01-01T10:00:00.250Z').epochMicros).toBe(
      Date.UTC(2024, 0, 1, 10, 0, 0, 250) * 1000
    );
  });

  it('keeps microseconds and truncates finer digits', () => {
    expect(parseBookingTime('2024-01-01T10:00:00.1234567Z').toISOString()).toBe(
      '2024-01-01T10:00:00.123456Z'
    );
  });

  it('rejects text that is not a timestamp', () => {
    expect(() => parseBookingTime('yesterday')).toThrow(FeedParseError);
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseBookingTime('2024-02-30T10:00:00Z')).toThrow(
      "Invalid booking timestamp '2024-02-30T10:00:00Z'"
    );
    expect(() => parseBookingTime('2023-02-29')).toThrow(FeedParseError);
    expect(() => parseBookingTime('2024-01-01T24:00:00Z')).toThrow(FeedParseError);
  });

  it('rejects offsets out of range', () => {
    expect(() => parseBookingTime('2024-01-01T10:00:00+01:75')).toThrow(FeedParseError);
  });
});
