import type { FastifyPluginAsync } from 'fastify';
import type { AppContext } from '../context';
import type { Transaction } from '../types';

interface TransactionsParams {
  accountId: number;
}

export function toTransactionView(transaction: Transaction) {
  return {
    id: transaction.id,
    accountId: transaction.accountId,
    bookingTime: transaction.bookingTime.toISOString(),
    sequenceNumber: transaction.sequenceNumber,
    state: transaction.state,
    remittanceInfo: transaction.remittanceInfo,
    transactionCode: transaction.transactionCode,
    amount: transaction.amount.toFixed(),
    currency: transaction.currency,
    sourceAmount: transaction.sourceAmount?.toFixed() ?? null,
    sourceCurrency: transaction.sourceCurrency,
    exchangeRate: transaction.exchangeRate,
  };
}

const plugin: FastifyPluginAsync<{ context: AppContext }> = async (fastify, { context }) => {
  fastify.get('/accounts', async () => {
    const accounts = await context.store.getAccounts();
    const banks = await context.store.getBanksByIds(accounts.map((account) => account.bankId));

    return {
      accounts: accounts.map((account) => ({
        id: account.id,
        name: account.name,
        externalId: account.externalId,
        bankId: account.bankId,
        bankName: banks.get(account.bankId)?.name ?? null,
      })),
    };
  });

  fastify.get<{ Params: TransactionsParams }>(
    '/accounts/:accountId/transactions',
    {
      schema: {
        params: {
          type: 'object',
          properties: {
            accountId: { type: 'integer', minimum: 1 },
          },
          required: ['accountId'],
        },
      },
    },
    async (request) => {
      const transactions = await context.store.getTransactions(request.params.accountId);
      return { transactions: transactions.map(toTransactionView) };
    }
  );
};

export default plugin;
