import type { OpenBankingApi, AccountDetails } from '../lib/gcClient';
import type { LinkNotifier } from '../lib/notifications';
import { parseTransactionFeed } from '../lib/normalizer';
import { LINKED_STATUS, type Requisition } from '../lib/requisition';
import type { ArchiveStore } from '../lib/store';
import { logger } from '../logger';
import type { Account, Bank, SyncSummary } from '../types';

export interface SyncDeps {
  store: ArchiveStore;
  api: OpenBankingApi;
  notifier: Pick<LinkNotifier, 'sendLink'>;
  userEmail: string;
}

export function accountFromDetails(
  bank: Bank,
  accountId: string,
  details: AccountDetails
): { bankId: number; name: string; externalId: string } {
  const externalId = details.resourceId ?? accountId;
  return {
    bankId: bank.id,
    name: details.details ?? details.name ?? externalId,
    externalId,
  };
}

/**
 * Fetch the bank's tracked requisition. A requisition the provider no longer
 * knows is cleared locally and reported as null.
 */
async function resolveRequisition(deps: SyncDeps, bank: Bank): Promise<Requisition | null> {
  const requisition = await deps.api.getRequisition(bank.activeRequisitionId);
  if (!requisition) {
    logger.warn(
      { bank: bank.name, requisitionId: bank.activeRequisitionId },
      'Requisition no longer exists, clearing it'
    );
    await deps.store.clearRequisitionId(bank.activeRequisitionId);
  }
  return requisition;
}

async function linkedBanks(store: ArchiveStore): Promise<Bank[]> {
  const banks = await store.getBanks();
  return banks.filter((bank) => bank.activeRequisitionId);
}

/**
 * Store every institution the provider offers as a bank
 */
export async function syncBanks(deps: SyncDeps, countryCode?: string): Promise<number> {
  logger.debug({ countryCode }, 'Retrieving list of banks');
  await deps.api.refreshToken();

  const institutions = await deps.api.listInstitutions(countryCode);
  logger.debug({ count: institutions.length }, 'Retrieved banks');

  await deps.store.upsertBanks(
    institutions.map((institution) => ({
      name: institution.name,
      externalId: institution.id,
      providerType: 'open_banking' as const,
    }))
  );

  logger.info({ count: institutions.length }, 'Synced banks to the database');
  return institutions.length;
}

export async function syncAccounts(deps: SyncDeps): Promise<number> {
  const banks = await linkedBanks(deps.store);
  await deps.api.refreshToken();

  let count = 0;
  for (const bank of banks) {
    try {
      const requisition = await resolveRequisition(deps, bank);
      if (!requisition || requisition.status !== LINKED_STATUS) {
        continue;
      }

      for (const accountId of requisition.accounts) {
        try {
          const details = await deps.api.getAccountDetails(accountId);
          await deps.store.upsertAccount(accountFromDetails(bank, accountId, details));
          count++;
        } catch (err) {
          logger.error({ err, bank: bank.name, accountId }, 'Failed to sync account');
        }
      }
    } catch (err) {
      logger.error({ err, bank: bank.name }, 'Failed to sync accounts of bank');
    }
  }

  logger.info({ count }, 'Synced accounts to the database');
  return count;
}

async function syncAccountTransactions(
  deps: SyncDeps,
  bank: Bank,
  accountId: string
): Promise<number> {
  const details = await deps.api.getAccountDetails(accountId);
  const account: Account = await deps.store.upsertAccount(
    accountFromDetails(bank, accountId, details)
  );

  logger.debug({ accountId }, 'Requesting transactions for account');
  const feed = await deps.api.getTransactions(accountId);

  const transactions = parseTransactionFeed(account, feed);
  await deps.store.upsertTransactions(transactions);

  logger.info(
    { count: transactions.length, account: account.name, bank: bank.name },
    'Synced transactions to the database'
  );
  return transactions.length;
}

/**
 * Remind the user to re-link a bank, once per inactive period
 */
async function remindInactiveBank(
  deps: SyncDeps,
  bank: Bank,
  requisition: Requisition
): Promise<void> {
  if (bank.activationEmailSent) {
    logger.debug({ bank: bank.name, status: requisition.status }, 'Link inactive, reminder already sent');
    return;
  }

  const sent = await deps.notifier.sendLink(deps.userEmail, bank, requisition.link);
  if (sent) {
    await deps.store.setActivationEmailSent(bank.id, true);
  }
}

/**
 * One archive cycle over every bank with a tracked link
 */
export async function syncTransactions(deps: SyncDeps): Promise<SyncSummary> {
  const summary: SyncSummary = { banks: 0, accounts: 0, transactions: 0, failures: 0 };

  await deps.api.refreshToken();
  const banks = await linkedBanks(deps.store);

  for (const bank of banks) {
    try {
      const requisition = await resolveRequisition(deps, bank);
      if (!requisition) {
        continue;
      }

      if (requisition.status !== LINKED_STATUS) {
        await remindInactiveBank(deps, bank, requisition);
        continue;
      }

      await deps.store.setActivationEmailSent(bank.id, false);
      summary.banks++;

      for (const accountId of requisition.accounts) {
        try {
          summary.transactions += await syncAccountTransactions(deps, bank, accountId);
          summary.accounts++;
        } catch (err) {
          summary.failures++;
          logger.error({ err, bank: bank.name, accountId }, 'Failed to sync account transactions');
        }
      }
    } catch (err) {
      summary.failures++;
      logger.error({ err, bank: bank.name }, 'Failed to sync bank');
    }
  }

  logger.info(summary, 'Sync cycle finished');
  return summary;
}
