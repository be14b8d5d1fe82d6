import type { Config } from '../config';
import type { OpenBankingApi } from '../lib/gcClient';
import { LINKED_STATUS, type Requisition, describeStatus } from '../lib/requisition';
import type { ArchiveStore } from '../lib/store';
import { logger } from '../logger';
import type { Bank } from '../types';

export class BankNotFoundError extends Error {
  constructor(readonly bankName: string) {
    super(`Unable to find bank with name '${bankName}'`);
    this.name = 'BankNotFoundError';
  }
}

export interface LinkDeps {
  store: ArchiveStore;
  api: OpenBankingApi;
  gocardless: Pick<
    Config['gocardless'],
    'redirectUrl' | 'maxHistoricalDays' | 'accessValidForDays'
  >;
}

export type LinkOutcome =
  | { outcome: 'created'; requisitionId: string; link: string }
  | { outcome: 'active'; requisitionId: string; link: string }
  | { outcome: 'inactive'; requisitionId: string; status: string };

export type LinkStatus = 'ACTIVE' | 'INACTIVE' | (string & {});

export interface PruneResult {
  deleted: string[];
  cleared: string[];
}

async function findBank(store: ArchiveStore, bankName: string): Promise<Bank> {
  const bank = await store.getBankByName(bankName);
  if (!bank) {
    throw new BankNotFoundError(bankName);
  }
  return bank;
}

function trackedRequisition(api: OpenBankingApi, bank: Bank): Promise<Requisition | null> {
  return bank.activeRequisitionId
    ? api.getRequisition(bank.activeRequisitionId)
    : Promise.resolve(null);
}

/**
 * Start a new link for a bank unless one already exists
 */
export async function linkBank(deps: LinkDeps, bankName: string): Promise<LinkOutcome> {
  const bank = await findBank(deps.store, bankName);
  await deps.api.refreshToken();

  const existing = await trackedRequisition(deps.api, bank);
  if (existing) {
    if (existing.status === LINKED_STATUS) {
      logger.info({ bank: bankName, link: existing.link }, `Link with ${bankName} already active`);
      return { outcome: 'active', requisitionId: existing.id, link: existing.link };
    }

    logger.info(
      { bank: bankName, status: existing.status },
      `Link with ${bankName} exists but is not active. Unlink it first using \`unlink '${bankName}'\``
    );
    return { outcome: 'inactive', requisitionId: existing.id, status: existing.status };
  }

  const requisition = await deps.api.createRequisition({
    institutionId: bank.externalId,
    redirectUrl: deps.gocardless.redirectUrl,
    maxHistoricalDays: deps.gocardless.maxHistoricalDays,
    accessValidForDays: deps.gocardless.accessValidForDays,
  });

  await deps.store.updateBank({ ...bank, activeRequisitionId: requisition.id });
  logger.info({ bank: bankName, requisitionId: requisition.id }, `Link: ${requisition.link}`);

  return { outcome: 'created', requisitionId: requisition.id, link: requisition.link };
}

/**
 * Forget the tracked link. Resolves to false when there was none to remove.
 */
export async function unlinkBank(deps: LinkDeps, bankName: string): Promise<boolean> {
  const bank = await findBank(deps.store, bankName);
  await deps.api.refreshToken();

  const existing = await trackedRequisition(deps.api, bank);
  if (!existing) {
    logger.info({ bank: bankName }, `No link currently exists with ${bankName}`);
    return false;
  }

  await deps.store.updateBank({ ...bank, activeRequisitionId: '' });
  logger.info({ bank: bankName }, `Link with ${bankName} exists and has been removed.`);
  return true;
}

export async function linkStatus(deps: LinkDeps, bankName: string): Promise<LinkStatus> {
  const bank = await findBank(deps.store, bankName);

  let requisition: Requisition | null = null;
  if (bank.activeRequisitionId) {
    await deps.api.refreshToken();
    requisition = await deps.api.getRequisition(bank.activeRequisitionId);
  }

  let status: LinkStatus;
  if (!requisition) {
    status = 'INACTIVE';
  } else if (requisition.status === LINKED_STATUS) {
    status = 'ACTIVE';
  } else {
    status = requisition.status;
  }

  logger.info(
    { bank: bankName, status, description: requisition ? describeStatus(requisition.status) : null },
    `Link with ${bankName}: ${status}`
  );
  return status;
}

/**
 * Delete remote requisitions that are not linked or not tracked, then clear
 * local ids that point at requisitions the provider no longer has.
 */
export async function pruneRequisitions(deps: LinkDeps): Promise<PruneResult> {
  const banks = await deps.store.getBanks();
  const trackedIds = new Set(
    banks.map((bank) => bank.activeRequisitionId).filter((id) => id !== '')
  );

  await deps.api.refreshToken();
  const requisitions = await deps.api.listRequisitions();
  const remoteIds = new Set(requisitions.map((requisition) => requisition.id));

  const deleted: string[] = [];
  for (const requisition of requisitions) {
    if (requisition.status !== LINKED_STATUS || !trackedIds.has(requisition.id)) {
      logger.info({ requisitionId: requisition.id }, `Deleting requisition ID ${requisition.id}`);
      await deps.api.deleteRequisition(requisition.id);
      deleted.push(requisition.id);
    }
  }

  const cleared: string[] = [];
  for (const orphanId of trackedIds) {
    if (!remoteIds.has(orphanId)) {
      await deps.store.clearRequisitionId(orphanId);
      cleared.push(orphanId);
    }
  }

  logger.info({ deleted: deleted.length, cleared: cleared.length }, 'Pruned requisitions');
  return { deleted, cleared };
}
