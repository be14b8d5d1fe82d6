import type { Config } from './config';
import { GoCardlessClient, type OpenBankingApi } from './lib/gcClient';
import { CycleLock } from './lib/lock';
import { LinkNotifier } from './lib/notifications';
import { PostgresStore } from './lib/postgresStore';
import type { ArchiveStore } from './lib/store';
import type { LinkDeps } from './workers/linkManager';
import type { SyncDeps } from './workers/syncRunner';

/**
 * Everything the sync and link operations need, shared by the CLI and the
 * HTTP server.
 */
export interface AppContext extends SyncDeps, LinkDeps {
  store: ArchiveStore;
  api: OpenBankingApi;
  gocardless: Pick<
    Config['gocardless'],
    'countryCode' | 'redirectUrl' | 'maxHistoricalDays' | 'accessValidForDays'
  >;
  pollIntervalSeconds: number;
  cycleLock: CycleLock;
}

export function createContext(config: Config): AppContext {
  return {
    store: PostgresStore.fromConfig(config.database),
    api: GoCardlessClient.fromConfig(config.gocardless),
    notifier: LinkNotifier.fromConfig(config.smtp),
    userEmail: config.userEmail,
    gocardless: config.gocardless,
    pollIntervalSeconds: config.sync.pollIntervalSeconds,
    cycleLock: new CycleLock(),
  };
}
