#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import Table from 'cli-table3';
import { getConfig } from './config';
import { type AppContext, createContext } from './context';
import { PollScheduler } from './lib/scheduler';
import { serve } from './index';
import { type LogFormat, logFormats, logger, setLogFormat } from './logger';
import {
  BankNotFoundError,
  linkBank,
  linkStatus,
  pruneRequisitions,
  unlinkBank,
} from './workers/linkManager';
import { syncAccounts, syncBanks, syncTransactions } from './workers/syncRunner';

const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

type ContextFactory = () => AppContext;

type GlobalOptions = { verbose?: boolean; logFormat?: LogFormat; logLevel?: string };

const plainStyle = { head: [], border: [] };

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a whole number of seconds.');
  }
  return seconds;
}

export async function renderBanksTable(context: AppContext): Promise<string> {
  const banks = [...(await context.store.getBanks())].sort((a, b) => a.name.localeCompare(b.name));

  const table = new Table({
    head: ['ID', 'Name', 'External ID', 'Active Requisition ID', 'Provider Type'],
    style: plainStyle,
  });
  for (const bank of banks) {
    table.push([bank.id, bank.name, bank.externalId, bank.activeRequisitionId, bank.providerType]);
  }
  return table.toString();
}

export async function renderAccountsTable(context: AppContext): Promise<string> {
  const accounts = [...(await context.store.getAccounts())].sort((a, b) => a.id - b.id);
  const banks = await context.store.getBanksByIds(accounts.map((account) => account.bankId));

  const table = new Table({ head: ['ID', 'Name', 'External ID', 'Bank Name'], style: plainStyle });
  for (const account of accounts) {
    table.push([
      account.id,
      account.name,
      account.externalId,
      banks.get(account.bankId)?.name ?? 'Not Found',
    ]);
  }
  return table.toString();
}

/**
 * Run an operation against a fresh context and release its pool afterwards
 */
async function withContext(
  factory: ContextFactory,
  fn: (context: AppContext) => Promise<void>
): Promise<void> {
  const context = factory();
  try {
    await fn(context);
  } catch (err) {
    if (err instanceof BankNotFoundError) {
      logger.error({ bank: err.bankName }, err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    await context.store.close();
  }
}

export function buildProgram(factory: ContextFactory = () => createContext(getConfig())): Command {
  const program = new Command();

  program
    .name('bank-feed-archiver')
    .description('Archive open banking transactions into PostgreSQL')
    .option('--verbose', 'log debug output')
    .addOption(new Option('--log-format <format>', 'log output format').choices(logFormats))
    .addOption(new Option('--log-level <level>', 'log level').choices(logLevels))
    .hook('preAction', (command) => {
      const options = command.opts<GlobalOptions>();
      if (options.logFormat) {
        setLogFormat(options.logFormat);
      }
      if (options.logLevel) {
        logger.level = options.logLevel;
      } else if (options.verbose) {
        logger.level = 'debug';
      }
    });

  const ls = program.command('ls').description('List archived records');

  ls.command('banks').action(() =>
    withContext(factory, async (context) => {
      process.stdout.write(`${await renderBanksTable(context)}\n`);
    })
  );

  ls.command('accounts').action(() =>
    withContext(factory, async (context) => {
      process.stdout.write(`${await renderAccountsTable(context)}\n`);
    })
  );

  const sync = program.command('sync').description('Pull data from the provider');

  sync.command('banks').action(() =>
    withContext(factory, async (context) => {
      await syncBanks(context, context.gocardless.countryCode);
    })
  );

  sync.command('accounts').action(() =>
    withContext(factory, async (context) => {
      await syncAccounts(context);
    })
  );

  sync
    .command('transactions')
    .option(
      '--poll-interval <seconds>',
      'poll interval in seconds to sync transactions to the database',
      parseSeconds
    )
    .action((options: { pollInterval?: number }) =>
      withContext(factory, async (context) => {
        const scheduler = new PollScheduler(
          () => context.cycleLock.run('poll', () => syncTransactions(context)),
          { intervalSeconds: options.pollInterval ?? context.pollIntervalSeconds }
        );
        const stop = () => scheduler.stop();
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
        try {
          await scheduler.start();
        } finally {
          process.off('SIGINT', stop);
          process.off('SIGTERM', stop);
        }
      })
    );

  program
    .command('link')
    .argument('<bank>', 'bank name')
    .action((bankName: string) =>
      withContext(factory, async (context) => {
        await linkBank(context, bankName);
      })
    );

  program
    .command('unlink')
    .argument('<bank>', 'bank name')
    .action((bankName: string) =>
      withContext(factory, async (context) => {
        await unlinkBank(context, bankName);
      })
    );

  program
    .command('status')
    .argument('<bank>', 'bank name')
    .action((bankName: string) =>
      withContext(factory, async (context) => {
        await linkStatus(context, bankName);
      })
    );

  program.command('prune').action(() =>
    withContext(factory, async (context) => {
      await pruneRequisitions(context);
    })
  );

  program
    .command('serve')
    .description('Start the HTTP admin surface')
    .action(() => serve(factory(), getConfig().port));

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      logger.fatal({ err }, 'Command failed');
      process.exit(1);
    });
}
