import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import type { AppContext } from '../context';
import { syncAccounts, syncBanks, syncTransactions } from '../workers/syncRunner';

/**
 * Single sync cycles on demand. Each request waits for its cycle to finish;
 * a request made while another cycle runs is refused.
 */
const plugin: FastifyPluginAsync<{ context: AppContext }> = async (fastify, { context }) => {
  const rejectBusy = (reply: FastifyReply) =>
    reply.code(409).send({
      error: 'SYNC_IN_PROGRESS',
      message: 'A sync cycle is already running',
    });

  fastify.post('/sync/banks', async (request, reply) => {
    if (context.cycleLock.isLocked) {
      return rejectBusy(reply);
    }
    const banks = await context.cycleLock.run('sync banks', () =>
      syncBanks(context, context.gocardless.countryCode)
    );
    return { banks };
  });

  fastify.post('/sync/accounts', async (request, reply) => {
    if (context.cycleLock.isLocked) {
      return rejectBusy(reply);
    }
    const accounts = await context.cycleLock.run('sync accounts', () => syncAccounts(context));
    return { accounts };
  });

  fastify.post('/sync/transactions', async (request, reply) => {
    if (context.cycleLock.isLocked) {
      return rejectBusy(reply);
    }
    return context.cycleLock.run('sync transactions', () => syncTransactions(context));
  });
};

export default plugin;
