import type { FastifyPluginAsync } from 'fastify';
import type { AppContext } from '../context';
import { linkBank, linkStatus, pruneRequisitions, unlinkBank } from '../workers/linkManager';

interface BankParams {
  name: string;
}

const bankParamsSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
  },
  required: ['name'],
} as const;

const plugin: FastifyPluginAsync<{ context: AppContext }> = async (fastify, { context }) => {
  fastify.get('/banks', async () => {
    const banks = await context.store.getBanks();
    return {
      banks: banks
        .sort((a, b) => a.name.localeCompare(b.name))
        .map((bank) => ({
          id: bank.id,
          name: bank.name,
          externalId: bank.externalId,
          providerType: bank.providerType,
          activeRequisitionId: bank.activeRequisitionId || null,
          activationEmailSent: bank.activationEmailSent,
        })),
    };
  });

  fastify.get<{ Params: BankParams }>(
    '/banks/:name/status',
    { schema: { params: bankParamsSchema } },
    async (request) => {
      const status = await linkStatus(context, request.params.name);
      return { bank: request.params.name, status };
    }
  );

  fastify.post<{ Params: BankParams }>(
    '/banks/:name/link',
    { schema: { params: bankParamsSchema } },
    async (request, reply) => {
      const result = await linkBank(context, request.params.name);
      return reply.code(result.outcome === 'created' ? 201 : 200).send(result);
    }
  );

  fastify.post<{ Params: BankParams }>(
    '/banks/:name/unlink',
    { schema: { params: bankParamsSchema } },
    async (request) => {
      const removed = await unlinkBank(context, request.params.name);
      return { bank: request.params.name, removed };
    }
  );

  fastify.post('/requisitions/prune', async () => pruneRequisitions(context));
};

export default plugin;
