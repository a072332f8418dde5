import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { FilterListStore } from '../../application/filter-list-store.js';

export interface FilterListRoutesOptions {
  store: FilterListStore;
  /** Ask every bot process to rebuild its filter lists. */
  requestReload: () => Promise<void>;
}

/**
 * Filter list admin routes.
 *
 * GET  /health                      — liveness and loaded list count
 * GET  /api/v1/filter-lists         — loaded lists, their events and filter counts
 * POST /api/v1/filter-lists/reload  — publish a reload notification
 */
async function filterListRoutes(fastify: FastifyInstance, opts: FilterListRoutesOptions): Promise<void> {

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: 'ok', filterLists: opts.store.get().size });
    },
  );

  fastify.get(
    '/api/v1/filter-lists',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const lists = opts.store.get().all().map((list) => ({
        name: list.name,
        events: list.events,
        filterCount: list.filters.length,
      }));
      return reply.status(200).send(lists);
    },
  );

  fastify.post(
    '/api/v1/filter-lists/reload',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      await opts.requestReload();
      return reply.status(202).send({ status: 'reload requested' });
    },
  );
}

export default fp(filterListRoutes, {
  name: 'filter-list-routes',
  fastify: '5.x',
});
