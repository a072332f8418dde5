import Fastify from 'fastify';
import type { Logger } from 'pino';
import type { FilteringDispatcher } from '../../application/dispatcher.js';
import type { FilterListStore } from '../../application/filter-list-store.js';
import filterListRoutes from './filter-list-routes.js';
import checkRoutes from './check-routes.js';

export interface ServerDependencies {
  log: Logger;
  store: FilterListStore;
  dispatcher: FilteringDispatcher;
  requestReload: () => Promise<void>;
}

/**
 * Build the admin HTTP server. The caller decides when to listen().
 */
export async function buildServer(deps: ServerDependencies) {
  const fastify = Fastify({ loggerInstance: deps.log });

  await fastify.register(filterListRoutes, { store: deps.store, requestReload: deps.requestReload });
  await fastify.register(checkRoutes, { dispatcher: deps.dispatcher });

  return fastify;
}
