import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { checkRequestSchema } from '../../application/filter-list-schema.js';
import type { FilteringDispatcher } from '../../application/dispatcher.js';

export interface CheckRoutesOptions {
  dispatcher: FilteringDispatcher;
}

/**
 * Dry-run route.
 *
 * POST /api/v1/filter/check: run the filter lists against some content and
 * return what would trigger and the combined action, without applying it.
 */
async function checkRoutes(fastify: FastifyInstance, opts: CheckRoutesOptions): Promise<void> {

  fastify.post(
    '/api/v1/filter/check',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = checkRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: parsed.error.flatten() });
      }

      const body = parsed.data;
      const { ctx, triggered, actions } = await opts.dispatcher.evaluate({
        event: body.event,
        author: { id: body.author_id, username: 'dry-run', avatarUrl: null, bot: false },
        channel: { id: body.channel_id, name: 'dry-run', guildId: body.guild_id },
        content: body.content,
        message: null,
        embeds: body.embeds,
      });

      return reply.status(200).send({
        triggered: triggered.map(({ name, filters }) => ({
          list: name,
          filters: filters.map((filter) => ({
            id: filter.id,
            content: filter.content,
            description: filter.description,
            matches: filter.matches,
          })),
        })),
        matches: ctx.matches,
        actions,
      });
    },
  );
}

export default fp(checkRoutes, {
  name: 'check-routes',
  fastify: '5.x',
});
