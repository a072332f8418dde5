import { Events } from 'discord.js';
import type { Client, Message } from 'discord.js';
import type { Logger } from 'pino';
import type { EmbedDescriptor, FilterContextInput, FilterEvent } from '../../domain/index.js';
import type { FilteringDispatcher } from '../../application/dispatcher.js';

/** Translate a discord.js message into the input of a filtering pass. */
export function toFilterContextInput(message: Message, event: FilterEvent): FilterContextInput {
  const channel = message.channel;
  const embeds: EmbedDescriptor[] = [
    ...message.embeds.map((embed) => ({
      url: embed.url ?? undefined,
      title: embed.title ?? undefined,
      description: embed.description ?? undefined,
    })),
    ...message.attachments.map((attachment) => ({ url: attachment.url, title: attachment.name })),
  ];

  return {
    event,
    author: {
      id: message.author.id,
      username: message.author.username,
      avatarUrl: message.author.displayAvatarURL(),
      bot: message.author.bot,
    },
    channel: {
      id: message.channelId,
      name: channel.isDMBased() ? 'DM' : channel.name,
      guildId: message.guildId,
    },
    content: message.content,
    message: { id: message.id, jumpUrl: message.url },
    embeds,
  };
}

/**
 * Route new and edited messages into the dispatcher.
 *
 * Edits that leave the text unchanged (e.g. link previews being added)
 * are not filtered again.
 */
export function attachFilteringListeners(
  client: Client,
  dispatcher: FilteringDispatcher,
  log: Logger,
): void {
  const handle = async (message: Message, event: FilterEvent): Promise<void> => {
    try {
      await dispatcher.onMessage(toFilterContextInput(message, event));
    } catch (err: unknown) {
      log.error({ err, messageId: message.id, event }, 'Filtering dispatch failed');
    }
  };

  client.on(Events.MessageCreate, (message) => {
    void handle(message, 'message');
  });

  client.on(Events.MessageUpdate, (before, after) => {
    if (!before.partial && !after.partial && before.content === after.content) return;

    void (async () => {
      try {
        const message = after.partial ? await after.fetch() : after;
        await handle(message, 'message_edit');
      } catch (err: unknown) {
        log.warn({ err, messageId: after.id }, 'Could not fetch edited message');
      }
    })();
  });
}
