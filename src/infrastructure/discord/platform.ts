import {
  DiscordAPIError,
  EmbedBuilder,
  RESTJSONErrorCodes,
  TimestampStyles,
  WebhookClient,
  bold,
  time,
  userMention,
} from 'discord.js';
import type { Client, GuildMember } from 'discord.js';
import type { Logger } from 'pino';
import type {
  Actor,
  Alert,
  AlertChannel,
  ChannelRef,
  DeliveryResult,
  InfractionRequest,
  PlatformActions,
  RenameRequest,
  RichContent,
} from '../../domain/index.js';

/** Longest timeout Discord accepts. */
export const MAX_TIMEOUT_MS = 28 * 24 * 60 * 60 * 1000;

const SUPERSTAR_NICKNAME = 'Superstar';

export function toEmbed(content: RichContent): EmbedBuilder {
  return new EmbedBuilder()
    .setDescription(content.description || null)
    .setColor(content.colour)
    .setThumbnail(content.thumbnailUrl ?? null);
}

function isDmForbidden(err: unknown): boolean {
  return err instanceof DiscordAPIError && err.code === RESTJSONErrorCodes.CannotSendMessagesToThisUser;
}

function describeExpiry(expiresAt: Date | null): string {
  return expiresAt === null ? 'permanently' : `until ${time(expiresAt, TimestampStyles.RelativeTime)}`;
}

/**
 * PlatformActions backed by a discord.js client.
 *
 * Bans, kicks and mutes (as timeouts) are enforced natively; voice bans
 * disconnect the member from voice. Warnings, watches and notes have no
 * Discord counterpart and are only confirmed in the reply channel.
 * Expiry of bans and renames is reported but not scheduled.
 */
export class DiscordPlatform implements PlatformActions {
  private readonly client: Client;
  private readonly guildId: string;
  private readonly log: Logger;
  private readonly webhooks: Map<string, WebhookClient> = new Map();
  private readonly nowFn: () => number;

  constructor(client: Client, guildId: string, log: Logger, nowFn: () => number = Date.now) {
    this.client = client;
    this.guildId = guildId;
    this.log = log;
    this.nowFn = nowFn;
  }

  /**
   * Register the alert webhook. Returns null (and logs) when the URL
   * is empty or not a valid webhook URL.
   */
  registerAlertWebhook(url: string): AlertChannel | null {
    if (!url) {
      this.log.error('No alert webhook configured, filter alerts are disabled');
      return null;
    }
    try {
      const webhook = new WebhookClient({ url });
      this.webhooks.set(webhook.id, webhook);
      return { id: webhook.id };
    } catch (err: unknown) {
      this.log.error({ err }, 'Invalid alert webhook URL, filter alerts are disabled');
      return null;
    }
  }

  mention(actor: Actor): string {
    return userMention(actor.id);
  }

  async sendDirectMessage(actor: Actor, content: string, embed: RichContent | null): Promise<DeliveryResult> {
    const user = await this.client.users.fetch(actor.id);
    try {
      await user.send({ content, embeds: embed ? [toEmbed(embed)] : [] });
      return 'sent';
    } catch (err: unknown) {
      if (isDmForbidden(err)) return 'forbidden';
      throw err;
    }
  }

  async sendToChannel(channel: ChannelRef, content: string, embed: RichContent | null): Promise<void> {
    const target = await this.client.channels.fetch(channel.id);
    if (target === null || !target.isSendable()) {
      throw new Error(`Channel ${channel.id} is not a channel messages can be sent to`);
    }
    await target.send({ content, embeds: embed ? [toEmbed(embed)] : [] });
  }

  private async fetchMember(userId: string): Promise<GuildMember> {
    const guild = await this.client.guilds.fetch(this.guildId);
    return guild.members.fetch(userId);
  }

  async issueInfraction(request: InfractionRequest): Promise<void> {
    const { actor, infraction, expiresAt, reason } = request;

    switch (infraction) {
      case 'BAN': {
        const guild = await this.client.guilds.fetch(this.guildId);
        await guild.members.ban(actor.id, { reason });
        break;
      }
      case 'KICK':
        await (await this.fetchMember(actor.id)).kick(reason);
        break;
      case 'MUTE': {
        const remaining = expiresAt === null ? MAX_TIMEOUT_MS : expiresAt.getTime() - this.nowFn();
        const member = await this.fetchMember(actor.id);
        await member.timeout(Math.min(Math.max(remaining, 0), MAX_TIMEOUT_MS), reason);
        break;
      }
      case 'VOICE_BAN': {
        const member = await this.fetchMember(actor.id);
        if (member.voice.channelId !== null) {
          await member.voice.disconnect(reason);
        }
        break;
      }
      case 'SUPERSTAR':
        await this.forceRename({ actor, expiresAt, reason, channel: request.replyChannel });
        return;
      case 'WARNING':
      case 'WATCH':
      case 'NOTE':
        break;
    }

    const label = infraction.toLowerCase().replace('_', ' ');
    const confirmation = `Applied ${bold(label)} to ${userMention(actor.id)} ${describeExpiry(expiresAt)}`
      + (reason ? `: ${reason}` : '.');
    await this.sendToChannel(request.replyChannel, confirmation, null);
  }

  async forceRename(request: RenameRequest): Promise<void> {
    const member = await this.fetchMember(request.actor.id);
    await member.setNickname(SUPERSTAR_NICKNAME, request.reason || undefined);
    await this.sendToChannel(
      request.channel,
      `${userMention(request.actor.id)} has been superstarified ${describeExpiry(request.expiresAt)}.`,
      null,
    );
  }

  async sendAlert(channel: AlertChannel, alert: Alert): Promise<void> {
    const webhook = this.webhooks.get(channel.id);
    if (webhook === undefined) {
      throw new Error(`Alert webhook ${channel.id} is not registered`);
    }
    await webhook.send({
      username: alert.username,
      content: alert.content || undefined,
      embeds: alert.embeds.map(toEmbed),
    });
  }

  destroy(): void {
    for (const webhook of this.webhooks.values()) {
      webhook.destroy();
    }
    this.webhooks.clear();
  }
}
