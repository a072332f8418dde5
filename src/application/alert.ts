import { inspect } from 'node:util';
import { bold, channelMention, escapeMarkdown, hyperlink, inlineCode, userMention } from 'discord.js';
import { eventTitle } from '../domain/index.js';
import type { Actor, Alert, ChannelRef, FilterContext, TriggeredFilter } from '../domain/index.js';

export const ALERT_COLOUR = 0xf9cb54;
export const MAX_ALERT_LENGTH = 4000;
export const TRUNCATION_MARKER = ' [...]';

/** The filters one list reported as triggered. */
export interface TriggeredList {
  readonly name: string;
  readonly filters: readonly TriggeredFilter[];
}

/** `domain_name` → `Domain Name` */
export function listTitle(name: string): string {
  return name
    .split(/[_ ]/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function formatUser(actor: Actor): string {
  return `${userMention(actor.id)} (${inlineCode(actor.id)})`;
}

export function formatChannel(channel: ChannelRef): string {
  return `${channelMention(channel.id)} (${inlineCode(channel.id)})`;
}

function formatFilter(filter: TriggeredFilter): string {
  return `#${filter.id} (${inlineCode(filter.content)})`;
}

function formatFilters(triggered: readonly TriggeredList[]): string {
  const [only] = triggered;
  if (triggered.length === 1 && only !== undefined && only.filters.length === 1) {
    const [filter] = only.filters;
    if (filter !== undefined) {
      let line = `${bold(`${listTitle(only.name)} Filters:`)} ${formatFilter(filter)}`;
      if (filter.description) line += ` - ${filter.description}`;
      return line;
    }
  }

  return triggered
    .map(({ name, filters }) => `${bold(`${listTitle(name)} Filters:`)} ${filters.map(formatFilter).join(', ')}`)
    .join('\n');
}

/**
 * Cap the body at MAX_ALERT_LENGTH UTF-16 units, marking the cut.
 * A surrogate pair straddling the limit is dropped whole.
 */
export function truncateAlertBody(body: string): string {
  if (body.length <= MAX_ALERT_LENGTH) return body;
  let end = MAX_ALERT_LENGTH;
  const last = body.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return body.slice(0, end) + TRUNCATION_MARKER;
}

/** Description of the summary embed: who, where, what matched, what was done. */
export function composeAlertBody(ctx: FilterContext, triggered: readonly TriggeredList[]): string {
  const triggeredBy = `${bold('Triggered by:')} ${formatUser(ctx.author)}`;
  const triggeredIn = ctx.channel.guildId !== null
    ? `${bold('Triggered in:')} ${formatChannel(ctx.channel)}`
    : bold('DM');
  const filters = formatFilters(triggered);
  const matches = `${bold('Matches:')} ${ctx.matches.map((match) => inspect(match)).join(', ')}`;
  const actions = `${bold('Actions Taken:')} ${ctx.actionDescriptions.length > 0 ? ctx.actionDescriptions.join(', ') : '-'}`;
  const source = ctx.message !== null
    ? bold(hyperlink('Original Content', ctx.message.jumpUrl))
    : bold('Original Content');
  const content = `${source}: ${escapeMarkdown(ctx.content)}`;

  const body = [triggeredBy, triggeredIn, filters, matches, actions, content]
    .filter((part) => part.length > 0)
    .join('\n');
  return truncateAlertBody(body);
}

export function composeAlert(ctx: FilterContext, triggered: readonly TriggeredList[]): Alert {
  return {
    username: `${eventTitle(ctx.event)} Filter`,
    content: ctx.alertContent,
    embeds: [
      {
        description: composeAlertBody(ctx, triggered),
        colour: ALERT_COLOUR,
        thumbnailUrl: ctx.author.avatarUrl,
      },
      ...ctx.alertEmbeds,
    ],
  };
}
