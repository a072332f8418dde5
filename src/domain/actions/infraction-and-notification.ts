import type { FilterContext } from '../filter-context.js';
import type { Infraction } from '../infraction.js';
import { mostSevere } from '../infraction.js';
import { mergeDurations, mergeMessages } from './merge.js';
import type { ActionEnvironment, ActionHandler } from './types.js';

export const INFRACTION_AND_NOTIFICATION = 'infraction_and_notification';

/** A forced rename riding alongside the primary infraction. */
export interface SuperstarAction {
  readonly reason: string;
  /** Seconds, null = permanent. */
  readonly duration: number | null;
}

/**
 * Which infraction to issue and what to DM the offending user.
 *
 * The two live in one entry because a DM can no longer be delivered
 * once the user has been banned or kicked.
 */
export interface InfractionAndNotification {
  readonly kind: typeof INFRACTION_AND_NOTIFICATION;
  readonly infractionType: Infraction;
  readonly infractionReason: string;
  /** Seconds, null = permanent. */
  readonly infractionDuration: number | null;
  readonly dmContent: string;
  /** Description of the embed sent with the DM. */
  readonly dmEmbed: string;
  readonly superstar: SuperstarAction | null;
}

export type InfractionAndNotificationInit = Partial<Omit<InfractionAndNotification, 'kind'>>;

export function createInfractionAndNotification(
  init: InfractionAndNotificationInit = {},
): InfractionAndNotification {
  return {
    kind: INFRACTION_AND_NOTIFICATION,
    infractionType: init.infractionType ?? 'NONE',
    infractionReason: init.infractionReason ?? '',
    infractionDuration: init.infractionDuration ?? null,
    dmContent: init.dmContent ?? '',
    dmEmbed: init.dmEmbed ?? '',
    superstar: init.superstar ?? null,
  };
}

function mergeSuperstars(a: SuperstarAction | null, b: SuperstarAction | null): SuperstarAction | null {
  if (a === null) return b;
  if (b === null) return a;
  return {
    reason: mergeMessages(a.reason, b.reason),
    duration: mergeDurations(a.duration, b.duration),
  };
}

/**
 * Combine two entries into one that does at least what both would.
 *
 * - An entry without an infraction leaves the other side's infraction as is;
 *   its DM texts and superstar are still merged in.
 * - A SUPERSTAR facing a different infraction is folded into the
 *   embedded superstar of the other entry, using its own reason and
 *   duration as the rename parameters.
 * - Otherwise the more severe infraction wins with its own duration;
 *   equal infractions keep the longer duration (permanent wins).
 * - Reasons and DM texts are always merged into bullet points.
 */
export function combineInfractionAndNotification(
  a: InfractionAndNotification,
  b: InfractionAndNotification,
): InfractionAndNotification {
  const dmContent = mergeMessages(a.dmContent, b.dmContent);
  const dmEmbed = mergeMessages(a.dmEmbed, b.dmEmbed);

  if (a.infractionType === 'NONE' || b.infractionType === 'NONE') {
    const infracting = a.infractionType === 'NONE' ? b : a;
    return {
      ...infracting,
      dmContent,
      dmEmbed,
      superstar: mergeSuperstars(a.superstar, b.superstar),
    };
  }

  if (
    a.infractionType !== b.infractionType
    && (a.infractionType === 'SUPERSTAR' || b.infractionType === 'SUPERSTAR')
  ) {
    const [star, primary] = a.infractionType === 'SUPERSTAR' ? [a, b] : [b, a];
    const promoted: SuperstarAction = {
      reason: star.infractionReason,
      duration: star.infractionDuration,
    };
    return {
      ...primary,
      dmContent,
      dmEmbed,
      superstar: mergeSuperstars(mergeSuperstars(promoted, star.superstar), primary.superstar),
    };
  }

  const infractionType = mostSevere(a.infractionType, b.infractionType);
  let infractionDuration: number | null;
  if (a.infractionType === b.infractionType) {
    infractionDuration = mergeDurations(a.infractionDuration, b.infractionDuration);
  } else {
    infractionDuration = infractionType === a.infractionType ? a.infractionDuration : b.infractionDuration;
  }

  return {
    kind: INFRACTION_AND_NOTIFICATION,
    infractionType,
    infractionReason: mergeMessages(a.infractionReason, b.infractionReason),
    infractionDuration,
    dmContent,
    dmEmbed,
    superstar: mergeSuperstars(a.superstar, b.superstar),
  };
}

function expiresAt(duration: number | null, env: ActionEnvironment): Date | null {
  return duration === null ? null : new Date(env.now() + duration * 1000);
}

async function bestEffort(
  step: string,
  ctx: FilterContext,
  env: ActionEnvironment,
  run: () => Promise<void>,
): Promise<void> {
  try {
    await run();
  } catch (err: unknown) {
    env.log.error({ err, step, author: ctx.author.id }, 'Filter action step failed');
  }
}

async function notify(entry: InfractionAndNotification, ctx: FilterContext, env: ActionEnvironment): Promise<void> {
  ctx.dmContent = mergeMessages(ctx.dmContent, entry.dmContent);
  ctx.dmEmbed.description = mergeMessages(ctx.dmEmbed.description, entry.dmEmbed);
  if (!ctx.dmContent && !ctx.dmEmbed.description) return;

  if (ctx.dmEmbed.colour === null) {
    ctx.dmEmbed.colour = env.dmColour;
  }

  const greeting = `Hey ${env.platform.mention(ctx.author)}!`;
  const content = ctx.dmContent ? `${greeting}\n${ctx.dmContent}` : greeting;
  const embed = ctx.dmEmbed.description ? ctx.dmEmbed : null;

  const result = await env.platform.sendDirectMessage(ctx.author, content, embed);
  if (result === 'forbidden') {
    env.log.debug({ author: ctx.author.id, channel: ctx.channel.id }, 'DMs closed, notifying in channel');
    await env.platform.sendToChannel(ctx.channel, content, embed);
  }
  ctx.actionDescriptions.push('notified');
}

/**
 * Apply the entry: notify, then superstar, then infract.
 *
 * Each step runs even if an earlier one failed.
 */
export async function applyInfractionAndNotification(
  entry: InfractionAndNotification,
  ctx: FilterContext,
  env: ActionEnvironment,
): Promise<void> {
  await bestEffort('notify', ctx, env, () => notify(entry, ctx, env));

  const superstar = entry.superstar;
  if (superstar !== null) {
    await bestEffort('superstar', ctx, env, async () => {
      await env.platform.forceRename({
        actor: ctx.author,
        expiresAt: expiresAt(superstar.duration, env),
        reason: superstar.reason,
        channel: ctx.channel,
      });
      ctx.actionDescriptions.push('superstarred');
    });
  }

  const infraction = entry.infractionType;
  if (infraction !== 'NONE') {
    await bestEffort('infraction', ctx, env, async () => {
      // Bans and DM-originated infractions are confirmed out of public view.
      const replyChannel = infraction === 'BAN' || ctx.channel.guildId === null
        ? env.moderationChannel
        : ctx.channel;
      await env.platform.issueInfraction({
        actor: ctx.author,
        infraction,
        expiresAt: expiresAt(entry.infractionDuration, env),
        reason: entry.infractionReason,
        replyChannel,
      });
      ctx.actionDescriptions.push(infraction.toLowerCase());
    });
  }
}

export const infractionAndNotificationHandler: ActionHandler<InfractionAndNotification> = {
  combine: combineInfractionAndNotification,
  apply: applyInfractionAndNotification,
};
