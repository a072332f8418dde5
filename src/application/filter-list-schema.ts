import { z } from 'zod';
import {
  FILTER_EVENTS,
  INFRACTION_AND_NOTIFICATION,
  actionSetFromEntries,
  createInfractionAndNotification,
  parseInfraction,
} from '../domain/index.js';
import type { ActionEntry, ActionSet, FilterListData } from '../domain/index.js';

/**
 * Infraction name as stored in filter settings ("ban", "voice ban", …).
 * Null or blank maps to NONE.
 */
const infractionTypeSchema = z.string().nullable().default(null).transform((value, ctx) => {
  try {
    return parseInfraction(value);
  } catch (err: unknown) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

/** Seconds; null means permanent. */
const durationSchema = z.number().finite().nonnegative().nullable().default(null);

const superstarSchema = z.object({
  reason: z.string().default(''),
  duration: durationSchema,
});

export const infractionAndNotificationSchema = z.object({
  infraction_type: infractionTypeSchema,
  infraction_reason: z.string().default(''),
  infraction_duration: durationSchema,
  dm_content: z.string().default(''),
  dm_embed: z.string().default(''),
  superstar: superstarSchema.nullable().default(null),
});

export type InfractionAndNotificationConfig = z.input<typeof infractionAndNotificationSchema>;

/**
 * Actions configured on a list or a filter, keyed by action kind.
 * Parses into an ActionSet.
 */
export const actionsSchema = z.object({
  [INFRACTION_AND_NOTIFICATION]: infractionAndNotificationSchema.optional(),
}).default({}).transform((config): ActionSet => {
  const entries: ActionEntry[] = [];
  const infraction = config[INFRACTION_AND_NOTIFICATION];
  if (infraction !== undefined) {
    entries.push(createInfractionAndNotification({
      infractionType: infraction.infraction_type,
      infractionReason: infraction.infraction_reason,
      infractionDuration: infraction.infraction_duration,
      dmContent: infraction.dm_content,
      dmEmbed: infraction.dm_embed,
      superstar: infraction.superstar,
    }));
  }
  return actionSetFromEntries(entries);
});

export const rawFilterSchema = z.object({
  id: z.number().int(),
  content: z.string().min(1),
  description: z.string().nullable().default(null),
  actions: actionsSchema.nullable().default(null),
});

/**
 * One filter list as supplied by the filter-list source.
 *
 * Several raw lists may share a name; they are added to the same list.
 */
export const rawFilterListSchema = z.object({
  name: z.string().min(1),
  defaults: z.object({ actions: actionsSchema }).default({}),
  filters: z.array(rawFilterSchema).default([]),
});

export type RawFilterList = z.input<typeof rawFilterListSchema>;
export type ParsedFilterList = z.output<typeof rawFilterListSchema>;

/** Fold list defaults into each filter; a filter's own entry wins per kind. */
export function toFilterListData(parsed: ParsedFilterList): FilterListData {
  return {
    name: parsed.name,
    filters: parsed.filters.map((filter) => ({
      id: filter.id,
      content: filter.content,
      description: filter.description,
      actions: { ...parsed.defaults.actions, ...(filter.actions ?? {}) },
    })),
  };
}

/** Body of POST /api/v1/filter/check. */
export const checkRequestSchema = z.object({
  event: z.enum(FILTER_EVENTS).default('message'),
  content: z.string(),
  author_id: z.string().min(1).default('0'),
  channel_id: z.string().min(1).default('0'),
  guild_id: z.string().min(1).nullable().default(null),
  embeds: z.array(z.object({ url: z.string().optional() })).default([]),
});

export type CheckRequest = z.infer<typeof checkRequestSchema>;
