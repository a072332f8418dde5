import type { FilterContext } from '../filter-context.js';
import {
  INFRACTION_AND_NOTIFICATION,
  infractionAndNotificationHandler,
} from './infraction-and-notification.js';
import type { InfractionAndNotification } from './infraction-and-notification.js';
import type { ActionEnvironment, ActionHandler } from './types.js';

/** Entry type for every action kind, keyed by its discriminant. */
export interface ActionEntryByKind {
  [INFRACTION_AND_NOTIFICATION]: InfractionAndNotification;
}

export type ActionKind = keyof ActionEntryByKind;

export type ActionEntry = ActionEntryByKind[ActionKind];

/** At most one entry per kind. */
export type ActionSet = { readonly [K in ActionKind]?: ActionEntryByKind[K] };

type MutableActionSet = { [K in ActionKind]?: ActionEntryByKind[K] };

/** Application order. */
export const ACTION_KINDS: readonly ActionKind[] = [INFRACTION_AND_NOTIFICATION];

const handlers: { [K in ActionKind]: ActionHandler<ActionEntryByKind[K]> } = {
  [INFRACTION_AND_NOTIFICATION]: infractionAndNotificationHandler,
};

export const EMPTY_ACTION_SET: ActionSet = {};

function mergeKind<K extends ActionKind>(
  target: MutableActionSet,
  kind: K,
  left: ActionSet,
  right: ActionSet,
): void {
  const a: ActionEntryByKind[K] | undefined = left[kind];
  const b: ActionEntryByKind[K] | undefined = right[kind];
  const handler: ActionHandler<ActionEntryByKind[K]> = handlers[kind];

  if (a === undefined) {
    if (b !== undefined) target[kind] = b;
  } else {
    target[kind] = b === undefined ? a : handler.combine(a, b);
  }
}

/**
 * Union of two action sets.
 *
 * Entries of the same kind are combined with that kind's handler;
 * entries of different kinds never meet.
 */
export function mergeActionSets(left: ActionSet, right: ActionSet): ActionSet {
  const merged: MutableActionSet = {};
  for (const kind of ACTION_KINDS) {
    mergeKind(merged, kind, left, right);
  }
  return merged;
}

export function reduceActionSets(sets: Iterable<ActionSet>): ActionSet {
  let result = EMPTY_ACTION_SET;
  for (const set of sets) {
    result = mergeActionSets(result, set);
  }
  return result;
}

export function actionSetFromEntries(entries: Iterable<ActionEntry>): ActionSet {
  let result = EMPTY_ACTION_SET;
  for (const entry of entries) {
    const single: MutableActionSet = {};
    single[entry.kind] = entry;
    result = mergeActionSets(result, single);
  }
  return result;
}

export function isEmptyActionSet(set: ActionSet): boolean {
  return ACTION_KINDS.every((kind) => set[kind] === undefined);
}

async function applyKind<K extends ActionKind>(
  kind: K,
  set: ActionSet,
  ctx: FilterContext,
  env: ActionEnvironment,
): Promise<void> {
  const entry: ActionEntryByKind[K] | undefined = set[kind];
  if (entry === undefined) return;

  const handler: ActionHandler<ActionEntryByKind[K]> = handlers[kind];
  try {
    await handler.apply(entry, ctx, env);
  } catch (err: unknown) {
    env.log.error({ err, kind }, 'Failed to apply filter action');
  }
}

/** Apply every present kind once, in `ACTION_KINDS` order. */
export async function applyActionSet(
  set: ActionSet,
  ctx: FilterContext,
  env: ActionEnvironment,
): Promise<void> {
  for (const kind of ACTION_KINDS) {
    await applyKind(kind, set, ctx, env);
  }
}
