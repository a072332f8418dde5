export type { ActionEnvironment, ActionHandler } from './types.js';
export { mergeMessages, mergeDurations } from './merge.js';
export {
  INFRACTION_AND_NOTIFICATION,
  createInfractionAndNotification,
  combineInfractionAndNotification,
  applyInfractionAndNotification,
} from './infraction-and-notification.js';
export type {
  InfractionAndNotification,
  InfractionAndNotificationInit,
  SuperstarAction,
} from './infraction-and-notification.js';
export {
  ACTION_KINDS,
  EMPTY_ACTION_SET,
  mergeActionSets,
  reduceActionSets,
  actionSetFromEntries,
  isEmptyActionSet,
  applyActionSet,
} from './action-set.js';
export type { ActionSet, ActionKind, ActionEntry, ActionEntryByKind } from './action-set.js';
