export {
  actionsSchema,
  infractionAndNotificationSchema,
  rawFilterListSchema,
  checkRequestSchema,
  toFilterListData,
} from './filter-list-schema.js';
export type { RawFilterList, ParsedFilterList, CheckRequest, InfractionAndNotificationConfig } from './filter-list-schema.js';
export { FilterListRegistry, buildFilterListRegistry } from './filter-list-registry.js';
export { FilterListStore } from './filter-list-store.js';
export { composeAlert, composeAlertBody, truncateAlertBody, listTitle, MAX_ALERT_LENGTH, TRUNCATION_MARKER } from './alert.js';
export type { TriggeredList } from './alert.js';
export { FilteringDispatcher } from './dispatcher.js';
export type { DispatcherOptions, DispatchOutcome, Evaluation } from './dispatcher.js';
