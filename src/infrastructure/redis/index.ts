export { publishFilterListChange, FILTER_LISTS_CHANNEL } from './filter-list-notifier.js';
export type { FilterListChangeReason, FilterListChangePayload } from './filter-list-notifier.js';
