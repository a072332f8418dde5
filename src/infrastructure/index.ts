export { publishFilterListChange, FILTER_LISTS_CHANNEL } from './redis/index.js';
export type { FilterListChangeReason, FilterListChangePayload } from './redis/index.js';
export { createDbClient, ensureTables, findFilterLists, groupFilterLists, filterLists, filters } from './db/index.js';
export type { Database, SqlClient, StoredFilterList } from './db/index.js';
export { startFilterListSubscriber, reloadFilterLists } from './worker/index.js';
export { loadFilteringConfig, DEFAULT_CONFIG } from './config/index.js';
export type { FilteringConfig } from './config/index.js';
export { DiscordPlatform, attachFilteringListeners, toFilterContextInput } from './discord/index.js';
