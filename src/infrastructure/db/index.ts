export { filterLists, filters } from './schema.js';
export { createDbClient, ensureTables } from './client.js';
export type { Database, SqlClient } from './client.js';
export { findFilterLists, groupFilterLists } from './filter-list-repository.js';
export type { FilterListRow, FilterRow, StoredFilterList } from './filter-list-repository.js';
