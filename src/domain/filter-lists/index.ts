import { createDomainFilterList } from './domain.js';
import { createTokenFilterList } from './token.js';
import type { FilterListFactory } from './types.js';

export type { Filter, TriggeredFilter, FilterList, FilterListData, FilterListFactory } from './types.js';
export { createTokenFilterList } from './token.js';
export { createDomainFilterList, extractHostnames } from './domain.js';

/** Implementation for each filter list name known to the bot. */
export const FILTER_LIST_TYPES: ReadonlyMap<string, FilterListFactory> = new Map([
  ['token', createTokenFilterList],
  ['domain', createDomainFilterList],
]);
