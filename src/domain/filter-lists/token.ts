import type { FilterContext } from '../filter-context.js';
import type { Filter, FilterList, FilterListData, TriggeredFilter } from './types.js';

const LIST_NAME = 'token';

function compilePattern(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    return null;
  }
}

/**
 * Token filter list.
 *
 * Each filter's content is a case-insensitive regular expression tested
 * against the message text. Filters with an invalid pattern never match.
 */
export function createTokenFilterList(): FilterList {
  const filters: Filter[] = [];
  const compiled = new Map<number, RegExp | null>();

  return {
    name: LIST_NAME,
    events: ['message', 'message_edit'],
    filters,

    addList(data: FilterListData): void {
      for (const filter of data.filters) {
        filters.push(filter);
        compiled.set(filter.id, compilePattern(filter.content));
      }
    },

    async triggersFor(ctx: Readonly<FilterContext>): Promise<TriggeredFilter[]> {
      if (!ctx.content) return [];

      const triggered: TriggeredFilter[] = [];
      for (const filter of filters) {
        const match = compiled.get(filter.id)?.exec(ctx.content);
        if (match) {
          triggered.push({ ...filter, matches: [match[0]] });
        }
      }
      return triggered;
    },
  };
}
