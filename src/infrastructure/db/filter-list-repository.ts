import { asc } from 'drizzle-orm';
import type { Database } from './client.js';
import { filterLists, filters } from './schema.js';

export type FilterListRow = typeof filterLists.$inferSelect;
export type FilterRow = typeof filters.$inferSelect;

/**
 * A filter list as stored, before validation.
 *
 * JSONB columns stay `unknown` here; the registry validates them.
 */
export interface StoredFilterList {
  name: string;
  defaults: unknown;
  filters: Array<{
    id: number;
    content: string;
    description: string | null;
    actions: unknown;
  }>;
}

/**
 * Group filter rows under their list rows, preserving id order.
 *
 * Filters referencing a missing list are dropped.
 */
export function groupFilterLists(
  listRows: readonly FilterListRow[],
  filterRows: readonly FilterRow[],
): StoredFilterList[] {
  const byListId = new Map<number, StoredFilterList>();
  const grouped: StoredFilterList[] = [];

  for (const row of listRows) {
    const list: StoredFilterList = { name: row.name, defaults: row.defaults, filters: [] };
    byListId.set(row.id, list);
    grouped.push(list);
  }

  for (const row of filterRows) {
    byListId.get(row.filter_list_id)?.filters.push({
      id: row.id,
      content: row.content,
      description: row.description,
      actions: row.actions,
    });
  }

  return grouped;
}

export async function findFilterLists(db: Database): Promise<StoredFilterList[]> {
  const listRows = await db.select().from(filterLists).orderBy(asc(filterLists.id));
  const filterRows = await db.select().from(filters).orderBy(asc(filters.id));
  return groupFilterLists(listRows, filterRows);
}
