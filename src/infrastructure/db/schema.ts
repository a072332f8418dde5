import { pgTable, serial, integer, varchar, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `filter_lists` table.
 *
 * Several rows may share a name: each is added to the same in-memory
 * filter list. `defaults` holds the actions applied by every filter of
 * the row unless the filter overrides them.
 */
export const filterLists = pgTable('filter_lists', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 64 }).notNull(),
  defaults: jsonb('defaults').notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_filter_lists_name').on(table.name),
]);

/**
 * Drizzle schema for the `filters` table.
 *
 * `actions` is null when the filter uses its list's defaults only.
 */
export const filters = pgTable('filters', {
  id: serial('id').primaryKey(),
  filter_list_id: integer('filter_list_id')
    .notNull()
    .references(() => filterLists.id, { onDelete: 'cascade' }),
  content: varchar('content', { length: 1024 }).notNull(),
  description: varchar('description', { length: 1024 }),
  actions: jsonb('actions'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_filters_filter_list_id').on(table.filter_list_id),
]);
