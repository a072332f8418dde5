import type { Logger } from 'pino';
import type { FilterEvent, FilterList, FilterListFactory } from '../domain/index.js';
import { FILTER_LIST_TYPES } from '../domain/index.js';
import { rawFilterListSchema, toFilterListData } from './filter-list-schema.js';

/**
 * Filter lists by name, plus the subscription table mapping each event
 * kind to the lists that want to receive it (in subscription order).
 */
export class FilterListRegistry {
  private readonly lists: Map<string, FilterList> = new Map();
  private readonly subscriptions: Map<FilterEvent, FilterList[]> = new Map();

  register(list: FilterList): void {
    this.lists.set(list.name, list);
  }

  /**
   * Subscribe a list to events. Subscribing twice to the same event is a no-op.
   *
   * Lists declare the events they expect, but nothing stops a caller from
   * subscribing a list to other events as long as it builds the context properly.
   */
  subscribe(list: FilterList, ...events: FilterEvent[]): void {
    for (const event of events) {
      const subscribers = this.subscriptions.get(event) ?? [];
      if (!subscribers.includes(list)) {
        subscribers.push(list);
      }
      this.subscriptions.set(event, subscribers);
    }
  }

  subscribers(event: FilterEvent): readonly FilterList[] {
    return this.subscriptions.get(event) ?? [];
  }

  get(name: string): FilterList | undefined {
    return this.lists.get(name);
  }

  all(): FilterList[] {
    return [...this.lists.values()];
  }

  get size(): number {
    return this.lists.size;
  }
}

/**
 * Build a registry from raw filter-list data.
 *
 * Raw lists without a matching implementation are skipped with one
 * warning per name; invalid raw lists are skipped with a warning each.
 * Raw lists sharing a name are added to the same list instance.
 */
export function buildFilterListRegistry(
  rawLists: readonly unknown[],
  log: Logger,
  types: ReadonlyMap<string, FilterListFactory> = FILTER_LIST_TYPES,
): FilterListRegistry {
  const registry = new FilterListRegistry();
  const alreadyWarned = new Set<string>();

  for (const raw of rawLists) {
    const parsed = rawFilterListSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues }, 'Skipping invalid filter list data');
      continue;
    }

    const name = parsed.data.name;
    let list = registry.get(name);
    if (list === undefined) {
      const factory = types.get(name);
      if (factory === undefined) {
        if (!alreadyWarned.has(name)) {
          log.warn({ list: name }, 'Filter list loaded from the database has no matching implementation');
          alreadyWarned.add(name);
        }
        continue;
      }
      list = factory();
      registry.register(list);
      registry.subscribe(list, ...list.events);
    }

    list.addList(toFilterListData(parsed.data));
  }

  return registry;
}
