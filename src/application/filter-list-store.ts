import { FilterListRegistry } from './filter-list-registry.js';

/**
 * Atomic-swap holder for the registry snapshot used by the dispatcher.
 *
 * The dispatcher calls `get()` once at the start of every dispatch.
 * The reload subscriber calls `set()` with a freshly built registry.
 *
 * `get()` and `set()` are synchronous, so a dispatch always sees one
 * complete registry, either the old one or the new one, never a mix.
 */
export class FilterListStore {
  private registry: FilterListRegistry;

  constructor(initial: FilterListRegistry = new FilterListRegistry()) {
    this.registry = initial;
  }

  get(): FilterListRegistry {
    return this.registry;
  }

  set(next: FilterListRegistry): void {
    this.registry = next;
  }
}
