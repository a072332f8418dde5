import type { ActionSet } from '../actions/index.js';
import type { FilterContext, FilterEvent } from '../filter-context.js';

/**
 * A single rule: something to look for and what to do when it is found.
 *
 * `actions` already has the list defaults folded in.
 */
export interface Filter {
  readonly id: number;
  readonly content: string;
  readonly description: string | null;
  readonly actions: ActionSet;
}

/** A filter that matched, with the opaque match records it found. */
export interface TriggeredFilter extends Filter {
  readonly matches: readonly unknown[];
}

/** One validated batch of filters belonging to a named list. */
export interface FilterListData {
  readonly name: string;
  readonly filters: readonly Filter[];
}

/**
 * A named collection of filters evaluated against the same kinds of events.
 *
 * `triggersFor` must not write to the context: matches are returned and
 * recorded by the dispatcher.
 */
export interface FilterList {
  readonly name: string;
  /** Events the list subscribes to when registered. */
  readonly events: readonly FilterEvent[];
  readonly filters: readonly Filter[];
  addList(data: FilterListData): void;
  triggersFor(ctx: Readonly<FilterContext>): Promise<TriggeredFilter[]>;
}

export type FilterListFactory = () => FilterList;
