import type { Logger } from 'pino';
import {
  EMPTY_ACTION_SET,
  applyActionSet,
  createFilterContext,
  isEmptyActionSet,
  reduceActionSets,
} from '../domain/index.js';
import type {
  ActionEnvironment,
  ActionSet,
  AlertChannel,
  ChannelRef,
  FilterContext,
  FilterContextInput,
  PlatformActions,
} from '../domain/index.js';
import { composeAlert } from './alert.js';
import type { TriggeredList } from './alert.js';
import type { FilterListStore } from './filter-list-store.js';

export interface DispatcherOptions {
  readonly store: FilterListStore;
  readonly platform: PlatformActions;
  /** null when no alert channel is configured or it could not be resolved. */
  readonly alertChannel: AlertChannel | null;
  readonly moderationChannel: ChannelRef;
  readonly dmColour: number;
  readonly log: Logger;
  /** Defaults to Date.now. */
  readonly now?: () => number;
}

/** What one event produced, before any action is applied. */
export interface Evaluation {
  readonly ctx: FilterContext;
  readonly triggered: TriggeredList[];
  readonly actions: ActionSet;
}

export interface DispatchOutcome extends Evaluation {
  readonly alerted: boolean;
}

/**
 * Filtering dispatcher.
 *
 * For every qualifying event:
 * 1. Builds a FilterContext.
 * 2. Fans it out to every filter list subscribed to the event kind.
 * 3. Reduces the actions of all triggered filters into one ActionSet.
 * 4. Applies it, then alerts the moderators unless an action opted out.
 *
 * One list failing to evaluate, one action failing to apply, or the alert
 * failing to send never stops the remaining steps. Side effects already
 * requested are not undone.
 */
export class FilteringDispatcher {
  private readonly store: FilterListStore;
  private readonly platform: PlatformActions;
  private readonly alertChannel: AlertChannel | null;
  private readonly log: Logger;
  private readonly env: ActionEnvironment;

  constructor(options: DispatcherOptions) {
    this.store = options.store;
    this.platform = options.platform;
    this.alertChannel = options.alertChannel;
    this.log = options.log;
    this.env = {
      platform: options.platform,
      moderationChannel: options.moderationChannel,
      dmColour: options.dmColour,
      log: options.log,
      now: options.now ?? Date.now,
    };
  }

  /** Entry point for platform events. Events authored by bots are ignored. */
  async onMessage(input: FilterContextInput): Promise<DispatchOutcome | null> {
    if (input.author.bot) return null;
    return this.dispatch(input);
  }

  async dispatch(input: FilterContextInput): Promise<DispatchOutcome> {
    const evaluation = await this.evaluate(input);
    const { ctx, triggered, actions } = evaluation;
    if (triggered.length === 0) {
      return { ...evaluation, alerted: false };
    }

    if (!isEmptyActionSet(actions)) {
      await applyActionSet(actions, ctx, this.env);
    }

    const alerted = ctx.sendAlert ? await this.sendAlert(ctx, triggered) : false;

    this.log.info(
      {
        event: ctx.event,
        author: ctx.author.id,
        channel: ctx.channel.id,
        lists: triggered.map((t) => t.name),
        filterIds: triggered.flatMap((t) => t.filters.map((f) => f.id)),
        actions: ctx.actionDescriptions,
        alerted,
      },
      'Filters triggered',
    );

    return { ...evaluation, alerted };
  }

  /**
   * Fan out and reduce without applying anything.
   *
   * Matches are recorded on the returned context.
   */
  async evaluate(input: FilterContextInput): Promise<Evaluation> {
    const ctx = createFilterContext(input);
    const triggered = await this.fanOut(ctx);
    if (triggered.length === 0) {
      return { ctx, triggered, actions: EMPTY_ACTION_SET };
    }

    for (const { filters } of triggered) {
      for (const filter of filters) {
        ctx.matches.push(...filter.matches);
      }
    }

    const actions = reduceActionSets(
      triggered.flatMap(({ filters }) => filters.map((filter) => filter.actions)),
    );
    return { ctx, triggered, actions };
  }

  private async fanOut(ctx: FilterContext): Promise<TriggeredList[]> {
    // One snapshot for the whole dispatch, even if a reload swaps the store meanwhile.
    const lists = this.store.get().subscribers(ctx.event);

    const results = await Promise.all(lists.map(async (list): Promise<TriggeredList> => {
      try {
        return { name: list.name, filters: await list.triggersFor(ctx) };
      } catch (err: unknown) {
        this.log.error({ err, list: list.name, event: ctx.event }, 'Filter list failed to evaluate');
        return { name: list.name, filters: [] };
      }
    }));

    return results.filter((result) => result.filters.length > 0);
  }

  private async sendAlert(ctx: FilterContext, triggered: readonly TriggeredList[]): Promise<boolean> {
    if (this.alertChannel === null) {
      this.log.warn({ event: ctx.event, author: ctx.author.id }, 'No alert channel available, skipping alert');
      return false;
    }

    try {
      await this.platform.sendAlert(this.alertChannel, composeAlert(ctx, triggered));
      return true;
    } catch (err: unknown) {
      this.log.error({ err, alertChannel: this.alertChannel.id }, 'Failed to send filter alert');
      return false;
    }
  }
}
