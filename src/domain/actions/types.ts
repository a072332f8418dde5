import type { Logger } from 'pino';
import type { ChannelRef, FilterContext } from '../filter-context.js';
import type { PlatformActions } from '../platform.js';

/** What an action may use while applying itself to a context. */
export interface ActionEnvironment {
  readonly platform: PlatformActions;
  /** Receives infraction confirmations that must not appear in public. */
  readonly moderationChannel: ChannelRef;
  readonly dmColour: number;
  readonly log: Logger;
  readonly now: () => number;
}

/**
 * Behaviour shared by every action kind.
 *
 * `combine` must be associative and total over entries of its own kind;
 * applying the result has the effect of applying both operands.
 */
export interface ActionHandler<E> {
  combine(a: E, b: E): E;
  apply(entry: E, ctx: FilterContext, env: ActionEnvironment): Promise<void>;
}
