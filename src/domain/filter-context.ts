/**
 * Core domain types for a single filtering pass.
 *
 * A FilterContext is created once per inbound event and handed by
 * reference through fan-out, action application and alerting.
 * It carries no platform dependencies: adapters translate their
 * own message objects into a FilterContextInput.
 *
 * Field ownership:
 * - input fields are set by `createFilterContext()` and never written again;
 * - `matches` is written by the dispatcher after fan-out (filter lists
 *   report matches, they never write to the context themselves);
 * - every other output field is written during action application.
 */

/** Kinds of events a filter list can subscribe to. */
export const FILTER_EVENTS = ['message', 'message_edit'] as const;

export type FilterEvent = (typeof FILTER_EVENTS)[number];

/** The user that triggered the event. */
export interface Actor {
  readonly id: string;
  readonly username: string;
  readonly avatarUrl: string | null;
  readonly bot: boolean;
}

/** `guildId === null` means a private (DM) channel. */
export interface ChannelRef {
  readonly id: string;
  readonly name: string;
  readonly guildId: string | null;
}

export interface MessageRef {
  readonly id: string;
  readonly jumpUrl: string;
}

/** Embed or attachment descriptor attached to the original message. */
export interface EmbedDescriptor {
  readonly url?: string;
  readonly title?: string;
  readonly description?: string;
}

/** Rich-content block sent alongside a DM or an alert. */
export interface RichContent {
  description: string;
  colour: number | null;
  thumbnailUrl?: string | null;
}

export interface FilterContextInput {
  readonly event: FilterEvent;
  readonly author: Actor;
  readonly channel: ChannelRef;
  readonly content: string;
  readonly message: MessageRef | null;
  readonly embeds?: readonly EmbedDescriptor[];
}

export interface FilterContext {
  // Input
  readonly event: FilterEvent;
  readonly author: Actor;
  readonly channel: ChannelRef;
  readonly content: string;
  readonly message: MessageRef | null;
  readonly embeds: readonly EmbedDescriptor[];
  // Output
  dmContent: string;
  dmEmbed: RichContent;
  sendAlert: boolean;
  alertContent: string;
  alertEmbeds: RichContent[];
  actionDescriptions: string[];
  matches: unknown[];
}

export function emptyRichContent(): RichContent {
  return { description: '', colour: null };
}

export function createFilterContext(input: FilterContextInput): FilterContext {
  return {
    event: input.event,
    author: input.author,
    channel: input.channel,
    content: input.content,
    message: input.message,
    embeds: input.embeds ?? [],
    dmContent: '',
    dmEmbed: emptyRichContent(),
    sendAlert: true,
    alertContent: '',
    alertEmbeds: [],
    actionDescriptions: [],
    matches: [],
  };
}

/**
 * Return a new context with the given fields replaced.
 *
 * Mutable outputs are copied, so writes through the returned context
 * never reach the original.
 */
export function replaceContext(
  ctx: FilterContext,
  overrides: Partial<FilterContext> = {},
): FilterContext {
  return {
    ...ctx,
    dmEmbed: { ...ctx.dmEmbed },
    alertEmbeds: [...ctx.alertEmbeds],
    actionDescriptions: [...ctx.actionDescriptions],
    matches: [...ctx.matches],
    ...overrides,
  };
}

/** `message_edit` → `Message Edit` */
export function eventTitle(event: FilterEvent): string {
  return event
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
