import type { Actor, ChannelRef, RichContent } from './filter-context.js';
import type { Infraction } from './infraction.js';

/** `forbidden` means the recipient does not accept private messages. */
export type DeliveryResult = 'sent' | 'forbidden';

export interface InfractionRequest {
  readonly actor: Actor;
  readonly infraction: Exclude<Infraction, 'NONE'>;
  /** null = permanent */
  readonly expiresAt: Date | null;
  readonly reason: string;
  /** Where confirmation of the infraction is posted. */
  readonly replyChannel: ChannelRef;
}

export interface RenameRequest {
  readonly actor: Actor;
  readonly expiresAt: Date | null;
  readonly reason: string;
  readonly channel: ChannelRef;
}

/** Structured alert for the moderators' channel. */
export interface Alert {
  readonly username: string;
  readonly content: string;
  readonly embeds: readonly RichContent[];
}

/** Opaque handle of the channel alerts are delivered to. */
export interface AlertChannel {
  readonly id: string;
}

/**
 * Everything the filtering core asks of the chat platform.
 *
 * The core decides what to request and in which order; how a request
 * is delivered is up to the implementation.
 */
export interface PlatformActions {
  /** How the platform addresses a user inside message text. */
  mention(actor: Actor): string;
  sendDirectMessage(actor: Actor, content: string, embed: RichContent | null): Promise<DeliveryResult>;
  sendToChannel(channel: ChannelRef, content: string, embed: RichContent | null): Promise<void>;
  issueInfraction(request: InfractionRequest): Promise<void>;
  forceRename(request: RenameRequest): Promise<void>;
  sendAlert(channel: AlertChannel, alert: Alert): Promise<void>;
}
