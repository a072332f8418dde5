import { vi } from 'vitest';
import type {
  ActionEnvironment,
  FilterContextInput,
  PlatformActions,
} from '../src/domain/index.js';

/** Fixed "now" for deterministic expiry timestamps. */
export const FIXED_NOW = new Date('2026-03-01T12:00:00Z').getTime();

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Platform double recording every request; DMs are delivered by default. */
export function fakePlatform() {
  return {
    mention: vi.fn<PlatformActions['mention']>((actor) => `<@${actor.id}>`),
    sendDirectMessage: vi.fn<PlatformActions['sendDirectMessage']>().mockResolvedValue('sent'),
    sendToChannel: vi.fn<PlatformActions['sendToChannel']>().mockResolvedValue(undefined),
    issueInfraction: vi.fn<PlatformActions['issueInfraction']>().mockResolvedValue(undefined),
    forceRename: vi.fn<PlatformActions['forceRename']>().mockResolvedValue(undefined),
    sendAlert: vi.fn<PlatformActions['sendAlert']>().mockResolvedValue(undefined),
  } satisfies PlatformActions;
}

export const MODERATION_CHANNEL = { id: '9009', name: 'mod-alerts', guildId: 'guild-1' };

export const DM_COLOUR = 0x7289da;

export function makeEnv(
  platform: PlatformActions,
  log: import('pino').Logger = fakeLogger(),
): ActionEnvironment {
  return {
    platform,
    moderationChannel: MODERATION_CHANNEL,
    dmColour: DM_COLOUR,
    log,
    now: () => FIXED_NOW,
  };
}

/**
 * Factory for filtering inputs with sensible defaults: a message in a
 * guild text channel written by a regular user.
 */
export function makeInput(overrides: Partial<FilterContextInput> = {}): FilterContextInput {
  return {
    event: overrides.event ?? 'message',
    author: overrides.author ?? {
      id: '1001',
      username: 'tester',
      avatarUrl: 'https://cdn.example/avatar.png',
      bot: false,
    },
    channel: overrides.channel ?? { id: '2002', name: 'general', guildId: 'guild-1' },
    content: overrides.content ?? 'hello there',
    message: overrides.message === undefined
      ? { id: '3003', jumpUrl: 'https://discord.com/channels/guild-1/2002/3003' }
      : overrides.message,
    embeds: overrides.embeds ?? [],
  };
}
