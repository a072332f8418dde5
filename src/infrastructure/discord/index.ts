export { DiscordPlatform, toEmbed, MAX_TIMEOUT_MS } from './platform.js';
export { toFilterContextInput, attachFilteringListeners } from './inbound.js';
