export type {
  FilterEvent,
  FilterContext,
  FilterContextInput,
  Actor,
  ChannelRef,
  MessageRef,
  EmbedDescriptor,
  RichContent,
} from './filter-context.js';
export {
  FILTER_EVENTS,
  createFilterContext,
  replaceContext,
  emptyRichContent,
  eventTitle,
} from './filter-context.js';
export type { Infraction } from './infraction.js';
export { INFRACTIONS, infractionRank, isInfraction, mostSevere, parseInfraction } from './infraction.js';
export type {
  PlatformActions,
  DeliveryResult,
  InfractionRequest,
  RenameRequest,
  Alert,
  AlertChannel,
} from './platform.js';
export * from './actions/index.js';
export * from './filter-lists/index.js';
