import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

export const FILTER_LISTS_CHANNEL = 'filter_lists_changed';

export type FilterListChangeReason = 'manual' | 'create' | 'update' | 'delete';

export interface FilterListChangePayload {
  ts: string;
  reason: FilterListChangeReason;
}

/**
 * Publishes a lightweight notification to the "filter_lists_changed" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated to the caller.
 */
export async function publishFilterListChange(
  redis: Redis,
  log: Logger,
  reason: FilterListChangeReason,
): Promise<void> {
  try {
    const payload: FilterListChangePayload = {
      ts: new Date().toISOString(),
      reason,
    };
    await redis.publish(FILTER_LISTS_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: FILTER_LISTS_CHANNEL, reason }, 'Published filter list change notification');
  } catch (err: unknown) {
    log.error({ err, reason }, 'Failed to publish filter list change notification');
  }
}
