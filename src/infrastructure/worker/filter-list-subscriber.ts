import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Database } from '../db/index.js';
import { findFilterLists } from '../db/index.js';
import { buildFilterListRegistry } from '../../application/filter-list-registry.js';
import type { FilterListStore } from '../../application/filter-list-store.js';
import { FILTER_LISTS_CHANNEL } from '../redis/index.js';

/**
 * Subscribes to the "filter_lists_changed" Pub/Sub channel and rebuilds
 * the filter list registry from Postgres whenever a notification arrives.
 *
 * ioredis requires a dedicated connection for subscriptions: once a client
 * enters subscriber mode it cannot issue regular commands.
 *
 * Dispatches keep using the last snapshot while a reload is in progress;
 * the new registry is swapped in atomically via `store.set()`.
 *
 * Returns a cleanup function that unsubscribes and disconnects the subscriber client.
 */
export async function startFilterListSubscriber(
  redisUrl: string,
  db: Database,
  log: Logger,
  store: FilterListStore,
  signal: AbortSignal,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Filter list subscriber Redis connection established');

  // Guard against concurrent reloads (e.g. bursts of edits)
  let reloading = false;

  sub.on('message', (channel: string, message: string) => {
    if (channel !== FILTER_LISTS_CHANNEL) return;
    if (signal.aborted) return;

    void reloadFilterLists(db, log, store, message, () => reloading, (v) => { reloading = v; });
  });

  await sub.subscribe(FILTER_LISTS_CHANNEL);
  log.info({ channel: FILTER_LISTS_CHANNEL }, 'Subscribed to filter list change notifications');

  return async () => {
    try {
      await sub.unsubscribe(FILTER_LISTS_CHANNEL);
      await sub.quit();
      log.info('Filter list subscriber disconnected');
    } catch (err: unknown) {
      log.warn({ err }, 'Filter list subscriber did not disconnect cleanly');
    }
  };
}

function parseReason(rawMessage: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(rawMessage);
    if (typeof parsed === 'object' && parsed !== null && 'reason' in parsed && typeof parsed.reason === 'string') {
      return parsed.reason;
    }
    return undefined;
  } catch {
    // Non-JSON message, reload without a reason
    return undefined;
  }
}

/**
 * Rebuilds the registry from Postgres and swaps the store snapshot.
 *
 * Exported for unit testing; callers outside this module should use
 * `startFilterListSubscriber()` instead.
 */
export async function reloadFilterLists(
  db: Database,
  log: Logger,
  store: FilterListStore,
  rawMessage: string,
  getReloading: () => boolean,
  setReloading: (v: boolean) => void,
): Promise<void> {
  if (getReloading()) {
    log.debug('Reload already in progress, skipping');
    return;
  }

  setReloading(true);
  try {
    log.info({ reason: parseReason(rawMessage) }, 'Filter list change detected, reloading from database…');

    const rawLists = await findFilterLists(db);
    const registry = buildFilterListRegistry(rawLists, log);
    store.set(registry);

    log.info(
      { listCount: registry.size, lists: registry.all().map((l) => l.name) },
      'Filter lists reloaded successfully',
    );
  } catch (err: unknown) {
    log.error({ err }, 'Failed to reload filter lists from database');
  } finally {
    setReloading(false);
  }
}
