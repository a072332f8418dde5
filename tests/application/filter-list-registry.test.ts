import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FilterListRegistry, FilterListStore, buildFilterListRegistry } from '../../src/application/index.js';
import { createDomainFilterList, createTokenFilterList } from '../../src/domain/index.js';
import type { FilterList } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

describe('FilterListRegistry', () => {
  it('keeps subscribers in subscription order without duplicates', () => {
    const registry = new FilterListRegistry();
    const token = createTokenFilterList();
    const domain = createDomainFilterList();

    registry.subscribe(token, 'message');
    registry.subscribe(domain, 'message', 'message_edit');
    registry.subscribe(token, 'message', 'message_edit');

    expect(registry.subscribers('message')).toEqual([token, domain]);
    expect(registry.subscribers('message_edit')).toEqual([domain, token]);
  });

  it('has no subscribers for an event nobody subscribed to', () => {
    expect(new FilterListRegistry().subscribers('message')).toEqual([]);
  });
});

describe('buildFilterListRegistry', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    vi.clearAllMocks();
    log = fakeLogger();
  });

  it('registers and subscribes one list per known name', () => {
    const registry = buildFilterListRegistry([
      { name: 'token', filters: [{ id: 1, content: 'badword' }] },
      { name: 'token', filters: [{ id: 2, content: 'other' }] },
      { name: 'domain', filters: [{ id: 3, content: 'example.com' }] },
    ], log);

    expect(registry.size).toBe(2);
    expect(registry.get('token')?.filters.map((f) => f.id)).toEqual([1, 2]);
    expect(registry.subscribers('message').map((l) => l.name)).toEqual(['token', 'domain']);
    expect(registry.subscribers('message_edit').map((l) => l.name)).toEqual(['token', 'domain']);
  });

  it('warns once per list name without an implementation', () => {
    const registry = buildFilterListRegistry([{ name: 'unknown' }, { name: 'unknown' }], log);

    expect(registry.size).toBe(0);
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      { list: 'unknown' },
      'Filter list loaded from the database has no matching implementation',
    );
  });

  it('skips invalid list data', () => {
    const registry = buildFilterListRegistry([{ name: '' }, 'garbage', { name: 'token' }], log);

    expect(registry.size).toBe(1);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ issues: expect.any(Array) }), 'Skipping invalid filter list data');
  });

  it('uses the given implementations', () => {
    const custom: FilterList = {
      name: 'custom',
      events: ['message_edit'],
      filters: [],
      addList: vi.fn(),
      triggersFor: vi.fn().mockResolvedValue([]),
    };

    const registry = buildFilterListRegistry([{ name: 'custom' }], log, new Map([['custom', () => custom]]));

    expect(registry.get('custom')).toBe(custom);
    expect(registry.subscribers('message')).toEqual([]);
    expect(registry.subscribers('message_edit')).toEqual([custom]);
    expect(custom.addList).toHaveBeenCalledWith({ name: 'custom', filters: [] });
  });
});

describe('FilterListStore', () => {
  it('starts empty and swaps snapshots', () => {
    const store = new FilterListStore();
    const first = store.get();
    expect(first.size).toBe(0);

    const next = new FilterListRegistry();
    store.set(next);

    expect(store.get()).toBe(next);
    expect(store.get()).not.toBe(first);
  });
});
