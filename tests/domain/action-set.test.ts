import { describe, it, expect } from 'vitest';
import {
  EMPTY_ACTION_SET,
  INFRACTION_AND_NOTIFICATION,
  actionSetFromEntries,
  applyActionSet,
  createFilterContext,
  createInfractionAndNotification,
  isEmptyActionSet,
  mergeActionSets,
  reduceActionSets,
} from '../../src/domain/index.js';
import type { ActionSet } from '../../src/domain/index.js';
import { fakeLogger, fakePlatform, makeEnv, makeInput } from '../helpers.js';

function muteFor(seconds: number): ActionSet {
  return {
    [INFRACTION_AND_NOTIFICATION]: createInfractionAndNotification({
      infractionType: 'MUTE',
      infractionDuration: seconds,
    }),
  };
}

describe('mergeActionSets', () => {
  it('merges two empty sets into an empty set', () => {
    const merged = mergeActionSets(EMPTY_ACTION_SET, EMPTY_ACTION_SET);
    expect(merged).toEqual({});
    expect(isEmptyActionSet(merged)).toBe(true);
  });

  it('keeps an entry present on one side only', () => {
    const set = muteFor(60);
    expect(mergeActionSets(set, {})[INFRACTION_AND_NOTIFICATION]).toBe(set[INFRACTION_AND_NOTIFICATION]);
    expect(mergeActionSets({}, set)[INFRACTION_AND_NOTIFICATION]).toBe(set[INFRACTION_AND_NOTIFICATION]);
  });

  it('combines entries of the same kind', () => {
    const merged = mergeActionSets(muteFor(60), muteFor(120));
    expect(merged[INFRACTION_AND_NOTIFICATION]?.infractionDuration).toBe(120);
    expect(isEmptyActionSet(merged)).toBe(false);
  });
});

describe('reduceActionSets', () => {
  it('reduces nothing to the empty set', () => {
    expect(reduceActionSets([])).toEqual({});
  });

  it('reduces several sets into one entry per kind', () => {
    const reduced = reduceActionSets([muteFor(60), {}, muteFor(600), muteFor(300)]);
    expect(reduced[INFRACTION_AND_NOTIFICATION]?.infractionDuration).toBe(600);
  });
});

describe('reduction order', () => {
  /** Bullet points of a merged message, order ignored. */
  function bullets(text: string): string[] {
    return text.split('\n\n').map((line) => line.replace(/^• /, '')).sort();
  }

  function entry(init: Parameters<typeof createInfractionAndNotification>[0]): ActionSet {
    return { [INFRACTION_AND_NOTIFICATION]: createInfractionAndNotification(init) };
  }

  it('sends every DM of filters without an infraction whatever the order', () => {
    const first = entry({ dmContent: 'x' });
    const second = entry({ dmContent: 'y' });

    const forward = reduceActionSets([first, second])[INFRACTION_AND_NOTIFICATION];
    const backward = reduceActionSets([second, first])[INFRACTION_AND_NOTIFICATION];

    expect(bullets(forward?.dmContent ?? '')).toEqual(['x', 'y']);
    expect(bullets(backward?.dmContent ?? '')).toEqual(['x', 'y']);
  });

  it('reduces the same sets in any order to the same actions', () => {
    const sets = [
      entry({ infractionType: 'WARNING', infractionDuration: 60, infractionReason: 'w', dmContent: 'x' }),
      entry({ infractionType: 'BAN', infractionReason: 'b', dmContent: 'y' }),
      entry({ dmContent: 'z', superstar: { reason: 's', duration: 30 } }),
    ];

    const forward = reduceActionSets(sets)[INFRACTION_AND_NOTIFICATION];
    const backward = reduceActionSets([...sets].reverse())[INFRACTION_AND_NOTIFICATION];

    for (const reduced of [forward, backward]) {
      expect(reduced?.infractionType).toBe('BAN');
      expect(reduced?.infractionDuration).toBeNull();
      expect(bullets(reduced?.infractionReason ?? '')).toEqual(['b', 'w']);
      expect(bullets(reduced?.dmContent ?? '')).toEqual(['x', 'y', 'z']);
      expect(reduced?.superstar).toEqual({ reason: 's', duration: 30 });
    }
  });
});

describe('actionSetFromEntries', () => {
  it('combines entries of the same kind while building', () => {
    const set = actionSetFromEntries([
      createInfractionAndNotification({ infractionType: 'WARNING', dmContent: 'a' }),
      createInfractionAndNotification({ infractionType: 'KICK', dmContent: 'b' }),
    ]);

    expect(set[INFRACTION_AND_NOTIFICATION]?.infractionType).toBe('KICK');
    expect(set[INFRACTION_AND_NOTIFICATION]?.dmContent).toBe('• a\n\n• b');
  });
});

describe('applyActionSet', () => {
  it('applies each present entry', async () => {
    const platform = fakePlatform();
    const ctx = createFilterContext(makeInput());

    await applyActionSet(muteFor(60), ctx, makeEnv(platform, fakeLogger()));

    expect(platform.issueInfraction).toHaveBeenCalledTimes(1);
    expect(ctx.actionDescriptions).toEqual(['mute']);
  });

  it('does nothing for the empty set', async () => {
    const platform = fakePlatform();
    const ctx = createFilterContext(makeInput());

    await applyActionSet(EMPTY_ACTION_SET, ctx, makeEnv(platform, fakeLogger()));

    expect(platform.sendDirectMessage).not.toHaveBeenCalled();
    expect(platform.issueInfraction).not.toHaveBeenCalled();
    expect(ctx.actionDescriptions).toEqual([]);
  });
});
