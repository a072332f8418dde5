import { describe, it, expect } from 'vitest';
import {
  MAX_ALERT_LENGTH,
  TRUNCATION_MARKER,
  composeAlert,
  composeAlertBody,
  listTitle,
  truncateAlertBody,
} from '../../src/application/index.js';
import type { TriggeredList } from '../../src/application/index.js';
import { EMPTY_ACTION_SET, createFilterContext } from '../../src/domain/index.js';
import type { TriggeredFilter } from '../../src/domain/index.js';
import { makeInput } from '../helpers.js';

function triggeredFilter(id: number, content: string, description: string | null = null): TriggeredFilter {
  return { id, content, description, actions: EMPTY_ACTION_SET, matches: [content] };
}

describe('listTitle', () => {
  it('title-cases list names', () => {
    expect(listTitle('token')).toBe('Token');
    expect(listTitle('domain_name')).toBe('Domain Name');
    expect(listTitle('EXTENSION list')).toBe('Extension List');
  });
});

describe('truncateAlertBody', () => {
  it('leaves bodies up to the limit untouched', () => {
    const body = 'a'.repeat(MAX_ALERT_LENGTH);
    expect(truncateAlertBody(body)).toBe(body);
  });

  it('cuts longer bodies and marks the cut', () => {
    expect(truncateAlertBody('a'.repeat(MAX_ALERT_LENGTH + 1))).toBe('a'.repeat(MAX_ALERT_LENGTH) + TRUNCATION_MARKER);
  });

  it('does not split an emoji straddling the limit', () => {
    const body = 'a'.repeat(MAX_ALERT_LENGTH - 1) + '\u{1F600}' + 'b';

    expect(truncateAlertBody(body)).toBe('a'.repeat(MAX_ALERT_LENGTH - 1) + TRUNCATION_MARKER);
  });

  it('keeps an emoji that ends exactly at the limit', () => {
    const body = 'a'.repeat(MAX_ALERT_LENGTH - 2) + '\u{1F600}' + 'b';

    expect(truncateAlertBody(body)).toBe('a'.repeat(MAX_ALERT_LENGTH - 2) + '\u{1F600}' + TRUNCATION_MARKER);
  });
});

describe('composeAlertBody', () => {
  it('describes a single triggered filter with its description', () => {
    const ctx = createFilterContext(makeInput({ content: 'this is bad content' }));
    ctx.matches.push('bad');
    ctx.actionDescriptions.push('notified', 'mute');
    const triggered: TriggeredList[] = [{ name: 'token', filters: [triggeredFilter(1, 'bad', 'Rude word')] }];

    expect(composeAlertBody(ctx, triggered).split('\n')).toEqual([
      '**Triggered by:** <@1001> (`1001`)',
      '**Triggered in:** <#2002> (`2002`)',
      '**Token Filters:** #1 (`bad`) - Rude word',
      "**Matches:** 'bad'",
      '**Actions Taken:** notified, mute',
      '**[Original Content](https://discord.com/channels/guild-1/2002/3003)**: this is bad content',
    ]);
  });

  it('gives every triggered list its own line', () => {
    const ctx = createFilterContext(makeInput());
    const triggered: TriggeredList[] = [
      { name: 'token', filters: [triggeredFilter(1, 'bad', 'Rude word'), triggeredFilter(2, 'worse')] },
      { name: 'domain', filters: [triggeredFilter(5, 'example.com')] },
    ];

    const lines = composeAlertBody(ctx, triggered).split('\n');

    expect(lines[2]).toBe('**Token Filters:** #1 (`bad`), #2 (`worse`)');
    expect(lines[3]).toBe('**Domain Filters:** #5 (`example.com`)');
  });

  it('marks DMs, missing actions and missing message links', () => {
    const ctx = createFilterContext(makeInput({
      channel: { id: '4004', name: 'DM', guildId: null },
      content: 'hello',
      message: null,
    }));
    const triggered: TriggeredList[] = [{ name: 'token', filters: [triggeredFilter(3, 'hello')] }];

    const lines = composeAlertBody(ctx, triggered).split('\n');

    expect(lines[1]).toBe('**DM**');
    expect(lines[4]).toBe('**Actions Taken:** -');
    expect(lines[5]).toBe('**Original Content**: hello');
  });

  it('truncates very long content', () => {
    const ctx = createFilterContext(makeInput({ content: 'x'.repeat(5000) }));
    const body = composeAlertBody(ctx, [{ name: 'token', filters: [triggeredFilter(1, 'x')] }]);

    expect(body).toHaveLength(MAX_ALERT_LENGTH + TRUNCATION_MARKER.length);
    expect(body.endsWith(`x${TRUNCATION_MARKER}`)).toBe(true);
  });
});

describe('composeAlert', () => {
  it('names the event and appends extra alert embeds', () => {
    const ctx = createFilterContext(makeInput({ event: 'message_edit' }));
    ctx.alertContent = '@here';
    ctx.alertEmbeds.push({ description: 'extra', colour: null });

    const alert = composeAlert(ctx, [{ name: 'token', filters: [triggeredFilter(1, 'hello')] }]);

    expect(alert.username).toBe('Message Edit Filter');
    expect(alert.content).toBe('@here');
    expect(alert.embeds).toHaveLength(2);
    expect(alert.embeds[0]).toEqual({
      description: composeAlertBody(ctx, [{ name: 'token', filters: [triggeredFilter(1, 'hello')] }]),
      colour: 0xf9cb54,
      thumbnailUrl: 'https://cdn.example/avatar.png',
    });
    expect(alert.embeds[1]).toEqual({ description: 'extra', colour: null });
  });
});
