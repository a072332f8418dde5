import { describe, it, expect } from 'vitest';
import { INFRACTIONS, infractionRank, mostSevere, parseInfraction } from '../../src/domain/index.js';

describe('infraction hierarchy', () => {
  it('ranks infractions from most to least severe', () => {
    expect(INFRACTIONS.map(infractionRank)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(INFRACTIONS[0]).toBe('BAN');
    expect(INFRACTIONS[INFRACTIONS.length - 1]).toBe('NONE');
  });

  it('picks the more severe infraction', () => {
    expect(mostSevere('BAN', 'KICK')).toBe('BAN');
    expect(mostSevere('NOTE', 'SUPERSTAR')).toBe('SUPERSTAR');
    expect(mostSevere('NONE', 'WATCH')).toBe('WATCH');
    expect(mostSevere('MUTE', 'MUTE')).toBe('MUTE');
  });
});

describe('parseInfraction', () => {
  it('normalizes case and spaces', () => {
    expect(parseInfraction('voice ban')).toBe('VOICE_BAN');
    expect(parseInfraction(' Mute ')).toBe('MUTE');
    expect(parseInfraction('superstar')).toBe('SUPERSTAR');
  });

  it('maps null and blank values to NONE', () => {
    expect(parseInfraction(null)).toBe('NONE');
    expect(parseInfraction(undefined)).toBe('NONE');
    expect(parseInfraction('  ')).toBe('NONE');
  });

  it('rejects unknown names', () => {
    expect(() => parseInfraction('yeet')).toThrow('Unknown infraction type "yeet"');
  });
});
