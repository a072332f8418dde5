/**
 * Infraction types, most severe first.
 *
 * `NONE` is the absence of an infraction and the identity element
 * when merging actions.
 */
export const INFRACTIONS = [
  'BAN',
  'KICK',
  'MUTE',
  'VOICE_BAN',
  'WARNING',
  'WATCH',
  'SUPERSTAR',
  'NOTE',
  'NONE',
] as const;

export type Infraction = (typeof INFRACTIONS)[number];

/** Position in the hierarchy. Lower is more severe. */
export function infractionRank(infraction: Infraction): number {
  return INFRACTIONS.indexOf(infraction);
}

export function isInfraction(value: string): value is Infraction {
  return (INFRACTIONS as readonly string[]).includes(value);
}

/** The more severe of the two. */
export function mostSevere(a: Infraction, b: Infraction): Infraction {
  return infractionRank(a) <= infractionRank(b) ? a : b;
}

/**
 * Parse an infraction name as stored in filter configuration.
 *
 * Case-insensitive, spaces map to underscores (`"voice ban"` → `VOICE_BAN`).
 * Null or blank means `NONE`.
 */
export function parseInfraction(raw: string | null | undefined): Infraction {
  if (raw === null || raw === undefined || raw.trim() === '') return 'NONE';

  const normalized = raw.trim().replace(/ /g, '_').toUpperCase();
  if (!isInfraction(normalized)) {
    throw new Error(`Unknown infraction type "${raw}"`);
  }
  return normalized;
}
