const BULLET = '•';

/**
 * Combine two messages into bullet points of a single message.
 *
 * Identical messages collapse into one. Empty strings are ignored.
 */
export function mergeMessages(first: string, second: string): string {
  if (!first && !second) return '';
  if (!first || first === second) return second;
  if (!second) return first;

  const a = first.startsWith(BULLET) ? first : `${BULLET} ${first}`;
  const b = second.startsWith(BULLET) ? second : `${BULLET} ${second}`;
  return `${a}\n\n${b}`;
}

/**
 * The larger of two durations in seconds.
 * `null` is permanent and wins over any finite duration.
 */
export function mergeDurations(first: number | null, second: number | null): number | null {
  if (first === null || second === null) return null;
  return Math.max(first, second);
}
