/** Source of the current time for anything that stamps a status. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Fixed clock, for tests and replays. */
export function fixedClock(at: Date | string): Clock {
  const instant = new Date(at);
  return () => new Date(instant.getTime());
}

/** UTC ISO-8601 at second precision, e.g. `2025-01-15T10:30:00Z`. */
export function isoTimestamp(clock: Clock): string {
  return clock().toISOString().replace(/\.\d{3}Z$/, 'Z');
}
