/**
 * UTC date/time handling for the reporting window
 */

const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})Z?$/;

/**
 * Parse "YYYY-MM-DD HH:MM:SS" as a UTC instant. Returns null for anything
 * else, including impossible dates such as 2024-02-30.
 */
export function parseUtcDateTime(value: string): Date | null {
  const match = DATE_TIME.exec(value.trim());
  if (!match) {
    return null;
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  return roundTrips ? date : null;
}

export function formatUtcDateTime(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}
