// ============================================================================
// TIME UTILITIES
// ============================================================================
// Calendar dates and clock times as seen in a user's IANA timezone.

function parts(date: Date, timeZone: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  });
  const result: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    result[part.type] = part.value;
  }
  return result;
}

/**
 * YYYY-MM-DD in the given timezone
 */
export function localDate(date: Date, timeZone: string): string {
  const p = parts(date, timeZone);
  return `${p.year}-${p.month}-${p.day}`;
}

/**
 * HH:MM (24-hour) in the given timezone
 */
export function localTime(date: Date, timeZone: string): string {
  const p = parts(date, timeZone);
  return `${p.hour}:${p.minute}`;
}

/**
 * YYYY-MM-DD HH:MM in the given timezone
 */
export function formatLocal(date: Date, timeZone: string): string {
  return `${localDate(date, timeZone)} ${localTime(date, timeZone)}`;
}

export function isValidTimezone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether the clock time `now` (HH:MM) has reached `target` (HH:MM)
 */
export function hasReachedTime(now: string, target: string): boolean {
  return now >= target;
}
