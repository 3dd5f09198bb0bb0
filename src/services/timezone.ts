import { formatInTimeZone, toZonedTime, fromZonedTime } from 'date-fns-tz';
import { parseISO, addDays, addHours, addMinutes, setHours, setMinutes, setSeconds, setMilliseconds } from 'date-fns';

export function formatInTimezone(date: Date, timezone: string, format: string = 'yyyy-MM-dd HH:mm zzz'): string {
  return formatInTimeZone(date, timezone, format);
}

function atTime(zoned: Date, hours: number, minutes: number): Date {
  return setMilliseconds(setSeconds(setMinutes(setHours(zoned, hours), minutes), 0), 0);
}

/** Null when the clock time does not exist, e.g. "13pm" or "9:75". */
function to24h(hours: number, minutes: number, meridiem: string | undefined): number | null {
  if (minutes > 59) return null;
  if (!meridiem) return hours > 23 ? null : hours;
  if (hours < 1 || hours > 12) return null;
  if (meridiem === 'pm' && hours < 12) return hours + 12;
  if (meridiem === 'am' && hours === 12) return 0;
  return hours;
}

/**
 * Parses "in 30 minutes", "tomorrow at 9am", "at 5:30pm", or an ISO timestamp.
 * Wall-clock forms are read in `timezone`; ISO strings without an offset are too.
 */
export function parseRelativeTime(input: string, timezone: string, now: Date = new Date()): Date | null {
  const nowInTz = toZonedTime(now, timezone);
  const lower = input.toLowerCase().trim();

  // Handle "tomorrow at Xpm/am"
  const tomorrowMatch = lower.match(/^tomorrow\s+(?:at\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)?$/);
  if (tomorrowMatch) {
    const minutes = tomorrowMatch[2] ? parseInt(tomorrowMatch[2], 10) : 0;
    const hours = to24h(parseInt(tomorrowMatch[1] ?? '0', 10), minutes, tomorrowMatch[3]);
    if (hours === null) return null;
    return fromZonedTime(atTime(addDays(nowInTz, 1), hours, minutes), timezone);
  }

  // Handle "today at Xpm/am", "at Xpm/am", or bare "Xpm/am"
  const timeMatch = lower.match(/^(?:today\s+)?(?:at\s+)?(\d{1,2})(?::(\d{2}))?\s*(am|pm)$/);
  if (timeMatch) {
    const minutes = timeMatch[2] ? parseInt(timeMatch[2], 10) : 0;
    const hours = to24h(parseInt(timeMatch[1] ?? '0', 10), minutes, timeMatch[3]);
    if (hours === null) return null;
    const today = fromZonedTime(atTime(nowInTz, hours, minutes), timezone);

    // Already passed today in the user's timezone: next day
    if (today <= now) {
      return fromZonedTime(atTime(addDays(nowInTz, 1), hours, minutes), timezone);
    }
    return today;
  }

  // Handle "in X minutes/hours"
  const inMatch = lower.match(/^in\s+(\d+)\s+(minute|minutes|min|mins|hour|hours|hr|hrs)$/);
  if (inMatch) {
    const amount = parseInt(inMatch[1] ?? '0', 10);
    const unit = inMatch[2] ?? '';
    return unit.startsWith('min') ? addMinutes(now, amount) : addHours(now, amount);
  }

  // Handle ISO date string
  const parsed = parseISO(input.trim());
  if (!isNaN(parsed.getTime())) {
    // No Z or offset: a wall-clock time in the user's timezone
    if (!/(?:z|[+-]\d{2}:?\d{2})$/i.test(input.trim())) {
      return fromZonedTime(input.trim(), timezone);
    }
    return parsed;
  }

  return null;
}

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}
