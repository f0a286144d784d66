/**
 * UTC ↔ local calendar conversion.
 *
 * Notes carry UTC timestamps, but journal pages are per *local* day: a note
 * written at 23:30 in UTC-5 is already 04:30 the next day in UTC and must still
 * land on the local date. All conversions go through Intl so a configured IANA
 * zone and the process zone behave identically.
 */

export interface LocalDateTime {
  year: number;
  month: number;   // 1-12
  day: number;     // 1-31
  hour: number;
  minute: number;
  second: number;
  weekday: number; // 0 = Sunday
  offsetMinutes: number; // local - UTC
}

export const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;
export const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/** The zone the process runs in (honours TZ). */
export function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** Throws a RangeError for zones ICU does not know. */
export function assertTimeZone(timeZone: string): void {
  formatterFor(timeZone);
}

function pad(n: number, width = 2): string {
  return String(Math.abs(n)).padStart(width, '0');
}

/**
 * Convert a UTC instant to local calendar fields.
 * `timeZone` defaults to the process zone.
 */
export function toLocal(utc: Date, timeZone: string = localTimeZone()): LocalDateTime {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(utc)) {
    if (part.type !== 'literal') fields[part.type] = Number(part.value);
  }
  const year = fields.year ?? 0;
  const month = fields.month ?? 1;
  const day = fields.day ?? 1;
  const hour = fields.hour ?? 0;
  const minute = fields.minute ?? 0;
  const second = fields.second ?? 0;

  const wallClock = Date.UTC(year, month - 1, day, hour, minute, second);
  const instant = Math.floor(utc.getTime() / 1000) * 1000;

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    weekday: new Date(Date.UTC(year, month - 1, day)).getUTCDay(),
    offsetMinutes: Math.round((wallClock - instant) / 60000),
  };
}

/** `2025-01-01T18:30:00-05:00`, the form Zim writes in Creation-Date. */
export function formatLocalIso(local: LocalDateTime): string {
  const sign = local.offsetMinutes < 0 ? '-' : '+';
  const offset = `${sign}${pad(Math.trunc(local.offsetMinutes / 60))}:${pad(local.offsetMinutes % 60)}`;
  return (
    `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)}` +
    `T${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}${offset}`
  );
}

/** `2025-01-01 18:30:00`, for log lines. */
export function formatLocalDisplay(local: LocalDateTime): string {
  return `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)} ${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}`;
}

/** Journal page title, e.g. `Wednesday 01 Jan 2025`. */
export function formatJournalTitle(local: LocalDateTime): string {
  return `${WEEKDAYS[local.weekday]} ${pad(local.day)} ${MONTHS[local.month - 1].slice(0, 3)} ${local.year}`;
}

/** `Wednesday 01 January 2025`, the line under a journal page title. */
export function formatFullDate(local: LocalDateTime): string {
  return `${WEEKDAYS[local.weekday]} ${pad(local.day)} ${MONTHS[local.month - 1]} ${local.year}`;
}

/** `January 01 2025`, used in link labels. */
export function formatLongDate(local: LocalDateTime): string {
  return `${MONTHS[local.month - 1]} ${pad(local.day)} ${local.year}`;
}

/** `2025-01-01`, the calendar bucket of a local timestamp. */
export function localDateKey(local: LocalDateTime): string {
  return `${pad(local.year, 4)}-${pad(local.month)}-${pad(local.day)}`;
}

export function sameLocalDay(a: LocalDateTime, b: LocalDateTime): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

const ZONED_RE = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;
const NAIVE_DATETIME_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse a stored timestamp as UTC. Strings without an offset are taken to be
 * UTC (not local), matching how the notes app writes them.
 * Returns undefined for anything unparsable.
 */
export function parseUtcTimestamp(value: unknown): Date | undefined {
  let date: Date | undefined;
  if (value instanceof Date) {
    date = new Date(value.getTime());
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    date = new Date(value);
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return undefined;
    if (DATE_ONLY_RE.test(trimmed)) {
      date = new Date(`${trimmed}T00:00:00Z`);
    } else if (NAIVE_DATETIME_RE.test(trimmed) && !ZONED_RE.test(trimmed)) {
      date = new Date(`${trimmed.replace(' ', 'T')}Z`);
    } else {
      date = new Date(trimmed);
    }
  }
  if (!date || Number.isNaN(date.getTime())) return undefined;
  return date;
}
