const formatters = new Map<string, Intl.DateTimeFormat>();

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export type LocalDate = {
  year: number;
  month: number;
  day: number;
};

export type LocalDateTimeParts = LocalDate & {
  hour: number;
  minute: number;
};

export type WallClockTime = {
  hour: number;
  minute: number;
};

function formatterFor(timezone: string) {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23"
    });
    formatters.set(timezone, formatter);
  }

  return formatter;
}

export function getLocalDateTimeParts(date: Date, timezone: string): LocalDateTimeParts {
  const parts = formatterFor(timezone).formatToParts(date);

  const readPart = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((part) => part.type === type)?.value ?? "0");

  return {
    year: readPart("year"),
    month: readPart("month"),
    day: readPart("day"),
    hour: readPart("hour"),
    minute: readPart("minute")
  };
}

function pad2(value: number) {
  return String(value).padStart(2, "0");
}

/** Operator-local calendar date as `YYYY-MM-DD`. */
export function toLocalDateKey(epochMs: number, timezone: string) {
  const parts = getLocalDateTimeParts(new Date(epochMs), timezone);
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function formatLocalTime(epochMs: number, timezone: string) {
  const parts = getLocalDateTimeParts(new Date(epochMs), timezone);
  return `${pad2(parts.hour)}:${pad2(parts.minute)}`;
}

export function isSameLocalDate(epochMs: number, reference: Date, timezone: string) {
  return toLocalDateKey(epochMs, timezone) === toLocalDateKey(reference.getTime(), timezone);
}

export function formatElapsed(fromMs: number, toMs: number) {
  const totalMinutes = Math.max(0, Math.floor((toMs - fromMs) / 60_000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

export function parseWallClockTime(value: string): WallClockTime | null {
  const match = value.match(/^(\d{2}):(\d{2})$/);
  if (!match) {
    return null;
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }

  return { hour, minute };
}

function hasWallClock(epochMs: number, expected: LocalDateTimeParts, timezone: string) {
  const actual = getLocalDateTimeParts(new Date(epochMs), timezone);
  return (
    actual.year === expected.year &&
    actual.month === expected.month &&
    actual.day === expected.day &&
    actual.hour === expected.hour &&
    actual.minute === expected.minute
  );
}

// Minutes the zone is ahead of UTC at the given instant.
function offsetMinutesAt(epochMs: number, timezone: string) {
  const wholeMinuteMs = Math.floor(epochMs / MINUTE_MS) * MINUTE_MS;
  const local = getLocalDateTimeParts(new Date(wholeMinuteMs), timezone);
  return (Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute) - wholeMinuteMs) / MINUTE_MS;
}

export function addDaysToLocalDate(localDate: LocalDate, days: number): LocalDate {
  const shifted = new Date(Date.UTC(localDate.year, localDate.month - 1, localDate.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  };
}

/**
 * Resolves a local wall-clock time to its UTC instant. An ambiguous time (DST
 * fall-back) resolves to the earlier instant; a time skipped by a DST jump
 * resolves to null.
 */
export function resolveLocalDateTimeToUtc(localDateTime: LocalDateTimeParts, timezone: string): Date | null {
  const wallClockMs = Date.UTC(
    localDateTime.year,
    localDateTime.month - 1,
    localDateTime.day,
    localDateTime.hour,
    localDateTime.minute
  );

  // the offsets a day either side bracket any single transition on that date
  let earliest: number | null = null;
  for (const offsetMinutes of [offsetMinutesAt(wallClockMs - DAY_MS, timezone), offsetMinutesAt(wallClockMs + DAY_MS, timezone)]) {
    const candidate = wallClockMs - offsetMinutes * MINUTE_MS;
    if (hasWallClock(candidate, localDateTime, timezone) && (earliest === null || candidate < earliest)) {
      earliest = candidate;
    }
  }

  return earliest === null ? null : new Date(earliest);
}

/** Start of the operator-local day containing `reference`, as epoch ms. */
export function startOfLocalDay(reference: Date, timezone: string) {
  const local = getLocalDateTimeParts(reference, timezone);
  const midnight = resolveLocalDateTimeToUtc({ year: local.year, month: local.month, day: local.day, hour: 0, minute: 0 }, timezone);
  if (midnight) {
    return midnight.getTime();
  }

  // midnight skipped by a DST jump: the day starts at the first local hour that exists
  for (let hour = 1; hour < 24; hour += 1) {
    const candidate = resolveLocalDateTimeToUtc({ year: local.year, month: local.month, day: local.day, hour, minute: 0 }, timezone);
    if (candidate) {
      return candidate.getTime();
    }
  }

  return reference.getTime();
}
