import { DEFAULT_TIMEZONE } from "@/types";

/** Wall-clock reading in some zone; month 1-12. */
export interface ZonedDateTimeParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hour12: false,
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/** The wall clock read as if it were UTC; differences give zone offsets. */
function wallClockMillis(parts: ZonedDateTimeParts): number {
  return Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour ?? 0, parts.minute ?? 0, parts.second ?? 0);
}

/** Wall-clock parts of an instant as seen in the given zone. */
export function partsInTimeZone(date: Date, timeZone = DEFAULT_TIMEZONE): Required<ZonedDateTimeParts> {
  const values = new Map<string, number>();
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== "literal") values.set(part.type, Number.parseInt(part.value, 10));
  }
  const get = (type: Intl.DateTimeFormatPartTypes) => values.get(type) ?? 0;
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    // Some ICU builds print midnight as "24" under hour12: false.
    hour: get("hour") % 24,
    minute: get("minute"),
    second: get("second"),
  };
}

/**
 * Instant at which the zone's clock shows `parts`. Starts from the wall
 * clock taken as UTC and corrects by the observed offset; a few rounds
 * settle across DST changes. Host-zone `Date` constructors are not used.
 */
export function dateFromZonedParts(parts: ZonedDateTimeParts, timeZone = DEFAULT_TIMEZONE): Date {
  const target = wallClockMillis(parts);
  let utc = target;
  for (let round = 0; round < 3; round++) {
    const diff = target - wallClockMillis(partsInTimeZone(new Date(utc), timeZone));
    if (diff === 0) break;
    utc += diff;
  }
  return new Date(utc);
}

/** Midnight of the instant's calendar day in the zone. */
export function startOfDayInTimeZone(date: Date, timeZone = DEFAULT_TIMEZONE): Date {
  const { year, month, day } = partsInTimeZone(date, timeZone);
  return dateFromZonedParts({ year, month, day }, timeZone);
}

/** `YYYY-MM-DD` of the instant in the zone. */
export function dateKeyInTimeZone(date: Date, timeZone = DEFAULT_TIMEZONE): string {
  const { year, month, day } = partsInTimeZone(date, timeZone);
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}
