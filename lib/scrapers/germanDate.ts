import { DEFAULT_TIMEZONE, YEAR_ROLLOVER_PAST_DAYS } from "@/types";
import { dateFromZonedParts, partsInTimeZone } from "./timezone";

/** Wall-clock date and time of an event, month 1-12. */
export interface EventDateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

/**
 * German month names, abbreviations and the spellings seen on local sites
 * (umlaut-less, Austrian, English-looking abbreviations).
 */
const GERMAN_MONTHS: Readonly<Record<string, number>> = Object.freeze({
  januar: 1, jan: 1, jänner: 1, jaenner: 1,
  februar: 2, feb: 2, feber: 2,
  märz: 3, maerz: 3, marz: 3, mär: 3, mar: 3, mrz: 3,
  april: 4, apr: 4,
  mai: 5,
  juni: 6, jun: 6,
  juli: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  oktober: 10, okt: 10, oct: 10,
  november: 11, nov: 11,
  dezember: 12, dez: 12, dec: 12,
});

/** Date, optional time and an optional `Z` / `±HH:MM` offset. */
const RE_ISO =
  /(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?/gi;
const RE_NUMERIC = /(\d{1,2})\.(\d{1,2})\.(\d{4})/g;
const RE_MONTH_NAME = /(\d{1,2})\.\s*([A-Za-zÄÖÜäöüß]+)\.?\s+(\d{4})/g;

/** "19:30", "19.30 Uhr", "um 20 Uhr", ", 21 Uhr" directly after a date. */
const RE_TRAILING_TIME = /^[,\s]*(?:[-–|]\s*)?(?:um\s+|ab\s+|Beginn:?\s+)?(\d{1,2})(?:[:.](\d{2})(?![.\d]))?\s*(Uhr)?/i;

export function lookupGermanMonth(name: string): number | null {
  const key = name.trim().toLowerCase().replace(/\.$/, "");
  return GERMAN_MONTHS[key] ?? null;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidDateParts(parts: EventDateParts): boolean {
  const { year, month, day, hour, minute } = parts;
  if (![year, month, day, hour, minute].every(Number.isInteger)) return false;
  if (year < 1 || month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}

function toParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0
): EventDateParts | null {
  const parts = { year, month, day, hour, minute };
  return isValidDateParts(parts) ? parts : null;
}

function int(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number.parseInt(value, 10);
}

function trailingTime(rest: string): { hour: number; minute: number } | null {
  const m = rest.match(RE_TRAILING_TIME);
  if (!m) return null;
  // A bare number without minutes or "Uhr" is not a time ("7. März 2026 2 Tickets").
  if (m[2] === undefined && m[3] === undefined) return null;
  return { hour: int(m[1]) ?? 0, minute: int(m[2]) ?? 0 };
}

/** Offset in minutes east of UTC: "Z" → 0, "-05:00" → -300. */
function offsetMinutes(offset: string): number {
  if (offset.toUpperCase() === "Z") return 0;
  const sign = offset.startsWith("-") ? -1 : 1;
  const digits = offset.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * A timestamp with an offset names an instant; it is read back as the
 * wall clock in `timeZone`. Without an offset the wall clock is taken as is.
 */
function parseIso(text: string, timeZone: string): EventDateParts | null {
  for (const m of text.matchAll(RE_ISO)) {
    const parts = toParts(Number(m[1]), Number(m[2]), Number(m[3]), int(m[4]), int(m[5]));
    if (!parts) continue;
    // "19:30-22:00" is a range; a numeric offset needs seconds before it.
    const offset = m[7];
    if (offset === undefined || (m[6] === undefined && offset.toUpperCase() !== "Z")) return parts;
    const instant =
      Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, int(m[6]) ?? 0) -
      offsetMinutes(offset) * 60_000;
    const local = partsInTimeZone(new Date(instant), timeZone);
    return { year: local.year, month: local.month, day: local.day, hour: local.hour, minute: local.minute };
  }
  return null;
}

function parseNumeric(text: string): EventDateParts | null {
  for (const m of text.matchAll(RE_NUMERIC)) {
    const rest = text.slice((m.index ?? 0) + m[0].length);
    const time = trailingTime(rest);
    const parts = toParts(Number(m[3]), Number(m[2]), Number(m[1]), time?.hour, time?.minute);
    if (parts) return parts;
  }
  return null;
}

function parseMonthName(text: string): EventDateParts | null {
  for (const m of text.matchAll(RE_MONTH_NAME)) {
    const month = lookupGermanMonth(m[2] ?? "");
    if (month === null) continue;
    const rest = text.slice((m.index ?? 0) + m[0].length);
    const time = trailingTime(rest);
    const parts = toParts(Number(m[3]), month, Number(m[1]), time?.hour, time?.minute);
    if (parts) return parts;
  }
  return null;
}

const STRATEGIES: ReadonlyArray<(text: string, timeZone: string) => EventDateParts | null> = [
  parseIso,
  parseNumeric,
  parseMonthName,
];

/**
 * Parse free-form date text (ISO, `DD.MM.YYYY`, `D. Monatsname YYYY`).
 * Returns null when no strategy yields a valid calendar date.
 */
export function parseEventDate(
  text: string | null | undefined,
  timeZone = DEFAULT_TIMEZONE
): EventDateParts | null {
  if (!text) return null;
  const s = text.replace(/\u00a0/g, " ");
  for (const strategy of STRATEGIES) {
    const parts = strategy(s, timeZone);
    if (parts) return parts;
  }
  return null;
}

export interface DayMonth {
  day: number;
  month: number;
  hour?: number;
  minute?: number;
}

/**
 * Complete a date that has no year: the reference's year, or the next one
 * when that date lies more than `pastThresholdDays` before the reference.
 */
export function inferYear(
  dayMonth: DayMonth,
  reference: Date,
  pastThresholdDays = YEAR_ROLLOVER_PAST_DAYS,
  timeZone = DEFAULT_TIMEZONE
): EventDateParts | null {
  const ref = partsInTimeZone(reference, timeZone);
  const candidate = toParts(
    ref.year,
    dayMonth.month,
    dayMonth.day,
    dayMonth.hour,
    dayMonth.minute
  );
  if (!candidate) return null;

  const refMillis = Date.UTC(ref.year, ref.month - 1, ref.day, ref.hour, ref.minute);
  const candidateMillis = Date.UTC(
    candidate.year,
    candidate.month - 1,
    candidate.day,
    candidate.hour,
    candidate.minute
  );
  if (candidateMillis < refMillis - pastThresholdDays * 86_400_000) {
    return toParts(
      candidate.year + 1,
      candidate.month,
      candidate.day,
      candidate.hour,
      candidate.minute
    );
  }
  return candidate;
}

export function toEventDate(parts: EventDateParts, timeZone = DEFAULT_TIMEZONE): Date {
  return dateFromZonedParts(parts, timeZone);
}

/** Parse text straight to an instant in the given zone. */
export function parseEventDateInZone(
  text: string | null | undefined,
  timeZone = DEFAULT_TIMEZONE
): Date | null {
  const parts = parseEventDate(text, timeZone);
  return parts ? toEventDate(parts, timeZone) : null;
}

export function formatDateParts(parts: EventDateParts): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${parts.year}-${pad(parts.month)}-${pad(parts.day)}T${pad(parts.hour)}:${pad(parts.minute)}`;
}
