// Timestamp helpers - parsing and formatting of entry times

import { TlError } from "./errors.ts";

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?)?(Z|[+-]\d{2}:\d{2})?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${
    pad(date.getDate())
  }`;
}

function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${
    pad(date.getSeconds())
  }`;
}

/**
 * Parse an ISO 8601 timestamp.
 *
 * Accepted forms:
 * - `YYYY-MM-DD` (midnight)
 * - `YYYY-MM-DDTHH[:mm[:SS[.fff]]]`, with `T` or a space as separator
 * - either of the above followed by `Z` or `+HH:MM` / `-HH:MM`
 * - `THH[:mm[:SS]]`, meaning that time on the day of `now`
 *
 * Values without a UTC offset are read as local time.
 */
export function parseTimestamp(input: string, now: Date = new Date()): Date {
  const value = input.trim();
  const expanded = value.startsWith("T") ? formatDate(now) + value : value;
  const date = toDate(expanded);
  if (date === null) {
    throw invalid(input);
  }
  return date;
}

/**
 * Whether `value` is a complete timestamp (a date, optionally with time
 * and offset). The short `THH:mm` form does not count.
 */
export function isTimestamp(value: string): boolean {
  return toDate(value.trim()) !== null;
}

function toDate(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, y, mo, d, h = "0", mi = "0", s = "0", frac, tz] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = frac ? Number(frac.padEnd(3, "0").slice(0, 3)) : 0;

  // Date.UTC rolls invalid days over into the next month
  const calendar = new Date(Date.UTC(year, month - 1, day));
  if (
    calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== day ||
    hour > 23 || minute > 59 || second > 59
  ) {
    return null;
  }

  if (tz === undefined) {
    return new Date(year, month - 1, day, hour, minute, second, millis);
  }

  let offsetMinutes = 0;
  if (tz !== "Z") {
    const sign = tz.startsWith("-") ? -1 : 1;
    const [oh, om] = tz.slice(1).split(":").map(Number);
    if (oh > 23 || om > 59) {
      return null;
    }
    offsetMinutes = sign * (oh * 60 + om);
  }
  return new Date(
    Date.UTC(year, month - 1, day, hour, minute, second, millis) -
      offsetMinutes * 60_000,
  );
}

function invalid(input: string): TlError {
  return new TlError(
    "parse_error",
    `Invalid timestamp: '${input}'. Use ISO 8601 (YYYY-MM-DD[THH:mm[:SS]][<tz>])`,
  );
}

/**
 * "YYYY-MM-DD HH:mm:SS" in local time.
 */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${formatTime(date)}`;
}

/**
 * ISO 8601 in local time with its UTC offset,
 * e.g. "2025-01-16T09:15:00+01:00".
 */
export function toLocalISOString(date: Date): string {
  const tzOffset = -date.getTimezoneOffset();
  const sign = tzOffset >= 0 ? "+" : "-";
  const hours = pad(Math.floor(Math.abs(tzOffset) / 60));
  const minutes = pad(Math.abs(tzOffset) % 60);
  return `${formatDate(date)}T${formatTime(date)}${sign}${hours}:${minutes}`;
}
