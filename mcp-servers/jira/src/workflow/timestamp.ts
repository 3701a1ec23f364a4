/**
 * Timestamp normalization
 * Jira writes offsets as +0000; ISO-8601 wants +00:00. Both, and a trailing Z, parse to the same Instant.
 */

import { MalformedTimestampError } from '@review-tracker/shared';
import type { Instant } from '../types/index.js';
import { roundHalfEven } from '../utils/rounding.js';

const MICROS_PER_MILLI = 1_000;
const MICROS_PER_MINUTE = 60_000_000;
const MICROS_PER_HOUR = 3_600_000_000;

const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?([+-])(\d{2}):(\d{2})$/;

/**
 * Rewrite a trailing Z and a separator-less four-digit offset into the ±HH:MM form
 */
export function normalizeTimestamp(value: string): string {
  let normalized = value.trim();
  if (normalized.endsWith('Z') || normalized.endsWith('z')) {
    normalized = `${normalized.slice(0, -1)}+00:00`;
  }
  if (/[+-]\d{4}$/.test(normalized)) {
    normalized = `${normalized.slice(0, -2)}:${normalized.slice(-2)}`;
  }
  return normalized;
}

// setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
function daysInMonth(year: number, month: number): number {
  const lastDay = new Date(0);
  lastDay.setUTCFullYear(year, month, 0);
  return lastDay.getUTCDate();
}

/**
 * Parse a textual timestamp into an Instant
 *
 * @throws MalformedTimestampError when no calendar date, time of day and offset can be read
 */
export function parseTimestamp(value: string): Instant {
  const match = ISO_TIMESTAMP.exec(normalizeTimestamp(value));
  if (!match) {
    throw new MalformedTimestampError(value);
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, sign, offsetHourText, offsetMinuteText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = secondText ? Number(secondText) : 0;
  const offsetHours = Number(offsetHourText);
  const offsetMins = Number(offsetMinuteText);

  if (
    year < 1 ||
    month < 1 || month > 12 ||
    day < 1 || day > daysInMonth(year, month) ||
    hour > 23 || minute > 59 || second > 59 ||
    offsetHours > 23 || offsetMins > 59
  ) {
    throw new MalformedTimestampError(value);
  }

  // Fraction kept to microseconds
  const micros = fractionText ? Number(fractionText.slice(0, 6).padEnd(6, '0')) : 0;
  const offsetMinutes = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetMins);

  const wallClock = new Date(0);
  wallClock.setUTCFullYear(year, month - 1, day);
  wallClock.setUTCHours(hour, minute, second, 0);

  return {
    epochMicros: wallClock.getTime() * MICROS_PER_MILLI + micros - offsetMinutes * MICROS_PER_MINUTE,
    offsetMinutes,
  };
}

/**
 * The current instant, in UTC
 */
export function nowInstant(): Instant {
  return { epochMicros: Date.now() * MICROS_PER_MILLI, offsetMinutes: 0 };
}

/**
 * Negative when a is earlier than b, zero when equal, positive when later
 */
export function compareInstants(a: Instant, b: Instant): number {
  return a.epochMicros - b.epochMicros;
}

export function isBefore(a: Instant, b: Instant): boolean {
  return a.epochMicros < b.epochMicros;
}

/**
 * Elapsed hours from `start` to `end`, rounded to two decimals with ties to even
 */
export function hoursBetween(start: Instant, end: Instant): number {
  const hours = (end.epochMicros - start.epochMicros) / MICROS_PER_HOUR;
  return roundHalfEven(hours);
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Second-precision rendering for reports, in the instant's own offset: 2024-01-15 10:30:00
 */
export function formatDisplayTime(instant: Instant): string {
  const localMillis = Math.floor((instant.epochMicros + instant.offsetMinutes * MICROS_PER_MINUTE) / MICROS_PER_MILLI);
  const date = new Date(localMillis);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}
