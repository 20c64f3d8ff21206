/**
 * CDA TS (timestamp) to FHIR date / dateTime
 *
 * Input:  YYYY[MM[DD[HH[MM[SS[.S+]]]]]][+/-ZZZZ]
 * Output: YYYY | YYYY-MM | YYYY-MM-DD | YYYY-MM-DDThh:mm:ss[.S+]+zz:zz
 *
 * FHIR requires a timezone on any dateTime carrying a time. When the source
 * has a time of day but no offset, or an offset outside -14:00..+14:00 /
 * minutes 0..59, the value is truncated to the date. Fractional seconds are
 * copied verbatim whenever the time survives.
 */

import type { DecisionLog } from "../decision-log";
import type { AbsentValue, InstantValue, IntervalValue, PeriodicIntervalValue } from "./values";

export interface ParsedTimestamp {
  year: string;
  month?: string;
  day?: string;
  hour?: string;
  minute?: string;
  second?: string;
  /** Including the leading dot, e.g. ".251" */
  fraction?: string;
  /** Raw offset text, e.g. "-0500"; validity checked separately */
  offset?: string;
}

export interface TimeContext {
  log: DecisionLog;
  path?: string;
}

const TIMESTAMP_PATTERN =
  /^(\d{4})(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\.\d+)?(Z|[+-]\d{1,2}:?\d{2})?$/;

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;

// ============================================================================
// Parsing
// ============================================================================

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Split a CDA timestamp into components.
 * Returns undefined for text that is not a timestamp or names an impossible
 * calendar date or time.
 */
export function parseTimestamp(raw: string | undefined): ParsedTimestamp | undefined {
  if (!raw) return undefined;

  const match = TIMESTAMP_PATTERN.exec(raw.trim());
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  if (year === undefined) return undefined;

  // Fractional seconds only make sense after seconds
  if (fraction !== undefined && second === undefined) return undefined;

  const y = Number(year);
  if (month !== undefined) {
    const m = Number(month);
    if (m < 1 || m > 12) return undefined;
    if (day !== undefined) {
      const d = Number(day);
      if (d < 1 || d > daysInMonth(y, m)) return undefined;
    }
  }
  if (hour !== undefined && Number(hour) > 23) return undefined;
  if (minute !== undefined && Number(minute) > 59) return undefined;
  if (second !== undefined && Number(second) > 59) return undefined;

  return {
    year,
    ...(month !== undefined && { month }),
    ...(day !== undefined && { day }),
    ...(hour !== undefined && { hour }),
    ...(minute !== undefined && { minute }),
    ...(second !== undefined && { second }),
    ...(fraction !== undefined && { fraction }),
    ...(offset !== undefined && { offset }),
  };
}

/**
 * Normalize an offset to "+hh:mm" ("Z" stays "Z"). Undefined when absent or out of range
 * (hours 0-14, minutes 0-59).
 */
export function normalizeOffset(offset: string | undefined): string | undefined {
  if (!offset) return undefined;
  if (offset === "Z") return "Z";
  const match = OFFSET_PATTERN.exec(offset);
  if (!match) return undefined;

  const [, sign, hours, minutes] = match;
  if (sign === undefined || hours === undefined || minutes === undefined) return undefined;
  if (Number(hours) > 14 || Number(minutes) > 59) return undefined;

  return `${sign}${hours}:${minutes}`;
}

function formatDate(ts: ParsedTimestamp): string {
  if (!ts.month) return ts.year;
  if (!ts.day) return `${ts.year}-${ts.month}`;
  return `${ts.year}-${ts.month}-${ts.day}`;
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert a CDA timestamp to a FHIR dateTime.
 * Truncation to date-only is recorded as a downgrade when a context is given.
 */
export function convertTSToDateTime(
  raw: string | undefined,
  ctx?: TimeContext,
): string | undefined {
  if (!raw) return undefined;

  const ts = parseTimestamp(raw);
  if (!ts) {
    ctx?.log.unknownConstruct("invalid-timestamp", `"${raw}" is not a valid timestamp`, ctx.path);
    return undefined;
  }

  const date = formatDate(ts);
  if (ts.hour === undefined || ts.day === undefined) return date;

  const offset = normalizeOffset(ts.offset);
  if (!offset) {
    ctx?.log.downgrade(
      "timestamp-truncated",
      ts.offset
        ? `Timestamp "${raw}" has invalid offset "${ts.offset}"; kept date only`
        : `Timestamp "${raw}" has a time but no offset; kept date only`,
      ctx.path,
    );
    return date;
  }

  const minute = ts.minute ?? "00";
  const second = ts.second ?? "00";
  return `${date}T${ts.hour}:${minute}:${second}${ts.fraction ?? ""}${offset}`;
}

/** Convert a CDA timestamp to a FHIR date (time and offset dropped) */
export function convertTSToDate(raw: string | undefined, ctx?: TimeContext): string | undefined {
  if (!raw) return undefined;
  const ts = parseTimestamp(raw);
  if (!ts) {
    ctx?.log.unknownConstruct("invalid-timestamp", `"${raw}" is not a valid timestamp`, ctx.path);
    return undefined;
  }
  return formatDate(ts);
}

/**
 * Convert to a FHIR instant (full precision with offset), as needed by
 * Provenance.recorded and Bundle.timestamp. Returns undefined when the
 * timestamp is not that precise.
 */
export function convertTSToInstant(raw: string | undefined): string | undefined {
  const dateTime = convertTSToDateTime(raw);
  return dateTime !== undefined && dateTime.includes("T") ? dateTime : undefined;
}

// ============================================================================
// Effective Times
// ============================================================================

export type EffectiveTime = InstantValue | IntervalValue | PeriodicIntervalValue | AbsentValue;

/**
 * Convert an interval to a FHIR Period. A bound that cannot be converted is
 * left out; an interval with neither bound yields undefined.
 */
export function convertIntervalToPeriod(
  interval: IntervalValue,
  ctx?: TimeContext,
): fhir4.Period | undefined {
  const start = interval.low?.kind === "instant" ? convertTSToDateTime(interval.low.raw, ctx) : undefined;
  const end = interval.high?.kind === "instant" ? convertTSToDateTime(interval.high.raw, ctx) : undefined;

  if (start === undefined && end === undefined) {
    const center = interval.center ? convertTSToDateTime(interval.center.raw, ctx) : undefined;
    return center === undefined ? undefined : { start: center, end: center };
  }

  return {
    ...(start !== undefined && { start }),
    ...(end !== undefined && { end }),
  };
}

/** Point in time for an effectiveTime: the value, else low, else center */
export function effectiveStart(time: EffectiveTime | undefined): string | undefined {
  if (!time) return undefined;
  switch (time.kind) {
    case "instant":
      return time.raw;
    case "interval":
      if (time.low?.kind === "instant") return time.low.raw;
      return time.center?.raw;
    default:
      return undefined;
  }
}

export function effectiveEnd(time: EffectiveTime | undefined): string | undefined {
  if (time?.kind !== "interval") return undefined;
  return time.high?.kind === "instant" ? time.high.raw : undefined;
}

/**
 * dateTime-or-Period choice used by onset, performed and effective fields:
 * a point becomes dateTime, an interval with bounds becomes Period.
 */
export function convertEffectiveTime(
  time: EffectiveTime | undefined,
  ctx?: TimeContext,
): { dateTime?: string; period?: fhir4.Period } {
  if (!time) return {};

  if (time.kind === "instant") {
    const dateTime = convertTSToDateTime(time.raw, ctx);
    return dateTime === undefined ? {} : { dateTime };
  }

  if (time.kind === "interval") {
    // Interval with only a low bound is a point in time
    if (time.high === undefined && time.low?.kind === "instant") {
      const dateTime = convertTSToDateTime(time.low.raw, ctx);
      return dateTime === undefined ? {} : { dateTime };
    }
    const period = convertIntervalToPeriod(time, ctx);
    return period === undefined ? {} : { period };
  }

  return {};
}
