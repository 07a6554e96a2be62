import { ConfigError, type EvalEnvironment } from '@plugin-evals/shared';
import { isRecord, type PlatformRecord } from '../client/platform-client';

/** Fields that may carry a record's time, in order of preference. */
export const TIMESTAMP_FIELDS = ['start_time', 'created_at', 'timestamp', 'end_time'] as const;

/** Default look-back when no explicit window start is configured. */
export const DEFAULT_LOOKBACK_MS = 5 * 60 * 1000;

const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * A zone-less date and time, encoded as milliseconds on a UTC axis so that
 * two wall-clock values compare correctly. It is not a real instant.
 */
export type WallClock = number;

interface WallClockParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/**
 * Reduces the platform's timestamp variants to `YYYY-MM-DD HH:MM:SS`:
 * trailing `Z` and any `+offset` are dropped, as are fractional seconds.
 */
export function normalizeTimestampText(text: string): string {
  let clean = text.replace(/Z$/, '').replace('T', ' ');
  const plus = clean.indexOf('+');
  if (plus !== -1) clean = clean.slice(0, plus);
  const dot = clean.indexOf('.');
  if (dot !== -1) clean = clean.slice(0, dot);
  return clean.trim();
}

function parseParts(text: string): WallClockParts | null {
  const match = WALL_CLOCK_PATTERN.exec(text);
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const parts = { year, month, day, hour, minute, second };

  if (hour > 23 || minute > 59 || second > 59) return null;
  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (
    calendarDay.getUTCFullYear() !== year ||
    calendarDay.getUTCMonth() !== month - 1 ||
    calendarDay.getUTCDate() !== day
  ) {
    return null;
  }
  return parts;
}

function toWallClock(parts: WallClockParts): WallClock {
  return Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
}

/** Parses normalized timestamp text; `null` when it is not a valid calendar time. */
export function parseWallClock(text: string): WallClock | null {
  const parts = parseParts(normalizeTimestampText(text));
  return parts ? toWallClock(parts) : null;
}

/**
 * Finds the first parseable text timestamp on a record. Each field is tried
 * on the record itself, then on its `completion_metadata`.
 */
export function parseRecordTimestamp(record: PlatformRecord): WallClock | null {
  const metadata = isRecord(record.completion_metadata) ? record.completion_metadata : {};
  for (const field of TIMESTAMP_FIELDS) {
    for (const source of [record, metadata]) {
      const value = source[field];
      if (typeof value !== 'string' || value === '') continue;
      const parsed = parseWallClock(value);
      if (parsed !== null) return parsed;
    }
  }
  return null;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Formats a local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface EvalWindow {
  /** Normalized start text, as sent to the platform and reported */
  startText: string;
  start: WallClock;
  /** Epoch seconds compared against numeric record timestamps */
  startEpoch: number;
}

/**
 * Derives the window from the configured start, falling back to five minutes
 * before `now` in local time.
 */
export function resolveWindow(
  config: Pick<EvalEnvironment, 'startTime' | 'startEpoch'>,
  now: Date = new Date(),
): EvalWindow {
  const startText =
    config.startTime !== undefined
      ? normalizeTimestampText(config.startTime)
      : formatLocalTimestamp(new Date(now.getTime() - DEFAULT_LOOKBACK_MS));

  const parts = parseParts(startText);
  if (!parts) {
    throw new ConfigError(
      `EVAL_START_TIME must look like YYYY-MM-DD HH:MM:SS, got "${config.startTime ?? ''}"`,
    );
  }

  const localStart = new Date(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
  );

  return {
    startText,
    start: toWallClock(parts),
    startEpoch: config.startEpoch ?? Math.floor(localStart.getTime() / 1000),
  };
}

export interface Reconciliation {
  inWindow: PlatformRecord[];
  totalReturned: number;
  count: number;
}

/**
 * Re-filters records client-side. Records without a parseable timestamp are
 * never in the window; an empty candidate set reconciles to zero.
 */
export function reconcileWindow(records: PlatformRecord[], window: EvalWindow): Reconciliation {
  const inWindow = records.filter((record) => {
    const time = parseRecordTimestamp(record);
    return time !== null && time >= window.start;
  });
  return { inWindow, totalReturned: records.length, count: inWindow.length };
}

/** Numeric epoch seconds are compared as-is against the epoch boundary. */
export function isEpochInWindow(value: unknown, window: EvalWindow): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= window.startEpoch;
}
