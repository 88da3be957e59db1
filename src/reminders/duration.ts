import { InvalidDurationError } from "../errors.js";
import type { Duration } from "./types.js";

const MINUTES_PER_HOUR = 60;
const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR;

// Longest alias first so "hours" is never read as "h" + "ours".
const TOKEN_RE = /(\d+)(days|day|d|hours|hour|hrs|hr|h|minutes|minute|mins|min|m)/gi;

// "7:04", "07:04", "1d7:04"; compared against the compacted input.
const COLON_RE = /^(?:(\d+)d)?(\d{1,2}):(\d{1,2})$/i;

const BARE_MINUTES_RE = /^\d+$/;

/** Largest offset from the epoch a `Date` can hold. */
export const MAX_DATE_MS = 8.64e15;

export function duration(parts: Partial<Duration>): Duration {
  return { days: parts.days ?? 0, hours: parts.hours ?? 0, minutes: parts.minutes ?? 0 };
}

export function toMinutes(d: Duration): number {
  return d.days * MINUTES_PER_DAY + d.hours * MINUTES_PER_HOUR + d.minutes;
}

export function toMilliseconds(d: Duration): number {
  return toMinutes(d) * 60_000;
}

export function fromMinutes(totalMinutes: number): Duration {
  const total = Math.max(0, Math.floor(totalMinutes));
  const days = Math.floor(total / MINUTES_PER_DAY);
  const rem = total % MINUTES_PER_DAY;
  return { days, hours: Math.floor(rem / MINUTES_PER_HOUR), minutes: rem % MINUTES_PER_HOUR };
}

/** Difference in minutes; negative when `b` is longer than `a`. */
export function subtractDurations(a: Duration, b: Duration): number {
  return toMinutes(a) - toMinutes(b);
}

/**
 * @throws InvalidDurationError when a field or the total is not a safe integer, or the
 * total in milliseconds is past what a `Date` can represent.
 */
export function assertRepresentable(d: Duration): void {
  const fields = [d.days, d.hours, d.minutes];
  const ms = toMilliseconds(d);
  if (!fields.every(Number.isSafeInteger) || !Number.isSafeInteger(ms) || ms > MAX_DATE_MS) {
    throw new InvalidDurationError("Duration is too long");
  }
}

function compact(text: string): string {
  return text.replace(/\s+/g, "");
}

function parseColonForm(text: string): Duration | null {
  const m = compact(text).match(COLON_RE);
  if (!m) return null;
  const days = m[1] ? Number(m[1]) : 0;
  const hours = Number(m[2]);
  const minutes = Number(m[3]);
  if (minutes >= MINUTES_PER_HOUR) throw new InvalidDurationError("Minutes must be < 60 in H:MM format");
  return { days, hours, minutes };
}

function parseTokenForm(text: string): Duration | null {
  const s = compact(text);
  let days = 0;
  let hours = 0;
  let minutes = 0;
  let matched = 0;
  let found = false;

  for (const m of s.matchAll(TOKEN_RE)) {
    found = true;
    matched += m[0].length;
    const num = Number(m[1]);
    const unit = m[2].toLowerCase();
    if (unit.startsWith("d")) days += num;
    else if (unit.startsWith("h")) hours += num;
    else minutes += num;
  }

  // "1m30": the trailing "30" has no unit.
  if (!found || matched !== s.length) return null;

  if (minutes >= MINUTES_PER_HOUR) {
    hours += Math.floor(minutes / MINUTES_PER_HOUR);
    minutes %= MINUTES_PER_HOUR;
  }
  return { days, hours, minutes };
}

function parseBareMinutes(text: string): Duration | null {
  if (!BARE_MINUTES_RE.test(text)) return null;
  return { days: 0, hours: 0, minutes: Number(text) };
}

/**
 * Reads a relative duration such as `2h`, `1h30m`, `1d 7:04`, `1 hour 5 minutes` or `45` (minutes).
 *
 * @throws InvalidDurationError when no form matches or the value is too long.
 */
export function parseDuration(text: string): Duration {
  const trimmed = String(text ?? "").trim();
  if (!trimmed) throw new InvalidDurationError("Empty duration");

  for (const parse of [parseColonForm, parseTokenForm, parseBareMinutes]) {
    const parsed = parse(trimmed);
    if (parsed) {
      assertRepresentable(parsed);
      return parsed;
    }
  }
  throw new InvalidDurationError(`Could not parse duration: ${JSON.stringify(trimmed)}`);
}

export function formatDuration(d: Duration): string {
  const { days, hours, minutes } = fromMinutes(toMinutes(d));
  const parts: string[] = [];
  if (days) parts.push(`${days}d`);
  if (hours) parts.push(`${hours}h`);
  if (minutes || !parts.length) parts.push(`${minutes}m`);
  return parts.join(" ");
}
