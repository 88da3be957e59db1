import { InvalidServerTimeError } from "../errors.js";
import { fromMinutes } from "./duration.js";
import type { Duration } from "./types.js";

const TIME_ONLY_RE = /^(\d{1,2}):(\d{2})$/;
const DATE_TIME_RE = /^(\d{1,2})-(\d{1,2})-(\d{4})\s+(\d{1,2}):(\d{2})$/;

function checkClock(hour: number, minute: number): void {
  if (hour < 0 || hour > 23) throw new InvalidServerTimeError(`Hour out of range: ${hour}`);
  if (minute < 0 || minute > 59) throw new InvalidServerTimeError(`Minute out of range: ${minute}`);
}

function minuteFloor(date: Date): Date {
  const d = new Date(date.getTime());
  d.setSeconds(0, 0);
  return d;
}

function diffAsDuration(target: Date, base: Date): Duration {
  return fromMinutes(Math.round((target.getTime() - base.getTime()) / 60_000));
}

/**
 * Turns an in-game server time (`17:09`, `8-11-2025 17:09`) into the span from `now` until then,
 * reading wall-clock values in the process's local zone.
 *
 * A bare time that is not later than `now` means the same time tomorrow.
 *
 * @throws InvalidServerTimeError on malformed input or a date-time that is not in the future.
 */
export function parseServerTimeToDuration(text: string, now: Date = new Date()): Duration {
  const s = String(text ?? "").trim();
  if (!s) throw new InvalidServerTimeError("Empty server time");

  const base = minuteFloor(now);

  const t = s.match(TIME_ONLY_RE);
  if (t) {
    const hour = Number(t[1]);
    const minute = Number(t[2]);
    checkClock(hour, minute);
    const target = new Date(base.getTime());
    target.setHours(hour, minute, 0, 0);
    if (target.getTime() <= now.getTime()) target.setDate(target.getDate() + 1);
    return diffAsDuration(target, base);
  }

  const dt = s.match(DATE_TIME_RE);
  if (dt) {
    const day = Number(dt[1]);
    const month = Number(dt[2]);
    const year = Number(dt[3]);
    const hour = Number(dt[4]);
    const minute = Number(dt[5]);
    checkClock(hour, minute);
    const target = new Date(year, month - 1, day, hour, minute, 0, 0);
    if (target.getFullYear() !== year || target.getMonth() !== month - 1 || target.getDate() !== day) {
      throw new InvalidServerTimeError(`No such date: ${day}-${month}-${year}`);
    }
    if (target.getTime() <= now.getTime()) throw new InvalidServerTimeError(`Server time is not in the future: ${s}`);
    return diffAsDuration(target, base);
  }

  throw new InvalidServerTimeError(`Could not parse server time: ${JSON.stringify(s)}`);
}
