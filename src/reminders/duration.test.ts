import test from "node:test";
import assert from "node:assert/strict";
import { InvalidDurationError } from "../errors.js";
import { MAX_DATE_MS, assertRepresentable, duration, formatDuration, fromMinutes, parseDuration, subtractDurations, toMilliseconds, toMinutes } from "./duration.js";

test("parseDuration: unit tokens", () => {
  assert.deepEqual(parseDuration("2h"), { days: 0, hours: 2, minutes: 0 });
  assert.deepEqual(parseDuration("1h30m"), { days: 0, hours: 1, minutes: 30 });
  assert.deepEqual(parseDuration("1d 2h 3m"), { days: 1, hours: 2, minutes: 3 });
  assert.deepEqual(parseDuration("2 hours 5 min"), { days: 0, hours: 2, minutes: 5 });
  assert.deepEqual(parseDuration("3 days"), { days: 3, hours: 0, minutes: 0 });
  assert.deepEqual(parseDuration("1hr 10mins"), { days: 0, hours: 1, minutes: 10 });
});

test("parseDuration: case insensitive", () => {
  assert.deepEqual(parseDuration("1H 5M"), { days: 0, hours: 1, minutes: 5 });
});

test("parseDuration: minutes of 60 or more carry into hours", () => {
  assert.deepEqual(parseDuration("90m"), { days: 0, hours: 1, minutes: 30 });
  assert.deepEqual(parseDuration("1h 75m"), { days: 0, hours: 2, minutes: 15 });
});

test("parseDuration: colon form with optional days", () => {
  assert.deepEqual(parseDuration("7:04"), { days: 0, hours: 7, minutes: 4 });
  assert.deepEqual(parseDuration("1d7:04"), { days: 1, hours: 7, minutes: 4 });
  assert.deepEqual(parseDuration("1d 07:04"), { days: 1, hours: 7, minutes: 4 });
});

test("parseDuration: colon form rejects minutes >= 60", () => {
  assert.throws(() => parseDuration("7:60"), { name: "InvalidDurationError", message: "Minutes must be < 60 in H:MM format" });
});

test("parseDuration: bare digits are minutes", () => {
  assert.deepEqual(parseDuration("45"), { days: 0, hours: 0, minutes: 45 });
  assert.deepEqual(parseDuration(" 5 "), { days: 0, hours: 0, minutes: 5 });
});

test("parseDuration: rejects empty, unitless tails and words", () => {
  assert.throws(() => parseDuration(""), InvalidDurationError);
  assert.throws(() => parseDuration("   "), { message: "Empty duration" });
  assert.throws(() => parseDuration("1m30"), InvalidDurationError);
  assert.throws(() => parseDuration("soon"), { message: 'Could not parse duration: "soon"' });
  assert.throws(() => parseDuration("2x"), InvalidDurationError);
});

test("formatDuration: omits zero units", () => {
  assert.equal(formatDuration(duration({ days: 1, hours: 7, minutes: 4 })), "1d 7h 4m");
  assert.equal(formatDuration(duration({ hours: 2 })), "2h");
  assert.equal(formatDuration(duration({ days: 2, minutes: 5 })), "2d 5m");
  assert.equal(formatDuration(duration({})), "0m");
});

test("formatDuration: normalizes overflowing fields", () => {
  assert.equal(formatDuration({ days: 0, hours: 25, minutes: 61 }), "1d 2h 1m");
});

test("arithmetic helpers", () => {
  const d = duration({ days: 1, hours: 1, minutes: 1 });
  assert.equal(toMinutes(d), 1501);
  assert.equal(toMilliseconds(d), 1501 * 60_000);
  assert.deepEqual(fromMinutes(1501), d);
  assert.deepEqual(fromMinutes(-5), duration({}));
  assert.equal(subtractDurations(duration({ hours: 1 }), duration({ minutes: 5 })), 55);
  assert.equal(subtractDurations(duration({ minutes: 5 }), duration({ hours: 1 })), -55);
});

test("parseDuration: colon hours take at most two digits", () => {
  assert.deepEqual(parseDuration("07:04"), { days: 0, hours: 7, minutes: 4 });
  assert.throws(() => parseDuration("007:04"), { name: "InvalidDurationError", message: 'Could not parse duration: "007:04"' });
});

test("parseDuration: an hour of minutes equals one more hour", () => {
  assert.deepEqual(parseDuration("1h 60m"), parseDuration("2h"));
  assert.equal(toMinutes(parseDuration("1h 60m")), 120);
});

test("parseDuration: totals past the Date range are rejected", () => {
  assert.throws(() => parseDuration("999999999999m"), { name: "InvalidDurationError", message: "Duration is too long" });
  assert.throws(() => parseDuration("99999999999999999999"), { name: "InvalidDurationError", message: "Duration is too long" });
  assert.throws(() => parseDuration("99999999999999999999d"), { name: "InvalidDurationError", message: "Duration is too long" });
  assert.deepEqual(parseDuration("100000d"), { days: 100_000, hours: 0, minutes: 0 });
});

test("assertRepresentable: rejects unsafe fields and totals", () => {
  assert.doesNotThrow(() => assertRepresentable(duration({ minutes: MAX_DATE_MS / 60_000 })));
  assert.throws(() => assertRepresentable(duration({ minutes: MAX_DATE_MS / 60_000 + 1 })), InvalidDurationError);
  assert.throws(() => assertRepresentable(duration({ days: Number.MAX_SAFE_INTEGER + 1 })), InvalidDurationError);
  assert.throws(() => assertRepresentable(duration({ hours: 1.5 })), InvalidDurationError);
});

test("formatDuration: days and minutes without hours", () => {
  assert.equal(formatDuration({ days: 1, hours: 0, minutes: 59 }), "1d 59m");
});

test("formatDuration output parses back to the same fields", () => {
  for (let days = 0; days <= 3; days++) {
    for (let hours = 0; hours < 24; hours++) {
      for (let minutes = 0; minutes < 60; minutes++) {
        const d = { days, hours, minutes };
        const text = formatDuration(d);
        assert.deepEqual(parseDuration(text), d, text);
      }
    }
  }
});
