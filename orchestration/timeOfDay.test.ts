import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "./errors.js";
import {
  TIME_FORMAT_HINT,
  addMinutes,
  formatTime,
  matchesTime,
  minuteKey,
  nextOccurrence,
  parseTime,
  validateTime,
} from "./timeOfDay.js";

describe("validateTime", () => {
  it("should accept every hour with boundary minutes", () => {
    for (let hour = 0; hour <= 23; hour++) {
      for (const minute of [0, 1, 30, 59]) {
        const input = formatTime({ hour, minute });
        assert.equal(validateTime(input), true, input);
      }
    }
  });

  it("should accept single-digit segments and surrounding whitespace", () => {
    assert.equal(validateTime("7:05"), true);
    assert.equal(validateTime("07:5"), true);
    assert.equal(validateTime("  14:30 "), true);
  });

  it("should reject malformed or out-of-range input", () => {
    const invalid = ["", "12", "1230", "12:30:00", "24:00", "12:60", "ab:cd", ":30", "12:", "-1:30", "12:3a", "123:00", "1 2:30"];

    for (const input of invalid) {
      assert.equal(validateTime(input), false, JSON.stringify(input));
    }
  });
});

describe("parseTime", () => {
  it("should return hour and minute", () => {
    assert.deepEqual(parseTime(" 09:05 "), { hour: 9, minute: 5 });
  });

  it("should throw a ValidationError with the format hint", () => {
    assert.throws(
      () => parseTime("25:00"),
      (error: unknown) => error instanceof ValidationError && error.message === TIME_FORMAT_HINT,
    );
  });
});

describe("formatTime", () => {
  it("should zero-pad both fields", () => {
    assert.equal(formatTime({ hour: 7, minute: 5 }), "07:05");
    assert.equal(formatTime({ hour: 23, minute: 59 }), "23:59");
  });
});

describe("matchesTime", () => {
  it("should compare hour and minute only", () => {
    const time = { hour: 9, minute: 0 };

    assert.equal(matchesTime(time, new Date(2026, 0, 5, 9, 0, 0)), true);
    assert.equal(matchesTime(time, new Date(2026, 0, 5, 9, 0, 59)), true);
    assert.equal(matchesTime(time, new Date(2026, 0, 5, 9, 1, 0)), false);
    assert.equal(matchesTime(time, new Date(2026, 0, 5, 21, 0, 0)), false);
  });
});

describe("addMinutes", () => {
  it("should drop seconds", () => {
    assert.deepEqual(addMinutes(new Date(2026, 0, 5, 10, 0, 59), 5), { hour: 10, minute: 5 });
  });

  it("should carry into the next hour", () => {
    assert.deepEqual(addMinutes(new Date(2026, 0, 5, 10, 55), 10), { hour: 11, minute: 5 });
  });

  it("should wrap past midnight", () => {
    assert.deepEqual(addMinutes(new Date(2026, 0, 5, 23, 58, 45), 5), { hour: 0, minute: 3 });
  });
});

describe("minuteKey", () => {
  it("should identify the calendar minute", () => {
    assert.equal(minuteKey(new Date(2026, 0, 5, 9, 7, 30)), "2026-01-05 09:07");
    assert.notEqual(
      minuteKey(new Date(2026, 0, 5, 9, 7)),
      minuteKey(new Date(2026, 0, 6, 9, 7)),
    );
  });
});

describe("nextOccurrence", () => {
  it("should stay on the same day for a later time", () => {
    assert.deepEqual(
      nextOccurrence({ hour: 9, minute: 5 }, new Date(2026, 0, 5, 9, 0, 42)),
      new Date(2026, 0, 5, 9, 5, 0),
    );
  });

  it("should count the current minute as reached", () => {
    assert.deepEqual(
      nextOccurrence({ hour: 9, minute: 0 }, new Date(2026, 0, 5, 9, 0, 59)),
      new Date(2026, 0, 5, 9, 0, 0),
    );
  });

  it("should roll over to the next day for an earlier time", () => {
    assert.deepEqual(
      nextOccurrence({ hour: 0, minute: 3 }, new Date(2026, 0, 5, 23, 58)),
      new Date(2026, 0, 6, 0, 3, 0),
    );
  });
});
