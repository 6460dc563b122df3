import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { computeDeferral, originOf } from "./deferral.js";
import type { Trigger } from "./types.js";

function makeTrigger(overrides?: Partial<Trigger>): Trigger {
  return {
    id: "t1",
    fireTime: { hour: 10, minute: 0 },
    toneRef: "/tones/beep.wav",
    deferDuration: 5,
    label: "Wake",
    enabled: true,
    deferred: false,
    deferCount: 0,
    ...overrides,
  };
}

describe("computeDeferral", () => {
  it("should schedule the first deferral from now", () => {
    const next = computeDeferral(makeTrigger(), new Date(2026, 2, 10, 10, 0, 0));

    assert.deepEqual(next, {
      id: "t1:snooze-1",
      originId: "t1",
      fireTime: { hour: 10, minute: 5 },
      toneRef: "/tones/beep.wav",
      deferDuration: 5,
      label: "Wake (Snooze 1)",
      enabled: true,
      deferred: false,
      deferCount: 1,
    });
  });

  it("should chain deferrals back to the same origin", () => {
    const first = computeDeferral(makeTrigger(), new Date(2026, 2, 10, 10, 0, 0));
    const second = computeDeferral(first, new Date(2026, 2, 10, 10, 5, 0));

    assert.equal(second.id, "t1:snooze-2");
    assert.equal(second.originId, "t1");
    assert.deepEqual(second.fireTime, { hour: 10, minute: 10 });
    assert.equal(second.deferCount, 2);
    assert.equal(second.label, "Wake (Snooze 1) (Snooze 2)");
  });

  it("should use the trigger's own defer duration", () => {
    const next = computeDeferral(makeTrigger({ deferDuration: 15 }), new Date(2026, 2, 10, 23, 50));

    assert.deepEqual(next.fireTime, { hour: 0, minute: 5 });
  });

  it("should clear the deferred flag on the instance", () => {
    const next = computeDeferral(makeTrigger({ deferred: true, deferCount: 3 }), new Date(2026, 2, 10, 8, 0));

    assert.equal(next.deferred, false);
    assert.equal(next.deferCount, 4);
  });

  it("should not modify its input and be deterministic", () => {
    const trigger = makeTrigger();
    const now = new Date(2026, 2, 10, 10, 0, 0);

    const a = computeDeferral(trigger, now);
    const b = computeDeferral(trigger, now);

    assert.deepEqual(a, b);
    assert.deepEqual(trigger, makeTrigger());
  });
});

describe("originOf", () => {
  it("should resolve deferral instances to their origin", () => {
    const trigger = makeTrigger();
    const next = computeDeferral(trigger, new Date(2026, 2, 10, 10, 0));

    assert.equal(originOf(trigger), "t1");
    assert.equal(originOf(next), "t1");
  });
});
