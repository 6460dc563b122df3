import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { SoundPlayer } from "../execution/soundPlayer.js";
import { PlaybackError } from "./errors.js";
import { FiringCoordinator } from "./firingCoordinator.js";
import { Mutex } from "./mutex.js";
import { TriggerStore } from "./triggerStore.js";
import type { DecisionSource, Trigger } from "./types.js";
import {
  ManualClock,
  ScriptedDecisions,
  at,
  queuedDecisions,
  recordingPlayer,
  waitFor,
} from "./testSupport.js";

interface SetupOptions {
  readonly soundPlayer?: SoundPlayer;
  readonly fallbackPlayer?: SoundPlayer;
  readonly responseTimeoutMs?: number;
  readonly onFiring?: (trigger: Trigger) => void;
}

function setup(decisions: DecisionSource, options?: SetupOptions) {
  let next = 0;
  const store = new TriggerStore({ generateId: () => `t${String(++next)}` });
  const clock = new ManualClock(at(9, 0));
  const coordinator = new FiringCoordinator({
    store,
    mutex: new Mutex(),
    soundPlayer: options?.soundPlayer ?? recordingPlayer(),
    fallbackPlayer: options?.fallbackPlayer ?? recordingPlayer(),
    decisions,
    responseTimeoutMs: options?.responseTimeoutMs ?? 5_000,
    clock,
    onFiring: options?.onFiring,
  });
  const addTrigger = (label: string): Trigger =>
    store.add({ fireTime: { hour: 9, minute: 0 }, toneRef: "/tones/beep.wav", deferDuration: 5, label });

  return { store, clock, coordinator, addTrigger };
}

describe("FiringCoordinator", () => {
  it("should reset the deferral state when dismissed", async () => {
    const { store, coordinator, addTrigger } = setup(queuedDecisions(["dismiss"]));
    addTrigger("Wake");
    const trigger = store.update("t1", { deferred: true, deferCount: 3 });

    const outcome = await coordinator.fire(trigger);

    assert.deepEqual(outcome, { kind: "dismissed", trigger, reason: "response" });
    assert.equal(store.get("t1")?.deferred, false);
    assert.equal(store.get("t1")?.deferCount, 0);
  });

  it("should defer by the trigger's duration and mark the origin", async () => {
    const { store, coordinator, addTrigger } = setup(queuedDecisions(["defer"]));
    const trigger = addTrigger("Wake");

    const outcome = await coordinator.fire(trigger);

    assert.ok(outcome && outcome.kind === "deferred");
    assert.equal(outcome?.reason, "response");
    assert.equal(outcome.next.id, "t1:snooze-1");
    assert.deepEqual(outcome.next.fireTime, { hour: 9, minute: 5 });
    assert.equal(store.get("t1")?.deferred, true);
    assert.equal(store.get("t1")?.deferCount, 1);
  });

  it("should defer when no decision arrives before the deadline", async () => {
    const decisions = new ScriptedDecisions();
    const { coordinator, addTrigger } = setup(decisions, { responseTimeoutMs: 20 });

    const outcome = await coordinator.fire(addTrigger("Wake"));

    assert.equal(outcome?.kind, "deferred");
    assert.equal(outcome?.reason, "timeout");
    assert.equal(decisions.latest().signal.aborted, true);
  });

  it("should ignore a decision that arrives after the deadline", async () => {
    const decisions = new ScriptedDecisions();
    const { store, coordinator, addTrigger } = setup(decisions, { responseTimeoutMs: 20 });

    await coordinator.fire(addTrigger("Wake"));
    decisions.latest().resolve("dismiss");
    await Promise.resolve();

    assert.equal(store.get("t1")?.deferred, true);
  });

  it("should dismiss on interrupt", async () => {
    const { coordinator, addTrigger } = setup(queuedDecisions(["interrupt"]));

    const outcome = await coordinator.fire(addTrigger("Wake"));

    assert.equal(outcome?.kind, "dismissed");
    assert.equal(outcome?.reason, "interrupt");
  });

  it("should dismiss when the decision source fails", async () => {
    const { store, coordinator, addTrigger } = setup(queuedDecisions([]));

    const outcome = await coordinator.fire(addTrigger("Wake"));

    assert.equal(outcome?.kind, "dismissed");
    assert.equal(outcome?.reason, "error");
    assert.equal(store.get("t1")?.deferred, false);
  });

  it("should allow only one firing episode at a time", async () => {
    const decisions = new ScriptedDecisions();
    const { coordinator, addTrigger } = setup(decisions);
    const first = addTrigger("First");
    const second = addTrigger("Second");

    const firing = coordinator.fire(first);
    await waitFor(() => decisions.requests.length === 1);

    assert.equal(coordinator.state, "firing");
    assert.equal(coordinator.active?.id, "t1");
    assert.equal(await coordinator.fire(second), null);
    assert.equal(decisions.requests.length, 1);

    decisions.latest().resolve("dismiss");
    const outcome = await firing;

    assert.equal(outcome?.trigger.id, "t1");
    assert.equal(coordinator.state, "idle");
    assert.equal(coordinator.active, null);
  });

  it("should announce the firing trigger", async () => {
    const announced: string[] = [];
    const { coordinator, addTrigger } = setup(queuedDecisions(["dismiss"]), {
      onFiring: (trigger) => announced.push(trigger.label),
    });

    await coordinator.fire(addTrigger("Wake"));

    assert.deepEqual(announced, ["Wake"]);
  });

  it("should not use the fallback when playback succeeds", async () => {
    const fallbackPlayer = recordingPlayer();
    const soundPlayer = recordingPlayer();
    const { coordinator, addTrigger } = setup(queuedDecisions(["dismiss"]), {
      soundPlayer,
      fallbackPlayer,
    });

    await coordinator.fire(addTrigger("Wake"));

    assert.deepEqual(soundPlayer.played, ["/tones/beep.wav"]);
    assert.deepEqual(fallbackPlayer.played, []);
  });

  it("should fall back when playback reports a failure", async () => {
    const decisions = new ScriptedDecisions();
    const fallbackPlayer = recordingPlayer();
    const { coordinator, addTrigger } = setup(decisions, {
      soundPlayer: recordingPlayer({
        ok: false,
        error: new PlaybackError("device busy", "/tones/beep.wav"),
      }),
      fallbackPlayer,
    });

    const firing = coordinator.fire(addTrigger("Wake"));
    await waitFor(() => fallbackPlayer.played.length === 1 && decisions.requests.length === 1);
    decisions.latest().resolve("dismiss");
    const outcome = await firing;

    assert.equal(outcome?.kind, "dismissed");
    assert.deepEqual(fallbackPlayer.played, ["/tones/beep.wav"]);
  });

  it("should fall back when playback throws", async () => {
    const decisions = new ScriptedDecisions();
    const fallbackPlayer = recordingPlayer();
    const { coordinator, addTrigger } = setup(decisions, {
      soundPlayer: { play: () => Promise.reject(new Error("crashed")) },
      fallbackPlayer,
    });

    const firing = coordinator.fire(addTrigger("Wake"));
    await waitFor(() => fallbackPlayer.played.length === 1 && decisions.requests.length === 1);
    decisions.latest().resolve("defer");

    assert.equal((await firing)?.kind, "deferred");
  });

  it("should stop playback when the episode ends", async () => {
    let stopped = false;
    const soundPlayer: SoundPlayer = {
      play: (_ref, signal) =>
        new Promise((resolve) => {
          signal?.addEventListener(
            "abort",
            () => {
              stopped = true;
              resolve({ ok: true });
            },
            { once: true },
          );
        }),
    };
    const { coordinator, addTrigger } = setup(queuedDecisions(["dismiss"]), { soundPlayer });

    await coordinator.fire(addTrigger("Wake"));

    assert.equal(stopped, true);
  });

  it("should dismiss the active trigger when cancelled", async () => {
    const decisions = new ScriptedDecisions();
    const { coordinator, addTrigger } = setup(decisions);

    assert.equal(coordinator.cancelActive(), false);

    const firing = coordinator.fire(addTrigger("Wake"));
    await waitFor(() => decisions.requests.length === 1);

    assert.equal(coordinator.cancelActive(), true);
    const outcome = await firing;

    assert.equal(outcome?.kind, "dismissed");
    assert.equal(outcome?.reason, "interrupt");
    assert.equal(decisions.latest().signal.aborted, true);
  });

  it("should defer a trigger that is no longer in the store", async () => {
    const { store, coordinator, addTrigger } = setup(queuedDecisions(["defer"]));
    const trigger = addTrigger("Wake");
    store.removeById(trigger.id);

    const outcome = await coordinator.fire(trigger);

    assert.equal(outcome?.kind, "deferred");
    assert.equal(store.size, 0);
  });
});
