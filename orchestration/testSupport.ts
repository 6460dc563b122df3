import { setImmediate as nextTurn } from "node:timers/promises";
import type { PlaybackResult, SoundPlayer } from "../execution/soundPlayer.js";
import type { Decision, DecisionSource, Trigger } from "./types.js";

export interface DecisionRequest {
  readonly trigger: Trigger;
  readonly signal: AbortSignal;
  readonly resolve: (decision: Decision) => void;
  readonly reject: (error: unknown) => void;
}

/** Decision source whose answers are given by the test, one request at a time. */
export class ScriptedDecisions implements DecisionSource {
  readonly requests: DecisionRequest[] = [];

  requestDecision(trigger: Trigger, signal: AbortSignal): Promise<Decision> {
    return new Promise<Decision>((resolve, reject) => {
      this.requests.push({ trigger, signal, resolve, reject });
    });
  }

  latest(): DecisionRequest {
    const request = this.requests.at(-1);
    if (!request) {
      throw new Error("No decision requested yet");
    }
    return request;
  }
}

/** Answers each request immediately with the next queued decision. */
export function queuedDecisions(answers: readonly Decision[]): DecisionSource & { readonly asked: Trigger[] } {
  const remaining = [...answers];
  const asked: Trigger[] = [];

  return {
    asked,
    requestDecision(trigger) {
      asked.push(trigger);
      const next = remaining.shift();
      return next ? Promise.resolve(next) : Promise.reject(new Error("No queued decision"));
    },
  };
}

export interface RecordingPlayer extends SoundPlayer {
  readonly played: string[];
}

export function recordingPlayer(result: PlaybackResult = { ok: true }): RecordingPlayer {
  const played: string[] = [];
  return {
    played,
    play(resourceRef) {
      played.push(resourceRef);
      return Promise.resolve(result);
    },
  };
}

/** Mutable clock for tests that step wall-clock time by hand. */
export class ManualClock {
  constructor(public current: Date) {}

  now(): Date {
    return this.current;
  }
}

export function at(hour: number, minute: number, second = 0, day = 5): Date {
  return new Date(2026, 0, day, hour, minute, second);
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("Condition not met in time");
    }
    await nextTurn();
  }
}
