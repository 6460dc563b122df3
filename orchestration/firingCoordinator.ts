import { logger } from "../config/logger.js";
import type { SoundPlayer } from "../execution/soundPlayer.js";
import { computeDeferral, originOf } from "./deferral.js";
import type { Mutex } from "./mutex.js";
import type { TriggerStore } from "./triggerStore.js";
import { systemClock } from "./types.js";
import type {
  Clock,
  Decision,
  DecisionReason,
  DecisionSource,
  FiringOutcome,
  Trigger,
} from "./types.js";

export type CoordinatorState = "idle" | "firing";

export interface FiringCoordinatorOptions {
  readonly store: TriggerStore;
  readonly mutex: Mutex;
  readonly soundPlayer: SoundPlayer;
  readonly fallbackPlayer: SoundPlayer;
  readonly decisions: DecisionSource;
  readonly responseTimeoutMs: number;
  readonly clock?: Clock;
  readonly onFiring?: (trigger: Trigger) => void;
}

interface ResolvedDecision {
  readonly action: "dismiss" | "defer";
  readonly reason: DecisionReason;
}

/**
 * Owns the single firing slot. A firing episode plays the trigger's tone,
 * waits for a dismiss/defer decision raced against the response deadline,
 * and applies the outcome to the trigger's store entry.
 */
export class FiringCoordinator {
  private readonly store: TriggerStore;
  private readonly mutex: Mutex;
  private readonly soundPlayer: SoundPlayer;
  private readonly fallbackPlayer: SoundPlayer;
  private readonly decisions: DecisionSource;
  private readonly responseTimeoutMs: number;
  private readonly clock: Clock;
  private readonly onFiring?: (trigger: Trigger) => void;

  private activeTrigger: Trigger | null = null;
  private cancelDecision: (() => void) | null = null;

  constructor(options: FiringCoordinatorOptions) {
    this.store = options.store;
    this.mutex = options.mutex;
    this.soundPlayer = options.soundPlayer;
    this.fallbackPlayer = options.fallbackPlayer;
    this.decisions = options.decisions;
    this.responseTimeoutMs = options.responseTimeoutMs;
    this.clock = options.clock ?? systemClock;
    this.onFiring = options.onFiring;
  }

  get state(): CoordinatorState {
    return this.activeTrigger ? "firing" : "idle";
  }

  get active(): Trigger | null {
    return this.activeTrigger;
  }

  /** Runs one firing episode. Resolves to null when another trigger holds the slot. */
  async fire(trigger: Trigger): Promise<FiringOutcome | null> {
    const claimed = await this.mutex.runExclusive(() => {
      if (this.activeTrigger) return false;
      this.activeTrigger = trigger;
      return true;
    });

    if (!claimed) {
      logger.debug(
        { triggerId: trigger.id, activeId: this.activeTrigger?.id },
        "Firing slot busy, trigger left pending",
      );
      return null;
    }

    logger.info({ triggerId: trigger.id, label: trigger.label }, "Trigger firing");
    const playbackControl = new AbortController();

    try {
      this.onFiring?.(trigger);
      const playback = this.playAlert(trigger, playbackControl.signal);
      const decision = await this.awaitDecision(trigger);
      playbackControl.abort();
      await playback;

      return await this.mutex.runExclusive(() => {
        const outcome = this.applyDecision(trigger, decision);
        this.activeTrigger = null;
        return outcome;
      });
    } finally {
      playbackControl.abort();
      this.activeTrigger = null;
      this.cancelDecision = null;
    }
  }

  /** Ends the pending decision as an interrupt, which dismisses the trigger. */
  cancelActive(): boolean {
    if (!this.cancelDecision) return false;
    this.cancelDecision();
    return true;
  }

  private async playAlert(trigger: Trigger, signal: AbortSignal): Promise<void> {
    try {
      const result = await this.soundPlayer.play(trigger.toneRef, signal);
      if (result.ok) return;
      logger.warn(
        { triggerId: trigger.id, toneRef: trigger.toneRef, error: result.error.message },
        "Playback failed, using fallback cue",
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(
        { triggerId: trigger.id, toneRef: trigger.toneRef, error: message },
        "Playback failed, using fallback cue",
      );
    }

    if (signal.aborted) return;

    try {
      await this.fallbackPlayer.play(trigger.toneRef, signal);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ triggerId: trigger.id, error: message }, "Fallback cue failed");
    }
  }

  private awaitDecision(trigger: Trigger): Promise<ResolvedDecision> {
    const request = new AbortController();

    return new Promise<ResolvedDecision>((resolve) => {
      let settled = false;

      const finish = (decision: ResolvedDecision): void => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        this.cancelDecision = null;
        request.abort();
        resolve(decision);
      };

      const deadline = setTimeout(() => {
        logger.info(
          { triggerId: trigger.id, timeoutMs: this.responseTimeoutMs },
          "No response before deadline, deferring",
        );
        finish({ action: "defer", reason: "timeout" });
      }, this.responseTimeoutMs);

      this.cancelDecision = () => finish({ action: "dismiss", reason: "interrupt" });

      void Promise.resolve()
        .then(() => this.decisions.requestDecision(trigger, request.signal))
        .then(
          (decision) => finish(resolveDecision(decision)),
          (error: unknown) => {
            if (request.signal.aborted) return;
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ triggerId: trigger.id, error: message }, "Decision source failed, dismissing");
            finish({ action: "dismiss", reason: "error" });
          },
        );
    });
  }

  private applyDecision(trigger: Trigger, decision: ResolvedDecision): FiringOutcome {
    const originId = originOf(trigger);
    const isStoreMember = this.store.get(originId) !== undefined;

    if (decision.action === "dismiss") {
      if (isStoreMember) {
        this.store.update(originId, { deferred: false, deferCount: 0 });
      }
      logger.info({ triggerId: trigger.id, reason: decision.reason }, "Trigger dismissed");
      return { kind: "dismissed", trigger, reason: decision.reason };
    }

    const next = computeDeferral(trigger, this.clock.now());
    if (isStoreMember) {
      this.store.update(originId, { deferred: true, deferCount: next.deferCount });
    }
    logger.info(
      {
        triggerId: trigger.id,
        reason: decision.reason,
        nextId: next.id,
        deferCount: next.deferCount,
        deferMinutes: trigger.deferDuration,
      },
      "Trigger deferred",
    );
    return { kind: "deferred", trigger, reason: decision.reason, next };
  }
}

function resolveDecision(decision: Decision): ResolvedDecision {
  switch (decision) {
    case "dismiss":
      return { action: "dismiss", reason: "response" };
    case "defer":
      return { action: "defer", reason: "response" };
    case "interrupt":
      return { action: "dismiss", reason: "interrupt" };
  }
}
