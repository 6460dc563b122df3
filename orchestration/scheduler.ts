import { logger } from "../config/logger.js";
import { originOf } from "./deferral.js";
import type { FiringCoordinator } from "./firingCoordinator.js";
import type { Mutex } from "./mutex.js";
import { formatTime, matchesTime, minuteKey, nextOccurrence } from "./timeOfDay.js";
import type { TriggerStore } from "./triggerStore.js";
import { systemClock } from "./types.js";
import type { Clock, FiringOutcome, Trigger } from "./types.js";

export const DEFAULT_SCAN_INTERVAL_MS = 30_000;

export interface SchedulerLoopOptions {
  readonly store: TriggerStore;
  readonly coordinator: FiringCoordinator;
  readonly mutex: Mutex;
  readonly intervalMs?: number;
  readonly clock?: Clock;
  readonly onOutcome?: (outcome: FiringOutcome) => void;
}

export interface ScanResult {
  readonly due: readonly Trigger[];
  readonly outcomes: readonly FiringOutcome[];
}

interface WatchTask {
  readonly trigger: Trigger;
  /** Once reached, the instance stays due until the firing slot frees up. */
  readonly dueAt: Date;
  readonly controller: AbortController;
  timer: NodeJS.Timeout | null;
}

/**
 * Polls wall-clock time and hands due triggers to the firing coordinator.
 *
 * Runs two kinds of periodic task: the main scan over the store, and one
 * watch task per deferred instance. Both sleep the full interval between
 * checks and never overlap with themselves. A scan works through every
 * trigger due in its minute, one episode after another, so a trigger
 * queued behind a long episode still fires. Every watch task is tracked so
 * `stop()` can cancel all of them.
 */
export class SchedulerLoop {
  private readonly store: TriggerStore;
  private readonly coordinator: FiringCoordinator;
  private readonly mutex: Mutex;
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly onOutcome?: (outcome: FiringOutcome) => void;

  private running = false;
  private stopped = false;
  private scanTimer: NodeJS.Timeout | null = null;
  private readonly watchTasks = new Map<string, WatchTask>();
  private readonly lastFired = new Map<string, string>();
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(options: SchedulerLoopOptions) {
    this.store = options.store;
    this.coordinator = options.coordinator;
    this.mutex = options.mutex;
    this.intervalMs = options.intervalMs ?? DEFAULT_SCAN_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
    this.onOutcome = options.onOutcome;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopped = false;
    logger.info({ intervalMs: this.intervalMs }, "Scheduler started");

    this.runScanCycle();
    for (const task of this.watchTasks.values()) {
      this.scheduleWatch(task);
    }
  }

  /** Cancels every periodic task and the pending decision, then waits for in-flight checks. */
  async stop(): Promise<void> {
    this.running = false;
    this.stopped = true;

    if (this.scanTimer) {
      clearTimeout(this.scanTimer);
      this.scanTimer = null;
    }
    for (const id of [...this.watchTasks.keys()]) {
      this.cancelWatch(id);
    }
    this.coordinator.cancelActive();

    await Promise.allSettled([...this.inFlight]);
    logger.info("Scheduler stopped");
  }

  /** One pass of the main scan: fires the triggers due at `now` in store order while the slot is free. */
  async scanOnce(now?: Date): Promise<ScanResult> {
    const at = now ?? this.clock.now();
    const key = minuteKey(at);

    const due = await this.mutex.runExclusive(() =>
      this.store.snapshot().filter((t) => this.isDue(t, at, key)),
    );

    const outcomes: FiringOutcome[] = [];
    for (const candidate of due) {
      if (this.stopped) break;

      const current = await this.mutex.runExclusive(() => {
        const trigger = this.store.get(candidate.id);
        return trigger && this.isDue(trigger, at, key) ? trigger : undefined;
      });
      if (!current) continue;

      if (this.coordinator.state === "firing") {
        logger.debug({ dueCount: due.length }, "Due triggers waiting for the firing slot");
        break;
      }

      this.lastFired.set(current.id, key);
      const outcome = await this.coordinator.fire(current);
      if (!outcome) {
        this.lastFired.delete(current.id);
        break;
      }

      await this.handleOutcome(outcome);
      outcomes.push(outcome);
    }

    return { due, outcomes };
  }

  /** Tracks a deferred instance with its own periodic task. */
  watch(trigger: Trigger): void {
    this.cancelWatch(trigger.id);

    const task: WatchTask = {
      trigger,
      dueAt: nextOccurrence(trigger.fireTime, this.clock.now()),
      controller: new AbortController(),
      timer: null,
    };
    this.watchTasks.set(trigger.id, task);
    logger.info(
      { watchId: trigger.id, fireTime: formatTime(trigger.fireTime), dueAt: task.dueAt.toISOString() },
      "Watching deferred trigger",
    );

    if (this.running) {
      this.scheduleWatch(task);
    }
  }

  watches(): readonly Trigger[] {
    return [...this.watchTasks.values()].map((task) => task.trigger);
  }

  /**
   * Checks a single watch task. It fires on the first check at or after its
   * due instant that finds the slot free, and ends once that episode resolves.
   */
  async checkWatch(watchId: string, now?: Date): Promise<FiringOutcome | null> {
    const task = this.watchTasks.get(watchId);
    if (!task || task.controller.signal.aborted) return null;

    const at = now ?? this.clock.now();
    if (at < task.dueAt) return null;
    if (this.coordinator.state === "firing") return null;

    this.watchTasks.delete(watchId);
    const outcome = await this.coordinator.fire(task.trigger);
    if (!outcome) {
      if (!task.controller.signal.aborted) {
        this.watchTasks.set(watchId, task);
      }
      return null;
    }

    await this.handleOutcome(outcome);
    return outcome;
  }

  async checkWatches(now?: Date): Promise<readonly FiringOutcome[]> {
    const outcomes: FiringOutcome[] = [];
    for (const id of [...this.watchTasks.keys()]) {
      const outcome = await this.checkWatch(id, now);
      if (outcome) outcomes.push(outcome);
    }
    return outcomes;
  }

  /** Drops watch tasks and firing history of a trigger leaving the store. */
  cancelWatchesFor(originId: string): number {
    this.lastFired.delete(originId);

    let cancelled = 0;
    for (const task of [...this.watchTasks.values()]) {
      if (originOf(task.trigger) === originId) {
        this.cancelWatch(task.trigger.id);
        cancelled++;
      }
    }
    return cancelled;
  }

  private isDue(trigger: Trigger, at: Date, key: string): boolean {
    return (
      trigger.enabled &&
      !trigger.deferred &&
      matchesTime(trigger.fireTime, at) &&
      this.lastFired.get(trigger.id) !== key
    );
  }

  private async handleOutcome(outcome: FiringOutcome): Promise<void> {
    this.onOutcome?.(outcome);
    if (outcome.kind !== "deferred" || this.stopped) return;

    const next = outcome.next;
    const originPresent = await this.mutex.runExclusive(
      () => this.store.get(originOf(next)) !== undefined,
    );
    if (!originPresent) {
      logger.info({ watchId: next.id }, "Trigger removed while firing, deferral dropped");
      return;
    }

    this.watch(next);
  }

  private runScanCycle(): void {
    if (!this.running) return;

    this.track(
      this.scanOnce()
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          logger.error({ error: message }, "Scan failed, continuing");
        })
        .finally(() => {
          if (this.running) {
            this.scanTimer = setTimeout(() => this.runScanCycle(), this.intervalMs);
          }
        }),
    );
  }

  private scheduleWatch(task: WatchTask): void {
    if (task.timer) clearTimeout(task.timer);
    task.timer = setTimeout(() => this.runWatchCycle(task), this.intervalMs);
  }

  private runWatchCycle(task: WatchTask): void {
    task.timer = null;
    if (!this.running || task.controller.signal.aborted) return;

    const watchId = task.trigger.id;
    this.track(
      this.checkWatch(watchId)
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          logger.error({ watchId, error: message }, "Watch check failed, continuing");
        })
        .finally(() => {
          if (this.running && this.watchTasks.get(watchId) === task) {
            this.scheduleWatch(task);
          }
        }),
    );
  }

  private cancelWatch(watchId: string): void {
    const task = this.watchTasks.get(watchId);
    if (!task) return;

    task.controller.abort();
    if (task.timer) {
      clearTimeout(task.timer);
      task.timer = null;
    }
    this.watchTasks.delete(watchId);
    logger.debug({ watchId }, "Watch task cancelled");
  }

  private track(promise: Promise<unknown>): void {
    this.inFlight.add(promise);
    void promise.finally(() => this.inFlight.delete(promise));
  }
}
