import { logger } from "../config/logger.js";
import type { Mutex } from "./mutex.js";
import type { SchedulerLoop } from "./scheduler.js";
import type { TriggerStore } from "./triggerStore.js";
import type { ListedTrigger, Trigger, TriggerDraft } from "./types.js";

export interface AlarmServiceOptions {
  readonly store: TriggerStore;
  readonly scheduler: SchedulerLoop;
  readonly mutex: Mutex;
}

/**
 * Core operations used by the interactive layer. Ordinals are 1-based here
 * and resolved to stable ids under the lock, so a concurrent firing cannot
 * shift the target between lookup and mutation.
 */
export class AlarmService {
  private readonly store: TriggerStore;
  private readonly scheduler: SchedulerLoop;
  private readonly mutex: Mutex;
  private running = true;

  constructor(options: AlarmServiceOptions) {
    this.store = options.store;
    this.scheduler = options.scheduler;
    this.mutex = options.mutex;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    this.running = true;
    this.scheduler.start();
  }

  async setRunning(running: boolean): Promise<void> {
    if (running) {
      this.start();
      return;
    }
    this.running = false;
    await this.scheduler.stop();
  }

  addTrigger(draft: TriggerDraft): Promise<Trigger> {
    return this.mutex.runExclusive(() => {
      const trigger = this.store.add(draft);
      logger.info({ triggerId: trigger.id, label: trigger.label }, "Trigger added");
      return trigger;
    });
  }

  listTriggers(): Promise<readonly ListedTrigger[]> {
    return this.mutex.runExclusive(() => [...this.store.list()]);
  }

  toggle(ordinal: number): Promise<Trigger> {
    return this.mutex.runExclusive(() => {
      const trigger = this.store.toggleEnabled(ordinal - 1);
      logger.info({ triggerId: trigger.id, enabled: trigger.enabled }, "Trigger toggled");
      return trigger;
    });
  }

  remove(ordinal: number): Promise<Trigger> {
    return this.mutex.runExclusive(() => {
      const removed = this.store.remove(ordinal - 1);
      const cancelledWatches = this.scheduler.cancelWatchesFor(removed.id);
      logger.info({ triggerId: removed.id, cancelledWatches }, "Trigger removed");
      return removed;
    });
  }

  activeCount(): Promise<number> {
    return this.mutex.runExclusive(
      () => this.store.snapshot().filter((trigger) => trigger.enabled).length,
    );
  }
}
