import crypto from "node:crypto";
import { formatTime } from "./timeOfDay.js";
import { OutOfRangeError, TriggerNotFoundError } from "./errors.js";
import type {
  ListedTrigger,
  Trigger,
  TriggerChange,
  TriggerDraft,
  TriggerStatePatch,
} from "./types.js";

export type TriggerChangeListener = (change: TriggerChange) => void;

export interface TriggerStoreOptions {
  readonly generateId?: () => string;
  readonly onChange?: TriggerChangeListener;
}

/**
 * Ordered trigger collection. Records are immutable; state changes replace
 * the record under the same id. Has no locking of its own: callers
 * serialize access through the shared mutex.
 */
export class TriggerStore {
  private readonly triggers: Trigger[] = [];
  private readonly generateId: () => string;
  private readonly listeners: TriggerChangeListener[] = [];

  constructor(options?: TriggerStoreOptions) {
    this.generateId = options?.generateId ?? (() => crypto.randomUUID());
    if (options?.onChange) {
      this.listeners.push(options.onChange);
    }
  }

  get size(): number {
    return this.triggers.length;
  }

  onChange(listener: TriggerChangeListener): void {
    this.listeners.push(listener);
  }

  add(draft: TriggerDraft): Trigger {
    const trigger: Trigger = {
      id: draft.id ?? this.generateId(),
      fireTime: draft.fireTime,
      toneRef: draft.toneRef,
      deferDuration: draft.deferDuration,
      label: resolveLabel(draft),
      enabled: draft.enabled ?? true,
      deferred: false,
      deferCount: draft.deferCount ?? 0,
    };

    this.triggers.push(trigger);
    this.emit({ type: "added", trigger });
    return trigger;
  }

  get(id: string): Trigger | undefined {
    return this.triggers.find((t) => t.id === id);
  }

  idAt(index: number): string {
    const trigger = Number.isInteger(index) ? this.triggers[index] : undefined;
    if (!trigger) {
      throw new OutOfRangeError(index, this.triggers.length);
    }
    return trigger.id;
  }

  toggleEnabled(index: number): Trigger {
    return this.toggleEnabledById(this.idAt(index));
  }

  toggleEnabledById(id: string): Trigger {
    const current = this.require(id);
    return this.update(id, { enabled: !current.enabled });
  }

  remove(index: number): Trigger {
    return this.removeById(this.idAt(index));
  }

  removeById(id: string): Trigger {
    const position = this.triggers.findIndex((t) => t.id === id);
    if (position === -1) {
      throw new TriggerNotFoundError(id);
    }

    const [removed] = this.triggers.splice(position, 1);
    this.emit({ type: "removed", trigger: removed });
    return removed;
  }

  update(id: string, patch: TriggerStatePatch): Trigger {
    const position = this.triggers.findIndex((t) => t.id === id);
    if (position === -1) {
      throw new TriggerNotFoundError(id);
    }

    const updated: Trigger = { ...this.triggers[position], ...patch };
    this.triggers[position] = updated;
    this.emit({ type: "updated", trigger: updated });
    return updated;
  }

  /** Lazy (ordinal, trigger) pairs in insertion order; ordinals start at 1. */
  list(): Iterable<ListedTrigger> {
    const triggers = this.triggers;
    return {
      *[Symbol.iterator]() {
        for (let i = 0; i < triggers.length; i++) {
          yield { ordinal: i + 1, trigger: triggers[i] };
        }
      },
    };
  }

  snapshot(): readonly Trigger[] {
    return [...this.triggers];
  }

  private require(id: string): Trigger {
    const trigger = this.get(id);
    if (!trigger) {
      throw new TriggerNotFoundError(id);
    }
    return trigger;
  }

  private emit(change: TriggerChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}

export function defaultLabel(draft: Pick<TriggerDraft, "fireTime">): string {
  return `Alarm at ${formatTime(draft.fireTime)}`;
}

function resolveLabel(draft: TriggerDraft): string {
  const label = draft.label?.trim();
  return label && label.length > 0 ? label : defaultLabel(draft);
}
