import { addMinutes } from "./timeOfDay.js";
import type { Trigger } from "./types.js";

/**
 * Follow-up trigger for a deferred ("snoozed") firing. Pure: the result
 * depends only on the firing trigger and `now`.
 */
export function computeDeferral(trigger: Trigger, now: Date): Trigger {
  const deferCount = trigger.deferCount + 1;
  const originId = trigger.originId ?? trigger.id;

  return {
    ...trigger,
    id: `${originId}:snooze-${String(deferCount)}`,
    originId,
    fireTime: addMinutes(now, trigger.deferDuration),
    label: `${trigger.label} (Snooze ${String(deferCount)})`,
    deferred: false,
    deferCount,
  };
}

export function originOf(trigger: Trigger): string {
  return trigger.originId ?? trigger.id;
}
