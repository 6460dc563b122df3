export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export interface Trigger {
  readonly id: string;
  readonly originId?: string;
  readonly fireTime: TimeOfDay;
  readonly toneRef: string;
  readonly deferDuration: number;
  readonly label: string;
  readonly enabled: boolean;
  readonly deferred: boolean;
  readonly deferCount: number;
}

export interface TriggerDraft {
  readonly fireTime: TimeOfDay;
  readonly toneRef: string;
  readonly deferDuration: number;
  readonly label?: string;
  readonly enabled?: boolean;
  readonly deferCount?: number;
  readonly id?: string;
}

export type TriggerStatePatch = Partial<Pick<Trigger, "enabled" | "deferred" | "deferCount">>;

export interface ListedTrigger {
  readonly ordinal: number;
  readonly trigger: Trigger;
}

export type TriggerChange =
  | { readonly type: "added"; readonly trigger: Trigger }
  | { readonly type: "updated"; readonly trigger: Trigger }
  | { readonly type: "removed"; readonly trigger: Trigger };

export type Decision = "dismiss" | "defer" | "interrupt";

export type DecisionReason = "response" | "timeout" | "interrupt" | "error";

export interface DecisionSource {
  requestDecision(trigger: Trigger, signal: AbortSignal): Promise<Decision>;
}

export type FiringOutcome =
  | {
      readonly kind: "dismissed";
      readonly trigger: Trigger;
      readonly reason: DecisionReason;
    }
  | {
      readonly kind: "deferred";
      readonly trigger: Trigger;
      readonly reason: DecisionReason;
      readonly next: Trigger;
    };

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
