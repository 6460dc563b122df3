import { InterruptSignal } from "../orchestration/errors.js";
import type { Decision, DecisionSource, Trigger } from "../orchestration/types.js";
import type { Prompter } from "./consolePrompter.js";

export const DECISION_QUESTION = "Enter your choice (1-2) or press Enter to snooze: ";
export const INVALID_DECISION_MESSAGE = "❌ Invalid choice. Please enter 1 or 2.\n";

export function parseDecision(input: string): "dismiss" | "defer" | null {
  const normalized = input.trim().toLowerCase();

  if (normalized === "1" || normalized === "dismiss") return "dismiss";
  if (normalized === "2" || normalized === "" || normalized === "snooze") return "defer";
  return null;
}

export function createConsoleDecisionSource(prompter: Prompter): DecisionSource {
  return {
    async requestDecision(trigger: Trigger, signal: AbortSignal): Promise<Decision> {
      for (;;) {
        prompter.write(`\n⏰ Alarm: ${trigger.label}\n1. Dismiss Alarm\n2. Snooze Alarm\n`);

        let answer: string;
        try {
          answer = await prompter.ask(DECISION_QUESTION, { signal, interruptible: true });
        } catch (error) {
          if (error instanceof InterruptSignal) return "interrupt";
          throw error;
        }

        const decision = parseDecision(answer);
        if (decision) return decision;
        prompter.write(INVALID_DECISION_MESSAGE);
      }
    },
  };
}
