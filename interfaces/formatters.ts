import path from "node:path";
import { formatTime, timeOfDayOf } from "../orchestration/timeOfDay.js";
import type { FiringOutcome, ListedTrigger, Trigger } from "../orchestration/types.js";

const RULE = "=".repeat(50);
const SEPARATOR = "-".repeat(40);

export function formatHeading(title: string): string {
  return `\n${RULE}\n           ${title}\n${RULE}\n`;
}

export function formatClock(date: Date): string {
  const seconds = String(date.getSeconds()).padStart(2, "0");
  return `${formatTime(timeOfDayOf(date))}:${seconds}`;
}

export function formatMenu(now: Date, activeCount: number): string {
  return [
    formatHeading("ALARM CLOCK MENU").trimEnd(),
    "1. Set New Alarm",
    "2. View All Alarms",
    "3. Manage Alarms",
    "4. Help",
    "5. Exit",
    RULE,
    `Current Time: ${formatClock(now)}`,
    `Active Alarms: ${String(activeCount)}`,
    "",
  ].join("\n");
}

export function formatTriggerEntry({ ordinal, trigger }: ListedTrigger): string {
  const status = trigger.enabled ? "✅ ENABLED" : "❌ DISABLED";
  const snoozeInfo = trigger.deferred ? ` (Snoozed ${String(trigger.deferCount)}x)` : "";

  return [
    `${String(ordinal)}. ${trigger.label}`,
    `   Time: ${formatTime(trigger.fireTime)} | Status: ${status}${snoozeInfo}`,
    `   Tone: ${path.basename(trigger.toneRef)}`,
    `   Snooze: ${String(trigger.deferDuration)} minutes`,
    SEPARATOR,
  ].join("\n");
}

export function formatTriggerList(listed: readonly ListedTrigger[]): string {
  if (listed.length === 0) {
    return "No alarms set. Use option 1 to set an alarm.";
  }
  return listed.map(formatTriggerEntry).join("\n");
}

export function formatTriggerSummary(trigger: Trigger): string {
  return [
    "",
    "✅ Alarm set successfully!",
    `   Time: ${formatTime(trigger.fireTime)}`,
    `   Tone: ${trigger.toneRef}`,
    `   Snooze: ${String(trigger.deferDuration)} minutes`,
    `   Label: ${trigger.label}`,
  ].join("\n");
}

export function formatFiringBanner(trigger: Trigger): string {
  return `\n🚨 ALARM RINGING: ${trigger.label} 🚨\nTime: ${formatTime(trigger.fireTime)}\n`;
}

export function formatOutcome(outcome: FiringOutcome): string {
  if (outcome.kind === "dismissed") {
    return outcome.reason === "interrupt"
      ? "\n✅ Alarm dismissed via keyboard interrupt."
      : "✅ Alarm dismissed.";
  }

  const lead = outcome.reason === "timeout" ? "\n⌛ No response. " : "";
  return [
    `${lead}😴 Alarm snoozed for ${String(outcome.trigger.deferDuration)} minutes.`,
    `   Snooze count: ${String(outcome.next.deferCount)}`,
    `   Next ring: ${formatTime(outcome.next.fireTime)}`,
  ].join("\n");
}

export const HELP_TEXT = `
===============================================
            ALARM CLOCK HELP
===============================================

🔹 SETTING ALARMS:
• Use 24-hour format (e.g., 14:30 for 2:30 PM)
• Choose from 4 default tones or use a custom audio file
• Set custom snooze duration (1-60 minutes)
• Add descriptive labels for easy identification

🔹 ALARM TONES:
• Default tones are stored in the tone directory (ALARM_TONE_DIR)
• Supported custom formats: .wav, .mp3, .ogg, .m4a
• Without a working audio player a text cue is shown instead

🔹 SNOOZE FEATURE:
• Snooze postpones the alarm by its snooze duration
• Tracks snooze count for each alarm
• Auto-snooze when there is no response before the deadline

🔹 ALARM MANAGEMENT:
• View all alarms with their status
• Enable/disable alarms without deleting
• Delete alarms you no longer need

🔹 KEYBOARD SHORTCUTS:
• Ctrl+C while an alarm rings: dismiss it
• Ctrl+C at the menu: exit
• Enter while an alarm rings: quick snooze

===============================================
`;
