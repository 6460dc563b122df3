import { logger } from "../config/logger.js";
import {
  CUSTOM_TONE_CHOICE,
  TONE_PRESETS,
  defaultTonePath,
  findPreset,
  resolvePresetTone,
  validateCustomTone,
} from "../execution/toneLibrary.js";
import type { AlarmService } from "../orchestration/alarmService.js";
import { OutOfRangeError, ResourceError, ValidationError } from "../orchestration/errors.js";
import { TIME_FORMAT_HINT, parseTime } from "../orchestration/timeOfDay.js";
import { systemClock } from "../orchestration/types.js";
import type { Clock, TimeOfDay } from "../orchestration/types.js";
import { PromptClosedError } from "./consolePrompter.js";
import type { Prompter } from "./consolePrompter.js";
import {
  HELP_TEXT,
  formatHeading,
  formatMenu,
  formatTriggerList,
  formatTriggerSummary,
} from "./formatters.js";

const SNOOZE_PRESETS: Readonly<Record<string, number>> = { "1": 5, "2": 10, "3": 15 };
const CUSTOM_SNOOZE_CHOICE = "4";
const MIN_SNOOZE_MINUTES = 1;
const MAX_SNOOZE_MINUTES = 60;

export interface AlarmMenuOptions {
  readonly service: AlarmService;
  readonly prompter: Prompter;
  readonly toneDir: string;
  readonly defaultDeferMinutes: number;
  readonly clock?: Clock;
}

export interface MenuContext {
  readonly service: AlarmService;
  readonly prompter: Prompter;
  readonly toneDir: string;
  readonly defaultDeferMinutes: number;
  readonly clock: Clock;
}

/** Main menu loop. Returns once the user exits or the input closes. */
export async function runAlarmMenu(options: AlarmMenuOptions): Promise<void> {
  const ctx: MenuContext = { ...options, clock: options.clock ?? systemClock };
  const { service, prompter } = ctx;

  while (service.isRunning) {
    try {
      prompter.write(formatMenu(ctx.clock.now(), await service.activeCount()));
      const choice = (await prompter.ask("\nEnter your choice (1-5): ")).trim();

      switch (choice) {
        case "1":
          await setAlarm(ctx);
          break;
        case "2":
          await viewAlarms(ctx);
          break;
        case "3":
          await manageAlarms(ctx);
          break;
        case "4":
          prompter.write(HELP_TEXT);
          break;
        case "5":
          prompter.write("👋 Goodbye! All alarms have been stopped.\n");
          await service.setRunning(false);
          return;
        default:
          prompter.write("❌ Invalid choice. Please select 1-5.\n");
      }

      await prompter.ask("\nPress Enter to continue...");
    } catch (error) {
      if (error instanceof PromptClosedError) {
        logger.info("Input closed, leaving menu");
        await service.setRunning(false);
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, "Menu action failed");
      prompter.write(`❌ An error occurred: ${message}\nThe program will continue running.\n`);
    }
  }
}

export async function setAlarm(ctx: MenuContext): Promise<void> {
  ctx.prompter.write(formatHeading("SET NEW ALARM"));

  const fireTime = await askTime(ctx.prompter);
  const toneRef = await selectTone(ctx);
  const deferDuration = await selectSnoozeDuration(ctx);
  const label = (await ctx.prompter.ask("Enter alarm label (optional): ")).trim();

  const trigger = await ctx.service.addTrigger({
    fireTime,
    toneRef,
    deferDuration,
    label,
  });
  ctx.prompter.write(`${formatTriggerSummary(trigger)}\n`);
}

export async function askTime(prompter: Prompter): Promise<TimeOfDay> {
  for (;;) {
    const input = await prompter.ask("Enter alarm time (HH:MM in 24-hour format): ");
    try {
      return parseTime(input);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      prompter.write(`❌ ${TIME_FORMAT_HINT}\n`);
    }
  }
}

export async function selectTone(ctx: MenuContext): Promise<string> {
  const lines = TONE_PRESETS.map((preset) => `${preset.choice}. ${preset.name}`);
  ctx.prompter.write(
    `\n📻 Select Alarm Tone:\n${lines.join("\n")}\n${CUSTOM_TONE_CHOICE}. Use Custom Tone\n`,
  );

  for (;;) {
    const choice = (await ctx.prompter.ask("Enter your choice (1-5): ")).trim();

    if (findPreset(choice)) {
      return resolvePresetTone(ctx.toneDir, choice);
    }
    if (choice === CUSTOM_TONE_CHOICE) {
      return selectCustomTone(ctx);
    }
    ctx.prompter.write("❌ Invalid choice. Please select 1-5.\n");
  }
}

export async function selectCustomTone(ctx: MenuContext): Promise<string> {
  for (;;) {
    const filePath = await ctx.prompter.ask(
      "Enter path to custom audio file (.wav, .mp3, .ogg, .m4a): ",
    );

    try {
      const tonePath = validateCustomTone(filePath);
      ctx.prompter.write(`✅ Custom tone selected: ${tonePath}\n`);
      return tonePath;
    } catch (error) {
      if (!(error instanceof ResourceError)) throw error;
      ctx.prompter.write(`❌ ${error.message}\n`);

      if (error.reason === "missing") {
        const useDefault = await ctx.prompter.ask("Use default tone instead? (y/n): ");
        if (useDefault.trim().toLowerCase() === "y") {
          return defaultTonePath(ctx.toneDir);
        }
      }
    }
  }
}

export async function selectSnoozeDuration(ctx: MenuContext): Promise<number> {
  ctx.prompter.write(
    [
      "",
      "⏰ Select Snooze Duration:",
      "1. 5 minutes",
      "2. 10 minutes",
      "3. 15 minutes",
      "4. Custom duration",
      `(press Enter for ${String(ctx.defaultDeferMinutes)} minutes)`,
      "",
    ].join("\n"),
  );

  for (;;) {
    const choice = (await ctx.prompter.ask("Enter your choice (1-4): ")).trim();

    if (choice === "") return ctx.defaultDeferMinutes;
    const preset = SNOOZE_PRESETS[choice];
    if (preset !== undefined) return preset;
    if (choice === CUSTOM_SNOOZE_CHOICE) return askCustomSnooze(ctx.prompter);

    ctx.prompter.write("❌ Invalid choice. Please select 1-4.\n");
  }
}

async function askCustomSnooze(prompter: Prompter): Promise<number> {
  for (;;) {
    const input = await prompter.ask(
      `Enter custom snooze duration (${String(MIN_SNOOZE_MINUTES)}-${String(MAX_SNOOZE_MINUTES)} minutes): `,
    );

    const minutes = parseWholeNumber(input);
    if (minutes === null) {
      prompter.write("❌ Please enter a valid number.\n");
      continue;
    }
    if (minutes < MIN_SNOOZE_MINUTES || minutes > MAX_SNOOZE_MINUTES) {
      prompter.write(
        `❌ Please enter a value between ${String(MIN_SNOOZE_MINUTES)} and ${String(MAX_SNOOZE_MINUTES)} minutes.\n`,
      );
      continue;
    }
    return minutes;
  }
}

export async function viewAlarms(ctx: MenuContext): Promise<number> {
  ctx.prompter.write(formatHeading("YOUR ALARMS"));
  const listed = await ctx.service.listTriggers();
  ctx.prompter.write(`${formatTriggerList(listed)}\n`);
  return listed.length;
}

export async function manageAlarms(ctx: MenuContext): Promise<void> {
  const count = await viewAlarms(ctx);
  if (count === 0) {
    ctx.prompter.write("No alarms to manage. Set an alarm first.\n");
    return;
  }

  ctx.prompter.write("\nAlarm Management:\n1. Enable/Disable Alarm\n2. Delete Alarm\n3. Back to Main Menu\n");
  const choice = (await ctx.prompter.ask("Enter your choice (1-3): ")).trim();

  switch (choice) {
    case "1":
      await toggleAlarm(ctx);
      break;
    case "2":
      await deleteAlarm(ctx);
      break;
    case "3":
      break;
    default:
      ctx.prompter.write("❌ Invalid choice.\n");
  }
}

export async function toggleAlarm(ctx: MenuContext): Promise<void> {
  const ordinal = await askOrdinal(ctx.prompter, "Enter alarm number to toggle: ");
  if (ordinal === null) return;

  try {
    const trigger = await ctx.service.toggle(ordinal);
    const status = trigger.enabled ? "enabled" : "disabled";
    ctx.prompter.write(`✅ Alarm ${String(ordinal)} ${status}.\n`);
  } catch (error) {
    if (!(error instanceof OutOfRangeError)) throw error;
    ctx.prompter.write("❌ Invalid alarm number.\n");
  }
}

export async function deleteAlarm(ctx: MenuContext): Promise<void> {
  const ordinal = await askOrdinal(ctx.prompter, "Enter alarm number to delete: ");
  if (ordinal === null) return;

  try {
    const removed = await ctx.service.remove(ordinal);
    ctx.prompter.write(`✅ Alarm '${removed.label}' deleted.\n`);
  } catch (error) {
    if (!(error instanceof OutOfRangeError)) throw error;
    ctx.prompter.write("❌ Invalid alarm number.\n");
  }
}

async function askOrdinal(prompter: Prompter, question: string): Promise<number | null> {
  const ordinal = parseWholeNumber(await prompter.ask(question));
  if (ordinal === null) {
    prompter.write("❌ Please enter a valid number.\n");
  }
  return ordinal;
}

export function parseWholeNumber(input: string): number | null {
  const trimmed = input.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  return Number(trimmed);
}
