import fs from "node:fs";
import path from "node:path";
import { logger } from "../config/logger.js";
import { ResourceError } from "../orchestration/errors.js";

export interface TonePreset {
  readonly choice: string;
  readonly name: string;
  readonly fileName: string;
}

export const TONE_PRESETS: readonly TonePreset[] = [
  { choice: "1", name: "Default Beep", fileName: "beep.wav" },
  { choice: "2", name: "Bell Sound", fileName: "bell.wav" },
  { choice: "3", name: "Chime", fileName: "chime.wav" },
  { choice: "4", name: "Buzzer", fileName: "buzzer.wav" },
];

export const CUSTOM_TONE_CHOICE = "5";
export const DEFAULT_TONE_CHOICE = "1";
export const ALLOWED_TONE_EXTENSIONS: readonly string[] = [".wav", ".mp3", ".ogg", ".m4a"];

/** Creates the tone directory and a placeholder for every missing preset file. */
export function ensureDefaultTones(toneDir: string): readonly string[] {
  if (!fs.existsSync(toneDir)) {
    fs.mkdirSync(toneDir, { recursive: true });
    logger.info({ toneDir }, "Created tone directory");
  }

  const created: string[] = [];
  for (const preset of TONE_PRESETS) {
    const tonePath = path.join(toneDir, preset.fileName);
    if (!fs.existsSync(tonePath)) {
      fs.writeFileSync(tonePath, `Placeholder for ${preset.fileName}`, "utf-8");
      created.push(tonePath);
    }
  }

  if (created.length > 0) {
    logger.debug({ count: created.length }, "Placeholder tones written");
  }
  return created;
}

export function findPreset(choice: string): TonePreset | undefined {
  return TONE_PRESETS.find((preset) => preset.choice === choice.trim());
}

export function resolvePresetTone(toneDir: string, choice: string): string {
  const preset = findPreset(choice);
  if (!preset) {
    throw new ResourceError(`Unknown tone preset: ${choice}`, toneDir);
  }
  return path.join(toneDir, preset.fileName);
}

export function defaultTonePath(toneDir: string): string {
  return resolvePresetTone(toneDir, DEFAULT_TONE_CHOICE);
}

export function hasAllowedToneExtension(filePath: string): boolean {
  return ALLOWED_TONE_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/** Returns the path unchanged when it names an existing audio file. */
export function validateCustomTone(filePath: string): string {
  const trimmed = filePath.trim();

  if (trimmed.length === 0 || !fs.existsSync(trimmed)) {
    throw new ResourceError("File not found. Please check the path.", trimmed, "missing");
  }
  if (!hasAllowedToneExtension(trimmed)) {
    throw new ResourceError(
      `Please select a valid audio file (${ALLOWED_TONE_EXTENSIONS.join(", ")})`,
      trimmed,
    );
  }
  return trimmed;
}
