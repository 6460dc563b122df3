import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { logger } from "./logger.js";
import { getDefaultDatabasePath, getDefaultToneDir, getSettingsPath } from "./paths.js";

export type SoundPlayerMode = "system" | "simulated";

export interface AlarmSettings {
  readonly scanIntervalMs: number;
  readonly responseTimeoutMs: number;
  readonly defaultDeferMinutes: number;
  readonly toneDir: string;
  readonly databasePath: string;
  readonly soundPlayer: SoundPlayerMode;
}

export interface LoadSettingsOptions {
  readonly path?: string;
  readonly env?: NodeJS.ProcessEnv;
}

const DEFAULT_SCAN_INTERVAL_SECONDS = 30;
const DEFAULT_RESPONSE_TIMEOUT_SECONDS = 30;
const DEFAULT_DEFER_MINUTES = 5;
const MAX_DEFER_MINUTES = 60;

const VALID_SOUND_PLAYERS: readonly SoundPlayerMode[] = ["system", "simulated"];

const ENV_OVERRIDES: ReadonlyArray<readonly [string, string]> = [
  ["ALARM_SCAN_INTERVAL_SECONDS", "scan_interval_seconds"],
  ["ALARM_RESPONSE_TIMEOUT_SECONDS", "response_timeout_seconds"],
  ["ALARM_DEFAULT_DEFER_MINUTES", "default_defer_minutes"],
  ["ALARM_TONE_DIR", "tone_dir"],
  ["ALARM_DB_PATH", "database_path"],
  ["ALARM_SOUND_PLAYER", "sound_player"],
];

export function loadSettings(options?: LoadSettingsOptions): AlarmSettings {
  const settingsPath = options?.path ?? getSettingsPath();
  const env = options?.env ?? process.env;

  let fileValues: Record<string, unknown> = {};
  if (fs.existsSync(settingsPath)) {
    const raw = fs.readFileSync(settingsPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    if (parsed !== null && parsed !== undefined) {
      if (typeof parsed !== "object" || Array.isArray(parsed)) {
        throw new SettingsValidationError(`Settings file must contain a mapping: ${settingsPath}`);
      }
      fileValues = parsed as Record<string, unknown>;
    }
    logger.info({ settingsPath }, "Settings file loaded");
  }

  const merged: Record<string, unknown> = { ...fileValues };
  for (const [envName, key] of ENV_OVERRIDES) {
    const value = env[envName];
    if (value !== undefined && value.trim().length > 0) {
      merged[key] = value;
    }
  }

  return validateSettings(merged);
}

export function validateSettings(raw: unknown): AlarmSettings {
  if (raw === null || raw === undefined) {
    return validateSettings({});
  }
  if (typeof raw !== "object") {
    throw new SettingsValidationError("Settings must be an object");
  }

  const record = raw as Record<string, unknown>;

  const scanIntervalSeconds = validatePositiveInteger(
    record["scan_interval_seconds"] ?? record["scanIntervalSeconds"],
    "scan_interval_seconds",
    DEFAULT_SCAN_INTERVAL_SECONDS,
  );
  const responseTimeoutSeconds = validatePositiveInteger(
    record["response_timeout_seconds"] ?? record["responseTimeoutSeconds"],
    "response_timeout_seconds",
    DEFAULT_RESPONSE_TIMEOUT_SECONDS,
  );
  const defaultDeferMinutes = validatePositiveInteger(
    record["default_defer_minutes"] ?? record["defaultDeferMinutes"],
    "default_defer_minutes",
    DEFAULT_DEFER_MINUTES,
  );
  if (defaultDeferMinutes > MAX_DEFER_MINUTES) {
    throw new SettingsValidationError(
      `default_defer_minutes must be at most ${String(MAX_DEFER_MINUTES)}. Got: ${String(defaultDeferMinutes)}`,
    );
  }

  return {
    scanIntervalMs: scanIntervalSeconds * 1000,
    responseTimeoutMs: responseTimeoutSeconds * 1000,
    defaultDeferMinutes,
    toneDir: validatePath(record["tone_dir"] ?? record["toneDir"], "tone_dir", getDefaultToneDir),
    databasePath: validatePath(
      record["database_path"] ?? record["databasePath"],
      "database_path",
      getDefaultDatabasePath,
    ),
    soundPlayer: validateSoundPlayer(record["sound_player"] ?? record["soundPlayer"]),
  };
}

function validatePositiveInteger(value: unknown, field: string, fallback: number): number {
  if (value === undefined || value === null) return fallback;

  const num = typeof value === "string" ? Number(value.trim()) : value;
  if (typeof num !== "number" || !Number.isInteger(num) || num <= 0) {
    throw new SettingsValidationError(
      `${field} must be a positive integer. Got: "${String(value)}"`,
    );
  }
  return num;
}

function validatePath(value: unknown, field: string, fallback: () => string): string {
  if (value === undefined || value === null) return fallback();
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new SettingsValidationError(`${field} must be a non-empty string`);
  }
  return value.trim();
}

function validateSoundPlayer(value: unknown): SoundPlayerMode {
  if (value === undefined || value === null) {
    return "system";
  }
  const mode = VALID_SOUND_PLAYERS.find((candidate) => candidate === value);
  if (!mode) {
    throw new SettingsValidationError(
      `sound_player must be one of: ${VALID_SOUND_PLAYERS.join(", ")}. Got: "${String(value)}"`,
    );
  }
  return mode;
}

export class SettingsValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsValidationError";
  }
}
