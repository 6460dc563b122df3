import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { logger } from "./logger.js";

let _resolvedHome: string | null = null;

function resolveAlarmHome(): string {
  if (!_resolvedHome) {
    _resolvedHome = process.env.ALARM_HOME ?? path.join(os.homedir(), "alarm-scheduler");
    logger.debug({ alarmHome: _resolvedHome }, "ALARM_HOME resolved");
  }
  return _resolvedHome;
}

export function getAlarmHome(): string {
  return resolveAlarmHome();
}

export function getDefaultToneDir(): string {
  return path.join(resolveAlarmHome(), "alarm_tones");
}

export function getDefaultDatabasePath(): string {
  return path.join(resolveAlarmHome(), "alarms.db");
}

export function getSettingsPath(): string {
  return path.join(resolveAlarmHome(), "alarm.config.yaml");
}

export function ensureAlarmDirectories(dirs: readonly string[]): void {
  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info({ dir }, "Created alarm directory");
    }
  }
}
