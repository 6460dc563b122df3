import { logger } from "../config/logger.js";
import { ensureAlarmDirectories } from "../config/paths.js";
import { loadSettings } from "../config/settings.js";
import { ensureDefaultTones, resolvePresetTone, validateCustomTone } from "../execution/toneLibrary.js";
import { parseTime } from "../orchestration/timeOfDay.js";
import { TriggerStore } from "../orchestration/triggerStore.js";
import { openDatabase } from "../state/db.js";
import { attachTriggerPersistence, loadTriggers } from "../state/triggers.js";

const args = process.argv.slice(2);

function flagValue(name: string): string | undefined {
  const index = args.indexOf(name);
  return index !== -1 && index + 1 < args.length ? args[index + 1] : undefined;
}

const flagValueIndexes = new Set(
  ["--label", "--snooze", "--tone"]
    .map((flag) => args.indexOf(flag))
    .filter((index) => index !== -1)
    .map((index) => index + 1),
);

const timeArg = args.find((arg, idx) => !arg.startsWith("--") && !flagValueIndexes.has(idx));
if (!timeArg) {
  logger.error("Usage: seed-alarm HH:MM [--label text] [--snooze minutes] [--tone 1-4|path]");
  process.exit(1);
}

const settings = loadSettings();
ensureAlarmDirectories([settings.toneDir]);
ensureDefaultTones(settings.toneDir);

const toneArg = flagValue("--tone") ?? "1";
const toneRef = /^[1-4]$/.test(toneArg)
  ? resolvePresetTone(settings.toneDir, toneArg)
  : validateCustomTone(toneArg);
const deferDuration = Number(flagValue("--snooze") ?? String(settings.defaultDeferMinutes));
if (!Number.isInteger(deferDuration) || deferDuration < 1 || deferDuration > 60) {
  logger.error({ snooze: flagValue("--snooze") }, "--snooze must be a whole number of minutes (1-60)");
  process.exit(1);
}

const db = openDatabase(settings.databasePath);

try {
  const store = new TriggerStore();
  attachTriggerPersistence(db, store);

  const trigger = store.add({
    fireTime: parseTime(timeArg),
    toneRef,
    deferDuration,
    label: flagValue("--label"),
  });

  logger.info(
    { id: trigger.id, label: trigger.label, toneRef, deferDuration },
    "Alarm inserted",
  );
  logger.info({ total: loadTriggers(db).length }, "Total stored alarms");
} finally {
  db.close();
}
