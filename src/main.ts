#!/usr/bin/env node
import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../config/logger.js";
import { ensureAlarmDirectories } from "../config/paths.js";
import { loadSettings } from "../config/settings.js";
import type { AlarmSettings } from "../config/settings.js";
import { createSimulatedSoundPlayer, createSoundPlayer } from "../execution/soundPlayer.js";
import { ensureDefaultTones } from "../execution/toneLibrary.js";
import { runAlarmMenu } from "../interfaces/alarmMenu.js";
import { ConsolePrompter } from "../interfaces/consolePrompter.js";
import { createConsoleDecisionSource } from "../interfaces/decisionPrompt.js";
import { formatFiringBanner, formatOutcome } from "../interfaces/formatters.js";
import { AlarmService } from "../orchestration/alarmService.js";
import { FiringCoordinator } from "../orchestration/firingCoordinator.js";
import { Mutex } from "../orchestration/mutex.js";
import { SchedulerLoop } from "../orchestration/scheduler.js";
import { TriggerStore } from "../orchestration/triggerStore.js";
import { openDatabase } from "../state/db.js";
import { attachTriggerPersistence, restoreTriggers } from "../state/triggers.js";

interface Runtime {
  readonly settings: AlarmSettings;
  readonly db: BetterSqlite3.Database;
  readonly prompter: ConsolePrompter;
  readonly service: AlarmService;
}

function bootstrap(): Runtime {
  const settings = loadSettings();
  ensureAlarmDirectories([settings.toneDir]);
  ensureDefaultTones(settings.toneDir);

  const db = openDatabase(settings.databasePath);
  const mutex = new Mutex();
  const store = new TriggerStore();
  restoreTriggers(db, store);
  attachTriggerPersistence(db, store);

  const prompter: ConsolePrompter = new ConsolePrompter({
    onInterrupt: () => {
      prompter.write("\n\n🛑 Program interrupted by user.\n");
      prompter.close();
    },
  });

  const coordinator = new FiringCoordinator({
    store,
    mutex,
    soundPlayer: createSoundPlayer(settings.soundPlayer),
    fallbackPlayer: createSimulatedSoundPlayer(),
    decisions: createConsoleDecisionSource(prompter),
    responseTimeoutMs: settings.responseTimeoutMs,
    onFiring: (trigger) => prompter.write(formatFiringBanner(trigger)),
  });

  const scheduler = new SchedulerLoop({
    store,
    coordinator,
    mutex,
    intervalMs: settings.scanIntervalMs,
    onOutcome: (outcome) => prompter.write(`${formatOutcome(outcome)}\n`),
  });

  const service = new AlarmService({ store, scheduler, mutex });
  return { settings, db, prompter, service };
}

logger.info("alarm-scheduler initializing...");

let runtime: Runtime;
try {
  runtime = bootstrap();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  logger.fatal({ error: message }, "Initialization failed");
  process.stderr.write(`❌ Fatal error: ${message}\nPlease restart the program.\n`);
  process.exit(1);
}

const { settings, db, prompter, service } = runtime;
process.once("SIGTERM", () => prompter.close());

try {
  prompter.write("🔔 Welcome to Advanced Alarm Clock!\nSetting up alarm monitoring...\n");
  service.start();
  prompter.write("✅ Alarm monitoring started.\n");

  await runAlarmMenu({
    service,
    prompter,
    toneDir: settings.toneDir,
    defaultDeferMinutes: settings.defaultDeferMinutes,
  });
} finally {
  await service.setRunning(false);
  prompter.close();
  db.close();
  logger.info("alarm-scheduler stopped");
}
