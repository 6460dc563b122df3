import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../config/logger.js";
import type { TriggerStore } from "../orchestration/triggerStore.js";
import type { Trigger, TriggerChange, TriggerDraft } from "../orchestration/types.js";

export interface TriggerRow {
  readonly id: string;
  readonly label: string;
  readonly hour: number;
  readonly minute: number;
  readonly tone_ref: string;
  readonly defer_minutes: number;
  readonly enabled: number;
  readonly position: number;
  readonly created_at: string;
  readonly updated_at: string;
}

export function loadTriggers(db: BetterSqlite3.Database): readonly TriggerDraft[] {
  const rows = db
    .prepare("SELECT * FROM triggers ORDER BY position ASC, created_at ASC")
    .all() as TriggerRow[];

  return rows.map((row) => ({
    id: row.id,
    label: row.label,
    fireTime: { hour: row.hour, minute: row.minute },
    toneRef: row.tone_ref,
    deferDuration: row.defer_minutes,
    enabled: row.enabled === 1,
  }));
}

export function insertTrigger(db: BetterSqlite3.Database, trigger: Trigger): void {
  db.prepare(
    `INSERT INTO triggers (id, label, hour, minute, tone_ref, defer_minutes, enabled, position)
     VALUES (?, ?, ?, ?, ?, ?, ?, (SELECT COALESCE(MAX(position), -1) + 1 FROM triggers))`,
  ).run(
    trigger.id,
    trigger.label,
    trigger.fireTime.hour,
    trigger.fireTime.minute,
    trigger.toneRef,
    trigger.deferDuration,
    trigger.enabled ? 1 : 0,
  );
}

export function updateTriggerEnabled(
  db: BetterSqlite3.Database,
  triggerId: string,
  enabled: boolean,
): void {
  db.prepare(
    "UPDATE triggers SET enabled = ?, updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now') WHERE id = ?",
  ).run(enabled ? 1 : 0, triggerId);
}

export function deleteTrigger(db: BetterSqlite3.Database, triggerId: string): boolean {
  const result = db.prepare("DELETE FROM triggers WHERE id = ?").run(triggerId);
  return result.changes > 0;
}

/**
 * Mirrors store changes into SQLite. Deferral instances live outside the
 * store, so they never reach the database.
 */
export function attachTriggerPersistence(db: BetterSqlite3.Database, store: TriggerStore): void {
  store.onChange((change) => {
    try {
      applyChange(db, change);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(
        { triggerId: change.trigger.id, change: change.type, error: message },
        "Failed to persist trigger change",
      );
    }
  });
}

function applyChange(db: BetterSqlite3.Database, change: TriggerChange): void {
  switch (change.type) {
    case "added":
      insertTrigger(db, change.trigger);
      break;
    case "updated":
      updateTriggerEnabled(db, change.trigger.id, change.trigger.enabled);
      break;
    case "removed":
      deleteTrigger(db, change.trigger.id);
      break;
  }
}

export function restoreTriggers(db: BetterSqlite3.Database, store: TriggerStore): number {
  const drafts = loadTriggers(db);
  for (const draft of drafts) {
    store.add(draft);
  }
  logger.info({ count: drafts.length }, "Triggers restored");
  return drafts.length;
}
