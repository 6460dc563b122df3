import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { getDefaultDatabasePath, getDefaultToneDir } from "./paths.js";
import { loadSettings, validateSettings, SettingsValidationError } from "./settings.js";

describe("validateSettings", () => {
  it("should fall back to defaults for an empty object", () => {
    const settings = validateSettings({});

    assert.deepEqual(settings, {
      scanIntervalMs: 30_000,
      responseTimeoutMs: 30_000,
      defaultDeferMinutes: 5,
      toneDir: getDefaultToneDir(),
      databasePath: getDefaultDatabasePath(),
      soundPlayer: "system",
    });
  });

  it("should treat null as an empty settings file", () => {
    assert.equal(validateSettings(null).scanIntervalMs, 30_000);
  });

  it("should convert seconds to milliseconds", () => {
    const settings = validateSettings({ scan_interval_seconds: 10, response_timeout_seconds: 45 });

    assert.equal(settings.scanIntervalMs, 10_000);
    assert.equal(settings.responseTimeoutMs, 45_000);
  });

  it("should accept camelCase keys as alternative", () => {
    const settings = validateSettings({
      scanIntervalSeconds: 5,
      defaultDeferMinutes: 15,
      toneDir: "/tmp/tones",
      soundPlayer: "simulated",
    });

    assert.equal(settings.scanIntervalMs, 5_000);
    assert.equal(settings.defaultDeferMinutes, 15);
    assert.equal(settings.toneDir, "/tmp/tones");
    assert.equal(settings.soundPlayer, "simulated");
  });

  it("should accept numeric strings", () => {
    assert.equal(validateSettings({ default_defer_minutes: " 12 " }).defaultDeferMinutes, 12);
  });

  it("should reject non-positive or fractional intervals", () => {
    for (const value of [0, -5, 1.5, "abc", ""]) {
      assert.throws(
        () => validateSettings({ scan_interval_seconds: value }),
        SettingsValidationError,
      );
    }
  });

  it("should reject a default snooze above 60 minutes", () => {
    assert.throws(
      () => validateSettings({ default_defer_minutes: 61 }),
      /default_defer_minutes must be at most 60/,
    );
  });

  it("should reject an unknown sound player", () => {
    assert.throws(
      () => validateSettings({ sound_player: "loud" }),
      /sound_player must be one of: system, simulated/,
    );
  });

  it("should reject an empty tone directory", () => {
    assert.throws(() => validateSettings({ tone_dir: "  " }), /tone_dir must be a non-empty string/);
  });
});

describe("loadSettings", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  function writeSettings(content: string): string {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "alarm-settings-"));
    const file = path.join(tempDir, "alarm.config.yaml");
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("should read values from the YAML file", () => {
    const file = writeSettings("scan_interval_seconds: 10\nsound_player: simulated\n");

    const settings = loadSettings({ path: file, env: {} });

    assert.equal(settings.scanIntervalMs, 10_000);
    assert.equal(settings.soundPlayer, "simulated");
  });

  it("should let environment variables override the file", () => {
    const file = writeSettings("scan_interval_seconds: 10\ntone_dir: /from/file\n");

    const settings = loadSettings({
      path: file,
      env: { ALARM_SCAN_INTERVAL_SECONDS: "15", ALARM_TONE_DIR: "/from/env" },
    });

    assert.equal(settings.scanIntervalMs, 15_000);
    assert.equal(settings.toneDir, "/from/env");
  });

  it("should ignore blank environment values", () => {
    const file = writeSettings("default_defer_minutes: 7\n");

    const settings = loadSettings({ path: file, env: { ALARM_DEFAULT_DEFER_MINUTES: "  " } });

    assert.equal(settings.defaultDeferMinutes, 7);
  });

  it("should use defaults when the file does not exist", () => {
    const settings = loadSettings({ path: "/nonexistent/alarm.config.yaml", env: {} });

    assert.equal(settings.responseTimeoutMs, 30_000);
  });

  it("should reject a file that is not a mapping", () => {
    const file = writeSettings("- 1\n- 2\n");

    assert.throws(() => loadSettings({ path: file, env: {} }), SettingsValidationError);
  });
});
