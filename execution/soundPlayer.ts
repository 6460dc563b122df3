import { execFile } from "node:child_process";
import fs from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import { promisify } from "node:util";
import { logger } from "../config/logger.js";
import type { SoundPlayerMode } from "../config/settings.js";
import { PlaybackError } from "../orchestration/errors.js";

const execFileAsync = promisify(execFile);

const PLAYBACK_TIMEOUT_MS = 60_000;
const SIMULATED_BEEPS = 5;
const SIMULATED_PAUSE_MS = 500;
export const SIMULATED_CUE_LINE = "♪ BEEP BEEP BEEP ♪";

export type PlaybackResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: PlaybackError };

export interface SoundPlayer {
  play(resourceRef: string, signal?: AbortSignal): Promise<PlaybackResult>;
}

export interface PlayerCommand {
  readonly command: string;
  readonly args: (resourceRef: string) => readonly string[];
}

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { readonly signal?: AbortSignal; readonly timeout: number },
) => Promise<unknown>;

export interface CommandSoundPlayerOptions {
  readonly platform?: NodeJS.Platform;
  readonly execFile?: ExecFileFn;
  readonly fileExists?: (resourceRef: string) => boolean;
  readonly timeoutMs?: number;
}

export function playerCommandsFor(platform: NodeJS.Platform): readonly PlayerCommand[] {
  switch (platform) {
    case "darwin":
      return [{ command: "afplay", args: (ref) => [ref] }];
    case "win32":
      return [
        {
          command: "powershell",
          args: (ref) => [
            "-NoProfile",
            "-Command",
            `(New-Object Media.SoundPlayer '${ref.replaceAll("'", "''")}').PlaySync()`,
          ],
        },
      ];
    default:
      return [
        { command: "paplay", args: (ref) => [ref] },
        { command: "aplay", args: (ref) => ["-q", ref] },
        {
          command: "ffplay",
          args: (ref) => ["-nodisp", "-autoexit", "-loglevel", "quiet", ref],
        },
      ];
  }
}

const defaultExecFile: ExecFileFn = (file, args, options) =>
  execFileAsync(file, [...args], { signal: options.signal, timeout: options.timeout });

/** Plays tones through the first system audio command that is installed. */
export function createCommandSoundPlayer(options?: CommandSoundPlayerOptions): SoundPlayer {
  const commands = playerCommandsFor(options?.platform ?? process.platform);
  const run = options?.execFile ?? defaultExecFile;
  const fileExists = options?.fileExists ?? ((ref: string) => fs.existsSync(ref));
  const timeout = options?.timeoutMs ?? PLAYBACK_TIMEOUT_MS;
  const missingCommands = new Set<string>();

  return {
    async play(resourceRef, signal) {
      if (!fileExists(resourceRef)) {
        return failure(`Tone file not found: ${resourceRef}`, resourceRef);
      }

      for (const player of commands) {
        if (missingCommands.has(player.command)) continue;

        try {
          await run(player.command, player.args(resourceRef), { signal, timeout });
          return { ok: true };
        } catch (error) {
          if (signal?.aborted) {
            return { ok: true };
          }
          if (isMissingCommand(error)) {
            missingCommands.add(player.command);
            logger.debug({ command: player.command }, "Audio command not available");
            continue;
          }
          const message = error instanceof Error ? error.message : String(error);
          return failure(`${player.command} failed: ${message}`, resourceRef);
        }
      }

      return failure("No audio player command available", resourceRef);
    },
  };
}

export interface SimulatedSoundPlayerOptions {
  readonly write?: (line: string) => void;
  readonly beeps?: number;
  readonly pauseMs?: number;
}

/** Text cue used when real audio is unavailable. */
export function createSimulatedSoundPlayer(options?: SimulatedSoundPlayerOptions): SoundPlayer {
  const write = options?.write ?? ((line: string) => process.stdout.write(`${line}\n`));
  const beeps = options?.beeps ?? SIMULATED_BEEPS;
  const pauseMs = options?.pauseMs ?? SIMULATED_PAUSE_MS;

  return {
    async play(_resourceRef, signal) {
      for (let i = 0; i < beeps; i++) {
        if (signal?.aborted) break;
        write(SIMULATED_CUE_LINE);
        if (i === beeps - 1) break;

        try {
          await sleep(pauseMs, undefined, { signal });
        } catch {
          break;
        }
      }
      return { ok: true };
    },
  };
}

export function createSoundPlayer(mode: SoundPlayerMode): SoundPlayer {
  return mode === "simulated" ? createSimulatedSoundPlayer() : createCommandSoundPlayer();
}

function failure(message: string, resourceRef: string): PlaybackResult {
  return { ok: false, error: new PlaybackError(message, resourceRef) };
}

function isMissingCommand(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
