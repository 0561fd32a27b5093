/**
 * Clip playback through a command-line player (afplay, ffplay, paplay or aplay).
 *
 * Each clip is written to a temp file and played by its own child process.
 * Pause and resume suspend the process with SIGSTOP/SIGCONT.
 */

import { type ChildProcess, spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import { rmSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getLogger, type RuntimeLogger } from "@murmur/shared";
import { PlaybackDecodeError } from "../errors";
import { findExecutable } from "./executables";
import type { ClipEvents, ClipPlayer, PlaybackDevice } from "./IAudioDevices";

export type ClipExtension = "wav" | "mp3" | "aac" | "flac" | "ogg" | "m4a";

function ascii(bytes: Uint8Array, start: number, length: number): string {
  return String.fromCharCode(...bytes.subarray(start, start + length));
}

/**
 * Container type from the clip's leading bytes, or null when unrecognized.
 */
export function detectClipExtension(clip: Uint8Array): ClipExtension | null {
  if (clip.byteLength < 4) {
    return null;
  }
  if (ascii(clip, 0, 4) === "RIFF" && ascii(clip, 8, 4) === "WAVE") {
    return "wav";
  }
  if (ascii(clip, 0, 4) === "fLaC") {
    return "flac";
  }
  if (ascii(clip, 0, 4) === "OggS") {
    return "ogg";
  }
  if (ascii(clip, 4, 4) === "ftyp") {
    return "m4a";
  }
  if (ascii(clip, 0, 3) === "ID3") {
    return "mp3";
  }
  const [first = 0, second = 0] = clip;
  if (first === 0xff) {
    // ADTS (AAC) sync word has layer bits 00; MPEG audio frames do not
    if ((second & 0xf6) === 0xf0) {
      return "aac";
    }
    if ((second & 0xe0) === 0xe0) {
      return "mp3";
    }
  }
  return null;
}

export interface PlayerCommand {
  command: string;
  args: string[];
}

/**
 * Player command line for a clip file, or null when no suitable player is installed.
 */
export function resolvePlayerCommand(
  filePath: string,
  extension: ClipExtension,
  find: (name: string) => string | null = findExecutable,
  platform: NodeJS.Platform = process.platform
): PlayerCommand | null {
  if (platform === "darwin") {
    const afplay = find("afplay");
    if (afplay && extension !== "ogg") {
      return { command: afplay, args: [filePath] };
    }
  }

  const ffplay = find("ffplay");
  if (ffplay) {
    return { command: ffplay, args: ["-nodisp", "-autoexit", "-loglevel", "error", filePath] };
  }

  if (extension === "wav") {
    const paplay = find("paplay");
    if (paplay) {
      return { command: paplay, args: [filePath] };
    }
    const aplay = find("aplay");
    if (aplay) {
      return { command: aplay, args: ["-q", filePath] };
    }
  }

  return null;
}

class ProcessClipPlayer implements ClipPlayer {
  private child: ChildProcess | null = null;
  private paused = false;
  private released = false;

  constructor(
    private readonly player: PlayerCommand,
    private readonly filePath: string,
    private readonly events: ClipEvents,
    private readonly logger: RuntimeLogger
  ) {}

  play(): void {
    if (this.child || this.released) {
      return;
    }
    const child = spawn(this.player.command, this.player.args, { stdio: "ignore" });
    this.child = child;

    child.once("error", (error) => {
      if (this.released) {
        return;
      }
      this.finish();
      this.events.onDecodeError(
        new PlaybackDecodeError(`Failed to start audio player: ${error.message}`, { cause: error })
      );
    });
    child.once("close", (code, signal) => {
      if (this.released) {
        return;
      }
      this.finish();
      if (code === 0) {
        this.events.onFinished();
        return;
      }
      const reason = code === null ? `signal ${signal ?? "unknown"}` : `code ${code}`;
      this.logger.warn("Player exited unexpectedly", { reason });
      this.events.onDecodeError(new PlaybackDecodeError(`Audio player exited with ${reason}.`));
    });
  }

  pause(): void {
    if (this.child && !this.paused && !this.released) {
      this.child.kill("SIGSTOP");
      this.paused = true;
    }
  }

  resume(): void {
    if (this.child && this.paused && !this.released) {
      this.child.kill("SIGCONT");
      this.paused = false;
    }
  }

  stop(): void {
    if (this.released) {
      return;
    }
    const child = this.child;
    this.finish();
    if (child && child.exitCode === null) {
      if (this.paused) {
        child.kill("SIGCONT");
      }
      child.kill("SIGTERM");
    }
  }

  isPlaying(): boolean {
    return this.child !== null && !this.paused && !this.released;
  }

  private finish(): void {
    this.released = true;
    rmSync(this.filePath, { force: true });
  }
}

export interface ProcessPlaybackDeviceOptions {
  logger?: RuntimeLogger;
  tempDirectory?: string;
  findExecutable?: (name: string) => string | null;
  platform?: NodeJS.Platform;
}

export class ProcessPlaybackDevice implements PlaybackDevice {
  private readonly logger: RuntimeLogger;
  private readonly tempDirectory: string;
  private readonly find: (name: string) => string | null;
  private readonly platform: NodeJS.Platform;

  constructor(options: ProcessPlaybackDeviceOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child({ module: "playback" });
    this.tempDirectory = options.tempDirectory ?? tmpdir();
    this.find = options.findExecutable ?? ((name) => findExecutable(name));
    this.platform = options.platform ?? process.platform;
  }

  async load(clip: Uint8Array, events: ClipEvents): Promise<ClipPlayer> {
    const extension = detectClipExtension(clip);
    if (!extension) {
      throw new PlaybackDecodeError("Unrecognized audio format.");
    }

    const filePath = join(this.tempDirectory, `murmur_clip_${randomUUID()}.${extension}`);
    const player = resolvePlayerCommand(filePath, extension, this.find, this.platform);
    if (!player) {
      throw new PlaybackDecodeError(`No audio player found for ${extension} clips. Install ffmpeg.`);
    }

    await writeFile(filePath, clip);
    this.logger.debug("Clip loaded", { command: player.command, bytes: clip.byteLength, extension });
    return new ProcessClipPlayer(player, filePath, events, this.logger);
  }
}
