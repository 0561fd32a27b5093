/**
 * Microphone capture through a command-line recorder (sox, ffmpeg or arecord).
 *
 * Node has no OS permission prompt, so permission is always reported as granted;
 * a missing recorder surfaces when capture starts.
 */

import { type ChildProcess, spawn } from "node:child_process";
import { getLogger, type RuntimeLogger } from "@murmur/shared";
import { RecordingFailedError } from "../errors";
import type { PcmFormat } from "../types";
import { findExecutable } from "./executables";
import type {
  CaptureDevice,
  CaptureSession,
  CaptureStartOptions,
  MicrophonePermission,
} from "./IAudioDevices";

const STOP_GRACE_MS = 2000;

export interface RecorderCommand {
  command: string;
  args: string[];
}

export interface SoxCaptureDeviceOptions {
  logger?: RuntimeLogger;
  /** Executable lookup, PATH scan by default */
  findExecutable?: (name: string) => string | null;
  platform?: NodeJS.Platform;
}

/**
 * Recorder command line for the first available tool, or null when none is installed.
 */
export function resolveCaptureCommand(
  format: PcmFormat,
  filePath: string,
  find: (name: string) => string | null = findExecutable,
  platform: NodeJS.Platform = process.platform
): RecorderCommand | null {
  const rate = String(format.sampleRate);
  const channels = String(format.channels);
  const bits = String(format.bitDepth);

  const sox = find("sox");
  if (sox) {
    return {
      command: sox,
      args: ["-q", "-d", "-c", channels, "-r", rate, "-b", bits, "-e", "signed-integer", filePath],
    };
  }

  const ffmpeg = find("ffmpeg");
  if (ffmpeg) {
    const codecArgs = ["-ac", channels, "-ar", rate, "-acodec", `pcm_s${bits}le`, filePath];
    if (platform === "darwin") {
      return {
        command: ffmpeg,
        args: ["-y", "-loglevel", "error", "-f", "avfoundation", "-i", ":0", ...codecArgs],
      };
    }
    if (platform === "linux") {
      return {
        command: ffmpeg,
        args: ["-y", "-loglevel", "error", "-f", "alsa", "-i", "default", ...codecArgs],
      };
    }
  }

  const arecord = find("arecord");
  if (arecord) {
    return {
      command: arecord,
      args: ["-q", "-f", `S${bits}_LE`, "-r", rate, "-c", channels, "-t", "wav", filePath],
    };
  }

  return null;
}

class ProcessCaptureSession implements CaptureSession {
  private stoppedIntentionally = false;
  private exited = false;
  private readonly closed: Promise<void>;

  constructor(
    private readonly child: ChildProcess,
    private readonly logger: RuntimeLogger,
    onEncodeError: (error: Error) => void
  ) {
    this.closed = new Promise((resolve) => {
      child.once("close", (code, signal) => {
        this.exited = true;
        resolve();
        if (!this.stoppedIntentionally && code !== 0) {
          const reason = code === null ? `signal ${signal ?? "unknown"}` : `code ${code}`;
          this.logger.warn("Recorder exited unexpectedly", { reason });
          onEncodeError(new Error(`Audio recorder exited with ${reason}.`));
        }
      });
    });
    child.on("error", (error) => {
      if (!this.stoppedIntentionally) {
        this.logger.error("Recorder process error", error);
        onEncodeError(error);
      }
    });
  }

  async stop(): Promise<void> {
    this.stoppedIntentionally = true;
    if (this.exited) {
      return;
    }
    // SIGINT lets the recorder flush its buffers and finalize the header
    this.child.kill("SIGINT");
    const forceKill = setTimeout(() => {
      this.logger.warn("Recorder did not stop in time, killing");
      this.child.kill("SIGKILL");
    }, STOP_GRACE_MS);
    try {
      await this.closed;
    } finally {
      clearTimeout(forceKill);
    }
  }
}

export class SoxCaptureDevice implements CaptureDevice {
  private readonly logger: RuntimeLogger;
  private readonly find: (name: string) => string | null;
  private readonly platform: NodeJS.Platform;

  constructor(options: SoxCaptureDeviceOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child({ module: "capture" });
    this.find = options.findExecutable ?? ((name) => findExecutable(name));
    this.platform = options.platform ?? process.platform;
  }

  async permissionStatus(): Promise<MicrophonePermission> {
    return "granted";
  }

  async requestPermission(): Promise<boolean> {
    return true;
  }

  async start(options: CaptureStartOptions): Promise<CaptureSession> {
    const recorder = resolveCaptureCommand(options.format, options.filePath, this.find, this.platform);
    if (!recorder) {
      throw new RecordingFailedError("No supported audio recorder found. Install sox or ffmpeg.");
    }

    const child = spawn(recorder.command, recorder.args, { stdio: "ignore" });
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(new RecordingFailedError(`Failed to start audio recorder: ${error.message}`, { cause: error }));
      };
      child.once("error", onError);
      child.once("spawn", () => {
        child.off("error", onError);
        resolve();
      });
    });

    this.logger.debug("Capture started", { command: recorder.command, filePath: options.filePath });
    return new ProcessCaptureSession(child, this.logger, options.onEncodeError);
  }
}
