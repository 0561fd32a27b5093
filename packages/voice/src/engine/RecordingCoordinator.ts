/**
 * Recording Coordinator
 *
 * Microphone capture into a temporary WAV file, then transcription of that
 * file. The coordinator owns the file and removes it on every exit.
 */

import { randomUUID } from "node:crypto";
import { rmSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getLogger, type RuntimeLogger } from "@murmur/shared";
import type { CaptureDevice, CaptureSession } from "../devices/IAudioDevices";
import {
  PermissionDeniedError,
  RecordingFailedError,
  toVoiceError,
  type VoiceError,
} from "../errors";
import type { SpeechProviderFactory } from "../providers/ISpeechProviders";
import { RECORDING_FORMAT, type RecordingState, type TranscriptionConfig } from "../types";

const DEFAULT_TICK_INTERVAL_MS = 100;
const RECORDING_FILENAME = "recording.wav";
const RECORDING_MIME_TYPE = "audio/wav";

export type RecordingListener = (state: RecordingState, elapsedSeconds: number) => void;

export interface RecordingCoordinatorOptions {
  device: CaptureDevice;
  providers: SpeechProviderFactory;
  /** Directory for recording files, the OS temp directory by default */
  tempDirectory?: string;
  /** Clock in milliseconds */
  now?: () => number;
  tickIntervalMs?: number;
  logger?: RuntimeLogger;
}

export interface StartRecordingOptions {
  /** Receives failures that happen while recording, after the session is cleaned up */
  onError?: (error: VoiceError) => void;
}

interface RecordingSession {
  readonly filePath: string;
  readonly onError?: (error: VoiceError) => void;
  capture: CaptureSession | null;
  ticker: ReturnType<typeof setInterval> | null;
}

const IDLE: RecordingState = { status: "idle" };

export class RecordingCoordinator {
  private readonly device: CaptureDevice;
  private readonly providers: SpeechProviderFactory;
  private readonly tempDirectory: string;
  private readonly now: () => number;
  private readonly tickIntervalMs: number;
  private readonly logger: RuntimeLogger;
  private readonly listeners = new Set<RecordingListener>();

  private session: RecordingSession | null = null;
  private state: RecordingState = IDLE;
  private elapsedSeconds = 0;

  constructor(options: RecordingCoordinatorOptions) {
    this.device = options.device;
    this.providers = options.providers;
    this.tempDirectory = options.tempDirectory ?? tmpdir();
    this.now = options.now ?? Date.now;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.logger = (options.logger ?? getLogger()).child({ module: "recording" });
  }

  getState(): RecordingState {
    return this.state;
  }

  getElapsedSeconds(): number {
    return this.elapsedSeconds;
  }

  /**
   * Listeners are called on every state change and on each elapsed-time tick.
   */
  subscribe(listener: RecordingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Start capturing. A no-op unless idle.
   *
   * @throws PermissionDeniedError when microphone access is denied or restricted
   * @throws RecordingFailedError when the capture device cannot start
   */
  async startRecording(options: StartRecordingOptions = {}): Promise<void> {
    if (this.session || this.state.status !== "idle") {
      return;
    }

    const session: RecordingSession = {
      filePath: join(this.tempDirectory, `murmur_recording_${randomUUID()}.wav`),
      onError: options.onError,
      capture: null,
      ticker: null,
    };
    this.session = session;

    let granted: boolean;
    try {
      granted = await this.ensurePermission();
    } catch (error) {
      this.abandon(session);
      throw new RecordingFailedError("Failed to request microphone access.", { cause: error });
    }
    if (this.session !== session) {
      return;
    }
    if (!granted) {
      this.abandon(session);
      throw new PermissionDeniedError();
    }

    let capture: CaptureSession;
    try {
      capture = await this.device.start({
        filePath: session.filePath,
        format: RECORDING_FORMAT,
        onEncodeError: (error) => {
          this.handleEncodeError(session, error).catch((failure: unknown) => {
            this.logger.error("Encoding failure cleanup failed", { error: String(failure) });
          });
        },
      });
    } catch (error) {
      this.abandon(session);
      throw error instanceof RecordingFailedError
        ? error
        : new RecordingFailedError("Failed to record audio.", { cause: error });
    }

    if (this.session !== session) {
      // Cancelled while the device was starting
      await capture.stop().catch(() => undefined);
      rmSync(session.filePath, { force: true });
      return;
    }

    session.capture = capture;
    const startedAt = this.now();
    this.elapsedSeconds = 0;
    this.setState({ status: "recording", startedAt });
    session.ticker = setInterval(() => {
      this.tick(session, startedAt);
    }, this.tickIntervalMs);
  }

  /**
   * Stop capturing and transcribe the recording. Returns "" unless recording,
   * and "" when the session is cancelled before the transcript arrives.
   */
  async stopAndTranscribe(config: TranscriptionConfig): Promise<string> {
    const session = this.session;
    if (!session || this.state.status !== "recording") {
      return "";
    }

    this.stopTicker(session);
    this.setState({ status: "transcribing" });

    try {
      const audio = await this.finishCapture(session);
      if (this.session !== session) {
        return "";
      }

      const provider = this.providers.createTranscriber(config);
      const upload = {
        audio,
        filename: RECORDING_FILENAME,
        mimeType: RECORDING_MIME_TYPE,
        model: config.model,
        prompt: config.prompt,
        responseFormat: config.responseFormat,
        temperature: config.temperature,
      };
      const text = config.translateToEnglish
        ? await provider.translate(upload)
        : await provider.transcribe({
            ...upload,
            language: config.language,
            timestampGranularities: config.timestampGranularities,
          });

      return this.session === session ? text.trim() : "";
    } catch (error) {
      if (this.session !== session) {
        return "";
      }
      throw toVoiceError(error);
    } finally {
      rmSync(session.filePath, { force: true });
      if (this.session === session) {
        this.session = null;
        this.setState(IDLE);
      }
    }
  }

  /**
   * Stop everything and return to idle from any state. Safe to call repeatedly.
   */
  async cancelAndCleanup(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.elapsedSeconds = 0;
    this.setState(IDLE);
    if (!session) {
      return;
    }

    this.stopTicker(session);
    rmSync(session.filePath, { force: true });
    const capture = session.capture;
    session.capture = null;
    if (capture) {
      // Failures while stopping a discarded capture have no recipient
      await capture.stop().catch(() => undefined);
      // The recorder may flush after the first removal
      rmSync(session.filePath, { force: true });
    }
  }

  private async ensurePermission(): Promise<boolean> {
    const status = await this.device.permissionStatus();
    switch (status) {
      case "granted":
        return true;
      case "undetermined":
        return this.device.requestPermission();
      case "denied":
      case "restricted":
        return false;
    }
  }

  private async finishCapture(session: RecordingSession): Promise<Uint8Array> {
    const capture = session.capture;
    session.capture = null;
    try {
      await capture?.stop();
      return new Uint8Array(await readFile(session.filePath));
    } catch (error) {
      throw new RecordingFailedError("Failed to record audio.", { cause: error });
    }
  }

  private async handleEncodeError(session: RecordingSession, error: Error): Promise<void> {
    if (this.session !== session) {
      return;
    }
    await this.cancelAndCleanup();
    try {
      session.onError?.(new RecordingFailedError("Failed to record audio.", { cause: error }));
    } catch (handlerError) {
      this.logger.warn("Recording error handler failed", { error: String(handlerError) });
    }
  }

  /** Give up on a session that never reached recording */
  private abandon(session: RecordingSession): void {
    rmSync(session.filePath, { force: true });
    if (this.session === session) {
      this.session = null;
      this.setState(IDLE);
    }
  }

  private tick(session: RecordingSession, startedAt: number): void {
    if (this.session !== session || this.state.status !== "recording") {
      return;
    }
    this.elapsedSeconds = Math.max(0, (this.now() - startedAt) / 1000);
    this.notify();
  }

  private stopTicker(session: RecordingSession): void {
    if (session.ticker) {
      clearInterval(session.ticker);
      session.ticker = null;
    }
  }

  private setState(next: RecordingState): void {
    if (this.state.status === "idle" && next.status === "idle") {
      this.state = next;
      return;
    }
    this.state = next;
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.state, this.elapsedSeconds);
      } catch (error) {
        this.logger.warn("Recording listener failed", { error: String(error) });
      }
    }
  }
}
