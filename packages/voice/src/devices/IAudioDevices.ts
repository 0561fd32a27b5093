/**
 * Audio Device Interfaces
 *
 * Capture and playback capabilities consumed by the coordinators.
 */

import type { PcmFormat } from "../types";

export type MicrophonePermission = "granted" | "denied" | "restricted" | "undetermined";

export interface CaptureStartOptions {
  /** File the device writes the recording to */
  readonly filePath: string;
  readonly format: PcmFormat;
  /** Reported at most once, while the capture is running */
  readonly onEncodeError: (error: Error) => void;
}

export interface CaptureSession {
  /** Stop capture and flush the file; resolves once the file is complete */
  stop(): Promise<void>;
}

export interface CaptureDevice {
  permissionStatus(): Promise<MicrophonePermission>;
  /** Resolves true when access was granted */
  requestPermission(): Promise<boolean>;
  start(options: CaptureStartOptions): Promise<CaptureSession>;
}

export interface ClipEvents {
  /** The clip played to its end */
  readonly onFinished: () => void;
  readonly onDecodeError: (error: Error) => void;
}

export interface ClipPlayer {
  play(): void;
  pause(): void;
  resume(): void;
  /** Release the player; no events are delivered afterwards */
  stop(): void;
  isPlaying(): boolean;
}

export interface PlaybackDevice {
  /**
   * Prepare a clip for playback. Rejects when the bytes cannot be decoded.
   */
  load(clip: Uint8Array, events: ClipEvents): Promise<ClipPlayer>;
}
