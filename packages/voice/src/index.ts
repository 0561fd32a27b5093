/**
 * @murmur/voice - Voice I/O Pipeline
 *
 * Microphone recording with remote transcription, and chunked remote speech
 * synthesis with ordered playback.
 *
 * @example
 * ```typescript
 * import {
 *   createVoicePipeline,
 *   describeSpeechError,
 *   JsonFileSettingsStore,
 *   resolveTextToSpeech,
 * } from "@murmur/voice";
 *
 * const settings = await JsonFileSettingsStore.load("./settings.json");
 * const { playback } = createVoicePipeline();
 *
 * const resolved = resolveTextToSpeech(settings);
 * if (resolved.ok) {
 *   playback.request("msg-1", "Hello there.", resolved.config, (error) => {
 *     console.error(describeSpeechError(error, resolved.config.backend));
 *   });
 * }
 * ```
 */

// Types
export type {
  ElevenLabsSynthesisConfig,
  ElevenLabsVoiceSettings,
  GroqSynthesisConfig,
  GroqTranscriptionConfig,
  OpenAISynthesisConfig,
  OpenAITranscriptionConfig,
  PcmFormat,
  PlaybackState,
  RecordingState,
  SynthesisBackend,
  SynthesisConfig,
  TranscriptionBackend,
  TranscriptionConfig,
} from "./types";
export { RECORDING_FORMAT } from "./types";

// Errors
export {
  AuthenticationFailedError,
  InvalidEndpointError,
  MissingVoiceError,
  NotConfiguredError,
  PermissionDeniedError,
  PlaybackDecodeError,
  ProviderError,
  RecordingFailedError,
  VoiceError,
  toVoiceError,
  type ConfigError,
  type SpeechDirection,
  type VoiceErrorCode,
} from "./errors";
export { describeSpeechError } from "./messages";

// Text and audio
export { MAX_CHUNK_CHARACTERS, packChunkSegments, packChunks, type ChunkSegment } from "./text/chunkPacker";
export { headerlessPcmSampleRate, toPlayableClip, wrapPcm16LeMono } from "./audio/wavContainer";

// Configuration
export { DEFAULT_BASE_URLS, SETTINGS_KEYS } from "./config/settingsKeys";
export {
  JsonFileSettingsStore,
  MemorySettingsStore,
  SettingsFileError,
  type SettingsStore,
  type SettingValue,
} from "./config/settingsStore";
export {
  currentSpeechToTextBackend,
  currentTextToSpeechBackend,
  resolveSpeechToText,
  resolveTextToSpeech,
  type ConfigResult,
} from "./config/resolver";

// Providers and devices
export * from "./providers";
export * from "./devices";

// Coordinators
export * from "./engine";

import type { RuntimeLogger } from "@murmur/shared";
import type { CaptureDevice, PlaybackDevice } from "./devices";
import { ProcessPlaybackDevice, SoxCaptureDevice } from "./devices";
import { RecordingCoordinator, SpeechPlaybackCoordinator } from "./engine";
import { HttpSpeechProviderFactory, type SpeechProviderFactory } from "./providers";

export interface VoicePipelineOptions {
  logger?: RuntimeLogger;
  providers?: SpeechProviderFactory;
  captureDevice?: CaptureDevice;
  playbackDevice?: PlaybackDevice;
  tempDirectory?: string;
}

export interface VoicePipeline {
  recording: RecordingCoordinator;
  playback: SpeechPlaybackCoordinator;
}

/**
 * Create both coordinators, wired to the HTTP providers and the
 * command-line audio devices unless others are given.
 */
export function createVoicePipeline(options: VoicePipelineOptions = {}): VoicePipeline {
  const providers = options.providers ?? new HttpSpeechProviderFactory({ logger: options.logger });
  const captureDevice = options.captureDevice ?? new SoxCaptureDevice({ logger: options.logger });
  const playbackDevice =
    options.playbackDevice ??
    new ProcessPlaybackDevice({ logger: options.logger, tempDirectory: options.tempDirectory });

  return {
    recording: new RecordingCoordinator({
      device: captureDevice,
      providers,
      tempDirectory: options.tempDirectory,
      logger: options.logger,
    }),
    playback: new SpeechPlaybackCoordinator({ device: playbackDevice, providers, logger: options.logger }),
  };
}
