/**
 * Voice Package - Core Type Definitions
 *
 * Session states, backend identifiers and the immutable provider
 * configurations resolved from persisted settings.
 */

// ============================================================
// BACKENDS
// ============================================================

/**
 * Text-to-speech backends
 */
export type SynthesisBackend = "openai" | "groq" | "elevenlabs";

/**
 * Speech-to-text backends
 */
export type TranscriptionBackend = "groq" | "openai";

// ============================================================
// SESSION STATE
// ============================================================

/**
 * Playback session state. At most one non-idle state exists per coordinator.
 */
export type PlaybackState =
  | { readonly status: "idle" }
  | { readonly status: "generating"; readonly messageId: string }
  | { readonly status: "playing"; readonly messageId: string }
  | { readonly status: "paused"; readonly messageId: string };

/**
 * Recording session state
 */
export type RecordingState =
  | { readonly status: "idle" }
  | { readonly status: "recording"; readonly startedAt: number }
  | { readonly status: "transcribing" };

// ============================================================
// SYNTHESIS CONFIGURATION
// ============================================================

export interface OpenAISynthesisConfig {
  readonly backend: "openai";
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly voice: string;
  /** Declared response container (mp3, wav, aac, flac, pcm, ...) */
  readonly responseFormat: string;
  readonly speed?: number;
  /** Style prompt for models that accept one */
  readonly instructions?: string;
}

export interface GroqSynthesisConfig {
  readonly backend: "groq";
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  readonly voice: string;
  readonly responseFormat: string;
}

export interface ElevenLabsVoiceSettings {
  readonly stability?: number;
  readonly similarityBoost?: number;
  readonly style?: number;
  readonly useSpeakerBoost?: boolean;
}

export interface ElevenLabsSynthesisConfig {
  readonly backend: "elevenlabs";
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly voiceId: string;
  readonly modelId?: string;
  /** e.g. "mp3_44100_128" or "pcm_24000" */
  readonly outputFormat?: string;
  /** Latency hint, 0-4 */
  readonly optimizeStreamingLatency?: number;
  readonly enableLogging?: boolean;
  readonly voiceSettings?: ElevenLabsVoiceSettings;
}

export type SynthesisConfig = OpenAISynthesisConfig | GroqSynthesisConfig | ElevenLabsSynthesisConfig;

// ============================================================
// TRANSCRIPTION CONFIGURATION
// ============================================================

interface TranscriptionConfigFields {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly model: string;
  /** Request an English translation instead of a native-language transcript */
  readonly translateToEnglish: boolean;
  readonly language?: string;
  readonly prompt?: string;
  readonly responseFormat?: string;
  readonly temperature?: number;
  readonly timestampGranularities?: readonly string[];
}

export interface OpenAITranscriptionConfig extends TranscriptionConfigFields {
  readonly backend: "openai";
}

export interface GroqTranscriptionConfig extends TranscriptionConfigFields {
  readonly backend: "groq";
}

export type TranscriptionConfig = OpenAITranscriptionConfig | GroqTranscriptionConfig;

// ============================================================
// AUDIO FORMAT
// ============================================================

/**
 * Linear PCM capture format
 */
export interface PcmFormat {
  readonly sampleRate: number;
  readonly channels: number;
  readonly bitDepth: number;
}

/**
 * Capture format for every recording: 16 kHz, mono, 16-bit little-endian.
 * The smallest payload every supported transcription backend accepts.
 */
export const RECORDING_FORMAT: PcmFormat = {
  sampleRate: 16_000,
  channels: 1,
  bitDepth: 16,
};
