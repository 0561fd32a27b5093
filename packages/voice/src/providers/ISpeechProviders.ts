/**
 * Speech Provider Interfaces
 *
 * Contracts for remote transcription and synthesis backends.
 * Coordinators depend on these only; concrete HTTP clients live beside them.
 */

import type { SynthesisConfig, TranscriptionConfig } from "../types";

/**
 * Audio upload for transcription or translation
 */
export interface TranscriptionRequest {
  readonly audio: Uint8Array;
  readonly filename: string;
  readonly mimeType: string;
  readonly model: string;
  readonly language?: string;
  readonly prompt?: string;
  readonly responseFormat?: string;
  readonly temperature?: number;
  readonly timestampGranularities?: readonly string[];
}

/**
 * Speech-to-text capability.
 * Authentication failures reject with AuthenticationFailedError.
 */
export interface TranscriptionProvider {
  transcribe(request: TranscriptionRequest): Promise<string>;

  /** Transcribe into English regardless of the spoken language */
  translate(request: Omit<TranscriptionRequest, "language" | "timestampGranularities">): Promise<string>;
}

/**
 * One synthesis call for a single chunk
 */
export interface SynthesisRequest {
  readonly text: string;
  /** Voice name, or the voice identifier for ElevenLabs */
  readonly voice: string;
  readonly model?: string;
  readonly responseFormat?: string;
  readonly speed?: number;
  readonly instructions?: string;
}

/**
 * Text-to-speech capability. Resolves with the encoded clip bytes.
 */
export interface SpeechSynthesisProvider {
  synthesize(request: SynthesisRequest): Promise<Uint8Array>;
}

/**
 * Builds provider capabilities for a resolved configuration
 */
export interface SpeechProviderFactory {
  createTranscriber(config: TranscriptionConfig): TranscriptionProvider;
  createSynthesizer(config: SynthesisConfig): SpeechSynthesisProvider;
}
