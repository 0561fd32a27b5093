/**
 * Per-backend synthesis parameters: chunk limit, declared output format and
 * the request built for each chunk.
 */

import { ProviderError } from "../errors";
import type { SynthesisRequest } from "../providers/ISpeechProviders";
import { MAX_CHUNK_CHARACTERS } from "../text/chunkPacker";
import type { SynthesisBackend, SynthesisConfig } from "../types";

/**
 * OpenAI response formats the playback device can open once wrapped
 */
export const PLAYABLE_OPENAI_FORMATS: ReadonlySet<string> = new Set(["mp3", "wav", "aac", "flac", "pcm"]);

export interface SynthesisPlan {
  readonly backend: SynthesisBackend;
  readonly maxChunkChars: number;
  /** Format the provider is asked for; decides whether clips need a container */
  readonly declaredFormat: string | undefined;
  buildRequest(chunk: string): SynthesisRequest;
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Throws ProviderError("invalid_request") for an OpenAI format that cannot be played.
 */
export function planSynthesis(config: SynthesisConfig): SynthesisPlan {
  switch (config.backend) {
    case "openai": {
      const format = config.responseFormat.trim().toLowerCase();
      if (!PLAYABLE_OPENAI_FORMATS.has(format)) {
        throw new ProviderError(
          "invalid_request",
          `Invalid request: OpenAI format "${format}" is not playable. Choose mp3, wav, aac, flac, or pcm.`
        );
      }
      const instructions = blankToUndefined(config.instructions);
      return {
        backend: "openai",
        maxChunkChars: MAX_CHUNK_CHARACTERS.openai,
        declaredFormat: format,
        buildRequest: (chunk) => ({
          text: chunk,
          voice: config.voice,
          model: config.model,
          responseFormat: format,
          speed: config.speed,
          instructions,
        }),
      };
    }
    case "groq":
      return {
        backend: "groq",
        maxChunkChars: MAX_CHUNK_CHARACTERS.groq,
        declaredFormat: config.responseFormat,
        buildRequest: (chunk) => ({
          text: chunk,
          voice: config.voice,
          model: config.model,
          responseFormat: config.responseFormat,
        }),
      };
    case "elevenlabs":
      return {
        backend: "elevenlabs",
        maxChunkChars: MAX_CHUNK_CHARACTERS.elevenlabs,
        declaredFormat: config.outputFormat,
        buildRequest: (chunk) => ({
          text: chunk,
          voice: config.voiceId,
          model: config.modelId,
          responseFormat: config.outputFormat,
        }),
      };
  }
}
