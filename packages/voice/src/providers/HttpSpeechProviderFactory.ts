/**
 * Builds HTTP provider clients for resolved configurations.
 */

import type { RuntimeLogger } from "@murmur/shared";
import type { SynthesisConfig, TranscriptionConfig } from "../types";
import { ElevenLabsClient } from "./ElevenLabsClient";
import type {
  SpeechProviderFactory,
  SpeechSynthesisProvider,
  TranscriptionProvider,
} from "./ISpeechProviders";
import { OpenAICompatibleAudioClient } from "./OpenAICompatibleAudioClient";

export interface HttpSpeechProviderFactoryOptions {
  logger?: RuntimeLogger;
  fetch?: typeof fetch;
}

export class HttpSpeechProviderFactory implements SpeechProviderFactory {
  constructor(private readonly options: HttpSpeechProviderFactoryOptions = {}) {}

  createTranscriber(config: TranscriptionConfig): TranscriptionProvider {
    return new OpenAICompatibleAudioClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      label: config.backend,
      logger: this.options.logger,
      fetch: this.options.fetch,
    });
  }

  createSynthesizer(config: SynthesisConfig): SpeechSynthesisProvider {
    if (config.backend === "elevenlabs") {
      return new ElevenLabsClient({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        outputFormat: config.outputFormat,
        optimizeStreamingLatency: config.optimizeStreamingLatency,
        enableLogging: config.enableLogging,
        voiceSettings: config.voiceSettings,
        logger: this.options.logger,
        fetch: this.options.fetch,
      });
    }
    return new OpenAICompatibleAudioClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
      label: config.backend,
      logger: this.options.logger,
      fetch: this.options.fetch,
    });
  }
}
