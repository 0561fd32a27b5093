/**
 * ElevenLabs Client
 *
 * Text-to-speech and voice listing over the ElevenLabs REST API.
 */

import { getLogger, type RuntimeLogger } from "@murmur/shared";
import { z } from "zod";
import { ProviderError } from "../errors";
import type { ElevenLabsVoiceSettings } from "../types";
import { HttpTransport } from "./httpTransport";
import type { SpeechSynthesisProvider, SynthesisRequest } from "./ISpeechProviders";

const SYNTHESIS_TIMEOUT_MS = 120_000;
const VOICES_TIMEOUT_MS = 30_000;

export interface ElevenLabsVoice {
  id: string;
  name: string;
  previewUrl?: string;
}

const VoicesResponseSchema = z.object({
  voices: z.array(
    z.object({
      voice_id: z.string(),
      name: z.string(),
      preview_url: z.string().nullish(),
    })
  ),
});

export interface ElevenLabsClientOptions {
  apiKey: string;
  baseUrl: string;
  outputFormat?: string;
  optimizeStreamingLatency?: number;
  enableLogging?: boolean;
  voiceSettings?: ElevenLabsVoiceSettings;
  logger?: RuntimeLogger;
  fetch?: typeof fetch;
}

function toWireVoiceSettings(settings: ElevenLabsVoiceSettings): Record<string, number | boolean> {
  const wire: Record<string, number | boolean> = {};
  if (settings.stability !== undefined) {
    wire.stability = settings.stability;
  }
  if (settings.similarityBoost !== undefined) {
    wire.similarity_boost = settings.similarityBoost;
  }
  if (settings.style !== undefined) {
    wire.style = settings.style;
  }
  if (settings.useSpeakerBoost !== undefined) {
    wire.use_speaker_boost = settings.useSpeakerBoost;
  }
  return wire;
}

export class ElevenLabsClient implements SpeechSynthesisProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly options: ElevenLabsClientOptions;
  private readonly transport: HttpTransport;

  constructor(options: ElevenLabsClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.options = options;
    const logger = (options.logger ?? getLogger()).child({
      module: "audio-client",
      provider: "elevenlabs",
    });
    this.transport = new HttpTransport({ logger, fetch: options.fetch });
  }

  async validateApiKey(): Promise<void> {
    await this.listVoices();
  }

  async listVoices(): Promise<ElevenLabsVoice[]> {
    const payload = await this.transport.sendForJson({
      method: "GET",
      url: `${this.baseUrl}/voices`,
      headers: { "xi-api-key": this.apiKey },
      timeoutMs: VOICES_TIMEOUT_MS,
    });

    const parsed = VoicesResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError("decoding_error", `Failed to decode response: ${parsed.error.message}`);
    }
    return parsed.data.voices.map((voice) => ({
      id: voice.voice_id,
      name: voice.name,
      previewUrl: voice.preview_url ?? undefined,
    }));
  }

  /**
   * `request.voice` is the voice identifier and `request.model` the model identifier.
   */
  async synthesize(request: SynthesisRequest): Promise<Uint8Array> {
    const url = new URL(`${this.baseUrl}/text-to-speech/${encodeURIComponent(request.voice)}`);
    const outputFormat = request.responseFormat ?? this.options.outputFormat;
    if (outputFormat !== undefined && outputFormat.trim().length > 0) {
      url.searchParams.set("output_format", outputFormat);
    }
    if (this.options.optimizeStreamingLatency !== undefined) {
      url.searchParams.set("optimize_streaming_latency", String(this.options.optimizeStreamingLatency));
    }
    if (this.options.enableLogging !== undefined) {
      url.searchParams.set("enable_logging", this.options.enableLogging ? "true" : "false");
    }

    const body: Record<string, unknown> = { text: request.text };
    if (request.model !== undefined) {
      body.model_id = request.model;
    }
    if (this.options.voiceSettings) {
      body.voice_settings = toWireVoiceSettings(this.options.voiceSettings);
    }

    return this.transport.sendForBytes({
      method: "POST",
      url: url.toString(),
      headers: { "xi-api-key": this.apiKey, "Content-Type": "application/json" },
      body: JSON.stringify(body),
      timeoutMs: SYNTHESIS_TIMEOUT_MS,
    });
  }
}
