/**
 * OpenAI-compatible Audio Client
 *
 * Speech, transcription and translation over the OpenAI audio API.
 * Groq serves the same routes under its own base URL.
 */

import { getLogger, isRecord, type RuntimeLogger } from "@murmur/shared";
import { ProviderError } from "../errors";
import { type HttpRequest, HttpTransport } from "./httpTransport";
import type {
  SpeechSynthesisProvider,
  SynthesisRequest,
  TranscriptionProvider,
  TranscriptionRequest,
} from "./ISpeechProviders";

const SYNTHESIS_TIMEOUT_MS = 120_000;
const TRANSCRIPTION_TIMEOUT_MS = 120_000;
const VALIDATION_TIMEOUT_MS = 30_000;

const JSON_RESPONSE_FORMATS = new Set(["json", "verbose_json"]);

export interface OpenAICompatibleAudioClientOptions {
  apiKey: string;
  baseUrl: string;
  /** Provider label for logs */
  label?: string;
  logger?: RuntimeLogger;
  fetch?: typeof fetch;
}

function hasText(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

export class OpenAICompatibleAudioClient implements TranscriptionProvider, SpeechSynthesisProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;

  constructor(options: OpenAICompatibleAudioClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    const logger = (options.logger ?? getLogger()).child({
      module: "audio-client",
      provider: options.label ?? "openai",
    });
    this.transport = new HttpTransport({ logger, fetch: options.fetch });
  }

  /**
   * Cheap authenticated call used to verify a key.
   */
  async validateApiKey(): Promise<void> {
    await this.transport.send({
      method: "GET",
      url: `${this.baseUrl}/models`,
      headers: this.authHeaders(),
      timeoutMs: VALIDATION_TIMEOUT_MS,
    });
  }

  async synthesize(request: SynthesisRequest): Promise<Uint8Array> {
    const body: Record<string, unknown> = {
      model: request.model,
      input: request.text,
      voice: request.voice,
    };
    if (hasText(request.responseFormat)) {
      body.response_format = request.responseFormat;
    }
    if (request.speed !== undefined) {
      body.speed = request.speed;
    }
    if (hasText(request.instructions)) {
      body.instructions = request.instructions;
    }

    return this.transport.sendForBytes({
      method: "POST",
      url: `${this.baseUrl}/audio/speech`,
      headers: { ...this.authHeaders(), "Content-Type": "application/json" },
      body: JSON.stringify(body),
      timeoutMs: SYNTHESIS_TIMEOUT_MS,
    });
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    const form = this.buildForm(request);
    if (hasText(request.language)) {
      form.append("language", request.language);
    }
    for (const granularity of request.timestampGranularities ?? []) {
      form.append("timestamp_granularities[]", granularity);
    }
    return this.postAudio("audio/transcriptions", form, request.responseFormat);
  }

  async translate(
    request: Omit<TranscriptionRequest, "language" | "timestampGranularities">
  ): Promise<string> {
    return this.postAudio("audio/translations", this.buildForm(request), request.responseFormat);
  }

  private buildForm(request: Omit<TranscriptionRequest, "language" | "timestampGranularities">): FormData {
    const form = new FormData();
    form.append("file", new Blob([request.audio], { type: request.mimeType }), request.filename);
    form.append("model", request.model);
    if (hasText(request.prompt)) {
      form.append("prompt", request.prompt);
    }
    if (hasText(request.responseFormat)) {
      form.append("response_format", request.responseFormat);
    }
    if (request.temperature !== undefined) {
      form.append("temperature", String(request.temperature));
    }
    return form;
  }

  private async postAudio(path: string, form: FormData, responseFormat: string | undefined): Promise<string> {
    const request: HttpRequest = {
      method: "POST",
      url: `${this.baseUrl}/${path}`,
      headers: this.authHeaders(),
      body: form,
      timeoutMs: TRANSCRIPTION_TIMEOUT_MS,
    };

    const format = (responseFormat ?? "json").trim().toLowerCase();
    if (!JSON_RESPONSE_FORMATS.has(format)) {
      // text, srt and vtt come back as the raw body
      return this.transport.sendForText(request);
    }

    const payload = await this.transport.sendForJson(request);
    if (!isRecord(payload)) {
      throw new ProviderError("decoding_error", "Failed to decode response: expected a JSON object");
    }
    return typeof payload.text === "string" ? payload.text : "";
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }
}
