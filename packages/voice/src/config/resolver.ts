/**
 * Provider Configuration Resolver
 *
 * Turns persisted settings into one typed configuration per backend, or a
 * typed configuration error. Reads the settings store and nothing else.
 *
 * Validation order: backend → credential → endpoint → voice → tunables.
 */

import {
  coerceOptionalBoolean,
  coerceOptionalNumber,
  isStringArray,
  normalizeOptionalString,
} from "@murmur/shared";
import {
  type ConfigError,
  InvalidEndpointError,
  MissingVoiceError,
  NotConfiguredError,
} from "../errors";
import type {
  ElevenLabsVoiceSettings,
  SynthesisBackend,
  SynthesisConfig,
  TranscriptionBackend,
  TranscriptionConfig,
} from "../types";
import { DEFAULT_BASE_URLS, SETTINGS_KEYS } from "./settingsKeys";
import type { SettingsStore } from "./settingsStore";

export type ConfigResult<T> = { ok: true; config: T } | { ok: false; error: ConfigError };

const SYNTHESIS_BACKENDS: readonly SynthesisBackend[] = ["openai", "groq", "elevenlabs"];
const TRANSCRIPTION_BACKENDS: readonly TranscriptionBackend[] = ["groq", "openai"];

const DEFAULT_SYNTHESIS_BACKEND: SynthesisBackend = "openai";
const DEFAULT_TRANSCRIPTION_BACKEND: TranscriptionBackend = "groq";

const DEFAULTS = {
  tts: {
    openai: { model: "gpt-4o-mini-tts", voice: "alloy", responseFormat: "mp3" },
    groq: { model: "canopylabs/orpheus-v1-english", voice: "troy", responseFormat: "wav" },
  },
  stt: {
    openai: { model: "gpt-4o-mini-transcribe" },
    groq: { model: "whisper-large-v3-turbo" },
  },
} as const;

// ============================================================
// SETTINGS ACCESS
// ============================================================

function readString(settings: SettingsStore, key: string): string | undefined {
  const value = settings.get(key);
  return normalizeOptionalString(typeof value === "string" ? value : undefined);
}

function readNumber(settings: SettingsStore, key: string): number | undefined {
  return coerceOptionalNumber(settings.get(key));
}

function readInteger(settings: SettingsStore, key: string): number | undefined {
  const value = readNumber(settings, key);
  return value !== undefined && Number.isInteger(value) ? value : undefined;
}

function readBoolean(settings: SettingsStore, key: string): boolean | undefined {
  return coerceOptionalBoolean(settings.get(key));
}

function readStringList(settings: SettingsStore, key: string): readonly string[] | undefined {
  const raw = readString(settings, key);
  if (raw === undefined) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isStringArray(parsed)) {
    return undefined;
  }
  const items = parsed.map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function pickBackend<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const candidate = raw?.toLowerCase();
  return allowed.find((backend) => backend === candidate) ?? fallback;
}

type EndpointResult = { ok: true; url: string } | { ok: false; error: InvalidEndpointError };

function resolveEndpoint(stored: string | undefined, fallback: string): EndpointResult {
  const value = stored ?? fallback;
  try {
    return { ok: true, url: new URL(value).href.replace(/\/+$/, "") };
  } catch {
    return { ok: false, error: new InvalidEndpointError(value) };
  }
}

// ============================================================
// BACKEND SELECTION
// ============================================================

/**
 * Selected text-to-speech backend; unset or unrecognized values fall back to the default.
 */
export function currentTextToSpeechBackend(settings: SettingsStore): SynthesisBackend {
  return pickBackend(
    readString(settings, SETTINGS_KEYS.tts.provider),
    SYNTHESIS_BACKENDS,
    DEFAULT_SYNTHESIS_BACKEND
  );
}

/**
 * Selected speech-to-text backend; unset or unrecognized values fall back to the default.
 */
export function currentSpeechToTextBackend(settings: SettingsStore): TranscriptionBackend {
  return pickBackend(
    readString(settings, SETTINGS_KEYS.stt.provider),
    TRANSCRIPTION_BACKENDS,
    DEFAULT_TRANSCRIPTION_BACKEND
  );
}

// ============================================================
// TEXT TO SPEECH
// ============================================================

function resolveVoiceSettings(settings: SettingsStore): ElevenLabsVoiceSettings | undefined {
  const keys = SETTINGS_KEYS.tts.elevenlabs;
  const voiceSettings: ElevenLabsVoiceSettings = {
    stability: readNumber(settings, keys.stability),
    similarityBoost: readNumber(settings, keys.similarityBoost),
    style: readNumber(settings, keys.style),
    useSpeakerBoost: readBoolean(settings, keys.useSpeakerBoost),
  };
  const hasAny = Object.values(voiceSettings).some((value) => value !== undefined);
  return hasAny ? voiceSettings : undefined;
}

export function resolveTextToSpeech(settings: SettingsStore): ConfigResult<SynthesisConfig> {
  const backend = currentTextToSpeechBackend(settings);
  const keys = SETTINGS_KEYS.tts[backend];

  const apiKey = readString(settings, keys.apiKey);
  if (apiKey === undefined) {
    return { ok: false, error: new NotConfiguredError("text-to-speech") };
  }

  const endpoint = resolveEndpoint(readString(settings, keys.baseUrl), DEFAULT_BASE_URLS[backend]);
  if (!endpoint.ok) {
    return endpoint;
  }
  const baseUrl = endpoint.url;

  switch (backend) {
    case "openai": {
      const openai = SETTINGS_KEYS.tts.openai;
      const defaults = DEFAULTS.tts.openai;
      return {
        ok: true,
        config: {
          backend,
          apiKey,
          baseUrl,
          model: readString(settings, openai.model) ?? defaults.model,
          voice: readString(settings, openai.voice) ?? defaults.voice,
          responseFormat: readString(settings, openai.responseFormat) ?? defaults.responseFormat,
          speed: readNumber(settings, openai.speed),
          instructions: readString(settings, openai.instructions),
        },
      };
    }
    case "groq": {
      const groq = SETTINGS_KEYS.tts.groq;
      const defaults = DEFAULTS.tts.groq;
      return {
        ok: true,
        config: {
          backend,
          apiKey,
          baseUrl,
          model: readString(settings, groq.model) ?? defaults.model,
          voice: readString(settings, groq.voice) ?? defaults.voice,
          responseFormat: readString(settings, groq.responseFormat) ?? defaults.responseFormat,
        },
      };
    }
    case "elevenlabs": {
      const eleven = SETTINGS_KEYS.tts.elevenlabs;
      const voiceId = readString(settings, eleven.voiceId);
      if (voiceId === undefined) {
        return { ok: false, error: new MissingVoiceError() };
      }
      return {
        ok: true,
        config: {
          backend,
          apiKey,
          baseUrl,
          voiceId,
          modelId: readString(settings, eleven.modelId),
          outputFormat: readString(settings, eleven.outputFormat),
          optimizeStreamingLatency: readInteger(settings, eleven.optimizeStreamingLatency),
          enableLogging: readBoolean(settings, eleven.enableLogging),
          voiceSettings: resolveVoiceSettings(settings),
        },
      };
    }
  }
}

// ============================================================
// SPEECH TO TEXT
// ============================================================

export function resolveSpeechToText(settings: SettingsStore): ConfigResult<TranscriptionConfig> {
  const backend = currentSpeechToTextBackend(settings);
  const keys = SETTINGS_KEYS.stt[backend];

  const apiKey = readString(settings, keys.apiKey);
  if (apiKey === undefined) {
    return { ok: false, error: new NotConfiguredError("speech-to-text") };
  }

  const endpoint = resolveEndpoint(readString(settings, keys.baseUrl), DEFAULT_BASE_URLS[backend]);
  if (!endpoint.ok) {
    return endpoint;
  }

  return {
    ok: true,
    config: {
      backend,
      apiKey,
      baseUrl: endpoint.url,
      model: readString(settings, keys.model) ?? DEFAULTS.stt[backend].model,
      translateToEnglish: readBoolean(settings, keys.translateToEnglish) ?? false,
      language: readString(settings, keys.language),
      prompt: readString(settings, keys.prompt),
      responseFormat: readString(settings, keys.responseFormat),
      temperature: readNumber(settings, keys.temperature),
      timestampGranularities: readStringList(settings, keys.timestampGranularities),
    },
  };
}
