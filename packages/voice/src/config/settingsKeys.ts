/**
 * Persisted setting keys read by the provider configuration resolver
 */
export const SETTINGS_KEYS = {
  tts: {
    provider: "tts.provider",
    openai: {
      apiKey: "tts.openai.apiKey",
      baseUrl: "tts.openai.baseUrl",
      model: "tts.openai.model",
      voice: "tts.openai.voice",
      responseFormat: "tts.openai.responseFormat",
      speed: "tts.openai.speed",
      instructions: "tts.openai.instructions",
    },
    groq: {
      apiKey: "tts.groq.apiKey",
      baseUrl: "tts.groq.baseUrl",
      model: "tts.groq.model",
      voice: "tts.groq.voice",
      responseFormat: "tts.groq.responseFormat",
    },
    elevenlabs: {
      apiKey: "tts.elevenlabs.apiKey",
      baseUrl: "tts.elevenlabs.baseUrl",
      voiceId: "tts.elevenlabs.voiceId",
      modelId: "tts.elevenlabs.modelId",
      outputFormat: "tts.elevenlabs.outputFormat",
      optimizeStreamingLatency: "tts.elevenlabs.optimizeStreamingLatency",
      enableLogging: "tts.elevenlabs.enableLogging",
      stability: "tts.elevenlabs.stability",
      similarityBoost: "tts.elevenlabs.similarityBoost",
      style: "tts.elevenlabs.style",
      useSpeakerBoost: "tts.elevenlabs.useSpeakerBoost",
    },
  },
  stt: {
    provider: "stt.provider",
    openai: {
      apiKey: "stt.openai.apiKey",
      baseUrl: "stt.openai.baseUrl",
      model: "stt.openai.model",
      translateToEnglish: "stt.openai.translateToEnglish",
      language: "stt.openai.language",
      prompt: "stt.openai.prompt",
      responseFormat: "stt.openai.responseFormat",
      temperature: "stt.openai.temperature",
      timestampGranularities: "stt.openai.timestampGranularities",
    },
    groq: {
      apiKey: "stt.groq.apiKey",
      baseUrl: "stt.groq.baseUrl",
      model: "stt.groq.model",
      translateToEnglish: "stt.groq.translateToEnglish",
      language: "stt.groq.language",
      prompt: "stt.groq.prompt",
      responseFormat: "stt.groq.responseFormat",
      temperature: "stt.groq.temperature",
      timestampGranularities: "stt.groq.timestampGranularities",
    },
  },
} as const;

export const DEFAULT_BASE_URLS = {
  openai: "https://api.openai.com/v1",
  groq: "https://api.groq.com/openai/v1",
  elevenlabs: "https://api.elevenlabs.io/v1",
} as const;
