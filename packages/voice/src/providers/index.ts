export type {
  SpeechProviderFactory,
  SpeechSynthesisProvider,
  SynthesisRequest,
  TranscriptionProvider,
  TranscriptionRequest,
} from "./ISpeechProviders";
export {
  DEFAULT_REQUEST_TIMEOUT_MS,
  HttpTransport,
  errorFromResponse,
  parseRetryAfter,
  type HttpRequest,
  type HttpTransportOptions,
} from "./httpTransport";
export {
  OpenAICompatibleAudioClient,
  type OpenAICompatibleAudioClientOptions,
} from "./OpenAICompatibleAudioClient";
export { ElevenLabsClient, type ElevenLabsClientOptions, type ElevenLabsVoice } from "./ElevenLabsClient";
export { HttpSpeechProviderFactory, type HttpSpeechProviderFactoryOptions } from "./HttpSpeechProviderFactory";
