/**
 * Voice Error Types
 *
 * Configuration errors are returned by the resolver before any session starts.
 * Session errors reach the caller through the session's error handler or the
 * rejected promise of the operation that failed.
 */

export type VoiceErrorCode =
  | "NOT_CONFIGURED"
  | "INVALID_ENDPOINT"
  | "MISSING_VOICE"
  | "PERMISSION_DENIED"
  | "RECORDING_FAILED"
  | "PROVIDER_ERROR"
  | "AUTHENTICATION_FAILED"
  | "PLAYBACK_DECODE_ERROR";

export type SpeechDirection = "speech-to-text" | "text-to-speech";

export class VoiceError extends Error {
  readonly code: VoiceErrorCode;

  constructor(code: VoiceErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VoiceError";
    this.code = code;
  }
}

// ============================================================
// CONFIGURATION
// ============================================================

export class NotConfiguredError extends VoiceError {
  readonly direction: SpeechDirection;

  constructor(direction: SpeechDirection) {
    const label = direction === "text-to-speech" ? "Text to Speech" : "Speech to Text";
    super("NOT_CONFIGURED", `${label} is not configured. Set an API key for the selected provider.`);
    this.name = "NotConfiguredError";
    this.direction = direction;
  }
}

export class InvalidEndpointError extends VoiceError {
  readonly value: string;

  constructor(value: string) {
    super("INVALID_ENDPOINT", `Invalid API base URL: "${value}".`);
    this.name = "InvalidEndpointError";
    this.value = value;
  }
}

export class MissingVoiceError extends VoiceError {
  constructor() {
    super("MISSING_VOICE", "ElevenLabs voice is not selected. Choose a voice before speaking.");
    this.name = "MissingVoiceError";
  }
}

export type ConfigError = NotConfiguredError | InvalidEndpointError | MissingVoiceError;

// ============================================================
// RECORDING
// ============================================================

export class PermissionDeniedError extends VoiceError {
  constructor() {
    super("PERMISSION_DENIED", "Microphone access is denied.");
    this.name = "PermissionDeniedError";
  }
}

export class RecordingFailedError extends VoiceError {
  constructor(message = "Failed to record audio.", options?: ErrorOptions) {
    super("RECORDING_FAILED", message, options);
    this.name = "RecordingFailedError";
  }
}

// ============================================================
// PROVIDERS AND PLAYBACK
// ============================================================

export class ProviderError extends VoiceError {
  /** Provider-level code: HTTP status, "rate_limited", "network_error", ... */
  readonly providerCode: string;
  readonly status?: number;
  readonly retryAfterSeconds?: number;

  constructor(
    providerCode: string,
    message: string,
    options: ErrorOptions & { status?: number; retryAfterSeconds?: number } = {}
  ) {
    super("PROVIDER_ERROR", message, { cause: options.cause });
    this.name = "ProviderError";
    this.providerCode = providerCode;
    this.status = options.status;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

export class AuthenticationFailedError extends ProviderError {
  override readonly code = "AUTHENTICATION_FAILED";
  readonly detail?: string;

  constructor(detail?: string, options?: ErrorOptions) {
    const trimmed = detail?.trim();
    super(
      "authentication_failed",
      trimmed
        ? `Authentication failed. Please check your API key.\n\n${trimmed}`
        : "Authentication failed. Please check your API key.",
      { ...options, status: 401 }
    );
    this.name = "AuthenticationFailedError";
    this.detail = trimmed || undefined;
  }
}

export class PlaybackDecodeError extends VoiceError {
  constructor(message = "Failed to decode audio.", options?: ErrorOptions) {
    super("PLAYBACK_DECODE_ERROR", message, options);
    this.name = "PlaybackDecodeError";
  }
}

/**
 * Pass voice errors through; wrap anything else as a generic provider error.
 */
export function toVoiceError(error: unknown): VoiceError {
  if (error instanceof VoiceError) {
    return error;
  }
  if (error instanceof Error) {
    return new ProviderError("unknown", error.message, { cause: error });
  }
  return new ProviderError("unknown", String(error));
}
