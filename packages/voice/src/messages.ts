import { AuthenticationFailedError } from "./errors";
import type { SynthesisBackend } from "./types";

const ELEVENLABS_SCOPE_HINT =
  "If your ElevenLabs key uses endpoint scopes, enable access to /v1/text-to-speech.";

/**
 * User-facing message for a text-to-speech failure.
 */
export function describeSpeechError(error: unknown, backend: SynthesisBackend): string {
  if (error instanceof AuthenticationFailedError && backend === "elevenlabs") {
    return `${error.message}\n\n${ELEVENLABS_SCOPE_HINT}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
