/**
 * WAV container for headerless 16-bit little-endian mono PCM.
 */

import type { SynthesisBackend } from "../types";

const HEADER_BYTES = 44;
const CHANNELS = 1;
const BITS_PER_SAMPLE = 16;

function writeAscii(view: DataView, offset: number, text: string): void {
  for (let i = 0; i < text.length; i++) {
    view.setUint8(offset + i, text.charCodeAt(i));
  }
}

/**
 * Prepend a canonical 44-byte RIFF/WAVE header to raw PCM samples.
 * Header fields are derived from the sample rate and payload length only.
 */
export function wrapPcm16LeMono(payload: Uint8Array, sampleRate: number): Uint8Array {
  const blockAlign = CHANNELS * (BITS_PER_SAMPLE / 8);
  const byteRate = sampleRate * blockAlign;
  const dataSize = payload.byteLength;

  const out = new Uint8Array(HEADER_BYTES + dataSize);
  const view = new DataView(out.buffer);

  writeAscii(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeAscii(view, 8, "WAVE");

  writeAscii(view, 12, "fmt ");
  view.setUint32(16, 16, true); // fmt chunk size
  view.setUint16(20, 1, true); // linear PCM
  view.setUint16(22, CHANNELS, true);
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, BITS_PER_SAMPLE, true);

  writeAscii(view, 36, "data");
  view.setUint32(40, dataSize, true);

  out.set(payload, HEADER_BYTES);
  return out;
}

/**
 * Sample rate of the headerless PCM a backend returns for its declared format,
 * or null when the format already carries a container.
 */
export function headerlessPcmSampleRate(
  backend: SynthesisBackend,
  declaredFormat: string | undefined
): number | null {
  const format = (declaredFormat ?? "").trim().toLowerCase();

  if (backend === "openai") {
    // OpenAI `pcm` is 24 kHz signed 16-bit LE without a header
    return format === "pcm" ? 24_000 : null;
  }

  if (backend === "elevenlabs" && format.startsWith("pcm_")) {
    const rate = Number(format.slice("pcm_".length));
    return Number.isInteger(rate) && rate > 0 ? rate : null;
  }

  return null;
}

/**
 * Wrap the clip in a WAV container when the backend's declared format is headerless PCM.
 */
export function toPlayableClip(
  backend: SynthesisBackend,
  declaredFormat: string | undefined,
  clip: Uint8Array
): Uint8Array {
  const sampleRate = headerlessPcmSampleRate(backend, declaredFormat);
  return sampleRate === null ? clip : wrapPcm16LeMono(clip, sampleRate);
}
