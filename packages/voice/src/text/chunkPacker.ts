/**
 * Chunk Packer
 *
 * Splits text into request-sized chunks for speech synthesis, preferring
 * paragraph boundaries and falling back to hard slicing at the limit.
 * Lengths are counted in grapheme clusters, so a combining sequence or an
 * emoji sequence is never cut apart.
 */

import type { SynthesisBackend } from "../types";

/**
 * One packed chunk plus the exact text that separated it from the previous one.
 * Joining `separator + text` over all segments restores the trimmed input.
 */
export interface ChunkSegment {
  readonly separator: string;
  readonly text: string;
}

/**
 * Maximum characters per synthesis request, by backend
 */
export const MAX_CHUNK_CHARACTERS: Readonly<Record<SynthesisBackend, number>> = {
  groq: 200,
  openai: 4096,
  elevenlabs: 6000,
};

/** Any line terminator; CRLF counts as one break */
const PARAGRAPH_BREAK = /(\r\n|[\n\v\f\r\u0085\u2028\u2029])/;

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function graphemes(text: string): string[] {
  return Array.from(graphemeSegmenter.segment(text), (part) => part.segment);
}

function graphemeLength(text: string): number {
  let length = 0;
  for (const _ of graphemeSegmenter.segment(text)) {
    length++;
  }
  return length;
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

function hardSplit(text: string, maxChars: number): string[] {
  const characters = graphemes(text);
  const pieces: string[] = [];
  for (let start = 0; start < characters.length; start += maxChars) {
    pieces.push(characters.slice(start, start + maxChars).join(""));
  }
  return pieces;
}

/**
 * Pack text into ordered segments, each at most `maxChars` characters.
 */
export function packChunkSegments(text: string, maxChars: number): ChunkSegment[] {
  const limit = Math.max(1, Math.floor(maxChars));
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }
  if (graphemeLength(trimmed) <= limit) {
    return [{ separator: "", text: trimmed }];
  }

  const segments: ChunkSegment[] = [];
  let pendingSeparator = "";
  let current: string | null = null;

  const emit = (chunk: string) => {
    segments.push({ separator: pendingSeparator, text: chunk });
    pendingSeparator = "";
  };

  const flush = () => {
    if (current === null) {
      return;
    }
    if (isBlank(current)) {
      pendingSeparator += current;
    } else {
      emit(current);
    }
    current = null;
  };

  // Even indices hold paragraphs, odd indices the break that precedes the next one.
  const parts = trimmed.split(PARAGRAPH_BREAK);
  for (let index = 0; index < parts.length; index += 2) {
    const paragraph = parts[index] ?? "";
    const lead = index === 0 ? "" : (parts[index - 1] ?? "");
    const paragraphLength = graphemeLength(paragraph);

    if (paragraphLength > limit) {
      flush();
      pendingSeparator += lead;
      for (const piece of hardSplit(paragraph, limit)) {
        if (isBlank(piece)) {
          pendingSeparator += piece;
        } else {
          emit(piece);
        }
      }
      continue;
    }

    if (current !== null && isBlank(current)) {
      flush();
    }

    if (current !== null && graphemeLength(current) + graphemeLength(lead) + paragraphLength <= limit) {
      current = current + lead + paragraph;
      continue;
    }

    flush();
    pendingSeparator += lead;
    current = paragraph;
  }
  flush();

  return segments;
}

/**
 * Pack text into ordered, non-empty chunks of at most `maxChars` characters.
 */
export function packChunks(text: string, maxChars: number): string[] {
  return packChunkSegments(text, maxChars).map((segment) => segment.text);
}
