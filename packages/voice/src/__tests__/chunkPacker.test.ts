/**
 * Chunk Packer Unit Tests
 */

import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { MAX_CHUNK_CHARACTERS, packChunkSegments, packChunks } from "../text/chunkPacker";

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });
const characters = (text: string) => Array.from(segmenter.segment(text)).length;

describe("packChunks", () => {
  it("returns nothing for blank input", () => {
    expect(packChunks("", 10)).toEqual([]);
    expect(packChunks("  \n\t ", 10)).toEqual([]);
  });

  it("returns the trimmed text as one chunk when it fits", () => {
    expect(packChunks("  hello  ", 10)).toEqual(["hello"]);
  });

  it("joins paragraphs while the buffer stays within the limit", () => {
    expect(packChunks("aaa\nbbb\nccc", 7)).toEqual(["aaa\nbbb", "ccc"]);
  });

  it("hard-splits an oversized paragraph at the limit", () => {
    expect(packChunks("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("folds hard-split pieces back in at their original position", () => {
    expect(packChunks("ab\ncdefghij\nkl", 4)).toEqual(["ab", "cdef", "ghij", "kl"]);
  });

  it("never emits whitespace-only chunks", () => {
    expect(packChunks("aaa\n\nbbb", 3)).toEqual(["aaa", "bbb"]);
  });

  it("does not split surrogate pairs", () => {
    expect(packChunks("😀😀😀", 2)).toEqual(["😀😀", "😀"]);
  });

  it("counts a combining sequence as one character", () => {
    const accented = "e\u0301";

    expect(packChunks(accented.repeat(3), 3)).toEqual([accented.repeat(3)]);
    expect(packChunks(accented.repeat(4), 3)).toEqual([accented.repeat(3), accented]);
  });

  it("keeps an emoji sequence whole at the hard-split boundary", () => {
    const developer = "\u{1F469}\u200D\u{1F4BB}";

    expect(packChunks(`ab${developer}cd`, 3)).toEqual([`ab${developer}`, "cd"]);
  });

  it("floors the limit and clamps it to one", () => {
    expect(packChunks("abc", 2.9)).toEqual(["ab", "c"]);
    expect(packChunks("ab", 0)).toEqual(["a", "b"]);
  });

  it("has per-backend limits", () => {
    expect(MAX_CHUNK_CHARACTERS).toEqual({ groq: 200, openai: 4096, elevenlabs: 6000 });
    expect(packChunks("x".repeat(450), MAX_CHUNK_CHARACTERS.groq).map(characters)).toEqual([
      200, 200, 50,
    ]);
  });
});

describe("packChunkSegments", () => {
  it("keeps the separators between chunks", () => {
    expect(packChunkSegments("aaa\n\nbbb", 3)).toEqual([
      { separator: "", text: "aaa" },
      { separator: "\n\n", text: "bbb" },
    ]);
    expect(packChunkSegments("ab\ncdefghij\nkl", 4)).toEqual([
      { separator: "", text: "ab" },
      { separator: "\n", text: "cdef" },
      { separator: "", text: "ghij" },
      { separator: "\n", text: "kl" },
    ]);
  });

  it("treats every line terminator as a paragraph break", () => {
    expect(packChunkSegments("aaa\u2028bbb", 3)).toEqual([
      { separator: "", text: "aaa" },
      { separator: "\u2028", text: "bbb" },
    ]);
    expect(packChunkSegments("aa\r\nbb", 4)).toEqual([
      { separator: "", text: "aa" },
      { separator: "\r\n", text: "bb" },
    ]);
    expect(packChunkSegments("aa\rbb\u0085cc", 5)).toEqual([
      { separator: "", text: "aa\rbb" },
      { separator: "\u0085", text: "cc" },
    ]);
  });

  it("restores the trimmed input and respects the limit for any text", () => {
    const text = fc
      .array(
        fc.constantFrom(
          "a",
          "bb",
          "word",
          " ",
          "\n",
          "\n\n",
          "\r\n",
          "\u2028",
          "é",
          "e\u0301",
          "\u0301",
          "\u{1F469}\u200D\u{1F4BB}",
          "😀",
          "\t"
        ),
        { maxLength: 40 }
      )
      .map((parts) => parts.join(""));

    fc.assert(
      fc.property(text, fc.integer({ min: 1, max: 12 }), (input, maxChars) => {
        const segments = packChunkSegments(input, maxChars);
        const rejoined = segments.map((segment) => segment.separator + segment.text).join("");

        expect(rejoined).toBe(input.trim());
        for (const segment of segments) {
          expect(characters(segment.text)).toBeLessThanOrEqual(maxChars);
          expect(segment.text.trim().length).toBeGreaterThan(0);
        }
      })
    );
  });
});
