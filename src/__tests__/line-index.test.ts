import { describe, it, expect } from "vitest";
import { LineIndex, convertPosition, findLineBreakIndex, findLineBreaks } from "../line-index.js";

const FIXTURE = `
#! /usr/bin/env nu
def main [] {
    ls | sort-by 'size' | first
}
`.trim();

describe("findLineBreaks", () => {
  it("returns byte offsets of every newline", () => {
    expect(findLineBreaks(FIXTURE)).toEqual([18, 32, 64]);
  });

  it("counts multi-byte characters in bytes", () => {
    // "é" is 2 bytes, "😀" is 4 bytes
    expect(findLineBreaks("é\n😀\nx")).toEqual([2, 7]);
  });

  it("records CRLF at its newline and counts a lone carriage return", () => {
    expect(findLineBreaks("ls\r\nps\rcd")).toEqual([3, 6]);
  });

  it("returns an empty list for text without newlines", () => {
    expect(findLineBreaks("ls")).toEqual([]);
  });
});

describe("convertPosition", () => {
  it("converts the start of the document to 0", () => {
    expect(convertPosition(FIXTURE, { line: 0, character: 0 })).toBe(0);
  });

  it("converts a position on a later line", () => {
    // `ls | ...`
    expect(convertPosition(FIXTURE, { line: 2, character: 4 })).toBe(37);
  });
});

describe("findLineBreakIndex", () => {
  const breaks = [18, 32, 64];

  it("returns undefined before the first break", () => {
    expect(findLineBreakIndex(0, breaks)).toBeUndefined();
    expect(findLineBreakIndex(17, breaks)).toBeUndefined();
  });

  it("returns the index of the last break at or before the offset", () => {
    expect(findLineBreakIndex(19, breaks)).toBe(0);
    expect(findLineBreakIndex(31, breaks)).toBe(0);
    expect(findLineBreakIndex(33, breaks)).toBe(1);
    expect(findLineBreakIndex(63, breaks)).toBe(1);
    expect(findLineBreakIndex(64, breaks)).toBe(2);
    expect(findLineBreakIndex(1000, breaks)).toBe(2);
  });

  it("returns undefined for an empty break list", () => {
    expect(findLineBreakIndex(5, [])).toBeUndefined();
  });
});

describe("LineIndex", () => {
  it("maps offsets to positions on the fixture", () => {
    const index = new LineIndex(FIXTURE);
    expect(index.positionAt(0)).toEqual({ line: 0, character: 0 });
    expect(index.positionAt(18)).toEqual({ line: 0, character: 18 });
    expect(index.positionAt(19)).toEqual({ line: 1, character: 0 });
    expect(index.positionAt(37)).toEqual({ line: 2, character: 4 });
    expect(index.positionAt(66)).toEqual({ line: 3, character: 1 });
  });

  it("counts UTF-16 units on the editor side and bytes on the compiler side", () => {
    const index = new LineIndex("let s = '😀é'\nls");
    // "let s = '" is 9 bytes, 😀 is 4 bytes and 2 units, é is 2 bytes and 1 unit
    expect(index.offsetAt({ line: 0, character: 9 })).toBe(9);
    expect(index.offsetAt({ line: 0, character: 11 })).toBe(13);
    expect(index.offsetAt({ line: 0, character: 12 })).toBe(15);
    expect(index.positionAt(13)).toEqual({ line: 0, character: 11 });
    expect(index.positionAt(15)).toEqual({ line: 0, character: 12 });
    // line 1 starts after "'" (1 byte) and "\n" (1 byte)
    expect(index.positionAt(17)).toEqual({ line: 1, character: 0 });
    expect(index.offsetAt({ line: 1, character: 2 })).toBe(19);
  });

  it("round-trips every character boundary", () => {
    const text = "a😀b\né\n\n  ç|x";
    const index = new LineIndex(text);
    const boundaries = [0, 1, 5, 6, 7, 9, 10, 11, 12, 13, 15, 16, 17];
    for (const offset of boundaries) {
      expect(index.offsetAt(index.positionAt(offset))).toBe(offset);
    }
    const positions = [
      { line: 0, character: 0 },
      { line: 0, character: 1 },
      { line: 0, character: 3 },
      { line: 0, character: 4 },
      { line: 1, character: 1 },
      { line: 2, character: 0 },
      { line: 3, character: 3 },
      { line: 3, character: 5 },
    ];
    for (const position of positions) {
      expect(index.positionAt(index.offsetAt(position))).toEqual(position);
    }
  });

  it("resolves a position inside a surrogate pair to the pair start", () => {
    const index = new LineIndex("a😀b");
    expect(index.offsetAt({ line: 0, character: 2 })).toBe(1);
  });

  it("resolves an offset inside a multi-byte character to the character start", () => {
    const index = new LineIndex("a😀b");
    expect(index.positionAt(3)).toEqual({ line: 0, character: 1 });
  });

  it("keeps CRLF and lone carriage returns out of line content", () => {
    const index = new LineIndex("ls\r\nps\rcd");
    expect(index.lineCount).toBe(3);
    expect(index.offsetAt({ line: 0, character: 10 })).toBe(2);
    expect(index.offsetAt({ line: 1, character: 1 })).toBe(5);
    expect(index.offsetAt({ line: 2, character: 1 })).toBe(8);
    expect(index.positionAt(3)).toEqual({ line: 0, character: 2 });
    expect(index.positionAt(4)).toEqual({ line: 1, character: 0 });
    expect(index.positionAt(7)).toEqual({ line: 2, character: 0 });
  });

  it("clamps out-of-range input", () => {
    const index = new LineIndex("ab\ncd");
    expect(index.offsetAt({ line: 0, character: 10 })).toBe(2);
    expect(index.offsetAt({ line: 9, character: 0 })).toBe(5);
    expect(index.positionAt(99)).toEqual({ line: 1, character: 2 });
    expect(index.positionAt(-4)).toEqual({ line: 0, character: 0 });
  });
});
