import type { Position } from "vscode-languageserver-protocol";

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Byte offsets of every line terminator in the UTF-8 encoding of `text`.
 * `\r\n` is one terminator, recorded at its `\n`; a lone `\r` counts too,
 * matching how editors number lines.
 */
export function findLineBreaks(text: string): number[] {
  return new LineIndex(text).lineBreaks;
}

/**
 * Index of the last line break at or before `offset`, or `undefined` when
 * the offset precedes the first break.
 */
export function findLineBreakIndex(offset: number, lineBreaks: readonly number[]): number | undefined {
  let low = 0;
  let high = lineBreaks.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (lineBreaks[mid] <= offset) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low === 0 ? undefined : low - 1;
}

export function convertPosition(text: string, position: Position): number {
  return new LineIndex(text).offsetAt(position);
}

/**
 * Conversion table between editor positions (UTF-16 code units) and
 * compiler offsets (UTF-8 bytes) for one immutable text.
 */
export class LineIndex {
  readonly text: string;
  readonly lineBreaks: number[];
  private readonly lineStartBytes: number[];
  private readonly lineStartUnits: number[];
  private readonly lineEndUnits: number[];
  private readonly byteLength: number;

  constructor(text: string) {
    this.text = text;
    this.lineBreaks = [];
    this.lineStartBytes = [0];
    this.lineStartUnits = [0];
    this.lineEndUnits = [];

    let bytes = 0;
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      const width = utf8Width(text, i);
      if (code === LINE_FEED || (code === CARRIAGE_RETURN && text.charCodeAt(i + 1) !== LINE_FEED)) {
        const crlf = code === LINE_FEED && i > 0 && text.charCodeAt(i - 1) === CARRIAGE_RETURN;
        this.lineEndUnits.push(crlf ? i - 1 : i);
        this.lineBreaks.push(bytes);
        this.lineStartBytes.push(bytes + 1);
        this.lineStartUnits.push(i + 1);
      }
      if (width === 4) i++;
      bytes += width;
    }
    this.lineEndUnits.push(text.length);
    this.byteLength = bytes;
  }

  get lineCount(): number {
    return this.lineStartBytes.length;
  }

  offsetAt(position: Position): number {
    if (position.line < 0) return 0;
    if (position.line >= this.lineCount) return this.byteLength;

    const lineStart = this.lineStartUnits[position.line];
    const lineEnd = this.lineEndUnits[position.line];
    let target = Math.min(lineStart + Math.max(position.character, 0), lineEnd);
    if (target > lineStart && isHighSurrogate(this.text.charCodeAt(target - 1)) && isLowSurrogate(this.text.charCodeAt(target))) {
      target--;
    }

    let bytes = this.lineStartBytes[position.line];
    for (let i = lineStart; i < target; i++) {
      const width = utf8Width(this.text, i);
      if (width === 4) i++;
      bytes += width;
    }
    return bytes;
  }

  positionAt(offset: number): Position {
    const clamped = Math.min(Math.max(offset, 0), this.byteLength);
    const breakIndex = findLineBreakIndex(clamped - 1, this.lineBreaks);
    const line = breakIndex === undefined ? 0 : breakIndex + 1;

    const lineStart = this.lineStartUnits[line];
    const lineEnd = this.lineEndUnits[line];
    let bytes = this.lineStartBytes[line];
    let unit = lineStart;
    while (unit < lineEnd) {
      const width = utf8Width(this.text, unit);
      if (bytes + width > clamped) break;
      bytes += width;
      unit += width === 4 ? 2 : 1;
    }
    return { line, character: unit - lineStart };
  }
}

function utf8Width(text: string, index: number): number {
  const code = text.charCodeAt(index);
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (isHighSurrogate(code) && isLowSurrogate(text.charCodeAt(index + 1))) return 4;
  // Lone surrogates are written as U+FFFD.
  return 3;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
