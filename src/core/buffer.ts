import assert from 'node:assert/strict';
import type { PositionLC, SourceRange } from './types.js';

/**
 * Immutable source text with offset <-> line/column lookups.
 * Offsets index UTF-16 code units, the same units chevrotain reports.
 */
export class TextBuffer {
  readonly text: string;
  private readonly lineStarts: number[];

  constructor(text: string) {
    this.text = text;
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.lineStarts.push(i + 1);
    }
  }

  get length(): number {
    return this.text.length;
  }

  assertRange(range: SourceRange): void {
    assert.ok(
      range.begin >= 0 && range.begin <= range.end && range.end <= this.text.length,
      `range [${range.begin}, ${range.end}) is outside buffer of length ${this.text.length}`,
    );
  }

  slice(range: SourceRange): string {
    this.assertRange(range);
    return this.text.slice(range.begin, range.end);
  }

  /** 0-based line index containing `offset`. */
  lineIndexOf(offset: number): number {
    this.assertRange({ begin: offset, end: offset });
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }

  lineStartOf(offset: number): number {
    return this.lineStarts[this.lineIndexOf(offset)] ?? 0;
  }

  /** 0-based column of `offset` within its line. */
  columnOf(offset: number): number {
    return offset - this.lineStartOf(offset);
  }

  /** True when only spaces or tabs precede `offset` on its line. */
  isFirstOnLine(offset: number): boolean {
    const start = this.lineStartOf(offset);
    return /^[ \t]*$/.test(this.text.slice(start, offset));
  }

  /**
   * Indentation for text placed at `offset`: the line's own leading whitespace,
   * or spaces up to the column when code precedes it.
   */
  indentBefore(offset: number): string {
    const prefix = this.text.slice(this.lineStartOf(offset), offset);
    return /^[ \t]*$/.test(prefix) ? prefix : ' '.repeat(prefix.length);
  }

  position(offset: number): PositionLC {
    const idx = this.lineIndexOf(offset);
    return { line: idx + 1, column: offset - (this.lineStarts[idx] ?? 0) + 1 };
  }

  lineText(line: number): string {
    const idx = Math.max(0, Math.min(this.lineStarts.length - 1, line - 1));
    const start = this.lineStarts[idx] ?? 0;
    const next = this.lineStarts[idx + 1];
    return this.text.slice(start, next === undefined ? this.text.length : next - 1).replace(/\r$/, '');
  }
}
