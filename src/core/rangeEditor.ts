import assert from 'node:assert/strict';
import type { TextBuffer } from './buffer.js';
import { insertBeforeOffset, removeRange } from './edits.js';
import type { Edit, SourceRange } from './types.js';

/**
 * The lines strictly between two nodes: from one past the first line break
 * after `a` to one past the last line break before `b`. Without a line break
 * the range covers the gap minus its last character and stays on one line.
 */
export function linesBetween(buffer: TextBuffer, a: SourceRange, b: SourceRange): SourceRange {
  assert.ok(a.end <= b.begin, `nodes out of order: ${a.end} > ${b.begin}`);
  const gap = buffer.slice({ begin: a.end, end: b.begin });
  const first = gap.indexOf('\n');
  const last = gap.lastIndexOf('\n');
  const beginOffset = first === -1 ? 0 : first;
  const endOffset = last === -1 ? gap.length - 1 : last;
  const begin = a.end + beginOffset + 1;
  const end = Math.max(begin, a.end + endOffset + 1);
  return { begin, end };
}

export function isMultiLine(buffer: TextBuffer, range: SourceRange): boolean {
  return buffer.slice(range).includes('\n');
}

/**
 * Remove everything between two nodes except one line break. Nothing to do
 * when they are on the same line or already on adjacent lines.
 */
export function collapse(buffer: TextBuffer, a: SourceRange, b: SourceRange): Edit | undefined {
  const range = linesBetween(buffer, a, b);
  if (range.begin >= range.end || !isMultiLine(buffer, range)) return undefined;
  return removeRange(range.begin, range.end);
}

/** The range's text without its blank lines. */
export function preservedText(buffer: TextBuffer, range: SourceRange): string {
  return buffer
    .slice(range)
    .split(/(?<=\n)/)
    .filter((line) => line.trim() !== '')
    .join('');
}

/**
 * Insert `text` (whole lines, each ending in a line break, first line already
 * indented by `indentation`) above `node`. When code precedes the node on its
 * line the text goes right before the node, which is moved to a fresh line at
 * its own column.
 */
export function insertBefore(buffer: TextBuffer, node: SourceRange, text: string, indentation: string): Edit {
  if (buffer.isFirstOnLine(node.begin)) {
    return insertBeforeOffset(buffer.lineStartOf(node.begin), text);
  }
  const body = text.startsWith(indentation) ? text.slice(indentation.length) : text;
  return insertBeforeOffset(node.begin, body + ' '.repeat(buffer.columnOf(node.begin)));
}

export function wholeLineStart(buffer: TextBuffer, node: SourceRange): number {
  return buffer.lineStartOf(node.begin);
}
