import type { TextBuffer } from './buffer.js';
import type { Edit, Offense, TextEditLC } from './types.js';

export interface Replacement {
  begin: number;
  end: number;
  text: string;
}

export class EditConflictError extends Error {
  constructor(readonly first: Replacement, readonly second: Replacement) {
    super(
      `Conflicting edits: [${first.begin}, ${first.end}) overlaps [${second.begin}, ${second.end})`,
    );
    this.name = 'EditConflictError';
  }
}

export function insertBeforeOffset(anchor: number, text: string): Edit {
  return { kind: 'insert-before', anchor, text };
}

export function replaceRange(begin: number, end: number, text: string): Edit {
  return { kind: 'replace-range', begin, end, text };
}

export function removeRange(begin: number, end: number): Edit {
  return { kind: 'remove', begin, end };
}

export function toReplacement(edit: Edit): Replacement {
  switch (edit.kind) {
    case 'insert-before':
      return { begin: edit.anchor, end: edit.anchor, text: edit.text };
    case 'replace-range':
      return { begin: edit.begin, end: edit.end, text: edit.text };
    case 'remove':
      return { begin: edit.begin, end: edit.end, text: '' };
  }
}

export function toTextEditLC(buffer: TextBuffer, edit: Edit): TextEditLC {
  const r = toReplacement(edit);
  const start = buffer.position(r.begin);
  if (r.begin === r.end) return { start, newText: r.text };
  return { start, end: buffer.position(r.end), newText: r.text };
}

/** Every correction of every offense, in offense order. */
export function collectEdits(offenses: readonly Offense[]): Edit[] {
  return offenses.flatMap((o) => [...o.corrections]);
}

/**
 * Resolve edits against the original buffer. Identical edits collapse into one;
 * insertions at the same offset keep their input order and go before a range
 * starting there. Any overlap throws EditConflictError.
 */
export function mergeEdits(buffer: TextBuffer, edits: readonly Edit[]): Replacement[] {
  const seen = new Set<string>();
  const unique: Array<Replacement & { seq: number }> = [];
  edits.forEach((edit, seq) => {
    const r = toReplacement(edit);
    buffer.assertRange(r);
    const key = `${r.begin}:${r.end}:${r.text}`;
    if (seen.has(key)) return;
    seen.add(key);
    unique.push({ ...r, seq });
  });

  unique.sort((a, b) => {
    if (a.begin !== b.begin) return a.begin - b.begin;
    const aInsert = a.begin === a.end ? 0 : 1;
    const bInsert = b.begin === b.end ? 0 : 1;
    if (aInsert !== bInsert) return aInsert - bInsert;
    return a.seq - b.seq;
  });

  const merged: Replacement[] = [];
  let last: Replacement | undefined;
  let cursor = 0;
  for (const { begin, end, text } of unique) {
    const current = { begin, end, text };
    if (last && begin < cursor) throw new EditConflictError(last, current);
    merged.push(current);
    if (end > cursor || !last) last = current;
    cursor = Math.max(cursor, end);
  }
  return merged;
}

export function applyEdits(buffer: TextBuffer, edits: readonly Edit[]): string {
  if (edits.length === 0) return buffer.text;
  const merged = mergeEdits(buffer, edits);
  const parts: string[] = [];
  let cursor = 0;
  for (const r of merged) {
    parts.push(buffer.text.slice(cursor, r.begin), r.text);
    cursor = r.end;
  }
  parts.push(buffer.text.slice(cursor));
  return parts.join('');
}
