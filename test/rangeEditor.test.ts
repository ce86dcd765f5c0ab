import { describe, expect, test } from 'vitest';
import { TextBuffer } from '../src/core/buffer.js';
import { applyEdits } from '../src/core/edits.js';
import { collapse, insertBefore, isMultiLine, linesBetween, preservedText } from '../src/core/rangeEditor.js';

const sig = { begin: 0, end: 12 };

describe('linesBetween / collapse', () => {
  test('covers blank and comment lines between two nodes', () => {
    const buf = new TextBuffer('sig { void }\n\n# note\n\ndef foo; end\n');
    const def = { begin: 22, end: 34 };
    const range = linesBetween(buf, sig, def);
    expect(range).toEqual({ begin: 13, end: 22 });
    expect(buf.slice(range)).toBe('\n# note\n\n');
    expect(isMultiLine(buf, range)).toBe(true);
    expect(preservedText(buf, range)).toBe('# note\n');
    expect(collapse(buf, sig, def)).toEqual({ kind: 'remove', begin: 13, end: 22 });
  });

  test('does nothing for adjacent lines', () => {
    const buf = new TextBuffer('sig { void }\ndef foo; end');
    const def = { begin: 13, end: 25 };
    expect(linesBetween(buf, sig, def)).toEqual({ begin: 13, end: 13 });
    expect(collapse(buf, sig, def)).toBeUndefined();
  });

  test('does nothing on a single line', () => {
    const buf = new TextBuffer('sig { void }; def foo; end');
    const def = { begin: 14, end: 26 };
    expect(buf.slice(linesBetween(buf, sig, def))).toBe(' ');
    expect(collapse(buf, sig, def)).toBeUndefined();
  });

  test('rejects nodes out of order', () => {
    const buf = new TextBuffer('sig { void }\ndef foo; end');
    expect(() => linesBetween(buf, { begin: 13, end: 25 }, sig)).toThrow(/out of order/);
  });
});

describe('insertBefore', () => {
  test('inserts whole lines above a node that starts its line', () => {
    const buf = new TextBuffer('class A\n  def foo; end\nend\n');
    const edit = insertBefore(buf, { begin: 10, end: 22 }, '  sig { void }\n', '  ');
    expect(edit).toEqual({ kind: 'insert-before', anchor: 8, text: '  sig { void }\n' });
    expect(applyEdits(buf, [edit])).toBe('class A\n  sig { void }\n  def foo; end\nend\n');
  });

  test('breaks the line when code precedes the node', () => {
    const buf = new TextBuffer('x; def foo; end');
    const edit = insertBefore(buf, { begin: 3, end: 15 }, '  sig { void }\n', '  ');
    expect(edit).toEqual({ kind: 'insert-before', anchor: 3, text: 'sig { void }\n   ' });
    expect(applyEdits(buf, [edit])).toBe('x; sig { void }\n   def foo; end');
  });
});
