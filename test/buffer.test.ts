import { describe, expect, test } from 'vitest';
import { TextBuffer } from '../src/core/buffer.js';

describe('TextBuffer', () => {
  const buf = new TextBuffer('ab\n  cd\n');

  test('maps offsets to 1-based positions', () => {
    expect(buf.position(0)).toEqual({ line: 1, column: 1 });
    expect(buf.position(5)).toEqual({ line: 2, column: 3 });
    expect(buf.position(8)).toEqual({ line: 3, column: 1 });
  });

  test('takes indentation from the line, keeping tabs', () => {
    expect(buf.indentBefore(5)).toBe('  ');
    expect(buf.indentBefore(6)).toBe('   ');
    expect(new TextBuffer('x\n\t\tdef foo').indentBefore(4)).toBe('\t\t');
  });

  test('reports line starts, columns and leading whitespace', () => {
    expect(buf.lineStartOf(6)).toBe(3);
    expect(buf.columnOf(5)).toBe(2);
    expect(buf.isFirstOnLine(5)).toBe(true);
    expect(buf.isFirstOnLine(6)).toBe(false);
    expect(buf.lineText(2)).toBe('  cd');
  });

  test('rejects ranges outside the text', () => {
    expect(buf.slice({ begin: 3, end: 7 })).toBe('  cd');
    expect(() => buf.slice({ begin: 4, end: 20 })).toThrow(/outside buffer/);
    expect(() => buf.slice({ begin: 5, end: 4 })).toThrow(/outside buffer/);
  });
});
