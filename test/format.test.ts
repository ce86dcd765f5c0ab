import { describe, expect, test } from 'vitest';
import { textReport, toJsonResult } from '../src/core/format.js';
import type { Diagnostic } from '../src/core/types.js';

const warning: Diagnostic = {
  line: 1,
  column: 1,
  message: 'Methods should have Sorbet signatures.',
  severity: 'warning',
  code: 'SIG-MISSING',
  length: 7,
};

describe('textReport', () => {
  test('says so when there is nothing to report', () => {
    expect(textReport('a.rb', 'def foo\nend\n', [])).toBe('No offenses');
  });

  test('prints a code frame with a caret under the offense', () => {
    expect(textReport('a.rb', 'def foo\nend\n', [warning]).split('\n')).toEqual([
      '\x1b[33mwarning\x1b[0m[SIG-MISSING]: Methods should have Sorbet signatures.',
      'at a.rb:1:1',
      '  1 | def foo',
      '    | \x1b[31m^^^^^^^\x1b[0m',
      '  2 | end',
      '',
    ]);
  });

  test('lists errors before warnings and prints hints', () => {
    const error: Diagnostic = { line: 2, column: 3, message: 'boom', severity: 'error', code: 'RB-PARSE', hint: 'fix it' };
    const lines = textReport('b.rb', 'x\ny = (\n', [warning, error]).split('\n');
    expect(lines[0]).toBe('\x1b[31merror\x1b[0m[RB-PARSE]: boom');
    expect(lines.slice(1, 7)).toEqual([
      'at b.rb:2:3',
      '  1 | x',
      '  2 | y = (',
      '    |   \x1b[31m^\x1b[0m',
      '  3 | ',
      'hint: fix it',
    ]);
  });
});

describe('toJsonResult', () => {
  test('counts by severity', () => {
    expect(toJsonResult('a.rb', [warning])).toEqual({
      file: 'a.rb',
      valid: false,
      errorCount: 0,
      warningCount: 1,
      errors: [],
      warnings: [warning],
    });
    expect(toJsonResult('a.rb', []).valid).toBe(true);
  });
});
