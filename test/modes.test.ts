import { describe, expect, test } from 'vitest';
import { detectFileModes } from '../src/core/modes.js';
import { tokenize } from '../src/ruby/lexer.js';

function modesOf(text: string) {
  const lex = tokenize(text);
  return detectFileModes(lex.groups.comments ?? [], lex.tokens);
}

describe('detectFileModes', () => {
  test('typed: true enables signatures', () => {
    expect(modesOf('# typed: true\nclass A; end\n')).toEqual({ strict: false, signaturesEnabled: true });
    expect(modesOf('#typed:true\n')).toEqual({ strict: false, signaturesEnabled: true });
  });

  test('strict and strong are strict', () => {
    expect(modesOf('# typed: strict\n')).toEqual({ strict: true, signaturesEnabled: false });
    expect(modesOf('# typed: strong\n')).toEqual({ strict: true, signaturesEnabled: false });
  });

  test('strict wins over true', () => {
    expect(modesOf('# typed: true\n# typed: strict\n')).toEqual({ strict: true, signaturesEnabled: false });
  });

  test('reads only comments before the first code', () => {
    expect(modesOf('# frozen_string_literal: true\n\n# typed: true\nx = 1\n').signaturesEnabled).toBe(true);
    expect(modesOf('class A\n  # typed: true\nend\n').signaturesEnabled).toBe(false);
  });

  test('other sigils enable nothing', () => {
    expect(modesOf('# typed: false\n')).toEqual({ strict: false, signaturesEnabled: false });
    expect(modesOf('')).toEqual({ strict: false, signaturesEnabled: false });
  });
});
