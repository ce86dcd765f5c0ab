import type { IToken } from 'chevrotain';
import { TextBuffer } from '../core/buffer.js';
import { fromLexerError, mapRubyParserError } from '../core/diagnostics.js';
import type { SyntaxTree } from '../core/tree.js';
import type { Diagnostic } from '../core/types.js';
import { buildTree } from './builder.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';

export interface ParsedRuby {
  buffer: TextBuffer;
  /** Absent when lexing or parsing failed. */
  tree?: SyntaxTree;
  tokens: IToken[];
  comments: IToken[];
  diagnostics: Diagnostic[];
}

export function parseRuby(text: string): ParsedRuby {
  const buffer = new TextBuffer(text);

  // Lexing
  const lex = tokenize(text);
  const comments = lex.groups.comments ?? [];
  if (lex.errors.length > 0) {
    return { buffer, tokens: lex.tokens, comments, diagnostics: lex.errors.map(fromLexerError) };
  }

  // Parsing (only if no lexer errors)
  const { cst, errors } = parse(lex.tokens);
  if (errors.length > 0) {
    return { buffer, tokens: lex.tokens, comments, diagnostics: errors.map((e) => mapRubyParserError(e, text)) };
  }

  return { buffer, tree: buildTree(cst, buffer), tokens: lex.tokens, comments, diagnostics: [] };
}
