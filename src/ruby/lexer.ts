import { createToken, Lexer, type IToken, type TokenType } from 'chevrotain';

// Identifiers first so keywords can name them as longer_alt
export const Identifier = createToken({ name: 'Identifier', pattern: /[a-z_][A-Za-z0-9_]*[?!]?/ });
export const Constant = createToken({ name: 'Constant', pattern: /[A-Z][A-Za-z0-9_]*/ });

// `key:` in hashes, keyword arguments and keyword parameters (never `Foo::Bar`)
export const Label = createToken({ name: 'Label', pattern: /[A-Za-z_][A-Za-z0-9_]*[?!]?:(?!:)/ });

function keyword(word: string): TokenType {
  const name = word.charAt(0).toUpperCase() + word.slice(1);
  return createToken({ name, pattern: new RegExp(word), longer_alt: Identifier });
}

export const Class = keyword('class');
export const Module = keyword('module');
export const Def = keyword('def');
export const End = keyword('end');
export const Do = keyword('do');
export const If = keyword('if');
export const Unless = keyword('unless');
export const While = keyword('while');
export const Until = keyword('until');
export const Case = keyword('case');
export const When = keyword('when');
export const Begin = keyword('begin');
export const Rescue = keyword('rescue');
export const Ensure = keyword('ensure');
export const Elsif = keyword('elsif');
export const Else = keyword('else');
export const Then = keyword('then');
export const Self = keyword('self');

export const InstanceVar = createToken({ name: 'InstanceVar', pattern: /@@?[A-Za-z_][A-Za-z0-9_]*/ });
export const GlobalVar = createToken({ name: 'GlobalVar', pattern: /\$(?:[A-Za-z_][A-Za-z0-9_]*|[0-9!@&`'+~=/\\,;.<>*$?:"])/ });

export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*'|`(?:\\.|[^`\\])*`/,
  line_breaks: true,
});
// %w[a b], %i(x y), %q{...}, %r{...}
export const PercentLiteral = createToken({
  name: 'PercentLiteral',
  pattern: /%[qQwWiIr]?(?:\[[^\]]*\]|\([^)]*\)|\{[^}]*\}|<[^>]*>|\|[^|]*\|)/,
  line_breaks: true,
});
export const SymbolLiteral = createToken({
  name: 'SymbolLiteral',
  pattern: /:(?:"(?:\\.|[^"\\])*"|[A-Za-z_][A-Za-z0-9_]*(?:[?!]|=(?![=>~]))?|@@?[A-Za-z_][A-Za-z0-9_]*|\[\]=?|[-+!~]@|[-+*/%<>=!~^&|]+)/,
  line_breaks: true,
});

// Tokens after which a `/` begins an operand rather than a division
const OPERAND_EXPECTED = new Set([
  'Newline',
  'Semicolon',
  'Comma',
  'LParen',
  'LBracket',
  'LCurly',
  'Pipe',
  'Arrow',
  'Operator',
  'SimpleOperator',
  'Equals',
  'Star',
  'DoubleStar',
  'Ampersand',
  'If',
  'Unless',
  'While',
  'Until',
  'When',
  'Then',
  'Else',
  'Elsif',
  'Do',
  'Begin',
  'Case',
  'Rescue',
]);
const REGEXP_LITERAL = /\/(?:\\.|\[(?:\\.|[^\]\\\n])*\]|[^\/\\\n[])*\/[imxounse]*/y;

function matchRegexp(text: string, offset: number, tokens: IToken[]): RegExpExecArray | null {
  const prev = tokens[tokens.length - 1];
  const expected =
    !prev ||
    OPERAND_EXPECTED.has(prev.tokenType.name) ||
    // `split /,/` is a command argument; `a / b` and `a/b` divide
    (prev.tokenType.name === 'Identifier' && /[ \t]/.test(text.charAt(offset - 1)) && !/[ \t=]/.test(text.charAt(offset + 1)));
  if (!expected) return null;
  REGEXP_LITERAL.lastIndex = offset;
  return REGEXP_LITERAL.exec(text);
}

export const RegexpLiteral = createToken({
  name: 'RegexpLiteral',
  pattern: { exec: matchRegexp },
  line_breaks: false,
  start_chars_hint: ['/'],
});
// The opener only; bodies are consumed by the line break that ends its line
export const Heredoc = createToken({
  name: 'Heredoc',
  pattern: /<<(?:[~-]?(?:'[A-Za-z_]\w*'|"[A-Za-z_]\w*")|[~-][A-Za-z_]\w*|[A-Z_]\w*)/,
});
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /[0-9][0-9_]*(?:\.[0-9][0-9_]*)?(?:[eE][+-]?[0-9]+)?/,
});

export const DoubleColon = createToken({ name: 'DoubleColon', pattern: /::/ });
export const Arrow = createToken({ name: 'Arrow', pattern: /=>/ });
export const Lambda = createToken({ name: 'Lambda', pattern: /->/ });
export const SafeNav = createToken({ name: 'SafeNav', pattern: /&\./ });
// `def +@`, `def -@`
export const UnaryMethodName = createToken({ name: 'UnaryMethodName', pattern: /[-+!~]@(?![A-Za-z_@])/ });
// Multi-character operators, including compound assignment and ranges
export const Operator = createToken({
  name: 'Operator',
  pattern: /\*\*=|\|\|=|&&=|<<=|>>=|<=>|===|==|!=|=~|!~|>=|<=|&&|\|\||<<|>>|\.\.\.|\.\.|[-+*/%|&^]=/,
});
export const DoubleStar = createToken({ name: 'DoubleStar', pattern: /\*\*/ });
export const Star = createToken({ name: 'Star', pattern: /\*/ });
export const Ampersand = createToken({ name: 'Ampersand', pattern: /&/ });
export const Pipe = createToken({ name: 'Pipe', pattern: /\|/ });
export const Equals = createToken({ name: 'Equals', pattern: /=/ });
export const Dot = createToken({ name: 'Dot', pattern: /\./ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });
export const LCurly = createToken({ name: 'LCurly', pattern: /\{/ });
export const RCurly = createToken({ name: 'RCurly', pattern: /\}/ });
// Single-character operators: arithmetic, comparison, negation, ternary
export const SimpleOperator = createToken({ name: 'SimpleOperator', pattern: /[-+/%<>!^~?:]/ });

// Comments are kept aside for the `# typed:` sigil
export const Comment = createToken({ name: 'Comment', pattern: /#[^\n\r]*/, group: 'comments' });
export const LineContinuation = createToken({
  name: 'LineContinuation',
  pattern: /\\\r?\n/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });

const LINE_BREAK = /\r?\n/y;
const HEREDOC_OPENER = /^<<([~-]?)['"]?([A-Za-z_]\w*)/;

// A line break after heredoc openers also takes their bodies, up to and
// including each terminator line's identifier.
function matchNewline(text: string, offset: number, tokens: IToken[]): RegExpExecArray | null {
  const bodies: string[] = [];
  for (let i = tokens.length - 1; i >= 0; i--) {
    const tok = tokens[i];
    if (!tok || tok.tokenType.name === 'Newline') break;
    const opener = tok.tokenType.name === 'Heredoc' ? HEREDOC_OPENER.exec(tok.image) : null;
    if (!opener) continue;
    const [, squiggly, id] = opener;
    bodies.unshift(`(?:[^\\n]*\\n)*?${squiggly ? '[ \\t]*' : ''}${id ?? ''}[ \\t]*(?=\\r?\\n|$)`);
  }
  if (bodies.length > 0) {
    const pattern = new RegExp(`\\r?\\n${bodies.join('\\r?\\n')}`, 'y');
    pattern.lastIndex = offset;
    const match = pattern.exec(text);
    if (match) return match;
  }
  LINE_BREAK.lastIndex = offset;
  return LINE_BREAK.exec(text);
}

export const Newline = createToken({
  name: 'Newline',
  pattern: { exec: matchNewline },
  line_breaks: true,
  start_chars_hint: ['\r', '\n'],
});

export const allTokens = [
  // skipped / side channel
  Comment,
  LineContinuation,
  WhiteSpace,
  Newline,
  // literals that may contain anything
  StringLiteral,
  PercentLiteral,
  RegexpLiteral,
  Heredoc,
  // `::` before symbols so `Foo::Bar` never lexes a symbol
  DoubleColon,
  SymbolLiteral,
  // labels before keywords (`if:` is a label)
  Label,
  Class,
  Module,
  Def,
  End,
  Do,
  If,
  Unless,
  While,
  Until,
  Case,
  When,
  Begin,
  Rescue,
  Ensure,
  Elsif,
  Else,
  Then,
  Self,
  InstanceVar,
  GlobalVar,
  Constant,
  Identifier,
  NumberLiteral,
  // punctuation, longest first
  Arrow,
  Lambda,
  SafeNav,
  UnaryMethodName,
  Operator,
  DoubleStar,
  Star,
  Ampersand,
  Pipe,
  Equals,
  Dot,
  Comma,
  Semicolon,
  LParen,
  RParen,
  LBracket,
  RBracket,
  LCurly,
  RCurly,
  SimpleOperator,
];

export const RubyLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return RubyLexer.tokenize(text);
}
