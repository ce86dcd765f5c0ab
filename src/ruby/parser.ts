import { CstParser, EOF, type IToken, type TokenType } from 'chevrotain';
import * as t from './lexer.js';

// Tokens that begin the arguments of a command call written without parentheses
// (`attr_reader :a`, `memoize def foo`, `extend T::Sig`).
const ARGUMENT_START: readonly TokenType[] = [
  t.Identifier,
  t.Constant,
  t.InstanceVar,
  t.GlobalVar,
  t.StringLiteral,
  t.PercentLiteral,
  t.RegexpLiteral,
  t.Heredoc,
  t.SymbolLiteral,
  t.NumberLiteral,
  t.Label,
  t.Def,
  t.Self,
  t.Star,
  t.DoubleStar,
  t.Ampersand,
  t.Lambda,
];

export class RubyParser extends CstParser {
  constructor() {
    super(t.allTokens, { nodeLocationTracking: 'onlyOffset' });
    this.performSelfAnalysis();
  }

  private atArgumentStart(): boolean {
    return ARGUMENT_START.includes(this.LA(1).tokenType);
  }

  // `def foo=(v)`: the `=` belongs to the name only when nothing separates them
  private adjacentToPrevious(): boolean {
    const prev = this.LA(0);
    const next = this.LA(1);
    return prev.endOffset !== undefined && next.startOffset === prev.endOffset + 1;
  }

  private leadingDotAhead(): boolean {
    let i = 1;
    while (this.LA(i).tokenType === t.Newline) i++;
    const next = this.LA(i).tokenType;
    return next === t.Dot || next === t.SafeNav;
  }

  public program = this.RULE('program', () => {
    this.SUBRULE(this.statements);
    this.OPTION(() => this.CONSUME(EOF));
  });

  private statements = this.RULE('statements', () => {
    this.MANY(() => {
      this.OR({
        IGNORE_AMBIGUITIES: true,
        DEF: [
          { ALT: () => this.CONSUME(t.Newline) },
          { ALT: () => this.CONSUME(t.Semicolon) },
          { ALT: () => this.SUBRULE(this.clause) },
          { ALT: () => this.SUBRULE(this.statement) },
        ],
      });
    });
  });

  private skipNewlines = this.RULE('skipNewlines', () => {
    this.MANY(() => this.CONSUME(t.Newline));
  });

  // Section keywords inside bodies: rescue/ensure/else/elsif/when/then
  private clause = this.RULE('clause', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            this.CONSUME(t.Rescue);
            this.OPTION(() => this.SUBRULE(this.argumentList));
            this.OPTION2(() => {
              this.CONSUME(t.Arrow);
              this.SUBRULE(this.operand);
            });
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.When);
            this.SUBRULE2(this.argumentList);
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Elsif);
            this.SUBRULE(this.expression);
          },
        },
        { ALT: () => this.CONSUME(t.Else) },
        { ALT: () => this.CONSUME(t.Ensure) },
        { ALT: () => this.CONSUME(t.Then) },
      ],
    });
  });

  private statement = this.RULE('statement', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        { ALT: () => this.SUBRULE(this.classDef) },
        { ALT: () => this.SUBRULE(this.moduleDef) },
        { ALT: () => this.SUBRULE(this.conditional) },
        { ALT: () => this.SUBRULE(this.expression) },
      ],
    });
    // multiple assignment: `a, b = 1, 2`
    this.MANY(() => {
      this.CONSUME(t.Comma);
      this.OPTION(() => this.SUBRULE(this.argument));
    });
    this.MANY2(() => this.SUBRULE(this.modifier));
  });

  private modifier = this.RULE('modifier', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.If) },
      { ALT: () => this.CONSUME(t.Unless) },
      { ALT: () => this.CONSUME(t.While) },
      { ALT: () => this.CONSUME(t.Until) },
      { ALT: () => this.CONSUME(t.Rescue) },
    ]);
    this.SUBRULE(this.expression);
  });

  private conditional = this.RULE('conditional', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.If) },
      { ALT: () => this.CONSUME(t.Unless) },
      { ALT: () => this.CONSUME(t.While) },
      { ALT: () => this.CONSUME(t.Until) },
    ]);
    this.SUBRULE(this.expression);
    this.SUBRULE(this.statements);
    this.CONSUME(t.End);
  });

  private classDef = this.RULE('classDef', () => {
    this.CONSUME(t.Class);
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          // class << self
          ALT: () => {
            this.CONSUME(t.Operator);
            this.SUBRULE(this.expression);
          },
        },
        {
          ALT: () => {
            this.SUBRULE(this.constantPath);
            this.OPTION(() => {
              this.CONSUME(t.SimpleOperator);
              this.SUBRULE2(this.expression);
            });
          },
        },
      ],
    });
    this.SUBRULE(this.statements);
    this.CONSUME(t.End);
  });

  private moduleDef = this.RULE('moduleDef', () => {
    this.CONSUME(t.Module);
    this.SUBRULE(this.constantPath);
    this.SUBRULE(this.statements);
    this.CONSUME(t.End);
  });

  private constantPath = this.RULE('constantPath', () => {
    this.OPTION(() => this.CONSUME(t.DoubleColon));
    this.CONSUME(t.Constant);
    this.MANY(() => {
      this.CONSUME2(t.DoubleColon);
      this.CONSUME2(t.Constant);
    });
  });

  private methodDef = this.RULE('methodDef', () => {
    this.CONSUME(t.Def);
    this.OPTION(() => this.SUBRULE(this.singletonReceiver));
    this.SUBRULE(this.methodName);
    this.OPTION2(() => this.SUBRULE(this.parameters));
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          // endless: def foo = expr
          ALT: () => {
            this.CONSUME(t.Equals);
            this.SUBRULE(this.skipNewlines);
            this.SUBRULE(this.statement);
          },
        },
        {
          ALT: () => {
            this.SUBRULE(this.statements);
            this.CONSUME(t.End);
          },
        },
      ],
    });
  });

  private singletonReceiver = this.RULE('singletonReceiver', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Self) },
      { ALT: () => this.CONSUME(t.Constant) },
      { ALT: () => this.CONSUME(t.Identifier) },
    ]);
    this.CONSUME(t.Dot);
  });

  private methodName = this.RULE('methodName', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            this.CONSUME(t.Identifier);
            this.OPTION({ GATE: () => this.adjacentToPrevious(), DEF: () => this.CONSUME(t.Equals) });
          },
        },
        { ALT: () => this.CONSUME(t.Constant) },
        {
          ALT: () => {
            this.CONSUME(t.LBracket);
            this.CONSUME(t.RBracket);
            this.OPTION2({ GATE: () => this.adjacentToPrevious(), DEF: () => this.CONSUME2(t.Equals) });
          },
        },
        { ALT: () => this.CONSUME(t.Operator) },
        { ALT: () => this.CONSUME(t.UnaryMethodName) },
        { ALT: () => this.CONSUME(t.SimpleOperator) },
        { ALT: () => this.CONSUME(t.DoubleStar) },
        { ALT: () => this.CONSUME(t.Star) },
        { ALT: () => this.CONSUME(t.Ampersand) },
        { ALT: () => this.CONSUME(t.Pipe) },
      ],
    });
  });

  private parameters = this.RULE('parameters', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            this.CONSUME(t.LParen);
            this.SUBRULE(this.skipNewlines);
            this.OPTION(() => this.SUBRULE(this.parameterList));
            this.SUBRULE2(this.skipNewlines);
            this.CONSUME(t.RParen);
          },
        },
        { ALT: () => this.SUBRULE2(this.parameterList) },
      ],
    });
  });

  private parameterList = this.RULE('parameterList', () => {
    this.SUBRULE(this.parameter);
    this.MANY(() => {
      this.CONSUME(t.Comma);
      this.SUBRULE(this.skipNewlines);
      this.SUBRULE2(this.parameter);
    });
  });

  private parameter = this.RULE('parameter', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            this.CONSUME(t.LParen);
            this.SUBRULE(this.parameterList);
            this.CONSUME(t.RParen);
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.DoubleStar);
            this.OPTION(() => this.CONSUME(t.Identifier));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Star);
            this.OPTION2(() => this.CONSUME2(t.Identifier));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Ampersand);
            this.OPTION3(() => this.CONSUME3(t.Identifier));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Label);
            this.OPTION4(() => this.SUBRULE(this.expression));
          },
        },
        {
          ALT: () => {
            this.CONSUME4(t.Identifier);
            this.OPTION5(() => {
              this.CONSUME(t.Equals);
              this.SUBRULE2(this.expression);
            });
          },
        },
        // argument forwarding: def foo(...)
        { ALT: () => this.CONSUME(t.Operator) },
      ],
    });
  });

  private blockParameters = this.RULE('blockParameters', () => {
    this.CONSUME(t.Pipe);
    this.OPTION(() => {
      this.SUBRULE(this.blockParameter);
      this.MANY(() => {
        this.CONSUME(t.Comma);
        this.SUBRULE2(this.blockParameter);
      });
    });
    this.CONSUME2(t.Pipe);
  });

  // Defaults are restricted to primaries so a `|` always closes the list
  private blockParameter = this.RULE('blockParameter', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            this.CONSUME(t.LParen);
            this.SUBRULE(this.parameterList);
            this.CONSUME(t.RParen);
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.DoubleStar);
            this.OPTION(() => this.CONSUME(t.Identifier));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Star);
            this.OPTION2(() => this.CONSUME2(t.Identifier));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Ampersand);
            this.OPTION3(() => this.CONSUME3(t.Identifier));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Label);
            this.OPTION4(() => this.SUBRULE(this.primary));
          },
        },
        {
          ALT: () => {
            this.CONSUME4(t.Identifier);
            this.OPTION5(() => {
              this.CONSUME(t.Equals);
              this.SUBRULE2(this.primary);
            });
          },
        },
      ],
    });
  });

  private expression = this.RULE('expression', () => {
    this.SUBRULE(this.operand);
    this.MANY(() => {
      this.SUBRULE(this.binaryOperator);
      this.SUBRULE(this.skipNewlines);
      this.OR({
        IGNORE_AMBIGUITIES: true,
        DEF: [
          { ALT: () => this.SUBRULE(this.conditional) },
          { ALT: () => this.SUBRULE2(this.operand) },
        ],
      });
    });
  });

  private binaryOperator = this.RULE('binaryOperator', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Operator) },
      { ALT: () => this.CONSUME(t.SimpleOperator) },
      { ALT: () => this.CONSUME(t.DoubleStar) },
      { ALT: () => this.CONSUME(t.Star) },
      { ALT: () => this.CONSUME(t.Ampersand) },
      { ALT: () => this.CONSUME(t.Pipe) },
      { ALT: () => this.CONSUME(t.Equals) },
    ]);
  });

  private operand = this.RULE('operand', () => {
    // unary !, -, +, ~
    this.OPTION(() => this.CONSUME(t.SimpleOperator));
    this.SUBRULE(this.primary);
    this.MANY({
      GATE: () => this.LA(1).tokenType !== t.Newline || this.leadingDotAhead(),
      DEF: () => this.SUBRULE(this.postfix),
    });
  });

  private primary = this.RULE('primary', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        { ALT: () => this.SUBRULE(this.methodDef) },
        { ALT: () => this.SUBRULE(this.call) },
        { ALT: () => this.SUBRULE(this.constantRef) },
        { ALT: () => this.SUBRULE(this.lambda) },
        { ALT: () => this.SUBRULE(this.caseExpr) },
        { ALT: () => this.SUBRULE(this.beginBlock) },
        { ALT: () => this.SUBRULE(this.parenthesized) },
        { ALT: () => this.SUBRULE(this.arrayLiteral) },
        { ALT: () => this.SUBRULE(this.hashLiteral) },
        { ALT: () => this.CONSUME(t.Self) },
        { ALT: () => this.CONSUME(t.StringLiteral) },
        { ALT: () => this.CONSUME(t.PercentLiteral) },
        { ALT: () => this.CONSUME(t.RegexpLiteral) },
        { ALT: () => this.CONSUME(t.Heredoc) },
        { ALT: () => this.CONSUME(t.SymbolLiteral) },
        { ALT: () => this.CONSUME(t.NumberLiteral) },
        { ALT: () => this.CONSUME(t.InstanceVar) },
        { ALT: () => this.CONSUME(t.GlobalVar) },
      ],
    });
  });

  private call = this.RULE('call', () => {
    this.CONSUME(t.Identifier);
    this.SUBRULE(this.callTail);
  });

  private callTail = this.RULE('callTail', () => {
    this.OPTION(() => this.SUBRULE(this.parenArguments));
    this.OPTION2({ GATE: () => this.atArgumentStart(), DEF: () => this.SUBRULE(this.argumentList) });
    this.OPTION3(() => this.SUBRULE(this.block));
  });

  private parenArguments = this.RULE('parenArguments', () => {
    this.CONSUME(t.LParen);
    this.SUBRULE(this.skipNewlines);
    this.OPTION(() => this.SUBRULE(this.argumentList));
    this.SUBRULE2(this.skipNewlines);
    this.CONSUME(t.RParen);
  });

  private argumentList = this.RULE('argumentList', () => {
    this.SUBRULE(this.argument);
    this.MANY(() => {
      this.CONSUME(t.Comma);
      this.SUBRULE(this.skipNewlines);
      this.OPTION(() => this.SUBRULE2(this.argument));
    });
  });

  private argument = this.RULE('argument', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            this.CONSUME(t.Label);
            this.OPTION(() => this.SUBRULE(this.expression));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.DoubleStar);
            this.OPTION2(() => this.SUBRULE2(this.expression));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Star);
            this.OPTION3(() => this.SUBRULE3(this.expression));
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.Ampersand);
            this.OPTION4(() => this.SUBRULE4(this.expression));
          },
        },
        {
          ALT: () => {
            this.SUBRULE5(this.expression);
            this.OPTION5(() => {
              this.CONSUME(t.Arrow);
              this.SUBRULE(this.skipNewlines);
              this.SUBRULE6(this.expression);
            });
          },
        },
      ],
    });
  });

  private block = this.RULE('block', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(t.LCurly);
          this.OPTION(() => this.SUBRULE(this.blockParameters));
          this.SUBRULE(this.statements);
          this.CONSUME(t.RCurly);
        },
      },
      {
        ALT: () => {
          this.CONSUME(t.Do);
          this.OPTION2(() => this.SUBRULE2(this.blockParameters));
          this.SUBRULE2(this.statements);
          this.CONSUME(t.End);
        },
      },
    ]);
  });

  private lambda = this.RULE('lambda', () => {
    this.CONSUME(t.Lambda);
    this.OPTION(() => {
      this.CONSUME(t.LParen);
      this.OPTION2(() => this.SUBRULE(this.parameterList));
      this.CONSUME(t.RParen);
    });
    this.SUBRULE(this.block);
  });

  private constantRef = this.RULE('constantRef', () => {
    this.OPTION(() => this.CONSUME(t.DoubleColon));
    this.CONSUME(t.Constant);
    this.OPTION2(() => this.SUBRULE(this.parenArguments));
  });

  private postfix = this.RULE('postfix', () => {
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        {
          ALT: () => {
            // a chain may continue on the next line with a leading `.`
            this.SUBRULE4(this.skipNewlines);
            this.OR2([
              { ALT: () => this.CONSUME(t.Dot) },
              { ALT: () => this.CONSUME(t.SafeNav) },
            ]);
            this.SUBRULE(this.skipNewlines);
            this.SUBRULE(this.methodRef);
            this.SUBRULE(this.callTail);
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.DoubleColon);
            this.OR3({
              IGNORE_AMBIGUITIES: true,
              DEF: [
                {
                  ALT: () => {
                    this.CONSUME(t.Constant);
                    this.OPTION(() => this.SUBRULE(this.parenArguments));
                  },
                },
                {
                  ALT: () => {
                    this.CONSUME(t.Identifier);
                    this.SUBRULE2(this.callTail);
                  },
                },
              ],
            });
          },
        },
        {
          ALT: () => {
            this.CONSUME(t.LBracket);
            this.SUBRULE2(this.skipNewlines);
            this.OPTION2(() => this.SUBRULE(this.argumentList));
            this.SUBRULE3(this.skipNewlines);
            this.CONSUME(t.RBracket);
          },
        },
      ],
    });
  });

  // Method names after `.`; keywords are valid here (`obj.class`, `range.end`)
  private methodRef = this.RULE('methodRef', () => {
    this.OR([
      { ALT: () => this.CONSUME(t.Identifier) },
      { ALT: () => this.CONSUME(t.Constant) },
      { ALT: () => this.CONSUME(t.Class) },
      { ALT: () => this.CONSUME(t.Then) },
      { ALT: () => this.CONSUME(t.Begin) },
      { ALT: () => this.CONSUME(t.End) },
    ]);
  });

  private caseExpr = this.RULE('caseExpr', () => {
    this.CONSUME(t.Case);
    this.OPTION(() => this.SUBRULE(this.expression));
    this.SUBRULE(this.statements);
    this.CONSUME(t.End);
  });

  private beginBlock = this.RULE('beginBlock', () => {
    this.CONSUME(t.Begin);
    this.SUBRULE(this.statements);
    this.CONSUME(t.End);
  });

  private parenthesized = this.RULE('parenthesized', () => {
    this.CONSUME(t.LParen);
    this.SUBRULE(this.statements);
    this.CONSUME(t.RParen);
  });

  private arrayLiteral = this.RULE('arrayLiteral', () => {
    this.CONSUME(t.LBracket);
    this.SUBRULE(this.skipNewlines);
    this.OPTION(() => this.SUBRULE(this.argumentList));
    this.SUBRULE2(this.skipNewlines);
    this.CONSUME(t.RBracket);
  });

  private hashLiteral = this.RULE('hashLiteral', () => {
    this.CONSUME(t.LCurly);
    this.SUBRULE(this.skipNewlines);
    this.OPTION(() => this.SUBRULE(this.argumentList));
    this.SUBRULE2(this.skipNewlines);
    this.CONSUME(t.RCurly);
  });
}

export const parserInstance = new RubyParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.program();
  return { cst, errors: parserInstance.errors };
}
