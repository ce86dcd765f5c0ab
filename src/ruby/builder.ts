import type { CstElement, CstNode, IToken } from 'chevrotain';
import type { TextBuffer } from '../core/buffer.js';
import { TreeArena, type SyntaxTree } from '../core/tree.js';
import type { ArgumentKind, SourceRange } from '../core/types.js';

function isToken(el: CstElement): el is IToken {
  return 'tokenType' in el;
}

function tokensOf(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

function nodesOf(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter((el): el is CstNode => !isToken(el));
}

function firstToken(node: CstNode, key: string): IToken | undefined {
  return tokensOf(node, key)[0];
}

function firstNode(node: CstNode, key: string): CstNode | undefined {
  return nodesOf(node, key)[0];
}

function requireToken(node: CstNode, key: string): IToken {
  const tok = firstToken(node, key);
  if (!tok) throw new Error(`malformed ${node.name}: missing ${key}`);
  return tok;
}

function requireNode(node: CstNode, key: string): CstNode {
  const child = firstNode(node, key);
  if (!child) throw new Error(`malformed ${node.name}: missing ${key}`);
  return child;
}

function tokenEnd(tok: IToken): number {
  return tok.startOffset + tok.image.length;
}

function startOf(el: CstElement): number {
  return isToken(el) ? el.startOffset : (el.location?.startOffset ?? Number.NaN);
}

function byStart(a: CstElement, b: CstElement): number {
  return startOf(a) - startOf(b);
}

/** All tokens below `node`, in source order. */
function tokensBelow(node: CstNode): IToken[] {
  const out: IToken[] = [];
  for (const elements of Object.values(node.children)) {
    for (const el of elements) {
      if (isToken(el)) out.push(el);
      else out.push(...tokensBelow(el));
    }
  }
  return out.sort(byStart);
}

function symbolName(image: string): string {
  const bare = image.slice(1);
  return bare.startsWith('"') ? bare.slice(1, -1) : bare;
}

/**
 * Lowers the chevrotain CST into the SyntaxTree arena. Nodes are added
 * bottom-up so every child exists before its parent claims it.
 */
class TreeBuilder {
  private readonly arena = new TreeArena();

  constructor(private readonly buffer: TextBuffer) {}

  build(program: CstNode): SyntaxTree {
    const statements = firstNode(program, 'statements');
    const children = statements ? this.statements(statements) : [];
    const root = this.arena.add({ kind: 'program', begin: 0, end: this.buffer.length, children });
    return this.arena.finish(this.buffer, root);
  }

  private span(node: CstNode): SourceRange {
    const begin = node.location?.startOffset;
    const end = node.location?.endOffset;
    if (begin === undefined || end === undefined || Number.isNaN(begin) || Number.isNaN(end)) {
      throw new Error(`${node.name} has no source location`);
    }
    return { begin, end: end + 1 };
  }

  private statements(node: CstNode): number[] {
    const parts = [...nodesOf(node, 'clause'), ...nodesOf(node, 'statement')].sort(byStart);
    return parts.map((part) => (part.name === 'clause' ? this.clause(part) : this.statement(part)));
  }

  /** A `body` node; an empty body sits at the closing keyword. */
  private body(node: CstNode | undefined, closing: number): number {
    const children = node ? this.statements(node) : [];
    const first = children[0];
    const last = children[children.length - 1];
    const begin = first === undefined ? closing : this.arena.range(first).begin;
    const end = last === undefined ? closing : this.arena.range(last).end;
    return this.arena.add({ kind: 'body', begin, end, children });
  }

  // rescue/else/when... stay in the statement list so siblings never cross them
  private clause(node: CstNode): number {
    const [keyword] = tokensBelow(node);
    const children = [
      ...nodesOf(node, 'argumentList').flatMap((list) => this.argumentList(list)),
      ...nodesOf(node, 'expression').map((expr) => this.expression(expr)),
      ...nodesOf(node, 'operand').map((operand) => this.operand(operand)),
    ];
    return this.arena.add({ kind: 'expr', name: keyword?.image, ...this.span(node), children });
  }

  private statement(node: CstNode): number {
    const main = this.statementHead(node);
    const extras = [
      ...nodesOf(node, 'argument').map((arg) => this.argument(arg)),
      ...nodesOf(node, 'modifier').map((modifier) => this.modifier(modifier)),
    ];
    if (extras.length === 0) return main;
    return this.arena.add({ kind: 'expr', ...this.span(node), children: [main, ...extras] });
  }

  private statementHead(node: CstNode): number {
    const classDef = firstNode(node, 'classDef');
    if (classDef) return this.classDef(classDef);
    const moduleDef = firstNode(node, 'moduleDef');
    if (moduleDef) return this.moduleDef(moduleDef);
    const conditional = firstNode(node, 'conditional');
    if (conditional) return this.conditional(conditional);
    return this.expression(requireNode(node, 'expression'));
  }

  private modifier(node: CstNode): number {
    const [keyword] = tokensBelow(node);
    const condition = this.expression(requireNode(node, 'expression'));
    return this.arena.add({ kind: 'expr', name: keyword?.image, ...this.span(node), children: [condition] });
  }

  private conditional(node: CstNode): number {
    const [keyword] = tokensBelow(node);
    const condition = this.expression(requireNode(node, 'expression'));
    const body = this.body(firstNode(node, 'statements'), requireToken(node, 'End').startOffset);
    return this.arena.add({ kind: 'expr', name: keyword?.image, ...this.span(node), children: [condition, body] });
  }

  private classDef(node: CstNode): number {
    const closing = requireToken(node, 'End').startOffset;
    if (firstToken(node, 'Operator')) {
      const target = this.expression(requireNode(node, 'expression'));
      const body = this.body(firstNode(node, 'statements'), closing);
      return this.arena.add({ kind: 'sclass', ...this.span(node), children: [target, body] });
    }
    const children = [this.constantPath(requireNode(node, 'constantPath'))];
    const superclass = firstNode(node, 'expression');
    if (superclass) children.push(this.expression(superclass));
    children.push(this.body(firstNode(node, 'statements'), closing));
    return this.arena.add({ kind: 'class', ...this.span(node), children });
  }

  private moduleDef(node: CstNode): number {
    const name = this.constantPath(requireNode(node, 'constantPath'));
    const body = this.body(firstNode(node, 'statements'), requireToken(node, 'End').startOffset);
    return this.arena.add({ kind: 'module', ...this.span(node), children: [name, body] });
  }

  private constantPath(node: CstNode): number {
    const path = tokensOf(node, 'Constant').map((tok) => tok.image);
    return this.arena.add({ kind: 'const', ...this.span(node), path });
  }

  private methodDef(node: CstNode): number {
    const children: number[] = [];
    const singleton = firstNode(node, 'singletonReceiver');
    const receiver = singleton ? this.singletonReceiver(singleton) : undefined;
    if (receiver !== undefined) children.push(receiver);

    const name = tokensBelow(requireNode(node, 'methodName'))
      .map((tok) => tok.image)
      .join('');

    const parameters = firstNode(node, 'parameters');
    if (parameters) children.push(this.parameters(parameters));

    const endless = firstNode(node, 'statement');
    if (endless) {
      const statement = this.statement(endless);
      children.push(this.arena.add({ kind: 'body', ...this.arena.range(statement), children: [statement] }));
    } else {
      children.push(this.body(firstNode(node, 'statements'), requireToken(node, 'End').startOffset));
    }

    if (receiver === undefined) {
      return this.arena.add({ kind: 'def', name, ...this.span(node), children });
    }
    return this.arena.add({ kind: 'defs', name, receiver, ...this.span(node), children });
  }

  private singletonReceiver(node: CstNode): number {
    const self = firstToken(node, 'Self');
    if (self) return this.arena.add({ kind: 'expr', name: 'self', begin: self.startOffset, end: tokenEnd(self) });
    const constant = firstToken(node, 'Constant');
    if (constant) {
      return this.arena.add({ kind: 'const', path: [constant.image], begin: constant.startOffset, end: tokenEnd(constant) });
    }
    const ident = requireToken(node, 'Identifier');
    return this.arena.add({ kind: 'send', name: ident.image, receiver: null, begin: ident.startOffset, end: tokenEnd(ident) });
  }

  private parameters(node: CstNode): number {
    const list = firstNode(node, 'parameterList');
    const children = list ? this.parameterList(list) : [];
    return this.arena.add({ kind: 'params', ...this.span(node), children });
  }

  private parameterList(node: CstNode): number[] {
    return nodesOf(node, 'parameter').map((param) => this.parameter(param));
  }

  private blockParameters(node: CstNode): number {
    const children = nodesOf(node, 'blockParameter').map((param) => this.parameter(param));
    return this.arena.add({ kind: 'params', ...this.span(node), children });
  }

  // Shared by method and block parameters; block defaults are primaries
  private parameter(node: CstNode): number {
    const span = this.span(node);
    const list = firstNode(node, 'parameterList');
    if (list) {
      return this.arena.add({ kind: 'param', paramKind: 'destructured', ...span, children: this.parameterList(list) });
    }
    const defaults = [
      ...nodesOf(node, 'expression').map((expr) => this.expression(expr)),
      ...nodesOf(node, 'primary').map((primary) => this.primary(primary)),
    ];
    const ident = firstToken(node, 'Identifier');
    // `**nil` forbids keywords; it names nothing
    const name = ident && ident.image !== 'nil' ? ident.image : undefined;
    const param = (paramKind: ArgumentKind, paramName: string | undefined) =>
      this.arena.add({ kind: 'param', paramKind, name: paramName, ...span, children: defaults });

    if (firstToken(node, 'DoubleStar') || firstToken(node, 'Star')) return param('rest', name);
    if (firstToken(node, 'Ampersand')) return param('block', name);
    const label = firstToken(node, 'Label');
    if (label) return param('keyword', label.image.slice(0, -1));
    // `...`
    if (firstToken(node, 'Operator')) return param('rest', undefined);
    return param('positional', name);
  }

  private expression(node: CstNode): number {
    const parts = [...nodesOf(node, 'operand'), ...nodesOf(node, 'conditional')].sort(byStart);
    const [only] = parts;
    if (parts.length === 1 && only && only.name === 'operand') return this.operand(only);
    const children = parts.map((part) => (part.name === 'conditional' ? this.conditional(part) : this.operand(part)));
    return this.arena.add({ kind: 'expr', ...this.span(node), children });
  }

  private operand(node: CstNode): number {
    const primary = requireNode(node, 'primary');
    const postfixes = nodesOf(node, 'postfix');
    const begin = this.span(primary).begin;

    let current: number;
    let rest = postfixes;
    const path = this.constantNameOf(primary);
    if (path) {
      // Foo::Bar::Baz folds into one const node
      const stop = postfixes.findIndex((postfix) => !this.constantSegment(postfix));
      const segments = stop === -1 ? postfixes : postfixes.slice(0, stop);
      rest = postfixes.slice(segments.length);
      let end = this.span(primary).end;
      for (const segment of segments) {
        const tok = requireToken(segment, 'Constant');
        path.push(tok.image);
        end = tokenEnd(tok);
      }
      current = this.arena.add({ kind: 'const', begin, end, path });
    } else {
      current = this.primary(primary);
    }

    for (const postfix of rest) current = this.postfix(postfix, current, begin);

    const unary = firstToken(node, 'SimpleOperator');
    if (!unary) return current;
    return this.arena.add({ kind: 'expr', name: unary.image, ...this.span(node), children: [current] });
  }

  private constantNameOf(primary: CstNode): string[] | undefined {
    const ref = firstNode(primary, 'constantRef');
    if (!ref || firstNode(ref, 'parenArguments')) return undefined;
    return [requireToken(ref, 'Constant').image];
  }

  private constantSegment(postfix: CstNode): boolean {
    return !!firstToken(postfix, 'DoubleColon') && !!firstToken(postfix, 'Constant') && !firstNode(postfix, 'parenArguments');
  }

  private postfix(node: CstNode, receiver: number, begin: number): number {
    const methodRef = firstNode(node, 'methodRef');
    if (methodRef) {
      const [nameToken] = tokensBelow(methodRef);
      if (!nameToken) throw new Error('malformed methodRef');
      return this.call(nameToken.image, receiver, begin, tokenEnd(nameToken), firstNode(node, 'callTail'));
    }
    const ident = firstToken(node, 'Identifier');
    if (ident) return this.call(ident.image, receiver, begin, tokenEnd(ident), firstNode(node, 'callTail'));

    const constant = firstToken(node, 'Constant');
    if (constant) {
      const paren = firstNode(node, 'parenArguments');
      const args = paren ? this.parenArguments(paren) : [];
      const end = paren ? this.span(paren).end : tokenEnd(constant);
      return this.arena.add({ kind: 'send', name: constant.image, receiver, begin, end, children: [receiver, ...args] });
    }

    // receiver[...]
    const list = firstNode(node, 'argumentList');
    const args = list ? this.argumentList(list) : [];
    return this.arena.add({ kind: 'send', name: '[]', receiver, begin, end: this.span(node).end, children: [receiver, ...args] });
  }

  private call(name: string, receiver: number | null, begin: number, nameEnd: number, tail: CstNode | undefined): number {
    const paren = tail ? firstNode(tail, 'parenArguments') : undefined;
    const bare = tail ? firstNode(tail, 'argumentList') : undefined;
    const args = [...(paren ? this.parenArguments(paren) : []), ...(bare ? this.argumentList(bare) : [])];

    let end = paren ? this.span(paren).end : nameEnd;
    const lastArg = args[args.length - 1];
    if (lastArg !== undefined) end = Math.max(end, this.arena.range(lastArg).end);

    const children = receiver === null ? args : [receiver, ...args];
    const send = this.arena.add({ kind: 'send', name, receiver, begin, end, children });
    const block = tail ? firstNode(tail, 'block') : undefined;
    return block ? this.block(block, send, begin) : send;
  }

  private block(node: CstNode, callee: number, begin: number): number {
    const children = [callee];
    const params = firstNode(node, 'blockParameters');
    if (params) children.push(this.blockParameters(params));
    const closing = firstToken(node, 'RCurly') ?? requireToken(node, 'End');
    children.push(this.body(firstNode(node, 'statements'), closing.startOffset));
    return this.arena.add({ kind: 'block', begin, end: this.span(node).end, children });
  }

  private parenArguments(node: CstNode): number[] {
    const list = firstNode(node, 'argumentList');
    return list ? this.argumentList(list) : [];
  }

  private argumentList(node: CstNode): number[] {
    return nodesOf(node, 'argument').map((arg) => this.argument(arg));
  }

  private argument(node: CstNode): number {
    const values = nodesOf(node, 'expression').map((expr) => this.expression(expr));
    const marker =
      firstToken(node, 'Label') ??
      firstToken(node, 'DoubleStar') ??
      firstToken(node, 'Star') ??
      firstToken(node, 'Ampersand') ??
      firstToken(node, 'Arrow');
    const [only] = values;
    if (!marker && only !== undefined && values.length === 1) return only;
    return this.arena.add({ kind: 'expr', name: marker?.image, ...this.span(node), children: values });
  }

  private primary(node: CstNode): number {
    const methodDef = firstNode(node, 'methodDef');
    if (methodDef) return this.methodDef(methodDef);

    const call = firstNode(node, 'call');
    if (call) {
      const ident = requireToken(call, 'Identifier');
      return this.call(ident.image, null, ident.startOffset, tokenEnd(ident), firstNode(call, 'callTail'));
    }

    const ref = firstNode(node, 'constantRef');
    if (ref) {
      const constant = requireToken(ref, 'Constant');
      const paren = firstNode(ref, 'parenArguments');
      if (!paren) return this.arena.add({ kind: 'const', ...this.span(ref), path: [constant.image] });
      const args = this.parenArguments(paren);
      return this.arena.add({ kind: 'send', name: constant.image, receiver: null, ...this.span(ref), children: args });
    }

    const lambda = firstNode(node, 'lambda');
    if (lambda) return this.lambda(lambda);

    const caseExpr = firstNode(node, 'caseExpr');
    if (caseExpr) {
      const subject = firstNode(caseExpr, 'expression');
      const children = subject ? [this.expression(subject)] : [];
      children.push(this.body(firstNode(caseExpr, 'statements'), requireToken(caseExpr, 'End').startOffset));
      return this.arena.add({ kind: 'expr', name: 'case', ...this.span(caseExpr), children });
    }

    const grouped = firstNode(node, 'beginBlock') ?? firstNode(node, 'parenthesized');
    if (grouped) {
      const closing = firstToken(grouped, 'End') ?? requireToken(grouped, 'RParen');
      const body = this.body(firstNode(grouped, 'statements'), closing.startOffset);
      return this.arena.add({ kind: 'expr', ...this.span(grouped), children: [body] });
    }

    const collection = firstNode(node, 'arrayLiteral') ?? firstNode(node, 'hashLiteral');
    if (collection) {
      const list = firstNode(collection, 'argumentList');
      const children = list ? this.argumentList(list) : [];
      return this.arena.add({ kind: 'expr', ...this.span(collection), children });
    }

    const [tok] = tokensBelow(node);
    if (!tok) throw new Error('malformed primary');
    const range = { begin: tok.startOffset, end: tokenEnd(tok) };
    switch (tok.tokenType.name) {
      case 'SymbolLiteral':
        return this.arena.add({ kind: 'sym', name: symbolName(tok.image), ...range });
      case 'StringLiteral':
      case 'PercentLiteral':
      case 'Heredoc':
        return this.arena.add({ kind: 'str', ...range });
      default:
        return this.arena.add({ kind: 'expr', name: tok.image, ...range });
    }
  }

  private lambda(node: CstNode): number {
    const children: number[] = [];
    const list = firstNode(node, 'parameterList');
    const lparen = firstToken(node, 'LParen');
    const rparen = firstToken(node, 'RParen');
    if (lparen && rparen) {
      children.push(
        this.arena.add({
          kind: 'params',
          begin: lparen.startOffset,
          end: tokenEnd(rparen),
          children: list ? this.parameterList(list) : [],
        }),
      );
    }
    const block = requireNode(node, 'block');
    const closing = firstToken(block, 'RCurly') ?? requireToken(block, 'End');
    children.push(this.body(firstNode(block, 'statements'), closing.startOffset));
    return this.arena.add({ kind: 'lambda', ...this.span(node), children });
  }
}

export function buildTree(cst: CstNode, buffer: TextBuffer): SyntaxTree {
  return new TreeBuilder(buffer).build(cst);
}
