import { describe, expect, test } from 'vitest';
import {
  argumentDescriptors,
  capabilityEdit,
  hasCapability,
  indentationFor,
  methodLabel,
  nodeToDecorate,
  planCorrections,
  signatureEdit,
} from '../src/core/planner.js';
import { applyEdits } from '../src/core/edits.js';
import { enclosingScope } from '../src/core/siblings.js';
import { findDef, findNode, rb, treeOf } from './helpers.js';

describe('planner', () => {
  const source = rb('# typed: true', 'class A', '  def foo(a, (b, c), *, **kw, &)', '  end', 'end');

  test('flattens parameters and skips anonymous ones', () => {
    const tree = treeOf(source);
    expect(argumentDescriptors(tree, findDef(tree, 'foo'))).toEqual([
      { name: 'a', kind: 'positional' },
      { name: 'b', kind: 'positional' },
      { name: 'c', kind: 'positional' },
      { name: 'kw', kind: 'rest' },
    ]);
  });

  test('plans the capability before the signature', () => {
    const tree = treeOf(source);
    const foo = findDef(tree, 'foo');
    const scope = enclosingScope(tree, foo);
    expect(scope?.kind).toBe('class');
    expect(scope ? hasCapability(tree, scope) : true).toBe(false);

    expect(capabilityEdit(tree, foo)).toEqual({ kind: 'insert-before', anchor: 22, text: '  extend T::Sig\n\n' });
    expect(signatureEdit(tree, foo, null)).toEqual({
      kind: 'insert-before',
      anchor: 22,
      text: '  sig { params(a: T.untyped, b: T.untyped, c: T.untyped, kw: T.untyped).returns(T.untyped) }\n',
    });
    expect(planCorrections(tree, foo, { budget: null, declareCapability: true })).toEqual([
      capabilityEdit(tree, foo),
      signatureEdit(tree, foo, null),
    ]);
    expect(planCorrections(tree, foo, { budget: null, declareCapability: false })).toHaveLength(1);
  });

  test('has no capability edit at top level', () => {
    const tree = treeOf(rb('def foo; end'));
    expect(capabilityEdit(tree, findDef(tree, 'foo'))).toBeUndefined();
  });

  test('decorates the call wrapping a definition', () => {
    const tree = treeOf(rb('module M', '    private def foo; end', 'end'));
    const foo = findDef(tree, 'foo');
    expect(nodeToDecorate(tree, foo).name).toBe('private');
    expect(indentationFor(tree, foo)).toEqual({ column: 4, text: '    ' });
  });

  test('decorates the outermost of nested wrapping calls', () => {
    const tree = treeOf(rb('class A', '  private memoize def foo; end', 'end'));
    const foo = findDef(tree, 'foo');
    expect(nodeToDecorate(tree, foo).name).toBe('private');
    expect(signatureEdit(tree, foo, null)).toEqual({ kind: 'insert-before', anchor: 8, text: '  sig { returns(T.untyped) }\n' });
  });

  test('keeps tab indentation', () => {
    const tree = treeOf(rb('class A', '\tdef foo; end', 'end'));
    const foo = findDef(tree, 'foo');
    expect(indentationFor(tree, foo)).toEqual({ column: 1, text: '\t' });
    expect(capabilityEdit(tree, foo)).toEqual({ kind: 'insert-before', anchor: 8, text: '\textend T::Sig\n\n' });
    expect(signatureEdit(tree, foo, null)).toEqual({ kind: 'insert-before', anchor: 8, text: '\tsig { returns(T.untyped) }\n' });
  });

  test('counts code before the method toward the line budget', () => {
    // 'class A; ' is 9 columns, the one-line signature 47 characters
    const tree = treeOf(rb('class A; def foo(a); end', 'end'));
    const foo = findDef(tree, 'foo');
    expect(indentationFor(tree, foo)).toEqual({ column: 9, text: '         ' });
    expect(applyEdits(tree.buffer, [signatureEdit(tree, foo, 56)]).split('\n').slice(0, 2)).toEqual([
      'class A; sig { params(a: T.untyped).returns(T.untyped) }',
      '         def foo(a); end',
    ]);
    expect(applyEdits(tree.buffer, [signatureEdit(tree, foo, 55)]).split('\n')).toEqual([
      'class A; sig do',
      '           params(',
      '             a: T.untyped',
      '           ).returns(T.untyped)',
      '         end',
      '         def foo(a); end',
      'end',
      '',
    ]);
  });

  test('labels accessors by their attributes', () => {
    const tree = treeOf(rb('attr_accessor :a, :b', 'attr_writer :c'));
    const accessor = findNode(tree, (n) => n.name === 'attr_accessor');
    const writer = findNode(tree, (n) => n.name === 'attr_writer');
    expect(methodLabel(tree, accessor)).toBe('a, b');
    expect(argumentDescriptors(tree, accessor)).toEqual([]);
    expect(argumentDescriptors(tree, writer)).toEqual([{ name: 'c', kind: 'positional' }]);
  });
});
