import { fileURLToPath } from 'node:url';
import { describe, expect, test } from 'vitest';
import { lintRuby } from '../src/core/pipeline.js';
import { fixRuby } from '../src/index.js';
import { missingSignatureMessage } from '../src/rules/methods-should-have-signatures.js';
import { rb } from './helpers.js';

const only = ['methods-should-have-signatures'] as const;
const options = { only: [...only], lineLengthLimit: 118 };

function expectMessage(label: string, displayPath = '<file path>'): string {
  return missingSignatureMessage(label, displayPath);
}

describe('methods-should-have-signatures', () => {
  test('message names the method, the fix command and the docs', () => {
    expect(missingSignatureMessage('foo', '<file path>')).toBe(
      'Methods should have Sorbet signatures. Please add a `sig` to method #foo. ' +
        'You can use `rbsig --fix --only methods-should-have-signatures <file path>` ' +
        'to get a starting signature you can modify. See https://sorbet.org/docs/sigs for more information.',
    );
  });

  test('flags a method in a class that extends T::Sig', () => {
    const source = rb(
      '# typed: true',
      '',
      'class FakeController',
      '  extend T::Sig',
      '',
      '  def foo',
      '    "some value"',
      '  end',
      'end',
    );
    const { diagnostics } = lintRuby(source, options);
    expect(diagnostics).toEqual([
      {
        line: 6,
        column: 3,
        severity: 'warning',
        code: 'SIG-MISSING',
        rule: 'methods-should-have-signatures',
        length: 7,
        message: expectMessage('foo'),
      },
    ]);

    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'class FakeController',
        '  extend T::Sig',
        '',
        '  sig { returns(T.untyped) }',
        '  def foo',
        '    "some value"',
        '  end',
        'end',
      ),
    );
  });

  test('adds extend T::Sig when the class lacks it', () => {
    const source = rb('# typed: true', '', 'class FakeController', '  def foo', '    "some value"', '  end', 'end');
    expect(lintRuby(source, options).offenses).toHaveLength(1);
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'class FakeController',
        '  extend T::Sig',
        '',
        '  sig { returns(T.untyped) }',
        '  def foo',
        '    "some value"',
        '  end',
        'end',
      ),
    );
  });

  test('places the signature above a memoized method and quotes an existing file path', () => {
    const filename = fileURLToPath(import.meta.url);
    const source = rb(
      '# typed: true',
      '',
      'class MyComponent',
      '  memoize def my_expensive_method',
      '    make_some_database_queries',
      '  end',
      'end',
    );
    const { diagnostics, offenses } = lintRuby(source, { ...options, filename });
    expect(offenses).toHaveLength(1);
    expect(offenses[0]?.node.kind).toBe('def');
    expect(diagnostics[0]).toMatchObject({
      line: 4,
      column: 11,
      length: 23,
      message: expectMessage('my_expensive_method', filename),
    });

    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'class MyComponent',
        '  extend T::Sig',
        '',
        '  sig { returns(T.untyped) }',
        '  memoize def my_expensive_method',
        '    make_some_database_queries',
        '  end',
        'end',
      ),
    );
  });

  test('places the signature above the outermost of nested wrappers', () => {
    const source = rb('# typed: true', 'class A', '  extend T::Sig', '', '  private memoize def foo', '    1', '  end', 'end');
    const { diagnostics } = lintRuby(source, options);
    expect(diagnostics.map((d) => [d.line, d.column, d.message])).toEqual([[5, 19, expectMessage('foo')]]);
    const { fixed } = fixRuby(source, options);
    expect(fixed).toBe(
      rb('# typed: true', 'class A', '  extend T::Sig', '', '  sig { returns(T.untyped) }', '  private memoize def foo', '    1', '  end', 'end'),
    );
    expect(lintRuby(fixed, options).offenses).toEqual([]);
  });

  test('accepts a signature above nested wrappers', () => {
    const source = rb('# typed: true', 'class A', '  extend T::Sig', '  sig { void }', '  private memoize def foo; end', 'end');
    expect(lintRuby(source, options).offenses).toEqual([]);
  });

  test('accepts a block signature written as a leading-dot chain', () => {
    const source = rb(
      '# typed: true',
      'class A',
      '  extend T::Sig',
      '  sig do',
      '    params(a: String)',
      '      .void',
      '  end',
      '  def call(a)',
      '    a =~ /x/ ? <<~MSG : a',
      '      matched',
      '    MSG',
      '  end',
      'end',
    );
    expect(lintRuby(source, options)).toMatchObject({ diagnostics: [], offenses: [] });
  });

  test('indents with tabs when the method does', () => {
    const source = rb('# typed: true', 'class A', '\tdef foo(a); end', 'end');
    expect(fixRuby(source, { ...options, lineLengthLimit: 20 }).fixed).toBe(
      rb(
        '# typed: true',
        'class A',
        '\textend T::Sig',
        '',
        '\tsig do',
        '\t  params(',
        '\t    a: T.untyped',
        '\t  ).returns(T.untyped)',
        '\tend',
        '\tdef foo(a); end',
        'end',
      ),
    );
  });

  test('uses the block form when the one-line signature is too long', () => {
    const def =
      '  memoize def my_long_expensive_method_that_is_very_verbose(unwieldy_argument_name_the_first, flag2:, flag3:, flag4: [])';
    const source = rb('# typed: true', '', 'class MyComponent', def, '    make_some_database_queries', '  end', 'end');
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'class MyComponent',
        '  extend T::Sig',
        '',
        '  sig do',
        '    params(',
        '      unwieldy_argument_name_the_first: T.untyped,',
        '      flag2: T.untyped,',
        '      flag3: T.untyped,',
        '      flag4: T.untyped',
        '    ).returns(T.untyped)',
        '  end',
        def,
        '    make_some_database_queries',
        '  end',
        'end',
      ),
    );
  });

  test('lists every argument in params', () => {
    const source = rb(
      '# typed: true',
      '',
      'class MyClass',
      '  extend T::Sig',
      '',
      '  def foo(bar, baz:, val: true)',
      '    "some value"',
      '  end',
      'end',
    );
    expect(lintRuby(source, options).diagnostics[0]?.length).toBe(29);
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'class MyClass',
        '  extend T::Sig',
        '',
        '  sig { params(bar: T.untyped, baz: T.untyped, val: T.untyped).returns(T.untyped) }',
        '  def foo(bar, baz:, val: true)',
        '    "some value"',
        '  end',
        'end',
      ),
    );
  });

  test('flattens destructured parameters of a top-level method', () => {
    const source = rb('# typed: true', '', 'def build_query((name, period, query_params))', '  :some_value', 'end');
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'sig { params(name: T.untyped, period: T.untyped, query_params: T.untyped).returns(T.untyped) }',
        'def build_query((name, period, query_params))',
        '  :some_value',
        'end',
      ),
    );
  });

  test('indents a long signature inside a nested module', () => {
    const def =
      '    def you_wont_believe_how_long_this_method_is(arg0:, arg1:, arg2: true, arg3: false, arg4: [], arg5: nil)';
    const source = rb(
      '# typed: true',
      '',
      'class MyClass',
      '  module SomeInterestingConcern',
      '    extend T::Sig',
      '',
      def,
      '      "some value"',
      '    end',
      '  end',
      'end',
    );
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'class MyClass',
        '  module SomeInterestingConcern',
        '    extend T::Sig',
        '',
        '    sig do',
        '      params(',
        '        arg0: T.untyped,',
        '        arg1: T.untyped,',
        '        arg2: T.untyped,',
        '        arg3: T.untyped,',
        '        arg4: T.untyped,',
        '        arg5: T.untyped',
        '      ).returns(T.untyped)',
        '    end',
        def,
        '      "some value"',
        '    end',
        '  end',
        'end',
      ),
    );
  });

  test('declares the capability in a module', () => {
    const source = rb('# typed: true', '', 'module SomeHelper', '  def fancy_method?', '    true', '  end', 'end');
    const { diagnostics } = lintRuby(source, options);
    expect(diagnostics[0]?.message).toBe(expectMessage('fancy_method?'));
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        '',
        'module SomeHelper',
        '  extend T::Sig',
        '',
        '  sig { returns(T.untyped) }',
        '  def fancy_method?',
        '    true',
        '  end',
        'end',
      ),
    );
  });

  test('adds only the signature at top level', () => {
    const source = rb('# typed: true', '', 'def foo', '  "some value"', 'end');
    expect(fixRuby(source, options).fixed).toBe(
      rb('# typed: true', '', 'sig { returns(T.untyped) }', 'def foo', '  "some value"', 'end'),
    );
  });

  test('leaves strict files alone', () => {
    const source = rb('# typed: strict', '', 'class FakeController', '  def foo', '    "some value"', '  end', 'end');
    expect(lintRuby(source, options).offenses).toEqual([]);
  });

  test('accepts a method that already has a signature', () => {
    const source = rb(
      '# typed: true',
      '',
      'class FakeController',
      '  extend T::Sig',
      '',
      '  sig { returns String }',
      '  def foo',
      '    "some value"',
      '  end',
      'end',
    );
    expect(lintRuby(source, options).offenses).toEqual([]);
  });

  test('ignores delegate', () => {
    const source = rb('# typed: true', '', 'class FakeController', '  extend T::Sig', '', '  delegate :foo, to: :bar', 'end');
    expect(lintRuby(source, options).offenses).toEqual([]);
  });

  test('ignores files that neither opt in nor extend T::Sig', () => {
    const source = rb('class FakeController', '  def foo; end', 'end');
    expect(lintRuby(source, options).offenses).toEqual([]);
  });

  test('flags methods in a scope that extends T::Sig even without a typed sigil', () => {
    const source = rb('class A', '  extend T::Sig', '', '  def foo; end', 'end');
    expect(fixRuby(source, options).fixed).toBe(
      rb('class A', '  extend T::Sig', '', '  sig { returns(T.untyped) }', '  def foo; end', 'end'),
    );
  });

  test('covers attribute accessors', () => {
    const source = rb(
      '# typed: true',
      'class A',
      '  extend T::Sig',
      '',
      '  attr_reader :name, :age',
      '  attr_writer :email',
      'end',
    );
    const { offenses } = lintRuby(source, options);
    expect(offenses.map((o) => o.message)).toEqual([expectMessage('name, age'), expectMessage('email')]);
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        'class A',
        '  extend T::Sig',
        '',
        '  sig { returns(T.untyped) }',
        '  attr_reader :name, :age',
        '  sig { params(email: T.untyped).returns(T.untyped) }',
        '  attr_writer :email',
        'end',
      ),
    );
  });

  test('covers singleton methods', () => {
    const source = rb('# typed: true', 'class A', '  extend T::Sig', '', '  def self.build(x)', '  end', 'end');
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        'class A',
        '  extend T::Sig',
        '',
        '  sig { params(x: T.untyped).returns(T.untyped) }',
        '  def self.build(x)',
        '  end',
        'end',
      ),
    );
  });

  test('declares the capability inside class << self', () => {
    const source = rb('# typed: true', 'class A', '  class << self', '    def foo; end', '  end', 'end');
    expect(fixRuby(source, options).fixed).toBe(
      rb(
        '# typed: true',
        'class A',
        '  class << self',
        '    extend T::Sig',
        '',
        '    sig { returns(T.untyped) }',
        '    def foo; end',
        '  end',
        'end',
      ),
    );
  });

  test('declares the capability once for several methods', () => {
    const source = rb('# typed: true', 'class A', '  def foo; end', '', '  def bar; end', 'end');
    expect(lintRuby(source, options).offenses).toHaveLength(2);
    const { fixed, diagnostics } = fixRuby(source, options);
    expect(fixed).toBe(
      rb(
        '# typed: true',
        'class A',
        '  extend T::Sig',
        '',
        '  sig { returns(T.untyped) }',
        '  def foo; end',
        '',
        '  sig { returns(T.untyped) }',
        '  def bar; end',
        'end',
      ),
    );
    expect(diagnostics).toEqual([]);
  });

  test('without a line length limit signatures stay on one line', () => {
    const def =
      '  def you_wont_believe_how_long_this_method_is(arg0:, arg1:, arg2: true, arg3: false, arg4: [], arg5: nil)';
    const source = rb('# typed: true', 'class A', '  extend T::Sig', def, '  end', 'end');
    const { fixed } = fixRuby(source, { only: [...only] });
    expect(fixed.split('\n')[3]).toBe(
      '  sig { params(arg0: T.untyped, arg1: T.untyped, arg2: T.untyped, arg3: T.untyped, arg4: T.untyped, arg5: T.untyped).returns(T.untyped) }',
    );
  });
});
