import { describe, expect, it } from 'vitest';

import { extractCallNames } from '../src/analyzer/extract/callees.js';
import {
  captureDefinitionName,
  findDefinitionSpans,
  FUNCTION_DEFINITION_PCRE,
  matchQualifiedName,
  NESTED_ANGLES,
  NESTED_BRACES,
  NESTED_PARENS,
  simpleNameOf,
} from '../src/analyzer/patterns.js';

describe('balanced delimiters', () => {
  it('returns the index past the matching close', () => {
    expect(NESTED_PARENS.matchAt('f(a(b)c)d', 1)).toBe(8);
    expect(NESTED_BRACES.matchAt('{ { } }', 0)).toBe(7);
  });

  it('matches nested template argument lists', () => {
    expect(NESTED_ANGLES.matchAt('map<int, vector<int>> m', 3)).toBe(21);
    expect(NESTED_ANGLES.matchAt('vector<int', 6)).toBeNull();
    expect(NESTED_ANGLES.pcre.startsWith('(?:\\<')).toBe(true);
  });

  it('returns null when the delimiter never closes or is absent', () => {
    expect(NESTED_PARENS.matchAt('(a(b)', 0)).toBeNull();
    expect(NESTED_PARENS.matchAt('x()', 0)).toBeNull();
  });

  it('embeds recursive groups in the pcre form', () => {
    expect(NESTED_PARENS.pcre).toContain('(?-1)');
    expect(FUNCTION_DEFINITION_PCRE.startsWith('^.*?(')).toBe(true);
  });
});

describe('qualified names', () => {
  it('matches scoped and global names', () => {
    expect(matchQualifiedName('ns::Foo::bar(', 0)?.name).toBe('ns::Foo::bar');
    expect(matchQualifiedName('::g()', 0)?.name).toBe('::g');
  });

  it('does not start in the middle of a word', () => {
    expect(matchQualifiedName('abc', 1)).toBeNull();
    expect(matchQualifiedName('9abc', 0)).toBeNull();
  });

  it('reduces to the trailing identifier', () => {
    expect(simpleNameOf('ns::Foo::bar')).toBe('bar');
    expect(simpleNameOf('bar')).toBe('bar');
  });
});

describe('definition spans', () => {
  it('finds a definition whose body spans several lines', () => {
    const text = 'int f(int a) {\n  g(a);\n}\nint x;\n';
    const spans = findDefinitionSpans(text);
    expect(spans).toHaveLength(1);
    const [span] = spans;
    expect(span && text.slice(span.start, span.end)).toBe('int f(int a) {\n  g(a);\n}');
  });

  it('ignores declarations without a body', () => {
    expect(findDefinitionSpans('int g(int a);\nvoid h();\n')).toEqual([]);
  });

  it('resumes on the line after a match', () => {
    const text = 'void a() { b(); }\nvoid c() {\n}\n';
    const spans = findDefinitionSpans(text).map((s) => text.slice(s.start, s.end));
    expect(spans).toEqual(['void a() { b(); }', 'void c() {\n}']);
  });

  it('captures a constructor name across its initializer list', () => {
    expect(captureDefinitionName('Foo::Foo(int a) : base_(a), size_(0) {\n}')).toBe('Foo::Foo');
  });

  it('captures nothing from a prototype', () => {
    expect(captureDefinitionName('int g(int a);')).toBeNull();
  });
});

describe('call names', () => {
  it('descends into nested argument lists', () => {
    expect(extractCallNames('f(g(h(x)))')).toEqual(['f', 'g', 'h']);
  });

  it('continues after each closed call', () => {
    expect(extractCallNames('a(1) + b(c(2), d)')).toEqual(['a', 'b', 'c']);
  });

  it('keeps qualified spellings', () => {
    expect(extractCallNames('ns::f(x); ::g();')).toEqual(['ns::f', '::g']);
  });

  it('runs an unclosed argument list to the end of the text', () => {
    expect(extractCallNames('f(g(x')).toEqual(['f', 'g']);
  });
});
