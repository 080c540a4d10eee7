/**
 * @file tests/lint.test.ts
 * @description Lint rule ordering and messages.
 */

import { describe, expect, it } from 'vitest';
import { checkReturnsSectionName, lintDocstring } from '../src/lib/lint';

const lines = (...parts: string[]): string => parts.join('\n');

describe('lintDocstring', () => {
  it('returns nothing for an empty docstring', () => {
    expect(lintDocstring('')).toEqual([]);
  });

  it('returns nothing for a clean docstring', () => {
    const text = lines('Desc.', '', 'Args:', '    x (int): Value.', '', 'Returns:', '    None');
    expect(lintDocstring(text, { requireParamTypes: true })).toEqual([]);
  });

  it('flags misspelled Returns headers', () => {
    const text = lines('Desc.', '', 'returns:', '    int: x');
    expect(lintDocstring(text)).toEqual([
      "Invalid section name 'returns:', use 'Returns:' instead",
    ]);
  });

  it('stops after unclosed parameter types', () => {
    const text = lines('Desc.', '', 'Args:', '    x (int: value', '    y (List): other');
    expect(lintDocstring(text)).toEqual([
      "Unclosed parenthesis in parameter type: 'x (int: value'",
    ]);
  });

  it('reports parse failures with a prefix', () => {
    const text = lines('Desc.', '', 'Args:', '    x (List): values');
    expect(lintDocstring(text)).toEqual([
      "Error parsing docstring: Collection type 'List' must include element types (e.g., List[str])",
    ]);
  });

  it('reports reference format failures with a prefix', () => {
    const text = lines('Desc.', '', 'References:', '    - Only one: x');
    expect(lintDocstring(text)).toEqual([
      "Error parsing docstring: A single reference must not start with a dash: '- Only one: x'",
    ]);
  });

  it('reports each collected error', () => {
    const text = lines('Desc.', '', 'Args:', '    a (List): x', '    b (Dict): y');
    expect(lintDocstring(text, { collectErrors: true })).toEqual([
      "Error parsing docstring: Collection type 'List' must include element types (e.g., List[str])",
      "Error parsing docstring: Collection type 'Dict' must include element types (e.g., Dict[str])",
    ]);
  });

  it('requires parameter types when asked', () => {
    const text = lines('Desc.', '', 'Args:', '    x: value', '    y (int): other');
    expect(lintDocstring(text)).toEqual([]);
    expect(lintDocstring(text, { requireParamTypes: true })).toEqual([
      "Parameter 'x' is missing a type in docstring",
    ]);
  });

  it('reports references without a source unless disabled', () => {
    const text = lines('Desc.', '', 'References:', '    - Draft:', '    - Guide: https://example.org');
    expect(lintDocstring(text)).toEqual(['Reference #1 has an empty source']);
    expect(lintDocstring(text, { checkReferences: false })).toEqual([]);
  });
});

describe('checkReturnsSectionName', () => {
  it('accepts the correct header', () => {
    expect(checkReturnsSectionName('Returns:\n    None')).toEqual([]);
  });

  it('flags every misspelling', () => {
    expect(checkReturnsSectionName('Return:\n    x\nreturn:\n    y')).toEqual([
      "Invalid section name 'Return:', use 'Returns:' instead",
      "Invalid section name 'return:', use 'Returns:' instead",
    ]);
  });
});
