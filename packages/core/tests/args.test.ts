/**
 * @file tests/args.test.ts
 * @description Parameter line parsing for `Args:` sections.
 */

import { describe, expect, it } from 'vitest';
import { collectingIssueHandler, TypeAnnotationError } from '../src/errors';
import { matchParameterHeader, parseArgs } from '../src/lib/args';

describe('parseArgs', () => {
  it('parses typed parameters in order', () => {
    expect(parseArgs('x (int): The x value.\ny (str): The y value.')).toEqual([
      { name: 'x', type: 'int', description: 'The x value.' },
      { name: 'y', type: 'str', description: 'The y value.' },
    ]);
  });

  it('records a missing type as null', () => {
    expect(parseArgs('verbose: Print more.')).toEqual([
      { name: 'verbose', type: null, description: 'Print more.' },
    ]);
  });

  it('joins indented continuation lines with newlines', () => {
    const content = ['path (str): Where to', '    write output.', 'mode (str): Mode.'].join('\n');
    expect(parseArgs(content)).toEqual([
      { name: 'path', type: 'str', description: 'Where to\nwrite output.' },
      { name: 'mode', type: 'str', description: 'Mode.' },
    ]);
  });

  it('drops shallower lines and resets the baseline on each parameter', () => {
    const content = ['a (int): x', '        deep', '  shallow', 'b (int): y', '    z'].join('\n');
    expect(parseArgs(content)).toEqual([
      { name: 'a', type: 'int', description: 'x\ndeep' },
      { name: 'b', type: 'int', description: 'y\nz' },
    ]);
  });

  it('accepts star-prefixed names', () => {
    expect(parseArgs('*args: Extra.\n**kwargs (Any): Options.')).toEqual([
      { name: '*args', type: null, description: 'Extra.' },
      { name: '**kwargs', type: 'Any', description: 'Options.' },
    ]);
  });

  it('keeps nested generic types intact', () => {
    expect(parseArgs('mapping (Dict[str, List[int]]): Lookup.')).toEqual([
      { name: 'mapping', type: 'Dict[str, List[int]]', description: 'Lookup.' },
    ]);
  });

  it('allows an empty description', () => {
    expect(parseArgs('flag (bool):')).toEqual([{ name: 'flag', type: 'bool', description: '' }]);
  });

  it('ignores text before the first parameter', () => {
    expect(parseArgs('stray text\nx: ok')).toEqual([{ name: 'x', type: null, description: 'ok' }]);
  });

  it('throws on a bare container type', () => {
    expect(() => parseArgs('items (List): Items.')).toThrow(TypeAnnotationError);
    expect(() => parseArgs('items (List): Items.')).toThrow(
      "Collection type 'List' must include element types (e.g., List[str])",
    );
  });

  it('skips validation when disabled', () => {
    expect(parseArgs('items (List): Items.', { validateTypes: false })).toEqual([
      { name: 'items', type: 'List', description: 'Items.' },
    ]);
  });

  it('reports every type problem to a collecting handler', () => {
    const errors: string[] = [];
    const records = parseArgs('a (List): x\nb (Dict[str, int): y', {
      issues: collectingIssueHandler(errors),
    });
    expect(records.map((record) => record.name)).toEqual(['a', 'b']);
    expect(errors).toEqual([
      "Collection type 'List' must include element types (e.g., List[str])",
      "Unclosed brackets '[' in type annotation 'Dict[str, int'",
    ]);
  });
});

describe('matchParameterHeader', () => {
  it('returns null for lines without a colon', () => {
    expect(matchParameterHeader('just words')).toBeNull();
  });
});
