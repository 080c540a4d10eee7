/**
 * @file tests/docstring.test.ts
 * @description End-to-end assembly of parsed docstrings in fail-fast and collect modes.
 */

import { describe, expect, it } from 'vitest';
import { ReferenceFormatError, TypeAnnotationError } from '../src/errors';
import { parseDocstring } from '../src/lib/docstring';
import { joinSections, splitSections } from '../src/lib/sections';

const lines = (...parts: string[]): string => parts.join('\n');

describe('parseDocstring', () => {
  it('assembles description, args and returns', () => {
    const text = lines('Desc.', '', 'Args:', '    p (int): d', '', 'Returns:', '    bool: ok', '');
    expect(parseDocstring(text)).toEqual({
      description: 'Desc.',
      args: [{ name: 'p', type: 'int', description: 'd' }],
      returns: { kind: 'value', type: 'bool', description: 'ok' },
    });
  });

  it('returns an empty record for empty or blank input', () => {
    expect(parseDocstring('')).toEqual({});
    expect(parseDocstring('   \n  ')).toEqual({});
  });

  it('keeps header-free text as the description', () => {
    expect(parseDocstring('Just text.')).toEqual({ description: 'Just text.' });
  });

  it('uses the first reference heading and passes other sections through', () => {
    const text = lines(
      'Desc.',
      '',
      'Reference:',
      '    Guide: https://example.org/guide',
      '',
      'References:',
      '    - A: x',
      '    - B: y',
      '',
      'Raises:',
      '    ValueError: bad input.',
    );
    expect(parseDocstring(text)).toEqual({
      description: 'Desc.',
      references: {
        heading: 'Reference',
        entries: [{ description: 'Guide', source: 'https://example.org/guide' }],
      },
      otherSections: {
        References: '- A: x\n- B: y',
        Raises: 'ValueError: bad input.',
      },
    });
  });

  it('throws on the first type problem by default', () => {
    const text = lines('Desc.', '', 'Args:', '    items (List): Items.');
    expect(() => parseDocstring(text)).toThrow(TypeAnnotationError);
  });

  it('collects type and returns problems in collect mode', () => {
    const text = lines(
      'Desc.',
      '',
      'Args:',
      '    items (List): Items.',
      '    pair (Tuple[int): Pair.',
      '',
      'Returns:',
      '    Result value',
    );
    expect(parseDocstring(text, { collectErrors: true })).toEqual({
      description: 'Desc.',
      args: [
        { name: 'items', type: 'List', description: 'Items.' },
        { name: 'pair', type: 'Tuple[int', description: 'Pair.' },
      ],
      errors: [
        "Collection type 'List' must include element types (e.g., List[str])",
        "Unclosed brackets '[' in type annotation 'Tuple[int'",
        "Returns section must be 'None' or start with a type annotation: 'Result value'",
      ],
    });
  });

  it('omits errors in collect mode when nothing went wrong', () => {
    expect(parseDocstring('Desc.\n\nReturns:\n    None', { collectErrors: true })).toEqual({
      description: 'Desc.',
      returns: { kind: 'none' },
    });
  });

  it('always throws reference problems', () => {
    const text = lines('Desc.', '', 'References:', '    - Only: x');
    expect(() => parseDocstring(text, { collectErrors: true })).toThrow(ReferenceFormatError);
  });

  it('skips type validation when disabled', () => {
    const text = lines('Args:', '    items (List): Items.');
    expect(parseDocstring(text, { validateTypes: false })).toEqual({
      description: '',
      args: [{ name: 'items', type: 'List', description: 'Items.' }],
    });
  });

  it('parses re-joined sections to the same result', () => {
    const text = lines(
      'Summary line.',
      '',
      'Args:',
      '    a (int): First value,',
      '        spanning two lines.',
      '    b: Second.',
      '',
      'Returns:',
      '    Dict[str, int]: Mapping.',
      '',
      'References:',
      '    - Paper: https://example.org/paper',
      '    - Notes: internal',
    );
    const rejoined = joinSections(splitSections(text));
    expect(parseDocstring(rejoined)).toEqual(parseDocstring(text));
  });
});
