/**
 * @file src/shared/parser-config.ts
 * @description Centralized knobs for the docstring parser and type annotation validator.
 *              These constants are read-only after module load.
 */

/**
 * Generic collection names that must always be written with element types.
 * Matching is exact and case-sensitive: `LIST` or `Dict_` are ordinary identifiers.
 */
const CONTAINER_BASE_NAMES = [
  'list',
  'List',
  'dict',
  'Dict',
  'set',
  'Set',
  'frozenset',
  'FrozenSet',
  'tuple',
  'Tuple',
  'type',
  'Type',
  'iterable',
  'Iterable',
  'iterator',
  'Iterator',
  'generator',
  'Generator',
  'sequence',
  'Sequence',
  'literal',
  'Literal',
] as const;

const LOWERCASE_BUILTINS = ['list', 'dict', 'set', 'frozenset', 'tuple', 'type'] as const;

const TYPING_NAMES = [
  'List',
  'Dict',
  'Set',
  'FrozenSet',
  'Tuple',
  'Type',
  'Iterable',
  'Iterator',
  'Generator',
  'Sequence',
  'Literal',
] as const;

const ABC_NAMES = ['Iterable', 'Iterator', 'Generator', 'Sequence', 'Set'] as const;

export const CONTAINERS_REQUIRING_ARGS: ReadonlySet<string> = new Set<string>([
  ...CONTAINER_BASE_NAMES,
  ...TYPING_NAMES.map((name) => `typing.${name}`),
  ...TYPING_NAMES.map((name) => `typing_extensions.${name}`),
  ...ABC_NAMES.map((name) => `collections.abc.${name}`),
  ...LOWERCASE_BUILTINS.map((name) => `builtins.${name}`),
]);

/**
 * Type strings longer than this many words are candidates for the prose short-circuit.
 */
export const PROSE_WORD_THRESHOLD = 8;

/**
 * Words that mark a long "type" as a sentence rather than an annotation.
 */
export const PROSE_CONNECTIVES: ReadonlySet<string> = new Set([
  'with',
  'without',
  'that',
  'which',
  'where',
  'when',
  'containing',
]);

export const DESCRIPTION_SECTION = 'Description';
export const ARGS_SECTION = 'Args';
export const RETURNS_SECTION = 'Returns';
export const REFERENCE_SECTIONS = ['References', 'Reference'] as const;

/**
 * Section spellings the linter rejects in favour of `Returns:`.
 */
export const MISSPELLED_RETURNS_HEADERS: readonly string[] = ['return:', 'Return:', 'returns:'];

/**
 * Indentation used when serialising sections back into docstring text.
 */
export const SECTION_INDENT = '    ';
