/**
 * @file src/lib/lint.ts
 * @description Lint rules layered on top of the parser: misspelled `Returns:` headers,
 *              unterminated parameter types, parse failures, missing parameter types, and
 *              references without a source. Messages are plain strings; callers add location.
 */

import { DocstringError } from '../errors';
import { ARGS_SECTION, MISSPELLED_RETURNS_HEADERS } from '../shared/parser-config';
import type { ParsedDocstring } from '../types/docstring';
import { parseDocstring } from './docstring';
import { splitSections } from './sections';

export interface LintOptions {
  requireParamTypes?: boolean;
  checkReferences?: boolean;
  validateTypes?: boolean;
  collectErrors?: boolean;
}

/** `name (` with no closing `)`, or a `[` that is never closed. */
const unclosedParameterTypeRegex = /^(\w+)\s+\(([^)]*$|.*\[[^\]]*$)/;

export const checkReturnsSectionName = (docstring: string): string[] =>
  docstring
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => MISSPELLED_RETURNS_HEADERS.includes(line))
    .map((line) => `Invalid section name '${line}', use 'Returns:' instead`);

export const checkUnclosedParameterTypes = (docstring: string): string[] => {
  const args = splitSections(docstring).find((section) => section.name === ARGS_SECTION);
  if (!args) {
    return [];
  }
  return args.rawContent
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => unclosedParameterTypeRegex.test(line))
    .map((line) => `Unclosed parenthesis in parameter type: '${line}'`);
};

export const checkParameterTypes = (parsed: ParsedDocstring): string[] =>
  (parsed.args ?? [])
    .filter((arg) => arg.type === null)
    .map((arg) => `Parameter '${arg.name}' is missing a type in docstring`);

export const checkReferenceSources = (parsed: ParsedDocstring): string[] =>
  (parsed.references?.entries ?? []).flatMap((reference, index) =>
    reference.source.length ? [] : [`Reference #${index + 1} has an empty source`],
  );

/**
 * Runs every rule against one docstring and returns the messages in rule order.
 */
export const lintDocstring = (docstring: string, options: LintOptions = {}): string[] => {
  const {
    requireParamTypes = false,
    checkReferences = true,
    validateTypes = true,
    collectErrors = false,
  } = options;
  if (!docstring.trim().length) {
    return [];
  }

  const messages = [...checkReturnsSectionName(docstring)];

  const unclosed = checkUnclosedParameterTypes(docstring);
  if (unclosed.length) {
    return [...messages, ...unclosed];
  }

  let parsed: ParsedDocstring;
  try {
    parsed = parseDocstring(docstring, { validateTypes, collectErrors });
  } catch (error) {
    if (error instanceof DocstringError) {
      return [...messages, `Error parsing docstring: ${error.message}`];
    }
    throw error;
  }

  messages.push(...(parsed.errors ?? []).map((message) => `Error parsing docstring: ${message}`));
  if (requireParamTypes) {
    messages.push(...checkParameterTypes(parsed));
  }
  if (checkReferences) {
    messages.push(...checkReferenceSources(parsed));
  }
  return messages;
};
