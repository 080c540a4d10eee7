/**
 * @file src/lib/type-validator.ts
 * @description Checks a docstring type annotation for balanced brackets and for generic
 *              containers written without element types (`List`, `Dict[str, List]`, ...).
 *              Bracket structure is verified first with an explicit stack; the bare-container
 *              scan only runs once the brackets balance.
 */

import { TypeAnnotationError, type TypeAnnotationIssue } from '../errors';
import {
  CONTAINERS_REQUIRING_ARGS,
  PROSE_CONNECTIVES,
  PROSE_WORD_THRESHOLD,
} from '../shared/parser-config';
import type { ClosingBracket, OpeningBracket, TypeToken } from '../types/docstring';
import { tokenizeTypeAnnotation } from './type-tokenizer';

/**
 * Pluggable validator used by the Args and Returns parsers.
 */
export type TypeValidator = (expression: string) => TypeAnnotationIssue | null;

const CLOSER_FOR: Record<OpeningBracket, ClosingBracket> = {
  '[': ']',
  '(': ')',
  '{': '}',
};

export const isContainerName = (name: string): boolean => CONTAINERS_REQUIRING_ARGS.has(name);

/**
 * Long strings containing a connective are descriptions that ended up in a type slot.
 */
export const looksLikeProse = (expression: string): boolean => {
  const words = expression.trim().split(/\s+/);
  return (
    words.length > PROSE_WORD_THRESHOLD &&
    words.some((word) => PROSE_CONNECTIVES.has(word.toLowerCase()))
  );
};

const checkBrackets = (tokens: TypeToken[], expression: string): TypeAnnotationIssue | null => {
  const stack: OpeningBracket[] = [];

  for (const token of tokens) {
    if (token.kind === 'open') {
      stack.push(token.bracket);
      continue;
    }
    if (token.kind !== 'close') {
      continue;
    }
    const opener = stack.pop();
    if (!opener) {
      return { code: 'unbalanced_closing', expression, bracket: token.bracket };
    }
    if (CLOSER_FOR[opener] !== token.bracket) {
      return { code: 'mismatched_pair', expression, opening: opener, closing: token.bracket };
    }
  }

  if (stack.length) {
    return {
      code: 'unclosed_brackets',
      expression,
      unclosed: [...stack],
    };
  }
  return null;
};

const checkBareContainers = (tokens: TypeToken[], expression: string): TypeAnnotationIssue | null => {
  let depth = 0;
  for (const [index, token] of tokens.entries()) {
    if (token.kind === 'open') {
      depth += 1;
      continue;
    }
    if (token.kind === 'close') {
      depth -= 1;
      continue;
    }
    if (token.kind !== 'identifier' || !isContainerName(token.text)) {
      continue;
    }
    // Dotted names arrive as one identifier, so `pkg.List` only matches a listed spelling.
    if (tokens[index + 1]?.kind === 'open') {
      continue;
    }
    return { code: 'bare_container', expression, container: token.text, depth };
  }
  return null;
};

/**
 * Returns the first problem found in `expression`, or `null` when it is acceptable.
 */
export const checkTypeAnnotation: TypeValidator = (expression) => {
  const trimmed = expression.trim();
  if (!trimmed.length || looksLikeProse(trimmed)) {
    return null;
  }
  const tokens = tokenizeTypeAnnotation(trimmed);
  return checkBrackets(tokens, trimmed) ?? checkBareContainers(tokens, trimmed);
};

/**
 * Throwing variant of {@link checkTypeAnnotation}.
 */
export const validateTypeAnnotation = (expression: string): void => {
  const issue = checkTypeAnnotation(expression);
  if (issue) {
    throw new TypeAnnotationError(issue);
  }
};
