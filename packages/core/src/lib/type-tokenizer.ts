/**
 * @file src/lib/type-tokenizer.ts
 * @description Splits a type annotation such as `Dict[str, Literal["a,b"]]` into a typed token
 *              stream. String literals are masked with positional placeholders before scanning so
 *              brackets and commas inside them are never structural.
 */

import type { ClosingBracket, OpeningBracket, TypeToken } from '../types/docstring';

const STRING_LITERAL_REGEX = /"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'/g;
const PLACEHOLDER_REGEX = /\u0000(\d+)\u0000/g;
const EXACT_PLACEHOLDER_REGEX = /^\u0000(\d+)\u0000$/;

const OPENING: ReadonlySet<string> = new Set(['[', '(', '{']);
const CLOSING: ReadonlySet<string> = new Set([']', ')', '}']);

const isOpening = (char: string): char is OpeningBracket => OPENING.has(char);
const isClosing = (char: string): char is ClosingBracket => CLOSING.has(char);

export interface MaskedLiterals {
  text: string;
  literals: string[];
}

/**
 * Replaces each quoted string literal with a `\u0000<index>\u0000` placeholder.
 */
export const maskStringLiterals = (expression: string): MaskedLiterals => {
  const literals: string[] = [];
  const text = expression.replace(STRING_LITERAL_REGEX, (literal) => {
    literals.push(literal);
    return `\u0000${literals.length - 1}\u0000`;
  });
  return { text, literals };
};

const restoreLiterals = (text: string, literals: string[]): string =>
  text.replace(PLACEHOLDER_REGEX, (placeholder, index: string) => literals[Number(index)] ?? placeholder);

const toWordToken = (word: string, literals: string[]): TypeToken => {
  const exact = EXACT_PLACEHOLDER_REGEX.exec(word);
  if (exact) {
    const literal = literals[Number(exact[1])];
    if (literal !== undefined) {
      return { kind: 'string', text: literal };
    }
  }
  return { kind: 'identifier', text: restoreLiterals(word, literals) };
};

export const tokenizeTypeAnnotation = (expression: string): TypeToken[] => {
  const { text, literals } = maskStringLiterals(expression);
  const tokens: TypeToken[] = [];
  let word = '';

  const flushWord = () => {
    if (word.length) {
      tokens.push(toWordToken(word, literals));
      word = '';
    }
  };

  for (const char of text) {
    if (isOpening(char)) {
      flushWord();
      tokens.push({ kind: 'open', bracket: char });
    } else if (isClosing(char)) {
      flushWord();
      tokens.push({ kind: 'close', bracket: char });
    } else if (char === ',') {
      flushWord();
      tokens.push({ kind: 'comma' });
    } else if (/\s/.test(char)) {
      flushWord();
    } else {
      word += char;
    }
  }
  flushWord();

  return tokens;
};

/**
 * Renders tokens back to their source spelling, mainly for diagnostics and tests.
 */
export const tokenText = (token: TypeToken): string => {
  switch (token.kind) {
    case 'identifier':
    case 'string':
      return token.text;
    case 'open':
    case 'close':
      return token.bracket;
    case 'comma':
      return ',';
  }
};
