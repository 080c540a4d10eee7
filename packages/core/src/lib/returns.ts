/**
 * @file src/lib/returns.ts
 * @description Parses the body of a `Returns:` section. The section is either the literal
 *              `None` or `type: description`; a type without a description (or the reverse)
 *              is reported as malformed rather than returned as a partial record.
 */

import { throwingIssueHandler } from '../errors';
import type { ReturnRecord } from '../types/docstring';
import type { SectionParseOptions } from './args';
import { checkTypeAnnotation } from './type-validator';

const typeShapeRegex = /^[A-Za-z_][\w.]*(?:\s*\|\s*[A-Za-z_][\w.]*)*$/;

const OPENERS = '[({';
const CLOSERS = '])}';

/**
 * Removes bracketed argument lists so `Dict[str, int] | None` reads as `Dict | None`.
 */
const stripBracketed = (value: string): string => {
  let depth = 0;
  let outer = '';
  for (const char of value) {
    if (OPENERS.includes(char)) {
      depth += 1;
    } else if (CLOSERS.includes(char)) {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0) {
      outer += char;
    }
  }
  return outer;
};

export const looksLikeTypePrefix = (value: string): boolean =>
  typeShapeRegex.test(stripBracketed(value).trim());

export interface ReturnLineParts {
  type: string | null;
  rest: string;
}

/**
 * Splits `line` at the first top-level colon that is not a `scheme://` separator, keeping the
 * prefix only when it is shaped like a type annotation.
 */
export const splitReturnLine = (line: string): ReturnLineParts => {
  let depth = 0;
  for (let i = 0; i < line.length; i += 1) {
    const char = line[i];
    if (OPENERS.includes(char)) {
      depth += 1;
    } else if (CLOSERS.includes(char)) {
      depth = Math.max(0, depth - 1);
    } else if (char === ':' && depth === 0) {
      if (line.startsWith('//', i + 1)) {
        continue;
      }
      const prefix = line.slice(0, i).trim();
      if (prefix.length && looksLikeTypePrefix(prefix)) {
        return { type: prefix, rest: line.slice(i + 1).trim() };
      }
      break;
    }
  }
  return { type: null, rest: line.trim() };
};

export const parseReturns = (
  content: string,
  options: SectionParseOptions = {},
): ReturnRecord | undefined => {
  const {
    validator = checkTypeAnnotation,
    validateTypes = true,
    issues = throwingIssueHandler,
  } = options;
  const [firstLine = '', ...moreLines] = content.trim().split('\n');
  const first = firstLine.trim();
  if (!first.length) {
    return undefined;
  }
  if (first === 'None') {
    return { kind: 'none' };
  }

  const { type, rest } = splitReturnLine(first);
  if (type === null) {
    issues.report({ code: 'malformed_returns', line: first, reason: 'missing-type' });
    return undefined;
  }
  if (!rest.length) {
    issues.report({ code: 'malformed_returns', line: first, reason: 'missing-description', type });
    return undefined;
  }

  if (validateTypes) {
    const issue = validator(type);
    if (issue) {
      issues.report(issue);
    }
  }

  const continuation = moreLines.map((line) => line.trim()).filter((line) => line.length);
  return {
    kind: 'value',
    type,
    description: [rest, ...continuation].join('\n'),
  };
};
