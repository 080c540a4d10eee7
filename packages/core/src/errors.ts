/**
 * @file src/errors.ts
 * @description Failure taxonomy for docstring parsing. Every failure is a tagged issue
 *              (discriminated by `code`) wrapped in a `DocstringError` subclass so callers can
 *              either catch by class or switch exhaustively on `error.issue.code`.
 */

import type { ClosingBracket, OpeningBracket } from './types/docstring';

export type TypeAnnotationIssue =
  | {
      code: 'bare_container';
      expression: string;
      container: string;
      /** Bracket nesting depth at which the bare name appeared. */
      depth: number;
    }
  | {
      code: 'unbalanced_closing';
      expression: string;
      bracket: ClosingBracket;
    }
  | {
      code: 'mismatched_pair';
      expression: string;
      opening: OpeningBracket;
      closing: ClosingBracket;
    }
  | {
      code: 'unclosed_brackets';
      expression: string;
      unclosed: OpeningBracket[];
    };

export interface ReturnsIssue {
  code: 'malformed_returns';
  line: string;
  reason: 'missing-description' | 'missing-type';
  type?: string;
}

export type ReferenceIssueCode = 'missing_dash' | 'dash_in_single' | 'missing_colon' | 'empty_description';

export interface ReferenceIssue {
  code: ReferenceIssueCode;
  line: string;
}

export type DocstringIssue = TypeAnnotationIssue | ReturnsIssue | ReferenceIssue;

export type DocstringIssueCode = DocstringIssue['code'];

/**
 * Renders the human-readable message for an issue.
 */
export const describeIssue = (issue: DocstringIssue): string => {
  switch (issue.code) {
    case 'bare_container':
      return issue.depth === 0
        ? `Collection type '${issue.container}' must include element types (e.g., ${issue.container}[str])`
        : `Nested collection type '${issue.container}' must include element types in '${issue.expression}'`;
    case 'unbalanced_closing':
      return `Unbalanced closing bracket '${issue.bracket}' in type annotation '${issue.expression}'`;
    case 'mismatched_pair':
      return `Mismatched brackets: '${issue.opening}' closed by '${issue.closing}' in type annotation '${issue.expression}'`;
    case 'unclosed_brackets':
      return `Unclosed brackets '${issue.unclosed.join('')}' in type annotation '${issue.expression}'`;
    case 'malformed_returns':
      return issue.reason === 'missing-description'
        ? `Returns section declares type '${issue.type ?? ''}' without a description: '${issue.line}'`
        : `Returns section must be 'None' or start with a type annotation: '${issue.line}'`;
    case 'missing_dash':
      return `Multiple references must each start with a dash: '${issue.line}'`;
    case 'dash_in_single':
      return `A single reference must not start with a dash: '${issue.line}'`;
    case 'missing_colon':
      return `Reference must separate description and source with a colon: '${issue.line}'`;
    case 'empty_description':
      return `Reference has an empty description: '${issue.line}'`;
    default: {
      const exhaustive: never = issue;
      return exhaustive;
    }
  }
};

/**
 * Base class for all parse failures.
 */
export class DocstringError extends Error {
  public readonly code: DocstringIssueCode;
  public readonly issue: DocstringIssue;

  constructor(issue: DocstringIssue) {
    super(describeIssue(issue));
    this.code = issue.code;
    this.issue = issue;
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      issue: this.issue,
    };
  }
}

export class TypeAnnotationError extends DocstringError {
  declare readonly issue: TypeAnnotationIssue;

  constructor(issue: TypeAnnotationIssue) {
    super(issue);
  }
}

export class ReturnsFormatError extends DocstringError {
  declare readonly issue: ReturnsIssue;

  constructor(issue: ReturnsIssue) {
    super(issue);
  }
}

export class ReferenceFormatError extends DocstringError {
  declare readonly issue: ReferenceIssue;

  constructor(issue: ReferenceIssue) {
    super(issue);
  }
}

/**
 * Strategy for validation failures that may either abort the parse or be accumulated.
 * Reference failures never go through a handler; they always throw.
 */
export interface IssueHandler {
  report(issue: TypeAnnotationIssue | ReturnsIssue): void;
}

export const throwingIssueHandler: IssueHandler = {
  report(issue) {
    if (issue.code === 'malformed_returns') {
      throw new ReturnsFormatError(issue);
    }
    throw new TypeAnnotationError(issue);
  },
};

export const collectingIssueHandler = (errors: string[]): IssueHandler => ({
  report(issue) {
    errors.push(describeIssue(issue));
  },
});
