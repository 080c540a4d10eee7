/**
 * @file src/types/docstring.ts
 * @description Structured records produced by the docstring pipeline: sections, parameters,
 *              return information, references, and the assembled `ParsedDocstring`.
 *              Sections missing from a docstring are absent optional fields; a missing parameter
 *              type is `null` and a missing description is `''`.
 */

export interface Section {
  /** Header text as written, without the trailing colon. */
  name: string;
  /** Section body with one level of indentation removed. */
  rawContent: string;
}

export interface ParameterRecord {
  name: string;
  /** `null` when the parameter line carries no parenthesised annotation. */
  type: string | null;
  description: string;
}

export type ReturnRecord =
  | { kind: 'none' }
  | {
      kind: 'value';
      type: string;
      description: string;
    };

export interface ReferenceRecord {
  description: string;
  source: string;
}

export type ReferenceHeading = 'References' | 'Reference';

export interface ReferenceList {
  /** Which header spelling introduced the list. */
  heading: ReferenceHeading;
  entries: ReferenceRecord[];
}

export interface ParsedDocstring {
  description?: string;
  args?: ParameterRecord[];
  returns?: ReturnRecord;
  references?: ReferenceList;
  otherSections?: Record<string, string>;
  /** Collected validation messages; only present in collect mode when non-empty. */
  errors?: string[];
}

export interface ParseOptions {
  /** Run the type annotation validator on Args and Returns types (default `true`). */
  validateTypes?: boolean;
  /** Collect type/returns failures into `errors` instead of throwing (default `false`). */
  collectErrors?: boolean;
}

export type TypeToken =
  | { kind: 'identifier'; text: string }
  | { kind: 'string'; text: string }
  | { kind: 'open'; bracket: OpeningBracket }
  | { kind: 'close'; bracket: ClosingBracket }
  | { kind: 'comma' };

export type OpeningBracket = '[' | '(' | '{';
export type ClosingBracket = ']' | ')' | '}';
