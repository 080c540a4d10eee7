/**
 * @file src/lib/args.ts
 * @description Parses the body of an `Args:` section into parameter records.
 *              Parameter lines look like `name (type): description`; continuation lines keep
 *              their line breaks.
 */

import { throwingIssueHandler, type IssueHandler } from '../errors';
import type { ParameterRecord } from '../types/docstring';
import { checkTypeAnnotation, type TypeValidator } from './type-validator';

export interface SectionParseOptions {
  validator?: TypeValidator;
  validateTypes?: boolean;
  issues?: IssueHandler;
}

/**
 * `name`, optional `(type)` ending at the first `)` followed by the colon, then the description.
 */
const parameterRegex = /^(\*{0,2}\w+)(?:\s*\((.*?)\))?\s*:\s*(.*)$/;

const leadingSpaces = (line: string): number => line.length - line.trimStart().length;

export interface ParameterHeader {
  name: string;
  type: string | null;
  description: string;
}

export const matchParameterHeader = (line: string): ParameterHeader | null => {
  const match = parameterRegex.exec(line.trim());
  if (!match) {
    return null;
  }
  const type = match[2]?.trim();
  return {
    name: match[1],
    type: type ? type : null,
    description: match[3] ?? '',
  };
};

interface PendingParameter {
  header: ParameterHeader;
  lines: string[];
}

export const parseArgs = (content: string, options: SectionParseOptions = {}): ParameterRecord[] => {
  const {
    validator = checkTypeAnnotation,
    validateTypes = true,
    issues = throwingIssueHandler,
  } = options;
  const lines = content.split('\n');
  const records: ParameterRecord[] = [];
  let current: PendingParameter | null = null;
  let continuationIndent: number | null = null;

  const flush = () => {
    if (!current) return;
    records.push({
      name: current.header.name,
      type: current.header.type,
      description: current.lines.join('\n').trim(),
    });
    current = null;
  };

  lines.forEach((line, index) => {
    const stripped = line.trim();
    if (!stripped.length) {
      return;
    }

    const header = matchParameterHeader(line);
    if (header) {
      flush();
      if (validateTypes && header.type) {
        const issue = validator(header.type);
        if (issue) {
          issues.report(issue);
        }
      }
      current = { header, lines: header.description ? [header.description] : [] };
      const next = lines[index + 1];
      continuationIndent = next !== undefined && next.trim().length ? leadingSpaces(next) : null;
      return;
    }

    if (current && (continuationIndent === null || leadingSpaces(line) >= continuationIndent)) {
      current.lines.push(stripped);
    }
  });
  flush();

  return records;
};
