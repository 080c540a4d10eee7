/**
 * @file src/lib/references.ts
 * @description Parses `References:` / `Reference:` sections into `{description, source}` pairs.
 *              A single reference is written bare; two or more are a dash list. Entries may wrap
 *              onto indented continuation lines, which are joined with single spaces.
 *
 *              Check order is fixed: dash rules over the whole list first, then per entry the
 *              colon split, then the empty-description check.
 */

import { ReferenceFormatError } from '../errors';
import type { ReferenceRecord } from '../types/docstring';

interface ReferenceEntry {
  text: string;
  indent: number;
}

const leadingSpaces = (line: string): number => line.length - line.trimStart().length;

const startsWithDash = (text: string): boolean => text.startsWith('-');

/**
 * Groups physical lines into logical entries.
 */
export const groupReferenceEntries = (content: string): string[] => {
  const entries: ReferenceEntry[] = [];

  for (const line of content.split('\n')) {
    const stripped = line.trim();
    if (!stripped.length) {
      continue;
    }
    const indent = leadingSpaces(line);
    const previous: ReferenceEntry | undefined = entries[entries.length - 1];
    const continues =
      previous !== undefined &&
      !startsWithDash(stripped) &&
      !(indent <= previous.indent && stripped.includes(':'));

    if (previous && continues) {
      previous.text = `${previous.text} ${stripped}`;
    } else {
      entries.push({ text: stripped, indent });
    }
  }

  return entries.map((entry) => entry.text);
};

/**
 * Index of the first colon that is not part of a `scheme://` separator, or -1.
 */
export const findSeparatorColon = (text: string): number => {
  for (let i = 0; i < text.length; i += 1) {
    if (text[i] === ':' && !text.startsWith('//', i + 1)) {
      return i;
    }
  }
  return -1;
};

const stripDash = (text: string): string => (startsWithDash(text) ? text.slice(1).trim() : text);

export const parseReferences = (content: string): ReferenceRecord[] => {
  const entries = groupReferenceEntries(content);
  if (!entries.length) {
    return [];
  }

  if (entries.length === 1) {
    if (startsWithDash(entries[0])) {
      throw new ReferenceFormatError({ code: 'dash_in_single', line: entries[0] });
    }
  } else {
    const undashed = entries.find((entry) => !startsWithDash(entry));
    if (undashed !== undefined) {
      throw new ReferenceFormatError({ code: 'missing_dash', line: undashed });
    }
  }

  return entries.map((entry) => {
    const text = stripDash(entry);
    const colon = findSeparatorColon(text);
    if (colon === -1) {
      throw new ReferenceFormatError({ code: 'missing_colon', line: entry });
    }
    const description = text.slice(0, colon).trim();
    if (!description.length) {
      throw new ReferenceFormatError({ code: 'empty_description', line: entry });
    }
    return { description, source: text.slice(colon + 1).trim() };
  });
};
