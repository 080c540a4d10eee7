/**
 * @file src/lib/sections.ts
 * @description Segments a docstring into named sections delimited by `Header:` lines.
 *              Each section loses exactly one level of indentation (the indent of its first
 *              content line) so relative indentation inside descriptions survives.
 */

import { DESCRIPTION_SECTION, SECTION_INDENT } from '../shared/parser-config';
import type { Section } from '../types/docstring';

const headerRegex = /^([A-Za-z][A-Za-z0-9 ]+):$/;

const leadingSpaces = (line: string): number => line.length - line.trimStart().length;

/**
 * Returns the header name when `line` is a section header.
 */
export const matchSectionHeader = (line: string): string | null => {
  const match = headerRegex.exec(line.trim());
  return match ? match[1] : null;
};

export const splitSections = (text: string): Section[] => {
  const sections = new Map<string, string>();
  let currentName = DESCRIPTION_SECTION;
  let buffer: string[] = [];
  let indentLevel: number | null = null;

  const closeSection = () => {
    if (buffer.length) {
      sections.set(currentName, buffer.join('\n').trim());
      buffer = [];
    }
  };

  for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
    const stripped = line.trim();
    if (!stripped.length && !buffer.length) {
      continue;
    }

    const header = matchSectionHeader(line);
    if (header) {
      closeSection();
      currentName = header;
      indentLevel = null;
      continue;
    }

    if (indentLevel === null && stripped.length) {
      indentLevel = leadingSpaces(line);
    }
    if (indentLevel !== null && line.startsWith(' '.repeat(indentLevel))) {
      buffer.push(line.slice(indentLevel));
    } else {
      buffer.push(line);
    }
  }
  closeSection();

  return Array.from(sections, ([name, rawContent]) => ({ name, rawContent }));
};

const indentBlock = (content: string): string =>
  content
    .split('\n')
    .map((line) => (line.trim().length ? `${SECTION_INDENT}${line}` : ''))
    .join('\n');

/**
 * Serialises sections back into docstring text that {@link splitSections} reads identically.
 */
export const joinSections = (sections: Section[]): string =>
  sections
    .map((section) =>
      section.name === DESCRIPTION_SECTION
        ? section.rawContent
        : `${section.name}:\n${indentBlock(section.rawContent)}`,
    )
    .join('\n\n');
