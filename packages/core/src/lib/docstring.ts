/**
 * @file src/lib/docstring.ts
 * @description Assembles a `ParsedDocstring` from raw docstring text: splits sections, runs the
 *              Args/Returns/References parsers, and passes every other section through.
 *              `collectErrors` is resolved once into an issue handler shared by the sub-parsers;
 *              reference-format failures always throw.
 */

import { collectingIssueHandler, throwingIssueHandler } from '../errors';
import {
  ARGS_SECTION,
  DESCRIPTION_SECTION,
  REFERENCE_SECTIONS,
  RETURNS_SECTION,
} from '../shared/parser-config';
import type {
  ParseOptions,
  ParsedDocstring,
  ReferenceHeading,
  Section,
} from '../types/docstring';
import { parseArgs, type SectionParseOptions } from './args';
import { parseReferences } from './references';
import { parseReturns } from './returns';
import { splitSections } from './sections';
import { checkTypeAnnotation } from './type-validator';

const REFERENCE_HEADINGS: ReadonlySet<string> = new Set<string>(REFERENCE_SECTIONS);

const isReferenceHeading = (name: string): name is ReferenceHeading =>
  REFERENCE_HEADINGS.has(name);

const STRUCTURED_SECTIONS: ReadonlySet<string> = new Set([
  DESCRIPTION_SECTION,
  ARGS_SECTION,
  RETURNS_SECTION,
]);

export const parseDocstring = (text: string, options: ParseOptions = {}): ParsedDocstring => {
  const trimmed = text.trim();
  if (!trimmed.length) {
    return {};
  }

  const { validateTypes = true, collectErrors = false } = options;
  const errors: string[] = [];
  const sectionOptions: SectionParseOptions = {
    validator: checkTypeAnnotation,
    validateTypes,
    issues: collectErrors ? collectingIssueHandler(errors) : throwingIssueHandler,
  };

  const sections: Section[] = splitSections(trimmed);
  const byName = new Map(sections.map((section) => [section.name, section.rawContent]));
  const result: ParsedDocstring = {
    description: byName.get(DESCRIPTION_SECTION) ?? '',
  };

  const argsContent = byName.get(ARGS_SECTION);
  if (argsContent !== undefined) {
    result.args = parseArgs(argsContent, sectionOptions);
  }

  const returnsContent = byName.get(RETURNS_SECTION);
  if (returnsContent !== undefined) {
    const returns = parseReturns(returnsContent, sectionOptions);
    if (returns) {
      result.returns = returns;
    }
  }

  // First of References/Reference wins; the other stays a passthrough section.
  let referenceSection: Section | undefined;
  for (const section of sections) {
    if (isReferenceHeading(section.name)) {
      referenceSection = section;
      result.references = {
        heading: section.name,
        entries: parseReferences(section.rawContent),
      };
      break;
    }
  }

  const otherSections: Record<string, string> = {};
  for (const section of sections) {
    if (STRUCTURED_SECTIONS.has(section.name) || section === referenceSection) {
      continue;
    }
    otherSections[section.name] = section.rawContent.trimEnd();
  }
  if (Object.keys(otherSections).length) {
    result.otherSections = otherSections;
  }

  if (collectErrors && errors.length) {
    result.errors = errors;
  }
  return result;
};
