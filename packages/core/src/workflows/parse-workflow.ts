/**
 * @file src/workflows/parse-workflow.ts
 * @description Loads a docstring from disk, either a plain text file or one symbol of a Python
 *              module, and parses it.
 */

import fs from 'node:fs';
import { parseDocstring } from '../lib/docstring';
import { extractPythonDocstrings } from '../lib/python-source';
import type { ParseOptions, ParsedDocstring } from '../types/docstring';

export interface ParseWorkflowOptions extends ParseOptions {
  file: string;
  /** Name of a function or class in a `.py` file; the first match wins. */
  symbol?: string;
}

export const loadDocstringText = (file: string, symbol?: string): string => {
  if (!fs.existsSync(file)) {
    throw new Error(`File not found: ${file}`);
  }
  const source = fs.readFileSync(file, 'utf8');
  if (!symbol) {
    return source;
  }
  const match = extractPythonDocstrings(source).find((entry) => entry.name === symbol);
  if (!match) {
    throw new Error(`No docstring found for '${symbol}' in ${file}.`);
  }
  return match.docstring;
};

export const runParseWorkflow = (options: ParseWorkflowOptions): ParsedDocstring => {
  const { file, symbol, ...parseOptions } = options;
  return parseDocstring(loadDocstringText(file, symbol), parseOptions);
};
