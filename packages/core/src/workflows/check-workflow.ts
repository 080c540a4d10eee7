/**
 * @file src/workflows/check-workflow.ts
 * @description Walks Python files, extracts their docstrings and lints each one.
 */

import fs from 'node:fs';
import path from 'node:path';
import { lintDocstring, type LintOptions } from '../lib/lint';
import { extractPythonDocstrings } from '../lib/python-source';

export interface CheckWorkflowOptions extends LintOptions {
  paths: string[];
  excludeFiles?: string[];
  /** Called before each file is read. */
  onFile?: (file: string) => void;
}

export interface CheckDiagnostic {
  file: string;
  line: number;
  name: string;
  message: string;
}

export interface CheckWorkflowResult {
  filesChecked: number;
  docstringsChecked: number;
  diagnostics: CheckDiagnostic[];
  /** Inputs that are neither a directory nor a `.py` file. */
  skipped: string[];
}

export const formatDiagnostic = (diagnostic: CheckDiagnostic): string =>
  `${diagnostic.file}:${diagnostic.line}: ${diagnostic.message} in '${diagnostic.name}'`;

const toPosix = (file: string): string => file.split(path.sep).join('/');

export const isExcluded = (file: string, patterns: string[]): boolean => {
  const normalized = toPosix(file);
  const base = path.basename(file);
  return patterns.some((pattern) => base === pattern || normalized.endsWith(`/${pattern}`));
};

const isPythonFile = (file: string): boolean => file.endsWith('.py');

const walkPythonFiles = (dir: string): string[] => {
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));
  return entries.flatMap((entry) => {
    const target = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      return walkPythonFiles(target);
    }
    return entry.isFile() && isPythonFile(entry.name) ? [target] : [];
  });
};

/**
 * Expands the given paths into the Python files to check, in input order. Directories are walked
 * in name order; a file reached twice is only checked once.
 */
export const collectPythonFiles = (
  inputs: string[],
  excludeFiles: string[] = [],
): { files: string[]; skipped: string[] } => {
  const files: string[] = [];
  const skipped: string[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const stat = fs.existsSync(input) ? fs.statSync(input) : null;
    let candidates: string[];
    if (stat?.isDirectory()) {
      candidates = walkPythonFiles(input);
    } else if (stat?.isFile() && isPythonFile(input)) {
      candidates = [input];
    } else {
      skipped.push(input);
      continue;
    }
    for (const file of candidates) {
      const key = path.resolve(file);
      if (seen.has(key) || isExcluded(file, excludeFiles)) {
        continue;
      }
      seen.add(key);
      files.push(file);
    }
  }

  return { files, skipped };
};

export const checkPythonSource = (
  file: string,
  source: string,
  options: LintOptions = {},
): { docstringsChecked: number; diagnostics: CheckDiagnostic[] } => {
  const docstrings = extractPythonDocstrings(source);
  const diagnostics = docstrings.flatMap(({ name, line, docstring }) =>
    lintDocstring(docstring, options).map((message) => ({ file, line, name, message })),
  );
  return { docstringsChecked: docstrings.length, diagnostics };
};

export const runCheckWorkflow = (options: CheckWorkflowOptions): CheckWorkflowResult => {
  const { paths: inputs, excludeFiles = [], onFile, ...lintOptions } = options;
  const { files, skipped } = collectPythonFiles(inputs, excludeFiles);

  const result: CheckWorkflowResult = {
    filesChecked: 0,
    docstringsChecked: 0,
    diagnostics: [],
    skipped,
  };

  for (const file of files) {
    onFile?.(file);
    const source = fs.readFileSync(file, 'utf8');
    const checked = checkPythonSource(file, source, lintOptions);
    result.filesChecked += 1;
    result.docstringsChecked += checked.docstringsChecked;
    result.diagnostics.push(...checked.diagnostics);
  }

  return result;
};
