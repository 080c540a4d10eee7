/**
 * @file tests/check-workflow.test.ts
 * @description File discovery, exclusion and diagnostics of the check workflow.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  checkPythonSource,
  formatDiagnostic,
  isExcluded,
  runCheckWorkflow,
} from '../src/workflows/check-workflow';

const A_PY = [
  'def ok(x):',
  '    """Fine.',
  '',
  '    Args:',
  '        x (int): Value.',
  '    """',
  '',
  '',
  'def bad(items):',
  '    """Bad.',
  '',
  '    Args:',
  '        items (List): Items.',
  '    """',
  '',
].join('\n');

const B_PY = ['def untyped(x):', '    """Doc.', '', '    Args:', '        x: Value.', '    """', ''].join(
  '\n',
);

const SETUP_PY = ['def s():', '    """Setup.', '', '    returns:', '        None', '    """', ''].join(
  '\n',
);

let root: string;
let pkg: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'docstring-lint-check-'));
  pkg = path.join(root, 'pkg');
  fs.mkdirSync(path.join(pkg, 'sub'), { recursive: true });
  fs.writeFileSync(path.join(pkg, 'a.py'), A_PY, 'utf8');
  fs.writeFileSync(path.join(pkg, 'sub', 'b.py'), B_PY, 'utf8');
  fs.writeFileSync(path.join(pkg, 'setup.py'), SETUP_PY, 'utf8');
  fs.writeFileSync(path.join(pkg, 'notes.txt'), 'not python', 'utf8');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('runCheckWorkflow', () => {
  it('walks directories, honours exclusions and reports diagnostics', () => {
    const visited: string[] = [];
    const missing = path.join(root, 'missing.txt');
    const result = runCheckWorkflow({
      paths: [pkg, missing],
      excludeFiles: ['setup.py'],
      requireParamTypes: true,
      onFile: (file) => visited.push(file),
    });

    const aPath = path.join(pkg, 'a.py');
    const bPath = path.join(pkg, 'sub', 'b.py');
    expect(visited).toEqual([aPath, bPath]);
    expect(result).toEqual({
      filesChecked: 2,
      docstringsChecked: 3,
      skipped: [missing],
      diagnostics: [
        {
          file: aPath,
          line: 9,
          name: 'bad',
          message:
            "Error parsing docstring: Collection type 'List' must include element types (e.g., List[str])",
        },
        {
          file: bPath,
          line: 1,
          name: 'untyped',
          message: "Parameter 'x' is missing a type in docstring",
        },
      ],
    });
  });

  it('checks a file passed directly and only once', () => {
    const setup = path.join(pkg, 'setup.py');
    const result = runCheckWorkflow({ paths: [setup, setup] });
    expect(result.filesChecked).toBe(1);
    expect(result.diagnostics.map(formatDiagnostic)).toEqual([
      `${setup}:1: Invalid section name 'returns:', use 'Returns:' instead in 's'`,
    ]);
  });

  it('excludes files by path suffix', () => {
    const result = runCheckWorkflow({ paths: [pkg], excludeFiles: ['sub/b.py', 'setup.py'] });
    expect(result.filesChecked).toBe(1);
  });
});

describe('isExcluded', () => {
  it('matches basenames and path suffixes exactly', () => {
    expect(isExcluded('/repo/setup.py', ['setup.py'])).toBe(true);
    expect(isExcluded('/repo/mysetup.py', ['setup.py'])).toBe(false);
    expect(isExcluded('/repo/pkg/sub/b.py', ['sub/b.py'])).toBe(true);
    expect(isExcluded('/repo/pkg/b.py', ['sub/b.py'])).toBe(false);
  });
});

describe('checkPythonSource', () => {
  it('respects the reference switch', () => {
    const source = [
      'def cite():',
      '    """Cites.',
      '',
      '    References:',
      '        - Draft:',
      '        - Guide: https://example.org',
      '    """',
      '',
    ].join('\n');
    expect(checkPythonSource('cite.py', source).diagnostics).toEqual([
      { file: 'cite.py', line: 1, name: 'cite', message: 'Reference #1 has an empty source' },
    ]);
    expect(checkPythonSource('cite.py', source, { checkReferences: false })).toEqual({
      docstringsChecked: 1,
      diagnostics: [],
    });
  });
});
