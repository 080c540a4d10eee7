/**
 * @file src/commands/check.ts
 * @description CLI wiring for the check workflow. Paths and rule switches come from flags first,
 *              then `.docstringlintrc.json`, then the defaults.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import {
  CONFIG_FILENAME,
  formatDiagnostic,
  resolveCheckConfig,
  runCheckWorkflow,
  type CheckWorkflowResult,
} from '@docstring-lint/core';
import { parseList, pluralize } from '../utils';

interface CheckCliOptions {
  requireParamTypes?: boolean;
  checkReferences?: boolean;
  validateTypes?: boolean;
  collectErrors?: boolean;
  excludeFiles?: string[];
  verbose?: boolean;
}

export interface CheckReport {
  diagnostics: string[];
  notes: string[];
  summary: string;
  exitCode: number;
}

/**
 * Turns a workflow result into the lines the command prints, uncoloured.
 */
export const renderCheckReport = (result: CheckWorkflowResult, verbose = false): CheckReport => {
  const notes = result.skipped.map((input) => `[check] Skipped ${input}: not a directory or .py file`);
  if (verbose) {
    notes.push(
      `[check] Checked ${pluralize(result.docstringsChecked, 'docstring')} in ${pluralize(result.filesChecked, 'file')}`,
    );
  }
  const count = result.diagnostics.length;
  return {
    diagnostics: result.diagnostics.map(formatDiagnostic),
    notes,
    summary: count ? `Found ${count} error(s)` : '[check] No docstring errors found',
    exitCode: count ? 1 : 0,
  };
};

const checkCommand = new Command('check')
  .description('Check Google-style docstrings in Python files and directories')
  .argument('[paths...]', `Files or directories to check (default: "paths" in ${CONFIG_FILENAME})`)
  .option('--require-param-types', 'Report parameters documented without a type')
  .option('--check-references', 'Report references without a source (default)')
  .option('--no-check-references', 'Skip the reference source check')
  .option('--exclude-files <list>', 'Comma-separated file names or path suffixes to skip', parseList)
  .option('--validate-types', 'Validate type annotations (default)')
  .option('--no-validate-types', 'Skip type annotation validation')
  .option('--collect-errors', 'Report every type and returns error instead of the first')
  .option('-v, --verbose', 'Print each file as it is checked')
  .action((paths: string[], options: CheckCliOptions) => {
    const { config, warning } = resolveCheckConfig({ ...options, paths });
    if (warning) {
      console.warn(chalk.yellow(`[check] ${warning}`));
    }
    if (!config.paths.length) {
      console.log(
        chalk.yellow(
          `[check] Nothing to check. Pass paths or set "paths" in ${CONFIG_FILENAME} (see 'docstring-lint init').`,
        ),
      );
      return;
    }

    const spinner = config.verbose ? null : ora('[check] scanning').start();
    let result: CheckWorkflowResult;
    try {
      result = runCheckWorkflow({
        paths: config.paths,
        excludeFiles: config.excludeFiles,
        requireParamTypes: config.requireParamTypes,
        checkReferences: config.checkReferences,
        validateTypes: config.validateTypes,
        collectErrors: config.collectErrors,
        onFile: (file) => {
          if (spinner) {
            spinner.text = `[check] ${file}`;
          } else {
            console.log(chalk.gray(`[check] ${file}`));
          }
        },
      });
    } catch (error) {
      spinner?.fail('[check] failed');
      throw error;
    }
    spinner?.stop();

    const report = renderCheckReport(result, config.verbose);
    report.notes.forEach((note) => console.log(chalk.gray(note)));
    report.diagnostics.forEach((line) => console.log(line));
    console.log(report.exitCode ? chalk.red(report.summary) : chalk.green(report.summary));
    if (report.exitCode) {
      process.exit(report.exitCode);
    }
  });

export default checkCommand;
