/**
 * @file src/commands/init.ts
 * @description Interactive/non-interactive configuration. Captures the paths to check, excluded
 *              files and rule switches in `.docstringlintrc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import prompts from 'prompts';
import {
  configPath,
  DocstringLintConfigSchema,
  loadConfig,
  writeConfig,
  type DocstringLintConfig,
} from '@docstring-lint/core';
import { parseList } from '../utils';

type InitOptions = {
  paths?: string[];
  excludeFiles?: string[];
  requireParamTypes?: boolean;
  checkReferences?: boolean;
  validateTypes?: boolean;
  collectErrors?: boolean;
  verbose?: boolean;
  yes?: boolean;
};

const PromptAnswersSchema = DocstringLintConfigSchema.partial();

const toggle = (
  skip: boolean,
  name: keyof DocstringLintConfig,
  message: string,
  initial: boolean,
): prompts.PromptObject => ({
  type: skip ? null : 'toggle',
  name,
  message,
  initial,
  active: 'yes',
  inactive: 'no',
});

/**
 * Flag values win over answers, which win over what the file already holds.
 */
export const mergeInitValues = (
  existing: DocstringLintConfig,
  options: InitOptions,
  answers: Partial<DocstringLintConfig>,
): DocstringLintConfig => ({
  paths: options.paths ?? answers.paths ?? existing.paths,
  excludeFiles: options.excludeFiles ?? answers.excludeFiles ?? existing.excludeFiles,
  requireParamTypes:
    options.requireParamTypes ?? answers.requireParamTypes ?? existing.requireParamTypes,
  checkReferences: options.checkReferences ?? answers.checkReferences ?? existing.checkReferences,
  validateTypes: options.validateTypes ?? answers.validateTypes ?? existing.validateTypes,
  collectErrors: options.collectErrors ?? answers.collectErrors ?? existing.collectErrors,
  verbose: options.verbose ?? answers.verbose ?? existing.verbose,
});

const initCommand = new Command('init')
  .description('Write default paths and rule switches to .docstringlintrc.json')
  .option('--paths <list>', 'Comma-separated files or directories to check', parseList)
  .option('--exclude-files <list>', 'Comma-separated file names or path suffixes to skip', parseList)
  .option('--require-param-types', 'Require a type on every documented parameter')
  .option('--no-require-param-types', 'Allow parameters without a type')
  .option('--check-references', 'Report references without a source')
  .option('--no-check-references', 'Skip the reference source check')
  .option('--validate-types', 'Validate type annotations')
  .option('--no-validate-types', 'Skip type annotation validation')
  .option('--collect-errors', 'Report every type and returns error instead of the first')
  .option('--no-collect-errors', 'Stop at the first type or returns error')
  .option('--verbose', 'Print each file as it is checked')
  .option('--no-verbose', 'Show a spinner instead of the file list')
  .option('-y, --yes', 'Accept current values without prompting')
  .action(async (options: InitOptions) => {
    const { config: existing, warning } = loadConfig();
    if (warning) {
      console.warn(chalk.yellow(`[init] ${warning}`));
    }
    const onCancel = () => {
      console.log(chalk.yellow('Initialization cancelled.'));
      process.exit(1);
    };

    const questions: prompts.PromptObject[] = options.yes
      ? []
      : [
          {
            type: options.paths ? null : 'list',
            name: 'paths',
            message: 'Files or directories to check (comma-separated)',
            initial: existing.paths.join(', '),
            separator: ',',
          },
          {
            type: options.excludeFiles ? null : 'list',
            name: 'excludeFiles',
            message: 'Files to exclude (comma-separated, optional)',
            initial: existing.excludeFiles.join(', '),
            separator: ',',
          },
          toggle(
            options.requireParamTypes !== undefined,
            'requireParamTypes',
            'Require a type on every documented parameter?',
            existing.requireParamTypes,
          ),
          toggle(
            options.checkReferences !== undefined,
            'checkReferences',
            'Report references without a source?',
            existing.checkReferences,
          ),
          toggle(
            options.validateTypes !== undefined,
            'validateTypes',
            'Validate type annotations?',
            existing.validateTypes,
          ),
          toggle(
            options.collectErrors !== undefined,
            'collectErrors',
            'Collect every type error instead of stopping at the first?',
            existing.collectErrors,
          ),
        ];

    const responses = await prompts(questions, { onCancel });
    const answers = PromptAnswersSchema.parse({
      ...responses,
      paths: Array.isArray(responses.paths) ? parseList(responses.paths.join(',')) : undefined,
      excludeFiles: Array.isArray(responses.excludeFiles)
        ? parseList(responses.excludeFiles.join(','))
        : undefined,
    });

    const updated = writeConfig(mergeInitValues(existing, options, answers));

    console.log(chalk.green('docstring-lint configured successfully.'));
    console.log(chalk.gray(`   Saved to ${configPath()}`));
    console.log(
      [
        '',
        'Current defaults:',
        `  • Paths: ${updated.paths.length ? updated.paths.join(', ') : '(none)'}`,
        `  • Excluded files: ${updated.excludeFiles.length ? updated.excludeFiles.join(', ') : '(none)'}`,
        `  • Require parameter types: ${updated.requireParamTypes ? 'yes' : 'no'}`,
        `  • Check references: ${updated.checkReferences ? 'yes' : 'no'}`,
        `  • Validate types: ${updated.validateTypes ? 'yes' : 'no'}`,
        `  • Collect errors: ${updated.collectErrors ? 'yes' : 'no'}`,
        '',
      ].join('\n'),
    );
  });

export default initCommand;
