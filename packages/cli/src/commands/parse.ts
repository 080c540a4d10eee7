/**
 * @file src/commands/parse.ts
 * @description Prints the parsed structure of one docstring as JSON.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { DocstringError, runParseWorkflow, type ParseWorkflowOptions } from '@docstring-lint/core';

interface ParseCliOptions {
  symbol?: string;
  validateTypes?: boolean;
  collectErrors?: boolean;
}

export const renderParseOutput = (options: ParseWorkflowOptions): string =>
  JSON.stringify(runParseWorkflow(options), null, 2);

const parseCommand = new Command('parse')
  .description('Parse a docstring file, or one symbol of a Python file, and print it as JSON')
  .argument('<file>', 'Docstring text file, or a .py file together with --symbol')
  .option('-s, --symbol <name>', 'Function or class whose docstring should be parsed')
  .option('--no-validate-types', 'Skip type annotation validation')
  .option('--collect-errors', 'Collect type and returns errors into "errors" instead of failing')
  .action((file: string, options: ParseCliOptions) => {
    try {
      console.log(
        renderParseOutput({
          file,
          symbol: options.symbol,
          validateTypes: options.validateTypes,
          collectErrors: options.collectErrors,
        }),
      );
    } catch (error) {
      if (error instanceof DocstringError) {
        console.error(chalk.red(`[parse] ${error.code}: ${error.message}`));
        process.exit(1);
      }
      if (error instanceof Error) {
        console.error(chalk.red(`[error] ${error.message}`));
        process.exit(1);
      }
      throw error;
    }
  });

export default parseCommand;
