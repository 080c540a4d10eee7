#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the docstring-lint CLI, which checks Google-style docstrings in Python
 *              sources: section layout, parameter and return types, and reference lists.
 *
 * Commands exposed by the entry point:
 *   - `init`: capture paths, exclusions and rule switches in `.docstringlintrc.json`.
 *   - `check`: lint every docstring under the given files and directories.
 *   - `parse`: print one docstring's parsed structure as JSON.
 *
 * @example
 *   docstring-lint init --paths src,scripts
 *   docstring-lint check src --require-param-types
 *   docstring-lint check --exclude-files setup.py,docs/conf.py
 *   docstring-lint parse src/app/models.py --symbol User
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import fs from 'node:fs';
import path from 'node:path';
import checkCommand from './commands/check';
import initCommand from './commands/init';
import parseCommand from './commands/parse';

const pkg: { version: string } = JSON.parse(
  fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf8'),
);

const program = new Command();
program
  .name('docstring-lint')
  .description('Checker for Google-style docstrings in Python source files')
  .version(pkg.version, '-V, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(checkCommand);
program.addCommand(parseCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('docstring-lint', { font: 'Standard' });
  console.log(chalk.hex('#9be2ff')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  program.parse();
}
