/**
 * `worklog init` command.
 *
 * Writes a default .worklog.yml and a starter WORKLOG-TEMPLATE.md into
 * the project directory. Existing files are kept unless --force is given.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { CONFIG_FILENAME, IOError, findProjectRoot, writeDefaultConfig } from '@worklog/core';
import { DEFAULT_TEMPLATE } from '@worklog/report';

const TEMPLATE_FILENAME = 'WORKLOG-TEMPLATE.md';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a default .worklog.yml and header template')
    .option('--path <dir>', 'Project directory (default: enclosing repository root)')
    .option('--force', 'Overwrite existing files')
    .action((options: { path?: string; force?: boolean }) => {
      const projectDir = options.path
        ? path.resolve(options.path)
        : findProjectRoot(process.cwd());

      console.log(chalk.bold('\n  Worklog Setup\n'));

      const configPath = path.join(projectDir, CONFIG_FILENAME);
      if (fs.existsSync(configPath) && !options.force) {
        console.log(chalk.gray(`  ${CONFIG_FILENAME} already exists, keeping it.`));
      } else {
        writeDefaultConfig(projectDir);
        console.log(chalk.green(`  ✓ Configuration written to ${chalk.bold(CONFIG_FILENAME)}`));
      }

      const templatePath = path.join(projectDir, TEMPLATE_FILENAME);
      if (fs.existsSync(templatePath) && !options.force) {
        console.log(chalk.gray(`  ${TEMPLATE_FILENAME} already exists, keeping it.`));
      } else {
        try {
          fs.writeFileSync(templatePath, DEFAULT_TEMPLATE, 'utf-8');
        } catch (error) {
          throw new IOError('Cannot write template', templatePath, { cause: error });
        }
        console.log(chalk.green(`  ✓ Header template written to ${chalk.bold(TEMPLATE_FILENAME)}`));
      }

      console.log(
        chalk.gray('\n  Run `worklog` to generate this month, or `worklog 2026-01` for another.\n')
      );
    });
}
