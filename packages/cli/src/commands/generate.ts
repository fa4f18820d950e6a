/**
 * `worklog [YYYY-MM]` command (the default).
 *
 * Generates the month's worklog from git history, or regenerates a
 * single day with --day.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'node:path';
import {
  createGitClient,
  describeError,
  findProjectRoot,
  initLogger,
  loadConfig,
  shutdownLogger,
  type GitClient,
  type LogEntry,
} from '@worklog/core';
import { generateWorklog, periodLabel } from '@worklog/report';

/** Injection points for tests */
export interface CommandDeps {
  createGit?: (cwd: string) => GitClient;
  now?: () => Date;
}

interface GenerateCommandOptions {
  month?: string;
  day?: string;
  author?: string;
  path?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

function echoLogEntry(entry: LogEntry): void {
  const line = `  [${entry.category}] ${entry.message}`;
  console.error(entry.level === 'error' ? chalk.red(line) : chalk.gray(line));
}

export function registerGenerateCommand(program: Command, deps: CommandDeps = {}): void {
  program
    .command('generate', { isDefault: true })
    .description('Generate the worklog for a month (default: the current month)')
    .argument('[month]', 'Month as YYYY-MM')
    .option('--month <month>', 'Month as YYYY-MM')
    .option('--day <date>', 'Regenerate one day (YYYY-MM-DD) inside the month file')
    .option('--author <pattern>', 'Only commits whose author matches (default: $WORKLOG_AUTHOR)')
    .option('--path <dir>', 'Project directory (default: enclosing repository root)')
    .option('--dry-run', 'Print the worklog instead of writing it')
    .option('--verbose', 'Echo log entries to stderr')
    .action(async (month: string | undefined, options: GenerateCommandOptions) => {
      const projectDir = options.path
        ? path.resolve(options.path)
        : findProjectRoot(process.cwd());
      const config = loadConfig(projectDir);

      const logger = initLogger({
        logDir: config.logging.enabled ? path.resolve(projectDir, config.logging.dir) : undefined,
        level: config.logging.level,
        onLog: options.verbose ? echoLogEntry : undefined,
      });

      const spinner = ora('Generating worklog...').start();

      try {
        const createGit = deps.createGit ?? createGitClient;
        const result = await generateWorklog({
          cwd: projectDir,
          now: deps.now?.() ?? new Date(),
          git: createGit(projectDir),
          config,
          positional: month,
          month: options.month,
          day: options.day,
          author: options.author ?? (process.env.WORKLOG_AUTHOR || undefined),
          dryRun: options.dryRun,
        });

        const label = periodLabel(result.period);
        if (result.written) {
          spinner.succeed(
            `${result.merged ? 'Updated' : 'Wrote'} ${chalk.bold(result.outputPath)}`
          );
        } else {
          spinner.stop();
          process.stdout.write(result.document);
        }

        if (result.stats.commits === 0) {
          console.error(chalk.yellow(`  No commits found for ${label}.`));
        } else {
          console.error(
            chalk.gray(
              `  ${result.stats.commits} commits across ${result.stats.activeDays} days, ` +
                `${result.stats.assets} assets`
            )
          );
        }
      } catch (error: unknown) {
        spinner.fail('Worklog generation failed');
        logger.error('generate', describeError(error));
        throw error;
      } finally {
        await shutdownLogger();
      }
    });
}
