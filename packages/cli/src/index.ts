#!/usr/bin/env node

/**
 * @worklog/cli - Main CLI entry point.
 * Generates the monthly worklog, or writes a starter configuration with
 * `worklog init`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import { CommanderError } from 'commander';
import { describeError, isErrnoException } from '@worklog/core';
import { createProgram, exitCodeFor } from './program.js';

// Load .env from the current working directory without overriding the
// environment. Scheduled runs set WORKLOG_AUTHOR this way.
function loadDotenv(dir: string): void {
  const envPath = path.resolve(dir, '.env');
  let content: string;
  try {
    content = fs.readFileSync(envPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw error;
  }

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    // Strip surrounding quotes
    if ((value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

async function main(): Promise<void> {
  try {
    loadDotenv(process.cwd());
    await createProgram().parseAsync(process.argv);
  } catch (error: unknown) {
    // commander has already printed usage errors; help and version exit 0
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    console.error(chalk.red(`\nError: ${describeError(error)}`));
    if (process.env.WORKLOG_DEBUG && error instanceof Error) {
      console.error(chalk.gray(error.stack ?? ''));
    }
    process.exitCode = exitCodeFor(error);
  }
}

void main();
