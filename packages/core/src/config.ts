/**
 * YAML configuration loader for .worklog.yml files.
 * Handles loading, validation, and default values.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { IOError, ValidationError, isErrnoException } from './errors.js';

export const CONFIG_FILENAME = '.worklog.yml';

export const DEFAULT_IMAGE_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.webp',
  '.svg',
  '.avif',
];

const extensionSchema = z
  .string()
  .min(1)
  .transform((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());

const configSchema = z.object({
  version: z.number().default(1),
  template: z.string().min(1).default('WORKLOG-TEMPLATE.md'),
  outputDir: z.string().min(1).default('worklogs'),
  assets: z
    .object({
      dir: z.string().min(1).default('assets'),
      imageExtensions: z.array(extensionSchema).default(DEFAULT_IMAGE_EXTENSIONS),
      exclude: z.array(z.string()).default(['**/.*']),
    })
    .default({}),
  report: z
    .object({
      details: z.boolean().default(true),
      maxFilesPerCommit: z.number().int().min(0).default(20),
      emptyDays: z.enum(['omit', 'placeholder']).default('omit'),
    })
    .default({}),
  logging: z
    .object({
      enabled: z.boolean().default(false),
      dir: z.string().min(1).default('.worklog/logs'),
      level: z.enum(['debug', 'info', 'warn', 'error']).default('debug'),
    })
    .default({}),
});

export type WorklogConfig = z.infer<typeof configSchema>;

/** Default configuration when no .worklog.yml is found */
export function getDefaultConfig(): WorklogConfig {
  return configSchema.parse({});
}

/**
 * Load and validate a .worklog.yml config file.
 * Falls back to defaults if the file doesn't exist.
 */
export function loadConfig(projectDir: string): WorklogConfig {
  const configPath = path.join(projectDir, CONFIG_FILENAME);

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return getDefaultConfig();
    }
    throw new IOError('Cannot read config', configPath, { cause: error });
  }

  return parseConfig(raw, configPath);
}

/** Parse YAML text into a validated config */
export function parseConfig(raw: string, source = CONFIG_FILENAME): WorklogConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`${source} is not valid YAML: ${message}`, source);
  }

  // Convert snake_case YAML keys to camelCase for TS
  const normalized = normalizeKeys(parsed ?? {});
  const result = configSchema.safeParse(normalized);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`${source} is invalid: ${issues}`, source);
  }
  return result.data;
}

/**
 * Write a default .worklog.yml config file to the project directory.
 */
export function writeDefaultConfig(projectDir: string): string {
  const configPath = path.join(projectDir, CONFIG_FILENAME);
  const defaultYaml = `version: 1

# Header template read from the project directory. When the file is
# missing a built-in header is used.
template: WORKLOG-TEMPLATE.md

# One YYYY-MM.md file per month is written here
output_dir: worklogs

# Screenshots and attachments: assets/YYYY-MM/<file>.
# Files named YYYY-MM-DD-<name> are attached to that day's section,
# everything else goes to the trailing "Assets" section.
assets:
  dir: assets
  image_extensions: [${DEFAULT_IMAGE_EXTENSIONS.join(', ')}]
  exclude:
    - "**/.*"

report:
  details: true              # Per-commit date, files and message body
  max_files_per_commit: 20
  empty_days: omit           # omit | placeholder

# Session logs for troubleshooting scheduled runs. Keep the directory
# out of version control when enabling this.
logging:
  enabled: false
  dir: .worklog/logs
  level: debug
`;

  try {
    fs.writeFileSync(configPath, defaultYaml, 'utf-8');
  } catch (error) {
    throw new IOError('Cannot write config', configPath, { cause: error });
  }
  return configPath;
}

/** Recursively convert snake_case keys to camelCase */
function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}
