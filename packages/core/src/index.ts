/**
 * @worklog/core - Shared types, errors, configuration, logging and git helpers.
 * This is the foundation package the report pipeline and the CLI depend on.
 */

// Types
export * from './types.js';

// Errors
export {
  WorklogError,
  ValidationError,
  ExternalToolError,
  IOError,
  describeError,
  isErrnoException,
} from './errors.js';

// Config
export {
  CONFIG_FILENAME,
  DEFAULT_IMAGE_EXTENSIONS,
  loadConfig,
  parseConfig,
  writeDefaultConfig,
  getDefaultConfig,
  type WorklogConfig,
} from './config.js';

// Logger
export {
  Logger,
  initLogger,
  getLogger,
  shutdownLogger,
  formatForFile,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

// Git
export {
  createGitClient,
  runGit,
  buildLogArgs,
  getCommitLog,
  parseLogOutput,
  LOG_FORMAT,
  type GitClient,
} from './git.js';

// Utils
export {
  pad2,
  readTextIfExists,
  toPosixPath,
  findProjectRoot,
} from './utils.js';
