/**
 * Runtime configuration, read from the environment and overridden by CLI flags
 */

import { homedir } from 'os';
import { join } from 'path';
import { ConfigError } from './utils/errors.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

export const DEFAULT_COLUMNS = 80;
export const DEFAULT_EXPORT_DIR = 'claude_chat';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const DEFAULT_MAX_RESULT_LINES = 12;
export const DEFAULT_MAX_SESSIONS_PER_PROJECT = 50;

export interface CclogConfig {
  /** Directory holding one encoded directory per project */
  projectsRoot: string;
  /** Terminal width used to size listing columns */
  columns: number;
  logLevel: LogLevel;
  /** Default output directory for Markdown exports */
  exportDir: string;
  /** Tool result lines shown per entry in the terminal view */
  maxResultLines: number;
  /** Upper bound on session files parsed per project when listing projects */
  maxSessionsPerProject: number;
}

export type ConfigOverrides = Partial<Record<keyof CclogConfig, string | undefined>>;

type Env = Record<string, string | undefined>;

export function defaultProjectsRoot(): string {
  return join(homedir(), '.claude', 'projects');
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`, 'INVALID_VALUE');
  }
  return parsed;
}

function nonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find(v => v !== undefined && v.trim() !== '');
}

/**
 * Build the configuration. CLI overrides win over the environment, which
 * wins over the defaults.
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): CclogConfig {
  const projectsRoot = nonEmpty(overrides.projectsRoot, env.CCLOG_PROJECTS_DIR) ?? defaultProjectsRoot();

  const columnsRaw = nonEmpty(overrides.columns, env.COLUMNS);
  const columns = columnsRaw
    ? parsePositiveInt('columns', columnsRaw)
    : (process.stdout.columns ?? DEFAULT_COLUMNS);

  const levelRaw = nonEmpty(overrides.logLevel, env.CCLOG_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(levelRaw)) {
    throw new ConfigError(
      `log level must be one of debug, info, warn, error, silent; got "${levelRaw}"`,
      'INVALID_VALUE',
    );
  }

  const exportDir = nonEmpty(overrides.exportDir, env.CCLOG_EXPORT_DIR) ?? DEFAULT_EXPORT_DIR;

  const resultLinesRaw = nonEmpty(overrides.maxResultLines, env.CCLOG_PREVIEW_RESULT_LINES);
  const maxResultLines = resultLinesRaw
    ? parsePositiveInt('maxResultLines', resultLinesRaw)
    : DEFAULT_MAX_RESULT_LINES;

  const maxSessionsRaw = nonEmpty(overrides.maxSessionsPerProject, env.CCLOG_MAX_PROJECT_SESSIONS);
  const maxSessionsPerProject = maxSessionsRaw
    ? parsePositiveInt('maxSessionsPerProject', maxSessionsRaw)
    : DEFAULT_MAX_SESSIONS_PER_PROJECT;

  return {
    projectsRoot,
    columns,
    logLevel: levelRaw,
    exportDir,
    maxResultLines,
    maxSessionsPerProject,
  };
}
