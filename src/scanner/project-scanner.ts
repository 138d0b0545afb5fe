/**
 * Enumerates project directories under the projects root and lists them
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';
import chalk, { type ChalkInstance } from 'chalk';
import type { ProjectEntry } from '../types/session.js';
import { decodeProjectPath, fsProbe, type DirectoryProbe } from '../codec/path-codec.js';
import { listSessionFiles, FIELD_SEPARATOR, type SessionFailure } from './index-reader.js';
import { parseSessionSummary } from './session-parser.js';
import { formatRelativeTime, padToWidth, truncateToWidth } from '../reporter/format.js';
import { fromFsError, wrapError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('projects');

export const PROJECT_LIST_HEADER_LINES = 3;

const TIME_WIDTH = 10;
const COUNT_WIDTH = 8;
const COLUMN_GAP = '  ';
const MIN_PATH_WIDTH = 20;
const MAX_RULE_WIDTH = 120;

export interface ScanProjectsOptions {
  maxSessionsPerProject: number;
  probe?: DirectoryProbe;
}

export interface ProjectListOptions extends ScanProjectsOptions {
  columns: number;
  now?: Date;
  colors?: ChalkInstance;
}

export interface ProjectScan {
  projects: ProjectEntry[];
  /** Project directories and session files that could not be read */
  failures: SessionFailure[];
}

interface TimedFile {
  filePath: string;
  mtimeMs: number;
}

async function filesByMtime(files: string[]): Promise<TimedFile[]> {
  const timed: TimedFile[] = [];
  for (const filePath of files) {
    try {
      const stat = await fs.stat(filePath);
      timed.push({ filePath, mtimeMs: stat.mtimeMs });
    } catch (err) {
      log.debug(`Cannot stat ${filePath}`, { reason: wrapError(err).message });
    }
  }
  return timed.sort((a, b) => b.mtimeMs - a.mtimeMs);
}

/**
 * Latest session timestamp in a project. Files are parsed newest first and
 * the walk stops as soon as the next file was last written before the best
 * timestamp found so far, or after `limit` files.
 */
async function findLastActivity(
  files: string[],
  limit: number,
  failures: SessionFailure[],
): Promise<{ lastActivity?: Date; parsed: number }> {
  let lastActivity: Date | undefined;
  let parsed = 0;

  for (const { filePath, mtimeMs } of await filesByMtime(files)) {
    if (parsed >= limit) break;
    if (lastActivity && mtimeMs < lastActivity.getTime()) break;

    try {
      const summary = await parseSessionSummary(filePath);
      parsed++;
      if (summary.lastTimestamp && (!lastActivity || summary.lastTimestamp > lastActivity)) {
        lastActivity = summary.lastTimestamp;
      }
    } catch (err) {
      const error = wrapError(err);
      failures.push({ filePath, error });
      log.warn(`Skipping unreadable session ${filePath}: ${error.message}`);
    }
  }

  return { lastActivity, parsed };
}

export function compareProjects(a: ProjectEntry, b: ProjectEntry): number {
  const at = a.lastActivity?.getTime();
  const bt = b.lastActivity?.getTime();

  if (at !== undefined && bt !== undefined && at !== bt) return bt - at;
  if (at !== undefined && bt === undefined) return -1;
  if (at === undefined && bt !== undefined) return 1;
  return a.encodedName < b.encodedName ? -1 : a.encodedName > b.encodedName ? 1 : 0;
}

/**
 * One ProjectEntry per directory under `root`, most recent activity first.
 * Directories and session files that cannot be read are logged, skipped and
 * returned as failures.
 */
export async function scanProjects(
  root: string,
  options: ScanProjectsOptions,
): Promise<ProjectScan> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    throw fromFsError(err, root);
  }

  const projects: ProjectEntry[] = [];
  const failures: SessionFailure[] = [];

  for (const dirent of dirents) {
    if (!dirent.isDirectory()) continue;
    const dirPath = join(root, dirent.name);

    let files: string[];
    try {
      files = await listSessionFiles(dirPath);
    } catch (err) {
      const error = wrapError(err);
      failures.push({ filePath: dirPath, error });
      log.warn(`Skipping unreadable project ${dirent.name}: ${error.message}`);
      continue;
    }

    const { lastActivity, parsed } = await findLastActivity(files, options.maxSessionsPerProject, failures);

    projects.push({
      encodedName: dirent.name,
      dirPath,
      decodedPath: decodeProjectPath(dirent.name, options.probe ?? fsProbe),
      sessionCount: files.length,
      lastActivity,
      parsedSessions: parsed,
    });
  }

  return { projects: projects.sort(compareProjects), failures };
}

export function formatProjectRow(
  project: ProjectEntry,
  columns: number,
  now: Date,
  c: ChalkInstance = chalk,
): string {
  const pathWidth = Math.max(MIN_PATH_WIDTH, columns - TIME_WIDTH - COUNT_WIDTH - COLUMN_GAP.length * 2);
  const cells = [
    c.dim(padToWidth(formatRelativeTime(project.lastActivity, now), TIME_WIDTH)),
    c.green(padToWidth(String(project.sessionCount), COUNT_WIDTH, 'right')),
    c.cyan(truncateToWidth(project.decodedPath, pathWidth)),
  ];
  return cells.join(COLUMN_GAP) + FIELD_SEPARATOR + project.encodedName;
}

/**
 * Exactly PROJECT_LIST_HEADER_LINES header lines, then one row per project
 * with the encoded directory name after the field separator.
 */
export async function* generateProjectList(
  root: string,
  options: ProjectListOptions,
): AsyncGenerator<string> {
  const c = options.colors ?? chalk;
  const now = options.now ?? new Date();
  const { projects, failures } = await scanProjects(root, options);

  yield c.bold(`Claude Code projects (${projects.length})`);
  yield c.bold(
    [padToWidth('TIME', TIME_WIDTH), padToWidth('SESSIONS', COUNT_WIDTH, 'right'), 'PATH'].join(COLUMN_GAP),
  );
  yield c.dim('─'.repeat(Math.min(options.columns, MAX_RULE_WIDTH)));

  for (const project of projects) {
    yield formatProjectRow(project, options.columns, now, c);
  }

  if (failures.length > 0) {
    log.warn(`${failures.length} project or session file(s) could not be read`, { dir: root });
  }
}
