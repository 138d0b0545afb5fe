/**
 * Builds the session listing for one project directory.
 *
 * Output is line-oriented for an external fuzzy selector: a fixed number of
 * header lines, then one row per session whose visible columns are followed by
 * a unit separator (0x1F) and the session id.
 */

import { promises as fs, type Dirent } from 'fs';
import { basename, join } from 'path';
import chalk, { type ChalkInstance } from 'chalk';
import type { SessionSummary } from '../types/session.js';
import { parseSessionSummary, SESSION_FILE_EXTENSION } from './session-parser.js';
import { decodeProjectPath } from '../codec/path-codec.js';
import {
  displayWidth,
  formatDuration,
  formatRelativeTime,
  padToWidth,
  truncateToWidth,
} from '../reporter/format.js';
import { fromFsError, wrapError, type CclogError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('index');

export const FIELD_SEPARATOR = '\x1f';
export const SESSION_LIST_HEADER_LINES = 4;

const TIME_WIDTH = 10;
const DURATION_WIDTH = 8;
const MESSAGES_WIDTH = 5;
const MAX_BRANCH_WIDTH = 20;
const MIN_PREVIEW_WIDTH = 20;
const COLUMN_GAP = '  ';
const MAX_RULE_WIDTH = 120;

export interface SessionFailure {
  filePath: string;
  error: CclogError;
}

export interface SessionScan {
  sessions: SessionSummary[];
  failures: SessionFailure[];
}

export interface ListOptions {
  columns: number;
  now?: Date;
  colors?: ChalkInstance;
}

/**
 * Session log files directly inside `projectDir`, sorted by name.
 */
export async function listSessionFiles(projectDir: string): Promise<string[]> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(projectDir, { withFileTypes: true });
  } catch (err) {
    throw fromFsError(err, projectDir);
  }

  const files: string[] = [];
  for (const d of dirents) {
    if (!d.name.endsWith(SESSION_FILE_EXTENSION)) continue;
    if (d.isFile() || (d.isSymbolicLink() && (await isLinkedFile(join(projectDir, d.name))))) {
      files.push(d.name);
    }
  }
  return files.sort().map(name => join(projectDir, name));
}

async function isLinkedFile(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch {
    // dangling link
    return false;
  }
}

/**
 * Most recent activity first; sessions without any timestamp last; ties by
 * file name so the order is stable across runs.
 */
export function compareSessions(a: SessionSummary, b: SessionSummary): number {
  const at = a.lastTimestamp?.getTime();
  const bt = b.lastTimestamp?.getTime();

  if (at !== undefined && bt !== undefined && at !== bt) return bt - at;
  if (at !== undefined && bt === undefined) return -1;
  if (at === undefined && bt !== undefined) return 1;

  const an = basename(a.filePath);
  const bn = basename(b.filePath);
  return an < bn ? -1 : an > bn ? 1 : 0;
}

/**
 * Parse every session in the directory. A file that fails is recorded in
 * `failures` and left out; it never stops the rest of the scan.
 */
export async function readSessionSummaries(
  projectDir: string,
  files?: string[],
): Promise<SessionScan> {
  const sessionFiles = files ?? (await listSessionFiles(projectDir));
  const sessions: SessionSummary[] = [];
  const failures: SessionFailure[] = [];

  for (const filePath of sessionFiles) {
    try {
      sessions.push(await parseSessionSummary(filePath));
    } catch (err) {
      const error = wrapError(err);
      log.warn(`Skipping unreadable session ${basename(filePath)}: ${error.message}`);
      failures.push({ filePath, error });
    }
  }

  sessions.sort(compareSessions);
  return { sessions, failures };
}

export interface ColumnLayout {
  preview: number;
  branch: number;
}

export function layoutColumns(columns: number, sessions: SessionSummary[]): ColumnLayout {
  const longestBranch = Math.max(0, ...sessions.map(s => displayWidth(s.gitBranch ?? '')));
  const branch = Math.min(MAX_BRANCH_WIDTH, longestBranch);

  const fixed =
    TIME_WIDTH + DURATION_WIDTH + MESSAGES_WIDTH + COLUMN_GAP.length * 3 +
    (branch > 0 ? branch + COLUMN_GAP.length : 0);

  return { preview: Math.max(MIN_PREVIEW_WIDTH, columns - fixed), branch };
}

function previewText(session: SessionSummary): string {
  if (session.firstUserMessagePreview) return session.firstUserMessagePreview;
  if (session.summaryText) return `[${session.summaryText.replace(/\s+/g, ' ').trim()}]`;
  return '(no messages)';
}

/**
 * One listing row: visible columns, separator, session id.
 */
export function formatSessionRow(
  session: SessionSummary,
  layout: ColumnLayout,
  now: Date,
  c: ChalkInstance = chalk,
): string {
  const cells = [
    c.dim(padToWidth(formatRelativeTime(session.lastTimestamp, now), TIME_WIDTH)),
    c.yellow(padToWidth(formatDuration(session.durationSeconds), DURATION_WIDTH)),
    c.green(padToWidth(String(session.messageCount), MESSAGES_WIDTH, 'right')),
  ];

  const preview = truncateToWidth(previewText(session), layout.preview);
  if (layout.branch > 0) {
    cells.push(padToWidth(preview, layout.preview));
    cells.push(c.magenta(truncateToWidth(session.gitBranch ?? '', layout.branch)));
  } else {
    cells.push(preview);
  }

  return cells.join(COLUMN_GAP).trimEnd() + FIELD_SEPARATOR + session.sessionId;
}

function headerLines(
  projectDir: string,
  count: number,
  layout: ColumnLayout,
  columns: number,
  c: ChalkInstance,
): string[] {
  const project = decodeProjectPath(basename(projectDir));
  const titles = [
    padToWidth('TIME', TIME_WIDTH),
    padToWidth('DURATION', DURATION_WIDTH),
    padToWidth('MSGS', MESSAGES_WIDTH, 'right'),
    layout.branch > 0 ? padToWidth('FIRST MESSAGE', layout.preview) : 'FIRST MESSAGE',
  ];
  if (layout.branch > 0) titles.push('BRANCH');

  return [
    c.bold(`Sessions for ${project} (${count})`),
    c.dim('Enter: id | Ctrl-v: view | Ctrl-p: path | Ctrl-r: resume | Ctrl-e: export | Ctrl-f: export filtered'),
    c.bold(titles.join(COLUMN_GAP).trimEnd()),
    c.dim('─'.repeat(Math.min(columns, MAX_RULE_WIDTH))),
  ];
}

/**
 * Yield the listing line by line: exactly SESSION_LIST_HEADER_LINES header
 * lines, then one row per session. Nothing is yielded before the directory
 * has been parsed because both the sort and the column layout depend on every
 * session; rows are then produced one at a time.
 *
 * Throws SessionFileError when `projectDir` itself cannot be read.
 */
export async function* generateSessionList(
  projectDir: string,
  options: ListOptions,
): AsyncGenerator<string> {
  const c = options.colors ?? chalk;
  const now = options.now ?? new Date();

  const { sessions, failures } = await readSessionSummaries(projectDir);
  const layout = layoutColumns(options.columns, sessions);

  yield* headerLines(projectDir, sessions.length, layout, options.columns, c);

  for (const session of sessions) {
    yield formatSessionRow(session, layout, now, c);
  }

  if (failures.length > 0) {
    log.warn(`${failures.length} session file(s) could not be read`, { dir: projectDir });
  }
}
