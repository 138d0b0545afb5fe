/**
 * Stream-parses JSONL session files into classified records and summaries
 */

import { promises as fs, type Stats } from 'fs';
import type { FileHandle } from 'fs/promises';
import { basename } from 'path';
import { createInterface } from 'readline';
import type {
  LogEntry,
  ParsedLine,
  SessionContent,
  SessionSummary,
} from '../types/session.js';
import { classifyRecord } from './record-classifier.js';
import { fromFsError, SessionFileError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { sanitizeText, truncateToWidth } from '../reporter/format.js';

const log = createLogger('parser');

export const PREVIEW_WIDTH = 80;
export const SESSION_FILE_EXTENSION = '.jsonl';

export function sessionIdFromPath(filePath: string): string {
  return basename(filePath, SESSION_FILE_EXTENSION);
}

async function statSessionFile(filePath: string): Promise<Stats> {
  let stat: Stats;
  try {
    stat = await fs.stat(filePath);
  } catch (err) {
    throw fromFsError(err, filePath);
  }
  if (stat.isDirectory()) {
    throw new SessionFileError(
      `Expected a file but found a directory: ${filePath}`,
      'IS_A_DIRECTORY',
      filePath,
    );
  }
  return stat;
}

/**
 * Yield one ParsedLine per non-blank line, in file order. Lines that are not
 * valid JSON come back as `malformed` instead of ending the stream, so a
 * half-written last line does not lose the rest of the session.
 */
export async function* streamEntries(filePath: string): AsyncGenerator<ParsedLine> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (err) {
    throw fromFsError(err, filePath);
  }

  try {
    if ((await handle.stat()).isDirectory()) {
      throw new SessionFileError(
        `Expected a file but found a directory: ${filePath}`,
        'IS_A_DIRECTORY',
        filePath,
      );
    }

    const rl = createInterface({
      input: handle.createReadStream({ encoding: 'utf-8' }),
      crlfDelay: Infinity,
    });

    let rawIndex = -1;
    try {
      for await (const line of rl) {
        rawIndex++;
        if (!line.trim()) continue;

        let value: unknown;
        try {
          value = JSON.parse(line);
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          log.debug(`Skipping malformed line ${rawIndex + 1}`, { file: basename(filePath), reason });
          yield { kind: 'malformed', rawIndex, reason };
          continue;
        }

        const result = classifyRecord(value, rawIndex);
        if (!result.ok) {
          log.debug(`Skipping unrecognized line ${rawIndex + 1}`, { file: basename(filePath), reason: result.reason });
          yield { kind: 'malformed', rawIndex, reason: result.reason };
          continue;
        }

        yield { kind: 'record', record: result.record };
      }
    } finally {
      rl.close();
    }
  } catch (err) {
    throw fromFsError(err, filePath);
  } finally {
    await handle.close();
  }
}

/**
 * Strip control sequences, collapse whitespace and cut to the preview width.
 */
export function toPreview(text: string, width = PREVIEW_WIDTH): string {
  return truncateToWidth(sanitizeText(text).replace(/\s+/g, ' ').trim(), width);
}

function isTurnRecordKind(kind: string): boolean {
  return kind === 'user' || kind === 'assistant';
}

/**
 * Read every entry of a session in file order. Used by the renderers, which
 * need the content and not just the summary.
 */
export async function readSessionEntries(filePath: string): Promise<SessionContent> {
  const entries: LogEntry[] = [];
  let messageCount = 0;
  let malformedLines = 0;
  let lastLineMalformed = false;

  for await (const line of streamEntries(filePath)) {
    if (line.kind === 'malformed') {
      malformedLines++;
      lastLineMalformed = true;
      continue;
    }
    lastLineMalformed = false;
    if (isTurnRecordKind(line.record.kind)) messageCount++;
    entries.push(...line.record.entries);
  }

  return { entries, messageCount, malformedLines, truncated: lastLineMalformed };
}

const summaryCache = new Map<string, SessionSummary>();

export function clearSummaryCache(): void {
  summaryCache.clear();
}

/**
 * Build a SessionSummary in one streaming pass. Summaries are memoised for
 * the life of the process on (path, mtime, size), so listing projects and
 * then sessions does not read a file twice.
 */
export async function parseSessionSummary(filePath: string): Promise<SessionSummary> {
  const stat = await statSessionFile(filePath);
  const cacheKey = `${filePath}\0${stat.mtimeMs}\0${stat.size}`;
  const cached = summaryCache.get(cacheKey);
  if (cached) return cached;

  let messageCount = 0;
  let firstTimestamp: Date | undefined;
  let lastTimestamp: Date | undefined;
  let firstUserMessagePreview = '';
  let gitBranch: string | undefined;
  let cwd: string | undefined;
  let hasSummary = false;
  let summaryText: string | undefined;
  let malformedLines = 0;
  let lastLineMalformed = false;

  for await (const line of streamEntries(filePath)) {
    if (line.kind === 'malformed') {
      malformedLines++;
      lastLineMalformed = true;
      continue;
    }
    lastLineMalformed = false;

    const { record } = line;

    if (record.kind === 'summary') {
      hasSummary = true;
      summaryText ??= record.entries[0]?.text;
      continue;
    }

    if (record.timestamp) {
      if (!firstTimestamp || record.timestamp < firstTimestamp) firstTimestamp = record.timestamp;
      if (!lastTimestamp || record.timestamp > lastTimestamp) lastTimestamp = record.timestamp;
    }

    gitBranch ??= record.gitBranch;
    cwd ??= record.cwd;

    if (isTurnRecordKind(record.kind)) {
      messageCount++;
      if (!firstUserMessagePreview && record.kind === 'user') {
        const text = record.entries[0]?.text ?? '';
        if (text.trim()) firstUserMessagePreview = toPreview(text);
      }
    }
  }

  const durationSeconds =
    firstTimestamp && lastTimestamp
      ? Math.max(0, Math.floor((lastTimestamp.getTime() - firstTimestamp.getTime()) / 1000))
      : 0;

  const summary: SessionSummary = {
    filePath,
    sessionId: sessionIdFromPath(filePath),
    messageCount,
    firstTimestamp,
    lastTimestamp,
    durationSeconds,
    firstUserMessagePreview,
    gitBranch,
    cwd,
    hasSummary,
    summaryText,
    malformedLines,
    truncated: lastLineMalformed,
    modifiedMs: stat.mtimeMs,
  };

  summaryCache.set(cacheKey, summary);
  return summary;
}
