/**
 * Markdown rendering and export of sessions
 */

import { promises as fs } from 'fs';
import { basename, join } from 'path';
import type { LogEntry, SessionContent } from '../types/session.js';
import { readSessionEntries, sessionIdFromPath } from '../scanner/session-parser.js';
import { listSessionFiles } from '../scanner/index-reader.js';
import { formatClock, formatDay, formatDuration, hasMeaningfulInput } from './format.js';
import { ExportError, wrapError, type CclogError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('export');

export interface MarkdownOptions {
  /** Drop entries with no text, and tool calls with no input or output */
  filterEmpty: boolean;
}

export interface MarkdownStats {
  messages: number;
  entries: number;
  user: number;
  assistant: number;
  toolUse: number;
  toolResult: number;
  /** Entries dropped by filterEmpty */
  removed: number;
}

export interface MarkdownDocument {
  markdown: string;
  stats: MarkdownStats;
}

export interface ExportResult {
  sessionId: string;
  outputPath: string;
  stats: MarkdownStats;
}

export interface BulkExportFailure {
  filePath: string;
  error: CclogError;
}

export interface BulkExportResult {
  exported: ExportResult[];
  /** Session files with no messages left after filtering */
  skipped: string[];
  failed: BulkExportFailure[];
}

export type BulkExportProgress = (done: number, total: number, filePath: string) => void;

function hasText(entry: LogEntry): boolean {
  return entry.text.trim() !== '';
}

function isMeaningfulTool(entry: LogEntry): boolean {
  return entry.kind === 'tool_use' ? hasMeaningfulInput(entry.toolInput) : hasText(entry);
}

/**
 * Entries that go into an export, in file order. Unknown records without
 * text are never exported. With `filterEmpty`, tool entries need input or
 * output, and a turn survives only with text or a surviving tool entry.
 */
export function selectEntries(entries: LogEntry[], filterEmpty: boolean): LogEntry[] {
  const exportable = entries.filter(e => e.kind !== 'unknown' || hasText(e));
  if (!filterEmpty) return exportable;

  const keptTools = new Set(
    exportable.filter(e => (e.kind === 'tool_use' || e.kind === 'tool_result') && isMeaningfulTool(e)),
  );
  const parentsWithTools = new Set([...keptTools].map(e => e.parentIndex));

  return exportable.filter(e => {
    switch (e.kind) {
      case 'tool_use':
      case 'tool_result':
        return keptTools.has(e);
      case 'user':
      case 'assistant':
        return hasText(e) || parentsWithTools.has(e.rawIndex);
      default:
        return hasText(e);
    }
  });
}

function fence(text: string, lang = ''): string {
  const longestRun = Math.max(2, ...(text.match(/`+/g) ?? []).map(run => run.length));
  const marker = '`'.repeat(longestRun + 1);
  return `${marker}${lang}\n${text}\n${marker}`;
}

function formatToolInput(input: unknown): string {
  if (input === undefined) return '{}';
  return JSON.stringify(input, null, 2);
}

function entrySection(entry: LogEntry): string[] {
  const time = formatClock(entry.timestamp);
  const text = entry.text.trim();

  switch (entry.kind) {
    case 'user':
    case 'assistant': {
      const label = entry.kind === 'user' ? 'User' : 'Assistant';
      const lines = [`<!-- entry ${entry.rawIndex} -->`, `## ${label} (${time})`, ''];
      if (text) lines.push(text, '');
      return lines;
    }
    case 'tool_use':
      return [`### Tool: ${entry.toolName ?? 'unknown'}`, '', fence(formatToolInput(entry.toolInput), 'json'), ''];
    case 'tool_result':
      return [entry.isError ? '### Tool Result (error)' : '### Tool Result', '', fence(entry.text.replace(/\s+$/, '')), ''];
    case 'summary':
      return [`<!-- entry ${entry.rawIndex} -->`, '## Summary', '', text, ''];
    case 'system':
      return [`<!-- entry ${entry.rawIndex} -->`, `## System (${time})`, '', text, ''];
    case 'unknown':
      return [`<!-- entry ${entry.rawIndex} -->`, `## ${entry.rawType ?? 'Entry'} (${time})`, '', text, ''];
  }
}

function countStats(selected: LogEntry[], removed: number): MarkdownStats {
  const count = (kind: LogEntry['kind']) => selected.filter(e => e.kind === kind).length;
  const user = count('user');
  const assistant = count('assistant');
  return {
    messages: user + assistant,
    entries: selected.length,
    user,
    assistant,
    toolUse: count('tool_use'),
    toolResult: count('tool_result'),
    removed,
  };
}

function timeSpan(entries: LogEntry[]): { first?: Date; last?: Date } {
  let first: Date | undefined;
  let last: Date | undefined;
  for (const { timestamp } of entries) {
    if (!timestamp) continue;
    if (!first || timestamp < first) first = timestamp;
    if (!last || timestamp > last) last = timestamp;
  }
  return { first, last };
}

/**
 * Build the Markdown document for already-parsed session content. Header and
 * footer counts describe the entries that were actually emitted.
 */
export function buildMarkdown(
  sessionId: string,
  content: SessionContent,
  options: MarkdownOptions,
): MarkdownDocument {
  const exportable = selectEntries(content.entries, false);
  const selected = options.filterEmpty ? selectEntries(content.entries, true) : exportable;
  const stats = countStats(selected, exportable.length - selected.length);
  const { first, last } = timeSpan(content.entries);
  const duration = first && last ? Math.floor((last.getTime() - first.getTime()) / 1000) : 0;
  const topic = content.entries.find(e => e.kind === 'summary');

  const lines = [
    `# Claude Code Session ${sessionId}`,
    '',
    `**Date**: ${formatDay(first)}`,
    `**Messages**: ${stats.messages}`,
    `**Duration**: ${formatDuration(duration)}`,
  ];
  if (topic) lines.push(`**Summary**: ${topic.text}`);
  lines.push('', '---', '');

  for (const entry of selected) {
    lines.push(...entrySection(entry));
  }

  lines.push('---', '');
  const parts = [
    `${stats.user} user`,
    `${stats.assistant} assistant`,
    `${stats.toolUse} tool call(s)`,
    `${stats.toolResult} tool result(s)`,
  ];
  let footer = `_${stats.messages} message(s), ${stats.entries} entries (${parts.join(', ')})._`;
  if (options.filterEmpty) footer += ` _${stats.removed} empty entries removed._`;
  lines.push(footer);
  if (content.truncated) {
    lines.push('', '_The session log ends with an incomplete line; it was left out._');
  }

  return { markdown: lines.join('\n') + '\n', stats };
}

/**
 * Markdown for one session file.
 * Throws SessionFileError when the file cannot be opened.
 */
export async function renderMarkdown(filePath: string, options: MarkdownOptions): Promise<string> {
  const content = await readSessionEntries(filePath);
  return buildMarkdown(sessionIdFromPath(filePath), content, options).markdown;
}

export function exportFileName(sessionId: string, filterEmpty: boolean): string {
  return filterEmpty ? `${sessionId}_filtered.md` : `${sessionId}.md`;
}

async function writeDocument(outDir: string, fileName: string, markdown: string): Promise<string> {
  try {
    await fs.mkdir(outDir, { recursive: true });
  } catch (err) {
    throw new ExportError(`Cannot create output directory ${outDir}`, 'OUTPUT_DIR_FAILED', err);
  }

  const outputPath = join(outDir, fileName);
  try {
    await fs.writeFile(outputPath, markdown, 'utf-8');
  } catch (err) {
    throw new ExportError(`Cannot write ${outputPath}`, 'WRITE_FAILED', err);
  }
  return outputPath;
}

/**
 * Write `<outDir>/<sessionId>.md` (or `_filtered.md`), creating `outDir` as
 * needed. Re-running overwrites the same file with the same content.
 */
export async function exportMarkdown(
  filePath: string,
  outDir: string,
  options: MarkdownOptions,
): Promise<ExportResult> {
  const sessionId = sessionIdFromPath(filePath);
  const content = await readSessionEntries(filePath);
  const { markdown, stats } = buildMarkdown(sessionId, content, options);
  const outputPath = await writeDocument(outDir, exportFileName(sessionId, options.filterEmpty), markdown);
  return { sessionId, outputPath, stats };
}

/**
 * Filtered export of every session in a project directory, in file-name
 * order. A failing session is recorded and the rest continue; files already
 * written stay in place.
 */
export async function exportAllFiltered(
  projectDir: string,
  outDir: string,
  onProgress?: BulkExportProgress,
): Promise<BulkExportResult> {
  const files = await listSessionFiles(projectDir);
  const result: BulkExportResult = { exported: [], skipped: [], failed: [] };

  for (const [i, filePath] of files.entries()) {
    onProgress?.(i, files.length, filePath);
    try {
      const sessionId = sessionIdFromPath(filePath);
      const content = await readSessionEntries(filePath);
      const { markdown, stats } = buildMarkdown(sessionId, content, { filterEmpty: true });

      if (stats.messages === 0) {
        log.debug(`Skipping ${basename(filePath)}: no messages after filtering`);
        result.skipped.push(filePath);
        continue;
      }

      const outputPath = await writeDocument(outDir, exportFileName(sessionId, true), markdown);
      result.exported.push({ sessionId, outputPath, stats });
    } catch (err) {
      const error = wrapError(err);
      log.warn(`Export failed for ${basename(filePath)}: ${error.message}`);
      result.failed.push({ filePath, error });
    }
  }

  onProgress?.(files.length, files.length, '');
  return result;
}
