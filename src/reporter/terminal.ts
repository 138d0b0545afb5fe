/**
 * Colorized terminal rendering of a session, used for `view` and the
 * selector's preview pane
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { LogEntry, SessionSummary } from '../types/session.js';
import { parseSessionSummary, readSessionEntries } from '../scanner/session-parser.js';
import {
  describeToolInput,
  formatClock,
  formatDateTime,
  formatDuration,
  sanitizeText,
  truncateToWidth,
} from './format.js';

export interface TerminalOptions {
  colors?: ChalkInstance;
  /** Tool result lines shown before the rest is elided */
  maxResultLines: number;
  /** Width used for one-line tool descriptions */
  columns?: number;
}

const DEFAULT_COLUMNS = 80;
const INDENT = '  ';

function indent(text: string, prefix: string): string[] {
  return text.split('\n').map(line => prefix + line);
}

function turnHeading(entry: LogEntry, c: ChalkInstance): string {
  const label = entry.kind === 'user' ? c.cyan.bold('User') : c.green.bold('Assistant');
  return `${c.dim(`[${formatClock(entry.timestamp)}]`)} ${label}`;
}

function renderToolUse(entry: LogEntry, columns: number, c: ChalkInstance): string[] {
  const name = sanitizeText(entry.toolName ?? 'unknown');
  const description = describeToolInput(name, entry.toolInput).split('\n')[0] ?? '';
  const room = Math.max(10, columns - INDENT.length - name.length - 3);
  const line = `${INDENT}${c.yellow.bold(`⚙ ${name}`)}`;
  return [description ? `${line} ${c.yellow(truncateToWidth(description, room))}` : line];
}

function renderToolResult(entry: LogEntry, maxLines: number, c: ChalkInstance): string[] {
  const label = entry.isError ? c.red('↳ error') : c.gray('↳ result');
  const lines = entry.text.replace(/\s+$/, '').split('\n');
  if (lines.length === 1 && lines[0] === '') {
    return [`${INDENT}${label} ${c.dim('(empty)')}`];
  }

  const shown = lines.slice(0, maxLines).map(line => c.gray(`${INDENT}${INDENT}${line}`));
  const out = [`${INDENT}${label}`, ...shown];
  if (lines.length > maxLines) {
    out.push(c.dim(`${INDENT}${INDENT}… ${lines.length - maxLines} more line(s)`));
  }
  return out;
}

/**
 * Render the entries of a session. Kinds map to fixed colors: user cyan,
 * assistant green, tool calls yellow, tool results gray, summaries magenta,
 * everything else dim. Escape sequences in the log text are removed, so a
 * chalk instance at level 0 gives plain text.
 */
export function renderEntries(entries: LogEntry[], options: TerminalOptions): string[] {
  const c = options.colors ?? chalk;
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const parentsWithTools = new Set(
    entries.filter(e => e.parentIndex !== undefined).map(e => e.parentIndex),
  );
  const out: string[] = [];

  for (const raw of entries) {
    const entry: LogEntry = { ...raw, text: sanitizeText(raw.text) };
    switch (entry.kind) {
      case 'user':
      case 'assistant': {
        const hasText = entry.text.trim() !== '';
        if (!hasText && !parentsWithTools.has(entry.rawIndex)) break;
        if (out.length > 0) out.push('');
        out.push(turnHeading(entry, c));
        if (hasText) out.push(...indent(entry.text.trim(), INDENT));
        break;
      }
      case 'tool_use':
        out.push(...renderToolUse(entry, columns, c));
        break;
      case 'tool_result':
        out.push(...renderToolResult(entry, options.maxResultLines, c));
        break;
      case 'summary':
        if (out.length > 0) out.push('');
        out.push(`${c.magenta.bold('Summary:')} ${c.magenta(entry.text)}`);
        break;
      case 'system':
        if (!entry.text.trim()) break;
        if (out.length > 0) out.push('');
        out.push(c.dim(`[${formatClock(entry.timestamp)}] System: ${entry.text.trim()}`));
        break;
      case 'unknown':
        if (!entry.text.trim()) break;
        if (out.length > 0) out.push('');
        out.push(c.dim(`[${formatClock(entry.timestamp)}] ${sanitizeText(entry.rawType ?? 'entry')}: ${entry.text.trim()}`));
        break;
    }
  }

  return out;
}

/**
 * Full colorized view of a session file.
 * Throws SessionFileError when the file cannot be opened.
 */
export async function renderTerminal(filePath: string, options: TerminalOptions): Promise<string> {
  const c = options.colors ?? chalk;
  const content = await readSessionEntries(filePath);
  const lines = renderEntries(content.entries, options);

  if (content.truncated) {
    lines.push('', c.yellow('(last line is incomplete; showing what could be parsed)'));
  } else if (content.malformedLines > 0) {
    lines.push('', c.yellow(`(${content.malformedLines} malformed line(s) skipped)`));
  }
  if (lines.length === 0) {
    lines.push(c.dim('(empty session)'));
  }

  return lines.join('\n');
}

export function formatInfo(summary: SessionSummary, c: ChalkInstance = chalk): string {
  const rows: Array<[string, string]> = [
    ['Session', summary.sessionId],
    ['File', summary.filePath],
    ['Project', summary.cwd ?? '-'],
    ['Branch', summary.gitBranch ?? '-'],
    ['Started', formatDateTime(summary.firstTimestamp)],
    ['Last', formatDateTime(summary.lastTimestamp)],
    ['Duration', formatDuration(summary.durationSeconds)],
    ['Messages', String(summary.messageCount)],
  ];
  if (summary.summaryText) rows.push(['Summary', summary.summaryText]);
  if (summary.firstUserMessagePreview) rows.push(['First', summary.firstUserMessagePreview]);
  if (summary.malformedLines > 0) {
    const note = summary.truncated ? ', last line incomplete' : '';
    rows.push(['Warnings', `${summary.malformedLines} malformed line(s) skipped${note}`]);
  }

  return rows.map(([label, value]) => `${c.bold(`${label}:`.padEnd(10))}${sanitizeText(value)}`).join('\n');
}

/**
 * Metadata block shown above the preview.
 */
export async function renderInfo(filePath: string, colors?: ChalkInstance): Promise<string> {
  return formatInfo(await parseSessionSummary(filePath), colors);
}
