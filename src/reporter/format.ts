/**
 * Shared text formatting: display widths, durations and timestamps
 */

import {
  differenceInDays,
  differenceInHours,
  differenceInMinutes,
  differenceInSeconds,
  format,
} from 'date-fns';

const ELLIPSIS = '...';

// East Asian wide and fullwidth ranges plus the common emoji blocks.
const WIDE_RANGES: Array<[number, number]> = [
  [0x1100, 0x115f],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe30, 0xfe4f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f900, 0x1f9ff],
  [0x20000, 0x3fffd],
];

// CSI sequences (colors, cursor moves, screen clears), OSC strings and
// two-character escapes.
const ANSI_PATTERN =
  /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)|\u001b[@-Z\\-_]/g;
// C0 and C1 controls other than tab and newline.
const CONTROL_PATTERN = /[\u0000-\u0008\u000b-\u001f\u007f-\u009f]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Remove escape sequences and control characters from log text so it cannot
 * restyle or move the cursor of the terminal it is written to.
 */
export function sanitizeText(text: string): string {
  return stripAnsi(text).replace(CONTROL_PATTERN, '');
}

function charWidth(codePoint: number): number {
  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) return 0;
  if (codePoint >= 0x300 && codePoint <= 0x36f) return 0;
  for (const [start, end] of WIDE_RANGES) {
    if (codePoint >= start && codePoint <= end) return 2;
  }
  return 1;
}

export function displayWidth(text: string): number {
  let width = 0;
  for (const char of stripAnsi(text)) {
    width += charWidth(char.codePointAt(0) ?? 0);
  }
  return width;
}

/**
 * Cut text so it fits in `width` columns, marking the cut with `...`.
 */
export function truncateToWidth(text: string, width: number): string {
  const clean = sanitizeText(text);
  if (displayWidth(clean) <= width) return clean;
  if (width <= ELLIPSIS.length) return ELLIPSIS.slice(0, Math.max(0, width));

  const budget = width - ELLIPSIS.length;
  let used = 0;
  let out = '';
  for (const char of clean) {
    const w = charWidth(char.codePointAt(0) ?? 0);
    if (used + w > budget) break;
    out += char;
    used += w;
  }
  return out + ELLIPSIS;
}

export function padToWidth(text: string, width: number, align: 'left' | 'right' = 'left'): string {
  const gap = Math.max(0, width - displayWidth(text));
  return align === 'left' ? text + ' '.repeat(gap) : ' '.repeat(gap) + text;
}

/**
 * `45s`, `12m`, `3h 5m`, `2d 4h`.
 */
export function formatDuration(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  if (s < 60) return `${s}s`;
  if (s < 3600) return `${Math.floor(s / 60)}m`;
  if (s < 86400) {
    const hours = Math.floor(s / 3600);
    const minutes = Math.floor((s % 3600) / 60);
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  const days = Math.floor(s / 86400);
  const hours = Math.floor((s % 86400) / 3600);
  return hours > 0 ? `${days}d ${hours}h` : `${days}d`;
}

/**
 * Compact age: `just now`, `5m ago`, `3h ago`, `6d ago`, then the date.
 */
export function formatRelativeTime(date: Date | undefined, now: Date = new Date()): string {
  if (!date) return '-';
  const seconds = differenceInSeconds(now, date);
  if (seconds < 60) return 'just now';
  const minutes = differenceInMinutes(now, date);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = differenceInHours(now, date);
  if (hours < 24) return `${hours}h ago`;
  const days = differenceInDays(now, date);
  if (days < 7) return `${days}d ago`;
  return format(date, 'yyyy-MM-dd');
}

export function formatClock(date: Date | undefined): string {
  return date ? format(date, 'HH:mm:ss') : '--:--:--';
}

export function formatDay(date: Date | undefined): string {
  return date ? format(date, 'yyyy-MM-dd') : 'unknown';
}

export function formatDateTime(date: Date | undefined): string {
  return date ? format(date, 'yyyy-MM-dd HH:mm:ss') : 'unknown';
}

const KEY_PARAM_MAP: Record<string, string> = {
  Bash: 'command',
  Edit: 'file_path',
  MultiEdit: 'file_path',
  Write: 'file_path',
  Read: 'file_path',
  NotebookEdit: 'notebook_path',
  Grep: 'pattern',
  Glob: 'pattern',
  Task: 'description',
  WebSearch: 'query',
  WebFetch: 'url',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One-line description of a tool call: the tool's key parameter when we know
 * it, otherwise the first string argument, otherwise compact JSON.
 */
export function describeToolInput(toolName: string, input: unknown): string {
  if (!isRecord(input)) {
    return input === undefined || input === null ? '' : JSON.stringify(input);
  }

  const paramKey = KEY_PARAM_MAP[toolName];
  if (paramKey) {
    const value = input[paramKey];
    if (typeof value === 'string') return value;
  }

  for (const value of Object.values(input)) {
    if (typeof value === 'string') return value;
  }

  return Object.keys(input).length > 0 ? JSON.stringify(input) : '';
}

export function hasMeaningfulInput(input: unknown): boolean {
  if (input === undefined || input === null) return false;
  if (typeof input === 'string') return input.trim() !== '';
  if (Array.isArray(input)) return input.length > 0;
  if (isRecord(input)) return Object.keys(input).length > 0;
  return true;
}
