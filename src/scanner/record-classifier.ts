/**
 * Turns one decoded JSONL value into a normalized record.
 *
 * This is the only place that knows the shapes Claude Code has written over
 * time. Everything downstream (parser, listing, renderers) works on
 * `ClassifiedRecord` / `LogEntry` and switches on `kind`.
 */

import type { ClassifiedRecord, ClassifyResult, LogEntry, TurnKind } from '../types/session.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function parseTimestamp(value: unknown): Date | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function asTurnKind(value: unknown): TurnKind | undefined {
  return value === 'user' || value === 'assistant' ? value : undefined;
}

/**
 * Concatenate the text blocks of a message body. Strings pass through;
 * thinking, image and tool blocks are skipped.
 */
export function extractText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';

  const parts: string[] = [];
  for (const block of content) {
    if (typeof block === 'string') {
      parts.push(block);
    } else if (isObject(block) && block.type === 'text' && typeof block.text === 'string') {
      parts.push(block.text);
    }
  }
  return parts.join('\n');
}

function toolResultText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) return extractText(content);
  if (content === undefined || content === null) return '';
  return JSON.stringify(content);
}

function toolEntries(content: unknown, rawIndex: number, timestamp: Date | undefined): LogEntry[] {
  if (!Array.isArray(content)) return [];

  const entries: LogEntry[] = [];
  for (const block of content) {
    if (!isObject(block)) continue;

    if (block.type === 'tool_use') {
      entries.push({
        kind: 'tool_use',
        rawIndex,
        parentIndex: rawIndex,
        timestamp,
        text: '',
        toolName: optionalString(block.name) ?? 'unknown',
        toolInput: block.input,
        toolUseId: optionalString(block.id),
      });
    } else if (block.type === 'tool_result') {
      entries.push({
        kind: 'tool_result',
        rawIndex,
        parentIndex: rawIndex,
        timestamp,
        text: toolResultText(block.content),
        toolUseId: optionalString(block.tool_use_id),
        isError: block.is_error === true,
      });
    }
  }
  return entries;
}

function classifyTurn(
  raw: JsonObject,
  kind: TurnKind,
  rawIndex: number,
  base: Omit<ClassifiedRecord, 'kind' | 'entries' | 'rawIndex'>,
): ClassifiedRecord {
  const message = isObject(raw.message) ? raw.message : undefined;
  const content = message ? message.content : raw.content;

  const turn: LogEntry = {
    kind,
    rawIndex,
    timestamp: base.timestamp,
    text: extractText(content),
  };

  return {
    ...base,
    kind,
    rawIndex,
    entries: [turn, ...toolEntries(content, rawIndex, base.timestamp)],
  };
}

/**
 * Classify one decoded line. Never throws; values that are not objects are
 * reported as failures for the caller to log and skip.
 *
 * Rules, first match wins:
 * 1. a `summary` string and no role: topic summary
 * 2. `type` of user, assistant or system: that kind; any other `type`: unknown
 * 3. no `type` but a user/assistant role: inferred chat turn
 * Tool blocks inside a turn become `tool_use` / `tool_result` entries after it.
 */
export function classifyRecord(value: unknown, rawIndex: number): ClassifyResult {
  if (!isObject(value)) {
    return { ok: false, rawIndex, reason: `expected a JSON object, got ${Array.isArray(value) ? 'array' : typeof value}` };
  }

  const message = isObject(value.message) ? value.message : undefined;
  const role = asTurnKind(message?.role) ?? asTurnKind(value.role);
  const rawType = typeof value.type === 'string' ? value.type : undefined;

  if (typeof value.summary === 'string' && role === undefined) {
    return {
      ok: true,
      record: {
        kind: 'summary',
        rawIndex,
        rawType,
        entries: [
          {
            kind: 'summary',
            rawIndex,
            text: value.summary,
            leafUuid: optionalString(value.leafUuid),
          },
        ],
      },
    };
  }

  const base = {
    rawType,
    timestamp: parseTimestamp(value.timestamp),
    gitBranch: optionalString(value.gitBranch),
    cwd: optionalString(value.cwd),
  };

  if (rawType !== undefined) {
    const typed = asTurnKind(rawType);
    if (typed) {
      return { ok: true, record: classifyTurn(value, typed, rawIndex, base) };
    }

    if (rawType === 'system') {
      const text = typeof value.content === 'string' ? value.content : extractText(message?.content);
      return {
        ok: true,
        record: {
          ...base,
          kind: 'system',
          rawIndex,
          entries: [{ kind: 'system', rawIndex, timestamp: base.timestamp, text }],
        },
      };
    }

    const text = extractText(message?.content ?? value.content);
    return {
      ok: true,
      record: {
        ...base,
        kind: 'unknown',
        rawIndex,
        entries: [{ kind: 'unknown', rawIndex, timestamp: base.timestamp, text, rawType }],
      },
    };
  }

  if (role) {
    return { ok: true, record: classifyTurn(value, role, rawIndex, base) };
  }

  return {
    ok: true,
    record: {
      ...base,
      kind: 'unknown',
      rawIndex,
      entries: [{ kind: 'unknown', rawIndex, timestamp: base.timestamp, text: extractText(value.content) }],
    },
  };
}
