/**
 * Types for JSONL session records and the views derived from them
 */

export type EntryKind =
  | 'user'
  | 'assistant'
  | 'summary'
  | 'tool_use'
  | 'tool_result'
  | 'system'
  | 'unknown';

export type TurnKind = Extract<EntryKind, 'user' | 'assistant'>;

/** Normalized view of one record, or of one tool block inside a record. */
export interface LogEntry {
  kind: EntryKind;
  /** 0-based line number in the source file */
  rawIndex: number;
  /** Never set for summaries */
  timestamp?: Date;
  text: string;
  toolName?: string;
  toolInput?: unknown;
  toolUseId?: string;
  isError?: boolean;
  /** Summary backlink to the last message it covers */
  leafUuid?: string;
  /** Original `type` value of an unknown record */
  rawType?: string;
  /** rawIndex of the turn a tool entry belongs to */
  parentIndex?: number;
}

/** A classified line: the record-level kind plus the entries it expands to. */
export interface ClassifiedRecord {
  kind: Exclude<EntryKind, 'tool_use' | 'tool_result'>;
  rawIndex: number;
  rawType?: string;
  timestamp?: Date;
  gitBranch?: string;
  cwd?: string;
  entries: LogEntry[];
}

export type ClassifyResult =
  | { ok: true; record: ClassifiedRecord }
  | { ok: false; rawIndex: number; reason: string };

export type ParsedLine =
  | { kind: 'record'; record: ClassifiedRecord }
  | { kind: 'malformed'; rawIndex: number; reason: string };

export interface SessionSummary {
  filePath: string;
  sessionId: string;
  messageCount: number;
  firstTimestamp?: Date;
  lastTimestamp?: Date;
  durationSeconds: number;
  firstUserMessagePreview: string;
  gitBranch?: string;
  cwd?: string;
  hasSummary: boolean;
  summaryText?: string;
  malformedLines: number;
  /** Last non-blank line failed to decode, usually a write in progress */
  truncated: boolean;
  modifiedMs: number;
}

export interface SessionContent {
  entries: LogEntry[];
  messageCount: number;
  malformedLines: number;
  truncated: boolean;
}

export interface ProjectEntry {
  encodedName: string;
  dirPath: string;
  decodedPath: string;
  sessionCount: number;
  lastActivity?: Date;
  /** How many session files were actually parsed to find lastActivity */
  parsedSessions: number;
}
