import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { Chalk } from 'chalk';

export const plain = new Chalk({ level: 0 });

export const SAMPLE_SESSION = fileURLToPath(new URL('./fixtures/sample-session.jsonl', import.meta.url));

export function makeTempDir(prefix = 'cclog-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function jsonl(records: unknown[]): string {
  return records.map(r => JSON.stringify(r)).join('\n') + '\n';
}

/**
 * Write a session file. Records are serialized one per line; strings are
 * written verbatim so tests can include broken lines.
 */
export function writeSession(
  dir: string,
  name: string,
  lines: Array<unknown>,
  mtime?: Date,
): string {
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, name.endsWith('.jsonl') ? name : `${name}.jsonl`);
  const body = lines.map(l => (typeof l === 'string' ? l : JSON.stringify(l))).join('\n') + '\n';
  writeFileSync(filePath, body, 'utf-8');
  if (mtime) utimesSync(filePath, mtime, mtime);
  return filePath;
}

export function userTurn(text: unknown, timestamp: string, extra: Record<string, unknown> = {}) {
  return { type: 'user', message: { role: 'user', content: text }, timestamp, ...extra };
}

export function assistantTurn(content: unknown, timestamp: string, extra: Record<string, unknown> = {}) {
  return { type: 'assistant', message: { role: 'assistant', content }, timestamp, ...extra };
}
