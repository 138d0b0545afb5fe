/**
 * Tests for Markdown rendering and export.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  buildMarkdown,
  exportAllFiltered,
  exportFileName,
  exportMarkdown,
  renderMarkdown,
  selectEntries,
} from '../../src/reporter/markdown.js';
import { clearSummaryCache, readSessionEntries } from '../../src/scanner/session-parser.js';
import { setLogLevel } from '../../src/utils/logger.js';
import {
  SAMPLE_SESSION,
  assistantTurn,
  makeTempDir,
  removeDir,
  userTurn,
  writeSession,
} from '../helpers.js';

const SAMPLE_MARKDOWN = [
  '# Claude Code Session sample-session',
  '',
  '**Date**: 2025-01-15',
  '**Messages**: 4',
  '**Duration**: 12s',
  '',
  '---',
  '',
  '<!-- entry 0 -->',
  '## User (10:30:00)',
  '',
  'Hello, can you help me?',
  '',
  '<!-- entry 1 -->',
  '## Assistant (10:30:05)',
  '',
  "Hello! I'd be happy to help you.",
  '',
  '<!-- entry 2 -->',
  '## Assistant (10:30:10)',
  '',
  '### Tool: bash',
  '',
  '```json',
  '{',
  '  "command": "ls -la"',
  '}',
  '```',
  '',
  '<!-- entry 3 -->',
  '## User (10:30:12)',
  '',
  '### Tool Result',
  '',
  '```',
  'total 8',
  'drwxr-xr-x  3 user  staff   96 Jan 15 10:30 .',
  '```',
  '',
  '---',
  '',
  '_4 message(s), 6 entries (2 user, 2 assistant, 1 tool call(s), 1 tool result(s))._',
  '',
].join('\n');

function sessionWithEmptyEntries() {
  return [
    userTurn('question', '2025-01-15T10:00:00Z'),
    assistantTurn([{ type: 'tool_use', id: 't1', name: 'Read', input: {} }], '2025-01-15T10:00:01Z'),
    userTurn([{ type: 'tool_result', tool_use_id: 't1', content: '' }], '2025-01-15T10:00:02Z'),
    assistantTurn([{ type: 'text', text: 'answer' }], '2025-01-15T10:00:03Z'),
  ];
}

describe('markdown', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    clearSummaryCache();
    setLogLevel('silent');
  });

  afterEach(() => {
    removeDir(dir);
    setLogLevel('warn');
  });

  describe('buildMarkdown', () => {
    it('renders the sample session', async () => {
      const content = await readSessionEntries(SAMPLE_SESSION);

      const { markdown, stats } = buildMarkdown('sample-session', content, { filterEmpty: false });

      expect(markdown).toBe(SAMPLE_MARKDOWN);
      expect(stats).toEqual({
        messages: 4,
        entries: 6,
        user: 2,
        assistant: 2,
        toolUse: 1,
        toolResult: 1,
        removed: 0,
      });
    });

    it('keeps turns whose tool calls survive filtering', async () => {
      const content = await readSessionEntries(SAMPLE_SESSION);

      const { markdown, stats } = buildMarkdown('sample-session', content, { filterEmpty: true });

      expect(stats.messages).toBe(4);
      expect(stats.removed).toBe(0);
      expect(markdown).toContain('### Tool: bash');
      expect(markdown.endsWith(' _0 empty entries removed._\n')).toBe(true);
    });

    it('drops empty tool calls and the turns left without content', async () => {
      const filePath = writeSession(dir, 'empties', sessionWithEmptyEntries());
      const content = await readSessionEntries(filePath);

      const unfiltered = buildMarkdown('empties', content, { filterEmpty: false });
      const filtered = buildMarkdown('empties', content, { filterEmpty: true });

      expect(unfiltered.stats.messages).toBe(4);
      expect(unfiltered.markdown).toContain('### Tool: Read');
      expect(filtered.stats.messages).toBe(2);
      expect(filtered.stats.removed).toBe(4);
      expect(filtered.markdown).not.toContain('### Tool');
      expect(filtered.markdown).toContain('**Messages**: 2');
      expect(filtered.markdown.trimEnd().split('\n').at(-1)).toBe(
        '_2 message(s), 2 entries (1 user, 1 assistant, 0 tool call(s), 0 tool result(s))._ _4 empty entries removed._',
      );
    });

    it('uses a longer fence when the output contains backticks', async () => {
      const filePath = writeSession(dir, 'ticks', [
        userTurn([{ type: 'tool_result', tool_use_id: 't', content: 'a ``` b' }], '2025-01-15T10:00:00Z'),
      ]);
      const content = await readSessionEntries(filePath);

      const { markdown } = buildMarkdown('ticks', content, { filterEmpty: false });

      expect(markdown).toContain('````\na ``` b\n````');
    });

    it('marks failed tool results and includes the topic summary', async () => {
      const filePath = writeSession(dir, 'err', [
        { type: 'summary', summary: 'Debug the build', leafUuid: 'l' },
        userTurn([{ type: 'tool_result', tool_use_id: 't', content: 'denied', is_error: true }], '2025-01-15T10:00:00Z'),
      ]);
      const content = await readSessionEntries(filePath);

      const { markdown } = buildMarkdown('err', content, { filterEmpty: false });

      expect(markdown).toContain('**Summary**: Debug the build\n');
      expect(markdown).toContain('### Tool Result (error)\n\n```\ndenied\n```');
    });

    it('leaves unknown records without text out', async () => {
      const filePath = writeSession(dir, 'unknown', [
        { type: 'file-history-snapshot', snapshot: {} },
        userTurn('hi', '2025-01-15T10:00:00Z'),
      ]);
      const content = await readSessionEntries(filePath);

      const { markdown, stats } = buildMarkdown('unknown', content, { filterEmpty: false });

      expect(stats.entries).toBe(1);
      expect(markdown).not.toContain('file-history-snapshot');
    });
  });

  describe('selectEntries', () => {
    it('filters to an order-preserving subset', async () => {
      const filePath = writeSession(dir, 'subset', sessionWithEmptyEntries());
      const { entries } = await readSessionEntries(filePath);

      const all = selectEntries(entries, false);
      const filtered = selectEntries(entries, true);

      expect(filtered.length).toBeLessThanOrEqual(all.length);
      const positions = filtered.map(e => all.indexOf(e));
      expect(positions.every(p => p >= 0)).toBe(true);
      expect([...positions].sort((a, b) => a - b)).toEqual(positions);
      expect(filtered.map(e => e.text)).toEqual(['question', 'answer']);
    });

    it('returns entries in file order', async () => {
      const { entries } = await readSessionEntries(SAMPLE_SESSION);
      expect(selectEntries(entries, true)).toEqual(entries);
    });
  });

  describe('exportFileName', () => {
    it('adds a suffix for filtered exports', () => {
      expect(exportFileName('abc', false)).toBe('abc.md');
      expect(exportFileName('abc', true)).toBe('abc_filtered.md');
    });
  });

  describe('renderMarkdown', () => {
    it('names the document after the file', async () => {
      const markdown = await renderMarkdown(SAMPLE_SESSION, { filterEmpty: false });
      expect(markdown).toBe(SAMPLE_MARKDOWN);
    });
  });

  describe('exportMarkdown', () => {
    it('creates the output directory and writes the document', async () => {
      const outDir = join(dir, 'out', 'nested');

      const result = await exportMarkdown(SAMPLE_SESSION, outDir, { filterEmpty: false });

      expect(result.outputPath).toBe(join(outDir, 'sample-session.md'));
      expect(result.stats.messages).toBe(4);
      expect(readFileSync(result.outputPath, 'utf-8')).toBe(SAMPLE_MARKDOWN);
    });

    it('overwrites with identical content on a second run', async () => {
      const outDir = join(dir, 'out');

      const first = await exportMarkdown(SAMPLE_SESSION, outDir, { filterEmpty: true });
      const before = readFileSync(first.outputPath, 'utf-8');
      await exportMarkdown(SAMPLE_SESSION, outDir, { filterEmpty: true });

      expect(first.outputPath).toBe(join(outDir, 'sample-session_filtered.md'));
      expect(readFileSync(first.outputPath, 'utf-8')).toBe(before);
    });

    it('fails with OUTPUT_DIR_FAILED when the directory cannot be created', async () => {
      const blocker = join(dir, 'blocker');
      writeFileSync(blocker, 'not a directory');

      await expect(
        exportMarkdown(SAMPLE_SESSION, join(blocker, 'out'), { filterEmpty: false }),
      ).rejects.toMatchObject({ name: 'ExportError', code: 'OUTPUT_DIR_FAILED' });
    });

    it('fails with FILE_NOT_FOUND for a missing session', async () => {
      await expect(
        exportMarkdown(join(dir, 'missing.jsonl'), join(dir, 'out'), { filterEmpty: false }),
      ).rejects.toMatchObject({ code: 'FILE_NOT_FOUND' });
      expect(existsSync(join(dir, 'out'))).toBe(false);
    });
  });

  describe('exportAllFiltered', () => {
    it('exports, skips and records failures without stopping', async () => {
      const projectDir = join(dir, 'project');
      const outDir = join(dir, 'out');
      writeSession(projectDir, 'a', [userTurn('first', '2025-01-15T10:00:00Z')]);
      const skipped = writeSession(projectDir, 'b', [{ type: 'summary', summary: 'Topic', leafUuid: 'l' }]);
      const failing = writeSession(projectDir, 'c', [userTurn('third', '2025-01-15T11:00:00Z')]);
      mkdirSync(join(outDir, 'c_filtered.md'), { recursive: true });

      const progress: Array<[number, number, string]> = [];
      const result = await exportAllFiltered(projectDir, outDir, (done, total, filePath) => {
        progress.push([done, total, filePath]);
      });

      expect(result.exported.map(e => e.outputPath)).toEqual([join(outDir, 'a_filtered.md')]);
      expect(result.skipped).toEqual([skipped]);
      expect(result.failed.map(f => [f.filePath, f.error.code])).toEqual([[failing, 'WRITE_FAILED']]);
      expect(existsSync(join(outDir, 'a_filtered.md'))).toBe(true);
      expect(existsSync(join(outDir, 'b_filtered.md'))).toBe(false);
      expect(progress).toEqual([
        [0, 3, join(projectDir, 'a.jsonl')],
        [1, 3, skipped],
        [2, 3, failing],
        [3, 3, ''],
      ]);
    });

    it('fails when the project directory is missing', async () => {
      await expect(exportAllFiltered(join(dir, 'missing'), join(dir, 'out'))).rejects.toMatchObject({
        code: 'FILE_NOT_FOUND',
      });
    });
  });
});
