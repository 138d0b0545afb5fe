/**
 * Tests for project path encoding and filesystem-guided decoding.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeProjectPath,
  encodeProjectPath,
  naiveDecode,
  resolveProjectDir,
  type DirectoryProbe,
} from '../../src/codec/path-codec.js';

/**
 * In-memory directory tree built from absolute paths.
 */
function treeProbe(paths: string[]): { probe: DirectoryProbe; calls: () => number } {
  const children = new Map<string, Set<string>>([['/', new Set()]]);
  for (const path of paths) {
    let parent = '/';
    for (const part of path.split('/').filter(Boolean)) {
      const dir = parent === '/' ? `/${part}` : `${parent}/${part}`;
      children.get(parent)?.add(part);
      if (!children.has(dir)) children.set(dir, new Set());
      parent = dir;
    }
  }

  let calls = 0;
  const probe: DirectoryProbe = {
    listDirectories(dir) {
      calls++;
      const names = children.get(dir);
      return names ? [...names] : null;
    },
  };
  return { probe, calls: () => calls };
}

describe('path-codec', () => {
  describe('encodeProjectPath', () => {
    it('replaces separators, dots and underscores', () => {
      expect(encodeProjectPath('/Users/u/my_app.config')).toBe('-Users-u-my-app-config');
    });

    it('keeps existing dashes', () => {
      expect(encodeProjectPath('/home/me/my-project')).toBe('-home-me-my-project');
    });

    it('handles the empty string and punctuation-only paths', () => {
      expect(encodeProjectPath('')).toBe('');
      expect(encodeProjectPath('/_./')).toBe('----');
    });
  });

  describe('naiveDecode', () => {
    it('turns every placeholder into a separator', () => {
      expect(naiveDecode('-Users-me-my-project')).toBe('/Users/me/my/project');
    });
  });

  describe('decodeProjectPath', () => {
    it('restores dashes that exist on disk', () => {
      const { probe } = treeProbe(['/Users/me/my-project']);
      expect(decodeProjectPath('-Users-me-my-project', probe)).toBe('/Users/me/my-project');
    });

    it('restores dots and underscores', () => {
      const { probe } = treeProbe(['/home/u/site.io', '/home/u/my_app']);
      expect(decodeProjectPath('-home-u-site-io', probe)).toBe('/home/u/site.io');
      expect(decodeProjectPath('-home-u-my-app', probe)).toBe('/home/u/my_app');
    });

    it('restores hidden directories', () => {
      const { probe } = treeProbe(['/Users/me/.config/tool']);
      expect(decodeProjectPath('-Users-me--config-tool', probe)).toBe('/Users/me/.config/tool');
    });

    it('prefers a literal dash when several spellings exist', () => {
      const { probe } = treeProbe(['/p/a.b', '/p/a_b', '/p/a-b']);
      expect(decodeProjectPath('-p-a-b', probe)).toBe('/p/a-b');
    });

    it('resolves proj-a over proj.a when both exist', () => {
      const { probe } = treeProbe(['/Users/alice/proj.a', '/Users/alice/proj-a']);
      expect(decodeProjectPath('-Users-alice-proj-a', probe)).toBe('/Users/alice/proj-a');
    });

    it('falls back to code-point order without a literal dash', () => {
      const { probe } = treeProbe(['/p/a_b', '/p/a.b']);
      expect(decodeProjectPath('-p-a-b', probe)).toBe('/p/a.b');
    });

    it('backtracks when the longest match leads nowhere', () => {
      const { probe } = treeProbe(['/w/a-b', '/w/a/b/c']);
      expect(decodeProjectPath('-w-a-b-c', probe)).toBe('/w/a/b/c');
    });

    it('keeps the deepest existing prefix and decodes the rest naively', () => {
      const { probe } = treeProbe(['/Users/me']);
      expect(decodeProjectPath('-Users-me-gone-dir', probe)).toBe('/Users/me/gone/dir');
    });

    it('decodes naively when nothing matches', () => {
      const { probe } = treeProbe([]);
      expect(decodeProjectPath('-x-y', probe)).toBe('/x/y');
    });

    it('decodes naively when the probe cannot list anything', () => {
      const probe: DirectoryProbe = { listDirectories: () => null };
      expect(decodeProjectPath('-a-b-c', probe)).toBe('/a/b/c');
    });

    it('decodes names without a leading placeholder naively', () => {
      const { probe } = treeProbe(['/foo']);
      expect(decodeProjectPath('foo-bar', probe)).toBe('foo/bar');
    });

    it('decodes the root', () => {
      expect(decodeProjectPath('-', treeProbe([]).probe)).toBe('/');
    });

    it('round-trips paths whose names have no encoded characters', () => {
      const paths = ['/srv/app', '/Users/me/code/tool', '/a/b/c/d/e'];
      const { probe } = treeProbe(paths);
      for (const path of paths) {
        expect(decodeProjectPath(encodeProjectPath(path), probe)).toBe(path);
      }
    });

    it('stays within a quadratic budget on pathological trees', () => {
      let calls = 0;
      const probe: DirectoryProbe = {
        listDirectories() {
          calls++;
          return ['x', 'x-x', 'x.x'];
        },
      };
      const segments = 31;
      const name = '-' + 'x-'.repeat(segments - 1) + 'y';

      const decoded = decodeProjectPath(name, probe);

      expect(decoded.endsWith('/y')).toBe(true);
      expect(calls).toBeLessThanOrEqual(64 + segments * segments);
    });
  });

  describe('resolveProjectDir', () => {
    it('uses a directory that already holds session files', () => {
      const probe = { isDirectory: () => true, hasSessionFiles: (dir: string) => dir === '/logs/-work-app' };
      expect(resolveProjectDir('/logs/-work-app', '/root/projects', probe)).toBe('/logs/-work-app');
    });

    it('uses an existing log directory under the root even without sessions', () => {
      const probe = { isDirectory: (dir: string) => dir === '/root/projects/-work-app', hasSessionFiles: () => false };
      expect(resolveProjectDir('/root/projects/-work-app', '/root/projects', probe)).toBe(
        '/root/projects/-work-app',
      );
    });

    it('encodes a working directory under the projects root', () => {
      const probe = { isDirectory: () => true, hasSessionFiles: () => false };
      expect(resolveProjectDir('/work/my_app', '/root/projects', probe)).toBe(
        '/root/projects/-work-my-app',
      );
    });

    it('defaults to the current directory', () => {
      const probe = { isDirectory: () => true, hasSessionFiles: () => true };
      expect(resolveProjectDir(undefined, '/root/projects', probe)).toBe(
        `/root/projects/${encodeProjectPath(process.cwd())}`,
      );
    });
  });
});
