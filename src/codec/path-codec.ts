/**
 * Encodes project paths into Claude Code's directory names and back.
 *
 * Claude Code stores the sessions of `/Users/me/my_app.web` under
 * `~/.claude/projects/-Users-me-my-app-web`: every `/`, `.` and `_` becomes
 * `-`. The transform is lossy, so decoding consults the filesystem.
 */

import { readdirSync, statSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';

const PLACEHOLDER = '-';
// Directory visits allowed per decode, on top of segments².
const BASE_VISIT_BUDGET = 64;
const ENCODED_CHARS = /[/._]/g;

/**
 * Read-only view of the filesystem used while decoding.
 */
export interface DirectoryProbe {
  /** Names of the subdirectories of `dir`, or null when it cannot be listed */
  listDirectories(dir: string): string[] | null;
}

export const fsProbe: DirectoryProbe = {
  listDirectories(dir) {
    try {
      const dirents = readdirSync(dir, { withFileTypes: true });
      const names: string[] = [];
      for (const d of dirents) {
        if (d.isDirectory()) {
          names.push(d.name);
        } else if (d.isSymbolicLink()) {
          try {
            if (statSync(join(dir, d.name)).isDirectory()) names.push(d.name);
          } catch {
            // dangling link
          }
        }
      }
      return names;
    } catch {
      return null;
    }
  },
};

/**
 * @example encodeProjectPath('/Users/me/my_app.web') === '-Users-me-my-app-web'
 */
export function encodeProjectPath(realPath: string): string {
  return realPath.replace(ENCODED_CHARS, PLACEHOLDER);
}

/**
 * Every placeholder back to a separator. Used when nothing matches on disk.
 */
export function naiveDecode(encodedName: string): string {
  return encodedName.replaceAll(PLACEHOLDER, '/');
}

/**
 * Order for directory names that encode identically: a literal `-` wins,
 * otherwise plain code-point order, so `proj-a` < `proj.a` < `proj_a`.
 */
function compareCandidates(target: string) {
  return (a: string, b: string): number => {
    if (a === target) return -1;
    if (b === target) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  };
}

/**
 * Decode an encoded project directory name into the path it came from.
 *
 * Walks the segments from `/`. In each directory the subdirectories are
 * listed once and matched against runs of the remaining segments, longest
 * run first. Failed `(directory, segment)` states are remembered, which keeps
 * the search polynomial in the number of segments instead of trying every
 * placement of separators. Directory trees where many different spellings
 * all exist are cut off by a visit budget quadratic in the segment count.
 *
 * Falls back to the deepest directory that did exist followed by the naive
 * decoding of the rest, and to the fully naive decoding when not even the
 * first segment matches. Never throws.
 */
export function decodeProjectPath(encodedName: string, probe: DirectoryProbe = fsProbe): string {
  if (!encodedName.startsWith(PLACEHOLDER)) {
    return naiveDecode(encodedName);
  }
  if (encodedName === PLACEHOLDER) return '/';

  const segments = encodedName.slice(1).split(PLACEHOLDER);
  const listings = new Map<string, string[] | null>();
  const failed = new Set<string>();
  let deepest = { dir: '/', index: 0 };
  let visitsLeft = BASE_VISIT_BUDGET + segments.length * segments.length;

  const list = (dir: string): string[] | null => {
    if (!listings.has(dir)) listings.set(dir, probe.listDirectories(dir));
    return listings.get(dir) ?? null;
  };

  const search = (dir: string, index: number): string | null => {
    if (index === segments.length) return dir;

    const key = `${dir}\0${index}`;
    if (failed.has(key) || visitsLeft <= 0) return null;
    visitsLeft--;

    if (index > deepest.index) deepest = { dir, index };

    const names = list(dir);
    if (names) {
      const byEncoding = new Map<string, string[]>();
      for (const name of names) {
        const encoded = encodeProjectPath(name);
        const bucket = byEncoding.get(encoded);
        if (bucket) bucket.push(name);
        else byEncoding.set(encoded, [name]);
      }

      for (let end = segments.length; end > index; end--) {
        const run = segments.slice(index, end).join(PLACEHOLDER);
        const matches = byEncoding.get(run);
        if (!matches) continue;

        for (const name of [...matches].sort(compareCandidates(run))) {
          const found = search(join(dir, name), end);
          if (found !== null) return found;
        }
      }
    }

    failed.add(key);
    return null;
  };

  const exact = search('/', 0);
  if (exact !== null) return exact;

  if (deepest.index > 0) {
    return join(deepest.dir, ...segments.slice(deepest.index).filter(s => s !== ''));
  }
  return naiveDecode(encodedName);
}

export interface ProjectDirProbe {
  isDirectory(path: string): boolean;
  hasSessionFiles(dir: string): boolean;
}

export const fsProjectDirProbe: ProjectDirProbe = {
  isDirectory(path) {
    try {
      return statSync(path).isDirectory();
    } catch {
      return false;
    }
  },
  hasSessionFiles(dir) {
    try {
      return readdirSync(dir).some(name => name.endsWith('.jsonl'));
    } catch {
      return false;
    }
  },
};

/**
 * Map a command-line target onto a project log directory. A directory that
 * already holds session files, or an existing directory directly under
 * `projectsRoot`, is used as is. Anything else is treated as a working
 * directory and encoded under `projectsRoot`.
 */
export function resolveProjectDir(
  target: string | undefined,
  projectsRoot: string,
  probe: ProjectDirProbe = fsProjectDirProbe,
): string {
  const workingDir = target ?? process.cwd();
  const absolute = isAbsolute(workingDir) ? workingDir : resolve(workingDir);

  if (target !== undefined) {
    const underRoot = dirname(absolute) === resolve(projectsRoot) && probe.isDirectory(absolute);
    if (underRoot || probe.hasSessionFiles(absolute)) return absolute;
  }
  return join(projectsRoot, encodeProjectPath(absolute));
}
