import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { createLogger } from './log';

const log = createLogger('scanner');

export const SKIP_DIRS = new Set(['.git', '.venv', 'venv', '__pycache__', 'node_modules', 'build', 'dist', '.logs']);

export interface ScanOptions {
  extensions: string[];
  /** Globs relative to the root, on top of the root .gitignore. */
  ignore?: string[];
}

export function toPosix(relPath: string): string {
  return relPath.split(path.sep).join('/');
}

/**
 * Turns .gitignore lines into minimatch globs. Negations are not supported
 * and are dropped.
 */
export function gitignorePatterns(content: string): string[] {
  const patterns: string[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith('!')) continue;
    const body = line.replace(/\/+$/, '');
    const anchored = body.startsWith('/') || body.includes('/');
    const glob = anchored ? body.replace(/^\/+/, '') : `**/${body}`;
    patterns.push(glob);
    patterns.push(`${glob}/**`);
  }
  return patterns;
}

export function createIgnoreMatcher(patterns: string[]): (relPath: string) => boolean {
  return relPath => patterns.some(pattern => minimatch(relPath, pattern, { dot: true }));
}

function loadGitignore(root: string): string[] {
  const file = path.join(root, '.gitignore');
  if (!fs.existsSync(file)) return [];
  return gitignorePatterns(fs.readFileSync(file, 'utf8'));
}

/** Source files under `root` as sorted relative POSIX paths. */
export function scanFiles(root: string, options: ScanOptions): string[] {
  const ignored = createIgnoreMatcher([...loadGitignore(root), ...(options.ignore ?? [])]);
  const extensions = new Set(options.extensions);
  const files: string[] = [];

  const walk = (dir: string) => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      log.warn(`cannot read directory ${dir}`, err);
      return;
    }
    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      const rel = toPosix(path.relative(root, abs));
      if (entry.isDirectory()) {
        if (SKIP_DIRS.has(entry.name) || ignored(rel)) continue;
        walk(abs);
      } else if (entry.isFile() && extensions.has(path.extname(entry.name)) && !ignored(rel)) {
        files.push(rel);
      }
    }
  };

  walk(root);
  return files.sort();
}

export interface ResolvedPaths {
  /** root-relative POSIX paths, sorted and unique */
  files: string[];
  /** inputs that resolve outside the root, as given */
  outside: string[];
}

/**
 * Normalizes paths handed in by a caller to root-relative POSIX paths.
 * Relative inputs are taken relative to the root, not the process cwd.
 */
export function relativeToRoot(root: string, paths: string[]): ResolvedPaths {
  const absRoot = path.resolve(root);
  const files = new Set<string>();
  const outside: string[] = [];
  for (const p of paths) {
    const rel = path.relative(absRoot, path.resolve(absRoot, p));
    if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) {
      log.warn(`ignoring ${p}: outside ${absRoot}`);
      outside.push(p);
      continue;
    }
    files.add(toPosix(rel));
  }
  return { files: [...files].sort(), outside };
}
