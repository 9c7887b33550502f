import { readdirSync, rmSync } from 'fs';
import { join, posix } from 'path';

const DENIED_DIRECTORIES = new Set([
  // build caches
  '.cache',
  '.nyc_output',
  'coverage',
  // compiled bytecode
  '__pycache__',
  // tests
  'test',
  'tests',
  '__tests__',
  '__mocks__',
  // documentation and samples
  'doc',
  'docs',
  'example',
  'examples',
  'sample',
  'samples',
  '.github',
]);

const DENIED_FILES: RegExp[] = [
  /\.map$/,
  /\.tsbuildinfo$/,
  /\.py[co]$/,
  /\.(test|spec)\.[cm]?[jt]sx?$/,
  /\.(md|markdown|rst)$/i,
  /^(readme|changelog|history|license|licence|authors)(\..*)?$/i,
  /\.so(\.\d+)+$/,
];

export function isDenied(name: string, isDirectory: boolean): boolean {
  if (isDirectory) {
    return DENIED_DIRECTORIES.has(name);
  }
  return DENIED_FILES.some((pattern) => pattern.test(name));
}

/** Deletes every denylisted path under root and returns them, relative and sorted. */
export function pruneDenied(root: string): string[] {
  const removed: string[] = [];

  const walk = (dir: string, relative: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const entryPath = join(dir, entry.name);
      const entryRelative = relative ? posix.join(relative, entry.name) : entry.name;
      const isDirectory = entry.isDirectory();

      if (isDenied(entry.name, isDirectory)) {
        rmSync(entryPath, { recursive: true, force: true });
        removed.push(entryRelative);
      } else if (isDirectory) {
        walk(entryPath, entryRelative);
      }
    }
  };

  walk(root, '');
  return removed.sort();
}

/** Regular files under root as sorted posix paths. */
export function listFiles(root: string): string[] {
  const files: string[] = [];

  const walk = (dir: string, relative: string) => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const entryRelative = relative ? posix.join(relative, entry.name) : entry.name;
      if (entry.isDirectory()) {
        walk(join(dir, entry.name), entryRelative);
      } else if (entry.isFile()) {
        files.push(entryRelative);
      }
    }
  };

  walk(root, '');
  return files.sort();
}
