/**
 * Source discovery
 *
 * Walks a source tree and lists compilable files as candidates. Exclusions:
 * 1. Hidden entries and well-known build/dependency directories
 * 2. Bundles (.xcodeproj, .xcassets, ...) whose contents are never compiled
 * 3. Entries from .xcsyncignore and the `exclude` setting
 */
import * as fs from 'fs';
import * as path from 'path';
import type { CandidateFile } from '../types/index.js';
import { DEFAULT_SOURCE_EXTENSIONS } from './file-types.js';

export const IGNORE_FILE_NAME = '.xcsyncignore';

const SKIPPED_DIRECTORIES = new Set([
  'Build',
  'build',
  'DerivedData',
  'Pods',
  'Carthage',
  'node_modules',
]);

const BUNDLE_SUFFIXES = ['.xcodeproj', '.xcworkspace', '.app', '.framework', '.xcassets', '.xcframework', '.bundle'];

export interface DiscoveryOptions {
  extensions?: readonly string[];
  /** Base names or project-relative path prefixes to leave out */
  exclude?: string[];
}

/**
 * Parse a .xcsyncignore file: one entry per line, `#` starts a comment
 */
export function parseIgnoreFile(content: string): string[] {
  const entries: string[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    entries.push(normalizeEntry(line));
  }
  return entries;
}

/**
 * Load .xcsyncignore from the project directory
 */
export function loadIgnoreFile(projectDir: string): string[] {
  const ignorePath = path.join(projectDir, IGNORE_FILE_NAME);
  if (!fs.existsSync(ignorePath)) return [];
  return parseIgnoreFile(fs.readFileSync(ignorePath, 'utf-8'));
}

function normalizeEntry(entry: string): string {
  return entry.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, '');
}

/**
 * Whether an entry is excluded, by base name or by project-relative path prefix
 */
export function isExcluded(name: string, relativePath: string, exclude: string[]): boolean {
  return exclude.some(entry =>
    entry === name || entry === relativePath || relativePath.startsWith(`${entry}/`)
  );
}

/**
 * Convert an absolute or cwd-relative file path into a candidate relative to the project directory
 */
export function toCandidate(filePath: string, projectDir: string): CandidateFile {
  const absolute = path.resolve(filePath);
  return {
    displayName: path.basename(absolute),
    relativePath: path.relative(projectDir, absolute).split(path.sep).join('/'),
  };
}

/**
 * List compilable files below `sourceRoot`, depth first, in name order
 *
 * @param sourceRoot Directory to walk
 * @param projectDir Directory containing the .xcodeproj; candidate paths are relative to it
 */
export function discoverSourceFiles(
  sourceRoot: string,
  projectDir: string,
  options: DiscoveryOptions = {}
): CandidateFile[] {
  const extensions = options.extensions ?? DEFAULT_SOURCE_EXTENSIONS;
  const exclude = [...loadIgnoreFile(projectDir), ...(options.exclude ?? []).map(normalizeEntry)];
  const results: CandidateFile[] = [];

  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;

      const fullPath = path.join(dir, entry.name);
      const candidate = toCandidate(fullPath, projectDir);
      if (isExcluded(entry.name, candidate.relativePath, exclude)) continue;

      if (entry.isDirectory()) {
        if (SKIPPED_DIRECTORIES.has(entry.name)) continue;
        if (BUNDLE_SUFFIXES.some(suffix => entry.name.endsWith(suffix))) continue;
        walk(fullPath);
      } else if (entry.isFile() && extensions.includes(path.extname(entry.name).toLowerCase())) {
        results.push(candidate);
      }
    }
  };

  walk(path.resolve(sourceRoot));
  return results;
}
