import fs from 'node:fs';
import path from 'node:path';

import { ConfigurationError, errorMessage } from '../errors.js';

/**
 * Compile a user supplied file name pattern. The pattern is anchored at the
 * start of the base name only, so `file` matches `file.conf`.
 */
export function filenamePattern(pattern: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch (error) {
    throw new ConfigurationError(`Invalid file name pattern "${pattern}": ${errorMessage(error)}`);
  }
}

/**
 * Target base name for `name`: the last capture group that took part in the
 * match, or `name` itself. Undefined when `name` does not match.
 */
export function renamedTarget(name: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(name);
  if (!match) return undefined;
  for (let index = match.length - 1; index > 0; index--) {
    const group = match[index];
    if (group !== undefined && group !== '') return group;
  }
  return name;
}

/**
 * Every file below `directory`, following symlinked files but not
 * symlinked directories.
 */
export function walkFiles(directory: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...walkFiles(fullPath));
    } else if (entry.isFile() || (entry.isSymbolicLink() && isFile(fullPath))) {
      files.push(fullPath);
    }
  }
  return files.sort();
}

function isFile(target: string): boolean {
  try {
    return fs.statSync(target).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Pair every content file with its target.
 *
 * A content file maps onto `target`, or into it when `target` is an
 * existing directory. A content directory is walked; files matching
 * `include` map into `target` with their relative directory kept and their
 * base name possibly renamed by the pattern.
 */
export function resolveTargets(
  content: string,
  target: string,
  include: RegExp,
): Array<[content: string, target: string]> {
  if (isDirectory(content)) {
    const pairs: Array<[string, string]> = [];
    for (const file of walkFiles(content)) {
      const name = renamedTarget(path.basename(file), include);
      if (name === undefined) continue;
      const relativeDirectory = path.dirname(path.relative(content, file));
      pairs.push([file, path.join(target, relativeDirectory, name)]);
    }
    return pairs;
  }

  if (isDirectory(target)) {
    const name = renamedTarget(path.basename(content), include) ?? path.basename(content);
    return [[content, path.join(target, name)]];
  }
  return [[content, target]];
}
