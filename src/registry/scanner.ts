/**
 * Directory scanner for discovering unit candidates.
 */

import { readdirSync, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import { ScanError } from '../errors.js';
import { toError } from '../utils/index.js';
import type { Candidate } from './types.js';

export const META_SUFFIX = '_meta.yaml';

export interface ScanOptions {
  prefix: string;
  suffix: string;
}

export function matchesConvention(name: string, options: ScanOptions): boolean {
  return name.startsWith(options.prefix) && name.endsWith(options.suffix);
}

export function stripSuffix(name: string, suffix: string): string {
  return name.endsWith(suffix) ? name.slice(0, name.length - suffix.length) : name;
}

function compareNames(a: Candidate, b: Candidate): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * List `<prefix>*<suffix>` entries directly under `root`. Subdirectories are not
 * entered. Candidates come back sorted by name so that scan order, and with it
 * the last-write-wins collision rule, does not depend on the filesystem.
 */
export function scanUnits(root: string, options: ScanOptions): Candidate[] {
  const rootResolved = resolve(root);

  let entries: Dirent[];
  try {
    entries = readdirSync(rootResolved, { withFileTypes: true });
  } catch (e) {
    throw new ScanError(rootResolved, { cause: toError(e) });
  }

  const names = new Set(entries.map((entry) => entry.name));
  const results: Candidate[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) continue;
    if (!matchesConvention(entry.name, options)) continue;

    const metaName = stripSuffix(entry.name, options.suffix) + META_SUFFIX;
    results.push({
      name: entry.name,
      filePath: join(rootResolved, entry.name),
      metaPath: names.has(metaName) ? join(rootResolved, metaName) : null,
    });
  }

  return results.sort(compareNames);
}
