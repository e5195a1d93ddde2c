/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { InMemoryUnitSource } from '../src/registry/loader.js';
import type { LoadedUnit } from '../src/registry/types.js';
import type { UnitRun } from '../src/unit.js';

export const SCAN_OPTIONS = { prefix: 'code', suffix: '.js' };

export function createBufferOutput(): { output: { write(s: string): void }; lines: string[] } {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export function parseLines(lines: string[]): Array<Record<string, unknown>> {
  return lines.map((line): Record<string, unknown> => JSON.parse(line));
}

export function createTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `toolhost-${label}-`));
}

export function touch(root: string, relativePath: string, content = ''): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}

export function createMemorySource(): InMemoryUnitSource {
  return new InMemoryUnitSource(SCAN_OPTIONS);
}

export function makeUnit(displayName: string, run: UnitRun, overrides?: Partial<LoadedUnit>): LoadedUnit {
  return {
    displayName,
    description: '',
    order: 999,
    numericId: 999999,
    candidate: `code_${displayName.toLowerCase().replace(/ /g, '_')}.js`,
    filePath: `code_${displayName.toLowerCase().replace(/ /g, '_')}.js`,
    run,
    ...overrides,
  };
}
