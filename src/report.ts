/**
 * Operator-facing text: load error lines, dispatch failure reports and the
 * guidance shown when no unit is available.
 */

import type { DispatchFailureReport } from './dispatcher.js';
import type { ScanOptions } from './registry/scanner.js';
import type { LoadError, LoadErrorKind } from './registry/types.js';

export const LOAD_ERROR_PREFIXES: Readonly<Record<LoadErrorKind, string>> = Object.freeze({
  missing_entry_point: '[missing entry point]',
  not_callable: '[not callable]',
  load_exception: '[load exception]',
  invalid_metadata: '[invalid metadata]',
});

export const REMEDIATION_HINT = "Check the unit's code or contact the unit's author.";

export function formatLoadError(error: LoadError): string {
  return `${LOAD_ERROR_PREFIXES[error.kind]} ${error.message}`;
}

export function formatFailureReport(report: DispatchFailureReport): string {
  return [
    `Error running '${report.unit}'`,
    `Error type: ${report.errorKind}`,
    `Message: ${report.message}`,
    '',
    report.trace,
    '',
    `Tip: ${report.hint}`,
  ].join('\n');
}

export function noUnitsGuidance(options: ScanOptions): string {
  const example = `${options.prefix}_example${options.suffix}`;
  return [
    'No tool units found.',
    '',
    'To add a tool:',
    `  1. Create a file named ${options.prefix}<name>${options.suffix} (e.g. ${example}) in the units directory`,
    '  2. Export a run() function from it',
    '  3. Optionally export metadata:',
    "       name = 'My Tool'             display name",
    "       description = 'Does a thing'  shown next to the name",
    '       order = 1                     lower numbers are listed first',
    '',
    'Example:',
    `  // ${example}`,
    "  export const name = 'Example Tool';",
    '  export function run() {',
    "    console.log('Hello from Example Tool!');",
    '  }',
  ].join('\n');
}
