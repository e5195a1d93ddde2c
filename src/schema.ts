/**
 * TypeBox helpers shared by configuration and metadata validation.
 */

import type { TSchema } from '@sinclair/typebox';
import { Value, type ValueError } from '@sinclair/typebox/value';

function formatError(error: ValueError): string {
  return `${error.path || '/'}: ${error.message}`;
}

/** Returns one line per schema violation, or an empty list when `data` conforms. */
export function collectSchemaErrors(schema: TSchema, data: unknown): string[] {
  if (Value.Check(schema, data)) return [];
  const errors: string[] = [];
  for (const error of Value.Errors(schema, data)) {
    errors.push(formatError(error));
  }
  return errors;
}
