/**
 * Unit contract and the `defineUnit` authoring helper.
 */

export type UnitRun = () => unknown;

/**
 * What a unit module exposes, either as named exports or as a default-exported
 * object. Only `run` is required.
 */
export interface UnitDefinition {
  readonly run: UnitRun;
  readonly name?: string;
  readonly description?: string;
  readonly order?: number;
}

export const DEFAULT_UNIT_ORDER = 999;
export const DEFAULT_NUMERIC_ID = 999999;

/**
 * Declare a unit for a module's default export.
 *
 * ```ts
 * export default defineUnit({
 *   name: 'Label Printer',
 *   order: 1,
 *   run: async () => { ... },
 * });
 * ```
 */
export function defineUnit(definition: UnitDefinition): UnitDefinition {
  return Object.freeze({ ...definition });
}
