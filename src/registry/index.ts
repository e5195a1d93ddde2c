export { UnitRegistry, buildRegistry } from './registry.js';
export type { ReplaceCallback } from './registry.js';
export { RegistryCache } from './cache.js';
export type { RegistryBuilder } from './cache.js';
export type { Candidate, UnitMetadata, LoadedUnit, LoadError, LoadErrorKind, LoadOutcome, UnitSource } from './types.js';
export { scanUnits, matchesConvention, stripSuffix, META_SUFFIX } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { resolveUnit } from './entry-point.js';
export { validateUnit, ENTRY_POINT } from './validation.js';
export type { EntryPointCheck } from './validation.js';
export {
  extractMetadata,
  defaultDisplayName,
  parseNumericId,
  loadMetadataFile,
  pickDeclarations,
  UnitDeclarationsSchema,
} from './metadata.js';
export type { UnitDeclarations } from './metadata.js';
export { loadCandidate, buildUnit, toLoadError, loadErrorKind, DirectoryUnitSource, InMemoryUnitSource } from './loader.js';
export { compareUnits, sortUnits, DEFAULT_ORDERING_POLICY } from './ordering.js';
export type { OrderingPolicy } from './ordering.js';
