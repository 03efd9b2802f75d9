/**
 * Barrel export for all shared types.
 */
export { REQUIRED_FIELDS } from './character.js';
export type { RelationshipIds, RelationKind, SourcedRecord, RequiredField } from './character.js';
export { DEFAULT_CONFIG } from './config.js';
export type { KindredConfig, LogLevel, FailPolicy, ExportFormat } from './config.js';
export type { RecordSource, RecordSourceOptions } from './record-source.js';
