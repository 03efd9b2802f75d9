/**
 * Public API: load character records, link relationships, inspect the result.
 */
export { Character } from './model/character.js';
export { CharacterLoader, loadFromSource } from './loader/character-loader.js';
export type { LoadResult, CharacterLoaderOptions } from './loader/character-loader.js';
export {
    LoadIssue,
    RecordParseError,
    ValidationError,
    DuplicateIdError,
    MultiplePlayersError,
    NoPlayerDesignatedError,
    DanglingReferenceWarning,
    RecordSourceError,
} from './loader/issues.js';
export type { IssueKind, IssueSeverity } from './loader/issues.js';
export { YamlDirectorySource } from './sources/yaml-directory.js';
export { GameSession, evaluateLoad } from './session/game-session.js';
export type { LoadVerdict } from './session/game-session.js';
export { buildKinshipGraph, summarizeKinship } from './graph/kinship.js';
export type { KinshipGraph, KinshipSummary, CharacterNodeAttributes, KinshipEdgeAttributes } from './graph/kinship.js';
export { renderExport, exportCharacters, isExportFormat, EXPORT_FORMATS } from './exporters/export.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig } from './utils/config.js';
export * from './types/index.js';
