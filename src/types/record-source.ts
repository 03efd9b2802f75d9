import type { SourcedRecord } from './character.js';

/**
 * Interface for record sources (a YAML directory, an inline fixture, ...).
 * The loader never reads files itself; a source hands it tagged records.
 */
export interface RecordSource {
    /** Human-readable source name, used in log lines */
    readonly name: string;

    /**
     * Produce zero or more records, each tagged with a source identifier.
     * Throws RecordSourceError when the source cannot be consulted at all.
     */
    read(): SourcedRecord[];
}

/**
 * Options for directory-backed sources.
 */
export interface RecordSourceOptions {
    /** File extensions to pick up, including the dot */
    extensions?: string[];
}
