/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * How strictly a caller treats the issues a load accumulated.
 *
 *   any      : any recorded error fails the load
 *   critical : only a missing player character fails the load
 *   never    : the load always succeeds
 */
export type FailPolicy = 'any' | 'critical' | 'never';

/**
 * Export formats for the linked character graph.
 */
export type ExportFormat = 'json' | 'graphml' | 'mermaid' | 'csv';

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface KindredConfig {
    // Input
    charactersDir: string;
    extensions: string[];

    // Loading
    failOn: FailPolicy;
    escalateDanglingReferences: boolean;

    // Output
    exportFormat: ExportFormat;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: KindredConfig = {
    charactersDir: './data/characters',
    extensions: ['.yaml', '.yml'],
    failOn: 'critical',
    escalateDanglingReferences: false,
    exportFormat: 'json',
    logLevel: 'info',
    jsonLogs: false,
};
