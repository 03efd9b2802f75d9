import { readdirSync, readFileSync, statSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import { parse } from 'yaml';
import type { RecordSource, RecordSourceOptions, SourcedRecord } from '../types/index.js';
import { RecordSourceError } from '../loader/issues.js';
import { getLogger } from '../utils/logger.js';

const DEFAULT_EXTENSIONS = ['.yaml', '.yml'];

/**
 * Reads one character record per YAML file from a directory.
 *
 * Files are taken in name order so repeated runs see the same sequence
 * (duplicate and player resolution depend on it). An entry that cannot be
 * stat'ed, read or parsed is handed to the loader as an error record; only
 * a directory that cannot be listed aborts the read.
 */
export class YamlDirectorySource implements RecordSource {
    readonly name: string;
    private readonly dir: string;
    private readonly extensions: ReadonlySet<string>;

    constructor(dir: string, options: RecordSourceOptions = {}) {
        this.dir = resolve(dir);
        this.name = `directory '${dir}'`;
        this.extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map((e) => e.toLowerCase()));
    }

    /**
     * List matching entry names, sorted. Subdirectories are skipped; files
     * and symlinks are kept and checked when read.
     */
    listFiles(): string[] {
        try {
            return readdirSync(this.dir, { withFileTypes: true })
                .filter((entry) => !entry.isDirectory() && this.extensions.has(extname(entry.name).toLowerCase()))
                .map((entry) => entry.name)
                .sort();
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            throw new RecordSourceError(`Characters directory not readable: ${this.dir} (${detail})`, this.dir);
        }
    }

    read(): SourcedRecord[] {
        const logger = getLogger();
        const files = this.listFiles();

        if (files.length === 0) {
            logger.warn({ dir: this.dir, extensions: [...this.extensions] }, 'No character files found');
            return [];
        }

        logger.debug({ dir: this.dir, files: files.length }, 'Reading character files');

        return files.map((file): SourcedRecord => {
            const path = join(this.dir, file);
            try {
                if (!statSync(path).isFile()) {
                    throw new Error(`Not a regular file: ${path}`);
                }
                const data: unknown = parse(readFileSync(path, 'utf-8'));
                return { source: file, data };
            } catch (error) {
                logger.warn({ file, error }, 'Failed to read character file');
                return { source: file, error: error instanceof Error ? error : new Error(String(error)) };
            }
        });
    }
}
